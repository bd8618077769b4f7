// CHANGE: Human-readable rendering of structural issues
// PURITY: CORE
// COMPLEXITY: O(n) where n = |issues|

import { match } from "ts-pattern";

import type { StructuralIssue } from "../types/index.js";

/**
 * @pure true
 * @example
 * ```ts
 * describeIssue({ kind: "unmatched-open", line: 10, directive: "if" });
 * // "#if at line 10 has no matching #endif"
 * ```
 */
export function describeIssue(issue: StructuralIssue): string {
	return match(issue)
		.with(
			{ kind: "unmatched-open" },
			(i) => `#${i.directive} at line ${i.line} has no matching #endif`,
		)
		.with(
			{ kind: "unmatched-close" },
			(i) => `#endif at line ${i.line} has no matching #if`,
		)
		.with(
			{ kind: "orphan-branch" },
			(i) => `#${i.directive} at line ${i.line} has no matching #if`,
		)
		.with(
			{ kind: "branch-after-else" },
			(i) => `#${i.directive} at line ${i.line} follows #else at line ${i.elseLine}`,
		)
		.with(
			{ kind: "overlapping-spans" },
			(i) =>
				`guards for ${i.flag} at lines ${i.otherLine} and ${i.line} partially overlap`,
		)
		.exhaustive();
}

/**
 * @pure true
 */
export function describeIssues(issues: readonly StructuralIssue[]): string {
	return issues.map(describeIssue).join("; ");
}
