// CHANGE: Feature operation guard check with selectable matching rule
// FORMAT THEOREM:
//   nesting:     pass(f, file) ↔ ∀ l ∈ ops(file): ∃ s ∈ spans(f.flag): l ∈ s
//   first-match: pass(f, file) ↔ ∃ d = "#if f.flag …": d.line < max(lines(f.operations[0]))
// PURITY: CORE
// INVARIANT: both modes see the same comment-free text and the same occurrences
// COMPLEXITY: O(n · |operations|) per file

import { Either } from "effect";
import { match } from "ts-pattern";

import { detectGuardSpans, unguardedLines } from "../guards/spans.js";
import { scanConditionals } from "../preprocessor/conditionals.js";
import { describeIssues } from "../preprocessor/issues.js";
import { escapeRegExp, findIdentifierLines } from "../text/identifiers.js";
import { formatRanges, toRanges } from "../text/lines.js";
import type {
	CheckResult,
	Feature,
	FeatureGuardMode,
	SourceText,
} from "../types/index.js";
import { failed, type LoadedSource, passed } from "./result.js";

/**
 * Sorted unique lines where any operation of the feature occurs.
 *
 * @pure true
 */
export function operationLines(
	text: SourceText,
	feature: Feature,
): readonly number[] {
	const lines = feature.operations.flatMap((op) => findIdentifierLines(text, op));
	return [...new Set(lines)].sort((a, b) => a - b);
}

function nestingResult(
	feature: Feature,
	text: SourceText,
	lines: readonly number[],
	description: string,
): CheckResult {
	const file = text.relativePath;
	const guard = detectGuardSpans(text, feature.flag);
	if (guard.issues.length > 0) {
		return failed("feature-guard", description, "malformed-structure", {
			detail: describeIssues(guard.issues),
			file,
		});
	}
	const unguarded = unguardedLines(guard.spans, lines);
	if (unguarded.length > 0) {
		return failed("feature-guard", description, "guard-violation", {
			detail: `${feature.name} code exists but line ${formatRanges(toRanges(unguarded))} is not guarded`,
			file,
		});
	}
	return passed("feature-guard", description, {
		detail: `${feature.name} properly guarded`,
		file,
	});
}

/**
 * Forward search of the legacy checker: a plain `#if FLAG` line somewhere
 * before the last occurrence of the first operation. `#ifdef`, `#ifndef`
 * and conditions that do not start with the flag never match.
 */
function firstMatchResult(
	feature: Feature,
	text: SourceText,
	description: string,
): CheckResult {
	const file = text.relativePath;
	const [anchor] = feature.operations;
	const last =
		anchor === undefined ? undefined : findIdentifierLines(text, anchor).at(-1);
	const leading = new RegExp(`^${escapeRegExp(feature.flag)}(?![A-Za-z0-9_])`, "u");
	const opening =
		last === undefined
			? undefined
			: scanConditionals(text).directives.find(
					(d) => d.kind === "if" && d.line < last && leading.test(d.argument),
				);
	if (opening === undefined) {
		return failed("feature-guard", description, "guard-violation", {
			detail: `${feature.name} code exists but not guarded`,
			file,
		});
	}
	return passed("feature-guard", description, {
		detail: `${feature.name} guard opens at line ${opening.line}`,
		file,
	});
}

/**
 * One result per file containing any operation of `feature`.
 *
 * Unreadable files are skipped; their absence is reported by the checks that own them.
 *
 * @pure true
 * @example
 * ```ts
 * checkFeatureGuards(cov, [Either.right(text)], "nesting");
 * ```
 */
export function checkFeatureGuards(
	feature: Feature,
	files: readonly LoadedSource[],
	mode: FeatureGuardMode,
): readonly CheckResult[] {
	const results: CheckResult[] = [];
	for (const loaded of files) {
		if (Either.isLeft(loaded)) continue;
		const text = loaded.right;
		const lines = operationLines(text, feature);
		if (lines.length === 0) continue;
		const description = `${text.relativePath} ${feature.name} code is guarded by #if ${feature.flag}`;
		results.push(
			match(mode)
				.with("nesting", () => nestingResult(feature, text, lines, description))
				.with("first-match", () => firstMatchResult(feature, text, description))
				.exhaustive(),
		);
	}
	if (results.length === 0) {
		return [
			passed("feature-guard", `${feature.name} operations are guarded`, {
				detail: `No ${feature.operations.join("/")} occurrences found`,
			}),
		];
	}
	return results;
}
