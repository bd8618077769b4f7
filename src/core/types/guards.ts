// CHANGE: Guard span model
// PURITY: CORE
// INVARIANT: openLine < closeLine; a span covers [openLine, closeLine)
// COMPLEXITY: O(1)

import type { StructuralIssue } from "./preprocessor.js";

/**
 * Lexical region conditioned on a flag.
 *
 * @remarks
 * - half-open `[openLine, closeLine)`: the closing directive line is outside
 * - `depth` is the directive-nesting depth at the opening directive
 */
export interface GuardSpan {
	readonly flag: string;
	readonly openLine: number;
	readonly closeLine: number;
	readonly depth: number;
}

/**
 * Spans of one flag in one file plus the structural issues found on the way.
 */
export interface GuardScan {
	readonly flag: string;
	readonly spans: readonly GuardSpan[];
	readonly issues: readonly StructuralIssue[];
}
