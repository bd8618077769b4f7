// CHANGE: Addressable source text with line-position mapping
// PURITY: CORE
// INVARIANT: lines.length = lineStarts.length ∧ lines are 1-based in every public API
// COMPLEXITY: O(1) per access

/**
 * A file loaded as text.
 *
 * @remarks
 * - `relativePath` is POSIX-style relative to the verified library root
 * - `lineStarts[i]` is the character offset of line `i + 1`
 * - `masked` is `content` with comments blanked out (same length, same newlines)
 */
export interface SourceText {
	readonly path: string;
	readonly relativePath: string;
	readonly content: string;
	readonly masked: string;
	readonly lines: readonly string[];
	readonly maskedLines: readonly string[];
	readonly lineStarts: readonly number[];
}

/**
 * Inclusive line range, 1-based.
 */
export interface LineRange {
	readonly start: number;
	readonly end: number;
}

export interface SourceLocation {
	readonly file: string;
	readonly line: number;
}
