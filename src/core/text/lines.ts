// CHANGE: Line splitting and offset → line mapping
// PURITY: CORE
// INVARIANT: lineStarts is strictly increasing and lineStarts[0] = 0
// COMPLEXITY: O(n) build, O(log n) lookup

import type { LineRange, SourceText } from "../types/index.js";
import { maskComments } from "./comments.js";

/**
 * Splits text into lines, accepting LF and CRLF endings.
 *
 * @pure true
 */
export function splitLines(content: string): readonly string[] {
	return content.split("\n").map((line) => line.replace(/\r$/u, ""));
}

/**
 * Computes the start offset of every line.
 *
 * @pure true
 */
export function computeLineStarts(content: string): readonly number[] {
	const starts = [0];
	for (let i = 0; i < content.length; i += 1) {
		if (content.charAt(i) === "\n") starts.push(i + 1);
	}
	return starts;
}

/**
 * Maps a character offset to its 1-based line number.
 *
 * @pure true
 * @precondition 0 ≤ offset
 * @complexity O(log n)
 */
export function lineOfOffset(
	lineStarts: readonly number[],
	offset: number,
): number {
	let lo = 0;
	let hi = lineStarts.length - 1;
	while (lo < hi) {
		const mid = Math.ceil((lo + hi) / 2);
		const start = lineStarts[mid] ?? 0;
		if (start <= offset) lo = mid;
		else hi = mid - 1;
	}
	return lo + 1;
}

/**
 * Builds a SourceText from already-read content.
 *
 * @pure true
 * @example
 * ```ts
 * const text = toSourceText("/lib/src/A.h", "src/A.h", "#if A\n#endif\n");
 * text.lines.length; // 3
 * ```
 */
export function toSourceText(
	path: string,
	relativePath: string,
	content: string,
): SourceText {
	const masked = maskComments(content);
	return {
		path,
		relativePath,
		content,
		masked,
		lines: splitLines(content),
		maskedLines: splitLines(masked),
		lineStarts: computeLineStarts(content),
	};
}

/**
 * Collapses sorted line numbers into inclusive ranges.
 *
 * @pure true
 * @example
 * ```ts
 * toRanges([3, 4, 5, 9]); // [{start:3,end:5},{start:9,end:9}]
 * ```
 */
export function toRanges(lines: readonly number[]): readonly LineRange[] {
	const sorted = [...new Set(lines)].sort((a, b) => a - b);
	const ranges: LineRange[] = [];
	for (const line of sorted) {
		const last = ranges.at(-1);
		if (last !== undefined && last.end + 1 === line) {
			ranges[ranges.length - 1] = { start: last.start, end: line };
		} else {
			ranges.push({ start: line, end: line });
		}
	}
	return ranges;
}

/**
 * Renders ranges as `3-5, 9`.
 *
 * @pure true
 */
export function formatRanges(ranges: readonly LineRange[]): string {
	return ranges
		.map((r) => (r.start === r.end ? `${r.start}` : `${r.start}-${r.end}`))
		.join(", ");
}
