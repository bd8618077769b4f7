// CHANGE: Whole-identifier search over masked source
// PURITY: CORE
// INVARIANT: "BACNET_OBJECT_VALUE" never matches inside "BACNET_OBJECT_ANALOG_VALUE"
// COMPLEXITY: O(n) per search

import type { SourceText } from "../types/index.js";
import { lineOfOffset } from "./lines.js";

/**
 * Escapes regex metacharacters.
 *
 * @pure true
 */
export function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/gu, "\\$&");
}

/**
 * Regex matching `identifier` as a whole C identifier.
 *
 * @pure true
 */
export function wholeWordPattern(identifier: string, flags = "u"): RegExp {
	return new RegExp(
		`(?<![A-Za-z0-9_])${escapeRegExp(identifier)}(?![A-Za-z0-9_])`,
		flags,
	);
}

/**
 * True when `text` mentions `identifier` as a whole identifier.
 *
 * @pure true
 */
export function mentionsIdentifier(text: string, identifier: string): boolean {
	return wholeWordPattern(identifier).test(text);
}

/**
 * 1-based lines where `identifier` occurs outside comments.
 *
 * @pure true
 * @postcondition result is sorted ascending, one entry per occurrence
 */
export function findIdentifierLines(
	text: SourceText,
	identifier: string,
): readonly number[] {
	const pattern = wholeWordPattern(identifier, "gu");
	const lines: number[] = [];
	for (const m of text.masked.matchAll(pattern)) {
		lines.push(lineOfOffset(text.lineStarts, m.index ?? 0));
	}
	return lines;
}
