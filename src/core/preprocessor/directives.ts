// CHANGE: Lexical recognition of preprocessor directive lines
// PURITY: CORE
// INVARIANT: a directive starts with optional whitespace, `#`, optional whitespace, a word
// COMPLEXITY: O(n) where n = |line|

import { match } from "ts-pattern";

import type { DirectiveKind } from "../types/index.js";

export interface RawDirective {
	readonly keyword: string;
	readonly argument: string;
}

const DIRECTIVE_LINE = /^\s*#\s*([A-Za-z_]+)\b(.*)$/u;

/**
 * Classifies a directive keyword.
 *
 * @pure true
 */
export function directiveKind(keyword: string): DirectiveKind {
	return match(keyword)
		.with(
			"if",
			"ifdef",
			"ifndef",
			"elif",
			"else",
			"endif",
			"define",
			"undef",
			"include",
			"pragma",
			(k) => k,
		)
		.otherwise(() => "other");
}

/**
 * Parses one comment-masked logical line as a directive.
 *
 * @returns null when the line is not a directive
 * @pure true
 * @example
 * ```ts
 * parseDirectiveLine("  #  if BACNET_FEATURE_COV  ");
 * // { keyword: "if", argument: "BACNET_FEATURE_COV" }
 * ```
 */
export function parseDirectiveLine(line: string): RawDirective | null {
	const m = DIRECTIVE_LINE.exec(line);
	if (m === null) return null;
	const keyword = m[1] ?? "";
	const argument = (m[2] ?? "").replace(/\s+/gu, " ").trim();
	return { keyword, argument };
}

/**
 * True when a (masked) line continues on the next line.
 *
 * @pure true
 */
export function continuesOnNextLine(line: string): boolean {
	return /\\\s*$/u.test(line);
}

/**
 * Extracts the header name of an `#include` argument.
 *
 * @pure true
 * @example
 * ```ts
 * includeTarget('"hardware/BACnetRS485.h"'); // "hardware/BACnetRS485.h"
 * includeTarget("<Arduino.h>");              // "Arduino.h"
 * ```
 */
export function includeTarget(argument: string): string | null {
	const m = /^(?:"([^"]+)"|<([^>]+)>)/u.exec(argument);
	if (m === null) return null;
	return m[1] ?? m[2] ?? null;
}
