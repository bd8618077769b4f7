// CHANGE: Syntax-highlighting keyword file checks
// PURITY: CORE
// INVARIANT: reported line numbers are physical 1-based lines of the file
// COMPLEXITY: O(n) where n = lines

import { failed, passed, plural } from "../checks/result.js";
import { splitLines } from "../text/lines.js";
import type { CheckResult } from "../types/index.js";

export interface KeywordLine {
	readonly line: number;
	readonly text: string;
}

/**
 * Non-blank, non-comment lines with their line numbers.
 *
 * @pure true
 */
export function keywordLines(content: string): readonly KeywordLine[] {
	return splitLines(content).flatMap((raw, index) => {
		const text = raw.trim();
		return text.length === 0 || text.startsWith("#")
			? []
			: [{ line: index + 1, text: raw }];
	});
}

function firstErrors(errors: readonly string[]): string {
	const [first] = errors;
	if (first === undefined) return "";
	return errors.length === 1
		? `Errors: ${first}`
		: `Errors: ${first} (and ${errors.length - 1} more)`;
}

/**
 * Keyword file not empty; every keyword line tab-delimited; every type known.
 *
 * @pure true
 */
export function checkKeywords(
	file: string,
	content: string | null,
	validTypes: readonly string[],
): readonly CheckResult[] {
	if (content === null) {
		return [
			failed("keywords", `${file} exists`, "missing-resource", {
				detail: `File not found: ${file}`,
				file,
			}),
		];
	}
	const lines = keywordLines(content);
	const tabErrors = lines
		.filter((k) => !k.text.includes("\t"))
		.map((k) => `Line ${k.line}: '${k.text.trim()}'`);
	const typeErrors = lines.flatMap((k) => {
		const type = k.text.split("\t")[1]?.trim();
		return type === undefined || validTypes.includes(type)
			? []
			: [`Line ${k.line}: Invalid type '${type}'`];
	});

	return [
		lines.length > 0
			? passed("keywords", `${file} is not empty`, {
					detail: `Found ${plural(lines.length, "keyword line")}`,
					file,
				})
			: failed("keywords", `${file} is not empty`, "format-violation", {
					detail: "Found 0 keyword lines",
					file,
				}),
		tabErrors.length === 0
			? passed("keywords", "Keywords use TAB delimiter", {
					detail: "All keywords properly formatted",
					file,
				})
			: failed("keywords", "Keywords use TAB delimiter", "format-violation", {
					detail: firstErrors(tabErrors),
					file,
				}),
		typeErrors.length === 0
			? passed("keywords", "Keywords use valid types", {
					detail: "All types are valid",
					file,
				})
			: failed("keywords", "Keywords use valid types", "format-violation", {
					detail: firstErrors(typeErrors),
					file,
				}),
	];
}
