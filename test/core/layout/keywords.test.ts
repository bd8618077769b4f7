// CHANGE: Unit tests for keyword file validation
// WHY: Reported line numbers must be physical lines, past blanks and comments
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { checkKeywords, keywordLines } from "../../../src/core/layout/keywords.js";

const TYPES = ["KEYWORD1", "KEYWORD2", "LITERAL1"];

describe("keywordLines", () => {
	it("keeps physical line numbers past blanks and comments", () => {
		expect(keywordLines("# Datatypes\n\nWidget\tKEYWORD1\n")).toEqual([
			{ line: 3, text: "Widget\tKEYWORD1" },
		]);
	});
});

describe("checkKeywords", () => {
	it("passes a well-formed file", () => {
		const results = checkKeywords(
			"keywords.txt",
			"# Classes\nWidget\tKEYWORD1\nbegin\tKEYWORD2\n",
			TYPES,
		);
		expect(results.map((r) => r.detail)).toEqual([
			"Found 2 keyword lines",
			"All keywords properly formatted",
			"All types are valid",
		]);
	});

	it("reports the first error and how many follow", () => {
		const content = [
			"Widget\tKEYWORD1",
			"begin KEYWORD2",
			"end KEYWORD2",
			"",
			"MAX\tCONSTANT",
			"",
		].join("\n");
		const [, tabs, types] = checkKeywords("keywords.txt", content, TYPES);
		expect(tabs?.detail).toBe("Errors: Line 2: 'begin KEYWORD2' (and 1 more)");
		expect(types?.detail).toBe("Errors: Line 5: Invalid type 'CONSTANT'");
	});

	it("checks lines beyond the first ten", () => {
		const rows = Array.from({ length: 12 }, (_, i) => `name${i}\tKEYWORD2`);
		rows.push("late KEYWORD2");
		const [, tabs] = checkKeywords("keywords.txt", rows.join("\n"), TYPES);
		expect(tabs?.detail).toBe("Errors: Line 13: 'late KEYWORD2'");
	});

	it("fails an empty file", () => {
		const [empty] = checkKeywords("keywords.txt", "# only comments\n", TYPES);
		expect(empty).toMatchObject({ passed: false, detail: "Found 0 keyword lines" });
	});

	it("fails once for a missing file", () => {
		expect(checkKeywords("keywords.txt", null, TYPES)[0]?.detail).toBe("File not found: keywords.txt");
	});
});
