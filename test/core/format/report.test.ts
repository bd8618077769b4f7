// CHANGE: Unit tests for text and jsonl report lines
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { ANSI_PALETTE, PLAIN_PALETTE, paletteFor } from "../../../src/core/format/palette.js";
import {
	fatalRecord,
	formatBanner,
	formatHeader,
	formatResult,
	formatSummary,
	GUARD_TEXTS,
	LAYOUT_TEXTS,
	resultRecord,
	summaryRecord,
} from "../../../src/core/format/report.js";

describe("paletteFor", () => {
	it("wraps text in SGR codes only when color is on", () => {
		expect(paletteFor(true).red("x")).toBe("\u001b[91mx\u001b[0m");
		expect(paletteFor(false).red("x")).toBe("x");
		expect(paletteFor(true)).toBe(ANSI_PALETTE);
	});
});

describe("text formatting", () => {
	it("renders a result with its detail indented", () => {
		expect(
			formatResult(
				{
					section: "self-guard",
					description: "src/Widget.h is wholly guarded by #if HAS_WIDGET",
					passed: false,
					kind: "guard-violation",
					detail: "Missing opening #if HAS_WIDGET guard",
				},
				PLAIN_PALETTE,
			),
		).toEqual([
			"✗ FAIL - src/Widget.h is wholly guarded by #if HAS_WIDGET",
			"      Missing opening #if HAS_WIDGET guard",
		]);
	});

	it("omits an empty detail line", () => {
		expect(
			formatResult({ section: "registry", description: "d", passed: true }, PLAIN_PALETTE),
		).toEqual(["✓ PASS - d"]);
	});

	it("frames section headers with rules", () => {
		const rule = "=".repeat(70);
		expect(formatHeader("1. Flag Registry Check", PLAIN_PALETTE)).toEqual([
			"",
			rule,
			"1. Flag Registry Check",
			rule,
			"",
		]);
	});

	it("prints the banner with the target", () => {
		expect(formatBanner(LAYOUT_TEXTS, "/lib", PLAIN_PALETTE)).toEqual([
			"Library Structure Verification",
			"Library directory: /lib",
			"",
		]);
	});

	it("summarizes success and failure with counts", () => {
		expect(
			formatSummary({ total: 4, passed: 4, failed: 0, ok: true }, GUARD_TEXTS, PLAIN_PALETTE),
		).toEqual([
			"✓ ALL CHECKS PASSED (4/4)",
			"",
			"Conditional compilation system is properly implemented!",
			"",
		]);
		expect(
			formatSummary({ total: 4, passed: 3, failed: 1, ok: false }, GUARD_TEXTS, PLAIN_PALETTE)[0],
		).toBe("⚠ SOME CHECKS FAILED (3/4)");
	});
});

describe("jsonl records", () => {
	it("serializes results, summaries and fatal errors one object per line", () => {
		expect(
			resultRecord({
				section: "usage-guard",
				description: "d",
				passed: false,
				kind: "guard-violation",
				file: "src/App.cpp",
			}),
		).toBe(
			'{"type":"result","section":"usage-guard","description":"d","passed":false,"kind":"guard-violation","file":"src/App.cpp"}',
		);
		expect(summaryRecord({ total: 2, passed: 1, failed: 1, ok: false })).toBe(
			'{"type":"summary","total":2,"passed":1,"failed":1,"ok":false}',
		);
		expect(fatalRecord("boom")).toBe('{"type":"fatal","message":"boom"}');
	});
});
