// CHANGE: Unit tests for whole-file self-guards of component sources
// WHY: Include guards, includes and pragmas sit outside the component guard in real headers
// PURITY: CORE
// INVARIANT: pass ↔ one top-level span covers every declaration line

import { describe, expect, it } from "vitest";

import {
	checkSelfGuards,
	declarationLines,
	evaluateSelfGuard,
} from "../../../src/core/checks/self-guard.js";
import type { LoadedSource } from "../../../src/core/checks/result.js";
import { scanConditionals } from "../../../src/core/preprocessor/conditionals.js";
import { component, lines, loaded, source, unreadable } from "../../utils/builders.js";

const GUARDED_HEADER = lines(
	"#ifndef WIDGET_H",
	"#define WIDGET_H",
	"",
	'#include "Config.h"',
	"",
	"#if HAS_WIDGET",
	"class Widget {",
	"};",
	"#endif // HAS_WIDGET",
	"",
	"#endif",
);

function sources(entries: Record<string, LoadedSource>): ReadonlyMap<string, LoadedSource> {
	return new Map(Object.entries(entries));
}

describe("declarationLines", () => {
	it("skips includes, the include-guard triplet, comments and blank lines", () => {
		const text = source(lines("/* License */", ...GUARDED_HEADER.trimEnd().split("\n")));
		expect(declarationLines(text, scanConditionals(text))).toEqual([7, 8, 9, 10]);
	});
});

describe("evaluateSelfGuard", () => {
	it("accepts a file wholly wrapped in one guard", () => {
		expect(evaluateSelfGuard(source(GUARDED_HEADER), "HAS_WIDGET")).toEqual({
			ok: true,
			span: { flag: "HAS_WIDGET", openLine: 6, closeLine: 9, depth: 1 },
		});
	});

	it("recognises an include guard below #pragma once", () => {
		const header = source(
			lines(
				"#pragma once",
				"#ifndef WIDGET_H",
				"#define WIDGET_H",
				"#if HAS_WIDGET",
				"class Widget {};",
				"#endif",
				"#endif",
			),
		);
		expect(declarationLines(header, scanConditionals(header))).toEqual([4, 5, 6]);
		expect(evaluateSelfGuard(header, "HAS_WIDGET")).toEqual({
			ok: true,
			span: { flag: "HAS_WIDGET", openLine: 4, closeLine: 6, depth: 1 },
		});
	});

	it("names the missing closure when the #endif is deleted", () => {
		const verdict = evaluateSelfGuard(
			source(lines("#if HAS_WIDGET", "class Widget {};")),
			"HAS_WIDGET",
		);
		expect(verdict).toEqual({
			ok: false,
			kind: "malformed-structure",
			detail: "Missing closure or unbalanced directives: #if at line 1 has no matching #endif",
		});
	});

	it("reports declarations before the opening and after the closing directive", () => {
		const verdict = evaluateSelfGuard(
			source(
				lines(
					'#include "Config.h"',
					"int helper();",
					"#if HAS_WIDGET",
					"class Widget {};",
					"#endif",
					"int after();",
				),
			),
			"HAS_WIDGET",
		);
		expect(verdict).toEqual({
			ok: false,
			kind: "guard-violation",
			detail:
				"guard opens at line 3 after first declaration at line 2; " +
				"guard closes at line 5 before last declaration at line 6; " +
				"unguarded lines 2, 6 outside #if HAS_WIDGET",
		});
	});

	it("fails a file with no guard for the flag", () => {
		const verdict = evaluateSelfGuard(
			source(lines("#if OTHER_FLAG", "class Widget {};", "#endif")),
			"HAS_WIDGET",
		);
		expect(verdict).toEqual({
			ok: false,
			kind: "guard-violation",
			detail: "Missing opening #if HAS_WIDGET guard",
		});
	});

	it("fails a guard split into several spans", () => {
		const verdict = evaluateSelfGuard(
			source(lines("#if HAS_WIDGET", "int a;", "#endif", "#if HAS_WIDGET", "int b;", "#endif")),
			"HAS_WIDGET",
		);
		expect(verdict).toEqual({
			ok: false,
			kind: "guard-violation",
			detail: "Guard split into 2 spans (lines 1-3, 4-6); the whole file must sit in one",
		});
	});
});

describe("checkSelfGuards", () => {
	const widget = component({ sources: ["src/Widget.h", "src/Widget.cpp"] });

	it("produces one result per definition file", () => {
		const results = checkSelfGuards(
			widget,
			sources({
				"src/Widget.h": loaded(GUARDED_HEADER, "src/Widget.h"),
				"src/Widget.cpp": loaded(
					lines('#include "Widget.h"', "#if HAS_WIDGET", "Widget::Widget() {}", "#endif"),
					"src/Widget.cpp",
				),
			}),
		);
		expect(results).toEqual([
			{
				section: "self-guard",
				description: "src/Widget.h is wholly guarded by #if HAS_WIDGET",
				passed: true,
				detail: "Guard spans lines 6-9",
				file: "src/Widget.h",
			},
			{
				section: "self-guard",
				description: "src/Widget.cpp is wholly guarded by #if HAS_WIDGET",
				passed: true,
				detail: "Guard spans lines 2-4",
				file: "src/Widget.cpp",
			},
		]);
	});

	it("reports unreadable and unloaded files as missing resources", () => {
		const results = checkSelfGuards(
			widget,
			sources({ "src/Widget.h": unreadable("src/Widget.h") }),
		);
		expect(results.map((r) => [r.kind, r.detail])).toEqual([
			["missing-resource", "Missing: src/Widget.h"],
			["missing-resource", "Missing: src/Widget.cpp"],
		]);
	});
});
