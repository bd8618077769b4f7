// CHANGE: Unit tests for component references outside their own files
// PURITY: CORE
// INVARIANT: files without a reference produce no result

import { describe, expect, it } from "vitest";

import {
	checkUsageGuards,
	unreadableResults,
} from "../../../src/core/checks/usage-guard.js";
import { component, lines, loaded, unreadable } from "../../utils/builders.js";

const widget = component();
const excluded = new Set(["src/Library.h"]);

describe("checkUsageGuards", () => {
	it("checks every file that references the component", () => {
		const tree = [
			loaded(lines("class Widget {};"), "src/Widget.h"),
			loaded(lines("Widget *w;"), "src/Library.h"),
			loaded(
				lines(
					'#include "Library.h"',
					"#if HAS_WIDGET",
					"Widget w;",
					"#endif",
					"void loop() {",
					"  // Widget is optional",
					"}",
				),
				"src/App.cpp",
			),
			loaded(lines("Widget w;"), "src/Bad.cpp"),
			loaded(lines("#if HAS_WIDGET", "Widget a;", "#endif", "Widget b;"), "src/Partial.cpp"),
			loaded(lines("int unrelated;"), "src/Other.cpp"),
		];
		const results = checkUsageGuards(widget, tree, excluded);
		expect(results.map((r) => [r.description, r.passed, r.detail])).toEqual([
			[
				"src/App.cpp uses Widget only under #if HAS_WIDGET",
				true,
				"References at line 3 are guarded",
			],
			[
				"src/Bad.cpp uses Widget only under #if HAS_WIDGET",
				false,
				"No #if HAS_WIDGET guard in file; references at line 1",
			],
			[
				"src/Partial.cpp uses Widget only under #if HAS_WIDGET",
				false,
				"Unguarded references at line 4",
			],
		]);
		expect(results[1]?.kind).toBe("guard-violation");
	});

	it("passes once when nothing references the component", () => {
		const results = checkUsageGuards(
			widget,
			[loaded(lines("int x;"), "src/Other.cpp")],
			excluded,
		);
		expect(results).toEqual([
			{
				section: "usage-guard",
				description: "Widget is not used outside its own files",
				passed: true,
				detail: "No references found",
			},
		]);
	});

	it("does not count longer identifiers as references", () => {
		const results = checkUsageGuards(
			widget,
			[loaded(lines("WidgetFactory f;", "MyWidget m;"), "src/Other.cpp")],
			excluded,
		);
		expect(results[0]?.description).toBe("Widget is not used outside its own files");
	});

	it("fails a referencing file with unbalanced directives as malformed", () => {
		const results = checkUsageGuards(
			widget,
			[loaded(lines("#if HAS_WIDGET", "Widget a;"), "src/Open.cpp")],
			excluded,
		);
		expect(results[0]).toMatchObject({
			passed: false,
			kind: "malformed-structure",
			detail: "#if at line 1 has no matching #endif",
			file: "src/Open.cpp",
		});
	});
});

describe("unreadableResults", () => {
	it("turns unreadable tree entries into failed results", () => {
		expect(
			unreadableResults([unreadable("src/Broken.cpp"), loaded("int x;\n", "src/Ok.cpp")]),
		).toEqual([
			{
				section: "usage-guard",
				description: "src/Broken.cpp is readable",
				passed: false,
				kind: "missing-resource",
				detail: "Missing: src/Broken.cpp",
				file: "src/Broken.cpp",
			},
		]);
	});
});
