// CHANGE: Unit tests for layout checks over an in-memory listing
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	checkExampleLayout,
	checkRequiredDirectories,
	checkRequiredFiles,
	checkSourceLocation,
	checkVendoredStack,
	filesUnder,
	type LibraryListing,
} from "../../../src/core/layout/structure.js";

function listing(files: readonly string[], directories: readonly string[]): LibraryListing {
	return { root: "/lib", files: new Set(files), directories: new Set(directories) };
}

const healthy = listing(
	[
		"library.properties",
		"src/Library.h",
		"src/Widget.cpp",
		"src/stack/a.c",
		"src/stack/a.h",
		"src/stack/deep/b.c",
		"examples/Blink/Blink.ino",
		"examples/Scan/Scan.ino",
	],
	["src", "src/stack", "src/stack/deep", "examples", "examples/Blink", "examples/Scan"],
);

describe("filesUnder", () => {
	it("lists matching files recursively in sorted order", () => {
		expect(filesUnder(healthy, "src/stack/", [".c"])).toEqual([
			"src/stack/a.c",
			"src/stack/deep/b.c",
		]);
	});
});

describe("checkRequiredFiles / checkRequiredDirectories", () => {
	it("reports the absolute path either way", () => {
		const files = checkRequiredFiles(healthy, [
			{ path: "library.properties", description: "metadata" },
			{ path: "LICENSE", description: "License information" },
		]);
		expect(files.map((r) => [r.description, r.passed, r.detail])).toEqual([
			["library.properties exists (metadata)", true, "Path: /lib/library.properties"],
			["LICENSE exists (License information)", false, "Missing: /lib/LICENSE"],
		]);
		const [extras] = checkRequiredDirectories(healthy, [
			{ path: "extras", description: "Additional documentation" },
		]);
		expect(extras).toMatchObject({
			description: "extras/ exists (Additional documentation)",
			passed: false,
			kind: "missing-resource",
			detail: "Missing: /lib/extras",
		});
	});
});

describe("checkSourceLocation", () => {
	it("passes a library whose sources live in the source directory", () => {
		expect(
			checkSourceLocation(healthy, "src", [".h", ".cpp"]).map((r) => r.detail),
		).toEqual(["All source files in src/", "Found 3 source files"]);
	});

	it("names stray sources in the root", () => {
		const [stray] = checkSourceLocation(
			listing(["Widget.h", "main.cpp", "README.md"], []),
			"src",
			[".h", ".cpp"],
		);
		expect(stray).toMatchObject({
			description: "No source files (.h, .cpp) in root directory",
			passed: false,
			detail: "Found: Widget.h, main.cpp",
		});
	});
});

describe("checkExampleLayout", () => {
	it("passes sketches placed in folders of the same name", () => {
		expect(checkExampleLayout(healthy, "examples", ".ino").map((r) => r.detail)).toEqual([
			"Found 2 example sketches",
			"All examples properly structured",
		]);
	});

	it("lists every misplaced sketch", () => {
		const results = checkExampleLayout(
			listing(["examples/Blink/Main.ino", "examples/Loose.ino"], ["examples", "examples/Blink"]),
			"examples",
			".ino",
		);
		expect(results[1]?.detail).toBe(
			"Errors: Main.ino should be in Main/ folder; Loose.ino should be in Loose/ folder",
		);
	});

	it("fails once when the directory is absent", () => {
		expect(checkExampleLayout(listing([], []), "examples", ".ino")).toEqual([
			{
				section: "example-layout",
				description: "examples/ directory exists",
				passed: false,
				kind: "missing-resource",
				detail: "Directory not found: /lib/examples",
			},
		]);
	});
});

describe("checkVendoredStack", () => {
	const stack = { path: "src/stack", extensions: [".c", ".h"], minFiles: 3 };

	it("passes at exactly the minimum file count", () => {
		expect(checkVendoredStack(healthy, stack).map((r) => r.detail)).toEqual([
			"Path: /lib/src/stack",
			"Found 3 files",
		]);
	});

	it("fails below the minimum", () => {
		expect(checkVendoredStack(healthy, { ...stack, minFiles: 4 })[1]?.detail).toBe(
			"Insufficient files: found 3, expected at least 4",
		);
	});

	it("names the expected directory when the stack is absent", () => {
		expect(checkVendoredStack(healthy, { ...stack, path: "src/vendor" })).toEqual([
			{
				section: "vendored-stack",
				description: "src/vendor/ directory exists",
				passed: false,
				kind: "missing-resource",
				detail: "Vendored stack not found: /lib/src/vendor",
			},
		]);
	});

	it("is skipped when disabled", () => {
		expect(checkVendoredStack(healthy, null)).toEqual([]);
	});
});
