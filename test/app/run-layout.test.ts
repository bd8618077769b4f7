// CHANGE: End-to-end layout verification over temporary libraries
// PURITY: SHELL - real files under os.tmpdir(), output captured in arrays

import { Effect } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { collectLayoutResults, runLayoutVerification } from "../../src/app/run-layout.js";
import { DEFAULT_LAYOUT_CONFIG } from "../../src/core/config/defaults.js";
import type { LayoutConfig } from "../../src/core/types/index.js";
import { createReporter } from "../../src/shell/output/reporter.js";
import { lines } from "../utils/builders.js";
import { createTempLibrary, type TempLibrary } from "../utils/tempLibrary.js";

const PROPERTIES = lines(
	"name=Widgets",
	"version=1.0.0",
	"author=Test Author",
	"maintainer=Test Author",
	"sentence=Widgets for boards.",
	"paragraph=Tiered widgets.",
	"category=Communication",
	"url=https://example.test/widgets",
	"architectures=*",
);

const LIBRARY: Readonly<Record<string, string>> = {
	"library.properties": PROPERTIES,
	"keywords.txt": lines("# Classes", "Widget\tKEYWORD1", "begin\tKEYWORD2"),
	LICENSE: "MIT\n",
	"README.md": "# Widgets\n",
	"src/Widget.h": "class Widget {};\n",
	"src/stack/a.c": "",
	"src/stack/a.h": "",
	"examples/Blink/Blink.ino": "void setup() {}\n",
};

const CONFIG: LayoutConfig = {
	...DEFAULT_LAYOUT_CONFIG,
	requiredDirectories: [
		{ path: "src", description: "Source code directory" },
		{ path: "examples", description: "Example sketches directory" },
	],
	vendoredStack: { path: "src/stack", extensions: [".c", ".h"], minFiles: 2 },
};

describe("collectLayoutResults", () => {
	let lib: TempLibrary | undefined;

	afterEach(() => {
		lib?.cleanup();
		lib = undefined;
	});

	it("passes a well-formed library", async () => {
		lib = createTempLibrary(LIBRARY);
		const run = await Effect.runPromise(collectLayoutResults(lib.root, CONFIG));
		expect(run.results.filter((r) => !r.passed)).toEqual([]);
		expect(run.passed).toBe(true);
	});

	it("reports each layout defect in its section", async () => {
		lib = createTempLibrary({
			...LIBRARY,
			"Stray.cpp": "",
			"library.properties": PROPERTIES.replace("version=1.0.0", "version=1.0"),
			"examples/Blink/Other.ino": "",
		});
		lib.remove("keywords.txt");
		const run = await Effect.runPromise(collectLayoutResults(lib.root, CONFIG));
		expect(
			run.results.filter((r) => !r.passed).map((r) => [r.section, r.detail]),
		).toEqual([
			["required-files", `Missing: ${lib.root}/keywords.txt`],
			["source-location", "Found: Stray.cpp"],
			["metadata", "Version: 1.0"],
			["keywords", "File not found: keywords.txt"],
			["example-layout", "Errors: Other.ino should be in Other/ folder"],
		]);
	});
});

describe("runLayoutVerification", () => {
	let lib: TempLibrary | undefined;

	afterEach(() => {
		lib?.cleanup();
		lib = undefined;
	});

	it("prints every section and a passing summary", async () => {
		lib = createTempLibrary({
			...LIBRARY,
			"verify.config.json": JSON.stringify({
				layout: {
					requiredDirectories: ["src", "examples"],
					vendoredStack: null,
				},
			}),
		});
		const out: string[] = [];
		const report = { color: false, format: "text" as const, quiet: false };
		const code = await Effect.runPromise(
			runLayoutVerification(
				{ targetPath: lib.root, report },
				createReporter(report, (line) => out.push(line)),
			),
		);
		expect(code).toBe(0);
		expect(out).toContain("7. Vendored Stack Check");
		expect(out).toContain("✓ PASS - src/ exists (src)");
		expect(out).toContain("✓ ALL CHECKS PASSED (23/23)");
	});
});
