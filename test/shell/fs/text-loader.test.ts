// CHANGE: Filesystem access against temporary library trees
// PURITY: SHELL - real files under os.tmpdir()

import { Effect, Either } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import {
	directoryExists,
	listTree,
	loadSource,
	loadTree,
	readSourceText,
	scanLibrary,
} from "../../../src/shell/fs/text-loader.js";
import { createTempLibrary, type TempLibrary } from "../../utils/tempLibrary.js";

describe("text-loader", () => {
	let lib: TempLibrary | undefined;

	afterEach(() => {
		lib?.cleanup();
		lib = undefined;
	});

	function library(files: Readonly<Record<string, string>>): TempLibrary {
		lib = createTempLibrary(files);
		return lib;
	}

	it("reads a file with comments masked", async () => {
		const { root } = library({ "src/A.h": "int a; // note\n" });
		const text = await Effect.runPromise(readSourceText(root, "src/A.h"));
		expect(text.relativePath).toBe("src/A.h");
		expect(text.lines).toEqual(["int a; // note", ""]);
		expect(text.maskedLines[0]?.includes("note")).toBe(false);
	});

	it("keeps a read failure as a value with the relative path", async () => {
		const { root } = library({});
		const loaded = await Effect.runPromise(loadSource(root, "src/Missing.h"));
		expect(Either.isLeft(loaded) && loaded.left.path).toBe("src/Missing.h");
	});

	it("lists files recursively, sorted, without hidden entries or node_modules", async () => {
		const { root } = library({
			"src/b/B.cpp": "",
			"src/A.h": "",
			"src/.cache/C.h": "",
			"src/node_modules/D.h": "",
			"src/notes.txt": "",
		});
		expect(await Effect.runPromise(listTree(root, "src", [".h", ".cpp"]))).toEqual([
			"src/A.h",
			"src/b/B.cpp",
		]);
	});

	it("loads the trees of existing roots only", async () => {
		const { root } = library({ "src/A.h": "int a;\n" });
		const tree = await Effect.runPromise(loadTree(root, ["src", "lib"], [".h"]));
		expect(tree.map((t) => (Either.isRight(t) ? t.right.relativePath : t.left.path))).toEqual([
			"src/A.h",
		]);
	});

	it("snapshots files and directories", async () => {
		const { root } = library({ "keywords.txt": "", "examples/Blink/Blink.ino": "" });
		const listing = await Effect.runPromise(scanLibrary(root));
		expect([...listing.files]).toEqual(["examples/Blink/Blink.ino", "keywords.txt"]);
		expect([...listing.directories]).toEqual(["examples", "examples/Blink"]);
		expect(await Effect.runPromise(directoryExists(`${root}/examples`))).toBe(true);
		expect(await Effect.runPromise(directoryExists(`${root}/keywords.txt`))).toBe(false);
	});
});
