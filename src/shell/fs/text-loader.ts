// CHANGE: Read-only filesystem access for the verifier
// PURITY: SHELL
// EFFECT: Effect<SourceText | LibraryListing, FSError>
// INVARIANT: file handles are released on every exit path; listings are sorted POSIX paths relative to the root
// COMPLEXITY: O(f) where f = visited entries

import { promises as fsp } from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";

import type { LoadedSource } from "../../core/checks/result.js";
import { FSError } from "../../core/errors.js";
import type { LibraryListing } from "../../core/layout/structure.js";
import { toSourceText } from "../../core/text/lines.js";
import type { SourceText } from "../../core/types/index.js";

const SKIPPED_DIRECTORIES = new Set(["node_modules"]);

function toFSError(relativePath: string): (error: unknown) => FSError {
	return (error) =>
		new FSError({
			path: relativePath,
			detail: error instanceof Error ? error.message : String(error),
		});
}

function toPosix(relativePath: string): string {
	return relativePath.split(path.sep).join("/");
}

/**
 * Reads one file under `root` inside a scope that closes the descriptor.
 *
 * @effect Effect<SourceText, FSError>
 */
export function readSourceText(
	root: string,
	relativePath: string,
): Effect.Effect<SourceText, FSError> {
	const absolute = path.join(root, relativePath);
	const onError = toFSError(relativePath);
	return Effect.scoped(
		Effect.acquireRelease(
			Effect.tryPromise({ try: () => fsp.open(absolute, "r"), catch: onError }),
			(handle) => Effect.promise(() => handle.close()),
		).pipe(
			Effect.flatMap((handle) =>
				Effect.tryPromise({
					try: () => handle.readFile({ encoding: "utf8" }),
					catch: onError,
				}),
			),
			Effect.map((content) => toSourceText(absolute, relativePath, content)),
		),
	);
}

/**
 * Like {@link readSourceText} but the failure is kept as a value for the checks.
 *
 * @effect Effect<LoadedSource, never>
 */
export function loadSource(
	root: string,
	relativePath: string,
): Effect.Effect<LoadedSource> {
	return Effect.either(readSourceText(root, relativePath));
}

export function directoryExists(absolute: string): Effect.Effect<boolean> {
	return Effect.tryPromise(() => fsp.stat(absolute)).pipe(
		Effect.map((stats) => stats.isDirectory()),
		Effect.orElseSucceed(() => false),
	);
}

interface Walk {
	readonly files: string[];
	readonly directories: string[];
}

function walk(
	root: string,
	relativeDir: string,
	into: Walk,
): Effect.Effect<void, FSError> {
	return Effect.gen(function* () {
		const entries = yield* Effect.tryPromise({
			try: () => fsp.readdir(path.join(root, relativeDir), { withFileTypes: true }),
			catch: toFSError(relativeDir === "" ? "." : toPosix(relativeDir)),
		});
		const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));
		for (const entry of sorted) {
			if (entry.name.startsWith(".")) continue;
			const relative = toPosix(path.join(relativeDir, entry.name));
			if (entry.isDirectory()) {
				if (SKIPPED_DIRECTORIES.has(entry.name)) continue;
				into.directories.push(relative);
				yield* walk(root, relative, into);
			} else if (entry.isFile()) {
				into.files.push(relative);
			}
		}
	});
}

/**
 * Files below `relativeDir`, recursively, optionally filtered by extension.
 *
 * Skips dot-entries and `node_modules`.
 *
 * @effect Effect<readonly string[], FSError>
 */
export function listTree(
	root: string,
	relativeDir: string,
	extensions?: readonly string[],
): Effect.Effect<readonly string[], FSError> {
	return Effect.gen(function* () {
		const into: Walk = { files: [], directories: [] };
		yield* walk(root, relativeDir, into);
		return into.files
			.filter((f) => extensions === undefined || extensions.some((e) => f.endsWith(e)))
			.sort();
	});
}

/**
 * Loads every matching file below each existing root; a root that cannot be
 * listed contributes one failed entry.
 *
 * @effect Effect<readonly LoadedSource[], never>
 */
export function loadTree(
	root: string,
	roots: readonly string[],
	extensions: readonly string[],
): Effect.Effect<readonly LoadedSource[]> {
	return Effect.gen(function* () {
		const loaded: LoadedSource[] = [];
		for (const dir of roots) {
			if (!(yield* directoryExists(path.join(root, dir)))) continue;
			const listed = yield* Effect.either(listTree(root, dir, extensions));
			if (Either.isLeft(listed)) {
				loaded.push(Either.left(listed.left));
				continue;
			}
			for (const file of listed.right) {
				loaded.push(yield* loadSource(root, file));
			}
		}
		return loaded;
	});
}

/**
 * Snapshot of the whole library tree for the layout checks.
 *
 * @effect Effect<LibraryListing, FSError>
 */
export function scanLibrary(root: string): Effect.Effect<LibraryListing, FSError> {
	return Effect.gen(function* () {
		const into: Walk = { files: [], directories: [] };
		yield* walk(root, "", into);
		return {
			root: toPosix(root),
			files: new Set(into.files),
			directories: new Set(into.directories),
		};
	});
}
