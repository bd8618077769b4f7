// CHANGE: Library layout checks over a directory listing
// PURITY: CORE
// INVARIANT: every path in a LibraryListing is POSIX and relative to the library root
// COMPLEXITY: O(f) per check where f = listed files

import { failed, passed, plural } from "../checks/result.js";
import type {
	CheckResult,
	RequiredPath,
	VendoredStack,
} from "../types/index.js";

/**
 * Snapshot of a library tree taken by the shell.
 */
export interface LibraryListing {
	readonly root: string;
	readonly files: ReadonlySet<string>;
	readonly directories: ReadonlySet<string>;
}

function absolute(listing: LibraryListing, path: string): string {
	return `${listing.root}/${path}`;
}

function hasExtension(file: string, extensions: readonly string[]): boolean {
	return extensions.some((ext) => file.endsWith(ext));
}

/**
 * Files under `dir` (recursively) with one of `extensions`.
 *
 * @pure true
 */
export function filesUnder(
	listing: LibraryListing,
	dir: string,
	extensions: readonly string[],
): readonly string[] {
	const prefix = `${dir.replace(/\/+$/u, "")}/`;
	return [...listing.files]
		.filter((f) => f.startsWith(prefix) && hasExtension(f, extensions))
		.sort();
}

export function checkRequiredFiles(
	listing: LibraryListing,
	required: readonly RequiredPath[],
): readonly CheckResult[] {
	return required.map(({ path, description }) => {
		const text = `${path} exists (${description})`;
		return listing.files.has(path)
			? passed("required-files", text, { detail: `Path: ${absolute(listing, path)}` })
			: failed("required-files", text, "missing-resource", {
					detail: `Missing: ${absolute(listing, path)}`,
				});
	});
}

export function checkRequiredDirectories(
	listing: LibraryListing,
	required: readonly RequiredPath[],
): readonly CheckResult[] {
	return required.map(({ path, description }) => {
		const text = `${path}/ exists (${description})`;
		return listing.directories.has(path)
			? passed("required-directories", text, {
					detail: `Path: ${absolute(listing, path)}`,
				})
			: failed("required-directories", text, "missing-resource", {
					detail: `Missing: ${absolute(listing, path)}`,
				});
	});
}

/**
 * No source files in the root; the source directory holds some.
 *
 * @pure true
 */
export function checkSourceLocation(
	listing: LibraryListing,
	sourceDir: string,
	extensions: readonly string[],
): readonly CheckResult[] {
	const kinds = extensions.join(", ");
	const inRoot = [...listing.files]
		.filter((f) => !f.includes("/") && hasExtension(f, extensions))
		.sort();
	const results: CheckResult[] = [
		inRoot.length === 0
			? passed("source-location", `No source files (${kinds}) in root directory`, {
					detail: `All source files in ${sourceDir}/`,
				})
			: failed(
					"source-location",
					`No source files (${kinds}) in root directory`,
					"format-violation",
					{ detail: `Found: ${inRoot.join(", ")}` },
				),
	];
	if (listing.directories.has(sourceDir)) {
		const count = filesUnder(listing, sourceDir, extensions).length;
		const text = `${sourceDir}/ directory contains source files`;
		results.push(
			count > 0
				? passed("source-location", text, {
						detail: `Found ${plural(count, "source file")}`,
					})
				: failed("source-location", text, "missing-resource", {
						detail: `No source files in ${sourceDir}/`,
					}),
		);
	}
	return results;
}

function parentName(file: string): string {
	const parts = file.split("/");
	return parts.at(-2) ?? "";
}

function stem(file: string, extension: string): string {
	const base = file.split("/").at(-1) ?? file;
	return base.endsWith(extension) ? base.slice(0, -extension.length) : base;
}

/**
 * Example directory exists, holds sketches, and each `foo.ino` sits in `foo/`.
 *
 * @pure true
 */
export function checkExampleLayout(
	listing: LibraryListing,
	examplesDir: string,
	sketchExtension: string,
): readonly CheckResult[] {
	if (!listing.directories.has(examplesDir)) {
		return [
			failed("example-layout", `${examplesDir}/ directory exists`, "missing-resource", {
				detail: `Directory not found: ${absolute(listing, examplesDir)}`,
			}),
		];
	}
	const sketches = filesUnder(listing, examplesDir, [sketchExtension]);
	const errors = sketches
		.filter((f) => parentName(f) !== stem(f, sketchExtension))
		.map((f) => {
			const name = stem(f, sketchExtension);
			return `${name}${sketchExtension} should be in ${name}/ folder`;
		});
	const [firstError] = errors;
	return [
		sketches.length > 0
			? passed("example-layout", `Examples directory contains ${sketchExtension} sketches`, {
					detail: `Found ${sketches.length} example sketch${sketches.length === 1 ? "" : "es"}`,
				})
			: failed(
					"example-layout",
					`Examples directory contains ${sketchExtension} sketches`,
					"missing-resource",
					{ detail: "No sketches found" },
				),
		firstError === undefined
			? passed(
					"example-layout",
					`Examples follow naming convention (sketch${sketchExtension} in sketch/ folder)`,
					{ detail: "All examples properly structured" },
				)
			: failed(
					"example-layout",
					`Examples follow naming convention (sketch${sketchExtension} in sketch/ folder)`,
					"format-violation",
					{ detail: `Errors: ${errors.join("; ")}` },
				),
	];
}

/**
 * Vendored protocol stack present with enough files. Disabled when `stack` is null.
 *
 * @pure true
 */
export function checkVendoredStack(
	listing: LibraryListing,
	stack: VendoredStack | null,
): readonly CheckResult[] {
	if (stack === null) return [];
	const text = `${stack.path}/ directory exists`;
	if (!listing.directories.has(stack.path)) {
		return [
			failed("vendored-stack", text, "missing-resource", {
				detail: `Vendored stack not found: ${absolute(listing, stack.path)}`,
			}),
		];
	}
	const count = filesUnder(listing, stack.path, stack.extensions).length;
	return [
		passed("vendored-stack", text, { detail: `Path: ${absolute(listing, stack.path)}` }),
		count >= stack.minFiles
			? passed("vendored-stack", "Vendored stack contains source files", {
					detail: `Found ${plural(count, "file")}`,
				})
			: failed("vendored-stack", "Vendored stack contains source files", "format-violation", {
					detail: `Insufficient files: found ${count}, expected at least ${stack.minFiles}`,
				}),
	];
}
