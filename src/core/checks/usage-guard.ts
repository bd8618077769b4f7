// CHANGE: Unguarded component usage check across the source tree
// FORMAT THEOREM: pass(c, f) ↔ ∀ l ∈ refs(f, c.identifier): ∃ s ∈ spans_f(c.flag): l ∈ s
// PURITY: CORE
// INVARIANT: files with no reference produce no result; a component referenced nowhere yields one pass
// COMPLEXITY: O(Σ n_f) per component

import { Either } from "effect";

import { detectGuardSpans, unguardedLines } from "../guards/spans.js";
import { describeIssues } from "../preprocessor/issues.js";
import { findIdentifierLines } from "../text/identifiers.js";
import { formatRanges, toRanges } from "../text/lines.js";
import type { CheckResult, Component, SourceText } from "../types/index.js";
import { failed, type LoadedSource, missing, passed } from "./result.js";

function checkFile(
	component: Component,
	text: SourceText,
	references: readonly number[],
): CheckResult {
	const file = text.relativePath;
	const description = `${file} uses ${component.identifier} only under #if ${component.flag}`;
	const guard = detectGuardSpans(text, component.flag);
	if (guard.issues.length > 0) {
		return failed("usage-guard", description, "malformed-structure", {
			detail: describeIssues(guard.issues),
			file,
		});
	}
	const lines = formatRanges(toRanges(references));
	if (guard.spans.length === 0) {
		return failed("usage-guard", description, "guard-violation", {
			detail: `No #if ${component.flag} guard in file; references at line ${lines}`,
			file,
		});
	}
	const unguarded = unguardedLines(guard.spans, references);
	if (unguarded.length > 0) {
		return failed("usage-guard", description, "guard-violation", {
			detail: `Unguarded references at line ${formatRanges(toRanges(unguarded))}`,
			file,
		});
	}
	return passed("usage-guard", description, {
		detail: `References at line ${lines} are guarded`,
		file,
	});
}

/**
 * One result per tree file that references the component outside its own
 * definition files and the `excluded` paths.
 *
 * Unreadable files are skipped here; see {@link unreadableResults}.
 *
 * @pure true
 */
export function checkUsageGuards(
	component: Component,
	tree: readonly LoadedSource[],
	excluded: ReadonlySet<string>,
): readonly CheckResult[] {
	const own = new Set(component.sources);
	const results: CheckResult[] = [];
	for (const loaded of tree) {
		if (Either.isLeft(loaded)) continue;
		const text = loaded.right;
		if (own.has(text.relativePath) || excluded.has(text.relativePath)) continue;
		const references = findIdentifierLines(text, component.identifier);
		if (references.length === 0) continue;
		results.push(checkFile(component, text, references));
	}
	if (results.length === 0) {
		return [
			passed(
				"usage-guard",
				`${component.identifier} is not used outside its own files`,
				{ detail: "No references found" },
			),
		];
	}
	return results;
}

/**
 * Failed results for tree files that could not be read.
 *
 * @pure true
 */
export function unreadableResults(
	tree: readonly LoadedSource[],
): readonly CheckResult[] {
	return tree.flatMap((loaded) =>
		Either.isLeft(loaded)
			? [missing("usage-guard", `${loaded.left.path} is readable`, loaded.left)]
			: [],
	);
}
