// CHANGE: Aggregator inclusion-guard check
// FORMAT THEOREM: pass(c, h) ↔ includes(h) ≠ ∅ ∧ ∀ l ∈ includes(h): ∃ s ∈ spans_agg(c.flag): l ∈ s
// PURITY: CORE
// INVARIANT: only the aggregator's own guards count; component-internal guards are irrelevant here
// COMPLEXITY: O(n + c·i) where n = aggregator lines, c = components, i = include lines

import { Either } from "effect";

import { detectGuardSpans, unguardedLines } from "../guards/spans.js";
import { scanConditionals } from "../preprocessor/conditionals.js";
import { includeTarget } from "../preprocessor/directives.js";
import { describeIssues } from "../preprocessor/issues.js";
import { formatRanges, toRanges } from "../text/lines.js";
import type {
	CheckResult,
	Component,
	ConditionalScan,
	SourceText,
} from "../types/index.js";
import { failed, type LoadedSource, passed } from "./result.js";

function baseName(file: string): string {
	return file.split(/[\\/]/u).at(-1) ?? file;
}

/**
 * Lines of `#include` directives naming `header` (compared by base name).
 *
 * @pure true
 */
export function includeLinesFor(
	scan: ConditionalScan,
	header: string,
): readonly number[] {
	const wanted = baseName(header);
	return scan.directives
		.filter((d) => d.kind === "include")
		.filter((d) => {
			const target = includeTarget(d.argument);
			return target !== null && baseName(target) === wanted;
		})
		.map((d) => d.line);
}

function checkInclude(
	aggregator: SourceText,
	scan: ConditionalScan,
	component: Component,
	header: string,
): CheckResult {
	const description = `${header} include is guarded by #if ${component.flag}`;
	const file = aggregator.relativePath;
	const lines = includeLinesFor(scan, header);
	if (lines.length === 0) {
		return failed("inclusion-guard", description, "missing-resource", {
			detail: `Missing include: ${header} is not included by ${file}`,
			file,
		});
	}
	const { spans } = detectGuardSpans(aggregator, component.flag, scan);
	const unguarded = unguardedLines(spans, lines);
	if (unguarded.length > 0) {
		return failed("inclusion-guard", description, "guard-violation", {
			detail: `Unguarded include at line ${formatRanges(toRanges(unguarded))}`,
			file,
		});
	}
	return passed("inclusion-guard", description, {
		detail: `Found conditional include at line ${formatRanges(toRanges(lines))}`,
		file,
	});
}

/**
 * Inclusion-guard results: directive balance of the aggregator, then one
 * result per (component, header) in declaration order.
 *
 * @pure true
 */
export function checkInclusionGuards(
	components: readonly Component[],
	aggregator: LoadedSource,
	aggregatorPath: string,
): readonly CheckResult[] {
	const pairs = components.flatMap((component) =>
		component.includes.map((header) => ({ component, header })),
	);
	if (Either.isLeft(aggregator)) {
		const detail = `Aggregator not found: ${aggregator.left.path}`;
		return [
			failed("inclusion-guard", `${aggregatorPath} exists`, "missing-resource", {
				detail,
				file: aggregatorPath,
			}),
			...pairs.map(({ component, header }) =>
				failed(
					"inclusion-guard",
					`${header} include is guarded by #if ${component.flag}`,
					"suppressed",
					{ detail, file: aggregatorPath },
				),
			),
		];
	}

	const text = aggregator.right;
	const scan = scanConditionals(text);
	const balanced = `${aggregatorPath} conditional directives are balanced`;
	return [
		scan.issues.length === 0
			? passed("inclusion-guard", balanced, { file: aggregatorPath })
			: failed("inclusion-guard", balanced, "malformed-structure", {
					detail: describeIssues(scan.issues),
					file: aggregatorPath,
				}),
		...pairs.map(({ component, header }) =>
			checkInclude(text, scan, component, header),
		),
	];
}
