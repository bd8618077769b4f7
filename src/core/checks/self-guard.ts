// CHANGE: Whole-file self-guard check for component definition files
// FORMAT THEOREM: pass(file, F) ↔ |top(spans_F)| = 1 ∧ ∀ l ∈ content(file): l ∈ (open, close)
// PURITY: CORE
// INVARIANT: malformed directive nesting is reported before any guard verdict
// COMPLEXITY: O(n + s²) where n = lines, s = spans of the flag

import { Either } from "effect";

import { detectGuardSpans, topLevelSpans } from "../guards/spans.js";
import { scanConditionals } from "../preprocessor/conditionals.js";
import { describeIssues } from "../preprocessor/issues.js";
import { formatRanges, toRanges } from "../text/lines.js";
import type {
	CheckResult,
	Component,
	ConditionalScan,
	GuardSpan,
	SourceText,
} from "../types/index.js";
import { failed, type LoadedSource, missing, passed } from "./result.js";

/**
 * Lines of the include-guard triplet `#ifndef X` / `#define X` / `#endif`.
 *
 * Recognised when the first directive after any leading `#pragma` and
 * `#include` lines is `#ifndef X`, the next one is `#define X`, and the
 * block closes.
 *
 * @pure true
 */
export function includeGuardLines(scan: ConditionalScan): readonly number[] {
	const start = scan.directives.findIndex(
		(d) => d.kind !== "pragma" && d.kind !== "include",
	);
	if (start < 0) return [];
	const [first, second] = scan.directives.slice(start);
	if (first?.kind !== "ifndef" || second?.kind !== "define") return [];
	const macro = first.argument.split(" ")[0] ?? "";
	if (macro === "" || (second.argument.split(" ")[0] ?? "") !== macro) return [];
	const block = scan.blocks.find((b) => b.openLine === first.line);
	if (block === undefined || block.closeLine === null) return [];
	return [first.line, second.line, block.closeLine];
}

/**
 * Declaration lines: non-blank lines outside comments, excluding `#include`,
 * `#pragma once` and the include-guard triplet.
 *
 * @pure true
 */
export function declarationLines(
	text: SourceText,
	scan: ConditionalScan,
): readonly number[] {
	const excluded = new Set(includeGuardLines(scan));
	for (const d of scan.directives) {
		const isInclude = d.kind === "include";
		const isPragmaOnce = d.kind === "pragma" && d.argument === "once";
		if (!isInclude && !isPragmaOnce) continue;
		for (let line = d.line; line <= d.endLine; line += 1) excluded.add(line);
	}
	const lines: number[] = [];
	for (const [index, masked] of text.maskedLines.entries()) {
		const line = index + 1;
		if (masked.trim().length === 0 || excluded.has(line)) continue;
		lines.push(line);
	}
	return lines;
}

export type SelfGuardVerdict =
	| { readonly ok: true; readonly span: GuardSpan }
	| {
			readonly ok: false;
			readonly kind: "malformed-structure" | "guard-violation";
			readonly detail: string;
	  };

function describeOutside(
	span: GuardSpan,
	outside: readonly number[],
	flag: string,
): string {
	const parts: string[] = [];
	const before = outside.filter((l) => l < span.openLine);
	const after = outside.filter((l) => l > span.closeLine);
	const first = before[0];
	const last = after.at(-1);
	if (first !== undefined) {
		parts.push(`guard opens at line ${span.openLine} after first declaration at line ${first}`);
	}
	if (last !== undefined) {
		parts.push(`guard closes at line ${span.closeLine} before last declaration at line ${last}`);
	}
	parts.push(`unguarded lines ${formatRanges(toRanges(outside))} outside #if ${flag}`);
	return parts.join("; ");
}

/**
 * Decides whether one file is wholly wrapped in a single guard for `flag`.
 *
 * @pure true
 * @example
 * ```ts
 * const ok = evaluateSelfGuard(toSourceText("a.h", "a.h", "#if F\nint a;\n#endif\n"), "F");
 * ok.ok; // true
 * ```
 */
export function evaluateSelfGuard(
	text: SourceText,
	flag: string,
): SelfGuardVerdict {
	const scan = scanConditionals(text);
	const guard = detectGuardSpans(text, flag, scan);
	if (guard.issues.length > 0) {
		return {
			ok: false,
			kind: "malformed-structure",
			detail: `Missing closure or unbalanced directives: ${describeIssues(guard.issues)}`,
		};
	}

	const top = topLevelSpans(guard.spans);
	const [span] = top;
	if (span === undefined) {
		return {
			ok: false,
			kind: "guard-violation",
			detail: `Missing opening #if ${flag} guard`,
		};
	}

	if (top.length > 1) {
		const ranges = top.map((s) => `${s.openLine}-${s.closeLine}`).join(", ");
		return {
			ok: false,
			kind: "guard-violation",
			detail: `Guard split into ${top.length} spans (lines ${ranges}); the whole file must sit in one`,
		};
	}

	const outside = declarationLines(text, scan).filter(
		(l) => l < span.openLine || l > span.closeLine,
	);
	if (outside.length > 0) {
		return {
			ok: false,
			kind: "guard-violation",
			detail: describeOutside(span, outside, flag),
		};
	}
	return { ok: true, span };
}

/**
 * Self-guard results for every definition file of a component, in declaration order.
 *
 * @pure true
 */
export function checkSelfGuards(
	component: Component,
	sources: ReadonlyMap<string, LoadedSource>,
): readonly CheckResult[] {
	return component.sources.map((file) => {
		const description = `${file} is wholly guarded by #if ${component.flag}`;
		const loaded = sources.get(file);
		if (loaded === undefined) {
			return failed("self-guard", description, "missing-resource", {
				detail: `Missing: ${file}`,
				file,
			});
		}
		if (Either.isLeft(loaded)) {
			return missing("self-guard", description, loaded.left);
		}
		const verdict = evaluateSelfGuard(loaded.right, component.flag);
		if (verdict.ok) {
			return passed("self-guard", description, {
				detail: `Guard spans lines ${verdict.span.openLine}-${verdict.span.closeLine}`,
				file,
			});
		}
		return failed("self-guard", description, verdict.kind, {
			detail: verdict.detail,
			file,
		});
	});
}
