// CHANGE: Guard span detection on top of the nesting-stack scan
// FORMAT THEOREM: ∀ t, f: detectGuardSpans(t, f) = detectGuardSpans(t, f)  (idempotent, no hidden state)
// PURITY: CORE
// INVARIANT: a span is emitted only when its own relevant frame is popped by #endif
// COMPLEXITY: O(n + b) where n = lines, b = conditional blocks

import { scanConditionals } from "../preprocessor/conditionals.js";
import { mentionsIdentifier } from "../text/identifiers.js";
import type {
	ConditionalScan,
	GuardScan,
	GuardSpan,
	SourceText,
	StructuralIssue,
} from "../types/index.js";

/**
 * Locates every region guarded by `flag`.
 *
 * A conditional is relevant when its opening condition (`#if`, `#ifdef`,
 * `#ifndef`) mentions the flag as a whole identifier. Only closed relevant
 * blocks produce spans; unmatched directives are returned as issues.
 *
 * @param scan - reuse a scan of the same text to avoid walking it twice
 *
 * @pure true
 * @example
 * ```ts
 * const text = toSourceText("a.h", "a.h", "#if F\n#if X\n#endif\nint a;\n#endif\n");
 * detectGuardSpans(text, "F").spans;
 * // [{ flag: "F", openLine: 1, closeLine: 5, depth: 0 }]
 * ```
 */
export function detectGuardSpans(
	text: SourceText,
	flag: string,
	scan: ConditionalScan = scanConditionals(text),
): GuardScan {
	const spans: GuardSpan[] = [];
	for (const block of scan.blocks) {
		const opening = block.branches[0];
		if (opening === undefined || block.closeLine === null) continue;
		if (!mentionsIdentifier(opening.condition, flag)) continue;
		spans.push({
			flag,
			openLine: block.openLine,
			closeLine: block.closeLine,
			depth: block.depth,
		});
	}
	return {
		flag,
		spans,
		issues: [...scan.issues, ...findOverlaps(spans)],
	};
}

/**
 * Reports every pair of same-flag spans that partially overlap.
 *
 * @pure true
 * @postcondition spans produced by detectGuardSpans never overlap partially
 */
export function findOverlaps(
	spans: readonly GuardSpan[],
): readonly StructuralIssue[] {
	const issues: StructuralIssue[] = [];
	for (const [i, a] of spans.entries()) {
		for (const b of spans.slice(i + 1)) {
			if (a.flag !== b.flag) continue;
			const [first, second] = a.openLine <= b.openLine ? [a, b] : [b, a];
			const disjoint = first.closeLine <= second.openLine;
			const nested = second.closeLine <= first.closeLine;
			if (!disjoint && !nested) {
				issues.push({
					kind: "overlapping-spans",
					line: second.openLine,
					otherLine: first.openLine,
					flag: a.flag,
				});
			}
		}
	}
	return issues;
}

/**
 * Half-open containment: `openLine ≤ line < closeLine`.
 *
 * @pure true
 */
export function spanCovers(span: GuardSpan, line: number): boolean {
	return span.openLine <= line && line < span.closeLine;
}

/**
 * @pure true
 */
export function isGuarded(spans: readonly GuardSpan[], line: number): boolean {
	return spans.some((span) => spanCovers(span, line));
}

/**
 * Lines not covered by any span.
 *
 * @pure true
 */
export function unguardedLines(
	spans: readonly GuardSpan[],
	lines: readonly number[],
): readonly number[] {
	return lines.filter((line) => !isGuarded(spans, line));
}

/**
 * Spans not nested inside another span of the list.
 *
 * @pure true
 */
export function topLevelSpans(
	spans: readonly GuardSpan[],
): readonly GuardSpan[] {
	return spans.filter(
		(span) =>
			!spans.some(
				(outer) =>
					outer !== span &&
					outer.openLine < span.openLine &&
					span.closeLine < outer.closeLine,
			),
	);
}
