// CHANGE: Tier comparison recognition inside conditional expressions
// PURITY: CORE
// INVARIANT: parseTierBound returns the smallest tier for which the comparison holds
// COMPLEXITY: O(|condition|)

import { escapeRegExp } from "../text/identifiers.js";

/**
 * Minimum tier implied by a `MACRO >= n`, `MACRO > n` or `MACRO == n`
 * comparison in a condition, or undefined when the condition compares no tier.
 * With several comparisons the largest bound wins.
 *
 * @pure true
 * @example
 * ```ts
 * parseTierBound("BOARD_TIER >= 2", "BOARD_TIER"); // 2
 * parseTierBound("BOARD_TIER > 2", "BOARD_TIER");  // 3
 * parseTierBound("BOARD_RAM_KB >= 32", "BOARD_TIER"); // undefined
 * ```
 */
export function parseTierBound(
	condition: string,
	tierMacro: string,
): number | undefined {
	const pattern = new RegExp(
		`(?<![A-Za-z0-9_])${escapeRegExp(tierMacro)}\\s*(>=|>|==)\\s*(\\d+)`,
		"gu",
	);
	let bound: number | undefined;
	for (const m of condition.matchAll(pattern)) {
		const value = Number.parseInt(m[2] ?? "", 10);
		if (Number.isNaN(value)) continue;
		const tier = m[1] === ">" ? value + 1 : value;
		bound = bound === undefined ? tier : Math.max(bound, tier);
	}
	return bound;
}
