// CHANGE: Flag registry model
// PURITY: CORE
// INVARIANT: ∀ name ∈ flags: flags.get(name).definitions.length ≥ 1
// COMPLEXITY: O(1)

import type { BranchRef, StructuralIssue } from "./preprocessor.js";

export type FlagValue = 0 | 1;

/**
 * Position of a define relative to tier conditionals.
 *
 * - `unconditional`: not inside any tier comparison
 * - `gated`: inside a branch whose condition compares the tier macro
 * - `fallback`: inside the `#else` branch of a tier comparison
 */
export type TierPlacement = "unconditional" | "gated" | "fallback";

export interface FlagDefinition {
	readonly name: string;
	readonly value: FlagValue;
	readonly line: number;
	readonly text: string;
	readonly placement: TierPlacement;
	readonly minTier?: number;
	readonly path: readonly BranchRef[];
}

export interface Flag {
	readonly name: string;
	readonly defaultValue: FlagValue;
	readonly minTier?: number;
	readonly location: FlagDefinition;
	readonly definitions: readonly FlagDefinition[];
}

/**
 * Flags extracted from the configuration source.
 *
 * @remarks
 * - read-only for the whole run
 * - `duplicates` holds every flag defined more than once on a compatible branch path
 */
export interface FlagRegistry {
	readonly source: string;
	readonly tierMacro: string;
	readonly flags: ReadonlyMap<string, Flag>;
	readonly duplicates: ReadonlyMap<string, readonly FlagDefinition[]>;
	readonly issues: readonly StructuralIssue[];
}
