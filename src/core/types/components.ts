// CHANGE: Components and features bound to flags
// PURITY: CORE
// INVARIANT: each Component and Feature is bound to exactly one flag
// COMPLEXITY: O(1)

/**
 * A flag-controlled object wrapper.
 *
 * @property identifier whole-word token that marks a usage (usually the class name)
 * @property sources own definition files, relative to the library root
 * @property includes header names the aggregator must include under the flag
 */
export interface Component {
	readonly name: string;
	readonly kind: "object";
	readonly identifier: string;
	readonly flag: string;
	readonly sources: readonly string[];
	readonly includes: readonly string[];
}

/**
 * A flag-controlled capability recognised by its operation names.
 */
export interface Feature {
	readonly name: string;
	readonly flag: string;
	readonly operations: readonly string[];
}

export interface TierExpectation {
	readonly flag: string;
	readonly minTier: number;
}
