// CHANGE: Check outcome and run aggregate
// PURITY: CORE
// INVARIANT: results keep production order; passed(run) = ∧ results.passed
// COMPLEXITY: O(1)

import type { FlagRegistry } from "./flags.js";

/**
 * Failure taxonomy.
 *
 * - `missing-resource`: file or directory absent
 * - `malformed-structure`: unbalanced directives, duplicate flags, overlapping spans
 * - `guard-violation`: guard absent or not covering the required lines
 * - `format-violation`: metadata or keyword formatting
 * - `suppressed`: a check that could not run because its precondition failed
 */
export type FailureKind =
	| "missing-resource"
	| "malformed-structure"
	| "guard-violation"
	| "format-violation"
	| "suppressed";

export type CheckSection =
	| "registry"
	| "self-guard"
	| "inclusion-guard"
	| "feature-guard"
	| "usage-guard"
	| "examples"
	| "required-files"
	| "required-directories"
	| "source-location"
	| "metadata"
	| "keywords"
	| "example-layout"
	| "vendored-stack";

export interface CheckResult {
	readonly section: CheckSection;
	readonly description: string;
	readonly passed: boolean;
	readonly detail?: string;
	readonly kind?: FailureKind;
	readonly file?: string;
}

export interface VerificationRun {
	readonly target: string;
	readonly registry: FlagRegistry | null;
	readonly results: readonly CheckResult[];
	readonly passed: boolean;
}

export interface RunSummary {
	readonly total: number;
	readonly passed: number;
	readonly failed: number;
	readonly ok: boolean;
}
