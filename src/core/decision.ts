// CHANGE: Pure decision functions mapping check results to summary and exit code
// FORMAT THEOREM: ∀rs: computeExitCode(rs) = 0 ↔ ∀r ∈ rs: r.passed
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping results → ExitCode
// COMPLEXITY: O(n) where n = |results|

import { Effect, pipe } from "effect";

import type { ExitCode } from "./models.js";
import type {
	CheckResult,
	FlagRegistry,
	RunSummary,
	VerificationRun,
} from "./types/index.js";

/**
 * Counts passed and failed results.
 *
 * @pure true
 * @invariant total = passed + failed; ok ↔ failed = 0
 */
export const summarize = (results: readonly CheckResult[]): RunSummary => {
	const passed = results.filter((r) => r.passed).length;
	return {
		total: results.length,
		passed,
		failed: results.length - passed,
		ok: passed === results.length,
	};
};

/**
 * Computes process exit code from check results.
 *
 * @returns 0 when every result passed (vacuously for an empty list), otherwise 1
 *
 * @pure true
 * @example
 * ```ts
 * computeExitCode([{ section: "registry", description: "x", passed: false }]); // 1
 * ```
 */
export const computeExitCode = (results: readonly CheckResult[]): ExitCode =>
	pipe(
		results,
		summarize,
		(summary): ExitCode => (summary.ok ? 0 : 1),
	);

/**
 * Builds the immutable run aggregate.
 *
 * @pure true
 * @postcondition run.results preserves the order of `results`
 */
export const buildRun = (
	target: string,
	registry: FlagRegistry | null,
	results: readonly CheckResult[],
): VerificationRun => ({
	target,
	registry,
	results: Object.freeze([...results]),
	passed: summarize(results).ok,
});

/**
 * Exit code as an Effect for composition with the app pipelines.
 *
 * @effect Effect<ExitCode, never, never>
 */
export const computeExitCodeEffect = (
	run: VerificationRun,
): Effect.Effect<ExitCode> =>
	Effect.succeed<ExitCode>(run.passed ? 0 : 1);
