// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: exports are APP orchestrators, pure CORE functions and types; SHELL internals stay hidden
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATORS (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Guard verification for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runGuardVerification } from "guard-verify";
 *
 * const exitCode = await Effect.runPromise(
 *   runGuardVerification({
 *     targetPath: "path/to/library",
 *     report: { color: false, format: "text", quiet: false },
 *   }),
 * );
 * ```
 */
export {
	collectGuardResults,
	runGuardVerification,
} from "./app/run-guards.js";
export {
	collectLayoutResults,
	runLayoutVerification,
} from "./app/run-layout.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { checkExampleTiers } from "./core/checks/examples.js";
export { checkFeatureGuards } from "./core/checks/feature-guard.js";
export { checkInclusionGuards } from "./core/checks/inclusion-guard.js";
export { checkRegistry } from "./core/checks/registry.js";
export { checkSelfGuards, evaluateSelfGuard } from "./core/checks/self-guard.js";
export { checkUsageGuards } from "./core/checks/usage-guard.js";
export { DEFAULT_CONFIG } from "./core/config/defaults.js";
export { buildRun, computeExitCode, summarize } from "./core/decision.js";
export {
	detectGuardSpans,
	isGuarded,
	spanCovers,
	unguardedLines,
} from "./core/guards/spans.js";
export { scanConditionals } from "./core/preprocessor/conditionals.js";
export { describeIssue, describeIssues } from "./core/preprocessor/issues.js";
export { extractFlagRegistry, isTierGated } from "./core/registry/extract.js";
export { toSourceText } from "./core/text/lines.js";
export { decodeConfig } from "./shell/config/loader.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS AND TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export {
	ConfigError,
	FSError,
	RegistryUnavailable,
	TargetNotFound,
	UsageError,
} from "./core/errors.js";
export type { ExitCode } from "./core/models.js";
export type * from "./core/types/index.js";
