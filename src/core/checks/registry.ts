// CHANGE: Registry checks (flag presence, uniqueness, tier gating)
// PURITY: CORE
// INVARIANT: an unavailable registry fails its own check and reports each dependent check as suppressed
// COMPLEXITY: O(f) where f = |required flags| + |tier expectations|

import { Either } from "effect";

import { describeIssues } from "../preprocessor/issues.js";
import { extractFlagRegistry } from "../registry/extract.js";
import type {
	CheckResult,
	FlagRegistry,
	GuardConfig,
	TierExpectation,
} from "../types/index.js";
import { failed, type LoadedSource, missing, passed } from "./result.js";

export interface RegistryOutcome {
	readonly results: readonly CheckResult[];
	readonly registry: FlagRegistry | null;
}

/**
 * Required flags in declaration order: configured flags, then component and feature flags.
 *
 * @pure true
 */
export function requiredFlagsOf(config: GuardConfig): readonly string[] {
	return [
		...new Set([
			...config.requiredFlags,
			...config.components.map((c) => c.flag),
			...config.features.map((f) => f.flag),
		]),
	];
}

function suppressedResults(
	config: GuardConfig,
	reason: string,
): readonly CheckResult[] {
	const detail = `Suppressed: flag registry unavailable (${reason})`;
	const results: CheckResult[] = [
		failed(
			"registry",
			`Flag definitions checked (${requiredFlagsOf(config).length} required)`,
			"suppressed",
			{ detail },
		),
	];
	if (config.tierExpectations.length > 0) {
		results.push(
			failed(
				"registry",
				`Tier gating checked (${config.tierExpectations.length} expected)`,
				"suppressed",
				{ detail },
			),
		);
	}
	return results;
}

function checkFlagDefined(registry: FlagRegistry, name: string): CheckResult {
	const description = `${name} is defined`;
	const duplicates = registry.duplicates.get(name);
	if (duplicates !== undefined) {
		return failed("registry", description, "malformed-structure", {
			detail: `Defined ${duplicates.length} times: lines ${duplicates.map((d) => d.line).join(", ")}`,
			file: registry.source,
		});
	}
	const flag = registry.flags.get(name);
	if (flag === undefined) {
		return failed("registry", description, "missing-resource", {
			detail: "Not defined",
			file: registry.source,
		});
	}
	return passed("registry", description, {
		detail: `Found: ${flag.location.text} (line ${flag.location.line})`,
		file: registry.source,
	});
}

function checkUnique(registry: FlagRegistry): CheckResult {
	const description = "Flag definitions are unique";
	if (registry.duplicates.size === 0) {
		return passed("registry", description, {
			detail: `${registry.flags.size} flags, each defined once per branch`,
			file: registry.source,
		});
	}
	const listed = [...registry.duplicates]
		.map(([name, defs]) => `${name} (lines ${defs.map((d) => d.line).join(", ")})`)
		.join("; ");
	return failed("registry", description, "malformed-structure", {
		detail: `Redefined: ${listed}`,
		file: registry.source,
	});
}

function checkTierExpectation(
	registry: FlagRegistry,
	expectation: TierExpectation,
): CheckResult {
	const { flag: name, minTier } = expectation;
	const description = `${name} is enabled from tier ${minTier}`;
	const flag = registry.flags.get(name);
	if (flag === undefined) {
		return failed("registry", description, "missing-resource", {
			detail: "Not defined",
			file: registry.source,
		});
	}
	if (flag.minTier === minTier) {
		return passed("registry", description, {
			detail: `Found tier-based enablement at line ${flag.location.line} (${registry.tierMacro} >= ${minTier})`,
			file: registry.source,
		});
	}
	if (flag.minTier === undefined) {
		return failed("registry", description, "guard-violation", {
			detail: `Missing tier structure: ${name} is not enabled inside a ${registry.tierMacro} comparison`,
			file: registry.source,
		});
	}
	return failed("registry", description, "guard-violation", {
		detail: `Enabled from tier ${flag.minTier}, expected ${minTier}`,
		file: registry.source,
	});
}

/**
 * Builds the registry and reports on it.
 *
 * @returns results in order: availability, directive balance, each required flag, uniqueness, tier expectations
 *
 * @pure true
 */
export function checkRegistry(
	source: LoadedSource,
	config: GuardConfig,
): RegistryOutcome {
	const exists = `${config.configSource} exists`;
	if (Either.isLeft(source)) {
		return {
			registry: null,
			results: [
				missing("registry", exists, source.left),
				...suppressedResults(config, "file not found"),
			],
		};
	}

	const extracted = extractFlagRegistry(source.right, {
		tierMacro: config.tierMacro,
	});
	if (Either.isLeft(extracted)) {
		return {
			registry: null,
			results: [
				failed("registry", `${config.configSource} defines flags`, "malformed-structure", {
					detail: extracted.left.reason,
					file: config.configSource,
				}),
				...suppressedResults(config, extracted.left.reason),
			],
		};
	}

	const registry = extracted.right;
	const balanced = `${config.configSource} conditional directives are balanced`;
	const results: CheckResult[] = [
		passed("registry", `${config.configSource} defines flags`, {
			detail: `${registry.flags.size} flags extracted`,
			file: config.configSource,
		}),
		registry.issues.length === 0
			? passed("registry", balanced, { file: config.configSource })
			: failed("registry", balanced, "malformed-structure", {
					detail: describeIssues(registry.issues),
					file: config.configSource,
				}),
		...requiredFlagsOf(config).map((name) => checkFlagDefined(registry, name)),
		checkUnique(registry),
		...config.tierExpectations.map((e) => checkTierExpectation(registry, e)),
	];
	return { registry, results };
}
