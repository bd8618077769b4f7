// CHANGE: Guard verification orchestration
// PURITY: APP
// EFFECT: Effect<ExitCode, never>
// INVARIANT: sections run in fixed order; the registry is built once and only read afterwards
// COMPLEXITY: O(F · n) where F = files inspected, n = file length

import * as path from "node:path";

import { Effect, Either } from "effect";

import { checkExampleTiers } from "../core/checks/examples.js";
import { checkFeatureGuards } from "../core/checks/feature-guard.js";
import { checkInclusionGuards } from "../core/checks/inclusion-guard.js";
import { checkRegistry } from "../core/checks/registry.js";
import type { LoadedSource } from "../core/checks/result.js";
import { checkSelfGuards } from "../core/checks/self-guard.js";
import {
	checkUsageGuards,
	unreadableResults,
} from "../core/checks/usage-guard.js";
import { buildRun, computeExitCodeEffect } from "../core/decision.js";
import { GUARD_TEXTS } from "../core/format/report.js";
import type { ExitCode } from "../core/models.js";
import type {
	CheckSection,
	CLIOptions,
	GuardConfig,
	VerificationRun,
} from "../core/types/index.js";
import {
	directoryExists,
	loadSource,
	loadTree,
} from "../shell/fs/text-loader.js";
import { createReporter, type Reporter } from "../shell/output/reporter.js";
import { describeFatal, prepareRun } from "./prepare.js";

export const GUARD_SECTIONS: readonly CheckSection[] = [
	"registry",
	"self-guard",
	"inclusion-guard",
	"feature-guard",
	"usage-guard",
	"examples",
];

function loadAll(
	target: string,
	files: readonly string[],
): Effect.Effect<ReadonlyMap<string, LoadedSource>> {
	return Effect.gen(function* () {
		const loaded = new Map<string, LoadedSource>();
		for (const file of files) {
			if (!loaded.has(file)) loaded.set(file, yield* loadSource(target, file));
		}
		return loaded;
	});
}

function uniqueByPath(files: readonly LoadedSource[]): readonly LoadedSource[] {
	const seen = new Set<string>();
	return files.filter((file) => {
		const key = Either.isRight(file) ? file.right.relativePath : file.left.path;
		if (seen.has(key)) return false;
		seen.add(key);
		return true;
	});
}

/**
 * Runs every guard check against a library root.
 *
 * @effect Effect<VerificationRun, never>
 * @postcondition results are grouped in GUARD_SECTIONS order
 */
export function collectGuardResults(
	target: string,
	config: GuardConfig,
): Effect.Effect<VerificationRun> {
	return Effect.gen(function* () {
		const registry = checkRegistry(
			yield* loadSource(target, config.configSource),
			config,
		);

		const sources = yield* loadAll(
			target,
			config.components.flatMap((c) => c.sources),
		);
		const selfGuard = config.components.flatMap((c) => checkSelfGuards(c, sources));

		const inclusion = checkInclusionGuards(
			config.components,
			yield* loadSource(target, config.aggregator),
			config.aggregator,
		);

		const tree = yield* loadTree(target, config.sourceRoots, config.sourceExtensions);
		const featureFiles = uniqueByPath([...sources.values(), ...tree]);
		const feature = config.features.flatMap((f) =>
			checkFeatureGuards(f, featureFiles, config.featureGuardMode),
		);

		const excluded = new Set([config.aggregator, config.configSource]);
		const usage = [
			...unreadableResults(tree),
			...config.components.flatMap((c) => checkUsageGuards(c, tree, excluded)),
		];

		const present = yield* directoryExists(path.join(target, config.examplesDir));
		const sketches = present
			? yield* loadTree(target, [config.examplesDir], [config.sketchExtension])
			: [];
		const examples = checkExampleTiers(config.components, registry.registry, {
			examplesDir: config.examplesDir,
			present,
			sketches,
			noticePattern: config.tierNoticePattern,
		});

		return buildRun(target, registry.registry, [
			...registry.results,
			...selfGuard,
			...inclusion,
			...feature,
			...usage,
			...examples,
		]);
	});
}

/**
 * Prints a run section by section.
 */
export function reportRun(
	run: VerificationRun,
	sections: readonly CheckSection[],
	reporter: Reporter,
): void {
	for (const section of sections) {
		reporter.section(section);
		for (const result of run.results) {
			if (result.section === section) reporter.record(result);
		}
	}
}

/**
 * Guard verification entry point.
 *
 * @returns exit code 0 iff every check passed; 1 on any failure or early-fatal error
 */
export function runGuardVerification(
	options: CLIOptions,
	reporter: Reporter = createReporter(options.report),
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const prepared = yield* Effect.either(prepareRun(options));
		if (Either.isLeft(prepared)) {
			reporter.fatal(describeFatal(prepared.left));
			return 1 as const;
		}
		const { target, config } = prepared.right;
		reporter.banner(GUARD_TEXTS, target);
		const run = yield* collectGuardResults(target, config.guards);
		reportRun(run, GUARD_SECTIONS, reporter);
		reporter.summary(run.results, GUARD_TEXTS);
		return yield* computeExitCodeEffect(run);
	});
}
