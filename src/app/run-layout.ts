// CHANGE: Library layout verification orchestration
// PURITY: APP
// EFFECT: Effect<ExitCode, never>
// INVARIANT: one snapshot of the tree serves every layout check

import { Effect, Either } from "effect";

import { buildRun, computeExitCodeEffect } from "../core/decision.js";
import type { FSError } from "../core/errors.js";
import { LAYOUT_TEXTS } from "../core/format/report.js";
import { checkKeywords } from "../core/layout/keywords.js";
import { checkMetadata } from "../core/layout/metadata.js";
import {
	checkExampleLayout,
	checkRequiredDirectories,
	checkRequiredFiles,
	checkSourceLocation,
	checkVendoredStack,
} from "../core/layout/structure.js";
import type { ExitCode } from "../core/models.js";
import type {
	CheckSection,
	CLIOptions,
	LayoutConfig,
	VerificationRun,
} from "../core/types/index.js";
import { loadSource, scanLibrary } from "../shell/fs/text-loader.js";
import { createReporter, type Reporter } from "../shell/output/reporter.js";
import { describeFatal, prepareRun } from "./prepare.js";
import { reportRun } from "./run-guards.js";

export const LAYOUT_SECTIONS: readonly CheckSection[] = [
	"required-files",
	"required-directories",
	"source-location",
	"metadata",
	"keywords",
	"example-layout",
	"vendored-stack",
];

function readOptional(
	target: string,
	file: string,
): Effect.Effect<string | null> {
	return loadSource(target, file).pipe(
		Effect.map((loaded) => (Either.isRight(loaded) ? loaded.right.content : null)),
	);
}

/**
 * Runs every layout check against a library root.
 *
 * @effect Effect<VerificationRun, FSError>
 */
export function collectLayoutResults(
	target: string,
	config: LayoutConfig,
): Effect.Effect<VerificationRun, FSError> {
	return Effect.gen(function* () {
		const listing = yield* scanLibrary(target);
		const metadata = yield* readOptional(target, config.metadataFile);
		const keywords = yield* readOptional(target, config.keywordsFile);
		return buildRun(target, null, [
			...checkRequiredFiles(listing, config.requiredFiles),
			...checkRequiredDirectories(listing, config.requiredDirectories),
			...checkSourceLocation(listing, config.sourceDir, config.rootSourceExtensions),
			...checkMetadata(config.metadataFile, metadata, config.metadataFields),
			...checkKeywords(config.keywordsFile, keywords, config.keywordTypes),
			...checkExampleLayout(listing, config.examplesDir, config.sketchExtension),
			...checkVendoredStack(listing, config.vendoredStack),
		]);
	});
}

/**
 * Layout verification entry point.
 */
export function runLayoutVerification(
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
		reporter.banner(LAYOUT_TEXTS, target);
		const run = yield* Effect.either(collectLayoutResults(target, config.layout));
		if (Either.isLeft(run)) {
			reporter.fatal(`Cannot list ${run.left.path}: ${run.left.detail}`);
			return 1 as const;
		}
		reportRun(run.right, LAYOUT_SECTIONS, reporter);
		reporter.summary(run.right.results, LAYOUT_TEXTS);
		return yield* computeExitCodeEffect(run.right);
	});
}
