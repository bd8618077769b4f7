// CHANGE: Shared run preparation for both entry points
// PURITY: APP
// EFFECT: Effect<PreparedRun, FatalError>
// INVARIANT: a missing target or invalid configuration stops the run before any check

import * as path from "node:path";

import { Effect } from "effect";
import { match } from "ts-pattern";

import { type FatalError, TargetNotFound } from "../core/errors.js";
import type { CLIOptions, VerifierConfig } from "../core/types/index.js";
import { loadVerifierConfig } from "../shell/config/index.js";
import { directoryExists } from "../shell/fs/text-loader.js";

export interface PreparedRun {
	readonly target: string;
	readonly config: VerifierConfig;
}

export function prepareRun(
	options: CLIOptions,
): Effect.Effect<PreparedRun, FatalError> {
	return Effect.gen(function* () {
		const target = path.resolve(options.targetPath);
		if (!(yield* directoryExists(target))) {
			return yield* Effect.fail(new TargetNotFound({ path: target }));
		}
		const config = yield* loadVerifierConfig(target, options.configPath);
		return { target, config };
	});
}

/**
 * One-line message for an early-fatal error.
 *
 * @pure true
 */
export function describeFatal(error: FatalError): string {
	return match(error)
		.with({ _tag: "TargetNotFound" }, (e) => `Directory does not exist: ${e.path}`)
		.with({ _tag: "ConfigError" }, (e) => `Invalid configuration ${e.path}: ${e.detail}`)
		.with({ _tag: "UsageError" }, (e) => e.detail)
		.exhaustive();
}
