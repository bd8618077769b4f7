// CHANGE: Command line parsing for both verifier entry points
// PURITY: SHELL (reads only its arguments; process state is passed in)
// INVARIANT: color is decided here once and travels inside ReportOptions
// COMPLEXITY: O(n) where n = |argv|

import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type { CLIOptions, OutputFormat } from "../../core/types/index.js";

/**
 * Library root used when no positional argument is given: the directory
 * that contains this tool's package directory.
 */
export const DEFAULT_TARGET = fileURLToPath(new URL("../../../..", import.meta.url));

interface ArgState {
	readonly targetPath: string | undefined;
	readonly configPath: string | undefined;
	readonly color: boolean;
	readonly format: OutputFormat;
	readonly quiet: boolean;
}

interface ArgStep {
	readonly state: ArgState;
	readonly skipNext: boolean;
}

type FlagHandler = (
	args: readonly string[],
	index: number,
	current: ArgState,
) => Either.Either<ArgStep, UsageError>;

function valueOf(
	args: readonly string[],
	index: number,
	flag: string,
): Either.Either<string, UsageError> {
	const value = args[index + 1];
	return value === undefined || value.startsWith("--")
		? Either.left(new UsageError({ detail: `${flag} expects a value` }))
		: Either.right(value);
}

function isOutputFormat(value: string): value is OutputFormat {
	return value === "text" || value === "jsonl";
}

const handlers: Readonly<Record<string, FlagHandler>> = {
	"--config": (args, index, current) =>
		Either.map(valueOf(args, index, "--config"), (configPath) => ({
			state: { ...current, configPath },
			skipNext: true,
		})),
	"--format": (args, index, current) =>
		Either.flatMap(
			valueOf(args, index, "--format"),
			(format): Either.Either<ArgStep, UsageError> =>
				isOutputFormat(format)
					? Either.right({ state: { ...current, format }, skipNext: true })
					: Either.left(
							new UsageError({
								detail: `--format must be 'text' or 'jsonl', got '${format}'`,
							}),
						),
		),
	"--no-color": (_args, _index, current) =>
		Either.right({ state: { ...current, color: false }, skipNext: false }),
	"--quiet": (_args, _index, current) =>
		Either.right({ state: { ...current, quiet: true }, skipNext: false }),
};

function processArgument(
	arg: string,
	args: readonly string[],
	index: number,
	current: ArgState,
): Either.Either<ArgStep, UsageError> {
	const handler = handlers[arg];
	if (handler !== undefined) return handler(args, index, current);
	if (arg.startsWith("--")) {
		return Either.left(new UsageError({ detail: `Unknown option ${arg}` }));
	}
	if (current.targetPath !== undefined) {
		return Either.left(
			new UsageError({ detail: `Unexpected argument ${arg}; only one library directory is accepted` }),
		);
	}
	return Either.right({ state: { ...current, targetPath: arg }, skipNext: false });
}

/**
 * Parses `[target] [--config path] [--format text|jsonl] [--no-color] [--quiet]`.
 *
 * @param env - used for `NO_COLOR`
 * @param isTTY - whether stdout is a terminal
 *
 * @example
 * ```ts
 * parseCLIArgs(["lib", "--quiet"], {}, false);
 * // Right({ targetPath: "/abs/lib", report: { color: false, format: "text", quiet: true } })
 * ```
 */
export function parseCLIArgs(
	argv: readonly string[],
	env: Readonly<Record<string, string | undefined>>,
	isTTY: boolean,
): Either.Either<CLIOptions, UsageError> {
	let state: ArgState = {
		targetPath: undefined,
		configPath: undefined,
		color: isTTY && env["NO_COLOR"] === undefined,
		format: "text",
		quiet: false,
	};

	for (let i = 0; i < argv.length; i++) {
		const arg = argv.at(i) ?? "";
		if (arg.length === 0) continue;
		const step = processArgument(arg, argv, i, state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		if (step.right.skipNext) i++;
	}

	const report = { color: state.color, format: state.format, quiet: state.quiet };
	const targetPath = path.resolve(state.targetPath ?? DEFAULT_TARGET);
	return Either.right(
		state.configPath === undefined
			? { targetPath, report }
			: { targetPath, configPath: path.resolve(state.configPath), report },
	);
}

export function usage(command: string): string {
	return `Usage: ${command} [library-dir] [--config <file>] [--format text|jsonl] [--no-color] [--quiet]`;
}
