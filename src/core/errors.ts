// CHANGE: Typed domain error ADT for the verification core using Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Filesystem operation error (missing or unreadable file).
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path: string;
}> {}

/**
 * The library root to verify does not exist. Early-fatal: no checks run.
 *
 * @pure true (Data class)
 */
export class TargetNotFound extends Data.TaggedError("TargetNotFound")<{
	readonly path: string;
}> {}

/**
 * Configuration file present but not valid.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Flag registry cannot be built: configuration source missing or without flags.
 *
 * @pure true (Data class)
 */
export class RegistryUnavailable extends Data.TaggedError(
	"RegistryUnavailable",
)<{
	readonly source: string;
	readonly reason: string;
}> {}

/**
 * Command line that cannot be interpreted.
 *
 * @pure true (Data class)
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Errors that abort a run before any check executes.
 */
export type FatalError = TargetNotFound | ConfigError | UsageError;
