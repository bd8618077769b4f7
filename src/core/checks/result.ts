// CHANGE: Constructors for immutable check results
// PURITY: CORE
// INVARIANT: every produced CheckResult is frozen; failed results always carry a kind
// COMPLEXITY: O(1)

import type { Either } from "effect";

import type { FSError } from "../errors.js";
import type {
	CheckResult,
	CheckSection,
	FailureKind,
	SourceText,
} from "../types/index.js";

/**
 * A file as handed to the core: its text, or the reason it could not be read.
 */
export type LoadedSource = Either.Either<SourceText, FSError>;

export interface ResultExtras {
	readonly detail?: string;
	readonly file?: string;
}

export function passed(
	section: CheckSection,
	description: string,
	extras: ResultExtras = {},
): CheckResult {
	return Object.freeze({ section, description, passed: true, ...extras });
}

export function failed(
	section: CheckSection,
	description: string,
	kind: FailureKind,
	extras: ResultExtras = {},
): CheckResult {
	return Object.freeze({
		section,
		description,
		passed: false,
		kind,
		...extras,
	});
}

/**
 * Failed result for a file that could not be read.
 */
export function missing(
	section: CheckSection,
	description: string,
	error: FSError,
): CheckResult {
	return failed(section, description, "missing-resource", {
		detail: `Missing: ${error.path}`,
		file: error.path,
	});
}

/**
 * Plural helper for details.
 *
 * @pure true
 */
export function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
