// CHANGE: Verifier configuration file loading and validation
// PURITY: SHELL (file read) over pure decoders
// EFFECT: Effect<VerifierConfig, ConfigError>
// INVARIANT: any unknown key or ill-typed value rejects the whole file
// COMPLEXITY: O(size of the file)

import { promises as fsp } from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";

import { DEFAULT_CONFIG } from "../../core/config/defaults.js";
import { ConfigError } from "../../core/errors.js";
import type {
	Component,
	Feature,
	FeatureGuardMode,
	GuardConfig,
	LayoutConfig,
	RequiredPath,
	TierExpectation,
	VendoredStack,
	VerifierConfig,
} from "../../core/types/index.js";

export const CONFIG_FILE_NAME = "verify.config.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

type Decoder<A> = (value: JSONValue, at: string) => Either.Either<A, string>;

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

const string: Decoder<string> = (value, at) =>
	typeof value === "string" && value.length > 0
		? Either.right(value)
		: Either.left(`${at} must be a non-empty string`);

const positiveInteger: Decoder<number> = (value, at) =>
	typeof value === "number" && Number.isInteger(value) && value > 0
		? Either.right(value)
		: Either.left(`${at} must be a positive integer`);

const pattern: Decoder<string> = (value, at) =>
	Either.flatMap(string(value, at), (source) =>
		Either.try({
			try: () => new RegExp(source, "iu").source,
			catch: () => `${at} is not a valid regular expression`,
		}).pipe(Either.map(() => source)),
	);

const featureGuardMode: Decoder<FeatureGuardMode> = (value, at) =>
	value === "nesting" || value === "first-match"
		? Either.right(value)
		: Either.left(`${at} must be "nesting" or "first-match"`);

function arrayOf<A>(item: Decoder<A>): Decoder<readonly A[]> {
	return (value, at) =>
		isArray(value)
			? Either.all(value.map((v, i) => item(v, `${at}[${i}]`)))
			: Either.left(`${at} must be an array`);
}

function objectWith(
	value: JSONValue,
	at: string,
	keys: readonly string[],
): Either.Either<JSONObject, string> {
	if (!isJSONObject(value)) return Either.left(`${at} must be an object`);
	const unknown = Object.keys(value).find((k) => !keys.includes(k));
	return unknown === undefined
		? Either.right(value)
		: Either.left(`${at}.${unknown} is not a known setting`);
}

/**
 * Decodes `obj[key]` when present, otherwise yields `fallback`.
 *
 * @pure true
 */
function field<A>(
	obj: JSONObject,
	key: string,
	at: string,
	decoder: Decoder<A>,
	fallback: A,
): Either.Either<A, string> {
	const value = obj[key];
	return value === undefined ? Either.right(fallback) : decoder(value, `${at}.${key}`);
}

/**
 * Required `obj[key]`.
 *
 * @pure true
 */
function required<A>(
	obj: JSONObject,
	key: string,
	at: string,
	decoder: Decoder<A>,
): Either.Either<A, string> {
	const value = obj[key];
	return value === undefined
		? Either.left(`${at}.${key} is required`)
		: decoder(value, `${at}.${key}`);
}

const strings = arrayOf(string);

const component: Decoder<Component> = (value, at) =>
	Either.flatMap(
		objectWith(value, at, ["name", "identifier", "flag", "sources", "includes"]),
		(obj) =>
			Either.flatMap(required(obj, "name", at, string), (name) =>
				Either.all({
					name: Either.right(name),
					kind: Either.right<"object">("object"),
					identifier: field(obj, "identifier", at, string, name),
					flag: required(obj, "flag", at, string),
					sources: field(obj, "sources", at, strings, []),
					includes: field(obj, "includes", at, strings, []),
				}),
			),
	);

const feature: Decoder<Feature> = (value, at) =>
	Either.flatMap(objectWith(value, at, ["name", "flag", "operations"]), (obj) =>
		Either.all({
			name: required(obj, "name", at, string),
			flag: required(obj, "flag", at, string),
			operations: required(obj, "operations", at, strings),
		}),
	);

const tierExpectation: Decoder<TierExpectation> = (value, at) =>
	Either.flatMap(objectWith(value, at, ["flag", "minTier"]), (obj) =>
		Either.all({
			flag: required(obj, "flag", at, string),
			minTier: required(obj, "minTier", at, positiveInteger),
		}),
	);

const requiredPath: Decoder<RequiredPath> = (value, at) =>
	typeof value === "string"
		? Either.map(string(value, at), (p) => ({ path: p, description: p }))
		: Either.flatMap(objectWith(value, at, ["path", "description"]), (obj) =>
				Either.flatMap(required(obj, "path", at, string), (p) =>
					Either.all({
						path: Either.right(p),
						description: field(obj, "description", at, string, p),
					}),
				),
			);

const vendoredStack: Decoder<VendoredStack | null> = (value, at) =>
	value === null
		? Either.right(null)
		: Either.flatMap(objectWith(value, at, ["path", "extensions", "minFiles"]), (obj) =>
				Either.all({
					path: required(obj, "path", at, string),
					extensions: required(obj, "extensions", at, strings),
					minFiles: required(obj, "minFiles", at, positiveInteger),
				}),
			);

const GUARD_KEYS: readonly (keyof GuardConfig)[] = [
	"configSource",
	"aggregator",
	"tierMacro",
	"requiredFlags",
	"tierExpectations",
	"components",
	"features",
	"sourceRoots",
	"sourceExtensions",
	"examplesDir",
	"sketchExtension",
	"tierNoticePattern",
	"featureGuardMode",
];

const LAYOUT_KEYS: readonly (keyof LayoutConfig)[] = [
	"requiredFiles",
	"requiredDirectories",
	"sourceDir",
	"rootSourceExtensions",
	"metadataFile",
	"metadataFields",
	"keywordsFile",
	"keywordTypes",
	"examplesDir",
	"sketchExtension",
	"vendoredStack",
];

function decodeGuards(
	value: JSONValue,
	at: string,
	d: GuardConfig,
): Either.Either<GuardConfig, string> {
	return Either.flatMap(objectWith(value, at, GUARD_KEYS), (obj) =>
		Either.all({
			configSource: field(obj, "configSource", at, string, d.configSource),
			aggregator: field(obj, "aggregator", at, string, d.aggregator),
			tierMacro: field(obj, "tierMacro", at, string, d.tierMacro),
			requiredFlags: field(obj, "requiredFlags", at, strings, d.requiredFlags),
			tierExpectations: field(
				obj,
				"tierExpectations",
				at,
				arrayOf(tierExpectation),
				d.tierExpectations,
			),
			components: field(obj, "components", at, arrayOf(component), d.components),
			features: field(obj, "features", at, arrayOf(feature), d.features),
			sourceRoots: field(obj, "sourceRoots", at, strings, d.sourceRoots),
			sourceExtensions: field(obj, "sourceExtensions", at, strings, d.sourceExtensions),
			examplesDir: field(obj, "examplesDir", at, string, d.examplesDir),
			sketchExtension: field(obj, "sketchExtension", at, string, d.sketchExtension),
			tierNoticePattern: field(obj, "tierNoticePattern", at, pattern, d.tierNoticePattern),
			featureGuardMode: field(obj, "featureGuardMode", at, featureGuardMode, d.featureGuardMode),
		}),
	);
}

function decodeLayout(
	value: JSONValue,
	at: string,
	d: LayoutConfig,
): Either.Either<LayoutConfig, string> {
	return Either.flatMap(objectWith(value, at, LAYOUT_KEYS), (obj) =>
		Either.all({
			requiredFiles: field(obj, "requiredFiles", at, arrayOf(requiredPath), d.requiredFiles),
			requiredDirectories: field(
				obj,
				"requiredDirectories",
				at,
				arrayOf(requiredPath),
				d.requiredDirectories,
			),
			sourceDir: field(obj, "sourceDir", at, string, d.sourceDir),
			rootSourceExtensions: field(
				obj,
				"rootSourceExtensions",
				at,
				strings,
				d.rootSourceExtensions,
			),
			metadataFile: field(obj, "metadataFile", at, string, d.metadataFile),
			metadataFields: field(obj, "metadataFields", at, strings, d.metadataFields),
			keywordsFile: field(obj, "keywordsFile", at, string, d.keywordsFile),
			keywordTypes: field(obj, "keywordTypes", at, strings, d.keywordTypes),
			examplesDir: field(obj, "examplesDir", at, string, d.examplesDir),
			sketchExtension: field(obj, "sketchExtension", at, string, d.sketchExtension),
			vendoredStack: field(obj, "vendoredStack", at, vendoredStack, d.vendoredStack),
		}),
	);
}

/**
 * Validates a parsed configuration document and merges it over `defaults`.
 *
 * @pure true
 * @example
 * ```ts
 * decodeConfig({ guards: { tierMacro: "TIER" } }).pipe(Either.map((c) => c.guards.tierMacro)); // Right("TIER")
 * ```
 */
export function decodeConfig(
	value: JSONValue,
	defaults: VerifierConfig = DEFAULT_CONFIG,
): Either.Either<VerifierConfig, string> {
	return Either.flatMap(objectWith(value, "config", ["guards", "layout"]), (obj) =>
		Either.all({
			guards:
				obj["guards"] === undefined
					? Either.right(defaults.guards)
					: decodeGuards(obj["guards"], "config.guards", defaults.guards),
			layout:
				obj["layout"] === undefined
					? Either.right(defaults.layout)
					: decodeLayout(obj["layout"], "config.layout", defaults.layout),
		}),
	);
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseJSON(raw: string, file: string): Effect.Effect<JSONValue, ConfigError> {
	return Effect.try({
		try: (): JSONValue => JSON.parse(raw),
		catch: (error) =>
			new ConfigError({
				path: file,
				detail: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});
}

/**
 * Loads the configuration for a library.
 *
 * Without `explicitPath`, `<target>/verify.config.json` is read when it
 * exists and the defaults apply otherwise. An explicit path must exist.
 *
 * @effect Effect<VerifierConfig, ConfigError>
 */
export function loadVerifierConfig(
	target: string,
	explicitPath?: string,
): Effect.Effect<VerifierConfig, ConfigError> {
	const file = explicitPath ?? path.join(target, CONFIG_FILE_NAME);
	return Effect.gen(function* () {
		const raw = yield* Effect.tryPromise({
			try: () => fsp.readFile(file, "utf8"),
			catch: (error) => error,
		}).pipe(Effect.either);
		if (Either.isLeft(raw)) {
			if (explicitPath === undefined && isNotFound(raw.left)) return DEFAULT_CONFIG;
			const detail = isNotFound(raw.left)
				? "configuration file not found"
				: `cannot read configuration file: ${String(raw.left)}`;
			return yield* Effect.fail(new ConfigError({ path: file, detail }));
		}
		const parsed = yield* parseJSON(raw.right, file);
		return yield* decodeConfig(parsed).pipe(
			Either.mapLeft((detail) => new ConfigError({ path: file, detail })),
		);
	});
}
