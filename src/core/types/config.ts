// CHANGE: Verifier configuration and CLI option types
// PURITY: CORE
// INVARIANT: configuration is immutable once loaded
// COMPLEXITY: O(1)

import type { Component, Feature, TierExpectation } from "./components.js";

/**
 * How feature operations are matched against guards.
 *
 * - `nesting`: every occurrence must lie in a span from the nesting-aware detector
 * - `first-match`: a `#if FLAG` line anywhere before the last occurrence of the first operation suffices
 */
export type FeatureGuardMode = "nesting" | "first-match";

export interface GuardConfig {
	readonly configSource: string;
	readonly aggregator: string;
	readonly tierMacro: string;
	readonly requiredFlags: readonly string[];
	readonly tierExpectations: readonly TierExpectation[];
	readonly components: readonly Component[];
	readonly features: readonly Feature[];
	readonly sourceRoots: readonly string[];
	readonly sourceExtensions: readonly string[];
	readonly examplesDir: string;
	readonly sketchExtension: string;
	readonly tierNoticePattern: string;
	readonly featureGuardMode: FeatureGuardMode;
}

export interface RequiredPath {
	readonly path: string;
	readonly description: string;
}

export interface VendoredStack {
	readonly path: string;
	readonly extensions: readonly string[];
	readonly minFiles: number;
}

export interface LayoutConfig {
	readonly requiredFiles: readonly RequiredPath[];
	readonly requiredDirectories: readonly RequiredPath[];
	readonly sourceDir: string;
	readonly rootSourceExtensions: readonly string[];
	readonly metadataFile: string;
	readonly metadataFields: readonly string[];
	readonly keywordsFile: string;
	readonly keywordTypes: readonly string[];
	readonly examplesDir: string;
	readonly sketchExtension: string;
	readonly vendoredStack: VendoredStack | null;
}

export interface VerifierConfig {
	readonly guards: GuardConfig;
	readonly layout: LayoutConfig;
}

export type OutputFormat = "text" | "jsonl";

/**
 * Reporter construction options.
 *
 * @invariant color is decided once, before the first line is printed
 */
export interface ReportOptions {
	readonly color: boolean;
	readonly format: OutputFormat;
	readonly quiet: boolean;
}

/**
 * Parsed command line.
 *
 * @property targetPath library root to verify
 * @property configPath explicit configuration file, if given
 */
export interface CLIOptions {
	readonly targetPath: string;
	readonly configPath?: string;
	readonly report: ReportOptions;
}
