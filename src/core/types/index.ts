// CHANGE: Central export file for all type definitions
// PURITY: Re-exports only

export type {
	CheckResult,
	CheckSection,
	FailureKind,
	RunSummary,
	VerificationRun,
} from "./check.js";
export type { Component, Feature, TierExpectation } from "./components.js";
export type {
	CLIOptions,
	FeatureGuardMode,
	GuardConfig,
	LayoutConfig,
	OutputFormat,
	ReportOptions,
	RequiredPath,
	VendoredStack,
	VerifierConfig,
} from "./config.js";
export type {
	Flag,
	FlagDefinition,
	FlagRegistry,
	FlagValue,
	TierPlacement,
} from "./flags.js";
export type { GuardScan, GuardSpan } from "./guards.js";
export type {
	BranchRef,
	ConditionalBlock,
	ConditionalBranch,
	ConditionalBranchKind,
	ConditionalOpenKind,
	ConditionalScan,
	Directive,
	DirectiveKind,
	StructuralIssue,
} from "./preprocessor.js";
export type { LineRange, SourceLocation, SourceText } from "./text.js";
