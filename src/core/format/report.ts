// CHANGE: Pure report line formatting (text and jsonl)
// PURITY: CORE
// INVARIANT: formatting never reorders results; one jsonl line per result plus one summary line
// COMPLEXITY: O(1) per line

import type { CheckResult, CheckSection, RunSummary } from "../types/index.js";
import type { Palette } from "./palette.js";

const RULE = "=".repeat(70);

export const SECTION_TITLES: Readonly<Record<CheckSection, string>> = {
	registry: "1. Flag Registry Check",
	"self-guard": "2. Component Self-Guard Check",
	"inclusion-guard": "3. Aggregator Conditional Includes Check",
	"feature-guard": "4. Feature Guards Check",
	"usage-guard": "5. Unguarded Component Usage Check",
	examples: "6. Example Sketch Compatibility Check",
	"required-files": "1. Required Files Check",
	"required-directories": "2. Required Directories Check",
	"source-location": "3. Source File Location Check",
	metadata: "4. Library Metadata Validation",
	keywords: "5. Keywords File Validation",
	"example-layout": "6. Examples Structure Check",
	"vendored-stack": "7. Vendored Stack Check",
};

/**
 * Texts that differ between the two entry points.
 */
export interface RunTexts {
	readonly title: string;
	readonly success: string;
	readonly failure: string;
}

export const GUARD_TEXTS: RunTexts = {
	title: "Conditional Compilation Verification",
	success: "Conditional compilation system is properly implemented!",
	failure: "Please fix the issues above to ensure proper tier-based compilation.",
};

export const LAYOUT_TEXTS: RunTexts = {
	title: "Library Structure Verification",
	success: "Library structure is valid and ready for the library index!",
	failure: "Please fix the issues above before submitting the library.",
};

export function formatBanner(
	texts: RunTexts,
	target: string,
	palette: Palette,
): readonly string[] {
	return [palette.bold(texts.title), `Library directory: ${target}`, ""];
}

export function formatHeader(title: string, palette: Palette): readonly string[] {
	return ["", palette.blue(RULE), palette.blue(title), palette.blue(RULE), ""];
}

/**
 * `✓ PASS - description` plus an indented detail line.
 *
 * @pure true
 */
export function formatResult(
	result: CheckResult,
	palette: Palette,
): readonly string[] {
	const status = result.passed ? palette.green("✓ PASS") : palette.red("✗ FAIL");
	const head = `${status} - ${result.description}`;
	return result.detail === undefined || result.detail.length === 0
		? [head]
		: [head, `      ${result.detail}`];
}

export function formatSummary(
	summary: RunSummary,
	texts: RunTexts,
	palette: Palette,
): readonly string[] {
	const counts = `(${summary.passed}/${summary.total})`;
	return summary.ok
		? [
				palette.green(palette.bold(`✓ ALL CHECKS PASSED ${counts}`)),
				"",
				palette.green(texts.success),
				"",
			]
		: [
				palette.yellow(`⚠ SOME CHECKS FAILED ${counts}`),
				"",
				palette.yellow(texts.failure),
				"",
			];
}

export function formatFatal(message: string, palette: Palette): string {
	return palette.red(`Error: ${message}`);
}

/**
 * One JSON record per result.
 *
 * @pure true
 * @example
 * ```ts
 * resultRecord({ section: "registry", description: "d", passed: true });
 * // '{"type":"result","section":"registry","description":"d","passed":true}'
 * ```
 */
export function resultRecord(result: CheckResult): string {
	return JSON.stringify({ type: "result", ...result });
}

export function summaryRecord(summary: RunSummary): string {
	return JSON.stringify({ type: "summary", ...summary });
}

export function fatalRecord(message: string): string {
	return JSON.stringify({ type: "fatal", message });
}
