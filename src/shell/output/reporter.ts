// CHANGE: Console reporter for verification runs
// PURITY: SHELL (writes through the injected sinks)
// INVARIANT: records are written in the order received; options are fixed at construction
// COMPLEXITY: O(1) per record

import { match } from "ts-pattern";

import { summarize } from "../../core/decision.js";
import { paletteFor } from "../../core/format/palette.js";
import {
	fatalRecord,
	formatBanner,
	formatFatal,
	formatHeader,
	formatResult,
	formatSummary,
	type RunTexts,
	resultRecord,
	SECTION_TITLES,
	summaryRecord,
} from "../../core/format/report.js";
import type {
	CheckResult,
	CheckSection,
	ReportOptions,
} from "../../core/types/index.js";

export type Sink = (line: string) => void;

export interface Reporter {
	readonly banner: (texts: RunTexts, target: string) => void;
	readonly section: (section: CheckSection) => void;
	readonly record: (result: CheckResult) => void;
	readonly summary: (results: readonly CheckResult[], texts: RunTexts) => void;
	readonly fatal: (message: string) => void;
}

/**
 * Builds a reporter bound to one set of options.
 *
 * In `quiet` mode only failed records and the summary are written. In
 * `jsonl` mode every record is one JSON line and headers are omitted.
 *
 * @example
 * ```ts
 * const lines: string[] = [];
 * const reporter = createReporter({ color: false, format: "text", quiet: false }, (l) => lines.push(l));
 * ```
 */
export function createReporter(
	options: ReportOptions,
	sink: Sink = console.log,
	errorSink: Sink = console.error,
): Reporter {
	const palette = paletteFor(options.color && options.format === "text");
	const text = options.format === "text";
	const writeAll = (lines: readonly string[]): void => {
		for (const line of lines) sink(line);
	};

	return {
		banner: (texts, target) => {
			if (text && !options.quiet) writeAll(formatBanner(texts, target, palette));
		},
		section: (section) => {
			if (text && !options.quiet) writeAll(formatHeader(SECTION_TITLES[section], palette));
		},
		record: (result) => {
			if (options.quiet && result.passed) return;
			match(options.format)
				.with("text", () => writeAll(formatResult(result, palette)))
				.with("jsonl", () => sink(resultRecord(result)))
				.exhaustive();
		},
		summary: (results, texts) => {
			const summary = summarize(results);
			match(options.format)
				.with("text", () =>
					writeAll([
						...formatHeader("Verification Summary", palette),
						...formatSummary(summary, texts, palette),
					]),
				)
				.with("jsonl", () => sink(summaryRecord(summary)))
				.exhaustive();
		},
		fatal: (message) => {
			match(options.format)
				.with("text", () => errorSink(formatFatal(message, palette)))
				.with("jsonl", () => errorSink(fatalRecord(message)))
				.exhaustive();
		},
	};
}
