// CHANGE: Builders for in-memory sources used across core tests
// PURITY: CORE (test helpers)

import { Either } from "effect";

import type { LoadedSource } from "../../src/core/checks/result.js";
import { FSError } from "../../src/core/errors.js";
import { toSourceText } from "../../src/core/text/lines.js";
import type {
	Component,
	Feature,
	GuardConfig,
	SourceText,
} from "../../src/core/types/index.js";

/**
 * Joins lines with LF and a trailing newline.
 */
export function lines(...rows: readonly string[]): string {
	return `${rows.join("\n")}\n`;
}

export function source(content: string, relativePath = "src/Test.h"): SourceText {
	return toSourceText(`/lib/${relativePath}`, relativePath, content);
}

export function loaded(content: string, relativePath = "src/Test.h"): LoadedSource {
	return Either.right(source(content, relativePath));
}

export function unreadable(relativePath: string): LoadedSource {
	return Either.left(new FSError({ path: relativePath, detail: "ENOENT" }));
}

export function component(overrides: Partial<Component> = {}): Component {
	return {
		name: "Widget",
		kind: "object",
		identifier: "Widget",
		flag: "HAS_WIDGET",
		sources: ["src/Widget.h"],
		includes: ["Widget.h"],
		...overrides,
	};
}

export const COV: Feature = {
	name: "COV",
	flag: "FEATURE_COV",
	operations: ["enableCOV", "disableCOV"],
};

export function guardConfig(overrides: Partial<GuardConfig> = {}): GuardConfig {
	return {
		configSource: "src/Config.h",
		aggregator: "src/Library.h",
		tierMacro: "BOARD_TIER",
		requiredFlags: [],
		tierExpectations: [],
		components: [],
		features: [],
		sourceRoots: ["src"],
		sourceExtensions: [".h", ".cpp", ".ino"],
		examplesDir: "examples",
		sketchExtension: ".ino",
		tierNoticePattern: "Tier \\d|REQUIRE_TIER",
		featureGuardMode: "nesting",
		...overrides,
	};
}
