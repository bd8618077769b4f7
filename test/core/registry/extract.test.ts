// CHANGE: Unit tests for flag registry extraction
// PURITY: CORE
// INVARIANT: definitions in different branches of one conditional are alternatives

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	extractFlagRegistry,
	isTierGated,
} from "../../../src/core/registry/extract.js";
import { parseTierBound } from "../../../src/core/registry/tiers.js";
import type { FlagRegistry } from "../../../src/core/types/index.js";
import { lines, source } from "../../utils/builders.js";

const CONFIG_SOURCE = lines(
	"#ifndef CFG_H",
	"#define CFG_H",
	"#define BOARD_TIER 2",
	"#define HAS_DEVICE 1",
	"#if BOARD_TIER >= 2",
	"  #define HAS_OUTPUT 1",
	"#else",
	"  #define HAS_OUTPUT 0",
	"#endif",
	"#define FEATURE_COV (1) // on by default",
	"#endif",
);

function registryOf(content: string): FlagRegistry {
	const result = extractFlagRegistry(source(content, "src/Config.h"), {
		tierMacro: "BOARD_TIER",
	});
	if (Either.isLeft(result)) throw new Error(result.left.reason);
	return result.right;
}

describe("parseTierBound", () => {
	it("derives the smallest enabled tier from the comparison", () => {
		expect(parseTierBound("BOARD_TIER >= 2", "BOARD_TIER")).toBe(2);
		expect(parseTierBound("BOARD_TIER > 2", "BOARD_TIER")).toBe(3);
		expect(parseTierBound("BOARD_TIER == 4", "BOARD_TIER")).toBe(4);
		expect(parseTierBound("BOARD_TIER>=1 && BOARD_TIER>=3", "BOARD_TIER")).toBe(3);
	});

	it("ignores other macros and non-tier comparisons", () => {
		expect(parseTierBound("BOARD_RAM_KB >= 32", "BOARD_TIER")).toBeUndefined();
		expect(parseTierBound("MY_BOARD_TIER >= 2", "BOARD_TIER")).toBeUndefined();
		expect(parseTierBound("BOARD_TIER < 2", "BOARD_TIER")).toBeUndefined();
	});
});

describe("extractFlagRegistry", () => {
	it("extracts boolean defines only", () => {
		const registry = registryOf(CONFIG_SOURCE);
		expect([...registry.flags.keys()]).toEqual(["HAS_DEVICE", "HAS_OUTPUT", "FEATURE_COV"]);
		expect(registry.issues).toEqual([]);
	});

	it("classifies defines against tier branches", () => {
		const registry = registryOf(CONFIG_SOURCE);
		const output = registry.flags.get("HAS_OUTPUT");
		expect(output?.minTier).toBe(2);
		expect(output?.defaultValue).toBe(1);
		expect(output?.location.line).toBe(6);
		expect(output?.definitions.map((d) => d.placement)).toEqual(["gated", "fallback"]);
		expect(registry.flags.get("HAS_DEVICE")?.location.placement).toBe("unconditional");
		expect(registry.flags.get("FEATURE_COV")?.location.text).toBe(
			"#define FEATURE_COV (1) // on by default",
		);
	});

	it("treats #if/#else definitions as alternatives, not duplicates", () => {
		expect(registryOf(CONFIG_SOURCE).duplicates.size).toBe(0);
	});

	it("reports a flag defined twice on the same path", () => {
		const registry = registryOf(lines("#define A 1", "#if X", "#endif", "#define A 0"));
		expect(registry.duplicates.get("A")?.map((d) => d.line)).toEqual([1, 4]);
	});

	it("uses the innermost tier bound for nested comparisons", () => {
		const registry = registryOf(
			lines(
				"#if BOARD_TIER >= 2",
				"#if BOARD_TIER >= 3",
				"#define DEEP 1",
				"#endif",
				"#endif",
			),
		);
		expect(registry.flags.get("DEEP")?.minTier).toBe(3);
	});

	it("does not treat a define after the tier block as gated", () => {
		const registry = registryOf(
			lines("#if BOARD_TIER >= 2", "#define OTHER 1", "#endif", "#define LATE 1"),
		);
		expect(registry.flags.get("LATE")?.location.placement).toBe("unconditional");
		expect(registry.flags.get("LATE")?.minTier).toBeUndefined();
	});

	it("gives no minimum tier to a flag switched off in the tier branch", () => {
		const registry = registryOf(
			lines("#if BOARD_TIER >= 3", "#define SLIM 0", "#else", "#define SLIM 1", "#endif"),
		);
		expect(registry.flags.get("SLIM")?.minTier).toBeUndefined();
		expect(registry.flags.get("SLIM")?.defaultValue).toBe(0);
	});

	it("is unavailable when the file defines no flags", () => {
		const result = extractFlagRegistry(source(lines("#define NAME \"x\""), "src/Config.h"), {
			tierMacro: "BOARD_TIER",
		});
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.reason).toBe("no '#define NAME 0|1' lines found");
			expect(result.left.source).toBe("src/Config.h");
		}
	});

	it("answers tier-gating queries", () => {
		const registry = registryOf(CONFIG_SOURCE);
		expect(isTierGated(registry, "HAS_OUTPUT", 2)).toBe(true);
		expect(isTierGated(registry, "HAS_OUTPUT", 3)).toBe(false);
		expect(isTierGated(registry, "HAS_DEVICE", 2)).toBe(false);
	});
});
