// CHANGE: Flag registry extraction from the configuration source
// FORMAT THEOREM: ∀ define d inside branch β of a tier block B: gated(d) ↔ β compares the tier ∧ d.line < B.closeLine
// PURITY: CORE
// INVARIANT: definitions in different branches of one conditional never count as redefinitions
// COMPLEXITY: O(n + d²) where n = lines, d = definitions of a single flag

import { Either } from "effect";

import { RegistryUnavailable } from "../errors.js";
import { blockById, scanConditionals } from "../preprocessor/conditionals.js";
import type {
	BranchRef,
	ConditionalScan,
	Flag,
	FlagDefinition,
	FlagRegistry,
	FlagValue,
	SourceText,
	TierPlacement,
} from "../types/index.js";
import { parseTierBound } from "./tiers.js";

export interface RegistryOptions {
	readonly tierMacro: string;
}

const BOOLEAN_DEFINE = /^([A-Za-z_][A-Za-z0-9_]*)\s+\(?\s*([01])\s*\)?$/u;

interface Placement {
	readonly placement: TierPlacement;
	readonly minTier?: number;
}

/**
 * Classifies a define by the tier conditions on its branch path.
 *
 * @pure true
 */
function placementOf(
	scan: ConditionalScan,
	path: readonly BranchRef[],
	tierMacro: string,
): Placement {
	let minTier: number | undefined;
	let fallback = false;
	for (const ref of path) {
		const block = blockById(scan, ref.blockId);
		if (block === undefined) continue;
		const branch = block.branches[ref.branchIndex];
		if (branch === undefined) continue;
		const bound =
			branch.kind === "if" || branch.kind === "elif"
				? parseTierBound(branch.condition, tierMacro)
				: undefined;
		if (bound !== undefined) {
			minTier = minTier === undefined ? bound : Math.max(minTier, bound);
			continue;
		}
		const earlierComparesTier = block.branches
			.slice(0, ref.branchIndex)
			.some((b) => parseTierBound(b.condition, tierMacro) !== undefined);
		if (earlierComparesTier) fallback = true;
	}
	if (minTier !== undefined) return { placement: "gated", minTier };
	return { placement: fallback ? "fallback" : "unconditional" };
}

/**
 * Two definitions are alternatives when they sit in different branches of
 * a common conditional block.
 *
 * @pure true
 */
export function areAlternatives(
	a: readonly BranchRef[],
	b: readonly BranchRef[],
): boolean {
	return a.some((ra) =>
		b.some((rb) => ra.blockId === rb.blockId && ra.branchIndex !== rb.branchIndex),
	);
}

function collectDefinitions(
	text: SourceText,
	scan: ConditionalScan,
	tierMacro: string,
): readonly FlagDefinition[] {
	const definitions: FlagDefinition[] = [];
	for (const directive of scan.directives) {
		if (directive.kind !== "define") continue;
		const m = BOOLEAN_DEFINE.exec(directive.argument);
		if (m === null) continue;
		const name = m[1] ?? "";
		const value: FlagValue = m[2] === "1" ? 1 : 0;
		const { placement, minTier } = placementOf(scan, directive.path, tierMacro);
		definitions.push({
			name,
			value,
			line: directive.line,
			text: (text.lines[directive.line - 1] ?? "").trim(),
			placement,
			...(minTier === undefined ? {} : { minTier }),
			path: directive.path,
		});
	}
	return definitions;
}

function hasConflict(definitions: readonly FlagDefinition[]): boolean {
	for (const [i, a] of definitions.entries()) {
		for (const b of definitions.slice(i + 1)) {
			if (!areAlternatives(a.path, b.path)) return true;
		}
	}
	return false;
}

function toFlag(name: string, definitions: readonly FlagDefinition[]): Flag | null {
	const gated = definitions.find((d) => d.placement === "gated");
	const primary = gated ?? definitions[0];
	if (primary === undefined) return null;
	const enabledFrom =
		primary.placement === "gated" && primary.value === 1
			? primary.minTier
			: undefined;
	return {
		name,
		defaultValue: primary.value,
		...(enabledFrom === undefined ? {} : { minTier: enabledFrom }),
		location: primary,
		definitions,
	};
}

/**
 * Builds the flag registry from the configuration source.
 *
 * Recognises `#define NAME 0` / `#define NAME 1` (optionally parenthesised)
 * and places each one against the tier comparisons of its enclosing
 * branches. A define that appears after a tier block closes is not gated.
 *
 * @returns Right(registry), or Left(RegistryUnavailable) when no flag is defined
 *
 * @pure true
 * @example
 * ```ts
 * const text = toSourceText("c.h", "src/c.h",
 *   "#if BOARD_TIER >= 2\n#define F 1\n#else\n#define F 0\n#endif\n");
 * const registry = Either.getOrThrow(extractFlagRegistry(text, { tierMacro: "BOARD_TIER" }));
 * registry.flags.get("F")?.minTier; // 2
 * ```
 */
export function extractFlagRegistry(
	text: SourceText,
	options: RegistryOptions,
): Either.Either<FlagRegistry, RegistryUnavailable> {
	const scan = scanConditionals(text);
	const definitions = collectDefinitions(text, scan, options.tierMacro);
	if (definitions.length === 0) {
		return Either.left(
			new RegistryUnavailable({
				source: text.relativePath,
				reason: "no '#define NAME 0|1' lines found",
			}),
		);
	}

	const byName = new Map<string, FlagDefinition[]>();
	for (const definition of definitions) {
		const list = byName.get(definition.name) ?? [];
		list.push(definition);
		byName.set(definition.name, list);
	}

	const flags = new Map<string, Flag>();
	const duplicates = new Map<string, readonly FlagDefinition[]>();
	for (const [name, list] of byName) {
		const flag = toFlag(name, list);
		if (flag !== null) flags.set(name, flag);
		if (hasConflict(list)) duplicates.set(name, list);
	}

	return Either.right({
		source: text.relativePath,
		tierMacro: options.tierMacro,
		flags,
		duplicates,
		issues: scan.issues,
	});
}

/**
 * Whether `flag` is defined inside a tier comparison with bound `minTier`.
 *
 * @pure true
 */
export function isTierGated(
	registry: FlagRegistry,
	flag: string,
	minTier: number,
): boolean {
	return registry.flags.get(flag)?.minTier === minTier;
}
