// CHANGE: Example sketch tier-notice check
// PURITY: CORE
// INVARIANT: only sketches using a component whose flag carries a minimum tier are judged
// COMPLEXITY: O(k · n) where k = sketches, n = sketch length

import { Either } from "effect";

import { detectGuardSpans, unguardedLines } from "../guards/spans.js";
import { findIdentifierLines } from "../text/identifiers.js";
import type {
	CheckResult,
	Component,
	FlagRegistry,
	SourceText,
} from "../types/index.js";
import { failed, type LoadedSource, missing, passed } from "./result.js";

export interface ExampleInputs {
	readonly examplesDir: string;
	readonly present: boolean;
	readonly sketches: readonly LoadedSource[];
	readonly noticePattern: string;
}

interface TieredComponent {
	readonly component: Component;
	readonly minTier: number;
}

function tieredComponents(
	components: readonly Component[],
	registry: FlagRegistry,
): readonly TieredComponent[] {
	return components.flatMap((component) => {
		const minTier = registry.flags.get(component.flag)?.minTier;
		return minTier === undefined ? [] : [{ component, minTier }];
	});
}

function usesGuarded(text: SourceText, uses: readonly TieredComponent[]): boolean {
	return uses.every(({ component }) => {
		const guard = detectGuardSpans(text, component.flag);
		if (guard.issues.length > 0) return false;
		const refs = findIdentifierLines(text, component.identifier);
		return unguardedLines(guard.spans, refs).length === 0;
	});
}

function checkSketch(
	text: SourceText,
	uses: readonly TieredComponent[],
	notice: RegExp,
): CheckResult {
	const file = text.relativePath;
	const names = uses.map(({ component }) => component.identifier).join(", ");
	const description = `${file} using tier-gated objects has a tier notice`;
	const tier = Math.max(...uses.map((u) => u.minTier));
	if (notice.test(text.content)) {
		return passed("examples", description, { detail: "Tier notice found", file });
	}
	if (usesGuarded(text, uses)) {
		return passed("examples", description, {
			detail: `Uses of ${names} are guarded`,
			file,
		});
	}
	return failed("examples", description, "guard-violation", {
		detail: `Missing tier requirement notice: ${names} need tier ${tier}`,
		file,
	});
}

/**
 * Example compatibility results.
 *
 * @pure true
 */
export function checkExampleTiers(
	components: readonly Component[],
	registry: FlagRegistry | null,
	inputs: ExampleInputs,
): readonly CheckResult[] {
	const summary = "Example sketches declare tier requirements";
	if (registry === null) {
		return [
			failed("examples", summary, "suppressed", {
				detail: "Suppressed: flag registry unavailable",
			}),
		];
	}
	if (!inputs.present) {
		return [
			passed("examples", summary, {
				detail: `No ${inputs.examplesDir}/ directory; no examples to check`,
			}),
		];
	}
	if (inputs.sketches.length === 0) {
		return [passed("examples", summary, { detail: "No example sketches found yet" })];
	}

	const tiered = tieredComponents(components, registry);
	const notice = new RegExp(inputs.noticePattern, "iu");
	const results: CheckResult[] = [];
	for (const loaded of inputs.sketches) {
		if (Either.isLeft(loaded)) {
			results.push(missing("examples", `${loaded.left.path} is readable`, loaded.left));
			continue;
		}
		const text = loaded.right;
		const uses = tiered.filter(
			({ component }) => findIdentifierLines(text, component.identifier).length > 0,
		);
		if (uses.length === 0) continue;
		results.push(checkSketch(text, uses, notice));
	}
	if (results.length === 0) {
		return [passed("examples", summary, { detail: "No sketch uses tier-gated objects" })];
	}
	return results;
}
