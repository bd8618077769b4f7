// CHANGE: Nesting-stack walk over conditional directives
// FORMAT THEOREM: ∀ file: every closed block's openLine < closeLine ∧ blocks nest or are disjoint
// PURITY: CORE
// INVARIANT: push on if/ifdef/ifndef, branch on elif/else, pop on endif; never pattern-search for a close
// COMPLEXITY: O(n) where n = number of lines

import { match } from "ts-pattern";

import type {
	BranchRef,
	ConditionalBlock,
	ConditionalBranch,
	ConditionalScan,
	Directive,
	SourceText,
	StructuralIssue,
} from "../types/index.js";
import {
	continuesOnNextLine,
	directiveKind,
	parseDirectiveLine,
} from "./directives.js";

interface Frame {
	readonly id: number;
	readonly openLine: number;
	readonly depth: number;
	readonly parentId: number | null;
	readonly branches: ConditionalBranch[];
	elseLine: number | null;
}

interface LogicalLine {
	readonly text: string;
	readonly line: number;
	readonly endLine: number;
}

/**
 * Joins backslash-continued directive lines.
 *
 * @pure true
 */
function* logicalLines(maskedLines: readonly string[]): Generator<LogicalLine> {
	let i = 0;
	while (i < maskedLines.length) {
		const start = i;
		let text = maskedLines[i] ?? "";
		while (continuesOnNextLine(text) && i + 1 < maskedLines.length) {
			i += 1;
			text = `${text.replace(/\\\s*$/u, " ")}${maskedLines[i] ?? ""}`;
		}
		yield { text, line: start + 1, endLine: i + 1 };
		i += 1;
	}
}

function currentPath(stack: readonly Frame[]): readonly BranchRef[] {
	return stack.map((f) => ({
		blockId: f.id,
		branchIndex: f.branches.length - 1,
	}));
}

function freeze(frame: Frame, closeLine: number | null): ConditionalBlock {
	return {
		id: frame.id,
		openLine: frame.openLine,
		closeLine,
		depth: frame.depth,
		parentId: frame.parentId,
		branches: [...frame.branches],
	};
}

/**
 * Walks every directive of a file with an explicit nesting stack.
 *
 * @returns directives (with their enclosing branch path), blocks in open order, structural issues sorted by line
 *
 * @pure true
 * @invariant an irrelevant nested `#if … #endif` never closes an outer block
 * @example
 * ```ts
 * const scan = scanConditionals(toSourceText("a.h", "a.h", "#if A\n#if B\n#endif\n#endif\n"));
 * scan.blocks.map((b) => [b.openLine, b.closeLine]); // [[1, 4], [2, 3]]
 * ```
 */
export function scanConditionals(text: SourceText): ConditionalScan {
	const directives: Directive[] = [];
	const issues: StructuralIssue[] = [];
	const blocks = new Map<number, ConditionalBlock>();
	const stack: Frame[] = [];
	let nextId = 0;

	for (const logical of logicalLines(text.maskedLines)) {
		const raw = parseDirectiveLine(logical.text);
		if (raw === null) continue;
		const kind = directiveKind(raw.keyword);
		const { line } = logical;
		const enclosing = currentPath(stack);
		const record = (path: readonly BranchRef[]): void => {
			directives.push({
				kind,
				keyword: raw.keyword,
				argument: raw.argument,
				line,
				endLine: logical.endLine,
				path,
			});
		};

		match(kind)
			.with("if", "ifdef", "ifndef", (open) => {
				record(enclosing);
				const parent = stack.at(-1);
				const frame: Frame = {
					id: nextId,
					openLine: line,
					depth: stack.length,
					parentId: parent === undefined ? null : parent.id,
					branches: [{ kind: open, line, condition: raw.argument }],
					elseLine: null,
				};
				nextId += 1;
				blocks.set(frame.id, freeze(frame, null));
				stack.push(frame);
			})
			.with("elif", "else", (branch) => {
				const top = stack.at(-1);
				if (top === undefined) {
					issues.push({ kind: "orphan-branch", line, directive: branch });
					record(enclosing);
					return;
				}
				const outer = enclosing.slice(0, -1);
				record(outer);
				if (top.elseLine !== null) {
					issues.push({
						kind: "branch-after-else",
						line,
						directive: branch,
						elseLine: top.elseLine,
					});
					return;
				}
				top.branches.push({ kind: branch, line, condition: raw.argument });
				if (branch === "else") top.elseLine = line;
			})
			.with("endif", () => {
				const top = stack.pop();
				if (top === undefined) {
					issues.push({ kind: "unmatched-close", line });
					record(enclosing);
					return;
				}
				record(enclosing.slice(0, -1));
				blocks.set(top.id, freeze(top, line));
			})
			.with("define", "undef", "include", "pragma", "other", () => {
				record(enclosing);
			})
			.exhaustive();
	}

	for (const frame of stack) {
		const opening = frame.branches[0]?.kind ?? "if";
		issues.push({ kind: "unmatched-open", line: frame.openLine, directive: opening });
		blocks.set(frame.id, freeze(frame, null));
	}

	return {
		directives,
		blocks: [...blocks.values()].sort((a, b) => a.id - b.id),
		issues: [...issues].sort((a, b) => a.line - b.line),
	};
}

/**
 * Looks up a block by id.
 *
 * @pure true
 */
export function blockById(
	scan: ConditionalScan,
	id: number,
): ConditionalBlock | undefined {
	return scan.blocks.find((b) => b.id === id);
}
