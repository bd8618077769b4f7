// CHANGE: Preprocessor directive and conditional-block model
// PURITY: CORE
// INVARIANT: every ConditionalBlock is opened by exactly one if/ifdef/ifndef branch
// COMPLEXITY: O(1)

export type ConditionalOpenKind = "if" | "ifdef" | "ifndef";
export type ConditionalBranchKind = ConditionalOpenKind | "elif" | "else";

export type DirectiveKind =
	| ConditionalBranchKind
	| "endif"
	| "define"
	| "undef"
	| "include"
	| "pragma"
	| "other";

/**
 * Reference to one branch of one conditional block.
 *
 * @invariant branchIndex < blocks[blockId].branches.length
 */
export interface BranchRef {
	readonly blockId: number;
	readonly branchIndex: number;
}

/**
 * One logical directive (continuation lines already joined).
 *
 * @property keyword raw directive word after `#`
 * @property argument rest of the directive with comments removed and trimmed
 * @property line first physical line (1-based)
 * @property endLine last physical line when the directive continues with `\`
 * @property path enclosing branches from outermost to innermost
 */
export interface Directive {
	readonly kind: DirectiveKind;
	readonly keyword: string;
	readonly argument: string;
	readonly line: number;
	readonly endLine: number;
	readonly path: readonly BranchRef[];
}

export interface ConditionalBranch {
	readonly kind: ConditionalBranchKind;
	readonly line: number;
	readonly condition: string;
}

/**
 * A balanced `#if … #endif` region.
 *
 * @property closeLine null when the block is never closed
 * @property depth number of open blocks enclosing this one at open time
 */
export interface ConditionalBlock {
	readonly id: number;
	readonly openLine: number;
	readonly closeLine: number | null;
	readonly depth: number;
	readonly parentId: number | null;
	readonly branches: readonly ConditionalBranch[];
}

export type StructuralIssue =
	| {
			readonly kind: "unmatched-open";
			readonly line: number;
			readonly directive: string;
	  }
	| { readonly kind: "unmatched-close"; readonly line: number }
	| {
			readonly kind: "orphan-branch";
			readonly line: number;
			readonly directive: "elif" | "else";
	  }
	| {
			readonly kind: "branch-after-else";
			readonly line: number;
			readonly directive: "elif" | "else";
			readonly elseLine: number;
	  }
	| {
			readonly kind: "overlapping-spans";
			readonly line: number;
			readonly otherLine: number;
			readonly flag: string;
	  };

/**
 * Result of walking a file's conditional directives with a nesting stack.
 */
export interface ConditionalScan {
	readonly directives: readonly Directive[];
	readonly blocks: readonly ConditionalBlock[];
	readonly issues: readonly StructuralIssue[];
}
