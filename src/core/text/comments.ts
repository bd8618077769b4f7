// CHANGE: Comment masking for C/C++ sources
// PURITY: CORE
// INVARIANT: |maskComments(s)| = |s| ∧ ∀i: s[i] = "\n" → result[i] = "\n"
// COMPLEXITY: O(n) where n = |source|

type ScanState =
	| "code"
	| "line-comment"
	| "block-comment"
	| "string"
	| "char";

/**
 * Replaces every comment character with a space, keeping newlines.
 *
 * String and character literals are copied verbatim (a `//` inside `"..."`
 * is not a comment). Offsets and line numbers of the result match the input.
 *
 * @pure true
 * @example
 * ```ts
 * maskComments('#endif // FLAG'); // '#endif         '
 * ```
 */
export function maskComments(source: string): string {
	const out: string[] = [];
	let state: ScanState = "code";
	let i = 0;
	while (i < source.length) {
		const ch = source.charAt(i);
		const next = source.charAt(i + 1);
		switch (state) {
			case "code":
				if (ch === "/" && next === "/") {
					state = "line-comment";
					out.push("  ");
					i += 2;
					continue;
				}
				if (ch === "/" && next === "*") {
					state = "block-comment";
					out.push("  ");
					i += 2;
					continue;
				}
				if (ch === '"') state = "string";
				else if (ch === "'") state = "char";
				out.push(ch);
				break;
			case "line-comment":
				if (ch === "\n") {
					state = "code";
					out.push(ch);
				} else {
					out.push(ch === "\r" ? ch : " ");
				}
				break;
			case "block-comment":
				if (ch === "*" && next === "/") {
					state = "code";
					out.push("  ");
					i += 2;
					continue;
				}
				out.push(ch === "\n" || ch === "\r" ? ch : " ");
				break;
			case "string":
			case "char": {
				const quote = state === "string" ? '"' : "'";
				if (ch === "\\" && next !== "" && next !== "\n") {
					out.push(ch, next);
					i += 2;
					continue;
				}
				// Unterminated literals end at the line break
				if (ch === quote || ch === "\n") state = "code";
				out.push(ch);
				break;
			}
		}
		i += 1;
	}
	return out.join("");
}
