// CHANGE: ANSI SGR palette selected from report options
// PURITY: CORE
// INVARIANT: the plain palette is the identity on every style
// COMPLEXITY: O(1)

export type Style = "bold" | "blue" | "green" | "red" | "yellow";

export type Palette = Readonly<Record<Style, (text: string) => string>>;

const RESET = "\u001b[0m";

function sgr(code: string): (text: string) => string {
	return (text) => `\u001b[${code}m${text}${RESET}`;
}

const identity = (text: string): string => text;

export const ANSI_PALETTE: Palette = {
	bold: sgr("1"),
	blue: sgr("1;94"),
	green: sgr("92"),
	red: sgr("91"),
	yellow: sgr("1;93"),
};

export const PLAIN_PALETTE: Palette = {
	bold: identity,
	blue: identity,
	green: identity,
	red: identity,
	yellow: identity,
};

/**
 * @pure true
 */
export function paletteFor(color: boolean): Palette {
	return color ? ANSI_PALETTE : PLAIN_PALETTE;
}
