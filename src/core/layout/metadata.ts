// CHANGE: Library metadata (key=value properties) checks
// PURITY: CORE
// INVARIANT: later duplicate keys override earlier ones
// COMPLEXITY: O(n) where n = lines

import { failed, passed } from "../checks/result.js";
import { splitLines } from "../text/lines.js";
import type { CheckResult } from "../types/index.js";

const SEMVER = /^\d+\.\d+\.\d+$/u;

/**
 * Parses `key=value` lines. Blank lines, `#` comments and lines without `=` are skipped.
 *
 * @pure true
 * @example
 * ```ts
 * parseProperties("name=Lib\n# c\nversion = 1.0.0\n").get("version"); // "1.0.0"
 * ```
 */
export function parseProperties(content: string): ReadonlyMap<string, string> {
	const fields = new Map<string, string>();
	for (const raw of splitLines(content)) {
		const line = raw.trim();
		if (line.startsWith("#")) continue;
		const eq = line.indexOf("=");
		if (eq < 0) continue;
		fields.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
	}
	return fields;
}

/**
 * Required fields present and non-empty; version is `x.y.z` when present.
 *
 * @param content - file text, or null when the file is missing
 *
 * @pure true
 */
export function checkMetadata(
	file: string,
	content: string | null,
	requiredFields: readonly string[],
): readonly CheckResult[] {
	if (content === null) {
		return [
			failed("metadata", `${file} exists`, "missing-resource", {
				detail: `File not found: ${file}`,
				file,
			}),
		];
	}
	const fields = parseProperties(content);
	const results: CheckResult[] = requiredFields.map((field) => {
		const value = fields.get(field) ?? "";
		const description = `Field '${field}' present`;
		return value.length > 0
			? passed("metadata", description, {
					detail: `Value: ${value.slice(0, 50)}...`,
					file,
				})
			: failed("metadata", description, "format-violation", {
					detail: "Missing or empty",
					file,
				});
	});
	const version = fields.get("version");
	if (version !== undefined) {
		const description = "Version format is semantic (x.y.z)";
		results.push(
			SEMVER.test(version)
				? passed("metadata", description, { detail: `Version: ${version}`, file })
				: failed("metadata", description, "format-violation", {
						detail: `Version: ${version}`,
						file,
					}),
		);
	}
	return results;
}
