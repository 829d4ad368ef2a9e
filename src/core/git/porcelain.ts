// CHANGE: Parse `git status --porcelain` (v1) into typed entries
// FORMAT THEOREM: ∀text ∈ PorcelainV1: hasChanges(text) ↔ parsePorcelain(text).length > 0
// PURITY: CORE
// INVARIANT: Never throws; malformed lines are skipped
// COMPLEXITY: O(n) where n = |text|

import type { PorcelainEntry } from "../models.js";

const OCTAL_ESCAPE = /^[0-7]{3}/u;

const SIMPLE_ESCAPES: Readonly<Record<string, number>> = {
	a: 7,
	b: 8,
	t: 9,
	n: 10,
	v: 11,
	f: 12,
	r: 13,
	'"': 34,
	"\\": 92,
};

/**
 * Reads a C-style quoted path starting at `start` (which points at `"`).
 *
 * git escapes non-ASCII bytes as octal triplets, so bytes are collected and
 * decoded as UTF-8 at the end.
 *
 * @returns decoded path and index just past the closing quote, or null
 */
function readQuoted(
	text: string,
	start: number,
): { readonly value: string; readonly end: number } | null {
	const bytes: number[] = [];
	let i = start + 1;
	while (i < text.length) {
		const ch = text.charAt(i);
		if (ch === '"') {
			return { value: Buffer.from(bytes).toString("utf8"), end: i + 1 };
		}
		if (ch !== "\\") {
			bytes.push(...Buffer.from(ch, "utf8"));
			i += 1;
			continue;
		}
		const rest = text.slice(i + 1);
		const octal = OCTAL_ESCAPE.exec(rest);
		if (octal !== null) {
			bytes.push(Number.parseInt(octal[0], 8));
			i += 4;
			continue;
		}
		const simple = SIMPLE_ESCAPES[rest.charAt(0)];
		if (simple === undefined) return null;
		bytes.push(simple);
		i += 2;
	}
	return null;
}

/**
 * Reads one path token: quoted, or plain up to ` -> ` / end of line.
 */
function readPath(
	text: string,
	start: number,
): { readonly value: string; readonly end: number } | null {
	if (text.charAt(start) === '"') return readQuoted(text, start);
	const arrow = text.indexOf(" -> ", start);
	const end = arrow === -1 ? text.length : arrow;
	const value = text.slice(start, end);
	return value.length === 0 ? null : { value, end };
}

/**
 * Parses a single porcelain line.
 *
 * @example
 * ```ts
 * parsePorcelainLine(" M src/app.py");
 * // { index: " ", worktree: "M", path: "src/app.py" }
 * parsePorcelainLine("R  old.py -> new.py");
 * // { index: "R", worktree: " ", path: "new.py", originalPath: "old.py" }
 * ```
 *
 * @pure true
 * @returns entry or null when the line is not a status line
 */
export function parsePorcelainLine(line: string): PorcelainEntry | null {
	if (line.length < 4 || line.charAt(2) !== " ") return null;
	const index = line.charAt(0);
	const worktree = line.charAt(1);
	const first = readPath(line, 3);
	if (first === null) return null;

	if (line.startsWith(" -> ", first.end)) {
		const second = readPath(line, first.end + 4);
		if (second === null) return null;
		return { index, worktree, path: second.value, originalPath: first.value };
	}
	return { index, worktree, path: first.value };
}

/**
 * Parses full `git status --porcelain` output.
 *
 * @pure true
 * @complexity O(n)
 */
export function parsePorcelain(text: string): readonly PorcelainEntry[] {
	const entries: PorcelainEntry[] = [];
	for (const line of text.split(/\r?\n/u)) {
		const entry = parsePorcelainLine(line);
		if (entry !== null) entries.push(entry);
	}
	return entries;
}

/**
 * Mirrors the shell guard `[ -n "$(git status --porcelain)" ]`.
 *
 * @pure true
 */
export const hasChanges = (text: string): boolean => text.trim().length > 0;

/**
 * Short label for an entry, e.g. `M  src/app.py` or `R  old.py -> new.py`.
 *
 * @pure true
 */
export function formatPorcelainEntry(entry: PorcelainEntry): string {
	const target =
		entry.originalPath === undefined
			? entry.path
			: `${entry.originalPath} -> ${entry.path}`;
	return `${entry.index}${entry.worktree} ${target}`;
}
