// CHANGE: File selection predicates for the built-in optimizer scan
// PURITY: CORE
// COMPLEXITY: O(p) where p = |prefixes|

import * as path from "node:path";

/**
 * True for `.py` files whose name starts with one of the prefixes.
 * An empty prefix list selects every `.py` file.
 *
 * @example
 * ```ts
 * isSelectedFile("simple_math.py", ["simple", "example"]); // true
 * isSelectedFile("main.py", ["simple", "example"]);        // false
 * ```
 *
 * @pure true
 */
export function isSelectedFile(
	fileName: string,
	prefixes: readonly string[],
): boolean {
	if (!isPythonFile(fileName)) return false;
	if (prefixes.length === 0) return true;
	return prefixes.some((prefix) => fileName.startsWith(prefix));
}

/**
 * @pure true
 */
export const isPythonFile = (filePath: string): boolean =>
	filePath.endsWith(".py");

/**
 * A directory met during a scan; `relative` is taken from the scan root.
 */
export interface ScannedDirectory {
	readonly name: string;
	readonly relative: string;
	readonly absolute: string;
}

const toPosix = (value: string): string => value.replace(/\\/gu, "/");

/**
 * `./venv/` → `venv`, `build\venv` → `build/venv`.
 *
 * @pure true
 */
export function normalizeDirectory(dir: string): string {
	const normalized = path.posix.normalize(toPosix(dir));
	return normalized.length > 1 ? normalized.replace(/\/+$/u, "") : normalized;
}

/**
 * A bare skip entry matches a directory name anywhere in the tree; an entry
 * with a separator matches the path from the scan root, or the absolute path.
 *
 * @pure true
 */
export function shouldEnterDirectory(
	dir: ScannedDirectory,
	skipDirectories: readonly string[],
): boolean {
	return !skipDirectories.some((entry) => {
		const skip = normalizeDirectory(entry);
		if (!skip.includes("/")) return skip === dir.name;
		return skip === toPosix(dir.relative) || skip === toPosix(dir.absolute);
	});
}
