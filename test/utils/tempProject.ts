// CHANGE: Test helper to create isolated temporary projects on disk
// INVARIANT: Every project lives under os.tmpdir(); cleanup() removes it recursively

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary project.
 *
 * Postconditions:
 * - cwd points to the root directory of the temporary project
 * - cleanup() removes the temporary directory recursively
 */
export interface TempProject {
	readonly cwd: string;
	readonly file: (relative: string) => string;
	readonly read: (relative: string) => string;
	readonly cleanup: () => void;
}

/**
 * Create a temporary project populated with `files` (relative path → content).
 *
 * @example
 * const t = createTempProject({ "pkg/simple_math.py": "x = 1\n" });
 * // ... run tests ...
 * t.cleanup();
 */
export function createTempProject(
	files: Readonly<Record<string, string>> = {},
): TempProject {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "pyrefine-test-"));
	for (const [relative, content] of Object.entries(files)) {
		const full = path.join(cwd, relative);
		fs.mkdirSync(path.dirname(full), { recursive: true });
		fs.writeFileSync(full, content, "utf8");
	}
	return {
		cwd,
		file: (relative) => path.join(cwd, relative),
		read: (relative) => fs.readFileSync(path.join(cwd, relative), "utf8"),
		cleanup: () => {
			fs.rmSync(cwd, { recursive: true, force: true });
		},
	};
}
