// CHANGE: Model `source venv/bin/activate` as a pure environment transform
// FORMAT THEOREM: activate(env, v).PATH = bin(v) + delimiter + env.PATH
// PURITY: CORE
// INVARIANT: input environment is never mutated
// COMPLEXITY: O(k) where k = |env|

import * as path from "node:path";

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Name of the venv executables directory for a platform.
 *
 * @pure true
 */
export const venvBinDir = (platform: NodeJS.Platform): string =>
	platform === "win32" ? "Scripts" : "bin";

/**
 * Interpreter used to create the venv: `python3.11` for version `3.11`.
 *
 * @pure true
 */
export const pythonExecutable = (version: string): string =>
	`python${version.trim()}`;

/**
 * Returns the environment an activated virtualenv would produce.
 *
 * @param env - base environment (usually process.env)
 * @param venvPath - absolute path of the venv directory
 * @param platform - target platform, decides `bin` vs `Scripts` and `:` vs `;`
 *
 * @pure true
 */
export function activateVirtualEnv(
	env: Environment,
	venvPath: string,
	platform: NodeJS.Platform,
): Environment {
	const delimiter = platform === "win32" ? ";" : ":";
	const joiner = platform === "win32" ? path.win32 : path.posix;
	const binDir = joiner.join(venvPath, venvBinDir(platform));
	const currentPath = env["PATH"];
	const { PYTHONHOME: _pythonHome, ...rest } = env;
	return {
		...rest,
		VIRTUAL_ENV: venvPath,
		PATH:
			currentPath === undefined || currentPath.length === 0
				? binDir
				: `${binDir}${delimiter}${currentPath}`,
	};
}
