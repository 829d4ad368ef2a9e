// CHANGE: Git queries used by the diff stage
// PURITY: SHELL
// EFFECT: Effect<WorkingTreeStatus, ExecError>
// INVARIANT: Porcelain output is parsed untrimmed (leading status columns are significant)

import { Effect } from "effect";

import type { Environment } from "../../core/env/virtualenv.js";
import type { ExecError } from "../../core/errors.js";
import { hasChanges, parsePorcelain } from "../../core/git/porcelain.js";
import type { PorcelainEntry } from "../../core/models.js";
import { type CommandRunner, execCommand } from "../utils/exec.js";

export interface WorkingTreeStatus {
	readonly changed: boolean;
	readonly entries: readonly PorcelainEntry[];
}

interface GitContext {
	readonly cwd: string;
	readonly env?: Environment;
}

/**
 * `git status --porcelain` as parsed entries.
 *
 * @pure false (runs git)
 */
export function readWorkingTreeStatus(
	runner: CommandRunner,
	context: GitContext,
): Effect.Effect<WorkingTreeStatus, ExecError> {
	return execCommand(runner, "git status --porcelain", context).pipe(
		Effect.map((stdout) => ({
			changed: hasChanges(stdout),
			entries: parsePorcelain(stdout),
		})),
	);
}

/**
 * Unstaged diff of tracked files.
 *
 * @pure false (runs git)
 */
export function readWorkingTreeDiff(
	runner: CommandRunner,
	context: GitContext,
): Effect.Effect<string, ExecError> {
	return execCommand(runner, "git --no-pager diff", context);
}
