// CHANGE: Shell command execution behind a CommandRunner seam
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<CommandResult, ExecError>
// INVARIANT: A non-zero exit is a value (CommandResult.exitCode), not an error; only spawn failures fail
// COMPLEXITY: O(1) time, O(n) space where n = output length

import { Effect } from "effect";

import type { Environment } from "../../core/env/virtualenv.js";
import { ExecError } from "../../core/errors.js";
import {
	type CommandResult,
	extractExecFailure,
} from "../../core/types/exec-helpers.js";
import { exec, promisify } from "./node-mods.js";

const execAsync = promisify(exec);

const DEFAULT_MAX_BUFFER = 32 * 1024 * 1024;

export interface RunCommandOptions {
	readonly cwd: string;
	readonly env?: Environment;
	readonly maxBuffer?: number;
}

/**
 * Runs shell command strings. The pipeline and the optimizer only talk to
 * the outside world through this interface, so tests substitute a fake.
 */
export interface CommandRunner {
	readonly run: (
		command: string,
		options: RunCommandOptions,
	) => Effect.Effect<CommandResult, ExecError>;
}

const describeUnknown = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * CommandRunner backed by `child_process.exec` (`/bin/sh -c` on POSIX).
 *
 * @pure false (spawns processes)
 * @effect Effect<CommandResult, ExecError>
 */
export const nodeCommandRunner: CommandRunner = {
	run: (command, options) =>
		Effect.tryPromise({
			try: () =>
				execAsync(command, {
					cwd: options.cwd,
					env: options.env ?? process.env,
					maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
					encoding: "utf8",
				}),
			catch: (error) => error,
		}).pipe(
			Effect.map(
				({ stdout, stderr }): CommandResult => ({
					command,
					exitCode: 0,
					stdout,
					stderr,
				}),
			),
			Effect.catchAll((error) => {
				const failure = extractExecFailure(error);
				if (failure.exitCode === null) {
					return Effect.fail(
						new ExecError({
							command,
							exitCode: null,
							detail:
								failure.stderr.trim().length > 0
									? failure.stderr.trim()
									: describeUnknown(error),
						}),
					);
				}
				return Effect.succeed<CommandResult>({
					command,
					exitCode: failure.exitCode,
					stdout: failure.stdout,
					stderr: failure.stderr,
				});
			}),
		),
};

/**
 * Runs a command and returns stdout, failing on a non-zero exit.
 *
 * @pure false (executes external command)
 * @effect Effect<string, ExecError>
 * @invariant result exitCode = 0 → stdout
 */
export function execCommand(
	runner: CommandRunner,
	command: string,
	options: RunCommandOptions,
): Effect.Effect<string, ExecError> {
	return runner.run(command, options).pipe(
		Effect.flatMap((result) =>
			result.exitCode === 0
				? Effect.succeed(result.stdout)
				: Effect.fail(
						new ExecError({
							command,
							exitCode: result.exitCode,
							detail: result.stderr.trim(),
						}),
					),
		),
	);
}
