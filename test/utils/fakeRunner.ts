// CHANGE: In-process CommandRunner stand-in for pipeline and optimizer tests
// INVARIANT: No process is spawned; every call is recorded in order

import { Effect } from "effect";

import type { Environment } from "../../src/core/env/virtualenv.js";
import { ExecError } from "../../src/core/errors.js";
import type { CommandResult } from "../../src/core/types/exec-helpers.js";
import type {
	CommandRunner,
	RunCommandOptions,
} from "../../src/shell/utils/exec.js";

export interface Reply {
	readonly exitCode?: number;
	readonly stdout?: string;
	readonly stderr?: string;
	/** Simulate a command that cannot be spawned. */
	readonly spawnError?: string;
}

export interface RecordedCall {
	readonly command: string;
	readonly cwd: string;
	readonly env: Environment | undefined;
}

export interface FakeRunner extends CommandRunner {
	readonly calls: RecordedCall[];
	readonly commands: () => readonly string[];
}

/**
 * Replies are looked up by exact command first, then by the first
 * matching prefix; anything else exits 0 with no output.
 */
export function fakeRunner(
	replies: Readonly<Record<string, Reply>> = {},
): FakeRunner {
	const calls: RecordedCall[] = [];
	const lookup = (command: string): Reply => {
		const exact = replies[command];
		if (exact !== undefined) return exact;
		const prefix = Object.keys(replies).find((key) => command.startsWith(key));
		return prefix === undefined ? {} : (replies[prefix] ?? {});
	};
	return {
		calls,
		commands: () => calls.map((call) => call.command),
		run: (command: string, options: RunCommandOptions) => {
			calls.push({ command, cwd: options.cwd, env: options.env });
			const reply = lookup(command);
			if (reply.spawnError !== undefined) {
				return Effect.fail(
					new ExecError({ command, exitCode: null, detail: reply.spawnError }),
				);
			}
			return Effect.succeed<CommandResult>({
				command,
				exitCode: reply.exitCode ?? 0,
				stdout: reply.stdout ?? "",
				stderr: reply.stderr ?? "",
			});
		},
	};
}
