// CHANGE: Make main.ts a thin APP delegator
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { runCommand } from "./app/commands.js";
import { describeError } from "./core/errors.js";
import type { ExitCode } from "./core/models.js";
import { terminalApprover } from "./shell/approval/prompt.js";
import { parseCLIArgs } from "./shell/config/index.js";
import { nodeCommandRunner } from "./shell/utils/exec.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv - arguments after the script name
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(
	argv: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	const parsed = parseCLIArgs(argv);
	if (Either.isLeft(parsed)) {
		console.error(`❌ ${describeError(parsed.left)}`);
		console.error("Run `pyrefine --help` for usage.");
		return 1;
	}
	return Effect.runPromise(
		runCommand(parsed.right, {
			runner: nodeCommandRunner,
			approver: terminalApprover(process.stdin, process.stdout),
			env: process.env,
			platform: process.platform,
			cwd: process.cwd(),
		}),
	);
}
