// CHANGE: Interactive approval gate between the diff and commit stages
// PURITY: SHELL (terminal I/O)
// EFFECT: Effect<ApprovalDecision, ApprovalUnavailable>
// INVARIANT: Only an affirmative answer approves; end of input and timeout reject
// COMPLEXITY: O(1)

import * as readline from "node:readline";
import type { Readable, Writable } from "node:stream";

import { Duration, Effect } from "effect";

import { isAffirmative } from "../../core/decision.js";
import { ApprovalUnavailable } from "../../core/errors.js";

export const APPROVAL_QUESTION = "Apply and push these changes? [y/N]";

export interface ApprovalRequest {
	readonly question: string;
	readonly timeoutSeconds?: number;
}

export type ApprovalReason = "answered" | "timeout" | "closed" | "auto";

export interface ApprovalDecision {
	readonly approved: boolean;
	readonly reason: ApprovalReason;
}

/**
 * Asks a human (or a stand-in) whether the run may commit.
 */
export type Approver = (
	request: ApprovalRequest,
) => Effect.Effect<ApprovalDecision, ApprovalUnavailable>;

/**
 * Approver that never prompts.
 *
 * @pure true
 */
export const autoApprover: Approver = () =>
	Effect.succeed({ approved: true, reason: "auto" });

function askOnce(
	input: Readable,
	output: Writable,
	question: string,
): Effect.Effect<ApprovalDecision, ApprovalUnavailable> {
	return Effect.async<ApprovalDecision, ApprovalUnavailable>((resume) => {
		if (!input.readable) {
			resume(
				Effect.fail(
					new ApprovalUnavailable({ detail: "approval input is not readable" }),
				),
			);
			return;
		}
		const rl = readline.createInterface({ input, output, terminal: false });
		let settled = false;
		const settle = (decision: ApprovalDecision): void => {
			if (settled) return;
			settled = true;
			rl.close();
			resume(Effect.succeed(decision));
		};
		rl.once("close", () => {
			settle({ approved: false, reason: "closed" });
		});
		rl.question(`\n${question} `, (answer) => {
			settle({ approved: isAffirmative(answer), reason: "answered" });
		});
		return Effect.sync(() => {
			settled = true;
			rl.close();
		});
	});
}

/**
 * Approver reading one answer from `input`.
 *
 * @param input - usually process.stdin
 * @param output - usually process.stdout
 *
 * @pure false (reads the terminal)
 * @invariant timeoutSeconds elapsed without an answer → { approved: false, reason: "timeout" }
 */
export function terminalApprover(input: Readable, output: Writable): Approver {
	return (request) => {
		const ask = askOnce(input, output, request.question);
		if (request.timeoutSeconds === undefined) return ask;
		return ask.pipe(
			Effect.timeoutTo({
				duration: Duration.millis(request.timeoutSeconds * 1000),
				onSuccess: (decision): ApprovalDecision => decision,
				onTimeout: (): ApprovalDecision => ({
					approved: false,
					reason: "timeout",
				}),
			}),
		);
	};
}
