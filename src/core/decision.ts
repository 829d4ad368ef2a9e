// CHANGE: Pure decision functions mapping stage outcomes to run status and exit code
// FORMAT THEOREM: ∀r ∈ Report: r.status = "success" ↔ computeExitCode(r) = 0
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping Outcomes → RunStatus → ExitCode
// COMPLEXITY: O(n) where n = |outcomes|

import { pipe } from "effect";

import type {
	ExitCode,
	RunReport,
	RunStatus,
	StageOutcome,
} from "./models.js";

/**
 * Derives the run status from stage outcomes.
 *
 * A rejected approval wins over a failure: the run was stopped on purpose.
 *
 * @pure true
 * @invariant result ∈ {success, failure, aborted}
 * @complexity O(n)
 */
export const runStatusOf = (
	outcomes: readonly StageOutcome[],
): RunStatus => {
	if (outcomes.some((o) => o.status === "rejected")) return "aborted";
	if (outcomes.some((o) => o.status === "failed")) return "failure";
	return "success";
};

/**
 * Computes process exit code from a finished run.
 *
 * @pure true
 * @postcondition report.status = "success" → result = 0
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ ...report, status: "aborted" }); // 1
 * ```
 */
export const computeExitCode = (report: Pick<RunReport, "status">): ExitCode =>
	pipe(
		report.status,
		(status) => status === "success",
		(ok): ExitCode => (ok ? 0 : 1),
	);

/**
 * True when the outcome stops every later stage except notify.
 *
 * @pure true
 */
export const isBlocking = (outcome: StageOutcome): boolean =>
	outcome.status === "failed" || outcome.status === "rejected";

/**
 * Approval answers: `y` and `yes` (any case) approve, anything else rejects.
 *
 * @pure true
 */
export const isAffirmative = (answer: string): boolean => {
	const normalized = answer.trim().toLowerCase();
	return normalized === "y" || normalized === "yes";
};
