// CHANGE: Functional Core domain models for the stage pipeline (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the pipeline process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Stage names in execution order.
 *
 * @invariant STAGE_ORDER is a permutation of StageName with no repeats
 */
export const STAGE_ORDER = [
	"checkout",
	"setup",
	"detect",
	"format",
	"fix",
	"diff",
	"approve",
	"commit",
	"notify",
] as const;

export type StageName = (typeof STAGE_ORDER)[number];

/**
 * What a step does when its command exits non-zero.
 *
 * - `fail`: the stage stops and is reported as failed
 * - `warn`: the warning is printed and the stage continues (`cmd || echo "..."`)
 */
export type FailurePolicy = "fail" | "warn";

/**
 * One shell command inside a stage.
 *
 * @invariant command.length > 0
 */
export interface StepSpec {
	readonly label: string;
	readonly command: string;
	readonly onFailure: FailurePolicy;
	readonly warning?: string;
}

export type StageStatus =
	| "passed"
	| "failed"
	| "skipped"
	| "suppressed"
	| "rejected";

export interface StageOutcome {
	readonly stage: StageName;
	readonly status: StageStatus;
	readonly detail?: string;
	readonly durationMs: number;
}

export type RunStatus = "success" | "failure" | "aborted";

/**
 * One line of `git status --porcelain` (v1).
 *
 * @invariant index.length === 1 ∧ worktree.length === 1
 */
export interface PorcelainEntry {
	readonly index: string;
	readonly worktree: string;
	readonly path: string;
	readonly originalPath?: string;
}

/**
 * Complete record of one pipeline run.
 *
 * @invariant stages are in STAGE_ORDER, each stage appears once
 */
export interface RunReport {
	readonly status: RunStatus;
	readonly workdir: string;
	readonly stages: readonly StageOutcome[];
	readonly changes: readonly PorcelainEntry[];
	readonly startedAt: string;
	readonly finishedAt: string;
}
