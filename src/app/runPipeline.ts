// CHANGE: Application orchestration of the nine pipeline stages
// FORMAT THEOREM: ∀run: report.stages.map(s => s.stage) = STAGE_ORDER
// PURITY: APP (no process.exit; effects go through CommandRunner, Approver and the report writer)
// EFFECT: Effect<RunReport, never>
// INVARIANT: Stages run strictly in order, one step at a time; notify always runs
// COMPLEXITY: O(s) where s = total number of steps

import { Effect } from "effect";
import { match } from "ts-pattern";

import { isBlocking, runStatusOf } from "../core/decision.js";
import { activateVirtualEnv, type Environment } from "../core/env/virtualenv.js";
import {
	type AppError,
	describeError,
	StageFailed,
} from "../core/errors.js";
import {
	type PorcelainEntry,
	type RunReport,
	STAGE_ORDER,
	type StageName,
	type StageOutcome,
	type StepSpec,
} from "../core/models.js";
import {
	checkoutSteps,
	commitSteps,
	formatSteps,
	optimizerStep,
	planStage,
	setupSteps,
} from "../core/pipeline/plan.js";
import type { PipelineConfig, RunOptions } from "../core/types/index.js";
import {
	APPROVAL_QUESTION,
	type ApprovalDecision,
	type Approver,
} from "../shell/approval/prompt.js";
import {
	readWorkingTreeDiff,
	readWorkingTreeStatus,
} from "../shell/git/index.js";
import {
	printChanges,
	printDiff,
	printFailure,
	printStageBanner,
	printStageDone,
	printStageSkipped,
	printStepResult,
	printSummary,
	printWarning,
} from "../shell/output/printer.js";
import { writeReport } from "../shell/output/report.js";
import type { CommandRunner } from "../shell/utils/exec.js";
import { path } from "../shell/utils/node-mods.js";
import { describeOptimizerSummary, runOptimizer } from "./runOptimizer.js";

/**
 * Everything the pipeline talks to. Tests pass fakes.
 */
export interface PipelineServices {
	readonly runner: CommandRunner;
	readonly approver: Approver;
	readonly env: Environment;
	readonly platform: NodeJS.Platform;
	readonly now?: () => number;
}

/**
 * Mutable state threaded through one run.
 */
interface RunState {
	env: Environment;
	hasChanges: boolean | null;
	changes: readonly PorcelainEntry[];
}

interface StageContext {
	readonly workdir: string;
	readonly config: PipelineConfig;
	readonly options: RunOptions;
	readonly services: PipelineServices;
	readonly state: RunState;
}

/**
 * Non-failed result of a stage body. Failures travel in the error channel.
 */
interface StageResult {
	readonly status: "passed" | "suppressed" | "rejected";
	readonly detail?: string;
}

const passed = (detail?: string): StageResult =>
	detail === undefined ? { status: "passed" } : { status: "passed", detail };

/**
 * Runs steps in order. A `warn` step that fails prints its warning and the
 * stage goes on; a `fail` step that fails stops the stage.
 *
 * @returns the warnings raised, in order
 */
function runSteps(
	stage: StageName,
	steps: readonly StepSpec[],
	ctx: StageContext,
): Effect.Effect<readonly string[], StageFailed> {
	return Effect.gen(function* () {
		const warnings: string[] = [];
		for (const step of steps) {
			const exit = yield* ctx.services.runner
				.run(step.command, { cwd: ctx.workdir, env: ctx.state.env })
				.pipe(
					Effect.map((result) => {
						printStepResult(result);
						return { code: result.exitCode, reason: `exit code ${result.exitCode}` };
					}),
					Effect.catchAll((error) =>
						Effect.succeed({ code: -1, reason: describeError(error) }),
					),
				);
			if (exit.code === 0) continue;
			if (step.onFailure === "warn") {
				const warning = step.warning ?? `${step.label} failed`;
				printWarning(warning);
				warnings.push(warning);
				continue;
			}
			return yield* Effect.fail(
				new StageFailed({ stage, step: step.label, reason: exit.reason }),
			);
		}
		return warnings;
	});
}

const fromWarnings = (warnings: readonly string[]): StageResult =>
	warnings.length === 0
		? passed()
		: { status: "suppressed", detail: warnings.join("; ") };

function setupStage(ctx: StageContext): Effect.Effect<StageResult, StageFailed> {
	return Effect.gen(function* () {
		const [create, ...pip] = setupSteps(ctx.config);
		if (create !== undefined) yield* runSteps("setup", [create], ctx);
		ctx.state.env = activateVirtualEnv(
			ctx.state.env,
			path.resolve(ctx.workdir, ctx.config.venvDir),
			ctx.services.platform,
		);
		const warnings = yield* runSteps("setup", pip, ctx);
		return fromWarnings(warnings);
	});
}

function optimizerStage(
	pass: "detect" | "fix",
	ctx: StageContext,
): Effect.Effect<StageResult, AppError> {
	if (ctx.config.optimizer === "external") {
		return runSteps(pass, [optimizerStep(ctx.config, pass)], ctx).pipe(
			Effect.map(fromWarnings),
		);
	}
	return runOptimizer(ctx.workdir, ctx.config.builtin, pass, {
		runner: ctx.services.runner,
		cwd: ctx.workdir,
		env: ctx.state.env,
	}).pipe(Effect.map((summary) => passed(describeOptimizerSummary(summary))));
}

function diffStage(ctx: StageContext): Effect.Effect<StageResult, AppError> {
	return Effect.gen(function* () {
		const git = { cwd: ctx.workdir, env: ctx.state.env };
		const status = yield* readWorkingTreeStatus(ctx.services.runner, git);
		ctx.state.hasChanges = status.changed;
		ctx.state.changes = status.entries;
		printChanges(status.entries);
		if (!status.changed) return passed("no changes");
		printDiff(yield* readWorkingTreeDiff(ctx.services.runner, git));
		return passed(`${status.entries.length} changed file(s)`);
	});
}

function approveStage(ctx: StageContext): Effect.Effect<StageResult, AppError> {
	if (ctx.options.autoApprove) return Effect.succeed(passed("auto-approved"));
	const timeout = ctx.options.approvalTimeoutSeconds;
	const request =
		timeout === undefined
			? { question: APPROVAL_QUESTION }
			: { question: APPROVAL_QUESTION, timeoutSeconds: timeout };
	return ctx.services.approver(request).pipe(
		Effect.map((decision): StageResult =>
			match<ApprovalDecision, StageResult>(decision)
				.with({ approved: true }, () => passed("approved"))
				.with({ reason: "timeout" }, () => ({
					status: "rejected",
					detail: `no answer within ${timeout ?? 0}s`,
				}))
				.otherwise(() => ({ status: "rejected", detail: "not approved" })),
		),
	);
}

function stageBody(
	stage: Exclude<StageName, "notify">,
	ctx: StageContext,
): Effect.Effect<StageResult, AppError> {
	return match<typeof stage, Effect.Effect<StageResult, AppError>>(stage)
		.with("checkout", () =>
			runSteps("checkout", checkoutSteps(ctx.options.branch), ctx).pipe(
				Effect.map(fromWarnings),
			),
		)
		.with("setup", () => setupStage(ctx))
		.with("detect", () => optimizerStage("detect", ctx))
		.with("format", () =>
			runSteps("format", formatSteps(ctx.config), ctx).pipe(
				Effect.map(fromWarnings),
			),
		)
		.with("fix", () => optimizerStage("fix", ctx))
		.with("diff", () => diffStage(ctx))
		.with("approve", () => approveStage(ctx))
		.with("commit", () =>
			runSteps("commit", commitSteps(ctx.config, !ctx.options.noPush), ctx).pipe(
				Effect.map(fromWarnings),
			),
		)
		.exhaustive();
}

/**
 * Runs one stage body and turns its result or error into an outcome.
 */
function executeStage(
	stage: Exclude<StageName, "notify">,
	ctx: StageContext,
	now: () => number,
): Effect.Effect<StageOutcome> {
	const started = now();
	return stageBody(stage, ctx).pipe(
		Effect.map((result): StageOutcome => ({
			stage,
			...result,
			durationMs: now() - started,
		})),
		Effect.catchAll((error) => {
			const detail = describeError(error);
			printFailure(detail);
			return Effect.succeed<StageOutcome>({
				stage,
				status: "failed",
				detail,
				durationMs: now() - started,
			});
		}),
		Effect.tap((outcome) =>
			Effect.sync(() => {
				printStageDone(outcome);
			}),
		),
	);
}

/**
 * Prints the summary and writes the report. A report that cannot be
 * written suppresses the notify stage; it never changes the run status.
 */
function notifyStage(
	ctx: StageContext,
	outcomes: readonly StageOutcome[],
	startedAt: Date,
	now: () => number,
): Effect.Effect<RunReport> {
	return Effect.gen(function* () {
		const started = now();
		const build = (notify: StageOutcome): RunReport => {
			const stages = [...outcomes, notify];
			return {
				status: runStatusOf(stages),
				workdir: ctx.workdir,
				stages,
				changes: ctx.state.changes,
				startedAt: startedAt.toISOString(),
				finishedAt: new Date(now()).toISOString(),
			};
		};

		const reportPath = ctx.options.reportPath;
		if (reportPath === undefined) {
			return yield* finish(
				build({ stage: "notify", status: "passed", durationMs: now() - started }),
			);
		}

		const written = build({
			stage: "notify",
			status: "passed",
			detail: `report: ${reportPath}`,
			durationMs: now() - started,
		});
		const report = yield* writeReport(reportPath, written).pipe(
			Effect.as(written),
			Effect.catchAll((error) => {
				const detail = `report not written: ${describeError(error)}`;
				printWarning(detail);
				return Effect.succeed(
					build({
						stage: "notify",
						status: "suppressed",
						detail,
						durationMs: now() - started,
					}),
				);
			}),
		);
		return yield* finish(report);
	});
}

function finish(report: RunReport): Effect.Effect<RunReport> {
	return Effect.sync(() => {
		printSummary(report);
		return report;
	});
}

/**
 * Runs the whole pipeline and returns its report. Never fails: every error
 * becomes a stage outcome.
 *
 * @param config - resolved configuration
 * @param options - run options (workdir, approval, push, report)
 * @param services - command runner, approver, base environment
 *
 * @invariant report.stages.length = STAGE_ORDER.length
 * @invariant ∃ s: s.status = "failed" ∨ "rejected" → every later stage but notify is skipped
 */
export function runPipeline(
	config: PipelineConfig,
	options: RunOptions,
	services: PipelineServices,
): Effect.Effect<RunReport> {
	const now = services.now ?? Date.now;
	return Effect.gen(function* () {
		const startedAt = new Date(now());
		const ctx: StageContext = {
			workdir: path.resolve(options.workdir),
			config,
			options,
			services,
			state: { env: services.env, hasChanges: null, changes: [] },
		};
		const outcomes: StageOutcome[] = [];

		for (const stage of STAGE_ORDER) {
			if (stage === "notify") break;
			const decision = planStage(stage, {
				blocked: outcomes.some(isBlocking),
				hasChanges: ctx.state.hasChanges,
				skipSetup: options.skipSetup,
			});
			if (decision === "skip") {
				printStageSkipped(stage);
				outcomes.push({ stage, status: "skipped", durationMs: 0 });
				continue;
			}
			printStageBanner(stage);
			outcomes.push(yield* executeStage(stage, ctx, now));
		}

		printStageBanner("notify");
		return yield* notifyStage(ctx, outcomes, startedAt, now);
	});
}
