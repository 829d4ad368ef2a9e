// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP orchestrators
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATORS (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Pipeline orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { DEFAULT_CONFIG, nodeCommandRunner, runPipeline, autoApprover } from "pyrefine-pipeline";
 *
 * const report = await Effect.runPromise(
 *   runPipeline(DEFAULT_CONFIG, {
 *     workdir: "service",
 *     autoApprove: true,
 *     skipSetup: false,
 *     noPush: true,
 *   }, {
 *     runner: nodeCommandRunner,
 *     approver: autoApprover,
 *     env: process.env,
 *     platform: process.platform,
 *   }),
 * );
 * ```
 *
 * @pure false - Orchestrates SHELL effects (commands, prompt, file I/O)
 */
export { type PipelineServices, runPipeline } from "./app/runPipeline.js";
export {
	describeOptimizerSummary,
	type OptimizerServices,
	type OptimizerSummary,
	runOptimizer,
} from "./app/runOptimizer.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	BuiltinOptimizerConfig,
	CLICommand,
	ExitCode,
	OptimizeOptions,
	OptimizerKind,
	OptimizerMode,
	PipelineConfig,
	PorcelainEntry,
	RunOptions,
	RunReport,
	RunStatus,
	StageName,
	StageOutcome,
	StageStatus,
	StepSpec,
	ToolCommand,
} from "./core/types/index.js";
export type { AppError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @pure true
 * @invariant ∀ report: computeExitCode(report) ∈ {0, 1}
 */
export { computeExitCode, runStatusOf } from "./core/decision.js";
export { STAGE_ORDER } from "./core/models.js";
export { DEFAULT_BUILTIN, DEFAULT_CONFIG } from "./core/config/defaults.js";
export { resolveConfig } from "./core/config/resolve.js";
export { hasChanges, parsePorcelain } from "./core/git/porcelain.js";
export { activateVirtualEnv } from "./core/env/virtualenv.js";
export { rewriteSource } from "./core/optimizer/rewrite.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type Approver,
	autoApprover,
	terminalApprover,
} from "./shell/approval/prompt.js";
export { type CommandRunner, nodeCommandRunner } from "./shell/utils/exec.js";
