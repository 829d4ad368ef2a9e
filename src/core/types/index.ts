// CHANGE: Central export file for type definitions
// REF: REQ-MODULAR-ARCH

export type {
	BuiltinOptimizerConfig,
	CLICommand,
	OptimizeOptions,
	OptimizerKind,
	OptimizerMode,
	PipelineConfig,
	RunOptions,
	ToolCommand,
} from "./config.js";
export type {
	ExitCode,
	FailurePolicy,
	PorcelainEntry,
	RunReport,
	RunStatus,
	StageName,
	StageOutcome,
	StageStatus,
	StepSpec,
} from "../models.js";
export type { CommandResult, ExecFailureOutput } from "./exec-helpers.js";
export { extractExecFailure } from "./exec-helpers.js";
