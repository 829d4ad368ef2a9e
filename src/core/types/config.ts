// CHANGE: Configuration and CLI option types for the pipeline
// PURITY: CORE
// INVARIANT: All fields readonly; optional fields model "not given" (exactOptionalPropertyTypes)

/**
 * A named external tool command. `{file_path}` is substituted per file
 * in the built-in optimizer.
 */
export interface ToolCommand {
	readonly name: string;
	readonly command: string;
}

export type OptimizerKind = "external" | "builtin";

/**
 * Which parts of the built-in optimizer run on each file.
 */
export type OptimizerMode = "detect" | "fix" | "all";

/**
 * Settings of the built-in optimizer.
 *
 * @property prefixes File name prefixes selected when scanning a directory
 * @property memoize Function names that receive `@lru_cache`
 */
export interface BuiltinOptimizerConfig {
	readonly prefixes: readonly string[];
	readonly errorTools: readonly ToolCommand[];
	readonly formatTools: readonly ToolCommand[];
	readonly memoize: readonly string[];
	readonly skipDirectories: readonly string[];
}

/**
 * Fully resolved pipeline configuration.
 *
 * @invariant venvDir.length > 0 ∧ remote.length > 0 ∧ branch.length > 0
 */
export interface PipelineConfig {
	readonly pythonVersion: string;
	readonly venvDir: string;
	readonly tools: readonly string[];
	readonly optimizer: OptimizerKind;
	readonly optimizerCommand: string;
	readonly formatters: readonly ToolCommand[];
	readonly remote: string;
	readonly branch: string;
	readonly commitMessage: string;
	readonly builtin: BuiltinOptimizerConfig;
}

/**
 * Options of `pyrefine run`. Optional fields override configuration.
 */
export interface RunOptions {
	readonly workdir: string;
	readonly configPath?: string;
	readonly pythonVersion?: string;
	readonly venvDir?: string;
	readonly optimizer?: OptimizerKind;
	readonly branch?: string;
	readonly remote?: string;
	readonly message?: string;
	readonly autoApprove: boolean;
	readonly approvalTimeoutSeconds?: number;
	readonly skipSetup: boolean;
	readonly noPush: boolean;
	readonly reportPath?: string;
}

/**
 * Options of `pyrefine optimize`.
 */
export interface OptimizeOptions {
	readonly target: string;
	readonly configPath?: string;
	readonly mode: OptimizerMode;
}

export type CLICommand =
	| { readonly kind: "run"; readonly options: RunOptions }
	| { readonly kind: "optimize"; readonly options: OptimizeOptions }
	| { readonly kind: "help" };
