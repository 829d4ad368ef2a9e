// CHANGE: Parse `pyrefine` command lines into a CLICommand
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Unknown flags and missing flag values are errors, never ignored
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import type {
	CLICommand,
	OptimizeOptions,
	OptimizerMode,
	RunOptions,
} from "../../core/types/index.js";

type Draft<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Applies a flag value to the draft; returns a problem message or null.
 */
type ValueFlagHandler<T> = (draft: Draft<T>, value: string) => string | null;

type BooleanFlagHandler<T> = (draft: Draft<T>) => void;

interface FlagTable<T> {
	readonly values: Readonly<Record<string, ValueFlagHandler<T>>>;
	readonly booleans: Readonly<Record<string, BooleanFlagHandler<T>>>;
}

const OPTIMIZE_USAGE = "Usage: pyrefine optimize <directory_or_file_path>";

const MODES: readonly OptimizerMode[] = ["detect", "fix", "all"];

const HELP_FLAGS: readonly string[] = ["--help", "-h"];

const nonEmpty =
	<T>(assign: (draft: Draft<T>, value: string) => void, flag: string) =>
	(draft: Draft<T>, value: string): string | null => {
		if (value.trim().length === 0) return `${flag} requires a non-empty value`;
		assign(draft, value);
		return null;
	};

const runString = (
	flag: string,
	assign: (draft: Draft<RunOptions>, value: string) => void,
): ValueFlagHandler<RunOptions> => nonEmpty(assign, flag);

const RUN_FLAGS: FlagTable<RunOptions> = {
	values: {
		"--config": runString("--config", (d, v) => {
			d.configPath = v;
		}),
		"--python": runString("--python", (d, v) => {
			d.pythonVersion = v.trim();
		}),
		"--venv": runString("--venv", (d, v) => {
			d.venvDir = v;
		}),
		"--branch": runString("--branch", (d, v) => {
			d.branch = v;
		}),
		"--remote": runString("--remote", (d, v) => {
			d.remote = v;
		}),
		"--message": runString("--message", (d, v) => {
			d.message = v;
		}),
		"--report": runString("--report", (d, v) => {
			d.reportPath = v;
		}),
		"--optimizer": (d, v) => {
			if (v !== "external" && v !== "builtin") {
				return `--optimizer must be one of external, builtin (got "${v}")`;
			}
			d.optimizer = v;
			return null;
		},
		"--approval-timeout": (d, v) => {
			const seconds = Number(v);
			if (v.trim().length === 0 || !Number.isFinite(seconds) || seconds <= 0) {
				return `--approval-timeout must be a positive number of seconds (got "${v}")`;
			}
			d.approvalTimeoutSeconds = seconds;
			return null;
		},
	},
	booleans: {
		"--yes": (d) => {
			d.autoApprove = true;
		},
		"-y": (d) => {
			d.autoApprove = true;
		},
		"--skip-setup": (d) => {
			d.skipSetup = true;
		},
		"--no-push": (d) => {
			d.noPush = true;
		},
	},
};

const OPTIMIZE_FLAGS: FlagTable<OptimizeOptions> = {
	values: {
		"--config": nonEmpty<OptimizeOptions>((d, v) => {
			d.configPath = v;
		}, "--config"),
		"--mode": (d, v) => {
			const mode = MODES.find((m) => m === v);
			if (mode === undefined) {
				return `--mode must be one of ${MODES.join(", ")} (got "${v}")`;
			}
			d.mode = mode;
			return null;
		},
	},
	booleans: {},
};

/**
 * Splits `--flag=value` into its parts; other arguments pass through.
 *
 * @pure true
 */
function splitInline(arg: string): { readonly flag: string; readonly inline?: string } {
	if (!arg.startsWith("--")) return { flag: arg };
	const eq = arg.indexOf("=");
	return eq === -1 ? { flag: arg } : { flag: arg.slice(0, eq), inline: arg.slice(eq + 1) };
}

/**
 * Walks the arguments, dispatching flags through the table and handing
 * positionals to `positional`.
 *
 * @pure true
 * @complexity O(n)
 */
function walkArgs<T>(
	args: readonly string[],
	table: FlagTable<T>,
	draft: Draft<T>,
	positional: (value: string) => string | null,
): string | null {
	for (let i = 0; i < args.length; i++) {
		const arg = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const { flag, inline } = splitInline(arg);
		const valueHandler = table.values[flag];
		if (valueHandler !== undefined) {
			const value = inline ?? args.at(i + 1);
			if (value === undefined) return `${flag} requires a value`;
			if (inline === undefined) i++;
			const problem = valueHandler(draft, value);
			if (problem !== null) return problem;
			continue;
		}

		const booleanHandler = table.booleans[flag];
		if (booleanHandler !== undefined) {
			if (inline !== undefined) return `${flag} does not take a value`;
			booleanHandler(draft);
			continue;
		}

		if (arg.startsWith("-")) return `Unknown option: ${arg}`;

		const problem = positional(arg);
		if (problem !== null) return problem;
	}
	return null;
}

function parseRun(args: readonly string[]): Either.Either<CLICommand, ConfigError> {
	const draft: Draft<RunOptions> = {
		workdir: ".",
		autoApprove: false,
		skipSetup: false,
		noPush: false,
	};
	let seenWorkdir = false;
	const problem = walkArgs(args, RUN_FLAGS, draft, (value) => {
		if (seenWorkdir) return `Unexpected argument: ${value}`;
		seenWorkdir = true;
		draft.workdir = value;
		return null;
	});
	return problem === null
		? Either.right({ kind: "run", options: draft })
		: Either.left(new ConfigError({ detail: problem }));
}

function parseOptimize(
	args: readonly string[],
): Either.Either<CLICommand, ConfigError> {
	const draft: Draft<OptimizeOptions> = { target: "", mode: "all" };
	let seenTarget = false;
	const problem = walkArgs(args, OPTIMIZE_FLAGS, draft, (value) => {
		if (seenTarget) return `Unexpected argument: ${value}`;
		seenTarget = true;
		draft.target = value;
		return null;
	});
	if (problem !== null) return Either.left(new ConfigError({ detail: problem }));
	if (!seenTarget) return Either.left(new ConfigError({ detail: OPTIMIZE_USAGE }));
	return Either.right({ kind: "optimize", options: draft });
}

/**
 * Parses command line arguments.
 *
 * @param args - arguments after the script name (defaults to `process.argv.slice(2)`)
 *
 * @example
 * ```ts
 * parseCLIArgs(["run", "repo", "--no-push"]);
 * // Right({ kind: "run", options: { workdir: "repo", noPush: true, ... } })
 * parseCLIArgs(["optimize"]);
 * // Left(ConfigError("Usage: pyrefine optimize <directory_or_file_path>"))
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLICommand, ConfigError> {
	const [first, ...rest] = args;
	if (first === "help" || args.some((arg) => HELP_FLAGS.includes(arg))) {
		return Either.right({ kind: "help" });
	}
	if (first === "optimize") return parseOptimize(rest);
	if (first === "run") return parseRun(rest);
	return parseRun(args);
}

/**
 * Text printed by `pyrefine help`.
 */
export const HELP_TEXT = `pyrefine: format, optimize and commit a Python repository

Usage:
  pyrefine [run] [workdir] [options]
  pyrefine optimize <directory_or_file_path> [--mode detect|fix|all] [--config <path>]

Run options:
  --config <path>            config file (default: pyrefine.config.json in workdir)
  --python <version>         interpreter suffix, python<version> (env PYTHON_VERSION)
  --venv <dir>               virtualenv directory (env VENV_DIR)
  --optimizer <kind>         external | builtin
  --branch <name>            check out <name> first and push to it
  --remote <name>            push remote (default: origin)
  --message <msg>            commit message
  -y, --yes                  approve changes without prompting
  --approval-timeout <s>     reject when nobody answers within <s> seconds
  --skip-setup               do not create the virtualenv
  --no-push                  commit without pushing
  --report <path>            write a JSON run report
`;
