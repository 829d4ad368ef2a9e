// CHANGE: CLI commands as Effects returning an ExitCode
// PURITY: APP (no process.exit; only composition)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every AppError is printed once and mapped to exit code 1
// COMPLEXITY: O(1) orchestration

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import { computeExitCode } from "../core/decision.js";
import type { Environment } from "../core/env/virtualenv.js";
import { ConfigError, describeError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import type {
	CLICommand,
	OptimizeOptions,
	RunOptions,
} from "../core/types/index.js";
import { type Approver, autoApprover } from "../shell/approval/prompt.js";
import { HELP_TEXT, loadPipelineConfig } from "../shell/config/index.js";
import type { CommandRunner } from "../shell/utils/exec.js";
import {
	checkDependencies,
	reportMissingDependencies,
	requiredDependencies,
} from "../shell/utils/dependencies.js";
import { fs, path } from "../shell/utils/node-mods.js";
import { describeOptimizerSummary, runOptimizer } from "./runOptimizer.js";
import { runPipeline } from "./runPipeline.js";

export interface CommandServices {
	readonly runner: CommandRunner;
	readonly approver: Approver;
	readonly env: Environment;
	readonly platform: NodeJS.Platform;
	readonly cwd: string;
}

const isDirectory = (dir: string): boolean =>
	fs.statSync(dir, { throwIfNoEntry: false })?.isDirectory() ?? false;

/**
 * Ensure git (and Python when setup runs) are reachable.
 *
 * @pure false (executes checks, console output)
 */
function haveCliDependencies(
	services: CommandServices,
	pythonVersion: string,
	skipSetup: boolean,
): Effect.Effect<boolean> {
	return Effect.gen(function* () {
		const check = yield* checkDependencies(
			services.runner,
			services.cwd,
			requiredDependencies({ pythonVersion, skipSetup }),
		);
		if (!check.allAvailable) {
			reportMissingDependencies(check.missing);
			return false;
		}
		return true;
	});
}

/**
 * `pyrefine run`: load configuration, preflight, run the stages.
 *
 * @pure false (coordinates effects)
 * @postcondition report.status = "success" ↔ result = 0
 */
export function runPipelineCommand(
	options: RunOptions,
	services: CommandServices,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const workdir = path.resolve(services.cwd, options.workdir);
		if (!isDirectory(workdir)) {
			const missing = new ConfigError({ detail: "working directory not found", path: workdir });
			console.error(`❌ ${describeError(missing)}`);
			return 1;
		}
		const loaded = loadPipelineConfig(
			workdir,
			options.configPath === undefined
				? undefined
				: path.resolve(services.cwd, options.configPath),
			services.env,
			options,
		);
		if (Either.isLeft(loaded)) {
			console.error(`❌ ${describeError(loaded.left)}`);
			return 1;
		}
		const config = loaded.right;

		const depsOk = yield* haveCliDependencies(
			services,
			config.pythonVersion,
			options.skipSetup,
		);
		if (!depsOk) return 1;

		console.log(`🚀 Running pipeline in ${workdir}`);
		const report = yield* runPipeline(
			config,
			{ ...options, workdir },
			{
				runner: services.runner,
				approver: options.autoApprove ? autoApprover : services.approver,
				env: services.env,
				platform: services.platform,
			},
		);
		return computeExitCode(report);
	});
}

/**
 * `pyrefine optimize <path>`: the built-in optimizer on its own.
 *
 * Files that fail to optimize are reported but do not change the exit code;
 * an invalid target or configuration exits 1.
 *
 * @pure false (coordinates effects)
 */
export function runOptimizeCommand(
	options: OptimizeOptions,
	services: CommandServices,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const loaded = loadPipelineConfig(
			services.cwd,
			options.configPath === undefined
				? undefined
				: path.resolve(services.cwd, options.configPath),
			services.env,
			{},
		);
		if (Either.isLeft(loaded)) {
			console.error(`❌ ${describeError(loaded.left)}`);
			return 1;
		}

		const target = path.resolve(services.cwd, options.target);
		return yield* runOptimizer(target, loaded.right.builtin, options.mode, {
			runner: services.runner,
			cwd: services.cwd,
			env: services.env,
		}).pipe(
			Effect.map((summary): ExitCode => {
				console.log(`\n✅ Optimization finished: ${describeOptimizerSummary(summary)}`);
				return 0;
			}),
			Effect.catchAll((error) => {
				console.error(`❌ ${describeError(error)}`);
				return Effect.succeed<ExitCode>(1);
			}),
		);
	});
}

/**
 * Dispatches a parsed command.
 *
 * @pure false (coordinates effects)
 */
export function runCommand(
	command: CLICommand,
	services: CommandServices,
): Effect.Effect<ExitCode> {
	return match(command)
		.with({ kind: "run" }, ({ options }) => runPipelineCommand(options, services))
		.with({ kind: "optimize" }, ({ options }) =>
			runOptimizeCommand(options, services),
		)
		.with({ kind: "help" }, () =>
			Effect.sync((): ExitCode => {
				console.log(HELP_TEXT);
				return 0;
			}),
		)
		.exhaustive();
}
