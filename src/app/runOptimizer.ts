// CHANGE: Built-in optimizer driver (scan → detect → format → rewrite, one file at a time)
// PURITY: APP (composes CORE rewrite rules with SHELL commands and files)
// EFFECT: Effect<OptimizerSummary, InvalidTarget | FSError>
// INVARIANT: A tool's non-zero exit and a file that fails to lex are reported and counted, never fatal
// COMPLEXITY: O(f · (t + n)) where f = files, t = tools, n = file size

import { Effect } from "effect";
import { match } from "ts-pattern";

import { fillTemplate } from "../core/command/quote.js";
import type { Environment } from "../core/env/virtualenv.js";
import {
	type AppError,
	describeError,
	FSError,
	type InvalidTarget,
} from "../core/errors.js";
import { rewriteSource } from "../core/optimizer/rewrite.js";
import { decodeSource, encodeSource } from "../core/optimizer/source-text.js";
import type {
	BuiltinOptimizerConfig,
	OptimizerMode,
	ToolCommand,
} from "../core/types/index.js";
import { collectTargets } from "../shell/optimizer/scan.js";
import type { CommandRunner } from "../shell/utils/exec.js";
import { fs } from "../shell/utils/node-mods.js";

export interface OptimizerServices {
	readonly runner: CommandRunner;
	readonly cwd: string;
	readonly env?: Environment;
}

/**
 * Counters of one optimizer run.
 *
 * @invariant rewritten + failed ≤ files
 */
export interface OptimizerSummary {
	readonly files: number;
	readonly rewritten: number;
	readonly failed: number;
	readonly toolFailures: number;
}

type FileOutcome = "unchanged" | "rewritten" | "failed";

const runsDetect = (mode: OptimizerMode): boolean => mode !== "fix";
const runsFix = (mode: OptimizerMode): boolean => mode !== "detect";

function printSection(title: string, text: string): void {
	const body = text.trimEnd();
	if (body.length === 0) return;
	console.log(`${title}:`);
	console.log(body);
}

/**
 * Runs one tool on one file and prints what it wrote.
 *
 * @returns true when the tool exited 0
 */
function runTool(
	tool: ToolCommand,
	file: string,
	services: OptimizerServices,
): Effect.Effect<boolean> {
	const command = fillTemplate(tool.command, { file_path: file });
	const options =
		services.env === undefined
			? { cwd: services.cwd }
			: { cwd: services.cwd, env: services.env };
	return services.runner.run(command, options).pipe(
		Effect.map((result) => {
			printSection(`${tool.name} Output`, result.stdout);
			printSection(`${tool.name} Errors`, result.stderr);
			if (result.exitCode !== 0) {
				console.log(`⚠️  ${tool.name} exited with code ${result.exitCode}`);
			}
			return result.exitCode === 0;
		}),
		Effect.catchAll((error) => {
			console.error(`❌ ${tool.name}: ${describeError(error)}`);
			return Effect.succeed(false);
		}),
	);
}

function runTools(
	tools: readonly ToolCommand[],
	file: string,
	services: OptimizerServices,
): Effect.Effect<number> {
	return Effect.gen(function* () {
		let failures = 0;
		for (const tool of tools) {
			const ok = yield* runTool(tool, file, services);
			if (!ok) failures += 1;
		}
		return failures;
	});
}

const toFSError = (file: string) => (error: unknown) =>
	new FSError({
		detail: error instanceof Error ? error.message : String(error),
		path: file,
	});

/**
 * Applies the rewrite rules to one file and writes it back when it changed.
 *
 * @pure false (reads and writes the file)
 */
export function rewriteFile(
	file: string,
	memoize: readonly string[],
): Effect.Effect<FileOutcome> {
	return Effect.gen(function* () {
		const bytes = yield* Effect.tryPromise({
			try: () => fs.promises.readFile(file),
			catch: toFSError(file),
		});
		const source = yield* decodeSource(bytes);
		const result = yield* rewriteSource(source.text, { memoize });
		if (!result.changed) return "unchanged" as const;
		const output = encodeSource({ ...source, text: result.source });
		yield* Effect.tryPromise({
			try: () => fs.promises.writeFile(file, output),
			catch: toFSError(file),
		});
		for (const hit of result.hits) {
			console.log(`  ✏️  line ${hit.line}: ${hit.detail}`);
		}
		return "rewritten" as const;
	}).pipe(
		Effect.catchAll((error: AppError) => {
			console.error(
				`❌ Failed to optimize file ${file}: ${describeError(error)}`,
			);
			return Effect.succeed<FileOutcome>("failed");
		}),
	);
}

/**
 * Runs the built-in optimizer over a directory or a single `.py` file.
 *
 * - `detect`: error tools only
 * - `fix`: format tools, then rewrite rules
 * - `all`: both
 *
 * @example
 * ```ts
 * const summary = yield* runOptimizer("src", DEFAULT_BUILTIN, "all", {
 *   runner: nodeCommandRunner,
 *   cwd: process.cwd(),
 * });
 * ```
 */
export function runOptimizer(
	target: string,
	config: BuiltinOptimizerConfig,
	mode: OptimizerMode,
	services: OptimizerServices,
): Effect.Effect<OptimizerSummary, InvalidTarget | FSError> {
	return Effect.gen(function* () {
		const files = yield* collectTargets(target, config);
		let rewritten = 0;
		let failed = 0;
		let toolFailures = 0;

		for (const file of files) {
			console.log(`\nProcessing: ${file}`);
			if (runsDetect(mode)) {
				toolFailures += yield* runTools(config.errorTools, file, services);
			}
			if (runsFix(mode)) {
				toolFailures += yield* runTools(config.formatTools, file, services);
				const outcome = yield* rewriteFile(file, config.memoize);
				match(outcome)
					.with("rewritten", () => {
						rewritten += 1;
					})
					.with("failed", () => {
						failed += 1;
					})
					.with("unchanged", () => undefined)
					.exhaustive();
			}
		}

		return { files: files.length, rewritten, failed, toolFailures };
	});
}

/**
 * `3 file(s), 1 rewritten, 0 failed`
 *
 * @pure true
 */
export const describeOptimizerSummary = (summary: OptimizerSummary): string =>
	`${summary.files} file(s), ${summary.rewritten} rewritten, ${summary.failed} failed`;
