// CHANGE: Check that the tools the pipeline shells out to are installed
// PURITY: SHELL
// EFFECT: Effect<DependencyCheckResult, never>
// INVARIANT: Every required dependency is probed exactly once, sequentially

import { Effect } from "effect";

import { pythonExecutable } from "../../core/env/virtualenv.js";
import type { CommandRunner } from "./exec.js";

/**
 * Information about one external dependency.
 */
export interface Dependency {
	readonly name: string;
	readonly command: string;
	readonly checkCommand: string;
	readonly installCommand: string;
}

const GIT: Dependency = {
	name: "Git",
	command: "git",
	checkCommand: "git --version",
	installCommand: "Visit https://git-scm.com/downloads",
};

function pythonDependency(version: string): Dependency {
	const executable = pythonExecutable(version);
	return {
		name: "Python",
		command: executable,
		checkCommand: `${executable} --version`,
		installCommand: "Visit https://www.python.org/downloads/",
	};
}

/**
 * Dependencies a run needs. Python is only probed when the setup stage
 * will create the virtualenv.
 *
 * @pure true
 */
export function requiredDependencies(options: {
	readonly pythonVersion: string;
	readonly skipSetup: boolean;
}): readonly Dependency[] {
	return options.skipSetup
		? [GIT]
		: [GIT, pythonDependency(options.pythonVersion)];
}

export interface DependencyCheckResult {
	readonly allAvailable: boolean;
	readonly missing: readonly Dependency[];
}

/**
 * Probes each dependency with its check command.
 *
 * @pure false (runs external commands)
 */
export function checkDependencies(
	runner: CommandRunner,
	cwd: string,
	dependencies: readonly Dependency[],
): Effect.Effect<DependencyCheckResult> {
	return Effect.gen(function* () {
		const missing: Dependency[] = [];
		for (const dep of dependencies) {
			const available = yield* runner.run(dep.checkCommand, { cwd }).pipe(
				Effect.map((result) => result.exitCode === 0),
				Effect.catchAll(() => Effect.succeed(false)),
			);
			if (!available) missing.push(dep);
		}
		return { allAvailable: missing.length === 0, missing };
	});
}

/**
 * Prints missing dependencies with install hints.
 */
export function reportMissingDependencies(
	missing: readonly Dependency[],
): void {
	console.error("\n❌ Missing required dependencies:\n");

	for (const dep of missing) {
		console.error(`  • ${dep.name} (${dep.command})`);
		console.error(`    Check: ${dep.checkCommand}`);
		console.error(`    Install: ${dep.installCommand}\n`);
	}

	console.error("Please install the missing dependencies and try again.\n");
}
