// CHANGE: Resolve an optimizer target into the list of files to process
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<readonly string[], InvalidTarget | FSError>
// INVARIANT: Results are sorted by directory walk order (entries sorted by name); skipped directories are never entered
// COMPLEXITY: O(n log n) where n = entries under the target

import { Effect } from "effect";

import { FSError, InvalidTarget } from "../../core/errors.js";
import {
	isPythonFile,
	isSelectedFile,
	shouldEnterDirectory,
} from "../../core/optimizer/select.js";
import type { BuiltinOptimizerConfig } from "../../core/types/index.js";
import { fs, path } from "../utils/node-mods.js";

type ScanSettings = Pick<BuiltinOptimizerConfig, "prefixes" | "skipDirectories">;

const fsError = (target: string) => (error: unknown) =>
	new FSError({
		detail: error instanceof Error ? error.message : String(error),
		path: target,
	});

function walk(
	root: string,
	dir: string,
	settings: ScanSettings,
): Effect.Effect<readonly string[], FSError> {
	return Effect.gen(function* () {
		const entries = yield* Effect.tryPromise({
			try: () => fs.promises.readdir(dir, { withFileTypes: true }),
			catch: fsError(dir),
		});
		const sorted = [...entries].sort((a, b) =>
			a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
		);
		const files: string[] = [];
		for (const entry of sorted) {
			const full = path.join(dir, entry.name);
			if (entry.isDirectory()) {
				const scanned = {
					name: entry.name,
					relative: path.relative(root, full),
					absolute: path.resolve(full),
				};
				if (shouldEnterDirectory(scanned, settings.skipDirectories)) {
					files.push(...(yield* walk(root, full, settings)));
				}
			} else if (entry.isFile() && isSelectedFile(entry.name, settings.prefixes)) {
				files.push(full);
			}
		}
		return files;
	});
}

/**
 * Files the optimizer processes for `target`.
 *
 * A directory is walked recursively and filtered by prefix; a `.py` file is
 * taken as is; anything else (including a missing path) is InvalidTarget.
 *
 * @pure false (filesystem)
 */
export function collectTargets(
	target: string,
	settings: ScanSettings,
): Effect.Effect<readonly string[], InvalidTarget | FSError> {
	return Effect.gen(function* () {
		const stats = yield* Effect.tryPromise({
			try: () => fs.promises.stat(target),
			catch: () => new InvalidTarget({ path: target }),
		});
		if (stats.isDirectory()) return yield* walk(target, target, settings);
		if (stats.isFile() && isPythonFile(target)) return [target];
		return yield* Effect.fail(new InvalidTarget({ path: target }));
	});
}
