// CHANGE: Persist the run report as JSON
// PURITY: SHELL (writes a file)
// EFFECT: Effect<string, FSError>
// INVARIANT: The file holds exactly one RunReport, pretty-printed, newline-terminated

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import type { RunReport } from "../../core/models.js";
import { fs, path } from "../utils/node-mods.js";

/**
 * Writes `report` to `file`, creating parent directories.
 *
 * @returns the absolute path written
 * @pure false (filesystem)
 */
export function writeReport(
	file: string,
	report: RunReport,
): Effect.Effect<string, FSError> {
	const target = path.resolve(file);
	return Effect.tryPromise({
		try: async () => {
			await fs.promises.mkdir(path.dirname(target), { recursive: true });
			await fs.promises.writeFile(
				target,
				`${JSON.stringify(report, null, 2)}\n`,
				"utf8",
			);
			return target;
		},
		catch: (error) =>
			new FSError({
				detail: error instanceof Error ? error.message : String(error),
				path: target,
			}),
	});
}
