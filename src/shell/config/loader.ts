// CHANGE: Read pyrefine.config.json and resolve the effective pipeline configuration
// PURITY: SHELL (reads the filesystem)
// INVARIANT: A missing default file means "no overrides"; an explicit or present-but-invalid file is a ConfigError
// COMPLEXITY: O(n) where n = config file size

import { Either, pipe } from "effect";

import { DEFAULT_CONFIG_FILE } from "../../core/config/defaults.js";
import {
	type ConfigOverrides,
	type FlagOverrides,
	parseConfigJSON,
	resolveConfig,
} from "../../core/config/resolve.js";
import type { Environment } from "../../core/env/virtualenv.js";
import { ConfigError } from "../../core/errors.js";
import type { PipelineConfig } from "../../core/types/index.js";
import type { JSONValue } from "../../core/types/json.js";
import { fs, path } from "../utils/node-mods.js";

const describeUnknown = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

function readJSONFile(file: string): Either.Either<JSONValue, ConfigError> {
	return Either.try({
		try: (): JSONValue => JSON.parse(fs.readFileSync(file, "utf8")),
		catch: (error) =>
			new ConfigError({
				detail:
					error instanceof SyntaxError
						? `invalid JSON: ${error.message}`
						: describeUnknown(error),
				path: file,
			}),
	});
}

/**
 * Loads config-file overrides.
 *
 * @param workdir - directory searched for `pyrefine.config.json`
 * @param configPath - explicit file; must exist
 *
 * @pure false (reads files)
 */
export function loadConfigOverrides(
	workdir: string,
	configPath?: string,
): Either.Either<ConfigOverrides, ConfigError> {
	if (configPath === undefined) {
		const file = path.join(workdir, DEFAULT_CONFIG_FILE);
		if (!fs.existsSync(file)) return Either.right({});
		return Either.flatMap(readJSONFile(file), (json) =>
			parseConfigJSON(json, file),
		);
	}
	const file = path.resolve(configPath);
	if (!fs.existsSync(file)) {
		return Either.left(
			new ConfigError({ detail: "config file not found", path: file }),
		);
	}
	return Either.flatMap(readJSONFile(file), (json) =>
		parseConfigJSON(json, file),
	);
}

/**
 * Resolves the configuration a run uses: flags > env > file > defaults.
 *
 * @pure false (reads files)
 */
export function loadPipelineConfig(
	workdir: string,
	configPath: string | undefined,
	env: Environment,
	flags: FlagOverrides,
): Either.Either<PipelineConfig, ConfigError> {
	return pipe(
		loadConfigOverrides(workdir, configPath),
		Either.map((file) => resolveConfig(file, env, flags)),
	);
}
