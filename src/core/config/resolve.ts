// CHANGE: Validate config-file JSON and layer CLI flags > environment > file > defaults
// FORMAT THEOREM: ∀k: resolve(file, env, flags)[k] = first defined of (flags[k], env[k], file[k], DEFAULT[k])
// PURITY: CORE
// INVARIANT: Every problem in the file is reported at once; no partial config escapes a Left
// COMPLEXITY: O(n) where n = size of the JSON document

import { Either } from "effect";

import type { Environment } from "../env/virtualenv.js";
import { ConfigError } from "../errors.js";
import type {
	BuiltinOptimizerConfig,
	OptimizerKind,
	PipelineConfig,
	RunOptions,
	ToolCommand,
} from "../types/config.js";
import type { JSONObject, JSONValue } from "../types/json.js";
import { isJSONArray, isJSONObject } from "../types/json.js";
import { normalizeDirectory } from "../optimizer/select.js";
import { DEFAULT_BUILTIN, DEFAULT_CONFIG } from "./defaults.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export type BuiltinOverrides = {
	readonly [K in keyof BuiltinOptimizerConfig]?: BuiltinOptimizerConfig[K];
};

export type ConfigOverrides = {
	readonly [K in Exclude<keyof PipelineConfig, "builtin">]?: PipelineConfig[K];
} & { readonly builtin?: BuiltinOverrides };

export type FlagOverrides = Pick<
	RunOptions,
	"pythonVersion" | "venvDir" | "optimizer" | "branch" | "remote" | "message"
>;

const STRING_FIELDS = [
	"venvDir",
	"optimizerCommand",
	"remote",
	"branch",
	"commitMessage",
] as const;

const OPTIMIZER_KINDS: readonly OptimizerKind[] = ["external", "builtin"];

function readString(
	obj: JSONObject,
	key: string,
	problems: string[],
	where: string,
): string | undefined {
	const value = obj[key];
	if (value === undefined) return undefined;
	if (typeof value === "string" && value.trim().length > 0) return value;
	problems.push(`${where}${key} must be a non-empty string`);
	return undefined;
}

function readStringList(
	obj: JSONObject,
	key: string,
	problems: string[],
	where: string,
): readonly string[] | undefined {
	const value = obj[key];
	if (value === undefined) return undefined;
	if (isJSONArray(value) && value.every((v) => typeof v === "string")) {
		return value.filter((v): v is string => typeof v === "string");
	}
	problems.push(`${where}${key} must be an array of strings`);
	return undefined;
}

function toToolCommand(value: JSONValue): ToolCommand | null {
	if (!isJSONObject(value)) return null;
	const { name, command } = value;
	if (typeof name !== "string" || typeof command !== "string") return null;
	if (name.length === 0 || command.trim().length === 0) return null;
	return { name, command };
}

function readToolList(
	obj: JSONObject,
	key: string,
	problems: string[],
	where: string,
): readonly ToolCommand[] | undefined {
	const value = obj[key];
	if (value === undefined) return undefined;
	if (isJSONArray(value)) {
		const tools = value.map(toToolCommand);
		if (tools.every((t) => t !== null)) {
			return tools.filter((t): t is ToolCommand => t !== null);
		}
	}
	problems.push(
		`${where}${key} must be an array of { "name": string, "command": string }`,
	);
	return undefined;
}

function readPythonVersion(
	obj: JSONObject,
	problems: string[],
): string | undefined {
	const value = obj["pythonVersion"];
	if (typeof value === "number") return String(value);
	return readString(obj, "pythonVersion", problems, "");
}

function readOptimizerKind(
	obj: JSONObject,
	problems: string[],
): OptimizerKind | undefined {
	const value = obj["optimizer"];
	if (value === undefined) return undefined;
	const kind = OPTIMIZER_KINDS.find((k) => k === value);
	if (kind === undefined) {
		problems.push(`optimizer must be one of ${OPTIMIZER_KINDS.join(", ")}`);
	}
	return kind;
}

function readBuiltin(
	value: JSONValue | undefined,
	problems: string[],
): BuiltinOverrides | undefined {
	if (value === undefined) return undefined;
	if (!isJSONObject(value)) {
		problems.push("builtin must be an object");
		return undefined;
	}
	const out: Mutable<BuiltinOverrides> = {};
	const where = "builtin.";
	const prefixes = readStringList(value, "prefixes", problems, where);
	if (prefixes !== undefined) out.prefixes = prefixes;
	const memoize = readStringList(value, "memoize", problems, where);
	if (memoize !== undefined) out.memoize = memoize;
	const skip = readStringList(value, "skipDirectories", problems, where);
	if (skip !== undefined) out.skipDirectories = skip;
	const errorTools = readToolList(value, "errorTools", problems, where);
	if (errorTools !== undefined) out.errorTools = errorTools;
	const formatTools = readToolList(value, "formatTools", problems, where);
	if (formatTools !== undefined) out.formatTools = formatTools;
	return out;
}

/**
 * Validates a parsed `pyrefine.config.json`.
 *
 * Unknown keys are ignored; a known key with the wrong shape is an error.
 *
 * @param value - parsed JSON document
 * @param source - file path used in the error
 *
 * @pure true
 */
export function parseConfigJSON(
	value: JSONValue,
	source: string,
): Either.Either<ConfigOverrides, ConfigError> {
	if (!isJSONObject(value)) {
		return Either.left(
			new ConfigError({ detail: "config must be a JSON object", path: source }),
		);
	}
	const problems: string[] = [];
	const out: Mutable<ConfigOverrides> = {};

	const pythonVersion = readPythonVersion(value, problems);
	if (pythonVersion !== undefined) out.pythonVersion = pythonVersion;
	for (const key of STRING_FIELDS) {
		const field = readString(value, key, problems, "");
		if (field !== undefined) out[key] = field;
	}
	const tools = readStringList(value, "tools", problems, "");
	if (tools !== undefined) out.tools = tools;
	const optimizer = readOptimizerKind(value, problems);
	if (optimizer !== undefined) out.optimizer = optimizer;
	const formatters = readToolList(value, "formatters", problems, "");
	if (formatters !== undefined) out.formatters = formatters;
	const builtin = readBuiltin(value["builtin"], problems);
	if (builtin !== undefined) out.builtin = builtin;

	if (problems.length > 0) {
		return Either.left(
			new ConfigError({ detail: problems.join("; "), path: source }),
		);
	}
	return Either.right(out);
}

const nonEmpty = (value: string | undefined): string | undefined =>
	value === undefined || value.trim().length === 0 ? undefined : value.trim();

/**
 * Layers flags over `PYTHON_VERSION`/`VENV_DIR` over the file over defaults.
 * The venv directory is always excluded from the built-in optimizer scan.
 *
 * @pure true
 */
export function resolveConfig(
	file: ConfigOverrides,
	env: Environment,
	flags: FlagOverrides,
): PipelineConfig {
	const venvDir =
		flags.venvDir ??
		nonEmpty(env["VENV_DIR"]) ??
		file.venvDir ??
		DEFAULT_CONFIG.venvDir;
	const builtin: BuiltinOptimizerConfig = { ...DEFAULT_BUILTIN, ...file.builtin };
	const venvSkip = normalizeDirectory(venvDir);
	return {
		pythonVersion:
			flags.pythonVersion ??
			nonEmpty(env["PYTHON_VERSION"]) ??
			file.pythonVersion ??
			DEFAULT_CONFIG.pythonVersion,
		venvDir,
		tools: file.tools ?? DEFAULT_CONFIG.tools,
		optimizer: flags.optimizer ?? file.optimizer ?? DEFAULT_CONFIG.optimizer,
		optimizerCommand: file.optimizerCommand ?? DEFAULT_CONFIG.optimizerCommand,
		formatters: file.formatters ?? DEFAULT_CONFIG.formatters,
		remote: flags.remote ?? file.remote ?? DEFAULT_CONFIG.remote,
		branch: flags.branch ?? file.branch ?? DEFAULT_CONFIG.branch,
		commitMessage:
			flags.message ?? file.commitMessage ?? DEFAULT_CONFIG.commitMessage,
		builtin: {
			...builtin,
			skipDirectories: builtin.skipDirectories.includes(venvSkip)
				? builtin.skipDirectories
				: [...builtin.skipDirectories, venvSkip],
		},
	};
}
