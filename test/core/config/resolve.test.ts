// CHANGE: Unit tests for config-file validation and precedence
// INVARIANT: flag > environment > file > default

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { DEFAULT_CONFIG } from "../../../src/core/config/defaults.js";
import {
	type ConfigOverrides,
	parseConfigJSON,
	resolveConfig,
} from "../../../src/core/config/resolve.js";
import type { JSONValue } from "../../../src/core/types/json.js";

const parse = (value: JSONValue): ConfigOverrides =>
	Either.getOrThrow(parseConfigJSON(value, "pyrefine.config.json"));

const problems = (value: JSONValue): string => {
	const result = parseConfigJSON(value, "pyrefine.config.json");
	if (Either.isRight(result)) throw new Error("expected a config error");
	return result.left.detail;
};

describe("parseConfigJSON", () => {
	it("accepts a complete document", (): void => {
		expect(
			parse({
				pythonVersion: 3.12,
				venvDir: ".venv",
				optimizer: "builtin",
				formatters: [{ name: "black", command: "black src" }],
				builtin: { prefixes: ["demo"], memoize: ["fib", "lucas"] },
				comment: "unknown keys are ignored",
			}),
		).toEqual({
			pythonVersion: "3.12",
			venvDir: ".venv",
			optimizer: "builtin",
			formatters: [{ name: "black", command: "black src" }],
			builtin: { prefixes: ["demo"], memoize: ["fib", "lucas"] },
		});
	});

	it("rejects a document that is not an object", (): void => {
		expect(problems([1, 2])).toBe("config must be a JSON object");
	});

	it("reports every problem at once", (): void => {
		expect(
			problems({
				venvDir: "",
				tools: "black",
				optimizer: "remote",
				builtin: { errorTools: [{ name: "pylint" }] },
			}),
		).toBe(
			[
				"venvDir must be a non-empty string",
				"tools must be an array of strings",
				"optimizer must be one of external, builtin",
				'builtin.errorTools must be an array of { "name": string, "command": string }',
			].join("; "),
		);
	});

	it("rejects a non-object builtin section", (): void => {
		expect(problems({ builtin: true })).toBe("builtin must be an object");
	});
});

describe("resolveConfig", () => {
	it("falls back to defaults and excludes the venv from scans", (): void => {
		const config = resolveConfig({}, {}, {});
		expect(config.pythonVersion).toBe("3");
		expect(config.venvDir).toBe("venv");
		expect(config.optimizerCommand).toBe("python code_optimizer.py .");
		expect(config.builtin.skipDirectories).toEqual([
			".git",
			"__pycache__",
			"node_modules",
			".venv",
			"venv",
		]);
	});

	it("excludes a venv given as a written-out path", (): void => {
		expect(resolveConfig({}, {}, { venvDir: "./venv" }).builtin.skipDirectories).toEqual([
			".git",
			"__pycache__",
			"node_modules",
			".venv",
			"venv",
		]);
		expect(resolveConfig({}, { VENV_DIR: "build/venv/" }, {}).builtin.skipDirectories.at(-1)).toBe(
			"build/venv",
		);
	});

	it("prefers environment variables over the file", (): void => {
		const config = resolveConfig(
			{ pythonVersion: "3.10", venvDir: "file-venv" },
			{ PYTHON_VERSION: " 3.12 ", VENV_DIR: "env-venv" },
			{},
		);
		expect(config.pythonVersion).toBe("3.12");
		expect(config.venvDir).toBe("env-venv");
	});

	it("ignores blank environment variables", (): void => {
		const config = resolveConfig({ venvDir: "file-venv" }, { VENV_DIR: "  " }, {});
		expect(config.venvDir).toBe("file-venv");
	});

	it("prefers flags over everything", (): void => {
		const config = resolveConfig(
			{ branch: "develop", commitMessage: "from file", optimizer: "external" },
			{ PYTHON_VERSION: "3.12" },
			{ pythonVersion: "3.9", branch: "release", message: "from flag", optimizer: "builtin" },
		);
		expect(config).toMatchObject({
			pythonVersion: "3.9",
			branch: "release",
			commitMessage: "from flag",
			optimizer: "builtin",
			remote: DEFAULT_CONFIG.remote,
		});
	});

	it("merges builtin overrides field by field", (): void => {
		const config = resolveConfig({ builtin: { memoize: ["lucas"] } }, {}, {});
		expect(config.builtin.memoize).toEqual(["lucas"]);
		expect(config.builtin.prefixes).toEqual(["simple", "example"]);
	});
});
