// CHANGE: Default pipeline configuration
// PURITY: CORE
// INVARIANT: Defaults reproduce the stock pipeline: venv → optimizer → black/autopep8/isort → git push origin main

import type {
	BuiltinOptimizerConfig,
	PipelineConfig,
} from "../types/config.js";

export const DEFAULT_CONFIG_FILE = "pyrefine.config.json";

export const DEFAULT_BUILTIN: BuiltinOptimizerConfig = {
	prefixes: ["simple", "example"],
	errorTools: [
		{ name: "pylint", command: "pylint {file_path} --output-format=text" },
		{ name: "ruff", command: "ruff check {file_path}" },
		{ name: "vulture", command: "vulture {file_path}" },
	],
	formatTools: [
		{ name: "black", command: "black {file_path}" },
		{ name: "autopep8", command: "autopep8 --in-place {file_path}" },
		{ name: "isort", command: "isort {file_path}" },
	],
	memoize: ["fib"],
	skipDirectories: [".git", "__pycache__", "node_modules", ".venv"],
};

export const DEFAULT_CONFIG: PipelineConfig = {
	pythonVersion: "3",
	venvDir: "venv",
	tools: ["black", "autopep8", "isort", "pylint", "ruff", "vulture"],
	optimizer: "external",
	optimizerCommand: "python code_optimizer.py .",
	formatters: [
		{ name: "black", command: "black ." },
		{ name: "autopep8", command: "autopep8 --in-place --recursive ." },
		{ name: "isort", command: "isort ." },
	],
	remote: "origin",
	branch: "main",
	commitMessage: "Automated code formatting and optimization",
	builtin: DEFAULT_BUILTIN,
};
