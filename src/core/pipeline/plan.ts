// CHANGE: Fixed stage order, conditional guards and step lists per stage
// FORMAT THEOREM: ∀s ∈ {approve, commit}: planStage(s, st) = "run" → st.hasChanges = true
// PURITY: CORE
// INVARIANT: notify is always planned; nothing else runs after a blocking outcome
// COMPLEXITY: O(1) per stage, O(k) per step list

import { shellQuote } from "../command/quote.js";
import { pythonExecutable } from "../env/virtualenv.js";
import type { StageName, StepSpec } from "../models.js";
import type { PipelineConfig, ToolCommand } from "../types/config.js";

export type StageDecision = "run" | "skip";

/**
 * Facts the guards depend on.
 *
 * @property blocked A previous stage failed or was rejected
 * @property hasChanges Porcelain status was non-empty; null before the diff stage ran
 */
export interface PlanState {
	readonly blocked: boolean;
	readonly hasChanges: boolean | null;
	readonly skipSetup: boolean;
}

/**
 * Decides whether a stage runs.
 *
 * @pure true
 * @invariant planStage("notify", _) = "run"
 */
export function planStage(stage: StageName, state: PlanState): StageDecision {
	if (stage === "notify") return "run";
	if (state.blocked) return "skip";
	if (stage === "setup" && state.skipSetup) return "skip";
	if (stage === "approve" || stage === "commit") {
		return state.hasChanges === true ? "run" : "skip";
	}
	return "run";
}

/**
 * `git rev-parse` proves the workdir is a checkout; an explicit branch is checked out.
 *
 * @pure true
 */
export function checkoutSteps(branch: string | undefined): readonly StepSpec[] {
	const verify: StepSpec = {
		label: "verify working tree",
		command: "git rev-parse --is-inside-work-tree",
		onFailure: "fail",
	};
	if (branch === undefined) return [verify];
	return [
		verify,
		{
			label: `checkout ${branch}`,
			command: `git checkout ${shellQuote(branch)}`,
			onFailure: "fail",
		},
	];
}

/**
 * Venv creation is fatal; pip upgrades and tool installs only warn.
 * The pip steps run after activation, so `python` is the venv interpreter.
 *
 * @pure true
 */
export function setupSteps(config: PipelineConfig): readonly StepSpec[] {
	const steps: StepSpec[] = [
		{
			label: "create virtualenv",
			command: `${pythonExecutable(config.pythonVersion)} -m venv ${shellQuote(config.venvDir)}`,
			onFailure: "fail",
		},
		{
			label: "upgrade pip",
			command: "python -m pip install --upgrade pip",
			onFailure: "warn",
			warning: "pip upgrade failed",
		},
	];
	if (config.tools.length > 0) {
		steps.push({
			label: "install tools",
			command: `python -m pip install ${config.tools.map(shellQuote).join(" ")}`,
			onFailure: "warn",
			warning: "tool installation failed",
		});
	}
	return steps;
}

/**
 * External optimizer invocation for either pass.
 *
 * @pure true
 */
export function optimizerStep(
	config: PipelineConfig,
	pass: "detect" | "fix",
): StepSpec {
	return {
		label: pass === "detect" ? "detect issues" : "apply fixes",
		command: config.optimizerCommand,
		onFailure: "fail",
	};
}

function formatterStep(tool: ToolCommand): StepSpec {
	return {
		label: tool.name,
		command: tool.command,
		onFailure: "warn",
		warning: `${tool.name} formatting failed`,
	};
}

/**
 * Every formatter warns on failure, mirroring `black . || echo "..."`.
 *
 * @pure true
 */
export function formatSteps(config: PipelineConfig): readonly StepSpec[] {
	return config.formatters.map(formatterStep);
}

/**
 * `git add .`, `git commit -m`, and `git push` unless pushing is disabled.
 *
 * @pure true
 */
export function commitSteps(
	config: PipelineConfig,
	push: boolean,
): readonly StepSpec[] {
	const steps: StepSpec[] = [
		{ label: "stage changes", command: "git add .", onFailure: "fail" },
		{
			label: "commit",
			command: `git commit -m ${shellQuote(config.commitMessage)}`,
			onFailure: "fail",
		},
	];
	if (push) {
		steps.push({
			label: `push ${config.remote}/${config.branch}`,
			command: `git push ${shellQuote(config.remote)} ${shellQuote(config.branch)}`,
			onFailure: "fail",
		});
	}
	return steps;
}
