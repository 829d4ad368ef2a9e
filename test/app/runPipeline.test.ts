// CHANGE: Pipeline orchestration tests with an in-process runner and approver
// INVARIANT: No process is spawned and no prompt is shown

import * as fs from "node:fs";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runPipeline } from "../../src/app/runPipeline.js";
import { DEFAULT_CONFIG } from "../../src/core/config/defaults.js";
import {
	type RunReport,
	STAGE_ORDER,
	type StageName,
	type StageOutcome,
} from "../../src/core/models.js";
import type { PipelineConfig, RunOptions } from "../../src/core/types/index.js";
import type {
	ApprovalDecision,
	ApprovalRequest,
	Approver,
} from "../../src/shell/approval/prompt.js";
import { type FakeRunner, fakeRunner, type Reply } from "../utils/fakeRunner.js";
import { createTempProject, type TempProject } from "../utils/tempProject.js";

const WORKDIR = "/work/repo";
const CHANGED = { "git status --porcelain": { stdout: " M app.py\n" } };

let project: TempProject | undefined;

beforeEach(() => {
	vi.spyOn(console, "log").mockImplementation(() => undefined);
	vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
	project?.cleanup();
	project = undefined;
});

interface FakeApprover {
	readonly approver: Approver;
	readonly requests: ApprovalRequest[];
}

function fakeApprover(
	decision: ApprovalDecision = { approved: true, reason: "answered" },
): FakeApprover {
	const requests: ApprovalRequest[] = [];
	return {
		requests,
		approver: (request) => {
			requests.push(request);
			return Effect.succeed(decision);
		},
	};
}

interface Harness {
	readonly report: RunReport;
	readonly runner: FakeRunner;
	readonly approvals: FakeApprover;
}

async function run(
	replies: Readonly<Record<string, Reply>>,
	options: Partial<RunOptions> = {},
	approvals: FakeApprover = fakeApprover(),
	config: PipelineConfig = DEFAULT_CONFIG,
): Promise<Harness> {
	const runner = fakeRunner(replies);
	const report = await Effect.runPromise(
		runPipeline(
			config,
			{ workdir: WORKDIR, autoApprove: false, skipSetup: false, noPush: false, ...options },
			{
				runner,
				approver: approvals.approver,
				env: { PATH: "/usr/bin" },
				platform: "linux",
			},
		),
	);
	return { report, runner, approvals };
}

const stage = (report: RunReport, name: StageName): StageOutcome | undefined =>
	report.stages.find((s) => s.stage === name);

const statuses = (report: RunReport): Record<string, string> =>
	Object.fromEntries(report.stages.map((s) => [s.stage, s.status]));

describe("runPipeline: ordering", () => {
	it("runs every stage in order when the tree changed", async () => {
		const { report, runner, approvals } = await run(CHANGED);

		expect(report.stages.map((s) => s.stage)).toEqual([...STAGE_ORDER]);
		expect(report.status).toBe("success");
		expect(report.changes).toEqual([{ index: " ", worktree: "M", path: "app.py" }]);
		expect(approvals.requests).toEqual([
			{ question: "Apply and push these changes? [y/N]" },
		]);
		expect(runner.commands()).toEqual([
			"git rev-parse --is-inside-work-tree",
			"python3 -m venv venv",
			"python -m pip install --upgrade pip",
			"python -m pip install black autopep8 isort pylint ruff vulture",
			"python code_optimizer.py .",
			"black .",
			"autopep8 --in-place --recursive .",
			"isort .",
			"python code_optimizer.py .",
			"git status --porcelain",
			"git --no-pager diff",
			"git add .",
			"git commit -m 'Automated code formatting and optimization'",
			"git push origin main",
		]);
		expect(runner.calls.every((call) => call.cwd === WORKDIR)).toBe(true);
	});

	it("activates the virtualenv after creating it", async () => {
		const { runner } = await run({});
		const [checkout, create, pip] = runner.calls;
		expect(checkout?.env).toEqual({ PATH: "/usr/bin" });
		expect(create?.env).toEqual({ PATH: "/usr/bin" });
		expect(pip?.env).toEqual({
			PATH: "/work/repo/venv/bin:/usr/bin",
			VIRTUAL_ENV: "/work/repo/venv",
		});
		expect(runner.calls.at(-1)?.env).toEqual(pip?.env);
	});
});

describe("runPipeline: guards", () => {
	it("skips approval and commit when nothing changed", async () => {
		const { report, runner, approvals } = await run({});
		expect(statuses(report)).toMatchObject({
			diff: "passed",
			approve: "skipped",
			commit: "skipped",
			notify: "passed",
		});
		expect(stage(report, "diff")?.detail).toBe("no changes");
		expect(approvals.requests).toEqual([]);
		expect(runner.commands()).not.toContain("git add .");
		expect(report.status).toBe("success");
	});

	it("approves without asking when autoApprove is set", async () => {
		const { report, approvals } = await run(CHANGED, { autoApprove: true });
		expect(approvals.requests).toEqual([]);
		expect(stage(report, "approve")?.detail).toBe("auto-approved");
		expect(stage(report, "commit")?.status).toBe("passed");
	});

	it("aborts before commit when the changes are rejected", async () => {
		const { report, runner } = await run(
			CHANGED,
			{},
			fakeApprover({ approved: false, reason: "answered" }),
		);
		expect(stage(report, "approve")).toMatchObject({
			status: "rejected",
			detail: "not approved",
		});
		expect(stage(report, "commit")?.status).toBe("skipped");
		expect(runner.commands()).not.toContain("git add .");
		expect(report.status).toBe("aborted");
	});

	it("passes the timeout to the approver and reports it on expiry", async () => {
		const { report, approvals } = await run(
			CHANGED,
			{ approvalTimeoutSeconds: 30 },
			fakeApprover({ approved: false, reason: "timeout" }),
		);
		expect(approvals.requests).toEqual([
			{ question: "Apply and push these changes? [y/N]", timeoutSeconds: 30 },
		]);
		expect(stage(report, "approve")?.detail).toBe("no answer within 30s");
		expect(report.status).toBe("aborted");
	});

	it("honours skipSetup, noPush and an explicit branch", async () => {
		const { report, runner } = await run(CHANGED, {
			skipSetup: true,
			noPush: true,
			branch: "release",
		});
		expect(stage(report, "setup")?.status).toBe("skipped");
		expect(runner.commands().slice(0, 3)).toEqual([
			"git rev-parse --is-inside-work-tree",
			"git checkout release",
			"python code_optimizer.py .",
		]);
		expect(runner.commands().at(-1)).toBe(
			"git commit -m 'Automated code formatting and optimization'",
		);
		expect(runner.calls.every((call) => call.env?.["VIRTUAL_ENV"] === undefined)).toBe(
			true,
		);
	});

	it("pushes to the configured remote and branch", async () => {
		const { runner } = await run(
			CHANGED,
			{},
			fakeApprover(),
			{ ...DEFAULT_CONFIG, remote: "upstream", branch: "trunk" },
		);
		expect(runner.commands().at(-1)).toBe("git push upstream trunk");
	});
});

describe("runPipeline: failure policies", () => {
	it("keeps going when a formatter fails", async () => {
		const { report, runner } = await run({ ...CHANGED, "isort .": { exitCode: 1 } });
		expect(stage(report, "format")).toMatchObject({
			status: "suppressed",
			detail: "isort formatting failed",
		});
		expect(runner.commands()).toContain("git push origin main");
		expect(report.status).toBe("success");
	});

	it("suppresses pip failures during setup", async () => {
		const { report } = await run({ "python -m pip install": { exitCode: 1 } });
		expect(stage(report, "setup")).toMatchObject({
			status: "suppressed",
			detail: "pip upgrade failed; tool installation failed",
		});
	});

	it("fails setup when the virtualenv cannot be created", async () => {
		const { report, runner } = await run({ "python3 -m venv": { exitCode: 1 } });
		expect(stage(report, "setup")).toMatchObject({
			status: "failed",
			detail: "setup: create virtualenv failed (exit code 1)",
		});
		expect(runner.commands()).toEqual([
			"git rev-parse --is-inside-work-tree",
			"python3 -m venv venv",
		]);
	});

	it("stops after a failing optimizer pass and still notifies", async () => {
		const { report, runner } = await run({
			...CHANGED,
			"python code_optimizer.py": { exitCode: 2 },
		});
		expect(statuses(report)).toEqual({
			checkout: "passed",
			setup: "passed",
			detect: "failed",
			format: "skipped",
			fix: "skipped",
			diff: "skipped",
			approve: "skipped",
			commit: "skipped",
			notify: "passed",
		});
		expect(stage(report, "detect")?.detail).toBe(
			"detect: detect issues failed (exit code 2)",
		);
		expect(runner.commands().at(-1)).toBe("python code_optimizer.py .");
		expect(report.status).toBe("failure");
	});

	it("fails checkout when git cannot be spawned", async () => {
		const { report } = await run({
			"git rev-parse": { spawnError: "git: command not found" },
		});
		expect(stage(report, "checkout")?.detail).toBe(
			"checkout: verify working tree failed (git rev-parse --is-inside-work-tree: git: command not found)",
		);
		expect(report.status).toBe("failure");
	});

	it("fails the diff stage when git status fails", async () => {
		const { report } = await run({ "git status --porcelain": { exitCode: 128 } });
		expect(stage(report, "diff")).toMatchObject({
			status: "failed",
			detail: "git status --porcelain exited with code 128",
		});
		expect(stage(report, "approve")?.status).toBe("skipped");
	});

	it("fails the commit stage on a rejected push", async () => {
		const { report } = await run({ ...CHANGED, "git push": { exitCode: 1 } });
		expect(stage(report, "commit")?.detail).toBe(
			"commit: push origin/main failed (exit code 1)",
		);
		expect(report.status).toBe("failure");
	});
});

describe("runPipeline: notify", () => {
	it("writes the JSON report", async () => {
		project = createTempProject();
		const reportPath = project.file("reports/run.json");
		const { report } = await run({}, { reportPath });
		const written: unknown = JSON.parse(fs.readFileSync(reportPath, "utf8"));
		expect(written).toEqual(report);
		expect(stage(report, "notify")?.detail).toBe(`report: ${reportPath}`);
	});

	it("suppresses notify when the report cannot be written", async () => {
		project = createTempProject({ "taken/file.txt": "" });
		const { report } = await run({}, { reportPath: project.file("taken") });
		expect(stage(report, "notify")?.status).toBe("suppressed");
		expect(report.status).toBe("success");
	});
});

describe("runPipeline: built-in optimizer", () => {
	it("optimizes the workdir in place of the external command", async () => {
		project = createTempProject({ "simple_dedupe.py": "xs = list(set([2, 2]))\n" });
		const runner = fakeRunner();
		const report = await Effect.runPromise(
			runPipeline(
				{ ...DEFAULT_CONFIG, optimizer: "builtin" },
				{ workdir: project.cwd, autoApprove: true, skipSetup: true, noPush: true },
				{ runner, approver: fakeApprover().approver, env: {}, platform: "linux" },
			),
		);
		expect(stage(report, "detect")?.detail).toBe("1 file(s), 0 rewritten, 0 failed");
		expect(stage(report, "fix")?.detail).toBe("1 file(s), 1 rewritten, 0 failed");
		expect(project.read("simple_dedupe.py")).toBe("xs = set([2, 2])\n");
		expect(runner.commands()).not.toContain("python code_optimizer.py .");
	});
});
