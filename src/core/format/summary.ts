// CHANGE: Pure rendering of stage outcomes and the final run summary
// PURITY: CORE
// INVARIANT: Output depends only on the report; one line per stage
// COMPLEXITY: O(n) where n = |stages|

import { match } from "ts-pattern";

import type {
	RunReport,
	RunStatus,
	StageOutcome,
	StageStatus,
} from "../models.js";

/**
 * @pure true
 */
export const stageIcon = (status: StageStatus): string =>
	match(status)
		.with("passed", () => "✅")
		.with("suppressed", () => "⚠️")
		.with("failed", () => "❌")
		.with("rejected", () => "🛑")
		.with("skipped", () => "⏭")
		.exhaustive();

/**
 * @pure true
 */
export const runBanner = (status: RunStatus): string =>
	match(status)
		.with("success", () => "✅ Pipeline completed successfully")
		.with("failure", () => "❌ Pipeline failed")
		.with("aborted", () => "🛑 Pipeline aborted: changes were not approved")
		.exhaustive();

const formatDuration = (ms: number): string =>
	ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;

/**
 * One summary row, e.g. `  ✅ format      1.2s`.
 *
 * @pure true
 */
export function formatStageLine(outcome: StageOutcome): string {
	const head = `  ${stageIcon(outcome.status)} ${outcome.stage.padEnd(10)}`;
	const timing = outcome.status === "skipped" ? "" : ` ${formatDuration(outcome.durationMs)}`;
	const detail = outcome.detail === undefined ? "" : ` (${outcome.detail})`;
	return `${head}${timing}${detail}`;
}

/**
 * Lines printed by the notify stage.
 *
 * @pure true
 */
export function formatSummary(report: RunReport): readonly string[] {
	const changed =
		report.changes.length === 0
			? "No changes detected"
			: `${report.changes.length} changed file(s)`;
	return [
		"",
		"📋 Pipeline summary",
		...report.stages.map(formatStageLine),
		"",
		`   ${changed}`,
		runBanner(report.status),
	];
}
