// CHANGE: Console output of a pipeline run
// PURITY: SHELL (console)
// INVARIANT: Every line goes through console.log / console.error; nothing is buffered
// COMPLEXITY: O(n) in the printed output

import { formatPorcelainEntry } from "../../core/git/porcelain.js";
import { formatSummary } from "../../core/format/summary.js";
import {
	type PorcelainEntry,
	type RunReport,
	STAGE_ORDER,
	type StageName,
	type StageOutcome,
} from "../../core/models.js";
import type { CommandResult } from "../../core/types/exec-helpers.js";

/**
 * `▶ [3/9] detect`
 */
export function printStageBanner(stage: StageName): void {
	const position = STAGE_ORDER.indexOf(stage) + 1;
	console.log(`\n▶ [${position}/${STAGE_ORDER.length}] ${stage}`);
}

export function printStageSkipped(stage: StageName): void {
	console.log(`⏭  ${stage} skipped`);
}

/**
 * Echoes a finished step: the command, then its captured output.
 */
export function printStepResult(result: CommandResult): void {
	console.log(`$ ${result.command}`);
	const stdout = result.stdout.trimEnd();
	const stderr = result.stderr.trimEnd();
	if (stdout.length > 0) console.log(stdout);
	if (stderr.length > 0) console.error(stderr);
}

export function printWarning(message: string): void {
	console.log(`⚠️  ${message}`);
}

export function printFailure(message: string): void {
	console.error(`❌ ${message}`);
}

export function printStageDone(outcome: StageOutcome): void {
	if (outcome.status === "passed") console.log(`✅ ${outcome.stage} passed`);
	if (outcome.status === "suppressed") {
		console.log(`⚠️  ${outcome.stage} finished with suppressed failures`);
	}
}

/**
 * Lists the porcelain entries the diff stage found.
 */
export function printChanges(entries: readonly PorcelainEntry[]): void {
	if (entries.length === 0) {
		console.log("✅ No changes detected");
		return;
	}
	console.log(`📝 ${entries.length} changed file(s):`);
	for (const entry of entries) {
		console.log(`   ${formatPorcelainEntry(entry)}`);
	}
}

export function printDiff(diff: string): void {
	const text = diff.trimEnd();
	if (text.length > 0) console.log(text);
}

export function printSummary(report: RunReport): void {
	for (const line of formatSummary(report)) console.log(line);
}
