// CHANGE: Typed domain error ADT for the pipeline using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

import type { StageName } from "./models.js";

/**
 * Command could not be spawned or exited non-zero where that is fatal.
 *
 * @invariant command.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly exitCode: number | null;
	readonly detail: string;
}> {}

/**
 * A stage stopped on a step with the `fail` policy.
 */
export class StageFailed extends Data.TaggedError("StageFailed")<{
	readonly stage: StageName;
	readonly step: string;
	readonly reason: string;
}> {}

/**
 * Configuration file or flag value is invalid.
 *
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Optimizer target is neither a directory nor a `.py` file.
 */
export class InvalidTarget extends Data.TaggedError("InvalidTarget")<{
	readonly path: string;
}> {}

/**
 * Python source could not be tokenized.
 *
 * @invariant line ≥ 1
 */
export class SourceSyntaxError extends Data.TaggedError("SourceSyntaxError")<{
	readonly line: number;
	readonly detail: string;
}> {}

/**
 * Approval prompt could not be shown (no input stream).
 */
export class ApprovalUnavailable extends Data.TaggedError(
	"ApprovalUnavailable",
)<{
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

export type AppError =
	| ExecError
	| StageFailed
	| ConfigError
	| InvalidTarget
	| SourceSyntaxError
	| ApprovalUnavailable
	| FSError;

/**
 * Human-readable one-line description of an application error.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeError(error: AppError): string {
	const located = (detail: string, path: string | undefined): string =>
		path === undefined ? detail : `${path}: ${detail}`;
	return match(error)
		.with({ _tag: "Exec" }, (e) =>
			e.exitCode === null
				? `${e.command}: ${e.detail}`
				: `${e.command} exited with code ${e.exitCode}`,
		)
		.with({ _tag: "StageFailed" }, (e) => `${e.stage}: ${e.step} failed (${e.reason})`)
		.with({ _tag: "ConfigError" }, (e) => located(e.detail, e.path))
		.with({ _tag: "InvalidTarget" }, (e) => `Invalid path: ${e.path}`)
		.with({ _tag: "SourceSyntaxError" }, (e) => `line ${e.line}: ${e.detail}`)
		.with({ _tag: "ApprovalUnavailable" }, (e) => e.detail)
		.with({ _tag: "FS" }, (e) => located(e.detail, e.path))
		.exhaustive();
}
