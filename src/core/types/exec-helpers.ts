// CHANGE: Recover stdout/stderr/exit code from a rejected child_process.exec promise
// PURITY: CORE
// INVARIANT: Never throws; absent fields become "" / null
// COMPLEXITY: O(1)

/**
 * Captured result of one shell command.
 *
 * @invariant exitCode === 0 ↔ the command succeeded
 */
export interface CommandResult {
	readonly command: string;
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Fields recoverable from an exec failure.
 */
export interface ExecFailureOutput {
	readonly exitCode: number | null;
	readonly stdout: string;
	readonly stderr: string;
}

function stringField(value: object, key: "stdout" | "stderr"): string {
	if (!(key in value)) return "";
	const field: unknown = Reflect.get(value, key);
	if (typeof field === "string") return field;
	return Buffer.isBuffer(field) ? field.toString("utf8") : "";
}

/**
 * Extracts output of a failed `exec`. Node sets `code` to the exit status
 * for a process that ran, and to a string (`ENOENT`, …) when spawn failed.
 *
 * @pure true
 * @postcondition exitCode === null ↔ the process never produced a numeric exit status
 */
export function extractExecFailure(error: unknown): ExecFailureOutput {
	if (typeof error !== "object" || error === null) {
		return { exitCode: null, stdout: "", stderr: String(error) };
	}
	const code: unknown = "code" in error ? error.code : undefined;
	return {
		exitCode: typeof code === "number" ? code : null,
		stdout: stringField(error, "stdout"),
		stderr: stringField(error, "stderr"),
	};
}
