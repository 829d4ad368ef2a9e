// CHANGE: Unit tests for `git status --porcelain` parsing
// INVARIANT: Leading status columns are significant; malformed lines are skipped

import { describe, expect, it } from "vitest";

import {
	formatPorcelainEntry,
	hasChanges,
	parsePorcelain,
	parsePorcelainLine,
} from "../../../src/core/git/porcelain.js";

describe("parsePorcelainLine", () => {
	it("keeps a leading space as the index column", (): void => {
		expect(parsePorcelainLine(" M src/app.py")).toEqual({
			index: " ",
			worktree: "M",
			path: "src/app.py",
		});
	});

	it("parses untracked files with spaces in the name", (): void => {
		expect(parsePorcelainLine("?? new file.py")).toEqual({
			index: "?",
			worktree: "?",
			path: "new file.py",
		});
	});

	it("splits renames into original and new path", (): void => {
		expect(parsePorcelainLine("R  old.py -> new.py")).toEqual({
			index: "R",
			worktree: " ",
			path: "new.py",
			originalPath: "old.py",
		});
	});

	it("decodes octal-escaped UTF-8 in quoted paths", (): void => {
		expect(parsePorcelainLine('?? "caf\\303\\251.py"')).toEqual({
			index: "?",
			worktree: "?",
			path: "café.py",
		});
	});

	it("unescapes quotes inside quoted paths", (): void => {
		expect(parsePorcelainLine('A  "a \\"b\\".py"')?.path).toBe('a "b".py');
	});

	it("handles quoted paths on both sides of a rename", (): void => {
		expect(parsePorcelainLine('R  "a b.py" -> "c d.py"')).toEqual({
			index: "R",
			worktree: " ",
			path: "c d.py",
			originalPath: "a b.py",
		});
	});

	it("rejects lines that are not status lines", (): void => {
		expect(parsePorcelainLine("")).toBeNull();
		expect(parsePorcelainLine("XY")).toBeNull();
		expect(parsePorcelainLine("garbage-line")).toBeNull();
		expect(parsePorcelainLine('?? "unterminated')).toBeNull();
	});
});

describe("parsePorcelain", () => {
	it("parses every line and skips blanks", (): void => {
		const entries = parsePorcelain(" M a.py\n\n?? b.py\n");
		expect(entries.map((e) => e.path)).toEqual(["a.py", "b.py"]);
	});

	it("accepts CRLF line endings", (): void => {
		const entries = parsePorcelain(" M a.py\r\n M b.py\r\n");
		expect(entries.map((e) => e.path)).toEqual(["a.py", "b.py"]);
	});

	it("returns nothing for empty output", (): void => {
		expect(parsePorcelain("")).toEqual([]);
	});
});

describe("hasChanges", () => {
	it("is false for empty or whitespace-only output", (): void => {
		expect(hasChanges("")).toBe(false);
		expect(hasChanges("\n  \n")).toBe(false);
	});

	it("is true as soon as one status line is present", (): void => {
		expect(hasChanges(" M a.py\n")).toBe(true);
	});
});

describe("formatPorcelainEntry", () => {
	it("prints status columns and path", (): void => {
		expect(
			formatPorcelainEntry({ index: " ", worktree: "M", path: "a.py" }),
		).toBe(" M a.py");
	});

	it("prints renames with an arrow", (): void => {
		expect(
			formatPorcelainEntry({
				index: "R",
				worktree: " ",
				path: "new.py",
				originalPath: "old.py",
			}),
		).toBe("R  old.py -> new.py");
	});
});
