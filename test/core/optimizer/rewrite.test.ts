// CHANGE: Unit and property tests for the source rewrite rules
// INVARIANT: Rewrites preserve every byte they do not replace

import { Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	applyEdits,
	type RewriteResult,
	rewriteSource,
} from "../../../src/core/optimizer/rewrite.js";
import { redundantListOfSet } from "../../../src/core/optimizer/rules.js";

const rewrite = (source: string, memoize: readonly string[] = ["fib"]): RewriteResult => {
	const result = rewriteSource(source, { memoize });
	if (Either.isLeft(result)) throw new Error(result.left.detail);
	return result.right;
};

describe("redundant-list-of-set", () => {
	it("replaces list(set(x)) with set(x)", (): void => {
		const result = rewrite("xs = list(set(ys))\n");
		expect(result.source).toBe("xs = set(ys)\n");
		expect(result.changed).toBe(true);
		expect(result.hits).toEqual([
			{
				rule: "redundant-list-of-set",
				line: 1,
				detail: "list(set(...)) replaced with set(...)",
			},
		]);
	});

	it("keeps the argument text verbatim", (): void => {
		expect(rewrite("u = list(set( a + b ))\n").source).toBe("u = set( a + b )\n");
	});

	it("unwraps nested occurrences over several passes", (): void => {
		const result = rewrite("u = list(set(list(set(a))))\n");
		expect(result.source).toBe("u = set(set(a))\n");
		expect(result.hits).toHaveLength(2);
	});

	it("ignores attribute calls and extra arguments", (): void => {
		const source = "a = obj.list(set(x))\nb = list(set(x), y)\nc = list(set(x).union(y))\n";
		expect(rewrite(source)).toEqual({ source, changed: false, hits: [] });
	});

	it("never touches strings or comments", (): void => {
		const source = "s = 'list(set(x))'  # list(set(y))\n";
		expect(rewrite(source).changed).toBe(false);
	});
});

describe("memoize-recursive", () => {
	const fib = "def fib(n):\n    if n < 2:\n        return n\n    return fib(n - 1) + fib(n - 2)\n";

	it("decorates fib and imports lru_cache", (): void => {
		const result = rewrite(fib);
		expect(result.source).toBe(`from functools import lru_cache\n@lru_cache\n${fib}`);
		expect(result.hits).toEqual([
			{ rule: "memoize-recursive", line: 1, detail: "@lru_cache added to fib()" },
		]);
	});

	it("places the import after the module docstring", (): void => {
		const source = '"""Math helpers."""\n\ndef fib(n):\n    return n\n';
		expect(rewrite(source).source).toBe(
			'"""Math helpers."""\n\nfrom functools import lru_cache\n@lru_cache\ndef fib(n):\n    return n\n',
		);
	});

	it("places the import after __future__ imports", (): void => {
		const source = "from __future__ import annotations\nimport os\n\ndef fib(n):\n    return n\n";
		expect(rewrite(source).source).toBe(
			"from __future__ import annotations\nfrom functools import lru_cache\nimport os\n\n@lru_cache\ndef fib(n):\n    return n\n",
		);
	});

	it("reuses an existing functools import", (): void => {
		const source = "from functools import lru_cache, reduce\n\ndef fib(n):\n    return n\n";
		expect(rewrite(source).source).toBe(
			"from functools import lru_cache, reduce\n\n@lru_cache\ndef fib(n):\n    return n\n",
		);
	});

	it("adds the import when lru_cache is only imported under an alias", (): void => {
		const source = "from functools import lru_cache as memo\ndef fib(n):\n    return n\n";
		expect(rewrite(source).source).toBe(
			"from functools import lru_cache\nfrom functools import lru_cache as memo\n@lru_cache\ndef fib(n):\n    return n\n",
		);
	});

	it("keeps the indentation of methods", (): void => {
		const source = "class M:\n    def fib(self, n):\n        return n\n";
		expect(rewrite(source).source).toBe(
			"from functools import lru_cache\nclass M:\n    @lru_cache\n    def fib(self, n):\n        return n\n",
		);
	});

	it("leaves already memoized functions alone", (): void => {
		for (const decorator of ["@lru_cache(maxsize=None)", "@functools.cache", "@cache"]) {
			const source = `${decorator}\ndef fib(n):\n    return n\n`;
			expect(rewrite(source).changed).toBe(false);
		}
	});

	it("looks through other decorators and comments", (): void => {
		const source = "@lru_cache\n# note\n@trace\ndef fib(n):\n    return n\n";
		expect(rewrite(source).changed).toBe(false);
	});

	it("recognises a decorator spanning several lines", (): void => {
		const source = "@lru_cache(\n    maxsize=None,\n)\ndef fib(n):\n    return n\n";
		expect(rewrite(source).changed).toBe(false);
	});

	it("looks through blank lines between decorator and def", (): void => {
		const source = "from functools import lru_cache\n@lru_cache\n\ndef fib(n):\n    return n\n";
		expect(rewrite(source).changed).toBe(false);
	});

	it("does not borrow the decorator of the previous function", (): void => {
		const source =
			"from functools import lru_cache\n@lru_cache\ndef other():\n    pass\ndef fib(n):\n    return n\n";
		expect(rewrite(source).source).toBe(
			"from functools import lru_cache\n@lru_cache\ndef other():\n    pass\n@lru_cache\ndef fib(n):\n    return n\n",
		);
	});

	it("ignores other names, async defs and an empty memoize list", (): void => {
		expect(rewrite("def fibonacci(n):\n    return n\n").changed).toBe(false);
		expect(rewrite("async def fib(n):\n    return n\n").changed).toBe(false);
		expect(rewrite("def fib(n):\n    return n\n", []).changed).toBe(false);
	});

	it("keeps CRLF line endings", (): void => {
		expect(rewrite("def fib(n):\r\n    return n\r\n").source).toBe(
			"from functools import lru_cache\r\n@lru_cache\r\ndef fib(n):\r\n    return n\r\n",
		);
	});

	it("is a fixpoint on its own output", (): void => {
		const once = rewrite(`${fib}xs = list(set([1, 1]))\n`);
		expect(rewrite(once.source).changed).toBe(false);
	});
});

describe("rewriteSource", () => {
	it("returns Left for sources that cannot be tokenized", (): void => {
		const result = rewriteSource("x = (1, 2\n", { memoize: ["fib"] });
		expect(Either.isLeft(result)).toBe(true);
	});

	it("runs only the rules it is given", (): void => {
		const result = rewriteSource("def fib(n):\n    return list(set(n))\n", {
			memoize: ["fib"],
			rules: [redundantListOfSet],
		});
		expect(Either.getOrThrow(result).source).toBe("def fib(n):\n    return set(n)\n");
	});

	it("returns sources without rule targets unchanged", (): void => {
		const alphabet = fc.constantFrom("a", "b", "x", "=", "(", ")", " ", "\n", "'", "#", "1", "s", "e", "t");
		fc.assert(
			fc.property(
				fc.array(alphabet, { maxLength: 40 }).map((chars) => chars.join("")),
				(source) => {
					const result = rewriteSource(source, { memoize: [] });
					return Either.isLeft(result) || result.right.source === source;
				},
			),
		);
	});
});

describe("applyEdits", () => {
	it("applies inserts at the same offset by priority and drops overlaps", (): void => {
		const { text, applied } = applyEdits("abcdef", [
			{ start: 0, end: 0, text: "2", priority: 1 },
			{ start: 0, end: 0, text: "1", priority: 0 },
			{ start: 1, end: 4, text: "X", priority: 0 },
			{ start: 2, end: 3, text: "Y", priority: 0 },
		]);
		expect(text).toBe("12aXef");
		expect(applied).toHaveLength(3);
	});
});
