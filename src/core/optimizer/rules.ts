// CHANGE: Token-level rewrite rules for Python sources
// PURITY: CORE
// INVARIANT: Rules only emit edits over name/op tokens; strings and comments are never touched
// COMPLEXITY: O(n) per rule where n = |tokens|

import type { Token } from "./lexer.js";

export type RuleName = "redundant-list-of-set" | "memoize-recursive";

export interface RuleHit {
	readonly rule: RuleName;
	readonly line: number;
	readonly detail: string;
}

/**
 * Replacement of `source[start, end)` by `text`. Zero-length edits insert;
 * at equal offsets lower priority is applied first.
 */
export interface Edit {
	readonly start: number;
	readonly end: number;
	readonly text: string;
	readonly priority: number;
	readonly hit?: RuleHit;
}

export interface RuleContext {
	readonly source: string;
	readonly tokens: readonly Token[];
	readonly pairs: ReadonlyMap<number, number>;
	/** Indices into `tokens` of significant tokens, in order. */
	readonly significant: readonly number[];
	/** Inverse of `significant`. */
	readonly positionOf: ReadonlyMap<number, number>;
	readonly memoize: readonly string[];
	readonly eol: string;
}

export type Rule = (ctx: RuleContext) => readonly Edit[];

const MEMO_DECORATOR = /^@\s*(?:functools\s*\.\s*)?(?:lru_cache|cache)\b/u;

const at = (ctx: RuleContext, position: number): Token | undefined => {
	const index = ctx.significant[position];
	return index === undefined ? undefined : ctx.tokens[index];
};

const isName = (token: Token | undefined, text: string): boolean =>
	token !== undefined && token.kind === "name" && token.text === text;

const isOp = (token: Token | undefined, text: string): boolean =>
	token !== undefined && token.kind === "op" && token.text === text;

const startsLogicalLine = (ctx: RuleContext, position: number): boolean => {
	const previous = at(ctx, position - 1);
	return previous === undefined || previous.kind === "newline";
};

const lineStartOf = (source: string, offset: number): number =>
	offset === 0 ? 0 : source.lastIndexOf("\n", offset - 1) + 1;

/**
 * Position of the closing bracket paired with the opener at `position`.
 */
function closerPosition(ctx: RuleContext, position: number): number | undefined {
	const openIndex = ctx.significant[position];
	if (openIndex === undefined) return undefined;
	const closeIndex = ctx.pairs.get(openIndex);
	return closeIndex === undefined ? undefined : ctx.positionOf.get(closeIndex);
}

/**
 * `list(set(X))` → `set(X)` when `list` is a bare name called with that single argument.
 *
 * @pure true
 */
export const redundantListOfSet: Rule = (ctx) => {
	const edits: Edit[] = [];
	for (let k = 0; k < ctx.significant.length; k += 1) {
		const listToken = at(ctx, k);
		if (!isName(listToken, "list") || listToken === undefined) continue;
		if (isOp(at(ctx, k - 1), ".")) continue;
		if (!isOp(at(ctx, k + 1), "(")) continue;
		const setToken = at(ctx, k + 2);
		if (!isName(setToken, "set") || setToken === undefined) continue;
		if (!isOp(at(ctx, k + 3), "(")) continue;

		const innerClose = closerPosition(ctx, k + 3);
		const outerClose = closerPosition(ctx, k + 1);
		if (innerClose === undefined || outerClose !== innerClose + 1) continue;
		const innerCloseToken = at(ctx, innerClose);
		const outerCloseToken = at(ctx, outerClose);
		if (innerCloseToken === undefined || outerCloseToken === undefined) continue;

		edits.push({
			start: listToken.start,
			end: outerCloseToken.end,
			text: ctx.source.slice(setToken.start, innerCloseToken.end),
			priority: 0,
			hit: {
				rule: "redundant-list-of-set",
				line: listToken.line,
				detail: "list(set(...)) replaced with set(...)",
			},
		});
	}
	return edits;
};

/**
 * Walks back from the `def` at `position` one logical line at a time,
 * over blank lines, comments and decorators (which may span lines).
 */
function hasMemoDecorator(ctx: RuleContext, position: number): boolean {
	let end = position - 1;
	while (end >= 0) {
		if (at(ctx, end)?.kind === "newline") {
			end -= 1;
			continue;
		}
		let start = end;
		while (start > 0 && !startsLogicalLine(ctx, start)) start -= 1;
		const first = at(ctx, start);
		const last = at(ctx, end);
		if (first === undefined || last === undefined || !isOp(first, "@")) return false;
		if (MEMO_DECORATOR.test(ctx.source.slice(first.start, last.end))) return true;
		end = start - 1;
	}
	return false;
}

/**
 * True when some `from functools import ...` binds the bare name `lru_cache`.
 */
function importsLruCache(ctx: RuleContext): boolean {
	for (let k = 0; k < ctx.significant.length; k += 1) {
		if (!isName(at(ctx, k), "from") || !startsLogicalLine(ctx, k)) continue;
		if (!isName(at(ctx, k + 1), "functools")) continue;
		if (!isName(at(ctx, k + 2), "import")) continue;
		for (let j = k + 3; j < ctx.significant.length; j += 1) {
			const token = at(ctx, j);
			if (token === undefined || token.kind === "newline") break;
			if (isOp(token, "*")) return true;
			if (isName(token, "lru_cache") && !isName(at(ctx, j + 1), "as")) {
				return true;
			}
		}
	}
	return false;
}

/**
 * Offset where a new import goes: after the module docstring and any
 * `from __future__` imports.
 */
function importOffset(ctx: RuleContext): number {
	let k = 0;
	const skipBlankLines = (): void => {
		while (at(ctx, k)?.kind === "newline") k += 1;
	};
	skipBlankLines();
	if (at(ctx, k)?.kind === "string") {
		const after = at(ctx, k + 1);
		if (after === undefined || after.kind === "newline") k += 2;
	}
	skipBlankLines();
	while (isName(at(ctx, k), "from") && isName(at(ctx, k + 1), "__future__")) {
		while (at(ctx, k) !== undefined && at(ctx, k)?.kind !== "newline") k += 1;
		k += 1;
		skipBlankLines();
	}
	const token = at(ctx, k);
	return token === undefined
		? ctx.source.length
		: lineStartOf(ctx.source, token.start);
}

function importEdit(ctx: RuleContext): Edit {
	const offset = importOffset(ctx);
	const needsBreak =
		offset === ctx.source.length &&
		offset > 0 &&
		!ctx.source.endsWith("\n");
	return {
		start: offset,
		end: offset,
		text: `${needsBreak ? ctx.eol : ""}from functools import lru_cache${ctx.eol}`,
		priority: 0,
	};
}

/**
 * Adds `@lru_cache` above `def <name>(` for the configured names, plus the
 * functools import when nothing provides it.
 *
 * @pure true
 */
export const memoizeRecursive: Rule = (ctx) => {
	const targets = new Set(ctx.memoize);
	if (targets.size === 0) return [];
	const edits: Edit[] = [];
	for (let k = 0; k < ctx.significant.length; k += 1) {
		const defToken = at(ctx, k);
		if (!isName(defToken, "def") || defToken === undefined) continue;
		if (!startsLogicalLine(ctx, k)) continue;
		const nameToken = at(ctx, k + 1);
		if (nameToken === undefined || nameToken.kind !== "name") continue;
		if (!targets.has(nameToken.text) || !isOp(at(ctx, k + 2), "(")) continue;

		const lineStart = lineStartOf(ctx.source, defToken.start);
		if (hasMemoDecorator(ctx, k)) continue;
		const indent = ctx.source.slice(lineStart, defToken.start);
		edits.push({
			start: lineStart,
			end: lineStart,
			text: `${indent}@lru_cache${ctx.eol}`,
			priority: 1,
			hit: {
				rule: "memoize-recursive",
				line: defToken.line,
				detail: `@lru_cache added to ${nameToken.text}()`,
			},
		});
	}
	if (edits.length > 0 && !importsLruCache(ctx)) {
		edits.push(importEdit(ctx));
	}
	return edits;
};

export const RULES: readonly Rule[] = [redundantListOfSet, memoizeRecursive];
