// CHANGE: Apply rewrite rules to a Python source until no rule fires
// FORMAT THEOREM: rewriteSource(rewriteSource(s).source).changed = false
// PURITY: CORE
// INVARIANT: Bytes outside accepted edits are preserved; Left leaves the caller's file untouched
// COMPLEXITY: O(p · n) where p ≤ MAX_PASSES, n = |source|

import { Either } from "effect";

import type { SourceSyntaxError } from "../errors.js";
import { type LexResult, significantIndices, tokenize } from "./lexer.js";
import { type Edit, RULES, type Rule, type RuleContext, type RuleHit } from "./rules.js";

export interface RewriteOptions {
	readonly memoize: readonly string[];
	readonly rules?: readonly Rule[];
}

export interface RewriteResult {
	readonly source: string;
	readonly changed: boolean;
	readonly hits: readonly RuleHit[];
}

/** Nested matches (`list(set(list(set(x))))`) need one pass per level. */
const MAX_PASSES = 8;

function buildContext(
	source: string,
	lexed: LexResult,
	memoize: readonly string[],
): RuleContext {
	const significant = significantIndices(lexed.tokens);
	const positionOf = new Map<number, number>();
	significant.forEach((tokenIndex, position) => {
		positionOf.set(tokenIndex, position);
	});
	return {
		source,
		tokens: lexed.tokens,
		pairs: lexed.pairs,
		significant,
		positionOf,
		memoize,
		eol: source.includes("\r\n") ? "\r\n" : "\n",
	};
}

/**
 * Applies non-overlapping edits left to right; an edit overlapping an
 * accepted one is dropped and picked up by the next pass.
 *
 * @pure true
 */
export function applyEdits(
	source: string,
	edits: readonly Edit[],
): { readonly text: string; readonly applied: readonly Edit[] } {
	const ordered = [...edits].sort(
		(a, b) => a.start - b.start || a.priority - b.priority || a.end - b.end,
	);
	const applied: Edit[] = [];
	let cursor = 0;
	let text = "";
	for (const edit of ordered) {
		if (edit.start < cursor) continue;
		text += source.slice(cursor, edit.start) + edit.text;
		cursor = edit.end;
		applied.push(edit);
	}
	return { text: text + source.slice(cursor), applied };
}

/**
 * Rewrites Python source with the configured rules.
 *
 * @example
 * ```ts
 * rewriteSource("xs = list(set(ys))\n", { memoize: [] });
 * // Right({ source: "xs = set(ys)\n", changed: true, hits: [...] })
 * ```
 *
 * @pure true
 * @returns Left when the source cannot be tokenized
 */
export function rewriteSource(
	source: string,
	options: RewriteOptions,
): Either.Either<RewriteResult, SourceSyntaxError> {
	const rules = options.rules ?? RULES;
	const hits: RuleHit[] = [];
	let current = source;

	for (let pass = 0; pass < MAX_PASSES; pass += 1) {
		const lexed = tokenize(current);
		if (Either.isLeft(lexed)) return Either.left(lexed.left);
		const ctx = buildContext(current, lexed.right, options.memoize);
		const edits = rules.flatMap((rule) => rule(ctx));
		if (edits.length === 0) break;
		const { text, applied } = applyEdits(current, edits);
		for (const edit of applied) {
			if (edit.hit !== undefined) hits.push(edit.hit);
		}
		current = text;
	}

	return Either.right({ source: current, changed: current !== source, hits });
}
