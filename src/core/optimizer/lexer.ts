// CHANGE: Minimal Python tokenizer for source rewrites
// FORMAT THEOREM: ∀src: tokenize(src) = Right(r) → concat(r.tokens.text) = src
// PURITY: CORE
// INVARIANT: Tokens are contiguous and cover the whole source; brackets are balanced in every Right
// COMPLEXITY: O(n) where n = |source|

import { Either } from "effect";

import { SourceSyntaxError } from "../errors.js";

/**
 * `newline` ends a logical line; `nl` is a line break inside brackets.
 */
export type TokenKind =
	| "name"
	| "number"
	| "string"
	| "comment"
	| "op"
	| "newline"
	| "nl"
	| "space";

export interface Token {
	readonly kind: TokenKind;
	readonly text: string;
	readonly start: number;
	readonly end: number;
	readonly line: number;
}

/**
 * @property pairs token index of each opening bracket → token index of its closer
 */
export interface LexResult {
	readonly tokens: readonly Token[];
	readonly pairs: ReadonlyMap<number, number>;
}

const STRING_PREFIXES: ReadonlySet<string> = new Set([
	"r",
	"u",
	"b",
	"f",
	"br",
	"rb",
	"fr",
	"rf",
]);

const CLOSER_OF: Readonly<Record<string, string>> = {
	"(": ")",
	"[": "]",
	"{": "}",
};

const CLOSERS: ReadonlySet<string> = new Set([")", "]", "}"]);
const NAME_START = /[\p{L}_]/u;
const NAME_PART = /[\p{L}\p{N}_]/u;
const NUMBER =
	/0[xXoObB][\da-fA-F_]+|(?:\d[\d_]*\.?[\d_]*|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJ]?/uy;
const INLINE_SPACE = /[ \t\f]+/uy;

interface StringSpan {
	readonly end: number;
	readonly newlines: number;
}

const syntaxError = (line: number, detail: string): SourceSyntaxError =>
	new SourceSyntaxError({ line, detail });

/**
 * Scans a string literal whose opening quote is at `quoteStart`.
 * A backslash always escapes the next character, raw strings included:
 * `r"\""` does not end at the escaped quote.
 */
function scanString(
	source: string,
	quoteStart: number,
	line: number,
): Either.Either<StringSpan, SourceSyntaxError> {
	const quote = source.charAt(quoteStart);
	const delimiter = source.startsWith(quote.repeat(3), quoteStart)
		? quote.repeat(3)
		: quote;
	const triple = delimiter.length === 3;
	let i = quoteStart + delimiter.length;
	let newlines = 0;
	while (i < source.length) {
		const ch = source.charAt(i);
		if (ch === "\\") {
			const escaped = source.charAt(i + 1);
			if (escaped === "\n") newlines += 1;
			if (escaped === "\r" && source.charAt(i + 2) === "\n") {
				newlines += 1;
				i += 1;
			}
			i += 2;
			continue;
		}
		if (source.startsWith(delimiter, i)) {
			return Either.right({ end: i + delimiter.length, newlines });
		}
		if (ch === "\n") {
			if (!triple) {
				return Either.left(syntaxError(line, "unterminated string literal"));
			}
			newlines += 1;
		}
		i += 1;
	}
	return Either.left(
		syntaxError(
			line,
			triple
				? "unterminated triple-quoted string literal"
				: "unterminated string literal",
		),
	);
}

function stickyMatch(pattern: RegExp, source: string, pos: number): number {
	pattern.lastIndex = pos;
	const match = pattern.exec(source);
	return match === null ? 0 : match[0].length;
}

/**
 * Splits Python source into tokens.
 *
 * Only what the rewrite rules need is recognised: names, numbers, strings,
 * comments, single-character operators and line structure.
 *
 * @pure true
 * @returns Left when a string is unterminated or brackets do not balance
 */
export function tokenize(
	source: string,
): Either.Either<LexResult, SourceSyntaxError> {
	const tokens: Token[] = [];
	const pairs = new Map<number, number>();
	const openers: number[] = [];
	let pos = 0;
	let line = 1;

	const push = (kind: TokenKind, end: number): void => {
		tokens.push({ kind, text: source.slice(pos, end), start: pos, end, line });
		pos = end;
	};

	while (pos < source.length) {
		const ch = source.charAt(pos);
		const next = source.charAt(pos + 1);

		if (ch === "\n" || (ch === "\r" && next === "\n")) {
			push(openers.length > 0 ? "nl" : "newline", ch === "\r" ? pos + 2 : pos + 1);
			line += 1;
			continue;
		}
		if (ch === "\r") {
			push("space", pos + 1);
			continue;
		}
		const spaces = stickyMatch(INLINE_SPACE, source, pos);
		if (spaces > 0) {
			push("space", pos + spaces);
			continue;
		}
		if (ch === "\\") {
			const width = next === "\n" ? 2 : next === "\r" && source.charAt(pos + 2) === "\n" ? 3 : 0;
			if (width === 0) {
				return Either.left(
					syntaxError(line, "unexpected character after line continuation character"),
				);
			}
			push("space", pos + width);
			line += 1;
			continue;
		}
		if (ch === "#") {
			const lineEnd = source.indexOf("\n", pos);
			const end = lineEnd === -1 ? source.length : lineEnd;
			push("comment", source.charAt(end - 1) === "\r" ? end - 1 : end);
			continue;
		}

		let stringStart = -1;
		let nameEnd = pos;
		if (ch === "'" || ch === '"') {
			stringStart = pos;
		} else if (NAME_START.test(ch)) {
			nameEnd = pos + 1;
			while (nameEnd < source.length && NAME_PART.test(source.charAt(nameEnd))) {
				nameEnd += 1;
			}
			const quote = source.charAt(nameEnd);
			const prefix = source.slice(pos, nameEnd).toLowerCase();
			if ((quote === "'" || quote === '"') && STRING_PREFIXES.has(prefix)) {
				stringStart = nameEnd;
			}
		}
		if (stringStart !== -1) {
			const span = scanString(source, stringStart, line);
			if (Either.isLeft(span)) return Either.left(span.left);
			push("string", span.right.end);
			line += span.right.newlines;
			continue;
		}
		if (nameEnd > pos) {
			push("name", nameEnd);
			continue;
		}

		const numberLength = /[\d.]/u.test(ch) ? stickyMatch(NUMBER, source, pos) : 0;
		if (numberLength > 0) {
			push("number", pos + numberLength);
			continue;
		}

		if (CLOSER_OF[ch] !== undefined) {
			openers.push(tokens.length);
		} else if (CLOSERS.has(ch)) {
			const openIndex = openers.pop();
			const opener = openIndex === undefined ? undefined : tokens[openIndex];
			if (openIndex === undefined || opener === undefined) {
				return Either.left(syntaxError(line, `unmatched '${ch}'`));
			}
			if (CLOSER_OF[opener.text] !== ch) {
				return Either.left(
					syntaxError(
						line,
						`closing parenthesis '${ch}' does not match opening parenthesis '${opener.text}'`,
					),
				);
			}
			pairs.set(openIndex, tokens.length);
		}
		push("op", pos + 1);
	}

	const unclosedIndex = openers.at(-1);
	const unclosed = unclosedIndex === undefined ? undefined : tokens[unclosedIndex];
	if (unclosed !== undefined) {
		return Either.left(syntaxError(unclosed.line, `'${unclosed.text}' was never closed`));
	}
	return Either.right({ tokens, pairs });
}

/**
 * Indices of tokens that carry syntax: everything but spaces, comments and
 * in-bracket line breaks.
 *
 * @pure true
 */
export function significantIndices(tokens: readonly Token[]): readonly number[] {
	const indices: number[] = [];
	tokens.forEach((token, index) => {
		if (token.kind !== "space" && token.kind !== "comment" && token.kind !== "nl") {
			indices.push(index);
		}
	});
	return indices;
}
