// CHANGE: Strict UTF-8 decoding of Python sources for in-place rewrites
// FORMAT THEOREM: ∀b: decodeSource(b) = Right(s) → encodeSource(s) = b
// PURITY: CORE
// INVARIANT: Bytes that are not valid UTF-8 are never decoded lossily
// COMPLEXITY: O(n) where n = |bytes|

import { Either } from "effect";

import { SourceSyntaxError } from "../errors.js";

const BOM = "\uFEFF";

/**
 * Decoded file contents; the byte order mark is kept apart so rules never see it.
 */
export interface SourceText {
	readonly text: string;
	readonly bom: boolean;
}

const strict = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const lenient = new TextDecoder("utf-8", { ignoreBOM: true });

/**
 * Line of the first undecodable byte, as far as the lenient decoding shows it.
 */
function invalidLine(bytes: Uint8Array): number {
	const text = lenient.decode(bytes);
	const at = text.indexOf("\uFFFD");
	const before = at === -1 ? text : text.slice(0, at);
	return before.split("\n").length;
}

/**
 * @pure true
 * @returns Left when `bytes` are not valid UTF-8
 */
export function decodeSource(
	bytes: Uint8Array,
): Either.Either<SourceText, SourceSyntaxError> {
	return Either.try({
		try: (): SourceText => {
			const decoded = strict.decode(bytes);
			return decoded.startsWith(BOM)
				? { text: decoded.slice(BOM.length), bom: true }
				: { text: decoded, bom: false };
		},
		catch: () =>
			new SourceSyntaxError({
				line: invalidLine(bytes),
				detail: "source is not valid UTF-8",
			}),
	});
}

/**
 * @pure true
 */
export const encodeSource = (source: SourceText): Buffer =>
	Buffer.from(source.bom ? `${BOM}${source.text}` : source.text, "utf8");
