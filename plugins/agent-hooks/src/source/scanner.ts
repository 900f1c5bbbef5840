/**
 * Comment and string scanner for Rust source text
 *
 * Best-effort lexical check, not a tokenizer. Known limitations:
 * - a `//` or `/*` inside a string literal still counts as a comment marker
 * - block comments do not nest
 * - any `"` ends a raw string, whatever its `#` count, so a buffer holding
 *   `r##"…"#…"##` is considered closed at the first quote
 */

/** State carried through one string walk */
interface LexState {
	index: number;
	inRawString: boolean;
}

function countOccurrences(haystack: string, needle: string): number {
	return haystack.split(needle).length - 1;
}

/** Text between the last newline and the end contains `//` */
function isInLineComment(before: string): boolean {
	const lineStart = before.lastIndexOf("\n") + 1;
	return before.slice(lineStart).includes("//");
}

/** More `/*` than `*\/` so far */
function isInBlockComment(before: string): boolean {
	return countOccurrences(before, "/*") > countOccurrences(before, "*/");
}

/**
 * Length of a raw-string opener (`r`, hashes, quote) starting at `start`,
 * or 0 when there is none
 */
function rawStringOpenerLength(text: string, start: number): number {
	if (text[start] !== "r" || start + 1 >= text.length) {
		return 0;
	}
	let end = start + 1;
	while (end < text.length && text[end] === "#") {
		end++;
	}
	return end < text.length && text[end] === '"' ? end + 1 - start : 0;
}

/** Quote at `index` that is not preceded by a backslash */
function isUnescapedQuote(text: string, index: number): boolean {
	return text[index] === '"' && (index === 0 || text[index - 1] !== "\\");
}

/** Ends inside an ordinary string or a raw string */
function isInStringLiteral(before: string): boolean {
	const state: LexState = { index: 0, inRawString: false };

	while (state.index < before.length) {
		const i = state.index;

		if (state.inRawString) {
			if (before[i] === '"') {
				state.inRawString = false;
			}
			state.index++;
			continue;
		}

		const opener = rawStringOpenerLength(before, i);
		if (opener > 0) {
			state.inRawString = true;
			state.index = i + opener;
			continue;
		}

		if (isUnescapedQuote(before, i)) {
			let close = i + 1;
			while (close < before.length && !isUnescapedQuote(before, close)) {
				close++;
			}
			// Unterminated: the position sits inside this string
			if (close >= before.length) {
				return true;
			}
			state.index = close + 1;
			continue;
		}

		state.index++;
	}

	return state.inRawString;
}

/**
 * Check whether `offset` in `buffer` falls inside a line comment, an open block
 * comment, an ordinary string or a raw string. Only the text before `offset` is
 * looked at.
 */
export function isExcludedPosition(buffer: string, offset: number): boolean {
	const before = buffer.slice(0, offset);
	if (before.length === 0) {
		return false;
	}

	return (
		isInLineComment(before) ||
		isInBlockComment(before) ||
		isInStringLiteral(before)
	);
}
