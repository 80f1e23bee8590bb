// Text Scanner - low-level helpers shared by the Swift rules.
// Source is treated as plain text; nothing here knows about Swift syntax
// beyond the `//` comment marker and `{ }` blocks.

const LINE_COMMENT = '//';

/**
 * 1-based line number of the character at `offset`.
 */
export function lineNumberAt(text: string, offset: number): number {
	let line = 1;
	const end = Math.min(offset, text.length);
	for (let i = 0; i < end; i++) {
		if (text[i] === '\n') line++;
	}
	return line;
}

/**
 * The physical line containing `offset`, plus the offset's column within it.
 */
export function lineContaining(text: string, offset: number): { line: string; column: number } {
	const lineStart = offset > 0 ? text.lastIndexOf('\n', offset - 1) + 1 : 0;
	const lineEnd = text.indexOf('\n', offset);
	const line = lineEnd === -1 ? text.slice(lineStart) : text.slice(lineStart, lineEnd);
	return { line, column: offset - lineStart };
}

/**
 * True when a `//` appears earlier on the same line than `offset`.
 * Only the first marker counts, and string literals are not recognised:
 * `"http://x"` on the line still reads as a comment start.
 */
export function isInLineComment(text: string, offset: number): boolean {
	const { line, column } = lineContaining(text, offset);
	const marker = line.indexOf(LINE_COMMENT);
	return marker !== -1 && marker < column;
}

/**
 * Index of the `}` that closes the first block opened at or after `start`.
 * Returns `text.length` when the text ends before the block closes.
 */
export function findBlockEnd(text: string, start: number): number {
	let depth = 0;
	let opened = false;

	for (let i = start; i < text.length; i++) {
		const ch = text[i];
		if (ch === '{') {
			depth++;
			opened = true;
		} else if (ch === '}') {
			depth--;
			if (opened && depth === 0) {
				return i;
			}
		}
	}

	return text.length;
}

/**
 * Offset reached after stepping `count` code points forward from `offset`,
 * clamped to the end of the text. Surrogate pairs count once.
 */
export function advanceCodePoints(text: string, offset: number, count: number): number {
	let end = offset;
	let seen = 0;
	for (const ch of text.slice(offset)) {
		if (seen === count) break;
		end += ch.length;
		seen++;
	}
	return Math.min(end, text.length);
}
