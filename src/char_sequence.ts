/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { Position, Range } from './range_mapping.js';
import { OffsetRange, type ISequence } from './sequence.js';

const enum CharCode {
	Tab = 9,
	LineFeed = 10,
	CarriageReturn = 13,
	Space = 32,
	Comma = 44,
	Digit0 = 48,
	Digit9 = 57,
	Semicolon = 59,
	A = 65,
	Z = 90,
	a = 97,
	z = 122,
}

/**
 * Character classes used to score diff boundaries.
 */
export enum CharBoundaryCategory {
	WordLower,
	WordUpper,
	WordNumber,
	End,
	Other,
	Separator,
	Space,
	LineBreakCR,
	LineBreakLF,
}

const categoryScores: Record<CharBoundaryCategory, number> = {
	[CharBoundaryCategory.WordLower]: 0,
	[CharBoundaryCategory.WordUpper]: 0,
	[CharBoundaryCategory.WordNumber]: 0,
	[CharBoundaryCategory.End]: 10,
	[CharBoundaryCategory.Other]: 2,
	[CharBoundaryCategory.Separator]: 30,
	[CharBoundaryCategory.Space]: 3,
	[CharBoundaryCategory.LineBreakCR]: 10,
	[CharBoundaryCategory.LineBreakLF]: 10,
};

/**
 * Classifies a char code; -1 stands for "before the start" or "after the end".
 */
export function getCategory(charCode: number): CharBoundaryCategory {
	if (charCode === CharCode.LineFeed) {
		return CharBoundaryCategory.LineBreakLF;
	} else if (charCode === CharCode.CarriageReturn) {
		return CharBoundaryCategory.LineBreakCR;
	} else if (charCode === CharCode.Space || charCode === CharCode.Tab) {
		return CharBoundaryCategory.Space;
	} else if (charCode >= CharCode.a && charCode <= CharCode.z) {
		return CharBoundaryCategory.WordLower;
	} else if (charCode >= CharCode.A && charCode <= CharCode.Z) {
		return CharBoundaryCategory.WordUpper;
	} else if (charCode >= CharCode.Digit0 && charCode <= CharCode.Digit9) {
		return CharBoundaryCategory.WordNumber;
	} else if (charCode === -1) {
		return CharBoundaryCategory.End;
	} else if (charCode === CharCode.Comma || charCode === CharCode.Semicolon) {
		return CharBoundaryCategory.Separator;
	}
	return CharBoundaryCategory.Other;
}

function isWordChar(charCode: number): boolean {
	return charCode >= CharCode.a && charCode <= CharCode.z
		|| charCode >= CharCode.A && charCode <= CharCode.Z
		|| charCode >= CharCode.Digit0 && charCode <= CharCode.Digit9;
}

function isUpperCase(charCode: number): boolean {
	return charCode >= CharCode.A && charCode <= CharCode.Z;
}

/**
 * The characters of a range of lines, as one sequence of UTF-16 char codes
 * with lines joined by `\n`.
 *
 * When whitespace changes are not considered, every line's leading and
 * trailing whitespace is left out of the element stream. The per-line
 * bookkeeping kept here maps element offsets back to document positions.
 *
 * @example
 * ```typescript
 * const lines = ['  foo', 'bar'];
 * const seq = new LinesSliceCharSequence(lines, new Range(1, 1, 2, 4), false);
 * seq.text; // 'foo\nbar'
 * seq.translateOffset(0); // (1,3)
 * ```
 */
export class LinesSliceCharSequence implements ISequence {
	private readonly elements: number[] = [];
	/** The element offset at which each line of the slice starts. */
	private readonly firstElementOffsetByLineIdx: number[] = [];
	/** The 0-based column in the document at which each line of the slice starts. */
	private readonly lineStartOffsets: number[] = [];
	/** How much leading whitespace was dropped from each line. */
	private readonly trimmedWsLengthsByLineIdx: number[] = [];

	constructor(
		public readonly lines: readonly string[],
		private readonly range: Range,
		public readonly considerWhitespaceChanges: boolean,
	) {
		if (range.startLineNumber < 1 || range.endLineNumber > lines.length) {
			throw new Error(`[LinesSliceCharSequence] Range ${range.toString()} is outside of ${lines.length} lines.`);
		}

		this.firstElementOffsetByLineIdx.push(0);
		for (let lineNumber = range.startLineNumber; lineNumber <= range.endLineNumber; lineNumber++) {
			let line = lines[lineNumber - 1];
			let lineStartOffset = 0;
			if (lineNumber === range.startLineNumber && range.startColumn > 1) {
				lineStartOffset = range.startColumn - 1;
				line = line.substring(lineStartOffset);
			}
			this.lineStartOffsets.push(lineStartOffset);

			let trimmedWsLength = 0;
			if (!considerWhitespaceChanges) {
				const trimmedStartLine = line.trimStart();
				trimmedWsLength = line.length - trimmedStartLine.length;
				line = trimmedStartLine.trimEnd();
			}
			this.trimmedWsLengthsByLineIdx.push(trimmedWsLength);

			const lineLength = lineNumber === range.endLineNumber
				? Math.min(range.endColumn - 1 - lineStartOffset - trimmedWsLength, line.length)
				: line.length;
			for (let i = 0; i < lineLength; i++) {
				this.elements.push(line.charCodeAt(i));
			}

			if (lineNumber < range.endLineNumber) {
				this.elements.push(CharCode.LineFeed);
				this.firstElementOffsetByLineIdx.push(this.elements.length);
			}
		}
	}

	get text(): string {
		return this.getText(new OffsetRange(0, this.length));
	}

	public getText(range: OffsetRange): string {
		return this.elements.slice(range.start, range.endExclusive).map(e => String.fromCharCode(e)).join('');
	}

	getElement(offset: number): number {
		return this.elements[offset];
	}

	get length(): number {
		return this.elements.length;
	}

	/**
	 * Scores a boundary before element `length`, from the categories of the
	 * characters on both sides of it.
	 */
	public getBoundaryScore(length: number): number {
		const prevCategory = getCategory(length > 0 ? this.elements[length - 1] : -1);
		const nextCategory = getCategory(length < this.elements.length ? this.elements[length] : -1);

		if (prevCategory === CharBoundaryCategory.LineBreakCR && nextCategory === CharBoundaryCategory.LineBreakLF) {
			// never split a CRLF pair
			return 0;
		}
		if (prevCategory === CharBoundaryCategory.LineBreakLF) {
			// prefer the line break before the change
			return 150;
		}

		let score = 0;
		if (prevCategory !== nextCategory) {
			score += 10;
			if (prevCategory === CharBoundaryCategory.WordLower && nextCategory === CharBoundaryCategory.WordUpper) {
				score += 1;
			}
		}

		score += categoryScores[prevCategory];
		score += categoryScores[nextCategory];

		return score;
	}

	/**
	 * Maps an element offset to a document position.
	 *
	 * Dropped leading whitespace is counted in, except for a 'left' position
	 * that sits exactly at the start of a line's content: the end of a range
	 * there must not claim the whitespace before it.
	 */
	public translateOffset(offset: number, preference: 'left' | 'right' = 'right'): Position {
		const i = findLastIdxMonotonous(this.firstElementOffsetByLineIdx, value => value <= offset);
		const lineOffset = offset - this.firstElementOffsetByLineIdx[i];
		return new Position(
			this.range.startLineNumber + i,
			1 + this.lineStartOffsets[i] + lineOffset + ((lineOffset === 0 && preference === 'left') ? 0 : this.trimmedWsLengthsByLineIdx[i]),
		);
	}

	/**
	 * Maps an offset range to a document range. A range whose end would land
	 * before its start collapses to an empty range at the end position.
	 */
	public translateRange(range: OffsetRange): Range {
		const pos1 = this.translateOffset(range.start, 'right');
		const pos2 = this.translateOffset(range.endExclusive, 'left');
		if (pos2.isBefore(pos1)) {
			return Range.fromPositions(pos2, pos2);
		}
		return Range.fromPositions(pos1, pos2);
	}

	/** The alphanumeric run containing `offset`, if any. */
	public findWordContaining(offset: number): OffsetRange | undefined {
		if (offset < 0 || offset >= this.elements.length) {
			return undefined;
		}
		if (!isWordChar(this.elements[offset])) {
			return undefined;
		}

		let start = offset;
		while (start > 0 && isWordChar(this.elements[start - 1])) {
			start--;
		}
		let end = offset;
		while (end < this.elements.length && isWordChar(this.elements[end])) {
			end++;
		}
		return new OffsetRange(start, end);
	}

	/**
	 * Like `findWordContaining`, but stops at camelCase humps. The range is
	 * empty when `offset` is on an uppercase letter.
	 */
	public findSubWordContaining(offset: number): OffsetRange | undefined {
		if (offset < 0 || offset >= this.elements.length) {
			return undefined;
		}
		if (!isWordChar(this.elements[offset])) {
			return undefined;
		}

		let start = offset;
		while (start > 0 && isWordChar(this.elements[start - 1]) && !isUpperCase(this.elements[start])) {
			start--;
		}
		// An offset on a capital yields an empty range: the capital ends the subword before it.
		let end = offset;
		while (end < this.elements.length && isWordChar(this.elements[end]) && !isUpperCase(this.elements[end])) {
			end++;
		}
		return new OffsetRange(start, end);
	}

	/** The number of line breaks the range spans. */
	public countLinesIn(range: OffsetRange): number {
		return this.translateOffset(range.endExclusive).lineNumber - this.translateOffset(range.start).lineNumber;
	}

	isStronglyEqual(offset1: number, offset2: number): boolean {
		return this.elements[offset1] === this.elements[offset2];
	}

	/** Widens the range to the starts of the lines it touches. */
	public extendToFullLines(range: OffsetRange): OffsetRange {
		const start = findLastMonotonous(this.firstElementOffsetByLineIdx, x => x <= range.start) ?? 0;
		const end = findFirstMonotonous(this.firstElementOffsetByLineIdx, x => range.endExclusive <= x) ?? this.elements.length;
		return new OffsetRange(start, end);
	}

	public toString(): string {
		return `Slice: "${this.text}"`;
	}
}

/**
 * The last index for which `predicate` holds, for a predicate that is true
 * on a prefix of `array`; -1 if it holds nowhere.
 */
function findLastIdxMonotonous<T>(array: readonly T[], predicate: (item: T) => boolean): number {
	let i = 0;
	let j = array.length;
	while (i < j) {
		const k = Math.floor((i + j) / 2);
		if (predicate(array[k])) {
			i = k + 1;
		} else {
			j = k;
		}
	}
	return i - 1;
}

function findLastMonotonous<T>(array: readonly T[], predicate: (item: T) => boolean): T | undefined {
	const idx = findLastIdxMonotonous(array, predicate);
	return idx === -1 ? undefined : array[idx];
}

/**
 * The first item for which `predicate` holds, for a predicate that is true
 * on a suffix of `array`.
 */
function findFirstMonotonous<T>(array: readonly T[], predicate: (item: T) => boolean): T | undefined {
	let i = 0;
	let j = array.length;
	while (i < j) {
		const k = Math.floor((i + j) / 2);
		if (predicate(array[k])) {
			j = k;
		} else {
			i = k + 1;
		}
	}
	return i === array.length ? undefined : array[i];
}
