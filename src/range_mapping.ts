/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * A 1-based (line, column) position. Columns count UTF-16 code units.
 */
export class Position {
	constructor(public readonly lineNumber: number, public readonly column: number) { }

	public isBefore(other: Position): boolean {
		return this.lineNumber < other.lineNumber
			|| (this.lineNumber === other.lineNumber && this.column < other.column);
	}

	public isBeforeOrEqual(other: Position): boolean {
		return this.lineNumber < other.lineNumber
			|| (this.lineNumber === other.lineNumber && this.column <= other.column);
	}

	public equals(other: Position): boolean {
		return this.lineNumber === other.lineNumber && this.column === other.column;
	}

	public toString(): string {
		return `(${this.lineNumber},${this.column})`;
	}
}

/**
 * A character range between two 1-based positions; the end position is exclusive.
 */
export class Range {
	public static fromPositions(start: Position, end: Position = start): Range {
		return new Range(start.lineNumber, start.column, end.lineNumber, end.column);
	}

	constructor(
		public readonly startLineNumber: number,
		public readonly startColumn: number,
		public readonly endLineNumber: number,
		public readonly endColumn: number,
	) {
		if (endLineNumber < startLineNumber || (endLineNumber === startLineNumber && endColumn < startColumn)) {
			throw new Error(`[Range] End ${endLineNumber},${endColumn} is before start ${startLineNumber},${startColumn}.`);
		}
	}

	get isEmpty(): boolean {
		return this.startLineNumber === this.endLineNumber && this.startColumn === this.endColumn;
	}

	public getStartPosition(): Position {
		return new Position(this.startLineNumber, this.startColumn);
	}

	public getEndPosition(): Position {
		return new Position(this.endLineNumber, this.endColumn);
	}

	public equals(other: Range): boolean {
		return this.startLineNumber === other.startLineNumber
			&& this.startColumn === other.startColumn
			&& this.endLineNumber === other.endLineNumber
			&& this.endColumn === other.endColumn;
	}

	public toString(): string {
		return `[${this.startLineNumber},${this.startColumn} -> ${this.endLineNumber},${this.endColumn}]`;
	}
}

/**
 * A half-open range of 1-based line numbers.
 */
export class LineRange {
	constructor(
		public readonly startLineNumber: number,
		public readonly endLineNumberExclusive: number,
	) {
		if (startLineNumber > endLineNumberExclusive) {
			throw new Error(`[LineRange] startLineNumber ${startLineNumber} cannot be after endLineNumberExclusive ${endLineNumberExclusive}.`);
		}
	}

	get isEmpty(): boolean {
		return this.startLineNumber === this.endLineNumberExclusive;
	}

	get length(): number {
		return this.endLineNumberExclusive - this.startLineNumber;
	}

	public join(other: LineRange): LineRange {
		return new LineRange(
			Math.min(this.startLineNumber, other.startLineNumber),
			Math.max(this.endLineNumberExclusive, other.endLineNumberExclusive),
		);
	}

	public intersectsOrTouches(other: LineRange): boolean {
		return this.startLineNumber <= other.endLineNumberExclusive && other.startLineNumber <= this.endLineNumberExclusive;
	}

	public equals(other: LineRange): boolean {
		return this.startLineNumber === other.startLineNumber && this.endLineNumberExclusive === other.endLineNumberExclusive;
	}

	public toString(): string {
		return `[${this.startLineNumber},${this.endLineNumberExclusive})`;
	}
}

/**
 * A character-level change: `originalRange` is replaced by the text of `modifiedRange`.
 */
export class RangeMapping {
	constructor(
		public readonly originalRange: Range,
		public readonly modifiedRange: Range,
	) { }

	public toString(): string {
		return `{${this.originalRange.toString()}->${this.modifiedRange.toString()}}`;
	}
}

/**
 * A line-level change.
 */
export class LineRangeMapping {
	constructor(
		public readonly original: LineRange,
		public readonly modified: LineRange,
	) { }

	/**
	 * The character range pair that this line change covers.
	 *
	 * Whole lines are used where both sides have a line after the change.
	 * Otherwise the range ends at the end of the last line, and a pure
	 * insertion or deletion at the end of the document starts at the end of
	 * the line before it.
	 */
	public toRangeMapping(originalLines: readonly string[], modifiedLines: readonly string[]): RangeMapping {
		if (isValidLineNumber(this.original.endLineNumberExclusive, originalLines)
			&& isValidLineNumber(this.modified.endLineNumberExclusive, modifiedLines)) {
			return new RangeMapping(
				new Range(this.original.startLineNumber, 1, this.original.endLineNumberExclusive, 1),
				new Range(this.modified.startLineNumber, 1, this.modified.endLineNumberExclusive, 1),
			);
		}

		if (!this.original.isEmpty && !this.modified.isEmpty) {
			return new RangeMapping(
				Range.fromPositions(
					new Position(this.original.startLineNumber, 1),
					normalizePosition(new Position(this.original.endLineNumberExclusive - 1, Number.MAX_SAFE_INTEGER), originalLines),
				),
				Range.fromPositions(
					new Position(this.modified.startLineNumber, 1),
					normalizePosition(new Position(this.modified.endLineNumberExclusive - 1, Number.MAX_SAFE_INTEGER), modifiedLines),
				),
			);
		}

		if (this.original.startLineNumber > 1 && this.modified.startLineNumber > 1) {
			return new RangeMapping(
				Range.fromPositions(
					normalizePosition(new Position(this.original.startLineNumber - 1, Number.MAX_SAFE_INTEGER), originalLines),
					normalizePosition(new Position(this.original.endLineNumberExclusive - 1, Number.MAX_SAFE_INTEGER), originalLines),
				),
				Range.fromPositions(
					normalizePosition(new Position(this.modified.startLineNumber - 1, Number.MAX_SAFE_INTEGER), modifiedLines),
					normalizePosition(new Position(this.modified.endLineNumberExclusive - 1, Number.MAX_SAFE_INTEGER), modifiedLines),
				),
			);
		}

		// One side is empty, one side ends after the last line and both start at line 1:
		// that would be a whole-document change, which callers handle before refining.
		throw new Error(`[LineRangeMapping] Cannot convert ${this.toString()} to a character range.`);
	}

	public toString(): string {
		return `{${this.original.toString()}->${this.modified.toString()}}`;
	}
}

/**
 * A line-level change together with its character-level changes.
 * An empty `innerChanges` list means the lines changed as a whole.
 */
export class DetailedLineRangeMapping extends LineRangeMapping {
	constructor(
		original: LineRange,
		modified: LineRange,
		public readonly innerChanges: readonly RangeMapping[],
	) {
		super(original, modified);
	}
}

/**
 * The result of a full diff computation.
 */
export interface LinesDiff {
	readonly changes: readonly DetailedLineRangeMapping[];
	/** True if any stage fell back to a whole-range diff because time ran out. */
	readonly hitTimeout: boolean;
}

/**
 * Groups character changes into line changes. Changes whose line ranges
 * intersect or touch on either side end up in the same line change.
 */
export function lineRangeMappingFromRangeMappings(
	alignments: readonly RangeMapping[],
	originalLines: readonly string[],
	modifiedLines: readonly string[],
): DetailedLineRangeMapping[] {
	const changes: DetailedLineRangeMapping[] = [];
	for (const g of groupAdjacentBy(
		alignments.map(a => getLineRangeMapping(a, originalLines, modifiedLines)),
		(a1, a2) =>
			a1.original.intersectsOrTouches(a2.original)
			|| a1.modified.intersectsOrTouches(a2.modified)
	)) {
		const first = g[0];
		const last = g[g.length - 1];

		changes.push(new DetailedLineRangeMapping(
			first.original.join(last.original),
			first.modified.join(last.modified),
			g.flatMap(a => a.innerChanges),
		));
	}
	return changes;
}

/**
 * The lines touched by a character change.
 *
 * A change ending at column 1 does not claim its end line, and a change
 * starting at the end of a line does not claim that line, as long as the
 * line range stays non-empty.
 */
export function getLineRangeMapping(
	rangeMapping: RangeMapping,
	originalLines: readonly string[],
	modifiedLines: readonly string[],
): DetailedLineRangeMapping {
	let lineStartDelta = 0;
	let lineEndDelta = 0;

	const original = rangeMapping.originalRange;
	const modified = rangeMapping.modifiedRange;

	if (modified.endColumn === 1 && original.endColumn === 1
		&& original.startLineNumber + lineStartDelta <= original.endLineNumber
		&& modified.startLineNumber + lineStartDelta <= modified.endLineNumber) {
		lineEndDelta = -1;
	}

	if (modified.startColumn - 1 >= getLineLength(modifiedLines, modified.startLineNumber)
		&& original.startColumn - 1 >= getLineLength(originalLines, original.startLineNumber)
		&& original.startLineNumber <= original.endLineNumber + lineEndDelta
		&& modified.startLineNumber <= modified.endLineNumber + lineEndDelta) {
		lineStartDelta = 1;
	}

	return new DetailedLineRangeMapping(
		new LineRange(original.startLineNumber + lineStartDelta, original.endLineNumber + 1 + lineEndDelta),
		new LineRange(modified.startLineNumber + lineStartDelta, modified.endLineNumber + 1 + lineEndDelta),
		[rangeMapping],
	);
}

/**
 * Yields maximal runs of items where each item should be grouped with its predecessor.
 */
export function* groupAdjacentBy<T>(items: Iterable<T>, shouldBeGrouped: (item1: T, item2: T) => boolean): Iterable<T[]> {
	let currentGroup: T[] | undefined;
	let last: T | undefined;
	for (const item of items) {
		if (currentGroup !== undefined && last !== undefined && shouldBeGrouped(last, item)) {
			currentGroup.push(item);
		} else {
			if (currentGroup) {
				yield currentGroup;
			}
			currentGroup = [item];
		}
		last = item;
	}
	if (currentGroup) {
		yield currentGroup;
	}
}

function getLineLength(lines: readonly string[], lineNumber: number): number {
	const line = lines[lineNumber - 1];
	return line === undefined ? 0 : line.length;
}

function isValidLineNumber(lineNumber: number, lines: readonly string[]): boolean {
	return lineNumber >= 1 && lineNumber <= lines.length;
}

function normalizePosition(position: Position, content: readonly string[]): Position {
	if (position.lineNumber < 1) {
		return new Position(1, 1);
	}
	if (position.lineNumber > content.length) {
		return new Position(content.length, content[content.length - 1].length + 1);
	}
	const line = content[position.lineNumber - 1];
	if (position.column > line.length + 1) {
		return new Position(position.lineNumber, line.length + 1);
	}
	return position;
}
