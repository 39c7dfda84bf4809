/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import type { ITimeout } from './timeout.js';

/**
 * A uniform view over "lines" or "characters" that the diff algorithms
 * operate on. Elements are compared as integers.
 */
export interface ISequence {
	/** The compact identity of the element at `offset` (a hash id or a char code). */
	getElement(offset: number): number;

	readonly length: number;

	/**
	 * The desirability of putting a diff boundary before the element at `length`.
	 * Higher is better. Sequences without this method are never boundary-shifted.
	 */
	getBoundaryScore?(length: number): number;

	/** Exact comparison of two elements of this sequence. */
	isStronglyEqual(offset1: number, offset2: number): boolean;
}

/**
 * A half-open range `[start, endExclusive)` of sequence offsets.
 */
export class OffsetRange {
	public static ofLength(length: number): OffsetRange {
		return new OffsetRange(0, length);
	}

	public static ofStartAndLength(start: number, length: number): OffsetRange {
		return new OffsetRange(start, start + length);
	}

	constructor(public readonly start: number, public readonly endExclusive: number) {
		if (start > endExclusive) {
			throw new Error(`[OffsetRange] Invalid range: start ${start} is after end ${endExclusive}.`);
		}
	}

	get isEmpty(): boolean {
		return this.start === this.endExclusive;
	}

	get length(): number {
		return this.endExclusive - this.start;
	}

	public delta(offset: number): OffsetRange {
		return new OffsetRange(this.start + offset, this.endExclusive + offset);
	}

	public deltaStart(offset: number): OffsetRange {
		return new OffsetRange(this.start + offset, this.endExclusive);
	}

	public deltaEnd(offset: number): OffsetRange {
		return new OffsetRange(this.start, this.endExclusive + offset);
	}

	public contains(offset: number): boolean {
		return this.start <= offset && offset < this.endExclusive;
	}

	/** The smallest range containing both ranges. */
	public join(other: OffsetRange): OffsetRange {
		return new OffsetRange(Math.min(this.start, other.start), Math.max(this.endExclusive, other.endExclusive));
	}

	/** The overlap of both ranges, or undefined if they are disjoint. Touching ranges yield an empty range. */
	public intersect(other: OffsetRange): OffsetRange | undefined {
		const start = Math.max(this.start, other.start);
		const end = Math.min(this.endExclusive, other.endExclusive);
		if (start <= end) {
			return new OffsetRange(start, end);
		}
		return undefined;
	}

	/** True if the ranges share at least one offset. */
	public intersects(other: OffsetRange): boolean {
		return Math.max(this.start, other.start) < Math.min(this.endExclusive, other.endExclusive);
	}

	public equals(other: OffsetRange): boolean {
		return this.start === other.start && this.endExclusive === other.endExclusive;
	}

	public toString(): string {
		return `[${this.start}, ${this.endExclusive})`;
	}
}

/**
 * A point in the edit graph: an offset into each of the two sequences.
 */
export class OffsetPair {
	public static readonly zero = new OffsetPair(0, 0);
	public static readonly max = new OffsetPair(Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER);

	constructor(public readonly offset1: number, public readonly offset2: number) { }

	public delta(offset: number): OffsetPair {
		if (offset === 0) {
			return this;
		}
		return new OffsetPair(this.offset1 + offset, this.offset2 + offset);
	}

	public equals(other: OffsetPair): boolean {
		return this.offset1 === other.offset1 && this.offset2 === other.offset2;
	}

	public toString(): string {
		return `${this.offset1} <-> ${this.offset2}`;
	}
}

/**
 * Calls `f` for every pair of neighbours, including `(undefined, first)` and `(last, undefined)`.
 */
export function forEachAdjacent<T>(arr: readonly T[], f: (item1: T | undefined, item2: T | undefined) => void): void {
	for (let i = 0; i <= arr.length; i++) {
		f(i === 0 ? undefined : arr[i - 1], i === arr.length ? undefined : arr[i]);
	}
}

/**
 * Calls `f` for every element together with its previous and next element.
 */
export function forEachWithNeighbors<T>(arr: readonly T[], f: (before: T | undefined, element: T, after: T | undefined) => void): void {
	for (let i = 0; i < arr.length; i++) {
		f(i === 0 ? undefined : arr[i - 1], arr[i], i + 1 === arr.length ? undefined : arr[i + 1]);
	}
}

/**
 * A changed region: `seq1Range` in the first sequence is replaced by `seq2Range` in the second.
 * One side may be empty (pure insertion or deletion), never both in a finished result.
 */
export class SequenceDiff {
	/**
	 * Returns the unchanged regions between the given diffs, including the leading and trailing ones.
	 */
	public static invert(sequenceDiffs: readonly SequenceDiff[], doc1Length: number): SequenceDiff[] {
		const result: SequenceDiff[] = [];
		forEachAdjacent(sequenceDiffs, (a, b) => {
			result.push(SequenceDiff.fromOffsetPairs(
				a ? a.getEndExclusives() : OffsetPair.zero,
				b ? b.getStarts() : new OffsetPair(doc1Length, (a ? a.seq2Range.endExclusive - a.seq1Range.endExclusive : 0) + doc1Length),
			));
		});
		return result;
	}

	public static fromOffsetPairs(start: OffsetPair, endExclusive: OffsetPair): SequenceDiff {
		return new SequenceDiff(
			new OffsetRange(start.offset1, endExclusive.offset1),
			new OffsetRange(start.offset2, endExclusive.offset2),
		);
	}

	/**
	 * Throws unless the diffs are strictly ordered on both sides and none of them is a no-op.
	 */
	public static assertSorted(sequenceDiffs: readonly SequenceDiff[]): void {
		let last: SequenceDiff | undefined;
		for (const cur of sequenceDiffs) {
			if (cur.seq1Range.isEmpty && cur.seq2Range.isEmpty) {
				throw new Error(`[SequenceDiff] Empty diff ${cur.toString()}.`);
			}
			if (last && !(last.seq1Range.endExclusive <= cur.seq1Range.start && last.seq2Range.endExclusive <= cur.seq2Range.start)) {
				throw new Error(`[SequenceDiff] Diffs are not sorted: ${last.toString()} before ${cur.toString()}.`);
			}
			last = cur;
		}
	}

	constructor(
		public readonly seq1Range: OffsetRange,
		public readonly seq2Range: OffsetRange,
	) { }

	public swap(): SequenceDiff {
		return new SequenceDiff(this.seq2Range, this.seq1Range);
	}

	public join(other: SequenceDiff): SequenceDiff {
		return new SequenceDiff(this.seq1Range.join(other.seq1Range), this.seq2Range.join(other.seq2Range));
	}

	public delta(offset: number): SequenceDiff {
		if (offset === 0) {
			return this;
		}
		return new SequenceDiff(this.seq1Range.delta(offset), this.seq2Range.delta(offset));
	}

	public deltaStart(offset: number): SequenceDiff {
		if (offset === 0) {
			return this;
		}
		return new SequenceDiff(this.seq1Range.deltaStart(offset), this.seq2Range.deltaStart(offset));
	}

	public deltaEnd(offset: number): SequenceDiff {
		if (offset === 0) {
			return this;
		}
		return new SequenceDiff(this.seq1Range.deltaEnd(offset), this.seq2Range.deltaEnd(offset));
	}

	public intersect(other: SequenceDiff): SequenceDiff | undefined {
		const i1 = this.seq1Range.intersect(other.seq1Range);
		const i2 = this.seq2Range.intersect(other.seq2Range);
		if (!i1 || !i2) {
			return undefined;
		}
		return new SequenceDiff(i1, i2);
	}

	public getStarts(): OffsetPair {
		return new OffsetPair(this.seq1Range.start, this.seq2Range.start);
	}

	public getEndExclusives(): OffsetPair {
		return new OffsetPair(this.seq1Range.endExclusive, this.seq2Range.endExclusive);
	}

	public toString(): string {
		return `${this.seq1Range.toString()} <-> ${this.seq2Range.toString()}`;
	}
}

/**
 * The output of a diff algorithm. `hitTimeout` marks the whole-range fallback.
 */
export class DiffAlgorithmResult {
	/** A single diff covering both sequences entirely, or nothing when both are empty. */
	public static trivial(seq1: ISequence, seq2: ISequence): DiffAlgorithmResult {
		return new DiffAlgorithmResult(DiffAlgorithmResult.wholeRange(seq1, seq2), false);
	}

	public static trivialTimedOut(seq1: ISequence, seq2: ISequence): DiffAlgorithmResult {
		return new DiffAlgorithmResult(DiffAlgorithmResult.wholeRange(seq1, seq2), true);
	}

	private static wholeRange(seq1: ISequence, seq2: ISequence): SequenceDiff[] {
		if (seq1.length === 0 && seq2.length === 0) {
			return [];
		}
		return [new SequenceDiff(OffsetRange.ofLength(seq1.length), OffsetRange.ofLength(seq2.length))];
	}

	constructor(
		public readonly diffs: SequenceDiff[],
		public readonly hitTimeout: boolean,
	) { }
}

/**
 * A diff algorithm over two abstract sequences.
 */
export interface IDiffAlgorithm {
	compute(sequence1: ISequence, sequence2: ISequence, timeout?: ITimeout): DiffAlgorithmResult;
}

/**
 * One element per line. Elements are perfect-hash ids of the trimmed line text,
 * so lines differing only in leading/trailing whitespace compare as equal.
 */
export class LineSequence implements ISequence {
	constructor(
		private readonly trimmedHash: ArrayLike<number>,
		private readonly lines: readonly string[],
	) {
		if (trimmedHash.length !== lines.length) {
			throw new Error(`[LineSequence] Got ${trimmedHash.length} hashes for ${lines.length} lines.`);
		}
	}

	getElement(offset: number): number {
		return this.trimmedHash[offset];
	}

	get length(): number {
		return this.trimmedHash.length;
	}

	/**
	 * Boundaries between lines with little indentation score higher,
	 * so inserted blocks settle next to blank or top-level lines.
	 */
	getBoundaryScore(length: number): number {
		const indentationBefore = length === 0 ? 0 : getIndentation(this.lines[length - 1]);
		const indentationAfter = length === this.lines.length ? 0 : getIndentation(this.lines[length]);
		return 1000 - (indentationBefore + indentationAfter);
	}

	getText(range: OffsetRange): string {
		return this.lines.slice(range.start, range.endExclusive).join('\n');
	}

	isStronglyEqual(offset1: number, offset2: number): boolean {
		return this.lines[offset1] === this.lines[offset2];
	}
}

function getIndentation(str: string): number {
	let i = 0;
	while (i < str.length && (str.charCodeAt(i) === 32 /* space */ || str.charCodeAt(i) === 9 /* tab */)) {
		i++;
	}
	return i;
}
