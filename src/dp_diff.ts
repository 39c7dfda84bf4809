/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import {
	DiffAlgorithmResult,
	OffsetRange,
	SequenceDiff,
	type IDiffAlgorithm,
	type ISequence,
} from './sequence.js';
import { InfiniteTimeout, type ITimeout } from './timeout.js';

const __DEV__ = false;

/**
 * Scores a match between `sequence1[offset1]` and `sequence2[offset2]`.
 * Only called for pairs whose elements are equal.
 */
export type EqualityScoreFn = (offset1: number, offset2: number) => number;

const enum Direction {
	None = 0,
	/** Skip an element of sequence 1. */
	Horizontal = 1,
	/** Skip an element of sequence 2. */
	Vertical = 2,
	/** Match both elements. */
	Diagonal = 3,
}

/**
 * A dense row-major 2D table backed by a typed array.
 * @internal
 */
class Array2D<T extends Float64Array | Int32Array | Uint8Array> {
	constructor(private readonly data: T, private readonly height: number) { }

	public get(x: number, y: number): number {
		return this.data[x * this.height + y];
	}

	public set(x: number, y: number, value: number): void {
		this.data[x * this.height + y] = value;
	}
}

/**
 * Global alignment by dynamic programming, with a pluggable score for equal pairs.
 *
 * Runs in O(N·M) time and space, so callers only use it below a size threshold.
 * Compared to Myers it can prefer alignments that read better: a run of
 * consecutive matches scores more than the same number of scattered matches,
 * and `equalityScore` can weight some matches (long lines) above others (blank lines).
 *
 * With the default score every equal pair is worth 1.
 */
export class DynamicProgrammingDiffing implements IDiffAlgorithm {
	/**
	 * @param sequence1 - The first sequence.
	 * @param sequence2 - The second sequence.
	 * @param timeout - Polled once per table cell.
	 * @param equalityScore - The score of an equal pair; defaults to 1.
	 * @param debug - Enables verbose logging in dev builds.
	 */
	public compute(
		sequence1: ISequence,
		sequence2: ISequence,
		timeout: ITimeout = InfiniteTimeout.instance,
		equalityScore?: EqualityScoreFn,
		debug: boolean = false
	): DiffAlgorithmResult {
		if (sequence1.length === 0 || sequence2.length === 0) {
			return DiffAlgorithmResult.trivial(sequence1, sequence2);
		}

		const len1 = sequence1.length;
		const len2 = sequence2.length;

		if (__DEV__ && debug) {
			console.group(`[DynamicProgrammingDiffing] START len1=${len1}, len2=${len2}`);
		}

		// lcsLengths(i, j): best score for the prefixes sequence1[0..i] and sequence2[0..j].
		const lcsLengths = new Array2D(new Float64Array(len1 * len2), len2);
		const directions = new Array2D(new Uint8Array(len1 * len2), len2);
		// lengths(i, j): length of the diagonal run ending in (i, j).
		const lengths = new Array2D(new Int32Array(len1 * len2), len2);

		for (let s1 = 0; s1 < len1; s1++) {
			for (let s2 = 0; s2 < len2; s2++) {
				if (!timeout.isValid()) {
					if (__DEV__ && debug) {
						console.log(`[DynamicProgrammingDiffing] Timeout at (${s1}, ${s2}), returning whole-range diff.`);
						console.groupEnd();
					}
					return DiffAlgorithmResult.trivialTimedOut(sequence1, sequence2);
				}

				const horizontalLen = s1 === 0 ? 0 : lcsLengths.get(s1 - 1, s2);
				const verticalLen = s2 === 0 ? 0 : lcsLengths.get(s1, s2 - 1);

				let extendedSeqScore: number;
				if (sequence1.getElement(s1) === sequence2.getElement(s2)) {
					extendedSeqScore = s1 === 0 || s2 === 0 ? 0 : lcsLengths.get(s1 - 1, s2 - 1);
					if (s1 > 0 && s2 > 0 && directions.get(s1 - 1, s2 - 1) === Direction.Diagonal) {
						// Prefer consecutive diagonals
						extendedSeqScore += lengths.get(s1 - 1, s2 - 1);
					}
					extendedSeqScore += equalityScore ? equalityScore(s1, s2) : 1;
				} else {
					extendedSeqScore = -1;
				}

				const newValue = Math.max(horizontalLen, verticalLen, extendedSeqScore);

				if (newValue === extendedSeqScore) {
					const prevLen = s1 > 0 && s2 > 0 ? lengths.get(s1 - 1, s2 - 1) : 0;
					lengths.set(s1, s2, prevLen + 1);
					directions.set(s1, s2, Direction.Diagonal);
				} else if (newValue === horizontalLen) {
					lengths.set(s1, s2, 0);
					directions.set(s1, s2, Direction.Horizontal);
				} else {
					lengths.set(s1, s2, 0);
					directions.set(s1, s2, Direction.Vertical);
				}

				lcsLengths.set(s1, s2, newValue);
			}
		}

		// Backtrack from the bottom-right corner, reporting the gaps between matched pairs.
		const result: SequenceDiff[] = [];
		let lastAligningPosS1 = len1;
		let lastAligningPosS2 = len2;

		const reportDecreasingAligningPositions = (s1: number, s2: number): void => {
			if (s1 + 1 !== lastAligningPosS1 || s2 + 1 !== lastAligningPosS2) {
				result.push(new SequenceDiff(
					new OffsetRange(s1 + 1, lastAligningPosS1),
					new OffsetRange(s2 + 1, lastAligningPosS2),
				));
			}
			lastAligningPosS1 = s1;
			lastAligningPosS2 = s2;
		};

		let s1 = len1 - 1;
		let s2 = len2 - 1;
		while (s1 >= 0 && s2 >= 0) {
			const direction = directions.get(s1, s2);
			if (direction === Direction.Diagonal) {
				reportDecreasingAligningPositions(s1, s2);
				s1--;
				s2--;
			} else if (direction === Direction.Horizontal) {
				s1--;
			} else {
				s2--;
			}
		}
		reportDecreasingAligningPositions(-1, -1);
		result.reverse();

		if (__DEV__ && debug) {
			console.log(`[DynamicProgrammingDiffing] FINISH with ${result.length} diffs:`, result.map(r => r.toString()));
			console.groupEnd();
		}

		return new DiffAlgorithmResult(result, false);
	}
}
