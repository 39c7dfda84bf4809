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

/** Marks "no snake recorded yet" in the path arena. */
const NO_PATH = -1;

/**
 * Backing store for the snake records of one Myers run.
 * A snake is a maximal run of equal elements starting at (x, y);
 * each record points at the snake that preceded it on its path.
 * Records are addressed by index and released together with the arena.
 * @internal
 */
class SnakePathArena {
	public readonly prev: number[] = [];
	public readonly x: number[] = [];
	public readonly y: number[] = [];
	public readonly length: number[] = [];

	public push(prev: number, x: number, y: number, length: number): number {
		this.prev.push(prev);
		this.x.push(x);
		this.y.push(y);
		this.length.push(length);
		return this.prev.length - 1;
	}

	get size(): number {
		return this.prev.length;
	}
}

/**
 * The greedy O(ND) shortest-edit-script algorithm by E. Myers.
 *
 * For every edit distance `d = 1, 2, ...` it keeps, per diagonal `k = x - y`,
 * the furthest x reachable with exactly `d` non-diagonal moves (`v[k + offset]`),
 * and the last snake on that path (`paths[k + offset]`). The diagonal range is
 * clipped to the diagonals that can still influence the result, so every index
 * lies in `[-(lenB + 1), lenA + 1]` and one flat buffer of `lenA + lenB + 3`
 * entries suffices.
 *
 * The timeout is polled once per `d`. On expiry the search is abandoned and a
 * single diff covering both sequences is returned with `hitTimeout` set.
 *
 * @example
 * ```typescript
 * const myers = new MyersDiffAlgorithm();
 * const { diffs, hitTimeout } = myers.compute(seqA, seqB, timeoutFromMs(1000));
 * ```
 */
export class MyersDiffAlgorithm implements IDiffAlgorithm {
	/**
	 * Computes the shortest edit script between two sequences.
	 *
	 * @param seq1 - The sequence on the x axis.
	 * @param seq2 - The sequence on the y axis.
	 * @param timeout - Polled once per edit distance.
	 * @param debug - Enables verbose logging in dev builds.
	 * @returns Diffs sorted by offset, never touching each other.
	 */
	public compute(
		seq1: ISequence,
		seq2: ISequence,
		timeout: ITimeout = InfiniteTimeout.instance,
		debug: boolean = false
	): DiffAlgorithmResult {
		if (seq1.length === 0 || seq2.length === 0) {
			return DiffAlgorithmResult.trivial(seq1, seq2);
		}

		const lenX = seq1.length;
		const lenY = seq2.length;

		if (__DEV__ && debug) {
			console.group(`[MyersDiffAlgorithm] START lenX=${lenX}, lenY=${lenY}`);
		}

		const getXAfterSnake = (x: number, y: number): number => {
			while (x < lenX && y < lenY && seq1.getElement(x) === seq2.getElement(y)) {
				x++;
				y++;
			}
			return x;
		};

		const offset = lenY + 1;
		const v = new Int32Array(lenX + lenY + 3);
		const paths = new Int32Array(lenX + lenY + 3).fill(NO_PATH);
		const arena = new SnakePathArena();

		v[offset] = getXAfterSnake(0, 0);
		paths[offset] = v[offset] === 0 ? NO_PATH : arena.push(NO_PATH, 0, 0, v[offset]);

		let d = 0;
		let k = 0;

		loop: while (true) {
			d++;
			if (!timeout.isValid()) {
				if (__DEV__ && debug) {
					console.log(`[MyersDiffAlgorithm] Timeout at d=${d}, returning whole-range diff.`);
					console.groupEnd();
				}
				return DiffAlgorithmResult.trivialTimedOut(seq1, seq2);
			}

			// Diagonals outside this window cannot reach (lenX, lenY) any more.
			const lowerBound = -Math.min(d, lenY + (d % 2));
			const upperBound = Math.min(d, lenX + (d % 2));
			for (k = lowerBound; k <= upperBound; k += 2) {
				// From diagonal k + 1 by a vertical move, or from k - 1 by a horizontal move.
				const maxXofDLineTop = k === upperBound ? -1 : v[k + 1 + offset];
				const maxXofDLineLeft = k === lowerBound ? -1 : v[k - 1 + offset] + 1;
				const x = Math.min(Math.max(maxXofDLineTop, maxXofDLineLeft), lenX);
				const y = x - k;
				if (x > lenX || y > lenY) {
					continue;
				}
				const newMaxX = getXAfterSnake(x, y);
				v[k + offset] = newMaxX;
				const lastPath = x === maxXofDLineTop ? paths[k + 1 + offset] : paths[k - 1 + offset];
				paths[k + offset] = newMaxX !== x ? arena.push(lastPath, x, y, newMaxX - x) : lastPath;

				if (newMaxX === lenX && newMaxX - k === lenY) {
					break loop;
				}
			}
		}

		if (__DEV__ && debug) {
			console.log(`[MyersDiffAlgorithm] Reached (${lenX}, ${lenY}) at d=${d} with ${arena.size} snakes.`);
		}

		// Walk the snakes backwards; every gap between two snakes is a diff.
		const result: SequenceDiff[] = [];
		let path = paths[k + offset];
		let lastAligningPosS1 = lenX;
		let lastAligningPosS2 = lenY;

		while (true) {
			const endX = path === NO_PATH ? 0 : arena.x[path] + arena.length[path];
			const endY = path === NO_PATH ? 0 : arena.y[path] + arena.length[path];

			if (endX !== lastAligningPosS1 || endY !== lastAligningPosS2) {
				result.push(new SequenceDiff(
					new OffsetRange(endX, lastAligningPosS1),
					new OffsetRange(endY, lastAligningPosS2),
				));
			}
			if (path === NO_PATH) {
				break;
			}
			lastAligningPosS1 = arena.x[path];
			lastAligningPosS2 = arena.y[path];
			path = arena.prev[path];
		}

		result.reverse();

		if (__DEV__ && debug) {
			console.log(`[MyersDiffAlgorithm] FINISH with ${result.length} diffs:`, result.map(r => r.toString()));
			console.groupEnd();
		}

		return new DiffAlgorithmResult(result, false);
	}
}
