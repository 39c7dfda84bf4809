/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import type { LinesSliceCharSequence } from './char_sequence.js';
import {
	forEachWithNeighbors,
	OffsetPair,
	OffsetRange,
	SequenceDiff,
	type ISequence,
	type LineSequence,
} from './sequence.js';

/** Boundary shifting never looks further than this in either direction. */
const MAX_SHIFT_LIMIT = 100;

/**
 * A sequence that can score diff boundaries.
 */
interface IScoredSequence extends ISequence {
	getBoundaryScore(length: number): number;
}

function hasBoundaryScore(sequence: ISequence): sequence is IScoredSequence {
	return typeof sequence.getBoundaryScore === 'function';
}

/**
 * Turns a minimal edit script into a more readable one of the same size:
 * joins insertions/deletions that can slide into a neighbour (twice, since a
 * join can enable another), then slides the remaining ones to the position
 * with the best boundary score.
 *
 * The input list is consumed; use the returned list.
 */
export function optimizeSequenceDiffs(sequence1: ISequence, sequence2: ISequence, sequenceDiffs: SequenceDiff[]): SequenceDiff[] {
	let result = sequenceDiffs;
	result = joinSequenceDiffsByShifting(sequence1, sequence2, result);
	result = joinSequenceDiffsByShifting(sequence1, sequence2, result);
	result = shiftSequenceDiffs(sequence1, sequence2, result);
	return result;
}

/**
 * Fixes diffs like this one:
 * ```
 * import { Baz, Bar } from "foo";
 * import { Baz, Bar, Foo } from "foo";
 * ```
 * Computed: add "," after "Bar", add "Foo " after the space.
 * Joined: add ", Foo" after "Bar".
 */
export function joinSequenceDiffsByShifting(sequence1: ISequence, sequence2: ISequence, sequenceDiffs: SequenceDiff[]): SequenceDiff[] {
	if (sequenceDiffs.length === 0) {
		return sequenceDiffs;
	}

	const result: SequenceDiff[] = [];
	result.push(sequenceDiffs[0]);

	// Move every insertion/deletion as far left as it goes, joining it with its predecessor when they meet.
	for (let i = 1; i < sequenceDiffs.length; i++) {
		const prevResult = result[result.length - 1];
		let cur = sequenceDiffs[i];

		if (cur.seq1Range.isEmpty || cur.seq2Range.isEmpty) {
			const length = cur.seq1Range.start - prevResult.seq1Range.endExclusive;
			let d;
			for (d = 1; d <= length; d++) {
				if (
					sequence1.getElement(cur.seq1Range.start - d) !== sequence1.getElement(cur.seq1Range.endExclusive - d) ||
					sequence2.getElement(cur.seq2Range.start - d) !== sequence2.getElement(cur.seq2Range.endExclusive - d)) {
					break;
				}
			}
			d--;

			if (d === length) {
				result[result.length - 1] = new SequenceDiff(
					new OffsetRange(prevResult.seq1Range.start, cur.seq1Range.endExclusive - length),
					new OffsetRange(prevResult.seq2Range.start, cur.seq2Range.endExclusive - length),
				);
				continue;
			}

			cur = cur.delta(-d);
		}

		result.push(cur);
	}

	// Then move them right, joining with the successor when they meet.
	const result2: SequenceDiff[] = [];
	for (let i = 0; i < result.length - 1; i++) {
		const nextResult = result[i + 1];
		let cur = result[i];

		if (cur.seq1Range.isEmpty || cur.seq2Range.isEmpty) {
			const length = nextResult.seq1Range.start - cur.seq1Range.endExclusive;
			let d;
			for (d = 0; d < length; d++) {
				if (
					!sequence1.isStronglyEqual(cur.seq1Range.start + d, cur.seq1Range.endExclusive + d) ||
					!sequence2.isStronglyEqual(cur.seq2Range.start + d, cur.seq2Range.endExclusive + d)
				) {
					break;
				}
			}

			if (d === length) {
				result[i + 1] = new SequenceDiff(
					new OffsetRange(cur.seq1Range.start + length, nextResult.seq1Range.endExclusive),
					new OffsetRange(cur.seq2Range.start + length, nextResult.seq2Range.endExclusive),
				);
				continue;
			}

			if (d > 0) {
				cur = cur.delta(d);
			}
		}

		result2.push(cur);
	}

	if (result.length > 0) {
		result2.push(result[result.length - 1]);
	}

	return result2;
}

/**
 * Slides every insertion/deletion to its best-scored position, e.g.
 * ```
 * import { I[Arr, I]Bar } from "foo";
 * ```
 * becomes
 * ```
 * import { [IArr, ]IBar } from "foo";
 * ```
 * Diffs never move into or next to their neighbours.
 */
export function shiftSequenceDiffs(sequence1: ISequence, sequence2: ISequence, sequenceDiffs: SequenceDiff[]): SequenceDiff[] {
	if (!hasBoundaryScore(sequence1) || !hasBoundaryScore(sequence2)) {
		return sequenceDiffs;
	}

	for (let i = 0; i < sequenceDiffs.length; i++) {
		const prevDiff = i > 0 ? sequenceDiffs[i - 1] : undefined;
		const diff = sequenceDiffs[i];
		const nextDiff = i + 1 < sequenceDiffs.length ? sequenceDiffs[i + 1] : undefined;

		const seq1ValidRange = new OffsetRange(prevDiff ? prevDiff.seq1Range.endExclusive + 1 : 0, nextDiff ? nextDiff.seq1Range.start - 1 : sequence1.length);
		const seq2ValidRange = new OffsetRange(prevDiff ? prevDiff.seq2Range.endExclusive + 1 : 0, nextDiff ? nextDiff.seq2Range.start - 1 : sequence2.length);

		if (diff.seq1Range.isEmpty) {
			sequenceDiffs[i] = shiftDiffToBetterPosition(diff, sequence1, sequence2, seq1ValidRange, seq2ValidRange);
		} else if (diff.seq2Range.isEmpty) {
			sequenceDiffs[i] = shiftDiffToBetterPosition(diff.swap(), sequence2, sequence1, seq2ValidRange, seq1ValidRange).swap();
		}
	}

	return sequenceDiffs;
}

/**
 * Shifts an insertion (empty `seq1Range`) within the valid ranges to the
 * position where the boundaries score highest. The leftmost best position wins.
 */
function shiftDiffToBetterPosition(
	diff: SequenceDiff,
	sequence1: IScoredSequence,
	sequence2: IScoredSequence,
	seq1ValidRange: OffsetRange,
	seq2ValidRange: OffsetRange,
): SequenceDiff {
	let deltaBefore = 1;
	while (
		diff.seq1Range.start - deltaBefore >= seq1ValidRange.start &&
		diff.seq2Range.start - deltaBefore >= seq2ValidRange.start &&
		sequence2.isStronglyEqual(diff.seq2Range.start - deltaBefore, diff.seq2Range.endExclusive - deltaBefore) &&
		deltaBefore < MAX_SHIFT_LIMIT
	) {
		deltaBefore++;
	}
	deltaBefore--;

	let deltaAfter = 0;
	while (
		diff.seq1Range.start + deltaAfter < seq1ValidRange.endExclusive &&
		diff.seq2Range.endExclusive + deltaAfter < seq2ValidRange.endExclusive &&
		sequence2.isStronglyEqual(diff.seq2Range.start + deltaAfter, diff.seq2Range.endExclusive + deltaAfter) &&
		deltaAfter < MAX_SHIFT_LIMIT
	) {
		deltaAfter++;
	}

	if (deltaBefore === 0 && deltaAfter === 0) {
		return diff;
	}

	let bestDelta = 0;
	let bestScore = -1;
	for (let delta = -deltaBefore; delta <= deltaAfter; delta++) {
		const seq2OffsetStart = diff.seq2Range.start + delta;
		const seq2OffsetEndExclusive = diff.seq2Range.endExclusive + delta;
		const seq1Offset = diff.seq1Range.start + delta;

		const score = sequence1.getBoundaryScore(seq1Offset)
			+ sequence2.getBoundaryScore(seq2OffsetStart)
			+ sequence2.getBoundaryScore(seq2OffsetEndExclusive);
		if (score > bestScore) {
			bestScore = score;
			bestDelta = delta;
		}
	}

	return diff.delta(bestDelta);
}

/**
 * Joins neighbouring diffs separated by at most 2 elements in either sequence.
 */
export function removeShortMatches(sequence1: ISequence, sequence2: ISequence, sequenceDiffs: readonly SequenceDiff[]): SequenceDiff[] {
	const result: SequenceDiff[] = [];
	for (const s of sequenceDiffs) {
		const last = result[result.length - 1];
		if (!last) {
			result.push(s);
			continue;
		}

		if (s.seq1Range.start - last.seq1Range.endExclusive <= 2 || s.seq2Range.start - last.seq2Range.endExclusive <= 2) {
			result[result.length - 1] = new SequenceDiff(last.seq1Range.join(s.seq1Range), last.seq2Range.join(s.seq2Range));
		} else {
			result.push(s);
		}
	}

	return result;
}

/**
 * Widens diffs to whole words (as found by `findParent`) when most of a word
 * changed anyway. With `force`, any partially changed word is widened.
 */
export function extendDiffsToEntireWordIfAppropriate(
	sequence1: LinesSliceCharSequence,
	sequence2: LinesSliceCharSequence,
	sequenceDiffs: readonly SequenceDiff[],
	findParent: (seq: LinesSliceCharSequence, idx: number) => OffsetRange | undefined,
	force: boolean = false,
): SequenceDiff[] {
	const equalMappings = SequenceDiff.invert(sequenceDiffs, sequence1.length);

	const additional: SequenceDiff[] = [];

	let lastPoint = new OffsetPair(0, 0);

	const scanWord = (pair: OffsetPair, equalMapping: SequenceDiff): void => {
		if (pair.offset1 < lastPoint.offset1 || pair.offset2 < lastPoint.offset2) {
			return;
		}

		const w1 = findParent(sequence1, pair.offset1);
		const w2 = findParent(sequence2, pair.offset2);
		if (!w1 || !w2) {
			return;
		}
		let w = new SequenceDiff(w1, w2);
		const equalPart = w.intersect(equalMapping);

		let equalChars1 = equalPart ? equalPart.seq1Range.length : 0;
		let equalChars2 = equalPart ? equalPart.seq2Range.length : 0;

		// The word cannot reach back into equal regions that were already scanned,
		// but it may extend into the following ones.
		while (equalMappings.length > 0) {
			const next = equalMappings[0];
			const intersects = next.seq1Range.intersects(w.seq1Range) || next.seq2Range.intersects(w.seq2Range);
			if (!intersects) {
				break;
			}

			const v1 = findParent(sequence1, next.seq1Range.start);
			const v2 = findParent(sequence2, next.seq2Range.start);
			if (!v1 || !v2) {
				break;
			}
			const v = new SequenceDiff(v1, v2);
			const nextEqualPart = v.intersect(next);

			equalChars1 += nextEqualPart ? nextEqualPart.seq1Range.length : 0;
			equalChars2 += nextEqualPart ? nextEqualPart.seq2Range.length : 0;

			w = w.join(v);

			if (w.seq1Range.endExclusive >= next.seq1Range.endExclusive) {
				equalMappings.shift();
			} else {
				break;
			}
		}

		const wordLength = w.seq1Range.length + w.seq2Range.length;
		if ((force && equalChars1 + equalChars2 < wordLength) || equalChars1 + equalChars2 < wordLength * 2 / 3) {
			additional.push(w);
		}

		lastPoint = w.getEndExclusives();
	};

	let next: SequenceDiff | undefined;
	while ((next = equalMappings.shift()) !== undefined) {
		if (next.seq1Range.isEmpty) {
			continue;
		}
		scanWord(next.getStarts(), next);
		// The equal region is not empty, so its last element is equal on both sides.
		scanWord(next.getEndExclusives().delta(-1), next);
	}

	return mergeSequenceDiffs(sequenceDiffs, additional);
}

/**
 * Merges two sorted diff lists, joining entries that overlap or touch in sequence 1.
 */
function mergeSequenceDiffs(sequenceDiffs1: readonly SequenceDiff[], sequenceDiffs2: readonly SequenceDiff[]): SequenceDiff[] {
	const result: SequenceDiff[] = [];
	let i1 = 0;
	let i2 = 0;

	while (i1 < sequenceDiffs1.length || i2 < sequenceDiffs2.length) {
		const sd1 = sequenceDiffs1[i1];
		const sd2 = sequenceDiffs2[i2];

		let next: SequenceDiff;
		if (sd1 && (!sd2 || sd1.seq1Range.start < sd2.seq1Range.start)) {
			next = sd1;
			i1++;
		} else {
			next = sd2;
			i2++;
		}

		const last = result[result.length - 1];
		if (last && last.seq1Range.endExclusive >= next.seq1Range.start) {
			result[result.length - 1] = last.join(next);
		} else {
			result.push(next);
		}
	}

	return result;
}

/**
 * Joins two line diffs when the unchanged lines between them hold at most
 * 4 non-whitespace characters and either diff spans more than 5 lines
 * (both sides counted). Repeats until stable, at most 10 extra passes.
 */
export function removeVeryShortMatchingLinesBetweenDiffs(
	sequence1: LineSequence,
	_sequence2: LineSequence,
	sequenceDiffs: SequenceDiff[],
): SequenceDiff[] {
	let diffs = sequenceDiffs;
	if (diffs.length === 0) {
		return diffs;
	}

	let counter = 0;
	let shouldRepeat: boolean;
	do {
		shouldRepeat = false;

		const result: SequenceDiff[] = [diffs[0]];

		for (let i = 1; i < diffs.length; i++) {
			const cur = diffs[i];
			const lastResult = result[result.length - 1];

			const unchangedRange = new OffsetRange(lastResult.seq1Range.endExclusive, cur.seq1Range.start);
			const unchangedTextWithoutWs = sequence1.getText(unchangedRange).replace(/\s/g, '');
			const shouldJoin = unchangedTextWithoutWs.length <= 4
				&& (lastResult.seq1Range.length + lastResult.seq2Range.length > 5 || cur.seq1Range.length + cur.seq2Range.length > 5);

			if (shouldJoin) {
				shouldRepeat = true;
				result[result.length - 1] = lastResult.join(cur);
			} else {
				result.push(cur);
			}
		}

		diffs = result;
	} while (counter++ < 10 && shouldRepeat);

	return diffs;
}

/**
 * Joins character diffs separated by a short, single-line piece of text when
 * the diffs around it are large, then lets large diffs swallow a short
 * remaining prefix/suffix of their first/last line.
 */
export function removeVeryShortMatchingTextBetweenLongDiffs(
	sequence1: LinesSliceCharSequence,
	sequence2: LinesSliceCharSequence,
	sequenceDiffs: SequenceDiff[],
): SequenceDiff[] {
	let diffs = sequenceDiffs;
	if (diffs.length === 0) {
		return diffs;
	}

	// A diff of this weight or more on both sides is "long".
	const max = 2 * 40 + 50;
	const cap = (v: number): number => Math.min(v, max);
	const weight = (lineCount1: number, length1: number, lineCount2: number, length2: number): number =>
		Math.pow(Math.pow(cap(lineCount1 * 40 + length1), 1.5) + Math.pow(cap(lineCount2 * 40 + length2), 1.5), 1.5);
	const threshold = ((max ** 1.5) ** 1.5) * 1.3;

	const shouldJoinDiffs = (before: SequenceDiff, after: SequenceDiff): boolean => {
		const unchangedRange = new OffsetRange(before.seq1Range.endExclusive, after.seq1Range.start);

		const unchangedLineCount = sequence1.countLinesIn(unchangedRange);
		if (unchangedLineCount > 5 || unchangedRange.length > 500) {
			return false;
		}

		const unchangedText = sequence1.getText(unchangedRange).trim();
		if (unchangedText.length > 20 || unchangedText.split(/\r\n|\r|\n/).length > 1) {
			return false;
		}

		const beforeWeight = weight(
			sequence1.countLinesIn(before.seq1Range), before.seq1Range.length,
			sequence2.countLinesIn(before.seq2Range), before.seq2Range.length,
		);
		const afterWeight = weight(
			sequence1.countLinesIn(after.seq1Range), after.seq1Range.length,
			sequence2.countLinesIn(after.seq2Range), after.seq2Range.length,
		);

		return beforeWeight + afterWeight > threshold;
	};

	let counter = 0;
	let shouldRepeat: boolean;
	do {
		shouldRepeat = false;

		const result: SequenceDiff[] = [diffs[0]];

		for (let i = 1; i < diffs.length; i++) {
			const cur = diffs[i];
			const lastResult = result[result.length - 1];

			if (shouldJoinDiffs(lastResult, cur)) {
				shouldRepeat = true;
				result[result.length - 1] = lastResult.join(cur);
			} else {
				result.push(cur);
			}
		}

		diffs = result;
	} while (counter++ < 10 && shouldRepeat);

	const newDiffs: SequenceDiff[] = [];

	// Large diffs absorb short line prefixes and suffixes.
	forEachWithNeighbors(diffs, (prev, cur, next) => {
		let newDiff = cur;

		const shouldMarkAsChanged = (text: string): boolean =>
			text.length > 0 && text.trim().length <= 3 && cur.seq1Range.length + cur.seq2Range.length > 100;

		const fullRange1 = sequence1.extendToFullLines(cur.seq1Range);
		const prefix = sequence1.getText(new OffsetRange(fullRange1.start, cur.seq1Range.start));
		if (shouldMarkAsChanged(prefix)) {
			newDiff = newDiff.deltaStart(-prefix.length);
		}
		const suffix = sequence1.getText(new OffsetRange(cur.seq1Range.endExclusive, fullRange1.endExclusive));
		if (shouldMarkAsChanged(suffix)) {
			newDiff = newDiff.deltaEnd(suffix.length);
		}

		const availableSpace = SequenceDiff.fromOffsetPairs(
			prev ? prev.getEndExclusives() : OffsetPair.zero,
			next ? next.getStarts() : OffsetPair.max,
		);
		const clipped = newDiff.intersect(availableSpace);
		if (!clipped) {
			throw new Error(`[removeVeryShortMatchingTextBetweenLongDiffs] Diff ${cur.toString()} lies outside of its neighbours.`);
		}
		const last = newDiffs[newDiffs.length - 1];
		if (last && clipped.getStarts().equals(last.getEndExclusives())) {
			newDiffs[newDiffs.length - 1] = last.join(clipped);
		} else {
			newDiffs.push(clipped);
		}
	});

	return newDiffs;
}
