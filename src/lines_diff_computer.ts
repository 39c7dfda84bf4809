/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { LinesSliceCharSequence } from './char_sequence.js';
import { DynamicProgrammingDiffing } from './dp_diff.js';
import {
	extendDiffsToEntireWordIfAppropriate,
	optimizeSequenceDiffs,
	removeShortMatches,
	removeVeryShortMatchingLinesBetweenDiffs,
	removeVeryShortMatchingTextBetweenLongDiffs,
} from './heuristic_optimizations.js';
import { MyersDiffAlgorithm } from './myers_diff.js';
import { PerfectHashTable } from './perfect_hash.js';
import {
	DetailedLineRangeMapping,
	LineRange,
	LineRangeMapping,
	lineRangeMappingFromRangeMappings,
	Range,
	RangeMapping,
	type LinesDiff,
} from './range_mapping.js';
import { LineSequence, OffsetRange, SequenceDiff } from './sequence.js';
import { timeoutFromMs, type ITimeout } from './timeout.js';

const __DEV__ = false;

/** Line sequences shorter than this (both sides together) are aligned by DP. */
export const LINE_DP_THRESHOLD = 1700;
/** Character sequences shorter than this (both sides together) are aligned by DP. */
export const CHAR_DP_THRESHOLD = 500;

/**
 * Configuration options for the diff computation.
 */
export interface DiffOptions {
	/** If true, leading/trailing whitespace changes are not reported. */
	ignoreTrimWhitespace?: boolean;
	/** The time budget for the whole computation; 0 means unbounded. */
	maxComputationTimeMs?: number;
	/** If true, character changes are widened to camelCase subwords. */
	extendToSubwords?: boolean;
}

/**
 * The line-level alignment of two documents.
 */
export interface LineAlignmentResult {
	/** Sorted, non-touching line diffs over 0-based line indices. */
	readonly diffs: SequenceDiff[];
	readonly hitTimeout: boolean;
}

interface RefinedDiff {
	readonly mappings: RangeMapping[];
	readonly hitTimeout: boolean;
}

/**
 * Computes line and character level diffs between two documents given as lines.
 *
 * Pipeline:
 * 1. Lines are hashed by trimmed content through a fresh `PerfectHashTable`.
 * 2. Line sequences are aligned by weighted DP (small inputs) or Myers.
 * 3. The alignment is cleaned up by the shifting heuristics and by joining
 *    diffs separated by near-empty lines.
 * 4. Every line diff is refined to character changes.
 *
 * The computer holds no per-computation state and can be reused.
 *
 * @example
 * ```typescript
 * const computer = new LinesDiffComputer();
 * const { changes, hitTimeout } = computer.computeDiff(
 *   ['const a = 1;'],
 *   ['const b = 1;'],
 *   { ignoreTrimWhitespace: false },
 * );
 * ```
 */
export class LinesDiffComputer {
	public static readonly defaultOptions: Required<DiffOptions> = {
		ignoreTrimWhitespace: true,
		maxComputationTimeMs: 0,
		extendToSubwords: false,
	};

	private readonly dynamicProgrammingDiffing = new DynamicProgrammingDiffing();
	private readonly myersDiffingAlgorithm = new MyersDiffAlgorithm();

	/**
	 * Aligns two documents line by line.
	 *
	 * Lines are compared by trimmed content, so lines that differ only in
	 * leading/trailing whitespace are aligned as equal.
	 *
	 * @param originalLines - The lines of the original document.
	 * @param modifiedLines - The lines of the modified document.
	 * @param timeoutMs - The time budget; 0 means unbounded.
	 * @param debug - Enables verbose logging in dev builds.
	 */
	public computeLineAlignments(
		originalLines: readonly string[],
		modifiedLines: readonly string[],
		timeoutMs: number = 0,
		debug: boolean = false
	): LineAlignmentResult {
		const original = validateLines(originalLines, 'originalLines');
		const modified = validateLines(modifiedLines, 'modifiedLines');
		return this.alignLines(original, modified, timeoutFromMs(validateTimeout(timeoutMs)), debug);
	}

	/**
	 * Refines line diffs to character changes, one `DetailedLineRangeMapping`
	 * per line diff, and reports whether any refinement ran out of time.
	 *
	 * @param lineDiffs - Sorted line diffs over 0-based line indices, e.g. from `computeLineAlignments`.
	 * @param originalLines - The lines of the original document.
	 * @param modifiedLines - The lines of the modified document.
	 * @param options - Whitespace, subword and time budget options.
	 * @param debug - Enables verbose logging in dev builds.
	 */
	public refineToCharacterLevel(
		lineDiffs: readonly SequenceDiff[],
		originalLines: readonly string[],
		modifiedLines: readonly string[],
		options?: DiffOptions,
		debug: boolean = false
	): LinesDiff {
		const config = resolveOptions(options);
		const original = validateLines(originalLines, 'originalLines');
		const modified = validateLines(modifiedLines, 'modifiedLines');
		validateLineDiffs(lineDiffs, original.length, modified.length);

		const timeout = timeoutFromMs(config.maxComputationTimeMs);
		const considerWhitespaceChanges = !config.ignoreTrimWhitespace;

		let hitTimeout = false;
		const changes = lineDiffs.map(diff => {
			// With a document that has no lines, the only valid diff covers the whole other document.
			const refined: RefinedDiff = original.length === 0 || modified.length === 0
				? { mappings: [new RangeMapping(wholeDocumentRange(original), wholeDocumentRange(modified))], hitTimeout: false }
				: this.refineDiff(original, modified, diff, timeout, considerWhitespaceChanges, config.extendToSubwords, debug);
			if (refined.hitTimeout) {
				hitTimeout = true;
			}
			return new DetailedLineRangeMapping(
				new LineRange(diff.seq1Range.start + 1, diff.seq1Range.endExclusive + 1),
				new LineRange(diff.seq2Range.start + 1, diff.seq2Range.endExclusive + 1),
				refined.mappings,
			);
		});

		return { changes, hitTimeout };
	}

	/**
	 * Computes the full diff: line alignment, character refinement and, unless
	 * whitespace is ignored, changes on aligned lines that differ only in
	 * leading/trailing whitespace. Character changes on touching lines are
	 * grouped into one line change.
	 *
	 * @param originalLines - The lines of the original document.
	 * @param modifiedLines - The lines of the modified document.
	 * @param options - Optional configuration, merged over `defaultOptions`.
	 * @param debug - Enables verbose logging in dev builds.
	 */
	public computeDiff(
		originalLines: readonly string[],
		modifiedLines: readonly string[],
		options?: DiffOptions,
		debug: boolean = false
	): LinesDiff {
		const config = resolveOptions(options);
		const original = asDocument(validateLines(originalLines, 'originalLines'));
		const modified = asDocument(validateLines(modifiedLines, 'modifiedLines'));

		if (__DEV__ && debug) {
			console.group(`[LinesDiffComputer] computeDiff START (${original.length} vs ${modified.length} lines)`);
			console.log(`Options:`, config);
		}

		if (original.length <= 1 && arraysEqual(original, modified)) {
			if (__DEV__ && debug) {
				console.log(`[LinesDiffComputer] Identical single-line documents.`);
				console.groupEnd();
			}
			return { changes: [], hitTimeout: false };
		}

		if ((original.length === 1 && original[0].length === 0) || (modified.length === 1 && modified[0].length === 0)) {
			if (__DEV__ && debug) {
				console.log(`[LinesDiffComputer] One document is empty, reporting a whole-document change.`);
				console.groupEnd();
			}
			return {
				changes: [
					new DetailedLineRangeMapping(
						new LineRange(1, original.length + 1),
						new LineRange(1, modified.length + 1),
						[new RangeMapping(wholeDocumentRange(original), wholeDocumentRange(modified))],
					),
				],
				hitTimeout: false,
			};
		}

		const timeout = timeoutFromMs(config.maxComputationTimeMs);
		const considerWhitespaceChanges = !config.ignoreTrimWhitespace;

		const lineAlignment = this.alignLines(original, modified, timeout, debug);
		let hitTimeout = lineAlignment.hitTimeout;

		const alignments: RangeMapping[] = [];
		let seq1LastStart = 0;
		let seq2LastStart = 0;

		// Aligned lines compare equal after trimming; refine the ones whose raw text differs.
		const scanForWhitespaceChanges = (equalLinesCount: number): void => {
			if (!considerWhitespaceChanges) {
				return;
			}
			for (let i = 0; i < equalLinesCount; i++) {
				const seq1Offset = seq1LastStart + i;
				const seq2Offset = seq2LastStart + i;
				if (original[seq1Offset] !== modified[seq2Offset]) {
					const characterDiffs = this.refineDiff(original, modified, new SequenceDiff(
						new OffsetRange(seq1Offset, seq1Offset + 1),
						new OffsetRange(seq2Offset, seq2Offset + 1),
					), timeout, considerWhitespaceChanges, config.extendToSubwords, debug);
					alignments.push(...characterDiffs.mappings);
					if (characterDiffs.hitTimeout) {
						hitTimeout = true;
					}
				}
			}
		};

		for (const diff of lineAlignment.diffs) {
			scanForWhitespaceChanges(diff.seq1Range.start - seq1LastStart);
			seq1LastStart = diff.seq1Range.endExclusive;
			seq2LastStart = diff.seq2Range.endExclusive;

			const characterDiffs = this.refineDiff(original, modified, diff, timeout, considerWhitespaceChanges, config.extendToSubwords, debug);
			if (characterDiffs.hitTimeout) {
				hitTimeout = true;
			}
			alignments.push(...characterDiffs.mappings);
		}

		scanForWhitespaceChanges(original.length - seq1LastStart);

		const changes = lineRangeMappingFromRangeMappings(alignments, original, modified);

		if (__DEV__ && debug) {
			console.log(`[LinesDiffComputer] computeDiff FINISH: ${changes.length} changes, hitTimeout=${hitTimeout}`);
			console.groupEnd();
		}

		return { changes, hitTimeout };
	}

	/**
	 * Hashes, aligns and optimizes the line sequences.
	 * The hash table lives only for the duration of this call.
	 */
	private alignLines(
		originalLines: readonly string[],
		modifiedLines: readonly string[],
		timeout: ITimeout,
		debug: boolean
	): LineAlignmentResult {
		const perfectHashes = new PerfectHashTable();
		const sequence1 = new LineSequence(perfectHashes.hashAll(originalLines.map(l => l.trim())), originalLines);
		const sequence2 = new LineSequence(perfectHashes.hashAll(modifiedLines.map(l => l.trim())), modifiedLines);

		const useDp = sequence1.length + sequence2.length < LINE_DP_THRESHOLD;

		if (__DEV__ && debug) {
			console.log(`[alignLines] ${perfectHashes.size} distinct trimmed lines, using ${useDp ? 'DP' : 'Myers'}.`);
		}

		const lineAlignmentResult = useDp
			? this.dynamicProgrammingDiffing.compute(sequence1, sequence2, timeout, (offset1, offset2) =>
				originalLines[offset1] === modifiedLines[offset2]
					? modifiedLines[offset2].length === 0 ? 0.1 : 1 + Math.log(1 + modifiedLines[offset2].length)
					: 0.99, debug)
			: this.myersDiffingAlgorithm.compute(sequence1, sequence2, timeout, debug);

		let diffs = lineAlignmentResult.diffs;
		diffs = optimizeSequenceDiffs(sequence1, sequence2, diffs);
		diffs = removeVeryShortMatchingLinesBetweenDiffs(sequence1, sequence2, diffs);

		if (__DEV__ && debug) {
			console.log(`[alignLines] Line diffs:`, diffs.map(d => d.toString()));
		}

		return { diffs, hitTimeout: lineAlignmentResult.hitTimeout };
	}

	/**
	 * Diffs the characters of one line diff and translates the result to document ranges.
	 */
	private refineDiff(
		originalLines: readonly string[],
		modifiedLines: readonly string[],
		diff: SequenceDiff,
		timeout: ITimeout,
		considerWhitespaceChanges: boolean,
		extendToSubwords: boolean,
		debug: boolean
	): RefinedDiff {
		const lineRangeMapping = new LineRangeMapping(
			new LineRange(diff.seq1Range.start + 1, diff.seq1Range.endExclusive + 1),
			new LineRange(diff.seq2Range.start + 1, diff.seq2Range.endExclusive + 1),
		);
		const rangeMapping = lineRangeMapping.toRangeMapping(originalLines, modifiedLines);

		const slice1 = new LinesSliceCharSequence(originalLines, rangeMapping.originalRange, considerWhitespaceChanges);
		const slice2 = new LinesSliceCharSequence(modifiedLines, rangeMapping.modifiedRange, considerWhitespaceChanges);

		const diffResult = slice1.length + slice2.length < CHAR_DP_THRESHOLD
			? this.dynamicProgrammingDiffing.compute(slice1, slice2, timeout, undefined, debug)
			: this.myersDiffingAlgorithm.compute(slice1, slice2, timeout, debug);

		let diffs = diffResult.diffs;
		diffs = optimizeSequenceDiffs(slice1, slice2, diffs);
		diffs = extendDiffsToEntireWordIfAppropriate(slice1, slice2, diffs, (seq, idx) => seq.findWordContaining(idx));
		if (extendToSubwords) {
			diffs = extendDiffsToEntireWordIfAppropriate(slice1, slice2, diffs, (seq, idx) => seq.findSubWordContaining(idx), true);
		}
		diffs = removeShortMatches(slice1, slice2, diffs);
		diffs = removeVeryShortMatchingTextBetweenLongDiffs(slice1, slice2, diffs);

		const mappings = diffs.map(d => new RangeMapping(
			slice1.translateRange(d.seq1Range),
			slice2.translateRange(d.seq2Range),
		));

		if (__DEV__ && debug) {
			console.log(`[refineDiff] ${diff.toString()}: ${slice1.toString()} vs ${slice2.toString()}`);
			console.log(`[refineDiff] Mappings:`, mappings.map(m => m.toString()));
		}

		return { mappings, hitTimeout: diffResult.hitTimeout };
	}
}

/**
 * Aligns two documents line by line; see {@link LinesDiffComputer.computeLineAlignments}.
 */
export function computeLineAlignments(
	linesA: readonly string[],
	linesB: readonly string[],
	timeoutMs: number = 0
): LineAlignmentResult {
	return new LinesDiffComputer().computeLineAlignments(linesA, linesB, timeoutMs);
}

/**
 * Refines line diffs to character changes; see {@link LinesDiffComputer.refineToCharacterLevel}.
 */
export function refineToCharacterLevel(
	lineDiffs: readonly SequenceDiff[],
	linesA: readonly string[],
	linesB: readonly string[],
	options?: DiffOptions
): DetailedLineRangeMapping[] {
	return [...new LinesDiffComputer().refineToCharacterLevel(lineDiffs, linesA, linesB, options).changes];
}

/**
 * Computes the full line and character diff; see {@link LinesDiffComputer.computeDiff}.
 */
export function computeDiff(
	originalLines: readonly string[],
	modifiedLines: readonly string[],
	options?: DiffOptions
): LinesDiff {
	return new LinesDiffComputer().computeDiff(originalLines, modifiedLines, options);
}

function resolveOptions(options: DiffOptions | undefined): Required<DiffOptions> {
	const defaults = LinesDiffComputer.defaultOptions;
	const config: Required<DiffOptions> = {
		ignoreTrimWhitespace: options?.ignoreTrimWhitespace ?? defaults.ignoreTrimWhitespace,
		maxComputationTimeMs: options?.maxComputationTimeMs ?? defaults.maxComputationTimeMs,
		extendToSubwords: options?.extendToSubwords ?? defaults.extendToSubwords,
	};
	validateTimeout(config.maxComputationTimeMs);
	return config;
}

function validateTimeout(timeoutMs: number): number {
	if (typeof timeoutMs !== 'number' || !Number.isFinite(timeoutMs) || timeoutMs < 0) {
		throw new Error(`[LinesDiffComputer] Timeout must be a non-negative number of milliseconds, got ${String(timeoutMs)}.`);
	}
	return timeoutMs;
}

function validateLines(lines: readonly string[], name: string): readonly string[] {
	const value: unknown = lines;
	if (!Array.isArray(value)) {
		throw new Error(`[LinesDiffComputer] ${name} must be an array of strings.`);
	}
	for (let i = 0; i < lines.length; i++) {
		if (typeof lines[i] !== 'string') {
			throw new Error(`[LinesDiffComputer] ${name}[${i}] is not a string.`);
		}
	}
	return lines;
}

/** A document without lines is a single empty line once it is shown. */
function asDocument(lines: readonly string[]): readonly string[] {
	return lines.length === 0 ? [''] : lines;
}

/** The range from the first character of a document to the end of its last line. */
function wholeDocumentRange(lines: readonly string[]): Range {
	const document = asDocument(lines);
	return new Range(1, 1, document.length, document[document.length - 1].length + 1);
}

/**
 * Line diffs must be sorted, inside both documents, and leave equally long
 * unchanged runs on both sides.
 */
function validateLineDiffs(lineDiffs: readonly SequenceDiff[], length1: number, length2: number): void {
	let last1 = 0;
	let last2 = 0;
	for (const diff of lineDiffs) {
		if (diff.seq1Range.start < last1 || diff.seq2Range.start < last2
			|| diff.seq1Range.endExclusive > length1 || diff.seq2Range.endExclusive > length2) {
			throw new Error(`[LinesDiffComputer] Line diff ${diff.toString()} is unsorted or out of range.`);
		}
		if (diff.seq1Range.isEmpty && diff.seq2Range.isEmpty) {
			throw new Error(`[LinesDiffComputer] Line diff ${diff.toString()} is empty.`);
		}
		if (diff.seq1Range.start - last1 !== diff.seq2Range.start - last2) {
			throw new Error(`[LinesDiffComputer] Line diff ${diff.toString()} does not follow an equal run of lines.`);
		}
		last1 = diff.seq1Range.endExclusive;
		last2 = diff.seq2Range.endExclusive;
	}
	if (length1 - last1 !== length2 - last2) {
		throw new Error(`[LinesDiffComputer] Line diffs leave unequal trailing runs (${length1 - last1} vs ${length2 - last2}).`);
	}
}

function arraysEqual(a: readonly string[], b: readonly string[]): boolean {
	if (a.length !== b.length) {
		return false;
	}
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) {
			return false;
		}
	}
	return true;
}
