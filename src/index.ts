// src/index.ts
// version: 1.0.0

/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// Public operations and the diff computer
export {
	LinesDiffComputer,
	computeLineAlignments,
	refineToCharacterLevel,
	computeDiff,
	LINE_DP_THRESHOLD,
	CHAR_DP_THRESHOLD,
	type DiffOptions,
	type LineAlignmentResult,
} from './lines_diff_computer.js';

// Result types
export {
	Position,
	Range,
	LineRange,
	RangeMapping,
	LineRangeMapping,
	DetailedLineRangeMapping,
	lineRangeMappingFromRangeMappings,
	getLineRangeMapping,
	type LinesDiff,
} from './range_mapping.js';

// Sequences
export {
	OffsetRange,
	OffsetPair,
	SequenceDiff,
	DiffAlgorithmResult,
	LineSequence,
	type ISequence,
	type IDiffAlgorithm,
} from './sequence.js';
export { LinesSliceCharSequence, CharBoundaryCategory, getCategory } from './char_sequence.js';
export { PerfectHashTable } from './perfect_hash.js';

// Algorithms
export { MyersDiffAlgorithm } from './myers_diff.js';
export { DynamicProgrammingDiffing, type EqualityScoreFn } from './dp_diff.js';
export {
	optimizeSequenceDiffs,
	joinSequenceDiffsByShifting,
	shiftSequenceDiffs,
	removeShortMatches,
	removeVeryShortMatchingLinesBetweenDiffs,
	extendDiffsToEntireWordIfAppropriate,
	removeVeryShortMatchingTextBetweenLongDiffs,
} from './heuristic_optimizations.js';
export { InfiniteTimeout, DateTimeout, timeoutFromMs, type ITimeout } from './timeout.js';
export {
	utf16ColumnToUtf8Column,
	utf8ColumnToUtf16Column,
	rangeMappingToUtf8,
	type Utf8Range,
	type Utf8RangeMapping,
} from './utf8_columns.js';
