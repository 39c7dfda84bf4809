/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { Buffer } from 'node:buffer';
import type { Range, RangeMapping } from './range_mapping.js';

/**
 * A range whose columns are 1-based UTF-8 byte columns.
 */
export interface Utf8Range {
	startLineNumber: number;
	startByteColumn: number;
	endLineNumber: number;
	endByteColumn: number;
}

export interface Utf8RangeMapping {
	original: Utf8Range;
	modified: Utf8Range;
}

function isHighSurrogate(charCode: number): boolean {
	return charCode >= 0xD800 && charCode <= 0xDBFF;
}

function isLowSurrogate(charCode: number): boolean {
	return charCode >= 0xDC00 && charCode <= 0xDFFF;
}

/**
 * Converts a 1-based UTF-16 column on `line` to a 1-based UTF-8 byte column.
 * A column inside a surrogate pair is moved to the start of the pair;
 * columns past the end of the line count one byte each.
 */
export function utf16ColumnToUtf8Column(line: string, column: number): number {
	if (column < 1) {
		throw new Error(`[utf16ColumnToUtf8Column] Columns are 1-based, got ${column}.`);
	}
	let end = Math.min(column - 1, line.length);
	if (end > 0 && end < line.length && isHighSurrogate(line.charCodeAt(end - 1)) && isLowSurrogate(line.charCodeAt(end))) {
		end--;
	}
	const overflow = Math.max(0, column - 1 - line.length);
	return Buffer.byteLength(line.substring(0, end), 'utf8') + overflow + 1;
}

/**
 * Converts a 1-based UTF-8 byte column on `line` to a 1-based UTF-16 column.
 * A byte column inside a multi-byte character maps to the start of that character.
 */
export function utf8ColumnToUtf16Column(line: string, byteColumn: number): number {
	if (byteColumn < 1) {
		throw new Error(`[utf8ColumnToUtf16Column] Columns are 1-based, got ${byteColumn}.`);
	}
	const targetBytes = byteColumn - 1;
	let bytes = 0;
	let i = 0;
	while (i < line.length) {
		const codePoint = line.codePointAt(i) ?? 0;
		const charBytes = codePoint < 0x80 ? 1 : codePoint < 0x800 ? 2 : codePoint < 0x10000 ? 3 : 4;
		if (bytes + charBytes > targetBytes) {
			return i + 1;
		}
		bytes += charBytes;
		i += codePoint >= 0x10000 ? 2 : 1;
	}
	return line.length + 1 + (targetBytes - bytes);
}

function toUtf8Range(range: Range, lines: readonly string[]): Utf8Range {
	return {
		startLineNumber: range.startLineNumber,
		startByteColumn: utf16ColumnToUtf8Column(lines[range.startLineNumber - 1] ?? '', range.startColumn),
		endLineNumber: range.endLineNumber,
		endByteColumn: utf16ColumnToUtf8Column(lines[range.endLineNumber - 1] ?? '', range.endColumn),
	};
}

/**
 * Re-expresses a character change in UTF-8 byte columns, for consumers
 * that address the documents as UTF-8 text.
 */
export function rangeMappingToUtf8(
	mapping: RangeMapping,
	originalLines: readonly string[],
	modifiedLines: readonly string[],
): Utf8RangeMapping {
	return {
		original: toUtf8Range(mapping.originalRange, originalLines),
		modified: toUtf8Range(mapping.modifiedRange, modifiedLines),
	};
}
