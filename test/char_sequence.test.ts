// test/char_sequence.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    LinesSliceCharSequence,
    CharBoundaryCategory,
    getCategory,
    OffsetRange,
    Range
} from '../src/index.js';

suite('LinesSliceCharSequence: Construction', () => {

    test('should drop leading and trailing whitespace when whitespace changes are ignored', () => {
        const seq = new LinesSliceCharSequence(['  foo  ', 'bar'], new Range(1, 1, 2, 4), false);
        assert.strictEqual(seq.text, 'foo\nbar');
        assert.strictEqual(seq.length, 7);
    });

    test('should keep whitespace when whitespace changes are considered', () => {
        const seq = new LinesSliceCharSequence(['  foo  ', 'bar'], new Range(1, 1, 2, 4), true);
        assert.strictEqual(seq.text, '  foo  \nbar');
    });

    test('should start at the range start column', () => {
        const seq = new LinesSliceCharSequence(['hello world'], new Range(1, 7, 1, 12), true);
        assert.strictEqual(seq.text, 'world');
    });

    test('should stop before the end column of the last line', () => {
        const seq = new LinesSliceCharSequence(['abc', 'def'], new Range(1, 1, 2, 1), true);
        assert.strictEqual(seq.text, 'abc\n');
    });

    test('should throw for a range outside of the lines', () => {
        assert.throws(
            () => new LinesSliceCharSequence(['a', 'b'], new Range(1, 1, 3, 1), true),
            /outside of 2 lines/
        );
    });
});

suite('LinesSliceCharSequence: Position Translation', () => {

    const seq = new LinesSliceCharSequence(['  foo', 'bar'], new Range(1, 1, 2, 4), false);

    test('should count the dropped indentation for a right-leaning offset', () => {
        assert.strictEqual(seq.translateOffset(0).toString(), '(1,3)');
        assert.strictEqual(seq.translateOffset(3).toString(), '(1,6)');
    });

    test('should not count the dropped indentation for a left-leaning offset at a line start', () => {
        assert.strictEqual(seq.translateOffset(0, 'left').toString(), '(1,1)');
        assert.strictEqual(seq.translateOffset(4, 'left').toString(), '(2,1)');
    });

    test('should map an offset after a line break to the next line', () => {
        assert.strictEqual(seq.translateOffset(4).toString(), '(2,1)');
        assert.strictEqual(seq.translateOffset(7).toString(), '(2,4)');
    });

    test('should translate ranges', () => {
        assert.strictEqual(seq.translateRange(new OffsetRange(0, 3)).toString(), '[1,3 -> 1,6]');
        assert.strictEqual(seq.translateRange(new OffsetRange(1, 6)).toString(), '[1,4 -> 2,3]');
    });

    test('should collapse an empty range whose end would land before its start', () => {
        // right-leaning (1,3) vs left-leaning (1,1)
        assert.strictEqual(seq.translateRange(new OffsetRange(0, 0)).toString(), '[1,1 -> 1,1]');
    });

    test('should add the start column offset', () => {
        const sliced = new LinesSliceCharSequence(['hello world'], new Range(1, 7, 1, 12), true);
        assert.strictEqual(sliced.translateOffset(0).toString(), '(1,7)');
        assert.strictEqual(sliced.translateOffset(5).toString(), '(1,12)');
    });

    test('should count the lines a range spans', () => {
        assert.strictEqual(seq.countLinesIn(new OffsetRange(0, 5)), 1);
        assert.strictEqual(seq.countLinesIn(new OffsetRange(0, 3)), 0);
    });

    test('should extend ranges to full lines', () => {
        assert.strictEqual(seq.extendToFullLines(new OffsetRange(1, 5)).toString(), '[0, 7)');
        assert.strictEqual(seq.extendToFullLines(new OffsetRange(1, 2)).toString(), '[0, 4)');
    });
});

suite('LinesSliceCharSequence: Boundary Scores', () => {

    const seq = new LinesSliceCharSequence(['a,b', 'C'], new Range(1, 1, 2, 2), true);

    test('should score the sequence edges', () => {
        // End -> WordLower, WordUpper -> End
        assert.strictEqual(seq.getBoundaryScore(0), 20);
        assert.strictEqual(seq.getBoundaryScore(5), 20);
    });

    test('should favour separators', () => {
        assert.strictEqual(seq.getBoundaryScore(1), 40);
        assert.strictEqual(seq.getBoundaryScore(2), 40);
    });

    test('should strongly favour the position after a line break', () => {
        assert.strictEqual(seq.getBoundaryScore(3), 20);
        assert.strictEqual(seq.getBoundaryScore(4), 150);
    });

    test('should add a bonus for a camelCase hump', () => {
        const camel = new LinesSliceCharSequence(['fooBar'], new Range(1, 1, 1, 7), true);
        assert.strictEqual(camel.getBoundaryScore(3), 11);
        assert.strictEqual(camel.getBoundaryScore(2), 0);
    });

    test('should never split a CRLF pair', () => {
        const crlf = new LinesSliceCharSequence(['a\r', 'b'], new Range(1, 1, 2, 2), true);
        assert.strictEqual(crlf.text, 'a\r\nb');
        assert.strictEqual(crlf.getBoundaryScore(2), 0);
    });

    test('should classify characters', () => {
        assert.strictEqual(getCategory(-1), CharBoundaryCategory.End);
        assert.strictEqual(getCategory(','.charCodeAt(0)), CharBoundaryCategory.Separator);
        assert.strictEqual(getCategory(';'.charCodeAt(0)), CharBoundaryCategory.Separator);
        assert.strictEqual(getCategory('\t'.charCodeAt(0)), CharBoundaryCategory.Space);
        assert.strictEqual(getCategory('7'.charCodeAt(0)), CharBoundaryCategory.WordNumber);
        assert.strictEqual(getCategory('('.charCodeAt(0)), CharBoundaryCategory.Other);
    });
});

suite('LinesSliceCharSequence: Words', () => {

    const seq = new LinesSliceCharSequence(['foo bar1', 'getUserName'], new Range(1, 1, 2, 12), true);

    test('should find the alphanumeric word around an offset', () => {
        assert.strictEqual(seq.findWordContaining(5)?.toString(), '[4, 8)');
        assert.strictEqual(seq.findWordContaining(0)?.toString(), '[0, 3)');
    });

    test('should find no word on a non-word character', () => {
        assert.strictEqual(seq.findWordContaining(3), undefined);
        assert.strictEqual(seq.findWordContaining(8), undefined);
        assert.strictEqual(seq.findWordContaining(-1), undefined);
    });

    test('should split camelCase words into subwords', () => {
        // "getUserName" starts at offset 9
        assert.strictEqual(seq.findSubWordContaining(9)?.toString(), '[9, 12)');
        assert.strictEqual(seq.findSubWordContaining(13)?.toString(), '[12, 16)');
        assert.strictEqual(seq.findSubWordContaining(17)?.toString(), '[16, 20)');
        assert.strictEqual(seq.findWordContaining(13)?.toString(), '[9, 20)');
    });

    test('should return an empty subword on an uppercase letter', () => {
        assert.strictEqual(seq.findSubWordContaining(12)?.toString(), '[12, 12)');
        assert.strictEqual(seq.findSubWordContaining(16)?.toString(), '[16, 16)');
    });
});
