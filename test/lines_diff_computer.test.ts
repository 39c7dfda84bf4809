// test/lines_diff_computer.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    LinesDiffComputer,
    computeLineAlignments,
    refineToCharacterLevel,
    computeDiff,
    OffsetRange,
    SequenceDiff,
    type DetailedLineRangeMapping,
    type DiffOptions
} from '../src/index.js';

// =============== HELPER FUNCTIONS ===============

const describeDiffs = (diffs: readonly SequenceDiff[]): string[] => diffs.map(d => d.toString());

// One entry per line change: the line ranges followed by the character changes
const describeChanges = (changes: readonly DetailedLineRangeMapping[]): string[] =>
    changes.map(c => `${c.toString()} ${c.innerChanges.map(i => i.toString()).join(' ')}`.trimEnd());

// Rebuilds the modified lines from the original lines and the line diffs
const applyLineDiffs = (linesA: string[], linesB: string[], diffs: readonly SequenceDiff[]): string[] => {
    const result: string[] = [];
    let pos1 = 0;
    for (const diff of diffs) {
        result.push(...linesA.slice(pos1, diff.seq1Range.start));
        result.push(...linesB.slice(diff.seq2Range.start, diff.seq2Range.endExclusive));
        pos1 = diff.seq1Range.endExclusive;
    }
    result.push(...linesA.slice(pos1));
    return result;
};

const distinctLines = (prefix: string, count: number): string[] =>
    Array.from({ length: count }, (_, i) => `${prefix}${i}`);

suite('computeLineAlignments: Documented Examples', () => {

    const runAlignmentTest = (title: string, linesA: string[], linesB: string[], expected: string[]) => {
        test(title, () => {
            const result = computeLineAlignments(linesA, linesB, 0);
            assert.deepStrictEqual(describeDiffs(result.diffs), expected);
            assert.strictEqual(result.hitTimeout, false);
        });
    };

    runAlignmentTest(
        'should report a single inserted line',
        ['line1', 'line3'],
        ['line1', 'line2', 'line3'],
        ['[1, 1) <-> [1, 2)']
    );

    runAlignmentTest(
        'should keep separate replacements apart',
        ['a', 'b', 'c', 'd', 'e'],
        ['a', 'B', 'c', 'D', 'e'],
        ['[1, 2) <-> [1, 2)', '[3, 4) <-> [3, 4)']
    );

    runAlignmentTest(
        'should align lines that differ only in indentation',
        ['function f() {', '  return 1;', '}'],
        ['function f() {', '    return 1;', '}'],
        []
    );

    runAlignmentTest(
        'should place an inserted block at the least indented boundary',
        ['  x', '', 'z'],
        ['  x', '', '  q', '', 'z'],
        ['[2, 2) <-> [2, 4)']
    );

    runAlignmentTest(
        'should return no diffs for identical documents',
        ['one', 'two', 'three'],
        ['one', 'two', 'three'],
        []
    );

    runAlignmentTest(
        'should insert every line into a document without lines',
        [],
        ['a', 'b'],
        ['[0, 0) <-> [0, 2)']
    );

    runAlignmentTest(
        'should delete every line of a document when the other has none',
        ['a', 'b'],
        [],
        ['[0, 2) <-> [0, 0)']
    );

    runAlignmentTest(
        'should return no diffs for two empty documents',
        [],
        [],
        []
    );
});

suite('computeLineAlignments: Properties', () => {

    const cases: [string[], string[]][] = [
        [['a', 'b', 'c'], ['c', 'b', 'a']],
        [['x', 'y', 'x', 'y'], ['y', 'x', 'y']],
        [['fn a() {', '}', '', 'fn b() {', '}'], ['fn a() {', '}', '', 'fn c() {', '}', '', 'fn b() {', '}']],
        [['1', '2', '3', '4', '5', '6'], ['1', '3', '4', '7', '6']],
    ];

    for (const [linesA, linesB] of cases) {
        test(`should round-trip ${JSON.stringify(linesA)} -> ${JSON.stringify(linesB)}`, () => {
            const result = computeLineAlignments(linesA, linesB);
            assert.deepStrictEqual(applyLineDiffs(linesA, linesB, result.diffs), linesB);

            for (let i = 1; i < result.diffs.length; i++) {
                const prev = result.diffs[i - 1];
                const cur = result.diffs[i];
                assert.ok(prev.seq1Range.endExclusive < cur.seq1Range.start);
                assert.ok(prev.seq2Range.endExclusive < cur.seq2Range.start);
            }
        });
    }

    test('should use Myers above the DP threshold', () => {
        const linesA = distinctLines('a', 1000);
        const linesB = [...linesA.slice(0, 500), 'inserted', ...linesA.slice(500)];
        const result = computeLineAlignments(linesA, linesB);
        assert.deepStrictEqual(describeDiffs(result.diffs), ['[500, 500) <-> [500, 501)']);
    });

    test('should report a timeout with a whole-document diff', () => {
        const result = computeLineAlignments(distinctLines('a', 3000), distinctLines('b', 3000), 1);
        assert.deepStrictEqual(describeDiffs(result.diffs), ['[0, 3000) <-> [0, 3000)']);
        assert.strictEqual(result.hitTimeout, true);
    });

    test('should reject a negative timeout', () => {
        assert.throws(() => computeLineAlignments(['a'], ['b'], -1), /non-negative/);
    });

    test('should reject lines that are not strings', () => {
        const lines: string[] = JSON.parse('["a", 1]');
        assert.throws(() => computeLineAlignments(lines, ['a']), /originalLines\[1\] is not a string/);
    });
});

suite('refineToCharacterLevel', () => {

    test('should produce one line change per line diff', () => {
        const linesA = ['a', 'b', 'c', 'd', 'e'];
        const linesB = ['a', 'B', 'c', 'D', 'e'];
        const { diffs } = computeLineAlignments(linesA, linesB);
        const changes = refineToCharacterLevel(diffs, linesA, linesB);
        assert.deepStrictEqual(describeChanges(changes), [
            '{[2,3)->[2,3)} {[2,1 -> 2,2]->[2,1 -> 2,2]}',
            '{[4,5)->[4,5)} {[4,1 -> 4,2]->[4,1 -> 4,2]}'
        ]);
    });

    test('should report whether a refinement ran out of time', () => {
        const linesA = ['a', 'b', 'c', 'd', 'e'];
        const linesB = ['a', 'B', 'c', 'D', 'e'];
        const { diffs } = computeLineAlignments(linesA, linesB);
        const result = new LinesDiffComputer().refineToCharacterLevel(diffs, linesA, linesB);
        assert.strictEqual(result.hitTimeout, false);
        assert.strictEqual(result.changes.length, 2);
    });

    test('should refine a diff against a document without lines', () => {
        const { diffs } = computeLineAlignments([], ['a', 'b']);
        assert.deepStrictEqual(describeChanges(refineToCharacterLevel(diffs, [], ['a', 'b'])), [
            '{[1,1)->[1,3)} {[1,1 -> 1,1]->[1,1 -> 2,2]}'
        ]);
        assert.deepStrictEqual(describeChanges(refineToCharacterLevel(diffs.map(d => d.swap()), ['a', 'b'], [])), [
            '{[1,3)->[1,1)} {[1,1 -> 2,2]->[1,1 -> 1,1]}'
        ]);
    });

    test('should reject line diffs that reach past a document without lines', () => {
        const diffs = [new SequenceDiff(new OffsetRange(0, 1), new OffsetRange(0, 2))];
        assert.throws(() => refineToCharacterLevel(diffs, [], ['a', 'b']), /unsorted or out of range/);
    });

    test('should reject line diffs that leave unequal unchanged runs', () => {
        const diffs = [new SequenceDiff(new OffsetRange(0, 1), new OffsetRange(1, 2))];
        assert.throws(() => refineToCharacterLevel(diffs, ['a', 'b'], ['a', 'c']), /does not follow an equal run/);
    });

    test('should reject line diffs outside of the documents', () => {
        const diffs = [new SequenceDiff(new OffsetRange(1, 3), new OffsetRange(1, 3))];
        assert.throws(() => refineToCharacterLevel(diffs, ['a', 'b'], ['a', 'c']), /unsorted or out of range/);
    });
});

suite('computeDiff: Character Changes', () => {

    const runDiffTest = (title: string, linesA: string[], linesB: string[], expected: string[], options?: DiffOptions) => {
        test(title, () => {
            const result = computeDiff(linesA, linesB, options);
            assert.deepStrictEqual(describeChanges(result.changes), expected);
            assert.strictEqual(result.hitTimeout, false);
        });
    };

    runDiffTest(
        'should report nothing for identical documents',
        ['a', 'b'],
        ['a', 'b'],
        []
    );

    runDiffTest(
        'should report a replaced word',
        ['const alpha = 1;'],
        ['const wxyz = 1;'],
        ['{[1,2)->[1,2)} {[1,7 -> 1,12]->[1,7 -> 1,11]}']
    );

    runDiffTest(
        'should widen a mostly changed word',
        ['const abcxyz = 1;'],
        ['const abcpqr = 1;'],
        ['{[1,2)->[1,2)} {[1,7 -> 1,13]->[1,7 -> 1,13]}']
    );

    runDiffTest(
        'should keep a single changed character inside a word',
        ['callFooBar();'],
        ['callFooBaz();'],
        ['{[1,2)->[1,2)} {[1,10 -> 1,11]->[1,10 -> 1,11]}']
    );

    runDiffTest(
        'should widen to the camelCase subword when asked',
        ['callFooBar();'],
        ['callFooBaz();'],
        ['{[1,2)->[1,2)} {[1,8 -> 1,11]->[1,8 -> 1,11]}'],
        { extendToSubwords: true }
    );

    runDiffTest(
        'should not widen to a subword that starts at an equal capital',
        ['A a b bb'],
        ['Aa bba'],
        ['{[1,2)->[1,2)} {[1,2 -> 1,9]->[1,1 -> 1,7]}'],
        { extendToSubwords: true }
    );

    runDiffTest(
        'should report an inserted line',
        ['a', 'b'],
        ['a', 'x', 'b'],
        ['{[2,2)->[2,3)} {[2,1 -> 2,1]->[2,1 -> 3,1]}']
    );

    runDiffTest(
        'should report a line appended at the end',
        ['a'],
        ['a', 'b'],
        ['{[2,2)->[2,3)} {[1,2 -> 1,2]->[1,2 -> 2,2]}']
    );

    runDiffTest(
        'should show a document without lines as a single empty line',
        [],
        ['a'],
        ['{[1,2)->[1,2)} {[1,1 -> 1,1]->[1,1 -> 1,2]}']
    );

    runDiffTest(
        'should report a whole-document change against an empty document',
        [''],
        ['a', 'b'],
        ['{[1,2)->[1,3)} {[1,1 -> 1,1]->[1,1 -> 2,2]}']
    );
});

suite('computeDiff: Whitespace', () => {

    const linesA = ['alpha', '  beta', 'gamma', 'delta  ', 'omega'];
    const linesB = ['alpha', 'beta', 'gamma', 'delta', 'omega'];

    test('should ignore leading and trailing whitespace by default', () => {
        const result = computeDiff(linesA, linesB);
        assert.deepStrictEqual(result.changes, []);
    });

    test('should report each whitespace-only change when whitespace is considered', () => {
        const result = computeDiff(linesA, linesB, { ignoreTrimWhitespace: false });
        assert.deepStrictEqual(describeChanges(result.changes), [
            '{[2,3)->[2,3)} {[2,1 -> 2,3]->[2,1 -> 2,1]}',
            '{[4,5)->[4,5)} {[4,6 -> 4,8]->[4,6 -> 4,6]}'
        ]);
    });

    test('should report added indentation', () => {
        const result = computeDiff(
            ['function f() {', '  return 1;', '}'],
            ['function f() {', '    return 1;', '}'],
            { ignoreTrimWhitespace: false }
        );
        assert.deepStrictEqual(describeChanges(result.changes), ['{[2,3)->[2,3)} {[2,1 -> 2,1]->[2,1 -> 2,3]}']);
    });
});

suite('computeDiff: Options and Timeouts', () => {

    test('should expose the default options', () => {
        assert.deepStrictEqual(LinesDiffComputer.defaultOptions, {
            ignoreTrimWhitespace: true,
            maxComputationTimeMs: 0,
            extendToSubwords: false
        });
    });

    test('should reject a negative time budget', () => {
        assert.throws(() => computeDiff(['a'], ['b'], { maxComputationTimeMs: -5 }), /non-negative/);
    });

    test('should report a timeout and still cover the changed lines', () => {
        const result = computeDiff(distinctLines('a', 3000), distinctLines('b', 3000), { maxComputationTimeMs: 1 });
        assert.strictEqual(result.hitTimeout, true);
        assert.deepStrictEqual(result.changes.map(c => c.toString()), ['{[1,3001)->[1,3001)}']);
    });

    test('should give the same result when the computer is reused', () => {
        const computer = new LinesDiffComputer();
        const first = computer.computeDiff(['a', 'b', 'c'], ['a', 'x', 'c']);
        const second = computer.computeDiff(['a', 'b', 'c'], ['a', 'x', 'c']);
        assert.deepStrictEqual(describeChanges(second.changes), describeChanges(first.changes));
        assert.deepStrictEqual(describeChanges(first.changes), ['{[2,3)->[2,3)} {[2,1 -> 2,2]->[2,1 -> 2,2]}']);
    });
});
