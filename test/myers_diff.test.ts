// test/myers_diff.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    MyersDiffAlgorithm,
    PerfectHashTable,
    LineSequence,
    SequenceDiff,
    type ISequence,
    type ITimeout
} from '../src/index.js';

// =============== HELPER FUNCTIONS ===============

class CharArraySequence implements ISequence {
    constructor(private readonly text: string) { }

    getElement(offset: number): number {
        return this.text.charCodeAt(offset);
    }

    get length(): number {
        return this.text.length;
    }

    isStronglyEqual(offset1: number, offset2: number): boolean {
        return this.text[offset1] === this.text[offset2];
    }
}

const lineSequences = (linesA: string[], linesB: string[]): [LineSequence, LineSequence] => {
    const table = new PerfectHashTable();
    return [
        new LineSequence(table.hashAll(linesA), linesA),
        new LineSequence(table.hashAll(linesB), linesB)
    ];
};

// Rebuilds `b` from `a`: unchanged runs are taken from `a`, changed ones from `b`.
const applyDiffs = (a: string, b: string, diffs: readonly SequenceDiff[]): string => {
    let result = '';
    let pos1 = 0;
    for (const diff of diffs) {
        result += a.substring(pos1, diff.seq1Range.start);
        result += b.substring(diff.seq2Range.start, diff.seq2Range.endExclusive);
        pos1 = diff.seq1Range.endExclusive;
    }
    return result + a.substring(pos1);
};

const lcsLength = (a: string, b: string): number => {
    const table: number[][] = [];
    for (let i = 0; i <= a.length; i++) {
        table.push(new Array<number>(b.length + 1).fill(0));
    }
    for (let i = 1; i <= a.length; i++) {
        for (let j = 1; j <= b.length; j++) {
            table[i][j] = a[i - 1] === b[j - 1]
                ? table[i - 1][j - 1] + 1
                : Math.max(table[i - 1][j], table[i][j - 1]);
        }
    }
    return table[a.length][b.length];
};

// Deterministic pseudo-random strings over a small alphabet
const randomStrings = (count: number, seed: number): string[] => {
    let state = seed;
    const next = (): number => {
        state = (state * 48271) % 2147483647;
        return state;
    };
    const result: string[] = [];
    for (let i = 0; i < count; i++) {
        const length = next() % 25;
        let s = '';
        for (let j = 0; j < length; j++) {
            s += 'abc'[next() % 3];
        }
        result.push(s);
    }
    return result;
};

const expiredTimeout: ITimeout = { isValid: () => false };

suite('MyersDiffAlgorithm: Line Sequences (Exact Match)', () => {

    const runMyersTest = (title: string, linesA: string[], linesB: string[], expected: string[]) => {
        test(title, () => {
            const [seq1, seq2] = lineSequences(linesA, linesB);
            const result = new MyersDiffAlgorithm().compute(seq1, seq2);
            assert.deepStrictEqual(result.diffs.map(d => d.toString()), expected);
            assert.strictEqual(result.hitTimeout, false);
        });
    };

    runMyersTest(
        'should report a single inserted line',
        ['line1', 'line3'],
        ['line1', 'line2', 'line3'],
        ['[1, 1) <-> [1, 2)']
    );

    runMyersTest(
        'should report a single deleted line',
        ['line1', 'line2', 'line3'],
        ['line1', 'line3'],
        ['[1, 2) <-> [1, 1)']
    );

    runMyersTest(
        'should report two separate replacements',
        ['a', 'b', 'c', 'd', 'e'],
        ['a', 'B', 'c', 'D', 'e'],
        ['[1, 2) <-> [1, 2)', '[3, 4) <-> [3, 4)']
    );

    runMyersTest(
        'should return no diffs for identical sequences',
        ['x', 'y', 'z'],
        ['x', 'y', 'z'],
        []
    );

    runMyersTest(
        'should report a whole-range diff when nothing matches',
        ['a', 'b'],
        ['c'],
        ['[0, 2) <-> [0, 1)']
    );

    runMyersTest(
        'should report an insertion into an empty sequence',
        [],
        ['a', 'b'],
        ['[0, 0) <-> [0, 2)']
    );

    runMyersTest(
        'should return no diffs for two empty sequences',
        [],
        [],
        []
    );
});

suite('MyersDiffAlgorithm: Timeout', () => {

    test('should fall back to a whole-range diff when the timeout has expired', () => {
        const result = new MyersDiffAlgorithm().compute(
            new CharArraySequence('abc'),
            new CharArraySequence('xyz'),
            expiredTimeout
        );
        assert.deepStrictEqual(result.diffs.map(d => d.toString()), ['[0, 3) <-> [0, 3)']);
        assert.strictEqual(result.hitTimeout, true);
    });
});

suite('MyersDiffAlgorithm: Functional Tests (Patch Correctness)', () => {

    const inputs = randomStrings(40, 12345);

    for (let i = 0; i + 1 < inputs.length; i += 2) {
        const a = inputs[i];
        const b = inputs[i + 1];

        test(`should produce a minimal, sorted script for "${a}" -> "${b}"`, () => {
            const result = new MyersDiffAlgorithm().compute(new CharArraySequence(a), new CharArraySequence(b));

            assert.strictEqual(applyDiffs(a, b, result.diffs), b);
            assert.doesNotThrow(() => SequenceDiff.assertSorted(result.diffs));

            for (let j = 1; j < result.diffs.length; j++) {
                const prev = result.diffs[j - 1];
                const cur = result.diffs[j];
                assert.ok(prev.seq1Range.endExclusive < cur.seq1Range.start, `diffs touch in sequence 1: ${prev} / ${cur}`);
                assert.ok(prev.seq2Range.endExclusive < cur.seq2Range.start, `diffs touch in sequence 2: ${prev} / ${cur}`);
            }

            const cost = result.diffs.reduce((sum, d) => sum + d.seq1Range.length + d.seq2Range.length, 0);
            assert.strictEqual(cost, a.length + b.length - 2 * lcsLength(a, b));
        });
    }
});
