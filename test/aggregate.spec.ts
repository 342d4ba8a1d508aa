import assert from 'assert';
import { describe, it } from 'vitest';

import { RcBuffer, compare, concat, concatMany, equals } from '../src/index.js';

const text = (buf: RcBuffer): string => new TextDecoder().decode(buf.data());

describe('aggregate operations', () => {
    describe('concat', () => {
        it('joins two buffers into a new one', () => {
            const a = RcBuffer.from('Hello, ');
            const b = RcBuffer.from('World!');
            const joined = concat(a, b);
            assert.strictEqual(joined.size, 13);
            assert.strictEqual(joined.capacity, 13);
            assert.strictEqual(joined.refcount, 1);
            assert.strictEqual(text(joined), 'Hello, World!');
            assert.strictEqual(a.refcount, 1);
            assert.strictEqual(b.refcount, 1);
            joined.release();
            a.release();
            b.release();
        });

        it('treats an absent operand as empty', () => {
            const a = RcBuffer.from('abc');
            const left = concat(a, null);
            const right = concat(undefined, a);
            assert.strictEqual(equals(left, a), true);
            assert.strictEqual(equals(right, a), true);
            assert.notStrictEqual(left, a);
            left.release();
            right.release();
            a.release();
        });

        it('returns an empty buffer for two absent operands', () => {
            const empty = concat(null, null);
            assert.strictEqual(empty.size, 0);
            assert.strictEqual(empty.refcount, 1);
            empty.release();
        });

        it('joins slices by their visible bytes', () => {
            const buf = RcBuffer.from('Hello World');
            const world = buf.sliceFrom(6);
            const hello = buf.sliceTo(5);
            const joined = concat(world, hello);
            assert.strictEqual(text(joined), 'WorldHello');
            joined.release();
            world?.release();
            hello?.release();
            assert.strictEqual(buf.refcount, 1);
            buf.release();
        });
    });

    describe('concatMany', () => {
        it('joins every present buffer in order', () => {
            const parts = [RcBuffer.from('one'), RcBuffer.from(''), RcBuffer.from('two'), RcBuffer.from('three')];
            const joined = concatMany([parts[0], null, parts[1], parts[2], undefined, parts[3]]);
            assert.strictEqual(joined.size, 11);
            assert.strictEqual(joined.capacity, 11);
            assert.strictEqual(text(joined), 'onetwothree');
            joined.release();
            for (const part of parts) part.release();
        });

        it('returns an empty buffer for an empty or absent list', () => {
            const fromEmpty = concatMany([]);
            const fromNull = concatMany(null);
            assert.strictEqual(fromEmpty.size, 0);
            assert.strictEqual(fromNull.size, 0);
            fromEmpty.release();
            fromNull.release();
        });
    });

    describe('equals', () => {
        it('is true for the same handle', () => {
            const a = RcBuffer.from('abc');
            assert.strictEqual(equals(a, a), true);
            a.release();
        });

        it('compares sizes then bytes', () => {
            const a = RcBuffer.from('abc');
            const b = RcBuffer.from('abc');
            const c = RcBuffer.from('abd');
            const d = RcBuffer.from('ab');
            assert.strictEqual(equals(a, b), true);
            assert.strictEqual(equals(a, c), false);
            assert.strictEqual(equals(a, d), false);
            for (const buf of [a, b, c, d]) buf.release();
        });

        it('handles absent operands', () => {
            const a = RcBuffer.from('');
            assert.strictEqual(equals(null, null), true);
            assert.strictEqual(equals(null, undefined), true);
            assert.strictEqual(equals(a, null), false);
            assert.strictEqual(equals(undefined, a), false);
            a.release();
        });
    });

    describe('compare', () => {
        it('orders by the first differing byte', () => {
            const a = RcBuffer.from('abc');
            const b = RcBuffer.from('abd');
            assert.strictEqual(compare(a, b), -1);
            assert.strictEqual(compare(b, a), 1);
            a.release();
            b.release();
        });

        it('compares bytes as unsigned values', () => {
            const high = RcBuffer.from(Uint8Array.of(0x80));
            const low = RcBuffer.from(Uint8Array.of(0x7f));
            assert.strictEqual(compare(high, low), 1);
            high.release();
            low.release();
        });

        it('orders a prefix before the longer buffer', () => {
            const a = RcBuffer.from('ab');
            const b = RcBuffer.from('abc');
            assert.strictEqual(compare(a, b), -1);
            assert.strictEqual(compare(b, a), 1);
            a.release();
            b.release();
        });

        it('returns 0 for equal contents', () => {
            const a = RcBuffer.from('same');
            const b = RcBuffer.from('same');
            assert.strictEqual(compare(a, b), 0);
            assert.strictEqual(compare(a, a), 0);
            a.release();
            b.release();
        });

        it('orders absent operands first', () => {
            const a = RcBuffer.from('');
            assert.strictEqual(compare(null, a), -1);
            assert.strictEqual(compare(a, null), 1);
            assert.strictEqual(compare(null, null), 0);
            assert.strictEqual(compare(undefined, null), 0);
            a.release();
        });

        it('is a total order consistent with equals', () => {
            const samples = [
                null,
                RcBuffer.from(''),
                RcBuffer.from(Uint8Array.of(0)),
                RcBuffer.from(Uint8Array.of(0, 0)),
                RcBuffer.from(Uint8Array.of(0, 1)),
                RcBuffer.from(Uint8Array.of(1)),
                RcBuffer.from(Uint8Array.of(1)),
                RcBuffer.from(Uint8Array.of(0xff, 0)),
            ];
            for (const a of samples) {
                for (const b of samples) {
                    const ab = compare(a, b);
                    assert.strictEqual(compare(b, a), -ab === 0 ? 0 : -ab);
                    if (ab === 0) assert.strictEqual(equals(a, b), true);
                    for (const c of samples) {
                        if (ab <= 0 && compare(b, c) <= 0) {
                            assert.ok(compare(a, c) <= 0);
                        }
                    }
                }
            }
            for (const buf of samples) buf?.release();
        });
    });
});
