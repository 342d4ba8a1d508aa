/**
 * Operations across several buffers. Absent (null or undefined) operands are
 * accepted everywhere and behave as empty or as ordering first.
 *
 * @packageDocumentation
 */
import { RcBuffer } from './buffer.js';
import type { Maybe } from './types.js';
import * as u8 from './uint8array-utils.js';

/**
 * Concatenates two buffers into a new root buffer of exactly their combined size.
 *
 * @example
 * ```typescript
 * import { RcBuffer, concat } from 'refbuf';
 *
 * const joined = concat(RcBuffer.from('Hello, '), RcBuffer.from('World!'));
 * joined.size; // 13
 * ```
 */
export function concat(a: Maybe<RcBuffer>, b: Maybe<RcBuffer>): RcBuffer {
    return concatMany([a, b]);
}

/**
 * Concatenates any number of buffers, sizing the result in a single pass.
 */
export function concatMany(buffers: Maybe<readonly Maybe<RcBuffer>[]>): RcBuffer {
    if (!buffers || buffers.length === 0) return RcBuffer.create(0);

    let totalSize = 0;
    for (const buf of buffers) {
        if (buf) totalSize += buf.size;
    }

    const result = RcBuffer.create(totalSize);
    for (const buf of buffers) {
        if (buf && buf.size > 0) {
            result.append(buf.data());
        }
    }
    return result;
}

/**
 * Checks if two buffers hold the same bytes. Two absent buffers are equal.
 */
export function equals(a: Maybe<RcBuffer>, b: Maybe<RcBuffer>): boolean {
    if (a === b || (!a && !b)) return true;
    if (!a || !b) return false;
    if (a.size !== b.size) return false;
    return u8.equals(a.data(), b.data());
}

/**
 * Orders buffers lexicographically by byte, shorter first on a shared prefix.
 * Absent buffers order before any present one.
 *
 * @returns -1 if a < b, 1 if a > b, 0 if equal
 */
export function compare(a: Maybe<RcBuffer>, b: Maybe<RcBuffer>): -1 | 0 | 1 {
    if (a === b) return 0;
    if (!a) return b ? -1 : 0;
    if (!b) return 1;
    return u8.compare(a.data(), b.data());
}
