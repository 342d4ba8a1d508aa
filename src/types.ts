/**
 * Shared type definitions, integer-range guards and argument assertions.
 *
 * @packageDocumentation
 */

// ============================================================================
// Types
// ============================================================================

/**
 * A value that may be absent. Aggregate operations accept absent operands.
 */
export type Maybe<T> = T | null | undefined;

export const UINT64_MAX = (1n << 64n) - 1n;

// ============================================================================
// Type Guards
// ============================================================================

export function isUInt8(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xff;
}

export function isUInt16(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

export function isUInt32(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}

export function isUInt53(value: unknown): value is number {
    return (
        typeof value === 'number' &&
        Number.isInteger(value) &&
        value >= 0 &&
        value <= Number.MAX_SAFE_INTEGER
    );
}

export function isUInt64(value: unknown): value is bigint {
    return typeof value === 'bigint' && value >= 0n && value <= UINT64_MAX;
}

// ============================================================================
// Assertion Helpers
// ============================================================================

export function assertUint8Array(value: unknown, name: string): asserts value is Uint8Array {
    if (!(value instanceof Uint8Array)) {
        throw new TypeError(`${name} must be a Uint8Array`);
    }
}

/**
 * Asserts that `value` is an unsigned integer no larger than `max`.
 */
export function assertUInt(value: unknown, max: number, name: string): asserts value is number {
    if (typeof value !== 'number') throw new TypeError(`cannot write a non-number as ${name}`);
    if (value < 0) throw new RangeError(`specified a negative value for ${name}`);
    if (value > max) throw new RangeError(`${name} value ${value} out of range`);
    if (Math.floor(value) !== value) throw new RangeError(`${name} value has a fractional component`);
}

export function assertUInt64(value: unknown, name: string): asserts value is bigint {
    if (typeof value !== 'bigint') throw new TypeError(`${name} must be a bigint`);
    if (!isUInt64(value)) throw new RangeError(`${name} value ${value} out of range`);
}
