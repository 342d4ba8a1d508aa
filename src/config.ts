/**
 * Library-wide defaults.
 *
 * Buffers, builders and the I/O helpers read the active configuration when
 * they are created, so changing it never affects live buffers.
 *
 * @packageDocumentation
 */
import { isUInt32, isUInt53 } from './types.js';

/**
 * Tunable defaults. Every field is optional when passed to {@link configure}.
 */
export interface BufferConfig {
    /** Capacity used by `RcBuffer.create()` and `new ByteBuilder()` without arguments. */
    readonly defaultCapacity?: number;
    /** Largest capacity a buffer may grow to; growth beyond it fails. */
    readonly maxCapacity?: number;
    /** Bytes requested per `readFd` call when the caller gives no limit. */
    readonly readChunkSize?: number;
    /** Bytes shown in the hex preview produced by `inspect`. */
    readonly previewBytes?: number;
    /** Back reference counts with `Atomics` over a `SharedArrayBuffer`. */
    readonly atomicRefcount?: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Readonly<Required<BufferConfig>> = Object.freeze({
    defaultCapacity: 64,
    maxCapacity: 0x7fffffff,
    readChunkSize: 4096,
    previewBytes: 16,
    atomicRefcount: false,
});

let active: Readonly<Required<BufferConfig>> = DEFAULT_CONFIG;

function validate(config: Required<BufferConfig>): void {
    if (!isUInt53(config.defaultCapacity)) {
        throw new RangeError(`defaultCapacity must be a non-negative integer, got ${config.defaultCapacity}`);
    }
    if (!isUInt53(config.maxCapacity) || config.maxCapacity < config.defaultCapacity) {
        throw new RangeError(
            `maxCapacity must be an integer >= defaultCapacity, got ${config.maxCapacity}`,
        );
    }
    if (!isUInt32(config.readChunkSize) || config.readChunkSize === 0) {
        throw new RangeError(`readChunkSize must be a positive integer, got ${config.readChunkSize}`);
    }
    if (!isUInt32(config.previewBytes)) {
        throw new RangeError(`previewBytes must be a non-negative integer, got ${config.previewBytes}`);
    }
}

/**
 * Merges `overrides` into the active configuration.
 *
 * @returns The new active configuration
 * @throws RangeError if a value is out of range; the active configuration is then unchanged
 *
 * @example
 * ```typescript
 * import { configure } from 'refbuf';
 *
 * configure({ atomicRefcount: true, readChunkSize: 64 * 1024 });
 * ```
 */
export function configure(overrides: BufferConfig): Readonly<Required<BufferConfig>> {
    const next: Required<BufferConfig> = { ...active, ...overrides };
    validate(next);
    active = Object.freeze(next);
    return active;
}

/**
 * Returns the active configuration.
 */
export function getConfig(): Readonly<Required<BufferConfig>> {
    return active;
}

/**
 * Restores {@link DEFAULT_CONFIG}.
 */
export function resetConfig(): void {
    active = DEFAULT_CONFIG;
}
