/**
 * Hex encoding of buffer contents.
 *
 * @packageDocumentation
 */
import { RcBuffer } from '../buffer.js';
import { bytesToHex, hexToBytes } from '../uint8array-utils.js';

export interface ToHexOptions {
    /** Emit A-F instead of a-f. */
    readonly uppercase?: boolean;
}

/**
 * Encodes the buffer contents as hex, two characters per byte.
 *
 * @example
 * ```typescript
 * import { RcBuffer, toHex } from 'refbuf';
 *
 * toHex(RcBuffer.from(Uint8Array.of(0xca, 0xfe)));                      // 'cafe'
 * toHex(RcBuffer.from(Uint8Array.of(0xca, 0xfe)), { uppercase: true }); // 'CAFE'
 * ```
 */
export function toHex(buf: RcBuffer, options: ToHexOptions = {}): string {
    return bytesToHex(buf.data(), options.uppercase ?? false);
}

/**
 * Decodes hex text (either case, no prefix) into a new buffer.
 *
 * @returns The buffer, or null for odd-length input or a non-hex character
 */
export function fromHex(hex: string): RcBuffer | null {
    const bytes = hexToBytes(hex);
    if (!bytes) return null;
    return RcBuffer.adopt(bytes, bytes.length);
}

/**
 * Checks whether `value` is even-length hex text.
 */
export function isHex(value: unknown): value is string {
    if (typeof value !== 'string') return false;
    if (value.length % 2 !== 0) return false;
    return /^[0-9a-fA-F]*$/.test(value);
}
