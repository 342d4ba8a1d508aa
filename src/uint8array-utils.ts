/**
 * Raw Uint8Array helpers shared by the buffer, the cursors and the hex codec.
 * Integer codecs go through DataView so that both byte orders are explicit.
 *
 * All functions here trust their offsets; bounds are enforced one level up
 * by {@link RcBuffer}, {@link ByteBuilder} and {@link ByteReader}.
 *
 * @packageDocumentation
 */

// ============================================================================
// Comparison
// ============================================================================

/**
 * Checks if two Uint8Arrays have the same length and contents.
 */
export function equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a === b) return true;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

/**
 * Compares two Uint8Arrays lexicographically, shorter-is-less on a shared prefix.
 *
 * @returns -1 if a < b, 1 if a > b, 0 if equal
 *
 * @example
 * ```typescript
 * compare(Uint8Array.of(1, 2), Uint8Array.of(1, 3)); // -1
 * compare(Uint8Array.of(1, 2), Uint8Array.of(1));    // 1
 * ```
 */
export function compare(a: Uint8Array, b: Uint8Array): -1 | 0 | 1 {
    const minLength = Math.min(a.length, b.length);
    for (let i = 0; i < minLength; i++) {
        if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
    }
    if (a.length === b.length) return 0;
    return a.length < b.length ? -1 : 1;
}

// ============================================================================
// Text
// ============================================================================

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Encodes a string as UTF-8 bytes.
 */
export function fromUtf8(str: string): Uint8Array {
    return encoder.encode(str);
}

/**
 * Decodes UTF-8 bytes into a string.
 */
export function toUtf8(bytes: Uint8Array): string {
    return decoder.decode(bytes);
}

// ============================================================================
// Hex
// ============================================================================

const HEX_LOWER = '0123456789abcdef';
const HEX_UPPER = '0123456789ABCDEF';

/**
 * Converts bytes to a hex string of exactly `2 * bytes.length` characters.
 *
 * @example
 * ```typescript
 * bytesToHex(Uint8Array.of(0xde, 0xad));       // 'dead'
 * bytesToHex(Uint8Array.of(0xde, 0xad), true); // 'DEAD'
 * ```
 */
export function bytesToHex(bytes: Uint8Array, uppercase: boolean = false): string {
    const chars = uppercase ? HEX_UPPER : HEX_LOWER;
    let result = '';
    for (let i = 0; i < bytes.length; i++) {
        result += chars[bytes[i] >> 4] + chars[bytes[i] & 0x0f];
    }
    return result;
}

function hexValue(code: number): number {
    if (code >= 0x30 && code <= 0x39) return code - 0x30; // 0-9
    if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10; // A-F
    if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10; // a-f
    return -1;
}

/**
 * Parses a hex string (either case, no prefix).
 *
 * @returns The decoded bytes, or null for odd length or a non-hex digit
 */
export function hexToBytes(hex: string): Uint8Array | null {
    if (hex.length % 2 !== 0) return null;
    const result = new Uint8Array(hex.length / 2);
    for (let i = 0; i < result.length; i++) {
        const high = hexValue(hex.charCodeAt(i * 2));
        const low = hexValue(hex.charCodeAt(i * 2 + 1));
        if (high < 0 || low < 0) return null;
        result[i] = (high << 4) | low;
    }
    return result;
}

// ============================================================================
// DataView-based read/write operations
// ============================================================================

/**
 * Creates a DataView for a Uint8Array at a given offset.
 * Handles views that do not start at the beginning of their ArrayBuffer.
 */
function getDataView(bytes: Uint8Array, offset: number, length: number): DataView {
    return new DataView(bytes.buffer, bytes.byteOffset + offset, length);
}

export function readUInt8(bytes: Uint8Array, offset: number): number {
    return bytes[offset];
}

/**
 * Writes an 8-bit unsigned integer.
 *
 * @returns The offset after the written value (offset + 1)
 */
export function writeUInt8(bytes: Uint8Array, value: number, offset: number): number {
    bytes[offset] = value & 0xff;
    return offset + 1;
}

export function readUInt16LE(bytes: Uint8Array, offset: number): number {
    return getDataView(bytes, offset, 2).getUint16(0, true);
}

export function readUInt16BE(bytes: Uint8Array, offset: number): number {
    return getDataView(bytes, offset, 2).getUint16(0, false);
}

/**
 * Writes a 16-bit unsigned integer in little-endian order.
 *
 * @returns The offset after the written value (offset + 2)
 *
 * @example
 * ```typescript
 * const bytes = new Uint8Array(2);
 * writeUInt16LE(bytes, 0x1234, 0);
 * bytesToHex(bytes); // '3412'
 * ```
 */
export function writeUInt16LE(bytes: Uint8Array, value: number, offset: number): number {
    getDataView(bytes, offset, 2).setUint16(0, value, true);
    return offset + 2;
}

/**
 * Writes a 16-bit unsigned integer in big-endian order.
 *
 * @returns The offset after the written value (offset + 2)
 */
export function writeUInt16BE(bytes: Uint8Array, value: number, offset: number): number {
    getDataView(bytes, offset, 2).setUint16(0, value, false);
    return offset + 2;
}

export function readUInt32LE(bytes: Uint8Array, offset: number): number {
    return getDataView(bytes, offset, 4).getUint32(0, true);
}

export function readUInt32BE(bytes: Uint8Array, offset: number): number {
    return getDataView(bytes, offset, 4).getUint32(0, false);
}

export function writeUInt32LE(bytes: Uint8Array, value: number, offset: number): number {
    getDataView(bytes, offset, 4).setUint32(0, value, true);
    return offset + 4;
}

export function writeUInt32BE(bytes: Uint8Array, value: number, offset: number): number {
    getDataView(bytes, offset, 4).setUint32(0, value, false);
    return offset + 4;
}

/**
 * Reads a 64-bit unsigned integer in little-endian order as bigint.
 *
 * @example
 * ```typescript
 * readUInt64LE(Uint8Array.of(1, 0, 0, 0, 0, 0, 0, 0), 0); // 1n
 * ```
 */
export function readUInt64LE(bytes: Uint8Array, offset: number): bigint {
    return getDataView(bytes, offset, 8).getBigUint64(0, true);
}

export function readUInt64BE(bytes: Uint8Array, offset: number): bigint {
    return getDataView(bytes, offset, 8).getBigUint64(0, false);
}

export function writeUInt64LE(bytes: Uint8Array, value: bigint, offset: number): number {
    getDataView(bytes, offset, 8).setBigUint64(0, value, true);
    return offset + 8;
}

export function writeUInt64BE(bytes: Uint8Array, value: bigint, offset: number): number {
    getDataView(bytes, offset, 8).setBigUint64(0, value, false);
    return offset + 8;
}
