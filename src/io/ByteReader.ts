/**
 * Sequential, bounds-checked decoder over an {@link RcBuffer}.
 *
 * @packageDocumentation
 */
import * as varuint from 'varuint-bitcoin';
import type { RcBuffer } from '../buffer.js';
import { ContractError, ReadBoundsError } from '../errors.js';
import * as u8 from '../uint8array-utils.js';

/**
 * Reads binary values from a buffer it keeps a reference to.
 *
 * Reading past the end is a caller bug and throws {@link ReadBoundsError};
 * check {@link canRead} first when the input length is not known. Call
 * {@link free} when done to drop the reference.
 *
 * @example
 * ```typescript
 * import { ByteReader, RcBuffer } from 'refbuf';
 *
 * const reader = new ByteReader(RcBuffer.from(Uint8Array.of(0x34, 0x12)));
 * reader.readUInt16LE(); // 0x1234
 * reader.remaining;      // 0
 * reader.free();
 * ```
 */
export class ByteReader {
    #buffer: RcBuffer | null;
    readonly #view: Uint8Array;
    #position = 0;

    public constructor(buffer: RcBuffer) {
        this.#buffer = buffer.retain();
        // Stable while retained: a shared buffer cannot be mutated in place.
        this.#view = buffer.data();
    }

    public get position(): number {
        this.#active();
        return this.#position;
    }

    public get remaining(): number {
        this.#active();
        return this.#view.length - this.#position;
    }

    /** Size of the buffer being read. */
    public get size(): number {
        this.#active();
        return this.#view.length;
    }

    /**
     * Whether `n` more bytes are available.
     */
    public canRead(n: number): boolean {
        return Number.isInteger(n) && n >= 0 && this.remaining >= n;
    }

    /**
     * Moves the cursor.
     *
     * @throws ContractError if `position` lies outside `[0, size]`
     */
    public seek(position: number): this {
        this.#active();
        if (!Number.isInteger(position) || position < 0 || position > this.#view.length) {
            throw new ContractError(`cannot seek to ${position} in a ${this.#view.length}-byte buffer`);
        }
        this.#position = position;
        return this;
    }

    public readUInt8(): number {
        return u8.readUInt8(this.#view, this.#advance(1));
    }

    public readUInt16LE(): number {
        return u8.readUInt16LE(this.#view, this.#advance(2));
    }

    public readUInt16BE(): number {
        return u8.readUInt16BE(this.#view, this.#advance(2));
    }

    public readUInt32LE(): number {
        return u8.readUInt32LE(this.#view, this.#advance(4));
    }

    public readUInt32BE(): number {
        return u8.readUInt32BE(this.#view, this.#advance(4));
    }

    public readUInt64LE(): bigint {
        return u8.readUInt64LE(this.#view, this.#advance(8));
    }

    public readUInt64BE(): bigint {
        return u8.readUInt64BE(this.#view, this.#advance(8));
    }

    /**
     * Reads a CompactSize variable-length integer (1, 3, 5 or 9 bytes).
     *
     * @throws RangeError if the value does not fit in a safe integer; use {@link readVarIntBig}
     */
    public readVarInt(): number {
        const value = this.readVarIntBig();
        if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
            throw new RangeError(`varint ${value} exceeds Number.MAX_SAFE_INTEGER`);
        }
        return Number(value);
    }

    public readVarIntBig(): bigint {
        this.#require(1);
        const prefix = this.#view[this.#position];
        const length = prefix === 0xff ? 9 : prefix === 0xfe ? 5 : prefix === 0xfd ? 3 : 1;
        const decoded = varuint.decode(this.#view, this.#advance(length));
        return decoded.bigintValue;
    }

    /**
     * Reads `n` bytes into a new array.
     */
    public readBytes(n: number): Uint8Array {
        const start = this.#advance(n);
        return this.#view.slice(start, start + n);
    }

    /**
     * Reads `n` bytes into `out`, starting at index 0.
     *
     * @throws RangeError if `out` is shorter than `n`
     */
    public readInto(out: Uint8Array, n: number = out.length): void {
        if (n > out.length) {
            throw new RangeError(`destination holds ${out.length} bytes, ${n} requested`);
        }
        const start = this.#advance(n);
        out.set(this.#view.subarray(start, start + n));
    }

    /**
     * Reads `n` bytes and decodes them as UTF-8.
     */
    public readString(n: number): string {
        const start = this.#advance(n);
        return u8.toUtf8(this.#view.subarray(start, start + n));
    }

    /**
     * Releases the buffer. The reader cannot be used afterwards.
     */
    public free(): void {
        const buf = this.#active();
        this.#buffer = null;
        buf.release();
    }

    #require(n: number): void {
        if (!this.canRead(n)) {
            throw new ReadBoundsError(this.#position, n, this.#view.length);
        }
    }

    /**
     * Checks that `n` bytes remain, moves past them and returns where they start.
     */
    #advance(n: number): number {
        this.#require(n);
        const start = this.#position;
        this.#position += n;
        return start;
    }

    #active(): RcBuffer {
        if (!this.#buffer) {
            throw new ContractError('reader used after free()');
        }
        return this.#buffer;
    }
}
