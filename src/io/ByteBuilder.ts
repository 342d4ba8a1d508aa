/**
 * Append/overwrite cursor that grows an {@link RcBuffer} while encoding
 * fixed-width integers and byte runs.
 *
 * @packageDocumentation
 */
import * as varuint from 'varuint-bitcoin';
import { RcBuffer } from '../buffer.js';
import { getConfig } from '../config.js';
import { ContractError } from '../errors.js';
import { assertUInt, assertUInt64, assertUint8Array } from '../types.js';
import * as u8 from '../uint8array-utils.js';

/**
 * Writes binary values into a buffer it owns.
 *
 * The cursor (`position`) is separate from the buffer size: after
 * {@link seek}ing backwards, writes overwrite in place and the size only
 * grows once the cursor passes it. All writes return the builder so calls
 * can be chained.
 *
 * @example
 * ```typescript
 * import { ByteBuilder } from 'refbuf';
 *
 * const buf = new ByteBuilder(16)
 *     .writeUInt8(0x42)
 *     .writeUInt16LE(0x1234)
 *     .writeUInt32BE(0x12345678)
 *     .writeString('Test')
 *     .finish();
 * buf.size; // 11
 * ```
 */
export class ByteBuilder {
    #buffer: RcBuffer | null;
    #position: number;

    /**
     * Starts a builder over a new empty buffer.
     */
    public constructor(initialCapacity: number = getConfig().defaultCapacity) {
        this.#buffer = RcBuffer.create(initialCapacity);
        this.#position = 0;
    }

    /**
     * Continues writing at the end of an existing buffer. The builder takes
     * over the caller's reference; get it back with {@link finish}.
     *
     * @returns The builder, or null if `buf` is shared or a slice
     */
    public static fromBuffer(buf: RcBuffer): ByteBuilder | null {
        if (!buf.isExclusive()) return null;
        const builder = new ByteBuilder(0);
        builder.#buffer?.release();
        builder.#buffer = buf;
        builder.#position = buf.size;
        return builder;
    }

    /** Current write cursor. */
    public get position(): number {
        return this.#position;
    }

    /** Bytes written so far, including any beyond the cursor. */
    public get size(): number {
        return this.#active().size;
    }

    /**
     * Moves the cursor.
     *
     * @throws ContractError if `position` lies past the written bytes
     */
    public seek(position: number): this {
        const buf = this.#active();
        if (!Number.isInteger(position) || position < 0 || position > buf.size) {
            throw new ContractError(`cannot seek to ${position}; only ${buf.size} bytes written`);
        }
        this.#position = position;
        return this;
    }

    public writeUInt8(value: number): this {
        assertUInt(value, 0xff, 'uint8');
        this.#position = u8.writeUInt8(this.#reserve(1), value, this.#position);
        return this;
    }

    public writeUInt16LE(value: number): this {
        assertUInt(value, 0xffff, 'uint16');
        this.#position = u8.writeUInt16LE(this.#reserve(2), value, this.#position);
        return this;
    }

    public writeUInt16BE(value: number): this {
        assertUInt(value, 0xffff, 'uint16');
        this.#position = u8.writeUInt16BE(this.#reserve(2), value, this.#position);
        return this;
    }

    public writeUInt32LE(value: number): this {
        assertUInt(value, 0xffffffff, 'uint32');
        this.#position = u8.writeUInt32LE(this.#reserve(4), value, this.#position);
        return this;
    }

    public writeUInt32BE(value: number): this {
        assertUInt(value, 0xffffffff, 'uint32');
        this.#position = u8.writeUInt32BE(this.#reserve(4), value, this.#position);
        return this;
    }

    public writeUInt64LE(value: bigint): this {
        assertUInt64(value, 'uint64');
        this.#position = u8.writeUInt64LE(this.#reserve(8), value, this.#position);
        return this;
    }

    public writeUInt64BE(value: bigint): this {
        assertUInt64(value, 'uint64');
        this.#position = u8.writeUInt64BE(this.#reserve(8), value, this.#position);
        return this;
    }

    /**
     * Writes a CompactSize variable-length integer (1, 3, 5 or 9 bytes).
     */
    public writeVarInt(value: number | bigint): this {
        if (typeof value === 'bigint') {
            assertUInt64(value, 'varint');
        } else {
            assertUInt(value, Number.MAX_SAFE_INTEGER, 'varint');
        }
        const length = varuint.encodingLength(value);
        const view = this.#reserve(length);
        this.#position += varuint.encode(value, view, this.#position).bytes;
        return this;
    }

    public writeBytes(bytes: Uint8Array): this {
        assertUint8Array(bytes, 'bytes');
        if (bytes.length === 0) return this;
        this.#reserve(bytes.length).set(bytes, this.#position);
        this.#position += bytes.length;
        return this;
    }

    /**
     * Writes the UTF-8 bytes of `text` with no terminator or length prefix.
     */
    public writeString(text: string): this {
        return this.writeBytes(u8.fromUtf8(text));
    }

    /**
     * Hands back the buffer. The builder cannot be used afterwards.
     */
    public finish(): RcBuffer {
        const buf = this.#active();
        this.#buffer = null;
        return buf;
    }

    /**
     * Makes room for `n` bytes at the cursor and returns a writable view of
     * the whole valid range.
     */
    #reserve(n: number): Uint8Array {
        const buf = this.#active();
        if (!buf.isExclusive()) {
            throw new ContractError('builder buffer was retained elsewhere before finish()');
        }
        const needed = this.#position + n;
        if (needed > buf.size && !buf.resize(needed)) {
            throw new RangeError(`buffer cannot grow to ${needed} bytes`);
        }
        return buf.data();
    }

    #active(): RcBuffer {
        if (!this.#buffer) {
            throw new ContractError('builder used after finish()');
        }
        return this.#buffer;
    }
}
