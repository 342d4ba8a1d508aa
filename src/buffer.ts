/**
 * Reference-counted byte buffer with zero-copy slices and guarded in-place
 * mutation.
 *
 * @packageDocumentation
 */
import { getConfig } from './config.js';
import { ContractError } from './errors.js';
import { createRefCounter, type RefCounter } from './refcount.js';
import { isUInt53, type Maybe } from './types.js';
import { fromUtf8 } from './uint8array-utils.js';

const EMPTY = new Uint8Array(0);

function assertLength(value: number, name: string): void {
    if (!isUInt53(value)) {
        throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
    }
}

/**
 * A reference-counted byte range.
 *
 * A buffer is either a root, which owns its storage, or a slice, which
 * holds a retained reference to a root and reads through the root's storage.
 * Roots may be mutated in place only while they hold the single reference;
 * slices are never mutated in place.
 *
 * Every constructor returns a buffer with `refcount === 1`. Each `retain()`
 * must be paired with one `release()`; the last release frees the storage
 * (or, for a slice, releases the root) and any further use of the object
 * throws {@link ContractError}.
 *
 * @example
 * ```typescript
 * import { RcBuffer } from 'refbuf';
 *
 * let buf: RcBuffer | null = RcBuffer.from('Hello, World!');
 * const world = buf.slice(7, 5);  // zero-copy, retains buf
 * buf = buf.release();            // storage stays alive through the slice
 * world?.data();                  // 'World' bytes
 * world?.release();
 * ```
 */
export class RcBuffer {
    /** Root storage; empty for slices and freed buffers. */
    #storage: Uint8Array;
    #size: number;
    readonly #counter: RefCounter;
    /** The root owner, for slices. */
    #parent: RcBuffer | null;
    /** Offset into the root's storage, for slices. */
    readonly #offset: number;
    readonly #maxCapacity: number;
    #freed = false;

    private constructor(storage: Uint8Array, size: number, parent: RcBuffer | null, offset: number) {
        const config = getConfig();
        this.#storage = storage;
        this.#size = size;
        this.#parent = parent;
        this.#offset = offset;
        this.#maxCapacity = config.maxCapacity;
        this.#counter = createRefCounter(config.atomicRefcount);
    }

    // ========================================================================
    // Constructors
    // ========================================================================

    /**
     * Allocates an empty buffer with room for `capacity` bytes.
     *
     * @throws RangeError if capacity is negative, fractional or above the configured maximum
     */
    public static create(capacity: number = getConfig().defaultCapacity): RcBuffer {
        assertLength(capacity, 'capacity');
        const { maxCapacity } = getConfig();
        if (capacity > maxCapacity) {
            throw new RangeError(`capacity ${capacity} exceeds maximum ${maxCapacity}`);
        }
        return new RcBuffer(new Uint8Array(capacity), 0, null, 0);
    }

    /**
     * Copies `data` into a new buffer whose capacity equals its size.
     * Strings are encoded as UTF-8. An empty source yields an empty buffer.
     */
    public static from(data: Uint8Array | string): RcBuffer {
        const bytes = typeof data === 'string' ? fromUtf8(data) : data;
        const buf = RcBuffer.create(bytes.length);
        buf.#storage.set(bytes);
        buf.#size = bytes.length;
        return buf;
    }

    /**
     * Takes ownership of an existing allocation without copying it.
     *
     * The first `size` bytes of `storage` become the buffer contents and
     * `capacity` bytes of it are usable for growth in place. After the call the
     * caller must no longer read or write `storage` directly.
     *
     * @param capacity - Usable bytes of `storage`, defaults to all of it
     * @returns The adopting buffer, or null if `size > capacity` or `capacity > storage.length`
     */
    public static adopt(storage: Uint8Array, size: number, capacity: number = storage.length): RcBuffer | null {
        assertLength(size, 'size');
        assertLength(capacity, 'capacity');
        if (size > capacity || capacity > storage.length) return null;
        if (capacity > getConfig().maxCapacity) return null;
        const owned = capacity === storage.length ? storage : storage.subarray(0, capacity);
        return new RcBuffer(owned, size, null, 0);
    }

    // ========================================================================
    // Ownership
    // ========================================================================

    /**
     * Adds a reference.
     *
     * @returns This buffer, for chaining
     */
    public retain(): this {
        this.#assertAlive();
        this.#counter.increment();
        return this;
    }

    /**
     * Drops a reference; the last one frees the storage or releases the root.
     *
     * @returns null, so callers can write `buf = buf.release()`
     */
    public release(): null {
        this.#assertAlive();
        if (this.#counter.decrement() === 0) {
            this.#freed = true;
            this.#storage = EMPTY;
            this.#size = 0;
            const parent = this.#parent;
            this.#parent = null;
            parent?.release();
        }
        return null;
    }

    // ========================================================================
    // Accessors
    // ========================================================================

    /** False once the last reference has been released. */
    public get isAlive(): boolean {
        return !this.#freed;
    }

    /** Number of valid bytes. */
    public get size(): number {
        this.#assertAlive();
        return this.#size;
    }

    /** Allocated bytes; equals `size` for slices. */
    public get capacity(): number {
        this.#assertAlive();
        return this.#parent ? this.#size : this.#storage.length;
    }

    public get isEmpty(): boolean {
        return this.size === 0;
    }

    public get refcount(): number {
        this.#assertAlive();
        return this.#counter.load();
    }

    /** True when this buffer reads through another buffer's storage. */
    public get isSlice(): boolean {
        this.#assertAlive();
        return this.#parent !== null;
    }

    /**
     * Adds a reference to the root owner whose storage this buffer reads
     * (itself for roots) and returns it. The caller must release it.
     */
    public retainRoot(): RcBuffer {
        this.#assertAlive();
        return (this.#parent ?? this).retain();
    }

    /**
     * Offset of this buffer's first byte within its root's storage.
     */
    public get offset(): number {
        this.#assertAlive();
        return this.#offset;
    }

    /**
     * A view of the valid bytes, without copying.
     * The view is read-only by contract; use {@link mutableData} to write.
     * It is invalidated by any later growth of the buffer.
     */
    public data(): Uint8Array {
        this.#assertAlive();
        if (this.#parent) {
            return this.#parent.#storage.subarray(this.#offset, this.#offset + this.#size);
        }
        return this.#storage.subarray(0, this.#size);
    }

    /**
     * Byte at `index`, or undefined outside `[0, size)`.
     */
    public at(index: number): number | undefined {
        if (!Number.isInteger(index) || index < 0 || index >= this.size) return undefined;
        return this.data()[index];
    }

    /**
     * A writable view of the valid bytes, or null when the buffer is shared or a slice.
     */
    public mutableData(): Uint8Array | null {
        if (!this.isExclusive()) return null;
        return this.#storage.subarray(0, this.#size);
    }

    /**
     * A writable view of the allocated bytes past `size`, or null when the
     * buffer is shared or a slice. Make written bytes valid with {@link commit}.
     */
    public spareCapacity(): Uint8Array | null {
        if (!this.isExclusive()) return null;
        return this.#storage.subarray(this.#size);
    }

    /**
     * Extends the size over `count` bytes already written through
     * {@link spareCapacity}, without clearing them.
     *
     * @returns false if the buffer is shared, a slice, or `count` exceeds the spare capacity
     */
    public commit(count: number): boolean {
        assertLength(count, 'count');
        if (!this.isExclusive()) return false;
        if (this.#size + count > this.#storage.length) return false;
        this.#size += count;
        return true;
    }

    /**
     * Whether in-place mutation is allowed: a single reference and not a slice.
     */
    public isExclusive(): boolean {
        this.#assertAlive();
        return this.#parent === null && this.#counter.load() === 1;
    }

    /**
     * Copies the valid bytes into a new Uint8Array.
     */
    public toUint8Array(): Uint8Array {
        return this.data().slice();
    }

    /**
     * Copies the valid bytes into an independent root buffer.
     */
    public clone(): RcBuffer {
        return RcBuffer.from(this.data());
    }

    // ========================================================================
    // Slices
    // ========================================================================

    /**
     * Creates a zero-copy view of `length` bytes starting at `offset`.
     * The view retains the root owner, so a slice of a slice never chains.
     *
     * @returns The slice, or null if the range falls outside `[0, size]`
     */
    public slice(offset: number, length: number): RcBuffer | null {
        this.#assertAlive();
        if (!isUInt53(offset) || !isUInt53(length)) return null;
        if (offset > this.#size || offset + length > this.#size) return null;
        const root = this.#parent ?? this;
        root.retain();
        return new RcBuffer(EMPTY, length, root, this.#offset + offset);
    }

    /**
     * Slice from `offset` to the end.
     */
    public sliceFrom(offset: number): RcBuffer | null {
        this.#assertAlive();
        if (!isUInt53(offset) || offset > this.#size) return null;
        return this.slice(offset, this.#size - offset);
    }

    /**
     * Slice of the first `length` bytes.
     */
    public sliceTo(length: number): RcBuffer | null {
        this.#assertAlive();
        if (!isUInt53(length) || length > this.#size) return null;
        return this.slice(0, length);
    }

    // ========================================================================
    // Guarded mutation
    // ========================================================================

    /**
     * Sets the size. Growing within capacity zero-fills the exposed bytes;
     * growing beyond it reallocates to `max(newSize, 2 * capacity)`.
     *
     * @returns false if the buffer is shared, a slice, or cannot grow that far
     */
    public resize(newSize: number): boolean {
        assertLength(newSize, 'newSize');
        if (!this.isExclusive()) return false;
        if (newSize > this.#storage.length && !this.#grow(newSize)) return false;
        if (newSize > this.#size) {
            this.#storage.fill(0, this.#size, newSize);
        }
        this.#size = newSize;
        return true;
    }

    /**
     * Ensures capacity for at least `minCapacity` bytes. Never shrinks.
     *
     * @returns true if the capacity already suffices or was grown
     */
    public reserve(minCapacity: number): boolean {
        assertLength(minCapacity, 'minCapacity');
        if (minCapacity <= this.capacity) return true;
        if (!this.isExclusive()) return false;
        return this.#grow(minCapacity);
    }

    /**
     * Appends a copy of `bytes`.
     *
     * @returns false if the buffer is shared, a slice, or cannot grow that far
     */
    public append(bytes: Uint8Array | string): boolean {
        const data = typeof bytes === 'string' ? fromUtf8(bytes) : bytes;
        this.#assertAlive();
        if (data.length === 0) return true;
        if (!this.isExclusive()) return false;
        const required = this.#size + data.length;
        if (required > this.#storage.length && !this.#grow(required)) return false;
        this.#storage.set(data, this.#size);
        this.#size = required;
        return true;
    }

    /**
     * Sets the size to zero, keeping capacity.
     *
     * @returns false if the buffer is shared or a slice
     */
    public clear(): boolean {
        if (!this.isExclusive()) return false;
        this.#size = 0;
        return true;
    }

    #grow(minCapacity: number): boolean {
        if (minCapacity > this.#maxCapacity) return false;
        const target = Math.min(Math.max(minCapacity, this.#storage.length * 2), this.#maxCapacity);
        let next: Uint8Array;
        try {
            next = new Uint8Array(target);
        } catch (error) {
            // Beyond what the engine can allocate.
            if (error instanceof RangeError) return false;
            throw error;
        }
        next.set(this.#storage.subarray(0, this.#size));
        this.#storage = next;
        return true;
    }

    #assertAlive(): void {
        if (this.#freed) {
            throw new ContractError('buffer used after its last reference was released');
        }
    }
}

/**
 * Adds a reference to `buf`; absent buffers are passed through untouched.
 */
export function retain<T extends Maybe<RcBuffer>>(buf: T): T {
    buf?.retain();
    return buf;
}

/**
 * Drops a reference to `buf`; absent buffers are ignored.
 *
 * @returns null, so callers can write `buf = release(buf)`
 */
export function release(buf: Maybe<RcBuffer>): null {
    buf?.release();
    return null;
}
