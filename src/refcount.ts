/**
 * Reference counters backing {@link RcBuffer}.
 *
 * The atomic variant keeps its count in a `SharedArrayBuffer` so that the
 * counter itself may be handed to a Worker; increments and decrements are
 * the only operations that are safe to perform concurrently.
 *
 * @packageDocumentation
 */

/**
 * A counter of live handles.
 */
export interface RefCounter {
    /** Current count. */
    load(): number;
    /** Adds one and returns the new count. */
    increment(): number;
    /** Subtracts one and returns the new count. */
    decrement(): number;
}

/**
 * Single-threaded counter.
 */
export class PlainRefCounter implements RefCounter {
    #count: number;

    public constructor(initial: number = 1) {
        this.#count = initial;
    }

    public load(): number {
        return this.#count;
    }

    public increment(): number {
        return ++this.#count;
    }

    public decrement(): number {
        return --this.#count;
    }
}

/**
 * Counter updated with `Atomics` on a 4-byte `SharedArrayBuffer`.
 *
 * @example
 * ```typescript
 * const counter = new AtomicRefCounter();
 * worker.postMessage({ refcount: counter.sharedBuffer });
 *
 * // Worker thread
 * const shared = AtomicRefCounter.fromSharedBuffer(e.data.refcount);
 * shared.increment();
 * ```
 */
export class AtomicRefCounter implements RefCounter {
    readonly #buffer: SharedArrayBuffer;
    readonly #control: Int32Array;

    public constructor(initial: number = 1, buffer?: SharedArrayBuffer) {
        this.#buffer = buffer ?? new SharedArrayBuffer(4);
        this.#control = new Int32Array(this.#buffer, 0, 1);
        if (buffer === undefined) {
            Atomics.store(this.#control, 0, initial);
        }
    }

    /**
     * Wraps a counter previously created in another thread.
     */
    public static fromSharedBuffer(buffer: SharedArrayBuffer): AtomicRefCounter {
        if (buffer.byteLength < 4) {
            throw new RangeError('A shared refcount needs at least 4 bytes');
        }
        return new AtomicRefCounter(0, buffer);
    }

    /**
     * The underlying SharedArrayBuffer, for transfer to Workers.
     */
    public get sharedBuffer(): SharedArrayBuffer {
        return this.#buffer;
    }

    public load(): number {
        return Atomics.load(this.#control, 0);
    }

    public increment(): number {
        return Atomics.add(this.#control, 0, 1) + 1;
    }

    public decrement(): number {
        return Atomics.sub(this.#control, 0, 1) - 1;
    }
}

/**
 * Creates a counter starting at 1.
 */
export function createRefCounter(atomic: boolean): RefCounter {
    return atomic ? new AtomicRefCounter(1) : new PlainRefCounter(1);
}
