/**
 * Error types thrown on contract violations.
 *
 * Recoverable conditions (bad slice bounds, mutation of a shared buffer, bad
 * hex input, unreadable files) never throw; they return `null`, `false` or
 * `-1`. The classes here signal caller bugs.
 *
 * @packageDocumentation
 */

/**
 * Thrown when a handle is used after it was released, finished or freed,
 * or when a cursor is moved outside the written range.
 */
export class ContractError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContractError';
    }
}

/** Thrown when a reader is asked for more bytes than remain. */
export class ReadBoundsError extends RangeError {
    /** The reader position when the read was attempted. */
    public readonly offset: number;
    /** The number of bytes requested. */
    public readonly size: number;
    /** The size of the buffer being read. */
    public readonly bufferLength: number;

    constructor(offset: number, size: number, bufferLength: number) {
        super(
            `Read exceeds buffer bounds. offset=${offset}, size=${size}, bufferLength=${bufferLength}`,
        );
        this.name = 'ReadBoundsError';
        this.offset = offset;
        this.size = size;
        this.bufferLength = bufferLength;
    }
}
