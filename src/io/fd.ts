/**
 * Synchronous file and descriptor I/O for {@link RcBuffer}.
 *
 * Reads grow the destination and commit only the bytes actually read.
 * Missing or inaccessible paths are reported as `null`/`false`; any other
 * I/O failure is thrown unchanged.
 *
 * @packageDocumentation
 */
import * as fs from 'fs';
import { RcBuffer } from '../buffer.js';
import { getConfig } from '../config.js';

const RECOVERABLE_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'ENOTDIR', 'EROFS']);

function isRecoverableFsError(error: unknown): boolean {
    if (!(error instanceof Error) || !('code' in error)) return false;
    const { code } = error;
    return typeof code === 'string' && RECOVERABLE_CODES.has(code);
}

/**
 * Reads up to `maxBytes` from `fd`, appending them to `buf`.
 *
 * @returns Bytes read (0 at end of file), or -1 if `buf` is shared, a slice, or cannot grow
 */
export function readFd(buf: RcBuffer, fd: number, maxBytes: number = getConfig().readChunkSize): number {
    if (!Number.isInteger(fd) || fd < 0) {
        throw new TypeError(`invalid file descriptor ${fd}`);
    }
    if (!Number.isInteger(maxBytes) || maxBytes <= 0) {
        throw new RangeError(`maxBytes must be a positive integer, got ${maxBytes}`);
    }
    if (!buf.reserve(buf.size + maxBytes)) return -1;
    const spare = buf.spareCapacity();
    if (!spare) return -1;

    const bytesRead = fs.readSync(fd, spare, 0, maxBytes, null);
    buf.commit(bytesRead);
    return bytesRead;
}

/**
 * Writes the whole contents of `buf` to `fd` in one call.
 *
 * @returns Bytes written
 */
export function writeFd(buf: RcBuffer, fd: number): number {
    if (!Number.isInteger(fd) || fd < 0) {
        throw new TypeError(`invalid file descriptor ${fd}`);
    }
    if (buf.isEmpty) return 0;
    return fs.writeSync(fd, buf.data());
}

/**
 * Loads a whole file into a new buffer.
 *
 * @returns The buffer, or null if the file does not exist or cannot be opened
 */
export function readFile(path: string): RcBuffer | null {
    let contents: Uint8Array;
    try {
        contents = fs.readFileSync(path);
    } catch (error) {
        if (isRecoverableFsError(error)) return null;
        throw error;
    }
    return RcBuffer.from(contents);
}

/**
 * Writes the buffer contents to `path`, replacing any existing file.
 *
 * @returns false if the file cannot be created or opened for writing
 */
export function writeFile(buf: RcBuffer, path: string): boolean {
    try {
        fs.writeFileSync(path, buf.data());
    } catch (error) {
        if (isRecoverableFsError(error)) return false;
        throw error;
    }
    return true;
}
