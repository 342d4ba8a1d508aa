/**
 * Reference-counted, slice-capable byte buffers with binary builder and
 * reader cursors.
 *
 * @packageDocumentation
 */
export { RcBuffer, retain, release } from './buffer.js';
export { concat, concatMany, equals, compare } from './aggregate.js';
export {
    ByteBuilder,
    ByteReader,
    toHex,
    fromHex,
    isHex,
    readFd,
    writeFd,
    readFile,
    writeFile,
    inspect,
    debugPrint,
    varuint,
} from './io/index.js';
export type { ToHexOptions } from './io/index.js';
export { configure, getConfig, resetConfig, DEFAULT_CONFIG } from './config.js';
export type { BufferConfig } from './config.js';
export { ContractError, ReadBoundsError } from './errors.js';
export { AtomicRefCounter, PlainRefCounter } from './refcount.js';
export type { RefCounter } from './refcount.js';
export type { Maybe } from './types.js';
export { isUInt8, isUInt16, isUInt32, isUInt53, isUInt64 } from './types.js';
