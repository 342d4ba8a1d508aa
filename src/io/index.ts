/**
 * Binary I/O over reference-counted buffers.
 *
 * @packageDocumentation
 */

import * as varuint from 'varuint-bitcoin';

// Binary reading and writing
export { ByteReader } from './ByteReader.js';
export { ByteBuilder } from './ByteBuilder.js';

// Hex encoding/decoding
export { toHex, fromHex, isHex } from './hex.js';
export type { ToHexOptions } from './hex.js';

// File and descriptor I/O
export { readFd, writeFd, readFile, writeFile } from './fd.js';

// Debug formatting
export { inspect, debugPrint } from './inspect.js';

// Re-export varuint for CompactSize lengths
export { varuint };
