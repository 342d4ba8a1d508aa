/**
 * Read-only debug formatting of a buffer's metadata and leading bytes.
 *
 * @packageDocumentation
 */
import type { RcBuffer } from '../buffer.js';
import { getConfig } from '../config.js';
import type { Maybe } from '../types.js';
import { bytesToHex } from '../uint8array-utils.js';

/**
 * Describes a buffer on one or two lines.
 *
 * @example
 * ```typescript
 * inspect(RcBuffer.from('Hi'), 'greeting');
 * // 'greeting: size=2, capacity=2, refcount=1\n  data: 48 69'
 * ```
 */
export function inspect(buf: Maybe<RcBuffer>, label: string = 'buffer'): string {
    if (!buf) return `${label}: NULL`;
    if (!buf.isAlive) return `${label}: <freed>`;

    const header = `${label}: size=${buf.size}, capacity=${buf.capacity}, refcount=${buf.refcount}`;
    if (buf.isEmpty) return header;

    const limit = getConfig().previewBytes;
    const data = buf.data();
    const shown = data.subarray(0, Math.min(limit, data.length));
    const bytes: string[] = [];
    for (let i = 0; i < shown.length; i++) {
        bytes.push(bytesToHex(shown.subarray(i, i + 1)));
    }
    let preview = bytes.length > 0 ? `  data: ${bytes.join(' ')}` : '  data:';
    if (data.length > shown.length) {
        preview += ` ... (${data.length - shown.length} more bytes)`;
    }
    return `${header}\n${preview}`;
}

/**
 * Writes {@link inspect} output to `sink` (console.log by default).
 */
export function debugPrint(
    buf: Maybe<RcBuffer>,
    label: string = 'buffer',
    sink: (line: string) => void = console.log,
): void {
    sink(inspect(buf, label));
}
