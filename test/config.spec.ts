import assert from 'assert';
import { afterEach, describe, it } from 'vitest';

import { ByteBuilder, DEFAULT_CONFIG, RcBuffer, configure, getConfig, resetConfig } from '../src/index.js';

describe('configuration', () => {
    afterEach(() => {
        resetConfig();
    });

    it('starts from the defaults', () => {
        assert.deepStrictEqual(getConfig(), {
            defaultCapacity: 64,
            maxCapacity: 0x7fffffff,
            readChunkSize: 4096,
            previewBytes: 16,
            atomicRefcount: false,
        });
        assert.strictEqual(getConfig(), DEFAULT_CONFIG);
    });

    it('merges overrides', () => {
        const next = configure({ previewBytes: 4 });
        assert.strictEqual(next.previewBytes, 4);
        assert.strictEqual(next.readChunkSize, 4096);
        assert.strictEqual(getConfig(), next);
        assert.ok(Object.isFrozen(next));
    });

    it('rejects invalid values and keeps the active configuration', () => {
        configure({ defaultCapacity: 8 });
        assert.throws(() => configure({ readChunkSize: 0 }), RangeError);
        assert.throws(() => configure({ defaultCapacity: -1 }), RangeError);
        assert.throws(() => configure({ maxCapacity: 4 }), RangeError);
        assert.throws(() => configure({ previewBytes: 0.5 }), RangeError);
        assert.strictEqual(getConfig().defaultCapacity, 8);
        assert.strictEqual(getConfig().readChunkSize, 4096);
    });

    it('applies to buffers created afterwards only', () => {
        const before = RcBuffer.create(4);
        configure({ maxCapacity: 4 * 1024, defaultCapacity: 16 });
        const builder = new ByteBuilder();
        const after = builder.finish();
        assert.strictEqual(after.capacity, 16);
        assert.strictEqual(before.reserve(8 * 1024), true);
        assert.strictEqual(after.reserve(8 * 1024), false);
        before.release();
        after.release();
    });

    it('restores the defaults', () => {
        configure({ atomicRefcount: true });
        resetConfig();
        assert.strictEqual(getConfig(), DEFAULT_CONFIG);
    });
});
