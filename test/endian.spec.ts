import assert from 'assert';
import { describe, it } from 'vitest';

import {
    fromHex,
    readInt32LE,
    readInt64LE,
    readInt8,
    readUInt16BE,
    readUInt16LE,
    readUInt32BE,
    readUInt32LE,
    readUInt64BE,
    readUInt64LE,
    toHex,
    writeInt16LE,
    writeUInt16BE,
    writeUInt32BE,
    writeUInt32LE,
    writeUInt64LE,
} from '../src/io/index.js';

describe('endian', () => {
    describe('reading', () => {
        it('should read big-endian values', () => {
            assert.strictEqual(readUInt32BE(fromHex('deadbeef'), 0), 0xdeadbeef);
            assert.strictEqual(readUInt16BE(fromHex('208d'), 0), 8333);
            assert.strictEqual(readUInt64BE(fromHex('0000000000000102'), 0), 0x102n);
        });

        it('should read little-endian values', () => {
            assert.strictEqual(readUInt16LE(fromHex('adde'), 0), 0xdead);
            assert.strictEqual(readUInt32LE(fromHex('efbeadde'), 0), 0xdeadbeef);
            assert.strictEqual(readUInt64LE(fromHex('efbeaddefecaad1b'), 0), 0x1badcafedeadbeefn);
        });

        it('should read signed values', () => {
            assert.strictEqual(readInt8(fromHex('80'), 0), -128);
            assert.strictEqual(readInt32LE(fromHex('ffffffff'), 0), -1);
            assert.strictEqual(readInt64LE(fromHex('feffffffffffffff'), 0), -2n);
        });

        it('should honour the offset', () => {
            assert.strictEqual(readUInt32LE(fromHex('00efbeadde'), 1), 0xdeadbeef);
        });

        it('should throw when the slice is too short', () => {
            assert.throws(() => readUInt32LE(new Uint8Array(3), 0), RangeError);
        });

        it('should read from a view with a byte offset', () => {
            const backing = fromHex('ffffefbeadde');
            assert.strictEqual(readUInt32LE(backing.subarray(2), 0), 0xdeadbeef);
        });
    });

    describe('writing', () => {
        it('should write both byte orders', () => {
            const be = new Uint8Array(4);
            const le = new Uint8Array(4);
            writeUInt32BE(be, 0xdeadbeef, 0);
            writeUInt32LE(le, 0xdeadbeef, 0);
            assert.strictEqual(toHex(be), 'deadbeef');
            assert.strictEqual(toHex(le), 'efbeadde');
        });

        it('should return the next offset', () => {
            const bytes = new Uint8Array(12);
            let offset = writeUInt16BE(bytes, 0x0102, 0);
            offset = writeInt16LE(bytes, -2, offset);
            offset = writeUInt64LE(bytes, 1n, offset);
            assert.strictEqual(offset, 12);
            assert.strictEqual(toHex(bytes), '0102feff0100000000000000');
        });
    });
});
