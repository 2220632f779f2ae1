import assert from 'assert';
import { describe, it } from 'vitest';

import { u8, u16, u32 } from '../src/consensus/codec.js';
import {
    MAX_VEC_SIZE,
    bytes4,
    bytes32,
    bytes33,
    checkAllocation,
    checkedData,
    pair,
    varBytes,
    varString,
    vector,
} from '../src/consensus/collections.js';
import { deserialize, deserializeHex, serializeHex } from '../src/consensus/encode.js';
import {
    InvalidChecksumError,
    IoError,
    OversizedVectorAllocationError,
    ParseFailedError,
} from '../src/consensus/errors.js';
import { fromHex, toHex } from '../src/io/index.js';
import { toFixedBytes } from '../src/types.js';

describe('fixed-size byte arrays', () => {
    it('should copy the bytes with no length prefix', () => {
        const id = toFixedBytes(fromHex('01020304'), 4);
        assert.strictEqual(serializeHex(bytes4, id), '01020304');
        assert.strictEqual(toHex(deserializeHex(bytes4, '01020304')), '01020304');
    });

    it('should decode exactly the declared width', () => {
        const key = deserialize(bytes33, new Uint8Array(33).fill(2));
        assert.strictEqual(key.length, 33);
        assert.throws(() => deserialize(bytes32, new Uint8Array(31)), IoError);
    });

    it('should refuse to brand an array of the wrong width', () => {
        assert.throws(() => toFixedBytes(new Uint8Array(31), 32), TypeError);
    });
});

describe('vector', () => {
    it('should prefix elements with their count', () => {
        assert.strictEqual(serializeHex(vector(u16), [1, 2]), '0201000200');
        assert.strictEqual(serializeHex(vector(u16), []), '00');
    });

    it('should decode elements in order', () => {
        assert.deepStrictEqual(deserializeHex(vector(u16), '0201000200'), [1, 2]);
    });

    it('should nest', () => {
        const nested = vector(vector(u8));
        const hex = serializeHex(nested, [[1], [2, 3]]);
        assert.strictEqual(hex, '020101020203');
        assert.deepStrictEqual(deserializeHex(nested, hex), [[1], [2, 3]]);
    });

    it('should reject a count whose byte size exceeds the ceiling', () => {
        // 1,000,001 u32 elements = 4,000,004 bytes
        assert.throws(() => deserializeHex(vector(u32), 'fe41420f00'), {
            name: 'OversizedVectorAllocationError',
            kind: 'oversized-vector-allocation',
            requested: 4_000_004n,
            max: MAX_VEC_SIZE,
        });
    });

    it('should accept a count exactly at the ceiling', () => {
        // 1,000,000 u32 elements = 4,000,000 bytes; fails only for want of data
        assert.throws(() => deserializeHex(vector(u32), 'fe40420f00'), IoError);
    });

    it('should reject a count whose byte size overflows 64 bits', () => {
        assert.throws(
            () => deserializeHex(vector(u32), 'ffffffffffffffffff'),
            (err: unknown) => err instanceof ParseFailedError && err.reason === 'invalid length',
        );
    });

    it('should propagate the first element error', () => {
        assert.throws(() => deserializeHex(vector(u16), '03010002'), IoError);
    });
});

describe('checkAllocation', () => {
    it('should return the count when within bounds', () => {
        assert.strictEqual(checkAllocation(10n, 4), 10);
        assert.strictEqual(checkAllocation(BigInt(MAX_VEC_SIZE), 1), MAX_VEC_SIZE);
    });

    it('should reject counts over the ceiling before allocating', () => {
        assert.throws(() => checkAllocation(BigInt(MAX_VEC_SIZE) + 1n, 1), OversizedVectorAllocationError);
    });
});

describe('varBytes', () => {
    it('should round-trip raw bytes', () => {
        assert.strictEqual(serializeHex(varBytes, fromHex('deadbeef')), '04deadbeef');
        assert.strictEqual(toHex(deserializeHex(varBytes, '04deadbeef')), 'deadbeef');
    });

    it('should reject a 9-byte length claiming an enormous buffer', () => {
        assert.throws(() => deserializeHex(varBytes, 'ffffffffffffffffff'), {
            name: 'OversizedVectorAllocationError',
            requested: 0xffff_ffff_ffff_ffffn,
            max: 4_000_000,
        });
    });

    it('should fail with IoError when fewer bytes follow than declared', () => {
        assert.throws(() => deserializeHex(varBytes, '04dead'), IoError);
    });
});

describe('varString', () => {
    it('should encode UTF-8 with a length prefix', () => {
        assert.strictEqual(serializeHex(varString, 'hi'), '026869');
        assert.strictEqual(serializeHex(varString, 'ü'), '02c3bc');
        assert.strictEqual(serializeHex(varString, ''), '00');
    });

    it('should decode UTF-8', () => {
        assert.strictEqual(deserializeHex(varString, '02c3bc'), 'ü');
    });

    it('should encode a surrogate pair as one four-byte sequence', () => {
        assert.strictEqual(serializeHex(varString, '\u{1F600}'), '04f09f9880');
        assert.strictEqual(deserializeHex(varString, '04f09f9880'), '\u{1F600}');
    });

    it('should refuse to encode an unpaired surrogate', () => {
        assert.throws(() => serializeHex(varString, 'a\uD800'), RangeError);
        assert.throws(() => serializeHex(varString, '\uDC00a'), RangeError);
        assert.throws(() => serializeHex(varString, '\uDBFF\uDBFF\uDC00'), RangeError);
    });

    it('should reject invalid UTF-8', () => {
        assert.throws(() => deserializeHex(varString, '02c328'), {
            name: 'ParseFailedError',
            reason: 'string was not valid UTF8',
        });
    });
});

describe('checkedData', () => {
    it('should frame a payload with its length and checksum', () => {
        assert.strictEqual(serializeHex(checkedData, new Uint8Array(0)), '000000005df6e0e2');
    });

    it('should round-trip a payload', () => {
        const payload = fromHex('0102030405');
        const hex = serializeHex(checkedData, payload);
        assert.strictEqual(hex.slice(0, 8), '05000000');
        assert.strictEqual(toHex(deserializeHex(checkedData, hex)), '0102030405');
    });

    it('should reject a checksum mismatch', () => {
        assert.throws(
            () => deserializeHex(checkedData, '0000000000000000'),
            (err: unknown) =>
                err instanceof InvalidChecksumError &&
                toHex(err.expected) === '5df6e0e2' &&
                toHex(err.actual) === '00000000',
        );
    });

    it('should reject a declared length over the ceiling', () => {
        assert.throws(() => deserializeHex(checkedData, '01093d0000000000'), OversizedVectorAllocationError);
    });
});

describe('pair', () => {
    it('should encode both values back to back', () => {
        const codec = pair(u32, u8);
        assert.strictEqual(serializeHex(codec, [1, 2]), '0100000002');
        assert.deepStrictEqual(deserializeHex(codec, '0100000002'), [1, 2]);
        assert.strictEqual(codec.elementSize, 5);
    });
});
