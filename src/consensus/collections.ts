/**
 * Codecs for byte arrays, length-prefixed sequences and strings.
 *
 * @packageDocumentation
 */
import type { FixedByteSize, FixedBytesBySize } from '../branded.js';
import { hash256 } from '../crypto.js';
import { equals, fromUtf8, isWellFormed, toUtf8 } from '../io/index.js';
import { UINT64_MAX, toFixedBytes } from '../types.js';
import { HANDLE_SIZE, type Codec } from './codec.js';
import {
    InvalidChecksumError,
    OversizedVectorAllocationError,
    ParseFailedError,
} from './errors.js';
import { readVarInt, writeVarInt } from './varint.js';

/**
 * Largest number of bytes a single decoded sequence may claim.
 *
 * Consensus-relevant: every peer must reject the same inputs, so this is not
 * configurable.
 */
export const MAX_VEC_SIZE = 4_000_000;

/**
 * Validates a decoded element count against the allocation ceiling and
 * returns it as a number. Runs before anything is allocated.
 *
 * @throws ParseFailedError if `count * elementSize` does not fit in 64 bits
 * @throws OversizedVectorAllocationError if it exceeds {@link MAX_VEC_SIZE}
 */
export function checkAllocation(count: bigint, elementSize: number): number {
    const requested = count * BigInt(Math.max(1, elementSize));
    if (requested > UINT64_MAX) {
        throw new ParseFailedError('invalid length');
    }
    if (requested > BigInt(MAX_VEC_SIZE)) {
        throw new OversizedVectorAllocationError(requested, MAX_VEC_SIZE);
    }
    return Number(count);
}

// ============================================================================
// Fixed-size byte arrays
// ============================================================================

/**
 * Raw bytes of a statically known width, with no length prefix.
 */
export function fixedBytes<N extends FixedByteSize>(n: N): Codec<FixedBytesBySize[N]> {
    return {
        elementSize: n,
        encode: (value, writer) => {
            if (value.length !== n) {
                throw new TypeError(`Expected ${n}-byte Uint8Array, got ${value.length} bytes`);
            }
            return writer.emitSlice(value);
        },
        decode: (reader) => toFixedBytes(reader.readBytes(n), n),
    };
}

export const bytes2 = fixedBytes(2);
export const bytes4 = fixedBytes(4);
export const bytes8 = fixedBytes(8);
export const bytes12 = fixedBytes(12);
export const bytes16 = fixedBytes(16);
export const bytes32 = fixedBytes(32);
export const bytes33 = fixedBytes(33);

// ============================================================================
// Length-prefixed sequences
// ============================================================================

/**
 * A VarInt element count followed by that many elements.
 *
 * @example
 * ```typescript
 * serialize(vector(u16), [1, 2]); // 02 0100 0200
 * ```
 */
export function vector<T>(element: Codec<T>): Codec<T[]> {
    return {
        elementSize: HANDLE_SIZE,
        encode: (values, writer) => {
            let len = writeVarInt(values.length, writer);
            for (const value of values) {
                len += element.encode(value, writer);
            }
            return len;
        },
        decode: (reader) => {
            const count = checkAllocation(readVarInt(reader), element.elementSize);
            const values = new Array<T>(count);
            for (let i = 0; i < count; i++) {
                values[i] = element.decode(reader);
            }
            return values;
        },
    };
}

/**
 * VarInt-prefixed raw bytes, copied in one read.
 */
export const varBytes: Codec<Uint8Array> = {
    elementSize: HANDLE_SIZE,
    encode: (value, writer) => writeVarInt(value.length, writer) + writer.emitSlice(value),
    decode: (reader) => reader.readBytes(checkAllocation(readVarInt(reader), 1)),
};

/**
 * VarInt-prefixed UTF-8. Malformed UTF-8 is rejected, never replaced.
 *
 * Encoding throws `RangeError` for a string with an unpaired surrogate, which
 * has no UTF-8 form.
 */
export const varString: Codec<string> = {
    elementSize: HANDLE_SIZE,
    encode: (value, writer) => {
        if (!isWellFormed(value)) {
            throw new RangeError(`string has an unpaired surrogate: ${JSON.stringify(value)}`);
        }
        return varBytes.encode(fromUtf8(value), writer);
    },
    decode: (reader) => {
        const bytes = varBytes.decode(reader);
        try {
            return toUtf8(bytes);
        } catch (err) {
            throw new ParseFailedError('string was not valid UTF8', err);
        }
    },
};

/**
 * Payload framed by a u32 length and a 4-byte checksum, the first four bytes
 * of its double SHA-256.
 */
export const checkedData: Codec<Uint8Array> = {
    elementSize: HANDLE_SIZE,
    encode: (value, writer) => {
        let len = writer.emitU32(value.length);
        len += writer.emitSlice(checksum(value));
        len += writer.emitSlice(value);
        return len;
    },
    decode: (reader) => {
        const length = checkAllocation(BigInt(reader.readU32()), 1);
        const actual = reader.readBytes(4);
        const data = reader.readBytes(length);
        const expected = checksum(data);
        if (!equals(expected, actual)) {
            throw new InvalidChecksumError(expected, actual);
        }
        return data;
    },
};

export function checksum(data: Uint8Array): Uint8Array {
    return hash256(data).slice(0, 4);
}

/**
 * Two values back to back, first then second.
 */
export function pair<A, B>(first: Codec<A>, second: Codec<B>): Codec<[A, B]> {
    return {
        elementSize: first.elementSize + second.elementSize,
        encode: ([a, b], writer) => first.encode(a, writer) + second.encode(b, writer),
        decode: (reader) => {
            const a = first.decode(reader);
            const b = second.decode(reader);
            return [a, b];
        },
    };
}
