/**
 * Variable-length unsigned integers (CompactSize).
 *
 * | magnitude                    | encoding                  |
 * | ---------------------------- | ------------------------- |
 * | `0 ..= 0xfc`                 | the byte itself           |
 * | `0xfd ..= 0xffff`            | `0xfd` + u16 little-endian |
 * | `0x10000 ..= 0xffffffff`     | `0xfe` + u32 little-endian |
 * | `0x100000000 ..= 2^64 - 1`   | `0xff` + u64 little-endian |
 *
 * Only the shortest form of a value is valid. Decoding a longer form is a
 * protocol violation, since two byte strings for one value would give one
 * message two hashes.
 *
 * @packageDocumentation
 */
import * as varuint from 'varuint-bitcoin';
import type { ByteReader, ByteWriter } from '../bufferutils.js';
import { isUInt64 } from '../types.js';
import type { Codec } from './codec.js';
import { NonMinimalVarIntError } from './errors.js';

export const VARINT_U16_MARKER = 0xfd;
export const VARINT_U32_MARKER = 0xfe;
export const VARINT_U64_MARKER = 0xff;

export class VarInt {
    readonly value: bigint;

    constructor(value: number | bigint) {
        if (typeof value === 'number' && !Number.isSafeInteger(value)) {
            throw new RangeError(`VarInt requires a safe integer, got ${value}`);
        }
        const magnitude = BigInt(value);
        if (!isUInt64(magnitude)) {
            throw new RangeError(`VarInt out of range: ${magnitude}`);
        }
        this.value = magnitude;
    }

    /**
     * Length of the canonical encoding: 1, 3, 5 or 9 bytes.
     */
    get encodedLength(): number {
        return varuint.encodingLength(this.value);
    }

    /**
     * @throws RangeError if the magnitude exceeds `Number.MAX_SAFE_INTEGER`
     */
    toNumber(): number {
        if (this.value > BigInt(Number.MAX_SAFE_INTEGER)) {
            throw new RangeError(`VarInt ${this.value} does not fit a safe integer`);
        }
        return Number(this.value);
    }

    equals(other: VarInt): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value.toString();
    }
}

/**
 * Reads one canonical VarInt magnitude.
 *
 * @throws NonMinimalVarIntError if a shorter form could hold the value
 * @throws IoError on short input
 */
export function readVarInt(reader: ByteReader): bigint {
    const marker = reader.readU8();
    switch (marker) {
        case VARINT_U64_MARKER: {
            const x = reader.readU64();
            if (x <= 0xffff_ffffn) throw new NonMinimalVarIntError();
            return x;
        }
        case VARINT_U32_MARKER: {
            const x = reader.readU32();
            if (x <= 0xffff) throw new NonMinimalVarIntError();
            return BigInt(x);
        }
        case VARINT_U16_MARKER: {
            const x = reader.readU16();
            if (x <= 0xfc) throw new NonMinimalVarIntError();
            return BigInt(x);
        }
        default:
            return BigInt(marker);
    }
}

/**
 * Writes the canonical encoding of `value` and returns its length.
 */
export function writeVarInt(value: number | bigint, writer: ByteWriter): number {
    const magnitude = new VarInt(value).value;
    const bytes = new Uint8Array(varuint.encodingLength(magnitude));
    varuint.encode(magnitude, bytes, 0);
    return writer.emitSlice(bytes);
}

export const varInt: Codec<VarInt> = {
    elementSize: 8,
    encode: (value, writer) => writeVarInt(value.value, writer),
    decode: (reader) => new VarInt(readVarInt(reader)),
};
