/**
 * The encode/decode contracts and the codecs for fixed-width primitives.
 *
 * @packageDocumentation
 */
import type { ByteReader, ByteWriter } from '../bufferutils.js';

/**
 * Writes values of type `T` to a byte stream.
 */
export interface Encoder<T> {
    /**
     * @returns The number of bytes written
     * @throws IoError if the sink fails
     */
    encode(value: T, writer: ByteWriter): number;
}

/**
 * Reads values of type `T` back from a byte stream.
 */
export interface Decoder<T> {
    /**
     * @throws ConsensusError if the input is not the canonical encoding of a `T`
     */
    decode(reader: ByteReader): T;
}

/**
 * A two-way consensus codec.
 *
 * `elementSize` is the static per-element size in bytes that a sequence of
 * `T` is charged when its length prefix is checked against the allocation
 * ceiling. For fixed-width types it is the wire width; for variable-width
 * types it is the size of the handle the sequence would hold.
 */
export interface Codec<T> extends Encoder<T>, Decoder<T> {
    readonly elementSize: number;
}

/**
 * Nominal size charged for a value held by reference (a nested sequence,
 * a string), the size of a pointer/length/capacity triple.
 */
export const HANDLE_SIZE = 24;

export const u8: Codec<number> = {
    elementSize: 1,
    encode: (value, writer) => writer.emitU8(value),
    decode: (reader) => reader.readU8(),
};

export const u16: Codec<number> = {
    elementSize: 2,
    encode: (value, writer) => writer.emitU16(value),
    decode: (reader) => reader.readU16(),
};

export const u32: Codec<number> = {
    elementSize: 4,
    encode: (value, writer) => writer.emitU32(value),
    decode: (reader) => reader.readU32(),
};

export const u64: Codec<bigint> = {
    elementSize: 8,
    encode: (value, writer) => writer.emitU64(value),
    decode: (reader) => reader.readU64(),
};

export const i8: Codec<number> = {
    elementSize: 1,
    encode: (value, writer) => writer.emitI8(value),
    decode: (reader) => reader.readI8(),
};

export const i16: Codec<number> = {
    elementSize: 2,
    encode: (value, writer) => writer.emitI16(value),
    decode: (reader) => reader.readI16(),
};

export const i32: Codec<number> = {
    elementSize: 4,
    encode: (value, writer) => writer.emitI32(value),
    decode: (reader) => reader.readI32(),
};

export const i64: Codec<bigint> = {
    elementSize: 8,
    encode: (value, writer) => writer.emitI64(value),
    decode: (reader) => reader.readI64(),
};

/**
 * `true` is `0x01`, `false` is `0x00`; any nonzero byte decodes as `true`.
 */
export const bool: Codec<boolean> = {
    elementSize: 1,
    encode: (value, writer) => writer.emitBool(value),
    decode: (reader) => reader.readBool(),
};

/**
 * Derives a codec for `T` from one for its wire representation `W`.
 *
 * `from` runs after `inner.decode` and may throw a `ConsensusError` to
 * reject a well-formed but meaningless wire value.
 *
 * @example
 * ```typescript
 * const flags = mapCodec(u64, (f: ServiceFlags) => f.bits, (bits) => new ServiceFlags(bits));
 * ```
 */
export function mapCodec<T, W>(inner: Codec<W>, to: (value: T) => W, from: (wire: W) => T): Codec<T> {
    return {
        elementSize: inner.elementSize,
        encode: (value, writer) => inner.encode(to(value), writer),
        decode: (reader) => from(inner.decode(reader)),
    };
}
