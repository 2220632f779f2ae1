/**
 * Entry points: values to bytes and back.
 *
 * @packageDocumentation
 */
import { ByteReader, ByteWriter } from '../bufferutils.js';
import type { ByteSink } from '../io/index.js';
import { BinaryReader, GrowableBinaryWriter, fromHex, toHex } from '../io/index.js';
import type { Encoder, Decoder } from './codec.js';
import { ParseFailedError, isConsensusError, type ConsensusError } from './errors.js';

export interface Decoded<T> {
    readonly value: T;
    /** Bytes of the input the value was decoded from. */
    readonly consumed: number;
}

export type DecodeOutcome<T> =
    | ({ readonly kind: 'ok' } & Decoded<T>)
    | { readonly kind: 'error'; readonly error: ConsensusError };

/**
 * Encodes `value` to a new byte array.
 *
 * The in-memory sink cannot fail, so an error here means a broken codec or a
 * value outside its type's domain, not bad input.
 */
export function serialize<T>(encoder: Encoder<T>, value: T): Uint8Array {
    const sink = new GrowableBinaryWriter();
    encoder.encode(value, new ByteWriter(sink));
    return sink.toBytes();
}

export function serializeHex<T>(encoder: Encoder<T>, value: T): string {
    return toHex(serialize(encoder, value));
}

/**
 * Encodes `value` into a caller-supplied sink.
 *
 * The record is encoded in memory first and handed to the sink in a single
 * write, so a sink that rejects the write never holds part of a record.
 *
 * @returns The number of bytes written
 * @throws IoError if the sink fails
 */
export function encodeTo<T>(encoder: Encoder<T>, value: T, sink: ByteSink): number {
    return new ByteWriter(sink).emitSlice(serialize(encoder, value));
}

/**
 * Decodes one value that must span all of `bytes`.
 *
 * @throws ParseFailedError if bytes remain after the value
 * @throws ConsensusError if the value itself is malformed
 */
export function deserialize<T>(decoder: Decoder<T>, bytes: Uint8Array): T {
    const { value, consumed } = deserializePartial(decoder, bytes);
    if (consumed !== bytes.length) {
        throw new ParseFailedError(
            `data not consumed entirely when explicitly deserializing (${bytes.length - consumed} trailing bytes)`,
        );
    }
    return value;
}

export function deserializeHex<T>(decoder: Decoder<T>, hex: string): T {
    return deserialize(decoder, fromHex(hex));
}

/**
 * Decodes one value from the front of `bytes`, leaving any rest alone.
 */
export function deserializePartial<T>(decoder: Decoder<T>, bytes: Uint8Array): Decoded<T> {
    const reader = new ByteReader(new BinaryReader(bytes));
    const value = decoder.decode(reader);
    return { value, consumed: reader.consumed };
}

/**
 * Like {@link deserialize}, but returns consensus failures as a value.
 *
 * Anything other than a `ConsensusError` (a bug in a codec) still throws.
 */
export function tryDeserialize<T>(decoder: Decoder<T>, bytes: Uint8Array): DecodeOutcome<T> {
    try {
        const value = deserialize(decoder, bytes);
        return { kind: 'ok', value, consumed: bytes.length };
    } catch (err) {
        if (isConsensusError(err)) {
            return { kind: 'error', error: err };
        }
        throw err;
    }
}
