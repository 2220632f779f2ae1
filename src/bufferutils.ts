/**
 * Typed little-endian reading and writing over any byte sink or source.
 *
 * `ByteWriter` and `ByteReader` are the only place integers meet bytes on
 * the consensus path; they always go through the explicit little-endian
 * helpers in `io/endian`. Failures of the wrapped sink or source surface as
 * {@link IoError}.
 *
 * @packageDocumentation
 */
import { IoError } from './consensus/errors.js';
import type { ByteSink, ByteSource } from './io/index.js';
import * as endian from './io/endian.js';
import { isInt, isUInt, isUInt64, isInt64 } from './types.js';

function verifuint(value: number, bits: 8 | 16 | 32): void {
    if (!isUInt(value, bits)) {
        throw new RangeError(`value ${value} is not a ${bits}-bit unsigned integer`);
    }
}

function verifint(value: number, bits: 8 | 16 | 32): void {
    if (!isInt(value, bits)) {
        throw new RangeError(`value ${value} is not a ${bits}-bit signed integer`);
    }
}

export class ByteWriter {
    readonly sink: ByteSink;

    constructor(sink: ByteSink) {
        this.sink = sink;
    }

    emitU8(value: number): number {
        verifuint(value, 8);
        return this.emitSlice(Uint8Array.of(value));
    }

    emitU16(value: number): number {
        verifuint(value, 16);
        const bytes = new Uint8Array(2);
        endian.writeUInt16LE(bytes, value, 0);
        return this.emitSlice(bytes);
    }

    emitU32(value: number): number {
        verifuint(value, 32);
        const bytes = new Uint8Array(4);
        endian.writeUInt32LE(bytes, value, 0);
        return this.emitSlice(bytes);
    }

    emitU64(value: bigint): number {
        if (!isUInt64(value)) {
            throw new RangeError(`value ${value} is not a 64-bit unsigned integer`);
        }
        const bytes = new Uint8Array(8);
        endian.writeUInt64LE(bytes, value, 0);
        return this.emitSlice(bytes);
    }

    emitI8(value: number): number {
        verifint(value, 8);
        const bytes = new Uint8Array(1);
        endian.writeInt8(bytes, value, 0);
        return this.emitSlice(bytes);
    }

    emitI16(value: number): number {
        verifint(value, 16);
        const bytes = new Uint8Array(2);
        endian.writeInt16LE(bytes, value, 0);
        return this.emitSlice(bytes);
    }

    emitI32(value: number): number {
        verifint(value, 32);
        const bytes = new Uint8Array(4);
        endian.writeInt32LE(bytes, value, 0);
        return this.emitSlice(bytes);
    }

    emitI64(value: bigint): number {
        if (!isInt64(value)) {
            throw new RangeError(`value ${value} is not a 64-bit signed integer`);
        }
        const bytes = new Uint8Array(8);
        endian.writeInt64LE(bytes, value, 0);
        return this.emitSlice(bytes);
    }

    emitBool(value: boolean): number {
        return this.emitSlice(Uint8Array.of(value ? 1 : 0));
    }

    /**
     * Writes raw bytes and returns how many were written.
     *
     * @throws IoError if the sink rejects the write
     */
    emitSlice(slice: Uint8Array): number {
        try {
            this.sink.write(slice);
        } catch (err) {
            throw new IoError(err instanceof Error ? err.message : String(err), err);
        }
        return slice.length;
    }
}

export class ByteReader {
    readonly source: ByteSource;
    #consumed = 0;

    constructor(source: ByteSource) {
        this.source = source;
    }

    /**
     * Number of bytes taken from the source so far.
     */
    get consumed(): number {
        return this.#consumed;
    }

    readU8(): number {
        return this.readBytes(1)[0];
    }

    readU16(): number {
        return endian.readUInt16LE(this.readBytes(2), 0);
    }

    readU32(): number {
        return endian.readUInt32LE(this.readBytes(4), 0);
    }

    readU64(): bigint {
        return endian.readUInt64LE(this.readBytes(8), 0);
    }

    readI8(): number {
        return endian.readInt8(this.readBytes(1), 0);
    }

    readI16(): number {
        return endian.readInt16LE(this.readBytes(2), 0);
    }

    readI32(): number {
        return endian.readInt32LE(this.readBytes(4), 0);
    }

    readI64(): bigint {
        return endian.readInt64LE(this.readBytes(8), 0);
    }

    /**
     * Any nonzero byte reads as `true`.
     */
    readBool(): boolean {
        return this.readU8() !== 0;
    }

    /**
     * Fills `target` completely from the source.
     *
     * @throws IoError if the source fails or ends before `target` is full
     */
    readSlice(target: Uint8Array): void {
        let filled = 0;
        while (filled < target.length) {
            let n: number;
            try {
                n = this.source.read(target.subarray(filled));
            } catch (err) {
                throw new IoError(err instanceof Error ? err.message : String(err), err);
            }
            if (n <= 0) {
                throw new IoError(`unexpected end of input: needed ${target.length} bytes, got ${filled}`);
            }
            filled += n;
            this.#consumed += n;
        }
    }

    /**
     * Reads exactly `length` bytes into a fresh array.
     *
     * Callers must bound `length` before calling; this allocates up front.
     */
    readBytes(length: number): Uint8Array {
        const out = new Uint8Array(length);
        this.readSlice(out);
        return out;
    }
}
