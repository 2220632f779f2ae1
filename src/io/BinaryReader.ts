/**
 * In-memory byte sources.
 *
 * @packageDocumentation
 */

/**
 * Anything raw bytes can be read from.
 *
 * `read` copies up to `target.length` bytes into `target` and returns how
 * many it copied; 0 means the source is exhausted.
 */
export interface ByteSource {
    read(target: Uint8Array): number;
}

/**
 * Cursor over a byte array.
 *
 * @example
 * ```typescript
 * const reader = new BinaryReader(fromHex('0102'));
 * const out = new Uint8Array(1);
 * reader.read(out); // 1, out is [0x01]
 * reader.offset; // 1
 * ```
 */
export class BinaryReader implements ByteSource {
    public readonly buffer: Uint8Array;
    public offset: number;

    constructor(buffer: Uint8Array, offset: number = 0) {
        if (!(buffer instanceof Uint8Array)) {
            throw new TypeError('buffer must be a Uint8Array');
        }
        if (offset < 0 || !Number.isInteger(offset) || offset > buffer.length) {
            throw new TypeError('offset must be a non-negative integer within the buffer');
        }
        this.buffer = buffer;
        this.offset = offset;
    }

    get remaining(): number {
        return this.buffer.length - this.offset;
    }

    read(target: Uint8Array): number {
        const n = Math.min(target.length, this.remaining);
        target.set(this.buffer.subarray(this.offset, this.offset + n));
        this.offset += n;
        return n;
    }
}
