/**
 * In-memory byte sinks.
 *
 * @packageDocumentation
 */

/**
 * Anything raw bytes can be written to.
 *
 * `write` either accepts the whole chunk or throws; there is no partial
 * write to recover from.
 */
export interface ByteSink {
    write(chunk: Uint8Array): void;
}

/**
 * Sink over a caller-provided buffer of fixed capacity.
 *
 * Writing past the end throws without touching the buffer.
 *
 * @example
 * ```typescript
 * const writer = new BinaryWriter(new Uint8Array(4));
 * writer.write(fromHex('efbeadde'));
 * writer.end(); // the full buffer
 * ```
 */
export class BinaryWriter implements ByteSink {
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

    static withCapacity(size: number): BinaryWriter {
        return new BinaryWriter(new Uint8Array(size));
    }

    get remaining(): number {
        return this.buffer.length - this.offset;
    }

    write(chunk: Uint8Array): void {
        if (chunk.length > this.remaining) {
            throw new RangeError(
                `Cannot write ${chunk.length} bytes: only ${this.remaining} of ${this.buffer.length} left`,
            );
        }
        this.buffer.set(chunk, this.offset);
        this.offset += chunk.length;
    }

    /**
     * Returns the buffer once it has been filled exactly.
     */
    end(): Uint8Array {
        if (this.buffer.length === this.offset) {
            return this.buffer;
        }
        throw new Error(`buffer size ${this.buffer.length}, offset ${this.offset}`);
    }
}

/**
 * Sink that grows its backing storage as needed.
 *
 * Writes never fail short of running out of memory, which is what lets
 * `serialize` treat a sink failure as a bug rather than an input error.
 */
export class GrowableBinaryWriter implements ByteSink {
    #buffer: Uint8Array;
    #length = 0;

    constructor(initialCapacity: number = 64) {
        this.#buffer = new Uint8Array(Math.max(1, initialCapacity));
    }

    get length(): number {
        return this.#length;
    }

    write(chunk: Uint8Array): void {
        this.#reserve(chunk.length);
        this.#buffer.set(chunk, this.#length);
        this.#length += chunk.length;
    }

    /**
     * Returns a copy of the bytes written so far.
     */
    toBytes(): Uint8Array {
        return this.#buffer.slice(0, this.#length);
    }

    #reserve(additional: number): void {
        const required = this.#length + additional;
        if (required <= this.#buffer.length) return;

        let capacity = this.#buffer.length * 2;
        while (capacity < required) capacity *= 2;

        const next = new Uint8Array(capacity);
        next.set(this.#buffer.subarray(0, this.#length));
        this.#buffer = next;
    }
}
