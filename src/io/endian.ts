/**
 * Fixed-width integer conversions between byte arrays and numbers.
 *
 * Every function names its byte order explicitly, so nothing here depends on
 * the host's native endianness. Reading or writing outside the array throws a
 * `RangeError` from the underlying `DataView`.
 *
 * @packageDocumentation
 */

function view(bytes: Uint8Array, offset: number, length: number): DataView {
    return new DataView(bytes.buffer, bytes.byteOffset + offset, length);
}

/**
 * Reads a 16-bit unsigned integer in little-endian order.
 *
 * @example
 * ```typescript
 * readUInt16LE(fromHex('adde'), 0); // 0xdead
 * ```
 */
export function readUInt16LE(bytes: Uint8Array, offset: number): number {
    return view(bytes, offset, 2).getUint16(0, true);
}

/**
 * Reads a 16-bit unsigned integer in big-endian (network) order.
 */
export function readUInt16BE(bytes: Uint8Array, offset: number): number {
    return view(bytes, offset, 2).getUint16(0, false);
}

/**
 * Reads a 32-bit unsigned integer in little-endian order.
 *
 * @example
 * ```typescript
 * readUInt32LE(fromHex('efbeadde'), 0); // 0xdeadbeef
 * ```
 */
export function readUInt32LE(bytes: Uint8Array, offset: number): number {
    return view(bytes, offset, 4).getUint32(0, true);
}

export function readUInt32BE(bytes: Uint8Array, offset: number): number {
    return view(bytes, offset, 4).getUint32(0, false);
}

/**
 * Reads a 64-bit unsigned integer in little-endian order as a bigint.
 */
export function readUInt64LE(bytes: Uint8Array, offset: number): bigint {
    return view(bytes, offset, 8).getBigUint64(0, true);
}

export function readUInt64BE(bytes: Uint8Array, offset: number): bigint {
    return view(bytes, offset, 8).getBigUint64(0, false);
}

export function readInt8(bytes: Uint8Array, offset: number): number {
    return view(bytes, offset, 1).getInt8(0);
}

export function readInt16LE(bytes: Uint8Array, offset: number): number {
    return view(bytes, offset, 2).getInt16(0, true);
}

export function readInt32LE(bytes: Uint8Array, offset: number): number {
    return view(bytes, offset, 4).getInt32(0, true);
}

export function readInt64LE(bytes: Uint8Array, offset: number): bigint {
    return view(bytes, offset, 8).getBigInt64(0, true);
}

/**
 * Writes a 16-bit unsigned integer in little-endian order.
 *
 * @returns The offset after the written value (offset + 2)
 */
export function writeUInt16LE(bytes: Uint8Array, value: number, offset: number): number {
    view(bytes, offset, 2).setUint16(0, value, true);
    return offset + 2;
}

/**
 * Writes a 16-bit unsigned integer in big-endian (network) order.
 *
 * @returns The offset after the written value (offset + 2)
 */
export function writeUInt16BE(bytes: Uint8Array, value: number, offset: number): number {
    view(bytes, offset, 2).setUint16(0, value, false);
    return offset + 2;
}

/**
 * Writes a 32-bit unsigned integer in little-endian order.
 *
 * @example
 * ```typescript
 * const bytes = new Uint8Array(4);
 * writeUInt32LE(bytes, 0xdeadbeef, 0);
 * toHex(bytes); // 'efbeadde'
 * ```
 */
export function writeUInt32LE(bytes: Uint8Array, value: number, offset: number): number {
    view(bytes, offset, 4).setUint32(0, value, true);
    return offset + 4;
}

export function writeUInt32BE(bytes: Uint8Array, value: number, offset: number): number {
    view(bytes, offset, 4).setUint32(0, value, false);
    return offset + 4;
}

export function writeUInt64LE(bytes: Uint8Array, value: bigint, offset: number): number {
    view(bytes, offset, 8).setBigUint64(0, value, true);
    return offset + 8;
}

export function writeInt8(bytes: Uint8Array, value: number, offset: number): number {
    view(bytes, offset, 1).setInt8(0, value);
    return offset + 1;
}

export function writeInt16LE(bytes: Uint8Array, value: number, offset: number): number {
    view(bytes, offset, 2).setInt16(0, value, true);
    return offset + 2;
}

export function writeInt32LE(bytes: Uint8Array, value: number, offset: number): number {
    view(bytes, offset, 4).setInt32(0, value, true);
    return offset + 4;
}

export function writeInt64LE(bytes: Uint8Array, value: bigint, offset: number): number {
    view(bytes, offset, 8).setBigInt64(0, value, true);
    return offset + 8;
}
