/**
 * Byte-level I/O: byte-order conversions, in-memory sinks and sources,
 * hex and UTF-8 helpers.
 *
 * @packageDocumentation
 */

export type { ByteSource } from './BinaryReader.js';
export { BinaryReader } from './BinaryReader.js';
export type { ByteSink } from './BinaryWriter.js';
export { BinaryWriter, GrowableBinaryWriter } from './BinaryWriter.js';

export * from './endian.js';

export { toHex, fromHex, isHex } from './hex.js';

export { concat, equals, fromUtf8, toUtf8, isAscii, isWellFormed } from './utils.js';
