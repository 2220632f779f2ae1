/**
 * Consensus wire encoding for the peer-to-peer protocol.
 *
 * @packageDocumentation
 */
export * from './consensus/index.js';
export * from './network/index.js';
export { ByteReader, ByteWriter } from './bufferutils.js';
export * from './io/index.js';
export { hash256 } from './crypto.js';

export type {
    Bytes2,
    Bytes4,
    Bytes8,
    Bytes12,
    Bytes16,
    Bytes32,
    Bytes33,
    FixedByteSize,
    FixedBytesBySize,
    Sha256dHash,
} from './types.js';
export {
    INT64_MAX,
    INT64_MIN,
    UINT64_MAX,
    isInt,
    isInt64,
    isUInt,
    isUInt16,
    isUInt64,
    isUint8ArrayN,
    toFixedBytes,
} from './types.js';
