/**
 * Consensus encoding: the byte format every peer must agree on.
 *
 * @packageDocumentation
 */

export type { Codec, Decoder, Encoder } from './codec.js';
export { HANDLE_SIZE, bool, i8, i16, i32, i64, mapCodec, u8, u16, u32, u64 } from './codec.js';

export {
    MAX_VEC_SIZE,
    bytes2,
    bytes4,
    bytes8,
    bytes12,
    bytes16,
    bytes32,
    bytes33,
    checkAllocation,
    checkedData,
    checksum,
    fixedBytes,
    pair,
    varBytes,
    varString,
    vector,
} from './collections.js';

export type { Decoded, DecodeOutcome } from './encode.js';
export {
    deserialize,
    deserializeHex,
    deserializePartial,
    encodeTo,
    serialize,
    serializeHex,
    tryDeserialize,
} from './encode.js';

export type { ConsensusErrorKind } from './errors.js';
export {
    ConsensusError,
    InvalidChecksumError,
    IoError,
    NonMinimalVarIntError,
    OversizedVectorAllocationError,
    ParseFailedError,
    UnexpectedNetworkMagicError,
    UnknownInventoryTypeError,
    UnknownNetworkMagicError,
    UnrecognizedNetworkCommandError,
    UnsupportedSegwitFlagError,
    isConsensusError,
} from './errors.js';

export type { StructFields } from './struct.js';
export { struct } from './struct.js';

export {
    VARINT_U16_MARKER,
    VARINT_U32_MARKER,
    VARINT_U64_MARKER,
    VarInt,
    readVarInt,
    varInt,
    writeVarInt,
} from './varint.js';
