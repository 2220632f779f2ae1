/**
 * Messages describing peers and their capabilities: `version` and `reject`.
 *
 * @packageDocumentation
 */
import type { Sha256dHash } from '../branded.js';
import { bool, i32, i64, mapCodec, u8, u32, u64, type Codec } from '../consensus/codec.js';
import { bytes32, varString } from '../consensus/collections.js';
import { ParseFailedError } from '../consensus/errors.js';
import { struct } from '../consensus/struct.js';
import { address, type Address } from './address.js';
import { assertCommand } from './command.js';
import { PROTOCOL_VERSION, type ServiceFlags, serviceFlags } from './constants.js';

/**
 * The `version` handshake message.
 */
export interface VersionMessage {
    /** Protocol version of the sender. */
    version: number;
    services: ServiceFlags;
    /** Unix time in seconds when the message was sent. */
    timestamp: bigint;
    receiver: Address;
    sender: Address;
    /** Random nonce used to detect connections to self. */
    nonce: bigint;
    userAgent: string;
    /** Height of the best chain the sender knows about. */
    startHeight: number;
    /** Whether the receiver should announce transactions (BIP-37). */
    relay: boolean;
}

export const versionMessage: Codec<VersionMessage> = struct<VersionMessage>({
    version: u32,
    services: serviceFlags,
    timestamp: i64,
    receiver: address,
    sender: address,
    nonce: u64,
    userAgent: varString,
    startHeight: i32,
    relay: bool,
});

export type VersionMessageParams = Omit<VersionMessage, 'version' | 'relay'>;

/**
 * A `version` message at {@link PROTOCOL_VERSION} with relay disabled.
 */
export function createVersionMessage(params: VersionMessageParams): VersionMessage {
    return { version: PROTOCOL_VERSION, ...params, relay: false };
}

export enum RejectReason {
    Malformed = 0x01,
    Invalid = 0x10,
    Obsolete = 0x11,
    Duplicate = 0x12,
    NonStandard = 0x40,
    Dust = 0x41,
    Fee = 0x42,
    Checkpoint = 0x43,
}

const REJECT_REASONS: readonly RejectReason[] = [
    RejectReason.Malformed,
    RejectReason.Invalid,
    RejectReason.Obsolete,
    RejectReason.Duplicate,
    RejectReason.NonStandard,
    RejectReason.Dust,
    RejectReason.Fee,
    RejectReason.Checkpoint,
];

export const rejectReason: Codec<RejectReason> = mapCodec(
    u8,
    (reason: RejectReason): number => reason,
    (code) => {
        const reason = REJECT_REASONS.find((r) => r === code);
        if (reason === undefined) throw new ParseFailedError('unknown reject code');
        return reason;
    },
);

/**
 * Sent by a peer rejecting one of our messages.
 */
export interface Reject {
    /** Command of the rejected message. */
    message: string;
    ccode: RejectReason;
    reason: string;
    /** Transaction or block the rejection refers to. */
    hash: Sha256dHash;
}

const rejectedCommand: Codec<string> = {
    elementSize: varString.elementSize,
    encode: (command, writer) => {
        assertCommand(command);
        return varString.encode(command, writer);
    },
    decode: (reader) => varString.decode(reader),
};

export const reject: Codec<Reject> = struct<Reject>({
    message: rejectedCommand,
    ccode: rejectReason,
    reason: varString,
    hash: bytes32,
});
