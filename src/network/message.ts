/**
 * Network message framing.
 *
 * A raw message on the wire is:
 *
 * ```text
 * [4]  magic          u32 little-endian
 * [12] command        ASCII, NUL-padded
 * [4]  payload length u32 little-endian
 * [4]  checksum       first 4 bytes of double SHA-256 of the payload
 * [n]  payload
 * ```
 *
 * @packageDocumentation
 */
import type { ByteReader } from '../bufferutils.js';
import { u32, u64, type Codec, type Decoder } from '../consensus/codec.js';
import { checkedData, pair, vector } from '../consensus/collections.js';
import { deserialize, deserializePartial, serialize, type Decoded } from '../consensus/encode.js';
import {
    ParseFailedError,
    UnexpectedNetworkMagicError,
    UnrecognizedNetworkCommandError,
} from '../consensus/errors.js';
import { address, type Address } from './address.js';
import { COMMAND_SIZE, commandString } from './command.js';
import { magic, type Network } from './constants.js';
import { inventoryList, type Inventory } from './inventory.js';
import {
    reject,
    versionMessage,
    type Reject,
    type VersionMessage,
} from './message-network.js';

export type NetworkMessage =
    | { readonly command: 'version'; readonly payload: VersionMessage }
    | { readonly command: 'verack' }
    | { readonly command: 'addr'; readonly payload: Array<[number, Address]> }
    | { readonly command: 'inv'; readonly payload: Inventory[] }
    | { readonly command: 'getdata'; readonly payload: Inventory[] }
    | { readonly command: 'notfound'; readonly payload: Inventory[] }
    | { readonly command: 'getaddr' }
    | { readonly command: 'ping'; readonly payload: bigint }
    | { readonly command: 'pong'; readonly payload: bigint }
    | { readonly command: 'sendheaders' }
    | { readonly command: 'reject'; readonly payload: Reject };

export type Command = NetworkMessage['command'];

export interface RawNetworkMessage {
    magic: number;
    payload: NetworkMessage;
}

/** `addr` entries: last-seen timestamp and the peer. */
const addrPayload = vector(pair(u32, address));

const EMPTY = new Uint8Array(0);

export function encodePayload(message: NetworkMessage): Uint8Array {
    switch (message.command) {
        case 'version':
            return serialize(versionMessage, message.payload);
        case 'addr':
            return serialize(addrPayload, message.payload);
        case 'inv':
        case 'getdata':
        case 'notfound':
            return serialize(inventoryList, message.payload);
        case 'ping':
        case 'pong':
            return serialize(u64, message.payload);
        case 'reject':
            return serialize(reject, message.payload);
        case 'verack':
        case 'getaddr':
        case 'sendheaders':
            return EMPTY;
    }
}

/**
 * Decodes a payload for `command`. The payload must be consumed exactly.
 *
 * @throws UnrecognizedNetworkCommandError for commands this library does not model
 */
export function decodePayload(command: string, payload: Uint8Array): NetworkMessage {
    switch (command) {
        case 'version':
            return { command, payload: deserialize(versionMessage, payload) };
        case 'addr':
            return { command, payload: deserialize(addrPayload, payload) };
        case 'inv':
        case 'getdata':
        case 'notfound':
            return { command, payload: deserialize(inventoryList, payload) };
        case 'ping':
        case 'pong':
            return { command, payload: deserialize(u64, payload) };
        case 'reject':
            return { command, payload: deserialize(reject, payload) };
        case 'verack':
        case 'getaddr':
        case 'sendheaders':
            if (payload.length !== 0) {
                throw new ParseFailedError(`${command} carries no payload`);
            }
            return { command };
        default:
            throw new UnrecognizedNetworkCommandError(command);
    }
}

export const rawNetworkMessage: Codec<RawNetworkMessage> = {
    elementSize: 4 + COMMAND_SIZE + checkedData.elementSize,
    encode: (message, writer) => {
        let len = writer.emitU32(message.magic);
        len += commandString.encode(message.payload.command, writer);
        len += checkedData.encode(encodePayload(message.payload), writer);
        return len;
    },
    decode: (reader) => decodeFramed(reader, reader.readU32()),
};

function decodeFramed(reader: ByteReader, wireMagic: number): RawNetworkMessage {
    const command = commandString.decode(reader);
    const data = checkedData.decode(reader);
    return { magic: wireMagic, payload: decodePayload(command, data) };
}

/**
 * Decoder that accepts only messages for `network`, checking the magic before
 * reading anything else.
 */
export function rawNetworkMessageFor(network: Network): Decoder<RawNetworkMessage> {
    const expected = magic(network);
    return {
        decode: (reader) => {
            const actual = reader.readU32();
            if (actual !== expected) {
                throw new UnexpectedNetworkMagicError(expected, actual);
            }
            return decodeFramed(reader, actual);
        },
    };
}

export function createRawMessage(network: Network, payload: NetworkMessage): RawNetworkMessage {
    return { magic: magic(network), payload };
}

/**
 * Reads one message from the front of a stream buffer, which may hold more.
 *
 * @throws UnexpectedNetworkMagicError if the message is for another network
 */
export function readRawMessage(bytes: Uint8Array, network: Network): Decoded<RawNetworkMessage> {
    return deserializePartial(rawNetworkMessageFor(network), bytes);
}
