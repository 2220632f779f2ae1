/**
 * Peer-to-peer message types built from the consensus codecs.
 *
 * @packageDocumentation
 */

export type { Address } from './address.js';
export { address, addressFromIpv4, formatHost, u16be } from './address.js';

export { COMMAND_SIZE, assertCommand, commandString } from './command.js';

export type { Network } from './constants.js';
export {
    NETWORKS,
    PROTOCOL_VERSION,
    ServiceFlags,
    isNetwork,
    magic,
    network,
    networkFromMagic,
    parseNetwork,
    serviceFlags,
} from './constants.js';

export type { Inventory } from './inventory.js';
export { InventoryType, inventory, inventoryList, inventoryType } from './inventory.js';

export type { Reject, VersionMessage, VersionMessageParams } from './message-network.js';
export {
    RejectReason,
    createVersionMessage,
    reject,
    rejectReason,
    versionMessage,
} from './message-network.js';

export type { Command, NetworkMessage, RawNetworkMessage } from './message.js';
export {
    createRawMessage,
    decodePayload,
    encodePayload,
    rawNetworkMessage,
    rawNetworkMessageFor,
    readRawMessage,
} from './message.js';
