import assert from 'assert';
import { describe, it } from 'vitest';

import { u32 } from '../src/consensus/codec.js';
import { checkedData } from '../src/consensus/collections.js';
import { deserialize, deserializeHex, serialize, serializeHex } from '../src/consensus/encode.js';
import {
    InvalidChecksumError,
    ParseFailedError,
    UnrecognizedNetworkCommandError,
} from '../src/consensus/errors.js';
import { concat, fromHex, toHex } from '../src/io/index.js';
import { addressFromIpv4 } from '../src/network/address.js';
import { commandString } from '../src/network/command.js';
import { ServiceFlags, magic } from '../src/network/constants.js';
import { inventory, inventoryList, InventoryType } from '../src/network/inventory.js';
import {
    createRawMessage,
    decodePayload,
    encodePayload,
    rawNetworkMessage,
    rawNetworkMessageFor,
    readRawMessage,
} from '../src/network/message.js';
import {
    createVersionMessage,
    reject,
    RejectReason,
    versionMessage,
    type Reject,
} from '../src/network/message-network.js';
import { toFixedBytes } from '../src/types.js';

const hash = toFixedBytes(new Uint8Array(32).fill(0xab), 32);

function frame(command: string, payload: Uint8Array): Uint8Array {
    return concat([
        serialize(u32, magic('bitcoin')),
        serialize(commandString, command),
        serialize(checkedData, payload),
    ]);
}

describe('version message', () => {
    const message = createVersionMessage({
        services: ServiceFlags.NETWORK,
        timestamp: 1_700_000_000n,
        receiver: addressFromIpv4(ServiceFlags.NONE, '127.0.0.1', 18444),
        sender: addressFromIpv4(ServiceFlags.NETWORK, '10.0.0.1', 18444),
        nonce: 0x0102030405060708n,
        userAgent: '/test:0.1/',
        startHeight: 100,
    });

    it('should fill in the protocol version and disable relay', () => {
        assert.strictEqual(message.version, 70001);
        assert.strictEqual(message.relay, false);
    });

    it('should lay out fields in wire order', () => {
        const hex = serializeHex(versionMessage, message);
        assert.strictEqual(hex.length, 96 * 2);
        assert.strictEqual(hex.slice(0, 8), '71110100');
        assert.strictEqual(hex.slice(8, 24), '0100000000000000');
        assert.strictEqual(hex.slice(-10), '6400000000');
    });

    it('should decode what it encodes', () => {
        const decoded = deserialize(versionMessage, serialize(versionMessage, message));
        assert.strictEqual(decoded.userAgent, '/test:0.1/');
        assert.strictEqual(decoded.timestamp, 1_700_000_000n);
        assert.strictEqual(decoded.nonce, 0x0102030405060708n);
        assert.strictEqual(decoded.startHeight, 100);
        assert.deepStrictEqual(decoded.sender.address, message.sender.address);
        assert.ok(decoded.services.equals(ServiceFlags.NETWORK));
    });
});

describe('reject message', () => {
    const message: Reject = {
        message: 'tx',
        ccode: RejectReason.Dust,
        reason: 'dust',
        hash,
    };

    it('should encode command, code, reason and hash', () => {
        const hex = serializeHex(reject, message);
        assert.strictEqual(hex, '027478' + '41' + '0464757374' + 'ab'.repeat(32));
    });

    it('should decode what it encodes', () => {
        const decoded = deserialize(reject, serialize(reject, message));
        assert.strictEqual(decoded.message, 'tx');
        assert.strictEqual(decoded.ccode, RejectReason.Dust);
        assert.strictEqual(decoded.reason, 'dust');
        assert.strictEqual(toHex(decoded.hash), 'ab'.repeat(32));
    });

    it('should reject an unknown reject code', () => {
        assert.throws(() => deserializeHex(reject, '027478' + '02' + '00' + '00'.repeat(32)), {
            name: 'ParseFailedError',
            reason: 'unknown reject code',
        });
    });

    it('should refuse a rejected command that does not fit the command field', () => {
        assert.throws(() => serialize(reject, { ...message, message: 'averylongcommand' }), RangeError);
    });
});

describe('inventory', () => {
    it('should encode the type as u32 followed by the hash', () => {
        const hex = serializeHex(inventory, { type: InventoryType.WitnessTransaction, hash });
        assert.strictEqual(hex, '01000040' + 'ab'.repeat(32));
    });

    it('should decode a list', () => {
        const hex = '01' + '02000000' + 'ab'.repeat(32);
        const [item] = deserializeHex(inventoryList, hex);
        assert.strictEqual(item.type, InventoryType.Block);
        assert.strictEqual(toHex(item.hash), 'ab'.repeat(32));
    });

    it('should reject an unknown type code', () => {
        assert.throws(() => deserializeHex(inventory, '05000000' + '00'.repeat(32)), {
            name: 'UnknownInventoryTypeError',
            kind: 'unknown-inventory-type',
            code: 5,
        });
    });
});

describe('raw network message', () => {
    const verackHex = 'f9beb4d9' + '76657261636b000000000000' + '00000000' + '5df6e0e2';

    it('should frame an empty payload', () => {
        const message = createRawMessage('bitcoin', { command: 'verack' });
        assert.strictEqual(serializeHex(rawNetworkMessage, message), verackHex);
    });

    it('should decode a framed message', () => {
        const decoded = deserializeHex(rawNetworkMessage, verackHex);
        assert.strictEqual(decoded.magic, 0xd9b4bef9);
        assert.deepStrictEqual(decoded.payload, { command: 'verack' });
    });

    it('should round-trip a ping', () => {
        const message = createRawMessage('regtest', { command: 'ping', payload: 42n });
        const bytes = serialize(rawNetworkMessage, message);
        assert.strictEqual(bytes.length, 24 + 8);
        assert.strictEqual(toHex(bytes.subarray(0, 4)), 'fabfb5da');
        assert.strictEqual(toHex(bytes.subarray(16, 20)), '08000000');
        assert.deepStrictEqual(deserialize(rawNetworkMessage, bytes), message);
    });

    it('should round-trip addr entries', () => {
        const peer = addressFromIpv4(ServiceFlags.NETWORK, '10.0.0.1', 8333);
        const message = createRawMessage('bitcoin', { command: 'addr', payload: [[1_700_000_000, peer]] });
        const decoded = deserialize(rawNetworkMessage, serialize(rawNetworkMessage, message));
        assert.strictEqual(decoded.payload.command, 'addr');
        if (decoded.payload.command === 'addr') {
            const [[time, addr]] = decoded.payload.payload;
            assert.strictEqual(time, 1_700_000_000);
            assert.deepStrictEqual(addr.address, peer.address);
            assert.strictEqual(addr.port, 8333);
        }
    });

    it('should reject a message for another network', () => {
        const bytes = serialize(rawNetworkMessage, createRawMessage('testnet', { command: 'verack' }));
        assert.throws(() => deserialize(rawNetworkMessageFor('bitcoin'), bytes), {
            name: 'UnexpectedNetworkMagicError',
            kind: 'unexpected-network-magic',
            expected: 0xd9b4bef9,
            actual: 0x0709110b,
        });
    });

    it('should reject an unrecognized command', () => {
        assert.throws(
            () => deserialize(rawNetworkMessage, frame('mempool', new Uint8Array(0))),
            (err: unknown) => err instanceof UnrecognizedNetworkCommandError && err.command === 'mempool',
        );
    });

    it('should reject a corrupted checksum', () => {
        const bytes = fromHex(verackHex);
        bytes[23] ^= 0xff;
        assert.throws(() => deserialize(rawNetworkMessage, bytes), InvalidChecksumError);
    });

    it('should reject a payload on a command that carries none', () => {
        assert.throws(
            () => deserialize(rawNetworkMessage, frame('verack', fromHex('00'))),
            (err: unknown) => err instanceof ParseFailedError && err.reason === 'verack carries no payload',
        );
    });

    it('should reject payload bytes left over after decoding', () => {
        assert.throws(() => decodePayload('ping', fromHex('010000000000000000')), ParseFailedError);
    });

    it('should read one message from the front of a stream buffer', () => {
        const { value, consumed } = readRawMessage(fromHex(verackHex + 'f9beb4d9'), 'bitcoin');
        assert.strictEqual(consumed, 24);
        assert.deepStrictEqual(value.payload, { command: 'verack' });
    });

    it('should encode inventory payloads the same for inv, getdata and notfound', () => {
        const items = [{ type: InventoryType.Transaction, hash }];
        const inv = encodePayload({ command: 'inv', payload: items });
        assert.strictEqual(toHex(encodePayload({ command: 'getdata', payload: items })), toHex(inv));
        assert.strictEqual(toHex(encodePayload({ command: 'notfound', payload: items })), toHex(inv));
        assert.strictEqual(toHex(inv), '01' + '01000000' + 'ab'.repeat(32));
    });
});
