/**
 * Peer network addresses as carried in `version` and `addr` messages.
 *
 * Unlike everything else on the wire, the IP groups and the port are
 * big-endian (network byte order).
 *
 * @packageDocumentation
 */
import type { Codec } from '../consensus/codec.js';
import { struct } from '../consensus/struct.js';
import { readUInt16BE, writeUInt16BE } from '../io/index.js';
import { isUInt16 } from '../types.js';
import { type ServiceFlags, serviceFlags } from './constants.js';

export interface Address {
    /** Services provided by the peer. */
    services: ServiceFlags;
    /** IPv6 address as eight 16-bit groups; IPv4 peers use `::ffff:a.b.c.d`. */
    address: number[];
    port: number;
}

const IPV4_MAPPED_PREFIX = [0, 0, 0, 0, 0, 0xffff];

export const u16be: Codec<number> = {
    elementSize: 2,
    encode: (value, writer) => {
        if (!isUInt16(value)) {
            throw new RangeError(`value ${value} is not a 16-bit unsigned integer`);
        }
        const bytes = new Uint8Array(2);
        writeUInt16BE(bytes, value, 0);
        return writer.emitSlice(bytes);
    },
    decode: (reader) => readUInt16BE(reader.readBytes(2), 0),
};

const ipv6Groups: Codec<number[]> = {
    elementSize: 16,
    encode: (groups, writer) => {
        if (groups.length !== 8) {
            throw new TypeError(`Expected 8 address groups, got ${groups.length}`);
        }
        return groups.reduce((len, group) => len + u16be.encode(group, writer), 0);
    },
    decode: (reader) => {
        const groups: number[] = [];
        for (let i = 0; i < 8; i++) {
            groups.push(u16be.decode(reader));
        }
        return groups;
    },
};

export const address: Codec<Address> = struct<Address>({
    services: serviceFlags,
    address: ipv6Groups,
    port: u16be,
});

/**
 * Builds an address for an IPv4 peer.
 *
 * @throws TypeError if `ip` is not a dotted-quad IPv4 address
 *
 * @example
 * ```typescript
 * addressFromIpv4(ServiceFlags.NETWORK, '10.0.0.1', 8333).address;
 * // [0, 0, 0, 0, 0, 0xffff, 0x0a00, 0x0001]
 * ```
 */
export function addressFromIpv4(services: ServiceFlags, ip: string, port: number): Address {
    const octets = ip.split('.');
    if (octets.length !== 4 || !octets.every((o) => /^\d{1,3}$/.test(o) && Number(o) <= 255)) {
        throw new TypeError(`Invalid IPv4 address: ${ip}`);
    }
    const [a, b, c, d] = octets.map(Number);
    return {
        services,
        address: [...IPV4_MAPPED_PREFIX, (a << 8) | b, (c << 8) | d],
        port,
    };
}

/**
 * Formats the host part: dotted quad for IPv4-mapped addresses, otherwise
 * the eight groups in uncompressed hex.
 */
export function formatHost(addr: Address): string {
    const groups = addr.address;
    if (IPV4_MAPPED_PREFIX.every((value, i) => groups[i] === value)) {
        return [groups[6] >> 8, groups[6] & 0xff, groups[7] >> 8, groups[7] & 0xff].join('.');
    }
    return groups.map((group) => group.toString(16)).join(':');
}
