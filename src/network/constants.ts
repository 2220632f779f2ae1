/**
 * Protocol version, network magic values and service flags.
 *
 * A network's magic is encoded as a plain little-endian u32:
 *
 * @example
 * ```typescript
 * toHex(serialize(u32, magic('bitcoin'))); // 'f9beb4d9'
 * ```
 *
 * @packageDocumentation
 */
import { mapCodec, u32, u64, type Codec } from '../consensus/codec.js';
import { UnknownNetworkMagicError } from '../consensus/errors.js';
import { isUInt64 } from '../types.js';

/** Protocol version advertised in `version` messages. */
export const PROTOCOL_VERSION = 70001;

export type Network = 'bitcoin' | 'testnet' | 'regtest';

const MAGIC: Readonly<Record<Network, number>> = {
    bitcoin: 0xd9b4bef9,
    testnet: 0x0709110b,
    regtest: 0xdab5bffa,
};

export const NETWORKS: readonly Network[] = ['bitcoin', 'testnet', 'regtest'];

export function magic(network: Network): number {
    return MAGIC[network];
}

export function networkFromMagic(value: number): Network | undefined {
    return NETWORKS.find((network) => MAGIC[network] === value);
}

export function isNetwork(value: unknown): value is Network {
    return typeof value === 'string' && NETWORKS.some((network) => network === value);
}

/**
 * @throws Error if `name` is not one of {@link NETWORKS}
 */
export function parseNetwork(name: string): Network {
    if (!isNetwork(name)) {
        throw new Error(`Unknown network (type ${name})`);
    }
    return name;
}

/**
 * A network, on the wire as its magic.
 */
export const network: Codec<Network> = mapCodec(u32, magic, (value) => {
    const known = networkFromMagic(value);
    if (known === undefined) throw new UnknownNetworkMagicError(value);
    return known;
});

const FLAG_NAMES: ReadonlyArray<readonly [string, bigint]> = [
    ['NETWORK', 1n << 0n],
    ['GETUTXO', 1n << 1n],
    ['BLOOM', 1n << 2n],
    ['WITNESS', 1n << 3n],
    ['NETWORK_LIMITED', 1n << 10n],
];

/**
 * Bitmask of the services a node offers. Immutable; `add` and `remove`
 * return new values. Unknown bits are kept as they are.
 */
export class ServiceFlags {
    static readonly NONE = new ServiceFlags(0n);
    /** Can serve the full block chain. */
    static readonly NETWORK = new ServiceFlags(1n << 0n);
    /** Answers `getutxo` (BIP-64). */
    static readonly GETUTXO = new ServiceFlags(1n << 1n);
    /** Supports bloom filtered connections (BIP-111). */
    static readonly BLOOM = new ServiceFlags(1n << 2n);
    /** Serves witness data (BIP-144). */
    static readonly WITNESS = new ServiceFlags(1n << 3n);
    /** Serves the last 288 blocks (BIP-159). */
    static readonly NETWORK_LIMITED = new ServiceFlags(1n << 10n);

    readonly bits: bigint;

    constructor(bits: bigint) {
        if (!isUInt64(bits)) {
            throw new RangeError(`service flags out of range: ${bits}`);
        }
        this.bits = bits;
    }

    has(flags: ServiceFlags): boolean {
        return (this.bits & flags.bits) === flags.bits;
    }

    add(flags: ServiceFlags): ServiceFlags {
        return new ServiceFlags(this.bits | flags.bits);
    }

    remove(flags: ServiceFlags): ServiceFlags {
        return new ServiceFlags(this.bits & ~flags.bits);
    }

    equals(other: ServiceFlags): boolean {
        return this.bits === other.bits;
    }

    /**
     * @example
     * ```typescript
     * ServiceFlags.NETWORK.add(ServiceFlags.WITNESS).toString(); // 'ServiceFlags(NETWORK|WITNESS)'
     * ```
     */
    toString(): string {
        if (this.bits === 0n) return 'ServiceFlags(NONE)';

        const names: string[] = [];
        let rest = this.bits;
        for (const [name, bit] of FLAG_NAMES) {
            if ((rest & bit) === bit) {
                names.push(name);
                rest &= ~bit;
            }
        }
        if (rest !== 0n) names.push(`0x${rest.toString(16)}`);
        return `ServiceFlags(${names.join('|')})`;
    }
}

export const serviceFlags: Codec<ServiceFlags> = mapCodec(
    u64,
    (flags) => flags.bits,
    (bits) => new ServiceFlags(bits),
);
