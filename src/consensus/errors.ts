/**
 * Failures raised while encoding or decoding consensus data.
 *
 * Every error carries a `kind` discriminant so callers can branch with a
 * `switch` instead of a chain of `instanceof` checks. The set is closed:
 * nothing outside this module extends `ConsensusError`.
 *
 * @packageDocumentation
 */
import { toHex } from '../io/index.js';

export type ConsensusErrorKind =
    | 'io'
    | 'unexpected-network-magic'
    | 'unknown-network-magic'
    | 'oversized-vector-allocation'
    | 'invalid-checksum'
    | 'non-minimal-varint'
    | 'parse-failed'
    | 'unsupported-segwit-flag'
    | 'unrecognized-network-command'
    | 'unknown-inventory-type';

export abstract class ConsensusError extends Error {
    abstract readonly kind: ConsensusErrorKind;

    protected constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The underlying sink or source failed, or the source ran out of bytes.
 */
export class IoError extends ConsensusError {
    readonly kind = 'io';

    constructor(message: string, cause?: unknown) {
        super(`I/O error: ${message}`, cause === undefined ? undefined : { cause });
    }
}

export class UnexpectedNetworkMagicError extends ConsensusError {
    readonly kind = 'unexpected-network-magic';
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number) {
        super(`unexpected network magic: expected ${formatMagic(expected)}, actual ${formatMagic(actual)}`);
        this.expected = expected;
        this.actual = actual;
    }
}

export class UnknownNetworkMagicError extends ConsensusError {
    readonly kind = 'unknown-network-magic';
    readonly magic: number;

    constructor(magic: number) {
        super(`unknown network magic: ${formatMagic(magic)}`);
        this.magic = magic;
    }
}

/**
 * A length prefix asked for more memory than any honest message needs.
 */
export class OversizedVectorAllocationError extends ConsensusError {
    readonly kind = 'oversized-vector-allocation';
    readonly requested: bigint;
    readonly max: number;

    constructor(requested: bigint, max: number) {
        super(`allocation of oversized vector requested: requested ${requested}, maximum ${max}`);
        this.requested = requested;
        this.max = max;
    }
}

export class InvalidChecksumError extends ConsensusError {
    readonly kind = 'invalid-checksum';
    readonly expected: Uint8Array;
    readonly actual: Uint8Array;

    constructor(expected: Uint8Array, actual: Uint8Array) {
        super(`invalid checksum: expected ${toHex(expected)}, actual ${toHex(actual)}`);
        this.expected = expected;
        this.actual = actual;
    }
}

export class NonMinimalVarIntError extends ConsensusError {
    readonly kind = 'non-minimal-varint';

    constructor() {
        super('non-minimal varint');
    }
}

/**
 * Structural violation with a fixed diagnostic, e.g. invalid UTF-8 or
 * trailing bytes after a complete message.
 */
export class ParseFailedError extends ConsensusError {
    readonly kind = 'parse-failed';
    readonly reason: string;

    constructor(reason: string, cause?: unknown) {
        super(`parse failed: ${reason}`, cause === undefined ? undefined : { cause });
        this.reason = reason;
    }
}

export class UnsupportedSegwitFlagError extends ConsensusError {
    readonly kind = 'unsupported-segwit-flag';
    readonly flag: number;

    constructor(flag: number) {
        super(`unsupported segwit version: ${flag}`);
        this.flag = flag;
    }
}

export class UnrecognizedNetworkCommandError extends ConsensusError {
    readonly kind = 'unrecognized-network-command';
    readonly command: string;

    constructor(command: string) {
        super(`unrecognized network command: ${JSON.stringify(command)}`);
        this.command = command;
    }
}

export class UnknownInventoryTypeError extends ConsensusError {
    readonly kind = 'unknown-inventory-type';
    readonly code: number;

    constructor(code: number) {
        super(`unknown inventory type: ${code}`);
        this.code = code;
    }
}

export function isConsensusError(value: unknown): value is ConsensusError {
    return value instanceof ConsensusError;
}

function formatMagic(magic: number): string {
    return `0x${magic.toString(16).padStart(8, '0')}`;
}
