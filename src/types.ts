/**
 * Integer range guards and byte-width assertions.
 *
 * @packageDocumentation
 */
import type { FixedByteSize, FixedBytesBySize } from './branded.js';

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
} from './branded.js';

// ============================================================================
// Constants
// ============================================================================

export const UINT64_MAX = 0xffff_ffff_ffff_ffffn;
export const INT64_MIN = -(1n << 63n);
export const INT64_MAX = (1n << 63n) - 1n;

// ============================================================================
// Type Guards
// ============================================================================

export function isUInt(value: unknown, bits: 8 | 16 | 32): value is number {
    return (
        typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < 2 ** bits
    );
}

export function isInt(value: unknown, bits: 8 | 16 | 32): value is number {
    const bound = 2 ** (bits - 1);
    return typeof value === 'number' && Number.isInteger(value) && value >= -bound && value < bound;
}

export function isUInt16(value: unknown): value is number {
    return isUInt(value, 16);
}

export function isUInt64(value: unknown): value is bigint {
    return typeof value === 'bigint' && value >= 0n && value <= UINT64_MAX;
}

export function isInt64(value: unknown): value is bigint {
    return typeof value === 'bigint' && value >= INT64_MIN && value <= INT64_MAX;
}

export function isUint8ArrayN<N extends FixedByteSize>(
    value: unknown,
    n: N,
): value is FixedBytesBySize[N] {
    return value instanceof Uint8Array && value.length === n;
}

// ============================================================================
// Assertion Helpers
// ============================================================================

/**
 * Brands a byte array as exactly `n` bytes long.
 *
 * @throws TypeError if the length differs
 *
 * @example
 * ```typescript
 * const hash = toFixedBytes(new Uint8Array(32), 32); // Bytes32
 * ```
 */
export function toFixedBytes<N extends FixedByteSize>(value: Uint8Array, n: N): FixedBytesBySize[N] {
    const length = value.length;
    if (!isUint8ArrayN(value, n)) {
        throw new TypeError(`Expected ${n}-byte Uint8Array, got ${length} bytes`);
    }
    return value;
}
