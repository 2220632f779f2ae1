/**
 * Branded byte array types: the length is part of the type.
 *
 * @packageDocumentation
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type Bytes2 = Brand<Uint8Array, 'Bytes2'>;
export type Bytes4 = Brand<Uint8Array, 'Bytes4'>;
export type Bytes8 = Brand<Uint8Array, 'Bytes8'>;
export type Bytes12 = Brand<Uint8Array, 'Bytes12'>;
export type Bytes16 = Brand<Uint8Array, 'Bytes16'>;
export type Bytes32 = Brand<Uint8Array, 'Bytes32'>;
export type Bytes33 = Brand<Uint8Array, 'Bytes33'>;

/**
 * Maps a supported width to its branded type.
 */
export interface FixedBytesBySize {
    2: Bytes2;
    4: Bytes4;
    8: Bytes8;
    12: Bytes12;
    16: Bytes16;
    32: Bytes32;
    33: Bytes33;
}

export type FixedByteSize = keyof FixedBytesBySize;

/** A double-SHA256 digest, as it appears on the wire. */
export type Sha256dHash = Bytes32;
