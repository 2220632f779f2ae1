/**
 * Hash functions used by message framing.
 *
 * @packageDocumentation
 */
import { sha256 } from '@noble/hashes/sha2.js';
import type { Sha256dHash } from './branded.js';
import { toFixedBytes } from './types.js';

/**
 * Double SHA-256.
 */
export function hash256(buffer: Uint8Array): Sha256dHash {
    return toFixedBytes(sha256(sha256(buffer)), 32);
}
