/**
 * Byte array helpers shared by the codecs and the tests.
 *
 * @packageDocumentation
 */

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Concatenates byte arrays into a new array.
 *
 * @example
 * ```typescript
 * toHex(concat([fromHex('dead'), fromHex('beef')])); // 'deadbeef'
 * ```
 */
export function concat(arrays: readonly Uint8Array[]): Uint8Array {
    const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
    const result = new Uint8Array(totalLength);
    let offset = 0;
    for (const arr of arrays) {
        result.set(arr, offset);
        offset += arr.length;
    }
    return result;
}

export function equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

/**
 * Encodes a string as UTF-8.
 */
export function fromUtf8(str: string): Uint8Array {
    return utf8Encoder.encode(str);
}

/**
 * Decodes UTF-8 bytes to a string.
 *
 * Unlike a default `TextDecoder`, malformed sequences are not replaced with
 * U+FFFD: they throw a `TypeError`, and a leading byte order mark is kept.
 */
export function toUtf8(bytes: Uint8Array): string {
    return utf8Decoder.decode(bytes);
}

/**
 * Checks that every surrogate in `str` is part of a high/low pair, i.e. that
 * the string survives a UTF-8 round trip unchanged.
 */
export function isWellFormed(str: string): boolean {
    for (let i = 0; i < str.length; i++) {
        const unit = str.charCodeAt(i);
        if (unit >= 0xd800 && unit <= 0xdbff) {
            const next = str.charCodeAt(i + 1);
            if (!(next >= 0xdc00 && next <= 0xdfff)) return false;
            i++;
        } else if (unit >= 0xdc00 && unit <= 0xdfff) {
            return false;
        }
    }
    return true;
}

/**
 * Checks that every byte is 7-bit ASCII.
 */
export function isAscii(bytes: Uint8Array): boolean {
    for (let i = 0; i < bytes.length; i++) {
        if (bytes[i] > 0x7f) return false;
    }
    return true;
}
