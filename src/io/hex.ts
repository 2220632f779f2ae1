const HEX_CHARS = '0123456789abcdef';

/**
 * Converts a hex string (with or without `0x` prefix) to bytes.
 *
 * @throws Error if the string has an odd length or a non-hex character
 *
 * @example
 * ```typescript
 * fromHex('deadbeef'); // Uint8Array [222, 173, 190, 239]
 * ```
 */
export function fromHex(hex: string): Uint8Array {
    if (hex.startsWith('0x') || hex.startsWith('0X')) {
        hex = hex.slice(2);
    }
    const length = hex.length;
    if (!isHex(hex)) {
        throw new Error(`Invalid hex string: ${length % 2 === 0 ? 'bad character' : 'odd length'}`);
    }
    const result = new Uint8Array(hex.length / 2);
    for (let i = 0; i < result.length; i++) {
        result[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
    }
    return result;
}

/**
 * Converts bytes to a lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
    let result = '';
    for (let i = 0; i < bytes.length; i++) {
        result += HEX_CHARS[bytes[i] >> 4] + HEX_CHARS[bytes[i] & 0x0f];
    }
    return result;
}

export function isHex(value: unknown): value is string {
    if (typeof value !== 'string') return false;
    if (value.length % 2 !== 0) return false;
    return /^[0-9a-fA-F]*$/.test(value);
}
