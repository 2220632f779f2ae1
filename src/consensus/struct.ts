/**
 * Record codecs composed from field codecs.
 *
 * @packageDocumentation
 */
import type { Codec } from './codec.js';

export type StructFields<T> = { readonly [K in keyof T]: Codec<T[K]> };

/**
 * Builds the codec for a record from one codec per field.
 *
 * The wire format is the fields' encodings concatenated in declaration order,
 * with no tags or separators, so the order of `fields` is the format. Decoding
 * reads the fields back in the same order and stops at the first failure.
 *
 * Property order follows insertion order, so field names must not be
 * integer-like strings (those would be enumerated first).
 *
 * @example
 * ```typescript
 * interface Ping { nonce: bigint; tag: number }
 * const ping = struct<Ping>({ nonce: u64, tag: u8 });
 * serialize(ping, { nonce: 1n, tag: 2 }); // 0100000000000000 02
 * ```
 */
export function struct<T extends object>(fields: StructFields<T>): Codec<T> {
    const keys: Array<Extract<keyof T, string>> = [];
    for (const key in fields) {
        keys.push(key);
    }
    const elementSize = keys.reduce((sum, key) => sum + fields[key].elementSize, 0);

    return {
        elementSize,
        encode: (value, writer) => {
            let len = 0;
            for (const key of keys) {
                len += fields[key].encode(value[key], writer);
            }
            return len;
        },
        decode: (reader) => {
            const record: Partial<T> = {};
            for (const key of keys) {
                record[key] = fields[key].decode(reader);
            }
            // Narrows Partial<T> to T; the loop above assigned every key.
            if (!hasFields(record, keys)) {
                throw new Error('record is missing decoded fields');
            }
            return record;
        },
    };
}

function hasFields<T extends object>(record: Partial<T>, keys: ReadonlyArray<keyof T>): record is T {
    return keys.every((key) => key in record);
}
