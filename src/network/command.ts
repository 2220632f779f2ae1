/**
 * Message command names: ASCII, at most 12 bytes, NUL-padded on the wire.
 *
 * @packageDocumentation
 */
import type { Codec } from '../consensus/codec.js';
import { ParseFailedError } from '../consensus/errors.js';
import { fromUtf8, isAscii, toUtf8 } from '../io/index.js';

export const COMMAND_SIZE = 12;

/**
 * @throws RangeError if `command` is not ASCII or longer than {@link COMMAND_SIZE}
 */
export function assertCommand(command: string): void {
    const bytes = fromUtf8(command);
    if (!isAscii(bytes) || bytes.includes(0)) {
        throw new RangeError(`command must be printable ASCII: ${JSON.stringify(command)}`);
    }
    if (bytes.length > COMMAND_SIZE) {
        throw new RangeError(`command "${command}" is ${bytes.length} bytes, limit is ${COMMAND_SIZE}`);
    }
}

/**
 * Fixed 12-byte command field.
 *
 * Encoding never truncates: a name over the limit throws. Decoding strips the
 * trailing NUL padding and rejects any other NUL or non-ASCII byte.
 */
export const commandString: Codec<string> = {
    elementSize: COMMAND_SIZE,
    encode: (command, writer) => {
        assertCommand(command);
        const field = new Uint8Array(COMMAND_SIZE);
        field.set(fromUtf8(command));
        return writer.emitSlice(field);
    },
    decode: (reader) => {
        const field = reader.readBytes(COMMAND_SIZE);
        let end = COMMAND_SIZE;
        while (end > 0 && field[end - 1] === 0) end--;

        const name = field.subarray(0, end);
        if (name.includes(0)) {
            throw new ParseFailedError('command string has embedded NUL');
        }
        if (!isAscii(name)) {
            throw new ParseFailedError('command string is not ASCII');
        }
        return toUtf8(name);
    },
};
