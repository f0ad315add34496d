/**
 * Length-prefixed string codec and frame builders.
 * @module protocol/codec
 *
 * Frame layout (both directions):
 *   [1B kind/mode] [2B length (LE u16)] [sender] [2B length (LE u16)] [payload]
 */
import {
    APP_SENDER_SUFFIX,
    AUTH_REQUEST_PREFIX,
    CommandMode,
    KEY_COMMAND_PREFIX,
    MAX_STRING_LENGTH,
    TEXT_COMMAND_PREFIX,
} from './constants';
import {RemoteError} from './errors';

const LENGTH_SIZE = 2;
const ASCII_PATTERN = /^[\x00-\x7f]*$/;

/**
 * Encode text as ASCII bytes, rejecting characters outside the 7-bit range.
 */
export const encodeAscii = (text: string): Buffer => {
    if (!ASCII_PATTERN.test(text)) {
        throw new RemoteError({
            message: `Text must be ASCII, got ${JSON.stringify(text)}`,
            code: 'INVALID_TEXT',
        });
    }
    return Buffer.from(text, 'ascii');
};

/**
 * Prefix a value with its little-endian 16-bit length.
 * Strings are encoded as ASCII first.
 */
export const encodeLengthPrefixed = (value: Buffer | Uint8Array | string): Buffer => {
    const bytes = typeof value === 'string' ? encodeAscii(value) : Buffer.from(value);
    if (bytes.length > MAX_STRING_LENGTH) {
        throw new RemoteError({
            message: `Value of ${bytes.length} bytes exceeds the ${MAX_STRING_LENGTH} byte length prefix`,
            code: 'VALUE_TOO_LARGE',
            details: {length: bytes.length},
        });
    }
    const buffer = Buffer.alloc(LENGTH_SIZE + bytes.length);
    buffer.writeUInt16LE(bytes.length, 0);
    bytes.copy(buffer, LENGTH_SIZE);
    return buffer;
};

/** Base64-encode ASCII text, then length-prefix the result. */
export const encodeLengthPrefixedBase64 = (text: string): Buffer =>
    encodeLengthPrefixed(encodeAscii(text).toString('base64'));

/**
 * Read one length-prefixed value from the start of `buffer`.
 * @returns The value and whatever bytes follow it.
 */
export const decodeLengthPrefixed = (buffer: Buffer): {value: Buffer; remainder: Buffer} => {
    if (buffer.length < LENGTH_SIZE) {
        throw new RemoteError({
            message: `Length prefix truncated: expected ${LENGTH_SIZE} bytes, got ${buffer.length}`,
            code: 'TRUNCATED_FRAME',
            details: {available: buffer.length},
        });
    }
    const length = buffer.readUInt16LE(0);
    const end = LENGTH_SIZE + length;
    if (buffer.length < end) {
        throw new RemoteError({
            message: `Length-prefixed value truncated: missing ${end - buffer.length} of ${length} bytes`,
            code: 'TRUNCATED_FRAME',
            details: {declared: length, available: buffer.length - LENGTH_SIZE},
        });
    }
    return {
        value: Buffer.from(buffer.subarray(LENGTH_SIZE, end)),
        remainder: Buffer.from(buffer.subarray(end)),
    };
};

/**
 * Build an outbound frame: mode byte, `<appLabel>.iapp.samsung` sender, inner payload.
 */
export const buildCommandFrame = (appLabel: string, mode: CommandMode, innerPayload: Buffer | Uint8Array): Buffer =>
    Buffer.concat([
        Buffer.from([mode]),
        encodeLengthPrefixed(appLabel + APP_SENDER_SUFFIX),
        encodeLengthPrefixed(innerPayload),
    ]);

/** Build a key-press frame, e.g. for `KEY_VOLUP`. */
export const buildKeyCommand = (appLabel: string, keyCode: string): Buffer =>
    buildCommandFrame(
        appLabel,
        CommandMode.Key,
        Buffer.concat([KEY_COMMAND_PREFIX, encodeLengthPrefixedBase64(keyCode)]),
    );

/** Build a text-input frame. Only accepted while a text field is focused on the device. */
export const buildTextCommand = (appLabel: string, text: string): Buffer =>
    buildCommandFrame(
        appLabel,
        CommandMode.Text,
        Buffer.concat([TEXT_COMMAND_PREFIX, encodeLengthPrefixedBase64(text)]),
    );

/** Inner payload of the handshake request. */
export const buildAuthRequest = (localIp: string, localMac: string, appLabel: string): Buffer =>
    Buffer.concat([
        AUTH_REQUEST_PREFIX,
        encodeLengthPrefixedBase64(localIp),
        encodeLengthPrefixedBase64(localMac),
        encodeLengthPrefixedBase64(appLabel),
    ]);

/** Full handshake frame sent right after connecting. */
export const buildAuthFrame = (localIp: string, localMac: string, appLabel: string): Buffer =>
    buildCommandFrame(appLabel, CommandMode.Key, buildAuthRequest(localIp, localMac, appLabel));

/**
 * Split a TCP stream buffer into whole frames.
 * Returns complete frames and any remaining incomplete bytes.
 */
export const extractFrames = (streamBuffer: Buffer): {frames: Buffer[]; remainder: Buffer} => {
    const frames: Buffer[] = [];
    let offset = 0;

    while (offset + 1 + LENGTH_SIZE <= streamBuffer.length) {
        const senderLength = streamBuffer.readUInt16LE(offset + 1);
        const payloadLengthOffset = offset + 1 + LENGTH_SIZE + senderLength;
        if (payloadLengthOffset + LENGTH_SIZE > streamBuffer.length) break;

        const payloadLength = streamBuffer.readUInt16LE(payloadLengthOffset);
        const end = payloadLengthOffset + LENGTH_SIZE + payloadLength;
        if (end > streamBuffer.length) break;

        frames.push(Buffer.from(streamBuffer.subarray(offset, end)));
        offset = end;
    }

    return {
        frames,
        remainder: Buffer.from(streamBuffer.subarray(offset)),
    };
};
