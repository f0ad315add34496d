/**
 * Device → client messages.
 * @module protocol/message
 */
import {identifyPayload, type ResponsePayloadName, ResponsePayload} from './constants';
import {decodeLengthPrefixed} from './codec';
import {RemoteError} from './errors';

/**
 * One message pushed by the device.
 *
 * Equality only looks at `kind` and `payload`; the sender name varies between
 * firmware versions and carries no meaning for the caller.
 */
export class Message {
    public readonly kind: number;
    public readonly sender: string;
    private readonly data: Buffer;

    constructor(kind: number, sender: string, payload: Buffer | Uint8Array) {
        if (!Number.isInteger(kind) || kind < 0 || kind > 0xff) {
            throw new RangeError(`Message kind must be 0-255, got ${kind}`);
        }
        this.kind = kind;
        this.sender = sender;
        this.data = Buffer.from(payload);
    }

    /**
     * Parse one complete frame as received from the device.
     */
    public static parse(frame: Buffer): Message {
        if (frame.length < 1) {
            throw new RemoteError({
                message: 'Message frame is empty',
                code: 'MALFORMED_FRAME',
            });
        }
        const kind = frame[0];
        const sender = decodeLengthPrefixed(frame.subarray(1));
        const payload = decodeLengthPrefixed(sender.remainder);
        if (payload.remainder.length > 0) {
            throw new RemoteError({
                message: `Message frame has ${payload.remainder.length} trailing bytes`,
                code: 'MALFORMED_FRAME',
                details: {frame: frame.toString('hex'), trailing: payload.remainder.toString('hex')},
            });
        }
        return new Message(kind, sender.value.toString('ascii'), payload.value);
    }

    /** Copy of the raw payload bytes. */
    public get payload(): Buffer {
        return Buffer.from(this.data);
    }

    /** Name of the payload if it is a known one. */
    public get payloadName(): ResponsePayloadName | null {
        return identifyPayload(this.data);
    }

    public hasPayload(expected: Uint8Array): boolean {
        return this.data.equals(expected);
    }

    /**
     * Compare by kind and payload. A raw frame is parsed before comparing.
     */
    public equals(other: Message | Buffer): boolean {
        const message = Buffer.isBuffer(other) ? Message.parse(other) : other;
        return this.kind === message.kind && this.data.equals(message.data);
    }

    public toString(): string {
        return `${this.kind.toString(16)}:${this.data.toString('hex')}`;
    }
}

export const parseMessage = (frame: Buffer): Message => Message.parse(frame);

/** Decides whether an observer is interested in a message. */
export type MessagePredicate = (message: Message) => boolean;

export const acceptAll: MessagePredicate = () => true;

export const kindIs = (kind: number): MessagePredicate => (message) => message.kind === kind;

export const payloadIs = (payload: ResponsePayloadName | Uint8Array): MessagePredicate => {
    const expected = typeof payload === 'string' ? ResponsePayload[payload] : Buffer.from(payload);
    return (message) => message.hasPayload(expected);
};
