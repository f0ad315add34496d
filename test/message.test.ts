import {describe, expect, it} from 'vitest';

import {
    acceptAll,
    encodeLengthPrefixed,
    identifyPayload,
    isRemoteError,
    kindIs,
    Message,
    MessageKind,
    parseMessage,
    payloadIs,
    ResponsePayload,
} from '../src';

const frame = (kind: number, sender: string, payload: Buffer): Buffer =>
    Buffer.concat([Buffer.from([kind]), encodeLengthPrefixed(sender), encodeLengthPrefixed(payload)]);

const parseError = (data: Buffer): unknown => {
    try {
        Message.parse(data);
    } catch (err) {
        return err;
    }
    throw new Error('Expected parse to fail');
};

describe('Message.parse', () => {
    it('reads kind, sender and payload', () => {
        const message = parseMessage(frame(0x02, 'src', Buffer.from('payload')));
        expect(message.kind).toBe(MessageKind.StateChange);
        expect(message.sender).toBe('src');
        expect(message.payload).toEqual(Buffer.from('payload'));
    });

    it('accepts kinds outside the known set', () => {
        expect(Message.parse(frame(0x7e, 'x', Buffer.alloc(0))).kind).toBe(0x7e);
    });

    it('rejects trailing bytes', () => {
        const err = parseError(Buffer.concat([frame(0x00, 'src', Buffer.from([0x01])), Buffer.from([0xff])]));
        expect(isRemoteError(err, 'MALFORMED_FRAME')).toBe(true);
    });

    it('rejects an empty frame', () => {
        expect(isRemoteError(parseError(Buffer.alloc(0)), 'MALFORMED_FRAME')).toBe(true);
    });

    it('reports a truncated payload', () => {
        const full = frame(0x00, 'src', Buffer.from([0x01, 0x02, 0x03]));
        expect(isRemoteError(parseError(full.subarray(0, full.length - 1)), 'TRUNCATED_FRAME')).toBe(true);
        expect(isRemoteError(parseError(Buffer.from([0x00, 0x04])), 'TRUNCATED_FRAME')).toBe(true);
    });
});

describe('Message', () => {
    it('rejects kinds that do not fit in a byte', () => {
        expect(() => new Message(256, 'x', Buffer.alloc(0))).toThrow(RangeError);
        expect(() => new Message(-1, 'x', Buffer.alloc(0))).toThrow(RangeError);
        expect(() => new Message(1.5, 'x', Buffer.alloc(0))).toThrow(RangeError);
    });

    it('compares kind and payload but not sender', () => {
        const a = new Message(0x00, 'iapp.samsung', ResponsePayload.KeyOk);
        expect(a.equals(new Message(0x00, 'other', ResponsePayload.KeyOk))).toBe(true);
        expect(a.equals(new Message(0x01, 'iapp.samsung', ResponsePayload.KeyOk))).toBe(false);
        expect(a.equals(new Message(0x00, 'iapp.samsung', ResponsePayload.AuthOk))).toBe(false);
    });

    it('compares against a raw frame', () => {
        const message = new Message(0x02, 'a', ResponsePayload.StatusShowingMenu);
        expect(message.equals(frame(0x02, 'b', ResponsePayload.StatusShowingMenu))).toBe(true);
        expect(message.equals(frame(0x02, 'b', ResponsePayload.StatusShowingTv))).toBe(false);
    });

    it('renders kind and payload as hex', () => {
        const message = new Message(0x02, 'iapp.samsung', ResponsePayload.StatusShowingMenu);
        expect(message.toString()).toBe('2:100002000000');
        expect(new Message(0x1f, '', Buffer.from([0xab])).toString()).toBe('1f:ab');
    });

    it('names known payloads', () => {
        expect(new Message(0x00, '', ResponsePayload.AuthOk).payloadName).toBe('AuthOk');
        expect(new Message(0x00, '', Buffer.from([0x01])).payloadName).toBeNull();
    });

    it('does not expose its payload buffer', () => {
        const message = new Message(0x00, '', Buffer.from([0x01, 0x02]));
        message.payload[0] = 0xff;
        expect(message.payload).toEqual(Buffer.from([0x01, 0x02]));
    });
});

describe('message predicates', () => {
    const menu = new Message(0x02, '', ResponsePayload.StatusShowingMenu);
    const keyOk = new Message(0x00, '', ResponsePayload.KeyOk);

    it('filters by kind', () => {
        expect(kindIs(MessageKind.StateChange)(menu)).toBe(true);
        expect(kindIs(MessageKind.StateChange)(keyOk)).toBe(false);
    });

    it('filters by payload name or bytes', () => {
        expect(payloadIs('StatusShowingMenu')(menu)).toBe(true);
        expect(payloadIs('StatusShowingMenu')(keyOk)).toBe(false);
        expect(payloadIs(Uint8Array.from([0x00, 0x00, 0x00, 0x00]))(keyOk)).toBe(true);
    });

    it('accepts everything by default', () => {
        expect(acceptAll(menu)).toBe(true);
        expect(acceptAll(keyOk)).toBe(true);
    });
});

describe('identifyPayload', () => {
    it('distinguishes the handshake timeout from the handshake replies', () => {
        expect(identifyPayload(Buffer.from([0x64, 0x00]))).toBe('AuthTimeout');
        expect(identifyPayload(Buffer.from([0x64, 0x00, 0x01, 0x00]))).toBe('AuthOk');
        expect(identifyPayload(Buffer.from([0x64, 0x00, 0x00, 0x00]))).toBe('AuthAccessDenied');
        expect(identifyPayload(Buffer.from([0x64, 0x00, 0x02, 0x00]))).toBeNull();
    });
});
