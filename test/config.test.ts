import {describe, expect, it} from 'vitest';

import {
    DEFAULT_AUTH_TIMEOUT_MS,
    DEFAULT_MAX_AUTH_ATTEMPTS,
    DEFAULT_PORT,
    DEFAULT_RECV_TIMEOUT_MS,
    isFrameError,
    isRemoteError,
    RemoteError,
    resolveConnectionConfig,
    resolveLocalMac,
    toError,
} from '../src';

describe('resolveConnectionConfig', () => {
    it('applies defaults', () => {
        const config = resolveConnectionConfig({appLabel: 'test-remote', host: '192.168.1.20'});
        expect(config).toMatchObject({
            appLabel: 'test-remote',
            host: '192.168.1.20',
            port: DEFAULT_PORT,
            authTimeoutMs: DEFAULT_AUTH_TIMEOUT_MS,
            recvTimeoutMs: DEFAULT_RECV_TIMEOUT_MS,
            maxAuthAttempts: DEFAULT_MAX_AUTH_ATTEMPTS,
        });
        expect(config.macAddress).toBe(resolveLocalMac);
        expect(config.logger).toBeUndefined();
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('keeps null timeouts', () => {
        const config = resolveConnectionConfig({
            appLabel: 'tv',
            host: 'tv.local',
            authTimeoutMs: null,
            recvTimeoutMs: null,
        });
        expect(config.authTimeoutMs).toBeNull();
        expect(config.recvTimeoutMs).toBeNull();
    });

    it('wraps a fixed MAC in a source', () => {
        const config = resolveConnectionConfig({appLabel: 'tv', host: 'tv.local', macAddress: 'aa:bb:cc:dd:ee:ff'});
        expect(config.macAddress('10.0.0.1')).toBe('aa:bb:cc:dd:ee:ff');
    });

    it('keeps a MAC source as given', () => {
        const source = (address: string) => (address === '10.0.0.1' ? '02:00:00:00:00:01' : '02:00:00:00:00:02');
        const config = resolveConnectionConfig({appLabel: 'tv', host: 'tv.local', macAddress: source});
        expect(config.macAddress).toBe(source);
    });

    it.each([
        [{appLabel: '', host: 'tv.local'}],
        [{appLabel: 'télé', host: 'tv.local'}],
        [{appLabel: 'tv', host: ''}],
        [{appLabel: 'tv', host: 'tv.local', port: 0}],
        [{appLabel: 'tv', host: 'tv.local', port: 65536}],
        [{appLabel: 'tv', host: 'tv.local', port: 80.5}],
        [{appLabel: 'tv', host: 'tv.local', maxAuthAttempts: 0}],
        [{appLabel: 'tv', host: 'tv.local', authTimeoutMs: 0}],
        [{appLabel: 'tv', host: 'tv.local', recvTimeoutMs: -5}],
        [{appLabel: 'tv', host: 'tv.local', recvTimeoutMs: Number.POSITIVE_INFINITY}],
        [{appLabel: 'tv', host: 'tv.local', macAddress: 'aa-bb-cc-dd-ee-ff'}],
    ])('rejects %o', (options) => {
        expect(() => resolveConnectionConfig(options)).toThrow(RangeError);
    });
});

describe('RemoteError', () => {
    it('derives the domain from the code', () => {
        expect(new RemoteError({message: 'x', code: 'VALUE_TOO_LARGE'}).domain).toBe('codec');
        expect(new RemoteError({message: 'x', code: 'RECEIVE_TIMEOUT'}).domain).toBe('transport');
        expect(new RemoteError({message: 'x', code: 'AUTHENTICATION_DENIED'}).domain).toBe('auth');
        expect(new RemoteError({message: 'x', code: 'INVALID_CHANNEL'}).domain).toBe('remote');
    });

    it('keeps name, details and cause', () => {
        const cause = new Error('ECONNREFUSED');
        const err = new RemoteError({message: 'connect failed', code: 'CONNECT_ERROR', details: {port: 55000}, cause});
        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe('RemoteError');
        expect(err.details).toEqual({port: 55000});
        expect(err.cause).toBe(cause);
    });

    it('narrows by code', () => {
        const err: unknown = new RemoteError({message: 'x', code: 'MALFORMED_FRAME'});
        expect(isRemoteError(err)).toBe(true);
        expect(isRemoteError(err, 'MALFORMED_FRAME')).toBe(true);
        expect(isRemoteError(err, 'TRUNCATED_FRAME')).toBe(false);
        expect(isRemoteError(new Error('x'))).toBe(false);
        expect(isFrameError(err)).toBe(true);
        expect(isFrameError(new RemoteError({message: 'x', code: 'SEND_ERROR'}))).toBe(false);
    });

    it('normalizes thrown values', () => {
        const err = new Error('boom');
        expect(toError(err)).toBe(err);
        expect(toError('boom').message).toBe('boom');
    });
});
