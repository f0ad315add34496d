/**
 * Connection configuration shared by the client and the receivers.
 * @module core/config
 */
import {
    DEFAULT_AUTH_TIMEOUT_MS,
    DEFAULT_MAX_AUTH_ATTEMPTS,
    DEFAULT_PORT,
    DEFAULT_RECV_TIMEOUT_MS,
} from '../protocol';
import type {Logger} from '../logger';
import {isMacAddress, type MacAddressSource, resolveLocalMac} from './network';

/**
 * Options accepted by every component that opens a session.
 */
export type ConnectionOptions = {
    /** Application name shown on the TV and used as sender of every frame. */
    appLabel: string;
    /** Device hostname or IP address. */
    host: string;
    /** Remote-control TCP port. Defaults to {@link DEFAULT_PORT}. */
    port?: number;
    /**
     * Connect and handshake read timeout in milliseconds. `null` waits forever.
     * Defaults to {@link DEFAULT_AUTH_TIMEOUT_MS}.
     */
    authTimeoutMs?: number | null;
    /**
     * Read timeout once authenticated. `null` disables it.
     * Defaults to {@link DEFAULT_RECV_TIMEOUT_MS}.
     */
    recvTimeoutMs?: number | null;
    /** Reads to wait for a final handshake answer. Defaults to {@link DEFAULT_MAX_AUTH_ATTEMPTS}. */
    maxAuthAttempts?: number;
    /** Fixed MAC (`aa:bb:cc:dd:ee:ff`) or a source resolving it from the local IP. */
    macAddress?: string | MacAddressSource;
    /** Log sink. Each component falls back to its own `debug` namespace. */
    logger?: Logger;
};

export type ConnectionConfig = Readonly<{
    appLabel: string;
    host: string;
    port: number;
    authTimeoutMs: number | null;
    recvTimeoutMs: number | null;
    maxAuthAttempts: number;
    macAddress: MacAddressSource;
    logger?: Logger;
}>;

const ASCII_PATTERN = /^[\x20-\x7e]+$/;

const validateTimeout = (name: string, value: number | null | undefined, fallback: number): number | null => {
    if (value === undefined) return fallback;
    if (value === null) return null;
    if (!Number.isFinite(value) || value <= 0) {
        throw new RangeError(`${name} must be a positive number of milliseconds or null, got ${value}`);
    }
    return value;
};

/**
 * Apply defaults and validate. The returned config is frozen.
 */
export const resolveConnectionConfig = (options: ConnectionOptions): ConnectionConfig => {
    const {
        appLabel,
        host,
        port = DEFAULT_PORT,
        maxAuthAttempts = DEFAULT_MAX_AUTH_ATTEMPTS,
        macAddress = resolveLocalMac,
        logger,
    } = options;

    if (!ASCII_PATTERN.test(appLabel)) {
        throw new RangeError(`appLabel must be non-empty printable ASCII, got ${JSON.stringify(appLabel)}`);
    }
    if (host.length === 0) {
        throw new RangeError('host must not be empty');
    }
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new RangeError(`port must be 1-65535, got ${port}`);
    }
    if (!Number.isInteger(maxAuthAttempts) || maxAuthAttempts < 1) {
        throw new RangeError(`maxAuthAttempts must be a positive integer, got ${maxAuthAttempts}`);
    }
    if (typeof macAddress === 'string' && !isMacAddress(macAddress)) {
        throw new RangeError(`macAddress must look like aa:bb:cc:dd:ee:ff, got ${macAddress}`);
    }

    return Object.freeze({
        appLabel,
        host,
        port,
        authTimeoutMs: validateTimeout('authTimeoutMs', options.authTimeoutMs, DEFAULT_AUTH_TIMEOUT_MS),
        recvTimeoutMs: validateTimeout('recvTimeoutMs', options.recvTimeoutMs, DEFAULT_RECV_TIMEOUT_MS),
        maxAuthAttempts,
        macAddress: typeof macAddress === 'string' ? () => macAddress : macAddress,
        logger,
    });
};
