/**
 * Structured error taxonomy for the remote-control protocol.
 * @module protocol/errors
 */
import type {Message} from './message';

export type RemoteErrorDomain = 'codec' | 'transport' | 'auth' | 'remote';

export type RemoteErrorCode =
    | 'VALUE_TOO_LARGE'
    | 'INVALID_TEXT'
    | 'TRUNCATED_FRAME'
    | 'MALFORMED_FRAME'
    | 'CONNECT_ERROR'
    | 'SEND_ERROR'
    | 'RECEIVE_TIMEOUT'
    | 'CONNECTION_CLOSED'
    | 'AUTHENTICATION_DENIED'
    | 'AUTHENTICATION_TIMED_OUT'
    | 'UNKNOWN_AUTH_RESPONSE'
    | 'INVALID_CHANNEL';

const ERROR_DOMAINS: Record<RemoteErrorCode, RemoteErrorDomain> = {
    VALUE_TOO_LARGE: 'codec',
    INVALID_TEXT: 'codec',
    TRUNCATED_FRAME: 'codec',
    MALFORMED_FRAME: 'codec',
    CONNECT_ERROR: 'transport',
    SEND_ERROR: 'transport',
    RECEIVE_TIMEOUT: 'transport',
    CONNECTION_CLOSED: 'transport',
    AUTHENTICATION_DENIED: 'auth',
    AUTHENTICATION_TIMED_OUT: 'auth',
    UNKNOWN_AUTH_RESPONSE: 'auth',
    INVALID_CHANNEL: 'remote',
};

export class RemoteError extends Error {
    public readonly domain: RemoteErrorDomain;
    public readonly code: RemoteErrorCode;
    public readonly details?: Record<string, unknown>;
    /** The offending device message, set for `UNKNOWN_AUTH_RESPONSE`. */
    public readonly response?: Message;

    constructor(params: {
        message: string;
        code: RemoteErrorCode;
        details?: Record<string, unknown>;
        response?: Message;
        cause?: unknown;
    }) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'RemoteError';
        this.domain = ERROR_DOMAINS[params.code];
        this.code = params.code;
        this.details = params.details;
        this.response = params.response;
    }
}

/**
 * Narrow `err` to a {@link RemoteError}, optionally of one specific code.
 */
export const isRemoteError = (err: unknown, code?: RemoteErrorCode): err is RemoteError =>
    err instanceof RemoteError && (code === undefined || err.code === code);

/** `true` for decode failures of a single frame. */
export const isFrameError = (err: unknown): err is RemoteError =>
    isRemoteError(err, 'TRUNCATED_FRAME') || isRemoteError(err, 'MALFORMED_FRAME');

/** Normalize a thrown value into an `Error`. */
export const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));
