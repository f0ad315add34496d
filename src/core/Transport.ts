/**
 * TCP transport carrying whole protocol frames.
 * @module core/Transport
 */
import * as net from 'net';
import type {Socket} from 'net';

import {extractFrames, RemoteError} from '../protocol';
import {createLogger, type Logger} from '../logger';
import {normalizeAddress} from './network';

/**
 * Frame-level transport used by the authenticator, the client and the receivers.
 * {@link Transport} is the socket-backed implementation.
 */
export interface FrameTransport {
    /** Write a whole frame. Resolves with the number of bytes written. */
    send(data: Buffer | Uint8Array): Promise<number>;
    /**
     * Resolve with the next whole frame.
     * Rejects with `RECEIVE_TIMEOUT` or `CONNECTION_CLOSED`.
     */
    receive(): Promise<Buffer>;
    /** Change the read timeout. `null` waits forever. */
    setReceiveTimeout(timeoutMs: number | null): void;
    /** Local IP address of the connection. */
    localAddress(): string;
    isOpen(): boolean;
    /** Release the connection. Safe to call repeatedly. */
    close(): void;
}

export type TransportConnectOptions = {
    host: string;
    port: number;
    /** Applies to the connect attempt and, initially, to every read. `null` waits forever. */
    timeoutMs: number | null;
    logger?: Logger;
};

type PendingReceive = {
    resolve: (frame: Buffer) => void;
    reject: (error: Error) => void;
    timeoutId: NodeJS.Timeout | null;
};

export class Transport implements FrameTransport {
    private readonly log: Logger;
    private readonly frames: Buffer[] = [];
    private streamBuffer: Buffer = Buffer.alloc(0);
    private pending: PendingReceive | null = null;
    private receiveTimeoutMs: number | null;
    private closed = false;
    private closeReason: Error | null = null;

    private constructor(
        private readonly socket: Socket,
        private readonly remote: string,
        options: TransportConnectOptions,
    ) {
        this.log = options.logger ?? createLogger('transport');
        this.receiveTimeoutMs = options.timeoutMs;

        socket.on('data', (chunk: Buffer) => this.onData(chunk));
        socket.on('error', (err) => {
            this.log('%s socket error: %s', this.remote, err.message);
            this.closeReason = err;
        });
        socket.on('end', () => this.markClosed());
        socket.on('close', () => this.markClosed());
    }

    /**
     * Open a TCP connection.
     * Rejects with `CONNECT_ERROR` on socket errors or when `timeoutMs` elapses first.
     */
    public static connect(options: TransportConnectOptions): Promise<Transport> {
        const {host, port, timeoutMs} = options;
        const remote = `${host}:${port}`;
        const log = options.logger ?? createLogger('transport');
        log('connecting to %s', remote);

        const socket = net.createConnection({host, port});
        return new Promise<Transport>((resolve, reject) => {
            let timeoutId: NodeJS.Timeout | null = null;
            const cleanup = (): void => {
                if (timeoutId) clearTimeout(timeoutId);
                socket.off('connect', onConnect);
                socket.off('error', onError);
            };
            const fail = (message: string, cause?: Error): void => {
                cleanup();
                socket.destroy();
                log('connect to %s failed: %s', remote, message);
                reject(new RemoteError({
                    message: `Could not connect to ${remote}: ${message}`,
                    code: 'CONNECT_ERROR',
                    details: {host, port},
                    cause,
                }));
            };
            const onConnect = (): void => {
                cleanup();
                log('connected to %s', remote);
                resolve(new Transport(socket, remote, options));
            };
            const onError = (err: Error): void => fail(err.message, err);

            socket.once('connect', onConnect);
            socket.once('error', onError);
            if (timeoutMs !== null) {
                timeoutId = setTimeout(() => fail(`timed out after ${timeoutMs}ms`), timeoutMs);
            }
        });
    }

    public async send(data: Buffer | Uint8Array): Promise<number> {
        if (this.closed) {
            throw new RemoteError({
                message: `Cannot send to ${this.remote}: connection is closed`,
                code: 'SEND_ERROR',
            });
        }
        const payload = Buffer.from(data);
        this.log('sending %s', payload.toString('hex'));
        await new Promise<void>((resolve, reject) => {
            this.socket.write(payload, (err) => {
                if (err) {
                    reject(new RemoteError({
                        message: `Send to ${this.remote} failed: ${err.message}`,
                        code: 'SEND_ERROR',
                        cause: err,
                    }));
                } else {
                    resolve();
                }
            });
        });
        return payload.length;
    }

    public receive(): Promise<Buffer> {
        const frame = this.frames.shift();
        if (frame) return Promise.resolve(frame);
        if (this.closed) return Promise.reject(this.closedError());
        if (this.pending) {
            return Promise.reject(new Error('Transport already has a pending receive'));
        }

        return new Promise<Buffer>((resolve, reject) => {
            const timeoutMs = this.receiveTimeoutMs;
            const timeoutId = timeoutMs === null ? null : setTimeout(() => {
                this.pending = null;
                reject(new RemoteError({
                    message: `No frame from ${this.remote} within ${timeoutMs}ms`,
                    code: 'RECEIVE_TIMEOUT',
                }));
            }, timeoutMs);
            this.pending = {resolve, reject, timeoutId};
        });
    }

    public setReceiveTimeout(timeoutMs: number | null): void {
        this.receiveTimeoutMs = timeoutMs;
    }

    public localAddress(): string {
        const address = this.socket.localAddress;
        if (!address) {
            throw new Error(`Connection to ${this.remote} has no local address`);
        }
        return normalizeAddress(address);
    }

    public isOpen(): boolean {
        return !this.closed;
    }

    public close(): void {
        if (this.closed) return;
        this.log('closing connection to %s', this.remote);
        this.markClosed();
        this.socket.destroy();
    }

    /**
     * Bytes left over from the previous chunk are only joined with `chunk` when
     * `chunk` does not hold whole frames on its own. Otherwise they are handed on
     * as a frame of their own, which fails to parse, and framing restarts at `chunk`.
     */
    private onData(chunk: Buffer): void {
        let extracted = extractFrames(chunk);
        if (this.streamBuffer.length > 0) {
            if (extracted.frames.length > 0 && extracted.remainder.length === 0) {
                this.log('%d stray bytes before a whole frame', this.streamBuffer.length);
                this.deliver(this.streamBuffer);
            } else {
                extracted = extractFrames(Buffer.concat([this.streamBuffer, chunk]));
            }
        }
        this.streamBuffer = extracted.remainder;

        for (const frame of extracted.frames) {
            this.deliver(frame);
        }
    }

    private deliver(frame: Buffer): void {
        this.log('received %s', frame.toString('hex'));
        const pending = this.pending;
        if (pending) {
            this.pending = null;
            if (pending.timeoutId) clearTimeout(pending.timeoutId);
            pending.resolve(frame);
        } else {
            this.frames.push(frame);
        }
    }

    private markClosed(): void {
        if (this.closed) return;
        this.closed = true;
        if (this.streamBuffer.length > 0) {
            this.log('discarding %d bytes of an incomplete frame', this.streamBuffer.length);
        }
        const pending = this.pending;
        if (pending) {
            this.pending = null;
            if (pending.timeoutId) clearTimeout(pending.timeoutId);
            pending.reject(this.closedError());
        }
    }

    private closedError(): RemoteError {
        return new RemoteError({
            message: `Connection to ${this.remote} closed`,
            code: 'CONNECTION_CLOSED',
            cause: this.closeReason ?? undefined,
        });
    }
}
