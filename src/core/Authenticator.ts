/**
 * Handshake with the device.
 * @module core/Authenticator
 */
import {buildAuthFrame, isRemoteError, type Message, parseMessage, RemoteError, ResponsePayload} from '../protocol';
import {createLogger, type Logger} from '../logger';
import {type ConnectionConfig, type ConnectionOptions, resolveConnectionConfig} from './config';
import {type FrameTransport, Transport} from './Transport';

/** Produces an authenticated transport. */
export type TransportFactory = () => Promise<FrameTransport>;

type AuthStatus = 'granted' | 'pending';

/**
 * Authenticates an application with the device.
 *
 * The device may answer with any number of "waiting for confirmation" messages
 * while the user is asked to allow the app on screen. Those count against
 * `maxAuthAttempts` the same way read timeouts do.
 */
export class Authenticator {
    public readonly config: ConnectionConfig;
    private readonly log: Logger;

    constructor(options: ConnectionOptions) {
        this.config = resolveConnectionConfig(options);
        this.log = this.config.logger ?? createLogger('auth');
    }

    /**
     * Connect and run {@link handshake}. The transport is closed if either step fails.
     */
    public async authenticate(): Promise<Transport> {
        const {host, port, authTimeoutMs, logger} = this.config;
        const transport = await Transport.connect({host, port, timeoutMs: authTimeoutMs, logger});
        try {
            await this.handshake(transport);
        } catch (err) {
            transport.close();
            throw err;
        }
        return transport;
    }

    /**
     * Send the auth request on an open transport and wait for the verdict.
     * On success the transport's read timeout is switched to `recvTimeoutMs`.
     */
    public async handshake(transport: FrameTransport): Promise<void> {
        const {appLabel, maxAuthAttempts, recvTimeoutMs} = this.config;
        const localAddress = transport.localAddress();
        const mac = this.config.macAddress(localAddress);
        this.log('authenticating %s from %s (%s)', appLabel, localAddress, mac);
        await transport.send(buildAuthFrame(localAddress, mac, appLabel));

        for (let attempt = 1; attempt <= maxAuthAttempts; attempt++) {
            let frame: Buffer;
            try {
                frame = await transport.receive();
            } catch (err) {
                if (!isRemoteError(err, 'RECEIVE_TIMEOUT')) throw err;
                this.log('no auth response (attempt %d/%d)', attempt, maxAuthAttempts);
                continue;
            }

            const message = parseMessage(frame);
            this.log('auth response %s (attempt %d/%d)', message, attempt, maxAuthAttempts);
            if (this.classify(message, transport) === 'granted') {
                transport.setReceiveTimeout(recvTimeoutMs);
                this.log('authenticated');
                return;
            }
        }

        this.log('no final auth response after %d attempts', maxAuthAttempts);
        throw new RemoteError({
            message: 'Access denied by remote device',
            code: 'AUTHENTICATION_DENIED',
            details: {attempts: maxAuthAttempts},
        });
    }

    private classify(message: Message, transport: FrameTransport): AuthStatus {
        if (message.hasPayload(ResponsePayload.AuthOk)) return 'granted';
        if (message.hasPayload(ResponsePayload.AuthNeedConfirmation)) {
            this.log('waiting for confirmation on the device');
            return 'pending';
        }
        if (message.hasPayload(ResponsePayload.AuthAccessDenied)) {
            transport.close();
            throw new RemoteError({
                message: 'Access denied by remote device',
                code: 'AUTHENTICATION_DENIED',
            });
        }
        if (message.hasPayload(ResponsePayload.AuthTimeout)) {
            throw new RemoteError({
                message: 'Remote device timed out waiting for confirmation',
                code: 'AUTHENTICATION_TIMED_OUT',
            });
        }
        throw new RemoteError({
            message: `Unknown authentication response ${message}`,
            code: 'UNKNOWN_AUTH_RESPONSE',
            response: message,
        });
    }
}

/**
 * Default {@link TransportFactory}: a fresh connect + handshake per call.
 */
export const createTransportFactory = (options: ConnectionOptions): TransportFactory => {
    const authenticator = new Authenticator(options);
    return () => authenticator.authenticate();
};
