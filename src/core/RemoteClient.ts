/**
 * High-level remote control.
 * @module core/RemoteClient
 */
import {
    buildKeyCommand,
    buildTextCommand,
    DEFAULT_CHANNEL_KEY_DELAY_MS,
    type Message,
    parseMessage,
    RemoteError,
} from '../protocol';
import {createLogger, type Logger} from '../logger';
import {createTransportFactory, type TransportFactory} from './Authenticator';
import {type ConnectionConfig, type ConnectionOptions, resolveConnectionConfig} from './config';
import type {FrameTransport} from './Transport';

/**
 * Configuration for a {@link RemoteClient}.
 */
export type RemoteClientOptions = ConnectionOptions & {
    /** Replace connect + authenticate, e.g. to reuse an existing session. */
    transportFactory?: TransportFactory;
    /** Default pause between the digit keys of {@link RemoteClient.setChannel}. */
    channelKeyDelayMs?: number;
};

const MAX_CHANNEL = 9999;

/**
 * Sends key presses and text to the device.
 *
 * The session is opened on first use; connection and authentication failures
 * surface from whichever call triggered them.
 */
export class RemoteClient {
    public readonly config: ConnectionConfig;
    private readonly log: Logger;
    private readonly transportFactory: TransportFactory;
    private readonly channelKeyDelayMs: number;

    private transport: FrameTransport | null = null;
    private connectPromise: Promise<FrameTransport> | null = null;
    private generation = 0;

    constructor(options: RemoteClientOptions) {
        this.config = resolveConnectionConfig(options);
        this.log = this.config.logger ?? createLogger('remote');
        this.transportFactory = options.transportFactory ?? createTransportFactory(this.config);
        this.channelKeyDelayMs = options.channelKeyDelayMs ?? DEFAULT_CHANNEL_KEY_DELAY_MS;
    }

    /** Connect and authenticate unless a session is already open. */
    public async connect(): Promise<void> {
        await this.ensureTransport();
    }

    /** Returns `true` while an authenticated session is open. */
    public isConnected(): boolean {
        return !!this.transport && this.transport.isOpen();
    }

    /** Send a raw frame, opening the session first if needed. */
    public async send(data: Buffer | Uint8Array): Promise<number> {
        const transport = await this.ensureTransport();
        return transport.send(data);
    }

    /**
     * Send one key press.
     * @param keyCode Device key code such as `KEY_MENU`.
     * @returns Bytes written.
     */
    public async sendKey(keyCode: string): Promise<number> {
        this.log('key %s', keyCode);
        return this.send(buildKeyCommand(this.config.appLabel, keyCode));
    }

    /**
     * Send text. Only accepted while a text input is focused on the device.
     * @returns Bytes written.
     */
    public async sendText(text: string): Promise<number> {
        this.log('text %j', text);
        return this.send(buildTextCommand(this.config.appLabel, text));
    }

    /**
     * Dial a channel as four digit key presses (`12` → `KEY_0 KEY_0 KEY_1 KEY_2`).
     */
    public async setChannel(channel: number, delayMs = this.channelKeyDelayMs): Promise<void> {
        if (!Number.isInteger(channel) || channel < 0 || channel > MAX_CHANNEL) {
            throw new RemoteError({
                message: `Channel must be an integer 0-${MAX_CHANNEL}, got ${channel}`,
                code: 'INVALID_CHANNEL',
                details: {channel},
            });
        }
        const digits = String(channel).padStart(4, '0');
        for (let i = 0; i < digits.length; i++) {
            if (i > 0 && delayMs > 0) {
                await new Promise((resolve) => setTimeout(resolve, delayMs));
            }
            await this.sendKey(`KEY_${digits[i]}`);
        }
    }

    /**
     * Read the next message the device sent on this session.
     * Rejects with `RECEIVE_TIMEOUT` when nothing arrives within `recvTimeoutMs`.
     */
    public async receive(): Promise<Message> {
        const transport = await this.ensureTransport();
        return parseMessage(await transport.receive());
    }

    /**
     * Close the session. The next command opens a new one.
     * A connect still in flight is abandoned: its commands reject with `CONNECTION_CLOSED`.
     */
    public disconnect(): void {
        this.generation += 1;
        this.connectPromise = null;
        this.transport?.close();
        this.transport = null;
    }

    private async ensureTransport(): Promise<FrameTransport> {
        if (this.transport && this.transport.isOpen()) return this.transport;
        if (this.connectPromise) return this.connectPromise;

        const pending = this.openSession(this.generation);
        this.connectPromise = pending;
        try {
            return await pending;
        } finally {
            if (this.connectPromise === pending) this.connectPromise = null;
        }
    }

    private async openSession(generation: number): Promise<FrameTransport> {
        const transport = await this.transportFactory();
        if (generation !== this.generation) {
            this.log('session opened after disconnect, closing it');
            transport.close();
            throw new RemoteError({
                message: 'Disconnected while the session was being opened',
                code: 'CONNECTION_CLOSED',
            });
        }
        this.transport = transport;
        return transport;
    }
}
