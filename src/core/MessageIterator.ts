/**
 * Pull-style consumption of device messages.
 * @module core/MessageIterator
 */
import {acceptAll, isRemoteError, type Message, type MessagePredicate, parseMessage} from '../protocol';
import {createLogger, type Logger} from '../logger';
import {createTransportFactory, type TransportFactory} from './Authenticator';
import {type ConnectionConfig, type ConnectionOptions, resolveConnectionConfig} from './config';
import type {FrameTransport} from './Transport';

export type MessageIteratorOptions = ConnectionOptions & {
    /** Messages rejected by the filter are dropped. Defaults to accepting everything. */
    filter?: MessagePredicate;
    /** Replace connect + authenticate. */
    transportFactory?: TransportFactory;
};

/**
 * Async iterable over the messages a device pushes.
 *
 * ```ts
 * for await (const message of new MessageIterator({appLabel: 'remote', host: '192.168.1.20'})) {
 *     console.log(message.toString());
 * }
 * ```
 *
 * Read timeouts are retried silently. Any other transport or decode error
 * rejects the pending read. Leaving a `for await` loop closes the session.
 */
export class MessageIterator implements AsyncIterable<Message> {
    public readonly config: ConnectionConfig;
    private readonly log: Logger;
    private readonly filter: MessagePredicate;
    private readonly transportFactory: TransportFactory;
    private transport: FrameTransport | null = null;

    constructor(options: MessageIteratorOptions) {
        this.config = resolveConnectionConfig(options);
        this.log = this.config.logger ?? createLogger('iterator');
        this.filter = options.filter ?? acceptAll;
        this.transportFactory = options.transportFactory ?? createTransportFactory(this.config);
    }

    /**
     * Wait for the next message accepted by `predicate` (the constructor filter by default).
     */
    public async nextMessage(predicate: MessagePredicate = this.filter): Promise<Message> {
        const transport = await this.ensureTransport();
        for (;;) {
            let frame: Buffer;
            try {
                frame = await transport.receive();
            } catch (err) {
                if (isRemoteError(err, 'RECEIVE_TIMEOUT')) continue;
                throw err;
            }
            const message = parseMessage(frame);
            if (predicate(message)) return message;
            this.log('dropped %s', message);
        }
    }

    public async* [Symbol.asyncIterator](): AsyncGenerator<Message, void, undefined> {
        try {
            for (;;) {
                yield await this.nextMessage();
            }
        } finally {
            this.close();
        }
    }

    public close(): void {
        this.transport?.close();
        this.transport = null;
    }

    private async ensureTransport(): Promise<FrameTransport> {
        if (this.transport && this.transport.isOpen()) return this.transport;
        this.transport = await this.transportFactory();
        return this.transport;
    }
}
