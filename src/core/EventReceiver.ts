/**
 * Push-style dispatch of device messages to registered observers.
 * @module core/EventReceiver
 */
import {EventEmitter} from 'events';

import {
    acceptAll,
    isFrameError,
    isRemoteError,
    type Message,
    type MessagePredicate,
    parseMessage,
    RemoteError,
    toError,
} from '../protocol';
import {createLogger, type Logger} from '../logger';
import {createTransportFactory, type TransportFactory} from './Authenticator';
import {type ConnectionConfig, type ConnectionOptions, resolveConnectionConfig} from './config';

export type MessageCallback = (message: Message) => void;

export type EventReceiverOptions = ConnectionOptions & {
    /** Replace connect + authenticate. */
    transportFactory?: TransportFactory;
};

/**
 * Typed event map emitted by {@link EventReceiver}.
 */
export interface EventReceiverEvents {
    /** Emitted once the worker holds an authenticated session. */
    connect: [];
    /** Emitted for every parsed message, before observers run. */
    message: [message: Message];
    /** Emitted for a frame that could not be decoded; the worker keeps running. */
    malformedFrame: [error: RemoteError, frame: Buffer];
    /** Emitted when an error ends the worker. */
    error: [error: Error];
    /** Emitted after the worker closed its session and exited. */
    stop: [];
}

type Subscription = {
    predicate: MessagePredicate;
    callback: MessageCallback;
};

/**
 * Background receiver that fans device messages out to observers.
 *
 * Observers are `(predicate, callback)` pairs invoked in registration order;
 * one message may reach several of them. Stopping is cooperative: the worker
 * checks the stop flag once per read, so shutdown takes up to one
 * `recvTimeoutMs`.
 */
export class EventReceiver extends EventEmitter<EventReceiverEvents> {
    public readonly config: ConnectionConfig;
    private readonly log: Logger;
    private readonly transportFactory: TransportFactory;
    private readonly subscriptions: Subscription[] = [];

    private worker: Promise<void> | null = null;
    private stopping = false;
    private failure: Error | null = null;

    constructor(options: EventReceiverOptions) {
        super();
        this.config = resolveConnectionConfig(options);
        this.log = this.config.logger ?? createLogger('receiver');
        this.transportFactory = options.transportFactory ?? createTransportFactory(this.config);
    }

    /**
     * Register an observer. `callback` runs for every message `predicate` accepts.
     */
    public addMessageListener(predicate: MessagePredicate, callback: MessageCallback): this {
        this.subscriptions.push({predicate, callback});
        return this;
    }

    /** Register an observer for every message. */
    public addMessageCallback(callback: MessageCallback): this {
        return this.addMessageListener(acceptAll, callback);
    }

    /** Remove every registration of `callback`. */
    public removeMessageListener(callback: MessageCallback): this {
        for (let i = this.subscriptions.length - 1; i >= 0; i--) {
            if (this.subscriptions[i].callback === callback) this.subscriptions.splice(i, 1);
        }
        return this;
    }

    /** Returns `true` while the worker is running. */
    public isRunning(): boolean {
        return this.worker !== null;
    }

    /**
     * Launch the worker. It authenticates, then dispatches until stopped.
     */
    public start(): this {
        if (this.worker) {
            throw new Error('EventReceiver is already running');
        }
        this.stopping = false;
        this.failure = null;
        this.worker = this.run()
            .catch((err: unknown) => {
                const error = toError(err);
                this.failure = error;
                this.log('receiver stopped on error: %s', error.message);
                if (this.listenerCount('error') > 0) this.emit('error', error);
            })
            .finally(() => {
                this.worker = null;
                this.emit('stop');
            });
        return this;
    }

    /** Ask the worker to exit after its current read. */
    public stop(): void {
        this.stopping = true;
    }

    /**
     * Stop the worker and wait for it to exit.
     * Rejects with the error that ended the worker, if any.
     */
    public async join(): Promise<void> {
        this.stop();
        const worker = this.worker;
        if (worker) await worker;
        const failure = this.failure;
        if (failure) {
            this.failure = null;
            throw failure;
        }
    }

    private async run(): Promise<void> {
        const transport = await this.transportFactory();
        try {
            this.emit('connect');
            while (!this.stopping) {
                let frame: Buffer;
                try {
                    frame = await transport.receive();
                } catch (err) {
                    if (isRemoteError(err, 'RECEIVE_TIMEOUT')) continue;
                    throw err;
                }

                let message: Message;
                try {
                    message = parseMessage(frame);
                } catch (err) {
                    if (!isFrameError(err)) throw err;
                    this.log('could not parse %s: %s', frame.toString('hex'), err.message);
                    this.emit('malformedFrame', err, frame);
                    continue;
                }
                this.dispatch(message);
            }
        } finally {
            transport.close();
            this.stopping = false;
        }
    }

    private dispatch(message: Message): void {
        this.emit('message', message);
        for (const {predicate, callback} of [...this.subscriptions]) {
            if (predicate(message)) callback(message);
        }
    }
}
