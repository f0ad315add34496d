import {EventReceiver, MessageKind, payloadIs} from '../src';

type CliOptions = {
    host?: string;
    port?: number;
    appLabel: string;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {host: process.env.SAMSUNG_DEVICE, appLabel: 'iapp-listener'};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) options.port = port;
        } else if (arg.startsWith('--label=')) {
            options.appLabel = arg.substring('--label='.length);
        }
    }
    return options;
}

const options = parseArgs(process.argv.slice(2));
if (!options.host) {
    console.error('Set SAMSUNG_DEVICE or pass --host=<device ip>');
    process.exit(2);
}

const receiver = new EventReceiver({appLabel: options.appLabel, host: options.host, port: options.port});

receiver.on('connect', () => {
    console.log(`Listening to ${options.host}:${options.port ?? 55000}`);
});

receiver.addMessageCallback((message) => {
    const kind = MessageKind[message.kind] ?? `0x${message.kind.toString(16)}`;
    console.log(`--- ${new Date().toISOString()} ---`);
    console.log(`${kind} from ${message.sender}: ${message.payload.toString('hex')} ${message.payloadName ?? ''}`);
});

receiver.addMessageListener(payloadIs('StatusShowingMenu'), () => {
    console.log('Menu opened');
});

receiver.on('malformedFrame', (error, frame) => {
    console.error(`[MalformedFrame] ${error.message}: ${frame.toString('hex')}`);
});

receiver.on('error', (error) => {
    console.error('[ReceiverError]', error.message);
});

receiver.start();

function shutdown(): void {
    receiver.join().then(
        () => process.exit(0),
        () => process.exit(1),
    );
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
