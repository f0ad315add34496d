import {RemoteClient, isRemoteError} from '../src';

type CliOptions = {
    host?: string;
    port?: number;
    delayMs: number;
    appLabel: string;
    commands: string[];
};

function parseArgs(argv: string[]): CliOptions {
    const out: CliOptions = {
        host: process.env.SAMSUNG_DEVICE,
        delayMs: 500,
        appLabel: 'iapp-remote',
        commands: [],
    };
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            out.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) out.port = port;
        } else if (arg.startsWith('--delay=')) {
            const delay = Number(arg.substring('--delay='.length));
            if (Number.isFinite(delay) && delay >= 0) out.delayMs = Math.round(delay);
        } else if (arg.startsWith('--label=')) {
            out.appLabel = arg.substring('--label='.length);
        } else {
            out.commands.push(arg);
        }
    }
    return out;
}

async function printResponse(client: RemoteClient): Promise<void> {
    try {
        const message = await client.receive();
        console.log(`<- ${message.toString()} ${message.payloadName ?? ''}`.trimEnd());
    } catch (err) {
        if (!isRemoteError(err, 'RECEIVE_TIMEOUT')) throw err;
        console.log('<- (no response)');
    }
}

async function main(): Promise<void> {
    const opts = parseArgs(process.argv.slice(2));
    if (!opts.host) {
        console.error('Set SAMSUNG_DEVICE or pass --host=<device ip>');
        process.exitCode = 2;
        return;
    }
    if (opts.commands.length === 0) {
        console.error('Usage: remote-send --host=<ip> [--port=55000] [--delay=500] KEY_<code>|CH<number>|<text> ...');
        process.exitCode = 2;
        return;
    }

    const client = new RemoteClient({appLabel: opts.appLabel, host: opts.host, port: opts.port});
    try {
        for (const command of opts.commands) {
            if (command.startsWith('KEY_')) {
                console.log(`-> ${command} (${await client.sendKey(command)} bytes)`);
            } else if (command.startsWith('CH')) {
                await client.setChannel(Number(command.substring(2)));
                console.log(`-> channel ${command.substring(2)}`);
            } else {
                console.log(`-> "${command}" (${await client.sendText(command)} bytes)`);
            }
            await new Promise((resolve) => setTimeout(resolve, opts.delayMs));
            await printResponse(client);
        }
    } finally {
        client.disconnect();
    }
}

main().catch((err: unknown) => {
    console.error('[RemoteError]', err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
