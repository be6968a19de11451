import {type CaptureSink, formatPeer, RuidaRelay} from '../src';

type CliOptions = {
    laserHost: string;
    preview: number;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {laserHost: '192.168.1.100', preview: 16};
    for (const arg of argv) {
        if (arg.startsWith('--laser=')) {
            options.laserHost = arg.substring('--laser='.length);
        } else if (arg.startsWith('--preview=')) {
            const preview = Number(arg.substring('--preview='.length));
            if (Number.isInteger(preview) && preview >= 0) {
                options.preview = preview;
            }
        }
    }
    return options;
}

/** Keeps a stream's bytes in memory and prints a short summary on close. */
class PreviewSink implements CaptureSink {
    public readonly name: string;
    private readonly chunks: Buffer[] = [];
    private readonly preview: number;

    constructor(name: string, preview: number) {
        this.name = name;
        this.preview = preview;
    }

    async write(data: Buffer): Promise<void> {
        this.chunks.push(Buffer.from(data));
    }

    async close(): Promise<void> {
        const job = Buffer.concat(this.chunks);
        console.log(`${this.name}: ${job.length} bytes, starts ${job.subarray(0, this.preview).toString('hex')}`);
    }
}

const options = parseArgs(process.argv.slice(2));
const relay = new RuidaRelay({
    laserHost: options.laserHost,
    sinkFactory: async (session) => new PreviewSink(`stream ${session.id}`, options.preview),
});

relay.on('listening', () => console.log(`relaying to ${options.laserHost}; press Ctrl+C to exit`));
relay.on('sessionStart', (session) => console.log(`stream ${session.id} opened by ${formatPeer(session.owner)}`));
relay.on('sessionEnd', (session, reason) => console.log(`stream ${session.id} closed (${reason})`));
relay.on('reject', (datagram, reason) => console.log(`NACK ${formatPeer(datagram.from)} (${reason})`));
relay.on('error', (err) => console.error('[RelayError]', err.message));

process.once('SIGINT', () => {
    relay.close().then(() => process.exit(0), (err: unknown) => {
        console.error(err);
        process.exit(1);
    });
});
