/**
 * `ruida-relay`: arbitrate and record jobs on their way to a controller.
 * @module cli/relay
 */
import {RuidaError} from '../protocols/ruida/errors';
import {RuidaRelay} from '../protocols/ruida/relay';
import {formatPeer} from '../protocols/ruida/util';
import {type Environment, parseRelayArgs, RELAY_USAGE, type RelayCliOptions} from './options';
import {type CliOutput, describeError} from './send';

/** Listens for the first SIGINT or SIGTERM until disposed. */
export type SignalWatch = {
    received: Promise<NodeJS.Signals>;
    dispose(): void;
};

export const watchSignals = (): SignalWatch => {
    let onSignal: (signal: NodeJS.Signals) => void = () => undefined;
    const received = new Promise<NodeJS.Signals>((resolve) => {
        onSignal = (signal) => {
            dispose();
            resolve(signal);
        };
    });
    const dispose = (): void => {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
    return {received, dispose};
};

/**
 * Run the relay until `stop` settles (default: SIGINT/SIGTERM) or a socket
 * fails, then shut down cleanly, closing any open capture file.
 * @returns Process exit code: 0 after a requested stop, 1 on errors.
 */
export async function runRelay(
    argv: string[],
    env: Environment,
    out: CliOutput = console,
    stop?: Promise<unknown>,
): Promise<number> {
    let options: RelayCliOptions;
    try {
        options = parseRelayArgs(argv, env);
    } catch (err) {
        out.error(describeError(err));
        out.error(RELAY_USAGE);
        return 1;
    }
    if (options.help) {
        out.log(RELAY_USAGE);
        return 0;
    }

    const relay = new RuidaRelay(options.relay);
    const failed = new Promise<number>((resolve) => {
        relay.on('error', (err) => {
            out.error('[RelayError]', err.message);
            if (err instanceof RuidaError && err.code === 'SOCKET_ERROR' && err.details?.socket !== undefined) {
                resolve(1);
            }
        });
    });
    relay.on('listening', () => {
        out.log(`relaying to ${options.relay.laserHost}; press Ctrl+C to exit`);
    });
    relay.on('sessionStart', (session, sink) => {
        out.log(`stream ${session.id} from ${formatPeer(session.owner)} -> ${sink}`);
    });
    relay.on('sessionEnd', (session, reason) => {
        out.log(`stream ${session.id} ended (${reason}): ${session.datagrams} datagrams, ${session.bytes} bytes`);
    });
    relay.on('reject', (datagram, reason) => {
        out.log(`NACK ${formatPeer(datagram.from)} (${reason})`);
    });
    if (options.verbose) {
        relay.on('forward', (datagram, session) => {
            out.log(`stream ${session.id}: ${datagram.data.length} bytes forwarded`);
        });
        relay.on('deviceReply', (reply, from) => {
            out.log(`controller ${formatPeer(from)} replied ${reply.toString('hex')}`);
        });
    }

    const signals = watchSignals();
    const outcome = await Promise.race([
        (stop ?? signals.received).then(() => 0),
        failed,
    ]);
    signals.dispose();
    await relay.close();
    return outcome;
}
