/**
 * `ruida-send`: transmit a job file to a controller.
 * @module cli/send
 */
import {readFile} from 'fs/promises';

import {RuidaSender} from '../protocols/ruida/sender';
import {formatByte} from '../protocols/ruida/util';
import {type Environment, parseSendArgs, SEND_USAGE, type SendCliOptions} from './options';

/** Console subset the CLIs write to. */
export type CliOutput = Pick<Console, 'log' | 'error'>;

export const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Run the sender CLI.
 * @returns Process exit code: 0 when every chunk was acknowledged, 2 when
 *   the controller stopped answering, 1 on errors.
 */
export async function runSend(argv: string[], env: Environment, out: CliOutput = console): Promise<number> {
    let options: SendCliOptions;
    try {
        options = parseSendArgs(argv, env);
    } catch (err) {
        out.error(describeError(err));
        out.error(SEND_USAGE);
        return 1;
    }
    if (options.help) {
        out.log(SEND_USAGE);
        return 0;
    }

    let job: Buffer;
    try {
        job = await readFile(options.file);
    } catch (err) {
        out.error(`Cannot read ${options.file}: ${describeError(err)}`);
        return 1;
    }

    const sender = new RuidaSender(options.sender);
    sender.on('error', (err) => out.error('[SocketError]', err.message));
    if (options.verbose) {
        sender.on('chunk', (chunk, attempt) => {
            out.log(`chunk ${chunk.index} offset=${chunk.offset} len=${chunk.payload.length} attempt=${attempt}`);
        });
        sender.on('ack', (chunk) => out.log(`chunk ${chunk.index} acknowledged`));
        sender.on('retry', (_chunk, attempt, delayMs) => out.log(`first chunk rejected, retry ${attempt} in ${delayMs}ms`));
    }
    sender.on('silence', (chunk, outcome) => out.error(`no reply to chunk ${chunk.index} (${outcome})`));
    sender.on('unknownResponse', (chunk, response) => {
        out.error(`unknown response ${formatByte(response)} to chunk ${chunk.index}`);
    });

    try {
        const report = await sender.write(job);
        out.log(`${options.file}: ${report.acked}/${report.chunks} chunks, ${report.bytes} bytes acknowledged (${report.outcome})`);
        return report.outcome === 'complete' ? 0 : 2;
    } catch (err) {
        out.error('[TransferError]', describeError(err));
        return 1;
    } finally {
        sender.close();
    }
}
