/**
 * Acknowledgement engine: the send-wait-retry loop behind every job transfer.
 * @module ruida/ack
 *
 * Rules:
 * - `0xC6` acknowledges a chunk; the next one may be sent.
 * - `0x46` on the first chunk means "not ready yet": resend it after a
 *   truncated binary backoff. On any later chunk it aborts the job.
 * - Silence (timeout or an empty datagram) and unknown bytes end the job
 *   without an error.
 */
import {type Chunk, countChunks, splitChunks} from './chunk';
import {
    RUIDA_DEFAULT_MTU,
    RUIDA_DEFAULT_RESPONSE_TIMEOUT_MS,
    RUIDA_DEFAULT_RETRY_DELAY_MS,
    RUIDA_DEFAULT_RETRY_MAX_DELAY_MS,
    ResponseByte,
} from './constants';
import {RuidaError, toRuidaError} from './errors';
import type {ChunkTransport} from './transport';

export type AckPolicy = {
    /** Wait for a reply to each datagram. Default 3000 ms. */
    responseTimeoutMs?: number;
    /** First backoff delay after a NACK on the first chunk. Default 200 ms. */
    retryDelayMs?: number;
    /** Backoff ceiling. Default 5000 ms. */
    retryMaxDelayMs?: number;
    /** Give up on the first chunk after this many retries. Default: never. */
    maxFirstChunkRetries?: number;
    /** Pause before each chunk (debugging aid). Default 0. */
    chunkPauseMs?: number;
};

export type TransferOptions = AckPolicy & {
    /** Maximum payload bytes per chunk. Default 1470. */
    mtu?: number;
    /** Timer used for backoff and pauses; replaceable in tests. */
    sleep?: (ms: number) => Promise<void>;
};

/** How the exchange for one chunk ended. */
export type ChunkOutcome = 'acked' | 'timeout' | 'empty-response' | 'unknown-response';

export type ChunkDelivery = {
    outcome: ChunkOutcome;
    /** Datagrams sent for this chunk (1 + retries). */
    attempts: number;
    /** Reply byte, when one was received. */
    response?: number;
};

/** Transfer outcome: `complete` when every chunk was acknowledged. */
export type TransferOutcome = 'complete' | Exclude<ChunkOutcome, 'acked'>;

export type TransferReport = {
    outcome: TransferOutcome;
    /** Chunks the job was split into. */
    chunks: number;
    /** Chunks acknowledged by the peer. */
    acked: number;
    /** Resends of the first chunk. */
    retries: number;
    /** Job bytes acknowledged. */
    bytes: number;
};

/** Progress callbacks; every member is optional. */
export interface TransferObserver {
    send?(chunk: Chunk, attempt: number): void;
    ack?(chunk: Chunk): void;
    retry?(chunk: Chunk, attempt: number, delayMs: number): void;
    silence?(chunk: Chunk, outcome: 'timeout' | 'empty-response'): void;
    unknownResponse?(chunk: Chunk, response: number): void;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Backoff before the `attempt`-th retry (1-based): base doubled per retry, capped.
 */
export const retryDelay = (attempt: number, baseMs: number, maxMs: number): number => {
    return Math.min(baseMs * (2 ** (attempt - 1)), maxMs);
};

/**
 * Deliver one chunk and wait for its acknowledgement.
 * @throws RuidaError `CHECKSUM_REJECTED` on a NACK for a non-first chunk,
 *   `FIRST_CHUNK_REJECTED` when the retry limit is exhausted.
 */
export const deliverChunk = async (
    transport: ChunkTransport,
    chunk: Chunk,
    options: TransferOptions = {},
    observer: TransferObserver = {},
): Promise<ChunkDelivery> => {
    const timeoutMs = options.responseTimeoutMs ?? RUIDA_DEFAULT_RESPONSE_TIMEOUT_MS;
    const baseDelayMs = options.retryDelayMs ?? RUIDA_DEFAULT_RETRY_DELAY_MS;
    const maxDelayMs = options.retryMaxDelayMs ?? RUIDA_DEFAULT_RETRY_MAX_DELAY_MS;
    const maxRetries = options.maxFirstChunkRetries ?? Number.POSITIVE_INFINITY;
    const sleep = options.sleep ?? defaultSleep;

    let attempts = 0;
    for (;;) {
        attempts += 1;
        observer.send?.(chunk, attempts);
        try {
            await transport.send(chunk.datagram);
        } catch (err) {
            throw toRuidaError(err, 'transport', 'SOCKET_ERROR', {index: chunk.index});
        }
        const reply = await transport.receive(timeoutMs);

        if (reply === null) {
            observer.silence?.(chunk, 'timeout');
            return {outcome: 'timeout', attempts};
        }
        if (reply.length === 0) {
            observer.silence?.(chunk, 'empty-response');
            return {outcome: 'empty-response', attempts};
        }

        const response = reply[0] ?? 0;
        if (response === ResponseByte.Ack) {
            observer.ack?.(chunk);
            return {outcome: 'acked', attempts, response};
        }
        if (response !== ResponseByte.Nack) {
            observer.unknownResponse?.(chunk, response);
            return {outcome: 'unknown-response', attempts, response};
        }

        if (!chunk.isFirst) {
            throw new RuidaError({
                message: `Chunk ${chunk.index} rejected by peer (checksum error)`,
                domain: 'transfer',
                code: 'CHECKSUM_REJECTED',
                details: {index: chunk.index, offset: chunk.offset, length: chunk.payload.length},
            });
        }
        const retry = attempts;
        if (retry > maxRetries) {
            throw new RuidaError({
                message: `First chunk still rejected after ${maxRetries} retries`,
                domain: 'transfer',
                code: 'FIRST_CHUNK_REJECTED',
                details: {retries: maxRetries},
            });
        }
        const delayMs = retryDelay(retry, baseDelayMs, maxDelayMs);
        observer.retry?.(chunk, retry, delayMs);
        await sleep(delayMs);
    }
};

/**
 * Split `job` and deliver its chunks strictly one after another.
 * Stops early, without throwing, when the peer goes silent or answers
 * with an unknown byte.
 */
export const transferJob = async (
    transport: ChunkTransport,
    job: Uint8Array,
    options: TransferOptions = {},
    observer: TransferObserver = {},
): Promise<TransferReport> => {
    const mtu = options.mtu ?? RUIDA_DEFAULT_MTU;
    const sleep = options.sleep ?? defaultSleep;
    const pauseMs = options.chunkPauseMs ?? 0;
    const report: TransferReport = {
        outcome: 'complete',
        chunks: countChunks(job.length, mtu),
        acked: 0,
        retries: 0,
        bytes: 0,
    };

    for (const chunk of splitChunks(job, mtu)) {
        if (pauseMs > 0) await sleep(pauseMs);
        const delivery = await deliverChunk(transport, chunk, options, observer);
        if (chunk.isFirst) report.retries = delivery.attempts - 1;
        if (delivery.outcome !== 'acked') {
            report.outcome = delivery.outcome;
            return report;
        }
        report.acked += 1;
        report.bytes += chunk.payload.length;
    }
    return report;
};
