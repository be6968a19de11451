/**
 * Job fragmentation into checksum-prefixed chunks.
 * @module ruida/chunk
 *
 * Wire layout of one chunk: `[checksumHi][checksumLo][payload...]`.
 * The datagram length delimits the payload; there is no length field.
 */
import {checksum} from './checksum';
import {RUIDA_CHECKSUM_SIZE, RUIDA_DEFAULT_MTU, RUIDA_END_TOKEN} from './constants';

/** One fragment of a job, ready to send. */
export type Chunk = {
    /** 0-based position in the job's chunk sequence. */
    index: number;
    /** Byte offset of `payload` inside the job. */
    offset: number;
    /** Only the first chunk of a job may be retried after a NACK. */
    isFirst: boolean;
    /** Job bytes carried by this chunk. */
    payload: Buffer;
    /** Checksum prefix followed by payload. */
    datagram: Buffer;
};

/**
 * Prefix a payload with its checksum.
 * @param payload Job bytes for one datagram.
 */
export const encodeChunk = (payload: Uint8Array): Buffer => {
    return Buffer.concat([checksum(payload), payload]);
};

/**
 * Job bytes of a received chunk (everything after the checksum prefix).
 * @returns An empty buffer when the datagram is too short to carry a payload.
 */
export const chunkPayload = (datagram: Buffer): Buffer => {
    if (datagram.length <= RUIDA_CHECKSUM_SIZE) return Buffer.alloc(0);
    return datagram.subarray(RUIDA_CHECKSUM_SIZE);
};

/** `true` when the job terminator occurs anywhere in `payload`. */
export const containsEndToken = (payload: Uint8Array): boolean => payload.includes(RUIDA_END_TOKEN);

/**
 * Lazily split a job into chunks of at most `mtu` payload bytes.
 * An empty job yields no chunks.
 * @param job Full job content.
 * @param mtu Maximum payload bytes per chunk.
 */
export function* splitChunks(job: Uint8Array, mtu = RUIDA_DEFAULT_MTU): Generator<Chunk> {
    if (!Number.isInteger(mtu) || mtu < 1) {
        throw new RangeError(`MTU must be a positive integer, got ${mtu}`);
    }
    const source = Buffer.from(job.buffer, job.byteOffset, job.byteLength);
    let index = 0;
    for (let offset = 0; offset < source.length; offset += mtu) {
        const payload = source.subarray(offset, Math.min(offset + mtu, source.length));
        yield {
            index,
            offset,
            isFirst: index === 0,
            payload,
            datagram: encodeChunk(payload),
        };
        index += 1;
    }
}

/** Number of chunks `splitChunks` will produce. */
export const countChunks = (jobLength: number, mtu = RUIDA_DEFAULT_MTU): number => {
    return jobLength === 0 ? 0 : Math.ceil(jobLength / mtu);
};
