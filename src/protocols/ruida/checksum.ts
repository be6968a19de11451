/**
 * Chunk checksum: 16-bit additive sum of the payload, big-endian on the wire.
 * @module ruida/checksum
 */
import {RUIDA_CHECKSUM_SIZE} from './constants';

/** Sum all bytes truncated to 16 bits. */
export const checksumValue = (payload: Uint8Array): number => {
    let sum = 0;
    for (const byte of payload) {
        sum = (sum + byte) & 0xffff;
    }
    return sum;
};

/**
 * Encode the checksum of a payload as the 2-byte chunk prefix.
 * @param payload Job bytes carried by one chunk.
 */
export const checksum = (payload: Uint8Array): Buffer => {
    const buffer = Buffer.alloc(RUIDA_CHECKSUM_SIZE);
    buffer.writeUInt16BE(checksumValue(payload), 0);
    return buffer;
};

/**
 * Check a full chunk (prefix + payload) against its own prefix.
 * @returns `false` for datagrams too short to carry a prefix.
 */
export const verify = (chunk: Uint8Array): boolean => {
    if (chunk.length < RUIDA_CHECKSUM_SIZE) return false;
    const expected = ((chunk[0] ?? 0) << 8) | (chunk[1] ?? 0);
    return checksumValue(chunk.subarray(RUIDA_CHECKSUM_SIZE)) === expected;
};
