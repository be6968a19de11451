/**
 * Ruida UDP protocol constants.
 * @module ruida/constants
 *
 * Protocol reference:
 * - Ruida controllers listen on UDP 50200 and answer from it; RDWorks sends from 40200.
 * - Each datagram is a 2-byte additive checksum followed by job bytes.
 */

/** UDP port the controller board listens on. */
export const RUIDA_DEVICE_PORT = 50200;
/** UDP port workstations send from, and the relay's laser-facing port. */
export const RUIDA_SOURCE_PORT = 40200;

/** Maximum job bytes per datagram, excluding the checksum prefix. */
export const RUIDA_DEFAULT_MTU = 1470;
/** Size of the checksum prefix on every chunk. */
export const RUIDA_CHECKSUM_SIZE = 2;

/** Sender wait for a single-byte response. */
export const RUIDA_DEFAULT_RESPONSE_TIMEOUT_MS = 3000;
export const RUIDA_DEFAULT_RETRY_DELAY_MS = 200;
export const RUIDA_DEFAULT_RETRY_MAX_DELAY_MS = 5000;

/** Inactivity after which the relay lets another sender take over. */
export const RUIDA_DEFAULT_SESSION_TIMEOUT_MS = 10000;

/** Single-byte replies sent back for each chunk. */
export enum ResponseByte {
    Ack = 0xc6,
    Nack = 0x46,
}

/** Job terminator (`Run`), present in the last chunk of every job. */
export const RUIDA_END_TOKEN = 0xd7;
