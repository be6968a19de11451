/**
 * Address and formatting helpers.
 * @module ruida/util
 */

/** UDP endpoint of a datagram's sender. */
export type PeerAddress = {
    address: string;
    port: number;
};

/** One received datagram, tagged with its sender and arrival time. */
export type Datagram = {
    data: Buffer;
    from: PeerAddress;
    /** Arrival time in epoch milliseconds. */
    receivedAt: number;
};

/** `host:port` form used in logs and as an identity key. */
export const formatPeer = (peer: PeerAddress): string => `${peer.address}:${peer.port}`;

/** Peers are equal when both address and port match. */
export const samePeer = (a: PeerAddress, b: PeerAddress): boolean => {
    return a.address === b.address && a.port === b.port;
};

/**
 * Validate a UDP port number.
 * @param port Candidate port (1-65535).
 */
export const validatePort = (port: number): number => {
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new RangeError(`UDP port must be 1-65535, got ${port}`);
    }
    return port;
};

/** Two-digit hex form of a byte, e.g. `0xc6`. */
export const formatByte = (value: number): string => `0x${value.toString(16).padStart(2, '0')}`;
