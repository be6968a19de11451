/**
 * Ruida UDP job sender.
 * @module ruida/sender
 *
 * Sends a job file straight to a controller: checksum-prefixed chunks, one
 * at a time, each acknowledged before the next. There is no handshake; an
 * acknowledged first chunk means the controller is ready.
 */
import {createSocket, type Socket} from 'dgram';
import {EventEmitter} from 'events';

import {type AckPolicy, type TransferReport, transferJob} from './ack';
import type {Chunk} from './chunk';
import {RUIDA_DEFAULT_MTU, RUIDA_DEVICE_PORT, RUIDA_SOURCE_PORT} from './constants';
import {RuidaError, toRuidaError} from './errors';
import {DatagramTransport} from './transport';
import {validatePort} from './util';

export type RuidaSenderConfiguration = AckPolicy & {
    /** Controller IP address or hostname. */
    host: string;
    /** Controller UDP port. Defaults to 50200. */
    port?: number;
    /** Local source port. Defaults to 40200; `0` picks an ephemeral port. */
    localPort?: number;
    /** Local interface address. Defaults to `0.0.0.0`. */
    bindAddress?: string;
    /** Maximum job bytes per datagram. Defaults to 1470. */
    mtu?: number;
};

export interface RuidaSenderEvents {
    /** A chunk datagram is about to be sent (`attempt` starts at 1). */
    chunk: [chunk: Chunk, attempt: number];
    /** The controller acknowledged a chunk. */
    ack: [chunk: Chunk];
    /** The first chunk was NACKed and will be resent after `delayMs`. */
    retry: [chunk: Chunk, attempt: number, delayMs: number];
    /** No reply, or an empty one; the job stops here. */
    silence: [chunk: Chunk, outcome: 'timeout' | 'empty-response'];
    /** A reply byte that is neither ACK nor NACK; the job stops here. */
    unknownResponse: [chunk: Chunk, response: number];
    /** Socket errors after the sender is open. */
    error: [Error];
}

/** Delivers whole jobs to one controller over UDP. */
export class RuidaSender extends EventEmitter<RuidaSenderEvents> {
    private readonly socket: Socket;
    private readonly transport: DatagramTransport;
    private readonly config: RuidaSenderConfiguration;
    private opening: Promise<void> | null = null;
    private busy = false;
    private closed = false;

    /**
     * Create a sender. The socket is bound and connected on first `write()`.
     * @param config Controller address, local port and acknowledgement policy.
     */
    constructor(config: RuidaSenderConfiguration) {
        super();
        if (!config.host) {
            throw new RuidaError({message: 'Sender needs a controller address', domain: 'config', code: 'INVALID_OPTION'});
        }
        const mtu = config.mtu ?? RUIDA_DEFAULT_MTU;
        if (!Number.isInteger(mtu) || mtu < 1) {
            throw new RangeError(`MTU must be a positive integer, got ${mtu}`);
        }
        validatePort(config.port ?? RUIDA_DEVICE_PORT);
        const localPort = config.localPort ?? RUIDA_SOURCE_PORT;
        if (localPort !== 0) validatePort(localPort);

        this.config = config;
        this.socket = createSocket('udp4');
        this.transport = new DatagramTransport(this.socket);
    }

    /**
     * Send one job and wait until every chunk is acknowledged or the
     * controller stops answering.
     * @throws RuidaError `SENDER_BUSY` while another job is in flight,
     *   `CHECKSUM_REJECTED` when a chunk after the first is NACKed.
     */
    public async write(job: Uint8Array): Promise<TransferReport> {
        if (this.closed) {
            throw new RuidaError({message: 'Sender is closed', domain: 'transfer', code: 'SENDER_CLOSED'});
        }
        if (this.busy) {
            throw new RuidaError({message: 'A job is already in flight on this sender', domain: 'transfer', code: 'SENDER_BUSY'});
        }
        this.busy = true;
        try {
            await this.open();
            this.transport.reset();
            return await transferJob(this.transport, job, {
                mtu: this.config.mtu,
                responseTimeoutMs: this.config.responseTimeoutMs,
                retryDelayMs: this.config.retryDelayMs,
                retryMaxDelayMs: this.config.retryMaxDelayMs,
                maxFirstChunkRetries: this.config.maxFirstChunkRetries,
                chunkPauseMs: this.config.chunkPauseMs,
            }, {
                send: (chunk, attempt) => this.emit('chunk', chunk, attempt),
                ack: (chunk) => this.emit('ack', chunk),
                retry: (chunk, attempt, delayMs) => this.emit('retry', chunk, attempt, delayMs),
                silence: (chunk, outcome) => this.emit('silence', chunk, outcome),
                unknownResponse: (chunk, response) => this.emit('unknownResponse', chunk, response),
            });
        } finally {
            this.busy = false;
        }
    }

    /** Close the UDP socket. Pending replies are abandoned. */
    public close(): void {
        if (this.closed) return;
        this.closed = true;
        this.transport.dispose();
        this.socket.close();
    }

    private open(): Promise<void> {
        if (!this.opening) {
            this.opening = this.bindAndConnect().catch((err: unknown) => {
                this.opening = null;
                throw toRuidaError(err, 'transport', 'SOCKET_ERROR', {host: this.config.host});
            });
        }
        return this.opening;
    }

    private async bindAndConnect(): Promise<void> {
        const port = this.config.port ?? RUIDA_DEVICE_PORT;
        const localPort = this.config.localPort ?? RUIDA_SOURCE_PORT;
        await this.socketStep((done) => {
            this.socket.bind({port: localPort, address: this.config.bindAddress ?? '0.0.0.0'}, done);
        });
        await this.socketStep((done) => {
            this.socket.connect(port, this.config.host, done);
        });
        this.socket.on('error', (err) => this.emit('error', toRuidaError(err, 'transport', 'SOCKET_ERROR')));
    }

    /** Run a socket setup step, turning an `error` event into a rejection. */
    private socketStep(step: (done: () => void) => void): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const onError = (err: Error): void => reject(err);
            this.socket.once('error', onError);
            step(() => {
                this.socket.off('error', onError);
                resolve();
            });
        });
    }
}
