/**
 * Ruida UDP relay.
 * @module ruida/relay
 *
 * Listens where a controller would (world-facing socket), admits one job
 * stream at a time, forwards admitted datagrams unchanged to the real
 * controller from the laser-facing socket, and records each stream's job
 * bytes to a capture sink.
 */
import {createSocket, type Socket} from 'dgram';
import {EventEmitter} from 'events';
import {isIP} from 'net';

import {verify} from './checksum';
import {chunkPayload, encodeChunk} from './chunk';
import {
    RUIDA_DEFAULT_SESSION_TIMEOUT_MS,
    RUIDA_DEVICE_PORT,
    RUIDA_END_TOKEN,
    RUIDA_SOURCE_PORT,
    ResponseByte,
} from './constants';
import {RuidaError, toRuidaError} from './errors';
import {
    advanceSession,
    type BusySession,
    createSession,
    expireSession,
    holdSession,
    type StreamSession,
} from './session';
import {type CaptureSink, type CaptureSinkFactory, fileCaptureSinkFactory} from './sink';
import {type Datagram, type PeerAddress, formatPeer, samePeer, validatePort} from './util';

/**
 * Who answers the sender for an admitted datagram.
 * - `local`: the relay ACKs as soon as the datagram is forwarded and stored.
 * - `device`: the controller's own reply is passed back to the stream owner.
 */
export type RelayAckMode = 'local' | 'device';

export type RuidaRelayConfiguration = {
    /** Controller IP address or hostname. */
    laserHost: string;
    /** Controller UDP port. Defaults to 50200. */
    laserPort?: number;
    /** World-facing listen port. Defaults to 50200. */
    worldPort?: number;
    /** Laser-facing local port. Defaults to 40200. */
    devicePort?: number;
    /** Local address both sockets bind to. Defaults to `0.0.0.0`. */
    iface?: string;
    /** Allow other processes to bind the same ports. Defaults to `true`. */
    reuseAddr?: boolean;
    /** Inactivity before another sender may take over. Defaults to 10000 ms. */
    sessionTimeoutMs?: number;
    /** Check for expired streams on a timer as well. `0` (default) disables it. */
    reapIntervalMs?: number;
    /** Defaults to `local`. */
    ackMode?: RelayAckMode;
    /** NACK and drop datagrams whose checksum prefix does not match. */
    verifyChecksums?: boolean;
    /** Directory for capture files when no `sinkFactory` is given. */
    captureDir?: string;
    /** Custom capture destination. */
    sinkFactory?: CaptureSinkFactory;
};

/** Why a stream stopped. */
export type SessionEndReason = 'end-token' | 'superseded' | 'expired' | 'forward-failed' | 'sink-error' | 'shutdown';

/** Why a datagram was NACKed. */
export type RejectReason = 'not-owner' | 'checksum' | 'forward-failed' | 'sink-error';

export interface RuidaRelayEvents {
    /** Both sockets are bound. */
    listening: [];
    /** A new stream took ownership. */
    sessionStart: [session: BusySession, sink: string];
    /** A stream ended; its sink is closed. */
    sessionEnd: [session: BusySession, reason: SessionEndReason];
    /** A datagram reached the controller. */
    forward: [datagram: Datagram, session: BusySession];
    /** A datagram was NACKed and dropped. */
    reject: [datagram: Datagram, reason: RejectReason];
    /** A datagram arrived from the controller. */
    deviceReply: [reply: Buffer, from: PeerAddress];
    /**
     * Forwarding, reply and capture errors; the relay keeps running.
     * Errors raised by a socket itself carry `details.socket`.
     */
    error: [Error];
}

const SYNTHETIC_END_CHUNK = encodeChunk(Buffer.from([RUIDA_END_TOKEN]));

/** Relays Ruida job streams and arbitrates between concurrent senders. */
export class RuidaRelay extends EventEmitter<RuidaRelayEvents> {
    private readonly world: Socket;
    private readonly device: Socket;
    private readonly laserHost: string;
    private readonly laserPort: number;
    private readonly sessionTimeoutMs: number;
    private readonly ackMode: RelayAckMode;
    private readonly verifyChecksums: boolean;
    private readonly sinkFactory: CaptureSinkFactory;

    private session: StreamSession = createSession();
    private sink: CaptureSink | null = null;
    /**
     * Where each reply still owed by the controller goes, oldest first
     * (device ACK mode only). `null` entries are swallowed.
     */
    private readonly replyRoutes: Array<PeerAddress | null> = [];
    private work: Promise<void> = Promise.resolve();
    private reaper: NodeJS.Timeout | null = null;
    private pendingBinds = 2;
    private closed = false;

    /**
     * Create a relay and bind both sockets.
     * @param config Controller address, ports and session policy.
     */
    constructor({
                    laserHost,
                    laserPort = RUIDA_DEVICE_PORT,
                    worldPort = RUIDA_DEVICE_PORT,
                    devicePort = RUIDA_SOURCE_PORT,
                    iface = '0.0.0.0',
                    reuseAddr = true,
                    sessionTimeoutMs = RUIDA_DEFAULT_SESSION_TIMEOUT_MS,
                    reapIntervalMs = 0,
                    ackMode = 'local',
                    verifyChecksums = false,
                    captureDir,
                    sinkFactory,
                }: RuidaRelayConfiguration) {
        super();
        if (!laserHost) {
            throw new RuidaError({message: 'Relay needs a controller address', domain: 'config', code: 'INVALID_OPTION'});
        }
        if (!Number.isFinite(sessionTimeoutMs) || sessionTimeoutMs < 0) {
            throw new RangeError(`Session timeout must be >= 0 ms, got ${sessionTimeoutMs}`);
        }
        this.laserHost = laserHost;
        this.laserPort = validatePort(laserPort);
        this.sessionTimeoutMs = sessionTimeoutMs;
        this.ackMode = ackMode;
        this.verifyChecksums = verifyChecksums;
        this.sinkFactory = sinkFactory ?? fileCaptureSinkFactory(captureDir);

        this.world = createSocket({type: 'udp4', reuseAddr});
        this.device = createSocket({type: 'udp4', reuseAddr});

        this.world.on('message', (msg, rinfo) => {
            const datagram: Datagram = {
                data: Buffer.from(msg),
                from: {address: rinfo.address, port: rinfo.port},
                receivedAt: Date.now(),
            };
            this.enqueue(() => this.handleWorld(datagram));
        });
        this.device.on('message', (msg, rinfo) => {
            const reply = Buffer.from(msg);
            const from: PeerAddress = {address: rinfo.address, port: rinfo.port};
            this.enqueue(() => this.handleDevice(reply, from));
        });

        this.world.on('error', (err) => {
            this.emit('error', toRuidaError(err, 'transport', 'SOCKET_ERROR', {socket: 'world'}));
        });
        this.device.on('error', (err) => {
            this.emit('error', toRuidaError(err, 'transport', 'SOCKET_ERROR', {socket: 'device'}));
        });

        const onBound = (): void => {
            this.pendingBinds -= 1;
            if (this.pendingBinds === 0) this.emit('listening');
        };
        this.world.bind({port: validatePort(worldPort), address: iface}, onBound);
        this.device.bind({port: validatePort(devicePort), address: iface}, onBound);

        if (reapIntervalMs > 0) {
            this.reaper = setInterval(() => {
                this.enqueue(() => this.reap(Date.now()));
            }, reapIntervalMs);
        }
    }

    /** Current stream state (a snapshot). */
    public getSession(): StreamSession {
        return this.session;
    }

    /** Resolves once every datagram received so far has been handled. */
    public async drain(): Promise<void> {
        await this.work;
    }

    /**
     * Stop accepting datagrams, finish queued work, close the active
     * stream's sink and both sockets.
     */
    public async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        if (this.reaper) {
            clearInterval(this.reaper);
            this.reaper = null;
        }
        await this.work;
        const session = this.session;
        if (session.state === 'busy') {
            this.session = {state: 'idle', lastId: session.id};
            await this.endSession(session, 'shutdown');
        }
        await Promise.all([closeSocket(this.world), closeSocket(this.device)]);
    }

    private enqueue(task: () => Promise<void>): void {
        if (this.closed) return;
        this.work = this.work.then(task).catch((err: unknown) => {
            this.emit('error', toRuidaError(err, 'session', 'FORWARD_FAILED'));
        });
    }

    private async handleWorld(datagram: Datagram): Promise<void> {
        if (this.verifyChecksums && !verify(datagram.data)) {
            await this.reject(datagram, 'checksum');
            return;
        }

        const previous = this.session;
        const transition = advanceSession(previous, datagram, {timeoutMs: this.sessionTimeoutMs});
        if (transition.verdict === 'reject') {
            await this.reject(datagram, 'not-owner');
            return;
        }

        const {owner} = transition;
        if (transition.superseded) {
            this.session = {state: 'idle', lastId: transition.superseded.id};
            await this.endSession(transition.superseded, 'superseded');
            await this.sendSyntheticEnd(transition.superseded);
        }

        if (transition.started) {
            try {
                this.sink = await this.sinkFactory(owner);
            } catch (err) {
                this.session = {state: 'idle', lastId: owner.id};
                this.emit('error', toRuidaError(err, 'sink', 'SINK_OPEN_FAILED', {session: owner.id}));
                await this.reject(datagram, 'sink-error');
                return;
            }
            this.emit('sessionStart', owner, this.sink.name);
        }

        try {
            await sendDatagram(this.device, datagram.data, this.laserPort, this.laserHost);
        } catch (err) {
            this.session = holdSession(previous, transition);
            if (transition.started) await this.endSession(owner, 'forward-failed');
            this.emit('error', toRuidaError(err, 'transport', 'FORWARD_FAILED', {
                from: formatPeer(datagram.from),
                session: owner.id,
            }));
            await this.reject(datagram, 'forward-failed');
            return;
        }
        this.session = transition.session;
        if (this.ackMode === 'device') this.replyRoutes.push(datagram.from);
        this.emit('forward', datagram, owner);

        try {
            await this.sink?.write(chunkPayload(datagram.data));
        } catch (err) {
            if (this.session.state === 'busy') this.session = {state: 'idle', lastId: owner.id};
            await this.endSession(owner, 'sink-error');
            if (!transition.ended) await this.sendSyntheticEnd(owner);
            this.emit('error', toRuidaError(err, 'sink', 'SINK_WRITE_FAILED', {session: owner.id}));
            await this.reject(datagram, 'sink-error');
            return;
        }

        if (this.ackMode === 'local') {
            await this.respond(datagram.from, ResponseByte.Ack);
        }
        if (transition.ended) {
            await this.endSession(owner, 'end-token');
        }
    }

    private async handleDevice(reply: Buffer, from: PeerAddress): Promise<void> {
        if (isIP(this.laserHost) !== 0 && from.address !== this.laserHost) return;
        this.emit('deviceReply', reply, from);
        if (this.ackMode !== 'device') return;
        const target = this.replyRoutes.shift();
        if (!target) return;
        try {
            await sendDatagram(this.world, reply, target.port, target.address);
        } catch (err) {
            this.emit('error', toRuidaError(err, 'transport', 'SOCKET_ERROR', {to: formatPeer(target)}));
        }
    }

    private async reap(now: number): Promise<void> {
        const expiry = expireSession(this.session, now, this.sessionTimeoutMs);
        if (!expiry) return;
        this.session = expiry.session;
        await this.endSession(expiry.expired, 'expired');
        await this.sendSyntheticEnd(expiry.expired);
    }

    private async reject(datagram: Datagram, reason: RejectReason): Promise<void> {
        this.emit('reject', datagram, reason);
        await this.respond(datagram.from, ResponseByte.Nack);
    }

    private async respond(to: PeerAddress, response: ResponseByte): Promise<void> {
        try {
            await sendDatagram(this.world, Buffer.from([response]), to.port, to.address);
        } catch (err) {
            this.emit('error', toRuidaError(err, 'transport', 'SOCKET_ERROR', {to: formatPeer(to)}));
        }
    }

    /** Lets the controller see a clean end for a stream its sender abandoned. */
    private async sendSyntheticEnd(session: BusySession): Promise<void> {
        try {
            await sendDatagram(this.device, SYNTHETIC_END_CHUNK, this.laserPort, this.laserHost);
            if (this.ackMode === 'device') this.replyRoutes.push(null);
        } catch (err) {
            this.emit('error', toRuidaError(err, 'transport', 'FORWARD_FAILED', {session: session.id}));
        }
    }

    /**
     * A stream that went quiet for longer than the timeout has nothing left
     * to answer. Otherwise the ended owner's replies stay in line but are
     * swallowed, except after an end token, where the owner still waits for them.
     */
    private dropReplyRoutes(session: BusySession, reason: SessionEndReason): void {
        if (reason === 'end-token') return;
        if (reason === 'superseded' || reason === 'expired') {
            this.replyRoutes.length = 0;
            return;
        }
        this.replyRoutes.forEach((route, i) => {
            if (route && samePeer(route, session.owner)) this.replyRoutes[i] = null;
        });
    }

    private async endSession(session: BusySession, reason: SessionEndReason): Promise<void> {
        this.dropReplyRoutes(session, reason);
        const sink = this.sink;
        this.sink = null;
        try {
            await sink?.close();
        } catch (err) {
            this.emit('error', toRuidaError(err, 'sink', 'SINK_WRITE_FAILED', {session: session.id}));
        }
        this.emit('sessionEnd', session, reason);
    }
}

const sendDatagram = (socket: Socket, data: Buffer, port: number, address: string): Promise<void> => {
    return new Promise<void>((resolve, reject) => {
        socket.send(data, port, address, (err) => {
            if (err) reject(err);
            else resolve();
        });
    });
};

const closeSocket = (socket: Socket): Promise<void> => {
    return new Promise<void>((resolve) => {
        socket.close(() => resolve());
    });
};
