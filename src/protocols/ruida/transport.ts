/**
 * Request/response channel used by the acknowledgement engine.
 * @module ruida/transport
 */
import type {Socket} from 'dgram';

/** Sends one datagram and waits for the single reply that answers it. */
export interface ChunkTransport {
    send(datagram: Buffer): Promise<void>;
    /** Resolves with the next reply, or `null` when none arrives within `timeoutMs`. */
    receive(timeoutMs: number): Promise<Buffer | null>;
}

type Waiter = {
    resolve: (reply: Buffer | null) => void;
    timeoutId: NodeJS.Timeout;
};

/**
 * {@link ChunkTransport} over a connected UDP socket.
 * Replies that arrive while nobody waits are queued in arrival order.
 */
export class DatagramTransport implements ChunkTransport {
    private readonly socket: Socket;
    private readonly queued: Buffer[] = [];
    private waiter: Waiter | null = null;
    private readonly onMessage = (msg: Buffer): void => {
        const reply = Buffer.from(msg);
        const waiter = this.waiter;
        if (waiter) {
            this.waiter = null;
            clearTimeout(waiter.timeoutId);
            waiter.resolve(reply);
            return;
        }
        this.queued.push(reply);
    };

    constructor(socket: Socket) {
        this.socket = socket;
        this.socket.on('message', this.onMessage);
    }

    public async send(datagram: Buffer): Promise<void> {
        await new Promise<void>((resolve, reject) => {
            this.socket.send(datagram, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    public receive(timeoutMs: number): Promise<Buffer | null> {
        const next = this.queued.shift();
        if (next) return Promise.resolve(next);
        if (this.waiter) {
            return Promise.reject(new Error('A receive is already pending on this transport'));
        }
        return new Promise<Buffer | null>((resolve) => {
            const timeoutId = setTimeout(() => {
                this.waiter = null;
                resolve(null);
            }, timeoutMs);
            this.waiter = {resolve, timeoutId};
        });
    }

    /** Discard replies nobody waited for, such as late answers to an earlier job. */
    public reset(): void {
        this.queued.length = 0;
    }

    /** Stop listening and release a pending `receive()` with `null`. */
    public dispose(): void {
        this.socket.off('message', this.onMessage);
        const waiter = this.waiter;
        this.waiter = null;
        if (waiter) {
            clearTimeout(waiter.timeoutId);
            waiter.resolve(null);
        }
        this.queued.length = 0;
    }
}
