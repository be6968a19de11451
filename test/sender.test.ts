import {EventEmitter} from 'events';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

import {RuidaError, RuidaSender} from '../src';

type Responder = (datagram: Buffer, index: number) => number[] | null;

class MockSocket extends EventEmitter {
    public bindConfig: unknown = null;
    public bindError: Error | null = null;
    public connected: [number, string] | null = null;
    public sent: Buffer[] = [];
    public responder: Responder = () => null;
    public closed = false;

    public bind(config: unknown, callback: () => void): void {
        this.bindConfig = config;
        const err = this.bindError;
        queueMicrotask(() => {
            if (err) this.emit('error', err);
            else callback();
        });
    }

    public connect(port: number, address: string, callback: () => void): void {
        this.connected = [port, address];
        queueMicrotask(callback);
    }

    public send(data: Buffer, callback: (err: Error | null) => void): void {
        const datagram = Buffer.from(data);
        this.sent.push(datagram);
        callback(null);
        const reply = this.responder(datagram, this.sent.length - 1);
        if (reply) {
            queueMicrotask(() => {
                const msg = Buffer.from(reply);
                this.emit('message', msg, {address: '192.168.1.50', port: 50200, family: 'IPv4', size: msg.length});
            });
        }
    }

    public close(): void {
        this.closed = true;
    }
}

const sockets: MockSocket[] = [];

vi.mock('dgram', () => ({
    createSocket: vi.fn(() => {
        const socket = new MockSocket();
        sockets.push(socket);
        return socket;
    }),
}));

const ACK = [0xc6];
const NACK = [0x46];
const HOST = '192.168.1.50';

const scripted = (replies: Array<number[] | null>): Responder => (_datagram, index) => replies[index] ?? null;

beforeEach(() => {
    sockets.length = 0;
    vi.useFakeTimers();
});

afterEach(() => {
    vi.useRealTimers();
    for (const socket of sockets) {
        socket.removeAllListeners();
    }
});

describe('RuidaSender', () => {
    it('binds the source port, connects and delivers every chunk', async () => {
        const sender = new RuidaSender({host: HOST});
        const socket = sockets[0];
        socket.responder = () => ACK;
        const acked: number[] = [];
        sender.on('ack', (chunk) => acked.push(chunk.index));

        const report = await sender.write(Buffer.alloc(3000, 0x22));

        expect(socket.bindConfig).toEqual({port: 40200, address: '0.0.0.0'});
        expect(socket.connected).toEqual([50200, HOST]);
        expect(socket.sent.map((d) => d.length)).toEqual([1472, 1472, 62]);
        expect(acked).toEqual([0, 1, 2]);
        expect(report).toEqual({outcome: 'complete', chunks: 3, acked: 3, retries: 0, bytes: 3000});
        sender.close();
        expect(socket.closed).toBe(true);
    });

    it('applies address and MTU options', async () => {
        const sender = new RuidaSender({host: HOST, port: 50207, localPort: 0, bindAddress: '127.0.0.1', mtu: 100});
        const socket = sockets[0];
        socket.responder = () => ACK;

        const report = await sender.write(Buffer.alloc(250, 1));

        expect(socket.bindConfig).toEqual({port: 0, address: '127.0.0.1'});
        expect(socket.connected).toEqual([50207, HOST]);
        expect(socket.sent.map((d) => d.length)).toEqual([102, 102, 52]);
        expect(report.chunks).toBe(3);
        sender.close();
    });

    it('backs off while the controller rejects the first chunk', async () => {
        const sender = new RuidaSender({host: HOST});
        const socket = sockets[0];
        socket.responder = scripted([NACK, NACK, ACK]);
        const retries: Array<[number, number]> = [];
        sender.on('retry', (_chunk, attempt, delayMs) => retries.push([attempt, delayMs]));

        const pending = sender.write(Buffer.from([1, 2, 3]));
        await vi.advanceTimersByTimeAsync(600);

        await expect(pending).resolves.toEqual({outcome: 'complete', chunks: 1, acked: 1, retries: 2, bytes: 3});
        expect(retries).toEqual([[1, 200], [2, 400]]);
        expect(socket.sent).toHaveLength(3);
        sender.close();
    });

    it('fails the job when a later chunk is rejected', async () => {
        const sender = new RuidaSender({host: HOST, mtu: 10});
        const socket = sockets[0];
        socket.responder = scripted([ACK, NACK]);

        await expect(sender.write(Buffer.alloc(25, 3))).rejects.toMatchObject({code: 'CHECKSUM_REJECTED'});
        expect(socket.sent).toHaveLength(2);
        sender.close();
    });

    it('stops after the response timeout', async () => {
        const sender = new RuidaSender({host: HOST, responseTimeoutMs: 1000});
        const socket = sockets[0];
        const silence = vi.fn();
        sender.on('silence', (chunk, outcome) => silence(chunk.index, outcome));

        const pending = sender.write(Buffer.alloc(3000, 4));
        await vi.advanceTimersByTimeAsync(1000);

        await expect(pending).resolves.toEqual({outcome: 'timeout', chunks: 3, acked: 0, retries: 0, bytes: 0});
        expect(silence).toHaveBeenCalledWith(0, 'timeout');
        expect(socket.sent).toHaveLength(1);
        sender.close();
    });

    it('reports unknown reply bytes', async () => {
        const sender = new RuidaSender({host: HOST});
        const socket = sockets[0];
        socket.responder = () => [0x00];
        const unknown = vi.fn();
        sender.on('unknownResponse', (chunk, response) => unknown(chunk.index, response));

        const report = await sender.write(Buffer.from([5]));

        expect(report.outcome).toBe('unknown-response');
        expect(unknown).toHaveBeenCalledWith(0, 0x00);
        sender.close();
    });

    it('refuses a second job while one is in flight', async () => {
        const sender = new RuidaSender({host: HOST});

        const first = sender.write(Buffer.from([1]));
        await expect(sender.write(Buffer.from([2]))).rejects.toMatchObject({code: 'SENDER_BUSY'});
        await vi.advanceTimersByTimeAsync(3000);

        await expect(first).resolves.toMatchObject({outcome: 'timeout'});
        sender.close();
    });

    it('does not take a late reply to an earlier job as an answer', async () => {
        const sender = new RuidaSender({host: HOST, responseTimeoutMs: 1000, maxFirstChunkRetries: 0});
        const socket = sockets[0];

        const first = sender.write(Buffer.from([1]));
        await vi.advanceTimersByTimeAsync(1000);
        await expect(first).resolves.toMatchObject({outcome: 'timeout'});

        socket.emit('message', Buffer.from(ACK), {address: HOST, port: 50200, family: 'IPv4', size: 1});
        socket.responder = () => NACK;

        await expect(sender.write(Buffer.from([2]))).rejects.toMatchObject({code: 'FIRST_CHUNK_REJECTED'});
        expect(socket.sent).toHaveLength(2);
        sender.close();
    });

    it('refuses jobs after close', async () => {
        const sender = new RuidaSender({host: HOST});
        sender.close();

        await expect(sender.write(Buffer.from([1]))).rejects.toMatchObject({code: 'SENDER_CLOSED'});
    });

    it('reports bind failures as socket errors', async () => {
        const sender = new RuidaSender({host: HOST});
        sockets[0].bindError = new Error('EADDRINUSE');

        const result = sender.write(Buffer.from([1]));

        await expect(result).rejects.toBeInstanceOf(RuidaError);
        await expect(result).rejects.toMatchObject({code: 'SOCKET_ERROR', message: 'EADDRINUSE'});
        sender.close();
    });

    it('validates its configuration', () => {
        expect(() => new RuidaSender({host: ''})).toThrow('Sender needs a controller address');
        expect(() => new RuidaSender({host: HOST, mtu: 0})).toThrow(RangeError);
        expect(() => new RuidaSender({host: HOST, port: 70000})).toThrow(RangeError);
        expect(() => new RuidaSender({host: HOST, localPort: -1})).toThrow(RangeError);
    });
});
