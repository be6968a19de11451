import {describe, expect, it} from 'vitest';

import {
    advanceSession,
    type BusySession,
    createSession,
    type Datagram,
    encodeChunk,
    expireSession,
    holdSession,
    RUIDA_END_TOKEN,
    type SessionTransition,
    type StreamSession,
} from '../src';

const A = {address: '10.0.0.1', port: 40200};
const B = {address: '10.0.0.2', port: 40200};

const datagram = (from: {address: string; port: number}, payload: number[], receivedAt: number): Datagram => ({
    data: encodeChunk(Buffer.from(payload)),
    from,
    receivedAt,
});

/** Narrow a transition to its accepted form, failing the test otherwise. */
const accepted = (transition: SessionTransition): Extract<SessionTransition, {verdict: 'accept'}> => {
    if (transition.verdict !== 'accept') throw new Error('expected the datagram to be accepted');
    return transition;
};

const busy = (session: StreamSession): BusySession => {
    if (session.state !== 'busy') throw new Error('expected a busy session');
    return session;
};

describe('advanceSession', () => {
    it('opens a stream for the first datagram while idle', () => {
        const transition = accepted(advanceSession(createSession(), datagram(A, [1, 2, 3], 1000)));

        expect(transition.started).toBe(true);
        expect(transition.ended).toBe(false);
        expect(transition.superseded).toBeUndefined();
        expect(transition.session).toEqual({
            state: 'busy',
            id: 1,
            owner: A,
            startedAt: 1000,
            lastActivity: 1000,
            datagrams: 1,
            bytes: 3,
        });
        expect(transition.owner).toBe(transition.session);
    });

    it('counts the owner\'s further datagrams', () => {
        let session: StreamSession = accepted(advanceSession(createSession(), datagram(A, [1, 2, 3], 1000))).session;
        const transition = accepted(advanceSession(session, datagram(A, [4, 5], 1500)));
        session = transition.session;

        expect(transition.started).toBe(false);
        expect(busy(session)).toMatchObject({id: 1, startedAt: 1000, lastActivity: 1500, datagrams: 2, bytes: 5});
    });

    it('rejects other senders while the stream is active', () => {
        const session = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;
        const transition = advanceSession(session, datagram(B, [2], 5000));

        expect(transition.verdict).toBe('reject');
        expect(transition.session).toBe(session);
    });

    it('treats another port on the same host as a different sender', () => {
        const session = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;

        expect(advanceSession(session, datagram({address: A.address, port: 40201}, [2], 10)).verdict).toBe('reject');
    });

    it('admits only the owner across interleaved traffic', () => {
        let session: StreamSession = createSession();
        const verdicts: string[] = [];
        const senders = [A, B, A, B, B, A, B];
        senders.forEach((from, i) => {
            const transition = advanceSession(session, datagram(from, [i + 1], i * 100));
            verdicts.push(transition.verdict);
            session = transition.session;
        });

        expect(verdicts).toEqual(['accept', 'reject', 'accept', 'reject', 'reject', 'accept', 'reject']);
        expect(busy(session)).toMatchObject({owner: A, datagrams: 3, bytes: 3});
    });

    it('ends the stream when a payload carries the end token', () => {
        let session: StreamSession = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;
        const transition = accepted(advanceSession(session, datagram(A, [0x10, RUIDA_END_TOKEN, 0x20], 100)));
        session = transition.session;

        expect(transition.ended).toBe(true);
        expect(transition.owner).toMatchObject({id: 1, datagrams: 2, bytes: 4});
        expect(session).toEqual({state: 'idle', lastId: 1});
    });

    it('opens and ends a stream with a single datagram', () => {
        const transition = accepted(advanceSession(createSession(), datagram(A, [RUIDA_END_TOKEN], 0)));

        expect(transition.started).toBe(true);
        expect(transition.ended).toBe(true);
        expect(transition.session).toEqual({state: 'idle', lastId: 1});
    });

    it('ignores the end token value inside the checksum prefix', () => {
        // 0xd6 + 0x01 sums to 0x00d7
        const transition = accepted(advanceSession(createSession(), datagram(A, [0xd6, 0x01], 0)));

        expect(Array.from(encodeChunk(Buffer.from([0xd6, 0x01])).subarray(0, 2))).toEqual([0x00, RUIDA_END_TOKEN]);
        expect(transition.ended).toBe(false);
        expect(transition.session.state).toBe('busy');
    });

    it('lets a new sender in after the stream ended', () => {
        const ended = accepted(advanceSession(createSession(), datagram(A, [RUIDA_END_TOKEN], 0))).session;
        const transition = accepted(advanceSession(ended, datagram(B, [1], 10)));

        expect(transition.started).toBe(true);
        expect(busy(transition.session)).toMatchObject({id: 2, owner: B});
    });

    it('keeps the stream exactly at the timeout', () => {
        const session = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;

        expect(advanceSession(session, datagram(B, [2], 10000)).verdict).toBe('reject');
    });

    it('supersedes a stream that has been quiet for longer than the timeout', () => {
        const session = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;
        const transition = accepted(advanceSession(session, datagram(B, [2], 10001)));

        expect(transition.superseded).toBe(session);
        expect(transition.started).toBe(true);
        expect(busy(transition.session)).toMatchObject({id: 2, owner: B, startedAt: 10001, datagrams: 1});
    });

    it('restarts the owner\'s own stale stream', () => {
        const session = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;
        const transition = accepted(advanceSession(session, datagram(A, [2], 20000)));

        expect(transition.superseded).toBe(session);
        expect(busy(transition.session)).toMatchObject({id: 2, owner: A, datagrams: 1});
    });

    it('measures the timeout from the latest owner datagram', () => {
        let session: StreamSession = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;
        session = accepted(advanceSession(session, datagram(A, [2], 8000))).session;

        expect(advanceSession(session, datagram(B, [3], 15000)).verdict).toBe('reject');
        expect(advanceSession(session, datagram(B, [3], 18001)).verdict).toBe('accept');
    });

    it('accepts a custom timeout', () => {
        const session = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;

        expect(advanceSession(session, datagram(B, [2], 501), {timeoutMs: 500}).verdict).toBe('accept');
        expect(advanceSession(session, datagram(B, [2], 500), {timeoutMs: 500}).verdict).toBe('reject');
    });
});

describe('holdSession', () => {
    it('drops a stream the datagram would have opened', () => {
        const previous = createSession();
        const transition = advanceSession(previous, datagram(A, [1], 0));

        expect(holdSession(previous, transition)).toEqual({state: 'idle', lastId: 1});
    });

    it('keeps an existing stream open without counting the datagram', () => {
        const previous = busy(accepted(advanceSession(createSession(), datagram(A, [1], 0))).session);
        const transition = advanceSession(previous, datagram(A, [2, 3], 700));

        expect(holdSession(previous, transition)).toEqual({...previous, lastActivity: 700});
    });

    it('returns the unchanged state for a rejected datagram', () => {
        const previous = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;
        const transition = advanceSession(previous, datagram(B, [2], 10));

        expect(holdSession(previous, transition)).toBe(previous);
    });
});

describe('expireSession', () => {
    it('leaves idle and fresh sessions alone', () => {
        const session = accepted(advanceSession(createSession(), datagram(A, [1], 0))).session;

        expect(expireSession(createSession(), 50000)).toBeNull();
        expect(expireSession(session, 10000)).toBeNull();
    });

    it('expires a quiet stream', () => {
        const session = busy(accepted(advanceSession(createSession(), datagram(A, [1], 0))).session);

        expect(expireSession(session, 10001)).toEqual({session: {state: 'idle', lastId: 1}, expired: session});
        expect(expireSession(session, 2001, 2000)).toEqual({session: {state: 'idle', lastId: 1}, expired: session});
    });
});
