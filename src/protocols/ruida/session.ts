/**
 * Stream session: who currently owns the laser.
 * @module ruida/session
 *
 * A stream is one job submission. The first datagram seen while idle makes
 * its sender the owner; the stream ends when a chunk payload carries the end
 * token, or when it has been quiet for longer than the timeout and another
 * datagram arrives. Expiry is checked lazily, on arrival.
 *
 * Transitions are pure: callers keep the returned session value.
 */
import {chunkPayload, containsEndToken} from './chunk';
import {RUIDA_DEFAULT_SESSION_TIMEOUT_MS} from './constants';
import {type Datagram, type PeerAddress, samePeer} from './util';

export type IdleSession = {
    state: 'idle';
    /** Id of the most recent session, 0 before the first one. */
    lastId: number;
};

export type BusySession = {
    state: 'busy';
    id: number;
    owner: PeerAddress;
    /** Epoch ms of the datagram that opened the stream. */
    startedAt: number;
    /** Epoch ms of the owner's latest datagram. */
    lastActivity: number;
    /** Datagrams admitted so far. */
    datagrams: number;
    /** Payload bytes admitted so far (checksum prefixes excluded). */
    bytes: number;
};

export type StreamSession = IdleSession | BusySession;

export type SessionOptions = {
    /** Inactivity after which the stream may be taken over. Default 10000 ms. */
    timeoutMs?: number;
};

/** Admission result for one datagram. */
export type SessionTransition =
    | {
        verdict: 'reject';
        session: StreamSession;
    }
    | {
        verdict: 'accept';
        /** State to keep after this datagram. */
        session: StreamSession;
        /** The stream this datagram belongs to, counters included. */
        owner: BusySession;
        /** The datagram opened `owner`. */
        started: boolean;
        /** The datagram carried the end token; `session` is idle. */
        ended: boolean;
        /** Stale stream forcibly ended to admit this datagram. */
        superseded?: BusySession;
    };

/** Initial state. */
export const createSession = (): IdleSession => ({state: 'idle', lastId: 0});

const idleAfter = (session: BusySession): IdleSession => ({state: 'idle', lastId: session.id});

/** `true` when `session` has been quiet for longer than `timeoutMs` at `now`. */
export const isExpired = (session: BusySession, now: number, timeoutMs: number): boolean => {
    return now - session.lastActivity > timeoutMs;
};

/**
 * Decide whether `datagram` may pass, and compute the next session state.
 * @param session Current state.
 * @param datagram Incoming datagram; `receivedAt` is the clock.
 */
export const advanceSession = (
    session: StreamSession,
    datagram: Datagram,
    options: SessionOptions = {},
): SessionTransition => {
    const timeoutMs = options.timeoutMs ?? RUIDA_DEFAULT_SESSION_TIMEOUT_MS;
    const now = datagram.receivedAt;
    const payload = chunkPayload(datagram.data);
    const ended = containsEndToken(payload);

    let superseded: BusySession | undefined;
    if (session.state === 'busy') {
        if (!isExpired(session, now, timeoutMs)) {
            if (!samePeer(session.owner, datagram.from)) {
                return {verdict: 'reject', session};
            }
            const owner: BusySession = {
                ...session,
                lastActivity: now,
                datagrams: session.datagrams + 1,
                bytes: session.bytes + payload.length,
            };
            return {
                verdict: 'accept',
                session: ended ? idleAfter(owner) : owner,
                owner,
                started: false,
                ended,
            };
        }
        superseded = session;
    }

    const previousId = session.state === 'busy' ? session.id : session.lastId;
    const owner: BusySession = {
        state: 'busy',
        id: previousId + 1,
        owner: {...datagram.from},
        startedAt: now,
        lastActivity: now,
        datagrams: 1,
        bytes: payload.length,
    };
    return {
        verdict: 'accept',
        session: ended ? idleAfter(owner) : owner,
        owner,
        started: true,
        ended,
        superseded,
    };
};

/**
 * State to keep when an accepted datagram could not be delivered downstream.
 * A stream it would have opened is dropped; an existing stream stays open
 * without counting the datagram, and its activity clock is refreshed.
 */
export const holdSession = (previous: StreamSession, transition: SessionTransition): StreamSession => {
    if (transition.verdict === 'reject') return transition.session;
    if (transition.started || previous.state === 'idle') return idleAfter(transition.owner);
    return {...previous, lastActivity: transition.owner.lastActivity};
};

/**
 * Active expiry check for an optional reaper.
 * @returns The idle state and the expired stream, or `null` when nothing expired.
 */
export const expireSession = (
    session: StreamSession,
    now: number,
    timeoutMs = RUIDA_DEFAULT_SESSION_TIMEOUT_MS,
): {session: IdleSession; expired: BusySession} | null => {
    if (session.state !== 'busy' || !isExpired(session, now, timeoutMs)) return null;
    return {session: idleAfter(session), expired: session};
};
