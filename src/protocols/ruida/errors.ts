/**
 * Structured Ruida error taxonomy.
 * @module ruida/errors
 */
export type RuidaErrorDomain = 'transfer' | 'session' | 'sink' | 'transport' | 'config';

export type RuidaErrorCode =
    | 'CHECKSUM_REJECTED'
    | 'FIRST_CHUNK_REJECTED'
    | 'SENDER_BUSY'
    | 'SENDER_CLOSED'
    | 'SOCKET_ERROR'
    | 'FORWARD_FAILED'
    | 'SINK_OPEN_FAILED'
    | 'SINK_WRITE_FAILED'
    | 'INVALID_OPTION';

export class RuidaError extends Error {
    public readonly domain: RuidaErrorDomain;
    public readonly code: RuidaErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        domain: RuidaErrorDomain;
        code: RuidaErrorCode;
        details?: Record<string, unknown>;
        cause?: unknown;
    }) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'RuidaError';
        this.domain = params.domain;
        this.code = params.code;
        this.details = params.details;
    }
}

/** Wrap any thrown value as a `RuidaError`, keeping existing ones intact. */
export const toRuidaError = (
    err: unknown,
    domain: RuidaErrorDomain,
    code: RuidaErrorCode,
    details?: Record<string, unknown>,
): RuidaError => {
    if (err instanceof RuidaError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new RuidaError({message, domain, code, details, cause: err});
};
