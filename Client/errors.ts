export type PeerErrorCode =
    | 'UNKNOWN_PEER'
    | 'TRACKER_UNREACHABLE'
    | 'TRACKER_REJECTED'
    | 'INVALID_RESPONSE'
    | 'DELIVERY_ERROR';

export class PeerError extends Error {
    readonly code: PeerErrorCode;
    readonly context?: Record<string, unknown>;

    constructor(code: PeerErrorCode, message: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'PeerError';
        this.code = code;
        this.context = context;
    }
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
