export type DispatchState = 'pending' | 'succeeded' | 'failed';

export interface DispatchHandle {
    handleId: string;
    ticketId: string;
}

export interface DispatchStatus extends DispatchHandle {
    state: DispatchState;
    detail: string;
    attempts: number;
    externalId: string | null;
}

export interface DispatchSettings {
    maxAttempts: number;
    softTimeoutMs: number;
    hardTimeoutMs: number;
    // How long a settled handle stays queryable
    handleRetentionMs: number;
}

/** Resolves after `ms`, rejects early once `signal` aborts. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type AttemptOutcome =
    | { kind: 'success'; externalId: string; statusCode: number }
    | { kind: 'transient'; reason: string; delayMs: number; statusCode: number | null }
    | { kind: 'terminal'; reason: string; statusCode: number | null };
