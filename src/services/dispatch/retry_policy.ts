import { PlatformResponse } from '../../adapters/platform_transport';
import { PlatformAdapter } from '../../adapters/platforms';
import { RequestType } from '../../core/contracts';
import { TerminalDispatchError, TransientDispatchError } from '../../core/errors';
import { AttemptOutcome } from './types';

export const DEFAULT_RETRY_AFTER_SECONDS = 60;
const BODY_EXCERPT_CHARS = 200;

/** 2^retryIndex seconds; retryIndex 0 is the first retry. */
export function backoffDelayMs(retryIndex: number): number {
    return 2 ** retryIndex * 1000;
}

/** Retry-After in whole seconds; anything else is ignored. */
export function parseRetryAfter(header: string | null): number | null {
    if (header === null) return null;
    const trimmed = header.trim();
    return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}

export function classifyResponse(
    adapter: PlatformAdapter,
    requestType: RequestType,
    response: PlatformResponse,
    retryIndex: number
): AttemptOutcome {
    const { status } = response;

    if (status === 429) {
        const seconds = parseRetryAfter(response.retryAfter) ?? DEFAULT_RETRY_AFTER_SECONDS;
        return { kind: 'transient', reason: 'Rate limited (429)', delayMs: seconds * 1000, statusCode: status };
    }

    if (status >= 500 && status <= 599) {
        return {
            kind: 'transient',
            reason: `Server error ${status}`,
            delayMs: backoffDelayMs(retryIndex),
            statusCode: status
        };
    }

    if (status >= 200 && status <= 299) {
        try {
            const body: unknown = JSON.parse(response.bodyText);
            return { kind: 'success', externalId: adapter.extractExternalId(requestType, body), statusCode: status };
        } catch (err) {
            const reason = err instanceof TerminalDispatchError
                ? err.message
                : `Unparseable ${adapter.platform} response body`;
            return { kind: 'terminal', reason, statusCode: status };
        }
    }

    return {
        kind: 'terminal',
        reason: `API Error ${status}: ${response.bodyText.slice(0, BODY_EXCERPT_CHARS)}`,
        statusCode: status
    };
}

/** Failures raised before or instead of a response. */
export function classifyError(err: unknown, retryIndex: number): AttemptOutcome {
    if (err instanceof TerminalDispatchError) {
        return { kind: 'terminal', reason: err.message, statusCode: null };
    }
    const reason = err instanceof TransientDispatchError
        ? err.message
        : `Network error: ${err instanceof Error ? err.message : String(err)}`;
    return { kind: 'transient', reason, delayMs: backoffDelayMs(retryIndex), statusCode: null };
}
