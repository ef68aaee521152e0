import { config, PlatformCredentials } from '../config';
import { JsonObject, Platform, RequestType } from '../core/contracts';
import { TerminalDispatchError } from '../core/errors';
import { PLATFORM_ADAPTERS } from './platforms';

export interface PlatformRequest {
    url: string;
    token: string;
    body: JsonObject;
    signal: AbortSignal;
}

export interface PlatformResponse {
    status: number;
    retryAfter: string | null;
    bodyText: string;
}

export interface PlatformTransport {
    send(request: PlatformRequest): Promise<PlatformResponse>;
}

export type CredentialTable = Record<Platform, PlatformCredentials>;

export interface PlatformEndpoint {
    url: string;
    token: string;
}

export function resolveEndpoint(
    platform: Platform,
    requestType: RequestType,
    credentials: CredentialTable = config.platforms
): PlatformEndpoint {
    const entry = credentials[platform];
    if (!entry.token) {
        throw new TerminalDispatchError(`No access token configured for platform: ${platform}`);
    }
    return {
        url: `${entry.baseUrl}${PLATFORM_ADAPTERS[platform].endpointPath(requestType)}`,
        token: entry.token
    };
}

/**
 * HTTP transport over the global fetch. Never throws on HTTP status;
 * only on network failure or abort.
 */
export class FetchTransport implements PlatformTransport {
    async send(request: PlatformRequest): Promise<PlatformResponse> {
        const response = await fetch(request.url, {
            method: 'POST',
            headers: {
                'Authorization': `Bearer ${request.token}`,
                'Content-Type': 'application/json'
            },
            body: JSON.stringify(request.body),
            signal: request.signal
        });

        return {
            status: response.status,
            retryAfter: response.headers.get('retry-after'),
            bodyText: await response.text()
        };
    }
}
