import { PlatformRequest, PlatformResponse, PlatformTransport } from '../../src/adapters/platform_transport';
import { Sleep } from '../../src/services/dispatch/types';

type ScriptStep = PlatformResponse | Error | ((request: PlatformRequest) => Promise<PlatformResponse>);

export function respond(status: number, body: unknown = {}, retryAfter: string | null = null): PlatformResponse {
    return {
        status,
        retryAfter,
        bodyText: typeof body === 'string' ? body : JSON.stringify(body)
    };
}

/** Plays back one scripted step per request. */
export class ScriptedTransport implements PlatformTransport {
    readonly requests: PlatformRequest[] = [];
    private readonly steps: ScriptStep[];

    constructor(steps: ScriptStep[]) {
        this.steps = [...steps];
    }

    async send(request: PlatformRequest): Promise<PlatformResponse> {
        this.requests.push(request);
        const step = this.steps.shift();
        if (step === undefined) throw new Error(`Unexpected request to ${request.url}`);
        if (step instanceof Error) throw step;
        if (typeof step === 'function') return step(request);
        return step;
    }
}

/** Returns immediately and remembers every requested delay. */
export function recordingSleep(): { delays: number[]; sleep: Sleep } {
    const delays: number[] = [];
    const sleep: Sleep = async (ms, signal) => {
        delays.push(ms);
        if (signal.aborted) throw new Error('Retry wait aborted');
    };
    return { delays, sleep };
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>(r => {
        resolve = r;
    });
    return { promise, resolve };
}
