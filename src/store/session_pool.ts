import { TicketStore } from './ticket_store';

export interface StoreSession {
    readonly store: TicketStore;
    release(): void;
}

export interface StoreProvider {
    acquire(): Promise<StoreSession>;
}

/**
 * Hands out scoped store sessions over one shared connection and tracks
 * how many are open. A released session rejects further use.
 */
export class SessionPool implements StoreProvider {
    private active = 0;

    constructor(private readonly backing: TicketStore) {}

    get activeCount(): number {
        return this.active;
    }

    async acquire(): Promise<StoreSession> {
        this.active++;
        let released = false;
        const backing = this.backing;

        const guarded = new Proxy(backing, {
            get(target, prop, receiver) {
                const value: unknown = Reflect.get(target, prop, receiver);
                if (typeof value !== 'function') return value;
                return (...args: unknown[]) => {
                    if (released) throw new Error('Store session used after release');
                    return Reflect.apply(value, target, args);
                };
            }
        });

        return {
            store: guarded,
            release: () => {
                if (released) return;
                released = true;
                this.active--;
            }
        };
    }
}

/** Scoped acquisition: the session is released on every exit path. */
export async function withSession<T>(
    provider: StoreProvider,
    fn: (store: TicketStore) => Promise<T>
): Promise<T> {
    const session = await provider.acquire();
    try {
        return await fn(session.store);
    } finally {
        session.release();
    }
}
