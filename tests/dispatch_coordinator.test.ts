import { PlatformTransport } from '../src/adapters/platform_transport';
import { Ticket, TicketStatus, TransitionFields } from '../src/core/contracts';
import { InvalidStateError, NotFoundError } from '../src/core/errors';
import { DatabaseHandle } from '../src/db';
import { DispatchCoordinator } from '../src/services/dispatch/dispatch_coordinator';
import { DispatchSettings, Sleep } from '../src/services/dispatch/types';
import { DrizzleTicketStore } from '../src/store/drizzle_ticket_store';
import { SessionPool } from '../src/store/session_pool';
import { deferred, recordingSleep, respond, ScriptedTransport } from './helpers/fake_transport';
import {
    approvedTicket, createTestStore, draftTicket, seedCatalog, TEST_CREDENTIALS, TestCatalog
} from './helpers/test_db';

const SETTINGS: DispatchSettings = { maxAttempts: 5, softTimeoutMs: 1000, hardTimeoutMs: 2000, handleRetentionMs: 60000 };

class UnloggedStore extends DrizzleTicketStore {
    async recordAttempt(): Promise<void> {
        throw new Error('attempt log unavailable');
    }
}

// Lets another writer store an external id just before the first success write
class RacedStore extends DrizzleTicketStore {
    private raced = false;

    async compareAndSetStatus(
        id: string,
        expected: TicketStatus,
        next: TicketStatus,
        fields: TransitionFields = {}
    ): Promise<Ticket> {
        if (!this.raced && next === 'DispatchSucceeded') {
            this.raced = true;
            await super.compareAndSetStatus(id, expected, next, { externalId: 'abc123' });
        }
        return super.compareAndSetStatus(id, expected, next, fields);
    }
}

describe('DispatchCoordinator', () => {
    let handle: DatabaseHandle;
    let store: DrizzleTicketStore;
    let sessions: SessionPool;
    let catalog: TestCatalog;

    beforeEach(async () => {
        ({ handle, store } = createTestStore());
        sessions = new SessionPool(store);
        catalog = await seedCatalog(store);
    });

    afterEach(() => handle.close());

    function coordinator(
        transport: PlatformTransport,
        sleep: Sleep,
        settings: Partial<DispatchSettings> = {}
    ): DispatchCoordinator {
        return new DispatchCoordinator({
            sessions,
            transport,
            sleep,
            settings: { ...SETTINGS, ...settings },
            credentials: TEST_CREDENTIALS
        });
    }

    it('retries 5xx with exponential backoff and succeeds on the fourth attempt', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([
            respond(503, 'unavailable'),
            respond(503, 'unavailable'),
            respond(503, 'unavailable'),
            respond(200, { id: 'abc123' })
        ]);
        const { delays, sleep } = recordingSleep();
        const dispatch = coordinator(transport, sleep);

        const { handleId } = await dispatch.submitDispatch(ticket.id);
        const status = await dispatch.waitForCompletion(handleId);

        expect(status).toEqual({
            handleId,
            ticketId: ticket.id,
            state: 'succeeded',
            detail: 'Delivered as abc123',
            attempts: 4,
            externalId: 'abc123'
        });
        expect(delays).toEqual([1000, 2000, 4000]);
        expect(transport.requests).toHaveLength(4);

        const stored = await store.getTicket(ticket.id);
        expect(stored?.status).toBe('DispatchSucceeded');
        expect(stored?.externalId).toBe('abc123');
        expect(stored?.failureReason).toBeNull();

        const attempts = await store.listAttempts(ticket.id);
        expect(attempts.map(a => a.outcome)).toEqual(['transient', 'transient', 'transient', 'success']);
        expect(attempts.map(a => a.statusCode)).toEqual([503, 503, 503, 200]);
    });

    it('sends the encoded payload to the platform endpoint with the configured token', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([respond(200, { id: 'abc123' })]);
        const dispatch = coordinator(transport, recordingSleep().sleep);

        await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(transport.requests).toHaveLength(1);
        const [request] = transport.requests;
        expect(request.url).toBe('https://meta.test/act_1/campaigns');
        expect(request.token).toBe('test-token');
        expect(request.body).toEqual({
            name: 'ACME_US_META_2026_SpringLaunch',
            objective: 'OUTCOME_AWARENESS',
            status: 'PAUSED',
            special_ad_categories: []
        });
    });

    it('fails immediately on a non-429 4xx', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([respond(403, 'Forbidden: token lacks ads_management')]);
        const { delays, sleep } = recordingSleep();
        const dispatch = coordinator(transport, sleep);

        const status = await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(status.state).toBe('failed');
        expect(status.attempts).toBe(1);
        expect(delays).toEqual([]);
        expect(transport.requests).toHaveLength(1);

        const stored = await store.getTicket(ticket.id);
        expect(stored?.status).toBe('DispatchFailed');
        expect(stored?.failureReason).toBe('API Error 403: Forbidden: token lacks ads_management');
        expect(stored?.externalId).toBeNull();
    });

    it('waits 60 seconds on a 429 without Retry-After', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([respond(429, 'slow down'), respond(200, { id: 'abc123' })]);
        const { delays, sleep } = recordingSleep();
        const dispatch = coordinator(transport, sleep);

        const status = await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(status.state).toBe('succeeded');
        expect(delays).toEqual([60000]);
    });

    it('honours a numeric Retry-After on a 429', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([
            respond(429, 'slow down', '120'),
            respond(200, { id: 'abc123' })
        ]);
        const { delays, sleep } = recordingSleep();
        const dispatch = coordinator(transport, sleep);

        await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(delays).toEqual([120000]);
    });

    it('gives up after the retry budget with the last transient reason', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([
            respond(503), respond(503), respond(503), respond(503), respond(503)
        ]);
        const { delays, sleep } = recordingSleep();
        const dispatch = coordinator(transport, sleep);

        const status = await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(status.state).toBe('failed');
        expect(status.attempts).toBe(5);
        expect(delays).toEqual([1000, 2000, 4000, 8000]);
        const stored = await store.getTicket(ticket.id);
        expect(stored?.status).toBe('DispatchFailed');
        expect(stored?.failureReason).toBe('Retry budget exhausted after 5 attempts: Server error 503');
    });

    it('treats network errors as transient', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([new Error('ECONNRESET'), respond(200, { id: 'abc123' })]);
        const { delays, sleep } = recordingSleep();
        const dispatch = coordinator(transport, sleep);

        await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        const attempts = await store.listAttempts(ticket.id);
        expect(attempts[0].outcome).toBe('transient');
        expect(attempts[0].detail).toBe('Network error: ECONNRESET');
        expect(attempts[0].statusCode).toBeNull();
        expect(delays).toEqual([1000]);
    });

    it('aborts a request at the soft timeout and retries', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([
            request => new Promise((_, reject) => {
                request.signal.addEventListener('abort', () => reject(new Error('This operation was aborted')));
            }),
            respond(200, { id: 'abc123' })
        ]);
        const dispatch = coordinator(transport, recordingSleep().sleep, { softTimeoutMs: 20, hardTimeoutMs: 1000 });

        const status = await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(status.state).toBe('succeeded');
        const attempts = await store.listAttempts(ticket.id);
        expect(attempts[0].detail).toBe('Attempt abandoned after soft timeout of 20ms');
    });

    it('abandons a request that ignores the abort signal at the hard timeout', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([
            () => new Promise(() => undefined),
            respond(200, { id: 'abc123' })
        ]);
        const dispatch = coordinator(transport, recordingSleep().sleep, { softTimeoutMs: 1000, hardTimeoutMs: 20 });

        const status = await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(status.state).toBe('succeeded');
        const attempts = await store.listAttempts(ticket.id);
        expect(attempts[0].detail).toBe('Attempt abandoned after hard timeout of 20ms');
    });

    it('returns the same handle for concurrent submissions of one ticket', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([respond(200, { id: 'abc123' })]);
        const dispatch = coordinator(transport, recordingSleep().sleep);

        const [first, second] = await Promise.all([
            dispatch.submitDispatch(ticket.id),
            dispatch.submitDispatch(ticket.id)
        ]);
        await dispatch.drain();

        expect(second.handleId).toBe(first.handleId);
        expect(transport.requests).toHaveLength(1);
    });

    it('keeps the first external id when a duplicate delivery is acknowledged', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([respond(200, { id: 'abc123' })]);
        const dispatch = coordinator(transport, recordingSleep().sleep);
        await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        await expect(dispatch.acknowledgeDelivery(ticket.id, 'def456')).resolves.toBe('abc123');
        await expect(dispatch.acknowledgeDelivery(ticket.id, 'abc123')).resolves.toBe('abc123');

        const stored = await store.getTicket(ticket.id);
        expect(stored?.externalId).toBe('abc123');
        expect(stored?.status).toBe('DispatchSucceeded');
    });

    it('returns the first external id to concurrent acknowledgements', async () => {
        const ticket = await approvedTicket(store, catalog);
        const dispatch = coordinator(new ScriptedTransport([]), recordingSleep().sleep);

        const results = await Promise.all([
            dispatch.acknowledgeDelivery(ticket.id, 'abc123'),
            dispatch.acknowledgeDelivery(ticket.id, 'def456')
        ]);

        expect(results).toEqual(['abc123', 'abc123']);
        const stored = await store.getTicket(ticket.id);
        expect(stored?.status).toBe('DispatchSucceeded');
        expect(stored?.externalId).toBe('abc123');
    });

    it('returns the stored external id when another writer wins the success write', async () => {
        const dispatch = new DispatchCoordinator({
            sessions: new SessionPool(new RacedStore(handle.db)),
            transport: new ScriptedTransport([]),
            sleep: recordingSleep().sleep,
            settings: SETTINGS,
            credentials: TEST_CREDENTIALS
        });
        const ticket = await approvedTicket(store, catalog);

        await expect(dispatch.acknowledgeDelivery(ticket.id, 'def456')).resolves.toBe('abc123');
        expect((await store.getTicket(ticket.id))?.externalId).toBe('abc123');
    });

    it('keeps a delivered external id when the attempt log cannot be written', async () => {
        const ticket = await approvedTicket(store, catalog);
        const dispatch = new DispatchCoordinator({
            sessions: new SessionPool(new UnloggedStore(handle.db)),
            transport: new ScriptedTransport([respond(200, { id: 'abc123' })]),
            sleep: recordingSleep().sleep,
            settings: SETTINGS,
            credentials: TEST_CREDENTIALS
        });

        const status = await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(status.state).toBe('succeeded');
        expect(status.externalId).toBe('abc123');
        const stored = await store.getTicket(ticket.id);
        expect(stored?.status).toBe('DispatchSucceeded');
        expect(stored?.externalId).toBe('abc123');
        await expect(store.listAttempts(ticket.id)).resolves.toEqual([]);
    });

    it('forgets settled handles once the retention window has passed', async () => {
        let clock = 1_000_000;
        const dispatch = new DispatchCoordinator({
            sessions,
            transport: new ScriptedTransport([
                respond(200, { id: 'id-1' }),
                respond(200, { id: 'id-2' }),
                respond(200, { id: 'id-3' })
            ]),
            sleep: recordingSleep().sleep,
            settings: SETTINGS,
            credentials: TEST_CREDENTIALS,
            now: () => clock
        });

        const handleIds: string[] = [];
        for (let i = 0; i < 3; i++) {
            const ticket = await approvedTicket(store, catalog);
            handleIds.push((await dispatch.submitDispatch(ticket.id)).handleId);
        }
        await dispatch.drain();
        expect(dispatch.retainedHandleCount).toBe(3);

        clock += 59_999;
        expect(dispatch.getDispatchStatus(handleIds[0]).state).toBe('succeeded');
        expect(dispatch.retainedHandleCount).toBe(3);

        clock += 1;
        for (const handleId of handleIds) {
            expect(() => dispatch.getDispatchStatus(handleId)).toThrow(NotFoundError);
        }
        expect(dispatch.retainedHandleCount).toBe(0);
    });

    it('never forgets a handle that is still pending', async () => {
        let clock = 1_000_000;
        const ticket = await approvedTicket(store, catalog);
        const waiting = deferred<number>();
        const sleep: Sleep = (ms, signal) => {
            waiting.resolve(ms);
            return new Promise((_, reject) => {
                signal.addEventListener('abort', () => reject(new Error('Retry wait aborted')));
            });
        };
        const dispatch = new DispatchCoordinator({
            sessions,
            transport: new ScriptedTransport([respond(503, 'unavailable')]),
            sleep,
            settings: SETTINGS,
            credentials: TEST_CREDENTIALS,
            now: () => clock
        });

        const { handleId } = await dispatch.submitDispatch(ticket.id);
        await waiting.promise;
        clock += 10 * 60_000;

        expect(dispatch.getDispatchStatus(handleId).state).toBe('pending');
        dispatch.cancelDispatch(handleId);
        await expect(dispatch.waitForCompletion(handleId)).resolves.toMatchObject({ state: 'failed' });
    });

    it('stops a job cancelled during its retry wait', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([respond(503, 'unavailable')]);
        const waiting = deferred<number>();
        const sleep: Sleep = (ms, signal) => {
            waiting.resolve(ms);
            return new Promise((_, reject) => {
                signal.addEventListener('abort', () => reject(new Error('Retry wait aborted')));
            });
        };
        const dispatch = coordinator(transport, sleep);

        const { handleId } = await dispatch.submitDispatch(ticket.id);
        await expect(waiting.promise).resolves.toBe(1000);

        const requested = dispatch.cancelDispatch(handleId);
        expect(requested.state).toBe('pending');
        expect(requested.detail).toBe('Cancellation requested');

        const status = await dispatch.waitForCompletion(handleId);
        expect(status.state).toBe('failed');
        expect(status.detail).toBe('Dispatch cancelled before attempt 2');
        expect(transport.requests).toHaveLength(1);

        const stored = await store.getTicket(ticket.id);
        expect(stored?.status).toBe('DispatchFailed');
        expect(stored?.failureReason).toBe('Dispatch cancelled before attempt 2');
    });

    it('aborts without further writes when the ticket changes status mid-attempt', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([
            async () => {
                await store.compareAndSetStatus(ticket.id, 'ApprovedForDispatch', 'DispatchFailed', {
                    failureReason: 'Withdrawn by operator'
                });
                return respond(200, { id: 'late-id' });
            }
        ]);
        const dispatch = coordinator(transport, recordingSleep().sleep);

        const status = await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(status.state).toBe('failed');
        expect(status.detail).toBe(
            `Dispatch aborted: Ticket ${ticket.id} status is DispatchFailed, expected ApprovedForDispatch`
        );
        const stored = await store.getTicket(ticket.id);
        expect(stored?.status).toBe('DispatchFailed');
        expect(stored?.failureReason).toBe('Withdrawn by operator');
        expect(stored?.externalId).toBeNull();
    });

    it('fails terminally for a channel without an adapter', async () => {
        const channel = await store.insertChannel({ platformName: 'Snapchat', apiIdentifier: 'snap-1' });
        const ticket = await approvedTicket(store, { ...catalog, channel });
        const transport = new ScriptedTransport([]);
        const dispatch = coordinator(transport, recordingSleep().sleep);

        const status = await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        expect(status.state).toBe('failed');
        expect(transport.requests).toHaveLength(0);
        const stored = await store.getTicket(ticket.id);
        expect(stored?.failureReason).toBe('Unsupported platform: Snapchat');
    });

    it('fails terminally when the platform has no access token', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([]);
        const dispatch = new DispatchCoordinator({
            sessions,
            transport,
            sleep: recordingSleep().sleep,
            settings: SETTINGS,
            credentials: { ...TEST_CREDENTIALS, meta: { baseUrl: 'https://meta.test/act_1', token: undefined } }
        });

        await dispatch.waitForCompletion((await dispatch.submitDispatch(ticket.id)).handleId);

        const stored = await store.getTicket(ticket.id);
        expect(stored?.failureReason).toBe('No access token configured for platform: meta');
    });

    it('rejects tickets that are not approved for dispatch', async () => {
        const ticket = await draftTicket(store, catalog);
        const dispatch = coordinator(new ScriptedTransport([]), recordingSleep().sleep);

        await expect(dispatch.submitDispatch(ticket.id)).rejects.toThrow(InvalidStateError);
        await expect(dispatch.submitDispatch('missing-ticket')).rejects.toThrow(NotFoundError);
        expect(() => dispatch.getDispatchStatus('missing-handle')).toThrow(NotFoundError);
    });

    it('releases every store session once jobs settle', async () => {
        const ticket = await approvedTicket(store, catalog);
        const transport = new ScriptedTransport([respond(500), respond(400, 'bad request')]);
        const dispatch = coordinator(transport, recordingSleep().sleep);

        await dispatch.submitDispatch(ticket.id);
        await dispatch.drain();

        expect(sessions.activeCount).toBe(0);
    });
});
