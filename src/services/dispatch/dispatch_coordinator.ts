import { setTimeout as delay } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config';
import {
    CredentialTable, PlatformRequest, PlatformResponse, PlatformTransport, resolveEndpoint
} from '../../adapters/platform_transport';
import { getAdapter } from '../../adapters/platforms';
import { Ticket } from '../../core/contracts';
import {
    ConflictError, InvalidStateError, NotFoundError, TerminalDispatchError, TransientDispatchError
} from '../../core/errors';
import { StoreProvider, withSession } from '../../store/session_pool';
import { TicketStore } from '../../store/ticket_store';
import { logger } from '../../utils/logger';
import { classifyError, classifyResponse } from './retry_policy';
import {
    AttemptOutcome, DispatchHandle, DispatchSettings, DispatchState, DispatchStatus, Sleep
} from './types';

export interface DispatchCoordinatorOptions {
    sessions: StoreProvider;
    transport: PlatformTransport;
    settings?: Partial<DispatchSettings>;
    credentials?: CredentialTable;
    sleep?: Sleep;
    now?: () => number;
}

interface DispatchJob {
    handleId: string;
    ticketId: string;
    state: DispatchState;
    detail: string;
    attempts: number;
    externalId: string | null;
    cancelRequested: boolean;
    settledAt: number | null;
    // Aborted on cancel to cut a pending retry wait short
    retryWaitAbort: AbortController;
    completion: Promise<void>;
}

type AttemptStep = { done: true } | { done: false; delayMs: number };

const defaultSleep: Sleep = async (ms, signal) => {
    await delay(ms, undefined, { signal });
};

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Background delivery of approved tickets to their ad platform.
 *
 * One job per ticket at a time. Each attempt re-reads the ticket inside its
 * own store session, and every settlement is a compare-and-set out of
 * ApprovedForDispatch, so a ticket reaches a dispatch outcome at most once.
 */
export class DispatchCoordinator {
    private readonly sessions: StoreProvider;
    private readonly transport: PlatformTransport;
    private readonly settings: DispatchSettings;
    private readonly credentials: CredentialTable;
    private readonly sleep: Sleep;
    private readonly now: () => number;

    // Settled jobs stay until handleRetentionMs has passed
    private readonly jobs = new Map<string, DispatchJob>();
    // Keyed by ticket id; set synchronously so concurrent submits share one job
    private readonly inFlight = new Map<string, Promise<DispatchJob>>();

    constructor(options: DispatchCoordinatorOptions) {
        this.sessions = options.sessions;
        this.transport = options.transport;
        this.settings = { ...config.dispatch, ...options.settings };
        this.credentials = options.credentials ?? config.platforms;
        this.sleep = options.sleep ?? defaultSleep;
        this.now = options.now ?? Date.now;
    }

    get retainedHandleCount(): number {
        return this.jobs.size;
    }

    /**
     * Start delivering an ApprovedForDispatch ticket and return at once.
     * A second submit while a job is running returns the same handle.
     */
    async submitDispatch(ticketId: string): Promise<DispatchHandle> {
        this.pruneSettled();
        const existing = this.inFlight.get(ticketId);
        if (existing) {
            return this.toHandle(await existing);
        }

        const starting = this.startJob(ticketId);
        this.inFlight.set(ticketId, starting);
        try {
            return this.toHandle(await starting);
        } catch (err) {
            this.inFlight.delete(ticketId);
            throw err;
        }
    }

    getDispatchStatus(handleId: string): DispatchStatus {
        return this.toStatus(this.findJob(handleId));
    }

    /**
     * Request cancellation. Honoured before the next attempt; an attempt
     * already in flight runs to completion or timeout first.
     */
    cancelDispatch(handleId: string): DispatchStatus {
        const job = this.findJob(handleId);
        if (job.state === 'pending' && !job.cancelRequested) {
            job.cancelRequested = true;
            job.detail = 'Cancellation requested';
            job.retryWaitAbort.abort();
            logger.info(`[Dispatch] Cancellation requested for ticket ${job.ticketId}`, { handleId });
        }
        return this.toStatus(job);
    }

    async waitForCompletion(handleId: string): Promise<DispatchStatus> {
        const job = this.findJob(handleId);
        await job.completion;
        return this.toStatus(job);
    }

    /** Resolves once every job started so far has settled. */
    async drain(): Promise<void> {
        this.pruneSettled();
        const pending = [...this.jobs.values()].filter(job => job.settledAt === null);
        await Promise.all(pending.map(job => job.completion));
    }

    /**
     * Record a platform's acknowledgement of a delivery. Idempotent: once an
     * externalId is stored, later acknowledgements return it unchanged.
     */
    async acknowledgeDelivery(ticketId: string, externalId: string): Promise<string> {
        const running = this.inFlight.get(ticketId);
        if (running) {
            await (await running).completion;
        }
        return withSession(this.sessions, store => this.applySuccess(store, ticketId, externalId));
    }

    private async startJob(ticketId: string): Promise<DispatchJob> {
        const ticket = await withSession(this.sessions, store => store.getTicket(ticketId));
        if (!ticket) throw new NotFoundError('Ticket', ticketId);
        if (ticket.status !== 'ApprovedForDispatch') {
            throw new InvalidStateError(`Ticket must be ApprovedForDispatch, current status: ${ticket.status}`);
        }

        const job: DispatchJob = {
            handleId: uuidv4(),
            ticketId,
            state: 'pending',
            detail: 'Queued',
            attempts: 0,
            externalId: null,
            cancelRequested: false,
            settledAt: null,
            retryWaitAbort: new AbortController(),
            completion: Promise.resolve()
        };
        this.jobs.set(job.handleId, job);
        job.completion = this.runJob(job);

        logger.info(`[Dispatch] Started ticket ${ticketId}`, { handleId: job.handleId });
        return job;
    }

    // Never rejects: every failure ends up in the job's state
    private async runJob(job: DispatchJob): Promise<void> {
        try {
            for (let attempt = 1; attempt <= this.settings.maxAttempts; attempt++) {
                if (job.cancelRequested) {
                    await this.finishCancelled(job, attempt);
                    return;
                }

                job.attempts = attempt;
                const step = await withSession(this.sessions, store => this.runAttempt(store, job, attempt));
                if (step.done) return;

                const waited = await this.waitForRetry(job, step.delayMs);
                if (!waited) {
                    await this.finishCancelled(job, attempt + 1);
                    return;
                }
            }
        } catch (err) {
            const level = err instanceof ConflictError ? 'warn' : 'error';
            logger[level](`[Dispatch] Aborted ticket ${job.ticketId}`, { handleId: job.handleId, error: err });
            this.settle(job, 'failed', `Dispatch aborted: ${errorMessage(err)}`);
        } finally {
            this.inFlight.delete(job.ticketId);
        }
    }

    private async runAttempt(store: TicketStore, job: DispatchJob, attempt: number): Promise<AttemptStep> {
        const ticket = await store.getTicket(job.ticketId);
        if (!ticket) throw new NotFoundError('Ticket', job.ticketId);
        if (ticket.status !== 'ApprovedForDispatch') {
            throw new ConflictError(
                'StatusConflict',
                `Ticket ${ticket.id} left ApprovedForDispatch (now ${ticket.status})`
            );
        }

        const outcome = await this.deliver(store, ticket, attempt);
        logger.info(`[Dispatch] Ticket ${ticket.id} attempt ${attempt}/${this.settings.maxAttempts}: ${outcome.kind}`, {
            handleId: job.handleId,
            statusCode: outcome.statusCode
        });

        // The platform id is stored before anything else can fail
        if (outcome.kind === 'success') {
            const externalId = await this.applySuccess(store, ticket.id, outcome.externalId);
            job.externalId = externalId;
            this.settle(job, 'succeeded', `Delivered as ${externalId}`);
            await this.logAttempt(store, job, attempt, outcome);
            return { done: true };
        }

        await this.logAttempt(store, job, attempt, outcome);
        if (outcome.kind === 'terminal') {
            await this.fail(store, job, outcome.reason);
            return { done: true };
        }
        if (attempt >= this.settings.maxAttempts) {
            await this.fail(store, job, `Retry budget exhausted after ${attempt} attempts: ${outcome.reason}`);
            return { done: true };
        }
        job.detail = `Attempt ${attempt} failed: ${outcome.reason}; retrying in ${outcome.delayMs / 1000}s`;
        return { done: false, delayMs: outcome.delayMs };
    }

    // After a success is applied, a failed log write is reported and not rethrown
    private async logAttempt(store: TicketStore, job: DispatchJob, attempt: number, outcome: AttemptOutcome): Promise<void> {
        try {
            await store.recordAttempt({
                ticketId: job.ticketId,
                handleId: job.handleId,
                attempt,
                outcome: outcome.kind,
                statusCode: outcome.statusCode,
                detail: outcome.kind === 'success' ? outcome.externalId : outcome.reason
            });
        } catch (err) {
            if (outcome.kind !== 'success') throw err;
            logger.error(`[Dispatch] Could not log attempt ${attempt} for ticket ${job.ticketId}`, {
                handleId: job.handleId,
                error: err
            });
        }
    }

    private async deliver(store: TicketStore, ticket: Ticket, attempt: number): Promise<AttemptOutcome> {
        const retryIndex = attempt - 1;
        try {
            const [campaign, channel] = await Promise.all([
                store.getCampaign(ticket.campaignId),
                store.getChannel(ticket.channelId)
            ]);
            if (!campaign) throw new TerminalDispatchError(`Campaign ${ticket.campaignId} no longer exists`);
            if (!channel) throw new TerminalDispatchError(`Channel ${ticket.channelId} no longer exists`);

            const adapter = getAdapter(channel.platformName);
            const body = adapter.encode({ ticket, campaign, channel });
            const endpoint = resolveEndpoint(adapter.platform, ticket.requestType, this.credentials);

            const response = await this.sendWithTimeouts({ url: endpoint.url, token: endpoint.token, body });
            return classifyResponse(adapter, ticket.requestType, response, retryIndex);
        } catch (err) {
            return classifyError(err, retryIndex);
        }
    }

    /**
     * The soft timeout aborts the request; the hard timeout abandons it
     * even when the transport ignores the abort.
     */
    private async sendWithTimeouts(request: Omit<PlatformRequest, 'signal'>): Promise<PlatformResponse> {
        const { softTimeoutMs, hardTimeoutMs } = this.settings;
        const controller = new AbortController();
        const softTimer = setTimeout(() => controller.abort(), softTimeoutMs);
        let hardTimer: NodeJS.Timeout | undefined;

        const hardLimit = new Promise<never>((_, reject) => {
            hardTimer = setTimeout(
                () => reject(new TransientDispatchError(`Attempt abandoned after hard timeout of ${hardTimeoutMs}ms`)),
                hardTimeoutMs
            );
        });
        const sending = this.transport.send({ ...request, signal: controller.signal });
        // An abandoned request may still settle later
        sending.catch(err => logger.debug('[Dispatch] Late transport failure', { error: err }));

        try {
            return await Promise.race([sending, hardLimit]);
        } catch (err) {
            if (err instanceof TransientDispatchError) throw err;
            if (controller.signal.aborted) {
                throw new TransientDispatchError(`Attempt abandoned after soft timeout of ${softTimeoutMs}ms`);
            }
            throw new TransientDispatchError(`Network error: ${errorMessage(err)}`);
        } finally {
            clearTimeout(softTimer);
            clearTimeout(hardTimer);
        }
    }

    // false when the wait was cut short by cancellation
    private async waitForRetry(job: DispatchJob, ms: number): Promise<boolean> {
        if (job.cancelRequested) return false;
        try {
            await this.sleep(ms, job.retryWaitAbort.signal);
        } catch (err) {
            if (job.cancelRequested) return false;
            throw err;
        }
        return !job.cancelRequested;
    }

    private async applySuccess(store: TicketStore, ticketId: string, externalId: string): Promise<string> {
        const current = await store.getTicket(ticketId);
        if (!current) throw new NotFoundError('Ticket', ticketId);

        if (current.externalId !== null) {
            if (current.externalId !== externalId) {
                logger.warn(`[Dispatch] Ignoring duplicate delivery for ticket ${ticketId}`, {
                    stored: current.externalId,
                    received: externalId
                });
            }
            return current.externalId;
        }

        try {
            const updated = await store.compareAndSetStatus(ticketId, 'ApprovedForDispatch', 'DispatchSucceeded', {
                externalId
            });
            return updated.externalId ?? externalId;
        } catch (err) {
            if (!(err instanceof ConflictError)) throw err;
            // A concurrent acknowledgement got there first
            const winner = await store.getTicket(ticketId);
            if (!winner || winner.status !== 'DispatchSucceeded' || winner.externalId === null) throw err;
            if (winner.externalId !== externalId) {
                logger.warn(`[Dispatch] Ignoring duplicate delivery for ticket ${ticketId}`, {
                    stored: winner.externalId,
                    received: externalId
                });
            }
            return winner.externalId;
        }
    }

    private async fail(store: TicketStore, job: DispatchJob, reason: string): Promise<void> {
        await store.compareAndSetStatus(job.ticketId, 'ApprovedForDispatch', 'DispatchFailed', {
            failureReason: reason
        });
        this.settle(job, 'failed', reason);
    }

    private async finishCancelled(job: DispatchJob, nextAttempt: number): Promise<void> {
        await withSession(this.sessions, store =>
            this.fail(store, job, `Dispatch cancelled before attempt ${nextAttempt}`)
        );
    }

    private settle(job: DispatchJob, state: Exclude<DispatchState, 'pending'>, detail: string): void {
        job.state = state;
        job.detail = detail;
        job.settledAt = this.now();
        logger.info(`[Dispatch] Ticket ${job.ticketId} ${state}`, { handleId: job.handleId, detail });
    }

    private findJob(handleId: string): DispatchJob {
        this.pruneSettled();
        const job = this.jobs.get(handleId);
        if (!job) throw new NotFoundError('Dispatch handle', handleId);
        return job;
    }

    private pruneSettled(): void {
        const cutoff = this.now() - this.settings.handleRetentionMs;
        for (const [handleId, job] of this.jobs) {
            if (job.settledAt !== null && job.settledAt <= cutoff) {
                this.jobs.delete(handleId);
            }
        }
    }

    private toHandle(job: DispatchJob): DispatchHandle {
        return { handleId: job.handleId, ticketId: job.ticketId };
    }

    private toStatus(job: DispatchJob): DispatchStatus {
        return {
            handleId: job.handleId,
            ticketId: job.ticketId,
            state: job.state,
            detail: job.detail,
            attempts: job.attempts,
            externalId: job.externalId
        };
    }
}
