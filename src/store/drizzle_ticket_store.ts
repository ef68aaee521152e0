import { and, asc, eq, isNull, sql, SQL } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import {
    Brand, Campaign, Channel, DispatchAttemptRecord, Ticket, TicketStatus, TransitionFields
} from '../core/contracts';
import { ConflictError, InvalidStateError, NotFoundError } from '../core/errors';
import { AppDatabase, brands, campaigns, channels, dispatchAttempts, tickets } from '../db';
import { CampaignChanges, NewAttempt, NewCampaign, NewTicket, TicketStore } from './ticket_store';

const FAILURE_STATUSES: readonly TicketStatus[] = ['ReviewFailed', 'DispatchFailed'];

function isUniqueViolation(err: unknown): boolean {
    if (typeof err !== 'object' || err === null) return false;
    if ('code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE') return true;
    return 'cause' in err && isUniqueViolation(err.cause);
}

export class DrizzleTicketStore implements TicketStore {
    constructor(private readonly db: AppDatabase) {}

    async getTicket(id: string): Promise<Ticket | null> {
        return this.db.select().from(tickets).where(eq(tickets.id, id)).get() ?? null;
    }

    async insertTicket(input: NewTicket): Promise<Ticket> {
        const now = new Date().toISOString();
        const row: Ticket = {
            id: uuidv4(),
            ...input,
            status: 'Draft',
            externalId: null,
            failureReason: null,
            createdAt: now,
            updatedAt: now
        };
        this.db.insert(tickets).values(row).run();
        return row;
    }

    async compareAndSetStatus(
        id: string,
        expected: TicketStatus,
        next: TicketStatus,
        fields: TransitionFields = {}
    ): Promise<Ticket> {
        // failureReason lives only on failure statuses
        const failing = FAILURE_STATUSES.includes(next);
        if (failing && !fields.failureReason) {
            throw new InvalidStateError(`Transition to ${next} requires a failure reason`);
        }

        const conditions: SQL[] = [eq(tickets.id, id), eq(tickets.status, expected)];
        const changes: Partial<typeof tickets.$inferInsert> = {
            status: next,
            failureReason: failing ? fields.failureReason : null,
            updatedAt: new Date().toISOString()
        };
        if (fields.externalId !== undefined) {
            // externalId is write-once
            conditions.push(isNull(tickets.externalId));
            changes.externalId = fields.externalId;
        }

        const result = this.db.update(tickets).set(changes).where(and(...conditions)).run();

        const current = await this.getTicket(id);
        if (!current) throw new NotFoundError('Ticket', id);
        if (result.changes === 0) {
            if (current.status !== expected) {
                throw new ConflictError(
                    'StatusConflict',
                    `Ticket ${id} status is ${current.status}, expected ${expected}`
                );
            }
            throw new ConflictError('ExternalIdConflict', `Ticket ${id} already has external id ${current.externalId}`);
        }
        return current;
    }

    async getCampaign(id: string): Promise<Campaign | null> {
        return this.db.select().from(campaigns).where(eq(campaigns.id, id)).get() ?? null;
    }

    async insertCampaign(input: NewCampaign): Promise<Campaign> {
        const now = new Date().toISOString();
        const row: Campaign = {
            id: uuidv4(),
            name: input.name,
            brandId: input.brandId,
            marketCode: input.marketCode,
            budget: input.budget,
            status: input.status ?? 'DRAFT',
            createdAt: now,
            updatedAt: now
        };
        try {
            this.db.insert(campaigns).values(row).run();
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new ConflictError('DuplicateName', `Campaign with name '${input.name}' already exists`);
            }
            throw err;
        }
        return row;
    }

    async updateCampaign(id: string, changes: CampaignChanges): Promise<Campaign | null> {
        const result = this.db.update(campaigns)
            .set({ ...changes, updatedAt: new Date().toISOString() })
            .where(eq(campaigns.id, id))
            .run();
        if (result.changes === 0) return null;
        return this.getCampaign(id);
    }

    async getBrand(id: string): Promise<Brand | null> {
        const row = this.db.select().from(brands).where(eq(brands.id, id)).get();
        if (!row) return null;
        return { id: row.id, name: row.name, code: row.code, restricted: row.restricted };
    }

    async insertBrand(input: Omit<Brand, 'id'>): Promise<Brand> {
        const brand: Brand = { id: uuidv4(), ...input };
        this.db.insert(brands).values({ ...brand, createdAt: new Date().toISOString() }).run();
        return brand;
    }

    async getChannel(id: string): Promise<Channel | null> {
        const row = this.db.select().from(channels).where(eq(channels.id, id)).get();
        if (!row) return null;
        return { id: row.id, platformName: row.platformName, apiIdentifier: row.apiIdentifier };
    }

    async insertChannel(input: Omit<Channel, 'id'>): Promise<Channel> {
        const channel: Channel = { id: uuidv4(), ...input };
        this.db.insert(channels).values({ ...channel, createdAt: new Date().toISOString() }).run();
        return channel;
    }

    async recordAttempt(attempt: NewAttempt): Promise<void> {
        this.db.insert(dispatchAttempts).values({
            ...attempt,
            createdAt: new Date().toISOString()
        }).run();
    }

    async listAttempts(ticketId: string): Promise<DispatchAttemptRecord[]> {
        const rows = this.db.select().from(dispatchAttempts)
            .where(eq(dispatchAttempts.ticketId, ticketId))
            .orderBy(asc(dispatchAttempts.attempt), asc(dispatchAttempts.id))
            .all();
        return rows.map(row => ({
            ticketId: row.ticketId,
            handleId: row.handleId,
            attempt: row.attempt,
            outcome: row.outcome,
            statusCode: row.statusCode,
            detail: row.detail,
            createdAt: row.createdAt
        }));
    }

    async ping(): Promise<void> {
        this.db.get(sql`SELECT 1`);
    }
}
