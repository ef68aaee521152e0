import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import {
    CAMPAIGN_STATUSES, REQUEST_TYPES, TICKET_STATUSES, TicketPayload
} from '../core/contracts';

export const brands = sqliteTable('brands', {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    code: text('code').notNull().unique(),
    restricted: integer('restricted', { mode: 'boolean' }).notNull().default(false),
    createdAt: text('created_at').notNull()
});

export const channels = sqliteTable('channels', {
    id: text('id').primaryKey(),
    platformName: text('platform_name').notNull(),
    apiIdentifier: text('api_identifier').notNull().unique(),
    createdAt: text('created_at').notNull()
});

export const campaigns = sqliteTable('campaigns', {
    id: text('id').primaryKey(),
    name: text('name').notNull().unique(),
    brandId: text('brand_id').notNull().references(() => brands.id),
    marketCode: text('market_code').notNull(),
    budget: text('budget').notNull(),
    status: text('status', { enum: CAMPAIGN_STATUSES }).notNull().default('DRAFT'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull()
});

export const tickets = sqliteTable('tickets', {
    id: text('id').primaryKey(),
    campaignId: text('campaign_id').notNull().references(() => campaigns.id),
    channelId: text('channel_id').notNull().references(() => channels.id),
    requestType: text('request_type', { enum: REQUEST_TYPES }).notNull(),
    payload: text('payload', { mode: 'json' }).$type<TicketPayload>().notNull(),
    status: text('status', { enum: TICKET_STATUSES }).notNull().default('Draft'),
    externalId: text('external_id'),
    failureReason: text('failure_reason'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull()
});

export const dispatchAttempts = sqliteTable('dispatch_attempts', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    ticketId: text('ticket_id').notNull().references(() => tickets.id),
    handleId: text('handle_id').notNull(),
    attempt: integer('attempt').notNull(),
    outcome: text('outcome', { enum: ['success', 'transient', 'terminal'] }).notNull(),
    statusCode: integer('status_code'),
    detail: text('detail').notNull(),
    createdAt: text('created_at').notNull()
});
