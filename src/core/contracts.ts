/**
 * Domain contracts shared by the naming, review and dispatch layers.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const TICKET_STATUSES = [
    'Draft',
    'PendingReview',
    'ReviewFailed',
    'ApprovedForDispatch',
    'DispatchSucceeded',
    'DispatchFailed'
] as const;
export type TicketStatus = typeof TICKET_STATUSES[number];

export const REQUEST_TYPES = ['CAMPAIGN', 'AD_SET', 'AD'] as const;
export type RequestType = typeof REQUEST_TYPES[number];

export const CAMPAIGN_STATUSES = ['DRAFT', 'ACTIVE', 'PAUSED', 'COMPLETED'] as const;
export type CampaignStatus = typeof CAMPAIGN_STATUSES[number];

export const PLATFORMS = ['meta', 'tiktok', 'google'] as const;
export type Platform = typeof PLATFORMS[number];

export type TicketPayload = JsonObject;

export interface Ticket {
    id: string;
    campaignId: string;
    channelId: string;
    requestType: RequestType;
    payload: TicketPayload;
    status: TicketStatus;
    externalId: string | null;
    failureReason: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface Brand {
    id: string;
    name: string;
    code: string;
    // Explicit classification; never derived from the display name
    restricted: boolean;
}

export interface Channel {
    id: string;
    platformName: string;
    apiIdentifier: string;
}

export interface Campaign {
    id: string;
    name: string;
    brandId: string;
    marketCode: string;
    budget: string;
    status: CampaignStatus;
    createdAt: string;
    updatedAt: string;
}

export interface NamingSpec {
    brandCode: string;
    marketCode: string;
    platformCode: string;
    year?: number;
    label: string;
}

// Fields a status transition may write alongside the new status
export interface TransitionFields {
    externalId?: string;
    failureReason?: string | null;
}

export type AttemptOutcomeKind = 'success' | 'transient' | 'terminal';

export interface DispatchAttemptRecord {
    ticketId: string;
    handleId: string;
    attempt: number;
    outcome: AttemptOutcomeKind;
    statusCode: number | null;
    detail: string;
    createdAt: string;
}

/**
 * Resolve a channel's display platform name to the platform enum.
 * Returns null for platforms without an adapter.
 */
export function resolvePlatform(platformName: string): Platform | null {
    const normalized = platformName.trim().toLowerCase();
    switch (normalized) {
        case 'meta':
        case 'facebook':
            return 'meta';
        case 'tiktok':
            return 'tiktok';
        case 'google':
        case 'google ads':
            return 'google';
        default:
            return null;
    }
}

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
