import { z } from 'zod';
import { CAMPAIGN_STATUSES, JsonValue, REQUEST_TYPES } from '../core/contracts';
import { parseDecimal } from '../utils/decimal';

// HTTP request contracts. Field names are snake_case on the wire.

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);

const amount = z.union([z.string(), z.number()])
    .transform(String)
    .refine(value => {
        const parsed = parseDecimal(value);
        return parsed !== null && !parsed.isNegative();
    }, 'must be a non-negative decimal amount');

export const CreateCampaignSchema = z.object({
    brand_id: z.string().min(1),
    market_code: z.string().min(1),
    platform_code: z.string().min(1),
    label: z.string().min(1),
    year: z.number().int().optional(),
    budget: amount,
    status: z.enum(CAMPAIGN_STATUSES).optional()
});

export const UpdateCampaignSchema = z.object({
    name: z.string().optional(),
    budget: amount.optional(),
    status: z.enum(CAMPAIGN_STATUSES).optional()
});

export const CreateTicketSchema = z.object({
    campaign_id: z.string().min(1),
    channel_id: z.string().min(1),
    request_type: z.enum(REQUEST_TYPES),
    payload: z.record(jsonValue)
});

export const DeploySchema = z.object({
    ticket_id: z.string().min(1)
});
