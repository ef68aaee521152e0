import Decimal from 'decimal.js';
import { PLATFORM_ADAPTERS } from '../../adapters/platforms';
import { firstMissingField } from '../../adapters/platforms/payload_fields';
import { resolvePlatform } from '../../core/contracts';
import { formatAmount, parseDecimal } from '../../utils/decimal';
import { validateCampaignName } from '../naming/naming_validator';
import { ReviewRule } from './types';

// Checked in this order; a present field above its cap fails the rule
export const BUDGET_CEILINGS: ReadonlyArray<{ field: string; cap: Decimal }> = [
    { field: 'daily_budget', cap: new Decimal(100_000) },
    { field: 'budget', cap: new Decimal(100_000) },
    { field: 'lifetime_budget', cap: new Decimal(1_000_000) }
];

// Rule 1: Taxonomy
export const namingPatternRule: ReviewRule = {
    id: 'naming_pattern',
    check({ campaign }) {
        if (validateCampaignName(campaign.name)) return null;
        return {
            ruleId: 'naming_pattern',
            reason: `Campaign name '${campaign.name}' does not match taxonomy pattern BRAND_MARKET_PLATFORM_YEAR_Label`
        };
    }
};

// Rule 2: Brand safety (restricted brands only)
export const brandSafetyRule: ReviewRule = {
    id: 'brand_safety',
    check({ ticket, brand, channel }, policy) {
        if (!brand.restricted) return null;

        const platform = resolvePlatform(channel.platformName);
        if (!platform) return null; // schema_completeness reports unknown platforms

        const denied = new Map(policy.denylists[platform].map(e => [e.id.toLowerCase(), e]));
        for (const id of PLATFORM_ADAPTERS[platform].collectTargetingIds(ticket.payload)) {
            const entry = denied.get(id.toLowerCase());
            if (entry) {
                return {
                    ruleId: 'brand_safety',
                    reason: `Restricted brand ${brand.code} cannot target denylisted ${platform} category ${entry.id} (${entry.label})`
                };
            }
        }
        return null;
    }
};

// Rule 3: Budget ceilings
export const budgetCeilingRule: ReviewRule = {
    id: 'budget_ceiling',
    check({ ticket }) {
        for (const { field, cap } of BUDGET_CEILINGS) {
            const raw = ticket.payload[field];
            if (raw === undefined || raw === null) continue;

            const amount = parseDecimal(raw);
            if (!amount) {
                return { ruleId: 'budget_ceiling', reason: `${field} value ${JSON.stringify(raw)} is not a valid decimal amount` };
            }
            if (amount.greaterThan(cap)) {
                return {
                    ruleId: 'budget_ceiling',
                    reason: `${field} of ${formatAmount(amount)} exceeds maximum allowed ${formatAmount(cap)}`
                };
            }
        }
        return null;
    }
};

// Rule 4: Platform schema
export const schemaCompletenessRule: ReviewRule = {
    id: 'schema_completeness',
    check({ ticket, channel }) {
        const platform = resolvePlatform(channel.platformName);
        if (!platform) {
            return { ruleId: 'schema_completeness', reason: `Unsupported platform: ${channel.platformName}` };
        }

        const adapter = PLATFORM_ADAPTERS[platform];
        const missing = firstMissingField(ticket.payload, adapter.requiredFields);
        if (missing) {
            return { ruleId: 'schema_completeness', reason: `Payload missing required field: ${missing}` };
        }
        if (!adapter.hasGeoTargeting(ticket.payload)) {
            return { ruleId: 'schema_completeness', reason: adapter.geoRequirement };
        }
        return null;
    }
};

export const REVIEW_RULES: readonly ReviewRule[] = [
    namingPatternRule,
    brandSafetyRule,
    budgetCeilingRule,
    schemaCompletenessRule
];
