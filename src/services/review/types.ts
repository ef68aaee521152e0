import { Brand, Campaign, Channel, Platform, Ticket } from '../../core/contracts';

export type RuleId = 'naming_pattern' | 'brand_safety' | 'budget_ceiling' | 'schema_completeness';

export interface ReviewContext {
    ticket: Ticket;
    campaign: Campaign;
    brand: Brand;
    channel: Channel;
}

export interface DenylistEntry {
    id: string;
    label: string;
}

export type TargetingDenylists = Record<Platform, DenylistEntry[]>;

export interface ReviewPolicy {
    denylists: TargetingDenylists;
}

// A business-rule rejection. Returned, never thrown.
export interface RuleFailure {
    ruleId: RuleId;
    reason: string;
}

export type ReviewResult =
    | { approved: true; reason: ''; ruleId: null }
    | { approved: false; reason: string; ruleId: RuleId };

export interface ReviewRule {
    id: RuleId;
    check(ctx: ReviewContext, policy: ReviewPolicy): RuleFailure | null;
}
