import { REVIEW_RULES } from './rules';
import { ReviewContext, ReviewPolicy, ReviewResult, ReviewRule } from './types';

/**
 * Pure pre-flight evaluation. Rules run in fixed order and the first failure
 * short-circuits the rest. Nothing is mutated or persisted here.
 */
export function evaluateTicket(
    ctx: ReviewContext,
    policy: ReviewPolicy,
    rules: readonly ReviewRule[] = REVIEW_RULES
): ReviewResult {
    for (const rule of rules) {
        const failure = rule.check(ctx, policy);
        if (failure) {
            return { approved: false, reason: failure.reason, ruleId: failure.ruleId };
        }
    }
    return { approved: true, reason: '', ruleId: null };
}
