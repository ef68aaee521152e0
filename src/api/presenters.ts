import { Campaign, DispatchAttemptRecord, Ticket } from '../core/contracts';
import { ReviewResult } from '../services/review/types';
import { DispatchStatus } from '../services/dispatch/types';

export function presentCampaign(campaign: Campaign) {
    return {
        id: campaign.id,
        name: campaign.name,
        brand_id: campaign.brandId,
        market_code: campaign.marketCode,
        budget: campaign.budget,
        status: campaign.status,
        created_at: campaign.createdAt,
        updated_at: campaign.updatedAt
    };
}

export function presentTicket(ticket: Ticket) {
    return {
        id: ticket.id,
        campaign_id: ticket.campaignId,
        channel_id: ticket.channelId,
        request_type: ticket.requestType,
        payload: ticket.payload,
        status: ticket.status,
        external_id: ticket.externalId,
        failure_reason: ticket.failureReason,
        created_at: ticket.createdAt,
        updated_at: ticket.updatedAt
    };
}

export function presentReview(result: ReviewResult) {
    return {
        approved: result.approved,
        reason: result.reason,
        rule_id: result.ruleId
    };
}

export function presentAttempt(attempt: DispatchAttemptRecord) {
    return {
        attempt: attempt.attempt,
        handle_id: attempt.handleId,
        outcome: attempt.outcome,
        status_code: attempt.statusCode,
        detail: attempt.detail,
        created_at: attempt.createdAt
    };
}

export function presentDispatch(status: DispatchStatus) {
    return {
        handle_id: status.handleId,
        ticket_id: status.ticketId,
        state: status.state,
        detail: status.detail,
        attempts: status.attempts,
        external_id: status.externalId
    };
}
