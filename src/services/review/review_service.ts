import { Ticket } from '../../core/contracts';
import { InvalidStateError, NotFoundError } from '../../core/errors';
import { TicketStore } from '../../store/ticket_store';
import { logger } from '../../utils/logger';
import { evaluateTicket } from './rule_engine';
import { ReviewContext, ReviewPolicy, ReviewResult } from './types';

export interface RecordedReview {
    result: ReviewResult;
    ticket: Ticket;
}

export class ReviewService {
    constructor(
        private readonly store: TicketStore,
        private readonly policy: () => ReviewPolicy
    ) {}

    /**
     * Evaluate without side effects. Safe to call repeatedly, in any status.
     */
    async preview(ticketId: string): Promise<ReviewResult> {
        const ctx = await this.loadContext(ticketId);
        return evaluateTicket(ctx, this.policy());
    }

    /**
     * Evaluate a PendingReview ticket and persist the verdict.
     */
    async record(ticketId: string): Promise<RecordedReview> {
        const ctx = await this.loadContext(ticketId);
        if (ctx.ticket.status !== 'PendingReview') {
            throw new InvalidStateError(`Ticket must be PendingReview, current status: ${ctx.ticket.status}`);
        }

        const result = evaluateTicket(ctx, this.policy());
        const ticket = result.approved
            ? await this.store.compareAndSetStatus(ticketId, 'PendingReview', 'ApprovedForDispatch')
            : await this.store.compareAndSetStatus(ticketId, 'PendingReview', 'ReviewFailed', {
                failureReason: result.reason
            });

        logger.info(`[Review] Ticket ${ticketId} -> ${ticket.status}`, {
            ticketId,
            ruleId: result.ruleId,
            reason: result.reason || undefined
        });

        return { result, ticket };
    }

    private async loadContext(ticketId: string): Promise<ReviewContext> {
        const ticket = await this.store.getTicket(ticketId);
        if (!ticket) throw new NotFoundError('Ticket', ticketId);

        const campaign = await this.store.getCampaign(ticket.campaignId);
        if (!campaign) throw new NotFoundError('Campaign', ticket.campaignId);

        const [brand, channel] = await Promise.all([
            this.store.getBrand(campaign.brandId),
            this.store.getChannel(ticket.channelId)
        ]);
        if (!brand) throw new NotFoundError('Brand', campaign.brandId);
        if (!channel) throw new NotFoundError('Channel', ticket.channelId);

        return { ticket, campaign, brand, channel };
    }
}
