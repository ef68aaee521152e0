import { RequestType, Ticket, TicketPayload, TicketStatus } from '../../core/contracts';
import { InvalidStateError, NotFoundError, ValidationError } from '../../core/errors';
import { TicketStore } from '../../store/ticket_store';
import { logger } from '../../utils/logger';

export interface CreateTicketParams {
    campaignId: string;
    channelId: string;
    requestType: RequestType;
    payload: TicketPayload;
}

// Statuses from which an explicit (re)submission is allowed
const SUBMITTABLE: readonly TicketStatus[] = ['Draft', 'ReviewFailed', 'DispatchFailed'];

export class TicketService {
    constructor(private readonly store: TicketStore) {}

    async createTicket(params: CreateTicketParams): Promise<Ticket> {
        const [campaign, channel] = await Promise.all([
            this.store.getCampaign(params.campaignId),
            this.store.getChannel(params.channelId)
        ]);
        if (!campaign) {
            throw new ValidationError('InvalidReference', 'Invalid campaignId: campaign does not exist');
        }
        if (!channel) {
            throw new ValidationError('InvalidReference', 'Invalid channelId: channel does not exist');
        }

        const ticket = await this.store.insertTicket(params);
        logger.info(`[Ticket] Created ${ticket.id}`, { campaignId: campaign.id, channel: channel.platformName });
        return ticket;
    }

    async getTicket(id: string): Promise<Ticket> {
        const ticket = await this.store.getTicket(id);
        if (!ticket) throw new NotFoundError('Ticket', id);
        return ticket;
    }

    /**
     * Draft -> PendingReview, or a resubmission out of ReviewFailed / DispatchFailed.
     * Entering PendingReview clears any previous failure reason.
     */
    async submitForReview(id: string): Promise<Ticket> {
        const ticket = await this.getTicket(id);
        if (!SUBMITTABLE.includes(ticket.status)) {
            throw new InvalidStateError(`Ticket in status ${ticket.status} cannot be submitted for review`);
        }
        const updated = await this.store.compareAndSetStatus(id, ticket.status, 'PendingReview');
        logger.info(`[Ticket] ${id} ${ticket.status} -> PendingReview`);
        return updated;
    }

    async listAttempts(id: string) {
        await this.getTicket(id);
        return this.store.listAttempts(id);
    }
}
