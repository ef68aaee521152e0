import {
    Brand, Campaign, CampaignStatus, Channel, DispatchAttemptRecord, RequestType,
    Ticket, TicketPayload, TicketStatus, TransitionFields
} from '../core/contracts';

export interface NewCampaign {
    name: string;
    brandId: string;
    marketCode: string;
    budget: string;
    status?: CampaignStatus;
}

// No `name`: a campaign's generated name never changes
export interface CampaignChanges {
    budget?: string;
    status?: CampaignStatus;
}

export interface NewTicket {
    campaignId: string;
    channelId: string;
    requestType: RequestType;
    payload: TicketPayload;
}

export type NewAttempt = Omit<DispatchAttemptRecord, 'createdAt'>;

/**
 * Single source of truth for ticket status and externalId.
 * Every status write is a compare-and-set against the expected prior status.
 */
export interface TicketStore {
    getTicket(id: string): Promise<Ticket | null>;
    insertTicket(input: NewTicket): Promise<Ticket>;

    /**
     * Throws ConflictError('StatusConflict') when the stored status is not `expected`,
     * and ConflictError('ExternalIdConflict') when an externalId is already stored.
     */
    compareAndSetStatus(
        id: string,
        expected: TicketStatus,
        next: TicketStatus,
        fields?: TransitionFields
    ): Promise<Ticket>;

    getCampaign(id: string): Promise<Campaign | null>;
    /** Throws ConflictError('DuplicateName') on a name collision. */
    insertCampaign(input: NewCampaign): Promise<Campaign>;
    updateCampaign(id: string, changes: CampaignChanges): Promise<Campaign | null>;

    getBrand(id: string): Promise<Brand | null>;
    insertBrand(input: Omit<Brand, 'id'>): Promise<Brand>;
    getChannel(id: string): Promise<Channel | null>;
    insertChannel(input: Omit<Channel, 'id'>): Promise<Channel>;

    recordAttempt(attempt: NewAttempt): Promise<void>;
    listAttempts(ticketId: string): Promise<DispatchAttemptRecord[]>;

    ping(): Promise<void>;
}
