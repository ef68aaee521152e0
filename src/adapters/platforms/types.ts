import { Campaign, Channel, JsonObject, Platform, RequestType, Ticket, TicketPayload } from '../../core/contracts';

export interface EncodeInput {
    ticket: Ticket;
    campaign: Campaign;
    channel: Channel;
}

/**
 * Pure per-platform functions. No I/O; the coordinator owns transport.
 * Encode/extract failures are thrown as EncodeError / ExtractError.
 */
export interface PlatformAdapter {
    platform: Platform;
    encode(input: EncodeInput): JsonObject;
    endpointPath(requestType: RequestType): string;
    extractExternalId(requestType: RequestType, responseBody: unknown): string;

    // Review-side schema knowledge
    requiredFields: readonly string[];
    hasGeoTargeting(payload: TicketPayload): boolean;
    geoRequirement: string;
    collectTargetingIds(payload: TicketPayload): string[];
}
