import { FetchTransport, PlatformTransport } from '../adapters/platform_transport';
import { DrizzleTicketStore } from '../store/drizzle_ticket_store';
import { SessionPool } from '../store/session_pool';
import { AppDatabase } from '../db';
import { CampaignService } from './campaign/campaign_service';
import { DispatchCoordinator, DispatchCoordinatorOptions } from './dispatch/dispatch_coordinator';
import { DenylistConfigService } from './review/denylist_config';
import { ReviewService } from './review/review_service';
import { ReviewPolicy } from './review/types';
import { TicketService } from './ticket/ticket_service';

export interface ServiceRegistry {
    sessions: SessionPool;
    campaigns: CampaignService;
    tickets: TicketService;
    review: ReviewService;
    dispatch: DispatchCoordinator;
}

export interface RegistryOverrides {
    transport?: PlatformTransport;
    policy?: () => ReviewPolicy;
    dispatch?: Omit<DispatchCoordinatorOptions, 'sessions' | 'transport'>;
}

/** Wire every service over one database. */
export function buildServices(db: AppDatabase, overrides: RegistryOverrides = {}): ServiceRegistry {
    const store = new DrizzleTicketStore(db);
    const sessions = new SessionPool(store);
    const policy = overrides.policy
        ?? (() => ({ denylists: DenylistConfigService.getInstance().getDenylists() }));

    return {
        sessions,
        campaigns: new CampaignService(store),
        tickets: new TicketService(store),
        review: new ReviewService(store, policy),
        dispatch: new DispatchCoordinator({
            ...overrides.dispatch,
            sessions,
            transport: overrides.transport ?? new FetchTransport()
        })
    };
}
