import { Campaign, CampaignStatus, NamingSpec } from '../../core/contracts';
import { NotFoundError, ValidationError } from '../../core/errors';
import { TicketStore } from '../../store/ticket_store';
import { logger } from '../../utils/logger';
import { generateCampaignName } from '../naming/naming_validator';

export interface CreateCampaignParams {
    brandId: string;
    marketCode: string;
    platformCode: string;
    label: string;
    year?: number;
    budget: string;
    status?: CampaignStatus;
}

export interface UpdateCampaignParams {
    name?: string;
    budget?: string;
    status?: CampaignStatus;
}

export class CampaignService {
    constructor(private readonly store: TicketStore) {}

    /**
     * Create a campaign under its taxonomy-generated name.
     * Name collisions surface as ConflictError('DuplicateName') from the store.
     */
    async createCampaign(params: CreateCampaignParams): Promise<Campaign> {
        const brand = await this.store.getBrand(params.brandId);
        if (!brand) {
            throw new ValidationError('InvalidReference', `Invalid brandId: brand ${params.brandId} does not exist`);
        }

        const spec: NamingSpec = {
            brandCode: brand.code,
            marketCode: params.marketCode,
            platformCode: params.platformCode,
            year: params.year,
            label: params.label
        };
        const name = generateCampaignName(spec);

        const campaign = await this.store.insertCampaign({
            name,
            brandId: brand.id,
            marketCode: params.marketCode.toUpperCase(),
            budget: params.budget,
            status: params.status
        });
        logger.info(`[Campaign] Created ${campaign.name}`, { campaignId: campaign.id });
        return campaign;
    }

    async getCampaign(id: string): Promise<Campaign> {
        const campaign = await this.store.getCampaign(id);
        if (!campaign) throw new NotFoundError('Campaign', id);
        return campaign;
    }

    async updateCampaign(id: string, params: UpdateCampaignParams): Promise<Campaign> {
        const current = await this.getCampaign(id);

        // The generated name is set once at creation
        if (params.name !== undefined && params.name !== current.name) {
            throw new ValidationError('ImmutableField', 'Campaign name is generated at creation and cannot be changed');
        }

        const updated = await this.store.updateCampaign(id, { budget: params.budget, status: params.status });
        if (!updated) throw new NotFoundError('Campaign', id);
        return updated;
    }
}
