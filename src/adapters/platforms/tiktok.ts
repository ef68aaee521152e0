import { isJsonObject, JsonObject, RequestType } from '../../core/contracts';
import { ExtractError } from '../../core/errors';
import {
    copyOptional, idsFromList, nonEmptyList, optionalAmount, PARENT_ID_FIELD,
    requireAmount, requireString, requireValue
} from './payload_fields';
import { EncodeInput, PlatformAdapter } from './types';

/**
 * TikTok Marketing API v1.3.
 * Budgets are sent as decimal numbers in account currency, not cents.
 */

const PATHS: Record<RequestType, string> = {
    CAMPAIGN: '/campaign/create/',
    AD_SET: '/adgroup/create/',
    AD: '/ad/create/'
};

const ID_FIELDS: Record<RequestType, string> = {
    CAMPAIGN: 'campaign_id',
    AD_SET: 'adgroup_id',
    AD: 'ad_id'
};

function encodeCampaign({ ticket, campaign }: EncodeInput): JsonObject {
    const config = ticket.payload;
    const budgetMode = typeof config.budget_mode === 'string' ? config.budget_mode : 'BUDGET_MODE_INFINITE';

    const payload: JsonObject = {
        advertiser_id: requireString(config, 'advertiser_id'),
        campaign_name: campaign.name,
        objective_type: requireString(config, 'objective_type'),
        budget_mode: budgetMode
    };

    const budget = optionalAmount(config, 'budget');
    if (budgetMode === 'BUDGET_MODE_TOTAL' && budget) {
        payload.budget = budget.toNumber();
    }
    copyOptional(payload, config, ['special_industries']);

    return payload;
}

function encodeAdGroup({ ticket, campaign }: EncodeInput): JsonObject {
    const config = ticket.payload;

    const payload: JsonObject = {
        advertiser_id: requireString(config, 'advertiser_id'),
        campaign_id: requireString(config, PARENT_ID_FIELD),
        adgroup_name: `${campaign.name}_AdGroup`,
        placement_type: 'PLACEMENT_TYPE_NORMAL',
        placements: requireValue(config, 'placements'),
        location_ids: requireValue(config, 'location_ids'),
        budget: requireAmount(config, 'budget').toNumber(),
        budget_mode: 'BUDGET_MODE_DAY',
        bid_type: requireString(config, 'bid_type'),
        optimization_goal: requireString(config, 'optimization_goal')
    };

    const bidPrice = optionalAmount(config, 'bid_price');
    if (bidPrice) payload.bid_price = bidPrice.toNumber();
    copyOptional(payload, config, [
        'age_groups',
        'gender',
        'interest_category_ids',
        'schedule_start_time',
        'schedule_end_time',
        'pacing'
    ]);

    return payload;
}

function encodeAd({ ticket, campaign }: EncodeInput): JsonObject {
    const config = ticket.payload;
    const payload: JsonObject = {
        advertiser_id: requireString(config, 'advertiser_id'),
        adgroup_id: requireString(config, PARENT_ID_FIELD),
        ad_name: `${campaign.name}_Ad`,
        ad_format: 'SINGLE_VIDEO',
        creatives: requireValue(config, 'creatives'),
        landing_page_url: requireString(config, 'landing_page_url')
    };
    copyOptional(payload, config, ['display_name', 'pixel_id', 'app_id']);
    return payload;
}

export const tiktokAdapter: PlatformAdapter = {
    platform: 'tiktok',

    encode(input) {
        switch (input.ticket.requestType) {
            case 'CAMPAIGN': return encodeCampaign(input);
            case 'AD_SET': return encodeAdGroup(input);
            case 'AD': return encodeAd(input);
        }
    },

    endpointPath(requestType) {
        return PATHS[requestType];
    },

    // TikTok returns: {"code": 0, "message": "OK", "data": {"campaign_id": "123"}}
    // A non-zero code is an API-level rejection delivered with HTTP 200.
    extractExternalId(requestType, body) {
        if (!isJsonObject(body)) {
            throw new ExtractError('TikTok response is not an object');
        }
        if (body.code !== 0) {
            const message = typeof body.message === 'string' ? body.message : 'unknown error';
            throw new ExtractError(`TikTok API error ${String(body.code)}: ${message}`);
        }
        const field = ID_FIELDS[requestType];
        const id = isJsonObject(body.data) ? body.data[field] : undefined;
        if (typeof id === 'string' || typeof id === 'number') {
            return String(id);
        }
        throw new ExtractError(`TikTok response missing data.${field}`);
    },

    requiredFields: ['advertiser_id', 'objective_type', 'placements'],
    geoRequirement: 'TikTok payload must target geographic locations (location_ids)',

    hasGeoTargeting(payload) {
        return nonEmptyList(payload.location_ids);
    },

    collectTargetingIds(payload) {
        return [
            ...idsFromList(payload.interest_category_ids),
            ...idsFromList(payload.action_category_ids)
        ];
    }
};
