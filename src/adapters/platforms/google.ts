import { isJsonObject, JsonObject, RequestType } from '../../core/contracts';
import { ExtractError } from '../../core/errors';
import { idsFromList, nonEmptyList, optionalAmount, PARENT_ID_FIELD, requireString } from './payload_fields';
import { EncodeInput, PlatformAdapter } from './types';
import { toMinorUnits } from '../../utils/decimal';

// Google Ads API v14, resource based. Every create is a single mutate operation.
const PATHS: Record<RequestType, string> = {
    CAMPAIGN: '/campaigns:mutate',
    AD_SET: '/adGroups:mutate',
    AD: '/adGroupAds:mutate'
};

const MICROS = 1_000_000;

function mutate(resource: JsonObject): JsonObject {
    return { operations: [{ create: resource }] };
}

function encodeCampaign({ ticket, campaign }: EncodeInput): JsonObject {
    const config = ticket.payload;
    const customerId = requireString(config, 'customer_id');
    const budgetId = requireString(config, 'budget_id');

    const resource: JsonObject = {
        name: campaign.name,
        status: 'PAUSED',
        advertising_channel_type: typeof config.channel_type === 'string' ? config.channel_type : 'SEARCH',
        campaign_budget: `customers/${customerId}/campaignBudgets/${budgetId}`
    };

    if (config.bidding_strategy === 'TARGET_CPA') {
        const targetCpa = optionalAmount(config, 'target_cpa');
        resource.target_cpa = {
            target_cpa_micros: targetCpa ? toMinorUnits(targetCpa, MICROS) : 10 * MICROS
        };
    } else if (config.bidding_strategy === 'MAXIMIZE_CONVERSIONS') {
        resource.maximize_conversions = {};
    }

    if (isJsonObject(config.networks)) {
        resource.network_settings = config.networks;
    }

    return mutate(resource);
}

// The parent id is the resource name returned when the campaign/ad group was created
function encodeAdGroup({ ticket, campaign }: EncodeInput): JsonObject {
    const config = ticket.payload;
    const resource: JsonObject = {
        name: `${campaign.name}_AdGroup`,
        campaign: requireString(config, PARENT_ID_FIELD),
        status: 'ENABLED',
        type: typeof config.ad_group_type === 'string' ? config.ad_group_type : 'SEARCH_STANDARD'
    };
    const cpcBid = optionalAmount(config, 'cpc_bid');
    if (cpcBid) resource.cpc_bid_micros = toMinorUnits(cpcBid, MICROS);
    return mutate(resource);
}

function textAssets(value: unknown): JsonObject[] {
    if (!Array.isArray(value)) return [];
    return value.filter((v): v is string => typeof v === 'string').map(text => ({ text }));
}

function encodeAd({ ticket }: EncodeInput): JsonObject {
    const config = ticket.payload;
    return mutate({
        ad_group: requireString(config, PARENT_ID_FIELD),
        status: 'ENABLED',
        ad: {
            responsive_search_ad: {
                headlines: textAssets(config.headlines),
                descriptions: textAssets(config.descriptions),
                path1: typeof config.path1 === 'string' ? config.path1 : '',
                path2: typeof config.path2 === 'string' ? config.path2 : ''
            },
            final_urls: Array.isArray(config.final_urls) ? config.final_urls : []
        }
    });
}

export const googleAdapter: PlatformAdapter = {
    platform: 'google',

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

    // Google returns: {"results": [{"resourceName": "customers/1/campaigns/2"}]}
    extractExternalId(_requestType, body) {
        const results = isJsonObject(body) ? body.results : undefined;
        const first = Array.isArray(results) ? results[0] : undefined;
        if (isJsonObject(first) && typeof first.resourceName === 'string') {
            return first.resourceName;
        }
        throw new ExtractError('Google Ads response missing results[0].resourceName');
    },

    requiredFields: ['customer_id', 'budget_id'],
    geoRequirement: 'Google Ads payload must target geographic locations (geo_target_constants)',

    hasGeoTargeting(payload) {
        return nonEmptyList(payload.geo_target_constants);
    },

    collectTargetingIds(payload) {
        return idsFromList(payload.user_interest_ids);
    }
};
