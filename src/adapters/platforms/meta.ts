import { isJsonObject, JsonObject, RequestType, TicketPayload } from '../../core/contracts';
import { EncodeError, ExtractError } from '../../core/errors';
import { toMinorUnits } from '../../utils/decimal';
import {
    copyOptional, idsFromObjects, objectAt, optionalAmount, PARENT_ID_FIELD,
    requireString, requireValue
} from './payload_fields';
import { EncodeInput, PlatformAdapter } from './types';

/**
 * Meta Marketing API (Graph API v18).
 *   Campaign: POST /act_{ad_account_id}/campaigns
 *   Ad set:   POST /act_{ad_account_id}/adsets
 *   Ad:       POST /act_{ad_account_id}/ads
 * Money fields are sent in cents. Everything is created PAUSED.
 */

const PATHS: Record<RequestType, string> = {
    CAMPAIGN: '/campaigns',
    AD_SET: '/adsets',
    AD: '/ads'
};

function encodeCampaign({ ticket, campaign }: EncodeInput): JsonObject {
    const config = ticket.payload;
    requireString(config, 'ad_account_id');

    const payload: JsonObject = {
        name: campaign.name,
        objective: requireString(config, 'objective'),
        status: 'PAUSED',
        special_ad_categories: config.special_ad_categories ?? []
    };

    const spendCap = optionalAmount(config, 'spend_cap');
    if (spendCap) payload.spend_cap = toMinorUnits(spendCap, 100);
    copyOptional(payload, config, ['buying_type']);

    return payload;
}

function encodeAdSet({ ticket, campaign }: EncodeInput): JsonObject {
    const config = ticket.payload;

    const payload: JsonObject = {
        name: `${campaign.name}_AdSet`,
        campaign_id: requireString(config, PARENT_ID_FIELD),
        optimization_goal: requireString(config, 'optimization_goal'),
        billing_event: requireString(config, 'billing_event'),
        status: 'PAUSED',
        targeting: requireValue(config, 'targeting')
    };

    // Daily or lifetime budget
    const daily = optionalAmount(config, 'daily_budget');
    const lifetime = optionalAmount(config, 'lifetime_budget');
    if (daily) {
        payload.daily_budget = toMinorUnits(daily, 100);
    } else if (lifetime) {
        payload.lifetime_budget = toMinorUnits(lifetime, 100);
        copyOptional(payload, config, ['end_time']);
    } else {
        throw new EncodeError('payload must include either daily_budget or lifetime_budget');
    }

    const bid = optionalAmount(config, 'bid_amount');
    if (bid) payload.bid_amount = toMinorUnits(bid, 100);
    copyOptional(payload, config, ['promoted_object']);

    return payload;
}

function encodeAd({ ticket, campaign }: EncodeInput): JsonObject {
    const config = ticket.payload;
    const payload: JsonObject = {
        name: `${campaign.name}_Ad`,
        adset_id: requireString(config, PARENT_ID_FIELD),
        status: 'PAUSED',
        creative: requireValue(config, 'creative')
    };
    copyOptional(payload, config, ['tracking_specs']);
    return payload;
}

function collectTargetingIds(payload: TicketPayload): string[] {
    const targeting = objectAt(payload, 'targeting');
    if (!targeting) return [];

    const ids = [
        ...idsFromObjects(targeting.interests),
        ...idsFromObjects(targeting.behaviors)
    ];

    // flexible_spec: [{ interests: [{id}], behaviors: [{id}], ... }]
    const flexible = targeting.flexible_spec;
    if (Array.isArray(flexible)) {
        for (const spec of flexible) {
            if (!isJsonObject(spec)) continue;
            for (const value of Object.values(spec)) {
                ids.push(...idsFromObjects(value));
            }
        }
    }
    return ids;
}

export const metaAdapter: PlatformAdapter = {
    platform: 'meta',

    encode(input) {
        switch (input.ticket.requestType) {
            case 'CAMPAIGN': return encodeCampaign(input);
            case 'AD_SET': return encodeAdSet(input);
            case 'AD': return encodeAd(input);
        }
    },

    endpointPath(requestType) {
        return PATHS[requestType];
    },

    // Meta returns: {"id": "123456789"}
    extractExternalId(_requestType, body) {
        if (isJsonObject(body) && (typeof body.id === 'string' || typeof body.id === 'number')) {
            return String(body.id);
        }
        throw new ExtractError('Meta response missing id');
    },

    requiredFields: ['ad_account_id', 'objective', 'targeting'],
    geoRequirement: 'Meta payload must target geographic locations (targeting.geo_locations)',

    hasGeoTargeting(payload) {
        const geo = objectAt(payload, 'targeting')?.geo_locations;
        return isJsonObject(geo) && Object.keys(geo).length > 0;
    },

    collectTargetingIds
};
