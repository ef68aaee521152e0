import { NamingSpec } from '../../core/contracts';
import { ValidationError } from '../../core/errors';

/**
 * Campaign naming taxonomy:
 *   [BRAND]_[MARKET]_[PLATFORM]_[YEAR]_[Label]
 * e.g. DIS_US_META_2026_MoanaLaunch
 *
 * generateCampaignName and validateCampaignName must accept the same shape:
 * anything the first produces, the second accepts.
 */

const CODE_PATTERN = /^[A-Z0-9]+$/;
const YEAR_PATTERN = /^\d{4}$/;
const NAME_PATTERN = /^[A-Z0-9]+_[A-Z0-9]+_[A-Z0-9]+_\d{4}_[A-Za-z0-9]+$/;

export function sanitizeLabel(label: string): string {
    return label.replace(/[^A-Za-z0-9]/g, '');
}

function normalizeCode(field: string, raw: string): string {
    const code = raw.trim().toUpperCase();
    if (!CODE_PATTERN.test(code)) {
        throw new ValidationError('InvalidCode', `Invalid ${field}: '${raw}'. Must be alphanumeric.`);
    }
    return code;
}

export function generateCampaignName(spec: NamingSpec, now: Date = new Date()): string {
    const brand = normalizeCode('brand code', spec.brandCode);
    const market = normalizeCode('market code', spec.marketCode);
    const platform = normalizeCode('platform code', spec.platformCode);

    const year = spec.year ?? now.getFullYear();
    if (!Number.isInteger(year) || !YEAR_PATTERN.test(String(year))) {
        throw new ValidationError('InvalidYear', `Invalid year: ${year}. Must be a 4-digit year.`);
    }

    const label = sanitizeLabel(spec.label);
    if (!label) {
        throw new ValidationError('InvalidLabel', 'Campaign label must contain at least one alphanumeric character');
    }

    return `${brand}_${market}_${platform}_${year}_${label}`;
}

export function validateCampaignName(name: string): boolean {
    return NAME_PATTERN.test(name);
}
