import Decimal from 'decimal.js';

const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;

/**
 * Parse a monetary amount without going through binary floating point.
 * Accepts finite numbers and plain decimal strings ("150000", "100000.01").
 */
export function parseDecimal(value: unknown): Decimal | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? new Decimal(value) : null;
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return NUMERIC_STRING.test(trimmed) ? new Decimal(trimmed) : null;
    }
    return null;
}

/** 150000 -> "150,000", 100000.01 -> "100,000.01" */
export function formatAmount(amount: Decimal): string {
    const [whole, fraction] = amount.toFixed().split('.');
    const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
    return fraction ? `${grouped}.${fraction}` : grouped;
}

/** Major units to integer minor units (e.g. dollars to cents). */
export function toMinorUnits(amount: Decimal, factor: number): number {
    return amount.times(factor).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber();
}
