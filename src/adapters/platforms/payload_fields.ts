import { isJsonObject, JsonObject, JsonValue, TicketPayload } from '../../core/contracts';
import { EncodeError } from '../../core/errors';
import { parseDecimal } from '../../utils/decimal';
import Decimal from 'decimal.js';

// Ad sets and ads hang off an already-created parent object on the platform
export const PARENT_ID_FIELD = 'parent_external_id';

export function isPresent(value: JsonValue | undefined): value is JsonValue {
    return value !== undefined && value !== null;
}

export function firstMissingField(payload: TicketPayload, fields: readonly string[]): string | null {
    for (const field of fields) {
        if (!isPresent(payload[field])) return field;
    }
    return null;
}

export function requireValue(payload: TicketPayload, field: string): JsonValue {
    const value = payload[field];
    if (!isPresent(value) || value === '') {
        throw new EncodeError(`payload missing required field: ${field}`);
    }
    return value;
}

export function requireString(payload: TicketPayload, field: string): string {
    const value = requireValue(payload, field);
    if (typeof value !== 'string' && typeof value !== 'number') {
        throw new EncodeError(`payload field ${field} must be a string`);
    }
    return String(value);
}

export function requireAmount(payload: TicketPayload, field: string): Decimal {
    const amount = parseDecimal(requireValue(payload, field));
    if (!amount) {
        throw new EncodeError(`payload field ${field} must be a decimal amount`);
    }
    return amount;
}

export function optionalAmount(payload: TicketPayload, field: string): Decimal | null {
    const value = payload[field];
    if (!isPresent(value)) return null;
    const amount = parseDecimal(value);
    if (!amount) {
        throw new EncodeError(`payload field ${field} must be a decimal amount`);
    }
    return amount;
}

/** Copy the listed keys verbatim when present. */
export function copyOptional(target: JsonObject, payload: TicketPayload, fields: readonly string[]): void {
    for (const field of fields) {
        const value = payload[field];
        if (isPresent(value)) target[field] = value;
    }
}

/** Ids from a flat list: ["100002", 6003] */
export function idsFromList(value: JsonValue | undefined): string[] {
    if (!Array.isArray(value)) return [];
    return value
        .filter((v): v is string | number => typeof v === 'string' || typeof v === 'number')
        .map(v => String(v));
}

/** Ids from a list of objects: [{ id: "6003", name: "Alcohol" }] */
export function idsFromObjects(value: JsonValue | undefined): string[] {
    if (!Array.isArray(value)) return [];
    const ids: string[] = [];
    for (const item of value) {
        if (isJsonObject(item) && (typeof item.id === 'string' || typeof item.id === 'number')) {
            ids.push(String(item.id));
        }
    }
    return ids;
}

export function objectAt(payload: TicketPayload, field: string): JsonObject | null {
    const value = payload[field];
    return isJsonObject(value) ? value : null;
}

export function nonEmptyList(value: JsonValue | undefined): boolean {
    return Array.isArray(value) && value.length > 0;
}
