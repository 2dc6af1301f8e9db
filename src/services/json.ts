// Narrowing helpers for upstream JSON payloads.

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return undefined;
}

/** Like asString, but blank strings count as absent. */
export function asNonEmptyString(value: unknown): string | undefined {
    const str = asString(value)?.trim();
    return str ? str : undefined;
}

export function asNumber(value: unknown): number | undefined {
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

export function asArray(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

export function asStringArray(value: unknown): string[] {
    return asArray(value)
        .map(asString)
        .filter((item): item is string => item !== undefined);
}
