// Calendar-day helpers used by the NASA clients. Days are YYYY-MM-DD; the
// APOD archive turns over at midnight US Eastern time.

import { ValidationError } from '../errors.js';
import type { DateInput } from '../types/nasa.types.js';

const DAY_MS = 86_400_000;
const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

export function formatUtcDay(date: Date): string {
    const y = date.getUTCFullYear();
    const m = String(date.getUTCMonth() + 1).padStart(2, '0');
    const d = String(date.getUTCDate()).padStart(2, '0');
    return `${y}-${m}-${d}`;
}

export const APOD_TIME_ZONE = 'America/New_York';

const apodDayFormat = new Intl.DateTimeFormat('en-CA', {
    timeZone: APOD_TIME_ZONE,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
});

/** Current APOD day, i.e. today's date in US Eastern time */
export function apodToday(): string {
    return apodDayFormat.format(new Date());
}

export function addDays(day: string, delta: number): string {
    return formatUtcDay(new Date(Date.parse(`${day}T00:00:00Z`) + delta * DAY_MS));
}

/**
 * Normalizes a DateInput to YYYY-MM-DD, rejecting impossible days like
 * 2023-02-30.
 */
export function toIsoDay(input: DateInput, field = 'date'): string {
    if (input instanceof Date) {
        if (Number.isNaN(input.getTime())) throw new ValidationError(`${field} is an invalid Date`);
        return formatUtcDay(input);
    }

    const match = ISO_DAY.exec(input.trim());
    if (!match) {
        throw new ValidationError(`${field} must be in YYYY-MM-DD format, got "${input}"`);
    }
    const [, y, m, d] = match;
    const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
    const normalized = formatUtcDay(parsed);
    if (normalized !== `${y}-${m}-${d}`) {
        throw new ValidationError(`${field} is not a real calendar date: "${input}"`);
    }
    return normalized;
}

export function assertIntegerInRange(value: number, min: number, max: number, field: string): void {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ValidationError(`${field} must be an integer between ${min} and ${max}, got ${value}`);
    }
}
