// ============================================================================
// APOD Service — Astronomy Picture of the Day
// ============================================================================
// GET https://api.nasa.gov/planetary/apod
//  - single day (today by default)
//  - random picks (count)
//  - date ranges / recent days
//  - "retry until image" for posting workflows
// ============================================================================

import { resolveNasaApiKey } from '../config.js';
import { ApiError, ValidationError } from '../errors.js';
import { DEFAULT_TIMEOUT_MS, requestJson, type QueryParams } from './http.js';
import { addDays, apodToday, assertIntegerInRange, toIsoDay } from './dates.js';
import { asNonEmptyString, asString, isRecord } from './json.js';
import type {
    ApodMediaType,
    ApodQuery,
    ApodRecord,
    DateInput,
    NasaClientOptions,
    RandomImageResult,
} from '../types/nasa.types.js';

export const APOD_ENDPOINT = 'https://api.nasa.gov/planetary/apod';

/** First day in the APOD archive */
export const APOD_FIRST_DATE = '1995-06-16';

export const MAX_APOD_COUNT = 100;
export const DEFAULT_IMAGE_ATTEMPTS = 5;

// ── Mapping ────────────────────────────────────────────────────────────────

function toMediaType(value: unknown): ApodMediaType {
    return value === 'image' || value === 'video' ? value : 'other';
}

export function mapApod(raw: unknown): ApodRecord {
    if (!isRecord(raw)) {
        throw new ApiError('Unexpected APOD payload', {
            url: APOD_ENDPOINT,
            status: 200,
            bodyText: JSON.stringify(raw ?? null).slice(0, 200),
        });
    }

    return {
        title: asString(raw.title) ?? '',
        date: asString(raw.date) ?? '',
        explanation: asString(raw.explanation) ?? '',
        mediaType: toMediaType(raw.media_type),
        url: asNonEmptyString(raw.url),
        hdurl: asNonEmptyString(raw.hdurl),
        copyright: asNonEmptyString(raw.copyright)?.replace(/\s+/g, ' '),
        thumbnailUrl: asNonEmptyString(raw.thumbnail_url),
        serviceVersion: asNonEmptyString(raw.service_version),
    };
}

function mapApodList(raw: unknown): ApodRecord[] {
    return Array.isArray(raw) ? raw.map(mapApod) : [mapApod(raw)];
}

export function isImageApod(apod: ApodRecord): boolean {
    return apod.mediaType === 'image';
}

export function isVideoApod(apod: ApodRecord): boolean {
    return apod.mediaType === 'video';
}

/** Public HTML page of an APOD day, e.g. https://apod.nasa.gov/apod/ap230101.html */
export function apodPageUrl(date: string): string {
    return `https://apod.nasa.gov/apod/ap${date.replace(/-/g, '').slice(2)}.html`;
}

// ── Client ─────────────────────────────────────────────────────────────────

export class ApodClient {
    private readonly apiKey: string;
    private readonly timeoutMs: number;

    constructor(options: NasaClientOptions = {}) {
        this.apiKey = resolveNasaApiKey(options.apiKey);
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    private async get(params: QueryParams): Promise<unknown> {
        return requestJson(APOD_ENDPOINT, {
            params: { api_key: this.apiKey, ...params },
            timeoutMs: this.timeoutMs,
        });
    }

    private archiveDay(input: DateInput, field: string): string {
        const day = toIsoDay(input, field);
        const today = apodToday();
        if (day < APOD_FIRST_DATE || day > today) {
            throw new ValidationError(`${field} must be between ${APOD_FIRST_DATE} and ${today}, got ${day}`);
        }
        return day;
    }

    /**
     * APOD for one day (today when no date is given).
     */
    async getApod(query: ApodQuery = {}): Promise<ApodRecord> {
        const params: QueryParams = {};
        if (query.date !== undefined) params.date = this.archiveDay(query.date, 'date');
        if (query.hd !== undefined) params.hd = query.hd;
        if (query.thumbs !== undefined) params.thumbs = query.thumbs;

        return mapApod(await this.get(params));
    }

    async getRandomApod(): Promise<ApodRecord> {
        const [apod] = await this.getRandomApods(1);
        if (!apod) {
            throw new ApiError('APOD returned no random entry', { url: APOD_ENDPOINT, status: 200 });
        }
        return apod;
    }

    async getRandomApods(count: number): Promise<ApodRecord[]> {
        assertIntegerInRange(count, 1, MAX_APOD_COUNT, 'count');
        return mapApodList(await this.get({ count }));
    }

    /**
     * Every APOD between two days, inclusive. endDate defaults to today.
     */
    async getApodRange(startDate: DateInput, endDate?: DateInput): Promise<ApodRecord[]> {
        const start = this.archiveDay(startDate, 'startDate');
        const end = endDate === undefined ? undefined : this.archiveDay(endDate, 'endDate');
        if (end !== undefined && start > end) {
            throw new ValidationError(`startDate (${start}) must not be after endDate (${end})`);
        }

        return mapApodList(await this.get({ start_date: start, end_date: end }));
    }

    /**
     * The last `days` APODs ending today, oldest first.
     */
    async getRecentApods(days = 7): Promise<ApodRecord[]> {
        assertIntegerInRange(days, 1, MAX_APOD_COUNT, 'days');
        const end = apodToday();
        const start = addDays(end, -(days - 1));

        const records = mapApodList(await this.get({ start_date: start, end_date: end }));
        return records.sort((a, b) => a.date.localeCompare(b.date));
    }

    /**
     * Fetches random APODs until one is an image, at most `maxAttempts`
     * times. When every attempt is a video the last one is returned with
     * isImage=false.
     */
    async getRandomImageApod(maxAttempts = DEFAULT_IMAGE_ATTEMPTS): Promise<RandomImageResult> {
        assertIntegerInRange(maxAttempts, 1, MAX_APOD_COUNT, 'maxAttempts');

        let apod: ApodRecord | null = null;
        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            apod = await this.getRandomApod();
            console.log(`[APOD] ✓ Retrieved APOD: ${apod.title} (${apod.date}, ${apod.mediaType})`);

            if (isImageApod(apod)) {
                return { apod, isImage: true, attempts: attempt };
            }
            console.log(`[APOD]   Attempt ${attempt}/${maxAttempts}: got ${apod.mediaType}, trying again...`);
        }

        if (!apod) {
            throw new ApiError('APOD returned no random entry', { url: APOD_ENDPOINT, status: 200 });
        }
        return { apod, isImage: false, attempts: maxAttempts };
    }
}
