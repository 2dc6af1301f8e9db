// ============================================================================
// TechTransfer Service — NASA patents, software and spinoffs
// ============================================================================
// GET https://api.nasa.gov/techtransfer/{category}/?{query}&api_key=...
//
// Rows come back as positional arrays, not objects:
//  [0] id  [1] case number  [2] title  [3] description  [4] reference
//  [5] category  [6..8] category-specific  [9] NASA center  [10] image URL
// Titles and descriptions carry <span class="highlight"> markup around
// matched terms.
// ============================================================================

import { resolveNasaApiKey } from '../config.js';
import { ValidationError, errorMessage } from '../errors.js';
import { DEFAULT_TIMEOUT_MS, requestJson } from './http.js';
import { asArray, asNonEmptyString, asNumber, isRecord, type JsonRecord } from './json.js';
import type {
    NasaClientOptions,
    PatentRecord,
    SoftwareRecord,
    SpinoffRecord,
    TechTransferCategory,
    TechTransferRecord,
    TechTransferSearchAllEntry,
    TechTransferSearchOptions,
    TechTransferSearchResult,
} from '../types/nasa.types.js';

export const TECHTRANSFER_BASE = 'https://api.nasa.gov/techtransfer';

export const TECHTRANSFER_CATEGORIES: readonly TechTransferCategory[] = ['patent', 'software', 'spinoff'];

export const MAX_TECHTRANSFER_LIMIT = 100;

// ── Mapping ────────────────────────────────────────────────────────────────

export function stripMarkup(text: string): string {
    return text
        .replace(/<[^>]*>/g, '')
        .replace(/&amp;/g, '&')
        .replace(/&quot;/g, '"')
        .replace(/&#39;/g, "'")
        .replace(/\s+/g, ' ')
        .trim();
}

function cell(row: unknown[], index: number): string | undefined {
    const value = asNonEmptyString(row[index]);
    return value === undefined ? undefined : stripMarkup(value) || undefined;
}

function baseFields(row: unknown[]) {
    return {
        id: cell(row, 0) ?? '',
        title: cell(row, 2) ?? '',
        description: cell(row, 3) ?? '',
        category: cell(row, 5),
        center: cell(row, 9),
        imageUrl: asNonEmptyString(row[10]),
    };
}

export function mapPatentRow(row: unknown[]): PatentRecord {
    return {
        kind: 'patent',
        ...baseFields(row),
        caseNumber: cell(row, 1),
        patentNumber: cell(row, 4),
    };
}

export function mapSoftwareRow(row: unknown[]): SoftwareRecord {
    return {
        kind: 'software',
        ...baseFields(row),
        caseNumber: cell(row, 1),
        releaseType: cell(row, 6),
        softwareUrl: asNonEmptyString(row[8]),
    };
}

export function mapSpinoffRow(row: unknown[]): SpinoffRecord {
    return {
        kind: 'spinoff',
        ...baseFields(row),
        company: cell(row, 6),
        state: cell(row, 7),
        publicationYear: cell(row, 8),
    };
}

export function mapSearchResult<T extends TechTransferRecord>(
    raw: unknown,
    mapRow: (row: unknown[]) => T,
    requestedPage: number,
    limit?: number
): TechTransferSearchResult<T> {
    const body: JsonRecord = isRecord(raw) ? raw : {};
    const rows = asArray(body.results).filter(Array.isArray).map(mapRow);
    const count = asNumber(body.count) ?? rows.length;

    return {
        results: limit === undefined ? rows : rows.slice(0, limit),
        count,
        total: asNumber(body.total) ?? count,
        page: asNumber(body.page) ?? requestedPage,
        perPage: asNumber(body.perpage) ?? rows.length,
    };
}

// ── Client ─────────────────────────────────────────────────────────────────

export class TechTransferClient {
    private readonly apiKey: string;
    private readonly timeoutMs: number;

    constructor(options: NasaClientOptions = {}) {
        this.apiKey = resolveNasaApiKey(options.apiKey);
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    getCategories(): TechTransferCategory[] {
        return [...TECHTRANSFER_CATEGORIES];
    }

    private validate(query: string, options: TechTransferSearchOptions): { query: string; page: number } {
        const trimmed = query.trim();
        if (!trimmed) throw new ValidationError('query must not be empty');

        const { limit, page = 1 } = options;
        if (limit !== undefined && (!Number.isInteger(limit) || limit < 1 || limit > MAX_TECHTRANSFER_LIMIT)) {
            throw new ValidationError(`limit must be an integer between 1 and ${MAX_TECHTRANSFER_LIMIT}, got ${limit}`);
        }
        if (!Number.isInteger(page) || page < 1) {
            throw new ValidationError(`page must be a positive integer, got ${page}`);
        }
        return { query: trimmed, page };
    }

    private async search<T extends TechTransferRecord>(
        category: TechTransferCategory,
        query: string,
        options: TechTransferSearchOptions,
        mapRow: (row: unknown[]) => T
    ): Promise<TechTransferSearchResult<T>> {
        const checked = this.validate(query, options);

        // The search term is the bare query string key (?engine&api_key=...),
        // so the URL is assembled by hand instead of through URLSearchParams.
        const url = `${TECHTRANSFER_BASE}/${category}/?${encodeURIComponent(checked.query)}`
            + `&api_key=${encodeURIComponent(this.apiKey)}&page=${checked.page}`;

        const raw = await requestJson(url, { timeoutMs: this.timeoutMs });
        return mapSearchResult(raw, mapRow, checked.page, options.limit);
    }

    searchPatents(query: string, options: TechTransferSearchOptions = {}): Promise<TechTransferSearchResult<PatentRecord>> {
        return this.search('patent', query, options, mapPatentRow);
    }

    searchSoftware(query: string, options: TechTransferSearchOptions = {}): Promise<TechTransferSearchResult<SoftwareRecord>> {
        return this.search('software', query, options, mapSoftwareRow);
    }

    searchSpinoffs(query: string, options: TechTransferSearchOptions = {}): Promise<TechTransferSearchResult<SpinoffRecord>> {
        return this.search('spinoff', query, options, mapSpinoffRow);
    }

    /**
     * Searches every category in turn. A failing category is reported in
     * place and does not stop the others.
     */
    async searchAll(query: string, options: Pick<TechTransferSearchOptions, 'limit'> = {}): Promise<TechTransferSearchAllEntry[]> {
        this.validate(query, options);
        const searches: Record<TechTransferCategory, () => Promise<TechTransferSearchAllEntry>> = {
            patent: async () => ({ category: 'patent', result: await this.searchPatents(query, options) }),
            software: async () => ({ category: 'software', result: await this.searchSoftware(query, options) }),
            spinoff: async () => ({ category: 'spinoff', result: await this.searchSpinoffs(query, options) }),
        };

        const entries: TechTransferSearchAllEntry[] = [];
        for (const category of TECHTRANSFER_CATEGORIES) {
            try {
                entries.push(await searches[category]());
            } catch (error) {
                console.warn(`[TechTransfer] ⚠️ ${category} search failed: ${errorMessage(error)}`);
                entries.push({ category, error: errorMessage(error) });
            }
        }

        return entries;
    }
}
