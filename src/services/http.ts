// ============================================================================
// HTTP — fetch wrapper shared by every client
// ============================================================================
// Fixed per-request timeout, JSON parsing and mapping of failures onto the
// ApiError family. No retries here: callers decide what to retry.
// ============================================================================

import { ApiError, RequestTimeoutError, redactUrl } from '../errors.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
    method?: 'GET' | 'POST';
    params?: QueryParams;
    body?: Record<string, unknown>;
    timeoutMs?: number;
    headers?: Record<string, string>;
}

export function buildUrl(base: string, params: QueryParams = {}): string {
    const url = new URL(base);
    for (const [key, value] of Object.entries(params)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
    }
    return url.toString();
}

function isTimeout(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('name' in error)) return false;
    return error.name === 'TimeoutError' || error.name === 'AbortError';
}

function transportError(url: string, timeoutMs: number, error: unknown): ApiError {
    if (isTimeout(error)) return new RequestTimeoutError(url, timeoutMs);
    return new ApiError(`Network error for ${redactUrl(url)}: ${error instanceof Error ? error.message : String(error)}`, {
        url,
        status: 0,
        cause: error,
    });
}

/**
 * Sends a request and returns the raw Response, mapping network failures and
 * timeouts to ApiError. Status codes are not checked here.
 */
export async function send(url: string, options: RequestOptions = {}): Promise<Response> {
    const { method = 'GET', body, timeoutMs = DEFAULT_TIMEOUT_MS } = options;
    const headers: Record<string, string> = { Accept: 'application/json', ...options.headers };
    if (body) headers['Content-Type'] = 'application/json';

    try {
        return await fetch(url, {
            method,
            headers,
            body: body ? JSON.stringify(body) : undefined,
            signal: AbortSignal.timeout(timeoutMs),
        });
    } catch (error) {
        throw transportError(url, timeoutMs, error);
    }
}

/**
 * Runs a body read (text, arrayBuffer ...). The request's timeout signal
 * stays armed while the body streams in, so failures here map the same way
 * as in send().
 */
export async function readBody<T>(url: string, read: () => Promise<T>, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<T> {
    try {
        return await read();
    } catch (error) {
        throw transportError(url, timeoutMs, error);
    }
}

/**
 * Reads the body of a response as JSON. Non-JSON bodies raise ApiError with
 * the first 200 characters of the text.
 */
export async function readJson(url: string, response: Response, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<unknown> {
    const text = await readBody(url, () => response.text(), timeoutMs);
    if (!text) return undefined;
    try {
        return JSON.parse(text);
    } catch {
        throw new ApiError(`Non-JSON response from ${redactUrl(url)}`, {
            url,
            status: response.status,
            bodyText: text.slice(0, 200),
        });
    }
}

/**
 * GET/POST returning parsed JSON. Any non-2xx status raises ApiError.
 * The payload is returned as `unknown`; each client narrows it.
 */
export async function requestJson(base: string, options: RequestOptions = {}): Promise<unknown> {
    const url = buildUrl(base, options.params);
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const response = await send(url, options);

    if (!response.ok) {
        const text = await readBody(url, () => response.text(), timeoutMs);
        throw new ApiError(`HTTP ${response.status} for ${redactUrl(url)}`, {
            url,
            status: response.status,
            bodyText: text,
        });
    }

    return readJson(url, response, timeoutMs);
}
