import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApiError, RequestTimeoutError, maskToken, redactUrl } from '../../errors.js';
import { buildUrl, requestJson } from '../http.js';
import { calledInit, calledUrl, jsonResponse, stubFetch } from './fetch-stub.js';

describe('redactUrl', () => {
    it('masks credential query parameters and keeps the rest', () => {
        expect(redactUrl('https://api.nasa.gov/planetary/apod?api_key=test-key&date=2024-01-01'))
            .toBe('https://api.nasa.gov/planetary/apod?api_key=***&date=2024-01-01');
    });

    it('returns unparsable input unchanged', () => {
        expect(redactUrl('not a url')).toBe('not a url');
    });
});

describe('maskToken', () => {
    it('keeps the first and last eight characters of long tokens', () => {
        expect(maskToken('abcdefgh-1234567890-ijklmnop')).toBe('abcdefgh...ijklmnop');
    });

    it('hides short tokens entirely', () => {
        expect(maskToken('short-token')).toBe('***MASKED***');
    });
});

describe('buildUrl', () => {
    it('skips undefined parameters', () => {
        expect(buildUrl('https://example.test/path', { a: 1, b: undefined, c: true }))
            .toBe('https://example.test/path?a=1&c=true');
    });
});

describe('requestJson', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('returns the parsed body on success', async () => {
        const fetchMock = stubFetch(jsonResponse({ ok: 1 }));

        await expect(requestJson('https://example.test/data', { params: { q: 'mars' } })).resolves.toEqual({ ok: 1 });
        expect(calledUrl(fetchMock).searchParams.get('q')).toBe('mars');
        expect(calledInit(fetchMock).method).toBe('GET');
    });

    it('raises ApiError with status and body on non-2xx, with the key redacted', async () => {
        stubFetch(new Response('rate limited', { status: 429 }));

        const error = await requestJson('https://example.test/data', { params: { api_key: 'test-key' } })
            .catch((err: unknown) => err);

        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({
            status: 429,
            bodyText: 'rate limited',
            message: 'HTTP 429 for https://example.test/data?api_key=***',
        });
    });

    it('raises ApiError on a non-JSON body', async () => {
        stubFetch(new Response('<html>oops</html>', { status: 200 }));

        await expect(requestJson('https://example.test/data')).rejects.toMatchObject({
            message: 'Non-JSON response from https://example.test/data',
            bodyText: '<html>oops</html>',
        });
    });

    it('maps timeouts to RequestTimeoutError', async () => {
        const timeout = new Error('The operation was aborted due to timeout');
        timeout.name = 'TimeoutError';
        vi.stubGlobal('fetch', vi.fn(() => Promise.reject(timeout)));

        const error = await requestJson('https://example.test/slow', { timeoutMs: 50 }).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RequestTimeoutError);
        expect(error).toMatchObject({ status: 0, timeoutMs: 50 });
    });

    it('maps network failures to ApiError with status 0', async () => {
        vi.stubGlobal('fetch', vi.fn(() => Promise.reject(new TypeError('fetch failed'))));

        await expect(requestJson('https://example.test/down')).rejects.toMatchObject({
            status: 0,
            message: 'Network error for https://example.test/down: fetch failed',
        });
    });

    it('maps a timeout while reading the body to RequestTimeoutError', async () => {
        const timeout = new Error('The operation was aborted due to timeout');
        timeout.name = 'TimeoutError';
        const response = jsonResponse({ ok: 1 });
        vi.spyOn(response, 'text').mockRejectedValue(timeout);
        stubFetch(response);

        const error = await requestJson('https://example.test/slow-body', { timeoutMs: 50 }).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RequestTimeoutError);
        expect(error).toMatchObject({ status: 0, timeoutMs: 50 });
    });

    it('maps a connection reset during an error body to ApiError with status 0', async () => {
        const response = new Response('partial', { status: 502 });
        vi.spyOn(response, 'text').mockRejectedValue(new TypeError('terminated'));
        stubFetch(response);

        await expect(requestJson('https://example.test/reset')).rejects.toMatchObject({
            status: 0,
            message: 'Network error for https://example.test/reset: terminated',
        });
    });
});
