import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
    RETRY_DELAY_MS,
    postRandomApodUnofficial,
    postRandomApodViaGraph,
    publicImageUrl,
    type ApodSource,
    type GraphWorkflowDeps,
} from '../apod-publisher.service.js';
import { silenceConsole } from './fetch-stub.js';
import type { ApodRecord, RandomImageResult } from '../../types/nasa.types.js';
import type { PublishResult } from '../../types/instagram.types.js';

function apod(overrides: Partial<ApodRecord> = {}): ApodRecord {
    return {
        title: 'Orion Nebula',
        date: '2020-02-02',
        explanation: 'Stars are born here.',
        mediaType: 'image',
        url: 'https://apod.nasa.gov/apod/image/orion_small.jpg',
        hdurl: 'https://apod.nasa.gov/apod/image/orion.jpg',
        ...overrides,
    };
}

function imageResult(record: ApodRecord, attempts = 1): RandomImageResult {
    return { apod: record, isImage: record.mediaType === 'image', attempts };
}

const published: PublishResult = { ok: true, postId: 'post-1', creationId: 'container-1' };
const rejected: PublishResult = { ok: false, stage: 'publish', error: 'Media not ready', creationId: 'container-1' };

function fakeApod(results: RandomImageResult[], today: ApodRecord = apod({ title: 'Today', date: '2024-05-01' })) {
    const getRandomImageApod = vi.fn((_maxAttempts?: number): Promise<RandomImageResult> =>
        Promise.reject(new Error('No more random results')));
    for (const result of results) getRandomImageApod.mockResolvedValueOnce(result);
    const getApod = vi.fn(() => Promise.resolve(today));
    const source: ApodSource = { getRandomImageApod, getApod };
    return { source, getRandomImageApod, getApod };
}

function fakeGraph(publishResults: PublishResult[]) {
    const publishImage = vi.fn((_imageUrl: string, _caption: string): Promise<PublishResult> =>
        Promise.reject(new Error('No more publish results')));
    for (const result of publishResults) publishImage.mockResolvedValueOnce(result);
    const graph: GraphWorkflowDeps['graph'] = {
        getAccountInfo: vi.fn(() => Promise.resolve({ id: 'ig-1', username: 'apod_daily', mediaCount: 3 })),
        publishImage,
        getPermalink: vi.fn(() => Promise.resolve('https://www.instagram.com/p/abc/')),
    };
    return { graph, publishImage };
}

describe('publicImageUrl', () => {
    it('prefers hdurl over url', () => {
        expect(publicImageUrl(apod())).toBe('https://apod.nasa.gov/apod/image/orion.jpg');
        expect(publicImageUrl(apod({ hdurl: undefined }))).toBe('https://apod.nasa.gov/apod/image/orion_small.jpg');
    });
});

describe('postRandomApodViaGraph', () => {
    beforeEach(() => {
        silenceConsole();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('posts the first random image', async () => {
        const { source } = fakeApod([imageResult(apod())]);
        const { graph, publishImage } = fakeGraph([published]);

        const outcome = await postRandomApodViaGraph({ apod: source, graph, sleep: vi.fn(() => Promise.resolve()) });

        expect(outcome).toMatchObject({ status: 'posted', postId: 'post-1', attempts: 1, usedFallback: false, postUrl: 'https://www.instagram.com/p/abc/' });
        expect(publishImage.mock.calls[0]?.[0]).toBe('https://apod.nasa.gov/apod/image/orion.jpg');
        expect(publishImage.mock.calls[0]?.[1]).toContain('🌟 Orion Nebula');
    });

    it('skips when no image APOD turns up', async () => {
        const { source } = fakeApod([imageResult(apod({ mediaType: 'video' }), 5)]);
        const { graph, publishImage } = fakeGraph([]);

        const outcome = await postRandomApodViaGraph({ apod: source, graph });

        expect(outcome).toEqual({ status: 'skipped', reason: "After 5 attempts, couldn't find an image APOD" });
        expect(publishImage).not.toHaveBeenCalled();
    });

    it('fails before fetching anything when the account cannot be reached', async () => {
        const { source, getRandomImageApod } = fakeApod([]);
        const { graph } = fakeGraph([]);
        graph.getAccountInfo = vi.fn(() => Promise.reject(new Error('Invalid OAuth access token')));

        const outcome = await postRandomApodViaGraph({ apod: source, graph });

        expect(outcome).toEqual({ status: 'failed', reason: 'Failed to verify Instagram account access: Invalid OAuth access token' });
        expect(getRandomImageApod).not.toHaveBeenCalled();
    });

    it('retries with another random image after waiting', async () => {
        const sleep = vi.fn(() => Promise.resolve());
        const { source, getRandomImageApod } = fakeApod([imageResult(apod()), imageResult(apod({ title: 'Second' }))]);
        const { graph, publishImage } = fakeGraph([rejected, published]);

        const outcome = await postRandomApodViaGraph({ apod: source, graph, sleep });

        expect(outcome).toMatchObject({ status: 'posted', attempts: 2, usedFallback: false, apod: { title: 'Second' } });
        expect(sleep).toHaveBeenCalledWith(RETRY_DELAY_MS);
        expect(getRandomImageApod).toHaveBeenCalledTimes(2);
        expect(publishImage).toHaveBeenCalledTimes(2);
    });

    it("falls back to today's APOD after three failed attempts", async () => {
        const { source, getApod } = fakeApod([imageResult(apod()), imageResult(apod()), imageResult(apod())]);
        const { graph, publishImage } = fakeGraph([rejected, rejected, rejected, published]);

        const outcome = await postRandomApodViaGraph({ apod: source, graph, sleep: vi.fn(() => Promise.resolve()) });

        expect(outcome).toMatchObject({ status: 'posted', usedFallback: true, attempts: 4, apod: { title: 'Today' } });
        expect(getApod).toHaveBeenCalledTimes(1);
        expect(publishImage).toHaveBeenCalledTimes(4);
    });

    it("fails when today's APOD is a video", async () => {
        const { source } = fakeApod(
            [imageResult(apod()), imageResult(apod()), imageResult(apod())],
            apod({ mediaType: 'video', title: 'Today' })
        );
        const { graph, publishImage } = fakeGraph([rejected, rejected, rejected]);

        const outcome = await postRandomApodViaGraph({ apod: source, graph, sleep: vi.fn(() => Promise.resolve()) });

        expect(outcome).toEqual({ status: 'failed', reason: "Posting failed (Media not ready) and today's APOD is not an image" });
        expect(publishImage).toHaveBeenCalledTimes(3);
    });

    it('fails when the retry cannot find another image', async () => {
        const { source } = fakeApod([imageResult(apod()), imageResult(apod({ mediaType: 'video' }), 5)]);
        const { graph } = fakeGraph([rejected]);

        const outcome = await postRandomApodViaGraph({ apod: source, graph, sleep: vi.fn(() => Promise.resolve()) });

        expect(outcome).toEqual({ status: 'failed', reason: 'Could not find another image APOD' });
    });
});

describe('postRandomApodUnofficial', () => {
    beforeEach(() => {
        silenceConsole();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('downloads the standard-resolution image and uploads it', async () => {
        const { source } = fakeApod([imageResult(apod())]);
        const buffer = Buffer.from([0xff, 0xd8, 0xff, 0x00]);
        const download = vi.fn((url: string) => Promise.resolve({ buffer, contentType: 'image/jpeg', sizeBytes: 4, sourceUrl: url }));
        const instagram = {
            login: vi.fn(() => Promise.resolve({ pk: 1, username: 'apod_daily' })),
            uploadPhoto: vi.fn(() => Promise.resolve({ mediaId: 'media-1', code: 'abc', postUrl: 'https://www.instagram.com/p/abc/' })),
        };

        const outcome = await postRandomApodUnofficial({ apod: source, instagram, download });

        expect(download).toHaveBeenCalledWith('https://apod.nasa.gov/apod/image/orion_small.jpg');
        expect(instagram.uploadPhoto).toHaveBeenCalledTimes(1);
        expect(outcome).toMatchObject({ status: 'posted', postId: 'media-1', postUrl: 'https://www.instagram.com/p/abc/' });
    });

    it('reports a login failure', async () => {
        const { source, getRandomImageApod } = fakeApod([]);
        const instagram = {
            login: vi.fn(() => Promise.reject(new Error('challenge_required'))),
            uploadPhoto: vi.fn(() => Promise.resolve({ mediaId: '', code: '', postUrl: '' })),
        };

        const outcome = await postRandomApodUnofficial({ apod: source, instagram });

        expect(outcome).toEqual({ status: 'failed', reason: 'Failed to authenticate with Instagram: challenge_required' });
        expect(getRandomImageApod).not.toHaveBeenCalled();
    });
});
