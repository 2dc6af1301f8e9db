// ============================================================================
// APOD Publisher — random APOD → Instagram workflows
// ============================================================================
// Graph API:   verify account → random image APOD → publish by URL, with
//              retries on other random images and a final fallback to today.
// Unofficial:  login → random image APOD → download → upload bytes.
//
// Both return a PostOutcome instead of exiting; the scripts map it to an
// exit code ("skipped" is not a failure).
// ============================================================================

import { DEFAULT_IMAGE_ATTEMPTS, isImageApod } from './apod.service.js';
import { buildApodCaption, captionInputFromApod } from './caption.service.js';
import { downloadImage } from './instagram-media.service.js';
import { errorMessage } from '../errors.js';
import type { ApodClient } from './apod.service.js';
import type { InstagramGraphClient } from './instagram-graph.service.js';
import type { InstagramUnofficialClient } from './instagram-unofficial.service.js';
import type { ApodRecord } from '../types/nasa.types.js';
import type { DownloadedImage, PostOutcome } from '../types/instagram.types.js';

export const MAX_POST_ATTEMPTS = 3;
export const RETRY_DELAY_MS = 2000;

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export type ApodSource = Pick<ApodClient, 'getRandomImageApod' | 'getApod'>;

export interface GraphWorkflowDeps {
    apod: ApodSource;
    graph: Pick<InstagramGraphClient, 'getAccountInfo' | 'publishImage' | 'getPermalink'>;
    sleep?: (ms: number) => Promise<void>;
    maxPostAttempts?: number;
    imageAttempts?: number;
}

export interface UnofficialWorkflowDeps {
    apod: ApodSource;
    instagram: Pick<InstagramUnofficialClient, 'login' | 'uploadPhoto'>;
    download?: (url: string) => Promise<DownloadedImage>;
    imageAttempts?: number;
}

/** hdurl first, then url */
export function publicImageUrl(apod: ApodRecord): string | undefined {
    return apod.hdurl || apod.url;
}

function captionFor(apod: ApodRecord): string {
    const caption = buildApodCaption(captionInputFromApod(apod));
    console.log(`[Publisher] 📝 Caption preview: ${caption.slice(0, 100)}...`);
    return caption;
}

// ── Graph API ──────────────────────────────────────────────────────────────

export async function postRandomApodViaGraph(deps: GraphWorkflowDeps): Promise<PostOutcome> {
    const sleep = deps.sleep ?? defaultSleep;
    const maxPostAttempts = deps.maxPostAttempts ?? MAX_POST_ATTEMPTS;
    const imageAttempts = deps.imageAttempts ?? DEFAULT_IMAGE_ATTEMPTS;

    console.log('[Publisher] 🔍 Verifying Instagram account access...');
    try {
        const account = await deps.graph.getAccountInfo();
        console.log(`[Publisher] ✅ Connected to @${account.username ?? 'Unknown'} with ${account.mediaCount ?? 0} posts`);
    } catch (error) {
        return { status: 'failed', reason: `Failed to verify Instagram account access: ${errorMessage(error)}` };
    }

    console.log('[Publisher] 📡 Fetching a random Astronomy Picture of the Day...');
    const first = await deps.apod.getRandomImageApod(imageAttempts);
    if (!first.isImage) {
        const reason = `After ${first.attempts} attempts, couldn't find an image APOD`;
        console.warn(`[Publisher] ⚠️ ${reason}. Skipping Instagram post.`);
        return { status: 'skipped', reason };
    }

    let apod = first.apod;
    let lastError = '';

    for (let attempt = 1; attempt <= maxPostAttempts; attempt++) {
        const imageUrl = publicImageUrl(apod);
        if (imageUrl) {
            console.log(`[Publisher] 📸 Attempt ${attempt}/${maxPostAttempts}: posting "${apod.title}" (${apod.date})`);
            const result = await deps.graph.publishImage(imageUrl, captionFor(apod));
            if (result.ok) {
                const postUrl = await deps.graph.getPermalink(result.postId);
                return { status: 'posted', postId: result.postId, postUrl, apod, attempts: attempt, usedFallback: false };
            }
            lastError = result.error;
        } else {
            lastError = `APOD ${apod.date} has no image URL`;
        }

        console.warn(`[Publisher] ⚠️ Posting attempt ${attempt} failed: ${lastError}`);
        if (attempt === maxPostAttempts) break;

        console.log(`[Publisher] 🔄 Trying with a different random APOD... (${maxPostAttempts - attempt} attempts remaining)`);
        await sleep(RETRY_DELAY_MS);

        const next = await deps.apod.getRandomImageApod(imageAttempts);
        if (!next.isImage) {
            return { status: 'failed', reason: 'Could not find another image APOD' };
        }
        apod = next.apod;
    }

    console.error('[Publisher] ❌ Failed to post after multiple attempts with random APODs');
    console.log("[Publisher] 🎯 Trying one last time with today's APOD as fallback...");

    try {
        const today = await deps.apod.getApod();
        const imageUrl = publicImageUrl(today);
        if (!isImageApod(today) || !imageUrl) {
            return { status: 'failed', reason: `Posting failed (${lastError}) and today's APOD is not an image` };
        }

        const result = await deps.graph.publishImage(imageUrl, captionFor(today));
        if (result.ok) {
            console.log("[Publisher] ✅ Successfully posted today's APOD to Instagram!");
            const postUrl = await deps.graph.getPermalink(result.postId);
            return {
                status: 'posted',
                postId: result.postId,
                postUrl,
                apod: today,
                attempts: maxPostAttempts + 1,
                usedFallback: true,
            };
        }
        return { status: 'failed', reason: `Even today's APOD failed to post: ${result.error}` };
    } catch (error) {
        return { status: 'failed', reason: `Fallback to today's APOD failed: ${errorMessage(error)}` };
    }
}

// ── Unofficial client ──────────────────────────────────────────────────────

export async function postRandomApodUnofficial(deps: UnofficialWorkflowDeps): Promise<PostOutcome> {
    const download = deps.download ?? ((url: string) => downloadImage(url));

    console.log('[Publisher] 📱 Setting up Instagram client...');
    try {
        await deps.instagram.login();
    } catch (error) {
        return { status: 'failed', reason: `Failed to authenticate with Instagram: ${errorMessage(error)}` };
    }

    console.log('[Publisher] 📡 Fetching a random Astronomy Picture of the Day...');
    const picked = await deps.apod.getRandomImageApod(deps.imageAttempts ?? DEFAULT_IMAGE_ATTEMPTS);
    if (!picked.isImage) {
        const reason = `After ${picked.attempts} attempts, couldn't find an image APOD`;
        console.warn(`[Publisher] ⚠️ ${reason}. Skipping Instagram post.`);
        return { status: 'skipped', reason };
    }

    const { apod } = picked;
    const imageUrl = apod.url || apod.hdurl;
    if (!imageUrl) {
        return { status: 'failed', reason: 'No image URL found in APOD data' };
    }

    try {
        console.log('[Publisher] ⬇️  Downloading image...');
        const image = await download(imageUrl);
        const uploaded = await deps.instagram.uploadPhoto(image.buffer, captionFor(apod));
        return {
            status: 'posted',
            postId: uploaded.mediaId,
            postUrl: uploaded.postUrl,
            apod,
            attempts: 1,
            usedFallback: false,
        };
    } catch (error) {
        return { status: 'failed', reason: `Failed to post to Instagram: ${errorMessage(error)}` };
    }
}
