// ============================================================================
// Instagram Graph Service — Meta Graph API (official)
// ============================================================================
// Implements:
//  - Two-step image publish: Create Container → wait → Publish
//  - Account lookup and Facebook Page discovery
//  - Token introspection (debug_token) and long-lived token exchange
//
// Requires an Instagram Business/Creator account linked to a Facebook Page.
// Images are published from a public URL; nothing is uploaded from disk.
// ============================================================================

import { DEFAULT_GRAPH_API_VERSION } from '../config.js';
import { ApiError, ValidationError, errorMessage, redactUrl } from '../errors.js';
import { DEFAULT_TIMEOUT_MS, buildUrl, readJson, send, type QueryParams } from './http.js';
import { asArray, asNonEmptyString, asNumber, asString, asStringArray, isRecord, type JsonRecord } from './json.js';
import type {
    FacebookPage,
    GraphClientOptions,
    InstagramAccountInfo,
    LongLivedToken,
    PublishResult,
    TokenDebugInfo,
} from '../types/instagram.types.js';

export const GRAPH_API_HOST = 'https://graph.facebook.com';

/** Instagram needs a moment to fetch and process the image before publishing */
export const DEFAULT_PROCESSING_DELAY_MS = 3000;

/** 60 days, used when the exchange response has no expires_in */
const DEFAULT_LONG_LIVED_EXPIRES_IN = 5_184_000;

const DAY_MS = 86_400_000;

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

// ── Errors ─────────────────────────────────────────────────────────────────

function graphError(url: string, status: number, error: JsonRecord): ApiError {
    const message = asString(error.message) ?? 'Unknown Graph API error';
    return new ApiError(`Graph API error: ${message}`, {
        url,
        status,
        bodyText: JSON.stringify({ error }),
        code: asNumber(error.code),
        type: asString(error.type),
        fbtraceId: asString(error.fbtrace_id),
    });
}

/**
 * Human guidance for the Graph API error codes that show up when the
 * token or account id is misconfigured.
 */
export function describeGraphError(code: number | undefined): string[] {
    switch (code) {
        case 190:
            return [
                'DIAGNOSIS: Invalid or expired access token',
                '→ Your token needs to be renewed (run the renew-instagram-token script)',
            ];
        case 100:
            return [
                'DIAGNOSIS: Invalid Instagram Account ID',
                '→ The account ID may be wrong',
                "→ Make sure you're using the Instagram Business Account ID, not the Page ID",
            ];
        case 10:
            return [
                'DIAGNOSIS: Permission denied',
                "→ Your token doesn't have the required permissions",
                '→ Required: instagram_basic, instagram_content_publish, pages_show_list',
            ];
        default:
            return [];
    }
}

// ── Client ─────────────────────────────────────────────────────────────────

export class InstagramGraphClient {
    readonly apiVersion: string;
    private readonly accessToken: string;
    private readonly accountId?: string;
    private readonly timeoutMs: number;
    private readonly processingDelayMs: number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => number;

    constructor(options: GraphClientOptions) {
        if (!options.accessToken) {
            throw new ValidationError('An Instagram access token is required');
        }
        this.accessToken = options.accessToken;
        this.accountId = options.accountId || undefined;
        this.apiVersion = options.apiVersion ?? DEFAULT_GRAPH_API_VERSION;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.processingDelayMs = options.processingDelayMs ?? DEFAULT_PROCESSING_DELAY_MS;
        this.sleep = options.sleep ?? defaultSleep;
        this.now = options.now ?? Date.now;
    }

    get baseUrl(): string {
        return `${GRAPH_API_HOST}/${this.apiVersion}`;
    }

    private requireAccountId(): string {
        if (!this.accountId) {
            throw new ValidationError('INSTAGRAM_ACCOUNT_ID is required for this operation');
        }
        return this.accountId;
    }

    /**
     * One Graph API call. GET sends parameters in the query string, POST as a
     * JSON body. An `error` object in the body always becomes ApiError,
     * whatever the status code.
     */
    private async call(
        method: 'GET' | 'POST',
        path: string,
        params: QueryParams = {},
        authenticate = true
    ): Promise<JsonRecord> {
        const withToken: QueryParams = authenticate ? { ...params, access_token: this.accessToken } : params;
        const url = method === 'GET'
            ? buildUrl(`${this.baseUrl}/${path}`, withToken)
            : `${this.baseUrl}/${path}`;

        const response = await send(url, {
            method,
            body: method === 'POST' ? withToken : undefined,
            timeoutMs: this.timeoutMs,
        });

        const data = await readJson(url, response, this.timeoutMs);
        const body: JsonRecord = isRecord(data) ? data : {};

        if (isRecord(body.error)) {
            throw graphError(url, response.status, body.error);
        }
        if (!response.ok) {
            throw new ApiError(`HTTP ${response.status} for ${redactUrl(url)}`, {
                url,
                status: response.status,
                bodyText: JSON.stringify(data ?? null),
            });
        }
        return body;
    }

    // ── Account ────────────────────────────────────────────────────────────

    async getAccountInfo(): Promise<InstagramAccountInfo> {
        const accountId = this.requireAccountId();
        const data = await this.call('GET', accountId, { fields: 'id,username,media_count' });

        return {
            id: asString(data.id) ?? accountId,
            username: asNonEmptyString(data.username),
            mediaCount: asNumber(data.media_count),
        };
    }

    /**
     * Facebook Pages visible to the token, with the linked Instagram
     * Business Account when there is one.
     */
    async listPages(): Promise<FacebookPage[]> {
        const data = await this.call('GET', 'me/accounts', { fields: 'id,name,instagram_business_account' });

        return asArray(data.data)
            .filter(isRecord)
            .map(page => ({
                id: asString(page.id) ?? '',
                name: asNonEmptyString(page.name),
                instagramAccountId: isRecord(page.instagram_business_account)
                    ? asNonEmptyString(page.instagram_business_account.id)
                    : undefined,
            }))
            .filter(page => page.id !== '');
    }

    async getPageInstagramAccount(pageId: string): Promise<string | undefined> {
        const data = await this.call('GET', pageId, { fields: 'instagram_business_account' });
        return isRecord(data.instagram_business_account)
            ? asNonEmptyString(data.instagram_business_account.id)
            : undefined;
    }

    // ── Publishing ─────────────────────────────────────────────────────────

    /**
     * POST /{account}/media, returns the creation id ('' when missing).
     */
    async createMediaContainer(imageUrl: string, caption: string): Promise<string> {
        const accountId = this.requireAccountId();
        const data = await this.call('POST', `${accountId}/media`, { image_url: imageUrl, caption });
        return asString(data.id) ?? '';
    }

    /**
     * POST /{account}/media_publish, returns the post id ('' when missing).
     */
    async publishContainer(creationId: string): Promise<string> {
        const accountId = this.requireAccountId();
        const data = await this.call('POST', `${accountId}/media_publish`, { creation_id: creationId });
        return asString(data.id) ?? '';
    }

    /**
     * Create Container → wait processingDelayMs → Publish.
     * API failures are reported in the result, never thrown.
     */
    async publishImage(imageUrl: string, caption: string): Promise<PublishResult> {
        let creationId: string;
        try {
            console.log('[IG-Graph] 📤 Creating Instagram media object...');
            creationId = await this.createMediaContainer(imageUrl, caption);
        } catch (error) {
            console.error(`[IG-Graph] ❌ Media object creation failed: ${errorMessage(error)}`);
            return { ok: false, stage: 'create', error: errorMessage(error) };
        }

        if (!creationId) {
            console.error('[IG-Graph] ❌ Failed to get creation ID from media upload');
            return { ok: false, stage: 'create', error: 'No creation id in response' };
        }
        console.log(`[IG-Graph] ✅ Media object created with ID: ${creationId}`);

        console.log('[IG-Graph] ⏳ Waiting for Instagram to process the media...');
        await this.sleep(this.processingDelayMs);

        let postId: string;
        try {
            console.log('[IG-Graph] 📱 Publishing to Instagram...');
            postId = await this.publishContainer(creationId);
        } catch (error) {
            console.error(`[IG-Graph] ❌ Publish failed: ${errorMessage(error)}`);
            return { ok: false, stage: 'publish', error: errorMessage(error), creationId };
        }

        if (!postId) {
            console.error('[IG-Graph] ❌ Failed to publish media');
            return { ok: false, stage: 'publish', error: 'No post id in response', creationId };
        }

        console.log(`[IG-Graph] ✅ Successfully published to Instagram! Post ID: ${postId}`);
        return { ok: true, postId, creationId };
    }

    async getPermalink(mediaId: string): Promise<string | undefined> {
        try {
            const data = await this.call('GET', mediaId, { fields: 'permalink' });
            return asNonEmptyString(data.permalink);
        } catch (error) {
            console.warn(`[IG-Graph] ⚠️ Permalink lookup failed for ${mediaId}: ${errorMessage(error)}`);
            return undefined;
        }
    }

    // ── Tokens ─────────────────────────────────────────────────────────────

    /**
     * GET /debug_token, inspecting `inputToken` (defaults to the client's
     * own token) with the client's token.
     */
    async debugToken(inputToken: string = this.accessToken): Promise<TokenDebugInfo> {
        const body = await this.call('GET', 'debug_token', { input_token: inputToken });
        if (!isRecord(body.data)) {
            throw new ApiError('Token data not found in response', {
                url: `${this.baseUrl}/debug_token`,
                status: 200,
                bodyText: JSON.stringify(body),
            });
        }

        const data = body.data;
        const expiresAt = asNumber(data.expires_at) ?? 0;

        return {
            appId: asNonEmptyString(data.app_id),
            userId: asNonEmptyString(data.user_id),
            isValid: data.is_valid === true,
            expiresAt,
            scopes: asStringArray(data.scopes),
            daysRemaining: expiresAt > 0
                ? Math.floor((expiresAt * 1000 - this.now()) / DAY_MS)
                : undefined,
        };
    }

    /**
     * GET /oauth/access_token with grant_type=fb_exchange_token.
     * Turns a short-lived token into a ~60-day one, or extends a long-lived
     * token.
     */
    async exchangeForLongLivedToken(appId: string, appSecret: string, token: string = this.accessToken): Promise<LongLivedToken> {
        if (!appId || !appSecret) {
            throw new ValidationError('FACEBOOK_APP_ID and FACEBOOK_APP_SECRET are required to exchange tokens');
        }

        const data = await this.call('GET', 'oauth/access_token', {
            grant_type: 'fb_exchange_token',
            client_id: appId,
            client_secret: appSecret,
            fb_exchange_token: token,
        }, false);

        const accessToken = asNonEmptyString(data.access_token);
        if (!accessToken) {
            throw new ApiError('No access token in renewal response', {
                url: `${this.baseUrl}/oauth/access_token`,
                status: 200,
            });
        }

        return {
            accessToken,
            expiresIn: asNumber(data.expires_in) || DEFAULT_LONG_LIVED_EXPIRES_IN,
        };
    }
}
