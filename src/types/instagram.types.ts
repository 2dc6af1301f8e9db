// ============================================================================
// Instagram — Types
// ============================================================================

import type { ApodRecord } from './nasa.types.js';

// ── Media Limits ───────────────────────────────────────────────────────────

export interface ImageLimits {
    maxSizeBytes: number;
    allowedFormats: string[];
}

export interface MediaValidation {
    valid: boolean;
    errors: string[];
}

export interface DownloadedImage {
    buffer: Buffer;
    contentType: string;
    sizeBytes: number;
    sourceUrl: string;
}

// ── Caption ────────────────────────────────────────────────────────────────

export interface CaptionInput {
    title?: string;
    date?: string;
    explanation?: string;
    copyright?: string;
}

// ── Graph API ──────────────────────────────────────────────────────────────

export interface GraphClientOptions {
    accessToken: string;
    accountId?: string;
    apiVersion?: string;
    timeoutMs?: number;
    /** Wait between creating the media container and publishing it */
    processingDelayMs?: number;
    sleep?: (ms: number) => Promise<void>;
    /** Epoch milliseconds; used for token expiry arithmetic */
    now?: () => number;
}

export interface InstagramAccountInfo {
    id: string;
    username?: string;
    mediaCount?: number;
}

export type PublishStage = 'create' | 'publish';

export type PublishResult =
    | { ok: true; postId: string; creationId: string }
    | { ok: false; stage: PublishStage; error: string; creationId?: string };

export interface TokenDebugInfo {
    appId?: string;
    userId?: string;
    isValid: boolean;
    /** Unix seconds; 0 means the token never expires */
    expiresAt: number;
    scopes: string[];
    /** Whole days until expiry, undefined for non-expiring tokens */
    daysRemaining?: number;
}

export interface FacebookPage {
    id: string;
    name?: string;
    instagramAccountId?: string;
}

export interface LongLivedToken {
    accessToken: string;
    expiresIn: number;                        // seconds
}

// ── Unofficial client ──────────────────────────────────────────────────────

export interface IGCredentials {
    username: string;
    password: string;
}

export interface UnofficialClientOptions {
    credentials: IGCredentials;
    /** Defaults to INSTAGRAM_SESSION_FILE, then {DATA_DIR}/instagram_session.json */
    sessionFile?: string;
    /** SESSION_ENCRYPTION_KEY; the session file is stored in clear text without it */
    encryptionKey?: string;
    proxyUrl?: string;
    /**
     * Asked for a verification code when Instagram requires two-factor
     * login or a checkpoint challenge. Without it those logins fail.
     */
    promptCode?: (kind: VerificationKind) => Promise<string>;
}

export type VerificationKind = 'two-factor' | 'challenge';

export interface StoredSession {
    username: string;
    deviceSeed: string;
    cookies: string;                          // serialized cookie jar
    savedAt: string;                          // ISO 8601
}

export interface UploadedPhoto {
    mediaId: string;
    code: string;
    postUrl: string;
}

// ── Workflow outcomes ──────────────────────────────────────────────────────

export type PostOutcome =
    | {
        status: 'posted';
        postId: string;
        postUrl?: string;
        apod: ApodRecord;
        attempts: number;
        usedFallback: boolean;
    }
    | { status: 'skipped'; reason: string }
    | { status: 'failed'; reason: string };
