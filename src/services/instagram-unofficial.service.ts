// ============================================================================
// Instagram Unofficial Service — instagram-private-api
// ============================================================================
// Emulates the Instagram Android app to post straight to the feed.
// Username/password login, no OAuth and no Business account required.
//
// The session (device seed + cookie jar) is kept in a JSON file so that
// scheduled runs do not log in from scratch every time. With
// SESSION_ENCRYPTION_KEY set the file is stored AES-256-GCM encrypted.
//
// ⚠️  Automated logins go against Instagram's terms of use and the account
//     can be challenged or banned. The Graph API workflow is the safer path.
// ============================================================================

import path from 'path';
import { IgApiClient } from 'instagram-private-api';
import { INSTAGRAM_SESSION_FILE } from '../config.js';
import { ClientError, ValidationError, errorMessage } from '../errors.js';
import { decrypt, deriveKey, encrypt, isEncrypted } from './crypto.service.js';
import { getDataDir, readFileSafe, writeFileAtomic } from './data-dir.js';
import { asNonEmptyString, isRecord } from './json.js';
import type {
    IGCredentials,
    StoredSession,
    UnofficialClientOptions,
    UploadedPhoto,
    VerificationKind,
} from '../types/instagram.types.js';

// ── instagram-private-api surface ──────────────────────────────────────────
// The subset of IgApiClient this module drives. Tests provide their own.

export interface IgLoggedInUser {
    pk: number | string;
    username: string;
}

export interface IgClient {
    state: {
        proxyUrl: string;
        generateDevice(seed: string): void;
        serializeCookieJar(): Promise<unknown>;
        deserializeCookieJar(cookies: string): Promise<void>;
    };
    simulate: {
        preLoginFlow(): Promise<unknown>;
    };
    account: {
        login(username: string, password: string): Promise<IgLoggedInUser>;
        twoFactorLogin(options: {
            username: string;
            verificationCode: string;
            twoFactorIdentifier: string;
            verificationMethod?: string;
            trustThisDevice?: string;
        }): Promise<IgLoggedInUser>;
        currentUser(): Promise<IgLoggedInUser>;
    };
    challenge: {
        auto(reset?: boolean): Promise<unknown>;
        sendSecurityCode(code: string): Promise<unknown>;
    };
    publish: {
        photo(options: { file: Buffer; caption: string }): Promise<{ media: { id: string; code: string } }>;
    };
}

export type IgClientFactory = () => IgClient;

const defaultFactory: IgClientFactory = () => new IgApiClient();

export const DEFAULT_SESSION_FILENAME = 'instagram_session.json';

export function resolveSessionFile(explicit?: string): string {
    return explicit || INSTAGRAM_SESSION_FILE() || path.join(getDataDir(), DEFAULT_SESSION_FILENAME);
}

export function instagramPostUrl(code: string): string {
    return `https://www.instagram.com/p/${code}/`;
}

// ── Session file ───────────────────────────────────────────────────────────

export function parseStoredSession(text: string): StoredSession {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (err) {
        throw new ClientError('Session file is not valid JSON', { cause: err });
    }

    const username = isRecord(data) ? asNonEmptyString(data.username) : undefined;
    const deviceSeed = isRecord(data) ? asNonEmptyString(data.deviceSeed) : undefined;
    const cookies = isRecord(data) ? asNonEmptyString(data.cookies) : undefined;
    if (!isRecord(data) || !username || !deviceSeed || !cookies) {
        throw new ClientError('Session file is missing username, deviceSeed or cookies');
    }

    return {
        username,
        deviceSeed,
        cookies,
        savedAt: asNonEmptyString(data.savedAt) ?? '',
    };
}

// ── Login errors ───────────────────────────────────────────────────────────

function errorName(error: unknown): string {
    return error instanceof Error ? error.name : '';
}

/**
 * two_factor_info from an IgLoginTwoFactorRequiredError response body.
 */
function twoFactorInfo(error: unknown): { identifier: string; totp: boolean } | undefined {
    if (!isRecord(error) || !isRecord(error.response) || !isRecord(error.response.body)) return undefined;
    const info = error.response.body.two_factor_info;
    if (!isRecord(info)) return undefined;

    const identifier = asNonEmptyString(info.two_factor_identifier);
    return identifier ? { identifier, totp: info.totp_two_factor_on === true } : undefined;
}

function logVerificationHelp(): void {
    console.error('[IG-Unofficial] Instagram requires verification (2FA or challenge). This cannot be automated.');
    console.error('[IG-Unofficial] Run the create-instagram-session script locally and answer the prompt,');
    console.error('[IG-Unofficial] then ship the resulting session file with INSTAGRAM_SESSION_FILE.');
}

// ── Client ─────────────────────────────────────────────────────────────────

export class InstagramUnofficialClient {
    readonly sessionFile: string;
    private readonly credentials: IGCredentials;
    private readonly key?: Buffer;
    private readonly proxyUrl?: string;
    private readonly promptCode?: (kind: VerificationKind) => Promise<string>;
    private readonly createClient: IgClientFactory;
    private ig: IgClient | null = null;

    constructor(options: UnofficialClientOptions, createClient: IgClientFactory = defaultFactory) {
        if (!options.credentials.username) {
            throw new ValidationError('INSTAGRAM_USERNAME is required');
        }
        this.credentials = options.credentials;
        this.sessionFile = resolveSessionFile(options.sessionFile);
        this.key = options.encryptionKey ? deriveKey(options.encryptionKey) : undefined;
        this.proxyUrl = options.proxyUrl || undefined;
        this.promptCode = options.promptCode;
        this.createClient = createClient;
    }

    get isLoggedIn(): boolean {
        return this.ig !== null;
    }

    private newClient(): IgClient {
        const ig = this.createClient();
        if (this.proxyUrl) ig.state.proxyUrl = this.proxyUrl;
        return ig;
    }

    /**
     * Restores the saved session when it is still accepted, otherwise logs
     * in with the password and saves a new session file.
     */
    async login(): Promise<IgLoggedInUser> {
        const restored = await this.restoreSession();
        if (restored) return restored;
        return this.loginWithPassword();
    }

    private readSession(): StoredSession | null {
        const text = readFileSafe(this.sessionFile);
        if (text === null) return null;

        if (isEncrypted(text)) {
            if (!this.key) {
                throw new ClientError('Session file is encrypted but SESSION_ENCRYPTION_KEY is not set');
            }
            return parseStoredSession(decrypt(text, this.key));
        }
        return parseStoredSession(text);
    }

    private async restoreSession(): Promise<IgLoggedInUser | null> {
        let session: StoredSession | null;
        try {
            session = this.readSession();
        } catch (err) {
            console.warn(`[IG-Unofficial] ⚠️ Could not read session file ${this.sessionFile}: ${errorMessage(err)}`);
            return null;
        }
        if (!session) return null;

        if (session.username.toLowerCase() !== this.credentials.username.toLowerCase()) {
            console.warn(`[IG-Unofficial] ⚠️ Session file belongs to @${session.username}, ignoring it`);
            return null;
        }

        const ig = this.newClient();
        try {
            ig.state.generateDevice(session.deviceSeed);
            await ig.state.deserializeCookieJar(session.cookies);
            const user = await ig.account.currentUser();
            this.ig = ig;
            console.log(`[IG-Unofficial] ✓ Session restored: @${user.username} (saved ${session.savedAt || 'unknown'})`);
            return user;
        } catch (err) {
            console.warn(`[IG-Unofficial] ⚠️ Saved session rejected, logging in again: ${errorMessage(err)}`);
            return null;
        }
    }

    private async loginWithPassword(): Promise<IgLoggedInUser> {
        const { username, password } = this.credentials;
        if (!password) {
            throw new ValidationError('INSTAGRAM_PASSWORD is required when there is no valid session file');
        }

        const ig = this.newClient();
        ig.state.generateDevice(username);

        let user: IgLoggedInUser;
        try {
            await ig.simulate.preLoginFlow();
            user = await ig.account.login(username, password);
        } catch (err) {
            user = await this.resolveLoginError(ig, err);
        }

        this.ig = ig;
        console.log(`[IG-Unofficial] ✓ Login OK: @${user.username} (pk=${user.pk})`);
        await this.saveSession(ig, username);
        return user;
    }

    private async resolveLoginError(ig: IgClient, err: unknown): Promise<IgLoggedInUser> {
        const name = errorName(err);
        const { username } = this.credentials;

        if (name === 'IgLoginTwoFactorRequiredError') {
            const info = twoFactorInfo(err);
            if (this.promptCode && info) {
                const code = await this.promptCode('two-factor');
                return ig.account.twoFactorLogin({
                    username,
                    verificationCode: code.trim(),
                    twoFactorIdentifier: info.identifier,
                    verificationMethod: info.totp ? '0' : '1',
                    trustThisDevice: '1',
                });
            }
            logVerificationHelp();
            throw new ClientError(`Instagram requires two-factor verification for @${username}`, { cause: err });
        }

        if (name === 'IgCheckpointError' || /challenge/i.test(errorMessage(err))) {
            if (this.promptCode) {
                await ig.challenge.auto(true);
                const code = await this.promptCode('challenge');
                await ig.challenge.sendSecurityCode(code.trim());
                return ig.account.currentUser();
            }
            logVerificationHelp();
            throw new ClientError(`Instagram raised a security challenge for @${username}`, { cause: err });
        }

        if (name === 'IgLoginBadPasswordError') {
            throw new ClientError(`Instagram rejected the password for @${username}`, { cause: err });
        }

        throw new ClientError(`Instagram login failed: ${errorMessage(err)}`, { cause: err });
    }

    private async saveSession(ig: IgClient, deviceSeed: string): Promise<void> {
        const session: StoredSession = {
            username: this.credentials.username,
            deviceSeed,
            cookies: JSON.stringify(await ig.state.serializeCookieJar()),
            savedAt: new Date().toISOString(),
        };

        const json = JSON.stringify(session, null, 2);
        writeFileAtomic(this.sessionFile, this.key ? encrypt(json, this.key) : json);
        console.log(`[IG-Unofficial] 💾 Session saved to ${this.sessionFile}${this.key ? ' (encrypted)' : ''}`);
    }

    // ── Publishing ─────────────────────────────────────────────────────────

    async uploadPhoto(image: Buffer, caption: string): Promise<UploadedPhoto> {
        if (!this.ig) {
            throw new ClientError('Not logged in to Instagram, call login() first');
        }

        const result = await this.ig.publish.photo({ file: image, caption });
        const mediaId = result.media.id;
        const code = result.media.code;
        const postUrl = instagramPostUrl(code);

        console.log(`[IG-Unofficial] ✅ Photo published: ${mediaId} (${postUrl})`);
        return { mediaId, code, postUrl };
    }
}
