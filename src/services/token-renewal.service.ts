// ============================================================================
// Token Renewal Service — long-lived Graph API token upkeep
// ============================================================================
// debug_token → renew when ≤ RENEWAL_THRESHOLD_DAYS remain (or the expiry
// cannot be read) → verify the new token with debug_token again.
// The new token is returned to the caller, never logged in full.
// ============================================================================

import { errorMessage } from '../errors.js';
import type { InstagramGraphClient } from './instagram-graph.service.js';
import type { LongLivedToken } from '../types/instagram.types.js';

export const RENEWAL_THRESHOLD_DAYS = 7;

/** Where the scripts write a full access token, inside the data directory */
export const ACCESS_TOKEN_FILENAME = 'instagram_access_token.txt';

type TokenClient = Pick<InstagramGraphClient, 'debugToken' | 'exchangeForLongLivedToken'>;

export interface TokenExpiry {
    needsRenewal: boolean;
    daysRemaining?: number;
    expiresAt?: Date;
}

export type RenewalOutcome =
    | { status: 'not-needed'; daysRemaining: number }
    | { status: 'renewed'; token: LongLivedToken; daysRemaining?: number }
    | { status: 'failed'; reason: string };

export interface RenewalDeps {
    current: TokenClient;
    /** Client authenticated with the renewed token, used to verify it */
    clientFor: (accessToken: string) => Pick<InstagramGraphClient, 'debugToken'>;
    appId: string;
    appSecret: string;
}

/**
 * Reads the expiry through debug_token. Anything unreadable counts as
 * needing renewal.
 */
export async function checkTokenExpiry(client: Pick<InstagramGraphClient, 'debugToken'>): Promise<TokenExpiry> {
    try {
        const info = await client.debugToken();
        if (info.daysRemaining === undefined) {
            console.error('[Token] ❌ Could not determine token expiry');
            return { needsRenewal: true };
        }

        const expiresAt = new Date(info.expiresAt * 1000);
        console.log(`[Token] 🔍 Current token expires: ${expiresAt.toISOString()}`);
        console.log(`[Token] ⏰ Days remaining: ${info.daysRemaining}`);

        return {
            needsRenewal: info.daysRemaining <= RENEWAL_THRESHOLD_DAYS,
            daysRemaining: info.daysRemaining,
            expiresAt,
        };
    } catch (error) {
        console.error(`[Token] ❌ Error checking token expiry: ${errorMessage(error)}`);
        return { needsRenewal: true };
    }
}

export async function renewTokenIfNeeded(deps: RenewalDeps): Promise<RenewalOutcome> {
    const expiry = await checkTokenExpiry(deps.current);
    if (!expiry.needsRenewal && expiry.daysRemaining !== undefined) {
        console.log(`[Token] ✅ Token is still valid for ${expiry.daysRemaining} days - no renewal needed`);
        return { status: 'not-needed', daysRemaining: expiry.daysRemaining };
    }

    let token: LongLivedToken;
    try {
        console.log('[Token] 🔄 Attempting to renew access token...');
        token = await deps.current.exchangeForLongLivedToken(deps.appId, deps.appSecret);
    } catch (error) {
        return { status: 'failed', reason: `Token renewal failed: ${errorMessage(error)}` };
    }
    console.log(`[Token] ✅ Successfully renewed token, valid for ${Math.floor(token.expiresIn / 86_400)} days`);

    console.log('[Token] 🧪 Testing new token...');
    const verified = await checkTokenExpiry(deps.clientFor(token.accessToken));
    if (verified.daysRemaining === undefined || verified.daysRemaining <= 0) {
        return { status: 'failed', reason: 'New token verification failed' };
    }

    console.log('[Token] ✅ New token verified and working!');
    return { status: 'renewed', token, daysRemaining: verified.daysRemaining };
}
