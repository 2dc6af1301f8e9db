// ============================================================================
// Token Diagnostics — what is wrong with the Graph API configuration?
// ============================================================================
// 1. debug_token on the access token
// 2. account lookup across several API versions
// 3. Facebook Page discovery, to find the right INSTAGRAM_ACCOUNT_ID
// ============================================================================

import { ApiError, errorMessage } from '../errors.js';
import { describeGraphError } from './instagram-graph.service.js';
import type { InstagramGraphClient } from './instagram-graph.service.js';
import type { FacebookPage, InstagramAccountInfo, TokenDebugInfo } from '../types/instagram.types.js';

export const DIAGNOSTIC_API_VERSIONS = ['v18.0', 'v19.0', 'v20.0'] as const;

type DiagnosticClient = Pick<InstagramGraphClient, 'debugToken' | 'getAccountInfo' | 'listPages' | 'getPageInstagramAccount'>;

/** Builds a client for one API version */
export type ClientForVersion = (apiVersion: string) => DiagnosticClient;

export type TokenCheck =
    | { valid: true; info: TokenDebugInfo }
    | { valid: false; error: string };

export type AccountCheck =
    | { accessible: true; version: string; account: InstagramAccountInfo }
    | { accessible: false; errors: Array<{ version: string; message: string; code?: number }> };

export async function checkAccessToken(client: DiagnosticClient): Promise<TokenCheck> {
    try {
        const info = await client.debugToken();
        console.log('✅ Token data received');
        console.log(`   App ID: ${info.appId ?? 'N/A'}`);
        console.log(`   User ID: ${info.userId ?? 'N/A'}`);
        console.log(`   Is Valid: ${info.isValid}`);
        console.log(`   Expires At: ${info.expiresAt > 0 ? new Date(info.expiresAt * 1000).toISOString() : 'Never'}`);
        if (info.daysRemaining !== undefined) console.log(`   Days Remaining: ${info.daysRemaining}`);
        console.log(`   Scopes: ${info.scopes.length > 0 ? info.scopes.join(', ') : 'None'}`);

        if (!info.isValid) return { valid: false, error: 'debug_token reports the token as invalid' };
        return { valid: true, info };
    } catch (error) {
        console.log(`❌ Token validation failed: ${errorMessage(error)}`);
        return { valid: false, error: errorMessage(error) };
    }
}

/**
 * Tries the account lookup with each API version and stops at the first
 * one that works.
 */
export async function checkAccountAccess(
    clientFor: ClientForVersion,
    versions: readonly string[] = DIAGNOSTIC_API_VERSIONS
): Promise<AccountCheck> {
    const errors: Array<{ version: string; message: string; code?: number }> = [];

    for (const version of versions) {
        console.log(`\nTrying API version: ${version}`);
        try {
            const account = await clientFor(version).getAccountInfo();
            console.log(`✅ Successfully accessed account with ${version}!`);
            console.log(`   ID: ${account.id}`);
            console.log(`   Username: ${account.username ?? 'N/A'}`);
            console.log(`   Media Count: ${account.mediaCount ?? 'N/A'}`);
            return { accessible: true, version, account };
        } catch (error) {
            const code = error instanceof ApiError ? error.code : undefined;
            console.log(`❌ Failed with ${version}`);
            console.log(`   Error Code: ${code ?? 'N/A'}`);
            if (error instanceof ApiError && error.type) console.log(`   Error Type: ${error.type}`);
            console.log(`   Error Message: ${errorMessage(error)}`);

            const diagnosis = describeGraphError(code);
            if (diagnosis.length > 0) {
                console.log('');
                for (const line of diagnosis) console.log(`💡 ${line}`);
            }
            errors.push({ version, message: errorMessage(error), code });
        }
    }

    return { accessible: false, errors };
}

/**
 * Lists the Facebook Pages the token can see and the Instagram account
 * linked to each.
 */
export async function discoverPages(client: DiagnosticClient): Promise<FacebookPage[]> {
    let pages: FacebookPage[];
    try {
        pages = await client.listPages();
    } catch (error) {
        console.log(`❌ Failed to get pages: ${errorMessage(error)}`);
        return [];
    }

    if (pages.length === 0) {
        console.log('❌ No Facebook pages found');
        console.log('💡 Your token may not have the pages_show_list permission');
        return [];
    }

    console.log(`✅ Found ${pages.length} Facebook page(s):`);
    const result: FacebookPage[] = [];
    for (const page of pages) {
        console.log(`\n   Page: ${page.name ?? 'N/A'}`);
        console.log(`   ID: ${page.id}`);

        let instagramAccountId = page.instagramAccountId;
        if (!instagramAccountId) {
            try {
                instagramAccountId = await client.getPageInstagramAccount(page.id);
            } catch (error) {
                console.log(`   ❌ Error getting Instagram account: ${errorMessage(error)}`);
            }
        }

        if (instagramAccountId) {
            console.log(`   📸 Instagram Account ID: ${instagramAccountId}`);
            console.log('   ✅ This is your INSTAGRAM_ACCOUNT_ID!');
        } else {
            console.log('   ❌ No Instagram account linked to this page');
        }
        result.push({ ...page, instagramAccountId });
    }
    return result;
}
