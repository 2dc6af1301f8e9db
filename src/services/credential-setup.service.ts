// ============================================================================
// Credential Setup — pieces of the interactive Graph API setup wizard
// ============================================================================
// The wizard itself lives in scripts/setup-instagram-credentials.ts; the
// parts here do not touch stdin so they can be tested.
// ============================================================================

import { maskToken } from '../errors.js';
import type { InstagramGraphClient } from './instagram-graph.service.js';
import type { FacebookPage } from '../types/instagram.types.js';

const DAY_SECONDS = 86_400;

export type TokenKind = 'short-lived' | 'long-lived' | 'help';

export interface SetupSecrets {
    accessToken: string;
    accountId: string;
    appId: string;
    appSecret: string;
}

/** Menu answer "1" / "2" / "3" */
export function parseTokenChoice(answer: string): TokenKind | undefined {
    switch (answer.trim()) {
        case '1':
            return 'short-lived';
        case '2':
            return 'long-lived';
        case '3':
            return 'help';
        default:
            return undefined;
    }
}

export const TOKEN_HELP: readonly string[] = [
    '1. Open the Graph API Explorer: https://developers.facebook.com/tools/explorer',
    '2. Select your app in the dropdown (top right)',
    '3. Under Permissions add instagram_basic, instagram_content_publish, pages_read_engagement, pages_show_list',
    "4. Click 'Generate Access Token'",
    '5. Copy the token and run this script again',
];

/**
 * Exchanges a short-lived token for a ~60-day one.
 */
export async function toLongLivedToken(
    client: Pick<InstagramGraphClient, 'exchangeForLongLivedToken'>,
    appId: string,
    appSecret: string,
    shortLivedToken: string
): Promise<{ accessToken: string; daysValid: number }> {
    const exchanged = await client.exchangeForLongLivedToken(appId, appSecret, shortLivedToken);
    return { accessToken: exchanged.accessToken, daysValid: Math.floor(exchanged.expiresIn / DAY_SECONDS) };
}

/** Distinct Instagram account ids linked to the pages, in page order */
export function linkedAccountIds(pages: FacebookPage[]): string[] {
    const ids: string[] = [];
    for (const page of pages) {
        if (page.instagramAccountId && !ids.includes(page.instagramAccountId)) ids.push(page.instagramAccountId);
    }
    return ids;
}

/**
 * Secret name → value as it may be printed. Ids are shown in full, the
 * token and app secret only masked.
 */
export function describeSecrets(secrets: SetupSecrets): Array<{ name: string; value: string }> {
    return [
        { name: 'INSTAGRAM_ACCESS_TOKEN', value: maskToken(secrets.accessToken) },
        { name: 'INSTAGRAM_ACCOUNT_ID', value: secrets.accountId },
        { name: 'FACEBOOK_APP_ID', value: secrets.appId },
        { name: 'FACEBOOK_APP_SECRET', value: maskToken(secrets.appSecret) },
    ];
}
