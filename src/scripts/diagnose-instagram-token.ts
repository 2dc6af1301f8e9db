// ============================================================================
// Instagram token & account diagnostic
// ============================================================================
// Usage: npm run instagram:diagnose
// ============================================================================

import '../env.js';

import { GRAPH_API_VERSION, INSTAGRAM_ACCESS_TOKEN, INSTAGRAM_ACCOUNT_ID } from '../config.js';
import { maskToken } from '../errors.js';
import { InstagramGraphClient } from '../services/instagram-graph.service.js';
import {
    checkAccessToken,
    checkAccountAccess,
    discoverPages,
} from '../services/token-diagnostics.service.js';
import { RULE, banner, runMain } from './cli.js';

runMain(async () => {
    banner('🏥 Instagram Access Token & Account Diagnostic');

    const accessToken = INSTAGRAM_ACCESS_TOKEN();
    const accountId = INSTAGRAM_ACCOUNT_ID();

    if (!accessToken) {
        console.error('❌ INSTAGRAM_ACCESS_TOKEN not found in environment');
        console.error("💡 Set it with: export INSTAGRAM_ACCESS_TOKEN='your_token'");
        return 1;
    }

    console.log(`Token: ${maskToken(accessToken)}`);
    console.log(`Token length: ${accessToken.length} characters`);
    console.log(accountId ? `Instagram Account ID: ${accountId}` : '⚠️  INSTAGRAM_ACCOUNT_ID not set');

    const clientFor = (apiVersion: string) => new InstagramGraphClient({ accessToken, accountId, apiVersion });
    const client = clientFor(GRAPH_API_VERSION());

    banner('🔍 Testing Access Token Validity');
    const token = await checkAccessToken(client);

    if (!token.valid) {
        console.log('\n❌ Token is invalid, skipping further tests');
        console.log('\n💡 NEXT STEPS:');
        console.log('1. Check the INSTAGRAM_ACCESS_TOKEN you deployed');
        console.log('2. Run the renew-instagram-token script');
        console.log('3. Or generate a new token from the Meta Developer Console');
    } else if (accountId) {
        banner('🔍 Testing Instagram Account Access');
        const account = await checkAccountAccess(clientFor);
        if (!account.accessible) {
            console.log('\n⚠️  Account not accessible, checking Facebook pages...');
            banner('🔍 Checking Facebook Pages');
            await discoverPages(client);
        }
    } else {
        console.log('\n⚠️  No account ID provided, checking Facebook pages...');
        banner('🔍 Checking Facebook Pages');
        await discoverPages(client);
    }

    console.log(`\n${RULE}\nDiagnostic complete!\n${RULE}`);
    return token.valid ? 0 : 1;
});
