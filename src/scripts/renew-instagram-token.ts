// ============================================================================
// Instagram token renewal
// ============================================================================
// Renews INSTAGRAM_ACCESS_TOKEN when it expires within a week. The new token
// is printed masked and written in full to {DATA_DIR}/instagram_access_token.txt
// (mode 600). Usage: npm run instagram:renew-token
// ============================================================================

import '../env.js';

import path from 'path';

import {
    FACEBOOK_APP_ID,
    FACEBOOK_APP_SECRET,
    GITHUB_REPOSITORY,
    GRAPH_API_VERSION,
    INSTAGRAM_ACCESS_TOKEN,
} from '../config.js';
import { maskToken } from '../errors.js';
import { getDataDir, writeFileAtomic } from '../services/data-dir.js';
import { InstagramGraphClient } from '../services/instagram-graph.service.js';
import { ACCESS_TOKEN_FILENAME, renewTokenIfNeeded } from '../services/token-renewal.service.js';
import { runMain } from './cli.js';

runMain(async () => {
    console.log('🚀 Starting Instagram token renewal check...');

    const accessToken = INSTAGRAM_ACCESS_TOKEN();
    const appId = FACEBOOK_APP_ID();
    const appSecret = FACEBOOK_APP_SECRET();

    if (!accessToken) {
        console.error('❌ INSTAGRAM_ACCESS_TOKEN not found in environment');
        return 1;
    }
    if (!appId || !appSecret) {
        console.error('❌ FACEBOOK_APP_ID and FACEBOOK_APP_SECRET are required');
        console.error('💡 Both are on the app dashboard in the Meta Developer Console');
        return 1;
    }

    const apiVersion = GRAPH_API_VERSION();
    const outcome = await renewTokenIfNeeded({
        current: new InstagramGraphClient({ accessToken, apiVersion }),
        clientFor: token => new InstagramGraphClient({ accessToken: token, apiVersion }),
        appId,
        appSecret,
    });

    if (outcome.status === 'not-needed') return 0;
    if (outcome.status === 'failed') {
        console.error(`❌ ${outcome.reason}`);
        return 1;
    }

    const { accessToken: newToken } = outcome.token;
    console.log('📝 NEW TOKEN GENERATED:');
    console.log('='.repeat(50));
    console.log('Variable: INSTAGRAM_ACCESS_TOKEN');
    console.log(`Token preview: ${maskToken(newToken)}`);
    console.log(`Token length: ${newToken.length} characters`);
    console.log('='.repeat(50));
    const tokenFile = path.join(getDataDir(), ACCESS_TOKEN_FILENAME);
    writeFileAtomic(tokenFile, newToken);
    console.log(`🔒 The full token is not logged; it was written to ${tokenFile}`);
    const repository = GITHUB_REPOSITORY();
    if (repository) {
        console.log(`💡 Update the INSTAGRAM_ACCESS_TOKEN secret at https://github.com/${repository}/settings/secrets/actions`);
    }
    console.log('🎉 Token renewal completed successfully!');
    return 0;
});
