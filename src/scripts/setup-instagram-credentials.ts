// ============================================================================
// Instagram Graph API credentials setup
// ============================================================================
// Interactive wizard: app id/secret → access token (exchanged for a
// long-lived one when needed) → Instagram account id from the linked pages
// → verification → the secrets to configure.
// Usage: npm run instagram:setup
// ============================================================================

import '../env.js';

import path from 'path';

import { GITHUB_REPOSITORY, GRAPH_API_VERSION } from '../config.js';
import {
    TOKEN_HELP,
    describeSecrets,
    linkedAccountIds,
    parseTokenChoice,
    toLongLivedToken,
} from '../services/credential-setup.service.js';
import { getDataDir, writeFileAtomic } from '../services/data-dir.js';
import { InstagramGraphClient } from '../services/instagram-graph.service.js';
import { checkAccessToken, checkAccountAccess, discoverPages } from '../services/token-diagnostics.service.js';
import { ACCESS_TOKEN_FILENAME } from '../services/token-renewal.service.js';
import { RULE, banner, prompt, runMain } from './cli.js';

runMain(async () => {
    banner('🔐 Instagram Graph API Credentials Setup');
    console.log('This script will help you:');
    console.log('  1. Generate or convert your access token');
    console.log('  2. Find your Instagram Business Account ID');
    console.log('  3. Verify your credentials');
    console.log('  4. List the secrets to configure');

    // ── Step 1: app credentials ──

    banner('📱 Step 1: Meta App Credentials');
    console.log('Find them at https://developers.facebook.com/apps/ → your app → Settings → Basic\n');

    const appId = await prompt('Enter your App ID: ');
    if (!appId) {
        console.error('❌ App ID is required');
        return 1;
    }
    const appSecret = await prompt('Enter your App Secret: ');
    if (!appSecret) {
        console.error('❌ App Secret is required');
        return 1;
    }
    console.log('✅ App credentials received');

    // ── Step 2: access token ──

    banner('🔑 Step 2: Access Token');
    console.log('  1. I have a short-lived token (expires in ~1 hour)');
    console.log('  2. I have a long-lived token (expires in ~60 days)');
    console.log('  3. I need help getting a token\n');

    const choice = parseTokenChoice(await prompt('Enter your choice (1-3): '));
    if (!choice) {
        console.error('❌ Please answer 1, 2 or 3');
        return 1;
    }
    if (choice === 'help') {
        console.log('\n📖 HOW TO GET YOUR ACCESS TOKEN:\n');
        for (const line of TOKEN_HELP) console.log(line);
        return 0;
    }

    let accessToken = await prompt('Paste your access token: ');
    if (!accessToken) {
        console.error('❌ Token is required');
        return 1;
    }

    const apiVersion = GRAPH_API_VERSION();
    if (choice === 'short-lived') {
        console.log('\n🔄 Converting to long-lived token...');
        const exchanged = await toLongLivedToken(
            new InstagramGraphClient({ accessToken, apiVersion }),
            appId,
            appSecret,
            accessToken
        );
        accessToken = exchanged.accessToken;
        console.log(`✅ Converted to a long-lived token, valid for ${exchanged.daysValid} days`);
    }
    console.log(`✅ Token ready (${accessToken.length} characters)`);

    // ── Step 3: Instagram account id ──

    banner('📱 Step 3: Finding Instagram Account ID');
    const client = new InstagramGraphClient({ accessToken, apiVersion });
    const found = linkedAccountIds(await discoverPages(client));
    const suggested = found.length === 1 ? found[0] : undefined;

    const answer = await prompt(suggested
        ? `\nInstagram Account ID [${suggested}]: `
        : '\nEnter your Instagram Account ID: ');
    const accountId = answer || suggested;
    if (!accountId) {
        console.log('\n💡 Troubleshooting tips:');
        console.log('   1. Make sure your Instagram is a BUSINESS or CREATOR account');
        console.log("   2. Make sure it's linked to a Facebook Page");
        console.log('   3. Check your token has all required permissions');
        return 1;
    }

    // ── Step 4: verification ──

    banner('🔍 Step 4: Verifying Credentials');
    const token = await checkAccessToken(client);
    const account = token.valid
        ? await checkAccountAccess(version => new InstagramGraphClient({ accessToken, accountId, apiVersion: version }))
        : undefined;

    // ── Step 5: secrets ──

    banner('🔐 Step 5: Secrets to configure');
    const tokenFile = path.join(getDataDir(), ACCESS_TOKEN_FILENAME);
    writeFileAtomic(tokenFile, accessToken);
    console.log(`🔒 The full access token was written to ${tokenFile}\n`);

    for (const secret of describeSecrets({ accessToken, accountId, appId, appSecret })) {
        console.log(`${secret.name} = ${secret.value}`);
    }
    const repository = GITHUB_REPOSITORY();
    if (repository) {
        console.log(`\n📋 Add them at https://github.com/${repository}/settings/secrets/actions`);
    }

    const ok = token.valid && account?.accessible === true;
    console.log(`\n${RULE}\n${ok ? '🎉 Setup Complete!' : '⚠️  Setup finished, but verification failed (see above)'}\n${RULE}`);
    return ok ? 0 : 1;
});
