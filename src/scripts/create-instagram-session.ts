// ============================================================================
// Create an Instagram session interactively
// ============================================================================
// Run locally: logs in with username/password, answers 2FA or checkpoint
// prompts, and saves the session file used by post-apod-unofficial.
// Usage: npm run instagram:session
// ============================================================================

import '../env.js';

import {
    INSTAGRAM_PROXY_URL,
    INSTAGRAM_SESSION_FILE,
    INSTAGRAM_USERNAME,
    SESSION_ENCRYPTION_KEY,
} from '../config.js';
import { ClientError } from '../errors.js';
import { InstagramUnofficialClient } from '../services/instagram-unofficial.service.js';
import { prompt, runMain } from './cli.js';
import type { VerificationKind } from '../types/instagram.types.js';

const CODE_PROMPTS: Record<VerificationKind, string> = {
    'two-factor': 'Two-factor code (SMS or authenticator app): ',
    challenge: 'Security code sent by Instagram (email or SMS): ',
};

runMain(async () => {
    console.log('🔐 Instagram Session Creator');
    console.log('='.repeat(40));

    const defaultUsername = INSTAGRAM_USERNAME();
    const entered = await prompt(`Instagram username${defaultUsername ? ` [${defaultUsername}]` : ''}: `);
    const username = entered || defaultUsername;
    const password = await prompt('Instagram password: ');

    if (!username || !password) {
        console.error('❌ Username and password are required');
        return 1;
    }

    const client = new InstagramUnofficialClient({
        credentials: { username, password },
        sessionFile: INSTAGRAM_SESSION_FILE(),
        encryptionKey: SESSION_ENCRYPTION_KEY(),
        proxyUrl: INSTAGRAM_PROXY_URL(),
        promptCode: kind => prompt(CODE_PROMPTS[kind]),
    });

    console.log('\n📱 Logging into Instagram...');
    console.log('(This may require 2FA verification)');

    try {
        await client.login();
    } catch (error) {
        if (error instanceof ClientError) {
            console.error(`❌ Login failed: ${error.message}`);
            console.error('\n💡 Tips for 2FA issues:');
            console.error('- Make sure you have access to your email/phone for verification');
            console.error('- Try logging in through the Instagram app first');
            return 1;
        }
        throw error;
    }

    console.log(`✅ Successfully logged in and saved session to ${client.sessionFile}`);
    console.log('\n📋 Next steps:');
    console.log('1. Copy this session file to the machine or CI job that posts');
    console.log('2. Point INSTAGRAM_SESSION_FILE at it');
    console.log('3. Keep this session file secure and private (set SESSION_ENCRYPTION_KEY to encrypt it)');
    return 0;
});
