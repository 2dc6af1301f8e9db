// ============================================================================
// Post a random APOD to Instagram with username/password login
// ============================================================================
// Requires INSTAGRAM_USERNAME plus INSTAGRAM_PASSWORD or a saved session
// file. Usage: npm run post:unofficial
// ============================================================================

import '../env.js';

import {
    INSTAGRAM_PASSWORD,
    INSTAGRAM_PROXY_URL,
    INSTAGRAM_SESSION_FILE,
    INSTAGRAM_USERNAME,
    SESSION_ENCRYPTION_KEY,
} from '../config.js';
import { ApodClient } from '../services/apod.service.js';
import { postRandomApodUnofficial } from '../services/apod-publisher.service.js';
import { InstagramUnofficialClient } from '../services/instagram-unofficial.service.js';
import { runMain } from './cli.js';

runMain(async () => {
    console.log('🚀 Starting random APOD Instagram poster');

    const username = INSTAGRAM_USERNAME();
    if (!username) {
        console.error('❌ Instagram credentials not found in environment');
        console.error('💡 Set INSTAGRAM_USERNAME and INSTAGRAM_PASSWORD');
        return 1;
    }

    const instagram = new InstagramUnofficialClient({
        credentials: { username, password: INSTAGRAM_PASSWORD() },
        sessionFile: INSTAGRAM_SESSION_FILE(),
        encryptionKey: SESSION_ENCRYPTION_KEY(),
        proxyUrl: INSTAGRAM_PROXY_URL(),
    });

    const outcome = await postRandomApodUnofficial({ apod: new ApodClient(), instagram });

    switch (outcome.status) {
        case 'posted':
            console.log(`🎉 Posted "${outcome.apod.title}" (${outcome.apod.date})`);
            console.log(`   Media ID: ${outcome.postId}`);
            if (outcome.postUrl) console.log(`   Post URL: ${outcome.postUrl}`);
            return 0;
        case 'skipped':
            console.log(`⏭️  Skipped: ${outcome.reason}`);
            return 0;
        case 'failed':
            console.error(`❌ ${outcome.reason}`);
            return 1;
    }
});
