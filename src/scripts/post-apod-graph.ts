// ============================================================================
// Post a random APOD to Instagram through the Graph API
// ============================================================================
// Requires INSTAGRAM_ACCESS_TOKEN and INSTAGRAM_ACCOUNT_ID (Business or
// Creator account linked to a Facebook Page). Usage: npm run post:graph
// ============================================================================

import '../env.js';

import { GRAPH_API_VERSION, INSTAGRAM_ACCESS_TOKEN, INSTAGRAM_ACCOUNT_ID } from '../config.js';
import { ApodClient } from '../services/apod.service.js';
import { postRandomApodViaGraph } from '../services/apod-publisher.service.js';
import { InstagramGraphClient } from '../services/instagram-graph.service.js';
import { runMain } from './cli.js';

runMain(async () => {
    console.log('🚀 Starting Instagram Graph API APOD poster');

    const accessToken = INSTAGRAM_ACCESS_TOKEN();
    const accountId = INSTAGRAM_ACCOUNT_ID();

    if (!accessToken) {
        console.error('❌ INSTAGRAM_ACCESS_TOKEN not found in environment');
        console.error('💡 Get your token from the Meta Developer Console');
        return 1;
    }
    if (!accountId) {
        console.error('❌ INSTAGRAM_ACCOUNT_ID not found in environment');
        console.error('💡 Get your Instagram Business Account ID from the Graph API Explorer');
        return 1;
    }

    const graph = new InstagramGraphClient({ accessToken, accountId, apiVersion: GRAPH_API_VERSION() });
    const apod = new ApodClient();

    const outcome = await postRandomApodViaGraph({ apod, graph });

    switch (outcome.status) {
        case 'posted':
            console.log(`🎉 Posted "${outcome.apod.title}" (${outcome.apod.date})`);
            console.log(`   Post ID: ${outcome.postId}`);
            if (outcome.postUrl) console.log(`   Post URL: ${outcome.postUrl}`);
            if (outcome.usedFallback) console.log("   (today's APOD was used as a fallback)");
            return 0;
        case 'skipped':
            console.log(`⏭️  Skipped: ${outcome.reason}`);
            return 0;
        case 'failed':
            console.error(`❌ ${outcome.reason}`);
            return 1;
    }
});
