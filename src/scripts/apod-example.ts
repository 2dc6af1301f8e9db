// ============================================================================
// APOD example — today, random picks, recent days, a fixed date
// ============================================================================
// Usage: npm run example:apod
// ============================================================================

import '../env.js';

import { ApodClient } from '../services/apod.service.js';
import { runMain, truncate } from './cli.js';

runMain(async () => {
    console.log('🚀 NASA APOD client example\n');

    // DEMO_KEY is used when NASA_API_KEY is not set. Free keys: https://api.nasa.gov/
    const client = new ApodClient();

    console.log("📅 Getting today's Astronomy Picture of the Day...");
    const apod = await client.getApod({ hd: true });
    console.log(`Title: ${apod.title}`);
    console.log(`Date: ${apod.date}`);
    console.log(`Media Type: ${apod.mediaType}`);
    console.log(`URL: ${apod.url ?? 'N/A'}`);
    if (apod.hdurl) console.log(`HD URL: ${apod.hdurl}`);
    if (apod.copyright) console.log(`Copyright: ${apod.copyright}`);
    console.log(`Explanation: ${truncate(apod.explanation, 100)}\n`);

    console.log('🎲 Getting a random APOD...');
    const random = await client.getRandomApod();
    console.log(`Random APOD: ${random.title} (${random.date})\n`);

    console.log('🎲 Getting 3 random APODs...');
    const randoms = await client.getRandomApods(3);
    randoms.forEach((item, i) => console.log(`${i + 1}. ${item.title} (${item.date})`));
    console.log();

    console.log('📆 Getting recent APODs (last 5 days)...');
    const recent = await client.getRecentApods(5);
    console.log(`Found ${recent.length} recent APODs:`);
    for (const item of recent) console.log(`  - ${item.date}: ${item.title}`);
    console.log();

    console.log('📅 Getting APOD for a specific date (2023-01-01)...');
    const specific = await client.getApod({ date: '2023-01-01' });
    console.log(`New Year 2023 APOD: ${specific.title}\n`);

    console.log('✅ All examples completed successfully!');
});
