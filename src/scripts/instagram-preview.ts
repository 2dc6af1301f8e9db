// ============================================================================
// Instagram preview — random image APOD and the caption it would get
// ============================================================================
// Nothing is posted. Usage: npm run instagram:preview
// ============================================================================

import '../env.js';

import { ApodClient } from '../services/apod.service.js';
import { buildPreviewCaption, captionInputFromApod, isCaptionWithinLimit } from '../services/caption.service.js';
import { RULE, runMain } from './cli.js';

runMain(async () => {
    console.log('📱 APOD Instagram preview\n');

    const client = new ApodClient();
    const { apod, isImage, attempts } = await client.getRandomImageApod();

    if (!isImage) {
        console.log(`⚠️ No image APOD after ${attempts} attempts (last was a ${apod.mediaType}).`);
        return 0;
    }

    console.log(`Title: ${apod.title}`);
    console.log(`Date: ${apod.date}`);
    console.log(`Image URL: ${apod.hdurl ?? apod.url ?? 'N/A'}`);

    const caption = buildPreviewCaption(captionInputFromApod(apod));
    console.log(`\n📝 Caption (${caption.length} characters):\n${RULE}\n${caption}\n${RULE}`);

    if (!isCaptionWithinLimit(caption)) {
        console.log('⚠️ Caption is longer than Instagram allows');
    }
    return 0;
});
