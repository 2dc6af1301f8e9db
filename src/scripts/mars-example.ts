// ============================================================================
// Mars Rover Photos example
// ============================================================================
// Usage: npm run example:mars
// ============================================================================

import '../env.js';

import { errorMessage } from '../errors.js';
import { MarsRoverPhotosClient } from '../services/mars-rover.service.js';
import { runMain } from './cli.js';

const capitalize = (name: string) => name.charAt(0).toUpperCase() + name.slice(1);

runMain(async () => {
    console.log('🔴 NASA Mars Rover Photos example\n');

    const client = new MarsRoverPhotosClient();

    console.log('🚀 Available Mars Rovers:');
    for (const rover of client.getAvailableRovers()) console.log(`  • ${capitalize(rover)}`);
    console.log();

    console.log('📊 Getting Curiosity mission manifest...');
    const manifest = await client.getManifest('curiosity');
    console.log(`Mission: ${manifest.name}`);
    console.log(`Status: ${manifest.status}`);
    console.log(`Landing Date: ${manifest.landingDate}`);
    console.log(`Total Photos: ${manifest.totalPhotos.toLocaleString('en-US')}`);
    console.log(`Max Sol: ${manifest.maxSol}\n`);

    console.log('📷 Curiosity Rover Cameras:');
    const cameras = client.getRoverCameras('curiosity');
    for (const camera of cameras.slice(0, 5)) console.log(`  • ${camera}`);
    if (cameras.length > 5) console.log(`  ... and ${cameras.length - 5} more`);
    console.log();

    console.log('📸 Getting photos from Curiosity Sol 1000 (MAST camera)...');
    const solPhotos = await client.getPhotosBySol('curiosity', 1000, { camera: 'MAST' });
    console.log(`Found ${solPhotos.length} photos from Sol 1000`);
    const [sample] = solPhotos;
    if (sample) {
        console.log('  Sample photo:');
        console.log(`    ID: ${sample.id}`);
        console.log(`    Earth Date: ${sample.earthDate}`);
        console.log(`    Camera: ${sample.camera.fullName ?? sample.camera.name}`);
        console.log(`    URL: ${sample.imgSrc}`);
    }
    console.log();

    console.log('📅 Getting photos from Curiosity on 2015-05-30...');
    const datePhotos = await client.getPhotosByEarthDate('curiosity', '2015-05-30', { camera: 'FHAZ' });
    console.log(`Found ${datePhotos.length} FHAZ photos from 2015-05-30\n`);

    console.log('🆕 Getting latest photos from Curiosity...');
    try {
        const latest = await client.getLatestPhotos('curiosity');
        console.log(`Found ${latest.length} latest photos from Curiosity`);
        const [photo] = latest;
        if (photo) {
            console.log('  Latest photo:');
            console.log(`    Sol: ${photo.sol}`);
            console.log(`    Earth Date: ${photo.earthDate}`);
            console.log(`    Camera: ${photo.camera.fullName ?? photo.camera.name}`);
        }
    } catch (error) {
        // DEMO_KEY hits the rate limit here more often than not
        console.log(`  ⚠️  Could not fetch latest photos (likely rate limit): ${errorMessage(error)}`);
    }
    console.log();

    console.log('📷 Perseverance Rover Cameras (sample):');
    for (const camera of client.getRoverCameras('perseverance').slice(0, 8)) console.log(`  • ${camera}`);
    console.log();

    console.log('✅ All Mars rover examples completed successfully!');
});
