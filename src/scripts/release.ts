// ============================================================================
// Release — bump the version, tag it and push
// ============================================================================
// Usage: npm run release -- 0.3.0
// With GITHUB_TOKEN and GITHUB_REPOSITORY set, a GitHub release is created
// for the new tag as well.
// ============================================================================

import '../env.js';

import fs from 'fs';
import path from 'path';
import { GITHUB_REPOSITORY, GITHUB_TOKEN } from '../config.js';
import {
    actionsUrl,
    createGitHubClient,
    createGitHubRelease,
    parseRepository,
} from '../services/github-release.service.js';
import { assertValidVersion, performRelease, readPackageVersion } from '../services/release.service.js';
import { prompt, runMain } from './cli.js';

runMain(async () => {
    const newVersion = process.argv[2];
    if (!newVersion) {
        console.log('Usage: npm run release -- <new_version>');
        console.log('Example: npm run release -- 0.3.0');
        return 1;
    }
    assertValidVersion(newVersion);

    const rootDir = process.cwd();
    const currentVersion = readPackageVersion(fs.readFileSync(path.join(rootDir, 'package.json'), 'utf-8'));
    console.log(`Current version: ${currentVersion}`);
    console.log(`New version: ${newVersion}`);

    const answer = await prompt('Continue with release? (y/N): ');
    if (answer.toLowerCase() !== 'y') {
        console.log('Release cancelled');
        return 0;
    }

    const tag = performRelease({ rootDir, currentVersion, newVersion });
    console.log(`\n✅ Release ${newVersion} completed! (${tag})`);

    const token = GITHUB_TOKEN();
    const repositoryName = GITHUB_REPOSITORY();
    if (!repositoryName) {
        console.log('💡 Set GITHUB_REPOSITORY (owner/repo) to get a link to the CI runs.');
        return 0;
    }

    const repository = parseRepository(repositoryName);
    if (token) {
        await createGitHubRelease(createGitHubClient(token), repository, newVersion);
    } else {
        console.log('💡 GITHUB_TOKEN not set, skipping GitHub release creation');
    }
    console.log(`\nYou can monitor the progress at:\n${actionsUrl(repository)}`);
    return 0;
});
