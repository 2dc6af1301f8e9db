// ============================================================================
// Release Service — version bump, tests, git tag and push
// ============================================================================
// The steps run in order and stop at the first failing command:
//   bump package.json + src/version.ts → npm test → commit (if dirty)
//   → tag vX.Y.Z → push branch and tag
// ============================================================================

import fs from 'fs';
import path from 'path';
import { execSync } from 'child_process';
import { ClientError, ValidationError, errorMessage } from '../errors.js';
import { isRecord, asNonEmptyString } from './json.js';

export const VERSION_FILES = ['package.json', 'src/version.ts'] as const;

export type CommandRunner = (command: string) => string;

export const runCommand: CommandRunner = (command) => {
    console.log(`[Release] $ ${command}`);
    try {
        return execSync(command, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (err) {
        throw new ClientError(`Command failed: ${command}\n${errorMessage(err)}`, { cause: err });
    }
};

export function isValidVersion(version: string): boolean {
    return /^\d+\.\d+\.\d+$/.test(version);
}

export function assertValidVersion(version: string): void {
    if (!isValidVersion(version)) {
        throw new ValidationError(`Version must be in format X.Y.Z (e.g., 0.3.0), got "${version}"`);
    }
}

export function readPackageVersion(packageJson: string): string {
    let data: unknown;
    try {
        data = JSON.parse(packageJson);
    } catch (err) {
        throw new ClientError('package.json is not valid JSON', { cause: err });
    }
    const version = isRecord(data) ? asNonEmptyString(data.version) : undefined;
    if (!version) throw new ClientError('Could not find version in package.json');
    return version;
}

/**
 * Replaces quoted occurrences of the old version, so "1.2.3" never matches
 * inside "11.2.3" or a dependency range like "^1.2.3".
 */
export function replaceVersion(content: string, oldVersion: string, newVersion: string): { content: string; changed: boolean } {
    const escaped = oldVersion.replace(/\./g, '\\.');
    const pattern = new RegExp(`(["'])${escaped}\\1`, 'g');
    const updated = content.replace(pattern, (_match, quote: string) => `${quote}${newVersion}${quote}`);
    return { content: updated, changed: updated !== content };
}

export function updateVersionFiles(rootDir: string, oldVersion: string, newVersion: string): string[] {
    const updated: string[] = [];
    for (const file of VERSION_FILES) {
        const filePath = path.join(rootDir, file);
        if (!fs.existsSync(filePath)) {
            console.warn(`[Release] ⚠️ ${file} not found, skipping`);
            continue;
        }
        const result = replaceVersion(fs.readFileSync(filePath, 'utf-8'), oldVersion, newVersion);
        if (result.changed) {
            fs.writeFileSync(filePath, result.content);
            console.log(`[Release] Updated version in ${file}`);
            updated.push(file);
        } else {
            console.log(`[Release] No version found to update in ${file}`);
        }
    }
    return updated;
}

export interface ReleaseSteps {
    rootDir: string;
    currentVersion: string;
    newVersion: string;
    run?: CommandRunner;
}

/**
 * Everything after the confirmation prompt. Returns the tag name.
 */
export function performRelease(steps: ReleaseSteps): string {
    const run = steps.run ?? runCommand;
    const { currentVersion, newVersion } = steps;

    updateVersionFiles(steps.rootDir, currentVersion, newVersion);

    console.log('[Release] Running tests...');
    run('npm test');

    if (run('git status --porcelain').trim()) {
        console.log('[Release] Working tree is not clean. Committing version changes...');
        run(`git add ${VERSION_FILES.join(' ')}`);
        run(`git commit -m "Bump version to ${newVersion}"`);
    }

    const tag = `v${newVersion}`;
    console.log(`[Release] Creating tag: ${tag}`);
    run(`git tag -a ${tag} -m "Release ${newVersion}"`);

    const branch = run('git rev-parse --abbrev-ref HEAD').trim();
    console.log('[Release] Pushing to GitHub...');
    run(`git push origin ${branch}`);
    run(`git push origin ${tag}`);

    return tag;
}
