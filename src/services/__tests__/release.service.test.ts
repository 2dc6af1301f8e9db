import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../errors.js';
import { parseRepository } from '../github-release.service.js';
import {
    assertValidVersion,
    performRelease,
    readPackageVersion,
    replaceVersion,
} from '../release.service.js';
import { silenceConsole } from './fetch-stub.js';

describe('version helpers', () => {
    it('accepts only X.Y.Z', () => {
        expect(() => assertValidVersion('1.2.3')).not.toThrow();
        expect(() => assertValidVersion('v1.2.3')).toThrow(ValidationError);
        expect(() => assertValidVersion('1.2')).toThrow('Version must be in format X.Y.Z (e.g., 0.3.0), got "1.2"');
    });

    it('reads the version from package.json text', () => {
        expect(readPackageVersion('{"name":"x","version":"0.1.0"}')).toBe('0.1.0');
        expect(() => readPackageVersion('{"name":"x"}')).toThrow('Could not find version in package.json');
    });

    it('replaces only quoted exact versions', () => {
        const content = '{ "version": "1.2.3", "dependencies": { "a": "^1.2.3", "b": "11.2.3" } }';

        expect(replaceVersion(content, '1.2.3', '1.3.0')).toEqual({
            content: '{ "version": "1.3.0", "dependencies": { "a": "^1.2.3", "b": "11.2.3" } }',
            changed: true,
        });
        expect(replaceVersion("export const VERSION = '1.2.3';", '1.2.3', '2.0.0').content)
            .toBe("export const VERSION = '2.0.0';");
    });

    it('parses owner/repo', () => {
        expect(parseRepository('octo-org/apod-poster')).toEqual({ owner: 'octo-org', repo: 'apod-poster' });
        expect(() => parseRepository('not a repo')).toThrow(ValidationError);
    });
});

describe('performRelease', () => {
    let dir: string;

    beforeEach(() => {
        silenceConsole();
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'release-'));
        fs.mkdirSync(path.join(dir, 'src'));
        fs.writeFileSync(path.join(dir, 'package.json'), '{\n  "name": "x",\n  "version": "0.1.0"\n}\n');
        fs.writeFileSync(path.join(dir, 'src', 'version.ts'), "export const VERSION = '0.1.0';\n");
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('bumps files, tests, commits, tags and pushes in order', () => {
        const commands: string[] = [];
        const run = (command: string) => {
            commands.push(command);
            if (command === 'git status --porcelain') return ' M package.json\n';
            if (command === 'git rev-parse --abbrev-ref HEAD') return 'main\n';
            return '';
        };

        const tag = performRelease({ rootDir: dir, currentVersion: '0.1.0', newVersion: '0.2.0', run });

        expect(tag).toBe('v0.2.0');
        expect(fs.readFileSync(path.join(dir, 'package.json'), 'utf-8')).toContain('"version": "0.2.0"');
        expect(fs.readFileSync(path.join(dir, 'src', 'version.ts'), 'utf-8')).toBe("export const VERSION = '0.2.0';\n");
        expect(commands).toEqual([
            'npm test',
            'git status --porcelain',
            'git add package.json src/version.ts',
            'git commit -m "Bump version to 0.2.0"',
            'git tag -a v0.2.0 -m "Release 0.2.0"',
            'git rev-parse --abbrev-ref HEAD',
            'git push origin main',
            'git push origin v0.2.0',
        ]);
    });

    it('skips the commit when the tree is clean', () => {
        const commands: string[] = [];
        const run = (command: string) => {
            commands.push(command);
            return command === 'git rev-parse --abbrev-ref HEAD' ? 'main' : '';
        };

        performRelease({ rootDir: dir, currentVersion: '0.1.0', newVersion: '0.2.0', run });

        expect(commands).not.toContain('git commit -m "Bump version to 0.2.0"');
    });
});
