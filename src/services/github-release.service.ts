// ============================================================================
// GitHub Release Service — @octokit/core
// ============================================================================

import { Octokit } from '@octokit/core';
import { ValidationError } from '../errors.js';

export interface GitHubRepo {
    owner: string;
    repo: string;
}

export interface CreatedRelease {
    id: number;
    htmlUrl: string;
}

/**
 * Splits GITHUB_REPOSITORY ("owner/repo").
 */
export function parseRepository(value: string): GitHubRepo {
    const match = /^([\w.-]+)\/([\w.-]+)$/.exec(value.trim());
    if (!match?.[1] || !match[2]) {
        throw new ValidationError(`GITHUB_REPOSITORY must look like "owner/repo", got "${value}"`);
    }
    return { owner: match[1], repo: match[2] };
}

export function actionsUrl(repository: GitHubRepo): string {
    return `https://github.com/${repository.owner}/${repository.repo}/actions`;
}

export function createGitHubClient(token: string): Octokit {
    return new Octokit({ auth: token });
}

export async function createGitHubRelease(
    octokit: Pick<Octokit, 'request'>,
    repository: GitHubRepo,
    version: string
): Promise<CreatedRelease> {
    const tag = `v${version}`;
    const { data } = await octokit.request('POST /repos/{owner}/{repo}/releases', {
        owner: repository.owner,
        repo: repository.repo,
        tag_name: tag,
        name: `Release ${version}`,
        generate_release_notes: true,
    });

    console.log(`[Release] ✅ GitHub release created: ${data.html_url}`);
    return { id: data.id, htmlUrl: data.html_url };
}
