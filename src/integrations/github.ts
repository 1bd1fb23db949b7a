/**
 * GitHub Integration
 *
 * Wrapper around the `gh` CLI used to list every repository the signed-in
 * user can see, so repositories that are not cloned on any machine can be
 * shown as "available". gh owns authentication; when it is missing or
 * signed out the dashboard falls back to the local-only view.
 */

import { z } from 'zod';
import { describeError, type ScanWarning } from '../errors.js';
import { identityKey, parseRemoteUrl } from '../catalog/remote-identity.js';
import type { RemoteRepo } from '../sync/aggregator.js';
import { runCommand, type CommandRunner } from '../tools/terminal.js';

const REPO_FIELDS = 'nameWithOwner,url,description,isArchived,isFork,pushedAt';
const REPO_LIMIT = '1000';

const GhRepoSchema = z.object({
  nameWithOwner: z.string(),
  url: z.string(),
  description: z.string().nullable().optional(),
  isArchived: z.boolean(),
  isFork: z.boolean(),
  pushedAt: z.string().nullable().optional(),
});

const GhRepoListSchema = z.array(GhRepoSchema);

export interface RemoteListOptions {
  includeArchived: boolean;
  includeOrgs: boolean;
}

export interface RemoteListResult {
  /** null when the provider could not be reached */
  repos: RemoteRepo[] | null;
  warning: ScanWarning | null;
}

/**
 * GitHub CLI wrapper
 */
export class GitHubIntegration {
  constructor(private readonly runner: CommandRunner = runCommand) {}

  /**
   * Organizations the user belongs to
   */
  async listOrganizations(): Promise<string[]> {
    const result = await this.runGh(['api', 'user/orgs', '--paginate', '-q', '.[].login']);
    return result
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);
  }

  /**
   * Repositories of one owner (the signed-in user when omitted)
   */
  async listRepos(owner?: string): Promise<RemoteRepo[]> {
    const args = ['repo', 'list'];
    if (owner) args.push(owner);
    args.push('--limit', REPO_LIMIT, '--json', REPO_FIELDS);

    const output = await this.runGh(args);
    const repos = GhRepoListSchema.parse(JSON.parse(output || '[]'));

    const result: RemoteRepo[] = [];
    for (const repo of repos) {
      const identity = parseRemoteUrl(repo.url);
      if (!identity) continue;
      result.push({
        identity,
        description: repo.description ?? '',
        url: repo.url,
        isArchived: repo.isArchived,
        isFork: repo.isFork,
        ownerIsOrganization: owner !== undefined,
        pushedAt: repo.pushedAt ?? null,
      });
    }
    return result;
  }

  /**
   * Every repository the user can see, filtered by the configured scope.
   * Any failure is reported once and yields `repos: null`.
   */
  async listRemoteRepos(options: RemoteListOptions): Promise<RemoteListResult> {
    try {
      const lists = [await this.listRepos()];
      if (options.includeOrgs) {
        for (const org of await this.listOrganizations()) {
          lists.push(await this.listRepos(org));
        }
      }

      const byKey = new Map<string, RemoteRepo>();
      for (const repo of lists.flat()) {
        if (!options.includeArchived && repo.isArchived) continue;
        const key = identityKey(repo.identity);
        if (!byKey.has(key)) byKey.set(key, repo);
      }

      const repos = [...byKey.keys()]
        .sort()
        .flatMap(key => {
          const repo = byKey.get(key);
          return repo ? [repo] : [];
        });

      return { repos, warning: null };
    } catch (error) {
      return {
        repos: null,
        warning: {
          kind: 'remote-unavailable',
          path: 'gh',
          message: `GitHub unavailable, showing local projects only: ${describeError(error)}`,
        },
      };
    }
  }

  /**
   * Run a gh CLI command
   */
  private async runGh(args: string[]): Promise<string> {
    const result = await this.runner('gh', args);
    if (!result.success) {
      throw new Error(result.error || result.stderr || `gh exited with code ${result.exitCode}`);
    }
    return result.stdout;
  }
}

// Singleton instance
export const github = new GitHubIntegration();
