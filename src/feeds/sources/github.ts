/**
 * Herald: GitHub Sources
 *
 * Releases and merged pull requests across the tracked repositories.
 *
 * Each repository is queried independently with bounded concurrency. A
 * repository that fails is logged and skipped; the source is unavailable
 * only when every repository failed.
 *
 * Ordering: oldest first across all repositories.
 */

import { Octokit } from 'octokit';
import pLimit from 'p-limit';
import { SourceAdapter, chronological, type FetchContext } from '../base';
import type { RawItem } from '../../types';
import { SourceUnavailableError } from '../../lib/errors';
import { errorMessage } from '../../lib/logger';
import { compactLines, squish, toIsoDate, truncate } from '../../lib/text';

const BODY_LENGTH = 500;
const REPO_CONCURRENCY = 4;
const MERGE_BRANCHES = new Set(['main', 'master']);

// ============================================================
// API
// ============================================================

export interface Release {
  /** Numeric release id; the legacy store keyed releases on it */
  id: number;
  tag: string;
  name: string | null;
  body: string | null;
  url: string;
  draft: boolean;
  prerelease: boolean;
  publishedAt: string | null;
}

export interface PullRequest {
  number: number;
  title: string;
  body: string | null;
  url: string;
  mergedAt: string | null;
  author?: string;
  baseBranch: string;
}

/**
 * The slice of the GitHub REST API the sources need.
 */
export interface GitHubApi {
  listReleases(repo: string, perPage: number, signal: AbortSignal): Promise<Release[]>;
  /** Closed pull requests, most recently updated first */
  listClosedPulls(repo: string, perPage: number, signal: AbortSignal): Promise<PullRequest[]>;
}

function splitRepo(repo: string): { owner: string; name: string } {
  const [owner, name] = repo.split('/');
  return { owner, name };
}

/**
 * GitHubApi over Octokit. Runs unauthenticated when no token is given.
 */
export class OctokitGitHubApi implements GitHubApi {
  private readonly octokit: Octokit;

  constructor(token?: string) {
    this.octokit = new Octokit({ auth: token });
  }

  async listReleases(repo: string, perPage: number, signal: AbortSignal): Promise<Release[]> {
    const { owner, name } = splitRepo(repo);
    const { data } = await this.octokit.rest.repos.listReleases({
      owner,
      repo: name,
      per_page: perPage,
      request: { signal },
    });

    return data.map(release => ({
      id: release.id,
      tag: release.tag_name,
      name: release.name,
      body: release.body ?? null,
      url: release.html_url,
      draft: release.draft,
      prerelease: release.prerelease,
      publishedAt: release.published_at ?? release.created_at,
    }));
  }

  async listClosedPulls(repo: string, perPage: number, signal: AbortSignal): Promise<PullRequest[]> {
    const { owner, name } = splitRepo(repo);
    const { data } = await this.octokit.rest.pulls.list({
      owner,
      repo: name,
      state: 'closed',
      sort: 'updated',
      direction: 'desc',
      per_page: perPage,
      request: { signal },
    });

    return data.map(pull => ({
      number: pull.number,
      title: pull.title,
      body: pull.body,
      url: pull.html_url,
      mergedAt: pull.merged_at,
      author: pull.user?.login,
      baseBranch: pull.base.ref,
    }));
  }
}

// ============================================================
// SHARED BASE
// ============================================================

export interface GitHubSourceOptions {
  api: GitHubApi;
  repos: string[];
  /** Items kept per repository */
  perRepo?: number;
}

abstract class GitHubRepoSource extends SourceAdapter {
  readonly kind = 'paginated_api' as const;

  protected readonly api: GitHubApi;
  protected readonly repos: string[];
  protected readonly perRepo: number;

  constructor(options: GitHubSourceOptions, defaultPerRepo: number) {
    super();
    this.api = options.api;
    this.repos = options.repos;
    this.perRepo = options.perRepo ?? defaultPerRepo;
  }

  protected abstract fetchRepo(repo: string, signal: AbortSignal): Promise<RawItem[]>;

  async fetch({ signal }: FetchContext): Promise<RawItem[]> {
    const limit = pLimit(REPO_CONCURRENCY);
    const failures: string[] = [];

    const batches = await Promise.all(
      this.repos.map(repo =>
        limit(async () => {
          try {
            return await this.fetchRepo(repo, signal);
          } catch (error) {
            const message = errorMessage(error);
            failures.push(`${repo}: ${message}`);
            this.logger.warn('Repository fetch failed', { repo, error: message });
            return [];
          }
        })
      )
    );

    if (this.repos.length > 0 && failures.length === this.repos.length) {
      throw new SourceUnavailableError(this.name, `every repository failed (${failures.join('; ')})`);
    }

    return chronological(batches.flat());
  }
}

// ============================================================
// RELEASES
// ============================================================

export class GitHubReleasesSource extends GitHubRepoSource {
  readonly name = 'github-releases';
  readonly category = 'release' as const;

  constructor(options: GitHubSourceOptions) {
    super(options, 5);
  }

  protected async fetchRepo(repo: string, signal: AbortSignal): Promise<RawItem[]> {
    const releases = await this.api.listReleases(repo, this.perRepo, signal);

    return releases
      .filter(release => !release.draft)
      .map(release =>
        this.item({
          naturalId: `${repo}@${release.tag}`,
          aliases: [`${repo}:${release.id}`],
          title: squish(release.name || release.tag),
          body: truncate(compactLines(release.body ?? ''), BODY_LENGTH),
          url: release.url,
          publishedAt: toIsoDate(release.publishedAt),
          payload: {
            type: 'release',
            repo,
            tag: release.tag,
            name: release.name ?? undefined,
            prerelease: release.prerelease,
          },
        })
      );
  }
}

// ============================================================
// MERGED CHANGES
// ============================================================

export class GitHubMergedChangesSource extends GitHubRepoSource {
  readonly name = 'github-merged';
  readonly category = 'merged_change' as const;

  constructor(options: GitHubSourceOptions) {
    super(options, 3);
  }

  protected async fetchRepo(repo: string, signal: AbortSignal): Promise<RawItem[]> {
    // Over-fetch: closed includes unmerged and side-branch pulls
    const pulls = await this.api.listClosedPulls(repo, this.perRepo * 2, signal);

    return pulls
      .filter(pull => pull.mergedAt !== null && MERGE_BRANCHES.has(pull.baseBranch))
      .slice(0, this.perRepo)
      .map(pull =>
        this.item({
          naturalId: `${repo}#${pull.number}`,
          title: squish(pull.title),
          body: truncate(compactLines(pull.body ?? ''), BODY_LENGTH),
          url: pull.url,
          publishedAt: toIsoDate(pull.mergedAt),
          payload: {
            type: 'merged_change',
            repo,
            number: pull.number,
            author: pull.author,
            baseBranch: pull.baseBranch,
          },
        })
      );
  }
}
