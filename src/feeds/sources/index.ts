/**
 * Herald: Feed Sources Index
 *
 * Builds the source set enabled by configuration. Registration order is
 * delivery order across sources.
 */

import { SourceRegistry } from '../base';
import type { HeraldConfig } from '../../lib/config';
import { BlogFeedSource } from './blog';
import { ChangelogPageSource } from './changelog';
import { GitHubMergedChangesSource, GitHubReleasesSource, OctokitGitHubApi, type GitHubApi } from './github';
import { ReferenceDocumentSource } from './reference-doc';
import { SocialTimelineSource } from './social';
import { StatusFeedSource } from './status';

export interface SourceDependencies {
  /** Defaults to Octokit authenticated with GITHUB_TOKEN when set */
  github?: GitHubApi;
}

export function createSources(config: HeraldConfig, deps: SourceDependencies = {}): SourceRegistry {
  const { enabled } = config.sources;
  const registry = new SourceRegistry();

  if (enabled.blog) {
    registry.register(new BlogFeedSource({ rssUrl: config.sources.blogRssUrl, blogUrl: config.sources.blogUrl }));
  }

  if (enabled.release || enabled.merged_change) {
    const api = deps.github ?? new OctokitGitHubApi(config.github.token);
    if (enabled.release) {
      registry.register(new GitHubReleasesSource({ api, repos: config.github.repos }));
    }
    if (enabled.merged_change) {
      registry.register(new GitHubMergedChangesSource({ api, repos: config.github.repos }));
    }
  }

  if (enabled.changelog) {
    registry.register(new ChangelogPageSource({ url: config.sources.changelogUrl }));
  }

  if (enabled.reference_doc) {
    registry.register(new ReferenceDocumentSource({ url: config.sources.referenceDocUrl }));
  }

  if (enabled.incident_status) {
    registry.register(
      new StatusFeedSource({ rssUrl: config.sources.statusRssUrl, atomUrl: config.sources.statusAtomUrl })
    );
  }

  if (enabled.social && config.sources.socialHandle) {
    registry.register(
      new SocialTimelineSource({ handle: config.sources.socialHandle, mirrors: config.sources.socialMirrors })
    );
  }

  return registry;
}

export { BlogFeedSource } from './blog';
export { ChangelogPageSource } from './changelog';
export {
  GitHubMergedChangesSource,
  GitHubReleasesSource,
  OctokitGitHubApi,
  type GitHubApi,
  type PullRequest,
  type Release,
} from './github';
export { ReferenceDocumentSource } from './reference-doc';
export { SocialTimelineSource, firstSuccessful } from './social';
export { StatusFeedSource, classifyStatus } from './status';
