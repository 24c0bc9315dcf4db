/**
 * Shared test doubles: in-process fetch routes, a scripted source and a
 * recording channel.
 */

import { vi } from 'vitest';
import { SourceAdapter, type FetchContext, type SeenView } from '../src/feeds/base';
import type { ChannelClient } from '../src/delivery/telegram';
import type { RawItem, SourceCategory } from '../src/types';
import { MemorySeenStore } from '../src/db/seen-store';
import type { GitHubApi, PullRequest, Release } from '../src/feeds/sources/github';

// ============================================================
// FETCH
// ============================================================

type Route = Response | (() => Response | Promise<Response>);

export function stubFetch(routes: Record<string, Route>) {
  const mock = vi.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const route = routes[url];
    if (!route) return new Response('not found', { status: 404 });
    return typeof route === 'function' ? route() : route.clone();
  });
  vi.stubGlobal('fetch', mock);
  return mock;
}

export const xml = (body: string, status = 200) =>
  new Response(body, { status, headers: { 'content-type': 'application/xml' } });

export const html = (body: string, status = 200) =>
  new Response(body, { status, headers: { 'content-type': 'text/html' } });

export const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

export function fetchContext(seen: SeenView = new MemorySeenStore()): FetchContext {
  return { signal: new AbortController().signal, seen };
}

// ============================================================
// ITEMS & SOURCES
// ============================================================

export function blogItem(title: string, overrides: Partial<RawItem> = {}): RawItem {
  return {
    category: 'blog',
    naturalId: `post-${title}`,
    title,
    url: `https://blog.test/${encodeURIComponent(title)}`,
    payload: { type: 'blog', source: 'rss' },
    ...overrides,
  };
}

export function changelogItem(title: string, overrides: Partial<RawItem> = {}): RawItem {
  return {
    category: 'changelog',
    title,
    url: `https://docs.test/changelog#${encodeURIComponent(title)}`,
    payload: { type: 'changelog' },
    ...overrides,
  };
}

export class StaticSource extends SourceAdapter {
  readonly kind = 'feed' as const;
  calls = 0;

  constructor(
    readonly name: string,
    readonly category: SourceCategory,
    private readonly produce: (context: FetchContext) => RawItem[] | Promise<RawItem[]>
  ) {
    super();
  }

  async fetch(context: FetchContext): Promise<RawItem[]> {
    this.calls += 1;
    return this.produce(context);
  }
}

// ============================================================
// GITHUB
// ============================================================

export class FakeGitHubApi implements GitHubApi {
  readonly releases = new Map<string, Release[] | Error>();
  readonly pulls = new Map<string, PullRequest[] | Error>();
  readonly requests: Array<{ repo: string; perPage: number }> = [];

  async listReleases(repo: string, perPage: number): Promise<Release[]> {
    this.requests.push({ repo, perPage });
    return this.resolve(this.releases.get(repo));
  }

  async listClosedPulls(repo: string, perPage: number): Promise<PullRequest[]> {
    this.requests.push({ repo, perPage });
    return this.resolve(this.pulls.get(repo));
  }

  private resolve<T>(value: T[] | Error | undefined): T[] {
    if (value instanceof Error) throw value;
    return value ?? [];
  }
}

export function release(tag: string, publishedAt: string, overrides: Partial<Release> = {}): Release {
  return {
    id: 1000,
    tag,
    name: `Release ${tag}`,
    body: null,
    url: `https://github.test/releases/${tag}`,
    draft: false,
    prerelease: false,
    publishedAt,
    ...overrides,
  };
}

export function pull(number: number, mergedAt: string | null, overrides: Partial<PullRequest> = {}): PullRequest {
  return {
    number,
    title: `Change ${number}`,
    body: null,
    url: `https://github.test/pull/${number}`,
    mergedAt,
    author: 'dev',
    baseBranch: 'main',
    ...overrides,
  };
}

// ============================================================
// CHANNEL
// ============================================================

export class FakeChannel implements ChannelClient {
  readonly name = 'fake';
  readonly sent: Array<{ channelId: string; text: string }> = [];
  /** Every send attempt, successful or not */
  readonly attempts: string[] = [];
  private readonly failures: Array<{ match: string; error: Error; remaining: number }> = [];

  /** Fail sends whose text contains `match`, `times` times */
  failWhen(match: string, error: Error, times = 1): this {
    this.failures.push({ match, error, remaining: times });
    return this;
  }

  async send(channelId: string, text: string): Promise<string> {
    this.attempts.push(text);
    const failure = this.failures.find(f => f.remaining > 0 && text.includes(f.match));
    if (failure) {
      failure.remaining -= 1;
      throw failure.error;
    }
    this.sent.push({ channelId, text });
    return `msg-${this.sent.length}`;
  }

  /** Bold title line of each sent message */
  titles(): string[] {
    return this.sent.map(message => message.text.split('\n\n')[1] ?? '');
  }
}
