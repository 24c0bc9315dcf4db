/**
 * Herald: Configuration
 *
 * Loads and validates environment configuration. Every variable is
 * optional except the Telegram credentials, which a dry run may omit.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { SourceCategory } from '../types';

// ============================================================
// DEFAULTS
// ============================================================

export const DEFAULT_TRACKED_REPOS = [
  'zama-ai/fhevm',
  'zama-ai/tfhe-rs',
  'zama-ai/concrete-ml',
  'zama-ai/concrete',
];

const DEFAULT_URLS = {
  blogRss: 'https://www.zama.ai/rss.xml',
  blog: 'https://www.zama.ai/blog',
  changelog: 'https://docs.zama.ai/change-log',
  referenceDoc: 'https://docs.zama.ai/protocol/zama-protocol-litepaper',
  statusRss: 'https://status.zama.ai/feed.rss',
  statusAtom: 'https://status.zama.ai/feed.atom',
} as const;

// ============================================================
// SCHEMA
// ============================================================

const flag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .optional()
    .transform(v => (v === undefined ? fallback : v === 'true' || v === '1' || v === 'yes'));

const int = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).optional().transform(v => v ?? fallback);

const list = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform(v =>
      v === undefined || v.trim() === ''
        ? fallback
        : v.split(',').map(s => s.trim()).filter(s => s.length > 0)
    );

const optionalString = z
  .string()
  .optional()
  .transform(v => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const repoName = /^[\w.-]+\/[\w.-]+$/;

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHANNEL_ID: optionalString,

  CHECK_INTERVAL_HOURS: int(0),
  CHECK_INTERVAL_MINUTES: int(5, 1),
  SOURCE_TIMEOUT_MS: int(15_000, 1),

  GITHUB_TOKEN: optionalString,
  TRACKED_REPOS: list(DEFAULT_TRACKED_REPOS).pipe(
    z.array(z.string().regex(repoName, 'expected owner/repo'))
  ),

  ENABLE_BLOG: flag(true),
  ENABLE_RELEASES: flag(true),
  ENABLE_MERGED_CHANGES: flag(true),
  ENABLE_CHANGELOG: flag(true),
  ENABLE_REFERENCE_DOC: flag(true),
  ENABLE_STATUS: flag(true),
  ENABLE_SOCIAL: flag(false),

  BLOG_RSS_URL: z.string().url().default(DEFAULT_URLS.blogRss),
  BLOG_URL: z.string().url().default(DEFAULT_URLS.blog),
  CHANGELOG_URL: z.string().url().default(DEFAULT_URLS.changelog),
  REFERENCE_DOC_URL: z.string().url().default(DEFAULT_URLS.referenceDoc),
  STATUS_RSS_URL: z.string().url().default(DEFAULT_URLS.statusRss),
  STATUS_ATOM_URL: z.string().url().default(DEFAULT_URLS.statusAtom),
  SOCIAL_HANDLE: optionalString,
  SOCIAL_MIRRORS: list([]).pipe(z.array(z.string().url())),

  MIN_MESSAGE_INTERVAL_MS: int(2_000),
  DELIVERY_MAX_ATTEMPTS: int(4, 1),
  DELIVERY_BASE_DELAY_MS: int(1_000),
  ANNOUNCE_ON_STARTUP: flag(true),

  STORE_BACKEND: z.enum(['file', 'supabase']).default('file'),
  STORE_FILE: z.string().min(1).default('posted_items.json'),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SEEN_TABLE: z.string().min(1).default('seen_items'),

  STATUS_PORT: z.coerce.number().int().min(1).max(65_535).optional(),
});

// ============================================================
// CONFIG SHAPE
// ============================================================

export interface HeraldConfig {
  telegram: {
    botToken?: string;
    channelId?: string;
  };
  schedule: {
    intervalMs: number;
    sourceTimeoutMs: number;
    announceOnStartup: boolean;
  };
  github: {
    token?: string;
    repos: string[];
  };
  sources: {
    enabled: Record<SourceCategory, boolean>;
    blogRssUrl: string;
    blogUrl: string;
    changelogUrl: string;
    referenceDocUrl: string;
    statusRssUrl: string;
    statusAtomUrl: string;
    socialHandle?: string;
    socialMirrors: string[];
  };
  delivery: {
    minIntervalMs: number;
    maxAttempts: number;
    baseDelayMs: number;
  };
  store:
    | { backend: 'file'; file: string }
    | { backend: 'supabase'; url: string; serviceRoleKey: string; table: string };
  statusPort?: number;
}

export interface LoadConfigOptions {
  /** Dry runs print instead of sending, so the Telegram credentials may be absent */
  dryRun?: boolean;
}

/**
 * Load and validate configuration from an environment map.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {}
): HeraldConfig {
  // Empty strings in .env mean "unset"
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const issues: string[] = [];

  if (!options.dryRun) {
    if (!e.TELEGRAM_BOT_TOKEN) issues.push('TELEGRAM_BOT_TOKEN is required');
    if (!e.TELEGRAM_CHANNEL_ID) issues.push('TELEGRAM_CHANNEL_ID is required');
  }

  if (e.ENABLE_SOCIAL && (!e.SOCIAL_HANDLE || e.SOCIAL_MIRRORS.length === 0)) {
    issues.push('ENABLE_SOCIAL requires SOCIAL_HANDLE and SOCIAL_MIRRORS');
  }

  let store: HeraldConfig['store'] = { backend: 'file', file: e.STORE_FILE };
  if (e.STORE_BACKEND === 'supabase') {
    if (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY) {
      issues.push('STORE_BACKEND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
    } else {
      store = {
        backend: 'supabase',
        url: e.SUPABASE_URL,
        serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
        table: e.SEEN_TABLE,
      };
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  const intervalMs =
    e.CHECK_INTERVAL_HOURS > 0
      ? e.CHECK_INTERVAL_HOURS * 60 * 60 * 1000
      : e.CHECK_INTERVAL_MINUTES * 60 * 1000;

  return {
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN,
      channelId: e.TELEGRAM_CHANNEL_ID,
    },
    schedule: {
      intervalMs,
      sourceTimeoutMs: e.SOURCE_TIMEOUT_MS,
      announceOnStartup: e.ANNOUNCE_ON_STARTUP,
    },
    github: {
      token: e.GITHUB_TOKEN,
      repos: e.TRACKED_REPOS,
    },
    sources: {
      enabled: {
        blog: e.ENABLE_BLOG,
        release: e.ENABLE_RELEASES,
        merged_change: e.ENABLE_MERGED_CHANGES,
        changelog: e.ENABLE_CHANGELOG,
        reference_doc: e.ENABLE_REFERENCE_DOC,
        incident_status: e.ENABLE_STATUS,
        social: e.ENABLE_SOCIAL,
      },
      blogRssUrl: e.BLOG_RSS_URL,
      blogUrl: e.BLOG_URL,
      changelogUrl: e.CHANGELOG_URL,
      referenceDocUrl: e.REFERENCE_DOC_URL,
      statusRssUrl: e.STATUS_RSS_URL,
      statusAtomUrl: e.STATUS_ATOM_URL,
      socialHandle: e.SOCIAL_HANDLE,
      socialMirrors: e.SOCIAL_MIRRORS,
    },
    delivery: {
      minIntervalMs: e.MIN_MESSAGE_INTERVAL_MS,
      maxAttempts: e.DELIVERY_MAX_ATTEMPTS,
      baseDelayMs: e.DELIVERY_BASE_DELAY_MS,
    },
    store,
    statusPort: e.STATUS_PORT,
  };
}
