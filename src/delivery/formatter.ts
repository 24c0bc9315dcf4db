/**
 * Herald: Message Formatter
 *
 * Renders items as Telegram HTML. Pure and total: any RawItem renders,
 * missing fields get placeholders. Text is truncated before escaping so an
 * entity is never cut in half.
 */

import type { RawItem, SourceCategory, StatusType } from '../types';
import { truncate } from '../lib/text';

// ============================================================
// ESCAPING
// ============================================================

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

// ============================================================
// BUILDING BLOCKS
// ============================================================

const STATUS_EMOJI: Record<StatusType, string> = {
  incident: '🔴',
  resolved: '✅',
  maintenance: '🔧',
  degraded: '⚠️',
  update: '🔵',
};

const CATEGORY_LABELS: Record<SourceCategory, string> = {
  blog: '📝 Blog',
  release: '🚀 GitHub releases',
  merged_change: '🔀 GitHub merged PRs',
  changelog: '📋 Documentation changelog',
  reference_doc: '📄 Reference document',
  incident_status: '🔵 System status',
  social: '🐦 Social timeline',
};

function excerpt(text: string | undefined, max: number): string | undefined {
  if (!text?.trim()) return undefined;
  return escapeHtml(truncate(text.trim(), max));
}

function dateLine(publishedAt: string | undefined): string | undefined {
  if (!publishedAt) return undefined;
  const time = Date.parse(publishedAt);
  if (Number.isNaN(time)) return undefined;
  return `📅 ${new Date(time).toISOString().slice(0, 10)}`;
}

function linkLine(url: string, label: string): string | undefined {
  if (!url.trim()) return undefined;
  return `🔗 <a href="${escapeHtml(url.trim())}">${label}</a>`;
}

/**
 * Blocks are separated by a blank line; the footer lines follow together.
 */
function compose(blocks: Array<string | undefined>, footer: Array<string | undefined>): string {
  const body = blocks.filter((block): block is string => Boolean(block)).join('\n\n');
  const tail = footer.filter((line): line is string => Boolean(line)).join('\n');
  return tail ? `${body}\n\n${tail}` : body;
}

function footer(item: RawItem, label: string): Array<string | undefined> {
  return [dateLine(item.publishedAt), linkLine(item.url, label)];
}

// ============================================================
// TEMPLATES
// ============================================================

export function renderNotification(item: RawItem): string {
  const title = item.title.trim();
  const payload = item.payload;

  switch (payload.type) {
    case 'blog':
      return compose(
        ['📝 <b>New Blog Post</b>', `<b>${escapeHtml(title || 'Untitled')}</b>`, excerpt(item.body, 300)],
        footer(item, 'Read more')
      );

    case 'release': {
      const version = `<b>Version ${escapeHtml(payload.tag || 'Unknown')}</b>`;
      const name = payload.name?.trim() && payload.name.trim() !== payload.tag
        ? `\n${escapeHtml(payload.name.trim())}`
        : '';
      return compose(
        [
          `🚀 <b>New Release: ${escapeHtml(payload.repo || 'Unknown')}</b>`,
          version + (payload.prerelease ? ' <i>(pre-release)</i>' : '') + name,
          excerpt(item.body, 400),
        ],
        footer(item, 'View release')
      );
    }

    case 'merged_change':
      return compose(
        [
          `🔀 <b>Merged PR: ${escapeHtml(payload.repo || 'Unknown')}</b>`,
          `<b>#${payload.number}: ${escapeHtml(title || 'Untitled')}</b>\nby @${escapeHtml(payload.author || 'Unknown')}`,
          excerpt(item.body, 300),
        ],
        footer(item, 'View PR')
      );

    case 'changelog':
      return compose(
        [
          '📋 <b>Documentation Changelog</b>',
          `<b>${escapeHtml(title || 'Changelog update')}</b>`,
          excerpt(item.body, 400),
        ],
        footer(item, 'View changelog')
      );

    case 'reference_doc':
      return compose(
        payload.previousHash
          ? [
              '📄 <b>Reference Document Updated</b>',
              `<b>${escapeHtml(title || 'Untitled')}</b>`,
              'The document has changed since it was last checked.',
            ]
          : [
              '📄 <b>Reference Document Now Tracked</b>',
              `<b>${escapeHtml(title || 'Untitled')}</b>`,
              'Future changes to this document will be announced here.',
            ],
        footer(item, 'Read document')
      );

    case 'incident_status':
      return compose(
        [
          `${STATUS_EMOJI[payload.statusType]} <b>System Status: ${escapeHtml(title || 'Status update')}</b>`,
          excerpt(item.body, 400),
        ],
        footer(item, 'View status page')
      );

    case 'social':
      return compose(
        [`🐦 <b>New post from ${escapeHtml(payload.author || 'Unknown')}</b>`, excerpt(item.body ?? title, 1000)],
        footer(item, 'View post')
      );
  }
}

/**
 * One-time announcement listing the monitored sources.
 */
export function renderStartupMessage(categories: SourceCategory[]): string {
  const lines = categories.map(category => CATEGORY_LABELS[category]);
  return compose(['🤖 <b>Herald Started</b>', ['Monitoring:', ...lines].join('\n')], []);
}
