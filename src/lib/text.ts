/**
 * Herald: Text Helpers
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

/**
 * Collapse runs of whitespace and trim.
 */
export function squish(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Strip markup from an HTML fragment, keeping its text with entities decoded.
 */
export function stripHtml(html: string): string {
  return squish(cheerio.load(html).root().text());
}

const BLOCK_ELEMENTS = 'p, div, li, tr, h1, h2, h3, h4, h5, h6, section, article, header, footer, blockquote, pre';

/**
 * Text of the first element matching `selector`, with block boundaries
 * kept as spaces. Mutates the document.
 */
export function blockText($: CheerioAPI, selector: string): string {
  const root = $(selector).first();
  root.find(BLOCK_ELEMENTS).append('\n');
  return squish(root.text());
}

/**
 * Keep non-blank lines, each trimmed.
 */
export function compactLines(text: string): string {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n');
}

/**
 * Cut to `max` code points, appending an ellipsis only when something was cut.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, max).join('').trimEnd() + '…';
}

/**
 * Parse a date string to ISO-8601, or undefined when unparseable.
 */
export function toIsoDate(value: string | undefined | null): string | undefined {
  if (!value) return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString();
}
