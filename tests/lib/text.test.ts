import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { blockText, compactLines, squish, stripHtml, toIsoDate, truncate } from '../../src/lib/text';

describe('text helpers', () => {
  it('squish collapses whitespace', () => {
    expect(squish('  a \n\n b\tc ')).toBe('a b c');
  });

  it('stripHtml keeps text and decodes plain entities', () => {
    expect(stripHtml('<p>Hello <b>world</b></p>')).toBe('Hello world');
    expect(stripHtml('Fish &amp; chips')).toBe('Fish & chips');
  });

  it('stripHtml decodes named and numeric entities without markup', () => {
    expect(stripHtml('Caf&eacute;&nbsp;au &lt;lait&gt; &#8211; 2')).toBe('Café au <lait> – 2');
  });

  it('blockText separates block elements', () => {
    const $ = cheerio.load('<main><h1>Title</h1><p>First.</p><p>Second.</p></main>');
    expect(blockText($, 'main')).toBe('Title First. Second.');
  });

  it('compactLines drops blank lines and trims', () => {
    expect(compactLines('  one  \n\n\n two\n ')).toBe('one\ntwo');
  });

  describe('truncate', () => {
    it('returns short text unchanged', () => {
      expect(truncate('short', 10)).toBe('short');
    });

    it('cuts and appends an ellipsis', () => {
      expect(truncate('hello world', 6)).toBe('hello…');
    });

    it('counts code points, not UTF-16 units', () => {
      expect(truncate('🚀🚀🚀', 3)).toBe('🚀🚀🚀');
      expect(truncate('🚀🚀🚀', 2)).toBe('🚀🚀…');
    });
  });

  describe('toIsoDate', () => {
    it('normalizes parseable dates', () => {
      expect(toIsoDate('Tue, 02 Jan 2024 10:00:00 GMT')).toBe('2024-01-02T10:00:00.000Z');
    });

    it('returns undefined for missing or invalid input', () => {
      expect(toIsoDate(undefined)).toBeUndefined();
      expect(toIsoDate('')).toBeUndefined();
      expect(toIsoDate('not a date')).toBeUndefined();
    });
  });
});
