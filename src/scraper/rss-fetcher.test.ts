import { describe, expect, it, vi } from 'vitest';
import { createFeedParser, fetchFeed, toEntry } from './rss-fetcher.js';
import type { FeedParser, RawFeedItem } from './types.js';

function fakeParser(items: RawFeedItem[]) {
  const parseURL = vi.fn(async (_url: string) => ({ items }));
  const parser: FeedParser = { parseURL };
  return { parser, parseURL };
}

describe('toEntry', () => {
  it('maps an RSS item', () => {
    const entry = toEntry({
      title: 'Soft fork signalling starts',
      link: 'https://example.test/soft-fork',
      pubDate: 'Wed, 03 Jan 2024 10:00:00 GMT',
      isoDate: '2024-01-03T10:00:00.000Z',
      description: '<p>Short description</p>',
      content: '<p>Short description</p>',
      contentEncoded: '<p>Full article body</p>',
    });

    expect(entry).toEqual({
      title: 'Soft fork signalling starts',
      link: 'https://example.test/soft-fork',
      summary: '<p>Short description</p>',
      content: [{ value: '<p>Full article body</p>' }, { value: '<p>Short description</p>' }],
      published: 'Wed, 03 Jan 2024 10:00:00 GMT',
      publishedParsed: new Date('2024-01-03T10:00:00.000Z'),
      updated: undefined,
      updatedParsed: undefined,
    });
  });

  it('prefers an Atom summary over the description', () => {
    const entry = toEntry({ summary: 'Atom summary', description: 'RSS description' });
    expect(entry.summary).toBe('Atom summary');
  });

  it('leaves dates absent when the item has none', () => {
    const entry = toEntry({ title: 'Undated' });

    expect(entry.published).toBeUndefined();
    expect(entry.publishedParsed).toBeUndefined();
    expect(entry.updated).toBeUndefined();
    expect(entry.updatedParsed).toBeUndefined();
    expect(entry.content).toEqual([]);
  });
});

describe('toEntry with parsed documents', () => {
  const ATOM_FEED = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example Atom</title>
  <id>urn:example:feed</id>
  <updated>2024-01-06T00:00:00Z</updated>
  <entry>
    <title>Only updated</title>
    <link href="https://example.test/only-updated"/>
    <id>urn:example:1</id>
    <updated>2024-01-05T08:00:00+01:00</updated>
  </entry>
  <entry>
    <title>Both dates</title>
    <link href="https://example.test/both"/>
    <id>urn:example:2</id>
    <published>2024-01-02T09:00:00+01:00</published>
    <updated>2024-01-06T00:00:00Z</updated>
  </entry>
</feed>`;

  const RSS_FEED = `<?xml version="1.0" encoding="utf-8"?>
<rss version="2.0">
  <channel>
    <title>Example RSS</title>
    <link>https://example.test</link>
    <description>Example channel</description>
    <item>
      <title>RSS item</title>
      <link>https://example.test/rss-item</link>
      <pubDate>Wed, 03 Jan 2024 10:00:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;

  it('treats an Atom entry with only updated as unpublished', async () => {
    const feed = await createFeedParser().parseString(ATOM_FEED);
    const entry = toEntry(feed.items[0]);

    expect(entry.title).toBe('Only updated');
    expect(entry.published).toBeUndefined();
    expect(entry.publishedParsed).toBeUndefined();
    expect(entry.updated).toBe('2024-01-05T08:00:00+01:00');
    expect(entry.updatedParsed).toEqual(new Date('2024-01-05T07:00:00.000Z'));
  });

  it('keeps Atom published and updated apart', async () => {
    const feed = await createFeedParser().parseString(ATOM_FEED);
    const entry = toEntry(feed.items[1]);

    expect(entry.published).toBe('2024-01-02T09:00:00+01:00');
    expect(entry.publishedParsed).toEqual(new Date('2024-01-02T08:00:00.000Z'));
    expect(entry.updated).toBe('2024-01-06T00:00:00Z');
    expect(entry.updatedParsed).toBeUndefined();
  });

  it('keeps the raw RSS pubDate as the published text', async () => {
    const feed = await createFeedParser().parseString(RSS_FEED);
    const entry = toEntry(feed.items[0]);

    expect(entry.published).toBe('Wed, 03 Jan 2024 10:00:00 GMT');
    expect(entry.publishedParsed).toEqual(new Date('2024-01-03T10:00:00.000Z'));
    expect(entry.updated).toBeUndefined();
  });
});

describe('fetchFeed', () => {
  it('returns parsed entries in feed order', async () => {
    const { parser, parseURL } = fakeParser([
      { title: 'First', link: 'https://example.test/1' },
      { title: 'Second', link: 'https://example.test/2' },
    ]);

    const result = await fetchFeed('https://example.test/rss', parser);

    expect(parseURL).toHaveBeenCalledWith('https://example.test/rss');
    expect(result.ok).toBe(true);
    expect(result.entries.map((entry) => entry.title)).toEqual(['First', 'Second']);
  });

  it('turns a parser failure into an empty failed result', async () => {
    const parser: FeedParser = {
      parseURL: vi.fn(async () => {
        throw new Error('getaddrinfo ENOTFOUND example.test');
      }),
    };

    const result = await fetchFeed('https://example.test/rss', parser);

    expect(result).toEqual({ ok: false, entries: [], error: 'getaddrinfo ENOTFOUND example.test' });
  });

  it('stringifies non-Error rejections', async () => {
    const parser: FeedParser = { parseURL: () => Promise.reject('Status code 404') };

    const result = await fetchFeed('https://example.test/missing', parser);

    expect(result).toEqual({ ok: false, entries: [], error: 'Status code 404' });
  });
});
