import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FeedFetcher, parseFeed, selectBody, toFeedEntryItem } from './feed-fetcher.js';
import { fingerprintFeedEntry } from '../reconciler.js';
import { FetchError } from '../../types/index.js';
import { textResponse } from '../../test/fixtures.js';

const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <title>Product Changelog</title>
    <link>https://changes.test/</link>
    <description>Latest product updates</description>
    <item>
      <title>Feature A is generally available</title>
      <link>https://changes.test/a</link>
      <guid>urn:change:a</guid>
      <pubDate>Mon, 03 Mar 2025 10:00:00 GMT</pubDate>
      <description><![CDATA[<p>Short <b>summary</b></p>]]></description>
    </item>
    <item>
      <title>Feature B preview</title>
      <link>https://changes.test/b</link>
      <description>Plain &amp; simple</description>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Release Notes</title>
  <subtitle>Engineering updates</subtitle>
  <link rel="self" href="https://notes.test/atom.xml"/>
  <link href="https://notes.test/"/>
  <entry>
    <title>Version 2</title>
    <id>tag:notes.test,2025:2</id>
    <link rel="alternate" href="https://notes.test/v2"/>
    <updated>2025-02-01T00:00:00Z</updated>
    <summary>Short</summary>
    <content type="html">&lt;p&gt;**Bigger** release&lt;/p&gt;</content>
  </entry>
</feed>`;

describe('parseFeed', () => {
  it('should read RSS channel metadata and items', () => {
    const feed = parseFeed(RSS);

    expect(feed.title).toBe('Product Changelog');
    expect(feed.link).toBe('https://changes.test/');
    expect(feed.description).toBe('Latest product updates');
    expect(feed.entries).toHaveLength(2);
    expect(feed.entries[0]).toEqual({
      id: 'urn:change:a',
      title: 'Feature A is generally available',
      link: 'https://changes.test/a',
      published: 'Mon, 03 Mar 2025 10:00:00 GMT',
      rawContent: '<p>Short <b>summary</b></p>',
    });
    expect(feed.entries[1].id).toBeUndefined();
    expect(feed.entries[1].rawContent).toBe('Plain & simple');
  });

  it('should read Atom feeds', () => {
    const feed = parseFeed(ATOM);

    expect(feed.title).toBe('Release Notes');
    expect(feed.link).toBe('https://notes.test/');
    expect(feed.description).toBe('Engineering updates');
    expect(feed.entries[0]).toEqual({
      id: 'tag:notes.test,2025:2',
      title: 'Version 2',
      link: 'https://notes.test/v2',
      published: '2025-02-01T00:00:00Z',
      rawContent: '<p>**Bigger** release</p>',
    });
  });

  it('should prefer encoded content', () => {
    const long = 'x'.repeat(250);
    const feed = parseFeed(`<rss xmlns:content="http://purl.org/rss/1.0/modules/content/"><channel>
      <item><link>https://a.test/1</link><description>short</description>
      <content:encoded><![CDATA[${long}]]></content:encoded></item>
    </channel></rss>`);

    expect(feed.entries[0].rawContent).toBe(long);
  });

  it('should reject documents that are not feeds', () => {
    expect(() => parseFeed('<html><body>hi</body></html>')).toThrow(FetchError);
  });
});

describe('selectBody', () => {
  it('should take the first candidate longer than 200 characters', () => {
    const long = 'y'.repeat(201);
    expect(selectBody(['short', undefined, long, 'z'.repeat(300)])).toBe(long);
  });

  it('should fall back to the first non-empty candidate', () => {
    expect(selectBody([undefined, '', 'first', 'second'])).toBe('first');
  });

  it('should return an empty body when nothing is present', () => {
    expect(selectBody([undefined, ''])).toBe('');
  });
});

describe('toFeedEntryItem', () => {
  it('should normalize the body and fingerprint title, link and body', () => {
    const item = toFeedEntryItem(
      {
        id: 'urn:1',
        title: 'Title',
        link: 'https://a.test/1',
        rawContent: '<p>Hello <em>there</em></p>',
      },
      2,
      '2025-03-01T00:00:00.000Z'
    );

    expect(item).toEqual({
      kind: 'feed_entry',
      identity: 'urn:1',
      title: 'Title',
      link: 'https://a.test/1',
      published: undefined,
      content: 'Hello there',
      contentHash: fingerprintFeedEntry('Title', 'https://a.test/1', 'Hello there'),
      size: 11,
      firstSeen: '2025-03-01T00:00:00.000Z',
      feedIndex: 2,
    });
  });

  it('should use the link when there is no id', () => {
    const item = toFeedEntryItem({ title: 't', link: 'https://a.test/2', rawContent: '' }, 0, 'now');
    expect(item?.identity).toBe('https://a.test/2');
  });

  it('should drop entries without id or link', () => {
    expect(toFeedEntryItem({ title: 't', link: '', rawContent: 'x' }, 0, 'now')).toBeUndefined();
  });
});

describe('FeedFetcher', () => {
  let fetcher: FeedFetcher;

  beforeEach(() => {
    vi.clearAllMocks();
    fetcher = new FeedFetcher({ retries: 1, retryDelay: 1 });
  });

  it('should fetch and convert entries keyed by identity', async () => {
    mockFetch.mockResolvedValueOnce(textResponse(RSS, 200, 'application/rss+xml'));

    const feed = await fetcher.fetch('https://changes.test/rss', 1, new Date('2025-03-05T00:00:00Z'));

    expect(feed.title).toBe('Product Changelog');
    expect(Object.keys(feed.snapshot)).toEqual(['urn:change:a', 'https://changes.test/b']);
    expect(feed.snapshot['urn:change:a'].content).toBe('Short summary');
    expect(feed.snapshot['urn:change:a'].feedIndex).toBe(1);
    expect(feed.snapshot['https://changes.test/b'].firstSeen).toBe('2025-03-05T00:00:00.000Z');
  });

  it('should keep the first of duplicate identities', async () => {
    mockFetch.mockResolvedValueOnce(
      textResponse(`<rss><channel>
        <item><title>One</title><link>https://a.test/same</link></item>
        <item><title>Two</title><link>https://a.test/same</link></item>
      </channel></rss>`)
    );

    const feed = await fetcher.fetch('https://a.test/rss', 0);

    expect(Object.values(feed.snapshot).map((entry) => entry.title)).toEqual(['One']);
  });

  it('should wrap parse failures in a FetchError', async () => {
    mockFetch.mockResolvedValueOnce(textResponse('<html><p>gone</p></html>', 200, 'text/html'));

    await expect(fetcher.fetch('https://a.test/rss', 0)).rejects.toThrow(
      'Failed to parse feed https://a.test/rss: Document is not an RSS or Atom feed'
    );
  });

  it('should propagate HTTP failures', async () => {
    mockFetch.mockResolvedValueOnce(textResponse('gone', 410));

    await expect(fetcher.fetch('https://a.test/rss', 0)).rejects.toThrow(FetchError);
  });
});
