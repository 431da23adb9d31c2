import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { createChildLogger } from '../../utils/logger.js';
import { normalizeText } from '../../utils/text-normalizer.js';
import { FetchError, errorMessage } from '../../types/index.js';
import { fingerprintFeedEntry } from '../reconciler.js';
import { FeedEntryItem, Snapshot } from '../types.js';
import { BaseFetcher, FetcherOptions } from './base-fetcher.js';

const logger = createChildLogger('feed-fetcher');

/** Body length above which a candidate is taken without looking further */
const PREFERRED_BODY_LENGTH = 200;

export interface ParsedFeedEntry {
  id?: string;
  title: string;
  link: string;
  published?: string;
  /** Markup as published, before normalization */
  rawContent: string;
}

export interface ParsedFeed {
  title: string;
  link: string;
  description: string;
  entries: ParsedFeedEntry[];
}

export interface FetchedFeed {
  url: string;
  title: string;
  link: string;
  description: string;
  /** Keyed by entry identity, in feed order */
  snapshot: Snapshot<FeedEntryItem>;
}

function childElements($: cheerio.CheerioAPI, parent: Element): Element[] {
  return $(parent).children().toArray();
}

/**
 * Trimmed text of the first direct child with one of the given tag names
 */
function childText($: cheerio.CheerioAPI, parent: Element, names: string[]): string | undefined {
  const children = childElements($, parent);
  for (const name of names) {
    const match = children.find((child) => child.tagName.toLowerCase() === name);
    if (match) {
      const text = $(match).text().trim();
      if (text) {
        return text;
      }
    }
  }
  return undefined;
}

/**
 * RSS carries the link as text, Atom as an href attribute
 */
function childLink($: cheerio.CheerioAPI, parent: Element): string {
  const links = childElements($, parent).filter((child) => child.tagName.toLowerCase() === 'link');
  for (const link of links) {
    const href = $(link).attr('href');
    const rel = $(link).attr('rel');
    if (href && (!rel || rel === 'alternate')) {
      return href.trim();
    }
    const text = $(link).text().trim();
    if (text) {
      return text;
    }
  }
  return '';
}

/**
 * Pick the entry body: the first non-empty candidate longer than the
 * preferred length, otherwise the first non-empty one
 */
export function selectBody(candidates: Array<string | undefined>): string {
  const present = candidates.filter((candidate): candidate is string => !!candidate);
  return present.find((candidate) => candidate.length > PREFERRED_BODY_LENGTH) ?? present[0] ?? '';
}

function parseEntry($: cheerio.CheerioAPI, element: Element): ParsedFeedEntry {
  return {
    id: childText($, element, ['guid', 'id']),
    title: childText($, element, ['title']) ?? 'No title',
    link: childLink($, element),
    published: childText($, element, ['pubdate', 'published', 'updated', 'dc:date']),
    rawContent: selectBody([
      childText($, element, ['content:encoded']),
      childText($, element, ['content']),
      childText($, element, ['description']),
      childText($, element, ['summary']),
    ]),
  };
}

/**
 * Parse an RSS 2.0, RSS 1.0 or Atom document
 */
export function parseFeed(xml: string): ParsedFeed {
  const $ = cheerio.load(xml, { xml: true });

  const channel = $('channel').first().get(0) ?? $('feed').first().get(0);
  const entryElements = [...$('item').toArray(), ...$('entry').toArray()];

  if (!channel && entryElements.length === 0) {
    throw new FetchError('Document is not an RSS or Atom feed');
  }

  return {
    title: channel ? childText($, channel, ['title']) ?? '' : '',
    link: channel ? childLink($, channel) : '',
    description: channel ? childText($, channel, ['description', 'subtitle']) ?? '' : '',
    entries: entryElements.map((element) => parseEntry($, element)),
  };
}

/**
 * Convert a parsed entry to a tracked item, or undefined when it has
 * neither id nor link
 */
export function toFeedEntryItem(
  entry: ParsedFeedEntry,
  feedIndex: number,
  timestamp: string
): FeedEntryItem | undefined {
  const identity = entry.id || entry.link;
  if (!identity) {
    return undefined;
  }

  const content = normalizeText(entry.rawContent);
  return {
    kind: 'feed_entry',
    identity,
    title: entry.title,
    link: entry.link,
    published: entry.published,
    content,
    contentHash: fingerprintFeedEntry(entry.title, entry.link, content),
    size: Buffer.byteLength(content, 'utf8'),
    firstSeen: timestamp,
    feedIndex,
  };
}

/**
 * Fetches a syndication feed and converts its entries to tracked items
 */
export class FeedFetcher extends BaseFetcher {
  constructor(options: FetcherOptions = {}) {
    super(options);
  }

  async fetch(url: string, feedIndex: number, now: Date = new Date()): Promise<FetchedFeed> {
    const { content } = await this.fetchWithRetry(url, {
      headers: {
        Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5',
      },
    });

    let parsed: ParsedFeed;
    try {
      parsed = parseFeed(content);
    } catch (error) {
      throw new FetchError(`Failed to parse feed ${url}: ${errorMessage(error)}`, undefined, { url });
    }

    const timestamp = now.toISOString();
    const snapshot: Snapshot<FeedEntryItem> = {};
    let dropped = 0;

    for (const entry of parsed.entries) {
      const item = toFeedEntryItem(entry, feedIndex, timestamp);
      if (!item) {
        dropped++;
        continue;
      }
      if (!Object.hasOwn(snapshot, item.identity)) {
        snapshot[item.identity] = item;
      }
    }

    logger.info(
      { url, feedIndex, entries: Object.keys(snapshot).length, dropped },
      'Feed fetched'
    );

    return {
      url,
      title: parsed.title,
      link: parsed.link,
      description: parsed.description,
      snapshot,
    };
  }
}
