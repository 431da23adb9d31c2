import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FeedFetcher } from './fetchers/feed-fetcher.js';
import { FeedMonitor, formatFeedSummary } from './feed-monitor.js';
import { SnapshotStore } from './state-store.js';
import { FeedChangeReport } from './types.js';
import { textResponse } from '../test/fixtures.js';

const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

function rss(items: Array<{ title: string; link: string; body?: string; pubDate?: string }>): string {
  const rendered = items
    .map(
      (item) => `<item>
        <title>${item.title}</title>
        <link>${item.link}</link>
        ${item.pubDate ? `<pubDate>${item.pubDate}</pubDate>` : ''}
        <description>${item.body ?? 'Body'}</description>
      </item>`
    )
    .join('\n');
  return `<rss version="2.0"><channel><title>Changelog</title><link>https://feed.test/</link>
    <description>Updates</description>${rendered}</channel></rss>`;
}

function emptyReport(overrides: Partial<FeedChangeReport>): FeedChangeReport {
  return {
    kind: 'feed',
    feedUrl: 'https://feed.test/rss',
    feedIndex: 0,
    detectedAt: '2025-03-01T00:00:00.000Z',
    changes: {
      newIdentities: [],
      updatedIdentities: [],
      unchangedIdentities: [],
      summary: { newCount: 0, updatedCount: 0, unchangedCount: 0 },
      stats: { totalItems: 0, totalSize: 0, averageSize: 0 },
    },
    newEntries: [],
    updatedEntries: [],
    previousCount: 0,
    ageReport: { distribution: { lastWeek: 0, lastMonth: 0, lastQuarter: 0, older: 0 }, oldest: [] },
    ...overrides,
  };
}

describe('formatFeedSummary', () => {
  it('should list the first three new titles and a remainder line', () => {
    const titles = ['One', 'Two', 'Three', 'Four', 'Five'];
    const report = emptyReport({
      feedIndex: 1,
      changes: {
        newIdentities: titles,
        updatedIdentities: [],
        unchangedIdentities: [],
        summary: { newCount: 5, updatedCount: 0, unchangedCount: 0 },
        stats: { totalItems: 5, totalSize: 50, averageSize: 10 },
      },
      newEntries: titles.map((title) => ({ identity: title, title, link: '', firstSeen: '' })),
    });

    expect(formatFeedSummary(report)).toBe(
      [
        'Feed 2 (https://feed.test/rss):',
        'New feed entries (5)',
        '  • One',
        '  • Two',
        '  • Three',
        '  • ... and 2 more',
        'Storage: 5 entries total, 5 new this run',
      ].join('\n')
    );
  });

  it('should mention updated entries', () => {
    const report = emptyReport({
      changes: {
        newIdentities: [],
        updatedIdentities: ['a'],
        unchangedIdentities: ['b'],
        summary: { newCount: 0, updatedCount: 1, unchangedCount: 1 },
        stats: { totalItems: 2, totalSize: 20, averageSize: 10 },
      },
    });

    expect(formatFeedSummary(report)).toBe(
      [
        'Feed 1 (https://feed.test/rss):',
        'Updated feed entries (1)',
        'Storage: 2 entries total, 0 new this run',
      ].join('\n')
    );
  });
});

describe('FeedMonitor', () => {
  let root: string;
  let store: SnapshotStore;
  let outputFile: string;
  const clock = new Date('2025-03-10T00:00:00.000Z');

  function createMonitor(feeds: string[]): FeedMonitor {
    return new FeedMonitor(new FeedFetcher({ retries: 1, retryDelay: 1 }), store, {
      feeds,
      actionsOutputFile: outputFile,
      now: () => clock,
    });
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    root = await mkdtemp(join(tmpdir(), 'feed-monitor-test-'));
    store = new SnapshotStore(root);
    outputFile = join(root, 'github-output.txt');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should store entries, change report and metadata per feed', async () => {
    mockFetch.mockResolvedValueOnce(
      textResponse(
        rss([
          { title: 'Alpha', link: 'https://feed.test/alpha', pubDate: 'Sat, 08 Mar 2025 00:00:00 GMT' },
          { title: 'Beta', link: 'https://feed.test/beta', pubDate: 'Mon, 01 Jan 2024 00:00:00 GMT' },
        ])
      )
    );

    const result = await createMonitor(['https://feed.test/rss']).run();

    expect(result.changesDetected).toBe(1);
    expect(result.summary).toBe(
      [
        'Feed 1 (https://feed.test/rss):',
        'New feed entries (2)',
        '  • Alpha',
        '  • Beta',
        'Storage: 2 entries total, 2 new this run',
      ].join('\n')
    );

    const snapshot = await store.load({ kind: 'feed', index: 0 });
    expect(Object.keys(snapshot)).toEqual(['https://feed.test/alpha', 'https://feed.test/beta']);

    const report = await store.loadChangeReport({ kind: 'feed', index: 0 });
    expect(report?.newEntries.map((entry) => entry.title)).toEqual(['Alpha', 'Beta']);
    expect(report?.ageReport.distribution).toEqual({
      lastWeek: 1,
      lastMonth: 0,
      lastQuarter: 0,
      older: 1,
    });

    const metadata = await store.loadFeedMetadata(0);
    expect(metadata).toEqual({
      feedTitle: 'Changelog',
      feedLink: 'https://feed.test/',
      feedDescription: 'Updates',
      feedUrl: 'https://feed.test/rss',
      feedIndex: 0,
      lastUpdated: '2025-03-10T00:00:00.000Z',
      totalEntries: 2,
    });
  });

  it('should continue with the next feed when one fails', async () => {
    mockFetch
      .mockResolvedValueOnce(textResponse('gone', 404))
      .mockResolvedValueOnce(textResponse(rss([{ title: 'Gamma', link: 'https://feed.test/gamma' }])));

    const result = await createMonitor(['https://broken.test/rss', 'https://feed.test/rss']).run();

    expect(result.details[0].error).toBe('HTTP 404: ');
    expect(result.details[1].hasChanges).toBe(true);
    expect(result.sourcesChecked).toBe(1);
    expect(await store.load({ kind: 'feed', index: 0 })).toEqual({});
    expect(Object.keys(await store.load({ kind: 'feed', index: 1 }))).toEqual([
      'https://feed.test/gamma',
    ]);
  });

  it('should skip a feed without entries', async () => {
    mockFetch.mockResolvedValueOnce(textResponse(rss([])));

    const result = await createMonitor(['https://feed.test/rss']).run();

    expect(result.details[0]).toEqual({
      sourceName: 'https://feed.test/rss',
      checked: true,
      hasChanges: false,
      summary: '',
    });
    expect(await store.loadFeedMetadata(0)).toBeUndefined();
  });

  it('should report unchanged feeds with empty outputs', async () => {
    const body = rss([{ title: 'Alpha', link: 'https://feed.test/alpha' }]);
    mockFetch
      .mockResolvedValueOnce(textResponse(body))
      .mockResolvedValueOnce(textResponse(body));

    await createMonitor(['https://feed.test/rss']).run();
    const result = await createMonitor(['https://feed.test/rss']).run();

    expect(result.changesDetected).toBe(0);
    const outputs = await readFile(outputFile, 'utf-8');
    expect(outputs.split('\n').slice(-3)).toEqual(['changes_detected=false', 'changes_summary=', '']);
  });

  it('should detect an edited entry as updated', async () => {
    mockFetch
      .mockResolvedValueOnce(textResponse(rss([{ title: 'Alpha', link: 'https://feed.test/alpha' }])))
      .mockResolvedValueOnce(
        textResponse(rss([{ title: 'Alpha', link: 'https://feed.test/alpha', body: 'Corrected' }]))
      );

    await createMonitor(['https://feed.test/rss']).run();
    const result = await createMonitor(['https://feed.test/rss']).run();

    expect(result.details[0].changes?.updatedIdentities).toEqual(['https://feed.test/alpha']);
    expect(result.summary).toContain('Updated feed entries (1)');
  });
});
