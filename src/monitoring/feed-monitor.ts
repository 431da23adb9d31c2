import { createChildLogger } from '../utils/logger.js';
import { writeActionOutputs } from '../utils/action-output.js';
import { errorMessage } from '../types/index.js';
import { FeedFetcher, FetchedFeed } from './fetchers/feed-fetcher.js';
import { analyzeAgeDistribution, carryForwardFirstSeen, hasChanges, reconcile } from './reconciler.js';
import { SnapshotStore } from './state-store.js';
import {
  FeedChangeReport,
  FeedEntryItem,
  FeedEntrySummary,
  FeedSourceKey,
  MonitorRunResult,
  MonitorSourceResult,
} from './types.js';

const logger = createChildLogger('feed-monitor');

/** New entry titles listed in a feed summary */
const SUMMARY_TITLE_LIMIT = 3;

export interface FeedMonitorOptions {
  feeds: string[];
  actionsOutputFile?: string;
  now?: () => Date;
}

function summarizeEntry(item: FeedEntryItem): FeedEntrySummary {
  return {
    identity: item.identity,
    title: item.title,
    link: item.link,
    published: item.published,
    firstSeen: item.firstSeen,
  };
}

/**
 * Multi-line summary of one feed's changes
 */
export function formatFeedSummary(report: FeedChangeReport): string {
  const lines: string[] = [`Feed ${report.feedIndex + 1} (${report.feedUrl}):`];
  const { newCount, updatedCount } = report.changes.summary;

  if (newCount > 0) {
    lines.push(`New feed entries (${newCount})`);
    for (const entry of report.newEntries.slice(0, SUMMARY_TITLE_LIMIT)) {
      lines.push(`  • ${entry.title}`);
    }
    if (report.newEntries.length > SUMMARY_TITLE_LIMIT) {
      lines.push(`  • ... and ${report.newEntries.length - SUMMARY_TITLE_LIMIT} more`);
    }
  }

  if (updatedCount > 0) {
    lines.push(`Updated feed entries (${updatedCount})`);
  }

  lines.push(
    `Storage: ${report.changes.stats.totalItems} entries total, ${newCount} new this run`
  );
  return lines.join('\n');
}

/**
 * Watches a list of syndication feeds. Each feed is an independent source
 * with its own state directory.
 */
export class FeedMonitor {
  private fetcher: FeedFetcher;
  private store: SnapshotStore;
  private options: FeedMonitorOptions;

  constructor(fetcher: FeedFetcher, store: SnapshotStore, options: FeedMonitorOptions) {
    this.fetcher = fetcher;
    this.store = store;
    this.options = options;
  }

  /**
   * Check every feed in configured order. A failing feed is recorded and the
   * next one processed.
   */
  async run(): Promise<MonitorRunResult> {
    const startedAt = this.now();
    const details: MonitorSourceResult[] = [];
    const { feeds } = this.options;

    logger.info({ feedCount: feeds.length }, 'Starting feed monitor run');

    for (const [index, url] of feeds.entries()) {
      logger.info({ feed: index + 1, of: feeds.length, url }, 'Processing feed');
      details.push(await this.checkFeed(url, index));
    }

    const completedAt = this.now();
    const changed = details.filter((detail) => detail.hasChanges);
    const summary = changed.map((detail) => detail.summary).join('\n\n');

    await writeActionOutputs(this.options.actionsOutputFile, {
      changes_detected: String(changed.length > 0),
      changes_summary: summary,
    });

    logger.info(
      {
        feedsChecked: details.filter((detail) => detail.checked).length,
        feedsChanged: changed.length,
        feedsFailed: details.filter((detail) => detail.error).length,
        durationMs: completedAt.getTime() - startedAt.getTime(),
      },
      'Feed monitor run complete'
    );

    return {
      sourcesChecked: details.filter((detail) => detail.checked).length,
      changesDetected: changed.length,
      details,
      summary,
      startedAt,
      completedAt,
    };
  }

  /**
   * Check a single feed
   */
  async checkFeed(url: string, index: number): Promise<MonitorSourceResult> {
    const key: FeedSourceKey = { kind: 'feed', index };
    const now = this.now();

    let fetched: FetchedFeed;
    try {
      fetched = await this.fetcher.fetch(url, index, now);
    } catch (error) {
      logger.error({ url, feedIndex: index, error: errorMessage(error) }, 'Could not fetch feed');
      return { sourceName: url, checked: false, hasChanges: false, summary: '', error: errorMessage(error) };
    }

    const current = fetched.snapshot;
    if (Object.keys(current).length === 0) {
      logger.warn({ url, feedIndex: index }, 'No entries found in feed');
      return { sourceName: url, checked: true, hasChanges: false, summary: '' };
    }

    const previous = await this.store.load(key);
    const changes = reconcile(previous, current);
    const merged = carryForwardFirstSeen(previous, current);

    const report: FeedChangeReport = {
      kind: 'feed',
      feedUrl: url,
      feedIndex: index,
      detectedAt: now.toISOString(),
      changes,
      newEntries: changes.newIdentities.map((identity) => summarizeEntry(merged[identity])),
      updatedEntries: changes.updatedIdentities.map((identity) => summarizeEntry(merged[identity])),
      previousCount: Object.keys(previous).length,
      ageReport: analyzeAgeDistribution(Object.values(merged), now),
    };

    const changed = hasChanges(changes);
    const summary = changed ? formatFeedSummary(report) : '';

    try {
      await this.store.save(key, merged);
      await this.store.saveChangeReport(key, report);
      await this.store.saveFeedMetadata(index, {
        feedTitle: fetched.title || 'Unknown',
        feedLink: fetched.link,
        feedDescription: fetched.description,
        feedUrl: url,
        feedIndex: index,
        lastUpdated: now.toISOString(),
        totalEntries: Object.keys(merged).length,
      });
    } catch (error) {
      logger.error({ url, feedIndex: index, error: errorMessage(error) }, 'Failed to persist feed state');
      return { sourceName: url, checked: true, hasChanges: changed, changes, summary, error: errorMessage(error) };
    }

    logger.info(
      { url, feedIndex: index, ...changes.summary, totalEntries: changes.stats.totalItems },
      changed ? 'Feed changes detected' : 'No changes in feed'
    );

    return { sourceName: url, checked: true, hasChanges: changed, changes, summary };
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }
}

export function createFeedMonitor(
  fetcher: FeedFetcher,
  store: SnapshotStore,
  options: FeedMonitorOptions
): FeedMonitor {
  return new FeedMonitor(fetcher, store, options);
}
