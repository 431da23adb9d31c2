/**
 * Builders shared by the unit tests
 */
import {
  ChangeSet,
  FeedChangeReport,
  FeedEntryItem,
  RepositoryChangeReport,
  RepositoryFileItem,
} from '../monitoring/types.js';

export function repositoryFile(
  path: string,
  overrides: Partial<RepositoryFileItem> = {}
): RepositoryFileItem {
  return {
    kind: 'repository_file',
    identity: path,
    path,
    contentHash: 'hash-' + path,
    size: 100,
    firstSeen: '2025-01-01T00:00:00.000Z',
    lastProcessed: '2025-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function feedEntry(identity: string, overrides: Partial<FeedEntryItem> = {}): FeedEntryItem {
  return {
    kind: 'feed_entry',
    identity,
    title: `Entry ${identity}`,
    link: `https://feed.test/${identity}`,
    content: `Body of ${identity}`,
    contentHash: 'hash-' + identity,
    size: 20,
    firstSeen: '2025-01-01T00:00:00.000Z',
    feedIndex: 0,
    ...overrides,
  };
}

export function textResponse(body: string, status: number = 200, contentType = 'text/plain'): Response {
  return new Response(body, { status, headers: { 'content-type': contentType } });
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function changeSet(
  newIdentities: string[],
  updatedIdentities: string[] = [],
  unchangedIdentities: string[] = [],
  averageSize: number = 100
): ChangeSet {
  const totalItems = newIdentities.length + updatedIdentities.length + unchangedIdentities.length;
  return {
    newIdentities,
    updatedIdentities,
    unchangedIdentities,
    summary: {
      newCount: newIdentities.length,
      updatedCount: updatedIdentities.length,
      unchangedCount: unchangedIdentities.length,
    },
    stats: { totalItems, totalSize: totalItems * averageSize, averageSize },
  };
}

export function repositoryReport(changes: ChangeSet): RepositoryChangeReport {
  return {
    kind: 'repository',
    repository: 'octo/docs',
    directory: 'docs',
    ref: 'main',
    detectedAt: '2025-06-01T12:00:00.000Z',
    changes,
  };
}

export function feedReport(feedIndex: number, changes: ChangeSet): FeedChangeReport {
  const summarize = (identity: string) => ({
    identity,
    title: `Entry ${identity}`,
    link: `https://feed.test/${identity}`,
    firstSeen: '2025-06-01T12:00:00.000Z',
  });
  return {
    kind: 'feed',
    feedUrl: `https://feed.test/${feedIndex}.xml`,
    feedIndex,
    detectedAt: '2025-06-01T12:00:00.000Z',
    changes,
    newEntries: changes.newIdentities.map(summarize),
    updatedEntries: changes.updatedIdentities.map(summarize),
    previousCount: changes.updatedIdentities.length + changes.unchangedIdentities.length,
    ageReport: {
      distribution: { lastWeek: changes.stats.totalItems, lastMonth: 0, lastQuarter: 0, older: 0 },
      oldest: [],
    },
  };
}
