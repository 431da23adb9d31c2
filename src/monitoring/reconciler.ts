/**
 * Change reconciliation between two snapshots of one source.
 *
 * Items are classified only by identity and fingerprint; size and the
 * descriptive fields never take part in equality.
 */
import { hashBytes, hashString } from '../utils/hash.js';
import {
  AgeReport,
  ChangeSet,
  Fingerprinted,
  SizeStats,
  Snapshot,
  TrackedItem,
} from './types.js';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Fingerprint of a repository file: raw bytes
 */
export function fingerprintFile(content: Uint8Array): string {
  return hashBytes(content);
}

/**
 * Fingerprint of a feed entry. Title and link take part so that corrections
 * to either are reported as updates.
 */
export function fingerprintFeedEntry(title: string, link: string, normalizedBody: string): string {
  return hashString(`${title}${link}${normalizedBody}`);
}

export function computeSizeStats(snapshot: Snapshot<Fingerprinted>): SizeStats {
  const items = Object.values(snapshot);
  const totalSize = items.reduce((sum, item) => sum + item.size, 0);
  return {
    totalItems: items.length,
    totalSize,
    averageSize: items.length > 0 ? Math.round(totalSize / items.length) : 0,
  };
}

/**
 * Classify every identity of `current` as new, updated or unchanged.
 * Identities only present in `previous` are not reported.
 */
export function reconcile<T extends Fingerprinted>(
  previous: Snapshot<T>,
  current: Snapshot<T>
): ChangeSet {
  const newIdentities: string[] = [];
  const updatedIdentities: string[] = [];
  const unchangedIdentities: string[] = [];

  for (const [identity, item] of Object.entries(current)) {
    const before = Object.hasOwn(previous, identity) ? previous[identity] : undefined;
    if (before === undefined) {
      newIdentities.push(identity);
    } else if (before.contentHash !== item.contentHash) {
      updatedIdentities.push(identity);
    } else {
      unchangedIdentities.push(identity);
    }
  }

  return {
    newIdentities,
    updatedIdentities,
    unchangedIdentities,
    summary: {
      newCount: newIdentities.length,
      updatedCount: updatedIdentities.length,
      unchangedCount: unchangedIdentities.length,
    },
    stats: computeSizeStats(current),
  };
}

export function hasChanges(changes: ChangeSet): boolean {
  return changes.summary.newCount > 0 || changes.summary.updatedCount > 0;
}

/**
 * Build the snapshot to persist: current items, keeping the first-seen
 * timestamp of every identity that was already tracked. A stored first-seen
 * that does not parse is replaced by the current run's.
 */
export function carryForwardFirstSeen<T extends TrackedItem>(
  previous: Snapshot<TrackedItem>,
  current: Snapshot<T>
): Snapshot<T> {
  const merged: Snapshot<T> = {};
  for (const [identity, item] of Object.entries(current)) {
    const before = Object.hasOwn(previous, identity) ? previous[identity] : undefined;
    merged[identity] =
      before && parseTimestamp(before.firstSeen) ? { ...item, firstSeen: before.firstSeen } : item;
  }
  return merged;
}

/**
 * Parse an ISO-8601 or RFC 822 timestamp, or undefined
 */
export function parseTimestamp(value: string | undefined): Date | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }
  const date = new Date(value);
  return isNaN(date.getTime()) ? undefined : date;
}

/**
 * Whole days elapsed between `from` and `now`
 */
export function daysBetween(from: Date, now: Date): number {
  return Math.floor((now.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Timestamp an item's age is measured from: the published date for feed
 * entries when it parses, otherwise first-seen
 */
export function referenceTimestamp(item: TrackedItem): Date | undefined {
  if (item.kind === 'feed_entry') {
    return parseTimestamp(item.published) ?? parseTimestamp(item.firstSeen);
  }
  return parseTimestamp(item.firstSeen);
}

/**
 * Bucket items by age for reporting. Unparseable timestamps count as 0 days
 * old here, unlike the retention sweeper which treats them as expired.
 */
export function analyzeAgeDistribution(
  items: TrackedItem[],
  now: Date,
  oldestLimit: number = 10
): AgeReport {
  const distribution = { lastWeek: 0, lastMonth: 0, lastQuarter: 0, older: 0 };

  const aged = items.map((item) => {
    const reference = referenceTimestamp(item);
    const ageDays = reference ? daysBetween(reference, now) : 0;

    if (ageDays <= 7) {
      distribution.lastWeek++;
    } else if (ageDays <= 30) {
      distribution.lastMonth++;
    } else if (ageDays <= 90) {
      distribution.lastQuarter++;
    } else {
      distribution.older++;
    }

    const title = item.kind === 'feed_entry' ? item.title : item.path;
    return { identity: item.identity, title: title.slice(0, 50), ageDays };
  });

  aged.sort((a, b) => b.ageDays - a.ageDays);

  return { distribution, oldest: aged.slice(0, oldestLimit) };
}
