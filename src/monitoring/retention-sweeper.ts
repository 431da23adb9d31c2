/**
 * Age-based pruning of tracked items.
 *
 * Runs as ANALYZE, then REPORT (dry run) or REPORT and MUTATE, then persists
 * a snapshot only if something was actually deleted from it.
 */
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../types/index.js';
import { computeSizeStats, daysBetween, referenceTimestamp } from './reconciler.js';
import { SnapshotStore } from './state-store.js';
import { CleanupCandidate, Snapshot, SourceKey, TrackedItem } from './types.js';

const logger = createChildLogger('retention-sweeper');

export interface SweepOptions<T extends TrackedItem> {
  now: Date;
  /**
   * Deletes the artifact backing an item. Resolves to false when the
   * artifact was already gone.
   */
  removeArtifact?: (item: T) => Promise<boolean>;
  /**
   * Whether the artifact backing an item is present. In a dry run only
   * candidates with a present artifact count toward bytes freed.
   */
  artifactExists?: (item: T) => Promise<boolean>;
}

export interface SweepFailure {
  identity: string;
  error: string;
}

export interface SweepResult<T extends TrackedItem> {
  candidates: CleanupCandidate[];
  /** Snapshot entries deleted; always 0 in a dry run */
  removedCount: number;
  /** Bytes of backing artifacts deleted, or that would be in a dry run */
  bytesFreed: number;
  remaining: Snapshot<T>;
  failures: SweepFailure[];
}

/**
 * Items older than `thresholdDays`. An item whose reference timestamp does
 * not parse is always a candidate.
 */
export function findCleanupCandidates(
  snapshot: Snapshot<TrackedItem>,
  thresholdDays: number,
  now: Date
): CleanupCandidate[] {
  const candidates: CleanupCandidate[] = [];

  for (const item of Object.values(snapshot)) {
    const reference = referenceTimestamp(item);
    const ageDays = reference ? daysBetween(reference, now) : null;

    if (ageDays === null || ageDays > thresholdDays) {
      candidates.push({
        identity: item.identity,
        kind: item.kind,
        ageDays,
        size: item.size,
        title: item.kind === 'feed_entry' ? item.title.slice(0, 50) : item.path,
      });
    }
  }

  return candidates;
}

/**
 * Select and, unless `destructive` is false, delete aged items. The input
 * snapshot is never mutated.
 */
export async function sweep<T extends TrackedItem>(
  snapshot: Snapshot<T>,
  thresholdDays: number,
  destructive: boolean,
  options: SweepOptions<T>
): Promise<SweepResult<T>> {
  const candidates = findCleanupCandidates(snapshot, thresholdDays, options.now);
  const remaining: Snapshot<T> = { ...snapshot };
  const failures: SweepFailure[] = [];
  const { removeArtifact, artifactExists } = options;

  if (!destructive) {
    let bytesFreed = 0;
    if (removeArtifact) {
      for (const candidate of candidates) {
        const item = snapshot[candidate.identity];
        if (!artifactExists || (await artifactExists(item))) {
          bytesFreed += candidate.size;
        }
      }
    }
    return { candidates, removedCount: 0, bytesFreed, remaining, failures };
  }

  let removedCount = 0;
  let bytesFreed = 0;

  for (const candidate of candidates) {
    const item = snapshot[candidate.identity];

    if (removeArtifact) {
      try {
        const existed = await removeArtifact(item);
        if (existed) {
          bytesFreed += item.size;
        } else {
          logger.debug({ identity: candidate.identity }, 'Artifact already removed');
        }
      } catch (error) {
        logger.error({ identity: candidate.identity, error: errorMessage(error) }, 'Error removing artifact');
        failures.push({ identity: candidate.identity, error: errorMessage(error) });
        continue;
      }
    }

    delete remaining[candidate.identity];
    removedCount++;
  }

  return { candidates, removedCount, bytesFreed, remaining, failures };
}

// ============================================================
// Store-level pass
// ============================================================

export interface SourceSweepReport {
  source: string;
  key: SourceKey;
  totalItems: number;
  totalSize: number;
  candidates: CleanupCandidate[];
  removedCount: number;
  bytesFreed: number;
  failures: SweepFailure[];
  /** Whether the pruned snapshot was written back; a failed write is listed in `failures` */
  persisted: boolean;
}

export interface RetentionSweepReport {
  thresholdDays: number;
  dryRun: boolean;
  sources: SourceSweepReport[];
  totals: {
    candidates: number;
    removed: number;
    bytesFreed: number;
    failures: number;
  };
}

export interface RetentionSweeperOptions {
  thresholdDays: number;
  dryRun: boolean;
  now?: () => Date;
}

/**
 * Applies the retention policy to the repository snapshot and every stored
 * feed snapshot
 */
export class RetentionSweeper {
  private store: SnapshotStore;
  private options: RetentionSweeperOptions;

  constructor(store: SnapshotStore, options: RetentionSweeperOptions) {
    this.store = store;
    this.options = options;
  }

  async run(): Promise<RetentionSweepReport> {
    const { thresholdDays, dryRun } = this.options;
    const now = this.options.now ? this.options.now() : new Date();

    logger.info({ thresholdDays, dryRun, rootDir: this.store.rootDir }, 'Starting retention sweep');

    const sources: SourceSweepReport[] = [];

    const repositoryKey = { kind: 'repository' } as const;
    const repositorySnapshot = await this.store.load(repositoryKey);
    const repositoryResult = await sweep(repositorySnapshot, thresholdDays, !dryRun, {
      now,
      removeArtifact: (item) => this.store.removeArtifact(item.identity),
      artifactExists: (item) => this.store.artifactExists(item.identity),
    });
    sources.push(
      await this.finish('repository', repositoryKey, repositorySnapshot, repositoryResult)
    );

    for (const index of await this.store.listFeedIndexes()) {
      const key = { kind: 'feed', index } as const;
      const snapshot = await this.store.load(key);
      const result = await sweep(snapshot, thresholdDays, !dryRun, { now });
      sources.push(await this.finish(`feed-${index}`, key, snapshot, result));
    }

    const report: RetentionSweepReport = {
      thresholdDays,
      dryRun,
      sources,
      totals: {
        candidates: sources.reduce((sum, source) => sum + source.candidates.length, 0),
        removed: sources.reduce((sum, source) => sum + source.removedCount, 0),
        bytesFreed: sources.reduce((sum, source) => sum + source.bytesFreed, 0),
        failures: sources.reduce((sum, source) => sum + source.failures.length, 0),
      },
    };

    logger.info({ ...report.totals, dryRun }, 'Retention sweep complete');
    return report;
  }

  private async finish<T extends TrackedItem>(
    source: string,
    key: SourceKey,
    snapshot: Snapshot<T>,
    result: SweepResult<T>
  ): Promise<SourceSweepReport> {
    const stats = computeSizeStats(snapshot);
    const failures = [...result.failures];
    let persisted = false;

    if (result.removedCount > 0) {
      try {
        await this.store.save(key, result.remaining);
        persisted = true;
        logger.info({ source, removed: result.removedCount }, 'Pruned snapshot saved');
      } catch (error) {
        logger.error({ source, error: errorMessage(error) }, 'Failed to save pruned snapshot');
        failures.push({ identity: this.store.snapshotPath(key), error: errorMessage(error) });
      }
    }

    return {
      source,
      key,
      totalItems: stats.totalItems,
      totalSize: stats.totalSize,
      candidates: result.candidates,
      removedCount: result.removedCount,
      bytesFreed: result.bytesFreed,
      failures,
      persisted,
    };
  }
}

export function createRetentionSweeper(
  store: SnapshotStore,
  options: RetentionSweeperOptions
): RetentionSweeper {
  return new RetentionSweeper(store, options);
}
