import { createChildLogger } from '../utils/logger.js';
import { writeActionOutputs } from '../utils/action-output.js';
import { errorMessage } from '../types/index.js';
import {
  FetchedRepository,
  RepositoryFetcher,
  RepositoryTarget,
} from './fetchers/repository-fetcher.js';
import { carryForwardFirstSeen, hasChanges, reconcile } from './reconciler.js';
import { SnapshotStore } from './state-store.js';
import {
  ChangeSet,
  MonitorRunResult,
  MonitorSourceResult,
  RepositoryChangeReport,
} from './types.js';

const logger = createChildLogger('repository-monitor');

export interface RepositoryMonitorOptions {
  target: RepositoryTarget;
  /** GitHub Actions output file, when running in a workflow */
  actionsOutputFile?: string;
  now?: () => Date;
}

/**
 * One-line status of a repository change set
 */
export function formatRepositorySummary(changes: ChangeSet): string {
  return [
    `New files: ${changes.summary.newCount}`,
    `Updated files: ${changes.summary.updatedCount}`,
    `Unchanged files: ${changes.summary.unchangedCount}`,
    `Total files: ${changes.stats.totalItems}`,
  ].join(' | ');
}

/**
 * Watches one directory of a repository for new and updated files
 */
export class RepositoryMonitor {
  private fetcher: RepositoryFetcher;
  private store: SnapshotStore;
  private options: RepositoryMonitorOptions;

  constructor(fetcher: RepositoryFetcher, store: SnapshotStore, options: RepositoryMonitorOptions) {
    this.fetcher = fetcher;
    this.store = store;
    this.options = options;
  }

  private get sourceName(): string {
    const { repository, directory } = this.options.target;
    return `${repository}/${directory}`;
  }

  /**
   * Fetch, reconcile against stored state, persist and report
   */
  async run(): Promise<MonitorRunResult> {
    const startedAt = this.now();
    const detail = await this.checkRepository(startedAt);
    const completedAt = this.now();

    await writeActionOutputs(this.options.actionsOutputFile, {
      changes_detected: String(detail.hasChanges),
      changes_summary: detail.summary,
    });

    logger.info(
      {
        source: this.sourceName,
        hasChanges: detail.hasChanges,
        durationMs: completedAt.getTime() - startedAt.getTime(),
      },
      'Repository monitor run complete'
    );

    return {
      sourcesChecked: detail.checked ? 1 : 0,
      changesDetected: detail.hasChanges ? 1 : 0,
      details: [detail],
      summary: detail.hasChanges ? detail.summary : '',
      startedAt,
      completedAt,
    };
  }

  private async checkRepository(now: Date): Promise<MonitorSourceResult> {
    const { target } = this.options;
    const key = { kind: 'repository' } as const;

    logger.info({ source: this.sourceName, ref: target.ref }, 'Scanning repository directory');

    let fetched: FetchedRepository;
    try {
      fetched = await this.fetcher.fetch(target, now);
    } catch (error) {
      logger.error({ source: this.sourceName, error: errorMessage(error) }, 'Repository fetch failed');
      return {
        sourceName: this.sourceName,
        checked: false,
        hasChanges: false,
        summary: '',
        error: errorMessage(error),
      };
    }

    if (Object.keys(fetched.snapshot).length === 0) {
      logger.warn({ source: this.sourceName }, 'No content found in monitored directory');
      return {
        sourceName: this.sourceName,
        checked: true,
        hasChanges: false,
        summary: '',
      };
    }

    const previous = await this.store.load(key);
    const changes = reconcile(previous, fetched.snapshot);
    const merged = carryForwardFirstSeen(previous, fetched.snapshot);
    const summary = formatRepositorySummary(changes);

    const report: RepositoryChangeReport = {
      kind: 'repository',
      repository: target.repository,
      directory: target.directory,
      ref: target.ref,
      detectedAt: now.toISOString(),
      changes,
    };

    try {
      for (const [identity, content] of fetched.contents) {
        await this.store.saveArtifact(identity, content);
      }
      await this.store.save(key, merged);
      await this.store.saveChangeReport(key, report);
    } catch (error) {
      logger.error({ source: this.sourceName, error: errorMessage(error) }, 'Failed to persist state');
      return {
        sourceName: this.sourceName,
        checked: true,
        hasChanges: hasChanges(changes),
        changes,
        summary,
        error: errorMessage(error),
      };
    }

    logger.info(
      {
        source: this.sourceName,
        ...changes.summary,
        totalFiles: changes.stats.totalItems,
        averageSize: changes.stats.averageSize,
      },
      hasChanges(changes) ? 'Repository changes detected' : 'No repository changes detected'
    );

    return {
      sourceName: this.sourceName,
      checked: true,
      hasChanges: hasChanges(changes),
      changes,
      summary,
    };
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }
}

export function createRepositoryMonitor(
  fetcher: RepositoryFetcher,
  store: SnapshotStore,
  options: RepositoryMonitorOptions
): RepositoryMonitor {
  return new RepositoryMonitor(fetcher, store, options);
}
