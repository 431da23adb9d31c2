import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../types/index.js';
import { GitHubClient, CreatedIssue } from '../monitoring/fetchers/github-client.js';
import { hasChanges } from '../monitoring/reconciler.js';
import { SnapshotStore } from '../monitoring/state-store.js';
import { RepositoryChangeReport } from '../monitoring/types.js';
import { FeedReport, buildFeedSection, buildRepositorySection } from './sections.js';
import { TemplateSet, loadTemplates, renderTemplate } from './templates.js';

const logger = createChildLogger('issue-notifier');

export const DEFAULT_ISSUE_TITLE = 'Content Update Review Required';
const STATUS_ACTIVE = '✅ Active';
const STATUS_IDLE = '⏸️ No changes';

/**
 * Latest change reports that carry new or updated items
 */
export interface CollectedChanges {
  repository?: RepositoryChangeReport;
  feeds: FeedReport[];
}

export interface IssueDraft {
  title: string;
  body: string;
}

export interface NotifyResult {
  created: boolean;
  issue?: CreatedIssue;
  assigned: boolean;
  draft?: IssueDraft;
}

export interface IssueNotifierOptions {
  /** `owner/name` receiving the issue */
  repository: string;
  labels: string[];
  assignee?: string;
  /** Client authenticated with the token allowed to assign */
  assignClient?: GitHubClient;
  assignDelayMs: number;
  templatesDir?: string;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export function hasAnyChanges(changes: CollectedChanges): boolean {
  return changes.repository !== undefined || changes.feeds.length > 0;
}

/**
 * Load the latest change report of every source, keeping only those with
 * new or updated items
 */
export async function collectChanges(store: SnapshotStore): Promise<CollectedChanges> {
  const collected: CollectedChanges = { feeds: [] };

  const repository = await store.loadChangeReport({ kind: 'repository' });
  if (repository && hasChanges(repository.changes)) {
    collected.repository = repository;
  }

  for (const index of await store.listFeedIndexes()) {
    const report = await store.loadChangeReport({ kind: 'feed', index });
    if (!report || !hasChanges(report.changes)) {
      continue;
    }
    collected.feeds.push({ report, metadata: await store.loadFeedMetadata(index) });
  }

  logger.debug(
    { repository: collected.repository !== undefined, feeds: collected.feeds.length },
    'Collected change reports'
  );
  return collected;
}

/**
 * Title from the first line of the body, without its heading marker
 */
export function extractIssueTitle(body: string): string {
  const firstLine = body.split('\n')[0] ?? '';
  return firstLine.startsWith('# ') ? firstLine.slice(2).trim() || DEFAULT_ISSUE_TITLE : DEFAULT_ISSUE_TITLE;
}

export function buildIssueBody(
  changes: CollectedChanges,
  templates: TemplateSet,
  detectionDate: string
): string {
  const repoSection = changes.repository
    ? buildRepositorySection(changes.repository, templates.repositorySection)
    : '';
  const feedSection =
    changes.feeds.length > 0 ? buildFeedSection(changes.feeds, templates.feedSection) : '';

  return renderTemplate(templates.actionItems, {
    detection_date: detectionDate,
    repo_changes: repoSection,
    feed_changes: feedSection,
    repo_status: changes.repository ? STATUS_ACTIVE : STATUS_IDLE,
    feed_status: changes.feeds.length > 0 ? STATUS_ACTIVE : STATUS_IDLE,
  });
}

/**
 * Opens one issue summarizing the latest detected changes
 */
export class IssueNotifier {
  private store: SnapshotStore;
  private client: GitHubClient;
  private options: IssueNotifierOptions;

  constructor(store: SnapshotStore, client: GitHubClient, options: IssueNotifierOptions) {
    this.store = store;
    this.client = client;
    this.options = options;
  }

  /**
   * Build the issue without creating it. Undefined when nothing changed.
   */
  async preview(): Promise<IssueDraft | undefined> {
    const changes = await collectChanges(this.store);
    if (!hasAnyChanges(changes)) {
      return undefined;
    }

    const templates = await loadTemplates(this.options.templatesDir);
    const now = this.options.now ? this.options.now() : new Date();
    const body = buildIssueBody(changes, templates, now.toISOString());
    return { title: extractIssueTitle(body), body };
  }

  async notify(): Promise<NotifyResult> {
    const draft = await this.preview();
    if (!draft) {
      logger.info('No changes detected, skipping issue creation');
      return { created: false, assigned: false };
    }

    const issue = await this.client.createIssue(this.options.repository, {
      title: draft.title,
      body: draft.body,
      labels: this.options.labels,
    });

    const assigned = await this.assign(issue);
    return { created: true, issue, assigned, draft };
  }

  /**
   * Assign after a delay. Failures are logged; the issue stays created.
   */
  private async assign(issue: CreatedIssue): Promise<boolean> {
    const { assignee, assignClient, assignDelayMs } = this.options;
    if (!assignee) {
      return false;
    }
    if (!assignClient) {
      logger.warn({ assignee }, 'No PERSONAL_ACCESS_TOKEN provided, skipping assignment');
      return false;
    }

    logger.info({ assignee, delayMs: assignDelayMs }, 'Waiting before assigning issue');
    const sleep = this.options.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
    await sleep(assignDelayMs);

    try {
      await assignClient.addAssignees(this.options.repository, issue.number, [assignee]);
      return true;
    } catch (error) {
      logger.warn(
        { assignee, issue: issue.number, error: errorMessage(error) },
        'Issue was created but assignment failed'
      );
      return false;
    }
  }
}

export function createIssueNotifier(
  store: SnapshotStore,
  client: GitHubClient,
  options: IssueNotifierOptions
): IssueNotifier {
  return new IssueNotifier(store, client, options);
}
