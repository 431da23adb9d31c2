import { readdir, readFile, stat, unlink } from 'fs/promises';
import { join, relative, resolve, isAbsolute } from 'path';
import { z } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import { isNotFoundError, writeFileAtomic, writeJsonAtomic } from '../utils/fs-atomic.js';
import { PersistenceError, StateError, errorMessage } from '../types/index.js';
import {
  FeedChangeReport,
  FeedChangeReportSchema,
  FeedEntryItem,
  FeedEntryItemSchema,
  FeedMetadata,
  FeedMetadataSchema,
  FeedSourceKey,
  RepositoryChangeReport,
  RepositoryChangeReportSchema,
  RepositoryFileItem,
  RepositoryFileItemSchema,
  RepositorySourceKey,
  Snapshot,
  SourceKey,
  TrackedItem,
} from './types.js';

const logger = createChildLogger('state-store');

const REPOSITORY_DIR = 'repo-content';
const FEEDS_DIR = 'rss-content';
const ARTIFACTS_DIR = 'files';
const REPOSITORY_SNAPSHOT_FILE = 'files_data.json';
const FEED_SNAPSHOT_FILE = 'feed_entries.json';
const CHANGE_REPORT_FILE = 'latest_changes.json';
const FEED_METADATA_FILE = 'feed_metadata.json';

// ============================================================
// Legacy state formats
// ============================================================

/** Older repository state: snake_case metadata keyed by path */
const LegacyRepositoryFileSchema = z.object({
  content_hash: z.string().min(1),
  size: z.number().int().min(0).optional(),
  path: z.string().optional(),
  sha: z.string().optional(),
  download_url: z.string().nullable().optional(),
  last_processed: z.string().optional(),
  added_date: z.string().optional(),
});

const LegacyRepositoryStateSchema = z.record(z.string(), LegacyRepositoryFileSchema);

/** Older feed state: a plain array of entries */
const LegacyFeedEntrySchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  link: z.string().optional(),
  published: z.string().optional(),
  content: z.string().optional(),
  content_hash: z.string().min(1),
  feed_index: z.number().int().min(0).optional(),
  detected_date: z.string().optional(),
});

const LegacyFeedStateSchema = z.array(LegacyFeedEntrySchema);

const RepositorySnapshotSchema = z.record(z.string(), RepositoryFileItemSchema);
const FeedSnapshotSchema = z.record(z.string(), FeedEntryItemSchema);

/**
 * Convert stored repository state, canonical or legacy, to a snapshot
 */
export function normalizeRepositoryState(raw: unknown): Snapshot<RepositoryFileItem> {
  const canonical = RepositorySnapshotSchema.safeParse(raw);
  if (canonical.success) {
    return canonical.data;
  }

  const legacy = LegacyRepositoryStateSchema.safeParse(raw);
  if (!legacy.success) {
    throw new StateError('Unrecognized repository state format', canonical.error.issues);
  }

  const snapshot: Snapshot<RepositoryFileItem> = {};
  for (const [identity, file] of Object.entries(legacy.data)) {
    const firstSeen = file.added_date ?? file.last_processed ?? '';
    snapshot[identity] = {
      kind: 'repository_file',
      identity,
      path: file.path ?? identity,
      contentHash: file.content_hash,
      size: file.size ?? 0,
      firstSeen,
      lastProcessed: file.last_processed ?? firstSeen,
      sha: file.sha,
      downloadUrl: file.download_url ?? undefined,
    };
  }
  return snapshot;
}

/**
 * Convert stored feed state, canonical or legacy, to a snapshot
 */
export function normalizeFeedState(raw: unknown, feedIndex: number): Snapshot<FeedEntryItem> {
  if (!Array.isArray(raw)) {
    const canonical = FeedSnapshotSchema.safeParse(raw);
    if (!canonical.success) {
      throw new StateError('Unrecognized feed state format', canonical.error.issues);
    }
    return canonical.data;
  }

  const legacy = LegacyFeedStateSchema.safeParse(raw);
  if (!legacy.success) {
    throw new StateError('Unrecognized legacy feed state format', legacy.error.issues);
  }

  const snapshot: Snapshot<FeedEntryItem> = {};
  for (const entry of legacy.data) {
    const identity = entry.id || entry.link;
    if (!identity) {
      continue;
    }
    const content = entry.content ?? '';
    snapshot[identity] = {
      kind: 'feed_entry',
      identity,
      title: entry.title ?? 'No title',
      link: entry.link ?? '',
      published: entry.published || undefined,
      content,
      contentHash: entry.content_hash,
      size: Buffer.byteLength(content, 'utf8'),
      firstSeen: entry.detected_date ?? '',
      feedIndex: entry.feed_index ?? feedIndex,
    };
  }
  return snapshot;
}

// ============================================================
// Store
// ============================================================

/**
 * File-backed persistence for snapshots, change reports, feed metadata and
 * local copies of repository files, all under one content root.
 *
 * Layout:
 *   repo-content/files_data.json
 *   repo-content/latest_changes.json
 *   repo-content/files/<path>
 *   rss-content/feed-<i>/feed_entries.json
 *   rss-content/feed-<i>/latest_changes.json
 *   rss-content/feed-<i>/feed_metadata.json
 */
export class SnapshotStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  sourceDir(key: SourceKey): string {
    return key.kind === 'repository'
      ? join(this.rootDir, REPOSITORY_DIR)
      : join(this.rootDir, FEEDS_DIR, `feed-${key.index}`);
  }

  snapshotPath(key: SourceKey): string {
    return join(
      this.sourceDir(key),
      key.kind === 'repository' ? REPOSITORY_SNAPSHOT_FILE : FEED_SNAPSHOT_FILE
    );
  }

  /**
   * Load the stored snapshot of a source. Missing or unreadable state yields
   * an empty snapshot.
   */
  load(key: RepositorySourceKey): Promise<Snapshot<RepositoryFileItem>>;
  load(key: FeedSourceKey): Promise<Snapshot<FeedEntryItem>>;
  load(key: SourceKey): Promise<Snapshot<TrackedItem>>;
  async load(key: SourceKey): Promise<Snapshot<TrackedItem>> {
    const path = this.snapshotPath(key);
    const raw = await this.readJson(path);
    if (raw === undefined) {
      return {};
    }

    try {
      return key.kind === 'repository'
        ? normalizeRepositoryState(raw)
        : normalizeFeedState(raw, key.index);
    } catch (error) {
      logger.warn({ path, error: errorMessage(error) }, 'Stored state is invalid, starting empty');
      return {};
    }
  }

  /**
   * Replace the stored snapshot of a source
   */
  async save(key: SourceKey, snapshot: Snapshot<TrackedItem>): Promise<void> {
    const path = this.snapshotPath(key);
    await this.writeJson(path, snapshot);
    logger.debug({ path, items: Object.keys(snapshot).length }, 'Snapshot saved');
  }

  async saveChangeReport(
    key: SourceKey,
    report: RepositoryChangeReport | FeedChangeReport
  ): Promise<void> {
    await this.writeJson(join(this.sourceDir(key), CHANGE_REPORT_FILE), report);
  }

  loadChangeReport(key: RepositorySourceKey): Promise<RepositoryChangeReport | undefined>;
  loadChangeReport(key: FeedSourceKey): Promise<FeedChangeReport | undefined>;
  async loadChangeReport(
    key: SourceKey
  ): Promise<RepositoryChangeReport | FeedChangeReport | undefined> {
    const path = join(this.sourceDir(key), CHANGE_REPORT_FILE);
    const raw = await this.readJson(path);
    if (raw === undefined) {
      return undefined;
    }

    const parsed =
      key.kind === 'repository'
        ? RepositoryChangeReportSchema.safeParse(raw)
        : FeedChangeReportSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ path, issues: parsed.error.issues.length }, 'Ignoring invalid change report');
      return undefined;
    }
    return parsed.data;
  }

  async saveFeedMetadata(index: number, metadata: FeedMetadata): Promise<void> {
    await this.writeJson(
      join(this.sourceDir({ kind: 'feed', index }), FEED_METADATA_FILE),
      metadata
    );
  }

  async loadFeedMetadata(index: number): Promise<FeedMetadata | undefined> {
    const path = join(this.sourceDir({ kind: 'feed', index }), FEED_METADATA_FILE);
    const raw = await this.readJson(path);
    if (raw === undefined) {
      return undefined;
    }
    const parsed = FeedMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ path }, 'Ignoring invalid feed metadata');
      return undefined;
    }
    return parsed.data;
  }

  /**
   * Indexes of every feed directory present, ascending
   */
  async listFeedIndexes(): Promise<number[]> {
    let names: string[];
    try {
      names = await readdir(join(this.rootDir, FEEDS_DIR));
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw new PersistenceError(`Failed to list feeds: ${errorMessage(error)}`, error);
    }

    return names
      .map((name) => /^feed-(\d+)$/.exec(name))
      .filter((match): match is RegExpExecArray => match !== null)
      .map((match) => parseInt(match[1], 10))
      .sort((a, b) => a - b);
  }

  /**
   * Location of the local copy of a repository file. Rejects paths that
   * would resolve outside the artifacts directory.
   */
  artifactPath(identity: string): string {
    const base = resolve(this.rootDir, REPOSITORY_DIR, ARTIFACTS_DIR);
    const target = resolve(base, identity);
    const rel = relative(base, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new PersistenceError(`Artifact path escapes content root: ${identity}`);
    }
    return target;
  }

  async saveArtifact(identity: string, content: Uint8Array | string): Promise<void> {
    const path = this.artifactPath(identity);
    await this.guardWrite(path, () => writeFileAtomic(path, content));
  }

  /**
   * Delete the local copy of a repository file.
   * Resolves to false when there was nothing to delete.
   */
  async removeArtifact(identity: string): Promise<boolean> {
    const path = this.artifactPath(identity);
    try {
      await unlink(path);
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw new PersistenceError(`Failed to remove ${path}: ${errorMessage(error)}`, error);
    }
  }

  async artifactExists(identity: string): Promise<boolean> {
    try {
      const info = await stat(this.artifactPath(identity));
      return info.isFile();
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }

  private async readJson(path: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (!isNotFoundError(error)) {
        logger.warn({ path, error: errorMessage(error) }, 'Failed to read stored state');
      }
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      logger.warn({ path, error: errorMessage(error) }, 'Stored state is not valid JSON');
      return undefined;
    }
  }

  private async writeJson(path: string, data: unknown): Promise<void> {
    await this.guardWrite(path, () => writeJsonAtomic(path, data));
  }

  private async guardWrite(path: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      throw new PersistenceError(`Failed to write ${path}: ${errorMessage(error)}`, error);
    }
  }
}

export function createSnapshotStore(rootDir: string): SnapshotStore {
  return new SnapshotStore(rootDir);
}
