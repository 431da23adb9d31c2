import { extname } from 'path';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../types/index.js';
import { fingerprintFile } from '../reconciler.js';
import { RepositoryFileItem, Snapshot } from '../types.js';
import { ContentEntry, GitHubClient } from './github-client.js';

const logger = createChildLogger('repository-fetcher');

/**
 * Extensions of files that are tracked; everything else is skipped
 */
export const TRACKED_EXTENSIONS = ['.md', '.markdown', '.txt', '.json'];

export function isTrackedFile(path: string): boolean {
  return TRACKED_EXTENSIONS.includes(extname(path).toLowerCase());
}

export interface RepositoryTarget {
  repository: string;
  directory: string;
  ref: string;
}

export interface FetchedRepository {
  /** Keyed by path relative to the monitored directory */
  snapshot: Snapshot<RepositoryFileItem>;
  /** Raw bytes of every file in the snapshot, same keys */
  contents: Map<string, Buffer>;
  skipped: string[];
}

/**
 * Walk a repository directory recursively and fetch every tracked file.
 *
 * A failure listing the top-level directory fails the fetch. Failures on
 * nested directories or single files are logged and skipped.
 */
export class RepositoryFetcher {
  constructor(private client: GitHubClient) {}

  async fetch(target: RepositoryTarget, now: Date = new Date()): Promise<FetchedRepository> {
    const result: FetchedRepository = { snapshot: {}, contents: new Map(), skipped: [] };
    const entries = await this.client.listDirectory(target.repository, target.directory, target.ref);

    await this.processEntries(target, entries, '', now.toISOString(), result);

    logger.info(
      {
        repository: target.repository,
        directory: target.directory,
        files: Object.keys(result.snapshot).length,
        skipped: result.skipped.length,
      },
      'Repository fetch complete'
    );
    return result;
  }

  private async processEntries(
    target: RepositoryTarget,
    entries: ContentEntry[],
    prefix: string,
    timestamp: string,
    result: FetchedRepository
  ): Promise<void> {
    for (const entry of entries) {
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;

      if (entry.type === 'dir') {
        await this.processDirectory(target, entry, relativePath, timestamp, result);
      } else if (entry.type === 'file') {
        if (!isTrackedFile(entry.path)) {
          logger.debug({ path: entry.path }, 'Skipping untracked file type');
          result.skipped.push(relativePath);
          continue;
        }
        await this.processFile(target, entry, relativePath, timestamp, result);
      }
    }
  }

  private async processDirectory(
    target: RepositoryTarget,
    entry: ContentEntry,
    relativePath: string,
    timestamp: string,
    result: FetchedRepository
  ): Promise<void> {
    try {
      const children = await this.client.listDirectory(target.repository, entry.path, target.ref);
      await this.processEntries(target, children, relativePath, timestamp, result);
    } catch (error) {
      logger.warn({ path: entry.path, error: errorMessage(error) }, 'Could not access directory');
    }
  }

  private async processFile(
    target: RepositoryTarget,
    entry: ContentEntry,
    relativePath: string,
    timestamp: string,
    result: FetchedRepository
  ): Promise<void> {
    try {
      const file = await this.client.getFile(target.repository, entry.path, target.ref);
      result.snapshot[relativePath] = {
        kind: 'repository_file',
        identity: relativePath,
        path: file.path,
        sha: file.sha,
        downloadUrl: file.downloadUrl,
        contentHash: fingerprintFile(file.content),
        size: file.content.length,
        firstSeen: timestamp,
        lastProcessed: timestamp,
      };
      result.contents.set(relativePath, file.content);
    } catch (error) {
      logger.warn({ path: entry.path, error: errorMessage(error) }, 'Could not fetch file');
      result.skipped.push(relativePath);
    }
  }
}
