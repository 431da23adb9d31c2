/**
 * Change monitoring for a repository directory and syndication feeds
 */

// Types
export * from './types.js';

// Change detection
export * from './reconciler.js';
export { SnapshotStore, createSnapshotStore, normalizeFeedState, normalizeRepositoryState } from './state-store.js';

// Fetchers
export { BaseFetcher, fetcherOptionsFromConfig } from './fetchers/base-fetcher.js';
export type { FetcherOptions } from './fetchers/base-fetcher.js';
export { GitHubClient, createGitHubClient } from './fetchers/github-client.js';
export { RepositoryFetcher, isTrackedFile } from './fetchers/repository-fetcher.js';
export type { RepositoryTarget } from './fetchers/repository-fetcher.js';
export { FeedFetcher, parseFeed } from './fetchers/feed-fetcher.js';

// Monitors
export { RepositoryMonitor, createRepositoryMonitor, formatRepositorySummary } from './repository-monitor.js';
export { FeedMonitor, createFeedMonitor, formatFeedSummary } from './feed-monitor.js';
export { RetentionSweeper, createRetentionSweeper, sweep, findCleanupCandidates } from './retention-sweeper.js';
