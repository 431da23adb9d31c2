/**
 * Types for change tracking of monitored sources
 */
import { z } from 'zod';

// ============================================================
// Tracked items
// ============================================================

const TrackedItemBaseSchema = z.object({
  /** Join key between runs: file path, or feed id falling back to link */
  identity: z.string().min(1),
  /** SHA-256 hex over the item's meaningful content */
  contentHash: z.string().min(1),
  /** Byte length, reporting only */
  size: z.number().int().min(0),
  /** ISO-8601, set the run the item is first observed */
  firstSeen: z.string(),
});

export const RepositoryFileItemSchema = TrackedItemBaseSchema.extend({
  kind: z.literal('repository_file'),
  /** Full path inside the monitored repository */
  path: z.string(),
  sha: z.string().optional(),
  downloadUrl: z.string().optional(),
  lastProcessed: z.string(),
});

export const FeedEntryItemSchema = TrackedItemBaseSchema.extend({
  kind: z.literal('feed_entry'),
  title: z.string(),
  link: z.string(),
  published: z.string().optional(),
  /** Normalized plain-text body */
  content: z.string(),
  feedIndex: z.number().int().min(0),
});

export const TrackedItemSchema = z.discriminatedUnion('kind', [
  RepositoryFileItemSchema,
  FeedEntryItemSchema,
]);

export type RepositoryFileItem = z.infer<typeof RepositoryFileItemSchema>;
export type FeedEntryItem = z.infer<typeof FeedEntryItemSchema>;
export type TrackedItem = z.infer<typeof TrackedItemSchema>;
export type TrackedItemKind = TrackedItem['kind'];

/**
 * Minimum an item needs for reconciliation
 */
export interface Fingerprinted {
  contentHash: string;
  size: number;
}

/**
 * Full current state of one monitored source, keyed by identity
 */
export type Snapshot<T extends Fingerprinted = TrackedItem> = Record<string, T>;

export const SnapshotSchema = z.record(z.string(), TrackedItemSchema);

// ============================================================
// Change sets
// ============================================================

export const SizeStatsSchema = z.object({
  totalItems: z.number().int().min(0),
  totalSize: z.number().int().min(0),
  averageSize: z.number().int().min(0),
});

export const ChangeSetSchema = z.object({
  newIdentities: z.array(z.string()),
  updatedIdentities: z.array(z.string()),
  unchangedIdentities: z.array(z.string()),
  summary: z.object({
    newCount: z.number().int().min(0),
    updatedCount: z.number().int().min(0),
    unchangedCount: z.number().int().min(0),
  }),
  stats: SizeStatsSchema,
});

export type SizeStats = z.infer<typeof SizeStatsSchema>;
export type ChangeSet = z.infer<typeof ChangeSetSchema>;

// ============================================================
// Age analysis
// ============================================================

export const AgeDistributionSchema = z.object({
  lastWeek: z.number().int().min(0),
  lastMonth: z.number().int().min(0),
  lastQuarter: z.number().int().min(0),
  older: z.number().int().min(0),
});

export const AgeReportSchema = z.object({
  distribution: AgeDistributionSchema,
  oldest: z.array(
    z.object({
      identity: z.string(),
      title: z.string(),
      ageDays: z.number().int(),
    })
  ),
});

export type AgeDistribution = z.infer<typeof AgeDistributionSchema>;
export type AgeReport = z.infer<typeof AgeReportSchema>;

/**
 * Item older than the retention threshold. Never persisted.
 */
export interface CleanupCandidate {
  identity: string;
  kind: TrackedItemKind;
  /** null when the reference timestamp could not be parsed */
  ageDays: number | null;
  size: number;
  title?: string;
}

// ============================================================
// Persisted reports
// ============================================================

export const FeedEntrySummarySchema = z.object({
  identity: z.string(),
  title: z.string(),
  link: z.string(),
  published: z.string().optional(),
  firstSeen: z.string(),
});

export type FeedEntrySummary = z.infer<typeof FeedEntrySummarySchema>;

export const RepositoryChangeReportSchema = z.object({
  kind: z.literal('repository'),
  repository: z.string(),
  directory: z.string(),
  ref: z.string(),
  detectedAt: z.string(),
  changes: ChangeSetSchema,
});

export const FeedChangeReportSchema = z.object({
  kind: z.literal('feed'),
  feedUrl: z.string(),
  feedIndex: z.number().int().min(0),
  detectedAt: z.string(),
  changes: ChangeSetSchema,
  newEntries: z.array(FeedEntrySummarySchema),
  updatedEntries: z.array(FeedEntrySummarySchema),
  /** Entries stored before this run */
  previousCount: z.number().int().min(0),
  ageReport: AgeReportSchema,
});

export type RepositoryChangeReport = z.infer<typeof RepositoryChangeReportSchema>;
export type FeedChangeReport = z.infer<typeof FeedChangeReportSchema>;
export type ChangeReport = RepositoryChangeReport | FeedChangeReport;

export const FeedMetadataSchema = z.object({
  feedTitle: z.string(),
  feedLink: z.string(),
  feedDescription: z.string(),
  feedUrl: z.string(),
  feedIndex: z.number().int().min(0),
  lastUpdated: z.string(),
  totalEntries: z.number().int().min(0),
});

export type FeedMetadata = z.infer<typeof FeedMetadataSchema>;

// ============================================================
// Source keys
// ============================================================

export interface RepositorySourceKey {
  kind: 'repository';
}

export interface FeedSourceKey {
  kind: 'feed';
  index: number;
}

export type SourceKey = RepositorySourceKey | FeedSourceKey;

// ============================================================
// Run results
// ============================================================

/**
 * Result for a single source in a monitor run
 */
export interface MonitorSourceResult {
  sourceName: string;
  checked: boolean;
  hasChanges: boolean;
  changes?: ChangeSet;
  summary: string;
  error?: string;
}

/**
 * Result of a monitor run
 */
export interface MonitorRunResult {
  sourcesChecked: number;
  changesDetected: number;
  details: MonitorSourceResult[];
  /** Human-readable summary of all sources with changes */
  summary: string;
  startedAt: Date;
  completedAt: Date;
}
