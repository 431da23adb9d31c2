/**
 * Markdown sections of the update issue
 */
import {
  FeedChangeReport,
  FeedEntrySummary,
  FeedMetadata,
  RepositoryChangeReport,
} from '../monitoring/types.js';
import { renderTemplate } from './templates.js';

export const FILE_LIST_LIMIT = 10;
export const FEED_ENTRY_LIMIT = 5;

export interface FeedReport {
  report: FeedChangeReport;
  metadata?: FeedMetadata;
}

export function formatFileList(files: string[], limit: number = FILE_LIST_LIMIT): string[] {
  const lines = files.slice(0, limit).map((file) => `- ${file}`);
  if (files.length > limit) {
    lines.push(`... and ${files.length - limit} more files`);
  }
  return lines;
}

export function formatFeedEntries(
  entries: FeedEntrySummary[],
  limit: number = FEED_ENTRY_LIMIT
): string[] {
  const lines: string[] = [];
  for (const entry of entries.slice(0, limit)) {
    lines.push(`- **${entry.title}**`);
    if (entry.link) {
      lines.push(`  Link: ${entry.link}`);
    }
    if (entry.published) {
      lines.push(`  Published: ${entry.published}`);
    }
  }
  if (entries.length > limit) {
    lines.push(`... and ${entries.length - limit} more entries`);
  }
  return lines;
}

export function buildRepositorySection(report: RepositoryChangeReport, template: string): string {
  const { changes } = report;
  const lines: string[] = [`**Source:** \`${report.repository}/${report.directory}\``, ''];

  if (changes.newIdentities.length > 0) {
    lines.push('### New Files:', '', ...formatFileList(changes.newIdentities), '');
  }
  if (changes.updatedIdentities.length > 0) {
    lines.push('### Updated Files:', '', ...formatFileList(changes.updatedIdentities), '');
  }

  lines.push('### Storage Analysis:');
  lines.push(`- **Total files tracked:** ${changes.stats.totalItems}`);
  lines.push(`- **Files added this run:** ${changes.summary.newCount}`);
  lines.push(`- **Files updated this run:** ${changes.summary.updatedCount}`);
  if (changes.stats.averageSize > 0) {
    lines.push(`- **Average file size:** ${changes.stats.averageSize.toLocaleString('en-US')} bytes`);
  }
  lines.push(`- **Detection time:** ${report.detectedAt}`);

  return renderTemplate(template, { repo_data: lines.join('\n') });
}

export function buildFeedSection(feeds: FeedReport[], template: string): string {
  const lines: string[] = [];

  for (const { report, metadata } of feeds) {
    lines.push(`### Feed: ${metadata?.feedTitle || `Feed ${report.feedIndex + 1}`}`);
    lines.push(`**Source:** ${report.feedUrl}`, '');

    if (report.newEntries.length > 0) {
      lines.push('**New Entries:**', '', ...formatFeedEntries(report.newEntries), '');
    }
    if (report.updatedEntries.length > 0) {
      lines.push('**Updated Entries:**', '', ...formatFeedEntries(report.updatedEntries), '');
    }

    lines.push('### Storage Analysis:');
    lines.push(`- **Total entries tracked:** ${report.changes.stats.totalItems}`);
    lines.push(`- **Entries added this run:** ${report.changes.summary.newCount}`);
    lines.push('');
  }

  return renderTemplate(template, { feed_data: lines.join('\n').trimEnd() });
}
