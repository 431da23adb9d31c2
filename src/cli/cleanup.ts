#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { SnapshotStore, createRetentionSweeper } from '../monitoring/index.js';
import { RetentionSweepReport } from '../monitoring/retention-sweeper.js';
import { ConfigError } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('cleanup-cli');

const program = new Command();

program
  .name('cleanup')
  .description('Prune tracked content older than the retention threshold')
  .version('1.0.0');

interface SweepCommandOptions {
  ageDays?: string;
  dryRun?: boolean;
  execute?: boolean;
  contentDir?: string;
}

function formatBytes(bytes: number): string {
  return `${bytes.toLocaleString('en-US')} bytes (${(bytes / 1024 / 1024).toFixed(1)} MB)`;
}

function printReport(report: RetentionSweepReport): void {
  const would = report.dryRun ? 'would be ' : '';

  console.log('\n📊 Content Analysis:');
  for (const source of report.sources) {
    console.log(`\n  ${source.source}`);
    console.log(`    Items: ${source.totalItems}, total size: ${formatBytes(source.totalSize)}`);
    console.log(`    Older than ${report.thresholdDays} days: ${source.candidates.length}`);

    for (const candidate of source.candidates.slice(0, 20)) {
      const age = candidate.ageDays === null ? 'unknown age' : `${candidate.ageDays} days old`;
      console.log(`      - ${candidate.title ?? candidate.identity} (${age})`);
    }
    if (source.candidates.length > 20) {
      console.log(`      ... and ${source.candidates.length - 20} more`);
    }
    for (const failure of source.failures) {
      console.log(`      ❌ ${failure.identity}: ${failure.error}`);
    }
  }

  console.log('\n' + '━'.repeat(60));
  console.log('Cleanup Summary:');
  console.log(`  Items ${would}removed: ${report.dryRun ? report.totals.candidates : report.totals.removed}`);
  if (report.totals.bytesFreed > 0) {
    console.log(`  Disk space ${would}freed: ${formatBytes(report.totals.bytesFreed)}`);
  }
  if (report.totals.failures > 0) {
    console.log(`  Failures: ${report.totals.failures}`);
  }
  console.log('━'.repeat(60));
}

/**
 * Analyze and optionally delete aged items
 */
program
  .command('sweep')
  .description('Report, and unless dry-running delete, items older than the threshold')
  .option('-a, --age-days <days>', 'Retention threshold in days (defaults to CLEANUP_AGE_DAYS)')
  .option('--dry-run', 'Only report what would be removed')
  .option('--execute', 'Delete aged items even when DRY_RUN is set')
  .option('-d, --content-dir <dir>', 'Override the local content directory')
  .action(async (options: SweepCommandOptions) => {
    try {
      const config = loadConfig();

      if (options.dryRun && options.execute) {
        throw new ConfigError('--dry-run and --execute cannot be combined');
      }

      let thresholdDays = config.cleanup.ageDays;
      if (options.ageDays !== undefined) {
        thresholdDays = Number(options.ageDays);
        if (!Number.isInteger(thresholdDays) || thresholdDays < 0) {
          throw new ConfigError(`--age-days must be a non-negative integer, got ${options.ageDays}`);
        }
      }
      const dryRun = options.execute ? false : options.dryRun ? true : config.cleanup.dryRun;
      const store = new SnapshotStore(options.contentDir ?? config.content.rootDir);

      console.log('\n🧹 Content Cleanup Analysis');
      console.log(`   Age threshold: ${thresholdDays} days`);
      console.log(`   Mode: ${dryRun ? 'DRY RUN' : 'ACTUAL CLEANUP'}`);
      console.log(`   Content directory: ${store.rootDir}`);

      const report = await createRetentionSweeper(store, { thresholdDays, dryRun }).run();
      printReport(report);

      if (report.totals.candidates === 0) {
        console.log('\n✅ No old content found, nothing to clean up');
      } else if (dryRun) {
        console.log('\n💡 To perform the cleanup, run with --execute or DRY_RUN=false');
      } else {
        console.log('\n✅ Cleanup completed');
      }
      console.log('');
    } catch (error) {
      logger.error({ error }, 'Cleanup failed');
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error({ error }, 'Command failed');
  process.exit(1);
});
