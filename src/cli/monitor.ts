#!/usr/bin/env node

import { Command } from 'commander';
import {
  loadConfig,
  requireFeedMonitorConfig,
  requireRepositoryMonitorConfig,
} from '../config/index.js';
import {
  FeedFetcher,
  MonitorRunResult,
  RepositoryFetcher,
  SnapshotStore,
  createFeedMonitor,
  createGitHubClient,
  createRepositoryMonitor,
  fetcherOptionsFromConfig,
} from '../monitoring/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('monitor-cli');

const program = new Command();

program
  .name('monitor')
  .description('Detect new and updated content in a repository directory and syndication feeds')
  .version('1.0.0');

function printRunResult(result: MonitorRunResult): void {
  console.log('━'.repeat(60));
  console.log('Results:');
  console.log(`  Sources checked: ${result.sourcesChecked}`);
  console.log(`  Changes detected: ${result.changesDetected}`);
  console.log(`  Duration: ${result.completedAt.getTime() - result.startedAt.getTime()}ms`);
  console.log('━'.repeat(60));

  if (result.details.length > 0) {
    console.log('\nDetails:\n');

    for (const detail of result.details) {
      const icon = detail.error ? '❌' : detail.hasChanges ? '🔄' : '✓';
      const status = detail.error
        ? detail.error
        : detail.hasChanges
        ? detail.summary
        : detail.checked
        ? 'No changes'
        : 'Skipped';

      console.log(`${icon} ${detail.sourceName}`);
      for (const line of status.split('\n')) {
        console.log(`   ${line}`);
      }
    }
  }

  console.log('');
}

/**
 * Check the monitored repository directory
 */
program
  .command('repo')
  .description('Check the monitored repository directory for new and updated files')
  .option('-d, --content-dir <dir>', 'Override the local content directory')
  .action(async (options: { contentDir?: string }) => {
    try {
      const config = loadConfig();
      const settings = requireRepositoryMonitorConfig(config);

      const client = createGitHubClient({
        token: settings.token,
        apiUrl: settings.apiUrl,
        ...fetcherOptionsFromConfig(settings.http),
      });
      const monitor = createRepositoryMonitor(
        new RepositoryFetcher(client),
        new SnapshotStore(options.contentDir ?? settings.contentRoot),
        {
          target: {
            repository: settings.repository,
            directory: settings.directory,
            ref: settings.ref,
          },
          actionsOutputFile: config.actionsOutputFile,
        }
      );

      console.log(`\n🔍 Checking ${settings.repository}/${settings.directory} (${settings.ref})...\n`);

      printRunResult(await monitor.run());
    } catch (error) {
      logger.error({ error }, 'Repository check failed');
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

/**
 * Check every configured feed
 */
program
  .command('feeds')
  .description('Check the configured RSS and Atom feeds for new and updated entries')
  .option('-d, --content-dir <dir>', 'Override the local content directory')
  .action(async (options: { contentDir?: string }) => {
    try {
      const config = loadConfig();
      const settings = requireFeedMonitorConfig(config);

      const monitor = createFeedMonitor(
        new FeedFetcher(fetcherOptionsFromConfig(settings.http)),
        new SnapshotStore(options.contentDir ?? settings.contentRoot),
        { feeds: settings.feeds, actionsOutputFile: config.actionsOutputFile }
      );

      console.log(`\n🔍 Checking ${settings.feeds.length} feed(s)...\n`);

      printRunResult(await monitor.run());
    } catch (error) {
      logger.error({ error }, 'Feed check failed');
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

/**
 * Show what is currently tracked
 */
program
  .command('status')
  .description('Show tracked items and the latest detected changes')
  .option('-d, --content-dir <dir>', 'Override the local content directory')
  .action(async (options: { contentDir?: string }) => {
    try {
      const config = loadConfig();
      const store = new SnapshotStore(options.contentDir ?? config.content.rootDir);

      console.log('\n📊 Monitor Status\n');
      console.log(`Content directory: ${store.rootDir}`);
      console.log('━'.repeat(60));

      const files = await store.load({ kind: 'repository' });
      const repositoryReport = await store.loadChangeReport({ kind: 'repository' });
      console.log('\n📁 Repository');
      console.log(`   Tracked files: ${Object.keys(files).length}`);
      if (repositoryReport) {
        const { summary } = repositoryReport.changes;
        console.log(`   Source: ${repositoryReport.repository}/${repositoryReport.directory}`);
        console.log(`   Last check: ${new Date(repositoryReport.detectedAt).toLocaleString()}`);
        console.log(`   Last changes: ${summary.newCount} new, ${summary.updatedCount} updated`);
      } else {
        console.log('   Last check: Never');
      }

      const indexes = await store.listFeedIndexes();
      if (indexes.length === 0) {
        console.log('\n📰 No feeds tracked.');
      }
      for (const index of indexes) {
        const entries = await store.load({ kind: 'feed', index });
        const metadata = await store.loadFeedMetadata(index);
        const report = await store.loadChangeReport({ kind: 'feed', index });

        console.log(`\n📰 ${metadata?.feedTitle ?? `Feed ${index + 1}`}`);
        if (metadata) {
          console.log(`   URL: ${metadata.feedUrl}`);
        }
        console.log(`   Tracked entries: ${Object.keys(entries).length}`);
        if (report) {
          const { distribution } = report.ageReport;
          console.log(`   Last check: ${new Date(report.detectedAt).toLocaleString()}`);
          console.log(
            `   Last changes: ${report.changes.summary.newCount} new, ${report.changes.summary.updatedCount} updated`
          );
          console.log(
            `   Age: ${distribution.lastWeek} ≤7d, ${distribution.lastMonth} ≤30d, ` +
              `${distribution.lastQuarter} ≤90d, ${distribution.older} older`
          );
        }
      }

      console.log('\n' + '━'.repeat(60));
    } catch (error) {
      logger.error({ error }, 'Failed to read status');
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error({ error }, 'Command failed');
  process.exit(1);
});
