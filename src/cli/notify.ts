#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, requireIssueConfig } from '../config/index.js';
import {
  SnapshotStore,
  createGitHubClient,
  fetcherOptionsFromConfig,
} from '../monitoring/index.js';
import { createIssueNotifier, IssueNotifier } from '../report/issue-notifier.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('notify-cli');

const program = new Command();

program
  .name('notify')
  .description('Open a review issue for detected content changes')
  .version('1.0.0');

interface NotifyCommandOptions {
  contentDir?: string;
  templates?: string;
}

function createNotifier(options: NotifyCommandOptions): IssueNotifier {
  const config = loadConfig();
  const settings = requireIssueConfig(config);
  const fetcherOptions = fetcherOptionsFromConfig(settings.http);

  const client = createGitHubClient({ token: settings.token, apiUrl: settings.apiUrl, ...fetcherOptions });
  const assignClient = settings.personalToken
    ? createGitHubClient({ token: settings.personalToken, apiUrl: settings.apiUrl, ...fetcherOptions })
    : undefined;

  return createIssueNotifier(new SnapshotStore(options.contentDir ?? config.content.rootDir), client, {
    repository: settings.repository,
    labels: settings.labels,
    assignee: settings.assignee,
    assignClient,
    assignDelayMs: settings.assignDelayMs,
    templatesDir: options.templates,
  });
}

/**
 * Create the issue from the latest change reports
 */
program
  .command('issue')
  .description('Create an issue when the latest run detected changes')
  .option('-d, --content-dir <dir>', 'Override the local content directory')
  .option('-t, --templates <dir>', 'Directory holding the issue templates')
  .action(async (options: NotifyCommandOptions) => {
    try {
      const result = await createNotifier(options).notify();

      if (!result.created) {
        console.log('\n✓ No changes detected, no issue created\n');
        return;
      }

      console.log(`\n✅ Created issue #${result.issue?.number}: ${result.draft?.title}`);
      if (result.issue) {
        console.log(`   ${result.issue.url}`);
      }
      console.log(`   Assigned: ${result.assigned ? 'yes' : 'no'}\n`);
    } catch (error) {
      logger.error({ error }, 'Failed to create issue');
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

/**
 * Print the issue without creating it
 */
program
  .command('preview')
  .description('Print the issue that would be created')
  .option('-d, --content-dir <dir>', 'Override the local content directory')
  .option('-t, --templates <dir>', 'Directory holding the issue templates')
  .action(async (options: NotifyCommandOptions) => {
    try {
      const draft = await createNotifier(options).preview();

      if (!draft) {
        console.log('\n✓ No changes detected\n');
        return;
      }

      console.log(`\nTitle: ${draft.title}`);
      console.log('━'.repeat(60));
      console.log(draft.body);
      console.log('━'.repeat(60));
    } catch (error) {
      logger.error({ error }, 'Failed to build issue preview');
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error({ error }, 'Command failed');
  process.exit(1);
});
