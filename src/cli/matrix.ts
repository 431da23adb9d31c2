#!/usr/bin/env node

import { Command } from 'commander';
import { join } from 'path';
import { DEFAULT_PLATFORM_TABLES, extractFeatureMatrix } from '../matrix/extractor.js';
import { validateFeatureFiles } from '../matrix/validator.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('matrix-cli');

const program = new Command();

program
  .name('matrix')
  .description('Generate and validate feature documents from the feature matrix')
  .version('1.0.0');

/**
 * Markdown tables to JSON documents
 */
program
  .command('extract')
  .description('Extract per-platform feature documents from the matrix tables')
  .option('-i, --input <file>', 'Feature matrix markdown file', 'feature-matrix.md')
  .option('-o, --output-dir <dir>', 'Directory for the generated documents', '.')
  .option('-s, --source-url <url>', 'Link recorded as the source of every feature')
  .action(async (options: { input: string; outputDir: string; sourceUrl?: string }) => {
    try {
      const result = await extractFeatureMatrix(options.input, options.outputDir, {
        sourceUrl: options.sourceUrl,
      });

      const counts = result.written.map((file) => `${file.features} ${file.platform}`).join(' and ');
      console.log(`\n✅ Extracted ${counts} features`);
      console.log(`📁 Generated: ${result.written.map((file) => file.path).join(', ')}\n`);
    } catch (error) {
      logger.error({ error }, 'Extraction failed');
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

/**
 * Schema check of generated documents
 */
program
  .command('validate [files...]')
  .description('Validate feature documents (defaults to the generated files)')
  .option('-o, --output-dir <dir>', 'Directory holding the generated documents', '.')
  .action(async (files: string[], options: { outputDir: string }) => {
    try {
      const targets =
        files.length > 0
          ? files.map((path) => ({ path, description: path }))
          : DEFAULT_PLATFORM_TABLES.map((table) => ({
              path: join(options.outputDir, table.outputFile),
              description: `${table.platform} Features`,
            }));

      console.log('\n🔍 Validating feature documents...\n');
      const summary = await validateFeatureFiles(targets);

      for (const result of summary.results) {
        if (result.valid) {
          console.log(`✅ ${result.file.description}: valid`);
        } else {
          console.log(`❌ ${result.file.description}: validation failed`);
          for (const message of result.errors) {
            console.log(`   ${message}`);
          }
        }
      }

      if (!summary.allValid) {
        console.log('\n💥 Validation failed\n');
        process.exit(1);
      }
      console.log('\n🎉 All feature documents are valid\n');
    } catch (error) {
      logger.error({ error }, 'Validation failed');
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error({ error }, 'Command failed');
  process.exit(1);
});
