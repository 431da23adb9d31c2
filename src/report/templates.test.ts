import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadTemplate, loadTemplates, renderTemplate, DEFAULT_TEMPLATES_DIR } from './templates.js';
import { TemplateError } from '../types/index.js';

describe('renderTemplate', () => {
  it('should substitute every placeholder', () => {
    expect(renderTemplate('{a} and {b_c}, again {a}', { a: '1', b_c: '2' })).toBe('1 and 2, again 1');
  });

  it('should insert values verbatim', () => {
    expect(renderTemplate('x{a}x', { a: '{b} $& $1' })).toBe('x{b} $& $1x');
  });

  it('should leave braces that are not placeholders alone', () => {
    expect(renderTemplate('{ "json": true } {Upper}', {})).toBe('{ "json": true } {Upper}');
  });

  it('should reject a placeholder without a value', () => {
    expect(() => renderTemplate('{missing}', {})).toThrow(TemplateError);
    expect(() => renderTemplate('{missing}', {})).toThrow('No value for template placeholder {missing}');
  });
});

describe('loadTemplates', () => {
  it('should load the shipped templates', async () => {
    const templates = await loadTemplates(DEFAULT_TEMPLATES_DIR);

    expect(templates.actionItems.split('\n')[0]).toBe('# Content Update Review Required');
    expect(templates.repositorySection).toContain('{repo_data}');
    expect(templates.feedSection).toContain('{feed_data}');
  });

  describe('from a custom directory', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'templates-test-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read a template file', async () => {
      await writeFile(join(dir, 'repo_section.md'), 'Repo: {repo_data}');

      expect(await loadTemplate('repo_section.md', dir)).toBe('Repo: {repo_data}');
    });

    it('should fail when a template is missing', async () => {
      await writeFile(join(dir, 'action_items.md'), '# Title');

      await expect(loadTemplates(dir)).rejects.toThrow(
        `Template file not found: ${join(dir, 'repo_section.md')}`
      );
    });
  });
});
