import { readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { TemplateError, errorMessage } from '../types/index.js';
import { isNotFoundError } from '../utils/fs-atomic.js';

/** Shipped templates, two levels above both src/report and dist/report */
export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

export const TEMPLATE_FILES = {
  actionItems: 'action_items.md',
  repositorySection: 'repo_section.md',
  feedSection: 'feed_section.md',
} as const;

export type TemplateName = keyof typeof TEMPLATE_FILES;

export type TemplateSet = Record<TemplateName, string>;

export async function loadTemplate(fileName: string, dir: string = DEFAULT_TEMPLATES_DIR): Promise<string> {
  const path = join(dir, fileName);
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new TemplateError(`Template file not found: ${path}`);
    }
    throw new TemplateError(`Failed to read template ${path}: ${errorMessage(error)}`, error);
  }
}

export async function loadTemplates(dir: string = DEFAULT_TEMPLATES_DIR): Promise<TemplateSet> {
  return {
    actionItems: await loadTemplate(TEMPLATE_FILES.actionItems, dir),
    repositorySection: await loadTemplate(TEMPLATE_FILES.repositorySection, dir),
    feedSection: await loadTemplate(TEMPLATE_FILES.feedSection, dir),
  };
}

/**
 * Substitute `{name}` placeholders. Every placeholder in the template must
 * have a value; values are inserted verbatim.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{([a-z_][a-z0-9_]*)\}/g, (_, name: string) => {
    if (!Object.hasOwn(values, name)) {
      throw new TemplateError(`No value for template placeholder {${name}}`);
    }
    return values[name];
  });
}
