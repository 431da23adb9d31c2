/**
 * Text normalization used before fingerprinting and for display
 */
import * as cheerio from 'cheerio';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('text-normalizer');

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

/**
 * Regex-only tag removal, used when the HTML parser rejects the input
 */
export function stripHtmlWithRegex(html: string): string {
  let text = html.replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '');
  text = text.replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '');
  text = text.replace(/<[^>]+>/g, '');

  for (const [entity, char] of Object.entries(HTML_ENTITIES)) {
    text = text.split(entity).join(char);
  }
  text = text.replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(parseInt(code, 10)));
  text = text.replace(/&#x([0-9a-f]+);/gi, (_, code: string) =>
    String.fromCodePoint(parseInt(code, 16))
  );
  return text;
}

/**
 * Extract the text of an HTML fragment
 */
export function stripHtml(html: string): string {
  if (!html.includes('<') && !html.includes('&')) {
    return html;
  }

  try {
    const $ = cheerio.load(html, null, false);
    return $.root().text();
  } catch (error) {
    logger.debug({ error }, 'HTML parser failed, falling back to regex stripping');
    return stripHtmlWithRegex(html);
  }
}

/**
 * Remove inline markdown syntax, keeping the visible text
 */
export function stripMarkdown(text: string): string {
  let result = text;
  // Links and images: keep the label
  result = result.replace(/!?\[([^\]]+)\]\([^)]+\)/g, '$1');
  // Headings
  result = result.replace(/^\s*#{1,6}\s+/gm, '');
  // Bullet and numbered list markers
  result = result.replace(/^\s*[-*+]\s+/gm, '');
  result = result.replace(/^\s*\d+\.\s+/gm, '');
  // Emphasis
  result = result.replace(/\*\*(.*?)\*\*/g, '$1');
  result = result.replace(/\*(.*?)\*/g, '$1');
  result = result.replace(/(^|\W)__(.+?)__(?=\W|$)/g, '$1$2');
  result = result.replace(/(^|\W)_(.+?)_(?=\W|$)/g, '$1$2');
  // Inline code
  result = result.replace(/`([^`]*)`/g, '$1');
  return result;
}

/**
 * Strip HTML and markdown, collapse whitespace and trim.
 * Pure and deterministic.
 */
export function normalizeText(raw: string | undefined | null): string {
  if (!raw) {
    return '';
  }

  const plain = stripMarkdown(stripHtml(raw));
  return plain.replace(/\s+/g, ' ').trim();
}
