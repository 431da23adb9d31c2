/**
 * Extraction of feature records from the markdown feature matrix.
 *
 * The matrix holds one table per platform under a known heading. Each data
 * row has at least six cells: feature, category, first introduced, status,
 * latest update and key milestones.
 */
import { readFile } from 'fs/promises';
import { basename, join } from 'path';
import { createChildLogger } from '../utils/logger.js';
import { writeJsonAtomic, isNotFoundError } from '../utils/fs-atomic.js';
import { ExtractionError, errorMessage } from '../types/index.js';
import { Feature, FeatureDocument, PlatformTable } from './types.js';

const logger = createChildLogger('matrix-extractor');

export const GENERATED_BY = 'automated-extraction';
export const UNKNOWN = 'Unknown';
export const NO_MILESTONES = 'No specific milestones available';

const MIN_CELLS = 6;
const MIN_TABLE_LINES = 3;
const HEADER_CELLS = new Set(['feature', 'capability', 'feature / capability']);

const STATUS_EMOJI: Array<[string, string]> = [
  ['🟢', 'Stable'],
  ['🟡', 'Preview'],
  ['🟠', 'Experimental'],
  ['🔵', 'Rolling Out'],
  ['🔴', 'Deprecated'],
];

export const DEFAULT_PLATFORM_TABLES: PlatformTable[] = [
  {
    platform: 'IDE',
    headingPatterns: [
      'IDE Feature Evolution Timeline',
      '🖥️ IDE Integration Features',
      'IDE Integration Features',
    ],
    outputFile: 'ide-features.json',
  },
  {
    platform: 'Platform',
    headingPatterns: [
      'Platform and Agent Evolution Timeline',
      '🌐 Platform and Agent Evolution Timeline',
      'Agent Feature Evolution Timeline',
      '🤖 Coding Agent Features',
      'Coding Agent Features',
    ],
    outputFile: 'platform-features.json',
  },
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Section regexes for a heading, most specific level first. Each section
 * runs until the next heading of the same or a higher level.
 */
function sectionPatterns(heading: string): RegExp[] {
  const text = escapeRegExp(heading);
  return [
    new RegExp(`### ${text}.*?\\n(.*?)(?=\\n## |$)`, 'is'),
    new RegExp(`## ${text}.*?\\n(.*?)(?=\\n## |\\n# |$)`, 'is'),
    new RegExp(`# ${text}.*?\\n(.*?)(?=\\n# |$)`, 'is'),
  ];
}

function tableLines(section: string): string[] {
  const lines: string[] = [];
  let inTable = false;

  for (const raw of section.split('\n')) {
    const line = raw.trim();
    if (line.startsWith('|') && line.split('|').length - 1 >= 3) {
      inTable = true;
      lines.push(line);
    } else if (inTable && line && !line.startsWith('|')) {
      break;
    }
  }

  return lines;
}

/**
 * Table under the first heading that matches one of `headingPatterns`.
 * Empty string when no section holds a table with a data row.
 */
export function extractTableSection(markdown: string, headingPatterns: string[]): string {
  for (const heading of headingPatterns) {
    for (const pattern of sectionPatterns(heading)) {
      const match = pattern.exec(markdown);
      if (!match) {
        continue;
      }
      const lines = tableLines(match[1] ?? '');
      if (lines.length >= MIN_TABLE_LINES) {
        return lines.join('\n');
      }
    }
  }
  return '';
}

export function cleanCell(cell: string): string {
  return cell
    .replace(/\*\*(.*?)\*\*/g, '$1')
    .replace(/\*(.*?)\*/g, '$1')
    .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
    .trim();
}

export function parseStatus(cell: string): string {
  for (const [emoji, status] of STATUS_EMOJI) {
    if (cell.includes(emoji)) {
      return status;
    }
  }
  const text = cell.replace(/[^\p{L}\p{N}_\s]/gu, '').trim();
  return text || UNKNOWN;
}

/**
 * Cells of a table row, without the empty strings outside the outer pipes
 */
export function splitRow(line: string): string[] {
  const cells = line.split('|').map((cell) => cell.trim());
  if (cells[0] === '') {
    cells.shift();
  }
  if (cells[cells.length - 1] === '') {
    cells.pop();
  }
  return cells;
}

export interface ParseTableOptions {
  platform: string;
  sourceUrl: string;
  now: Date;
}

/**
 * Features of a table produced by `extractTableSection`. The first two lines
 * (header and separator) are skipped.
 */
export function parseFeatureTable(table: string, options: ParseTableOptions): Feature[] {
  const lines = table
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length < MIN_TABLE_LINES) {
    return [];
  }

  const timestamp = options.now.toISOString();
  const features: Feature[] = [];

  for (const line of lines.slice(2)) {
    if (!line.startsWith('|')) {
      continue;
    }
    const cells = splitRow(line);
    if (cells.length < MIN_CELLS) {
      logger.debug({ line, cells: cells.length }, 'Skipping short table row');
      continue;
    }

    const featureCapability = cleanCell(cells[0]);
    if (!featureCapability || HEADER_CELLS.has(featureCapability.toLowerCase())) {
      continue;
    }

    features.push({
      featureCapability,
      category: cleanCell(cells[1]),
      firstIntroduced: cleanCell(cells[2]) || UNKNOWN,
      currentStatus: parseStatus(cells[3]),
      latestUpdate: cleanCell(cells[4]) || UNKNOWN,
      keyMilestones: cleanCell(cells[5]) || NO_MILESTONES,
      sourceLinks: [
        {
          url: options.sourceUrl,
          title: `Feature Matrix - ${options.platform} Features`,
          feedSource: 'feature-matrix',
        },
      ],
      detectionDate: timestamp,
      lastModified: timestamp,
    });
  }

  return features;
}

/**
 * Document for one platform, newest `latestUpdate` first
 */
export function buildFeatureDocument(
  platform: string,
  features: Feature[],
  feedSources: string[],
  now: Date
): FeatureDocument {
  const sorted = [...features].sort((a, b) =>
    a.latestUpdate < b.latestUpdate ? 1 : a.latestUpdate > b.latestUpdate ? -1 : 0
  );
  return {
    metadata: {
      platform,
      lastUpdated: now.toISOString(),
      generatedBy: GENERATED_BY,
      feedSources,
    },
    features: sorted,
  };
}

export interface ExtractOptions {
  /** Link recorded on every feature; defaults to the matrix file name */
  sourceUrl?: string;
  tables?: PlatformTable[];
  now?: Date;
}

export interface ExtractedDocument {
  table: PlatformTable;
  document: FeatureDocument;
}

export function extractFeatureDocuments(
  markdown: string,
  sourceName: string,
  options: ExtractOptions = {}
): ExtractedDocument[] {
  const now = options.now ?? new Date();
  const sourceUrl = options.sourceUrl ?? sourceName;

  return (options.tables ?? DEFAULT_PLATFORM_TABLES).map((table) => {
    const section = extractTableSection(markdown, table.headingPatterns);
    if (!section) {
      logger.warn({ platform: table.platform }, 'No feature table found for platform');
    }
    const features = parseFeatureTable(section, { platform: table.platform, sourceUrl, now });
    return {
      table,
      document: buildFeatureDocument(table.platform, features, [sourceName], now),
    };
  });
}

export interface ExtractionResult {
  written: Array<{ path: string; platform: string; features: number }>;
}

/**
 * Read the matrix file and write one feature document per platform into
 * `outputDir`
 */
export async function extractFeatureMatrix(
  matrixPath: string,
  outputDir: string,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  let markdown: string;
  try {
    markdown = await readFile(matrixPath, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ExtractionError(`Feature matrix not found: ${matrixPath}`);
    }
    throw new ExtractionError(`Failed to read ${matrixPath}: ${errorMessage(error)}`, error);
  }

  const written: ExtractionResult['written'] = [];
  for (const { table, document } of extractFeatureDocuments(markdown, basename(matrixPath), options)) {
    const path = join(outputDir, table.outputFile);
    await writeJsonAtomic(path, document);
    written.push({ path, platform: table.platform, features: document.features.length });
    logger.info({ path, features: document.features.length }, 'Wrote feature document');
  }

  return { written };
}
