import { readFile } from 'fs/promises';
import { createChildLogger } from '../utils/logger.js';
import { isNotFoundError } from '../utils/fs-atomic.js';
import { errorMessage } from '../types/index.js';
import { FeatureDocument, FeatureDocumentSchema } from './types.js';

const logger = createChildLogger('matrix-validator');

export type DocumentValidation =
  | { valid: true; document: FeatureDocument }
  | { valid: false; errors: string[] };

export function validateFeatureDocument(data: unknown): DocumentValidation {
  const result = FeatureDocumentSchema.safeParse(data);
  if (result.success) {
    return { valid: true, document: result.data };
  }
  return {
    valid: false,
    errors: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}

export interface FeatureFile {
  path: string;
  description: string;
}

export interface FileValidation {
  file: FeatureFile;
  valid: boolean;
  errors: string[];
}

export interface ValidationSummary {
  allValid: boolean;
  results: FileValidation[];
}

async function validateFile(file: FeatureFile): Promise<FileValidation> {
  let raw: string;
  try {
    raw = await readFile(file.path, 'utf-8');
  } catch (error) {
    const message = isNotFoundError(error) ? `${file.path} not found` : errorMessage(error);
    return { file, valid: false, errors: [message] };
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    return { file, valid: false, errors: [`Invalid JSON: ${errorMessage(error)}`] };
  }

  const validation = validateFeatureDocument(data);
  return validation.valid
    ? { file, valid: true, errors: [] }
    : { file, valid: false, errors: validation.errors };
}

/**
 * Validate every file; a missing file counts as a failure
 */
export async function validateFeatureFiles(files: FeatureFile[]): Promise<ValidationSummary> {
  const results: FileValidation[] = [];
  for (const file of files) {
    const result = await validateFile(file);
    if (!result.valid) {
      logger.warn({ path: file.path, errors: result.errors }, 'Feature document failed validation');
    }
    results.push(result);
  }
  return { allValid: results.every((result) => result.valid), results };
}
