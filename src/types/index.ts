import { z } from 'zod';

// ============================================================
// Configuration Types
// ============================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const ConfigSchema = z.object({
  github: z.object({
    apiUrl: z.string().url(),
    token: z.string().min(1).optional(),
    personalToken: z.string().min(1).optional(),
    issueRepository: z.string().min(1).optional(),
    assignee: z.string().min(1).optional(),
    assignDelayMs: z.number().min(0),
    issueLabels: z.array(z.string().min(1)),
  }),
  monitor: z.object({
    repository: z
      .string()
      .regex(/^[^/\s]+\/[^/\s]+$/, 'must look like owner/name')
      .optional(),
    directory: z.string().min(1).optional(),
    ref: z.string().min(1),
  }),
  feeds: z.array(z.string().url()),
  content: z.object({
    rootDir: z.string().min(1),
  }),
  cleanup: z.object({
    ageDays: z.number().int().min(0),
    dryRun: z.boolean(),
  }),
  http: z.object({
    timeoutMs: z.number().int().min(1),
    retries: z.number().int().min(1).max(10),
    retryDelayMs: z.number().int().min(0),
  }),
  actionsOutputFile: z.string().min(1).optional(),
  logLevel: LogLevelSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

export type HttpConfig = Config['http'];

// ============================================================
// Error Types
// ============================================================

export class MonitorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'MonitorError';
  }
}

export class ConfigError extends MonitorError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class FetchError extends MonitorError {
  constructor(
    message: string,
    public status?: number,
    details?: unknown
  ) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class StateError extends MonitorError {
  constructor(message: string, details?: unknown) {
    super(message, 'STATE_ERROR', details);
    this.name = 'StateError';
  }
}

export class PersistenceError extends MonitorError {
  constructor(message: string, details?: unknown) {
    super(message, 'PERSISTENCE_ERROR', details);
    this.name = 'PersistenceError';
  }
}

export class TemplateError extends MonitorError {
  constructor(message: string, details?: unknown) {
    super(message, 'TEMPLATE_ERROR', details);
    this.name = 'TemplateError';
  }
}

export class IssueError extends MonitorError {
  constructor(message: string, details?: unknown) {
    super(message, 'ISSUE_ERROR', details);
    this.name = 'IssueError';
  }
}

export class ExtractionError extends MonitorError {
  constructor(message: string, details?: unknown) {
    super(message, 'EXTRACTION_ERROR', details);
    this.name = 'ExtractionError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
