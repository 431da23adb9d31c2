import { z } from 'zod';
import { createChildLogger } from '../../utils/logger.js';
import { FetchError, errorMessage } from '../../types/index.js';
import { BaseFetcher, FetcherOptions } from './base-fetcher.js';

const logger = createChildLogger('github-client');

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

const ContentEntrySchema = z.object({
  type: z.string(),
  name: z.string(),
  path: z.string(),
  sha: z.string(),
  size: z.number().int().min(0),
  download_url: z.string().nullable().optional(),
});

const FileContentSchema = ContentEntrySchema.extend({
  content: z.string().optional(),
  encoding: z.string().optional(),
});

const IssueResponseSchema = z.object({
  number: z.number().int(),
  html_url: z.string(),
});

export type ContentEntry = z.infer<typeof ContentEntrySchema>;

export interface RepositoryFileContent {
  path: string;
  sha: string;
  size: number;
  downloadUrl?: string;
  content: Buffer;
}

export interface CreatedIssue {
  number: number;
  url: string;
}

export interface NewIssue {
  title: string;
  body: string;
  labels?: string[];
}

export interface GitHubClientOptions extends FetcherOptions {
  token: string;
  apiUrl?: string;
}

function encodePath(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
}

function readJson(text: string, what: string): unknown {
  try {
    const raw: unknown = JSON.parse(text);
    return raw;
  } catch (error) {
    throw new FetchError(`Invalid JSON in ${what}: ${errorMessage(error)}`);
  }
}

function parseJson<T>(schema: z.ZodType<T>, text: string, what: string): T {
  const parsed = schema.safeParse(readJson(text, what));
  if (!parsed.success) {
    throw new FetchError(`Unexpected ${what} payload`, undefined, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Minimal REST client for the GitHub contents and issues APIs
 */
export class GitHubClient extends BaseFetcher {
  private token: string;
  private apiUrl: string;

  constructor(options: GitHubClientOptions) {
    const { token, apiUrl, ...fetcherOptions } = options;
    super(fetcherOptions);
    this.token = token;
    this.apiUrl = (apiUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, '');
  }

  private headers(): Record<string, string> {
    return {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${this.token}`,
      'X-GitHub-Api-Version': '2022-11-28',
    };
  }

  private contentsUrl(repository: string, path: string, ref: string): string {
    const encoded = encodePath(path);
    const suffix = encoded ? `/${encoded}` : '';
    return `${this.apiUrl}/repos/${repository}/contents${suffix}?ref=${encodeURIComponent(ref)}`;
  }

  /**
   * List the entries of a directory
   */
  async listDirectory(repository: string, path: string, ref: string): Promise<ContentEntry[]> {
    const { content } = await this.fetchWithRetry(this.contentsUrl(repository, path, ref), {
      headers: this.headers(),
    });

    if (!Array.isArray(readJson(content, 'directory listing'))) {
      throw new FetchError(`${path} in ${repository} is not a directory`);
    }
    return parseJson(z.array(ContentEntrySchema), content, 'directory listing');
  }

  /**
   * Fetch a file's metadata and decoded bytes. Files the contents API does
   * not inline are read from their download URL.
   */
  async getFile(repository: string, path: string, ref: string): Promise<RepositoryFileContent> {
    const { content } = await this.fetchWithRetry(this.contentsUrl(repository, path, ref), {
      headers: this.headers(),
    });
    const file = parseJson(FileContentSchema, content, 'file');

    if (file.type !== 'file') {
      throw new FetchError(`${path} in ${repository} is not a file`);
    }

    let bytes: Buffer;
    if (file.encoding === 'base64' && file.content !== undefined) {
      bytes = Buffer.from(file.content, 'base64');
    } else if (file.download_url) {
      logger.debug({ path, encoding: file.encoding }, 'Content not inlined, using download URL');
      bytes = await this.fetchBytesWithRetry(file.download_url, { headers: this.headers() });
    } else {
      throw new FetchError(`No content available for ${path}`);
    }

    return {
      path: file.path,
      sha: file.sha,
      size: file.size,
      downloadUrl: file.download_url ?? undefined,
      content: bytes,
    };
  }

  /**
   * Open an issue. Sent once, without retries.
   */
  async createIssue(repository: string, issue: NewIssue): Promise<CreatedIssue> {
    const { content } = await this.fetchWithRetry(`${this.apiUrl}/repos/${repository}/issues`, {
      method: 'POST',
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify({ title: issue.title, body: issue.body, labels: issue.labels ?? [] }),
      retries: 1,
    });
    const created = parseJson(IssueResponseSchema, content, 'issue');
    logger.info({ repository, number: created.number }, 'Issue created');
    return { number: created.number, url: created.html_url };
  }

  async addAssignees(repository: string, issueNumber: number, assignees: string[]): Promise<void> {
    await this.fetchWithRetry(`${this.apiUrl}/repos/${repository}/issues/${issueNumber}/assignees`, {
      method: 'POST',
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify({ assignees }),
    });
    logger.info({ repository, issueNumber, assignees }, 'Issue assigned');
  }
}

export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  return new GitHubClient(options);
}
