import { createChildLogger } from '../../utils/logger.js';
import { FetchError, HttpConfig, errorMessage } from '../../types/index.js';

const logger = createChildLogger('base-fetcher');

/**
 * Configuration options for fetchers
 */
export interface FetcherOptions {
  /** Request timeout in milliseconds */
  timeout?: number;
  /** User agent string */
  userAgent?: string;
  /** Attempts per request, including the first */
  retries?: number;
  /** Base delay between attempts in milliseconds, multiplied by the attempt number */
  retryDelay?: number;
}

const DEFAULT_OPTIONS: Required<FetcherOptions> = {
  timeout: 30000,
  userAgent: 'content-monitor/1.0',
  retries: 3,
  retryDelay: 1000,
};

export interface FetchResult {
  content: string;
  status: number;
  contentType?: string;
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  /** Overrides the configured attempt count */
  retries?: number;
}

export function fetcherOptionsFromConfig(http: HttpConfig): FetcherOptions {
  return {
    timeout: http.timeoutMs,
    retries: http.retries,
    retryDelay: http.retryDelayMs,
  };
}

/**
 * Client errors other than rate limiting will not succeed on retry
 */
function isRetryable(error: unknown): boolean {
  if (error instanceof FetchError && error.status !== undefined) {
    return error.status >= 500 || error.status === 429;
  }
  return true;
}

/**
 * Base class for HTTP-backed fetchers: timeout per attempt and bounded
 * retries with linear backoff
 */
export abstract class BaseFetcher {
  protected options: Required<FetcherOptions>;

  constructor(options: FetcherOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Fetch a URL with retry logic
   */
  protected fetchWithRetry(url: string, request: RequestOptions = {}): Promise<FetchResult> {
    return this.retry(url, request, async (response) => ({
      content: await response.text(),
      status: response.status,
      contentType: response.headers.get('content-type') || undefined,
    }));
  }

  /**
   * Fetch a URL's body as raw bytes, with the same retry logic
   */
  protected fetchBytesWithRetry(url: string, request: RequestOptions = {}): Promise<Buffer> {
    return this.retry(url, request, async (response) => Buffer.from(await response.arrayBuffer()));
  }

  private async retry<T>(
    url: string,
    request: RequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const attempts = request.retries ?? this.options.retries;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        logger.debug({ url, attempt, method: request.method ?? 'GET' }, 'Fetching URL');
        return await this.fetchOnce(url, request, read);
      } catch (error) {
        lastError = error;
        logger.warn({ url, attempt, error: errorMessage(error) }, 'Fetch attempt failed');

        if (!isRetryable(error)) {
          throw error;
        }
        if (attempt < attempts) {
          await this.sleep(this.options.retryDelay * attempt);
        }
      }
    }

    const status = lastError instanceof FetchError ? lastError.status : undefined;
    throw new FetchError(
      `Failed to fetch ${url} after ${attempts} attempts: ${errorMessage(lastError)}`,
      status,
      { url }
    );
  }

  private async fetchOnce<T>(
    url: string,
    request: RequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await fetch(url, {
        method: request.method ?? 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          ...request.headers,
        },
        body: request.body,
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, response.status, {
          url,
          body: body.slice(0, 500),
        });
      }

      const result = await read(response);
      logger.debug({ url, status: response.status }, 'Fetch successful');
      return result;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Sleep for a specified duration
   */
  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
