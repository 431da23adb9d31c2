import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GitHubClient } from './github-client.js';
import { RepositoryFetcher, isTrackedFile } from './repository-fetcher.js';
import { fingerprintFile } from '../reconciler.js';
import { jsonResponse, textResponse } from '../../test/fixtures.js';

const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

const API = 'https://api.github.test';

function file(path: string, body: string) {
  return {
    type: 'file',
    name: path.split('/').pop() ?? path,
    path,
    sha: `sha-${path}`,
    size: Buffer.byteLength(body),
    download_url: `https://raw.github.test/${path}`,
    encoding: 'base64',
    content: Buffer.from(body).toString('base64'),
  };
}

function entry(type: 'file' | 'dir', path: string) {
  return { type, name: path.split('/').pop() ?? path, path, sha: `sha-${path}`, size: 0 };
}

/**
 * Routes contents API requests to canned payloads by path
 */
function serveContents(routes: Record<string, unknown>): void {
  mockFetch.mockImplementation((input) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const path = decodeURIComponent(url.pathname.replace('/repos/octo/docs/contents/', ''));
    if (Object.hasOwn(routes, path)) {
      return Promise.resolve(jsonResponse(routes[path]));
    }
    return Promise.resolve(textResponse('not found', 404));
  });
}

describe('isTrackedFile', () => {
  it('should accept documentation and data extensions', () => {
    expect(isTrackedFile('a.md')).toBe(true);
    expect(isTrackedFile('dir/b.MARKDOWN')).toBe(true);
    expect(isTrackedFile('notes.txt')).toBe(true);
    expect(isTrackedFile('data.json')).toBe(true);
  });

  it('should reject other files', () => {
    expect(isTrackedFile('image.png')).toBe(false);
    expect(isTrackedFile('script.ts')).toBe(false);
    expect(isTrackedFile('README')).toBe(false);
  });
});

describe('RepositoryFetcher', () => {
  let fetcher: RepositoryFetcher;
  const now = new Date('2025-03-01T00:00:00.000Z');
  const target = { repository: 'octo/docs', directory: 'docs', ref: 'main' };

  beforeEach(() => {
    vi.clearAllMocks();
    fetcher = new RepositoryFetcher(
      new GitHubClient({ token: 'test-token', apiUrl: API, retries: 1, retryDelay: 1 })
    );
  });

  it('should walk directories and key files by relative path', async () => {
    serveContents({
      docs: [entry('file', 'docs/a.md'), entry('file', 'docs/logo.png'), entry('dir', 'docs/guides')],
      'docs/a.md': file('docs/a.md', '# A\n'),
      'docs/guides': [entry('file', 'docs/guides/b.txt')],
      'docs/guides/b.txt': file('docs/guides/b.txt', 'bee'),
    });

    const result = await fetcher.fetch(target, now);

    expect(Object.keys(result.snapshot)).toEqual(['a.md', 'guides/b.txt']);
    expect(result.snapshot['guides/b.txt']).toEqual({
      kind: 'repository_file',
      identity: 'guides/b.txt',
      path: 'docs/guides/b.txt',
      sha: 'sha-docs/guides/b.txt',
      downloadUrl: 'https://raw.github.test/docs/guides/b.txt',
      contentHash: fingerprintFile(Buffer.from('bee')),
      size: 3,
      firstSeen: '2025-03-01T00:00:00.000Z',
      lastProcessed: '2025-03-01T00:00:00.000Z',
    });
    expect(result.contents.get('a.md')?.toString('utf8')).toBe('# A\n');
    expect(result.skipped).toEqual(['logo.png']);
  });

  it('should skip files that fail to download', async () => {
    serveContents({
      docs: [entry('file', 'docs/a.md'), entry('file', 'docs/broken.md')],
      'docs/a.md': file('docs/a.md', 'ok'),
    });

    const result = await fetcher.fetch(target, now);

    expect(Object.keys(result.snapshot)).toEqual(['a.md']);
    expect(result.skipped).toEqual(['broken.md']);
  });

  it('should skip nested directories that cannot be listed', async () => {
    serveContents({
      docs: [entry('dir', 'docs/private'), entry('file', 'docs/a.md')],
      'docs/a.md': file('docs/a.md', 'ok'),
    });

    const result = await fetcher.fetch(target, now);

    expect(Object.keys(result.snapshot)).toEqual(['a.md']);
  });

  it('should fail when the monitored directory cannot be listed', async () => {
    serveContents({});

    await expect(fetcher.fetch(target, now)).rejects.toThrow('HTTP 404');
  });
});
