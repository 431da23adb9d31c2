import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { hashString, hashBytes, hashFile, shortHash } from './hash.js';

describe('hashString', () => {
  it('should generate consistent SHA-256 hash', () => {
    const content = 'Hello, World!';
    const hash1 = hashString(content);
    const hash2 = hashString(content);

    expect(hash1).toBe(hash2);
    expect(hash1).toMatch(/^[a-f0-9]{64}$/);
  });

  it('should match the known digest of the empty string', () => {
    expect(hashString('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('should change when a single character differs', () => {
    expect(hashString('release notes v1')).not.toBe(hashString('release notes v2'));
  });

  it('should be case sensitive', () => {
    expect(hashString('Hello')).not.toBe(hashString('hello'));
  });

  it('should agree with hashBytes on UTF-8 input', () => {
    const text = 'Café — notes';
    expect(hashBytes(Buffer.from(text, 'utf8'))).toBe(hashString(text));
  });
});

describe('hashFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hash-test-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should hash file bytes', async () => {
    const path = join(dir, 'a.md');
    await writeFile(path, '# Title\n');

    expect(await hashFile(path)).toBe(hashString('# Title\n'));
  });
});

describe('shortHash', () => {
  it('should use default length of 8', () => {
    expect(shortHash('test content').length).toBe(8);
  });

  it('should be a prefix of the full hash', () => {
    expect(shortHash('test', 16)).toBe(hashString('test').substring(0, 16));
  });
});
