import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ContentCache, sha256 } from './cache';

// sha256 of the empty string
const EMPTY_DIGEST = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('sha256', () => {
  it('hashes the UTF-8 content', () => {
    expect(sha256('')).toBe(EMPTY_DIGEST);
  });
});

describe('ContentCache', () => {
  let tempDir: string;
  let cache: ContentCache;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'slider-cache-'));
    cache = new ContentCache(tempDir, '/slider-temp/');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('maps content to a path below the filter directory', () => {
    const entry = cache.entryFor('dot', '', 'svg');

    expect(entry.digest).toBe(EMPTY_DIGEST);
    expect(entry.directory).toBe(join(tempDir, 'dot'));
    expect(entry.fullName).toBe(join(tempDir, 'dot', `${EMPTY_DIGEST}.svg`));
    expect(entry.relPath).toBe(`dot/${EMPTY_DIGEST}.svg`);
  });

  it('maps the same content to the same entry', () => {
    expect(cache.entryFor('dot', 'digraph { a -> b }', 'png')).toEqual(
      cache.entryFor('dot', 'digraph { a -> b }', 'png'),
    );
    expect(cache.entryFor('dot', 'a', 'png').digest).not.toBe(
      cache.entryFor('dot', 'b', 'png').digest,
    );
  });

  it('links entries below the temp link', () => {
    expect(cache.linkFor(cache.entryFor('seqdiag', '', 'svg'))).toBe(
      `/slider-temp/seqdiag/${EMPTY_DIGEST}.svg`,
    );
  });

  it('derives siblings with another extension', () => {
    const sibling = cache.siblingOf(cache.entryFor('seqdiag', '', 'svg'), 'seqdiag');

    expect(sibling.fullName).toBe(join(tempDir, 'seqdiag', `${EMPTY_DIGEST}.seqdiag`));
    expect(sibling.relPath).toBe(`seqdiag/${EMPTY_DIGEST}.seqdiag`);
  });

  it('creates the directory once', async () => {
    const entry = cache.entryFor('dot', 'x', 'svg');

    expect(await cache.prepare(entry)).toBe(true);
    expect(await cache.prepare(entry)).toBe(false);
  });

  it('reports present entries', async () => {
    const entry = cache.entryFor('dot', 'x', 'svg');
    expect(await cache.has(entry)).toBe(false);

    await cache.prepare(entry);
    writeFileSync(entry.fullName, '<svg/>');
    expect(await cache.has(entry)).toBe(true);
  });
});
