/**
 * Content-addressed file cache for generated images
 *
 * Files live under `<tempDir>/<filterName>/<sha256>.<extension>`, so the same
 * source always maps to the same file and an existing file means the
 * external renderer can be skipped. Nothing here ever deletes entries.
 */

import { createHash } from 'crypto';
import { access, mkdir } from 'fs/promises';
import { join } from 'path';

export interface CacheEntry {
  /** Absolute file name */
  fullName: string;
  /** Path relative to the cache root, always with forward slashes */
  relPath: string;
  directory: string;
  digest: string;
}

export function sha256(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

export class ContentCache {
  constructor(
    readonly tempDir: string,
    readonly tempLink: string,
  ) {}

  /**
   * Cache entry for some content; does not touch the file system
   */
  entryFor(filterName: string, content: string, extension: string): CacheEntry {
    const digest = sha256(content);
    const filename = `${digest}.${extension}`;
    const directory = join(this.tempDir, filterName);
    return {
      fullName: join(directory, filename),
      relPath: `${filterName}/${filename}`,
      directory,
      digest,
    };
  }

  /**
   * Entry next to another one, sharing its digest but with another extension
   */
  siblingOf(entry: CacheEntry, extension: string): CacheEntry {
    const filename = `${entry.digest}.${extension}`;
    const filterName = entry.relPath.substring(0, entry.relPath.indexOf('/'));
    return {
      fullName: join(entry.directory, filename),
      relPath: `${filterName}/${filename}`,
      directory: entry.directory,
      digest: entry.digest,
    };
  }

  async has(entry: CacheEntry): Promise<boolean> {
    try {
      await access(entry.fullName);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Create the entry's directory; returns true if it had to be created
   */
  async prepare(entry: CacheEntry): Promise<boolean> {
    const created = await mkdir(entry.directory, { recursive: true });
    return created !== undefined;
  }

  /**
   * Site-relative URL of an entry
   */
  linkFor(entry: CacheEntry): string {
    return this.tempLink + entry.relPath;
  }
}
