/**
 * Filesystem Blob Store
 *
 * One file per key under a cache directory. File names are the SHA-256 of
 * the key, so any key is a safe path. Entries older than the TTL (by mtime)
 * read as absent and are removed. Writes also sweep expired files from the
 * directory, at most once per TTL period.
 */

import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { BlobStore } from './types';

export interface FileBlobStoreOptions {
  directory: string;
  ttlMs: number;
  /** Clock override for expiry checks */
  now?: () => number;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileBlobStore implements BlobStore {
  private readonly directory: string;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private ready: Promise<string | undefined> | null = null;
  private lastSweep = Number.NEGATIVE_INFINITY;

  constructor(options: FileBlobStoreOptions) {
    this.directory = options.directory;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | undefined> {
    const path = this.pathFor(key);
    try {
      const info = await stat(path);
      if (this.now() - info.mtimeMs > this.ttlMs) {
        await rm(path, { force: true });
        return undefined;
      }
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  async put(key: string, value: string): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.directory, { recursive: true }).catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    await this.ready;
    await this.sweepIfDue();

    // Write then rename so readers never see a partial file
    const path = this.pathFor(key);
    const temp = `${path}.${randomUUID()}.tmp`;
    await writeFile(temp, value, 'utf-8');
    await rename(temp, path);
  }

  /** Delete expired entries left behind by keys nobody reads again */
  private async sweepIfDue(): Promise<void> {
    const now = this.now();
    if (now - this.lastSweep < this.ttlMs) return;
    this.lastSweep = now;

    for (const name of await readdir(this.directory)) {
      if (!name.endsWith('.blob')) continue;
      const path = join(this.directory, name);
      try {
        const info = await stat(path);
        if (now - info.mtimeMs > this.ttlMs) {
          await rm(path, { force: true });
        }
      } catch (error) {
        // Removed by a concurrent reader or writer
        if (!isNotFound(error)) throw error;
      }
    }
  }

  private pathFor(key: string): string {
    const name = createHash('sha256').update(key).digest('hex');
    return join(this.directory, `${name}.blob`);
  }
}
