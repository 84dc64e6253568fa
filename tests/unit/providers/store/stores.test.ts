/**
 * Blob Store Tests
 *
 * MemoryBlobStore bounds (LRU, TTL) and FileBlobStore persistence under a
 * temporary directory.
 */

import { createHash } from 'node:crypto';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { FileBlobStore } from '@/providers/store/file';
import { MemoryBlobStore } from '@/providers/store/memory';

describe('MemoryBlobStore', () => {
  test('stores and returns values', async () => {
    const store = new MemoryBlobStore({ maxEntries: 10, ttlMs: 60_000 });
    await store.put('answer:1', 'thirty days');
    expect(await store.get('answer:1')).toBe('thirty days');
    expect(await store.get('answer:2')).toBeUndefined();
  });

  test('evicts the least recently used entry beyond maxEntries', async () => {
    const store = new MemoryBlobStore({ maxEntries: 2, ttlMs: 60_000 });
    await store.put('a', '1');
    await store.put('b', '2');
    await store.get('a'); // a is now more recent than b
    await store.put('c', '3');

    expect(await store.get('a')).toBe('1');
    expect(await store.get('b')).toBeUndefined();
    expect(await store.get('c')).toBe('3');
    expect(store.size).toBe(2);
  });

  test('expires entries after the TTL', async () => {
    const store = new MemoryBlobStore({ maxEntries: 10, ttlMs: 20 });
    await store.put('a', '1');

    await new Promise((resolve) => setTimeout(resolve, 60));

    expect(await store.get('a')).toBeUndefined();
  });
});

describe('FileBlobStore', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'quire-store-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  test('round-trips values through the filesystem', async () => {
    const store = new FileBlobStore({ directory, ttlMs: 60_000 });
    await store.put('index:abc', '{"version":1}');

    expect(await store.get('index:abc')).toBe('{"version":1}');
  });

  test('persists across store instances', async () => {
    await new FileBlobStore({ directory, ttlMs: 60_000 }).put('answer:x', 'persisted');

    const reopened = new FileBlobStore({ directory, ttlMs: 60_000 });
    expect(await reopened.get('answer:x')).toBe('persisted');
  });

  test('returns undefined for missing keys', async () => {
    const store = new FileBlobStore({ directory, ttlMs: 60_000 });
    expect(await store.get('missing')).toBeUndefined();
  });

  test('creates a missing cache directory on first write', async () => {
    const nested = join(directory, 'a', 'b');
    const store = new FileBlobStore({ directory: nested, ttlMs: 60_000 });
    await store.put('k', 'v');
    expect(await store.get('k')).toBe('v');
  });

  test('overwrites existing values and leaves no temporary files', async () => {
    const store = new FileBlobStore({ directory, ttlMs: 60_000 });
    await store.put('k', 'first');
    await store.put('k', 'second');

    expect(await store.get('k')).toBe('second');
    const files = await readdir(directory);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^[0-9a-f]{64}\.blob$/);
  });

  test('removes expired files nobody reads when a later write comes in', async () => {
    let clock = Date.now();
    const store = new FileBlobStore({ directory, ttlMs: 60_000, now: () => clock });
    await store.put('answer:old', 'stale');

    clock += 120_000;
    await store.put('answer:new', 'fresh');

    const newName = `${createHash('sha256').update('answer:new').digest('hex')}.blob`;
    expect(await readdir(directory)).toEqual([newName]);
  });

  test('keeps unexpired files when sweeping', async () => {
    const clock = Date.now();
    const store = new FileBlobStore({ directory, ttlMs: 60_000, now: () => clock });
    await store.put('a', '1');
    await new FileBlobStore({ directory, ttlMs: 60_000, now: () => clock }).put('b', '2');

    expect(await readdir(directory)).toHaveLength(2);
    expect(await store.get('a')).toBe('1');
    expect(await store.get('b')).toBe('2');
  });

  test('treats entries older than the TTL as absent and removes them', async () => {
    let now = Date.now();
    const store = new FileBlobStore({ directory, ttlMs: 1000, now: () => now });
    await store.put('k', 'v');

    now += 60_000;

    expect(await store.get('k')).toBeUndefined();
    expect(await readdir(directory)).toEqual([]);
  });
});
