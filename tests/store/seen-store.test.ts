/**
 * Tests for Seen-Item Stores
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, readdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemorySeenStore, JsonFileSeenStore } from '../../src/store';

describe('MemorySeenStore', () => {
  it('should load its initial contents', async () => {
    const store = new MemorySeenStore(['https://example.org/a']);

    const loaded = await store.load();

    expect([...loaded]).toEqual(['https://example.org/a']);
    expect(store.contains('https://example.org/a')).toBe(true);
    expect(store.size).toBe(1);
  });

  it('should record idempotently', async () => {
    const store = new MemorySeenStore();
    await store.load();

    store.record('https://example.org/a');
    store.record('https://example.org/a');

    expect(store.size).toBe(1);
  });

  it('should only persist on flush', async () => {
    const store = new MemorySeenStore();
    await store.load();
    store.record('https://example.org/a');

    expect(store.snapshot()).toEqual([]);
    await store.flush();
    expect(store.snapshot()).toEqual(['https://example.org/a']);
  });
});

describe('JsonFileSeenStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'grant-radar-seen-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should start empty when the file does not exist', async () => {
    const store = new JsonFileSeenStore(join(dir, 'seen.json'));

    expect((await store.load()).size).toBe(0);
  });

  it('should write and read back the seen set', async () => {
    const path = join(dir, 'nested', 'seen.json');
    const store = new JsonFileSeenStore(path);
    await store.load();
    store.record('https://example.org/a');
    store.record('https://example.org/b');

    await store.flush();

    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual([
      'https://example.org/a',
      'https://example.org/b',
    ]);

    const reopened = new JsonFileSeenStore(path);
    const loaded = await reopened.load();
    expect(loaded.has('https://example.org/b')).toBe(true);
    expect(reopened.contains('https://example.org/a')).toBe(true);
  });

  it('should not leave the temp file behind', async () => {
    const store = new JsonFileSeenStore(join(dir, 'seen.json'));
    await store.load();
    store.record('https://example.org/a');

    await store.flush();

    expect(await readdir(dir)).toEqual(['seen.json']);
  });

  it('should keep previously stored URLs across scans', async () => {
    const path = join(dir, 'seen.json');
    await writeFile(path, JSON.stringify(['https://example.org/old']), 'utf-8');

    const store = new JsonFileSeenStore(path);
    await store.load();
    store.record('https://example.org/new');
    await store.flush();

    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual([
      'https://example.org/old',
      'https://example.org/new',
    ]);
  });

  it('should treat a corrupt file as empty', async () => {
    const path = join(dir, 'seen.json');
    await writeFile(path, '{not json', 'utf-8');

    const loaded = await new JsonFileSeenStore(path).load();

    expect(loaded.size).toBe(0);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should treat an unexpected shape as empty', async () => {
    const path = join(dir, 'seen.json');
    await writeFile(path, JSON.stringify({ urls: ['https://example.org/a'] }), 'utf-8');

    expect((await new JsonFileSeenStore(path).load()).size).toBe(0);
  });
});
