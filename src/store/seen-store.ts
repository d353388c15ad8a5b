/**
 * GrantRadar — Seen-Item Store
 *
 * Persistent set of opportunity URLs already reported. The set only
 * grows; `flush` is the single durability point of a scan.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { logger, errorMessage, type Logger } from '../lib/logger';

export interface SeenItemStore {
  /** Load persisted URLs. Never throws; unreadable state loads as empty. */
  load(): Promise<Set<string>>;
  contains(url: string): boolean;
  /** Idempotent insert */
  record(url: string): void;
  /** Persist the current set. May throw. */
  flush(): Promise<void>;
  readonly size: number;
}

// ============================================================
// IN-MEMORY
// ============================================================

/**
 * Store with no durable backing. `flush` snapshots the set so a later
 * `load` returns it, which mimics a real backend across scans.
 */
export class MemorySeenStore implements SeenItemStore {
  private urls = new Set<string>();
  private persisted: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.persisted = new Set(initial);
  }

  async load(): Promise<Set<string>> {
    this.urls = new Set(this.persisted);
    return new Set(this.urls);
  }

  contains(url: string): boolean {
    return this.urls.has(url);
  }

  record(url: string): void {
    this.urls.add(url);
  }

  async flush(): Promise<void> {
    this.persisted = new Set(this.urls);
  }

  get size(): number {
    return this.urls.size;
  }

  /** URLs a `load` would currently return */
  snapshot(): string[] {
    return [...this.persisted];
  }
}

// ============================================================
// JSON FILE
// ============================================================

const SeenFileSchema = z.array(z.string());

/**
 * JSON array of URLs on disk. Writes go to a temp file that is then
 * renamed over the target, so a failed write keeps the previous file.
 */
export class JsonFileSeenStore implements SeenItemStore {
  private urls = new Set<string>();
  private readonly log: Logger;

  constructor(private readonly filePath: string) {
    this.log = logger.child({ store: 'json-file', path: filePath });
  }

  async load(): Promise<Set<string>> {
    this.urls = new Set(await this.readFile());
    this.log.debug('Seen set loaded', { count: this.urls.size });
    return new Set(this.urls);
  }

  private async readFile(): Promise<string[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.log.info('No seen file yet, starting empty');
      } else {
        this.log.warn('Seen file unreadable, starting empty', { error: errorMessage(error) });
      }
      return [];
    }

    try {
      const parsed = SeenFileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      this.log.warn('Seen file has an unexpected shape, starting empty');
    } catch (error) {
      this.log.warn('Seen file is not valid JSON, starting empty', { error: errorMessage(error) });
    }
    return [];
  }

  contains(url: string): boolean {
    return this.urls.has(url);
  }

  record(url: string): void {
    this.urls.add(url);
  }

  async flush(): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tmpPath, JSON.stringify([...this.urls], null, 2), 'utf-8');
    await rename(tmpPath, this.filePath);
    this.log.debug('Seen set written', { count: this.urls.size });
  }

  get size(): number {
    return this.urls.size;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
