// src/ScanCache.ts
// Extraction and domain results keyed by repository identifier and last push, with a TTL.
// Optionally persisted between runs so an unchanged repository is not fetched again.
//
// File shape:
//   { "entries": { "<owner/name>@<pushedAt>": { "stored_at": ms, "technologies": {...}, "domain": {...} } } }

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { Clock } from './clock';
import { systemClock } from './clock';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { DomainTag, RepositorySummary, TechnologyObservationSet } from './model';
import { DomainTagSchema, TechnologyListsSchema, fromTechnologyLists, toTechnologyLists } from './recordLog';

export interface CachedScan {
  technologies: TechnologyObservationSet;
  domain: DomainTag;
}

const CacheFileSchema = z.object({
  entries: z.record(
    z.object({
      stored_at: z.number(),
      technologies: TechnologyListsSchema,
      domain: DomainTagSchema,
    })
  ),
});

type CacheFile = z.infer<typeof CacheFileSchema>;

interface Entry {
  value: CachedScan;
  storedAt: number;
}

export interface ScanCacheOptions {
  ttlMs: number;
  filePath?: string | null; // null keeps the cache in memory for this run only
  clock?: Clock;
  logger?: Logger;
}

/** A new push changes the key, so stale extraction is never served for a changed repository. */
export function scanCacheKey(repo: RepositorySummary): string {
  return `${repo.id}@${repo.pushedAt ?? repo.createdAt}`;
}

export class ScanCache {
  readonly filePath: string | null;
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly entries = new Map<string, Entry>();
  private hits = 0;
  private misses = 0;

  constructor(options: ScanCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.filePath = options.filePath ?? null;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  get(key: string): CachedScan | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      this.misses += 1;
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    return entry.value;
  }

  set(key: string, value: CachedScan): void {
    this.entries.set(key, { value, storedAt: this.clock.now() });
  }

  /**
   * Reads entries persisted by an earlier run, dropping expired ones.
   * An unreadable cache file is discarded with a warning.
   * @returns the number of entries loaded.
   */
  async load(): Promise<number> {
    if (this.filePath === null) return 0;
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return 0;
      throw error;
    }

    const parsed = CacheFileSchema.safeParse(parseJson(text));
    if (!parsed.success) {
      this.logger.warn(`⚠ [Cache] Ignoring unreadable cache file ${this.filePath}`);
      return 0;
    }

    let loaded = 0;
    for (const [key, stored] of Object.entries(parsed.data.entries)) {
      const entry: Entry = {
        value: { technologies: fromTechnologyLists(stored.technologies), domain: stored.domain },
        storedAt: stored.stored_at,
      };
      if (this.isExpired(entry)) continue;
      this.entries.set(key, entry);
      loaded += 1;
    }
    this.logger.debug(`[Cache] Loaded ${loaded} entries from ${this.filePath}`);
    return loaded;
  }

  /** Writes the unexpired entries; a no-op for an in-memory cache. */
  async save(): Promise<void> {
    if (this.filePath === null) return;
    const file: CacheFile = { entries: {} };
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) continue;
      file.entries[key] = {
        stored_at: entry.storedAt,
        technologies: toTechnologyLists(entry.value.technologies),
        domain: entry.value.domain,
      };
    }
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(file), 'utf-8');
    await fs.rename(tempPath, this.filePath);
    this.logger.debug(`[Cache] Saved ${Object.keys(file.entries).length} entries to ${this.filePath}`);
  }

  /** Forgets every entry and removes the cache file. */
  async clear(): Promise<void> {
    this.entries.clear();
    if (this.filePath !== null) {
      await fs.rm(this.filePath, { force: true });
    }
  }

  get stats(): { size: number; hits: number; misses: number } {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }

  private isExpired(entry: Entry): boolean {
    return this.clock.now() - entry.storedAt >= this.ttlMs;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
