// src/CheckpointStore.ts
// Durable record of repositories that completed a scan pass, for resuming interrupted runs.
//
// File shape:
//   { "scanned_repos": [...], "start_time": iso, "last_update": iso, "end_time": iso | null, "stats": {...} }

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { Clock } from './clock';
import { systemClock } from './clock';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { ConfigError } from './errors';
import type { ScanStats } from './model';

const CheckpointFileSchema = z.object({
  scanned_repos: z.array(z.string()),
  start_time: z.string().nullable(),
  last_update: z.string().nullable(),
  end_time: z.string().nullable().default(null),
  stats: z
    .object({
      reposScanned: z.number(),
      reposSkipped: z.number(),
      reposFiltered: z.number().default(0),
      reposMissing: z.number().default(0),
      apiCalls: z.number(),
      errors: z.number(),
      rateLimitRemaining: z.number().nullable().default(null),
      rateLimitResetAt: z.string().nullable().default(null),
    })
    .nullable()
    .default(null),
});

export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

export interface CheckpointStoreOptions {
  saveInterval?: number;
  persist?: boolean; // false keeps progress in memory only

  clock?: Clock;
  logger?: Logger;
}

export class CheckpointStore {
  private readonly saveInterval: number;
  private readonly persist: boolean;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private scanned = new Set<string>();
  private startTime: string | null = null;
  private lastUpdate: string | null = null;
  private endTime: string | null = null;
  private stats: ScanStats | null = null;
  private unsaved = 0;
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    options: CheckpointStoreOptions = {}
  ) {
    this.saveInterval = options.saveInterval ?? 10;
    this.persist = options.persist ?? true;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Loads persisted progress. Only called when the caller asked to resume.
   * @returns true if a checkpoint file was found.
   */
  async load(): Promise<boolean> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.info(`[Checkpoint] No checkpoint at ${this.filePath}; starting fresh`);
        return false;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigError(`Checkpoint file is not valid JSON: ${this.filePath}`, error);
    }
    const parsed = CheckpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Checkpoint file has an unexpected shape: ${this.filePath}`, parsed.error);
    }

    this.scanned = new Set(parsed.data.scanned_repos);
    this.startTime = parsed.data.start_time;
    this.lastUpdate = parsed.data.last_update;
    this.endTime = parsed.data.end_time;
    this.stats = parsed.data.stats;
    this.unsaved = 0;
    this.logger.info(`[Checkpoint] Resuming: ${this.scanned.size} repositories already scanned`);
    return true;
  }

  /** Forgets all progress and removes the file. */
  async clear(): Promise<void> {
    this.scanned = new Set();
    this.startTime = null;
    this.lastUpdate = null;
    this.endTime = null;
    this.stats = null;
    this.unsaved = 0;
    if (this.persist) {
      await fs.rm(this.filePath, { force: true });
    }
  }

  /** Stamps the run start unless a resumed checkpoint already carries one. */
  begin(): void {
    if (this.startTime === null) {
      this.startTime = this.isoNow();
    }
    this.endTime = null;
  }

  isScanned(repoId: string): boolean {
    return this.scanned.has(repoId);
  }

  get size(): number {
    return this.scanned.size;
  }

  get scannedRepos(): string[] {
    return [...this.scanned];
  }

  get lastStats(): ScanStats | null {
    return this.stats;
  }

  /**
   * Records a completed repository and saves every `saveInterval` completions.
   */
  async markScanned(repoId: string, stats: ScanStats): Promise<void> {
    if (this.scanned.has(repoId)) return;
    this.scanned.add(repoId);
    this.stats = { ...stats };
    this.unsaved += 1;
    if (this.unsaved >= this.saveInterval) {
      await this.save();
    }
  }

  /**
   * Writes the current state. Writes are serialized, so a flush triggered by a
   * signal never interleaves with a periodic save.
   */
  async save(stats?: ScanStats): Promise<void> {
    if (stats) {
      this.stats = { ...stats };
    }
    this.lastUpdate = this.isoNow();
    this.unsaved = 0;
    if (!this.persist) return;

    const snapshot = JSON.stringify(this.toFile(), null, 2);
    const write = this.pendingWrite.then(() => this.writeFile(snapshot));
    this.pendingWrite = write.catch(() => undefined);
    await write;
    this.logger.debug(`[Checkpoint] Saved ${this.scanned.size} repositories to ${this.filePath}`);
  }

  /** Marks the run finished and writes the final state. */
  async finalize(stats: ScanStats): Promise<void> {
    this.endTime = this.isoNow();
    await this.save(stats);
  }

  toFile(): CheckpointFile {
    return {
      scanned_repos: [...this.scanned],
      start_time: this.startTime,
      last_update: this.lastUpdate,
      end_time: this.endTime,
      stats: this.stats,
    };
  }

  private async writeFile(content: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, this.filePath);
  }

  private isoNow(): string {
    return new Date(this.clock.now()).toISOString();
  }
}
