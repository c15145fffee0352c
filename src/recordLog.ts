// src/recordLog.ts
// Append-only JSONL audit log of repository records.
// Each line contains: {"metadata": {...}, "record": {...}}

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { DOMAINS, type RepositoryRecord, type TechnologyObservationSet } from './model';
import type { Logger } from './logger';
import { silentLogger } from './logger';

/**
 * Metadata attached to each logged record
 */
export type RecordLogMetadata = {
  repository: string; // owner/name
  timestamp: string;  // ISO 8601
};

const TemporalSchema = z.object({
  createdAt: z.string(),
  pushedAt: z.string(),
  ageDays: z.number(),
  ageMonths: z.number(),
  daysSincePush: z.number(),
  isActive: z.boolean(),
  isRecent: z.boolean(),
  isNew: z.boolean(),
  isLegacy: z.boolean(),
});

export const TechnologyListsSchema = z.object({
  languages: z.array(z.string()),
  frameworks: z.array(z.string()),
  tools: z.array(z.string()),
  platforms: z.array(z.string()),
});

export const DomainTagSchema = z.object({ domain: z.enum(DOMAINS), confidence: z.number(), reasoning: z.string() });

export type TechnologyLists = z.infer<typeof TechnologyListsSchema>;

/** Sets become sorted arrays so that serialized output is stable. */
export function toTechnologyLists(technologies: TechnologyObservationSet): TechnologyLists {
  const sorted = (names: ReadonlySet<string>): string[] => [...names].sort();
  return {
    languages: sorted(technologies.languages),
    frameworks: sorted(technologies.frameworks),
    tools: sorted(technologies.tools),
    platforms: sorted(technologies.platforms),
  };
}

export function fromTechnologyLists(lists: TechnologyLists): TechnologyObservationSet {
  return {
    languages: new Set(lists.languages),
    frameworks: new Set(lists.frameworks),
    tools: new Set(lists.tools),
    platforms: new Set(lists.platforms),
  };
}

const LoggedRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  createdAt: z.string(),
  pushedAt: z.string().nullable(),
  stars: z.number(),
  isArchived: z.boolean(),
  isFork: z.boolean(),
  isPrivate: z.boolean(),
  technologies: TechnologyListsSchema,
  domain: DomainTagSchema,
  temporal: TemporalSchema,
});

const EntrySchema = z.object({
  metadata: z.object({ repository: z.string(), timestamp: z.string() }),
  record: LoggedRecordSchema,
});

export type RecordLogEntry = z.infer<typeof EntrySchema>;

function toLoggedRecord(record: RepositoryRecord): RecordLogEntry['record'] {
  return { ...record, technologies: toTechnologyLists(record.technologies) };
}

function fromLoggedRecord(logged: RecordLogEntry['record']): RepositoryRecord {
  return { ...logged, technologies: fromTechnologyLists(logged.technologies) };
}

export class RecordLog {
  constructor(
    readonly filePath: string,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Appends one record as a single JSONL line. Creates the file if it doesn't exist.
   */
  async append(record: RepositoryRecord, timestamp: Date = new Date()): Promise<void> {
    const entry: RecordLogEntry = {
      metadata: { repository: record.id, timestamp: timestamp.toISOString() },
      record: toLoggedRecord(record),
    };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  /**
   * Reads records back for a resumed run. A repository logged more than once
   * (re-scanned after an interruption) keeps its latest line; unparsable lines
   * are skipped with a warning.
   */
  async readAll(): Promise<RepositoryRecord[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const latest = new Map<string, RepositoryRecord>();
    const lines = text.split('\n').filter((line) => line.trim());
    for (const [i, line] of lines.entries()) {
      const parsed = EntrySchema.safeParse(safeJson(line));
      if (!parsed.success) {
        this.logger.warn(`[Scan] Skipping unreadable line ${i + 1} in ${this.filePath}`);
        continue;
      }
      latest.delete(parsed.data.record.id);
      latest.set(parsed.data.record.id, fromLoggedRecord(parsed.data.record));
    }
    return [...latest.values()];
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}

function safeJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}
