// src/ScanOrchestrator.ts
// Walks the repository population one repository at a time and turns each admitted
// repository into a RepositoryRecord.
//
// Per repository:
//   checkpoint skip -> inclusion filters -> cache lookup
//   -> Breaker.guard(fetch snapshot + extract) -> domain classification
//   -> temporal metadata -> record hook -> checkpoint
//
// A repository that disappeared between listing and fetching is counted as missing
// and does not count against the breaker.
//
// Every outbound data-source call passes through CallGovernor.admitCall() and a
// bounded retry. A repository is marked scanned only after its record is complete.

import type { CallGovernor } from './CallGovernor';
import type { CheckpointStore } from './CheckpointStore';
import type { Clock } from './clock';
import { systemClock } from './clock';
import type { RepositoryDataSource } from './dataSource';
import type { DomainClassifier } from './DomainClassifier';
import { UNKNOWN_DOMAIN } from './DomainClassifier';
import { BreakerOpenError, ConfigError, NotFoundError, RadarError, describeError } from './errors';
import type { FailureBreaker } from './FailureBreaker';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type {
  DomainTag,
  RepositoryRecord,
  RepositorySnapshot,
  RepositorySummary,
  ScanStats,
  TechnologyObservationSet,
} from './model';
import { TECHNOLOGY_CATEGORIES, emptyScanStats } from './model';
import { matchesAnyGlob } from './nameMatching';
import { ObservationExtractor } from './ObservationExtractor';
import { withRetry } from './retry';
import type { CachedScan, ScanCache } from './ScanCache';
import { scanCacheKey } from './ScanCache';
import { computeTemporalMetadata } from './temporal';

// ============================================================================
// OPTIONS
// ============================================================================

export interface InclusionFilters {
  includeArchived: boolean;
  includeForks: boolean;
  includePrivate: boolean;
  minStars: number;
  excludeRepos: string[]; // Glob patterns, matched against the name and the owner/name id
}

export interface ScanRetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxTotalDelayMs: number;
}

interface FetchedRepository {
  snapshot: RepositorySnapshot;
  technologies: TechnologyObservationSet;
}

type ScanOutcome = { kind: 'scanned'; record: RepositoryRecord } | { kind: 'missing' } | { kind: 'failed' };

export interface ScanCollaborators {
  source: RepositoryDataSource;
  governor: CallGovernor;
  breaker: FailureBreaker;
  checkpoint: CheckpointStore;
  cache: ScanCache;
  domainClassifier: DomainClassifier | null;
}

export interface ScanOptions {
  organizations: string[];
  filters: InclusionFilters;
  retry: ScanRetryPolicy;
  repoLimit?: number | null;
  activeWindowDays?: number;
  signal?: AbortSignal;
  onRecord?: (record: RepositoryRecord) => Promise<void>;
  clock?: Clock;
  logger?: Logger;
}

export interface ScanResult {
  records: RepositoryRecord[];
  stats: ScanStats;
  populationSize: number;
  interrupted: boolean;
}

export const DEFAULT_FILTERS: InclusionFilters = {
  includeArchived: false,
  includeForks: false,
  includePrivate: true,
  minStars: 0,
  excludeRepos: [],
};

/**
 * Returns why a repository is excluded, or null when it is admitted.
 */
export function exclusionReason(repo: RepositorySummary, filters: InclusionFilters): string | null {
  if (repo.isArchived && !filters.includeArchived) return 'archived';
  if (repo.isFork && !filters.includeForks) return 'fork';
  if (repo.isPrivate && !filters.includePrivate) return 'private';
  if (repo.stars < filters.minStars) return `fewer than ${filters.minStars} stars`;
  if (matchesAnyGlob(repo.name, filters.excludeRepos) || matchesAnyGlob(repo.id, filters.excludeRepos)) {
    return 'excluded by name pattern';
  }
  return null;
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class ScanOrchestrator {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly extractor: ObservationExtractor;
  private readonly governedSource: RepositoryDataSource;
  private runStats: ScanStats = emptyScanStats();

  constructor(
    private readonly collaborators: ScanCollaborators,
    private readonly options: ScanOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.governedSource = this.governed(collaborators.source);
    this.extractor = new ObservationExtractor(this.governedSource, this.logger);
  }

  /** Live statistics, safe to read from a signal handler mid-run. */
  get stats(): ScanStats {
    return { ...this.runStats };
  }

  async run(): Promise<ScanResult> {
    const { checkpoint } = this.collaborators;
    this.runStats = emptyScanStats();
    checkpoint.begin();

    const population = await this.listPopulation();
    const limit = this.options.repoLimit ?? null;
    const candidates = limit === null ? population : population.slice(0, limit);
    if (limit !== null && population.length > limit) {
      this.logger.info(`[Scan] Limiting this run to the first ${limit} of ${population.length} repositories`);
    }

    const records: RepositoryRecord[] = [];
    const attempted = new Set<string>();
    let interrupted = false;

    for (const [i, repo] of candidates.entries()) {
      if (attempted.has(repo.id)) continue;
      attempted.add(repo.id);

      if (checkpoint.isScanned(repo.id)) {
        this.runStats.reposSkipped += 1;
        continue;
      }
      const reason = exclusionReason(repo, this.options.filters);
      if (reason !== null) {
        this.runStats.reposFiltered += 1;
        this.logger.debug(`[Scan] ${repo.id}: filtered (${reason})`);
        continue;
      }
      if (this.options.signal?.aborted) {
        interrupted = true;
        break;
      }

      this.logger.debug(`[Scan] [${i + 1}/${candidates.length}] ${repo.id}`);
      const outcome = await this.scanRepository(repo);
      if (outcome.kind === 'missing') {
        this.runStats.reposMissing += 1;
        continue;
      }
      if (outcome.kind === 'failed') continue;

      const { record } = outcome;
      records.push(record);
      if (this.options.onRecord) {
        await this.options.onRecord(record);
      }
      this.runStats.reposScanned += 1;
      this.refreshCallStats();
      await checkpoint.markScanned(repo.id, this.runStats);
    }

    this.refreshCallStats();
    if (interrupted) {
      this.logger.warn(`[Scan] Stopped early; ${checkpoint.size} repositories recorded in the checkpoint`);
      await checkpoint.save(this.runStats);
    } else {
      await checkpoint.finalize(this.runStats);
    }

    return { records, stats: this.stats, populationSize: population.length, interrupted };
  }

  // ============================================================================
  // POPULATION
  // ============================================================================

  private async listPopulation(): Promise<RepositorySummary[]> {
    const population: RepositorySummary[] = [];
    let listed = 0;

    for (const organization of this.options.organizations) {
      try {
        const repos = await this.governedSource.listRepositories(organization);
        this.logger.info(`📂 ${organization}: ${repos.length} repositories`);
        population.push(...repos);
        listed += 1;
      } catch (error) {
        if (error instanceof ConfigError) throw error;
        this.runStats.errors += 1;
        this.logger.error(`✗ [Scan] Could not list ${organization}:`, error);
      }
    }

    if (listed === 0 && this.options.organizations.length > 0) {
      throw new RadarError(`None of the configured organizations could be listed (${this.options.organizations.join(', ')})`);
    }
    return population;
  }

  // ============================================================================
  // ONE REPOSITORY
  // ============================================================================

  private async scanRepository(repo: RepositorySummary): Promise<ScanOutcome> {
    const key = scanCacheKey(repo);
    const cached = this.collaborators.cache.get(key);
    if (cached !== undefined) {
      this.logger.debug(`[Scan] ${repo.id}: unchanged since ${repo.pushedAt ?? repo.createdAt}; using cached result`);
      return { kind: 'scanned', record: this.buildRecord(repo, cached) };
    }

    let fetched: FetchedRepository | null;
    try {
      fetched = await this.guardedFetch(repo);
    } catch (error) {
      if (error instanceof ConfigError) throw error;
      this.runStats.errors += 1;
      this.logger.error(`✗ [Scan] ${repo.id}: skipped after failure:`, error);
      return { kind: 'failed' };
    }
    if (fetched === null) {
      this.logger.warn(`⚠ [Scan] ${repo.id}: no longer exists; skipped`);
      return { kind: 'missing' };
    }

    const { snapshot, technologies } = fetched;
    const domain = await this.classifyDomain(snapshot, technologies);
    this.collaborators.cache.set(key, { technologies, domain });
    return { kind: 'scanned', record: this.buildRecord(snapshot, { technologies, domain }) };
  }

  private buildRecord(repo: RepositorySummary, { technologies, domain }: CachedScan): RepositoryRecord {
    const temporal = computeTemporalMetadata(
      repo.createdAt,
      repo.pushedAt,
      new Date(this.clock.now()),
      this.options.activeWindowDays
    );

    const count = TECHNOLOGY_CATEGORIES.reduce((sum, category) => sum + technologies[category].size, 0);
    this.logger.success(`  ✓ ${repo.id}: ${count} technologies (${domain.domain})`);
    return {
      id: repo.id,
      name: repo.name,
      createdAt: repo.createdAt,
      pushedAt: repo.pushedAt,
      stars: repo.stars,
      isArchived: repo.isArchived,
      isFork: repo.isFork,
      isPrivate: repo.isPrivate,
      technologies,
      domain,
      temporal,
    };
  }

  /**
   * Fetch and extract under the breaker. While the breaker is open the scan waits
   * out the cooldown and then lets this repository be the recovery probe.
   * @returns null when the repository no longer exists.
   */
  private async guardedFetch(repo: RepositorySummary): Promise<FetchedRepository | null> {
    const { breaker } = this.collaborators;
    for (;;) {
      try {
        return await breaker.guard(() => this.fetchAndExtract(repo));
      } catch (error) {
        if (!(error instanceof BreakerOpenError)) throw error;
        this.logger.warn(`⚠ [Scan] ${error.message}; waiting ${Math.ceil(error.retryInMs / 1000)}s`);
        await this.clock.sleep(error.retryInMs);
        if (this.options.signal?.aborted) throw error;
      }
    }
  }

  /** A missing repository resolves to null so that the breaker records a success. */
  private async fetchAndExtract(repo: RepositorySummary): Promise<FetchedRepository | null> {
    let snapshot: RepositorySnapshot;
    try {
      snapshot = await this.governedSource.fetchSnapshot(repo);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
    const technologies = await this.extractor.extract(snapshot);
    return { snapshot, technologies };
  }

  private async classifyDomain(
    snapshot: RepositorySnapshot,
    technologies: TechnologyObservationSet
  ): Promise<DomainTag> {
    const classifier = this.collaborators.domainClassifier;
    if (classifier === null) return UNKNOWN_DOMAIN;
    return classifier.classify(snapshot, technologies);
  }

  private refreshCallStats(): void {
    const { governor } = this.collaborators;
    this.runStats.apiCalls = governor.callCount;
    const quota = governor.quotaSnapshot;
    if (quota !== null) {
      this.runStats.rateLimitRemaining = quota.remaining;
      this.runStats.rateLimitResetAt = quota.resetAt.toISOString();
    }
  }

  /**
   * Wraps every data-source call in Governor admission plus bounded retry.
   * Admission is inside the retry, so each attempt counts as one outbound call.
   */
  private governed(source: RepositoryDataSource): RepositoryDataSource {
    const call = <T>(label: string, operation: () => Promise<T>): Promise<T> =>
      withRetry(
        async () => {
          await this.collaborators.governor.admitCall();
          return operation();
        },
        {
          attempts: this.options.retry.attempts,
          baseDelayMs: this.options.retry.baseDelayMs,
          maxTotalDelayMs: this.options.retry.maxTotalDelayMs,
          clock: this.clock,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(`⚠ [Scan] ${label}: attempt ${attempt} failed (${describeError(error)}); retrying in ${delayMs}ms`),
        }
      );

    return {
      listRepositories: (organization) =>
        call(`list ${organization}`, () => source.listRepositories(organization)),
      fetchSnapshot: (repo) => call(repo.id, () => source.fetchSnapshot(repo)),
      fetchFileText: (repo, filePath) =>
        call(`${repo.id}:${filePath}`, () => source.fetchFileText(repo, filePath)),
    };
  }
}
