#!/usr/bin/env node
// src/main.ts
// Tech radar scan CLI
// Scans the configured GitHub organizations, scores every detected technology and
// writes the curated radar, with resumable checkpointing.

import 'dotenv/config';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { createApiClient, GitHubDataSource } from './api';
import type { QuotaSource } from './CallGovernor';
import { CallGovernor } from './CallGovernor';
import { CheckpointStore } from './CheckpointStore';
import type { Clock } from './clock';
import { systemClock } from './clock';
import type { RadarConfig } from './config';
import { applyCliOverrides, loadConfig, readCredentials, readOpenAiKey, validateForScan } from './config';
import type { CurationOptions } from './CurationEngine';
import type { RepositoryDataSource } from './dataSource';
import type { DominanceThresholds } from './DecisionEngine';
import { DomainClassifier } from './DomainClassifier';
import { ScanAbortedError, describeError } from './errors';
import { FailureBreaker } from './FailureBreaker';
import type { Logger } from './logger';
import { createConsoleLogger } from './logger';
import type { RepositoryRecord } from './model';
import { DisabledOracle } from './oracle/DisabledOracle';
import type { JudgmentOracle } from './oracle/JudgmentOracle';
import { OpenAiOracle } from './oracle/OpenAiOracle';
import { buildRadar } from './pipeline';
import { writeRadar } from './radarWriter';
import { RecordLog } from './recordLog';
import { ScanOrchestrator } from './ScanOrchestrator';
import { ScanCache } from './ScanCache';
import { createStopSignalHandler } from './signals';
import { printRunSummary } from './summary';

export const DEFAULT_CONFIG_FILE = 'config.yaml';

export interface CliOptions {
  config: string;
  org?: string[];
  output?: string;
  limit?: number;
  resume: boolean;
  fresh: boolean;
  dryRun: boolean;
  ai: boolean;
  verbose: boolean;
}

/** Collaborators a caller may substitute; production builds the GitHub and OpenAI ones. */
export interface RunDependencies {
  source?: RepositoryDataSource & QuotaSource;
  oracle?: JudgmentOracle;
  clock?: Clock;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// CONFIG -> COMPONENT OPTIONS
// ============================================================================

export function dominanceFrom(config: RadarConfig): DominanceThresholds {
  const d = config.classification.dominance;
  return {
    adoptLargeRepos: d.adopt_large_repos,
    adoptLargeActivity: d.adopt_large_activity,
    adoptMediumRepos: d.adopt_medium_repos,
    adoptMediumActivity: d.adopt_medium_activity,
    trialRepos: d.trial_repos,
    trialActivity: d.trial_activity,
  };
}

export function curationOptionsFrom(config: RadarConfig): CurationOptions | null {
  const f = config.filtering;
  if (!f.enabled) return null;
  return {
    alwaysIncludeNames: f.always_include_names,
    alwaysIncludeIfReposGte: f.always_include_if_repos_gte,
    minReposByDomain: config.classification.min_repos_by_domain,
    autoIgnoreSingleRepoUtilities: f.auto_ignore_single_repo_utilities,
    strategicIncludeIf: f.strategic_include_if,
    duplicateDetection: f.duplicate_detection,
    consolidation: f.consolidation,
    deprecation: f.deprecation,
  };
}

function selectOracle(config: RadarConfig, useAi: boolean, apiKey: string | null, clock: Clock, logger: Logger): JudgmentOracle {
  if (!useAi) {
    logger.info(chalk.gray('🤖 Judgment oracle disabled (--no-ai); using deterministic fallbacks'));
    return new DisabledOracle();
  }
  if (apiKey === null) {
    logger.warn('⚠ OPENAI_API_KEY is not set; using deterministic fallbacks');
    return new DisabledOracle();
  }
  logger.info(chalk.cyan(`🤖 Judgment oracle: ${config.openai.model}`));
  return new OpenAiOracle({
    model: config.openai.model,
    temperature: config.openai.temperature,
    maxTokens: config.openai.max_tokens,
    maxAttempts: config.openai.max_attempts,
    timeoutMs: config.openai.timeout_ms,
    apiKey,
    clock,
    logger,
  });
}

/** Prior records first, replaced by any repository re-scanned in this run. */
function mergeRecords(prior: RepositoryRecord[], current: RepositoryRecord[]): RepositoryRecord[] {
  const byId = new Map<string, RepositoryRecord>();
  for (const record of [...prior, ...current]) {
    byId.set(record.id, record);
  }
  return [...byId.values()];
}

// ============================================================================
// RUN
// ============================================================================

/**
 * Executes one scan run.
 * @throws ScanAbortedError when a stop signal ended the scan early.
 */
export async function runScan(options: CliOptions, deps: RunDependencies = {}): Promise<void> {
  const logger = deps.logger ?? createConsoleLogger({ verbose: options.verbose });
  const clock = deps.clock ?? systemClock;

  const loaded = await loadConfig(options.config, options.config === DEFAULT_CONFIG_FILE);
  const config = applyCliOverrides(loaded, {
    organizations: options.org,
    output: options.output,
    limit: options.limit,
  });
  validateForScan(config);

  logger.info(chalk.blue.bold('🚀 Starting tech radar scan...'));
  logger.info(chalk.cyan(`🏢 Organizations: ${config.github.organizations.join(', ')}`));
  logger.info(chalk.cyan(`📁 Output: ${config.output.file}`));
  if (options.dryRun) {
    logger.info(chalk.yellow('🔧 Dry run: nothing will be written (progress is kept in memory only)'));
  }

  const env = deps.env ?? process.env;
  const source = deps.source ?? new GitHubDataSource(createApiClient(readCredentials(env).githubToken), logger);
  const oracle = deps.oracle ?? selectOracle(config, options.ai, readOpenAiKey(env), clock, logger);

  // A dry run keeps its progress in memory: a checkpoint without matching record-log
  // lines would make a later --resume skip repositories it has no records for.
  const checkpoint = new CheckpointStore(config.checkpoint.file, {
    saveInterval: config.checkpoint.save_interval,
    persist: config.checkpoint.enabled && !options.dryRun,
    clock,
    logger,
  });
  const recordLog = new RecordLog(config.output.records_file, logger);
  const cache = new ScanCache({
    ttlMs: config.cache.ttl_seconds * 1000,
    filePath: options.dryRun ? null : config.cache.file,
    clock,
    logger,
  });

  if (options.fresh) {
    logger.info(chalk.gray('🧽 --fresh: clearing checkpoint, record log and cache'));
    await checkpoint.clear();
    await recordLog.clear();
    await cache.clear();
  } else {
    const cachedEntries = await cache.load();
    if (cachedEntries > 0) {
      logger.info(chalk.gray(`🗃 Loaded ${cachedEntries} cached repository results`));
    }
  }

  let priorRecords: RepositoryRecord[] = [];
  if (options.resume && !options.fresh && config.checkpoint.enabled) {
    if (await checkpoint.load()) {
      priorRecords = (await recordLog.readAll()).filter((record) => checkpoint.isScanned(record.id));
      logger.info(chalk.cyan(`♻ Restored ${priorRecords.length} records from ${recordLog.filePath}`));
    }
  } else if (!options.dryRun) {
    // A new run owns both files from the start; a stale checkpoint next to a
    // truncated record log would lose data on the next --resume.
    await checkpoint.clear();
    await recordLog.clear();
  }

  const governor = new CallGovernor(source, {
    maxPerMinute: config.rate_limit.max_per_minute,
    safetyThreshold: config.rate_limit.safety_threshold,
    quotaCacheTtlMs: config.rate_limit.quota_cache_ttl_seconds * 1000,
    resetBufferMs: config.rate_limit.reset_buffer_seconds * 1000,
    clock,
    logger,
  });
  const breaker = new FailureBreaker({
    name: 'repository-fetch',
    failureThreshold: config.breaker.failure_threshold,
    cooldownMs: config.breaker.cooldown_seconds * 1000,
    clock,
    logger,
  });

  // Assigned below; the signal handler only fires once the scan is running.
  let orchestrator: ScanOrchestrator | null = null;
  const stop = createStopSignalHandler({
    onSignal: (signal) => {
      logger.warn(`\n⚠ Received ${signal}; finishing the current repository and saving progress...`);
      if (orchestrator !== null) {
        checkpoint
          .save(orchestrator.stats)
          .catch((error: unknown) => logger.error('✗ [Checkpoint] Flush on signal failed:', error));
      }
    },
  });

  orchestrator = new ScanOrchestrator(
    {
      source,
      governor,
      breaker,
      checkpoint,
      cache,
      domainClassifier: config.classification.domain_detection ? new DomainClassifier(oracle, logger) : null,
    },
    {
      organizations: config.github.organizations,
      filters: {
        includeArchived: config.github.include_archived,
        includeForks: config.github.include_forks,
        includePrivate: config.github.include_private,
        minStars: config.github.min_stars,
        excludeRepos: config.github.exclude_repos,
      },
      retry: {
        attempts: config.retry.attempts,
        baseDelayMs: config.retry.base_delay_ms,
        maxTotalDelayMs: config.retry.max_total_delay_ms,
      },
      repoLimit: config.github.repo_limit,
      activeWindowDays: config.temporal.active_window_days,
      signal: stop.signal,
      onRecord: options.dryRun ? undefined : (record) => recordLog.append(record, new Date(clock.now())),
      clock,
      logger,
    }
  );

  logger.section('🔄 Scanning repositories');
  const running = orchestrator;
  const scan = await running.run().catch(async (error: unknown) => {
    await checkpoint.save(running.stats).catch((flushError: unknown) =>
      logger.error('✗ [Checkpoint] Flush after failure failed:', flushError)
    );
    await cache.save().catch((saveError: unknown) => logger.error('✗ [Cache] Save after failure failed:', saveError));
    throw error;
  }).finally(() => stop.cleanup());
  await cache.save();

  if (scan.interrupted) {
    printRunSummary(logger, scan.stats, null);
    throw new ScanAbortedError(stop.stoppedBy() ?? 'SIGINT');
  }

  const records = mergeRecords(priorRecords, scan.records);
  logger.success(`✓ Scanned ${scan.stats.reposScanned} repositories (${records.length} records in total)`);
  if (records.length === 0) {
    logger.warn('⚠ No repository records; nothing to classify');
    printRunSummary(logger, scan.stats, null);
    return;
  }

  const radar = await buildRadar(records, oracle, {
    minRepos: config.classification.min_repos,
    minReposByDomain: config.classification.min_repos_by_domain,
    excludePatterns: config.classification.exclude_patterns,
    dominance: dominanceFrom(config),
    curation: curationOptionsFrom(config),
    logger,
  });

  if (!options.dryRun) {
    const written = await writeRadar(
      radar,
      { file: config.output.file, fullFile: config.output.full_file, reportFile: config.output.report_file },
      { sortBy: config.output.sort_by, generatedAt: new Date(clock.now()) }
    );
    written.forEach((file) => logger.info(chalk.gray(`  Wrote ${file}`)));
  }

  printRunSummary(logger, scan.stats, radar);
  logger.info(chalk.gray(`  Oracle calls: ${oracle.callCount}`));
  logger.info(chalk.blue.bold('\n✨ Scan complete.'));
}

// ============================================================================
// CLI
// ============================================================================

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name('tech-radar-scan')
    .description('Scan GitHub organizations and build a curated technology radar')
    .option('-c, --config <file>', 'YAML configuration file', DEFAULT_CONFIG_FILE)
    .option('--org <name...>', 'GitHub organization(s) to scan (overrides config)')
    .option('-o, --output <file>', 'Public radar JSON path (overrides config)')
    .option('--limit <n>', 'Scan at most n repositories', parsePositiveInt)
    .option('--resume', 'Resume from the saved checkpoint', false)
    .option('--fresh', 'Clear the checkpoint and record log before scanning', false)
    .option('--dry-run', 'Scan and score, but write nothing', false)
    .option('--no-ai', 'Disable the judgment oracle and use deterministic fallbacks')
    .option('-v, --verbose', 'Verbose output', false);
}

/**
 * Main execution function
 */
async function main() {
  const program = buildProgram();
  program.parse(process.argv);
  await runScan(program.opts<CliOptions>());
}

if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof ScanAbortedError) {
      console.error(chalk.yellow(`\n${error.message}. Progress saved; rerun with --resume to continue.`));
      process.exit(130);
    }
    console.error(chalk.red.bold('An unexpected error occurred:'), describeError(error));
    process.exit(1);
  });
}
