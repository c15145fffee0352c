// src/config.ts
// Run configuration: a YAML file validated with zod, plus secrets from the environment.
//
// Every key has a default, so an empty file (or no file at all) yields a usable
// configuration. CLI flags are applied on top with applyCliOverrides().

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DOMAINS } from './model';

// ============================================================================
// SCHEMA
// ============================================================================

const DomainSchema = z.enum(DOMAINS);
const VerdictSchema = z.enum(['high', 'medium', 'low']);

const GithubSchema = z.object({
  organizations: z.array(z.string().min(1)).default([]),
  include_archived: z.boolean().default(false),
  include_forks: z.boolean().default(false),
  include_private: z.boolean().default(true),
  min_stars: z.number().int().nonnegative().default(0),
  exclude_repos: z.array(z.string()).default([]), // Glob patterns on repository name
  repo_limit: z.number().int().positive().nullable().default(null),
});

const RateLimitSchema = z.object({
  max_per_minute: z.number().int().positive().default(25),
  safety_threshold: z.number().int().nonnegative().default(100),
  quota_cache_ttl_seconds: z.number().nonnegative().default(10),
  reset_buffer_seconds: z.number().nonnegative().default(1),
});

const BreakerSchema = z.object({
  failure_threshold: z.number().int().positive().default(5),
  cooldown_seconds: z.number().positive().default(60),
});

const RetrySchema = z.object({
  attempts: z.number().int().min(1).max(5).default(3),
  base_delay_ms: z.number().int().nonnegative().default(1000),
  max_total_delay_ms: z.number().int().nonnegative().default(30_000),
});

const CheckpointSchema = z.object({
  enabled: z.boolean().default(true),
  file: z.string().default('.scan-checkpoint.json'),
  save_interval: z.number().int().positive().default(10),
});

const DominanceSchema = z.object({
  adopt_large_repos: z.number().int().positive().default(70),
  adopt_large_activity: z.number().min(0).max(1).default(0.4),
  adopt_medium_repos: z.number().int().positive().default(50),
  adopt_medium_activity: z.number().min(0).max(1).default(0.5),
  trial_repos: z.number().int().positive().default(30),
  trial_activity: z.number().min(0).max(1).default(0.65),
});

const ClassificationSchema = z.object({
  min_repos: z.number().int().positive().default(2),
  min_repos_by_domain: z.record(DomainSchema, z.number().int().positive()).default({}),
  exclude_patterns: z.array(z.string()).default([]),
  domain_detection: z.boolean().default(true),
  dominance: DominanceSchema.default({}),
});

const FilteringSchema = z.object({
  enabled: z.boolean().default(true),
  always_include_names: z.array(z.string()).default([]),
  always_include_if_repos_gte: z.number().int().positive().default(5),
  auto_ignore_single_repo_utilities: z.boolean().default(true),
  strategic_include_if: z.array(VerdictSchema).default(['high', 'medium']),
  duplicate_detection: z.boolean().default(true),
  consolidation: z.boolean().default(true),
  deprecation: z.boolean().default(true),
});

const OpenAiSchema = z.object({
  model: z.string().default('gpt-4o-mini'),
  max_tokens: z.number().int().positive().default(1000),
  temperature: z.number().min(0).max(2).default(0.3),
  max_attempts: z.number().int().min(1).max(5).default(3),
  timeout_ms: z.number().int().positive().default(60_000),
});

const OutputSchema = z.object({
  file: z.string().default('output/radar.json'),
  full_file: z.string().default('output/radar.full.json'),
  report_file: z.string().default('output/curation-report.json'),
  records_file: z.string().default('output/scan-records.jsonl'),
  sort_by: z.enum(['usage', 'name', 'ring', 'confidence']).default('usage'),
});

export const ConfigSchema = z.object({
  github: GithubSchema.default({}),
  rate_limit: RateLimitSchema.default({}),
  breaker: BreakerSchema.default({}),
  retry: RetrySchema.default({}),
  checkpoint: CheckpointSchema.default({}),
  cache: z
    .object({
      ttl_seconds: z.number().nonnegative().default(3600),
      file: z.string().nullable().default('.scan-cache.json'), // null keeps the cache in memory
    })
    .default({}),
  temporal: z.object({ active_window_days: z.number().int().positive().default(90) }).default({}),
  openai: OpenAiSchema.default({}),
  classification: ClassificationSchema.default({}),
  filtering: FilteringSchema.default({}),
  output: OutputSchema.default({}),
});

export type RadarConfig = z.infer<typeof ConfigSchema>;
export type StrategicVerdict = z.infer<typeof VerdictSchema>;
export type SortKey = RadarConfig['output']['sort_by'];

// ============================================================================
// LOADING
// ============================================================================

/**
 * Parses and validates YAML configuration text.
 * @param text - Raw YAML; an empty document yields all defaults.
 * @param source - Label used in error messages.
 */
export function parseConfig(text: string, source = 'config'): RadarConfig {
  let raw: unknown;
  try {
    raw = yaml.parse(text);
  } catch (error) {
    throw new ConfigError(`Could not parse YAML in ${source}`, error);
  }

  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration in ${source}:\n${issues}`, result.error);
  }
  return result.data;
}

/**
 * Loads configuration from a YAML file. A missing file yields defaults only when
 * `optional` is set; otherwise it is a ConfigError.
 */
export async function loadConfig(filePath: string, optional = false): Promise<RadarConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (optional && isMissingFile(error)) {
      return ConfigSchema.parse({});
    }
    throw new ConfigError(`Configuration file not readable: ${filePath}`, error);
  }
  return parseConfig(text, filePath);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// OVERRIDES AND SECRETS
// ============================================================================

export interface CliOverrides {
  organizations?: string[];
  output?: string;
  limit?: number;
}

export function applyCliOverrides(config: RadarConfig, overrides: CliOverrides): RadarConfig {
  return {
    ...config,
    github: {
      ...config.github,
      organizations:
        overrides.organizations && overrides.organizations.length > 0
          ? overrides.organizations
          : config.github.organizations,
      repo_limit: overrides.limit ?? config.github.repo_limit,
    },
    output: {
      ...config.output,
      file: overrides.output ?? config.output.file,
    },
  };
}

export interface Credentials {
  githubToken: string;
  openAiKey: string | null;
}

/**
 * Reads secrets from the environment (populated from .env by dotenv).
 * The GitHub token is required; the OpenAI key is optional.
 */
export function readCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const githubToken = env.GITHUB_TOKEN?.trim();
  if (!githubToken) {
    throw new ConfigError('GITHUB_TOKEN environment variable is required for live API calls');
  }
  return { githubToken, openAiKey: readOpenAiKey(env) };
}

export function readOpenAiKey(env: NodeJS.ProcessEnv = process.env): string | null {
  const key = env.OPENAI_API_KEY?.trim();
  return key ? key : null;
}

export function validateForScan(config: RadarConfig): void {
  if (config.github.organizations.length === 0) {
    throw new ConfigError('No GitHub organizations configured (set github.organizations or pass --org)');
  }
}
