// src/pipeline.ts
// Turns scanned repository records into the curated radar:
// usage index -> exclusion -> temporal profile -> decision -> curation.

import type { CurationOptions, CurationResult } from './CurationEngine';
import { CurationEngine } from './CurationEngine';
import type { DominanceThresholds } from './DecisionEngine';
import { DecisionEngine } from './DecisionEngine';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { ClassificationDecision, Domain, RepositoryRecord, TemporalProfile } from './model';
import { DOMAINS } from './model';
import { matchesAnyGlob } from './nameMatching';
import type { JudgmentOracle } from './oracle/JudgmentOracle';
import { analyzeTechnology, recordUsesTechnology } from './temporalAnalyzer';
import { buildUsageIndex } from './usageIndex';

const EXAMPLE_REPO_LIMIT = 10;

export interface RadarBuildOptions {
  minRepos: number;
  minReposByDomain: Partial<Record<Domain, number>>;
  excludePatterns: string[];
  dominance: DominanceThresholds;
  curation: CurationOptions | null; // null skips the Curation Engine
  logger?: Logger;
}

export interface ExcludedTechnology {
  name: string;
  reposCount: number;
  reason: string;
}

export interface RadarBuildResult {
  totalRepos: number;
  classified: ClassificationDecision[]; // Before curation
  decisions: ClassificationDecision[];  // Final radar entries
  excluded: ExcludedTechnology[];
  curation: CurationResult | null;
  oracleFallbacks: number;
}

/**
 * True when the technology clears the global minimum, or a domain-specific
 * minimum within that domain's repositories.
 */
export function meetsMinimum(
  reposCount: number,
  profile: TemporalProfile,
  minRepos: number,
  minReposByDomain: Partial<Record<Domain, number>>
): boolean {
  if (reposCount >= minRepos) return true;
  const byDomain = profile.byDomain ?? {};
  return DOMAINS.some((domain) => {
    const minimum = minReposByDomain[domain];
    const counts = byDomain[domain];
    return minimum !== undefined && counts !== undefined && counts.totalRepos >= minimum;
  });
}

/**
 * Scores every technology seen in `records` and curates the result.
 * Technologies are processed by descending repository count, then by name.
 */
export async function buildRadar(
  records: readonly RepositoryRecord[],
  oracle: JudgmentOracle,
  options: RadarBuildOptions
): Promise<RadarBuildResult> {
  const logger = options.logger ?? silentLogger;
  const totalRepos = records.length;
  const index = buildUsageIndex(records);
  const ordered = [...index.entries()].sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b));

  logger.section(`🧮 Classifying ${ordered.length} technologies across ${totalRepos} repositories`);

  const engine = new DecisionEngine(oracle, { dominance: options.dominance, logger });
  const classified: ClassificationDecision[] = [];
  const excluded: ExcludedTechnology[] = [];

  for (const [name, reposCount] of ordered) {
    if (matchesAnyGlob(name, options.excludePatterns)) {
      excluded.push({ name, reposCount, reason: 'Matches an exclude pattern' });
      continue;
    }

    const profile = analyzeTechnology(name, records);
    if (!meetsMinimum(reposCount, profile, options.minRepos, options.minReposByDomain)) {
      excluded.push({ name, reposCount, reason: `Used in fewer than ${options.minRepos} repositories` });
      continue;
    }

    const exampleRepos = records
      .filter((record) => recordUsesTechnology(record, name))
      .slice(0, EXAMPLE_REPO_LIMIT)
      .map((record) => record.name);

    const decision = await engine.classify({
      technology: name,
      usageCount: reposCount,
      totalRepos,
      temporalProfile: profile,
      exampleRepos,
    });
    logger.debug(`  ${decision.name}: ${decision.ring} / ${decision.quadrant} (confidence ${decision.confidence})`);
    classified.push(decision);
  }

  logger.info(`[Scan] ${classified.length} technologies classified, ${excluded.length} excluded`);
  if (engine.fallbackCount > 0) {
    logger.warn(`⚠ [Oracle] ${engine.fallbackCount} descriptions came from the keyword fallback`);
  }

  let curation: CurationResult | null = null;
  let decisions = classified;
  if (options.curation !== null) {
    logger.section('🧹 Curating radar entries');
    curation = await new CurationEngine(oracle, { ...options.curation, logger }).curate(classified);
    decisions = curation.decisions;
  }

  return { totalRepos, classified, decisions, excluded, curation, oracleFallbacks: engine.fallbackCount };
}
