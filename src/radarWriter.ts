// src/radarWriter.ts
// Writes the radar artifacts:
// - full JSON: every decision with its signals, curation provenance and review metadata
// - public JSON: the minimal entry list a radar visualization renders
// - curation report: what the Curation Engine removed, merged, consolidated and flagged

import * as fs from 'fs/promises';
import * as path from 'path';
import type { SortKey } from './config';
import type { ClassificationDecision } from './model';
import { QUADRANTS, RINGS } from './model';
import type { RadarBuildResult } from './pipeline';

export interface RadarPaths {
  file: string;
  fullFile: string;
  reportFile: string;
}

export interface ReviewMetadata {
  reason: string | null;
  status: 'pending';
  human_decision: null;
}

export type PublicEntry = {
  name: string;
  quadrant: number; // Index into QUADRANTS
  ring: number;     // Index into RINGS
  description: string;
  moved: 0;
};

export type FullEntry = {
  name: string;
  quadrant: string;
  quadrant_index: number;
  ring: string;
  ring_index: number;
  description: string;
  confidence: number;
  repos_count: number;
  total_repos: number;
  usage_percentage: number;
  example_repos: string[];
  decision_factors: string[];
  temporal_profile: ClassificationDecision['temporalProfile'];
  signals: ClassificationDecision['signals'];
  domain_suggestions: ClassificationDecision['domainSuggestions'];
  strategic_value?: string;
  merged_from?: string[];
  consolidated_from?: string[];
  sub_features?: string[];
  deprecation?: { replacement: string; note: string };
  needs_review: boolean;
  review_metadata: ReviewMetadata | null;
};

// ============================================================================
// ORDERING AND SHAPING
// ============================================================================

const byName = (a: ClassificationDecision, b: ClassificationDecision): number => a.name.localeCompare(b.name);

const COMPARATORS: Record<SortKey, (a: ClassificationDecision, b: ClassificationDecision) => number> = {
  usage: (a, b) => b.usagePercentage - a.usagePercentage || byName(a, b),
  name: byName,
  ring: (a, b) => RINGS.indexOf(a.ring) - RINGS.indexOf(b.ring) || b.usagePercentage - a.usagePercentage || byName(a, b),
  confidence: (a, b) => b.confidence - a.confidence || byName(a, b),
};

export function sortDecisions(decisions: readonly ClassificationDecision[], sortBy: SortKey): ClassificationDecision[] {
  return [...decisions].sort(COMPARATORS[sortBy]);
}

export function toPublicEntry(decision: ClassificationDecision): PublicEntry {
  return {
    name: decision.name,
    quadrant: QUADRANTS.indexOf(decision.quadrant),
    ring: RINGS.indexOf(decision.ring),
    description: decision.description,
    moved: 0,
  };
}

export function toFullEntry(decision: ClassificationDecision): FullEntry {
  const entry: FullEntry = {
    name: decision.name,
    quadrant: decision.quadrant,
    quadrant_index: QUADRANTS.indexOf(decision.quadrant),
    ring: decision.ring,
    ring_index: RINGS.indexOf(decision.ring),
    description: decision.description,
    confidence: decision.confidence,
    repos_count: decision.reposCount,
    total_repos: decision.totalRepos,
    usage_percentage: decision.usagePercentage,
    example_repos: decision.exampleRepos,
    decision_factors: decision.decisionFactors,
    temporal_profile: decision.temporalProfile,
    signals: decision.signals,
    domain_suggestions: decision.domainSuggestions,
    needs_review: decision.needsReview,
    review_metadata: decision.needsReview
      ? { reason: decision.reviewReason, status: 'pending', human_decision: null }
      : null,
  };
  if (decision.strategicValue !== undefined) entry.strategic_value = decision.strategicValue;
  if (decision.mergedFrom !== undefined) entry.merged_from = decision.mergedFrom;
  if (decision.consolidatedFrom !== undefined) entry.consolidated_from = decision.consolidatedFrom;
  if (decision.subFeatures !== undefined) entry.sub_features = decision.subFeatures;
  if (decision.deprecation !== undefined) entry.deprecation = decision.deprecation;
  return entry;
}

export function buildCurationReport(result: RadarBuildResult, generatedAt: Date) {
  const curation = result.curation;
  return {
    generated_at: generatedAt.toISOString(),
    classified: result.classified.length,
    published: result.decisions.length,
    excluded: result.excluded.map((e) => ({ name: e.name, repos_count: e.reposCount, reason: e.reason })),
    stats: curation?.stats ?? null,
    removed: curation?.removed ?? [],
    merge_groups: (curation?.mergeGroups ?? []).map((g) => ({
      canonical_name: g.canonicalName,
      candidates: g.candidates,
      rationale: g.rationale,
    })),
    consolidations: curation?.consolidations ?? [],
    deprecations: curation?.deprecations ?? [],
    strategic_verdicts: curation?.verdicts ?? [],
  };
}

// ============================================================================
// WRITING
// ============================================================================

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
}

/**
 * Writes all three artifacts and returns the paths written.
 */
export async function writeRadar(
  result: RadarBuildResult,
  paths: RadarPaths,
  options: { sortBy: SortKey; generatedAt?: Date }
): Promise<string[]> {
  const generatedAt = options.generatedAt ?? new Date();
  const sorted = sortDecisions(result.decisions, options.sortBy);

  await writeJson(paths.fullFile, {
    metadata: {
      generated_at: generatedAt.toISOString(),
      total_repositories: result.totalRepos,
      technologies: sorted.length,
      needs_review: sorted.filter((d) => d.needsReview).length,
      sort_by: options.sortBy,
      quadrants: QUADRANTS,
      rings: RINGS,
    },
    entries: sorted.map(toFullEntry),
  });
  await writeJson(paths.file, sorted.map(toPublicEntry));
  await writeJson(paths.reportFile, buildCurationReport(result, generatedAt));

  return [paths.file, paths.fullFile, paths.reportFile];
}
