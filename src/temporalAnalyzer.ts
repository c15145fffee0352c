// src/temporalAnalyzer.ts
// Temporal adoption analysis: how recently and how actively a technology is used.

import type { Domain, RepositoryRecord, TemporalCounts, TemporalProfile, Trend } from './model';
import { TECHNOLOGY_CATEGORIES } from './model';

export interface TrendRatios {
  recentRatio: number;
  newRatio: number;
  legacyRatio: number;
  activityRatio: number;
}

/**
 * Trend label from adoption ratios. First matching rule wins.
 */
export function classifyTrend(ratios: TrendRatios): Trend {
  const { recentRatio, newRatio, legacyRatio, activityRatio } = ratios;

  if (recentRatio > 0.5 || (newRatio > 0.6 && activityRatio > 0.7)) {
    return 'GROWING';
  }
  if (legacyRatio > 0.7 && activityRatio < 0.3) {
    return 'ABANDONED';
  }
  if (recentRatio === 0 && newRatio < 0.3 && activityRatio < 0.5) {
    return 'DECLINING';
  }
  return 'STABLE';
}

export function recordUsesTechnology(record: RepositoryRecord, technology: string): boolean {
  return TECHNOLOGY_CATEGORIES.some((category) => record.technologies[category].has(technology));
}

export function emptyTemporalProfile(): TemporalProfile {
  return {
    totalRepos: 0,
    recentRepos: 0,
    newRepos: 0,
    legacyRepos: 0,
    activeRepos: 0,
    staleRepos: 0,
    avgAgeMonths: 0,
    trend: 'NONE',
    recencyScore: 0,
    activityScore: 0,
  };
}

/**
 * Builds the temporal profile of a technology across the records that reference it.
 *
 * @param domain - Restrict to records with this domain tag. Without it, the profile
 *   also carries a per-domain breakdown.
 */
export function analyzeTechnology(
  technology: string,
  records: readonly RepositoryRecord[],
  domain?: Domain
): TemporalProfile {
  const matching = records.filter(
    (record) =>
      recordUsesTechnology(record, technology) && (domain === undefined || record.domain.domain === domain)
  );

  if (matching.length === 0) {
    return emptyTemporalProfile();
  }

  const profile: TemporalProfile = computeCounts(matching);
  if (domain === undefined) {
    profile.byDomain = breakdownByDomain(matching);
  }
  return profile;
}

// ============================================================================
// INTERNALS
// ============================================================================

function computeCounts(records: readonly RepositoryRecord[]): TemporalCounts {
  const total = records.length;
  let recent = 0;
  let fresh = 0;
  let legacy = 0;
  let active = 0;
  let ageSum = 0;

  for (const { temporal } of records) {
    if (temporal.isRecent) recent += 1;
    if (temporal.isNew) fresh += 1;
    if (temporal.isLegacy) legacy += 1;
    if (temporal.isActive) active += 1;
    ageSum += temporal.ageMonths;
  }

  const trend = classifyTrend({
    recentRatio: recent / total,
    newRatio: fresh / total,
    legacyRatio: legacy / total,
    activityRatio: active / total,
  });

  return {
    totalRepos: total,
    recentRepos: recent,
    newRepos: fresh,
    legacyRepos: legacy,
    activeRepos: active,
    staleRepos: total - active,
    avgAgeMonths: round(ageSum / total, 1),
    trend,
    recencyScore: round((recent * 1.0 + fresh * 0.5) / total, 3),
    activityScore: round(active / total, 3),
  };
}

function breakdownByDomain(records: readonly RepositoryRecord[]): Partial<Record<Domain, TemporalCounts>> {
  const groups = new Map<Domain, RepositoryRecord[]>();
  for (const record of records) {
    const group = groups.get(record.domain.domain) ?? [];
    group.push(record);
    groups.set(record.domain.domain, group);
  }

  const breakdown: Partial<Record<Domain, TemporalCounts>> = {};
  for (const [domain, group] of groups) {
    breakdown[domain] = computeCounts(group);
  }
  return breakdown;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
