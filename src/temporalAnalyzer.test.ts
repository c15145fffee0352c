import { describe, expect, it } from 'vitest';
import { analyzeTechnology, classifyTrend, emptyTemporalProfile } from './temporalAnalyzer';
import { makeRecord } from './testing/fakes';

function ratios(recent: number, fresh: number, legacy: number, active: number, total: number) {
  return {
    recentRatio: recent / total,
    newRatio: fresh / total,
    legacyRatio: legacy / total,
    activityRatio: active / total,
  };
}

describe('classifyTrend', () => {
  it('labels the reference adoption patterns', () => {
    expect(classifyTrend(ratios(6, 6, 0, 6, 10))).toBe('GROWING');
    expect(classifyTrend(ratios(0, 0, 9, 1, 10))).toBe('ABANDONED');
    expect(classifyTrend(ratios(0, 2, 3, 3, 10))).toBe('DECLINING');
    expect(classifyTrend(ratios(3, 5, 2, 6, 10))).toBe('STABLE');
  });

  it('treats many new, very active repos as growing even with few recent ones', () => {
    expect(classifyTrend(ratios(2, 7, 0, 8, 10))).toBe('GROWING');
  });

  it('prefers GROWING over ABANDONED when both could apply', () => {
    expect(classifyTrend({ recentRatio: 0.6, newRatio: 0.6, legacyRatio: 0.8, activityRatio: 0.1 })).toBe('GROWING');
  });
});

describe('analyzeTechnology', () => {
  const records = [
    makeRecord({ id: 'acme/a', tools: ['Terraform'], domain: 'infrastructure', ageMonths: 3 }),
    makeRecord({ id: 'acme/b', tools: ['Terraform'], domain: 'infrastructure', ageMonths: 9 }),
    makeRecord({ id: 'acme/c', tools: ['Terraform'], domain: 'infrastructure', ageMonths: 30, daysSincePush: 200 }),
    makeRecord({ id: 'acme/d', tools: ['Terraform'], domain: 'backend', ageMonths: 3 }),
    makeRecord({ id: 'acme/e', languages: ['Python'], domain: 'backend', ageMonths: 3 }),
  ];

  it('computes counts, scores and trend over the matching records', () => {
    const profile = analyzeTechnology('Terraform', records);

    expect(profile).toMatchObject({
      totalRepos: 4,
      recentRepos: 2,
      newRepos: 3,
      legacyRepos: 1,
      activeRepos: 3,
      staleRepos: 1,
      avgAgeMonths: 11.3,
      trend: 'GROWING',
      recencyScore: 0.875,
      activityScore: 0.75,
    });
  });

  it('breaks the profile down by domain, omitting empty domains', () => {
    const profile = analyzeTechnology('Terraform', records);

    expect(Object.keys(profile.byDomain ?? {}).sort()).toEqual(['backend', 'infrastructure']);
    expect(profile.byDomain?.infrastructure).toEqual({
      totalRepos: 3,
      recentRepos: 1,
      newRepos: 2,
      legacyRepos: 1,
      activeRepos: 2,
      staleRepos: 1,
      avgAgeMonths: 14,
      trend: 'STABLE',
      recencyScore: 0.667,
      activityScore: 0.667,
    });
    expect(profile.byDomain?.backend?.trend).toBe('GROWING');
  });

  it('restricts to one domain without a nested breakdown', () => {
    const profile = analyzeTechnology('Terraform', records, 'backend');
    expect(profile.totalRepos).toBe(1);
    expect(profile.byDomain).toBeUndefined();
  });

  it('returns the empty NONE profile when nothing matches', () => {
    expect(analyzeTechnology('Fortran', records)).toEqual(emptyTemporalProfile());
    expect(emptyTemporalProfile().trend).toBe('NONE');
  });

  it('matches names case-sensitively', () => {
    expect(analyzeTechnology('terraform', records).totalRepos).toBe(0);
  });
});
