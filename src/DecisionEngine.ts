// src/DecisionEngine.ts
// Turns usage and temporal signals into a ring/quadrant decision with a confidence
// score and a human-review flag.
//
// The ring comes from deterministic rules over the temporal profile and usage ratio.
// The Judgment Oracle only contributes the quadrant, the description and one
// fifth of the overall confidence; when it fails, a keyword fallback takes its place.

import quadrantKeywords from './data/quadrant-keywords.json';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { describeError } from './errors';
import type {
  ClassificationDecision,
  Domain,
  Quadrant,
  Ring,
  TemporalCounts,
  TemporalProfile,
  Trend,
} from './model';
import { DOMAINS } from './model';
import { matchesKeyword } from './nameMatching';
import type { JudgmentOracle, TechnologyOpinion, TechnologyQuestion } from './oracle/JudgmentOracle';
import { confidenceWeight } from './oracle/JudgmentOracle';

// ============================================================================
// TUNABLES
// ============================================================================

/**
 * A technology concentrated in one large, active domain is promoted even when
 * its organisation-wide usage ratio is low.
 */
export interface DominanceThresholds {
  adoptLargeRepos: number;
  adoptLargeActivity: number;
  adoptMediumRepos: number;
  adoptMediumActivity: number;
  trialRepos: number;
  trialActivity: number;
}

export const DEFAULT_DOMINANCE: DominanceThresholds = {
  adoptLargeRepos: 70,
  adoptLargeActivity: 0.4,
  adoptMediumRepos: 50,
  adoptMediumActivity: 0.5,
  trialRepos: 30,
  trialActivity: 0.65,
};

const WEIGHTS = {
  signalClarity: 0.4,
  ring: 0.4,
  oracle: 0.2,
} as const;

export const REVIEW_CONFIDENCE_THRESHOLD = 0.75;
const MIN_SAMPLE_SIZE = 5;
const LIMITED_DATA_REPOS = 3;
const FALLBACK_CONFIDENCE_LABEL = 'low';

const TREND_EMOJI: Record<Trend, string> = {
  GROWING: '📈',
  STABLE: '➡',
  DECLINING: '📉',
  ABANDONED: '💀',
  NONE: '?',
};

// Checked in this order; anything unmatched is a Technique.
const QUADRANT_KEYWORDS: ReadonlyArray<[Quadrant, readonly string[]]> = [
  ['Languages & Frameworks', quadrantKeywords['Languages & Frameworks']],
  ['Platforms', quadrantKeywords.Platforms],
  ['Tools', quadrantKeywords.Tools],
];

// ============================================================================
// PURE RULES
// ============================================================================

export interface RingDecision {
  ring: Ring;
  confidence: number;
  basis: string;
}

/**
 * Ring decision; first matching rule wins.
 */
export function decideRing(
  usageRatio: number,
  profile: TemporalProfile,
  dominance: DominanceThresholds = DEFAULT_DOMINANCE
): RingDecision {
  const dominant = findDominantDomain(profile, dominance);
  if (dominant !== null) {
    return dominant;
  }

  const { activityScore, recencyScore, trend } = profile;

  if ((usageRatio >= 0.4 && activityScore >= 0.5) || (usageRatio >= 0.35 && activityScore >= 0.6)) {
    return { ring: 'Adopt', confidence: 0.9, basis: 'broad, actively maintained usage' };
  }
  if (
    (recencyScore >= 0.2 && activityScore >= 0.6 && trend === 'GROWING') ||
    (usageRatio >= 0.25 && activityScore >= 0.75)
  ) {
    return { ring: 'Trial', confidence: 0.8, basis: 'growing or highly active usage' };
  }
  if ((usageRatio < 0.1 && activityScore < 0.3) || trend === 'ABANDONED') {
    return { ring: 'Hold', confidence: 0.85, basis: 'little or abandoned usage' };
  }
  return { ring: 'Assess', confidence: 0.6, basis: 'mixed signals' };
}

function findDominantDomain(profile: TemporalProfile, t: DominanceThresholds): RingDecision | null {
  const domains = domainEntries(profile);

  for (const [domain, counts] of domains) {
    if (
      (counts.totalRepos >= t.adoptLargeRepos && counts.activityScore >= t.adoptLargeActivity) ||
      (counts.totalRepos >= t.adoptMediumRepos && counts.activityScore >= t.adoptMediumActivity)
    ) {
      return { ring: 'Adopt', confidence: 0.9, basis: `dominant in ${domain} domain` };
    }
  }
  for (const [domain, counts] of domains) {
    if (counts.totalRepos >= t.trialRepos && counts.activityScore >= t.trialActivity) {
      return { ring: 'Trial', confidence: 0.8, basis: `concentrated in active ${domain} domain` };
    }
  }
  return null;
}

/** Fraction of the four clarity signals that hold. */
export function signalClarity(usageRatio: number, profile: TemporalCounts): number {
  const signals = [
    usageRatio > 0.7 || usageRatio < 0.1,
    profile.activityScore > 0.8 || profile.activityScore < 0.2,
    profile.trend === 'GROWING' || profile.trend === 'ABANDONED',
    profile.totalRepos >= MIN_SAMPLE_SIZE,
  ];
  return signals.filter(Boolean).length / signals.length;
}

export function blendConfidence(signal: number, ring: number, oracle: number): number {
  const blended = WEIGHTS.signalClarity * signal + WEIGHTS.ring * ring + WEIGHTS.oracle * oracle;
  return Math.round(Math.min(1, Math.max(0, blended)) * 1000) / 1000;
}

/** First applicable reason for human review, or null. */
export function reviewReason(confidence: number, usageRatio: number, profile: TemporalCounts): string | null {
  if (confidence < REVIEW_CONFIDENCE_THRESHOLD) {
    return 'Low confidence classification';
  }
  if (profile.trend === 'DECLINING' && usageRatio > 0.3) {
    return 'High usage but declining trend';
  }
  if (profile.trend === 'GROWING' && usageRatio < 0.1) {
    return 'Low usage but growing trend';
  }
  if (profile.totalRepos < LIMITED_DATA_REPOS) {
    return `Limited data (fewer than ${LIMITED_DATA_REPOS} repos)`;
  }
  return null;
}

export function decisionFactors(usageRatio: number, profile: TemporalCounts): string[] {
  const factors: string[] = [];

  const usagePct = usageRatio * 100;
  if (usagePct >= 50) {
    factors.push(`✓ High usage (${usagePct.toFixed(1)}%)`);
  } else if (usagePct >= 20) {
    factors.push(`• Medium usage (${usagePct.toFixed(1)}%)`);
  } else {
    factors.push(`✗ Low usage (${usagePct.toFixed(1)}%)`);
  }

  if (profile.recentRepos > 0) {
    factors.push(`✓ ${profile.recentRepos} new repos in last 6 months`);
  } else {
    factors.push('✗ No new adoption in last 6 months');
  }

  const activePct = profile.totalRepos > 0 ? (profile.activeRepos / profile.totalRepos) * 100 : 0;
  if (activePct >= 70) {
    factors.push(`✓ ${activePct.toFixed(0)}% of repos actively maintained`);
  } else if (activePct >= 40) {
    factors.push(`• ${activePct.toFixed(0)}% of repos actively maintained`);
  } else {
    factors.push(`✗ Only ${activePct.toFixed(0)}% of repos actively maintained`);
  }

  factors.push(`${TREND_EMOJI[profile.trend]} Trend: ${profile.trend}`);
  return factors;
}

export function inferQuadrant(technology: string): Quadrant {
  for (const [quadrant, keywords] of QUADRANT_KEYWORDS) {
    if (keywords.some((keyword) => matchesKeyword(technology, keyword))) {
      return quadrant;
    }
  }
  return 'Techniques';
}

export function fallbackDescription(technology: string, usageRatio: number): string {
  return `${technology} is used in ${(usageRatio * 100).toFixed(1)}% of repositories. Further evaluation recommended.`;
}

/**
 * Suggested ring per domain, using min(repos / 10, 1) as the domain's usage ratio.
 */
export function suggestDomainRings(
  profile: TemporalProfile,
  dominance: DominanceThresholds = DEFAULT_DOMINANCE
): Partial<Record<Domain, Ring>> {
  const suggestions: Partial<Record<Domain, Ring>> = {};
  for (const [domain, counts] of domainEntries(profile)) {
    suggestions[domain] = decideRing(Math.min(counts.totalRepos / 10, 1), counts, dominance).ring;
  }
  return suggestions;
}

function domainEntries(profile: TemporalProfile): Array<[Domain, TemporalCounts]> {
  const entries: Array<[Domain, TemporalCounts]> = [];
  const byDomain = profile.byDomain ?? {};
  for (const domain of DOMAINS) {
    const counts = byDomain[domain];
    if (counts !== undefined) entries.push([domain, counts]);
  }
  return entries;
}

// ============================================================================
// ENGINE
// ============================================================================

export interface ClassifyInput {
  technology: string;
  usageCount: number;
  totalRepos: number;
  temporalProfile: TemporalProfile;
  exampleRepos?: string[];
}

export interface DecisionEngineOptions {
  dominance?: DominanceThresholds;
  logger?: Logger;
}

export class DecisionEngine {
  private readonly dominance: DominanceThresholds;
  private readonly logger: Logger;
  private oracleFailures = 0;

  constructor(
    private readonly oracle: JudgmentOracle,
    options: DecisionEngineOptions = {}
  ) {
    this.dominance = options.dominance ?? DEFAULT_DOMINANCE;
    this.logger = options.logger ?? silentLogger;
  }

  /** Decisions that fell back to the keyword table because the oracle failed. */
  get fallbackCount(): number {
    return this.oracleFailures;
  }

  async classify(input: ClassifyInput): Promise<ClassificationDecision> {
    const { technology, usageCount, totalRepos, temporalProfile: profile } = input;
    const usageRatio = totalRepos > 0 ? usageCount / totalRepos : 0;
    const usagePercentage = Math.round(usageRatio * 1000) / 10;
    const exampleRepos = input.exampleRepos ?? [];

    const ringDecision = decideRing(usageRatio, profile, this.dominance);

    const opinion = await this.consultOracle(
      {
        name: technology,
        ring: ringDecision.ring,
        reposCount: usageCount,
        totalRepos,
        usagePercentage,
        trend: profile.trend,
        exampleRepos,
      },
      usageRatio
    );

    const clarity = signalClarity(usageRatio, profile);
    const oracleConfidence = confidenceWeight(opinion.confidence);
    const confidence = blendConfidence(clarity, ringDecision.confidence, oracleConfidence);
    const reason = reviewReason(confidence, usageRatio, profile);

    return {
      name: technology,
      quadrant: opinion.quadrant,
      ring: ringDecision.ring,
      confidence,
      description: opinion.description,
      decisionFactors: decisionFactors(usageRatio, profile),
      needsReview: reason !== null,
      reviewReason: reason,
      temporalProfile: profile,
      signals: {
        usageRatio: Math.round(usageRatio * 1000) / 1000,
        recencyScore: profile.recencyScore,
        activityScore: profile.activityScore,
        ringConfidence: ringDecision.confidence,
        signalClarity: clarity,
        oracleConfidence,
        oracleLabel: opinion.confidence,
        oracleAnswered: opinion.answered,
      },
      reposCount: usageCount,
      totalRepos,
      usagePercentage,
      exampleRepos,
      domainSuggestions: suggestDomainRings(profile, this.dominance),
    };
  }

  private async consultOracle(
    question: TechnologyQuestion,
    usageRatio: number
  ): Promise<TechnologyOpinion & { answered: boolean }> {
    try {
      const opinion = await this.oracle.describeTechnology(question);
      return { ...opinion, answered: true };
    } catch (error) {
      this.oracleFailures += 1;
      this.logger.debug(`[Oracle] No opinion for ${question.name} (${describeError(error)}); using fallback`);
      return {
        quadrant: inferQuadrant(question.name),
        description: fallbackDescription(question.name, usageRatio),
        confidence: FALLBACK_CONFIDENCE_LABEL,
        answered: false,
      };
    }
  }
}
