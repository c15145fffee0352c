// src/oracle/JudgmentOracle.ts
// The advisory collaborator behind every qualitative judgment. Implementations may be
// slow, may fail, and may return low-quality opinions; callers always have a fallback.

import type { Domain, Quadrant, Ring, Trend } from '../model';

// ============================================================================
// QUESTIONS
// ============================================================================

export interface TechnologyQuestion {
  name: string;
  ring: Ring;
  reposCount: number;
  totalRepos: number;
  usagePercentage: number;
  trend: Trend;
  exampleRepos: string[];
}

export interface StrategicQuestion {
  name: string;
  quadrant: Quadrant;
  ring: Ring;
  reposCount: number;
  usagePercentage: number;
  description: string;
}

export interface NamedCount {
  name: string;
  reposCount: number;
}

export interface DuplicateQuestion {
  names: NamedCount[];
}

export interface HierarchyQuestion {
  parent: NamedCount;
  children: NamedCount[];
}

export interface DomainQuestion {
  repository: string;
  description: string | null;
  topics: string[];
  languages: string[];
  technologies: string[];
  rootEntries: string[];
}

// ============================================================================
// OPINIONS
// ============================================================================

// Confidence labels are self-reported and unvalidated; see confidenceWeight().
export interface TechnologyOpinion {
  quadrant: Quadrant;
  description: string;
  confidence: string;
}

export type StrategicValue = 'high' | 'medium' | 'low';

export interface StrategicOpinion {
  strategicValue: StrategicValue;
  reason: string;
  confidence: string;
}

export interface DuplicateOpinion {
  areDuplicates: boolean;
  canonicalName: string | null;
  mergeCandidates: string[];
  reason: string;
  confidence: string;
}

export interface HierarchyOpinion {
  shouldConsolidate: boolean;
  reason: string;
  confidence: string;
}

export interface DomainOpinion {
  domain: Domain;
  confidence: number;
  reasoning: string;
}

export interface JudgmentOracle {
  describeTechnology(question: TechnologyQuestion): Promise<TechnologyOpinion>;
  assessStrategicValue(question: StrategicQuestion): Promise<StrategicOpinion>;
  judgeDuplicates(question: DuplicateQuestion): Promise<DuplicateOpinion>;
  judgeHierarchy(question: HierarchyQuestion): Promise<HierarchyOpinion>;
  classifyDomain(question: DomainQuestion): Promise<DomainOpinion>;
  /** Calls issued so far, successful or not. */
  readonly callCount: number;
}

const CONFIDENCE_WEIGHTS = new Map<string, number>([
  ['high', 0.9],
  ['medium', 0.6],
  ['low', 0.3],
]);

/** Maps a self-reported label to a number; anything unrecognized counts as 0.5. */
export function confidenceWeight(label: string): number {
  return CONFIDENCE_WEIGHTS.get(label.trim().toLowerCase()) ?? 0.5;
}
