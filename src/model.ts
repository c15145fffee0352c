// src/model.ts
// Core data model: repository records, temporal profiles, classification decisions
// and the curation artifacts that rewrite them.

// ============================================================================
// ENUMERATIONS
// ============================================================================

export const DOMAINS = [
  'mobile',
  'backend',
  'frontend',
  'infrastructure',
  'data',
  'ml',
  'library',
  'tooling',
  'unknown',
] as const;
export type Domain = (typeof DOMAINS)[number];

export const TECHNOLOGY_CATEGORIES = ['languages', 'frameworks', 'tools', 'platforms'] as const;
export type TechnologyCategory = (typeof TECHNOLOGY_CATEGORIES)[number];

// Index order is the radar's rendering order.
export const RINGS = ['Adopt', 'Trial', 'Assess', 'Hold'] as const;
export type Ring = (typeof RINGS)[number];

export const QUADRANTS = ['Techniques', 'Tools', 'Platforms', 'Languages & Frameworks'] as const;
export type Quadrant = (typeof QUADRANTS)[number];

export type Trend = 'GROWING' | 'STABLE' | 'DECLINING' | 'ABANDONED' | 'NONE';

export function isDomain(value: string): value is Domain {
  return (DOMAINS as readonly string[]).includes(value);
}

// ============================================================================
// REPOSITORIES
// ============================================================================

// RepositorySummary is what a population listing yields for each repository
export interface RepositorySummary {
  id: string;       // Stable identifier, "owner/name"
  owner: string;
  name: string;
  createdAt: string; // ISO 8601
  pushedAt: string | null;
  stars: number;
  isArchived: boolean;
  isFork: boolean;
  isPrivate: boolean;
}

export interface TreeEntry {
  name: string;
  type: string; // 'blob' | 'tree' | 'commit'
}

// RepositorySnapshot adds the signals the observation extractor reads
export interface RepositorySnapshot extends RepositorySummary {
  description: string | null;
  topics: string[];
  languages: Record<string, number>; // language name -> bytes
  rootEntries: TreeEntry[];
  workflowFiles: string[];
}

export type TechnologyObservationSet = Record<TechnologyCategory, ReadonlySet<string>>;

export interface TemporalMetadata {
  createdAt: string;
  pushedAt: string;  // Falls back to createdAt when the source reports no push
  ageDays: number;
  ageMonths: number;
  daysSincePush: number;
  isActive: boolean;
  isRecent: boolean; // age <= 6 months
  isNew: boolean;    // age <= 12 months
  isLegacy: boolean; // age > 24 months
}

export interface DomainTag {
  domain: Domain;
  confidence: number;
  reasoning: string;
}

export interface RepositoryRecord {
  readonly id: string;
  readonly name: string;
  readonly createdAt: string;
  readonly pushedAt: string | null;
  readonly stars: number;
  readonly isArchived: boolean;
  readonly isFork: boolean;
  readonly isPrivate: boolean;
  readonly technologies: TechnologyObservationSet;
  readonly domain: DomainTag;
  readonly temporal: TemporalMetadata;
}

// ============================================================================
// SCORING
// ============================================================================

export interface TemporalCounts {
  totalRepos: number;
  recentRepos: number;
  newRepos: number;
  legacyRepos: number;
  activeRepos: number;
  staleRepos: number;
  avgAgeMonths: number;
  trend: Trend;
  recencyScore: number;
  activityScore: number;
}

export interface TemporalProfile extends TemporalCounts {
  byDomain?: Partial<Record<Domain, TemporalCounts>>;
}

export interface ClassificationSignals {
  usageRatio: number;
  recencyScore: number;
  activityScore: number;
  ringConfidence: number;
  signalClarity: number;
  oracleConfidence: number;
  oracleLabel: string;
  oracleAnswered: boolean;
}

export interface DeprecationNotice {
  replacement: string;
  note: string;
}

export interface ClassificationDecision {
  name: string;
  quadrant: Quadrant;
  ring: Ring;
  confidence: number;
  description: string;
  decisionFactors: string[];
  needsReview: boolean;
  reviewReason: string | null;
  temporalProfile: TemporalProfile;
  signals: ClassificationSignals;
  reposCount: number;
  totalRepos: number;
  usagePercentage: number;
  exampleRepos: string[];
  domainSuggestions: Partial<Record<Domain, Ring>>;

  // Curation provenance, present only on rewritten survivors
  mergedFrom?: string[];
  consolidatedFrom?: string[];
  subFeatures?: string[];
  deprecation?: DeprecationNotice;
  strategicValue?: string;
}

// ============================================================================
// CURATION ARTIFACTS
// ============================================================================

export interface MergeGroup {
  canonicalName: string;
  candidates: string[];
  rationale: string;
}

export interface Consolidation {
  parent: string;
  children: string[];
  rationale: string;
}

export interface DeprecationFlag extends DeprecationNotice {
  name: string;
}

// ============================================================================
// RUN STATISTICS
// ============================================================================

export interface ScanStats {
  reposScanned: number;
  reposSkipped: number;  // Already recorded in the checkpoint
  reposFiltered: number; // Rejected by inclusion filters
  reposMissing: number;  // Listed, but gone by the time it was fetched
  apiCalls: number;
  errors: number;
  rateLimitRemaining: number | null;
  rateLimitResetAt: string | null;
}

export function emptyScanStats(): ScanStats {
  return {
    reposScanned: 0,
    reposSkipped: 0,
    reposFiltered: 0,
    reposMissing: 0,
    apiCalls: 0,
    errors: 0,
    rateLimitRemaining: null,
    rateLimitResetAt: null,
  };
}
