// src/CurationEngine.ts
// Post-processes the classified set: strategic filtering, duplicate merging,
// hierarchy consolidation and deprecation flags.
//
// Phases 1-3 each read the same untouched input. Their removals are unioned and
// applied once in the final assembly, so a name dropped by any phase stays dropped.

import type { Logger } from './logger';
import { silentLogger } from './logger';
import { describeError } from './errors';
import type {
  ClassificationDecision,
  Consolidation,
  DeprecationFlag,
  DeprecationNotice,
  Domain,
  MergeGroup,
} from './model';
import { DOMAINS } from './model';
import type { JudgmentOracle, StrategicValue } from './oracle/JudgmentOracle';

// ============================================================================
// STATIC TABLES
// ============================================================================

// Incidental command-line and dev-convenience tools; dropped when only one repo uses them.
export const UTILITY_NAMES: readonly string[] = [
  'apt-get', 'brew', 'curl', 'wget', 'tar', 'zip', 'unzip', 'grep', 'sed', 'awk',
  'rimraf', 'nodemon', 'npm-run-all', 'cross-env', 'dotenv', 'envsubst',
];

const TSLINT: DeprecationNotice = { replacement: 'ESLint', note: 'TSLint is deprecated. Migrate to ESLint.' };
const PROTRACTOR: DeprecationNotice = {
  replacement: 'Playwright',
  note: 'Protractor reached end of life in 2023. Migrate to Playwright or Cypress.',
};
const NODE_SASS: DeprecationNotice = { replacement: 'Sass', note: 'node-sass is deprecated. Migrate to Dart Sass.' };
const BOWER: DeprecationNotice = { replacement: 'npm', note: 'Bower is deprecated. Manage front-end packages with npm.' };

export const DEPRECATED_TECHNOLOGIES: ReadonlyMap<string, DeprecationNotice> = new Map([
  ['TSLint', TSLINT],
  ['tslint', TSLINT],
  ['Protractor', PROTRACTOR],
  ['protractor', PROTRACTOR],
  ['node-sass', NODE_SASS],
  ['Node Sass', NODE_SASS],
  ['Bower', BOWER],
  ['bower', BOWER],
]);

const MAX_DUPLICATE_LENGTH_DIFF = 5;

// ============================================================================
// TYPES
// ============================================================================

export interface CurationOptions {
  alwaysIncludeNames?: string[];
  alwaysIncludeIfReposGte?: number;
  minReposByDomain?: Partial<Record<Domain, number>>;
  autoIgnoreSingleRepoUtilities?: boolean;
  strategicIncludeIf?: StrategicValue[];
  duplicateDetection?: boolean;
  consolidation?: boolean;
  deprecation?: boolean;
  logger?: Logger;
}

export type CurationPhase = 'strategic' | 'duplicate' | 'hierarchy';

export interface RemovedEntry {
  name: string;
  phase: CurationPhase;
  reason: string;
}

export interface StrategicVerdict {
  name: string;
  keep: boolean;
  value: StrategicValue | 'unassessed';
  confidence: string;
  reason: string;
}

export interface CurationStats {
  evaluated: number;
  kept: number;
  removed: number;
  merged: number;
  consolidated: number;
  deprecated: number;
  oracleCalls: number;
}

export interface CurationResult {
  decisions: ClassificationDecision[];
  verdicts: StrategicVerdict[];
  removed: RemovedEntry[];
  mergeGroups: MergeGroup[];
  consolidations: Consolidation[];
  deprecations: DeprecationFlag[];
  stats: CurationStats;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

/** Substring match, so that wrappers such as "python-dotenv" count as the utility they wrap. */
export function isUtilityName(name: string): boolean {
  const lower = name.toLowerCase();
  return UTILITY_NAMES.some((utility) => lower.includes(utility));
}

export function areSimilarNames(a: string, b: string): boolean {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA === lowerB) return true;
  const contains = lowerA.includes(lowerB) || lowerB.includes(lowerA);
  return contains && Math.abs(a.length - b.length) <= MAX_DUPLICATE_LENGTH_DIFF;
}

/** Greedy grouping in input order; each name joins at most one group. */
export function groupSimilarNames(names: readonly string[]): string[][] {
  const processed = new Set<string>();
  const groups: string[][] = [];

  names.forEach((name, index) => {
    if (processed.has(name)) return;
    const group = [name];
    for (const other of names.slice(index + 1)) {
      if (!processed.has(other) && other !== name && areSimilarNames(name, other)) {
        group.push(other);
      }
    }
    if (group.length > 1) {
      groups.push(group);
      group.forEach((member) => processed.add(member));
    }
  });

  return groups;
}

/** Parent name -> names that extend it with a space-separated suffix. */
export function findHierarchyCandidates(names: readonly string[]): Map<string, string[]> {
  const candidates = new Map<string, string[]>();
  for (const parent of names) {
    const children = names.filter((other) => other.startsWith(`${parent} `));
    if (children.length > 0) {
      candidates.set(parent, children);
    }
  }
  return candidates;
}

// ============================================================================
// ENGINE
// ============================================================================

export class CurationEngine {
  private readonly alwaysIncludeNames: Set<string>;
  private readonly alwaysIncludeIfReposGte: number;
  private readonly minReposByDomain: Partial<Record<Domain, number>>;
  private readonly autoIgnoreSingleRepoUtilities: boolean;
  private readonly strategicIncludeIf: Set<StrategicValue>;
  private readonly duplicateDetection: boolean;
  private readonly consolidation: boolean;
  private readonly deprecation: boolean;
  private readonly logger: Logger;
  private oracleCalls = 0;

  constructor(
    private readonly oracle: JudgmentOracle,
    options: CurationOptions = {}
  ) {
    this.alwaysIncludeNames = new Set(options.alwaysIncludeNames ?? []);
    this.alwaysIncludeIfReposGte = options.alwaysIncludeIfReposGte ?? 5;
    this.minReposByDomain = options.minReposByDomain ?? {};
    this.autoIgnoreSingleRepoUtilities = options.autoIgnoreSingleRepoUtilities ?? true;
    this.strategicIncludeIf = new Set(options.strategicIncludeIf ?? ['high', 'medium']);
    this.duplicateDetection = options.duplicateDetection ?? true;
    this.consolidation = options.consolidation ?? true;
    this.deprecation = options.deprecation ?? true;
    this.logger = options.logger ?? silentLogger;
  }

  async curate(input: readonly ClassificationDecision[]): Promise<CurationResult> {
    this.oracleCalls = 0;

    this.logger.debug(`[Curation] Phase 1: strategic filter over ${input.length} technologies`);
    const verdicts = await this.evaluateStrategicValue(input);

    this.logger.debug('[Curation] Phase 2: duplicate detection');
    const mergeGroups = this.duplicateDetection ? await this.detectDuplicates(input) : [];

    this.logger.debug('[Curation] Phase 3: hierarchy detection');
    const consolidations = this.consolidation ? await this.detectHierarchies(input) : [];

    const deprecations = this.deprecation ? detectDeprecated(input) : [];

    return this.assemble(input, verdicts, mergeGroups, consolidations, deprecations);
  }

  // ==========================================================================
  // PHASE 1
  // ==========================================================================

  private async evaluateStrategicValue(input: readonly ClassificationDecision[]): Promise<StrategicVerdict[]> {
    const verdicts: StrategicVerdict[] = [];
    for (const decision of input) {
      verdicts.push(await this.evaluateOne(decision));
    }
    return verdicts;
  }

  private async evaluateOne(decision: ClassificationDecision): Promise<StrategicVerdict> {
    const { name, reposCount } = decision;

    if (this.alwaysIncludeNames.has(name)) {
      return { name, keep: true, value: 'high', confidence: 'high', reason: 'Allow-listed' };
    }
    if (reposCount >= this.alwaysIncludeIfReposGte) {
      return {
        name,
        keep: true,
        value: 'medium',
        confidence: 'high',
        reason: `Used in ${reposCount} repos (>= ${this.alwaysIncludeIfReposGte})`,
      };
    }
    const qualifyingDomain = this.qualifyingDomain(decision);
    if (qualifyingDomain !== null) {
      return {
        name,
        keep: true,
        value: 'medium',
        confidence: 'medium',
        reason: `Meets the ${qualifyingDomain} domain minimum`,
      };
    }
    if (this.autoIgnoreSingleRepoUtilities && reposCount === 1 && isUtilityName(name)) {
      return { name, keep: false, value: 'low', confidence: 'high', reason: 'Single-repo utility' };
    }

    try {
      this.oracleCalls += 1;
      const opinion = await this.oracle.assessStrategicValue({
        name,
        quadrant: decision.quadrant,
        ring: decision.ring,
        reposCount,
        usagePercentage: decision.usagePercentage,
        description: decision.description,
      });
      return {
        name,
        keep: this.strategicIncludeIf.has(opinion.strategicValue),
        value: opinion.strategicValue,
        confidence: opinion.confidence,
        reason: opinion.reason,
      };
    } catch (error) {
      this.logger.debug(`[Curation] Strategic check failed for ${name} (${describeError(error)}); keeping`);
      return { name, keep: true, value: 'unassessed', confidence: 'low', reason: 'Oracle unavailable; kept by default' };
    }
  }

  private qualifyingDomain(decision: ClassificationDecision): Domain | null {
    const byDomain = decision.temporalProfile.byDomain ?? {};
    for (const domain of DOMAINS) {
      const minimum = this.minReposByDomain[domain];
      const counts = byDomain[domain];
      if (minimum !== undefined && counts !== undefined && counts.totalRepos >= minimum) {
        return domain;
      }
    }
    return null;
  }

  // ==========================================================================
  // PHASE 2
  // ==========================================================================

  private async detectDuplicates(input: readonly ClassificationDecision[]): Promise<MergeGroup[]> {
    const counts = new Map(input.map((d) => [d.name, d.reposCount]));
    const groups = groupSimilarNames(input.map((d) => d.name));
    const merges: MergeGroup[] = [];

    for (const group of groups) {
      try {
        this.oracleCalls += 1;
        const opinion = await this.oracle.judgeDuplicates({
          names: group.map((name) => ({ name, reposCount: counts.get(name) ?? 0 })),
        });
        if (!opinion.areDuplicates) continue;

        const canonical = resolveCanonical(group, opinion.canonicalName, counts);
        const proposed = opinion.mergeCandidates.filter((name) => group.includes(name) && name !== canonical);
        const candidates = proposed.length > 0 ? proposed : group.filter((name) => name !== canonical);

        merges.push({ canonicalName: canonical, candidates, rationale: opinion.reason });
        this.logger.debug(`[Curation] Merge ${candidates.join(', ')} -> ${canonical}`);
      } catch (error) {
        this.logger.debug(`[Curation] Duplicate check failed for ${group.join(', ')} (${describeError(error)})`);
      }
    }
    return merges;
  }

  // ==========================================================================
  // PHASE 3
  // ==========================================================================

  private async detectHierarchies(input: readonly ClassificationDecision[]): Promise<Consolidation[]> {
    const counts = new Map(input.map((d) => [d.name, d.reposCount]));
    const claimed = new Set<string>();
    const consolidations: Consolidation[] = [];

    for (const [parent, allChildren] of findHierarchyCandidates(input.map((d) => d.name))) {
      if (claimed.has(parent)) continue;
      const children = allChildren.filter((child) => !claimed.has(child));
      if (children.length === 0) continue;

      try {
        this.oracleCalls += 1;
        const opinion = await this.oracle.judgeHierarchy({
          parent: { name: parent, reposCount: counts.get(parent) ?? 0 },
          children: children.map((name) => ({ name, reposCount: counts.get(name) ?? 0 })),
        });
        if (!opinion.shouldConsolidate) continue;

        children.forEach((child) => claimed.add(child));
        consolidations.push({ parent, children, rationale: opinion.reason });
        this.logger.debug(`[Curation] Consolidate ${children.join(', ')} into ${parent}`);
      } catch (error) {
        this.logger.debug(`[Curation] Hierarchy check failed for ${parent} (${describeError(error)})`);
      }
    }
    return consolidations;
  }

  // ==========================================================================
  // ASSEMBLY
  // ==========================================================================

  private assemble(
    input: readonly ClassificationDecision[],
    verdicts: StrategicVerdict[],
    mergeGroups: MergeGroup[],
    consolidations: Consolidation[],
    deprecations: DeprecationFlag[]
  ): CurationResult {
    const removed = new Map<string, RemovedEntry>();
    const markRemoved = (name: string, phase: CurationPhase, reason: string): void => {
      if (!removed.has(name)) removed.set(name, { name, phase, reason });
    };

    for (const verdict of verdicts) {
      if (!verdict.keep) markRemoved(verdict.name, 'strategic', `${verdict.value} strategic value: ${verdict.reason}`);
    }
    for (const group of mergeGroups) {
      group.candidates.forEach((name) => markRemoved(name, 'duplicate', `Merged into ${group.canonicalName}`));
    }
    for (const consolidation of consolidations) {
      consolidation.children.forEach((name) =>
        markRemoved(name, 'hierarchy', `Consolidated into ${consolidation.parent}`)
      );
    }

    const byName = new Map(input.map((d) => [d.name, d]));
    const verdictByName = new Map(verdicts.map((v) => [v.name, v]));
    const mergeByCanonical = new Map(mergeGroups.map((g) => [g.canonicalName, g]));
    const consolidationByParent = new Map(consolidations.map((c) => [c.parent, c]));
    const deprecationByName = new Map(deprecations.map((d) => [d.name, d]));

    const survivors: ClassificationDecision[] = [];
    for (const decision of input) {
      if (removed.has(decision.name)) continue;

      const curated: ClassificationDecision = { ...decision };
      const verdict = verdictByName.get(decision.name);
      if (verdict) curated.strategicValue = verdict.value;

      const merge = mergeByCanonical.get(decision.name);
      if (merge) {
        const absorbed = merge.candidates.reduce((sum, name) => sum + (byName.get(name)?.reposCount ?? 0), 0);
        curated.reposCount = decision.reposCount + absorbed;
        curated.usagePercentage =
          decision.totalRepos > 0 ? Math.round((curated.reposCount / decision.totalRepos) * 1000) / 10 : 0;
        curated.mergedFrom = [...merge.candidates];
      }

      const consolidation = consolidationByParent.get(decision.name);
      if (consolidation) {
        curated.consolidatedFrom = [...consolidation.children];
        curated.subFeatures = consolidation.children.map(
          (child) => `${child} (${byName.get(child)?.reposCount ?? 0} repos)`
        );
      }

      const deprecated = deprecationByName.get(decision.name);
      if (deprecated) {
        curated.deprecation = { replacement: deprecated.replacement, note: deprecated.note };
      }

      survivors.push(curated);
    }

    const removedList = [...removed.values()];
    this.logger.info(
      `[Curation] Kept ${survivors.length}/${input.length} (removed ${removedList.length}, merged ${mergeGroups.length}, consolidated ${consolidations.length})`
    );

    return {
      decisions: survivors,
      verdicts,
      removed: removedList,
      mergeGroups,
      consolidations,
      deprecations,
      stats: {
        evaluated: input.length,
        kept: survivors.length,
        removed: removedList.length,
        merged: mergeGroups.reduce((sum, g) => sum + g.candidates.length, 0),
        consolidated: consolidations.reduce((sum, c) => sum + c.children.length, 0),
        deprecated: deprecations.length,
        oracleCalls: this.oracleCalls,
      },
    };
  }
}

function resolveCanonical(group: string[], proposed: string | null, counts: Map<string, number>): string {
  if (proposed !== null) {
    const exact = group.find((name) => name === proposed);
    if (exact !== undefined) return exact;
    const loose = group.find((name) => name.toLowerCase() === proposed.trim().toLowerCase());
    if (loose !== undefined) return loose;
  }
  // Most-used member; ties go to the earliest.
  return group.reduce((best, name) => ((counts.get(name) ?? 0) > (counts.get(best) ?? 0) ? name : best));
}

function detectDeprecated(input: readonly ClassificationDecision[]): DeprecationFlag[] {
  const flags: DeprecationFlag[] = [];
  for (const { name } of input) {
    const notice = DEPRECATED_TECHNOLOGIES.get(name);
    if (notice) flags.push({ name, ...notice });
  }
  return flags;
}
