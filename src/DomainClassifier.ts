// src/DomainClassifier.ts
// Tags each repository with a coarse engineering domain, via the Judgment Oracle.

import { describeError } from './errors';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { DomainTag, RepositorySnapshot, TechnologyObservationSet } from './model';
import { TECHNOLOGY_CATEGORIES } from './model';
import type { JudgmentOracle } from './oracle/JudgmentOracle';

export const UNKNOWN_DOMAIN: DomainTag = { domain: 'unknown', confidence: 0, reasoning: 'Not classified' };

export class DomainClassifier {
  constructor(
    private readonly oracle: JudgmentOracle,
    private readonly logger: Logger = silentLogger
  ) {}

  /** Never rejects: any oracle failure yields the unknown domain with confidence 0. */
  async classify(snapshot: RepositorySnapshot, technologies: TechnologyObservationSet): Promise<DomainTag> {
    try {
      const opinion = await this.oracle.classifyDomain({
        repository: snapshot.id,
        description: snapshot.description,
        topics: snapshot.topics,
        languages: Object.keys(snapshot.languages),
        technologies: TECHNOLOGY_CATEGORIES.flatMap((category) => [...technologies[category]]),
        rootEntries: snapshot.rootEntries.map((entry) => entry.name),
      });
      return {
        domain: opinion.domain,
        confidence: Math.min(1, Math.max(0, opinion.confidence)),
        reasoning: opinion.reasoning,
      };
    } catch (error) {
      this.logger.debug(`[Scan] ${snapshot.id}: domain classification failed (${describeError(error)})`);
      return { ...UNKNOWN_DOMAIN, reasoning: `Classification failed: ${describeError(error)}` };
    }
  }
}
