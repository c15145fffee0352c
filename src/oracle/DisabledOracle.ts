// src/oracle/DisabledOracle.ts
// Oracle used when no model is configured: every question fails, so every caller
// takes its deterministic fallback.

import { OracleError } from '../errors';
import type {
  DomainOpinion,
  DuplicateOpinion,
  HierarchyOpinion,
  JudgmentOracle,
  StrategicOpinion,
  TechnologyOpinion,
} from './JudgmentOracle';

export class DisabledOracle implements JudgmentOracle {
  readonly callCount = 0;

  describeTechnology(): Promise<TechnologyOpinion> {
    return this.refuse();
  }

  assessStrategicValue(): Promise<StrategicOpinion> {
    return this.refuse();
  }

  judgeDuplicates(): Promise<DuplicateOpinion> {
    return this.refuse();
  }

  judgeHierarchy(): Promise<HierarchyOpinion> {
    return this.refuse();
  }

  classifyDomain(): Promise<DomainOpinion> {
    return this.refuse();
  }

  private refuse<T>(): Promise<T> {
    return Promise.reject(new OracleError('Judgment oracle is disabled'));
  }
}
