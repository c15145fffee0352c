// src/usageIndex.ts
// Technology name -> number of distinct repositories referencing it, across all categories.

import type { RepositoryRecord } from './model';
import { TECHNOLOGY_CATEGORIES } from './model';

export type TechnologyUsageIndex = Map<string, number>;

/**
 * Builds the usage index. Names are counted verbatim: "React" and "react" are
 * different technologies here.
 */
export function buildUsageIndex(records: readonly RepositoryRecord[]): TechnologyUsageIndex {
  const index: TechnologyUsageIndex = new Map();
  for (const record of records) {
    const names = new Set<string>();
    for (const category of TECHNOLOGY_CATEGORIES) {
      record.technologies[category].forEach((name) => names.add(name));
    }
    for (const name of names) {
      index.set(name, (index.get(name) ?? 0) + 1);
    }
  }
  return index;
}
