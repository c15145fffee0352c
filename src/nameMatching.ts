// src/nameMatching.ts
// Name predicates shared by the scanner filters, the decision fallback and curation.

import { minimatch } from 'minimatch';

/**
 * True when `name` matches any glob pattern. Matching ignores case.
 */
export function matchesAnyGlob(name: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(name, pattern, { nocase: true, dot: true }));
}

/**
 * Keyword match on a technology name, ignoring case.
 * Multi-word keywords match as a substring; single words must match a whole token,
 * so that "go" does not match "MongoDB".
 */
export function matchesKeyword(name: string, keyword: string): boolean {
  const lowerName = name.toLowerCase().trim();
  const lowerKeyword = keyword.toLowerCase().trim();
  if (lowerName === lowerKeyword) return true;
  if (/\s/.test(lowerKeyword)) return lowerName.includes(lowerKeyword);
  return tokenize(lowerName).includes(lowerKeyword);
}

export function tokenize(name: string): string[] {
  return name
    .toLowerCase()
    .split(/[\s/(),:_]+/)
    .filter((token) => token.length > 0);
}
