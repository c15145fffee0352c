// src/dataSource.ts
// What the scanner needs from a repository host.

import type { RepositorySnapshot, RepositorySummary } from './model';

/**
 * Implementations signal a missing repository or file with NotFoundError and
 * retryable failures with TransientSourceError.
 */
export interface RepositoryDataSource {
  listRepositories(organization: string): Promise<RepositorySummary[]>;
  fetchSnapshot(repo: RepositorySummary): Promise<RepositorySnapshot>;
  fetchFileText(repo: RepositorySummary, filePath: string): Promise<string>;
}

