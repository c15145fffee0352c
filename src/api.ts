// src/api.ts
// This module encapsulates all interactions with the GitHub GraphQL API.
//
// GitHubDataSource implements both RepositoryDataSource (listing, snapshots, file
// contents) and QuotaSource (the rateLimit query the CallGovernor polls).
//
// Every request goes through request(), which maps failures onto the project's
// error taxonomy:
// - { repository: null } or a NOT_FOUND GraphQL error -> NotFoundError
// - HTTP 401                                            -> ConfigError
// - HTTP 429/5xx, RATE_LIMITED, network failures        -> TransientSourceError
// - HTTP 403 from a rate limit                          -> TransientSourceError
// - any other HTTP 403                                  -> RadarError (not retried)

import { GraphQLClient, ClientError } from 'graphql-request';
import chalk from 'chalk';
import type { QuotaSnapshot, QuotaSource } from './CallGovernor';
import type { RepositoryDataSource } from './dataSource';
import { ConfigError, NotFoundError, RadarError, TransientSourceError } from './errors';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { RepositorySnapshot, RepositorySummary, TreeEntry } from './model';
import {
  GetFileTextQuery,
  GetRateLimitQuery,
  GetRepositorySnapshotQuery,
  ListOrganizationRepositoriesQuery,
  type GetFileTextResult,
  type GetRateLimitResult,
  type GetRepositorySnapshotResult,
  type ListOrganizationRepositoriesResult,
  type RepositoryNode,
} from './queries';

export const GITHUB_GRAPHQL_URL = 'https://api.github.com/graphql';

/**
 * Creates and configures a GraphQLClient for the GitHub API.
 * @param token - The GitHub Personal Access Token.
 * @param fetchImpl - Optional fetch replacement (used by tests).
 * @returns An initialized GraphQLClient instance.
 */
export function createApiClient(token: string, fetchImpl?: typeof fetch): GraphQLClient {
  return new GraphQLClient(GITHUB_GRAPHQL_URL, {
    headers: {
      Authorization: `Bearer ${token}`,
    },
    ...(fetchImpl ? { fetch: fetchImpl } : {}),
  });
}

const RETRIABLE_STATUS = new Set([429, 500, 502, 503, 504]);

export class GitHubDataSource implements RepositoryDataSource, QuotaSource {
  constructor(
    private readonly client: GraphQLClient,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Lists every repository of an organization, following pagination.
   * @throws NotFoundError if the organization does not exist or is not visible.
   */
  async listRepositories(organization: string): Promise<RepositorySummary[]> {
    const repos: RepositorySummary[] = [];
    let cursor: string | null = null;

    do {
      const data: ListOrganizationRepositoriesResult = await this.request<ListOrganizationRepositoriesResult>(
        ListOrganizationRepositoriesQuery,
        { login: organization, cursor },
        `organization ${organization}`
      );
      if (data.organization === null) {
        throw new NotFoundError(`organization ${organization}`);
      }

      const page = data.organization.repositories;
      for (const node of page.nodes) {
        if (node !== null) repos.push(toSummary(node));
      }
      cursor = page.pageInfo.hasNextPage ? page.pageInfo.endCursor : null;
      this.logger.debug(`[API] ${organization}: ${repos.length} repositories listed so far`);
    } while (cursor !== null);

    return repos;
  }

  /**
   * Fetches timestamps, languages, topics and the root tree of one repository.
   */
  async fetchSnapshot(repo: RepositorySummary): Promise<RepositorySnapshot> {
    const data = await this.request<GetRepositorySnapshotResult>(
      GetRepositorySnapshotQuery,
      { owner: repo.owner, name: repo.name },
      repo.id
    );

    // The GitHub API returns { repository: null } for non-existent or inaccessible repos.
    const node = data.repository;
    if (node === null) {
      throw new NotFoundError(repo.id);
    }

    const languages: Record<string, number> = {};
    for (const edge of node.languages?.edges ?? []) {
      if (edge !== null) languages[edge.node.name] = edge.size;
    }

    return {
      ...toSummary(node),
      description: node.description,
      topics: node.repositoryTopics.nodes.flatMap((n) => (n === null ? [] : [n.topic.name])),
      languages,
      rootEntries: treeEntries(node.root),
      workflowFiles: treeEntries(node.workflows)
        .filter((entry) => entry.type === 'blob')
        .map((entry) => entry.name),
    };
  }

  /**
   * Reads a text file at HEAD.
   * @throws NotFoundError when the path does not exist or is binary.
   */
  async fetchFileText(repo: RepositorySummary, filePath: string): Promise<string> {
    const resource = `${repo.id}:${filePath}`;
    const data = await this.request<GetFileTextResult>(
      GetFileTextQuery,
      { owner: repo.owner, name: repo.name, expression: `HEAD:${filePath}` },
      resource
    );

    const blob = data.repository?.object ?? null;
    if (blob === null || blob.isBinary === true || typeof blob.text !== 'string') {
      throw new NotFoundError(resource);
    }
    return blob.text;
  }

  async fetchQuota(): Promise<QuotaSnapshot> {
    const data = await this.request<GetRateLimitResult>(GetRateLimitQuery, {}, 'rate limit');
    if (data.rateLimit === null) {
      throw new TransientSourceError('GitHub returned no rate limit information');
    }
    return {
      limit: data.rateLimit.limit,
      remaining: data.rateLimit.remaining,
      resetAt: new Date(data.rateLimit.resetAt),
    };
  }

  // ============================================================================
  // REQUEST AND ERROR MAPPING
  // ============================================================================

  private async request<T>(document: string, variables: Record<string, unknown>, resource: string): Promise<T> {
    this.logger.debug(`[API] Fetching ${resource}...`);
    try {
      const data = await this.client.request<T>(document, variables);
      this.logger.debug(`[API] Success for ${resource}.`);
      return data;
    } catch (error: unknown) {
      throw this.toSourceError(error, resource);
    }
  }

  private toSourceError(error: unknown, resource: string): RadarError {
    if (error instanceof ClientError) {
      const status = error.response.status;
      const errorTypes = graphQLErrorTypes(error.response.errors);

      if (errorTypes.includes('NOT_FOUND')) {
        return new NotFoundError(resource, error);
      }

      this.logRateLimitHeaders(error.response.headers);

      if (status === 401) {
        return new ConfigError('GitHub rejected the token (HTTP 401). Check GITHUB_TOKEN.', error);
      }
      // 403 is a rate limit only with an exhausted quota or a secondary-limit message;
      // otherwise the token lacks access and retrying cannot help.
      if (status === 403 && !isRateLimited(error)) {
        return new RadarError(`GitHub denied access to ${resource} (HTTP 403)`, error);
      }
      if (status === 403 || RETRIABLE_STATUS.has(status) || errorTypes.includes('RATE_LIMITED')) {
        return new TransientSourceError(`GitHub request for ${resource} failed (HTTP ${status})`, status, error);
      }
      return new RadarError(`GitHub request for ${resource} failed (HTTP ${status}): ${errorTypes.join(', ')}`, error);
    }

    if (error instanceof Error) {
      // fetch rejects with a TypeError on network failure
      return new TransientSourceError(`GitHub request for ${resource} failed: ${error.message}`, undefined, error);
    }
    return new RadarError(`GitHub request for ${resource} failed with an unknown error`, error);
  }

  private logRateLimitHeaders(headers: unknown): void {
    if (!isHeaderBag(headers)) return;
    const remaining = headers.get('x-ratelimit-remaining');
    const reset = headers.get('x-ratelimit-reset');
    if (remaining !== null) {
      this.logger.debug(chalk.yellow(`  Rate Limit Remaining: ${remaining}`));
    }
    if (reset !== null) {
      const resetTime = new Date(Number(reset) * 1000);
      this.logger.debug(chalk.yellow(`  Rate Limit Resets At: ${resetTime.toLocaleTimeString()}`));
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function toSummary(node: RepositoryNode): RepositorySummary {
  return {
    id: node.nameWithOwner,
    owner: node.owner.login,
    name: node.name,
    createdAt: node.createdAt,
    pushedAt: node.pushedAt,
    stars: node.stargazerCount,
    isArchived: node.isArchived,
    isFork: node.isFork,
    isPrivate: node.isPrivate,
  };
}

function treeEntries(tree: { entries?: TreeEntry[] } | null): TreeEntry[] {
  return tree?.entries?.map((entry) => ({ name: entry.name, type: entry.type })) ?? [];
}

function graphQLErrorTypes(errors: unknown): string[] {
  if (!Array.isArray(errors)) return [];
  const types: string[] = [];
  for (const entry of errors) {
    if (typeof entry === 'object' && entry !== null && 'type' in entry && typeof entry.type === 'string') {
      types.push(entry.type);
    }
  }
  return types;
}

function isRateLimited(error: ClientError): boolean {
  const headers = error.response.headers;
  if (isHeaderBag(headers) && headers.get('x-ratelimit-remaining') === '0') return true;
  return error.message.toLowerCase().includes('rate limit');
}

function isHeaderBag(value: unknown): value is { get(name: string): string | null } {
  return typeof value === 'object' && value !== null && 'get' in value && typeof value.get === 'function';
}
