import { describe, expect, it } from 'vitest';
import { GitHubDataSource, createApiClient } from './api';
import { ConfigError, NotFoundError, RadarError, TransientSourceError, isRetryableError } from './errors';
import type { RepositorySummary } from './model';

interface SentRequest {
  authorization: string | null;
  variables: Record<string, unknown>;
}

/** A fetch stand-in that answers each request with the next scripted response. */
interface ScriptedResponse {
  status?: number;
  headers?: Record<string, string>;
  body: unknown;
}

function scriptedFetch(responses: ScriptedResponse[]) {
  const sent: SentRequest[] = [];
  const fetchImpl: typeof fetch = async (_input, init) => {
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : {};
    const variables: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'variables') : undefined;
    sent.push({
      authorization: new Headers(init?.headers).get('authorization'),
      variables: typeof variables === 'object' && variables !== null ? Object.fromEntries(Object.entries(variables)) : {},
    });
    const next = responses.shift();
    if (next === undefined) throw new Error('no scripted response left');
    return new Response(JSON.stringify(next.body), {
      status: next.status ?? 200,
      headers: { 'content-type': 'application/json', ...next.headers },
    });
  };
  return { fetchImpl, sent };
}

function node(name: string) {
  return {
    nameWithOwner: `acme/${name}`,
    name,
    owner: { login: 'acme' },
    createdAt: '2023-03-01T00:00:00Z',
    pushedAt: '2024-05-01T00:00:00Z',
    stargazerCount: 4,
    isArchived: false,
    isFork: false,
    isPrivate: true,
  };
}

const REPO: RepositorySummary = {
  id: 'acme/api',
  owner: 'acme',
  name: 'api',
  createdAt: '2023-03-01T00:00:00Z',
  pushedAt: '2024-05-01T00:00:00Z',
  stars: 4,
  isArchived: false,
  isFork: false,
  isPrivate: true,
};

function sourceFor(responses: ScriptedResponse[]) {
  const { fetchImpl, sent } = scriptedFetch(responses);
  return { source: new GitHubDataSource(createApiClient('test-secret', fetchImpl)), sent };
}

describe('GitHubDataSource', () => {
  it('lists an organization across pages', async () => {
    const page = (nodes: unknown[], hasNextPage: boolean, endCursor: string | null) => ({
      body: { data: { organization: { repositories: { pageInfo: { hasNextPage, endCursor }, nodes } } } },
    });
    const { source, sent } = sourceFor([page([node('api'), null], true, 'cursor-1'), page([node('web')], false, null)]);

    const repos = await source.listRepositories('acme');

    expect(repos.map((r) => r.id)).toEqual(['acme/api', 'acme/web']);
    expect(repos[0]).toEqual({ ...REPO });
    expect(sent.map((s) => s.variables.cursor)).toEqual([null, 'cursor-1']);
    expect(sent[0].authorization).toBe('Bearer test-secret');
  });

  it('maps a missing organization to NotFoundError', async () => {
    const { source } = sourceFor([{ body: { data: { organization: null } } }]);
    await expect(source.listRepositories('ghost')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('builds a snapshot with languages, topics and root entries', async () => {
    const { source } = sourceFor([
      {
        body: {
          data: {
            repository: {
              ...node('api'),
              description: 'Orders API',
              repositoryTopics: { nodes: [{ topic: { name: 'payments' } }] },
              languages: { edges: [{ size: 900, node: { name: 'Go' } }, null] },
              root: { entries: [{ name: 'go.mod', type: 'blob' }, { name: 'cmd', type: 'tree' }] },
              workflows: { entries: [{ name: 'ci.yml', type: 'blob' }, { name: 'shared', type: 'tree' }] },
            },
          },
        },
      },
    ]);

    const snapshot = await source.fetchSnapshot(REPO);

    expect(snapshot.description).toBe('Orders API');
    expect(snapshot.topics).toEqual(['payments']);
    expect(snapshot.languages).toEqual({ Go: 900 });
    expect(snapshot.rootEntries).toEqual([
      { name: 'go.mod', type: 'blob' },
      { name: 'cmd', type: 'tree' },
    ]);
    expect(snapshot.workflowFiles).toEqual(['ci.yml']);
  });

  it('maps a NOT_FOUND GraphQL error to NotFoundError', async () => {
    const { source } = sourceFor([
      {
        body: {
          data: { repository: null },
          errors: [{ type: 'NOT_FOUND', message: "Could not resolve to a Repository with the name 'acme/api'." }],
        },
      },
    ]);
    await expect(source.fetchSnapshot(REPO)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('maps HTTP 401 to ConfigError', async () => {
    const { source } = sourceFor([{ status: 401, body: { message: 'Bad credentials' } }]);
    await expect(source.fetchSnapshot(REPO)).rejects.toBeInstanceOf(ConfigError);
  });

  it('maps HTTP 502 to a retryable TransientSourceError', async () => {
    const { source } = sourceFor([{ status: 502, body: { message: 'Bad gateway' } }]);

    const error: unknown = await source.fetchSnapshot(REPO).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientSourceError);
    expect(error instanceof TransientSourceError ? error.status : null).toBe(502);
  });

  it('maps a 403 without rate limiting to a permanent failure', async () => {
    const { source } = sourceFor([{ status: 403, body: { message: 'Resource not accessible by integration' } }]);

    const error: unknown = await source.fetchSnapshot(REPO).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RadarError);
    expect(error).not.toBeInstanceOf(TransientSourceError);
    expect(isRetryableError(error)).toBe(false);
  });

  it('retries a 403 from an exhausted quota', async () => {
    const { source } = sourceFor([
      { status: 403, headers: { 'x-ratelimit-remaining': '0' }, body: { message: 'API rate limit exceeded' } },
    ]);

    const error: unknown = await source.fetchSnapshot(REPO).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientSourceError);
    expect(error instanceof TransientSourceError ? error.status : null).toBe(403);
  });

  it('retries a 403 from a secondary rate limit', async () => {
    const { source } = sourceFor([
      { status: 403, body: { message: 'You have exceeded a secondary rate limit. Please wait a few minutes.' } },
    ]);
    await expect(source.fetchSnapshot(REPO)).rejects.toBeInstanceOf(TransientSourceError);
  });

  it('maps a network failure to TransientSourceError', async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const source = new GitHubDataSource(createApiClient('test-secret', fetchImpl));
    await expect(source.fetchQuota()).rejects.toBeInstanceOf(TransientSourceError);
  });

  it('reads text files and treats binary blobs as missing', async () => {
    const { source, sent } = sourceFor([
      { body: { data: { repository: { object: { text: 'module acme/api\n', isBinary: false } } } } },
      { body: { data: { repository: { object: { text: null, isBinary: true } } } } },
    ]);

    expect(await source.fetchFileText(REPO, 'go.mod')).toBe('module acme/api\n');
    await expect(source.fetchFileText(REPO, 'logo.png')).rejects.toBeInstanceOf(NotFoundError);
    expect(sent[0].variables.expression).toBe('HEAD:go.mod');
  });

  it('reads the rate limit quota', async () => {
    const { source } = sourceFor([
      { body: { data: { rateLimit: { limit: 5000, remaining: 4321, resetAt: '2024-06-01T01:00:00Z' } } } },
    ]);

    expect(await source.fetchQuota()).toEqual({
      limit: 5000,
      remaining: 4321,
      resetAt: new Date('2024-06-01T01:00:00Z'),
    });
  });
});
