// src/queries.ts
// GraphQL documents sent to the GitHub API, with the response shapes this project reads.

import { gql } from 'graphql-request';

export const ListOrganizationRepositoriesQuery = gql`
  query ListOrganizationRepositories($login: String!, $cursor: String) {
    organization(login: $login) {
      repositories(first: 100, after: $cursor, orderBy: { field: NAME, direction: ASC }) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          nameWithOwner
          name
          owner {
            login
          }
          createdAt
          pushedAt
          stargazerCount
          isArchived
          isFork
          isPrivate
        }
      }
    }
  }
`;

export const GetRepositorySnapshotQuery = gql`
  query GetRepositorySnapshot($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) {
      nameWithOwner
      name
      owner {
        login
      }
      description
      createdAt
      pushedAt
      stargazerCount
      isArchived
      isFork
      isPrivate
      repositoryTopics(first: 20) {
        nodes {
          topic {
            name
          }
        }
      }
      languages(first: 20, orderBy: { field: SIZE, direction: DESC }) {
        edges {
          size
          node {
            name
          }
        }
      }
      root: object(expression: "HEAD:") {
        ... on Tree {
          entries {
            name
            type
          }
        }
      }
      workflows: object(expression: "HEAD:.github/workflows") {
        ... on Tree {
          entries {
            name
            type
          }
        }
      }
    }
  }
`;

export const GetFileTextQuery = gql`
  query GetFileText($owner: String!, $name: String!, $expression: String!) {
    repository(owner: $owner, name: $name) {
      object(expression: $expression) {
        ... on Blob {
          text
          isBinary
        }
      }
    }
  }
`;

export const GetRateLimitQuery = gql`
  query GetRateLimit {
    rateLimit {
      limit
      remaining
      resetAt
    }
  }
`;

// ============================================================================
// RESPONSE SHAPES
// ============================================================================

export interface RepositoryNode {
  nameWithOwner: string;
  name: string;
  owner: { login: string };
  createdAt: string;
  pushedAt: string | null;
  stargazerCount: number;
  isArchived: boolean;
  isFork: boolean;
  isPrivate: boolean;
}

export interface ListOrganizationRepositoriesResult {
  organization: {
    repositories: {
      pageInfo: { hasNextPage: boolean; endCursor: string | null };
      nodes: Array<RepositoryNode | null>;
    };
  } | null;
}

interface TreeObject {
  entries?: Array<{ name: string; type: string }>;
}

export interface GetRepositorySnapshotResult {
  repository:
    | (RepositoryNode & {
        description: string | null;
        repositoryTopics: { nodes: Array<{ topic: { name: string } } | null> };
        languages: { edges: Array<{ size: number; node: { name: string } } | null> } | null;
        root: TreeObject | null;
        workflows: TreeObject | null;
      })
    | null;
}

export interface GetFileTextResult {
  repository: {
    object: { text?: string | null; isBinary?: boolean | null } | null;
  } | null;
}

export interface GetRateLimitResult {
  rateLimit: { limit: number; remaining: number; resetAt: string } | null;
}
