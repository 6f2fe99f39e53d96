import { Octokit } from "@octokit/rest";
import { z } from "zod";

import { type ShelfError, apiError, isAbortError, normalizeError } from "../core/errors.js";
import { isRecord, truncate } from "../core/utils.js";

const DEFAULT_API_URL = "https://api.github.com";
const ERROR_DETAIL_LIMIT = 200;

export const SEARCH_REPOSITORIES_QUERY = `
  query SearchRepositories($query: String!, $first: Int!, $after: String) {
    search(query: $query, type: REPOSITORY, first: $first, after: $after) {
      pageInfo {
        hasNextPage
        endCursor
      }
      nodes {
        __typename
        ... on Repository {
          url
          name
          nameWithOwner
          defaultBranchRef {
            name
            target {
              oid
            }
          }
          latestRelease {
            name
            publishedAt
          }
          issues(states: OPEN) {
            totalCount
          }
          pullRequests(states: OPEN) {
            totalCount
          }
        }
      }
    }
  }
`;

const RepoIssueNodeSchema = z.object({
  __typename: z.literal("Repository"),
  url: z.string(),
  name: z.string(),
  nameWithOwner: z.string(),
  defaultBranchRef: z
    .object({
      name: z.string(),
      target: z.object({ oid: z.string() }).nullable(),
    })
    .nullable(),
  latestRelease: z
    .object({
      name: z.string().nullable(),
      publishedAt: z.string().nullable(),
    })
    .nullable(),
  issues: z.object({ totalCount: z.number().int().nonnegative() }),
  pullRequests: z.object({ totalCount: z.number().int().nonnegative() }),
});

// Search results are a union type; only repositories are validated in full.
const SearchNodeSchema = z.object({ __typename: z.string() }).passthrough();

const SearchResponseSchema = z.object({
  search: z.object({
    pageInfo: z.object({
      hasNextPage: z.boolean(),
      endCursor: z.string().nullable(),
    }),
    nodes: z.array(SearchNodeSchema.nullable()).nullable(),
  }),
});

export type RepoIssueNode = z.output<typeof RepoIssueNodeSchema>;

export interface SearchRequest {
  query: string;
  first: number;
  after?: string | null;
  signal?: AbortSignal;
}

export interface SearchPage {
  repositories: RepoIssueNode[];
  hasNextPage: boolean;
  endCursor: string | null;
}

/** One page of a repository search. Implementations throw `ShelfError`s with API codes. */
export interface SearchApi {
  searchRepositories(request: SearchRequest): Promise<SearchPage>;
}

export interface GitHubSearchApiOptions {
  token: string;
  apiUrl?: string;
}

export class GitHubSearchApi implements SearchApi {
  private readonly octokit: Octokit;

  public constructor(options: GitHubSearchApiOptions) {
    this.octokit = new Octokit({
      auth: options.token,
      baseUrl: options.apiUrl ?? DEFAULT_API_URL,
      userAgent: "reposhelf",
    });
  }

  public async searchRepositories(request: SearchRequest): Promise<SearchPage> {
    let payload: unknown;
    try {
      payload = await this.octokit.graphql(SEARCH_REPOSITORIES_QUERY, {
        query: request.query,
        first: request.first,
        after: request.after ?? null,
        request: request.signal ? { signal: request.signal } : {},
      });
    } catch (error) {
      throw toSearchError(error, request.query);
    }

    return parseSearchPage(payload, request.query);
  }
}

export function parseSearchPage(payload: unknown, query: string): SearchPage {
  const parsed = SearchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw invalidResponse(query, parsed.error);
  }

  const { pageInfo, nodes } = parsed.data.search;
  const repositories: RepoIssueNode[] = [];
  for (const node of nodes ?? []) {
    if (node === null || node.__typename !== "Repository") {
      continue;
    }
    const repository = RepoIssueNodeSchema.safeParse(node);
    if (!repository.success) {
      throw invalidResponse(query, repository.error);
    }
    repositories.push(repository.data);
  }

  return {
    repositories,
    hasNextPage: pageInfo.hasNextPage,
    endCursor: pageInfo.endCursor,
  };
}

/**
 * Map an Octokit failure onto an API error code. HTTP failures carry
 * `status` and `response.headers`; GraphQL-level failures carry `errors`.
 */
export function toSearchError(error: unknown, query: string, now = Date.now()): ShelfError {
  if (isAbortError(error)) {
    return normalizeError(error, "API_NETWORK_ERROR", { query });
  }

  const detail = truncate(describeError(error), ERROR_DETAIL_LIMIT);
  const status = readStatus(error);
  const headers = readHeaders(error);

  if (isRateLimited(error, status, headers)) {
    const retryAfterMs = retryAfterFromHeaders(headers, now);
    return apiError("API_RATE_LIMITED", `GitHub rate limit reached while searching "${query}".`, {
      context: { query, status, ...(retryAfterMs !== undefined ? { retryAfterMs } : {}) },
      cause: error,
    });
  }

  if (status === 401 || status === 403) {
    return apiError("API_UNAUTHORIZED", `GitHub rejected the credential (HTTP ${status}).`, {
      severity: "fatal",
      context: { query, status },
      cause: error,
    });
  }

  if (status === undefined || (status === 500 && !isRecord(readField(error, "response")))) {
    if (hasGraphqlErrors(error)) {
      return apiError("API_REQUEST_FAILED", `GitHub search failed for "${query}": ${detail}`, {
        context: { query },
        cause: error,
      });
    }
    return apiError("API_NETWORK_ERROR", `Could not reach GitHub while searching "${query}": ${detail}`, {
      context: { query },
      cause: error,
    });
  }

  return apiError("API_REQUEST_FAILED", `GitHub search failed for "${query}" (HTTP ${status}): ${detail}`, {
    context: { query, status },
    cause: error,
  });
}

function invalidResponse(query: string, error: z.ZodError): ShelfError {
  return apiError("API_RESPONSE_INVALID", `Unexpected search response for "${query}".`, {
    context: {
      query,
      issues: error.issues.map((issue) => ({
        message: issue.message,
        path: issue.path.join("."),
      })),
    },
  });
}

function isRateLimited(
  error: unknown,
  status: number | undefined,
  headers: Record<string, string>,
): boolean {
  if (status === 429) {
    return true;
  }

  if (status === 403) {
    return (
      headers["x-ratelimit-remaining"] === "0" ||
      headers["retry-after"] !== undefined ||
      /rate limit/i.test(describeError(error))
    );
  }

  const errors = readField(error, "errors");
  return (
    Array.isArray(errors) && errors.some((entry) => readField(entry, "type") === "RATE_LIMITED")
  );
}

function retryAfterFromHeaders(headers: Record<string, string>, now: number): number | undefined {
  const retryAfter = Number.parseInt(headers["retry-after"] ?? "", 10);
  if (Number.isFinite(retryAfter) && retryAfter >= 0) {
    return retryAfter * 1000;
  }

  const reset = Number.parseInt(headers["x-ratelimit-reset"] ?? "", 10);
  if (Number.isFinite(reset)) {
    return Math.max(0, reset * 1000 - now);
  }

  return undefined;
}

function hasGraphqlErrors(error: unknown): boolean {
  const errors = readField(error, "errors");
  return Array.isArray(errors) && errors.length > 0;
}

function readStatus(error: unknown): number | undefined {
  const status = readField(error, "status");
  return typeof status === "number" ? status : undefined;
}

function readHeaders(error: unknown): Record<string, string> {
  const headers = readField(readField(error, "response"), "headers");
  const result: Record<string, string> = {};
  if (!isRecord(headers)) {
    return result;
  }

  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string" || typeof value === "number") {
      result[key.toLowerCase()] = String(value);
    }
  }
  return result;
}

function readField(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
