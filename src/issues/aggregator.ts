import {
  apiError,
  configError,
  isShelfError,
  normalizeError,
  type ShelfError,
} from "../core/errors.js";
import type {
  AggregationReport,
  QueryFailure,
  RepoIssueSummary,
  SearchQuery,
} from "../core/types.js";
import { sleep } from "../core/utils.js";
import { runBounded } from "../orchestrator/pool.js";
import type { RepoIssueNode, SearchApi, SearchPage } from "./github-search.js";

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MAX_PAGES = 100;
export const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_CONCURRENCY = 4;
const DEFAULT_RETRY_BASE_DELAY_MS = 1_000;
const DEFAULT_MAX_RETRY_DELAY_MS = 60_000;

export interface AggregateOptions {
  token: string;
  pageSize?: number;
  /** Upper bound on pages fetched per query. */
  maxPages?: number;
  /** Retries per page, applied to rate-limit failures only. */
  maxRetries?: number;
  concurrency?: number;
  retryBaseDelayMs?: number;
  maxRetryDelayMs?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
  onQueryStart?: (query: SearchQuery) => void;
  onQuerySettled?: (query: SearchQuery, error: ShelfError | null) => void;
}

/**
 * Run every query against the search API and merge the repositories they
 * return into one list.
 *
 * Queries run concurrently, pages within a query strictly in order. When two
 * queries return the same repository, the query listed first wins; the
 * order in which the requests complete has no say. A failing query does not
 * stop the others and turns the report `partial`. When every query was
 * refused for its credential, the token itself is bad and that error is
 * thrown instead.
 */
export async function aggregateIssues(
  queries: readonly SearchQuery[],
  options: AggregateOptions,
  api: SearchApi,
): Promise<AggregationReport> {
  if (queries.length === 0) {
    throw configError("CONFIG_INVALID", "At least one search query is required.");
  }

  if (!options.token.trim()) {
    throw configError(
      "CREDENTIAL_MISSING",
      "GitHub token not found. Set GITHUB_TOKEN or GH_TOKEN, or run `gh auth login`.",
    );
  }

  const results = await runBounded(
    queries,
    (query, { signal }) => fetchQuery(query, options, api, signal),
    {
      concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
      signal: options.signal,
      timeoutMs: options.timeoutMs,
      normalizeError: (error) => normalizeError(error, "API_REQUEST_FAILED"),
      onStart: (query) => options.onQueryStart?.(query),
      onSettled: (result, query) =>
        options.onQuerySettled?.(query, result.status === "fulfilled" ? null : result.error),
    },
  );

  const seen = new Set<string>();
  const summaries: RepoIssueSummary[] = [];
  const failures: QueryFailure[] = [];

  for (const result of results) {
    const query = queries[result.index];
    if (result.status !== "fulfilled") {
      failures.push({ query, error: result.error });
      continue;
    }

    for (const summary of result.value) {
      const key = summary.url;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      summaries.push(summary);
    }
  }

  if (failures.length === 0) {
    return { status: "complete", summaries };
  }

  if (
    failures.length === queries.length &&
    failures.every((failure) => isShelfError(failure.error, "API_UNAUTHORIZED"))
  ) {
    throw failures[0].error;
  }

  const message = `${failures.length} of ${queries.length} search queries failed.`;
  return {
    status: "partial",
    summaries,
    failures,
    error: apiError("PARTIAL_AGGREGATION", message, {
      context: {
        failures: failures.map((failure) => ({
          query: failure.query.query,
          code: failure.error.code,
        })),
      },
      cause: new AggregateError(
        failures.map((failure) => failure.error),
        message,
      ),
    }),
  };
}

export function toRepoIssueSummary(node: RepoIssueNode, query: SearchQuery): RepoIssueSummary {
  return {
    url: node.url,
    name: node.name,
    nameWithOwner: node.nameWithOwner,
    defaultBranch: node.defaultBranchRef?.name ?? null,
    defaultBranchHead: node.defaultBranchRef?.target?.oid ?? null,
    latestRelease: node.latestRelease
      ? { name: node.latestRelease.name, publishedAt: node.latestRelease.publishedAt }
      : null,
    openIssues: node.issues.totalCount,
    openPullRequests: node.pullRequests.totalCount,
    label: query.label,
    query: query.query,
  };
}

async function fetchQuery(
  query: SearchQuery,
  options: AggregateOptions,
  api: SearchApi,
  signal: AbortSignal,
): Promise<RepoIssueSummary[]> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const summaries: RepoIssueSummary[] = [];
  let after: string | null = null;

  for (let page = 0; page < maxPages; page += 1) {
    const result = await fetchPage(query, after, options, api, signal);
    for (const node of result.repositories) {
      summaries.push(toRepoIssueSummary(node, query));
    }

    if (!result.hasNextPage || result.repositories.length === 0 || !result.endCursor) {
      break;
    }
    after = result.endCursor;
  }

  return summaries;
}

async function fetchPage(
  query: SearchQuery,
  after: string | null,
  options: AggregateOptions,
  api: SearchApi,
  signal: AbortSignal,
): Promise<SearchPage> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await api.searchRepositories({
        query: query.query,
        first: options.pageSize ?? DEFAULT_PAGE_SIZE,
        after,
        signal,
      });
    } catch (error) {
      const failure = normalizeError(error, "API_REQUEST_FAILED", { query: query.query });
      if (failure.code !== "API_RATE_LIMITED" || attempt >= maxRetries || signal.aborted) {
        throw failure;
      }
      await sleep(retryDelayMs(failure, attempt, options), signal);
    }
  }
}

export function retryDelayMs(
  error: ShelfError,
  attempt: number,
  options: Pick<AggregateOptions, "retryBaseDelayMs" | "maxRetryDelayMs"> = {},
): number {
  const cap = options.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS;
  const hint = error.context?.retryAfterMs;
  if (typeof hint === "number" && hint >= 0) {
    return Math.min(hint, cap);
  }

  const base = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  return Math.min(base * 2 ** attempt, cap);
}
