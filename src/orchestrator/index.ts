import { mkdir } from "node:fs/promises";

import { type ShelfConfig, resolveQueries } from "../core/config.js";
import { type ShelfError, configError, normalizeError } from "../core/errors.js";
import type {
  AggregationReport,
  FailedOutcome,
  LinkResult,
  RepoTarget,
  SearchQuery,
  SyncOutcome,
} from "../core/types.js";
import { resolveUserPath } from "../core/utils.js";
import { aggregateIssues } from "../issues/aggregator.js";
import type { SearchApi } from "../issues/github-search.js";
import type { GitClient } from "../repo/git.js";
import { canonicalPath, toRepoTarget, tryParseRemoteUrl } from "../repo/resolver.js";
import { syncRepo } from "../repo/sync.js";
import { listWorkspaceRepos, resolveWorkspacePath } from "../repo/workspace.js";
import { type UnitResult, runBounded } from "./pool.js";

export { runBounded, type RunBoundedOptions, type UnitContext, type UnitResult } from "./pool.js";

export interface SyncAllDependencies {
  git: GitClient;
  linker?: (aliasPath: string, targetPath: string) => Promise<LinkResult>;
}

export interface SyncAllHooks {
  signal?: AbortSignal;
  onStart?: (url: string) => void;
  onSettled?: (outcome: SyncOutcome) => void;
}

export interface AggregateHooks {
  signal?: AbortSignal;
  /** Overrides the queries derived from `github` config. */
  queries?: SearchQuery[];
  pageSize?: number;
  maxPages?: number;
  onQueryStart?: (query: SearchQuery) => void;
  onQuerySettled?: (query: SearchQuery, error: ShelfError | null) => void;
}

export interface WorkspaceTargets {
  urls: string[];
  warnings: ShelfError[];
}

/**
 * Sync every URL with at most `sync.concurrency` repositories in flight.
 * Outcomes come back in the order of `urls`. Only an unusable base
 * directory is thrown; everything else is a `failed` outcome.
 */
export async function syncAll(
  urls: readonly string[],
  config: ShelfConfig,
  deps: SyncAllDependencies,
  hooks: SyncAllHooks = {},
): Promise<SyncOutcome[]> {
  const baseDir = await prepareBaseDir(config.workspace.baseDir);

  const toOutcome = (result: UnitResult<SyncOutcome>, url: string): SyncOutcome =>
    result.status === "fulfilled" ? result.value : failedOutcome(url, result.error, baseDir);

  const results = await runBounded(
    urls,
    async (url, { signal }) => {
      let target: RepoTarget;
      try {
        target = toRepoTarget(url);
      } catch (error) {
        return failedOutcome(url, normalizeError(error, "URL_PARSE_FAILED", { url }), baseDir);
      }

      return syncRepo(
        target,
        {
          baseDir,
          aliasStyle: config.workspace.aliasStyle,
          remote: config.sync.remote,
          pruneMergedBranches: config.sync.pruneMergedBranches,
          signal,
        },
        deps,
      );
    },
    {
      concurrency: config.sync.concurrency,
      signal: hooks.signal,
      timeoutMs: config.sync.timeoutMs,
      normalizeError: (error) => normalizeError(error, "GIT_OPERATION_FAILED"),
      onStart: (url) => hooks.onStart?.(url),
      onSettled: (result, url) => hooks.onSettled?.(toOutcome(result, url)),
    },
  );

  return results.map((result) => toOutcome(result, urls[result.index]));
}

/** Aggregate open issue and pull request counts for the configured queries. */
export async function aggregate(
  config: ShelfConfig,
  token: string,
  api: SearchApi,
  hooks: AggregateHooks = {},
): Promise<AggregationReport> {
  const queries = hooks.queries ?? resolveQueries(config.github);

  return aggregateIssues(
    queries,
    {
      token,
      pageSize: hooks.pageSize ?? config.github.pageSize,
      maxPages: hooks.maxPages ?? config.github.maxPages,
      maxRetries: config.github.maxRetries,
      concurrency: config.github.concurrency,
      timeoutMs: config.github.timeoutMs,
      signal: hooks.signal,
      onQueryStart: hooks.onQueryStart,
      onQuerySettled: hooks.onQuerySettled,
    },
    api,
  );
}

export async function resolvePath(config: ShelfConfig, name: string): Promise<string> {
  return resolveWorkspacePath(resolveUserPath(config.workspace.baseDir), name);
}

/**
 * Remote URLs for every repository linked into the workspace. The URL is
 * rebuilt from the canonical path; an existing clone is only fetched from
 * its own remote, so the scheme never matters.
 */
export async function workspaceTargets(config: ShelfConfig): Promise<WorkspaceTargets> {
  const listing = await listWorkspaceRepos(resolveUserPath(config.workspace.baseDir));
  const urls = new Set<string>();
  for (const repo of listing.repos) {
    const { host, owner, name } = repo.identity;
    urls.add(`https://${host}/${owner}/${name}`);
  }
  return { urls: [...urls], warnings: listing.errors };
}

async function prepareBaseDir(baseDir: string): Promise<string> {
  if (!baseDir.trim()) {
    throw configError("BASE_DIR_UNRESOLVABLE", "workspace.baseDir is empty.");
  }

  const resolved = resolveUserPath(baseDir);
  try {
    await mkdir(resolved, { recursive: true });
  } catch (error) {
    throw configError("BASE_DIR_UNRESOLVABLE", `Cannot use "${resolved}" as the base directory.`, {
      context: { baseDir: resolved },
      cause: error,
    });
  }
  return resolved;
}

function failedOutcome(url: string, error: ShelfError, baseDir: string): FailedOutcome {
  const identity = tryParseRemoteUrl(url);
  return {
    status: "failed",
    url,
    target: identity ? { url: url.trim(), identity } : null,
    path: identity ? canonicalPath(identity, baseDir) : null,
    error,
  };
}
