import { constants as fsConstants } from "node:fs";
import { access, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

import {
  type ShelfError,
  isAbortError,
  normalizeError,
  repoError,
  systemError,
} from "../core/errors.js";
import type {
  AliasStyle,
  LinkResult,
  PruneFailure,
  RepoState,
  RepoTarget,
  SyncOutcome,
  WorkspaceAlias,
} from "../core/types.js";
import type { GitClient } from "./git.js";
import { ensureLink } from "./linker.js";
import { canonicalPath, isReservedAlias, workspaceAlias } from "./resolver.js";

export interface SyncOptions {
  baseDir: string;
  aliasStyle?: AliasStyle;
  remote?: string;
  /** Delete local branches already merged into the default branch (`git branch -d`). */
  pruneMergedBranches?: boolean;
  signal?: AbortSignal;
}

export interface SyncDependencies {
  git: GitClient;
  linker?: (aliasPath: string, targetPath: string) => Promise<LinkResult>;
}

/**
 * Clone a repository into its canonical path, or bring an existing clone up
 * to date without touching local work.
 *
 * Existing clones are only fetched and fast-forwarded when the working tree
 * is clean and the default branch is checked out. A default branch that has
 * diverged from upstream is reported, never reset. This function does not
 * throw: every failure becomes a `failed` outcome.
 *
 * Callers must not run two syncs against the same repository at once; there
 * is no lock on the repository subtree.
 */
export async function syncRepo(
  target: RepoTarget,
  options: SyncOptions,
  deps: SyncDependencies,
): Promise<SyncOutcome> {
  const path = canonicalPath(target.identity, options.baseDir);

  try {
    if (options.signal?.aborted) {
      throw systemError("RUN_CANCELLED", `Sync of ${target.url} was cancelled before it started.`);
    }

    const alias = workspaceAlias(target.identity, options.baseDir, options.aliasStyle);

    if (!(await pathExists(path))) {
      return await cloneAbsent(target, path, alias, options, deps);
    }

    return await refreshPresent(target, path, alias, options, deps);
  } catch (error) {
    return {
      status: "failed",
      url: target.url,
      target,
      path,
      error: toSyncError(error, target, path),
    };
  }
}

async function cloneAbsent(
  target: RepoTarget,
  path: string,
  alias: WorkspaceAlias,
  options: SyncOptions,
  deps: SyncDependencies,
): Promise<SyncOutcome> {
  await mkdirParent(path);
  await deps.git.clone(target.url, path, { signal: options.signal });

  const link = await linkAlias(alias, path, deps);
  return { status: "cloned", url: target.url, target, path, alias, link };
}

async function refreshPresent(
  target: RepoTarget,
  path: string,
  alias: WorkspaceAlias,
  options: SyncOptions,
  deps: SyncDependencies,
): Promise<SyncOutcome> {
  const { git } = deps;
  const remote = options.remote ?? "origin";

  if (!(await git.isRepository(path))) {
    return { status: "skipped", url: target.url, target, path, reason: "not-a-git-repository" };
  }

  if (!(await git.hasRemote(path, remote))) {
    return { status: "skipped", url: target.url, target, path, reason: "no-remote" };
  }

  if (!(await git.hasCommits(path))) {
    return { status: "skipped", url: target.url, target, path, reason: "empty-repository" };
  }

  const currentBranch = await git.currentBranch(path);
  const defaultBranch = await git.defaultBranch(path, remote);
  const isClean = await git.isClean(path);

  const state: RepoState = {
    existsOnDisk: true,
    currentBranch,
    defaultBranch,
    isClean,
    ahead: 0,
    behind: 0,
  };

  if (!isClean || currentBranch !== defaultBranch) {
    return {
      status: "skipped",
      url: target.url,
      target,
      path,
      reason: "dirty-or-non-default-branch",
      state,
    };
  }

  await git.fetch(path, remote, { signal: options.signal });

  const upstream = `${remote}/${defaultBranch}`;
  const { ahead, behind } = await git.aheadBehind(path, defaultBranch, upstream);
  state.ahead = ahead;
  state.behind = behind;

  if (ahead > 0 && behind > 0) {
    return { status: "diverged", url: target.url, target, path, state };
  }

  let fastForwarded = false;
  if (behind > 0) {
    await git.fastForward(path, defaultBranch, upstream);
    fastForwarded = true;
  }

  const link = await linkAlias(alias, path, deps);
  const pruned: PruneResult = options.pruneMergedBranches
    ? await pruneMergedBranches(git, path, defaultBranch)
    : { deleted: [], failures: [] };

  return {
    status: "updated",
    url: target.url,
    target,
    path,
    alias,
    link,
    state,
    fastForwarded,
    pulledCommits: behind,
    deletedBranches: pruned.deleted,
    pruneFailures: pruned.failures,
  };
}

interface PruneResult {
  deleted: string[];
  failures: PruneFailure[];
}

/** A branch that cannot be deleted is recorded and the rest are still tried. */
async function pruneMergedBranches(
  git: GitClient,
  path: string,
  defaultBranch: string,
): Promise<PruneResult> {
  const merged = await git.mergedBranches(path, defaultBranch);
  const result: PruneResult = { deleted: [], failures: [] };

  for (const branch of merged) {
    if (branch === defaultBranch) {
      continue;
    }
    try {
      await git.deleteBranch(path, branch);
      result.deleted.push(branch);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      result.failures.push({
        branch,
        error: normalizeError(error, "GIT_OPERATION_FAILED", { path, branch }),
      });
    }
  }

  return result;
}

async function linkAlias(
  alias: WorkspaceAlias,
  path: string,
  deps: SyncDependencies,
): Promise<LinkResult> {
  if (isReservedAlias(alias)) {
    return { status: "reserved" };
  }
  const link = deps.linker ?? ensureLink;
  return link(alias.path, path);
}

async function mkdirParent(path: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
  } catch (error) {
    throw repoError("IO_ERROR", `Failed to create "${dirname(path)}".`, {
      context: { path: dirname(path) },
      cause: error,
    });
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

function toSyncError(error: unknown, target: RepoTarget, path: string): ShelfError {
  return normalizeError(error, "GIT_OPERATION_FAILED", { url: target.url, path });
}
