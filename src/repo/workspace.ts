import type { Dirent } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import { isAbsolute, join, relative, sep } from "node:path";

import { type ShelfError, repoError } from "../core/errors.js";
import type { RemoteIdentity } from "../core/types.js";
import { isNotFound } from "./linker.js";
import { CANONICAL_STORE_DIR, canonicalPath, tryParseRemoteUrl } from "./resolver.js";

export interface WorkspaceRepo {
  /** Alias relative to the base directory, e.g. `owner/name`. */
  alias: string;
  aliasPath: string;
  canonicalPath: string;
  identity: RemoteIdentity;
}

export interface WorkspaceListing {
  repos: WorkspaceRepo[];
  errors: ShelfError[];
}

/**
 * Find the workspace aliases under `baseDir`: symlinks at depth one (`name`
 * style) or two (`owner/name` style) that resolve into the canonical store.
 * Symlinks pointing anywhere else are not ours and are ignored.
 */
export async function listWorkspaceRepos(baseDir: string): Promise<WorkspaceListing> {
  const listing: WorkspaceListing = { repos: [], errors: [] };
  const storeRoot = await realpathOrNull(join(baseDir, CANONICAL_STORE_DIR));
  if (!storeRoot) {
    return listing;
  }

  for (const entry of await readDirEntries(baseDir)) {
    if (entry.name === CANONICAL_STORE_DIR) {
      continue;
    }

    const entryPath = join(baseDir, entry.name);
    if (entry.isSymbolicLink()) {
      await collectAlias(listing, storeRoot, baseDir, entryPath);
      continue;
    }

    if (!entry.isDirectory()) {
      continue;
    }

    for (const nested of await readDirEntries(entryPath)) {
      if (nested.isSymbolicLink()) {
        await collectAlias(listing, storeRoot, baseDir, join(entryPath, nested.name));
      }
    }
  }

  listing.repos.sort((left, right) => left.alias.localeCompare(right.alias));
  return listing;
}

/**
 * Resolve a workspace name (`owner/name`, `name`, or a remote URL) to the
 * real directory of its clone.
 */
export async function resolveWorkspacePath(baseDir: string, name: string): Promise<string> {
  const trimmed = name.trim();
  if (!trimmed) {
    throw repoError("REPO_NOT_FOUND", "Repository name cannot be empty.");
  }

  if (!isAbsolute(trimmed) && !trimmed.split(/[\\/]/).includes("..")) {
    const aliasDir = await directoryRealpath(join(baseDir, trimmed));
    if (aliasDir) {
      return aliasDir;
    }
  }

  const identity = tryParseRemoteUrl(trimmed);
  if (identity) {
    const storeDir = await directoryRealpath(canonicalPath(identity, baseDir));
    if (storeDir) {
      return storeDir;
    }
  }

  throw repoError("REPO_NOT_FOUND", `${join(baseDir, trimmed)} is not a git repository`, {
    context: { baseDir, name: trimmed },
  });
}

/** Shell function that changes into a workspace repository by name. */
export function cdShim(functionName: string, binName = "reposhelf"): string {
  return `function ${functionName}() { local p=$(${binName} path "$1") && cd "$p" }\n`;
}

async function collectAlias(
  listing: WorkspaceListing,
  storeRoot: string,
  baseDir: string,
  aliasPath: string,
): Promise<void> {
  const alias = relative(baseDir, aliasPath).split(sep).join("/");
  const resolved = await realpathOrNull(aliasPath);
  if (!resolved) {
    listing.errors.push(
      repoError("LINK_CONFLICT", `Workspace alias "${alias}" points to a missing directory.`, {
        severity: "warning",
        context: { aliasPath },
      }),
    );
    return;
  }

  const segments = relative(storeRoot, resolved).split(sep);
  if (segments.length !== 3 || segments.some((segment) => segment === ".." || segment === "")) {
    return;
  }

  const [host, owner, name] = segments;
  listing.repos.push({
    alias,
    aliasPath,
    canonicalPath: resolved,
    identity: Object.freeze({ host, owner, name }),
  });
}

async function readDirEntries(path: string): Promise<Dirent[]> {
  try {
    return await readdir(path, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw repoError("IO_ERROR", `Failed to read directory "${path}".`, {
      context: { path },
      cause: error,
    });
  }
}

async function directoryRealpath(path: string): Promise<string | null> {
  const resolved = await realpathOrNull(path);
  if (!resolved) {
    return null;
  }
  const info = await stat(resolved);
  return info.isDirectory() ? resolved : null;
}

async function realpathOrNull(path: string): Promise<string | null> {
  try {
    return await realpath(path);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw repoError("IO_ERROR", `Failed to resolve "${path}".`, {
      context: { path },
      cause: error,
    });
  }
}
