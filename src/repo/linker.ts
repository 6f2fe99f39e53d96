import { lstat, mkdir, readlink, realpath, symlink } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import { repoError } from "../core/errors.js";
import type { LinkResult } from "../core/types.js";

/**
 * Make `aliasPath` a symlink to `targetPath`.
 *
 * - missing alias: parent directories and the link are created
 * - alias already resolving to the target: nothing happens
 * - anything else at `aliasPath`: reported as a conflict and left untouched
 *
 * Filesystem failures throw a `ShelfError` with code `IO_ERROR`.
 */
export async function ensureLink(aliasPath: string, targetPath: string): Promise<LinkResult> {
  const existing = await lstatOrNull(aliasPath);

  if (!existing) {
    try {
      await mkdir(dirname(aliasPath), { recursive: true });
      await symlink(targetPath, aliasPath, "dir");
    } catch (error) {
      throw repoError("IO_ERROR", `Failed to create symlink "${aliasPath}" -> "${targetPath}".`, {
        context: { aliasPath, targetPath },
        cause: error,
      });
    }
    return { status: "created" };
  }

  if (!existing.isSymbolicLink()) {
    return { status: "conflict", existing: null };
  }

  const linkValue = await readLinkValue(aliasPath);
  const [resolvedAlias, resolvedTarget] = await Promise.all([
    realpathOrNull(aliasPath),
    realpathOrNull(targetPath),
  ]);

  if (resolvedAlias !== null && resolvedAlias === resolvedTarget) {
    return { status: "unchanged" };
  }

  // Dangling links are compared by their literal destination.
  if (resolvedAlias === null && resolve(dirname(aliasPath), linkValue) === resolve(targetPath)) {
    return { status: "unchanged" };
  }

  return { status: "conflict", existing: linkValue };
}

async function lstatOrNull(path: string) {
  try {
    return await lstat(path);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw repoError("IO_ERROR", `Failed to inspect "${path}".`, {
      context: { path },
      cause: error,
    });
  }
}

async function readLinkValue(path: string): Promise<string> {
  try {
    return await readlink(path);
  } catch (error) {
    throw repoError("IO_ERROR", `Failed to read symlink "${path}".`, {
      context: { path },
      cause: error,
    });
  }
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

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
