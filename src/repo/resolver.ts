import { join } from "node:path";

import { repoError } from "../core/errors.js";
import type { AliasStyle, RemoteIdentity, RepoTarget, WorkspaceAlias } from "../core/types.js";

/** `git@host:owner/name.git` and other scp-like forms (`user@host:path`). */
const SCP_LIKE_PATTERN = /^(?:[A-Za-z0-9_.-]+@)?(?<host>[A-Za-z0-9.-]+):(?!\/\/)(?<path>.+)$/;
/** `host/owner/name` without a scheme. */
const SCHEMELESS_PATTERN = /^(?<host>[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)+)\/(?<path>.+)$/;
const SEGMENT_PATTERN = /^[A-Za-z0-9_.-]+$/;
const SUPPORTED_PROTOCOLS = new Set(["https:", "http:", "ssh:", "git:"]);

export const CANONICAL_STORE_DIR = "repo";

/**
 * Parse a remote URL into its `{ host, owner, name }` identity.
 *
 * Accepts `https://host/owner/name[.git]`, `ssh://git@host[:port]/owner/name`,
 * `git@host:owner/name[.git]` and `host/owner/name`. The host is lower-cased
 * and a trailing `.git` or slash is dropped, so every spelling of the same
 * remote yields an identical identity. Segments past `owner/name` (for
 * example `/tree/main`) are ignored.
 */
export function parseRemoteUrl(input: string): RemoteIdentity {
  const normalized = input.trim();
  if (!normalized) {
    throw repoError("URL_PARSE_FAILED", "Repository URL cannot be empty.", {
      context: { url: input },
    });
  }

  const located = locateHostAndPath(normalized);
  if (!located) {
    throw repoError(
      "URL_PARSE_FAILED",
      `Cannot determine the host of repository URL "${input}".`,
      { context: { url: input } },
    );
  }

  const segments = located.path.split("/").filter(Boolean);
  if (segments.length < 2) {
    throw repoError(
      "URL_PARSE_FAILED",
      `Expected "owner/name" after the host in "${input}".`,
      { context: { url: input, host: located.host } },
    );
  }

  const owner = segments[0];
  const name = stripGitSuffix(segments[1]);
  if (!isSafeSegment(owner) || !isSafeSegment(name)) {
    throw repoError("URL_PARSE_FAILED", `Invalid owner or repository name in "${input}".`, {
      context: { url: input },
    });
  }

  return Object.freeze({
    host: located.host.toLowerCase(),
    owner,
    name,
  });
}

export function tryParseRemoteUrl(input: string): RemoteIdentity | null {
  try {
    return parseRemoteUrl(input);
  } catch {
    return null;
  }
}

export function toRepoTarget(url: string): RepoTarget {
  return { url: url.trim(), identity: parseRemoteUrl(url) };
}

/** `<baseDir>/repo/<host>/<owner>/<name>` */
export function canonicalPath(identity: RemoteIdentity, baseDir: string): string {
  return join(baseDir, CANONICAL_STORE_DIR, identity.host, identity.owner, identity.name);
}

export function aliasName(identity: RemoteIdentity, style: AliasStyle = "owner/name"): string {
  return style === "name" ? identity.name : `${identity.owner}/${identity.name}`;
}

export function workspaceAlias(
  identity: RemoteIdentity,
  baseDir: string,
  style: AliasStyle = "owner/name",
): WorkspaceAlias {
  const name = aliasName(identity, style);
  return { name, path: join(baseDir, ...name.split("/")) };
}

/**
 * An alias whose first segment is the canonical store directory would point
 * into the store itself. Compared case-insensitively for case-folding
 * filesystems.
 */
export function isReservedAlias(alias: WorkspaceAlias): boolean {
  const [first] = alias.name.split("/");
  return first.toLowerCase() === CANONICAL_STORE_DIR;
}

export function identityKey(identity: RemoteIdentity): string {
  return `${identity.host}/${identity.owner}/${identity.name}`;
}

export function sameIdentity(left: RemoteIdentity, right: RemoteIdentity): boolean {
  return identityKey(left) === identityKey(right);
}

function locateHostAndPath(input: string): { host: string; path: string } | null {
  if (input.includes("://")) {
    try {
      const url = new URL(input);
      if (!SUPPORTED_PROTOCOLS.has(url.protocol) || !url.hostname) {
        return null;
      }
      return { host: url.hostname, path: decodeURIComponent(url.pathname) };
    } catch {
      return null;
    }
  }

  const scpMatch = input.match(SCP_LIKE_PATTERN);
  if (scpMatch?.groups) {
    return { host: scpMatch.groups.host, path: scpMatch.groups.path };
  }

  const schemelessMatch = input.match(SCHEMELESS_PATTERN);
  if (schemelessMatch?.groups) {
    return { host: schemelessMatch.groups.host, path: schemelessMatch.groups.path };
  }

  return null;
}

function isSafeSegment(segment: string): boolean {
  return SEGMENT_PATTERN.test(segment) && segment !== "." && segment !== "..";
}

function stripGitSuffix(value: string): string {
  return value.replace(/\.git$/i, "");
}
