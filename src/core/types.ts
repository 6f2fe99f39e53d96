import type { ShelfError } from "./errors.js";

/**
 * Identity of a remote repository. Two URLs that point at the same remote
 * (differing only in scheme, `.git` suffix or host case) produce equal
 * identities.
 */
export interface RemoteIdentity {
  readonly host: string;
  readonly owner: string;
  readonly name: string;
}

export interface RepoTarget {
  /** URL as given by the user; this is what gets cloned. */
  url: string;
  identity: RemoteIdentity;
}

export type AliasStyle = "owner/name" | "name";

export interface WorkspaceAlias {
  name: string;
  path: string;
}

export interface RepoState {
  existsOnDisk: boolean;
  currentBranch: string | null;
  defaultBranch: string | null;
  isClean: boolean;
  ahead: number;
  behind: number;
}

/**
 * `reserved`: the alias would land on the canonical store directory itself
 * (an owner or name of `repo`), so no link was made.
 */
export type LinkResult =
  | { status: "created" }
  | { status: "unchanged" }
  | { status: "conflict"; existing: string | null }
  | { status: "reserved" };

export type SkipReason =
  | "dirty-or-non-default-branch"
  | "not-a-git-repository"
  | "no-remote"
  | "empty-repository";

/** A merged branch that `git branch -d` refused to delete. */
export interface PruneFailure {
  branch: string;
  error: ShelfError;
}

interface SyncOutcomeBase {
  /** URL as requested by the caller. */
  url: string;
  target: RepoTarget;
  path: string;
}

export interface ClonedOutcome extends SyncOutcomeBase {
  status: "cloned";
  alias: WorkspaceAlias;
  link: LinkResult;
}

export interface UpdatedOutcome extends SyncOutcomeBase {
  status: "updated";
  alias: WorkspaceAlias;
  link: LinkResult;
  state: RepoState;
  fastForwarded: boolean;
  pulledCommits: number;
  deletedBranches: string[];
  pruneFailures: PruneFailure[];
}

export interface SkippedOutcome extends SyncOutcomeBase {
  status: "skipped";
  reason: SkipReason;
  state?: RepoState;
}

export interface DivergedOutcome extends SyncOutcomeBase {
  status: "diverged";
  state: RepoState;
}

export interface FailedOutcome {
  status: "failed";
  url: string;
  /** `null` when the URL itself could not be parsed. */
  target: RepoTarget | null;
  path: string | null;
  error: ShelfError;
}

export type SyncOutcome =
  | ClonedOutcome
  | UpdatedOutcome
  | SkippedOutcome
  | DivergedOutcome
  | FailedOutcome;

export type SyncStatus = SyncOutcome["status"];

export interface SearchQuery {
  query: string;
  label: string;
}

export interface LatestRelease {
  name: string | null;
  publishedAt: string | null;
}

export interface RepoIssueSummary {
  url: string;
  name: string;
  nameWithOwner: string;
  defaultBranch: string | null;
  defaultBranchHead: string | null;
  latestRelease: LatestRelease | null;
  openIssues: number;
  openPullRequests: number;
  /** Label of the query that first matched this repository. */
  label: string;
  query: string;
}

export type AggregationResult = RepoIssueSummary[];

export interface QueryFailure {
  query: SearchQuery;
  error: ShelfError;
}

export type AggregationReport =
  | { status: "complete"; summaries: AggregationResult }
  | {
      status: "partial";
      summaries: AggregationResult;
      failures: QueryFailure[];
      error: ShelfError;
    };
