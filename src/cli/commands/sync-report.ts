import type { ChalkInstance } from "chalk";

import {
  type LinkResult,
  type ShelfConfig,
  type SyncOutcome,
  type SyncStatus,
  systemError,
} from "../../core/index.js";
import { syncAll } from "../../orchestrator/index.js";
import { SimpleGitClient } from "../../repo/index.js";
import { type GlobalCliOptions, createLogger, createSpinner } from "../helpers.js";

const SKIP_REASON_TEXT = {
  "dirty-or-non-default-branch": "uncommitted changes or not on the default branch",
  "not-a-git-repository": "directory exists but is not a git repository",
  "no-remote": "remote is not configured",
  "empty-repository": "repository has no commits yet",
} as const;

const SYNC_STATUSES: readonly SyncStatus[] = ["cloned", "updated", "skipped", "diverged", "failed"];

/**
 * Sync `urls` with progress output, print the outcomes and set a failing
 * exit code when any repository failed. Ctrl-C cancels the run; repositories
 * not yet started are reported as cancelled.
 */
export async function runSyncCommand(
  urls: string[],
  config: ShelfConfig,
  globalOptions: Required<GlobalCliOptions>,
  ui: ChalkInstance,
): Promise<SyncOutcome[]> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort(systemError("RUN_CANCELLED", "Interrupted."));
  };
  process.once("SIGINT", onInterrupt);

  const spinner = createSpinner(
    globalOptions.json || globalOptions.quiet,
    `Syncing ${urls.length} repositor${urls.length === 1 ? "y" : "ies"}...`,
  );
  let settled = 0;

  let outcomes: SyncOutcome[];
  try {
    outcomes = await syncAll(
      urls,
      config,
      { git: new SimpleGitClient() },
      {
        signal: controller.signal,
        onSettled: () => {
          settled += 1;
          if (spinner) {
            spinner.text = `Syncing repositories (${settled}/${urls.length})...`;
          }
        },
      },
    );
  } catch (error) {
    spinner?.fail("Sync failed");
    throw error;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }

  const counts = countByStatus(outcomes);
  if (counts.failed > 0) {
    spinner?.warn(`Synced with ${counts.failed} failure(s)`);
    process.exitCode = 1;
  } else {
    spinner?.succeed("Sync complete");
  }

  if (globalOptions.json) {
    console.log(JSON.stringify({ outcomes: outcomes.map(toJsonOutcome), counts }, null, 2));
    return outcomes;
  }

  const log = createLogger(globalOptions);
  for (const outcome of outcomes) {
    if (outcome.status === "failed") {
      console.error(formatOutcome(ui, outcome, globalOptions.verbose));
    } else {
      log(formatOutcome(ui, outcome, globalOptions.verbose));
    }
  }
  log("");
  log(formatCounts(counts));

  return outcomes;
}

export function formatOutcome(ui: ChalkInstance, outcome: SyncOutcome, verbose = false): string {
  switch (outcome.status) {
    case "cloned":
      return withLinkWarning(
        ui,
        `${ui.green("cloned  ")} ${outcome.alias.name}${verbose ? ` -> ${outcome.path}` : ""}`,
        outcome.link,
      );
    case "updated": {
      const detail = outcome.fastForwarded
        ? ` (+${outcome.pulledCommits} commit${outcome.pulledCommits === 1 ? "" : "s"})`
        : "";
      const deleted =
        outcome.deletedBranches.length > 0
          ? `\n          deleted merged branches: ${outcome.deletedBranches.join(", ")}`
          : "";
      const pruneFailures = outcome.pruneFailures
        .map(
          (failure) =>
            `\n          ${ui.yellow(`could not delete ${failure.branch}: ${failure.error.message}`)}`,
        )
        .join("");
      const label = outcome.fastForwarded ? ui.green("updated ") : ui.dim("current ");
      return withLinkWarning(
        ui,
        `${label} ${outcome.alias.name}${detail}${deleted}${pruneFailures}`,
        outcome.link,
      );
    }
    case "skipped":
      return `${ui.yellow("skipped ")} ${outcome.url} (${SKIP_REASON_TEXT[outcome.reason]})`;
    case "diverged":
      return `${ui.yellow("diverged")} ${outcome.url} (ahead ${outcome.state.ahead}, behind ${outcome.state.behind})`;
    case "failed":
      return `${ui.red("failed  ")} ${outcome.url}: ${outcome.error.message}`;
  }
}

export function countByStatus(outcomes: readonly SyncOutcome[]): Record<SyncStatus, number> {
  const counts: Record<SyncStatus, number> = {
    cloned: 0,
    updated: 0,
    skipped: 0,
    diverged: 0,
    failed: 0,
  };
  for (const outcome of outcomes) {
    counts[outcome.status] += 1;
  }
  return counts;
}

export function toJsonOutcome(outcome: SyncOutcome): Record<string, unknown> {
  if (outcome.status === "updated") {
    return {
      ...outcome,
      pruneFailures: outcome.pruneFailures.map((failure) => ({
        branch: failure.branch,
        code: failure.error.code,
        message: failure.error.message,
      })),
    };
  }
  if (outcome.status !== "failed") {
    return { ...outcome };
  }
  return {
    ...outcome,
    error: {
      code: outcome.error.code,
      message: outcome.error.message,
      severity: outcome.error.severity,
    },
  };
}

function formatCounts(counts: Record<SyncStatus, number>): string {
  return SYNC_STATUSES.filter((status) => counts[status] > 0)
    .map((status) => `${counts[status]} ${status}`)
    .join(", ");
}

function withLinkWarning(ui: ChalkInstance, line: string, link: LinkResult): string {
  switch (link.status) {
    case "conflict":
      return `${line}\n          ${ui.yellow("alias not created: another file or link is in the way")}`;
    case "reserved":
      return `${line}\n          ${ui.yellow("alias not created: the name collides with the repo store")}`;
    default:
      return line;
  }
}
