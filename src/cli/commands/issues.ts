import type { ChalkInstance } from "chalk";
import Table from "cli-table3";
import { Command } from "commander";

import type { AggregationReport, RepoIssueSummary, SearchQuery } from "../../core/index.js";
import { GitHubSearchApi } from "../../issues/index.js";
import { aggregate } from "../../orchestrator/index.js";
import { findGitHubCredential } from "../github-auth.js";
import {
  createSpinner,
  createUi,
  formatInteger,
  getGlobalOptions,
  loadCliConfig,
  parseInteger,
  truncate,
} from "../helpers.js";

interface IssuesCommandOptions {
  pageSize?: number;
  maxPages?: number;
}

export function createIssuesCommand(): Command {
  const command = new Command("issues");

  command
    .description("Count open issues and pull requests across repositories matched by search queries")
    .argument("[query...]", "GitHub search queries (default: github.query/queries/username from config)")
    .option("--page-size <n>", "Repositories per page (1-100)", parseInteger)
    .option("--max-pages <n>", "Maximum pages per query", parseInteger)
    .action(async (queryArgs: string[], options: IssuesCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const config = await loadCliConfig(globalOptions, ui, queryArgs.length === 0);

      const queries: SearchQuery[] | undefined =
        queryArgs.length > 0 ? queryArgs.map((query) => ({ query, label: query })) : undefined;
      const token = findGitHubCredential()?.token ?? "";

      const spinner = createSpinner(globalOptions.json || globalOptions.quiet, "Searching GitHub...");
      let report: AggregationReport;
      try {
        report = await aggregate(
          config,
          token,
          new GitHubSearchApi({ token, apiUrl: config.github.apiUrl }),
          {
            queries,
            pageSize: options.pageSize,
            maxPages: options.maxPages,
            onQuerySettled: (query, error) => {
              if (spinner && error === null) {
                spinner.text = `Searched "${truncate(query.query, 40)}"`;
              }
            },
          },
        );
      } catch (error) {
        spinner?.fail("Search failed");
        throw error;
      }

      if (report.status === "partial") {
        spinner?.warn(report.error.message);
        process.exitCode = 1;
      } else {
        spinner?.succeed(`Found ${formatInteger(report.summaries.length)} repositories`);
      }

      if (globalOptions.json) {
        console.log(JSON.stringify(toJsonReport(report), null, 2));
        return;
      }

      if (!globalOptions.quiet) {
        renderSummaries(ui, report.summaries);
      }

      if (report.status === "partial") {
        for (const failure of report.failures) {
          console.error(ui.red(`[${failure.error.code}] ${failure.query.label}: ${failure.error.message}`));
        }
      }
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ reposhelf issues
  $ reposhelf issues "org:my-org archived:false"
  $ reposhelf issues --max-pages 1 --json`,
  );

  return command;
}

export function renderSummaries(ui: ChalkInstance, summaries: readonly RepoIssueSummary[]): void {
  if (summaries.length === 0) {
    console.log(ui.yellow("No repositories matched."));
    return;
  }

  for (const [label, group] of groupByLabel(summaries)) {
    console.log(ui.bold(label));
    const table = new Table({
      head: ["Issues", "PRs", "Branch", "Release", "URL"],
    });
    for (const summary of group) {
      table.push([
        String(summary.openIssues),
        String(summary.openPullRequests),
        summary.defaultBranch ?? "",
        summary.latestRelease?.name ?? "",
        summary.url,
      ]);
    }
    console.log(table.toString());
  }
}

/** Groups keep the order in which their labels first appear. */
export function groupByLabel(
  summaries: readonly RepoIssueSummary[],
): Map<string, RepoIssueSummary[]> {
  const groups = new Map<string, RepoIssueSummary[]>();
  for (const summary of summaries) {
    const group = groups.get(summary.label);
    if (group) {
      group.push(summary);
    } else {
      groups.set(summary.label, [summary]);
    }
  }
  return groups;
}

function toJsonReport(report: AggregationReport): Record<string, unknown> {
  if (report.status === "complete") {
    return { status: report.status, summaries: report.summaries };
  }

  return {
    status: report.status,
    summaries: report.summaries,
    failures: report.failures.map((failure) => ({
      query: failure.query.query,
      label: failure.query.label,
      code: failure.error.code,
      message: failure.error.message,
    })),
  };
}
