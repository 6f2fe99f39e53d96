import { Command } from "commander";

import { configError } from "../../core/index.js";
import { workspaceTargets } from "../../orchestrator/index.js";
import { createUi, getGlobalOptions, loadCliConfig } from "../helpers.js";
import { runSyncCommand } from "./sync-report.js";

interface RefreshCommandOptions {
  all?: boolean;
}

export function createRefreshCommand(): Command {
  const command = new Command("refresh");

  command
    .description("Fast-forward clean clones on their default branch")
    .argument("[url...]", "Remote URLs to refresh (default: sync.repos from config)")
    .option("--all", "Refresh every repository linked into the workspace", false)
    .action(async (urls: string[], options: RefreshCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const config = await loadCliConfig(globalOptions, ui);

      let targets = urls;
      if (options.all) {
        const workspace = await workspaceTargets(config);
        if (globalOptions.verbose) {
          for (const warning of workspace.warnings) {
            console.warn(ui.yellow(`[reposhelf] ${warning.message}`));
          }
        }
        targets = [...new Set([...urls, ...workspace.urls])];
      } else if (targets.length === 0) {
        targets = config.sync.repos;
      }

      if (targets.length === 0) {
        throw configError(
          "CONFIG_INVALID",
          "Nothing to refresh. Pass URLs, list them under sync.repos, or use --all.",
        );
      }

      await runSyncCommand(targets, config, globalOptions, ui);
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ reposhelf refresh
  $ reposhelf refresh --all
  $ reposhelf refresh https://github.com/owner/repo`,
  );

  return command;
}
