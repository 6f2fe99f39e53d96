import { Command } from "commander";

import { resolveUserPath } from "../../core/index.js";
import { listWorkspaceRepos } from "../../repo/index.js";
import { createUi, getGlobalOptions, loadCliConfig } from "../helpers.js";

interface ListCommandOptions {
  path?: boolean;
  full?: boolean;
}

export function createListCommand(): Command {
  const command = new Command("list");

  command
    .description("List repositories linked into the workspace")
    .option("--path", "Print the canonical directory instead of the alias", false)
    .option("--full", "Print host/owner/name instead of the alias", false)
    .action(async (options: ListCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const config = await loadCliConfig(globalOptions, ui);

      const listing = await listWorkspaceRepos(resolveUserPath(config.workspace.baseDir));

      if (globalOptions.verbose) {
        for (const warning of listing.errors) {
          console.warn(ui.yellow(`[reposhelf] ${warning.message}`));
        }
      }

      if (globalOptions.json) {
        console.log(JSON.stringify(listing.repos, null, 2));
        return;
      }

      for (const repo of listing.repos) {
        if (options.path) {
          console.log(repo.canonicalPath);
        } else if (options.full) {
          console.log(`${repo.identity.host}/${repo.identity.owner}/${repo.identity.name}`);
        } else {
          console.log(repo.alias);
        }
      }
    });

  return command;
}
