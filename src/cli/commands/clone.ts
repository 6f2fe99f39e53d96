import { Command } from "commander";

import { createUi, getGlobalOptions, loadCliConfig } from "../helpers.js";
import { runSyncCommand } from "./sync-report.js";

export function createCloneCommand(): Command {
  const command = new Command("clone");

  command
    .description("Clone repositories into the workspace, or update them if already present")
    .argument("<url...>", "Remote URLs (https, ssh or git@host:owner/name)")
    .action(async (urls: string[], _options: Record<string, never>, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const config = await loadCliConfig(globalOptions, ui);

      await runSyncCommand(urls, config, globalOptions, ui);
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ reposhelf clone https://github.com/owner/repo
  $ reposhelf clone git@github.com:owner/repo.git github.com/owner/other`,
  );

  return command;
}
