import { Command } from "commander";

import { cdShim } from "../../repo/index.js";
import { createUi, getGlobalOptions, loadCliConfig } from "../helpers.js";

export function createShimsCommand(): Command {
  const command = new Command("shims");

  command
    .description("Print shell functions to source from your shell rc file")
    .action(async (_options: Record<string, never>, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const config = await loadCliConfig(globalOptions, ui);

      process.stdout.write(cdShim(config.shell.cdShim));
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ echo 'eval "$(reposhelf shims)"' >> ~/.zshrc
  $ rscd owner/repo`,
  );

  return command;
}
