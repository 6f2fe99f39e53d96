import { Command } from "commander";

import { resolvePath } from "../../orchestrator/index.js";
import { createUi, getGlobalOptions, loadCliConfig } from "../helpers.js";

export function createPathCommand(): Command {
  const command = new Command("path");

  command
    .description("Print the directory of a workspace repository")
    .argument("<name>", "owner/name, name, or a remote URL")
    .action(async (name: string, _options: Record<string, never>, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const config = await loadCliConfig(globalOptions, ui);

      const path = await resolvePath(config, name);
      console.log(globalOptions.json ? JSON.stringify({ name, path }) : path);
    });

  return command;
}
