import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { Command } from "commander";

import {
  DEFAULT_BASE_DIR,
  DEFAULT_CD_SHIM,
  type ShelfConfigInput,
  configError,
  isRecord,
  loadConfig,
} from "../../core/index.js";
import { createLogger, createUi, getGlobalOptions } from "../helpers.js";

interface InitCommandOptions {
  baseDir?: string;
  username?: string;
}

export function createInitCommand(): Command {
  const command = new Command("init");

  command
    .description("Write a default configuration file")
    .option("--base-dir <path>", "Workspace base directory", DEFAULT_BASE_DIR)
    .option("--username <login>", "GitHub user whose public repositories `issues` lists")
    .action(async (options: InitCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const log = createLogger(globalOptions);

      const config = buildDefaultConfig(options);
      // Reject bad flags before anything touches the disk.
      loadConfig(config);

      await writeConfigFile(globalOptions.config, config);

      if (globalOptions.json) {
        console.log(JSON.stringify({ configPath: globalOptions.config, config }, null, 2));
        return;
      }

      log(ui.green(`Created: ${globalOptions.config}`));
      log("");
      log("Next steps:");
      log(`  ${ui.blue("reposhelf clone <url>")}    Clone a repository into the workspace`);
      log(`  ${ui.blue('eval "$(reposhelf shims)"')} Add the cd helper to your shell`);
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ reposhelf init
  $ reposhelf init --base-dir ~/src --username octocat`,
  );

  return command;
}

export function buildDefaultConfig(options: InitCommandOptions = {}): ShelfConfigInput {
  return {
    workspace: {
      baseDir: options.baseDir ?? DEFAULT_BASE_DIR,
      aliasStyle: "owner/name",
    },
    sync: {
      repos: [],
      concurrency: 4,
    },
    github: options.username ? { username: options.username } : {},
    shell: {
      cdShim: DEFAULT_CD_SHIM,
    },
  };
}

/** Refuses to overwrite an existing file. */
export async function writeConfigFile(configPath: string, config: ShelfConfigInput): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });

  try {
    await writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, {
      encoding: "utf8",
      flag: "wx",
    });
  } catch (error) {
    if (isRecord(error) && error.code === "EEXIST") {
      throw configError(
        "CONFIG_EXISTS",
        `${configPath} already exists. Remove it first or pass --config to write elsewhere.`,
        { context: { configPath } },
      );
    }
    throw error;
  }
}
