import { readFileSync } from "node:fs";

import { Command } from "commander";

import { createCloneCommand } from "./commands/clone.js";
import { createCompletionCommand } from "./commands/completion.js";
import { createDoctorCommand } from "./commands/doctor.js";
import { createEditCommand } from "./commands/edit.js";
import { createInitCommand } from "./commands/init.js";
import { createIssuesCommand } from "./commands/issues.js";
import { createListCommand } from "./commands/list.js";
import { createPathCommand } from "./commands/path.js";
import { createRefreshCommand } from "./commands/refresh.js";
import { createShimsCommand } from "./commands/shims.js";

export interface GlobalCliOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  color?: boolean;
}

function registerCommands(program: Command): void {
  program.addCommand(createInitCommand());
  program.addCommand(createCloneCommand());
  program.addCommand(createRefreshCommand());
  program.addCommand(createIssuesCommand());
  program.addCommand(createListCommand());
  program.addCommand(createPathCommand());
  program.addCommand(createShimsCommand());
  program.addCommand(createEditCommand());
  program.addCommand(createDoctorCommand());
  program.addCommand(createCompletionCommand());
}

export function readPackageVersion(): string {
  try {
    const raw = readFileSync(new URL("../../package.json", import.meta.url), "utf8");
    const payload: unknown = JSON.parse(raw);
    if (typeof payload === "object" && payload !== null && "version" in payload) {
      return typeof payload.version === "string" ? payload.version : "0.0.0";
    }
  } catch {
    // running from an unpacked bundle without package.json
  }
  return "0.0.0";
}

export async function createCliProgram(): Promise<Command> {
  const program = new Command();
  program
    .name("reposhelf")
    .description("Keep a shelf of git repositories in one canonical layout")
    .version(readPackageVersion())
    .option("--config <path>", "Config file path (default: $REPOSHELF_CONFIG_PATH or ~/.reposhelf.json)")
    .option("--verbose", "Enable verbose logging", false)
    .option("--quiet", "Suppress non-error output", false)
    .option("--json", "Output machine-readable JSON", false)
    .option("--no-color", "Disable ANSI colors");

  registerCommands(program);

  program.addHelpText(
    "after",
    `\nGetting Started:\n  $ reposhelf init                        Write ~/.reposhelf.json\n  $ reposhelf clone <url>                 Clone into <baseDir>/repo/<host>/<owner>/<name>\n  $ reposhelf refresh --all               Fast-forward every clean clone\n  $ eval "$(reposhelf shims)"             Add the cd helper to your shell\n`,
  );

  return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  const program = await createCliProgram();
  await program.parseAsync([...argv]);
}
