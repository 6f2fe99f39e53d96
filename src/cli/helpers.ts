import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { Command } from "commander";
import ora, { type Ora } from "ora";

import type { ShelfConfig } from "../core/index.js";
export type { GlobalCliOptions } from "./cli.js";
import type { GlobalCliOptions } from "./cli.js";
import { loadConfigFile, resolveConfigPath } from "./config-loader.js";

// ── Global options ──────────────────────────────────────────

export function getGlobalOptions(command: Command): Required<GlobalCliOptions> {
  const options = command.optsWithGlobals<GlobalCliOptions>();

  return {
    config: resolveConfigPath(options.config),
    verbose: options.verbose === true,
    quiet: options.quiet === true,
    json: options.json === true,
    color: options.color !== false,
  };
}

// ── UI helpers ──────────────────────────────────────────────

export function createUi(options: Required<GlobalCliOptions>): ChalkInstance {
  const noColorEnv = Object.prototype.hasOwnProperty.call(process.env, "NO_COLOR");
  const colorEnabled = options.color && !noColorEnv;

  return new Chalk({ level: colorEnabled ? chalk.level : 0 });
}

/**
 * Creates a spinner when output is interactive (non-JSON / non-quiet).
 * Pass `true` to suppress the spinner (e.g. in JSON output or quiet mode).
 */
export function createSpinner(suppress: boolean, text: string): Ora | null {
  if (suppress) {
    return null;
  }

  return ora({ text, color: "blue" }).start();
}

/** Prints unless `--quiet` or `--json` is set. */
export function createLogger(options: Required<GlobalCliOptions>): (message: string) => void {
  return (message) => {
    if (!options.quiet && !options.json) {
      console.log(message);
    }
  };
}

// ── Parsing helpers ─────────────────────────────────────────

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected an integer but received "${value}".`);
  }

  return parsed;
}

// ── Formatting helpers ──────────────────────────────────────

export function formatInteger(value: number): string {
  return new Intl.NumberFormat("en-US").format(value);
}

export { truncate } from "../core/utils.js";

// ── Config helpers ──────────────────────────────────────────

export async function loadCliConfig(
  options: Required<GlobalCliOptions>,
  ui: ChalkInstance,
  required = false,
): Promise<ShelfConfig> {
  return loadConfigFile(options.config, {
    required,
    onWarning: options.verbose
      ? (message) => {
          console.warn(ui.yellow(`[reposhelf] ${message}`));
        }
      : undefined,
  });
}
