import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { extname, join } from "node:path";
import { pathToFileURL } from "node:url";

import {
  type ShelfConfig,
  configError,
  expandHomePath,
  isRecord,
  isShelfError,
  loadConfig,
  toErrorMessage,
} from "../core/index.js";

export const CONFIG_PATH_ENV = "REPOSHELF_CONFIG_PATH";
export const DEFAULT_CONFIG_FILE = ".reposhelf.json";

export interface ConfigLoaderOptions {
  /** Throw `CONFIG_NOT_FOUND` instead of falling back to defaults. */
  required?: boolean;
  env?: Record<string, string | undefined>;
  onWarning?: (message: string) => void;
}

/** `--config`, then `$REPOSHELF_CONFIG_PATH`, then `~/.reposhelf.json`. */
export function resolveConfigPath(
  flag: string | undefined,
  env: Record<string, string | undefined> = process.env,
  home: string = homedir(),
): string {
  const fromFlag = flag?.trim();
  if (fromFlag) {
    return expandHomePath(fromFlag, home);
  }

  const fromEnv = env[CONFIG_PATH_ENV]?.trim();
  if (fromEnv) {
    return expandHomePath(fromEnv, home);
  }

  return join(home, DEFAULT_CONFIG_FILE);
}

export async function loadConfigFile(
  configPath: string,
  options: ConfigLoaderOptions = {},
): Promise<ShelfConfig> {
  const candidate = await readConfigCandidate(configPath);

  if (candidate === undefined) {
    if (options.required) {
      throw configError(
        "CONFIG_NOT_FOUND",
        `No configuration found at ${configPath}. Run \`reposhelf init\` to create one.`,
        { context: { configPath } },
      );
    }
    options.onWarning?.(`No configuration found at ${configPath}; using defaults.`);
    return loadConfig({}, { env: options.env });
  }

  return loadConfig(candidate, { env: options.env });
}

async function readConfigCandidate(configPath: string): Promise<unknown> {
  const extension = extname(configPath).toLowerCase();

  if (extension === ".js" || extension === ".mjs" || extension === ".ts") {
    return importConfigCandidate(configPath);
  }

  let source: string;
  try {
    source = await readFile(configPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw configError("CONFIG_INVALID", `Failed to read ${configPath}: ${toErrorMessage(error)}`, {
      context: { configPath },
      cause: error,
    });
  }

  try {
    const parsed: unknown = JSON.parse(source);
    return parsed;
  } catch (error) {
    throw configError("CONFIG_INVALID", `${configPath} is not valid JSON: ${toErrorMessage(error)}`, {
      context: { configPath },
      cause: error,
    });
  }
}

async function importConfigCandidate(configPath: string): Promise<unknown> {
  let imported: unknown;
  try {
    imported = await import(`${pathToFileURL(configPath).href}?t=${Date.now()}`);
  } catch (error) {
    if (isMissingModule(error)) {
      return undefined;
    }
    if (isShelfError(error)) {
      throw error;
    }
    throw configError("CONFIG_INVALID", `Failed to load ${configPath}: ${toErrorMessage(error)}`, {
      context: { configPath },
      cause: error,
    });
  }

  if (isRecord(imported) && "default" in imported) {
    return imported.default;
  }
  return imported;
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

function isMissingModule(error: unknown): boolean {
  return isRecord(error) && error.code === "ERR_MODULE_NOT_FOUND";
}
