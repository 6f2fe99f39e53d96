import { z } from "zod";

import { configError } from "./errors.js";
import type { SearchQuery } from "./types.js";

const ENV_VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export const DEFAULT_BASE_DIR = "~/dev";
export const DEFAULT_CD_SHIM = "rscd";
export const GITHUB_MAX_PAGE_SIZE = 100;

export const WorkspaceSchema = z
  .object({
    baseDir: z.string().min(1).default(DEFAULT_BASE_DIR),
    aliasStyle: z.enum(["owner/name", "name"]).default("owner/name"),
  })
  .strict()
  .default({});

export const SyncSchema = z
  .object({
    repos: z.array(z.string().min(1)).default([]),
    concurrency: z.number().int().positive().default(4),
    remote: z.string().min(1).default("origin"),
    pruneMergedBranches: z.boolean().default(false),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .default({});

export const QueryEntrySchema = z.union([
  z.string().min(1),
  z
    .object({
      query: z.string().min(1),
      label: z.string().min(1).optional(),
    })
    .strict(),
]);

export const GitHubSchema = z
  .object({
    username: z.string().min(1).optional(),
    query: z.string().min(1).optional(),
    queries: z.array(QueryEntrySchema).optional(),
    pageSize: z.number().int().min(1).max(GITHUB_MAX_PAGE_SIZE).default(GITHUB_MAX_PAGE_SIZE),
    maxPages: z.number().int().positive().default(100),
    maxRetries: z.number().int().min(0).default(2),
    concurrency: z.number().int().positive().default(4),
    apiUrl: z.string().url().default("https://api.github.com"),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .default({})
  .superRefine((value, ctx) => {
    if (value.query !== undefined && value.queries !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["queries"],
        message: "Both query and queries are set. Please set only one of them.",
      });
    }
  });

export const ShellSchema = z
  .object({
    cdShim: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, "cdShim must be a valid shell function name")
      .default(DEFAULT_CD_SHIM),
  })
  .strict()
  .default({});

export const EditorSchema = z
  .object({
    command: z.string().min(1).optional(),
  })
  .strict()
  .default({});

export const ShelfConfigSchema = z
  .object({
    workspace: WorkspaceSchema,
    sync: SyncSchema,
    github: GitHubSchema,
    shell: ShellSchema,
    editor: EditorSchema,
  })
  .strict();

export const ShelfConfig = ShelfConfigSchema;
export type ShelfConfig = z.output<typeof ShelfConfigSchema>;
export type ShelfConfigInput = z.input<typeof ShelfConfigSchema>;

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
}

export function defineConfig(config: ShelfConfigInput): ShelfConfigInput {
  return config;
}

export function interpolateEnvVars(
  value: string,
  env: Record<string, string | undefined> = getProcessEnv(),
  path: string[] = [],
): string {
  return value.replaceAll(ENV_VAR_PATTERN, (_, variableName: string) => {
    const interpolated = env[variableName];
    if (interpolated !== undefined) {
      return interpolated;
    }

    throw configError(
      "CONFIG_SECRET_MISSING",
      `Environment variable ${variableName} is referenced in config but not set`,
      {
        context: {
          variableName,
          path: path.length > 0 ? path.join(".") : "<root>",
        },
      },
    );
  });
}

export function loadConfig(config: unknown = {}, options: LoadConfigOptions = {}): ShelfConfig {
  const env = options.env ?? getProcessEnv();
  const interpolatedConfig = interpolateConfigEnvVars(config, env);
  const parsed = ShelfConfigSchema.safeParse(interpolatedConfig);

  if (parsed.success) {
    return parsed.data;
  }

  throw configError("CONFIG_INVALID", "Invalid reposhelf configuration", {
    context: {
      issues: parsed.error.issues.map((issue) => ({
        code: issue.code,
        message: issue.message,
        path: issue.path.join("."),
      })),
    },
  });
}

/**
 * Search queries from the `github` section, in declaration order. Falls back
 * to the public, non-fork, non-archived repositories of `github.username`.
 */
export function resolveQueries(github: ShelfConfig["github"]): SearchQuery[] {
  if (github.query !== undefined) {
    return [{ query: github.query, label: github.query }];
  }

  if (github.queries !== undefined && github.queries.length > 0) {
    return github.queries.map((entry) =>
      typeof entry === "string"
        ? { query: entry, label: entry }
        : { query: entry.query, label: entry.label ?? entry.query },
    );
  }

  if (github.username !== undefined) {
    const query = `user:${github.username} is:public fork:false archived:false`;
    return [{ query, label: github.username }];
  }

  throw configError(
    "CONFIG_INVALID",
    "No search query configured. Set github.query, github.queries or github.username.",
  );
}

function interpolateConfigEnvVars(
  value: unknown,
  env: Record<string, string | undefined>,
  path: string[] = [],
): unknown {
  if (typeof value === "string") {
    return interpolateEnvVars(value, env, path);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => interpolateConfigEnvVars(item, env, [...path, `${index}`]));
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const interpolatedObject: Record<string, unknown> = {};

  for (const [key, nestedValue] of Object.entries(value)) {
    interpolatedObject[key] = interpolateConfigEnvVars(nestedValue, env, [...path, key]);
  }

  return interpolatedObject;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getProcessEnv(): Record<string, string | undefined> {
  return process.env;
}
