import { constants as fsConstants } from "node:fs";
import { access } from "node:fs/promises";
import { join } from "node:path";

import { type SimpleGit, simpleGit } from "simple-git";

import { isAbortError, repoError } from "../core/errors.js";
import { sleep } from "../core/utils.js";

const RETRY_BACKOFF_MS = [1000, 4000, 16000] as const;
const GIT_CLONE_TIMEOUT_MS = 300_000; // 5 min rolling timeout for clone
const GIT_FETCH_TIMEOUT_MS = 120_000; // 2 min rolling timeout for fetch
const GIT_LOCAL_TIMEOUT_MS = 30_000;

export interface AheadBehind {
  ahead: number;
  behind: number;
}

export interface GitCallOptions {
  signal?: AbortSignal;
}

/**
 * The subset of git that repository sync drives. Every method operates on
 * one working tree and throws a `ShelfError` (`GIT_OPERATION_FAILED`) when
 * git reports a failure.
 */
export interface GitClient {
  clone(url: string, destPath: string, options?: GitCallOptions): Promise<void>;
  fetch(repoPath: string, remote: string, options?: GitCallOptions): Promise<void>;
  isRepository(repoPath: string): Promise<boolean>;
  hasRemote(repoPath: string, remote: string): Promise<boolean>;
  /** `false` while HEAD is unborn, as in a clone of an empty repository. */
  hasCommits(repoPath: string): Promise<boolean>;
  /** `null` when HEAD is detached. */
  currentBranch(repoPath: string): Promise<string | null>;
  defaultBranch(repoPath: string, remote: string): Promise<string>;
  isClean(repoPath: string): Promise<boolean>;
  aheadBehind(repoPath: string, branch: string, upstream: string): Promise<AheadBehind>;
  fastForward(repoPath: string, branch: string, upstream: string): Promise<void>;
  mergedBranches(repoPath: string, branch: string): Promise<string[]>;
  deleteBranch(repoPath: string, branch: string): Promise<void>;
}

export interface SimpleGitClientOptions {
  retryBackoffMs?: readonly number[];
}

export class SimpleGitClient implements GitClient {
  private readonly retryBackoffMs: readonly number[];

  public constructor(options: SimpleGitClientOptions = {}) {
    this.retryBackoffMs = options.retryBackoffMs ?? RETRY_BACKOFF_MS;
  }

  public async clone(url: string, destPath: string, options: GitCallOptions = {}): Promise<void> {
    await this.retry(
      async () => {
        await createGit(undefined, GIT_CLONE_TIMEOUT_MS, options.signal).clone(url, destPath);
      },
      `clone ${url}`,
      options.signal,
    );
  }

  public async fetch(repoPath: string, remote: string, options: GitCallOptions = {}): Promise<void> {
    await this.retry(
      async () => {
        await createGit(repoPath, GIT_FETCH_TIMEOUT_MS, options.signal).raw([
          "fetch",
          "--prune",
          remote,
        ]);
      },
      `fetch ${remote} in ${repoPath}`,
      options.signal,
    );
  }

  public async isRepository(repoPath: string): Promise<boolean> {
    return pathExists(join(repoPath, ".git"));
  }

  /** `false` for a fresh clone of an empty repository, where HEAD is unborn. */
  public async hasCommits(repoPath: string): Promise<boolean> {
    try {
      await createGit(repoPath).raw(["rev-parse", "--verify", "HEAD"]);
      return true;
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      // rev-parse only fails here when HEAD does not name a commit yet.
      return false;
    }
  }

  public async hasRemote(repoPath: string, remote: string): Promise<boolean> {
    const remotes = await run(`list remotes in ${repoPath}`, () =>
      createGit(repoPath).getRemotes(),
    );
    return remotes.some((entry) => entry.name === remote);
  }

  public async currentBranch(repoPath: string): Promise<string | null> {
    const output = await run(`read current branch in ${repoPath}`, () =>
      createGit(repoPath).revparse(["--abbrev-ref", "HEAD"]),
    );
    const branch = output.trim();
    return branch === "HEAD" || branch.length === 0 ? null : branch;
  }

  public async defaultBranch(repoPath: string, remote: string): Promise<string> {
    const git = createGit(repoPath);
    const prefix = `${remote}/`;

    try {
      const symbolic = (await git.raw(["symbolic-ref", "--short", `refs/remotes/${remote}/HEAD`])).trim();
      if (symbolic.startsWith(prefix) && symbolic.length > prefix.length) {
        return symbolic.slice(prefix.length);
      }
    } catch {
      // refs/remotes/<remote>/HEAD is only set by clone; ask the remote instead.
    }

    const output = await run(`query default branch of ${remote} in ${repoPath}`, () =>
      createGit(repoPath, GIT_FETCH_TIMEOUT_MS).raw(["ls-remote", "--symref", remote, "HEAD"]),
    );
    const branch = parseSymrefOutput(output);
    if (!branch) {
      throw repoError(
        "GIT_OPERATION_FAILED",
        `Could not determine the default branch of "${remote}" in "${repoPath}".`,
        { context: { repoPath, remote } },
      );
    }
    return branch;
  }

  public async isClean(repoPath: string): Promise<boolean> {
    const status = await run(`read status of ${repoPath}`, () => createGit(repoPath).status());
    return status.isClean();
  }

  public async aheadBehind(
    repoPath: string,
    branch: string,
    upstream: string,
  ): Promise<AheadBehind> {
    const output = await run(`compare ${branch} with ${upstream} in ${repoPath}`, () =>
      createGit(repoPath).raw(["rev-list", "--left-right", "--count", `${branch}...${upstream}`]),
    );
    return parseAheadBehind(output);
  }

  public async fastForward(repoPath: string, branch: string, upstream: string): Promise<void> {
    await run(`fast-forward ${branch} to ${upstream} in ${repoPath}`, () =>
      createGit(repoPath).raw(["merge", "--ff-only", upstream]),
    );
  }

  public async mergedBranches(repoPath: string, branch: string): Promise<string[]> {
    const output = await run(`list branches merged into ${branch} in ${repoPath}`, () =>
      createGit(repoPath).raw(["branch", "--merged", branch, "--format=%(refname:short)"]),
    );
    return splitLines(output);
  }

  public async deleteBranch(repoPath: string, branch: string): Promise<void> {
    // -d refuses to delete unmerged work, unlike -D.
    await run(`delete branch ${branch} in ${repoPath}`, () =>
      createGit(repoPath).raw(["branch", "-d", branch]),
    );
  }

  private async retry<T>(
    operation: () => Promise<T>,
    operationName: string,
    signal?: AbortSignal,
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.retryBackoffMs.length; attempt += 1) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;
        if (attempt === this.retryBackoffMs.length || signal?.aborted || isAbortError(error)) {
          break;
        }
        await sleep(this.retryBackoffMs[attempt], signal);
      }
    }

    throw repoError(
      "GIT_OPERATION_FAILED",
      `Git operation failed (${operationName}): ${describeGitError(lastError)}`,
      { context: { operation: operationName }, cause: lastError },
    );
  }
}

export function parseAheadBehind(output: string): AheadBehind {
  const [ahead, behind] = output
    .trim()
    .split(/\s+/)
    .map((part) => Number.parseInt(part, 10));

  if (!Number.isFinite(ahead) || !Number.isFinite(behind)) {
    throw repoError("GIT_OPERATION_FAILED", `Unexpected rev-list output "${output.trim()}".`);
  }

  return { ahead, behind };
}

/** Extracts `main` from `ref: refs/heads/main\tHEAD`. */
export function parseSymrefOutput(output: string): string | null {
  const match = output.match(/^ref:\s+refs\/heads\/(\S+)\s+HEAD$/m);
  return match?.[1] ?? null;
}

function splitLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

async function run<T>(operationName: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw repoError(
      "GIT_OPERATION_FAILED",
      `Git operation failed (${operationName}): ${describeGitError(error)}`,
      { context: { operation: operationName }, cause: error },
    );
  }
}

function describeGitError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.trim().split(/\r?\n/)[0] ?? "unknown error";
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a `SimpleGit` instance with `GIT_TERMINAL_PROMPT=0` and a rolling
 * timeout that kills the spawned process if it produces no output for
 * `timeoutMs`.
 *
 * NOTE: `simple-git`'s `.env(key, value)` **replaces** the entire process
 * environment.  We must spread `process.env` so the child git process still
 * has `HOME`, `PATH`, `SSH_AUTH_SOCK`, etc.  simple-git refuses editor,
 * pager, ssh and askpass variables in that object unless they are allowed
 * explicitly; they come from the user's own environment, so they are.
 */
function createGit(
  baseDir?: string,
  timeoutMs = GIT_LOCAL_TIMEOUT_MS,
  signal?: AbortSignal,
): SimpleGit {
  return simpleGit({
    ...(baseDir ? { baseDir } : {}),
    ...(signal ? { abort: signal } : {}),
    timeout: { block: timeoutMs },
    unsafe: {
      allowUnsafeEditor: true,
      allowUnsafePager: true,
      allowUnsafeSshCommand: true,
      allowUnsafeAskPass: true,
    },
  }).env({ ...process.env, GIT_TERMINAL_PROMPT: "0" });
}
