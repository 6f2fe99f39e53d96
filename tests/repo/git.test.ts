import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => {
  const instance = {
    clone: vi.fn(),
    raw: vi.fn(),
    revparse: vi.fn(),
    getRemotes: vi.fn(),
    status: vi.fn(),
    env: vi.fn(),
  };
  instance.env.mockReturnValue(instance);
  return { instance, simpleGit: vi.fn(() => instance) };
});

vi.mock("simple-git", () => ({ simpleGit: mocks.simpleGit }));

import { ShelfError } from "../../src/core/errors.js";
import { SimpleGitClient, parseAheadBehind, parseSymrefOutput } from "../../src/repo/git.js";

const git = mocks.instance;

beforeEach(() => {
  vi.clearAllMocks();
  git.env.mockReturnValue(git);
});

describe("parseAheadBehind", () => {
  it("reads the left and right counts of rev-list", () => {
    expect(parseAheadBehind("2\t5\n")).toEqual({ ahead: 2, behind: 5 });
  });

  it("throws GIT_OPERATION_FAILED on unexpected output", () => {
    expect(() => parseAheadBehind("garbage")).toThrow(ShelfError);
  });
});

describe("parseSymrefOutput", () => {
  it("extracts the branch named by HEAD", () => {
    const output = "ref: refs/heads/trunk\tHEAD\n0123abcd\tHEAD\n";
    expect(parseSymrefOutput(output)).toBe("trunk");
  });

  it("returns null without a symref line", () => {
    expect(parseSymrefOutput("0123abcd\tHEAD\n")).toBeNull();
  });
});

describe("SimpleGitClient", () => {
  it("disables terminal prompts for every git process", async () => {
    git.revparse.mockResolvedValueOnce("main\n");

    await new SimpleGitClient().currentBranch("/work/repo");

    expect(mocks.simpleGit).toHaveBeenCalledWith({
      baseDir: "/work/repo",
      timeout: { block: 30_000 },
      unsafe: {
        allowUnsafeEditor: true,
        allowUnsafePager: true,
        allowUnsafeSshCommand: true,
        allowUnsafeAskPass: true,
      },
    });
    expect(git.env).toHaveBeenCalledWith(expect.objectContaining({ GIT_TERMINAL_PROMPT: "0" }));
  });

  it("passes the user's editor and ssh settings through to git", async () => {
    vi.stubEnv("EDITOR", "vi");
    vi.stubEnv("GIT_SSH_COMMAND", "ssh -o BatchMode=yes");
    git.revparse.mockResolvedValueOnce("main\n");

    try {
      await new SimpleGitClient().currentBranch("/work/repo");
    } finally {
      vi.unstubAllEnvs();
    }

    expect(git.env).toHaveBeenCalledWith(
      expect.objectContaining({ EDITOR: "vi", GIT_SSH_COMMAND: "ssh -o BatchMode=yes" }),
    );
  });

  it("reports whether HEAD names a commit", async () => {
    git.raw
      .mockResolvedValueOnce("abc123\n")
      .mockRejectedValueOnce(new Error("fatal: Needed a single revision"));
    const client = new SimpleGitClient();

    await expect(client.hasCommits("/work/repo")).resolves.toBe(true);
    await expect(client.hasCommits("/work/empty")).resolves.toBe(false);
    expect(git.raw).toHaveBeenCalledWith(["rev-parse", "--verify", "HEAD"]);
  });

  it("reports a detached HEAD as null", async () => {
    git.revparse.mockResolvedValueOnce("HEAD\n");

    await expect(new SimpleGitClient().currentBranch("/work/repo")).resolves.toBeNull();
  });

  it("reads the default branch from the remote HEAD ref", async () => {
    git.raw.mockResolvedValueOnce("origin/develop\n");

    await expect(new SimpleGitClient().defaultBranch("/work/repo", "origin")).resolves.toBe(
      "develop",
    );
    expect(git.raw).toHaveBeenCalledWith(["symbolic-ref", "--short", "refs/remotes/origin/HEAD"]);
  });

  it("asks the remote when the remote HEAD ref is missing", async () => {
    git.raw
      .mockRejectedValueOnce(new Error("fatal: ref refs/remotes/origin/HEAD is not a symbolic ref"))
      .mockResolvedValueOnce("ref: refs/heads/main\tHEAD\nabc123\tHEAD\n");

    await expect(new SimpleGitClient().defaultBranch("/work/repo", "origin")).resolves.toBe("main");
    expect(git.raw).toHaveBeenLastCalledWith(["ls-remote", "--symref", "origin", "HEAD"]);
  });

  it("checks for a named remote", async () => {
    git.getRemotes.mockResolvedValue([{ name: "origin" }]);
    const client = new SimpleGitClient();

    await expect(client.hasRemote("/work/repo", "origin")).resolves.toBe(true);
    await expect(client.hasRemote("/work/repo", "upstream")).resolves.toBe(false);
  });

  it("fast-forwards with --ff-only", async () => {
    git.raw.mockResolvedValueOnce("");

    await new SimpleGitClient().fastForward("/work/repo", "main", "origin/main");

    expect(git.raw).toHaveBeenCalledWith(["merge", "--ff-only", "origin/main"]);
  });

  it("deletes branches with -d so unmerged work survives", async () => {
    git.raw.mockResolvedValueOnce("");

    await new SimpleGitClient().deleteBranch("/work/repo", "done");

    expect(git.raw).toHaveBeenCalledWith(["branch", "-d", "done"]);
  });

  it("lists merged branches one per line", async () => {
    git.raw.mockResolvedValueOnce("main\ndone\n\n");

    await expect(new SimpleGitClient().mergedBranches("/work/repo", "main")).resolves.toEqual([
      "main",
      "done",
    ]);
  });

  it("retries a failed clone with backoff before giving up", async () => {
    git.clone.mockRejectedValue(new Error("fatal: unable to access\nmore detail"));
    const client = new SimpleGitClient({ retryBackoffMs: [0, 0] });

    const error = await client.clone("https://example.com/a/b", "/work/b").catch((e: unknown) => e);

    expect(git.clone).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(ShelfError);
    if (error instanceof ShelfError) {
      expect(error.code).toBe("GIT_OPERATION_FAILED");
      expect(error.message).toBe(
        "Git operation failed (clone https://example.com/a/b): fatal: unable to access",
      );
    }
  });

  it("succeeds on a later clone attempt", async () => {
    git.clone.mockRejectedValueOnce(new Error("transient")).mockResolvedValueOnce(undefined);
    const client = new SimpleGitClient({ retryBackoffMs: [0, 0] });

    await client.clone("https://example.com/a/b", "/work/b");

    expect(git.clone).toHaveBeenCalledTimes(2);
  });

  it("recognises a repository by its .git directory", async () => {
    const root = await mkdtemp(join(tmpdir(), "reposhelf-git-"));
    try {
      await mkdir(join(root, "with", ".git"), { recursive: true });
      await mkdir(join(root, "without"), { recursive: true });
      const client = new SimpleGitClient();

      await expect(client.isRepository(join(root, "with"))).resolves.toBe(true);
      await expect(client.isRepository(join(root, "without"))).resolves.toBe(false);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});
