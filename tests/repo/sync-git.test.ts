import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { type SimpleGit, simpleGit } from "simple-git";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { RepoTarget, SyncOutcome } from "../../src/core/types.js";
import { SimpleGitClient } from "../../src/repo/git.js";
import { syncRepo } from "../../src/repo/sync.js";

// Runs against real git repositories in a temp directory. The upstream is a
// bare repository on disk, so nothing leaves the machine.

function gitIn(baseDir: string): SimpleGit {
  return simpleGit({
    baseDir,
    config: ["user.name=Test", "user.email=test@example.com", "commit.gpgsign=false"],
    unsafe: {
      allowUnsafeEditor: true,
      allowUnsafePager: true,
      allowUnsafeSshCommand: true,
      allowUnsafeAskPass: true,
    },
  });
}

async function commitFile(repoPath: string, file: string, content: string): Promise<string> {
  const git = gitIn(repoPath);
  await writeFile(join(repoPath, file), content);
  await git.add(file);
  await git.commit(`update ${file}`);
  return head(repoPath);
}

async function head(repoPath: string): Promise<string> {
  return (await gitIn(repoPath).revparse(["HEAD"])).trim();
}

describe("syncRepo against real git", () => {
  let root: string;
  let baseDir: string;
  let upstream: string;
  let seed: string;
  let target: RepoTarget;
  let repoPath: string;
  let client: SimpleGitClient;

  const sync = (prune = false): Promise<SyncOutcome> =>
    syncRepo(target, { baseDir, pruneMergedBranches: prune }, { git: client });

  async function createUpstream(withCommit: boolean): Promise<void> {
    await gitIn(root).raw(["init", "--bare", "--initial-branch=main", upstream]);
    if (!withCommit) {
      return;
    }
    await gitIn(seed).raw(["init", "--initial-branch=main"]);
    await gitIn(seed).addRemote("origin", upstream);
    await commitFile(seed, "README.md", "hello\n");
    await gitIn(seed).push("origin", "main");
  }

  async function pushUpstreamChange(content: string): Promise<string> {
    const sha = await commitFile(seed, "README.md", content);
    await gitIn(seed).push("origin", "main");
    return sha;
  }

  beforeEach(async () => {
    vi.stubEnv("EDITOR", "vi");
    vi.stubEnv("PAGER", "less");
    vi.stubEnv("GIT_SSH_COMMAND", "ssh -o BatchMode=yes");

    root = await mkdtemp(join(tmpdir(), "reposhelf-git-"));
    baseDir = join(root, "shelf");
    upstream = join(root, "upstream.git");
    seed = join(root, "seed");
    await mkdir(baseDir);
    await mkdir(seed);

    target = { url: upstream, identity: { host: "example.com", owner: "owner", name: "repo" } };
    repoPath = join(baseDir, "repo", "example.com", "owner", "repo");
    client = new SimpleGitClient({ retryBackoffMs: [] });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(root, { recursive: true, force: true });
  });

  it("clones an absent repository with editor and ssh variables set", async () => {
    await createUpstream(true);

    const outcome = await sync();

    expect(outcome).toMatchObject({
      status: "cloned",
      path: repoPath,
      alias: { name: "owner/repo", path: join(baseDir, "owner", "repo") },
      link: { status: "created" },
    });
    expect(await readFile(join(repoPath, "README.md"), "utf8")).toBe("hello\n");
    expect(await readFile(join(baseDir, "owner", "repo", "README.md"), "utf8")).toBe("hello\n");
  });

  it("fast-forwards a clone that is behind", async () => {
    await createUpstream(true);
    await sync();
    const upstreamHead = await pushUpstreamChange("hello again\n");

    const outcome = await sync();

    expect(outcome).toMatchObject({
      status: "updated",
      fastForwarded: true,
      pulledCommits: 1,
      link: { status: "unchanged" },
      state: { currentBranch: "main", defaultBranch: "main", ahead: 0, behind: 1 },
    });
    expect(await head(repoPath)).toBe(upstreamHead);
    expect(await readFile(join(repoPath, "README.md"), "utf8")).toBe("hello again\n");
  });

  it("reports a diverged clone and leaves HEAD where it was", async () => {
    await createUpstream(true);
    await sync();
    const localHead = await commitFile(repoPath, "local.txt", "mine\n");
    await pushUpstreamChange("theirs\n");

    const outcome = await sync();

    expect(outcome).toMatchObject({ status: "diverged", state: { ahead: 1, behind: 1 } });
    expect(await head(repoPath)).toBe(localHead);
    expect(await readFile(join(repoPath, "README.md"), "utf8")).toBe("hello\n");
  });

  it("skips a clone with a modified file and keeps the edit", async () => {
    await createUpstream(true);
    await sync();
    const before = await head(repoPath);
    await writeFile(join(repoPath, "README.md"), "local edit\n");
    await pushUpstreamChange("upstream edit\n");

    const outcome = await sync();

    expect(outcome).toMatchObject({
      status: "skipped",
      reason: "dirty-or-non-default-branch",
      state: { isClean: false },
    });
    expect(await head(repoPath)).toBe(before);
    expect(await readFile(join(repoPath, "README.md"), "utf8")).toBe("local edit\n");
  });

  it("skips a clone with an untracked file and keeps it", async () => {
    await createUpstream(true);
    await sync();
    const before = await head(repoPath);
    await writeFile(join(repoPath, "notes.txt"), "scratch\n");
    await pushUpstreamChange("upstream edit\n");

    const outcome = await sync();

    expect(outcome).toMatchObject({ status: "skipped", reason: "dirty-or-non-default-branch" });
    expect(await head(repoPath)).toBe(before);
    expect(await readFile(join(repoPath, "notes.txt"), "utf8")).toBe("scratch\n");
  });

  it("clones an empty repository and skips it on the next sync", async () => {
    await createUpstream(false);

    const cloned = await sync();
    const refreshed = await sync();

    expect(cloned.status).toBe("cloned");
    expect(refreshed).toEqual({
      status: "skipped",
      url: upstream,
      target,
      path: repoPath,
      reason: "empty-repository",
    });
  });

  it("prunes a merged branch with git branch -d", async () => {
    await createUpstream(true);
    await sync();
    await gitIn(repoPath).branch(["done"]);

    const outcome = await sync(true);

    expect(outcome).toMatchObject({ status: "updated", deletedBranches: ["done"], pruneFailures: [] });
    const branches = await gitIn(repoPath).branchLocal();
    expect(branches.all).toEqual(["main"]);
  });
});
