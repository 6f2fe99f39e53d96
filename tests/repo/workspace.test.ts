import { mkdir, mkdtemp, realpath, rm, symlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ShelfError } from "../../src/core/errors.js";
import { cdShim, listWorkspaceRepos, resolveWorkspacePath } from "../../src/repo/workspace.js";

describe("workspace", () => {
  let baseDir: string;
  let canonical: string;

  beforeEach(async () => {
    baseDir = await realpath(await mkdtemp(join(tmpdir(), "reposhelf-workspace-")));
    canonical = join(baseDir, "repo", "github.com", "owner", "repo");
    await mkdir(canonical, { recursive: true });
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  describe("listWorkspaceRepos", () => {
    it("returns nothing when the canonical store does not exist", async () => {
      await rm(join(baseDir, "repo"), { recursive: true });

      await expect(listWorkspaceRepos(baseDir)).resolves.toEqual({ repos: [], errors: [] });
    });

    it("finds owner/name and name aliases sorted by alias", async () => {
      const other = join(baseDir, "repo", "gitlab.example.com", "group", "tool");
      await mkdir(other, { recursive: true });
      await mkdir(join(baseDir, "owner"));
      await symlink(canonical, join(baseDir, "owner", "repo"), "dir");
      await symlink(other, join(baseDir, "tool"), "dir");

      const listing = await listWorkspaceRepos(baseDir);

      expect(listing.errors).toEqual([]);
      expect(listing.repos).toEqual([
        {
          alias: "owner/repo",
          aliasPath: join(baseDir, "owner", "repo"),
          canonicalPath: canonical,
          identity: { host: "github.com", owner: "owner", name: "repo" },
        },
        {
          alias: "tool",
          aliasPath: join(baseDir, "tool"),
          canonicalPath: other,
          identity: { host: "gitlab.example.com", owner: "group", name: "tool" },
        },
      ]);
    });

    it("ignores symlinks that point outside the canonical store", async () => {
      const outside = join(baseDir, "elsewhere");
      await mkdir(outside);
      await symlink(outside, join(baseDir, "stray"), "dir");

      await expect(listWorkspaceRepos(baseDir)).resolves.toEqual({ repos: [], errors: [] });
    });

    it("reports dangling aliases as warnings", async () => {
      await symlink(join(baseDir, "repo", "github.com", "owner", "gone"), join(baseDir, "gone"), "dir");

      const listing = await listWorkspaceRepos(baseDir);

      expect(listing.repos).toEqual([]);
      expect(listing.errors).toHaveLength(1);
      expect(listing.errors[0].code).toBe("LINK_CONFLICT");
      expect(listing.errors[0].severity).toBe("warning");
      expect(listing.errors[0].message).toBe('Workspace alias "gone" points to a missing directory.');
    });
  });

  describe("resolveWorkspacePath", () => {
    it("resolves an alias to the real clone directory", async () => {
      await mkdir(join(baseDir, "owner"));
      await symlink(canonical, join(baseDir, "owner", "repo"), "dir");

      await expect(resolveWorkspacePath(baseDir, "owner/repo")).resolves.toBe(canonical);
    });

    it("resolves a remote URL through the canonical store without an alias", async () => {
      await expect(
        resolveWorkspacePath(baseDir, "git@github.com:owner/repo.git"),
      ).resolves.toBe(canonical);
    });

    it("throws REPO_NOT_FOUND for unknown names", async () => {
      const error = await resolveWorkspacePath(baseDir, "nobody/nothing").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ShelfError);
      if (error instanceof ShelfError) {
        expect(error.code).toBe("REPO_NOT_FOUND");
        expect(error.message).toBe(`${join(baseDir, "nobody/nothing")} is not a git repository`);
      }
    });

    it("does not follow parent-directory segments", async () => {
      await expect(resolveWorkspacePath(baseDir, "../outside")).rejects.toThrow(ShelfError);
    });

    it("rejects an empty name", async () => {
      await expect(resolveWorkspacePath(baseDir, "  ")).rejects.toThrow(
        "Repository name cannot be empty.",
      );
    });
  });
});

describe("cdShim", () => {
  it("defines a shell function that changes into the resolved path", () => {
    expect(cdShim("rscd")).toBe(
      'function rscd() { local p=$(reposhelf path "$1") && cd "$p" }\n',
    );
  });
});
