export type { AheadBehind, GitCallOptions, GitClient, SimpleGitClientOptions } from "./git.js";
export { SimpleGitClient, parseAheadBehind, parseSymrefOutput } from "./git.js";
export { ensureLink } from "./linker.js";
export {
  CANONICAL_STORE_DIR,
  aliasName,
  canonicalPath,
  identityKey,
  parseRemoteUrl,
  sameIdentity,
  toRepoTarget,
  tryParseRemoteUrl,
  workspaceAlias,
} from "./resolver.js";
export type { SyncDependencies, SyncOptions } from "./sync.js";
export { syncRepo } from "./sync.js";
export type { WorkspaceListing, WorkspaceRepo } from "./workspace.js";
export { cdShim, listWorkspaceRepos, resolveWorkspacePath } from "./workspace.js";
