import { execFileSync } from "node:child_process";

export type GitHubTokenSource = "GITHUB_TOKEN" | "GH_TOKEN" | "gh";

export interface GitHubCredential {
  token: string;
  source: GitHubTokenSource;
}

/**
 * Finds a GitHub token for search API calls.
 * Tries: GITHUB_TOKEN → GH_TOKEN → `gh auth token`.
 */
export function findGitHubCredential(
  env: Record<string, string | undefined> = process.env,
): GitHubCredential | undefined {
  const githubToken = env.GITHUB_TOKEN?.trim();
  if (githubToken) {
    return { token: githubToken, source: "GITHUB_TOKEN" };
  }

  const ghToken = env.GH_TOKEN?.trim();
  if (ghToken) {
    return { token: ghToken, source: "GH_TOKEN" };
  }

  try {
    const token = execFileSync("gh", ["auth", "token"], {
      timeout: 5_000,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
    }).trim();

    if (token.length > 0) {
      return { token, source: "gh" };
    }
  } catch {
    // gh not installed or not authenticated
  }

  return undefined;
}

export function maskToken(token: string): string {
  if (token.length <= 8) {
    return `${token.slice(0, 2)}****`;
  }

  return `${token.slice(0, 4)}****${token.slice(-2)}`;
}
