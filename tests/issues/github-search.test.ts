import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  graphql: vi.fn(),
  Octokit: vi.fn(),
}));

vi.mock("@octokit/rest", () => ({ Octokit: mocks.Octokit }));

import { ShelfError } from "../../src/core/errors.js";
import {
  GitHubSearchApi,
  SEARCH_REPOSITORIES_QUERY,
  parseSearchPage,
  toSearchError,
} from "../../src/issues/github-search.js";

const repository = {
  __typename: "Repository",
  url: "https://github.com/acme/tool",
  name: "tool",
  nameWithOwner: "acme/tool",
  defaultBranchRef: { name: "main", target: { oid: "abc123" } },
  latestRelease: null,
  issues: { totalCount: 4 },
  pullRequests: { totalCount: 1 },
};

function httpError(message: string, status: number, headers: Record<string, string> = {}) {
  return Object.assign(new Error(message), { status, response: { headers } });
}

function captureError(fn: () => unknown): ShelfError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ShelfError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected function to throw");
}

beforeEach(() => {
  vi.clearAllMocks();
  mocks.Octokit.mockImplementation(function () {
    return { graphql: mocks.graphql };
  });
});

describe("parseSearchPage", () => {
  it("keeps repositories and skips other node types", () => {
    const result = parseSearchPage(
      {
        search: {
          pageInfo: { hasNextPage: true, endCursor: "cursor-1" },
          nodes: [null, { __typename: "User", login: "someone" }, repository],
        },
      },
      "org:acme",
    );

    expect(result).toEqual({
      repositories: [repository],
      hasNextPage: true,
      endCursor: "cursor-1",
    });
  });

  it("treats null nodes as an empty page", () => {
    expect(
      parseSearchPage(
        { search: { pageInfo: { hasNextPage: false, endCursor: null }, nodes: null } },
        "org:acme",
      ),
    ).toEqual({ repositories: [], hasNextPage: false, endCursor: null });
  });

  it("rejects a repository missing required fields", () => {
    const { url: _url, ...withoutUrl } = repository;
    const error = captureError(() =>
      parseSearchPage(
        { search: { pageInfo: { hasNextPage: false, endCursor: null }, nodes: [withoutUrl] } },
        "org:acme",
      ),
    );

    expect(error.code).toBe("API_RESPONSE_INVALID");
    expect(error.message).toBe('Unexpected search response for "org:acme".');
    expect(error.context?.issues).toEqual([{ message: "Required", path: "url" }]);
  });

  it("rejects a payload without search results", () => {
    expect(captureError(() => parseSearchPage({ data: {} }, "org:acme")).code).toBe(
      "API_RESPONSE_INVALID",
    );
  });
});

describe("toSearchError", () => {
  it("maps HTTP 429 to a rate limit with the Retry-After hint", () => {
    const error = toSearchError(httpError("Too many requests", 429, { "Retry-After": "30" }), "q");

    expect(error.code).toBe("API_RATE_LIMITED");
    expect(error.message).toBe('GitHub rate limit reached while searching "q".');
    expect(error.context).toEqual({ query: "q", status: 429, retryAfterMs: 30_000 });
  });

  it("treats an exhausted quota on 403 as a rate limit timed by the reset header", () => {
    const error = toSearchError(
      httpError("API rate limit exceeded", 403, {
        "x-ratelimit-remaining": "0",
        "x-ratelimit-reset": "1700000060",
      }),
      "q",
      1_700_000_000_000,
    );

    expect(error.code).toBe("API_RATE_LIMITED");
    expect(error.context?.retryAfterMs).toBe(60_000);
  });

  it("recognises GraphQL rate limiting without an HTTP status", () => {
    const graphqlError = Object.assign(new Error("API rate limit exceeded"), {
      errors: [{ type: "RATE_LIMITED", message: "API rate limit exceeded" }],
    });

    expect(toSearchError(graphqlError, "q").code).toBe("API_RATE_LIMITED");
  });

  it("maps other 401 and 403 responses to a fatal credential error", () => {
    const error = toSearchError(httpError("Bad credentials", 401), "q");

    expect(error.code).toBe("API_UNAUTHORIZED");
    expect(error.severity).toBe("fatal");
    expect(error.message).toBe("GitHub rejected the credential (HTTP 401).");
  });

  it("maps GraphQL errors to a failed request", () => {
    const graphqlError = Object.assign(new Error("Field 'foo' doesn't exist"), {
      errors: [{ type: "undefinedField", message: "Field 'foo' doesn't exist" }],
    });
    const error = toSearchError(graphqlError, "q");

    expect(error.code).toBe("API_REQUEST_FAILED");
    expect(error.message).toBe(`GitHub search failed for "q": Field 'foo' doesn't exist`);
  });

  it("maps errors without a response to a network error", () => {
    const error = toSearchError(new Error("getaddrinfo ENOTFOUND api.github.com"), "q");

    expect(error.code).toBe("API_NETWORK_ERROR");
    expect(error.message).toBe(
      'Could not reach GitHub while searching "q": getaddrinfo ENOTFOUND api.github.com',
    );
  });

  it("maps other HTTP failures with their status", () => {
    const error = toSearchError(httpError("Bad gateway", 502), "q");

    expect(error.code).toBe("API_REQUEST_FAILED");
    expect(error.message).toBe('GitHub search failed for "q" (HTTP 502): Bad gateway');
    expect(error.context).toEqual({ query: "q", status: 502 });
  });

  it("maps an aborted request to a cancellation", () => {
    const abort = Object.assign(new Error("This operation was aborted"), { name: "AbortError" });

    expect(toSearchError(abort, "q").code).toBe("RUN_CANCELLED");
  });
});

describe("GitHubSearchApi", () => {
  it("sends the search query through Octokit's GraphQL client", async () => {
    mocks.graphql.mockResolvedValueOnce({
      search: { pageInfo: { hasNextPage: false, endCursor: null }, nodes: [repository] },
    });
    const api = new GitHubSearchApi({
      token: "test-token",
      apiUrl: "https://github.example.com/api",
    });

    const result = await api.searchRepositories({ query: "org:acme", first: 10 });

    expect(mocks.Octokit).toHaveBeenCalledWith({
      auth: "test-token",
      baseUrl: "https://github.example.com/api",
      userAgent: "reposhelf",
    });
    expect(mocks.graphql).toHaveBeenCalledWith(SEARCH_REPOSITORIES_QUERY, {
      query: "org:acme",
      first: 10,
      after: null,
      request: {},
    });
    expect(result.repositories).toEqual([repository]);
  });

  it("passes the abort signal and cursor along", async () => {
    mocks.graphql.mockResolvedValueOnce({
      search: { pageInfo: { hasNextPage: false, endCursor: null }, nodes: [] },
    });
    const controller = new AbortController();

    await new GitHubSearchApi({ token: "test-token" }).searchRepositories({
      query: "org:acme",
      first: 10,
      after: "cursor-1",
      signal: controller.signal,
    });

    expect(mocks.graphql).toHaveBeenCalledWith(SEARCH_REPOSITORIES_QUERY, {
      query: "org:acme",
      first: 10,
      after: "cursor-1",
      request: { signal: controller.signal },
    });
  });

  it("translates Octokit failures", async () => {
    mocks.graphql.mockRejectedValueOnce(httpError("Bad credentials", 401));

    await expect(
      new GitHubSearchApi({ token: "test-token" }).searchRepositories({ query: "q", first: 10 }),
    ).rejects.toMatchObject({ code: "API_UNAUTHORIZED" });
  });
});
