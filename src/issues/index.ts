export {
  aggregateIssues,
  retryDelayMs,
  toRepoIssueSummary,
  DEFAULT_MAX_PAGES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_PAGE_SIZE,
  type AggregateOptions,
} from "./aggregator.js";
export {
  GitHubSearchApi,
  parseSearchPage,
  toSearchError,
  SEARCH_REPOSITORIES_QUERY,
  type GitHubSearchApiOptions,
  type RepoIssueNode,
  type SearchApi,
  type SearchPage,
  type SearchRequest,
} from "./github-search.js";
