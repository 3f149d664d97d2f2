/**
 * Retrieval tools module.
 */

export type { SearchTool, SourceRecord, ToolDependencies } from "./types.js";

export {
  DEFAULT_BACKOFF_MS,
  DEFAULT_RETRIES,
  DEFAULT_TIMEOUT_MS,
  RETRYABLE_STATUSES,
  fetchJson,
  retryRequest,
  type FetchLike,
  type RetryOptions,
  type Sleep,
} from "./http.js";

export {
  QueryLog,
  countQueriesByTool,
  formatQueryLogEntry,
  formatQueryLogTimestamp,
  parseQueryLog,
  readQueryLog,
  type QueryLogEntry,
} from "./query-log.js";

export { ToolRegistry, ToolRegistryError, createDefaultRegistry } from "./registry.js";
export { OPENALEX_TOOL_NAME, createOpenAlexTool, type OpenAlexOptions } from "./openalex.js";
export {
  SEMANTIC_SCHOLAR_TOOL_NAME,
  createSemanticScholarTool,
  type SemanticScholarOptions,
} from "./semantic-scholar.js";
export { ARXIV_TOOL_NAME, createArxivTool, type ArxivOptions } from "./arxiv.js";
export { PUBMED_TOOL_NAME, createPubMedTool, type PubMedOptions } from "./pubmed.js";
