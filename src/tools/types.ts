/**
 * Retrieval tool contracts.
 */

import type { Logger } from "../logging/logger.js";
import type { QueryLog } from "./query-log.js";
import type { FetchLike, Sleep } from "./http.js";

/**
 * One retrieved citation, exactly as a tool returned it.
 * Generators copy these verbatim into a metric's sources.
 */
export interface SourceRecord {
  title: string;
  url: string;
}

/**
 * A retrieval tool the generator can call.
 */
export interface SearchTool {
  /** Registry key, e.g. "openalex_search" */
  readonly name: string;
  /** Shown to the generator when it chooses a tool */
  readonly description: string;
  /**
   * Run one query. Transport and parse failures are logged and yield [].
   * Configuration problems (e.g. a missing contact email) throw.
   */
  search(query: string): Promise<SourceRecord[]>;
}

/**
 * What every adapter needs from its surroundings.
 */
export interface ToolDependencies {
  /** Every query is recorded here before it is sent */
  queryLog: QueryLog;
  logger?: Logger;
  /** Injected in tests; defaults to the global fetch */
  fetch?: FetchLike;
  /** Injected in tests; defaults to a real timer */
  sleep?: Sleep;
}
