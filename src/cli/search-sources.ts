#!/usr/bin/env node
/**
 * CLI command to run retrieval-tool queries by hand.
 *
 * Sends each --query to one registered tool, prints the sources it returns
 * and saves the query audit log to QUERY_LOG_DIR. Useful for checking what a
 * generator would see before asking it for a batch.
 *
 * Usage:
 *   npx tsx src/cli/search-sources.ts --tool openalex_search --query "llm hallucination"
 *   npm run search-sources -- --tool pubmed_search --query "a" --query "b" --json
 *
 * Options:
 *   --tool <name>      Registered tool to query (default: openalex_search)
 *   --query <text>     Search query; repeat for several (required)
 *   --no-save          Do not write the query log
 *   --json             Output results as JSON
 *   --list             List registered tools and exit
 *   -h, --help         Show help
 *
 * Exit codes:
 *   0 - Every query returned at least one source
 *   1 - At least one query returned nothing
 *   2 - Usage or configuration error
 */

import { parseArgs } from "node:util";

import { ConfigurationError, loadConfig, validateConfig, type AppConfig } from "../config/index.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import {
  OPENALEX_TOOL_NAME,
  QueryLog,
  ToolRegistryError,
  createDefaultRegistry,
  type FetchLike,
  type SearchTool,
  type Sleep,
  type SourceRecord,
} from "../tools/index.js";
import { EXIT_INVALID, EXIT_OK, EXIT_USAGE, UsageError, type CliIo } from "./validate-batch.js";

// ============================================================
// CLI Parsing
// ============================================================

export interface SearchCliOptions {
  tool: string;
  queries: string[];
  save: boolean;
  json: boolean;
  list: boolean;
  help: boolean;
}

export const SEARCH_HELP_TEXT = `
Usage: search-sources --query <text> [options]

Options:
  --tool <name>      Registered tool to query (default: ${OPENALEX_TOOL_NAME})
  --query <text>     Search query; repeat for several (required)
  --no-save          Do not write the query log
  --json             Output results as JSON
  --list             List registered tools and exit
  -h, --help         Show this help message
`;

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      tool: { type: "string", default: OPENALEX_TOOL_NAME },
      query: { type: "string", multiple: true },
      "no-save": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      list: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });
}

/**
 * @throws UsageError on unknown flags
 */
export function parseSearchArgs(argv: readonly string[]): SearchCliOptions {
  let values: ReturnType<typeof readArgs>["values"];
  try {
    ({ values } = readArgs(argv));
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  return {
    tool: values.tool ?? OPENALEX_TOOL_NAME,
    queries: (values.query ?? []).map((q) => q.trim()).filter((q) => q.length > 0),
    save: values["no-save"] !== true,
    json: values.json === true,
    list: values.list === true,
    help: values.help === true,
  };
}

// ============================================================
// Main
// ============================================================

export interface SearchDependencies {
  io?: CliIo;
  config?: AppConfig;
  logger?: Logger;
  fetch?: FetchLike;
  sleep?: Sleep;
  /** Clock for the query log file name */
  clock?: () => Date;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Run the command.
 *
 * @returns The process exit code
 */
export async function runSearchSources(
  argv: readonly string[],
  deps: SearchDependencies = {}
): Promise<number> {
  const io = deps.io ?? consoleIo;

  let options: SearchCliOptions;
  try {
    options = parseSearchArgs(argv);
  } catch (err) {
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_USAGE;
  }
  if (options.help) {
    io.out(SEARCH_HELP_TEXT);
    return EXIT_OK;
  }

  let config: AppConfig;
  try {
    config = deps.config ?? loadConfig();
    validateConfig(config);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      io.err(err.format());
      return EXIT_USAGE;
    }
    throw err;
  }

  const logger =
    deps.logger ??
    createLogger({
      level: config.debug ? "debug" : isLogLevel(config.logLevel) ? config.logLevel : "info",
      console: !options.json,
      file: config.logFile,
      scope: "search-sources",
    });

  const queryLog = new QueryLog(deps.clock);
  const registry = createDefaultRegistry(config, {
    queryLog,
    logger,
    fetch: deps.fetch,
    sleep: deps.sleep,
  });

  if (options.list) {
    for (const tool of registry.list()) {
      io.out(`${tool.name.padEnd(26)}${tool.description}`);
    }
    return EXIT_OK;
  }

  if (options.queries.length === 0) {
    io.err("Error: at least one --query is required");
    return EXIT_USAGE;
  }

  let tool: SearchTool;
  try {
    tool = registry.get(options.tool);
  } catch (err) {
    if (err instanceof ToolRegistryError) {
      io.err(`Error: ${err.message}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const runId = initRunId();
  const results: Array<{ query: string; sources: SourceRecord[] }> = [];
  for (const query of options.queries) {
    results.push({ query, sources: await tool.search(query) });
  }

  const savedLog = options.save ? queryLog.save(config.queryLogDir) : null;
  if (savedLog) {
    logger.info("Saved query log", { path: savedLog });
  }

  if (options.json) {
    io.out(JSON.stringify({ runId, tool: tool.name, results, queryLog: savedLog }, null, 2));
  } else {
    for (const { query, sources } of results) {
      io.out(`${tool.name}: "${query}" (${sources.length} result(s))`);
      for (const source of sources) {
        io.out(`  - ${source.title}`);
        io.out(`    ${source.url}`);
      }
    }
    if (savedLog) {
      io.out("");
      io.out(`Query log saved to ${savedLog}`);
    }
  }

  return results.every((r) => r.sources.length > 0) ? EXIT_OK : EXIT_INVALID;
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("search-sources.ts") ||
   process.argv[1].endsWith("search-sources.js") ||
   process.argv[1].endsWith("search-sources"));

if (isDirectExecution) {
  runSearchSources(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = EXIT_USAGE;
    }
  );
}
