#!/usr/bin/env node
/**
 * CLI command to validate a candidate metric batch.
 *
 * Reads raw generator output (a bare JSON array, a fenced ```json block, or
 * an array embedded in prose), validates it against a constraint set and
 * prints every issue found. A valid batch can be saved in its normalized
 * JSON form.
 *
 * Usage:
 *   npx tsx src/cli/validate-batch.ts --input <file> [options]
 *   npm run validate-batch -- --input <file>
 *
 * Options:
 *   --input <path>        Raw generator output or JSON array (required)
 *   --num-metrics <n>     Exact metric count (default: NUM_METRICS or 10)
 *   --min-sources <n>     Minimum sources per metric (default: MIN_SOURCES_PER_METRIC or 3)
 *   --query-log <path>    Saved query log to check against MIN_TOOL_QUERIES
 *   --save <dir>          Save the normalized batch as metrics-{runId}.json
 *   --json                Output the report as JSON (for CI parsing)
 *   --no-color            Disable ANSI colors
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Batch is valid
 *   1 - Batch failed validation
 *   2 - Usage or configuration error
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  ConfigurationError,
  loadConfig,
  validateConfig,
  type AppConfig,
  type ConstraintSet,
} from "../config/index.js";
import {
  checkConstraints,
  formatBatchIssue,
  formatBatchReport,
  saveBatch,
  toMetricRecords,
  validateGeneratorOutput,
  type BatchValidationResult,
} from "../batch/index.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import { countQueriesByTool, readQueryLog, type QueryLogEntry } from "../tools/query-log.js";

// ============================================================
// Types
// ============================================================

export interface CliOptions {
  input?: string;
  numMetrics?: number;
  minSources?: number;
  queryLog?: string;
  save?: string;
  json: boolean;
  color: boolean;
  help: boolean;
}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface QueryDisciplineReport {
  count: number;
  required: number;
  met: boolean;
  byTool: Record<string, number>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;

export const HELP_TEXT = `
Usage: validate-batch --input <file> [options]

Options:
  --input <path>        Raw generator output or JSON array (required)
  --num-metrics <n>     Exact metric count (default: NUM_METRICS or 10)
  --min-sources <n>     Minimum sources per metric (default: MIN_SOURCES_PER_METRIC or 3)
  --query-log <path>    Saved query log to check against MIN_TOOL_QUERIES
  --save <dir>          Save the normalized batch as metrics-{runId}.json
  --json                Output the report as JSON (for CI parsing)
  --no-color            Disable ANSI colors
  -h, --help            Show this help message

Exit codes:
  0 - Batch is valid
  1 - Batch failed validation
  2 - Usage or configuration error
`;

// ============================================================
// CLI Parsing
// ============================================================

/**
 * Parse an integer flag value. Range checks belong to the constraint set.
 */
export function parseIntegerOption(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new UsageError(`--${flag} must be an integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      input: { type: "string" },
      "num-metrics": { type: "string" },
      "min-sources": { type: "string" },
      "query-log": { type: "string" },
      save: { type: "string" },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });
}

/**
 * @throws UsageError on unknown flags or malformed values
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let values: ReturnType<typeof readArgs>["values"];
  try {
    ({ values } = readArgs(argv));
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  return {
    input: values.input,
    numMetrics: parseIntegerOption("num-metrics", values["num-metrics"]),
    minSources: parseIntegerOption("min-sources", values["min-sources"]),
    queryLog: values["query-log"],
    save: values.save,
    json: values.json === true,
    color: values["no-color"] !== true,
    help: values.help === true,
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

let colorsDisabled = false;

function c(color: keyof typeof COLORS, text: string): string {
  const useColors = !colorsDisabled && Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Compare a saved query log with the configured minimum.
 */
export function checkQueryDiscipline(
  entries: readonly QueryLogEntry[],
  required: number
): QueryDisciplineReport {
  return {
    count: entries.length,
    required,
    met: entries.length >= required,
    byTool: countQueriesByTool(entries),
  };
}

function printTextReport(
  io: CliIo,
  result: BatchValidationResult,
  discipline: QueryDisciplineReport | undefined,
  savedTo: string | undefined
): void {
  io.out(formatBatchReport(result));

  if (discipline) {
    io.out("");
    const tools = Object.entries(discipline.byTool)
      .map(([tool, count]) => `${tool}=${count}`)
      .join(", ");
    const line = `Tool queries: ${discipline.count}/${discipline.required}${tools ? ` (${tools})` : ""}`;
    io.out(discipline.met ? line : c("yellow", `! ${line}, below the minimum`));
  }

  if (result.success && savedTo) {
    io.out("");
    io.out(c("dim", `Saved to ${savedTo}`));
  }
}

function printJsonReport(
  io: CliIo,
  runId: string,
  constraints: ConstraintSet,
  result: BatchValidationResult,
  discipline: QueryDisciplineReport | undefined,
  savedTo: string | undefined
): void {
  const report = result.success
    ? { success: true, runId, constraints, stats: result.stats, metrics: toMetricRecords(result.batch) }
    : { success: false, runId, constraints, stats: result.stats, issues: result.issues };
  io.out(JSON.stringify({ ...report, queryDiscipline: discipline, savedTo }, null, 2));
}

// ============================================================
// Main
// ============================================================

export interface RunDependencies {
  io?: CliIo;
  /** Defaults to loadConfig() */
  config?: AppConfig;
  logger?: Logger;
}

/**
 * Run the command.
 *
 * @returns The process exit code
 */
export function runValidateBatch(argv: readonly string[], deps: RunDependencies = {}): number {
  const io = deps.io ?? consoleIo;

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    io.err(c("red", `Error: ${err instanceof Error ? err.message : String(err)}`));
    io.err("  Usage: validate-batch --input <file> [--num-metrics N] [--min-sources N]");
    return EXIT_USAGE;
  }

  if (options.help) {
    io.out(HELP_TEXT);
    return EXIT_OK;
  }
  if (!options.color) {
    colorsDisabled = true;
  }

  if (!options.input) {
    io.err(c("red", "Error: --input is required"));
    io.err("  Usage: validate-batch --input <file> [--num-metrics N] [--min-sources N]");
    return EXIT_USAGE;
  }

  let config: AppConfig;
  try {
    config = deps.config ?? loadConfig();
    validateConfig(config);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      io.err(c("red", err.format()));
      return EXIT_USAGE;
    }
    throw err;
  }

  const logger =
    deps.logger ??
    createLogger({
      level: config.debug ? "debug" : isLogLevel(config.logLevel) ? config.logLevel : "info",
      console: config.debug && !options.json,
      file: config.logFile,
      scope: "validate-batch",
    });

  const constraints: ConstraintSet = {
    numMetrics: options.numMetrics ?? config.numMetrics,
    minSourcesPerMetric: options.minSources ?? config.minSourcesPerMetric,
  };
  const constraintIssues = checkConstraints(constraints);
  if (constraintIssues.length > 0) {
    io.err(c("red", "Invalid constraint set:"));
    for (const issue of constraintIssues) {
      io.err(`  - ${formatBatchIssue(issue)}`);
    }
    return EXIT_USAGE;
  }

  const inputPath = resolve(options.input);
  if (!existsSync(inputPath)) {
    io.err(c("red", `Error: input file not found: ${inputPath}`));
    return EXIT_USAGE;
  }

  let discipline: QueryDisciplineReport | undefined;
  if (options.queryLog) {
    const logPath = resolve(options.queryLog);
    if (!existsSync(logPath)) {
      io.err(c("red", `Error: query log not found: ${logPath}`));
      return EXIT_USAGE;
    }
    discipline = checkQueryDiscipline(readQueryLog(logPath), config.minToolQueries);
    if (!discipline.met) {
      logger.warn("Query discipline below minimum", {
        count: discipline.count,
        required: discipline.required,
      });
    }
  }

  const runId = initRunId();
  logger.info("Validating batch", { input: inputPath, ...constraints });

  const result = validateGeneratorOutput(readFileSync(inputPath, "utf-8"), constraints);

  let savedTo: string | undefined;
  if (result.success && options.save) {
    savedTo = saveBatch(result.batch, resolve(options.save), runId);
    logger.info("Saved normalized batch", { path: savedTo });
  }

  if (result.success) {
    logger.info("Batch valid", { metrics: result.batch.metrics.length });
  } else {
    logger.warn("Batch rejected", { issues: result.issues.length });
  }

  if (options.json) {
    printJsonReport(io, runId, constraints, result, discipline, savedTo);
  } else {
    printTextReport(io, result, discipline, savedTo);
  }

  return result.success ? EXIT_OK : EXIT_INVALID;
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("validate-batch.ts") ||
   process.argv[1].endsWith("validate-batch.js") ||
   process.argv[1].endsWith("validate-batch"));

if (isDirectExecution) {
  try {
    process.exitCode = runValidateBatch(process.argv.slice(2));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exitCode = EXIT_USAGE;
  }
}
