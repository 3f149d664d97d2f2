/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 *
 * Only entry points (CLI, scripts) read this module. The batch validator
 * receives its ConstraintSet as an explicit argument.
 */

import {
  ConfigurationError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  maybeEnv,
} from "./env.js";
import { NUM_METRICS_DEFAULT, MIN_SOURCES_DEFAULT } from "./constraints/defaults.js";

export { ConfigurationError, type ConfigurationIssue } from "./env.js";

// Re-export constraint configuration module
export * from "./constraints/index.js";

/** Minimum retrieval queries the generator should issue before emitting metrics */
export const MIN_TOOL_QUERIES_DEFAULT = 20;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Append log lines to this file as well as the console */
  readonly logFile?: string;
  /** Application name */
  readonly appName: string;
  /** Default exact metric count for CLI runs */
  readonly numMetrics: number;
  /** Default minimum sources per metric for CLI runs */
  readonly minSourcesPerMetric: number;
  /** Query-discipline threshold handed to the generation layer */
  readonly minToolQueries: number;
  /** Directory for saved query audit logs */
  readonly queryLogDir: string;
  /** Contact email for NCBI E-utilities */
  readonly pubmedEmail?: string;
  /** Polite-pool email for OpenAlex */
  readonly openAlexEmail?: string;
  readonly semanticScholarApiKey?: string;
}

/**
 * Load application configuration from the environment.
 */
export function loadConfig(): AppConfig {
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logFile: maybeEnv("LOG_FILE"),
    appName: optionalEnv("APP_NAME", "grounded-metrics"),
    numMetrics: optionalEnvInt("NUM_METRICS", NUM_METRICS_DEFAULT),
    minSourcesPerMetric: optionalEnvInt("MIN_SOURCES_PER_METRIC", MIN_SOURCES_DEFAULT),
    minToolQueries: optionalEnvInt("MIN_TOOL_QUERIES", MIN_TOOL_QUERIES_DEFAULT),
    queryLogDir: optionalEnv("QUERY_LOG_DIR", "query_logs"),
    pubmedEmail: maybeEnv("PUBMED_EMAIL"),
    openAlexEmail: maybeEnv("OPENALEX_EMAIL"),
    semanticScholarApiKey: maybeEnv("SEMANTIC_SCHOLAR_API_KEY"),
  });
}

/**
 * Validate an application configuration.
 * Call this at startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = loadConfig()): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigurationError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`,
      [{ field: "NODE_ENV", message: "must be development, production, or test", received: appConfig.env }]
    );
  }

  if (!["debug", "info", "warn", "error"].includes(appConfig.logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`,
      [{ field: "LOG_LEVEL", message: "must be debug, info, warn, or error", received: appConfig.logLevel }]
    );
  }

  if (appConfig.minToolQueries < 0) {
    throw new ConfigurationError(
      `Invalid MIN_TOOL_QUERIES: ${appConfig.minToolQueries}. Must be zero or greater.`,
      [{ field: "MIN_TOOL_QUERIES", message: "must be zero or greater", received: appConfig.minToolQueries }]
    );
  }
}
