/**
 * grounded-metrics: validation engine for evaluation-metric batches.
 *
 * @example
 *   import { validateBatch, formatBatchReport } from "grounded-metrics";
 *
 *   const result = validateBatch(records, { numMetrics: 10, minSourcesPerMetric: 3 });
 *   if (!result.success) {
 *     console.error(formatBatchReport(result));
 *   }
 */

export * from "./metrics/index.js";
export * from "./batch/index.js";
export * from "./tools/index.js";
export {
  ConfigurationError,
  DEFAULT_CONSTRAINTS,
  MIN_SOURCES_DEFAULT,
  MIN_SOURCES_RANGE,
  MIN_TOOL_QUERIES_DEFAULT,
  NUM_METRICS_DEFAULT,
  NUM_METRICS_RANGE,
  ConstraintSetSchema,
  loadConfig,
  loadConstraints,
  validateConfig,
  validateConstraints,
  type AppConfig,
  type ConfigurationIssue,
  type ConstraintSet,
} from "./config/index.js";
export * from "./logging/index.js";
