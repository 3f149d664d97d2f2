/**
 * Batch validation module.
 *
 * Usage:
 *   import { validateBatch, formatBatchReport } from "./batch/index.js";
 *
 *   const result = validateBatch(records, { numMetrics: 10, minSourcesPerMetric: 3 });
 *   if (!result.success) console.log(formatBatchReport(result));
 */

export {
  BatchValidationError,
  countIssuesByKind,
  formatBatchIssue,
  type BatchIssue,
  type BatchIssueKind,
  type ConfigurationViolation,
  type CountMismatch,
  type DuplicateMetricName,
  type InsufficientSources,
} from "./errors.js";

export {
  createNormalizedBatch,
  metricNames,
  toMetricRecords,
  type NormalizedBatch,
} from "./normalized.js";

export {
  checkConstraints,
  validateBatch,
  validateBatchOrThrow,
  type BatchStats,
  type BatchValidationResult,
} from "./validator.js";

export {
  deserializeBatch,
  getBatchFilename,
  loadBatch,
  revalidateBatch,
  saveBatch,
  serializeBatch,
  summarizeBatch,
} from "./serialization.js";

export {
  extractJsonArray,
  parseCandidateBatch,
  validateGeneratorOutput,
  type CandidateParseResult,
} from "./extract.js";

export { formatBatchReport } from "./report.js";
