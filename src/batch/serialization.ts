/**
 * Batch serialization.
 *
 * A validated batch is written to disk in its documented JSON shape, an
 * array of metric records, so downstream consumers never see the internal
 * camelCase types. Reading a batch back always re-runs the batch validator:
 * a file on disk is just another candidate.
 *
 * FILE NAMING CONVENTION:
 * Batches are saved as: metrics-{runId}.json
 * This allows easy correlation with log files and query logs.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { formatScale } from "../metrics/schema.js";
import { schemaViolation } from "../metrics/validators.js";
import { BatchValidationError } from "./errors.js";
import { toMetricRecords, type NormalizedBatch } from "./normalized.js";
import { validateBatch, validateBatchOrThrow, type BatchValidationResult } from "./validator.js";

/**
 * Serialize a batch to a JSON string.
 *
 * @param pretty - Whether to format with indentation (default: true)
 */
export function serializeBatch(batch: NormalizedBatch, pretty = true): string {
  return JSON.stringify(toMetricRecords(batch), null, pretty ? 2 : undefined);
}

/**
 * Deserialize and re-validate a batch from a JSON string.
 *
 * @param json - JSON array of metric records
 * @param constraints - Constraint set the batch must satisfy
 * @returns Validated and frozen batch
 * @throws BatchValidationError if the JSON is malformed or the batch is invalid
 * @throws ConfigurationError if the constraint set is invalid
 */
export function deserializeBatch(json: string, constraints: unknown): Readonly<NormalizedBatch> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    const reason = `malformed JSON: ${err instanceof Error ? err.message : String(err)}`;
    throw new BatchValidationError("Failed to parse batch JSON", [
      schemaViolation("(root)", json.length > 80 ? `${json.slice(0, 77)}...` : json, reason),
    ]);
  }

  return validateBatchOrThrow(parsed, constraints);
}

/**
 * Validate a batch again. Always succeeds for a batch produced by
 * validateBatch() under the same constraints.
 */
export function revalidateBatch(batch: NormalizedBatch): BatchValidationResult {
  return validateBatch(toMetricRecords(batch), batch.constraints);
}

/**
 * Generate the standard filename for a batch.
 *
 * @returns Filename in format "metrics-{runId}.json"
 */
export function getBatchFilename(runId: string): string {
  return `metrics-${runId}.json`;
}

/**
 * Save a batch to a file.
 *
 * @param directory - Directory to save in (created if missing)
 * @param runId - Run identifier used in the standard filename
 * @param filename - Optional filename override
 * @returns Full path to the saved file
 */
export function saveBatch(
  batch: NormalizedBatch,
  directory: string,
  runId: string,
  filename?: string
): string {
  const filePath = join(directory, filename ?? getBatchFilename(runId));

  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  writeFileSync(filePath, serializeBatch(batch) + "\n", "utf-8");
  return filePath;
}

/**
 * Load and re-validate a batch from a file.
 *
 * @throws Error if the file does not exist
 * @throws BatchValidationError if its content is not a valid batch
 */
export function loadBatch(filePath: string, constraints: unknown): Readonly<NormalizedBatch> {
  if (!existsSync(filePath)) {
    throw new Error(`Batch file not found: ${filePath}`);
  }
  return deserializeBatch(readFileSync(filePath, "utf-8"), constraints);
}

/**
 * One-line summary of a batch for logs.
 *
 * @example Output:
 *   "3 metrics, 11 sources, scales (1,5)x2 (0,1)x1"
 */
export function summarizeBatch(batch: NormalizedBatch): string {
  const sourceCount = batch.metrics.reduce((sum, metric) => sum + metric.sources.length, 0);

  const scaleCounts = new Map<string, number>();
  for (const metric of batch.metrics) {
    const key = formatScale(metric.scale);
    scaleCounts.set(key, (scaleCounts.get(key) ?? 0) + 1);
  }
  const scales = [...scaleCounts].map(([scale, count]) => `${scale}x${count}`).join(" ");

  return `${batch.metrics.length} metrics, ${sourceCount} sources, scales ${scales}`;
}
