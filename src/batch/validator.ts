/**
 * Batch validator.
 *
 * Runs the schema validator over every raw record of a candidate batch and
 * then enforces the batch-wide invariants of a ConstraintSet.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * VALIDATION STEPS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   1. Constraint set   — numMetrics 1–50, minSourcesPerMetric 1–20.
 *                          Failure stops the pass (ConfigurationError).
 *   2. Records          — every record through parseMetricRecord(); ALL
 *                          failures are collected (SchemaViolation).
 *   3. Count            — only when step 2 fully succeeded: exact match
 *                          with numMetrics (CountMismatchError).
 *   4. Sources          — every metric that passed step 2 must cite at
 *                          least minSourcesPerMetric sources
 *                          (InsufficientSourcesError, one per metric).
 *   5. Names            — metrics that passed step 2 must have distinct
 *                          names (DuplicateMetricNameError, one per name).
 *   6. Result           — no issues: a frozen NormalizedBatch.
 *
 * Issues from steps 2–5 are reported together so a generator can fix every
 * defect in its next attempt. Nothing is dropped, truncated or repaired, and
 * nothing is retried here. The pass is pure and synchronous.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { validateConstraints } from "../config/constraints/loader.js";
import { ConfigurationError, type ConfigurationIssue } from "../config/env.js";
import { parseMetricRecord, schemaViolation } from "../metrics/validators.js";
import type { Metric } from "../metrics/schema.js";
import {
  BatchValidationError,
  type BatchIssue,
  type ConfigurationViolation,
  type CountMismatch,
  type DuplicateMetricName,
  type InsufficientSources,
  type SchemaViolation,
} from "./errors.js";
import { createNormalizedBatch, type NormalizedBatch } from "./normalized.js";

export interface BatchStats {
  /** Records in the candidate batch (0 when it is not an array) */
  total: number;
  /** Records that passed schema validation */
  valid: number;
  /** Records with a schema violation */
  invalid: number;
}

export type BatchValidationResult =
  | { readonly success: true; readonly batch: Readonly<NormalizedBatch>; readonly stats: BatchStats }
  | { readonly success: false; readonly issues: readonly BatchIssue[]; readonly stats: BatchStats };

function toConfigurationViolations(
  errors: readonly ConfigurationIssue[]
): ConfigurationViolation[] {
  return errors.map((error) => ({ kind: "ConfigurationError", ...error }));
}

/**
 * Constraint-set problems as batch issues; empty when the set is valid.
 */
export function checkConstraints(constraints: unknown): ConfigurationViolation[] {
  const result = validateConstraints(constraints);
  return result.constraints ? [] : toConfigurationViolations(result.errors ?? []);
}

interface IndexedMetric {
  index: number;
  metric: Metric;
}

function checkCount(metrics: readonly IndexedMetric[], expected: number): CountMismatch | null {
  const actual = metrics.length;
  if (actual === expected) {
    return null;
  }
  return {
    kind: "CountMismatchError",
    expected,
    actual,
    reason: `expected ${expected} metrics, got ${actual}`,
  };
}

function checkMinimumSources(
  metrics: readonly IndexedMetric[],
  required: number
): InsufficientSources[] {
  const issues: InsufficientSources[] = [];

  for (const { index, metric } of metrics) {
    const actual = metric.sources.length;
    if (actual < required) {
      issues.push({
        kind: "InsufficientSourcesError",
        index,
        metric: metric.name,
        actual,
        required,
        reason: `has ${actual} source(s), but requires at least ${required} (${actual} < ${required})`,
      });
    }
  }

  return issues;
}

function findDuplicateNames(metrics: readonly IndexedMetric[]): DuplicateMetricName[] {
  const indicesByName = new Map<string, number[]>();

  for (const { index, metric } of metrics) {
    const indices = indicesByName.get(metric.name) ?? [];
    indices.push(index);
    indicesByName.set(metric.name, indices);
  }

  const issues: DuplicateMetricName[] = [];
  for (const [name, indices] of indicesByName) {
    if (indices.length > 1) {
      issues.push({
        kind: "DuplicateMetricNameError",
        metric: name,
        indices,
        reason: `metric name appears ${indices.length} times (indices ${indices.join(", ")})`,
      });
    }
  }
  return issues;
}

/**
 * Validate a candidate batch against a constraint set.
 *
 * @param records - Raw metric records as produced by the generator
 * @param constraints - ConstraintSet for this invocation
 * @returns The normalized batch, or every issue found in this pass
 *
 * @example
 *   const result = validateBatch(records, { numMetrics: 2, minSourcesPerMetric: 1 });
 *   if (!result.success) {
 *     console.log(formatBatchReport(result));
 *   }
 */
export function validateBatch(records: unknown, constraints: unknown): BatchValidationResult {
  const total = Array.isArray(records) ? records.length : 0;

  // Step 1: constraints
  const constraintResult = validateConstraints(constraints);
  if (!constraintResult.constraints) {
    const issues = toConfigurationViolations(constraintResult.errors ?? []);
    return { success: false, issues, stats: { total, valid: 0, invalid: 0 } };
  }
  const { numMetrics, minSourcesPerMetric } = constraintResult.constraints;

  if (!Array.isArray(records)) {
    return {
      success: false,
      issues: [
        schemaViolation(
          "(root)",
          records,
          "candidate batch must be a JSON array of metric records"
        ),
      ],
      stats: { total, valid: 0, invalid: 0 },
    };
  }

  // Step 2: per-record schema validation, collecting every failure
  const metrics: IndexedMetric[] = [];
  const schemaIssues: SchemaViolation[] = [];
  records.forEach((raw: unknown, index) => {
    const parsed = parseMetricRecord(raw, index);
    if (parsed.success) {
      metrics.push({ index, metric: parsed.metric });
    } else {
      schemaIssues.push(parsed.violation);
    }
  });

  const issues: BatchIssue[] = [...schemaIssues];

  // Step 3: exact count, only over a fully valid batch
  if (schemaIssues.length === 0) {
    const countIssue = checkCount(metrics, numMetrics);
    if (countIssue) issues.push(countIssue);
  }

  // Steps 4–5
  issues.push(...checkMinimumSources(metrics, minSourcesPerMetric));
  issues.push(...findDuplicateNames(metrics));

  const stats: BatchStats = {
    total,
    valid: metrics.length,
    invalid: schemaIssues.length,
  };

  if (issues.length > 0) {
    return { success: false, issues, stats };
  }

  // Step 6
  return {
    success: true,
    batch: createNormalizedBatch(
      metrics.map(({ metric }) => metric),
      constraintResult.constraints
    ),
    stats,
  };
}

/**
 * Validate a candidate batch, throwing on failure.
 *
 * @throws ConfigurationError if the constraint set is invalid
 * @throws BatchValidationError listing every issue otherwise
 */
export function validateBatchOrThrow(
  records: unknown,
  constraints: unknown
): Readonly<NormalizedBatch> {
  const result = validateBatch(records, constraints);
  if (result.success) {
    return result.batch;
  }

  const configIssues = result.issues.filter(
    (issue): issue is ConfigurationViolation => issue.kind === "ConfigurationError"
  );
  if (configIssues.length > 0) {
    throw new ConfigurationError(
      `Invalid constraint set: ${configIssues.length} validation error(s)`,
      configIssues.map(({ field, message, received }) => ({ field, message, received }))
    );
  }

  throw new BatchValidationError(
    `Batch validation failed: ${result.issues.length} issue(s)`,
    result.issues
  );
}
