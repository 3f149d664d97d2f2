/**
 * Normalized batch: the validated, immutable output of a validation pass.
 *
 * A NormalizedBatch is terminal. There is no update-in-place; fixing a batch
 * means validating a fresh candidate. Instances are deep-frozen, so any
 * attempt to mutate one throws a TypeError.
 *
 * Post-validation invariants:
 *   - metrics.length === constraints.numMetrics
 *   - every metric has >= constraints.minSourcesPerMetric sources
 *   - metric names are pairwise distinct (exact match after trim)
 *   - within a metric, source URLs are pairwise distinct
 */

import type { ConstraintSet } from "../config/constraints/schema.js";
import { toMetricRecord, type Metric, type MetricRecord } from "../metrics/schema.js";
import { deepFreeze } from "../shared/deep-freeze.js";

export interface NormalizedBatch {
  readonly constraints: Readonly<ConstraintSet>;
  readonly metrics: readonly Metric[];
}

/**
 * Assemble a batch from already-validated parts.
 * Only the batch validator calls this; it does not re-check invariants.
 */
export function createNormalizedBatch(
  metrics: readonly Metric[],
  constraints: Readonly<ConstraintSet>
): Readonly<NormalizedBatch> {
  return deepFreeze({
    constraints: { ...constraints },
    metrics: [...metrics],
  });
}

/**
 * The batch in its documented JSON array-of-metric-objects shape.
 */
export function toMetricRecords(batch: NormalizedBatch): MetricRecord[] {
  return batch.metrics.map(toMetricRecord);
}

/**
 * Metric names in batch order.
 */
export function metricNames(batch: NormalizedBatch): string[] {
  return batch.metrics.map((metric) => metric.name);
}
