/**
 * Batch constraint schema.
 *
 * A ConstraintSet is supplied by the caller for every validation pass. It is
 * never derived from the batch itself and never read from process-wide state
 * inside the validator.
 *
 *   numMetrics           exact number of metrics the batch must contain
 *   minSourcesPerMetric  minimum number of cited sources for every metric
 *
 * The loader also accepts the wire names num_metrics and
 * min_sources_per_metric and maps them onto these fields.
 */

import { z } from "zod";

export const NUM_METRICS_RANGE = { min: 1, max: 50 } as const;
export const MIN_SOURCES_RANGE = { min: 1, max: 20 } as const;

function boundedInt(field: string, range: { min: number; max: number }) {
  const rangeMessage = `${field} must be between ${range.min} and ${range.max}`;
  return z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .int(`${field} must be an integer`)
    .min(range.min, rangeMessage)
    .max(range.max, rangeMessage);
}

export const ConstraintSetSchema = z
  .object({
    /** Exact number of metrics a batch must contain (1–50) */
    numMetrics: boundedInt("numMetrics", NUM_METRICS_RANGE).describe(
      "Exact number of metrics the batch must contain"
    ),

    /** Minimum sources per metric (1–20) */
    minSourcesPerMetric: boundedInt("minSourcesPerMetric", MIN_SOURCES_RANGE).describe(
      "Minimum number of sources every metric must cite"
    ),
  })
  .strict();

export type ConstraintSet = z.infer<typeof ConstraintSetSchema>;
