/**
 * Default batch constraints.
 *
 * Used by the CLI and entry points when the environment does not override
 * them. The validator itself never falls back to these values.
 */

import type { ConstraintSet } from "./schema.js";

export const NUM_METRICS_DEFAULT = 10;
export const MIN_SOURCES_DEFAULT = 3;

export const DEFAULT_CONSTRAINTS: ConstraintSet = {
  numMetrics: NUM_METRICS_DEFAULT,
  minSourcesPerMetric: MIN_SOURCES_DEFAULT,
};
