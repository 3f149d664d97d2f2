/**
 * Batch constraint module.
 *
 * Usage:
 *   import { loadConstraints, DEFAULT_CONSTRAINTS } from "./config/constraints/index.js";
 *
 *   const constraints = loadConstraints({ numMetrics: 5, minSourcesPerMetric: 2 });
 */

export {
  ConstraintSetSchema,
  NUM_METRICS_RANGE,
  MIN_SOURCES_RANGE,
  type ConstraintSet,
} from "./schema.js";

export { loadConstraints, validateConstraints } from "./loader.js";

export {
  DEFAULT_CONSTRAINTS,
  NUM_METRICS_DEFAULT,
  MIN_SOURCES_DEFAULT,
} from "./defaults.js";
