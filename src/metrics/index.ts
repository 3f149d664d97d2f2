/**
 * Metric schema module.
 */

export {
  ALLOWED_SCALES,
  MAX_METRIC_NAME_LENGTH,
  MAX_TEXT_LENGTH,
  MAX_TITLE_LENGTH,
  DescriptionSchema,
  MetricNameSchema,
  RelevanceSchema,
  ScaleBoundSchema,
  SearchQuerySchema,
  SourceSchema,
  SourceUrlSchema,
  findAllowedScale,
  formatScale,
  toMetricRecord,
  type Metric,
  type MetricRecord,
  type Scale,
  type Source,
} from "./schema.js";

export {
  formatSchemaViolation,
  parseMetricRecord,
  schemaViolation,
  type MetricParseResult,
  type SchemaViolation,
} from "./validators.js";
