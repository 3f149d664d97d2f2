/**
 * Metric schema validator.
 *
 * Turns one raw, untyped metric record (as emitted by a generator) into a
 * typed, frozen Metric, or reports the FIRST structural violation it finds.
 *
 * Checks run in a fixed order so identical bad input always yields the
 * identical violation:
 *
 *   1. record shape   — must be a plain object
 *   2. name           — letters and spaces only, non-empty after trim
 *   3. scale          — integer bounds, min < max, (1,5) or (0,1)
 *   4. description    — then relevance; non-empty after trim
 *   5. sources        — non-empty; valid title + absolute URL; unique URLs
 *   6. search_queries — non-empty; every entry non-empty after trim
 *
 * No network or other I/O happens here.
 *
 * USAGE:
 *   const result = parseMetricRecord(raw, 3);
 *   if (!result.success) {
 *     console.log(formatSchemaViolation(result.violation));
 *   }
 */

import type { ZodType } from "zod";
import {
  MetricNameSchema,
  ScaleBoundSchema,
  DescriptionSchema,
  RelevanceSchema,
  SourceSchema,
  SearchQuerySchema,
  ALLOWED_SCALES,
  findAllowedScale,
  formatScale,
  type Metric,
  type Scale,
  type Source,
} from "./schema.js";

/**
 * A metric record that fails structural rules.
 * Attributable to a record index (absent for batch-level shape problems).
 */
export interface SchemaViolation {
  readonly kind: "SchemaViolation";
  /** Position of the record in the candidate batch */
  readonly index?: number;
  /** Offending field, e.g. "metric", "scale", "sources[2].url", "(root)" */
  readonly field: string;
  /** The value that was received for that field */
  readonly received: unknown;
  /** Human-readable reason */
  readonly reason: string;
}

export type MetricParseResult =
  | { readonly success: true; readonly metric: Metric }
  | { readonly success: false; readonly violation: SchemaViolation };

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Thrown inside this module only, to stop at the first violation.
 */
class FirstViolation extends Error {
  constructor(public readonly violation: SchemaViolation) {
    super(violation.reason);
  }
}

export function schemaViolation(
  field: string,
  received: unknown,
  reason: string,
  index?: number
): SchemaViolation {
  return index === undefined
    ? { kind: "SchemaViolation", field, received, reason }
    : { kind: "SchemaViolation", index, field, received, reason };
}

/**
 * Parse one value with a field schema, failing on its first issue.
 */
function parseField<T>(
  schema: ZodType<T>,
  value: unknown,
  field: string,
  index: number | undefined
): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const [first] = result.error.issues;
  const subPath = first && first.path.length > 0 ? `.${first.path.join(".")}` : "";
  const received = first && first.path.length > 0 && isRecord(value)
    ? value[String(first.path[0])]
    : value;

  throw new FirstViolation(
    schemaViolation(`${field}${subPath}`, received, first?.message ?? "invalid value", index)
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// FIELD CHECKS
// ═══════════════════════════════════════════════════════════════════════════

function readScaleInput(raw: RawRecord, index: number | undefined): { min: unknown; max: unknown } {
  const hasBounds = "min" in raw || "max" in raw;
  const hasScale = "scale" in raw;

  let fromScale: { min: unknown; max: unknown } | undefined;
  if (hasScale) {
    const scale = raw["scale"];
    if (Array.isArray(scale) && scale.length === 2) {
      fromScale = { min: scale[0], max: scale[1] };
    } else if (isRecord(scale) && "min" in scale && "max" in scale) {
      fromScale = { min: scale["min"], max: scale["max"] };
    } else {
      throw new FirstViolation(
        schemaViolation("scale", scale, "scale must be [min, max] or {min, max}", index)
      );
    }
  }

  if (!hasBounds) {
    if (fromScale) {
      return fromScale;
    }
    throw new FirstViolation(
      schemaViolation(
        "scale",
        undefined,
        "scale is required: provide min and max, or scale as [min, max]",
        index
      )
    );
  }

  const bounds = { min: raw["min"], max: raw["max"] };
  if (fromScale && (fromScale.min !== bounds.min || fromScale.max !== bounds.max)) {
    throw new FirstViolation(
      schemaViolation(
        "scale",
        { ...bounds, scale: raw["scale"] },
        `min/max ${formatScale(bounds)} disagree with scale ${formatScale(fromScale)}`,
        index
      )
    );
  }
  return bounds;
}

function checkScale(raw: RawRecord, index: number | undefined): Scale {
  const input = readScaleInput(raw, index);

  const min = ScaleBoundSchema.safeParse(input.min);
  const max = ScaleBoundSchema.safeParse(input.max);
  if (!min.success || !max.success) {
    const issue = !min.success ? min.error.issues[0] : !max.success ? max.error.issues[0] : undefined;
    throw new FirstViolation(
      schemaViolation("scale", input, issue?.message ?? "scale bounds must be integers", index)
    );
  }

  if (min.data >= max.data) {
    throw new FirstViolation(
      schemaViolation("scale", input, `min must be less than max, got ${formatScale(input)}`, index)
    );
  }

  const scale = findAllowedScale(min.data, max.data);
  if (!scale) {
    const allowed = ALLOWED_SCALES.map(formatScale).join(" or ");
    throw new FirstViolation(
      schemaViolation(
        "scale",
        input,
        `scale ${formatScale(input)} is not allowed; allowed combinations are ${allowed}`,
        index
      )
    );
  }
  return scale;
}

function checkSources(raw: RawRecord, index: number | undefined): Source[] {
  const value = raw["sources"];
  if (!Array.isArray(value)) {
    const reason = value === undefined ? "sources is required" : "sources must be an array";
    throw new FirstViolation(schemaViolation("sources", value, reason, index));
  }
  if (value.length === 0) {
    throw new FirstViolation(
      schemaViolation("sources", value, "sources must contain at least one source", index)
    );
  }

  const sources: Source[] = [];
  const seenUrls = new Map<string, number>();

  value.forEach((element: unknown, position) => {
    const source = parseField(SourceSchema, element, `sources[${position}]`, index);

    const firstPosition = seenUrls.get(source.url);
    if (firstPosition !== undefined) {
      throw new FirstViolation(
        schemaViolation(
          `sources[${position}].url`,
          source.url,
          `duplicate source url (first seen at sources[${firstPosition}])`,
          index
        )
      );
    }
    seenUrls.set(source.url, position);
    sources.push(Object.freeze({ title: source.title, url: source.url }));
  });

  return sources;
}

function checkSearchQueries(raw: RawRecord, index: number | undefined): string[] {
  const value = raw["search_queries"];
  if (!Array.isArray(value)) {
    const reason =
      value === undefined ? "search_queries is required" : "search_queries must be an array";
    throw new FirstViolation(schemaViolation("search_queries", value, reason, index));
  }
  if (value.length === 0) {
    throw new FirstViolation(
      schemaViolation("search_queries", value, "search_queries must not be empty", index)
    );
  }

  return value.map((query: unknown, position) =>
    parseField(SearchQuerySchema, query, `search_queries[${position}]`, index)
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// MAIN VALIDATION FUNCTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Validate one raw metric record.
 *
 * @param raw - Untyped record from the generator
 * @param index - Position in the candidate batch, carried into the violation
 */
export function parseMetricRecord(raw: unknown, index?: number): MetricParseResult {
  if (!isRecord(raw)) {
    return {
      success: false,
      violation: schemaViolation(
        "(record)",
        raw,
        "metric record must be a JSON object",
        index
      ),
    };
  }

  try {
    const name = parseField(MetricNameSchema, raw["metric"], "metric", index);
    const scale = checkScale(raw, index);
    const description = parseField(DescriptionSchema, raw["description"], "description", index);
    const relevance = parseField(RelevanceSchema, raw["relevance"], "relevance", index);
    const sources = checkSources(raw, index);
    const searchQueries = checkSearchQueries(raw, index);

    const metric: Metric = Object.freeze({
      name,
      scale,
      description,
      relevance,
      sources: Object.freeze(sources),
      searchQueries: Object.freeze(searchQueries),
    });
    return { success: true, metric };
  } catch (err) {
    if (err instanceof FirstViolation) {
      return { success: false, violation: err.violation };
    }
    throw err;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

function stringifyReceived(value: unknown): string {
  if (typeof value === "function") {
    return value.name ? `[function ${value.name}]` : "[function]";
  }
  if (typeof value === "bigint") {
    return `${value}n`;
  }
  try {
    // undefined for symbols and other values JSON cannot carry
    return JSON.stringify(value) ?? String(value);
  } catch {
    return `[unserializable ${typeof value}]`;
  }
}

function describeReceived(value: unknown): string {
  if (value === undefined) {
    return "undefined";
  }
  const text = stringifyReceived(value);
  return text.length > 80 ? `${text.slice(0, 77)}...` : text;
}

/**
 * Format a schema violation as a single line.
 *
 * @example Output:
 *   SchemaViolation [#2] metric: metric name must contain only letters and spaces (no digits or punctuation) (received "Accuracy 2")
 */
export function formatSchemaViolation(violation: SchemaViolation): string {
  const location = violation.index === undefined ? "" : ` [#${violation.index}]`;
  return (
    `${violation.kind}${location} ${violation.field}: ${violation.reason}` +
    ` (received ${describeReceived(violation.received)})`
  );
}
