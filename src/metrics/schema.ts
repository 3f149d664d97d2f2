/**
 * Metric and source schema definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * GROUNDED METRIC — ONE EVALUATION DIMENSION WITH CITED EVIDENCE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A metric is one dimension along which a human grades an LLM response:
 *
 *   1. Name        — letters and spaces only ("Factual Accuracy")
 *   2. Scale       — exactly (1,5) or (0,1); nothing else is gradeable
 *   3. Description — what the metric evaluates
 *   4. Relevance   — why it matters for the task
 *   5. Sources     — title + URL pairs copied from retrieval-tool output
 *   6. Queries     — the search queries that found those sources
 *
 * Wire shape (what generators emit and what a validated batch serializes to):
 *
 *   { "metric": str, "min": num, "max": num, "description": str,
 *     "relevance": str, "sources": [{"title": str, "url": str}],
 *     "search_queries": [str] }
 *
 * The zod field schemas below are applied one field at a time by
 * parseMetricRecord() so that the first failing field decides the error.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";

export const MAX_METRIC_NAME_LENGTH = 100;
export const MAX_TITLE_LENGTH = 300;
export const MAX_TEXT_LENGTH = 500;

const LETTERS_AND_SPACES = /^[A-Za-z ]+$/;
const HAS_LETTER = /[A-Za-z]/;

/**
 * The only gradeable scales: a 1–5 Likert scale or a binary 0/1 judgement.
 */
export const ALLOWED_SCALES = [
  { min: 1, max: 5 },
  { min: 0, max: 1 },
] as const;

export type Scale = (typeof ALLOWED_SCALES)[number];

export function formatScale(scale: { min: unknown; max: unknown }): string {
  return `(${String(scale.min)},${String(scale.max)})`;
}

/**
 * Look up an allowed scale by its bounds.
 */
export function findAllowedScale(min: number, max: number): Scale | undefined {
  return ALLOWED_SCALES.find((scale) => scale.min === min && scale.max === max);
}

// ═══════════════════════════════════════════════════════════════════════════
// FIELD SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Free text that needs at least one letter (descriptions, titles).
 * Digits and punctuation are fine.
 */
function textSchema(field: string, maxLength: number) {
  return z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .trim()
    .min(1, `${field} must be non-empty`)
    .max(maxLength, `${field} is unreasonably long (>${maxLength} chars)`)
    .regex(HAS_LETTER, `${field} must contain at least one letter`);
}

export const MetricNameSchema = z
  .string({
    required_error: "metric name is required",
    invalid_type_error: "metric name must be a string",
  })
  .trim()
  .min(1, "metric name must be a non-empty string")
  .max(MAX_METRIC_NAME_LENGTH, `metric name is too long (>${MAX_METRIC_NAME_LENGTH} chars)`)
  .regex(
    LETTERS_AND_SPACES,
    "metric name must contain only letters and spaces (no digits or punctuation)"
  );

export const ScaleBoundSchema = z
  .number({
    required_error: "scale bound is required",
    invalid_type_error: "scale bounds must be numbers",
  })
  .int("scale bounds must be integers");

export const DescriptionSchema = textSchema("description", MAX_TEXT_LENGTH);
export const RelevanceSchema = textSchema("relevance", MAX_TEXT_LENGTH);

function isHttpUrlWithHost(value: string): boolean {
  if (!URL.canParse(value)) {
    return false;
  }
  const url = new URL(value);
  return (url.protocol === "http:" || url.protocol === "https:") && url.hostname.length > 0;
}

export const SourceUrlSchema = z
  .string({
    required_error: "url is required",
    invalid_type_error: "url must be a string",
  })
  .trim()
  .min(1, "url must be non-empty")
  .url("url must be a well-formed absolute URL")
  .refine(isHttpUrlWithHost, "url must use http or https and include a host");

/**
 * One retrieved citation. Extra keys from tool output are dropped.
 */
export const SourceSchema = z.object(
  {
    title: textSchema("title", MAX_TITLE_LENGTH),
    url: SourceUrlSchema,
  },
  {
    required_error: "source is required",
    invalid_type_error: "source must be an object with title and url",
  }
);

export const SearchQuerySchema = z
  .string({
    required_error: "search query is required",
    invalid_type_error: "search query must be a string",
  })
  .trim()
  .min(1, "search query must be non-empty");

// ═══════════════════════════════════════════════════════════════════════════
// TYPED RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export type Source = Readonly<z.infer<typeof SourceSchema>>;

export interface Metric {
  readonly name: string;
  readonly scale: Scale;
  readonly description: string;
  readonly relevance: string;
  readonly sources: readonly Source[];
  readonly searchQueries: readonly string[];
}

/**
 * A metric in its documented JSON shape.
 */
export interface MetricRecord {
  metric: string;
  min: number;
  max: number;
  description: string;
  relevance: string;
  sources: Array<{ title: string; url: string }>;
  search_queries: string[];
}

export function toMetricRecord(metric: Metric): MetricRecord {
  return {
    metric: metric.name,
    min: metric.scale.min,
    max: metric.scale.max,
    description: metric.description,
    relevance: metric.relevance,
    sources: metric.sources.map((source) => ({ title: source.title, url: source.url })),
    search_queries: [...metric.searchQueries],
  };
}
