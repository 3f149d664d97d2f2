/**
 * Constraint set loader and validator.
 *
 * Responsible for:
 * - Validating a raw constraint object against the schema
 * - Producing structured ConfigurationError issues
 * - Freezing the result to enforce immutability
 */

import type { ZodIssue } from "zod";
import { ConstraintSetSchema, type ConstraintSet } from "./schema.js";
import { ConfigurationError, type ConfigurationIssue } from "../env.js";
import { deepFreeze } from "../../shared/deep-freeze.js";

function receivedAt(input: unknown, key: string | number | undefined): unknown {
  if (key === undefined || input === null || typeof input !== "object") {
    return input;
  }
  return Reflect.get(input, key);
}

/**
 * Convert Zod issues to configuration issues.
 */
function toConfigurationIssues(input: unknown, zodIssues: ZodIssue[]): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];

  for (const issue of zodIssues) {
    if (issue.code === "unrecognized_keys") {
      for (const key of issue.keys) {
        issues.push({
          field: key,
          message: `unknown constraint "${key}"`,
          received: receivedAt(input, key),
        });
      }
      continue;
    }

    const key = issue.path[0];
    issues.push({
      field: key === undefined ? "(root)" : String(key),
      message: issue.message,
      received: receivedAt(input, key),
    });
  }

  return issues;
}

/** Wire-format names accepted for each field */
const KEY_ALIASES: ReadonlyMap<string, string> = new Map([
  ["num_metrics", "numMetrics"],
  ["min_sources_per_metric", "minSourcesPerMetric"],
]);

/**
 * Rename snake_case keys to their camelCase fields. A key whose field is
 * also given directly is left alone and reported as unknown.
 */
function normalizeKeys(input: unknown): unknown {
  if (input === null || typeof input !== "object" || Array.isArray(input)) {
    return input;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    const field = KEY_ALIASES.get(key);
    normalized[field !== undefined && !(field in input) ? field : key] = value;
  }
  return normalized;
}

/**
 * Validate a constraint set without throwing.
 * Accepts `numMetrics`/`minSourcesPerMetric` or `num_metrics`/`min_sources_per_metric`.
 */
export function validateConstraints(input: unknown): {
  success: boolean;
  constraints?: Readonly<ConstraintSet>;
  errors?: ConfigurationIssue[];
} {
  const normalized = normalizeKeys(input);
  const result = ConstraintSetSchema.safeParse(normalized);

  if (result.success) {
    return { success: true, constraints: deepFreeze(result.data) };
  }

  return {
    success: false,
    errors: toConfigurationIssues(normalized, result.error.issues),
  };
}

/**
 * Validate and load a constraint set.
 *
 * @throws ConfigurationError if any value is missing or out of range
 */
export function loadConstraints(input: unknown): Readonly<ConstraintSet> {
  const { constraints, errors } = validateConstraints(input);

  if (constraints) {
    return constraints;
  }

  const issues = errors ?? [];
  throw new ConfigurationError(
    `Invalid constraint set: ${issues.length} validation error(s)`,
    issues
  );
}
