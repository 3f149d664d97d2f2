/**
 * Batch validation error taxonomy.
 *
 * Every violation found in one validation pass is reported as a BatchIssue,
 * a union discriminated on `kind`:
 *
 *   ConfigurationError        constraint values out of range (fatal)
 *   SchemaViolation           one record fails structural rules
 *   CountMismatchError        metric count differs from numMetrics
 *   InsufficientSourcesError  a metric cites fewer than minSourcesPerMetric
 *   DuplicateMetricNameError  two or more metrics share a name
 *
 * Issues carry enough context (index, field, expected vs. actual) for a
 * retry loop to regenerate without human intervention.
 */

import type { ConfigurationIssue } from "../config/env.js";
import { formatSchemaViolation, type SchemaViolation } from "../metrics/validators.js";

export type { SchemaViolation } from "../metrics/validators.js";

export interface ConfigurationViolation extends ConfigurationIssue {
  readonly kind: "ConfigurationError";
}

export interface CountMismatch {
  readonly kind: "CountMismatchError";
  readonly expected: number;
  readonly actual: number;
  readonly reason: string;
}

export interface InsufficientSources {
  readonly kind: "InsufficientSourcesError";
  readonly index: number;
  readonly metric: string;
  readonly actual: number;
  readonly required: number;
  readonly reason: string;
}

export interface DuplicateMetricName {
  readonly kind: "DuplicateMetricNameError";
  readonly metric: string;
  /** Every index at which the name appears */
  readonly indices: readonly number[];
  readonly reason: string;
}

export type BatchIssue =
  | ConfigurationViolation
  | SchemaViolation
  | CountMismatch
  | InsufficientSources
  | DuplicateMetricName;

export type BatchIssueKind = BatchIssue["kind"];

/**
 * Format a single issue as one line.
 */
export function formatBatchIssue(issue: BatchIssue): string {
  switch (issue.kind) {
    case "ConfigurationError":
      return `${issue.kind} ${issue.field}: ${issue.message}`;
    case "SchemaViolation":
      return formatSchemaViolation(issue);
    case "CountMismatchError":
      return `${issue.kind}: ${issue.reason}`;
    case "InsufficientSourcesError":
      return `${issue.kind} [#${issue.index}] "${issue.metric}": ${issue.reason}`;
    case "DuplicateMetricNameError":
      return `${issue.kind} "${issue.metric}": ${issue.reason}`;
  }
}

/**
 * Count issues per kind, in taxonomy order.
 */
export function countIssuesByKind(issues: readonly BatchIssue[]): Record<BatchIssueKind, number> {
  const counts: Record<BatchIssueKind, number> = {
    ConfigurationError: 0,
    SchemaViolation: 0,
    CountMismatchError: 0,
    InsufficientSourcesError: 0,
    DuplicateMetricNameError: 0,
  };
  for (const issue of issues) {
    counts[issue.kind] += 1;
  }
  return counts;
}

/**
 * Thrown form of a failed validation pass.
 */
export class BatchValidationError extends Error {
  public readonly issues: readonly BatchIssue[];

  constructor(message: string, issues: readonly BatchIssue[]) {
    super(message);
    this.name = "BatchValidationError";
    this.issues = issues;
  }

  /** Issues of one kind, narrowed to that kind's shape */
  issuesOfKind<K extends BatchIssueKind>(kind: K): Array<Extract<BatchIssue, { kind: K }>> {
    return this.issues.filter(
      (issue): issue is Extract<BatchIssue, { kind: K }> => issue.kind === kind
    );
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [`Batch validation failed: ${this.issues.length} issue(s)`];
    for (const issue of this.issues) {
      lines.push(`  - ${formatBatchIssue(issue)}`);
    }
    return lines.join("\n");
  }
}
