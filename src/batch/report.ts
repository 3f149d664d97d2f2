/**
 * Human-readable validation reports.
 */

import { countIssuesByKind, formatBatchIssue, type BatchIssueKind } from "./errors.js";
import type { BatchValidationResult } from "./validator.js";
import { summarizeBatch } from "./serialization.js";

const KIND_LABELS: Record<BatchIssueKind, string> = {
  ConfigurationError: "Config Errors:",
  SchemaViolation: "Schema Violations:",
  CountMismatchError: "Count Mismatches:",
  InsufficientSourcesError: "Too Few Sources:",
  DuplicateMetricNameError: "Duplicate Names:",
};

/**
 * Format a validation result for display.
 */
export function formatBatchReport(result: BatchValidationResult): string {
  const lines: string[] = [];

  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(" Metric Batch Validation Report");
  lines.push("═══════════════════════════════════════════════════════════════");

  lines.push("");
  lines.push(`Total Records:      ${result.stats.total}`);
  lines.push(`Valid Records:      ${result.stats.valid}`);
  lines.push(`Invalid Records:    ${result.stats.invalid}`);

  if (result.success) {
    lines.push("");
    lines.push(`✓ Batch accepted: ${summarizeBatch(result.batch)}`);
    return lines.join("\n");
  }

  const counts = countIssuesByKind(result.issues);
  lines.push("");
  for (const kind of Object.keys(KIND_LABELS).filter(isIssueKind)) {
    if (counts[kind] > 0) {
      lines.push(`${KIND_LABELS[kind].padEnd(20)}${counts[kind]}`);
    }
  }

  lines.push("");
  lines.push("───────────────────────────────────────────────────────────────");
  lines.push(" ISSUES (batch rejected)");
  lines.push("───────────────────────────────────────────────────────────────");
  for (const issue of result.issues) {
    lines.push(`  - ${formatBatchIssue(issue)}`);
  }

  return lines.join("\n");
}

function isIssueKind(value: string): value is BatchIssueKind {
  return value in KIND_LABELS;
}
