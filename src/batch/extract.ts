/**
 * Candidate batch extraction from raw generator output.
 *
 * Generators rarely emit a bare JSON document. The array is looked for in
 * three places, first match wins:
 *
 *   1. the whole (trimmed) text is an array        [ ... ]
 *   2. a fenced code block, optionally tagged       ```json [ ... ] ```
 *      json, json5 or jsonc
 *   3. the first balanced top-level array inside    Here you go: [ ... ] Done.
 *      surrounding prose; brackets inside string
 *      literals are ignored
 *
 * Extraction never repairs content. Whatever is found is handed to the batch
 * validator unchanged.
 */

import { schemaViolation, type SchemaViolation } from "../metrics/validators.js";
import { checkConstraints, validateBatch, type BatchValidationResult } from "./validator.js";

const FENCE = "```";
const FENCE_TAGS = new Set(["json", "json5", "jsonc"]);

function isBracketed(text: string): boolean {
  return text.startsWith("[") && text.endsWith("]");
}

function fromFencedBlocks(text: string): string | null {
  if (!text.includes(FENCE)) {
    return null;
  }

  const parts = text.split(FENCE);
  // Odd-numbered parts sit between an opening and a closing fence
  for (let i = 1; i < parts.length; i += 2) {
    let block = parts[i] ?? "";
    const [firstLine = "", ...rest] = block.split(/\r?\n/);
    if (FENCE_TAGS.has(firstLine.trim().toLowerCase())) {
      block = rest.join("\n");
    }
    block = block.trim();
    if (isBracketed(block)) {
      return block;
    }
  }
  return null;
}

function fromBalancedScan(text: string): string | null {
  const start = text.indexOf("[");
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "[") {
      depth++;
    } else if (ch === "]") {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return null;
}

/**
 * Find the top-level JSON array text in raw generator output.
 *
 * @returns The array text, or null when none is present
 */
export function extractJsonArray(raw: string): string | null {
  const text = raw.trim();
  if (isBracketed(text)) {
    return text;
  }
  return fromFencedBlocks(text) ?? fromBalancedScan(text);
}

export type CandidateParseResult =
  | { readonly success: true; readonly records: unknown }
  | { readonly success: false; readonly violation: SchemaViolation };

/**
 * Extract and parse the candidate batch from raw generator output.
 * Failures are reported as a SchemaViolation on the whole batch.
 */
export function parseCandidateBatch(raw: string): CandidateParseResult {
  const arrayText = extractJsonArray(raw);
  if (arrayText === null) {
    return {
      success: false,
      violation: schemaViolation(
        "(root)",
        raw.length > 80 ? `${raw.slice(0, 77)}...` : raw,
        "could not find a top-level JSON array in the output"
      ),
    };
  }

  try {
    return { success: true, records: JSON.parse(arrayText) };
  } catch (err) {
    return {
      success: false,
      violation: schemaViolation(
        "(root)",
        arrayText.length > 80 ? `${arrayText.slice(0, 77)}...` : arrayText,
        `malformed JSON: ${err instanceof Error ? err.message : String(err)}`
      ),
    };
  }
}

/**
 * Extract, parse and validate raw generator output in one step.
 * Constraint errors take precedence over extraction errors.
 */
export function validateGeneratorOutput(raw: string, constraints: unknown): BatchValidationResult {
  const candidate = parseCandidateBatch(raw);
  if (candidate.success) {
    return validateBatch(candidate.records, constraints);
  }

  const configIssues = checkConstraints(constraints);
  return {
    success: false,
    issues: configIssues.length > 0 ? configIssues : [candidate.violation],
    stats: { total: 0, valid: 0, invalid: 0 },
  };
}
