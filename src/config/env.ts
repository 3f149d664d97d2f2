/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

/**
 * A single configuration problem: which setting and what is wrong with it.
 */
export interface ConfigurationIssue {
  /** Setting name (environment variable or constraint field) */
  field: string;
  /** Human-readable error message */
  message: string;
  /** Value that was received, if any */
  received?: unknown;
}

/**
 * Raised when configuration is missing or out of range.
 * Fatal: the caller must fix its inputs before retrying.
 */
export class ConfigurationError extends Error {
  public readonly kind = "ConfigurationError" as const;
  public readonly issues: ConfigurationIssue[];

  constructor(message: string, issues: ConfigurationIssue[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  format(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get an optional environment variable, or undefined when unset.
 */
export function maybeEnv(key: string): string | undefined {
  const value = process.env[key];
  return value !== undefined && value !== "" ? value : undefined;
}

/**
 * Get an optional environment variable as an integer.
 */
export function optionalEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(
      `Environment variable ${key} must be a valid integer, got: ${value}`,
      [{ field: key, message: "must be a valid integer", received: value }]
    );
  }
  return parseInt(value, 10);
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigurationError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`,
    [{ field: key, message: "must be a boolean", received: value }]
  );
}
