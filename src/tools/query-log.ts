/**
 * Query audit log.
 *
 * Records every query a retrieval tool sends, so a run can be audited and the
 * generator's query discipline (a minimum number of searches before emitting
 * metrics) can be checked. Entries live in memory until save() writes them to
 * a timestamped text file, one "{tool}: {query}" line per query.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export interface QueryLogEntry {
  readonly tool: string;
  readonly query: string;
}

const SEPARATOR = ": ";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local time as "YYYY-MM-DD_HH-MM-SS".
 */
export function formatQueryLogTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function formatQueryLogEntry(entry: QueryLogEntry): string {
  return `${entry.tool}${SEPARATOR}${entry.query}`;
}

/**
 * Query counts per tool, in first-use order.
 */
export function countQueriesByTool(entries: readonly QueryLogEntry[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const { tool } of entries) {
    counts[tool] = (counts[tool] ?? 0) + 1;
  }
  return counts;
}

export class QueryLog {
  private readonly entries: QueryLogEntry[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /**
   * Record one query. Surrounding whitespace is dropped and line breaks are
   * folded into single spaces, so every query stays on one saved line.
   */
  log(tool: string, query: string): void {
    this.entries.push({ tool, query: query.replace(/\s*[\r\n]+\s*/g, " ").trim() });
  }

  get count(): number {
    return this.entries.length;
  }

  getEntries(): readonly QueryLogEntry[] {
    return [...this.entries];
  }

  countByTool(): Record<string, number> {
    return countQueriesByTool(this.entries);
  }

  meetsMinimum(threshold: number): boolean {
    return this.entries.length >= threshold;
  }

  clear(): void {
    this.entries.length = 0;
  }

  /**
   * Write buffered entries to "{directory}/{timestamp}.txt" and clear them.
   *
   * @returns Path of the written file, or null when there was nothing to save
   */
  save(directory: string): string | null {
    if (this.entries.length === 0) {
      return null;
    }

    if (!existsSync(directory)) {
      mkdirSync(directory, { recursive: true });
    }

    const filePath = join(directory, `${formatQueryLogTimestamp(this.clock())}.txt`);
    const content = this.entries.map((entry) => formatQueryLogEntry(entry) + "\n").join("");
    writeFileSync(filePath, content, "utf-8");

    this.clear();
    return filePath;
  }
}

/**
 * Parse the text of a saved query log. Blank lines are skipped; a line
 * without a tool prefix is attributed to "(unknown)".
 */
export function parseQueryLog(text: string): QueryLogEntry[] {
  const entries: QueryLogEntry[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === "") continue;
    const at = line.indexOf(SEPARATOR);
    entries.push(
      at === -1
        ? { tool: "(unknown)", query: line.trim() }
        : { tool: line.slice(0, at), query: line.slice(at + SEPARATOR.length).trim() }
    );
  }
  return entries;
}

/**
 * Read a saved query log file.
 *
 * @throws Error if the file does not exist
 */
export function readQueryLog(filePath: string): QueryLogEntry[] {
  if (!existsSync(filePath)) {
    throw new Error(`Query log not found: ${filePath}`);
  }
  return parseQueryLog(readFileSync(filePath, "utf-8"));
}
