/**
 * Logging Tests
 *
 * Run with: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger, formatLogEntry, isLogLevel, memorySink } from "./logger.js";
import { generateRunId, getRunId, initRunId, RUN_ID_PATTERN } from "./run-id.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

const TIMESTAMP = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] /;

console.log("\n── Run IDs ──");

test("generateRunId uses the UTC date and 6 hex chars", () => {
  const runId = generateRunId(new Date("2024-01-15T10:00:00Z"));
  assert.ok(runId.startsWith("20240115-"));
  assert.match(runId, RUN_ID_PATTERN);
});

test("initRunId keeps a well-formed explicit id", () => {
  assert.equal(initRunId("20240115-a1b2c3"), "20240115-a1b2c3");
  assert.equal(getRunId(), "20240115-a1b2c3");
});

test("initRunId rejects a malformed id", () => {
  assert.throws(() => initRunId("bad"), /Invalid run ID "bad"/);
  assert.equal(getRunId(), "20240115-a1b2c3");
});

console.log("\n── Log entries ──");

test("formats level, run id, scope and context", () => {
  const line = formatLogEntry({
    timestamp: new Date("2024-01-15T10:00:00.000Z"),
    level: "warn",
    runId: "20240115-a1b2c3",
    scope: "validate-batch",
    message: "Batch rejected",
    context: { issues: 2 },
  });
  assert.equal(
    line,
    '[2024-01-15T10:00:00.000Z] [WARN ] [20240115-a1b2c3] validate-batch: Batch rejected {"issues":2}'
  );
});

test("omits empty context and missing scope", () => {
  const line = formatLogEntry({
    timestamp: new Date("2024-01-15T10:00:00.000Z"),
    level: "info",
    runId: null,
    message: "Started",
    context: {},
  });
  assert.equal(line, "[2024-01-15T10:00:00.000Z] [INFO ] [no-run-id] Started");
});

test("isLogLevel", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("error"), true);
  assert.equal(isLogLevel("verbose"), false);
});

console.log("\n── Loggers ──");

test("records carry the current run id", () => {
  const memory = memorySink();
  const logger = createLogger({ console: false, sinks: [memory.sink] });
  logger.info("Validating batch", { numMetrics: 10 });
  assert.equal(memory.records.length, 1);
  assert.equal(memory.records[0]?.runId, "20240115-a1b2c3");
  assert.deepEqual(memory.records[0]?.context, { numMetrics: 10 });
  assert.equal(
    memory.lines[0]?.replace(TIMESTAMP, ""),
    '[INFO ] [20240115-a1b2c3] Validating batch {"numMetrics":10}'
  );
});

test("child loggers nest their scope", () => {
  const memory = memorySink();
  const logger = createLogger({ console: false, scope: "tools", sinks: [memory.sink] });
  logger.child("openalex").child("retry").warn("HTTP 503");
  assert.equal(memory.records[0]?.scope, "tools.openalex.retry");
  assert.equal(
    memory.lines[0]?.replace(TIMESTAMP, ""),
    "[WARN ] [20240115-a1b2c3] tools.openalex.retry: HTTP 503"
  );
});

test("entries below the level are dropped", () => {
  const memory = memorySink();
  const logger = createLogger({ level: "warn", console: false, sinks: [memory.sink] });
  logger.debug("a");
  logger.info("b");
  logger.warn("c");
  logger.child("x").error("d");
  assert.deepEqual(
    memory.records.map((r) => r.message),
    ["c", "d"]
  );
});

test("file sink appends lines and creates the directory", () => {
  const dir = mkdtempSync(join(tmpdir(), "logger-"));
  try {
    const file = join(dir, "logs", "run.log");
    const logger = createLogger({ console: false, file });
    logger.info("first");
    logger.error("second");
    const lines = readFileSync(file, "utf-8").split("\n");
    assert.equal(lines.length, 3);
    assert.equal(lines[0]?.replace(TIMESTAMP, ""), "[INFO ] [20240115-a1b2c3] first");
    assert.equal(lines[1]?.replace(TIMESTAMP, ""), "[ERROR] [20240115-a1b2c3] second");
    assert.equal(lines[2], "");
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

console.log("\n═══════════════════════════════════════════════════════════════");
console.log(` Results: ${passed} passed, ${failed} failed`);
console.log("═══════════════════════════════════════════════════════════════\n");

if (failed > 0) {
  process.exit(1);
}
