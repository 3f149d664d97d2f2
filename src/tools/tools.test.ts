/**
 * Retrieval Tool Tests
 *
 * Run with: node --import tsx src/tools/tools.test.ts
 *
 * All HTTP traffic goes through an in-process fetch stub; nothing leaves
 * the process.
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { z } from "zod";

import { fetchJson, retryRequest, type FetchLike } from "./http.js";
import {
  QueryLog,
  formatQueryLogEntry,
  formatQueryLogTimestamp,
  parseQueryLog,
  readQueryLog,
} from "./query-log.js";
import { createOpenAlexTool } from "./openalex.js";
import { createSemanticScholarTool } from "./semantic-scholar.js";
import { createPubMedTool } from "./pubmed.js";
import { createArxivTool } from "./arxiv.js";
import { ToolRegistry, ToolRegistryError, createDefaultRegistry } from "./registry.js";
import type { SearchTool } from "./types.js";
import { ConfigurationError } from "../config/env.js";
import { createLogger, memorySink } from "../logging/logger.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

type StubResponse = { status: number; body: string } | Error;

interface FetchCall {
  url: string;
  headers: Record<string, string>;
}

/**
 * Fetch stub that replays queued responses in order.
 */
function stubFetch(responses: StubResponse[]): { fetch: FetchLike; calls: FetchCall[] } {
  const queue = [...responses];
  const calls: FetchCall[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, headers: init.headers });
    const next = queue.shift();
    if (next === undefined) {
      throw new Error(`unexpected request: ${url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return { status: next.status, text: async () => next.body };
  };
  return { fetch, calls };
}

function json(body: unknown, status = 200): StubResponse {
  return { status, body: JSON.stringify(body) };
}

function recordSleeps(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

function searchParam(url: string | undefined, key: string): string | null {
  return url === undefined ? null : new URL(url).searchParams.get(key);
}

// ═══════════════════════════════════════════════════════════════════════════
// RETRY REQUEST
// ═══════════════════════════════════════════════════════════════════════════

section("retryRequest");

await test("returns the body on success", async () => {
  const { fetch, calls } = stubFetch([{ status: 200, body: "ok" }]);
  assert.equal(await retryRequest("https://api.example.org/x", { fetch }), "ok");
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.headers["User-Agent"], "grounded-metrics/0.1.0");
});

await test("passes custom headers", async () => {
  const { fetch, calls } = stubFetch([{ status: 200, body: "ok" }]);
  await retryRequest("https://api.example.org/x", { fetch, headers: { "x-api-key": "test-key" } });
  assert.equal(calls[0]?.headers["x-api-key"], "test-key");
});

await test("retries transient statuses with exponential backoff", async () => {
  const { fetch, calls } = stubFetch([
    { status: 429, body: "" },
    { status: 503, body: "" },
    { status: 200, body: "done" },
  ]);
  const { sleep, delays } = recordSleeps();
  assert.equal(await retryRequest("https://api.example.org/x", { fetch, sleep }), "done");
  assert.equal(calls.length, 3);
  assert.deepEqual(delays, [2000, 4000]);
});

await test("logs each retry under the adapter scope", async () => {
  const { fetch } = stubFetch([
    json({ results: [] }, 503),
    json({ results: [{ title: "Paper", id: "https://openalex.org/W1" }] }),
  ]);
  const memory = memorySink();
  const logger = createLogger({ console: false, scope: "tools", sinks: [memory.sink] });
  const { sleep } = recordSleeps();
  const tool = createOpenAlexTool({ queryLog: new QueryLog(), fetch, sleep, logger });

  await tool.search("x");
  const retry = memory.records.find((record) => record.level === "warn");
  assert.equal(retry?.scope, "tools.openalex");
  assert.deepEqual(retry?.context, { attempt: 1 });
  assert.ok(retry?.message.startsWith("HTTP 503 for https://api.openalex.org/works?"));
  assert.ok(retry?.message.endsWith("; retrying in 2.0s"));
});

await test("gives up after the last retry", async () => {
  const { fetch, calls } = stubFetch([
    { status: 500, body: "" },
    { status: 502, body: "" },
    { status: 504, body: "" },
  ]);
  const { sleep, delays } = recordSleeps();
  assert.equal(await retryRequest("https://api.example.org/x", { fetch, sleep }), null);
  assert.equal(calls.length, 3);
  assert.deepEqual(delays, [2000, 4000]);
});

await test("does not retry other statuses", async () => {
  const { fetch, calls } = stubFetch([{ status: 404, body: "missing" }]);
  const { sleep, delays } = recordSleeps();
  assert.equal(await retryRequest("https://api.example.org/x", { fetch, sleep }), null);
  assert.equal(calls.length, 1);
  assert.deepEqual(delays, []);
});

await test("does not retry network errors", async () => {
  const { fetch, calls } = stubFetch([new Error("connection reset")]);
  assert.equal(await retryRequest("https://api.example.org/x", { fetch }), null);
  assert.equal(calls.length, 1);
});

await test("honors retries and backoff options", async () => {
  const { fetch, calls } = stubFetch([
    { status: 503, body: "" },
    { status: 503, body: "" },
  ]);
  const { sleep, delays } = recordSleeps();
  const body = await retryRequest("https://api.example.org/x", {
    fetch,
    sleep,
    retries: 1,
    backoffMs: 10,
  });
  assert.equal(body, null);
  assert.equal(calls.length, 2);
  assert.deepEqual(delays, [10]);
});

section("fetchJson");

const ShapeSchema = z.object({ value: z.number() });

await test("parses a matching body", async () => {
  const { fetch } = stubFetch([json({ value: 3 })]);
  assert.deepEqual(await fetchJson("https://api.example.org/x", ShapeSchema, { fetch }), { value: 3 });
});

await test("returns null for invalid JSON", async () => {
  const { fetch } = stubFetch([{ status: 200, body: "<html>" }]);
  assert.equal(await fetchJson("https://api.example.org/x", ShapeSchema, { fetch }), null);
});

await test("returns null for an unexpected shape", async () => {
  const { fetch } = stubFetch([json({ value: "three" })]);
  assert.equal(await fetchJson("https://api.example.org/x", ShapeSchema, { fetch }), null);
});

// ═══════════════════════════════════════════════════════════════════════════
// QUERY LOG
// ═══════════════════════════════════════════════════════════════════════════

section("QueryLog");

await test("records trimmed queries per tool", () => {
  const log = new QueryLog();
  log.log("OpenAlex", "  llm evaluation  ");
  log.log("PubMed", "clinical summarization");
  log.log("OpenAlex", "rubric design");
  assert.equal(log.count, 3);
  assert.deepEqual(log.getEntries()[0], { tool: "OpenAlex", query: "llm evaluation" });
  assert.deepEqual(log.countByTool(), { OpenAlex: 2, PubMed: 1 });
  assert.equal(log.meetsMinimum(3), true);
  assert.equal(log.meetsMinimum(4), false);
});

await test("folds line breaks so each query stays on one line", () => {
  const log = new QueryLog();
  log.log("ArXiv", "hallucination\n  detection\r\nbenchmarks ");
  assert.deepEqual(log.getEntries(), [{ tool: "ArXiv", query: "hallucination detection benchmarks" }]);
  assert.deepEqual(
    parseQueryLog(log.getEntries().map((entry) => formatQueryLogEntry(entry) + "\n").join("")),
    [{ tool: "ArXiv", query: "hallucination detection benchmarks" }]
  );
});

await test("formats local timestamps", () => {
  assert.equal(formatQueryLogTimestamp(new Date(2024, 0, 15, 9, 5, 3)), "2024-01-15_09-05-03");
});

await test("parses saved log text", () => {
  assert.deepEqual(parseQueryLog("OpenAlex: a: b\n\nloose line\n"), [
    { tool: "OpenAlex", query: "a: b" },
    { tool: "(unknown)", query: "loose line" },
  ]);
});

const logDir = mkdtempSync(join(tmpdir(), "query-log-"));
try {
  await test("saves to a timestamped file and clears", () => {
    const log = new QueryLog(() => new Date(2024, 0, 15, 9, 5, 3));
    log.log("OpenAlex", "llm evaluation");
    log.log("PubMed", "clinical summarization");

    const filePath = log.save(join(logDir, "logs"));
    assert.equal(filePath, join(logDir, "logs", "2024-01-15_09-05-03.txt"));
    assert.equal(
      readFileSync(join(logDir, "logs", "2024-01-15_09-05-03.txt"), "utf-8"),
      "OpenAlex: llm evaluation\nPubMed: clinical summarization\n"
    );
    assert.equal(log.count, 0);
    assert.deepEqual(readQueryLog(join(logDir, "logs", "2024-01-15_09-05-03.txt")), [
      { tool: "OpenAlex", query: "llm evaluation" },
      { tool: "PubMed", query: "clinical summarization" },
    ]);
  });

  await test("saving an empty log writes nothing", () => {
    const log = new QueryLog();
    assert.equal(log.save(join(logDir, "empty")), null);
    assert.equal(existsSync(join(logDir, "empty")), false);
  });
} finally {
  rmSync(logDir, { recursive: true, force: true });
}

// ═══════════════════════════════════════════════════════════════════════════
// OPENALEX
// ═══════════════════════════════════════════════════════════════════════════

section("OpenAlex");

await test("maps works to sources and logs the query", async () => {
  const { fetch, calls } = stubFetch([
    json({
      results: [
        { title: " Paper One ", doi: "https://doi.org/10.1000/1", id: "https://openalex.org/W1" },
        { title: "Paper Two", doi: null, id: "https://openalex.org/W2" },
        { title: "", id: "https://openalex.org/W3" },
        { title: "No Link" },
      ],
    }),
  ]);
  const queryLog = new QueryLog();
  const tool = createOpenAlexTool({ queryLog, fetch }, { email: "test@example.org" });

  const sources = await tool.search("llm evaluation");
  assert.deepEqual(sources, [
    { title: "Paper One", url: "https://doi.org/10.1000/1" },
    { title: "Paper Two", url: "https://openalex.org/W2" },
  ]);
  assert.deepEqual(queryLog.getEntries(), [{ tool: "OpenAlex", query: "llm evaluation" }]);
  assert.equal(searchParam(calls[0]?.url, "search"), "llm evaluation");
  assert.equal(searchParam(calls[0]?.url, "per-page"), "30");
  assert.equal(searchParam(calls[0]?.url, "mailto"), "test@example.org");
});

await test("falls back to a title filter", async () => {
  const { fetch, calls } = stubFetch([
    json({ results: [] }),
    json({ results: [{ title: "Found By Title", id: "https://openalex.org/W9" }] }),
  ]);
  const tool = createOpenAlexTool({ queryLog: new QueryLog(), fetch });

  const sources = await tool.search("rubric");
  assert.deepEqual(sources, [{ title: "Found By Title", url: "https://openalex.org/W9" }]);
  assert.equal(calls.length, 2);
  assert.equal(searchParam(calls[1]?.url, "filter"), "title.search:rubric");
  assert.equal(searchParam(calls[1]?.url, "mailto"), null);
});

await test("returns [] when both requests fail", async () => {
  const { fetch, calls } = stubFetch([
    { status: 404, body: "" },
    { status: 404, body: "" },
  ]);
  const tool = createOpenAlexTool({ queryLog: new QueryLog(), fetch });
  assert.deepEqual(await tool.search("anything"), []);
  assert.equal(calls.length, 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// SEMANTIC SCHOLAR
// ═══════════════════════════════════════════════════════════════════════════

section("Semantic Scholar");

await test("maps papers and builds fallback urls", async () => {
  const { fetch, calls } = stubFetch([
    json({
      data: [
        { title: "Alpha", url: null, paperId: "abc" },
        { title: " Beta ", url: "https://www.semanticscholar.org/paper/def" },
        { title: "Gamma" },
      ],
    }),
  ]);
  const queryLog = new QueryLog();
  const tool = createSemanticScholarTool({ queryLog, fetch }, { apiKey: "test-key" });

  assert.deepEqual(await tool.search("faithfulness"), [
    { title: "Alpha", url: "https://www.semanticscholar.org/paper/abc" },
    { title: "Beta", url: "https://www.semanticscholar.org/paper/def" },
  ]);
  assert.equal(calls[0]?.headers["x-api-key"], "test-key");
  assert.equal(searchParam(calls[0]?.url, "query"), "faithfulness");
  assert.equal(searchParam(calls[0]?.url, "limit"), "30");
  assert.deepEqual(queryLog.countByTool(), { SemanticScholar: 1 });
});

await test("sends no api key when none is configured", async () => {
  const { fetch, calls } = stubFetch([json({ data: [] })]);
  const tool = createSemanticScholarTool({ queryLog: new QueryLog(), fetch });
  assert.deepEqual(await tool.search("x"), []);
  assert.equal(calls[0]?.headers["x-api-key"], undefined);
});

await test("returns [] on an unparseable body", async () => {
  const { fetch } = stubFetch([{ status: 200, body: "not json" }]);
  const tool = createSemanticScholarTool({ queryLog: new QueryLog(), fetch });
  assert.deepEqual(await tool.search("x"), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// ARXIV
// ═══════════════════════════════════════════════════════════════════════════

section("arXiv");

const ATOM_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="html">ArXiv Query: search_query=all:rubric</title>
  <entry>
    <id>http://arxiv.org/abs/2401.00001v1</id>
    <title>Rubric-Based Evaluation of
  Long-Form Answers</title>
  </entry>
  <entry>
    <id>http://arxiv.org/abs/2401.00002v2</id>
    <title>Judging the Judges</title>
  </entry>
  <entry>
    <id>http://arxiv.org/abs/2401.00003v1</id>
    <title></title>
  </entry>
</feed>`;

await test("maps Atom entries to sources", async () => {
  const { fetch, calls } = stubFetch([{ status: 200, body: ATOM_FEED }]);
  const queryLog = new QueryLog();
  const tool = createArxivTool({ queryLog, fetch });

  assert.deepEqual(await tool.search("rubric evaluation"), [
    { title: "Rubric-Based Evaluation of Long-Form Answers", url: "http://arxiv.org/abs/2401.00001v1" },
    { title: "Judging the Judges", url: "http://arxiv.org/abs/2401.00002v2" },
  ]);
  assert.equal(new URL(calls[0]?.url ?? "").host, "export.arxiv.org");
  assert.equal(searchParam(calls[0]?.url, "search_query"), "rubric evaluation");
  assert.equal(searchParam(calls[0]?.url, "start"), "0");
  assert.equal(searchParam(calls[0]?.url, "max_results"), "30");
  assert.deepEqual(queryLog.getEntries(), [{ tool: "ArXiv", query: "rubric evaluation" }]);
});

await test("handles a feed with a single entry", async () => {
  const body =
    '<feed xmlns="http://www.w3.org/2005/Atom"><entry>' +
    "<id>http://arxiv.org/abs/2402.00009v1</id><title>Only One</title></entry></feed>";
  const { fetch } = stubFetch([{ status: 200, body }]);
  const tool = createArxivTool({ queryLog: new QueryLog(), fetch });
  assert.deepEqual(await tool.search("x"), [
    { title: "Only One", url: "http://arxiv.org/abs/2402.00009v1" },
  ]);
});

await test("returns [] for a feed without entries", async () => {
  const body = '<feed xmlns="http://www.w3.org/2005/Atom"><title>empty</title></feed>';
  const { fetch } = stubFetch([{ status: 200, body }]);
  const tool = createArxivTool({ queryLog: new QueryLog(), fetch });
  assert.deepEqual(await tool.search("x"), []);
});

await test("returns [] for a body that is not XML", async () => {
  const { fetch } = stubFetch([{ status: 200, body: "Rate limit exceeded" }]);
  const tool = createArxivTool({ queryLog: new QueryLog(), fetch });
  assert.deepEqual(await tool.search("x"), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// PUBMED
// ═══════════════════════════════════════════════════════════════════════════

section("PubMed");

await test("requires a contact email", () => {
  assert.throws(
    () => createPubMedTool({ queryLog: new QueryLog() }, { email: undefined }),
    (err: unknown) => err instanceof ConfigurationError && err.issues[0]?.field === "PUBMED_EMAIL"
  );
  assert.throws(
    () => createPubMedTool({ queryLog: new QueryLog() }, { email: "  " }),
    ConfigurationError
  );
});

await test("searches then summarizes", async () => {
  const { fetch, calls } = stubFetch([
    json({ esearchresult: { idlist: ["111", "222", "333"] } }),
    json({
      result: {
        uids: ["111", "222", "333"],
        "111": { title: " First trial. " },
        "222": { title: "" },
        "333": { title: "Third cohort study." },
      },
    }),
  ]);
  const queryLog = new QueryLog();
  const tool = createPubMedTool({ queryLog, fetch }, { email: "test@example.org" });

  assert.deepEqual(await tool.search("discharge summary quality"), [
    { title: "First trial.", url: "https://pubmed.ncbi.nlm.nih.gov/111/" },
    { title: "Third cohort study.", url: "https://pubmed.ncbi.nlm.nih.gov/333/" },
  ]);
  assert.equal(new URL(calls[0]?.url ?? "").pathname, "/entrez/eutils/esearch.fcgi");
  assert.equal(searchParam(calls[0]?.url, "term"), "discharge summary quality");
  assert.equal(searchParam(calls[0]?.url, "retmax"), "30");
  assert.equal(searchParam(calls[0]?.url, "email"), "test@example.org");
  assert.equal(searchParam(calls[0]?.url, "tool"), "grounded-metrics");
  assert.equal(searchParam(calls[1]?.url, "id"), "111,222,333");
  assert.deepEqual(queryLog.getEntries(), [{ tool: "PubMed", query: "discharge summary quality" }]);
});

await test("skips the summary when nothing matches", async () => {
  const { fetch, calls } = stubFetch([json({ esearchresult: { idlist: [] } })]);
  const tool = createPubMedTool({ queryLog: new QueryLog(), fetch }, { email: "test@example.org" });
  assert.deepEqual(await tool.search("nothing"), []);
  assert.equal(calls.length, 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

section("ToolRegistry");

function fakeTool(name: string): SearchTool {
  return {
    name,
    description: `${name} tool`,
    search: async (query) => [{ title: `${name} result for ${query}`, url: "https://example.org/r" }],
  };
}

await test("looks tools up by name", async () => {
  const registry = ToolRegistry.create([fakeTool("alpha"), fakeTool("beta")]);
  assert.equal(registry.size, 2);
  assert.deepEqual(registry.names(), ["alpha", "beta"]);
  assert.equal(registry.has("beta"), true);
  assert.deepEqual(await registry.search("beta", "q"), [
    { title: "beta result for q", url: "https://example.org/r" },
  ]);
});

await test("rejects duplicate registration", () => {
  const registry = ToolRegistry.create([fakeTool("alpha")]);
  assert.throws(() => registry.register(fakeTool("alpha")), ToolRegistryError);
});

await test("unknown names list the registered tools", () => {
  const registry = ToolRegistry.create([fakeTool("alpha"), fakeTool("beta")]);
  assert.throws(
    () => registry.get("gamma"),
    (err: unknown) =>
      err instanceof ToolRegistryError &&
      err.message === 'Unknown tool "gamma". Registered tools: alpha, beta'
  );
});

await test("default registry leaves out PubMed without an email", () => {
  const registry = createDefaultRegistry({}, { queryLog: new QueryLog() });
  assert.deepEqual(registry.names(), ["openalex_search", "semantic_scholar_search", "arxiv_search"]);
});

await test("default registry includes PubMed with an email", () => {
  const registry = createDefaultRegistry(
    { pubmedEmail: "test@example.org" },
    { queryLog: new QueryLog() }
  );
  assert.deepEqual(registry.names(), [
    "openalex_search",
    "semantic_scholar_search",
    "arxiv_search",
    "pubmed_search",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log("\n═══════════════════════════════════════════════════════════════");
console.log(` Results: ${passed} passed, ${failed} failed`);
console.log("═══════════════════════════════════════════════════════════════\n");

if (failed > 0) {
  process.exit(1);
}
