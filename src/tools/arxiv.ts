/**
 * arXiv search through the export API.
 *
 * The API answers with an Atom feed. Each <entry> carries its title (often
 * hard-wrapped across lines) and its abstract-page URL as <id>.
 */

import { parseStringPromise } from "xml2js";
import { z } from "zod";
import { silentLogger } from "../logging/logger.js";
import { retryRequest } from "./http.js";
import type { SearchTool, SourceRecord, ToolDependencies } from "./types.js";

export const ARXIV_TOOL_NAME = "arxiv_search";
export const ARXIV_BASE_URL = "https://export.arxiv.org/api/query";
const MAX_RESULTS = 30;

// Text, or { _: text } when the element also carries attributes
const TextNodeSchema = z.union([
  z.string(),
  z.object({ _: z.string() }).transform((node) => node._),
]);

const AtomEntrySchema = z.object({
  title: TextNodeSchema.optional(),
  id: TextNodeSchema.optional(),
});

type AtomEntry = z.infer<typeof AtomEntrySchema>;

// explicitArray: false yields a bare object for a single <entry>
const AtomFeedSchema = z.object({
  feed: z.object({
    entry: z.union([z.array(AtomEntrySchema), AtomEntrySchema]).optional(),
  }),
});

export interface ArxivOptions {
  baseUrl?: string;
}

function toSourceRecords(entries: readonly AtomEntry[]): SourceRecord[] {
  const records: SourceRecord[] = [];
  for (const entry of entries) {
    const title = (entry.title ?? "").replace(/\s+/g, " ").trim();
    const url = (entry.id ?? "").trim();
    if (title && url) {
      records.push({ title, url });
    }
  }
  return records;
}

export function createArxivTool(deps: ToolDependencies, options: ArxivOptions = {}): SearchTool {
  const logger = (deps.logger ?? silentLogger).child("arxiv");
  const baseUrl = options.baseUrl ?? ARXIV_BASE_URL;

  return {
    name: ARXIV_TOOL_NAME,
    description: "Searches arXiv preprints, strongest for AI and machine learning research.",
    async search(query: string): Promise<SourceRecord[]> {
      deps.queryLog.log("ArXiv", query);

      const params = new URLSearchParams({
        search_query: query,
        start: "0",
        max_results: String(MAX_RESULTS),
      });
      const raw = await retryRequest(`${baseUrl}?${params.toString()}`, {
        fetch: deps.fetch,
        sleep: deps.sleep,
        logger,
      });
      if (raw === null) {
        logger.error("No response after retries");
        return [];
      }

      let parsed: unknown;
      try {
        parsed = await parseStringPromise(raw, { explicitArray: false, trim: true });
      } catch (err) {
        logger.error("Error parsing feed", { error: err instanceof Error ? err.message : String(err) });
        return [];
      }

      const feed = AtomFeedSchema.safeParse(parsed);
      if (!feed.success) {
        logger.error("Unexpected feed shape", {
          issues: feed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        });
        return [];
      }

      const entry = feed.data.feed.entry;
      const entries = entry === undefined ? [] : Array.isArray(entry) ? entry : [entry];
      const records = toSourceRecords(entries);
      logger.info(`Found ${records.length} results`);
      return records;
    },
  };
}
