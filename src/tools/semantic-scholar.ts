/**
 * Semantic Scholar paper search.
 */

import { z } from "zod";
import { silentLogger } from "../logging/logger.js";
import { fetchJson } from "./http.js";
import type { SearchTool, SourceRecord, ToolDependencies } from "./types.js";

export const SEMANTIC_SCHOLAR_TOOL_NAME = "semantic_scholar_search";
export const SEMANTIC_SCHOLAR_BASE_URL = "https://api.semanticscholar.org/graph/v1/paper/search";
export const SEMANTIC_SCHOLAR_PAPER_URL = "https://www.semanticscholar.org/paper/";
const LIMIT = 30;
const FIELDS = "title,url,paperId,year,openAccessPdf";

const PaperSearchSchema = z.object({
  data: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        paperId: z.string().nullish(),
      })
    )
    .nullish(),
});

export interface SemanticScholarOptions {
  apiKey?: string;
  baseUrl?: string;
}

export function createSemanticScholarTool(
  deps: ToolDependencies,
  options: SemanticScholarOptions = {}
): SearchTool {
  const logger = (deps.logger ?? silentLogger).child("semantic-scholar");
  const baseUrl = options.baseUrl ?? SEMANTIC_SCHOLAR_BASE_URL;
  const headers: Record<string, string> = options.apiKey ? { "x-api-key": options.apiKey } : {};

  return {
    name: SEMANTIC_SCHOLAR_TOOL_NAME,
    description: "Searches research papers from Semantic Scholar.",
    async search(query: string): Promise<SourceRecord[]> {
      deps.queryLog.log("SemanticScholar", query);

      const params = new URLSearchParams({ query, limit: String(LIMIT), fields: FIELDS });
      const data = await fetchJson(`${baseUrl}?${params.toString()}`, PaperSearchSchema, {
        headers,
        fetch: deps.fetch,
        sleep: deps.sleep,
        logger,
      });
      if (!data) {
        logger.error("No response after retries");
        return [];
      }

      const records: SourceRecord[] = [];
      for (const paper of data.data ?? []) {
        const title = (paper.title ?? "").trim();
        const url =
          paper.url || (paper.paperId ? `${SEMANTIC_SCHOLAR_PAPER_URL}${paper.paperId}` : "");
        if (title && url) {
          records.push({ title, url });
        }
      }

      logger.info(`Found ${records.length} results`);
      return records;
    },
  };
}
