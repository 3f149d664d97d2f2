/**
 * OpenAlex works search.
 *
 * Free-text `search` first; when that finds nothing, a `title.search` filter
 * on the same query. The work's DOI is preferred as its URL, falling back to
 * the OpenAlex id (itself an https URL).
 */

import { z } from "zod";
import { silentLogger } from "../logging/logger.js";
import { fetchJson } from "./http.js";
import type { SearchTool, SourceRecord, ToolDependencies } from "./types.js";

export const OPENALEX_TOOL_NAME = "openalex_search";
export const OPENALEX_BASE_URL = "https://api.openalex.org/works";
const PER_PAGE = 30;

const OpenAlexWorksSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        doi: z.string().nullish(),
        id: z.string().nullish(),
      })
    )
    .nullish(),
});

type OpenAlexWork = NonNullable<z.infer<typeof OpenAlexWorksSchema>["results"]>[number];

export interface OpenAlexOptions {
  /** Contact address for the OpenAlex polite pool */
  email?: string;
  baseUrl?: string;
}

function toSourceRecords(works: readonly OpenAlexWork[]): SourceRecord[] {
  const records: SourceRecord[] = [];
  for (const work of works) {
    const title = (work.title ?? "").trim();
    const url = work.doi || work.id || "";
    if (title && url) {
      records.push({ title, url });
    }
  }
  return records;
}

export function createOpenAlexTool(
  deps: ToolDependencies,
  options: OpenAlexOptions = {}
): SearchTool {
  const logger = (deps.logger ?? silentLogger).child("openalex");
  const baseUrl = options.baseUrl ?? OPENALEX_BASE_URL;

  function buildUrl(param: "search" | "filter", value: string): string {
    const params = new URLSearchParams({ "per-page": String(PER_PAGE) });
    if (options.email) {
      params.set("mailto", options.email);
    }
    params.set(param, value);
    return `${baseUrl}?${params.toString()}`;
  }

  async function fetchWorks(url: string): Promise<OpenAlexWork[]> {
    const data = await fetchJson(url, OpenAlexWorksSchema, {
      fetch: deps.fetch,
      sleep: deps.sleep,
      logger,
    });
    return data?.results ?? [];
  }

  return {
    name: OPENALEX_TOOL_NAME,
    description: "Searches the OpenAlex database for research works, returning titles and URLs.",
    async search(query: string): Promise<SourceRecord[]> {
      deps.queryLog.log("OpenAlex", query);

      let works = await fetchWorks(buildUrl("search", query));
      if (works.length === 0) {
        works = await fetchWorks(buildUrl("filter", `title.search:${query}`));
      }

      const records = toSourceRecords(works);
      logger.info(`Found ${records.length} results`);
      return records;
    },
  };
}
