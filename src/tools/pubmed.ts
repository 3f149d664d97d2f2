/**
 * PubMed search through NCBI E-utilities.
 *
 * Two requests per query: `esearch` for matching PMIDs, then `esummary` for
 * their titles. NCBI requires a contact email on every request, so the tool
 * cannot be created without one.
 */

import { z } from "zod";
import { ConfigurationError } from "../config/env.js";
import { silentLogger } from "../logging/logger.js";
import { fetchJson } from "./http.js";
import type { SearchTool, SourceRecord, ToolDependencies } from "./types.js";

export const PUBMED_TOOL_NAME = "pubmed_search";
export const EUTILS_BASE_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";
export const PUBMED_ARTICLE_URL = "https://pubmed.ncbi.nlm.nih.gov/";
const RETMAX = 30;

const ESearchSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()).default([]),
  }),
});

const ESummarySchema = z.object({
  result: z
    .object({
      uids: z.array(z.string()).default([]),
    })
    .catchall(z.unknown()),
});

const SummaryEntrySchema = z.object({
  title: z.string().nullish(),
});

export interface PubMedOptions {
  /** Contact email sent to NCBI (PUBMED_EMAIL) */
  email: string | undefined;
  /** Application name sent as the E-utilities `tool` parameter */
  toolName?: string;
  baseUrl?: string;
}

function requireContactEmail(email: string | undefined): string {
  const trimmed = email?.trim();
  if (!trimmed) {
    throw new ConfigurationError(
      "Missing required environment variable: PUBMED_EMAIL. NCBI requires a contact email.",
      [{ field: "PUBMED_EMAIL", message: "is required for PubMed searches" }]
    );
  }
  return trimmed;
}

/**
 * @throws ConfigurationError if no contact email is configured
 */
export function createPubMedTool(deps: ToolDependencies, options: PubMedOptions): SearchTool {
  const email = requireContactEmail(options.email);
  const logger = (deps.logger ?? silentLogger).child("pubmed");
  const baseUrl = options.baseUrl ?? EUTILS_BASE_URL;
  const requestOptions = { fetch: deps.fetch, sleep: deps.sleep, logger };

  function buildUrl(endpoint: "esearch" | "esummary", params: Record<string, string>): string {
    const search = new URLSearchParams({
      db: "pubmed",
      retmode: "json",
      tool: options.toolName ?? "grounded-metrics",
      email,
      ...params,
    });
    return `${baseUrl}/${endpoint}.fcgi?${search.toString()}`;
  }

  return {
    name: PUBMED_TOOL_NAME,
    description: "Searches biomedical and clinical literature from PubMed.",
    async search(query: string): Promise<SourceRecord[]> {
      deps.queryLog.log("PubMed", query);

      const found = await fetchJson(
        buildUrl("esearch", { term: query, retmax: String(RETMAX) }),
        ESearchSchema,
        requestOptions
      );
      const ids = found?.esearchresult.idlist ?? [];
      if (ids.length === 0) {
        return [];
      }

      const summary = await fetchJson(
        buildUrl("esummary", { id: ids.join(",") }),
        ESummarySchema,
        requestOptions
      );
      if (!summary) {
        return [];
      }

      const records: SourceRecord[] = [];
      for (const pmid of summary.result.uids) {
        const entry = SummaryEntrySchema.safeParse(summary.result[pmid]);
        const title = entry.success ? (entry.data.title ?? "").trim() : "";
        if (title) {
          records.push({ title, url: `${PUBMED_ARTICLE_URL}${pmid}/` });
        }
      }

      logger.info(`Found ${records.length} results`);
      return records;
    },
  };
}
