/**
 * Tool registry.
 *
 * An explicit name → tool mapping, built once at startup and handed to the
 * generation layer. Nothing registers itself on import.
 *
 * @example
 *   const registry = ToolRegistry.create([openAlex, semanticScholar]);
 *   const sources = await registry.search("openalex_search", "llm hallucination");
 */

import type { AppConfig } from "../config/index.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { createArxivTool } from "./arxiv.js";
import { createOpenAlexTool } from "./openalex.js";
import { createPubMedTool } from "./pubmed.js";
import { createSemanticScholarTool } from "./semantic-scholar.js";
import type { SearchTool, SourceRecord, ToolDependencies } from "./types.js";

export class ToolRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolRegistryError";
  }
}

export class ToolRegistry {
  private readonly tools = new Map<string, SearchTool>();

  static create(tools: readonly SearchTool[]): ToolRegistry {
    const registry = new ToolRegistry();
    for (const tool of tools) {
      registry.register(tool);
    }
    return registry;
  }

  /**
   * @throws ToolRegistryError if a tool with the same name is registered
   */
  register(tool: SearchTool): this {
    if (this.tools.has(tool.name)) {
      throw new ToolRegistryError(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * @throws ToolRegistryError listing the known names if none matches
   */
  get(name: string): SearchTool {
    const tool = this.tools.get(name);
    if (!tool) {
      const known = this.names();
      throw new ToolRegistryError(
        `Unknown tool "${name}". Registered tools: ${known.length > 0 ? known.join(", ") : "(none)"}`
      );
    }
    return tool;
  }

  /** Names in registration order */
  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): SearchTool[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }

  search(name: string, query: string): Promise<SourceRecord[]> {
    return this.get(name).search(query);
  }
}

/**
 * Registry with every adapter the configuration allows.
 * PubMed is left out, with a warning, when PUBMED_EMAIL is not set.
 */
export function createDefaultRegistry(
  config: Pick<AppConfig, "pubmedEmail" | "openAlexEmail" | "semanticScholarApiKey"> &
    Partial<Pick<AppConfig, "appName">>,
  deps: ToolDependencies
): ToolRegistry {
  const logger: Logger = deps.logger ?? silentLogger;
  const registry = ToolRegistry.create([
    createOpenAlexTool(deps, { email: config.openAlexEmail }),
    createSemanticScholarTool(deps, { apiKey: config.semanticScholarApiKey }),
    createArxivTool(deps),
  ]);

  if (config.pubmedEmail) {
    registry.register(createPubMedTool(deps, { email: config.pubmedEmail, toolName: config.appName }));
  } else {
    logger.warn("PUBMED_EMAIL is not set; pubmed_search is unavailable");
  }

  return registry;
}
