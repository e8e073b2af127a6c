import { SearchResult } from "../domain/types.js";
import type { Logger } from "../utils/logger.js";
import { VectorIndex } from "./vectorIndex.js";

export const NO_CONTEXT_AVAILABLE = "No relevant background information available.";
export const CONTEXT_RETRIEVAL_FAILED = "Error retrieving background information.";

export class Retriever {
  constructor(
    private readonly index: VectorIndex,
    private readonly logger: Logger,
  ) {}

  async retrieve(query: string, limit: number): Promise<SearchResult[]> {
    return this.index.search(query, limit);
  }

  /**
   * Joins the best-matching passages with blank lines, nearest first. Never
   * returns an empty string so prompts always receive some context.
   */
  async retrieveContext(query: string, limit: number): Promise<string> {
    const outcome = await this.index.searchDetailed(query, limit);
    if (!outcome.ok) {
      this.logger.error({ err: outcome.error.message }, "context retrieval failed");
      return CONTEXT_RETRIEVAL_FAILED;
    }

    if (outcome.results.length === 0) {
      this.logger.warn({ limit }, "no context retrieved");
      return NO_CONTEXT_AVAILABLE;
    }

    return outcome.results.map((result) => result.text).join("\n\n");
  }
}
