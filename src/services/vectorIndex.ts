import {
  EmbeddingFailureError,
  errorMessage,
  IndexOperationError,
  VectorStoreError,
} from "../domain/errors.js";
import { Chunk, chunkId, SearchResult } from "../domain/types.js";
import { VectorCollection, VectorRecord, VectorStore } from "../domain/vectorStore.js";
import { EmbeddingClient } from "../infra/ai/types.js";
import type { Logger } from "../utils/logger.js";

export interface VectorIndexOptions {
  store: VectorStore;
  embeddings: EmbeddingClient;
  collectionName: string;
  logger: Logger;
}

export type UpsertOutcome =
  | { status: "upserted"; count: number }
  | { status: "skipped"; count: 0 }
  | { status: "failed"; error: IndexOperationError };

export type SearchOutcome =
  | { ok: true; results: SearchResult[] }
  | { ok: false; error: IndexOperationError };

/**
 * A named collection of embedded chunks. Store access is serialized through a
 * single queue so a reset is never observed between delete and recreate;
 * embedding calls run outside the queue.
 */
export class VectorIndex {
  private readonly store: VectorStore;

  private readonly embeddings: EmbeddingClient;

  private readonly logger: Logger;

  readonly collectionName: string;

  private collection: VectorCollection | null = null;

  private queue: Promise<void> = Promise.resolve();

  constructor(options: VectorIndexOptions) {
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.collectionName = options.collectionName;
    this.logger = options.logger.child({ collection: options.collectionName });
  }

  async initialize(): Promise<void> {
    await this.exclusive(() => this.ensureCollection());
  }

  async upsert(chunks: Chunk[]): Promise<UpsertOutcome> {
    if (chunks.length === 0) {
      this.logger.warn("no chunks to upsert");
      return { status: "skipped", count: 0 };
    }

    let embeddings: number[][];
    try {
      embeddings = await this.embeddings.embedTexts(chunks.map((chunk) => chunk.text));
    } catch (error) {
      return this.failUpsert(
        new EmbeddingFailureError(`Embedding generation failed: ${errorMessage(error)}`, {
          cause: error,
        }),
      );
    }

    if (embeddings.length !== chunks.length) {
      return this.failUpsert(
        new EmbeddingFailureError(
          `Embedding provider returned ${embeddings.length} vectors for ${chunks.length} chunks.`,
        ),
      );
    }

    const records: VectorRecord[] = chunks.map((chunk, index) => ({
      id: chunkId(chunk.metadata),
      text: chunk.text,
      metadata: { ...chunk.metadata },
      embedding: embeddings[index],
    }));

    try {
      await this.exclusive(async () => {
        const collection = await this.ensureCollection();
        await collection.upsert(records);
      });
    } catch (error) {
      return this.failUpsert(
        new VectorStoreError(`Vector store upsert failed: ${errorMessage(error)}`, {
          cause: error,
        }),
      );
    }

    this.logger.info({ count: records.length }, "upserted chunks");
    return { status: "upserted", count: records.length };
  }

  async searchDetailed(query: string, limit: number): Promise<SearchOutcome> {
    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embeddings.embedQuery(query);
    } catch (error) {
      return this.failSearch(
        new EmbeddingFailureError(`Query embedding failed: ${errorMessage(error)}`, {
          cause: error,
        }),
      );
    }

    try {
      const matches = await this.exclusive(async () => {
        const collection = await this.ensureCollection();
        return collection.query(queryEmbedding, limit);
      });
      return { ok: true, results: matches.map((match) => ({ ...match })) };
    } catch (error) {
      return this.failSearch(
        new VectorStoreError(`Vector store query failed: ${errorMessage(error)}`, {
          cause: error,
        }),
      );
    }
  }

  /** Never throws: failures are logged and reported as no results. */
  async search(query: string, limit: number): Promise<SearchResult[]> {
    const outcome = await this.searchDetailed(query, limit);
    return outcome.ok ? outcome.results : [];
  }

  async count(): Promise<number> {
    try {
      return await this.exclusive(async () => {
        const collection = await this.ensureCollection();
        return collection.count();
      });
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, "failed to count collection");
      return 0;
    }
  }

  async reset(): Promise<void> {
    await this.exclusive(async () => {
      this.collection = null;
      try {
        const deleted = await this.store.deleteCollection(this.collectionName);
        this.logger.info(
          deleted ? "collection deleted" : "collection did not exist, skipping delete",
        );
      } catch (error) {
        this.logger.warn(
          { err: errorMessage(error) },
          "error deleting collection, recreating anyway",
        );
      }
      await this.ensureCollection();
    });
    this.logger.info("collection reset");
  }

  private async ensureCollection(): Promise<VectorCollection> {
    if (!this.collection) {
      this.collection = await this.store.getOrCreateCollection(this.collectionName);
      this.logger.debug("collection ready");
    }
    return this.collection;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private failUpsert(error: IndexOperationError): UpsertOutcome {
    this.logger.error({ err: error.message, kind: error.kind }, "upsert aborted");
    return { status: "failed", error };
  }

  private failSearch(error: IndexOperationError): SearchOutcome {
    this.logger.error({ err: error.message, kind: error.kind }, "search failed");
    return { ok: false, error };
  }
}
