import { ChunkMetadata } from "./types.js";

export interface VectorRecord {
  id: string;
  text: string;
  metadata: ChunkMetadata;
  embedding: number[];
}

export interface VectorQueryMatch {
  id: string;
  text: string;
  metadata: ChunkMetadata;
  /** Cosine distance; null when the back end does not report one. */
  distance: number | null;
}

export interface VectorCollection {
  readonly name: string;
  /** Insert or fully replace every record by id. */
  upsert(records: VectorRecord[]): Promise<void>;
  /** Nearest neighbours, ascending distance. */
  query(embedding: number[], limit: number): Promise<VectorQueryMatch[]>;
  count(): Promise<number>;
}

export interface VectorStore {
  getOrCreateCollection(name: string): Promise<VectorCollection>;
  /** Returns false when the collection did not exist. */
  deleteCollection(name: string): Promise<boolean>;
  close(): Promise<void>;
}
