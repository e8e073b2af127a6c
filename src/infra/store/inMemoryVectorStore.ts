import {
  VectorCollection,
  VectorQueryMatch,
  VectorRecord,
  VectorStore,
} from "../../domain/vectorStore.js";
import { cosineDistance } from "../../utils/vector.js";

export type CollectionChangeListener = (collection: InMemoryCollection) => Promise<void>;

export class InMemoryCollection implements VectorCollection {
  constructor(
    readonly name: string,
    private readonly records: Map<string, VectorRecord>,
    private readonly onChange: CollectionChangeListener,
  ) {}

  /** All-or-nothing: if the change listener rejects, the previous records are restored. */
  async upsert(records: VectorRecord[]): Promise<void> {
    const previous = new Map<string, VectorRecord | undefined>();
    for (const record of records) {
      if (!previous.has(record.id)) {
        previous.set(record.id, this.records.get(record.id));
      }
      this.records.set(record.id, {
        id: record.id,
        text: record.text,
        metadata: { ...record.metadata },
        embedding: [...record.embedding],
      });
    }

    try {
      await this.onChange(this);
    } catch (error) {
      for (const [id, record] of previous) {
        if (record) {
          this.records.set(id, record);
        } else {
          this.records.delete(id);
        }
      }
      throw error;
    }
  }

  async query(embedding: number[], limit: number): Promise<VectorQueryMatch[]> {
    if (limit <= 0 || this.records.size === 0) {
      return [];
    }

    const scored = [...this.records.values()].map((record) => ({
      record,
      distance: cosineDistance(embedding, record.embedding),
    }));

    scored.sort(
      (a, b) => a.distance - b.distance || a.record.id.localeCompare(b.record.id),
    );

    return scored.slice(0, limit).map(({ record, distance }) => ({
      id: record.id,
      text: record.text,
      metadata: { ...record.metadata },
      distance,
    }));
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  snapshot(): VectorRecord[] {
    return [...this.records.values()];
  }
}

export class InMemoryVectorStore implements VectorStore {
  protected collections = new Map<string, InMemoryCollection>();

  async getOrCreateCollection(name: string): Promise<VectorCollection> {
    return this.getOrCreateInMemoryCollection(name, []);
  }

  async deleteCollection(name: string): Promise<boolean> {
    return this.collections.delete(name);
  }

  async close(): Promise<void> {}

  protected getOrCreateInMemoryCollection(
    name: string,
    initialRecords: VectorRecord[],
  ): InMemoryCollection {
    const existing = this.collections.get(name);
    if (existing) {
      return existing;
    }

    const records = new Map(initialRecords.map((record) => [record.id, record]));
    const collection = new InMemoryCollection(name, records, (changed) =>
      this.onCollectionChanged(changed),
    );
    this.collections.set(name, collection);
    return collection;
  }

  protected async onCollectionChanged(_collection: InMemoryCollection): Promise<void> {}
}
