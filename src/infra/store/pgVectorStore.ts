import { Pool } from "pg";
import { chunkMetadataSchema } from "../../domain/schemas.js";
import {
  VectorCollection,
  VectorQueryMatch,
  VectorRecord,
  VectorStore,
} from "../../domain/vectorStore.js";

interface PgPassageRow {
  id: string;
  content: string;
  metadata: unknown;
  distance: number | string | null;
}

// hnsw needs pgvector 0.5+.
export function pgVectorSchemaStatements(vectorDimension: number): string[] {
  return [
    `CREATE EXTENSION IF NOT EXISTS vector`,
    `CREATE TABLE IF NOT EXISTS vector_collections (
      name TEXT PRIMARY KEY,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`,
    `CREATE TABLE IF NOT EXISTS vector_passages (
      collection TEXT NOT NULL REFERENCES vector_collections(name) ON DELETE CASCADE,
      id TEXT NOT NULL,
      content TEXT NOT NULL,
      metadata JSONB NOT NULL,
      embedding VECTOR(${vectorDimension}) NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (collection, id)
    )`,
    `CREATE INDEX IF NOT EXISTS idx_vector_passages_embedding
      ON vector_passages USING hnsw (embedding vector_cosine_ops)`,
  ];
}

export class PgVectorStore implements VectorStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    for (const statement of pgVectorSchemaStatements(this.vectorDimension)) {
      await this.pool.query(statement);
    }

    this.initialized = true;
  }

  async getOrCreateCollection(name: string): Promise<VectorCollection> {
    await this.initialize();
    await this.pool.query(
      `INSERT INTO vector_collections (name) VALUES ($1) ON CONFLICT (name) DO NOTHING`,
      [name],
    );
    return new PgVectorCollection(this.pool, name);
  }

  async deleteCollection(name: string): Promise<boolean> {
    await this.initialize();
    const result = await this.pool.query(`DELETE FROM vector_collections WHERE name = $1`, [
      name,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

class PgVectorCollection implements VectorCollection {
  constructor(
    private readonly pool: Pool,
    readonly name: string,
  ) {}

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const record of records) {
        await client.query(
          `
            INSERT INTO vector_passages (collection, id, content, metadata, embedding, updated_at)
            VALUES ($1, $2, $3, $4::jsonb, $5::vector, NOW())
            ON CONFLICT (collection, id)
            DO UPDATE SET
              content = EXCLUDED.content,
              metadata = EXCLUDED.metadata,
              embedding = EXCLUDED.embedding,
              updated_at = NOW()
          `,
          [
            this.name,
            record.id,
            record.text,
            JSON.stringify(record.metadata),
            toVectorLiteral(record.embedding),
          ],
        );
      }
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async query(embedding: number[], limit: number): Promise<VectorQueryMatch[]> {
    if (limit <= 0) {
      return [];
    }

    const result = await this.pool.query<PgPassageRow>(
      `
        SELECT id, content, metadata, (embedding <=> $2::vector) AS distance
        FROM vector_passages
        WHERE collection = $1
        ORDER BY embedding <=> $2::vector, id ASC
        LIMIT $3
      `,
      [this.name, toVectorLiteral(embedding), limit],
    );

    return result.rows.map((row) => ({
      id: row.id,
      text: row.content,
      metadata: chunkMetadataSchema.parse(row.metadata),
      distance: row.distance === null ? null : Number(row.distance),
    }));
  }

  async count(): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM vector_passages WHERE collection = $1`,
      [this.name],
    );
    return Number(result.rows[0]?.count ?? 0);
  }
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
