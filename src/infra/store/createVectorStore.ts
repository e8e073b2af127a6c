import { AppConfig } from "../../config/env.js";
import { VectorStore } from "../../domain/vectorStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { FileVectorStore } from "./fileVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export async function createVectorStore(
  config: Pick<AppConfig, "vectorStore" | "vectorStorePath" | "databaseUrl" | "vectorDimension">,
): Promise<VectorStore> {
  if (config.vectorStore === "file") {
    return new FileVectorStore(config.vectorStorePath);
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when VECTOR_STORE=pgvector.");
  }

  const store = new PgVectorStore(
    createPostgresPool(config.databaseUrl),
    config.vectorDimension,
  );
  await store.initialize();
  return store;
}
