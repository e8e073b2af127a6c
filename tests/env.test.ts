import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      openaiApiKey: null,
      openaiBaseUrl: "https://api.openai.com/v1",
      embeddingModel: "text-embedding-3-small",
      chatModel: "gpt-3.5-turbo",
      temperature: 0.7,
      vectorStore: "file",
      vectorStorePath: "data/vector_store",
      collectionName: "job_assistant",
      databaseUrl: null,
      vectorDimension: 1536,
      documentsDir: "data/documents",
      chunkSize: 500,
      chunkOverlap: 50,
      logging: { level: "info", pretty: false },
      transport: "stdio",
      host: "0.0.0.0",
      port: 3000,
    });
  });

  it("parses numeric and boolean settings", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "  test-secret  ",
      OPENAI_TEMPERATURE: "0.2",
      CHUNK_SIZE: "800",
      CHUNK_OVERLAP: "100",
      LOG_PRETTY: "true",
      MCP_TRANSPORT: "http",
      MCP_PORT: "4100",
    });

    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.temperature).toBe(0.2);
    expect(config.chunkSize).toBe(800);
    expect(config.chunkOverlap).toBe(100);
    expect(config.logging.pretty).toBe(true);
    expect(config.transport).toBe("http");
    expect(config.port).toBe(4100);
  });

  it("treats a blank api key as missing", () => {
    expect(loadConfig({ OPENAI_API_KEY: "   " }).openaiApiKey).toBeNull();
  });

  it("requires a database url for pgvector", () => {
    expect(() => loadConfig({ VECTOR_STORE: "pgvector" })).toThrow(
      "VECTOR_STORE=pgvector requires DATABASE_URL.",
    );
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => loadConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      "CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100).",
    );
  });

  it("rejects collection names outside the allowed pattern", () => {
    expect(() => loadConfig({ COLLECTION_NAME: "job assistant" })).toThrow();
  });
});
