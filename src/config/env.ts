import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).transform((value) => value === "true");

export const COLLECTION_NAME_PATTERN = /^[A-Za-z0-9_-]{1,63}$/;

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-3.5-turbo"),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  VECTOR_STORE: z.enum(["file", "pgvector"]).default("file"),
  VECTOR_STORE_PATH: z.string().default("data/vector_store"),
  COLLECTION_NAME: z.string().regex(COLLECTION_NAME_PATTERN).default("job_assistant"),
  DATABASE_URL: z.string().optional(),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  DOCUMENTS_DIR: z.string().default("data/documents"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(500),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(50),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_PRETTY: booleanFlag.default("false"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
}

export interface AppConfig {
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  embeddingModel: string;
  chatModel: string;
  temperature: number;
  vectorStore: "file" | "pgvector";
  vectorStorePath: string;
  collectionName: string;
  databaseUrl: string | null;
  vectorDimension: number;
  documentsDir: string;
  chunkSize: number;
  chunkOverlap: number;
  logging: LoggingConfig;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.VECTOR_STORE === "pgvector" && !parsed.DATABASE_URL) {
    throw new Error("VECTOR_STORE=pgvector requires DATABASE_URL.");
  }

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  return {
    openaiApiKey: parsed.OPENAI_API_KEY?.trim() || null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL,
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    chatModel: parsed.OPENAI_CHAT_MODEL,
    temperature: parsed.OPENAI_TEMPERATURE,
    vectorStore: parsed.VECTOR_STORE,
    vectorStorePath: parsed.VECTOR_STORE_PATH,
    collectionName: parsed.COLLECTION_NAME,
    databaseUrl: parsed.DATABASE_URL ?? null,
    vectorDimension: parsed.VECTOR_DIMENSION,
    documentsDir: parsed.DOCUMENTS_DIR,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    logging: {
      level: parsed.LOG_LEVEL,
      pretty: parsed.LOG_PRETTY,
    },
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}
