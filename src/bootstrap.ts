import { AppConfig } from "./config/env.js";
import { CompletionClient, EmbeddingClient } from "./infra/ai/types.js";
import { OpenAiClient } from "./infra/ai/openAiClient.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { ApplicationGenerator } from "./services/applicationGenerator.js";
import { CareerAssistantService } from "./services/careerAssistantService.js";
import { Retriever } from "./services/retriever.js";
import { VectorIndex } from "./services/vectorIndex.js";
import type { Logger } from "./utils/logger.js";

export interface RuntimeOverrides {
  embeddings?: EmbeddingClient;
  completion?: CompletionClient;
}

export interface CareerAssistantRuntime {
  service: CareerAssistantService;
  close: () => Promise<void>;
}

export async function createCareerAssistant(
  config: AppConfig,
  logger: Logger,
  overrides: RuntimeOverrides = {},
): Promise<CareerAssistantRuntime> {
  const openAi = new OpenAiClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.embeddingModel,
    chatModel: config.chatModel,
    temperature: config.temperature,
  });

  if (!openAi.isConfigured() && (!overrides.embeddings || !overrides.completion)) {
    logger.warn("OPENAI_API_KEY is missing; embeddings and generation will fail");
  }

  const store = await createVectorStore(config);
  const index = new VectorIndex({
    store,
    embeddings: overrides.embeddings ?? openAi,
    collectionName: config.collectionName,
    logger,
  });
  await index.initialize();
  logger.info(
    { store: config.vectorStore, path: config.vectorStorePath, collection: config.collectionName },
    "vector index ready",
  );

  const generator = new ApplicationGenerator({
    retriever: new Retriever(index, logger),
    completion: overrides.completion ?? openAi,
    logger,
  });

  const service = new CareerAssistantService({
    index,
    generator,
    logger,
    documentsDir: config.documentsDir,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
  });

  return {
    service,
    close: () => store.close(),
  };
}
