import { z } from "zod";
import { CompletionClient, EmbeddingClient } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  temperature: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

export class OpenAiClient implements EmbeddingClient, CompletionClient {
  private readonly baseUrl: string;

  constructor(private readonly options: OpenAiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingResponseSchema.parse(await response.json());
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    if (!embedding || embedding.length === 0) {
      throw new Error("OpenAI embeddings returned no vector for the query.");
    }
    return embedding;
  }

  async complete(prompt: string): Promise<string> {
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        temperature: this.options.temperature,
        messages: [{ role: "user", content: prompt }],
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = chatResponseSchema.parse(await response.json());
    const content = data.choices[0]?.message?.content;
    if (!content) {
      throw new Error("OpenAI chat returned an empty completion.");
    }
    return content;
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}
