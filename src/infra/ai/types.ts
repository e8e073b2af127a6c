export interface EmbeddingClient {
  /** One vector per input, in input order. Throws on provider failure. */
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

export interface CompletionClient {
  complete(prompt: string): Promise<string>;
}
