export class EmbeddingFailureError extends Error {
  readonly kind = "embedding_failure";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingFailureError";
  }
}

export class VectorStoreError extends Error {
  readonly kind = "store_failure";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VectorStoreError";
  }
}

export type IndexOperationError = EmbeddingFailureError | VectorStoreError;

/**
 * Raised for an unknown template name or a missing template field. These are
 * caller bugs and are never turned into placeholder text.
 */
export class PromptTemplateError extends Error {
  constructor(
    message: string,
    readonly templateName: string,
    readonly missingFields: string[] = [],
  ) {
    super(message);
    this.name = "PromptTemplateError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
