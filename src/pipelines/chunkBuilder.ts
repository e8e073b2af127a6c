import { Chunk, Document } from "../domain/types.js";
import type { Logger } from "../utils/logger.js";
import {
  cleanText,
  DEFAULT_OVERLAP,
  DEFAULT_TARGET_SIZE,
  splitIntoChunks,
} from "./chunking.js";
import { extractMetadata } from "./metadata.js";

export interface ChunkBuildOptions {
  targetSize?: number;
  overlap?: number;
  now?: Date;
  logger?: Logger;
}

export function buildDocumentChunks(
  document: Document,
  options: ChunkBuildOptions = {},
): Chunk[] {
  const { logger } = options;

  if (!document.content) {
    logger?.warn({ filename: document.filename }, "document has no content, skipping");
    return [];
  }

  const cleaned = cleanText(document.content);
  const metadata = extractMetadata(document, options.now);
  const segments = splitIntoChunks(
    cleaned,
    options.targetSize ?? DEFAULT_TARGET_SIZE,
    options.overlap ?? DEFAULT_OVERLAP,
  );

  const chunks = segments.map((text, index) => ({
    text,
    metadata: { ...metadata, chunkIndex: index },
  }));

  logger?.info(
    { filename: document.filename, chunks: chunks.length },
    "built document chunks",
  );
  return chunks;
}
