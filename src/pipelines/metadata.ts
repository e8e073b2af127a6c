import { Document, DocumentMetadata, FileType } from "../domain/types.js";

export function countWords(content: string): number {
  const trimmed = content.trim();
  if (!trimmed) {
    return 0;
  }
  return trimmed.split(/\s+/).length;
}

export function extractMetadata(
  document: Partial<Document>,
  now: Date = new Date(),
): DocumentMetadata {
  const fileType: FileType = document.fileType ?? "unknown";

  return {
    filename: document.filename || "unknown",
    fileType,
    dateProcessed: now.toISOString(),
    wordCount: countWords(document.content ?? ""),
  };
}
