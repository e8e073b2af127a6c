export type FileType = "pdf" | "docx" | "txt" | "unknown";

export interface Document {
  content: string;
  filename: string;
  fileType: FileType;
}

export interface DocumentMetadata {
  filename: string;
  fileType: FileType;
  /** ISO-8601 timestamp of the indexing pass. */
  dateProcessed: string;
  /** Word count of the whole source document, not of a single chunk. */
  wordCount: number;
}

export interface ChunkMetadata extends DocumentMetadata {
  chunkIndex: number;
}

export interface Chunk {
  text: string;
  metadata: ChunkMetadata;
}

export interface SearchResult {
  id: string;
  text: string;
  metadata: ChunkMetadata;
  distance: number | null;
}

export const ARTIFACT_TYPES = [
  "resume_bullets",
  "cover_letter",
  "ats_analysis",
  "linkedin_message",
] as const;

export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

export type GenerationResults = Record<ArtifactType, string>;

export interface ApplicationRequest {
  jobDescription: string;
  companyName: string;
  roleTitle: string;
  candidateName: string;
  resumeContent?: string;
}

export function chunkId(metadata: Pick<ChunkMetadata, "filename" | "chunkIndex">): string {
  return `${metadata.filename}_${metadata.chunkIndex}`;
}
