import { z } from "zod";

export const fileTypeSchema = z.enum(["pdf", "docx", "txt", "unknown"]);

export const chunkMetadataSchema = z.object({
  filename: z.string(),
  fileType: fileTypeSchema,
  dateProcessed: z.string(),
  wordCount: z.number().int().min(0),
  chunkIndex: z.number().int().min(0),
});

export const vectorRecordSchema = z.object({
  id: z.string(),
  text: z.string(),
  metadata: chunkMetadataSchema,
  embedding: z.array(z.number()),
});
