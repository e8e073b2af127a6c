import { promises as fs } from "node:fs";
import path from "node:path";
import mammoth from "mammoth";
import { Document, FileType } from "../../domain/types.js";
import { errorMessage } from "../../domain/errors.js";
import type { Logger } from "../../utils/logger.js";

const EXTENSION_TYPES: Record<string, Exclude<FileType, "unknown">> = {
  ".pdf": "pdf",
  ".docx": "docx",
  ".txt": "txt",
};

interface PdfParseResult {
  text?: string;
}

type PdfParseCtor = new (input: { data: Uint8Array }) => {
  getText: () => Promise<PdfParseResult>;
  destroy?: () => Promise<void> | void;
};

export function detectFileType(filePath: string): FileType {
  return EXTENSION_TYPES[path.extname(filePath).toLowerCase()] ?? "unknown";
}

export function getSupportedDocumentExtensions(): string[] {
  return Object.keys(EXTENSION_TYPES);
}

export function isSupportedDocumentExtension(filePath: string): boolean {
  return detectFileType(filePath) !== "unknown";
}

/**
 * Reads a career document from disk. Unreadable or unsupported files yield
 * empty content instead of an error so one bad file never stops a batch.
 */
export async function loadDocument(filePath: string, logger?: Logger): Promise<Document> {
  const filename = path.basename(filePath);
  const fileType = detectFileType(filePath);

  if (fileType === "unknown") {
    logger?.warn({ filename }, "unsupported file format");
    return { content: "", filename, fileType };
  }

  try {
    const data = await fs.readFile(filePath);
    return { content: await extractText(fileType, data), filename, fileType };
  } catch (error) {
    logger?.error({ filename, err: errorMessage(error) }, "failed to load document");
    return { content: "", filename, fileType };
  }
}

export async function loadDocumentFromBuffer(
  filename: string,
  data: Buffer,
  logger?: Logger,
): Promise<Document> {
  const fileType = detectFileType(filename);

  if (fileType === "unknown") {
    logger?.warn({ filename }, "unsupported file format");
    return { content: "", filename, fileType };
  }

  try {
    return { content: await extractText(fileType, data), filename, fileType };
  } catch (error) {
    logger?.error({ filename, err: errorMessage(error) }, "failed to parse uploaded document");
    return { content: "", filename, fileType };
  }
}

export async function loadAllDocuments(folder: string, logger?: Logger): Promise<Document[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(folder);
  } catch (error) {
    logger?.error({ folder, err: errorMessage(error) }, "documents folder not found");
    return [];
  }

  const documents: Document[] = [];
  for (const entry of entries.sort()) {
    const filePath = path.join(folder, entry);
    if (!isSupportedDocumentExtension(entry) || !(await isFile(filePath))) {
      continue;
    }

    const document = await loadDocument(filePath, logger);
    if (document.content) {
      documents.push(document);
    }
  }

  logger?.info({ folder, documents: documents.length }, "loaded documents");
  return documents;
}

async function extractText(fileType: Exclude<FileType, "unknown">, data: Buffer): Promise<string> {
  switch (fileType) {
    case "txt":
      return normalizeExtractedText(data.toString("utf-8"));
    case "docx": {
      const result = await mammoth.extractRawText({ buffer: data });
      return normalizeExtractedText(result.value);
    }
    case "pdf":
      return normalizeExtractedText(await parsePdf(data));
  }
}

async function parsePdf(data: Buffer): Promise<string> {
  const mod: unknown = await import("pdf-parse");
  const ctor = resolvePdfParseCtor(mod);
  if (!ctor) {
    throw new Error("Installed pdf-parse does not expose the PDFParse class.");
  }

  const parser = new ctor({ data: new Uint8Array(data) });
  try {
    const parsed = await parser.getText();
    return parsed.text ?? "";
  } finally {
    if (typeof parser.destroy === "function") {
      await parser.destroy();
    }
  }
}

function resolvePdfParseCtor(mod: unknown): PdfParseCtor | null {
  if (!mod || typeof mod !== "object" || !("PDFParse" in mod)) {
    return null;
  }

  const named = mod.PDFParse;
  if (typeof named === "function") {
    return named as PdfParseCtor;
  }

  return null;
}

function normalizeExtractedText(text: string): string {
  return text.replace(/\r\n/g, "\n").trim();
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
