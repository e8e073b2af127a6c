import path from "node:path";
import {
  ApplicationRequest,
  ArtifactType,
  Document,
  GenerationResults,
  SearchResult,
} from "../domain/types.js";
import { errorMessage } from "../domain/errors.js";
import {
  detectFileType,
  loadAllDocuments,
  loadDocument,
  loadDocumentFromBuffer,
} from "../infra/parsers/documentLoader.js";
import { buildDocumentChunks } from "../pipelines/chunkBuilder.js";
import type { Logger } from "../utils/logger.js";
import { ApplicationGenerator } from "./applicationGenerator.js";
import { VectorIndex } from "./vectorIndex.js";

export interface SkippedDocument {
  path: string;
  reason: string;
}

export interface IndexDocumentsResult {
  indexed_count: number;
  chunk_count: number;
  skipped: SkippedDocument[];
  failed: SkippedDocument[];
}

export interface RawDocumentInput {
  filename: string;
  content: string;
}

export interface UploadedDocumentInput {
  filename: string;
  contentBase64: string;
}

export interface CollectionStats {
  collection: string;
  count: number;
}

export interface CareerAssistantServiceOptions {
  index: VectorIndex;
  generator: ApplicationGenerator;
  logger: Logger;
  documentsDir: string;
  chunkSize: number;
  chunkOverlap: number;
}

export class CareerAssistantService {
  private readonly index: VectorIndex;

  private readonly generator: ApplicationGenerator;

  private readonly logger: Logger;

  constructor(private readonly options: CareerAssistantServiceOptions) {
    this.index = options.index;
    this.generator = options.generator;
    this.logger = options.logger;
  }

  async indexFiles(paths: string[]): Promise<IndexDocumentsResult> {
    const documents: Array<{ path: string; document: Document }> = [];
    for (const rawPath of paths) {
      const absolutePath = path.resolve(rawPath);
      documents.push({ path: rawPath, document: await loadDocument(absolutePath, this.logger) });
    }
    return this.indexLoadedDocuments(documents);
  }

  async indexFolder(folder: string = this.options.documentsDir): Promise<IndexDocumentsResult> {
    const documents = await loadAllDocuments(path.resolve(folder), this.logger);
    return this.indexLoadedDocuments(
      documents.map((document) => ({ path: document.filename, document })),
    );
  }

  async indexRawDocuments(documents: RawDocumentInput[]): Promise<IndexDocumentsResult> {
    return this.indexLoadedDocuments(
      documents.map((item) => {
        const filename = normalizeFilename(item.filename);
        const detected = detectFileType(filename);
        // Pasted text is plain text whatever the name suggests.
        const document: Document = {
          content: item.content,
          filename,
          fileType: detected === "unknown" ? "txt" : detected,
        };
        return { path: filename, document };
      }),
    );
  }

  async indexUploadedDocuments(documents: UploadedDocumentInput[]): Promise<IndexDocumentsResult> {
    const loaded: Array<{ path: string; document: Document }> = [];
    for (const item of documents) {
      const filename = normalizeFilename(item.filename);
      loaded.push({
        path: filename,
        document: await loadDocumentFromBuffer(
          filename,
          Buffer.from(item.contentBase64, "base64"),
          this.logger,
        ),
      });
    }
    return this.indexLoadedDocuments(loaded);
  }

  async searchPassages(query: string, limit: number): Promise<SearchResult[]> {
    return this.index.search(query, limit);
  }

  async getStats(): Promise<CollectionStats> {
    return {
      collection: this.index.collectionName,
      count: await this.index.count(),
    };
  }

  async resetIndex(): Promise<CollectionStats> {
    await this.index.reset();
    return this.getStats();
  }

  async generate(type: ArtifactType, request: ApplicationRequest): Promise<string> {
    return this.generator.generate(type, request);
  }

  async generateAll(request: ApplicationRequest): Promise<GenerationResults> {
    return this.generator.generateAll(request);
  }

  private async indexLoadedDocuments(
    documents: Array<{ path: string; document: Document }>,
  ): Promise<IndexDocumentsResult> {
    const skipped: SkippedDocument[] = [];
    const failed: SkippedDocument[] = [];
    let indexedCount = 0;
    let chunkCount = 0;

    for (const { path: sourcePath, document } of documents) {
      try {
        const chunks = buildDocumentChunks(document, {
          targetSize: this.options.chunkSize,
          overlap: this.options.chunkOverlap,
          logger: this.logger,
        });
        if (chunks.length === 0) {
          skipped.push({ path: sourcePath, reason: "No extractable text content." });
          continue;
        }

        const outcome = await this.index.upsert(chunks);
        if (outcome.status === "failed") {
          failed.push({ path: sourcePath, reason: outcome.error.message });
          continue;
        }

        indexedCount += 1;
        chunkCount += chunks.length;
      } catch (error) {
        failed.push({ path: sourcePath, reason: errorMessage(error) });
      }
    }

    this.logger.info(
      { indexed: indexedCount, chunks: chunkCount, skipped: skipped.length, failed: failed.length },
      "indexing pass finished",
    );

    return {
      indexed_count: indexedCount,
      chunk_count: chunkCount,
      skipped,
      failed,
    };
  }
}

function normalizeFilename(raw: string): string {
  const base = path.basename(raw.trim());
  return base || "document.txt";
}
