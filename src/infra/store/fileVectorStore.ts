import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { vectorRecordSchema } from "../../domain/schemas.js";
import { VectorCollection, VectorRecord } from "../../domain/vectorStore.js";
import { COLLECTION_NAME_PATTERN } from "../../config/env.js";
import { InMemoryCollection, InMemoryVectorStore } from "./inMemoryVectorStore.js";

const CURRENT_FORMAT_VERSION = 1;

const persistedCollectionSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  collection: z.string(),
  records: z.array(vectorRecordSchema),
});

type PersistedCollection = z.infer<typeof persistedCollectionSchema>;

/**
 * In-memory collections backed by one JSON snapshot per collection under
 * `storagePath`. Snapshots are loaded on first access and rewritten after
 * every change.
 */
export class FileVectorStore extends InMemoryVectorStore {
  private writeChain: Promise<void> = Promise.resolve();

  private readonly absoluteDir: string;

  constructor(storagePath: string) {
    super();
    this.absoluteDir = path.resolve(storagePath);
  }

  async getOrCreateCollection(name: string): Promise<VectorCollection> {
    const existing = this.collections.get(name);
    if (existing) {
      return existing;
    }

    const records = await this.readSnapshot(name);
    const collection = this.getOrCreateInMemoryCollection(name, records ?? []);
    if (!records) {
      await this.enqueueWrite(() => this.persistNow(collection));
    }
    return collection;
  }

  async deleteCollection(name: string): Promise<boolean> {
    const filePath = this.collectionPath(name);
    const inMemory = this.collections.delete(name);

    let onDisk = false;
    await this.enqueueWrite(async () => {
      onDisk = await fileExists(filePath);
      await fs.rm(filePath, { force: true });
    });
    return inMemory || onDisk;
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  protected async onCollectionChanged(collection: InMemoryCollection): Promise<void> {
    // A handle left over from before a delete must not resurrect the file.
    if (this.collections.get(collection.name) !== collection) {
      return;
    }
    await this.enqueueWrite(() => this.persistNow(collection));
  }

  private collectionPath(name: string): string {
    if (!COLLECTION_NAME_PATTERN.test(name)) {
      throw new Error(`Invalid collection name: ${JSON.stringify(name)}`);
    }
    return path.join(this.absoluteDir, `${name}.json`);
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(task, task);
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async readSnapshot(name: string): Promise<VectorRecord[] | null> {
    const filePath = this.collectionPath(name);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }

    const parsed = persistedCollectionSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid vector collection snapshot: ${filePath}`);
    }
    if (parsed.data.format_version !== CURRENT_FORMAT_VERSION) {
      throw new Error(
        `Unsupported vector collection format version: ${parsed.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
      );
    }
    return parsed.data.records;
  }

  private async persistNow(collection: InMemoryCollection): Promise<void> {
    const payload: PersistedCollection = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      collection: collection.name,
      records: collection.snapshot(),
    };

    const targetPath = this.collectionPath(collection.name);
    const serialized = JSON.stringify(payload);
    await fs.mkdir(this.absoluteDir, { recursive: true });
    const tempPath = `${targetPath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, targetPath, serialized);
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error) {
    if (isFileMissing(error)) {
      return false;
    }
    throw error;
  }
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Last fallback for Windows file-lock edge cases.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}
