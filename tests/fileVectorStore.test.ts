import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { VectorRecord } from "../src/domain/vectorStore.js";
import { FileVectorStore } from "../src/infra/store/fileVectorStore.js";

const TEMP_DIR = path.resolve(".tmp-tests-file-store");

function record(id: string, text: string, embedding: number[], chunkIndex = 0): VectorRecord {
  return {
    id,
    text,
    embedding,
    metadata: {
      filename: "resume.txt",
      fileType: "txt",
      dateProcessed: "2024-05-01T12:00:00.000Z",
      wordCount: 20,
      chunkIndex,
    },
  };
}

async function snapshotExists(name: string): Promise<boolean> {
  try {
    await fs.access(path.join(TEMP_DIR, `${name}.json`));
    return true;
  } catch {
    return false;
  }
}

async function blockStorageDir(): Promise<void> {
  await fs.rm(TEMP_DIR, { recursive: true, force: true });
  await fs.writeFile(TEMP_DIR, "not a directory", "utf-8");
}

describe("FileVectorStore", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("keeps a failed upsert out of memory when the snapshot cannot be written", async () => {
    const store = new FileVectorStore(TEMP_DIR);
    const collection = await store.getOrCreateCollection("job_assistant");
    await blockStorageDir();

    await expect(
      collection.upsert([
        record("resume.txt_0", "Built python data pipelines.", [1, 0, 0]),
        record("resume.txt_1", "Ran kubernetes clusters.", [0, 1, 0], 1),
      ]),
    ).rejects.toThrow();

    expect(await collection.count()).toBe(0);
    expect(await collection.query([1, 0, 0], 5)).toEqual([]);
  });

  it("restores replaced records when the snapshot cannot be written", async () => {
    const store = new FileVectorStore(TEMP_DIR);
    const collection = await store.getOrCreateCollection("job_assistant");
    await collection.upsert([record("resume.txt_0", "old text", [1, 0])]);
    await blockStorageDir();

    await expect(
      collection.upsert([
        record("resume.txt_0", "new text", [1, 0]),
        record("resume.txt_1", "extra text", [0, 1], 1),
      ]),
    ).rejects.toThrow();

    expect(await collection.count()).toBe(1);
    const [match] = await collection.query([1, 0], 5);
    expect(match.text).toBe("old text");
  });

  it("restores collections after restart", async () => {
    const store1 = new FileVectorStore(TEMP_DIR);
    const collection1 = await store1.getOrCreateCollection("job_assistant");
    await collection1.upsert([
      record("resume.txt_0", "Built python data pipelines.", [1, 0, 0]),
      record("resume.txt_1", "Ran kubernetes clusters.", [0, 1, 0], 1),
    ]);
    await store1.close();

    const store2 = new FileVectorStore(TEMP_DIR);
    const collection2 = await store2.getOrCreateCollection("job_assistant");

    expect(await collection2.count()).toBe(2);
    const [top] = await collection2.query([1, 0, 0], 1);
    expect(top).toMatchObject({ id: "resume.txt_0", text: "Built python data pipelines.", distance: 0 });
    expect(top.metadata.chunkIndex).toBe(0);
  });

  it("writes an empty snapshot as soon as a collection is created", async () => {
    const store = new FileVectorStore(TEMP_DIR);
    await store.getOrCreateCollection("job_assistant");
    await store.close();

    const raw = JSON.parse(await fs.readFile(path.join(TEMP_DIR, "job_assistant.json"), "utf-8"));
    expect(raw).toMatchObject({ format_version: 1, collection: "job_assistant", records: [] });
  });

  it("replaces records that share an id", async () => {
    const store = new FileVectorStore(TEMP_DIR);
    const collection = await store.getOrCreateCollection("job_assistant");
    await collection.upsert([record("resume.txt_0", "old text", [1, 0])]);
    await collection.upsert([record("resume.txt_0", "new text", [0, 1])]);

    expect(await collection.count()).toBe(1);
    const [match] = await collection.query([0, 1], 5);
    expect(match.text).toBe("new text");
  });

  it("reports whether a deleted collection existed", async () => {
    const store = new FileVectorStore(TEMP_DIR);
    await store.getOrCreateCollection("job_assistant");

    expect(await store.deleteCollection("job_assistant")).toBe(true);
    expect(await store.deleteCollection("job_assistant")).toBe(false);
    expect(await snapshotExists("job_assistant")).toBe(false);
  });

  it("ignores writes through a handle obtained before the collection was deleted", async () => {
    const store = new FileVectorStore(TEMP_DIR);
    const stale = await store.getOrCreateCollection("job_assistant");
    await store.deleteCollection("job_assistant");

    await stale.upsert([record("resume.txt_0", "late write", [1, 0])]);
    await store.close();

    expect(await snapshotExists("job_assistant")).toBe(false);
    const fresh = await store.getOrCreateCollection("job_assistant");
    expect(await fresh.count()).toBe(0);
  });

  it("rejects collection names that are not plain identifiers", async () => {
    const store = new FileVectorStore(TEMP_DIR);
    await expect(store.getOrCreateCollection("../escape")).rejects.toThrow(
      'Invalid collection name: "../escape"',
    );
  });

  it("rejects a snapshot with an unexpected shape", async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
    await fs.writeFile(path.join(TEMP_DIR, "job_assistant.json"), "{}", "utf-8");

    const store = new FileVectorStore(TEMP_DIR);
    await expect(store.getOrCreateCollection("job_assistant")).rejects.toThrow(
      "Invalid vector collection snapshot",
    );
  });
});
