import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  detectFileType,
  getSupportedDocumentExtensions,
  isSupportedDocumentExtension,
  loadAllDocuments,
  loadDocument,
  loadDocumentFromBuffer,
} from "../src/infra/parsers/documentLoader.js";

const TMP_DIR = path.resolve(".tmp-tests-loader");

describe("documentLoader", () => {
  beforeEach(async () => {
    await fs.mkdir(TMP_DIR, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(TMP_DIR, { recursive: true, force: true });
  });

  it("supports pdf, docx and txt", () => {
    expect(getSupportedDocumentExtensions()).toEqual([".pdf", ".docx", ".txt"]);
    expect(isSupportedDocumentExtension("Resume.PDF")).toBe(true);
    expect(detectFileType("cover-letter.docx")).toBe("docx");
    expect(detectFileType("notes.md")).toBe("unknown");
  });

  it("loads text file content", async () => {
    const filePath = path.join(TMP_DIR, "resume.txt");
    await fs.writeFile(filePath, "line 1\r\nline 2\r\n", "utf-8");

    expect(await loadDocument(filePath)).toEqual({
      content: "line 1\nline 2",
      filename: "resume.txt",
      fileType: "txt",
    });
  });

  it("returns empty content for an unsupported extension", async () => {
    expect(await loadDocument(path.join(TMP_DIR, "sheet.xlsx"))).toEqual({
      content: "",
      filename: "sheet.xlsx",
      fileType: "unknown",
    });
  });

  it("returns empty content for a missing file", async () => {
    expect(await loadDocument(path.join(TMP_DIR, "missing.txt"))).toEqual({
      content: "",
      filename: "missing.txt",
      fileType: "txt",
    });
  });

  it("returns empty content for a corrupt docx", async () => {
    const filePath = path.join(TMP_DIR, "broken.docx");
    await fs.writeFile(filePath, "this is not a zip archive", "utf-8");

    expect(await loadDocument(filePath)).toEqual({
      content: "",
      filename: "broken.docx",
      fileType: "docx",
    });
  });

  it("extracts text from an uploaded buffer", async () => {
    expect(await loadDocumentFromBuffer("notes.txt", Buffer.from("  shipped v2  \n"))).toEqual({
      content: "shipped v2",
      filename: "notes.txt",
      fileType: "txt",
    });
  });

  it("loads every supported non-empty file in a folder in name order", async () => {
    await fs.writeFile(path.join(TMP_DIR, "b.txt"), "Beta", "utf-8");
    await fs.writeFile(path.join(TMP_DIR, "a.txt"), "Alpha", "utf-8");
    await fs.writeFile(path.join(TMP_DIR, "empty.txt"), "", "utf-8");
    await fs.writeFile(path.join(TMP_DIR, "readme.md"), "Ignored", "utf-8");
    await fs.mkdir(path.join(TMP_DIR, "nested.txt"));

    const documents = await loadAllDocuments(TMP_DIR);

    expect(documents).toEqual([
      { content: "Alpha", filename: "a.txt", fileType: "txt" },
      { content: "Beta", filename: "b.txt", fileType: "txt" },
    ]);
  });

  it("returns no documents for a missing folder", async () => {
    expect(await loadAllDocuments(path.join(TMP_DIR, "absent"))).toEqual([]);
  });
});
