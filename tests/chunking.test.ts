import { describe, expect, it } from "vitest";
import { cleanText, splitIntoChunks, splitIntoSentences } from "../src/pipelines/chunking.js";

describe("cleanText", () => {
  it("flattens newlines and strips characters outside the allowed set", () => {
    expect(cleanText("Hello, world!\n\nIt's  a test.")).toBe("Hello, world! Its a test.");
  });

  it("keeps digits, hyphens and sentence punctuation", () => {
    expect(cleanText("Cut p99 latency by 40% (2023) - really?")).toBe(
      "Cut p99 latency by 40 2023 - really?",
    );
  });

  it("returns an empty string for empty input", () => {
    expect(cleanText("")).toBe("");
    expect(cleanText("\n\n  \n")).toBe("");
  });
});

describe("splitIntoSentences", () => {
  it("splits after terminal punctuation followed by whitespace", () => {
    expect(splitIntoSentences("One. Two! Three? Four")).toEqual(["One.", "Two!", "Three?", "Four"]);
  });
});

describe("splitIntoChunks", () => {
  it("carries trailing sentences shorter than the overlap into the next segment", () => {
    const chunks = splitIntoChunks("One two. Three four. Five six. Seven eight.", 25, 15);

    expect(chunks).toEqual([
      "One two. Three four.",
      "Three four. Five six.",
      "Five six. Seven eight.",
    ]);
  });

  it("splits a short resume into one segment per sentence", () => {
    const cleaned = cleanText(
      "Experience\nBuilt systems. Reduced latency by 40%. Led a team of 5 engineers.",
    );

    expect(splitIntoChunks(cleaned, 40, 10)).toEqual([
      "Experience Built systems.",
      "Reduced latency by 40.",
      "Led a team of 5 engineers.",
    ]);
  });

  it("emits an oversized sentence as its own segment", () => {
    expect(splitIntoChunks("Short one. This sentence is much longer than ten.", 10, 0)).toEqual([
      "Short one.",
      "This sentence is much longer than ten.",
    ]);
  });

  it("returns a single segment for text without sentence boundaries", () => {
    expect(splitIntoChunks("no punctuation here at all", 500, 50)).toEqual([
      "no punctuation here at all",
    ]);
  });

  it("returns no segments for empty text", () => {
    expect(splitIntoChunks("", 500, 50)).toEqual([]);
  });

  it("clamps an overlap that is not smaller than the target size", () => {
    expect(splitIntoChunks("Aa. Bb. Cc.", 6, 100)).toEqual(["Aa. Bb.", "Bb. Cc."]);
  });

  it("treats a negative overlap as no overlap", () => {
    expect(splitIntoChunks("Aa. Bb. Cc.", 6, -5)).toEqual(["Aa. Bb.", "Cc."]);
  });

  it("rejects a target size that is not a positive integer", () => {
    expect(() => splitIntoChunks("Aa.", 0, 0)).toThrow(RangeError);
    expect(() => splitIntoChunks("Aa.", -3, 0)).toThrow(RangeError);
    expect(() => splitIntoChunks("Aa.", 2.5, 0)).toThrow("targetSize must be a positive integer");
  });

  it("keeps every multi-sentence segment within the target size", () => {
    const text = Array.from(
      { length: 40 },
      (_, i) => `Sentence number ${i} describes ${"work ".repeat(i % 7)}done.`,
    ).join(" ");
    const targetSize = 120;

    const chunks = splitIntoChunks(text, targetSize, 30);

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      const sentences = splitIntoSentences(chunk);
      const length = sentences.reduce((total, sentence) => total + sentence.length, 0);
      if (sentences.length > 1) {
        expect(length).toBeLessThanOrEqual(targetSize);
      }
    }
  });
});
