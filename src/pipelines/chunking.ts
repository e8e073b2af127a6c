export const DEFAULT_TARGET_SIZE = 500;
export const DEFAULT_OVERLAP = 50;

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

/**
 * Flattens extracted document text into a single line of plain prose.
 * Only ASCII letters, digits, whitespace and `. , ! ? -` survive.
 */
export function cleanText(text: string): string {
  if (!text) {
    return "";
  }

  return text
    .replace(/\n+/g, " ")
    .replace(/[^a-zA-Z0-9\s.,!?-]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function splitIntoSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY).filter((sentence) => sentence.length > 0);
}

/**
 * Greedy sentence packing. A segment is closed once the next sentence would
 * push it past `targetSize`; the closing segment's trailing sentences whose
 * combined length stays below `overlap` seed the next one. Sentences are never
 * split, so a single sentence longer than `targetSize` becomes its own segment.
 */
export function splitIntoChunks(
  text: string,
  targetSize: number = DEFAULT_TARGET_SIZE,
  overlap: number = DEFAULT_OVERLAP,
): string[] {
  if (!Number.isInteger(targetSize) || targetSize <= 0) {
    throw new RangeError(`targetSize must be a positive integer, got ${targetSize}.`);
  }
  const safeOverlap = Math.min(Math.max(overlap, 0), targetSize - 1);

  if (!text) {
    return [];
  }

  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const sentence of splitIntoSentences(text)) {
    if (currentLength + sentence.length > targetSize && current.length > 0) {
      chunks.push(current.join(" "));

      const seed = collectOverlap(current, safeOverlap);
      current = seed.sentences;
      currentLength = seed.length;
    }

    current.push(sentence);
    currentLength += sentence.length;
  }

  if (current.length > 0) {
    chunks.push(current.join(" "));
  }

  return chunks;
}

function collectOverlap(
  sentences: string[],
  overlap: number,
): { sentences: string[]; length: number } {
  const carried: string[] = [];
  let length = 0;

  for (let i = sentences.length - 1; i >= 0; i -= 1) {
    const sentence = sentences[i];
    if (length + sentence.length >= overlap) {
      break;
    }
    carried.unshift(sentence);
    length += sentence.length;
  }

  return { sentences: carried, length };
}
