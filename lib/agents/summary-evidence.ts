import { NO_EVIDENCE_PROVIDED } from "./types";

const SENTENCE_BREAK = /(?<=[.!?])\s+/;
const MIN_EVIDENCE_WORDS = 6;

/**
 * Sentences of the summary long enough to stand as evidence (more than five
 * words). Falls back to the "No evidence provided" marker.
 */
export function extractValidEvidence(summary: string): string[] {
  const sentences = summary
    .split(SENTENCE_BREAK)
    .filter((sentence) => countWords(sentence) >= MIN_EVIDENCE_WORDS)
    .map((sentence) => sentence.trim());

  return sentences.length > 0 ? sentences : [NO_EVIDENCE_PROVIDED];
}

function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}
