/**
 * Demo knowledge base with a toy word-hashing embedder standing in for a
 * real embedding model.
 */

import type { KnowledgeDocument } from "../src/index.js";

const DIMENSIONS = 256;

export const knowledgeBase: KnowledgeDocument[] = [
  {
    source: "policies.md#refunds",
    text: "Section 4, refunds: purchases can be refunded within 30 days with the original receipt.",
  },
  {
    source: "policies.md#shipping",
    text: "Standard shipping takes 3 to 5 business days; express shipping arrives the next business day.",
  },
  {
    source: "support.md#hours",
    text: "Support is available Monday to Friday, 9:00 to 17:00 local time.",
  },
];

function hashWord(word: string): number {
  let hash = 0;
  for (const ch of word) {
    hash = (hash * 31 + ch.charCodeAt(0)) >>> 0;
  }
  return hash % DIMENSIONS;
}

export async function embed(texts: string[]): Promise<number[][]> {
  return texts.map((text) => {
    const vector = new Array<number>(DIMENSIONS).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      vector[hashWord(word)] += 1;
    }
    return vector;
  });
}
