/**
 * In-memory retriever: documents are embedded once, on first search, and
 * ranked against the query by cosine similarity.
 */

import { cosineSimilarity } from "./similarity.js";
import type {
  KnowledgeDocument,
  RetrievedDocument,
  Retriever,
  VectorRetrieverConfig,
} from "./types.js";

interface IndexedDocument {
  document: Readonly<KnowledgeDocument>;
  vector: number[];
}

export function createVectorRetriever(config: VectorRetrieverConfig): Retriever {
  const topK = config.topK ?? 3;
  if (!Number.isInteger(topK) || topK < 1) {
    throw new Error(`topK must be a positive integer, got ${topK}`);
  }
  const documents = config.documents.map((doc) => Object.freeze({ ...doc }));
  let index: Promise<IndexedDocument[]> | undefined;

  async function buildIndex(): Promise<IndexedDocument[]> {
    const vectors = await config.embed(documents.map((doc) => doc.text));
    if (vectors.length !== documents.length) {
      throw new Error(
        `Embedder returned ${vectors.length} vectors for ${documents.length} documents`
      );
    }
    return documents.map((document, i) => ({ document, vector: vectors[i] }));
  }

  function getIndex(): Promise<IndexedDocument[]> {
    if (!index) {
      // Drop a failed build so the next search tries again.
      index = buildIndex().catch((err: unknown) => {
        index = undefined;
        throw err;
      });
    }
    return index;
  }

  return {
    async search(query: string): Promise<RetrievedDocument[]> {
      if (documents.length === 0) {
        return [];
      }
      const indexed = await getIndex();
      const [queryVector] = await config.embed([query]);
      if (!queryVector) {
        throw new Error("Embedder returned no vector for the query");
      }

      return indexed
        .map(({ document, vector }) => ({
          text: document.text,
          score: cosineSimilarity(queryVector, vector),
          ...(document.source !== undefined ? { source: document.source } : {}),
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, topK);
    },
  };
}
