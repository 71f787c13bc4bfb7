export interface RetrievedDocument {
  text: string;
  score: number;
  source?: string;
}

/**
 * Knowledge-base search. Results come ranked best first, may be empty, and
 * searching never changes the underlying store.
 */
export interface Retriever {
  search(query: string): Promise<RetrievedDocument[]>;
}

export interface KnowledgeDocument {
  text: string;
  source?: string;
}

/** Turns texts into vectors, one per input, in input order. */
export type EmbedFn = (texts: string[]) => Promise<number[][]>;

export interface VectorRetrieverConfig {
  embed: EmbedFn;
  documents: KnowledgeDocument[];
  /** Max documents returned per search (default 3). */
  topK?: number;
}
