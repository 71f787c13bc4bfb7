export { cosineSimilarity } from "./similarity.js";
export type {
  EmbedFn,
  KnowledgeDocument,
  RetrievedDocument,
  Retriever,
  VectorRetrieverConfig,
} from "./types.js";
export { createVectorRetriever } from "./vector-retriever.js";
