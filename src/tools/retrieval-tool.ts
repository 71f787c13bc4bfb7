import { errorMessage, RetrievalError } from "../errors.js";
import type { RetrievedDocument, Retriever } from "../retrieval/types.js";
import { RETRIEVE_CONTEXT_TOOL, type RetrievalTool } from "./types.js";

/** One line per document; documents with a source get a source/score label. */
export function formatDocuments(documents: RetrievedDocument[]): string {
  return documents
    .map((doc) =>
      doc.source
        ? `[Source: ${doc.source} | Score: ${doc.score.toFixed(2)}] ${doc.text}`
        : doc.text
    )
    .join("\n");
}

/** `retriever.search` with failures wrapped in RetrievalError. */
export async function searchDocuments(
  retriever: Retriever,
  query: string
): Promise<RetrievedDocument[]> {
  try {
    return await retriever.search(query);
  } catch (err) {
    throw new RetrievalError(`Retrieval failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export function createRetrievalTool(retriever: Retriever): RetrievalTool {
  return {
    name: RETRIEVE_CONTEXT_TOOL,
    description:
      "Retrieve relevant information from the knowledge base. Use this when the question needs specific facts, documents or policies to answer.",
    async execute({ query }) {
      return formatDocuments(await searchDocuments(retriever, query));
    },
  };
}
