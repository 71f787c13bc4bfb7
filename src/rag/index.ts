export { createRagPipeline, NO_CONTEXT_REPLY } from "./pipeline.js";
export type { RagAnswer, RagPipeline, RagPipelineDeps } from "./types.js";
