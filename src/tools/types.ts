/**
 * Tool abstraction: the decision step picks one tool by name, the execution
 * step runs it and hands its text output to answer synthesis.
 */

export const RETRIEVE_CONTEXT_TOOL = "retrieve_context";
export const DIRECT_ANSWER_TOOL = "direct_answer";

export type ToolName = typeof RETRIEVE_CONTEXT_TOOL | typeof DIRECT_ANSWER_TOOL;

/** Arguments handed to a tool; always carries the query. */
export interface ToolInput {
  query: string;
  [key: string]: string;
}

export interface Tool<TName extends ToolName = ToolName> {
  /** Unique name, used by the model to choose the tool. */
  name: TName;
  /** Shown to the model in the decision prompt. */
  description: string;
  /** Returns the context text for answer synthesis (may be empty). */
  execute(input: ToolInput): Promise<string>;
}

export type RetrievalTool = Tool<typeof RETRIEVE_CONTEXT_TOOL>;
export type DirectAnswerTool = Tool<typeof DIRECT_ANSWER_TOOL>;

export interface ToolRegistry {
  /** Register a tool; a tool with the same name is replaced. */
  register(tool: Tool): void;
  get(name: string): Tool | undefined;
  /** Case-insensitive lookup, used to match the model's tool choice. */
  resolve(name: string): Tool | undefined;
  /** Tools in registration order. */
  list(): Tool[];
  /** Run a tool by exact name; throws when it is not registered. */
  execute(name: string, input: ToolInput): Promise<string>;
}
