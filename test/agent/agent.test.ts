import { describe, expect, it } from "vitest";
import { createRoutingAgent } from "../../src/agent/agent.js";
import { DECISION_FALLBACK_REASONING } from "../../src/agent/decision.js";
import { createSessionState } from "../../src/agent/session.js";
import type { SessionState } from "../../src/agent/types.js";
import {
  ConfigurationError,
  InvalidQueryError,
  RetrievalError,
  TransportError,
} from "../../src/errors.js";
import type { RetrievedDocument } from "../../src/retrieval/types.js";
import { createToolRegistry } from "../../src/tools/registry.js";
import { createRetrievalTool } from "../../src/tools/retrieval-tool.js";
import {
  createDefaultRegistry,
  createRecordingLogger,
  createStubEngine,
  createStubRetriever,
} from "../helpers.js";

const DIRECT_DECISION =
  '{"reasoning":"general knowledge","tool_choice":"direct_answer","tool_input":{"query":"q"}}';
const RETRIEVE_DECISION =
  '{"reasoning":"policy lookup","tool_choice":"retrieve_context","tool_input":{"query":"refund policy section 4"}}';

function setup(
  replies: Array<string | Error>,
  documents: RetrievedDocument[] | Error = [],
  session?: SessionState
) {
  const { engine, prompts } = createStubEngine(replies);
  const { retriever, search } = createStubRetriever(documents);
  const logger = createRecordingLogger();
  const agent = createRoutingAgent({
    engine,
    toolRegistry: createDefaultRegistry(retriever),
    session,
    logger,
  });
  return { agent, prompts, search, logger };
}

describe("createRoutingAgent", () => {
  it("refuses a registry without the direct answer tool", () => {
    const { engine, prompts } = createStubEngine(["not json"]);
    const { retriever } = createStubRetriever();

    expect(() =>
      createRoutingAgent({
        engine,
        toolRegistry: createToolRegistry([createRetrievalTool(retriever)]),
        logger: createRecordingLogger(),
      })
    ).toThrow(ConfigurationError);
    expect(() =>
      createRoutingAgent({
        engine,
        toolRegistry: createToolRegistry([createRetrievalTool(retriever)]),
        logger: createRecordingLogger(),
      })
    ).toThrow('The tool registry must contain "direct_answer".');
    expect(prompts).toEqual([]);
  });

  it("answers a general question directly", async () => {
    const { agent, search } = setup([
      '{"reasoning":"general knowledge","tool_choice":"direct_answer","tool_input":{"query":"What is the capital of France?"}}',
      '{"reply":"Paris.","word_count":1}',
    ]);

    const result = await agent.process("What is the capital of France?");

    expect(result.userQuery).toBe("What is the capital of France?");
    expect(result.toolChosen).toBe("direct_answer");
    expect(result.toolReasoning).toBe("general knowledge");
    expect(result.reply).toBe("Paris.");
    expect(result.wordCount).toBe(1);
    expect("retrievedContext" in result).toBe(false);
    expect(result.conversationHistory).toHaveLength(1);
    expect(search).not.toHaveBeenCalled();
  });

  it("grounds the answer in retrieved context", async () => {
    const passage = "Refunds are accepted within 30 days of purchase.";
    const { agent, prompts, search } = setup(
      [RETRIEVE_DECISION, '{"reply":"Refunds are accepted within 30 days.","word_count":6}'],
      [{ text: passage, score: 0.92 }]
    );

    const result = await agent.process("Explain the refund policy in section 4");

    expect(search).toHaveBeenCalledWith("refund policy section 4");
    expect(prompts).toHaveLength(2);
    expect(prompts[1]).toContain(passage);
    expect(result.toolChosen).toBe("retrieve_context");
    expect(result.retrievedContext).toBe(passage);
    expect(result.reply).toBe("Refunds are accepted within 30 days.");
  });

  it("keeps an empty retrieved context when retrieval finds nothing", async () => {
    const { agent } = setup([RETRIEVE_DECISION, '{"reply":"Unknown.","word_count":1}'], []);
    const result = await agent.process("Explain the refund policy in section 4");
    expect(result.retrievedContext).toBe("");
  });

  it("falls back to a direct answer for an unregistered tool", async () => {
    const { agent, search } = setup([
      '{"reasoning":"browse","tool_choice":"web_search","tool_input":{"query":"x"}}',
      '{"reply":"Hello.","word_count":1}',
    ]);

    const result = await agent.process("Say hello");

    expect(result.toolChosen).toBe("direct_answer");
    expect(result.toolReasoning).toContain(DECISION_FALLBACK_REASONING);
    expect(search).not.toHaveBeenCalled();
  });

  it("completes and records a query when the decision is plain prose", async () => {
    const { agent, logger } = setup([
      "You should probably just answer this one.",
      '{"reply":"Done.","word_count":1}',
    ]);

    const result = await agent.process("Do the thing");

    expect(result.toolChosen).toBe("direct_answer");
    expect(agent.getHistory()).toHaveLength(1);
    expect(logger.fallbacks.map((f) => f.protocol)).toEqual(["decision"]);
  });

  it("returns the raw synthesis text when it is not JSON", async () => {
    const raw = "Paris is the capital of France.";
    const { agent } = setup([DIRECT_DECISION, raw]);

    const result = await agent.process("Capital of France?");

    expect(result.reply).toBe(raw);
    expect(result.wordCount).toBe(6);
  });

  it("rejects blank queries before calling the engine", async () => {
    const { agent, prompts } = setup([DIRECT_DECISION]);

    await expect(agent.process("   ")).rejects.toBeInstanceOf(InvalidQueryError);
    expect(prompts).toHaveLength(0);
    expect(agent.getHistory()).toEqual([]);
  });

  it("records the trimmed query", async () => {
    const { agent, prompts } = setup([DIRECT_DECISION, '{"reply":"Hi.","word_count":1}']);
    const result = await agent.process("  hello  ");
    expect(result.userQuery).toBe("hello");
    expect(prompts[0]).toContain("User query: hello\n");
  });

  it("surfaces retrieval failures without recording anything", async () => {
    const { agent, prompts, logger } = setup(
      [RETRIEVE_DECISION, '{"reply":"unused","word_count":1}'],
      new Error("index offline")
    );

    await expect(agent.process("Explain the refund policy")).rejects.toBeInstanceOf(
      RetrievalError
    );
    expect(prompts).toHaveLength(1);
    expect(agent.getHistory()).toEqual([]);
    expect(logger.failures[0]?.step).toBe("execution");
    expect(logger.failures[0]?.error.code).toBe("RETRIEVAL_FAILED");
  });

  it("propagates engine failures unchanged without recording anything", async () => {
    const failure = new TransportError("Reasoning engine call failed: timeout");
    const { agent, logger } = setup([DIRECT_DECISION, failure]);

    await expect(agent.process("Capital of France?")).rejects.toBe(failure);
    expect(agent.getHistory()).toEqual([]);
    expect(logger.failures[0]?.step).toBe("synthesis");
  });

  it("keeps history in call order and clears it", async () => {
    const { agent } = setup([
      DIRECT_DECISION,
      '{"reply":"one","word_count":1}',
      DIRECT_DECISION,
      '{"reply":"two","word_count":1}',
      DIRECT_DECISION,
      '{"reply":"three","word_count":1}',
    ]);

    await agent.process("first");
    await agent.process("second");
    const last = await agent.process("third");

    expect(agent.getHistory().map((r) => r.userQuery)).toEqual([
      "first",
      "second",
      "third",
    ]);
    expect(last.conversationHistory.map((r) => r.reply)).toEqual([
      "one",
      "two",
      "three",
    ]);

    agent.clearHistory();
    expect(agent.getHistory()).toEqual([]);
    expect(last.conversationHistory).toHaveLength(3);
  });

  it("hands out frozen snapshots", async () => {
    const { agent } = setup([DIRECT_DECISION, '{"reply":"Hi.","word_count":1}']);
    await agent.process("hello");

    const history = agent.getHistory();
    expect(Object.isFrozen(history)).toBe(true);
    expect(Object.isFrozen(history[0])).toBe(true);
  });

  it("keeps sessions of separate agents apart", async () => {
    const session = createSessionState();
    const first = setup([DIRECT_DECISION, '{"reply":"a","word_count":1}'], [], session);
    const second = setup([DIRECT_DECISION, '{"reply":"b","word_count":1}']);

    await first.agent.process("one");
    await second.agent.process("two");

    expect(session.size).toBe(1);
    expect(first.agent.getHistory().map((r) => r.reply)).toEqual(["a"]);
    expect(second.agent.getHistory().map((r) => r.reply)).toEqual(["b"]);
  });
});
