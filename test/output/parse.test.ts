import { describe, expect, it } from "vitest";
import { extractJson, findObjectSpans } from "../../src/output/parse.js";

describe("extractJson", () => {
  it("extracts a bare JSON object", () => {
    const result = extractJson('{"a": 1}');
    expect(result).toEqual({ found: true, json: '{"a": 1}', value: { a: 1 } });
  });

  it("ignores prose around the object", () => {
    const json =
      '{"tool_choice":"direct_answer","tool_input":{"query":"q"}}';
    const result = extractJson(`Sure! Here is my decision: ${json} Hope that helps.`);
    expect(result.found && result.json).toBe(json);
  });

  it("reads the inside of a markdown code fence", () => {
    const result = extractJson('```json\n{"reply": "hi", "word_count": 1}\n```');
    expect(result.found && result.value).toEqual({ reply: "hi", word_count: 1 });
  });

  it("ignores braces inside string literals", () => {
    const result = extractJson('{"reply":"use {curly} braces }","word_count":3}');
    expect(result.found && result.value).toEqual({
      reply: "use {curly} braces }",
      word_count: 3,
    });
  });

  it("handles escaped quotes inside strings", () => {
    const result = extractJson('{"a":"say \\"hi\\" }"}');
    expect(result.found && result.value).toEqual({ a: 'say "hi" }' });
  });

  it("skips a malformed object and takes the next well-formed one", () => {
    const result = extractJson('{not json} then {"a": 2}');
    expect(result.found && result.value).toEqual({ a: 2 });
  });

  it("reports truncated output", () => {
    expect(extractJson('{"reply": "abc')).toEqual({
      found: false,
      reason: "Unclosed JSON object in content",
    });
  });

  it("reports content without any object", () => {
    expect(extractJson("Paris.")).toEqual({
      found: false,
      reason: "No JSON object found in content",
    });
    expect(extractJson("[1, 2]")).toEqual({
      found: false,
      reason: "No JSON object found in content",
    });
  });

  it("reports empty content", () => {
    expect(extractJson("   ")).toEqual({ found: false, reason: "Empty content" });
  });
});

describe("findObjectSpans", () => {
  it("lists nested spans by start index", () => {
    const text = 'x {"a": {"b": 1}} y';
    expect(findObjectSpans(text)).toEqual({
      spans: [
        [2, 16],
        [8, 15],
      ],
      unclosed: false,
    });
  });

  it("flags an object that never closes", () => {
    expect(findObjectSpans('{"a": {')).toEqual({ spans: [], unclosed: true });
  });

  it("ignores quotes and closing braces outside any object", () => {
    expect(findObjectSpans('He said "}" then {"a":1}')).toEqual({
      spans: [[17, 23]],
      unclosed: false,
    });
  });
});

describe("extractJson on large input", () => {
  it("gives up on a long run of opening braces quickly", () => {
    const startedAt = Date.now();
    expect(extractJson("{".repeat(40000))).toEqual({
      found: false,
      reason: "Unclosed JSON object in content",
    });
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });

  it("finds an object after many malformed ones", () => {
    const startedAt = Date.now();
    const result = extractJson(`${"{x}".repeat(20000)}{"ok":true}`);
    expect(result.found && result.value).toEqual({ ok: true });
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });
});
