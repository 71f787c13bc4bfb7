/**
 * Best-effort extraction of a JSON object from free-form model output
 * (code fences, leading prose, trailing explanation).
 */

export type ExtractResult =
  | { found: true; json: string; value: Record<string, unknown> }
  | { found: false; reason: string };

const CODE_BLOCK_REGEX = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)\r?\n?```/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface ObjectSpans {
  /** `[start, end]` index pairs of balanced `{...}` spans, ordered by start. */
  spans: Array<[number, number]>;
  /** Some `{` was never closed. */
  unclosed: boolean;
}

/**
 * Single pass over `text` collecting every balanced brace span. Quotes only
 * open a string inside a span, so prose around the object cannot hide it;
 * braces inside strings are ignored.
 */
export function findObjectSpans(text: string): ObjectSpans {
  const open: number[] = [];
  const spans: Array<[number, number]> = [];
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (c === "\\") {
        i++;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }
    if (c === "{") {
      open.push(i);
    } else if (open.length === 0) {
      continue;
    } else if (c === '"') {
      inString = true;
    } else if (c === "}") {
      const start = open.pop();
      if (start !== undefined) {
        spans.push([start, i]);
      }
    }
  }

  // Inner spans close first.
  spans.sort((a, b) => a[0] - b[0]);
  return { spans, unclosed: open.length > 0 };
}

function tryParseObject(json: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(json);
    return isPlainObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

function extractFirstObject(text: string): ExtractResult {
  if (!text.includes("{")) {
    return { found: false, reason: "No JSON object found in content" };
  }

  const { spans, unclosed } = findObjectSpans(text);
  for (const [start, end] of spans) {
    const json = text.slice(start, end + 1);
    const value = tryParseObject(json);
    if (value) {
      return { found: true, json, value };
    }
  }

  return {
    found: false,
    reason: unclosed
      ? "Unclosed JSON object in content"
      : "No well-formed JSON object found in content",
  };
}

/**
 * Extract the first well-formed JSON object from raw model content.
 * With `stripMarkdown`, the inside of a ```json fence is tried before the whole text.
 */
export function extractJson(
  content: string,
  stripMarkdown: boolean = true
): ExtractResult {
  const text = content.trim();
  if (!text) {
    return { found: false, reason: "Empty content" };
  }

  if (stripMarkdown) {
    const fenced = text.match(CODE_BLOCK_REGEX)?.[1]?.trim();
    if (fenced) {
      const inner = extractFirstObject(fenced);
      if (inner.found) {
        return inner;
      }
    }
  }

  return extractFirstObject(text);
}
