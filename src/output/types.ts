/**
 * Output control types. Model output is untrusted: it is extracted, parsed
 * and validated before anything reads it.
 */

import type { SchemaObject } from "ajv";

/** JSON Schema (draft-07 style) constraining a structured reply. */
export type JsonSchema = SchemaObject;

export type ParseResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; errors: string[]; raw: string };

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: string[] };

export interface ParseOptions {
  /** Strip a markdown code fence (```json ... ```) before scanning. Defaults to the controller setting. */
  stripMarkdownCodeBlock?: boolean;
}

export interface ParseAndValidateOptions extends ParseOptions {
  schema: JsonSchema;
}

export interface OutputControllerConfig {
  /** Whether to strip ```json ... ``` from content before parsing (default true). */
  stripMarkdownCodeBlock?: boolean;
  /** Max characters of raw content kept on a failed result (default 500). */
  maxRawLength?: number;
}

export interface OutputController {
  /** Extract the first well-formed JSON object from the content. */
  parse(content: string, options?: ParseOptions): ParseResult<unknown>;
  /** Extract, then validate against the schema; the data is typed by the schema's caller. */
  parseAndValidate<T>(
    content: string,
    options: ParseAndValidateOptions
  ): ParseResult<T>;
}
