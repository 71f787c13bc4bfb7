/**
 * Output controller: extract JSON from raw model content and validate it.
 */

import { extractJson } from "./parse.js";
import type {
  OutputController,
  OutputControllerConfig,
  ParseAndValidateOptions,
  ParseOptions,
  ParseResult,
} from "./types.js";
import { validateAgainstSchema } from "./validate.js";

export function createOutputController(
  config: OutputControllerConfig = {}
): OutputController {
  const stripMarkdown = config.stripMarkdownCodeBlock ?? true;
  const maxRawLength = config.maxRawLength ?? 500;

  function parse(content: string, options?: ParseOptions): ParseResult<unknown> {
    const strip = options?.stripMarkdownCodeBlock ?? stripMarkdown;
    const extract = extractJson(content, strip);
    if (!extract.found) {
      return {
        success: false,
        errors: [extract.reason],
        raw: content.slice(0, maxRawLength),
      };
    }
    return { success: true, data: extract.value };
  }

  return {
    parse,

    parseAndValidate<T>(
      content: string,
      options: ParseAndValidateOptions
    ): ParseResult<T> {
      const parsed = parse(content, options);
      if (!parsed.success) {
        return parsed;
      }

      const validation = validateAgainstSchema<T>(parsed.data, options.schema);
      if (!validation.valid) {
        return {
          success: false,
          errors: validation.errors,
          raw: content.slice(0, maxRawLength),
        };
      }
      return { success: true, data: validation.data };
    },
  };
}
