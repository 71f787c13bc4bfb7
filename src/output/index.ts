export { createOutputController } from "./controller.js";
export {
  extractJson,
  findObjectSpans,
  type ExtractResult,
  type ObjectSpans,
} from "./parse.js";
export { validateAgainstSchema } from "./validate.js";
export type {
  JsonSchema,
  OutputController,
  OutputControllerConfig,
  ParseAndValidateOptions,
  ParseOptions,
  ParseResult,
  ValidationResult,
} from "./types.js";
