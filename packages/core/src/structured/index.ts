export { extractBalanced, extractJson } from "./extract.js";
export {
  type AskFn,
  createStructuredOutputParser,
  type DecodeResult,
  type OutputSchema,
  type ParsedOutput,
  StructuredOutputParser,
  type StructuredOutputParserOptions,
} from "./parser.js";
export { caseInsensitiveEnum } from "./schema-helpers.js";
