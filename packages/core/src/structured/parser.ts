// ============================================
// Structured Output Parser
// ============================================

import type { ChatMessage } from "@modelgate/provider";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { CONFIG_DEFAULTS } from "../config/defaults.js";
import { ParseExhaustedError } from "../errors/index.js";
import { createNullLogger, type Logger } from "../logger/index.js";
import { extractJson } from "./extract.js";

/**
 * A zod schema whose input is unconstrained, as produced by JSON.parse.
 */
export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type DecodeResult<T> =
  | { success: true; value: T; raw: string }
  | { success: false; issues: string[]; raw: string };

export interface ParsedOutput<T> {
  value: T;
  /** Reply text the value was decoded from */
  raw: string;
  /** Replies requested, the first one included */
  attempts: number;
}

/**
 * Produces the next reply for a conversation. Each call is a full model
 * invocation: rate-limited, retried and charged.
 */
export type AskFn = (messages: readonly ChatMessage[]) => Promise<string>;

export interface StructuredOutputParserOptions {
  /** Replies to decode before giving up, the first one included (default: 3) */
  maxParseAttempts?: number;
  logger?: Logger;
}

/**
 * Decodes model replies into typed values and asks the model to repair
 * replies that do not validate.
 *
 * @example
 * ```typescript
 * const parser = new StructuredOutputParser(z.object({ probability: z.number().min(0).max(1) }));
 *
 * const { value, attempts } = await parser.parse(messages, async (conversation) => {
 *   const result = await invoker.invoke({ model, messages: conversation });
 *   return result.text;
 * });
 * ```
 */
export class StructuredOutputParser<T> {
  readonly schema: OutputSchema<T>;
  readonly maxParseAttempts: number;
  private readonly logger: Logger;
  private schemaText?: string;

  constructor(schema: OutputSchema<T>, options: StructuredOutputParserOptions = {}) {
    const maxParseAttempts = options.maxParseAttempts ?? CONFIG_DEFAULTS.structured.maxParseAttempts;
    if (!Number.isInteger(maxParseAttempts) || maxParseAttempts < 1) {
      throw new RangeError(`maxParseAttempts must be a positive integer, got ${maxParseAttempts}`);
    }
    this.schema = schema;
    this.maxParseAttempts = maxParseAttempts;
    this.logger = (options.logger ?? createNullLogger()).child({ component: "structured" });
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Decode one reply without asking for corrections.
   */
  decode(raw: string): DecodeResult<T> {
    const candidate = extractJson(raw);
    if (candidate === undefined) {
      return { success: false, issues: ["no JSON object or array found in the reply"], raw };
    }

    let data: unknown;
    try {
      data = JSON.parse(candidate);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, issues: [`invalid JSON: ${message}`], raw };
    }

    const result = this.schema.safeParse(data);
    if (!result.success) {
      return { success: false, issues: formatIssues(result.error), raw };
    }
    return { success: true, value: result.data, raw };
  }

  /**
   * Ask for a reply, decode it, and ask for a corrected one while decoding
   * fails, up to `maxParseAttempts` replies.
   *
   * @throws ParseExhaustedError carrying the last reply and its issues
   */
  async parse(messages: readonly ChatMessage[], ask: AskFn): Promise<ParsedOutput<T>> {
    let conversation = this.withFormatInstructions(messages);

    for (let attempt = 1; ; attempt++) {
      const raw = await ask(conversation);
      const decoded = this.decode(raw);
      if (decoded.success) {
        return { value: decoded.value, raw, attempts: attempt };
      }

      if (attempt >= this.maxParseAttempts) {
        this.logger.warn("Structured output still invalid, giving up", {
          attempts: attempt,
          issues: decoded.issues,
        });
        throw new ParseExhaustedError(attempt, raw, decoded.issues);
      }

      this.logger.debug("Structured output invalid, asking for a correction", {
        attempt,
        issues: decoded.issues,
      });
      conversation = this.correctionMessages(conversation, raw, decoded.issues);
    }
  }

  /**
   * Append the expected JSON shape to the system prompt, adding one when
   * the conversation has none.
   */
  withFormatInstructions(messages: readonly ChatMessage[]): ChatMessage[] {
    const instructions = this.formatInstructions();
    const [first, ...rest] = messages;
    if (first?.role === "system") {
      return [{ role: "system", content: `${first.content}\n\n${instructions}` }, ...rest];
    }
    return [{ role: "system", content: instructions }, ...messages];
  }

  formatInstructions(): string {
    return `Respond with a single JSON value that matches this JSON schema:\n${this.describeSchema()}`;
  }

  /**
   * The conversation so far, the faulty reply, and a request to fix it.
   */
  correctionMessages(
    conversation: readonly ChatMessage[],
    raw: string,
    issues: readonly string[]
  ): ChatMessage[] {
    return [
      ...conversation,
      { role: "assistant", content: raw },
      {
        role: "user",
        content: [
          "Your previous reply could not be parsed:",
          ...issues.map((issue) => `- ${issue}`),
          "",
          "Reply again with only the corrected JSON, matching this JSON schema:",
          this.describeSchema(),
        ].join("\n"),
      },
    ];
  }

  describeSchema(): string {
    this.schemaText ??= JSON.stringify(
      zodToJsonSchema(this.schema, { target: "openApi3", $refStrategy: "none" }),
      null,
      2
    );
    return this.schemaText;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Create a parser for `schema`.
 */
export function createStructuredOutputParser<T>(
  schema: OutputSchema<T>,
  options?: StructuredOutputParserOptions
): StructuredOutputParser<T> {
  return new StructuredOutputParser(schema, options);
}
