import type { ChatMessage } from "@modelgate/provider";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { ParseExhaustedError } from "../../errors/index.js";
import { StructuredOutputParser } from "../parser.js";
import { caseInsensitiveEnum } from "../schema-helpers.js";

const Forecast = z.object({
  probability: z.number().min(0).max(1),
  rationale: z.string(),
});

const question: ChatMessage[] = [{ role: "user", content: "Will it rain tomorrow?" }];

describe("StructuredOutputParser", () => {
  const parser = new StructuredOutputParser(Forecast);

  describe("decode", () => {
    it("should decode a valid reply", () => {
      const result = parser.decode('```json\n{"probability": 0.7, "rationale": "clouds"}\n```');

      expect(result).toEqual({
        success: true,
        value: { probability: 0.7, rationale: "clouds" },
        raw: '```json\n{"probability": 0.7, "rationale": "clouds"}\n```',
      });
    });

    it("should report schema violations by path", () => {
      const result = parser.decode('{"probability": 1.5, "rationale": "sure"}');

      expect(result).toEqual({
        success: false,
        issues: ["probability: Number must be less than or equal to 1"],
        raw: '{"probability": 1.5, "rationale": "sure"}',
      });
    });

    it("should report replies without JSON", () => {
      const result = parser.decode("Probably yes.");

      expect(result.success).toBe(false);
      expect(!result.success && result.issues).toEqual(["no JSON object or array found in the reply"]);
    });

    it("should report malformed JSON", () => {
      const result = parser.decode("```json\n{probability: 0.5}\n```");

      expect(!result.success && result.issues[0]?.startsWith("invalid JSON: ")).toBe(true);
    });
  });

  describe("parse", () => {
    it("should ask for corrections until a reply validates", async () => {
      const ask = vi
        .fn<(messages: readonly ChatMessage[]) => Promise<string>>()
        .mockResolvedValueOnce("Probably yes.")
        .mockResolvedValueOnce('{"probability": 2, "rationale": "very likely"}')
        .mockResolvedValueOnce('{"probability": 0.8, "rationale": "very likely"}');

      const parsed = await parser.parse(question, ask);

      expect(parsed).toEqual({
        value: { probability: 0.8, rationale: "very likely" },
        raw: '{"probability": 0.8, "rationale": "very likely"}',
        attempts: 3,
      });
      expect(ask.mock.calls.map(([messages]) => messages.length)).toEqual([2, 4, 6]);
    });

    it("should quote the faulty reply and its issues in the correction", async () => {
      const ask = vi
        .fn<(messages: readonly ChatMessage[]) => Promise<string>>()
        .mockResolvedValueOnce('{"probability": 2, "rationale": "x"}')
        .mockResolvedValueOnce('{"probability": 0.2, "rationale": "x"}');

      await parser.parse(question, ask);

      const correction = ask.mock.calls[1]?.[0] ?? [];
      expect(correction[2]).toEqual({ role: "assistant", content: '{"probability": 2, "rationale": "x"}' });
      expect(correction[3]?.role).toBe("user");
      expect(correction[3]?.content).toContain("- probability: Number must be less than or equal to 1");
    });

    it("should throw ParseExhaustedError after maxParseAttempts replies", async () => {
      const strict = new StructuredOutputParser(Forecast, { maxParseAttempts: 2 });
      const ask = vi.fn(async () => "no idea");

      const error = await strict.parse(question, ask).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ParseExhaustedError);
      expect(error).toMatchObject({
        attempts: 2,
        lastRaw: "no idea",
        issues: ["no JSON object or array found in the reply"],
      });
      expect(ask).toHaveBeenCalledTimes(2);
    });

    it("should reject a non-positive attempt limit", () => {
      expect(() => new StructuredOutputParser(Forecast, { maxParseAttempts: 0 })).toThrow(RangeError);
    });
  });

  describe("withFormatInstructions", () => {
    it("should extend an existing system prompt", () => {
      const messages = parser.withFormatInstructions([
        { role: "system", content: "You are a forecaster." },
        ...question,
      ]);

      expect(messages).toHaveLength(2);
      expect(messages[0]?.content.startsWith("You are a forecaster.\n\nRespond with a single JSON value")).toBe(
        true
      );
    });

    it("should add a system prompt when there is none", () => {
      const messages = parser.withFormatInstructions(question);

      expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
      expect(messages[0]?.content).toContain('"probability"');
    });
  });
});

describe("caseInsensitiveEnum", () => {
  const Direction = caseInsensitiveEnum(["Up", "Down"]);

  it("should normalize any letter case to the declared value", () => {
    expect(Direction.parse("DOWN")).toBe("Down");
    expect(Direction.parse("up")).toBe("Up");
  });

  it("should still reject unknown values", () => {
    expect(Direction.safeParse("sideways").success).toBe(false);
    expect(Direction.safeParse(3).success).toBe(false);
  });
});
