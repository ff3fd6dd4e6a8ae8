import { describe, expect, it } from "vitest";
import { extractJson } from "../extract.js";

describe("extractJson", () => {
  it("should prefer a json code fence", () => {
    const reply = 'Here you go:\n```json\n{"answer": 42}\n```\nAnything else? {"ignored": true}';

    expect(extractJson(reply)).toBe('{"answer": 42}');
  });

  it("should accept an untagged fence holding an object", () => {
    expect(extractJson('```\n[1, 2, 3]\n```')).toBe("[1, 2, 3]");
  });

  it("should find the first balanced object inside prose", () => {
    const reply = 'Sure! {"text": "a } b", "n": [1, {"x": 2}]} Hope that helps.';

    expect(extractJson(reply)).toBe('{"text": "a } b", "n": [1, {"x": 2}]}');
  });

  it("should handle escaped quotes inside strings", () => {
    expect(extractJson('{"quote": "he said \\"}\\" loudly"}')).toBe('{"quote": "he said \\"}\\" loudly"}');
  });

  it("should skip a bracket run that closes with the wrong bracket", () => {
    expect(extractJson('[1, 2} then {"ok": true}')).toBe('{"ok": true}');
  });

  it("should return undefined when no JSON value is present", () => {
    expect(extractJson("I cannot answer that.")).toBeUndefined();
    expect(extractJson('{"unterminated": ')).toBeUndefined();
  });
});
