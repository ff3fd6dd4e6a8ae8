import { ProviderError } from "@modelgate/provider";
import { ErrorCode, usd } from "@modelgate/shared";
import { describe, expect, it } from "vitest";
import {
  BudgetExceededError,
  CancelledError,
  ExhaustedRetriesError,
  FatalProviderError,
  GatewayError,
  isBatchStoppingError,
  isGatewayError,
  isRetryableError,
  ParseExhaustedError,
  UnknownModelError,
} from "../types.js";

describe("GatewayError", () => {
  it("should infer severity and retryability from the code", () => {
    const error = new GatewayError("slow down", ErrorCode.RATE_LIMITED);
    expect(error.severity).toBe("low");
    expect(error.isRetryable).toBe(true);
  });

  it("should serialize to JSON with the code name", () => {
    const cause = new Error("root");
    const json = new GatewayError("wrapped", ErrorCode.INTERNAL_ERROR, { cause }).toJSON();
    expect(json.codeName).toBe("INTERNAL_ERROR");
    expect(json.cause).toBe("root");
    expect(json.severity).toBe("critical");
  });

  it("should keep subclass identity through instanceof", () => {
    const error = new CancelledError();
    expect(error).toBeInstanceOf(GatewayError);
    expect(isGatewayError(error)).toBe(true);
    expect(error.code).toBe(ErrorCode.CANCELLED);
  });
});

describe("FatalProviderError", () => {
  const providerError = new ProviderError("Invalid API key", {
    code: ErrorCode.CREDENTIAL_INVALID,
    category: "credential_invalid",
    kind: "fatal",
    statusCode: 401,
  });

  it("should carry the provider error code and never be retryable", () => {
    const error = new FatalProviderError("openai/gpt-4o-mini", providerError, 1);
    expect(error.code).toBe(ErrorCode.CREDENTIAL_INVALID);
    expect(error.attempts).toBe(1);
    expect(error.cause).toBe(providerError);
    expect(isRetryableError(error)).toBe(false);
  });

  it("should stop a fail-fast batch", () => {
    expect(isBatchStoppingError(new FatalProviderError("m", providerError, 1))).toBe(true);
    expect(isBatchStoppingError(new ExhaustedRetriesError("m", 3, new Error("503")))).toBe(false);
  });
});

describe("BudgetExceededError", () => {
  it("should describe the shortfall in dollars", () => {
    const error = new BudgetExceededError({
      budget: "eval",
      ceiling: usd(1),
      committed: usd("0.5"),
      reserved: usd("0.25"),
      requested: usd("0.5"),
    });
    expect(error.message).toBe('Budget "eval" cannot cover $0.5 ($0.25 of $1 left)');
    expect(error.code).toBe(ErrorCode.BUDGET_EXCEEDED);
    expect(isBatchStoppingError(error)).toBe(true);
  });
});

describe("ParseExhaustedError", () => {
  it("should keep the last raw text and issues", () => {
    const error = new ParseExhaustedError(3, "not json", ["Unexpected token"]);
    expect(error.lastRaw).toBe("not json");
    expect(error.message).toBe("Structured output still invalid after 3 attempts: Unexpected token");
  });
});

describe("UnknownModelError", () => {
  it("should use the model-not-found code", () => {
    expect(new UnknownModelError("nope/model").code).toBe(ErrorCode.MODEL_NOT_FOUND);
  });
});
