/**
 * Error Classification Tests
 */

import { ErrorCode } from "@modelgate/shared";
import { describe, expect, it } from "vitest";
import {
  classifyHttpStatus,
  classifyProviderError,
  createProviderError,
  extractRequestId,
  extractRetryAfter,
  isRetryable,
  parseRetryAfter,
  ProviderError,
} from "../errors.js";

function httpError(status: number, message: string, headers: Record<string, string> = {}) {
  return Object.assign(new Error(message), { status, headers });
}

describe("errors", () => {
  // ==========================================================================
  // HTTP Status Classification
  // ==========================================================================

  describe("classifyHttpStatus", () => {
    it("should classify 429 as rate-limited", () => {
      const result = classifyHttpStatus(429);
      expect(result.code).toBe(ErrorCode.RATE_LIMITED);
      expect(result.kind).toBe("rate-limited");
    });

    it.each([400, 401, 403, 404, 422])("should classify %i as fatal", (status) => {
      expect(classifyHttpStatus(status).kind).toBe("fatal");
    });

    it.each([408, 409, 500, 502, 503, 504, 529])("should classify %i as retryable", (status) => {
      expect(classifyHttpStatus(status).kind).toBe("retryable");
    });

    it("should classify unlisted 5xx as retryable and unlisted 4xx as fatal", () => {
      expect(classifyHttpStatus(599).kind).toBe("retryable");
      expect(classifyHttpStatus(418).kind).toBe("fatal");
    });

    it("should map 401 to an invalid credential", () => {
      const result = classifyHttpStatus(401);
      expect(result.code).toBe(ErrorCode.CREDENTIAL_INVALID);
      expect(result.category).toBe("credential_invalid");
    });
  });

  // ==========================================================================
  // Generic Classification
  // ==========================================================================

  describe("classifyProviderError", () => {
    it("should keep the classification of an existing ProviderError", () => {
      const error = new ProviderError("slow down", {
        code: ErrorCode.RATE_LIMITED,
        category: "rate_limited",
        kind: "rate-limited",
        retryAfterMs: 1500,
      });
      expect(classifyProviderError(error)).toEqual({
        code: ErrorCode.RATE_LIMITED,
        category: "rate_limited",
        kind: "rate-limited",
        retryAfterMs: 1500,
      });
    });

    it("should read retry-after seconds from a 429", () => {
      const result = classifyProviderError(httpError(429, "Too Many Requests", { "retry-after": "2" }));
      expect(result.kind).toBe("rate-limited");
      expect(result.retryAfterMs).toBe(2000);
    });

    it("should refine a 400 context overflow", () => {
      const result = classifyProviderError(
        httpError(400, "This model's maximum context length is 128000 tokens")
      );
      expect(result.kind).toBe("fatal");
      expect(result.category).toBe("context_overflow");
      expect(result.code).toBe(ErrorCode.CONTEXT_OVERFLOW);
    });

    it("should refine a 400 content policy rejection", () => {
      const result = classifyProviderError(httpError(400, "Request flagged by content policy"));
      expect(result.kind).toBe("fatal");
      expect(result.code).toBe(ErrorCode.CONTENT_POLICY);
    });

    it("should treat timeouts and connection failures as retryable", () => {
      expect(classifyProviderError(new Error("Request timed out.")).kind).toBe("retryable");
      expect(classifyProviderError(new Error("Connection error.")).kind).toBe("retryable");
      expect(classifyProviderError(new Error("read ECONNRESET")).code).toBe(ErrorCode.NETWORK_ERROR);
    });

    it("should treat a timeout-flavoured abort as a timeout", () => {
      const error = new Error("The operation was aborted due to timeout");
      error.name = "TimeoutError";
      expect(classifyProviderError(error).category).toBe("timeout");
    });

    it("should treat a user abort as fatal", () => {
      const result = classifyProviderError(new Error("Request was aborted."));
      expect(result.kind).toBe("fatal");
      expect(result.category).toBe("aborted");
    });

    it("should treat rate limit messages without a status as rate-limited", () => {
      expect(classifyProviderError("Rate limit reached for requests").kind).toBe("rate-limited");
    });

    it("should treat unrecognized failures as fatal", () => {
      expect(classifyProviderError(new TypeError("x is not a function")).kind).toBe("fatal");
      expect(isRetryable(new TypeError("x is not a function"))).toBe(false);
    });
  });

  // ==========================================================================
  // Header Extraction
  // ==========================================================================

  describe("parseRetryAfter", () => {
    it("should parse delta seconds", () => {
      expect(parseRetryAfter("3")).toBe(3000);
      expect(parseRetryAfter("1.5")).toBe(1500);
    });

    it("should parse an HTTP date relative to now", () => {
      const now = Date.parse("Tue, 21 Oct 2025 07:28:00 GMT");
      expect(parseRetryAfter("Tue, 21 Oct 2025 07:28:05 GMT", now)).toBe(5000);
    });

    it("should clamp dates in the past to zero", () => {
      const now = Date.parse("Tue, 21 Oct 2025 07:28:10 GMT");
      expect(parseRetryAfter("Tue, 21 Oct 2025 07:28:05 GMT", now)).toBe(0);
    });

    it("should return undefined for garbage", () => {
      expect(parseRetryAfter("soon")).toBeUndefined();
    });
  });

  describe("extractRetryAfter", () => {
    it("should prefer retry-after-ms", () => {
      const error = httpError(429, "slow", { "retry-after-ms": "250", "retry-after": "9" });
      expect(extractRetryAfter(error)).toBe(250);
    });

    it("should read headers case-insensitively", () => {
      expect(extractRetryAfter(httpError(429, "slow", { "Retry-After": "4" }))).toBe(4000);
    });

    it("should read a fetch Headers instance", () => {
      const error = Object.assign(new Error("slow"), {
        status: 429,
        headers: new Headers({ "retry-after": "7" }),
      });
      expect(extractRetryAfter(error)).toBe(7000);
    });

    it("should fall back to a retryAfter property in seconds", () => {
      expect(extractRetryAfter({ retryAfter: 2 })).toBe(2000);
    });
  });

  describe("extractRequestId", () => {
    it("should find the request id header", () => {
      expect(extractRequestId(httpError(500, "boom", { "x-request-id": "req_123" }))).toBe("req_123");
    });

    it("should fall back to a requestID property", () => {
      expect(extractRequestId({ requestID: "req_456" })).toBe("req_456");
    });
  });

  // ==========================================================================
  // ProviderError
  // ==========================================================================

  describe("createProviderError", () => {
    it("should wrap an HTTP error with context", () => {
      const error = createProviderError(httpError(503, "Service Unavailable", { "x-request-id": "req_9" }), {
        provider: "openai",
        model: "gpt-4o-mini",
      });

      expect(error).toBeInstanceOf(ProviderError);
      expect(error.kind).toBe("retryable");
      expect(error.statusCode).toBe(503);
      expect(error.context.provider).toBe("openai");
      expect(error.context.model).toBe("gpt-4o-mini");
      expect(error.context.requestId).toBe("req_9");
      expect(error.retryable).toBe(true);
    });

    it("should prefix the message when given a string", () => {
      const error = createProviderError(new Error("boom"), "Completion failed");
      expect(error.message).toBe("Completion failed: boom");
    });

    it("should return an existing ProviderError with merged context", () => {
      const original = new ProviderError("bad", {
        code: ErrorCode.INVALID_ARGUMENT,
        category: "bad_request",
        kind: "fatal",
      });
      const wrapped = createProviderError(original, { model: "m" });
      expect(wrapped.kind).toBe("fatal");
      expect(wrapped.context.model).toBe("m");
    });

    it("should serialize to JSON", () => {
      const error = new ProviderError("slow", {
        code: ErrorCode.RATE_LIMITED,
        category: "rate_limited",
        kind: "rate-limited",
        retryAfterMs: 100,
      });
      const json = error.toJSON();
      expect(json.codeName).toBe("RATE_LIMITED");
      expect(json.kind).toBe("rate-limited");
      expect(json.retryAfterMs).toBe(100);
    });
  });
});
