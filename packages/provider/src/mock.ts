/**
 * MockProvider - Deterministic provider adapter for testing
 *
 * Plays back a script of responses and failures for:
 * - Unit and integration tests of the dispatch core
 * - Offline development
 *
 * @module @modelgate/provider
 */

import { ErrorCode, type TokenUsage } from "@modelgate/shared";
import { classifyHttpStatus, type ErrorKind, ProviderError } from "./errors.js";
import type {
  FinishReason,
  ProviderAdapter,
  ProviderRequest,
  ProviderType,
  RawResponse,
  SendOptions,
} from "./types.js";

// =============================================================================
// Mock Types
// =============================================================================

/**
 * Failure to raise instead of a response
 */
export interface MockFailure {
  kind: ErrorKind;
  message?: string;
  /** HTTP status to report; drives the error code when set */
  statusCode?: number;
  retryAfterMs?: number;
  /** Usage the vendor would bill for the failed request */
  billedUsage?: TokenUsage;
}

/**
 * One scripted step
 */
export interface MockResponse {
  /** Text content to return */
  text?: string;
  /** Token usage to report (defaults to 100 in / 50 out) */
  usage?: TokenUsage;
  /** Vendor-reported cost in USD */
  costUsd?: number;
  finishReason?: FinishReason;
  /** Simulated latency in ms; aborting the signal cuts it short */
  delay?: number;
  /** Fail this step instead of responding */
  error?: MockFailure;
}

/**
 * Computes a step from the incoming request
 */
export type MockHandler = (request: ProviderRequest, callIndex: number) => MockResponse;

/**
 * Mock script - sequence of responses
 */
export interface MockScript {
  /** Ordered list of responses to return */
  responses?: MockResponse[];
  /** Used when set; takes precedence over `responses` */
  handler?: MockHandler;
  /** Whether to cycle responses when exhausted (default: false, repeats the last) */
  cycle?: boolean;
  /** Provider identity to report */
  provider?: ProviderType;
}

/**
 * A request as the mock received it
 */
export interface RecordedRequest {
  request: ProviderRequest;
  receivedAt: number;
}

const DEFAULT_USAGE: TokenUsage = { inputTokens: 100, outputTokens: 50 };

// =============================================================================
// MockProvider Implementation
// =============================================================================

/**
 * MockProvider returns deterministic responses from a script
 *
 * @example
 * ```typescript
 * const provider = new MockProvider({
 *   responses: [
 *     { error: { kind: "rate-limited", retryAfterMs: 2000 } },
 *     { text: "Hello!" },
 *   ],
 * });
 *
 * await provider.send({ model: "mock", messages: [] }).catch(() => undefined);
 * const result = await provider.send({ model: "mock", messages: [] });
 * console.log(result.text); // "Hello!"
 * ```
 */
export class MockProvider implements ProviderAdapter {
  readonly provider: ProviderType;
  private readonly script: MockScript;
  private currentIndex = 0;
  private readonly recorded: RecordedRequest[] = [];

  constructor(script: MockScript = {}) {
    this.script = script;
    this.provider = script.provider ?? "mock";
  }

  // ===========================================================================
  // ProviderAdapter Implementation
  // ===========================================================================

  async send(request: ProviderRequest, options: SendOptions = {}): Promise<RawResponse> {
    const callIndex = this.recorded.length;
    this.recorded.push({ request, receivedAt: Date.now() });

    const step = this.script.handler ? this.script.handler(request, callIndex) : this.getNextResponse();

    if (step.delay && step.delay > 0) {
      await this.delay(step.delay, options.signal);
    }
    if (options.signal?.aborted) {
      throw abortError(request.model);
    }

    if (step.error) {
      throw this.toProviderError(step.error, request.model);
    }

    return {
      text: step.text ?? "",
      usage: step.usage ?? DEFAULT_USAGE,
      costUsd: step.costUsd,
      finishReason: step.finishReason ?? "stop",
      requestId: `mock-${callIndex + 1}`,
    };
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  /**
   * Requests received so far, in arrival order
   */
  get requests(): readonly RecordedRequest[] {
    return this.recorded;
  }

  get callCount(): number {
    return this.recorded.length;
  }

  /**
   * Reset the script to start from beginning and forget recorded requests
   */
  reset(): void {
    this.currentIndex = 0;
    this.recorded.length = 0;
  }

  hasMoreResponses(): boolean {
    return this.currentIndex < (this.script.responses?.length ?? 0);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private getNextResponse(): MockResponse {
    const responses = this.script.responses ?? [];
    if (responses.length === 0) {
      return { text: "[No mock responses configured]" };
    }

    if (this.currentIndex >= responses.length) {
      if (this.script.cycle) {
        this.currentIndex = 0;
      } else {
        return responses.at(-1) ?? { text: "[No mock responses configured]" };
      }
    }

    const response = responses[this.currentIndex] ?? { text: "[No mock responses configured]" };
    this.currentIndex++;
    return response;
  }

  private toProviderError(failure: MockFailure, model: string): ProviderError {
    const byStatus = failure.statusCode !== undefined ? classifyHttpStatus(failure.statusCode) : undefined;
    return new ProviderError(failure.message ?? `Mock ${failure.kind} failure`, {
      code: byStatus?.code ?? KIND_CODES[failure.kind],
      category: byStatus?.category ?? KIND_CATEGORIES[failure.kind],
      kind: failure.kind,
      statusCode: failure.statusCode,
      retryAfterMs: failure.retryAfterMs,
      billedUsage: failure.billedUsage,
      context: { provider: this.provider, model },
    });
  }

  private delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

const KIND_CODES: Record<ErrorKind, ErrorCode> = {
  "rate-limited": ErrorCode.RATE_LIMITED,
  retryable: ErrorCode.SERVICE_UNAVAILABLE,
  fatal: ErrorCode.INVALID_ARGUMENT,
};

const KIND_CATEGORIES = {
  "rate-limited": "rate_limited",
  retryable: "server_error",
  fatal: "bad_request",
} as const satisfies Record<ErrorKind, string>;

function abortError(model: string): ProviderError {
  return new ProviderError("Request was aborted", {
    code: ErrorCode.CANCELLED,
    category: "aborted",
    kind: "fatal",
    context: { provider: "mock", model },
  });
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a mock provider from a request handler
 */
export function createMockProvider(handler: MockHandler, provider?: ProviderType): MockProvider {
  return new MockProvider({ handler, provider });
}
