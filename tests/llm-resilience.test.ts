import { describe, it, expect, vi, afterEach } from "vitest";
import {
  classifyOpenAiError,
  isRetryable,
  shouldTripCircuit,
  isCircuitOpen,
  openCircuit,
  clearCircuit,
  getCircuitStatus,
} from "@/lib/llm-resilience";

describe("llm-resilience: error classification", () => {
  it("detects model_not_found", () => {
    expect(classifyOpenAiError({ status: 404, message: "model_not_found" })).toBe("MODEL_NOT_FOUND");
  });

  it("detects auth blocked", () => {
    expect(classifyOpenAiError({ status: 401, message: "unauthorized" })).toBe("AUTH_BLOCKED");
    expect(classifyOpenAiError({ status: 403, message: "forbidden" })).toBe("AUTH_BLOCKED");
  });

  it("detects rate limited", () => {
    expect(classifyOpenAiError({ status: 429, message: "rate limit" })).toBe("RATE_LIMITED");
  });

  it("detects provider down", () => {
    expect(classifyOpenAiError({ status: 503, message: "upstream" })).toBe("PROVIDER_DOWN");
    expect(classifyOpenAiError({ message: "fetch failed" })).toBe("PROVIDER_DOWN");
  });

  it("detects timeouts from the abort flag or the message", () => {
    expect(classifyOpenAiError({ aborted: true, status: 503 })).toBe("TIMEOUT");
    expect(classifyOpenAiError({ message: "The operation was aborted" })).toBe("TIMEOUT");
  });

  it("falls back to unknown", () => {
    expect(classifyOpenAiError({ status: 400, message: "something else" })).toBe("UNKNOWN");
  });
});

describe("llm-resilience: retry and trip policy", () => {
  it("retries transient failures only", () => {
    expect(isRetryable("TIMEOUT")).toBe(true);
    expect(isRetryable("PROVIDER_DOWN")).toBe(true);
    expect(isRetryable("EMPTY_RESPONSE")).toBe(true);
    expect(isRetryable("AUTH_BLOCKED")).toBe(false);
    expect(isRetryable("RATE_LIMITED")).toBe(false);
  });

  it("trips the circuit on provider-wide failures", () => {
    expect(shouldTripCircuit("PROVIDER_DOWN")).toBe(true);
    expect(shouldTripCircuit("AUTH_BLOCKED")).toBe(true);
    expect(shouldTripCircuit("TIMEOUT")).toBe(false);
    expect(shouldTripCircuit("UNKNOWN")).toBe(false);
  });
});

describe("llm-resilience: circuit breaker", () => {
  afterEach(() => {
    clearCircuit();
    vi.restoreAllMocks();
  });

  it("opens and clears circuit", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    clearCircuit();
    openCircuit("AUTH_BLOCKED", 10_000);
    expect(getCircuitStatus().status).toBe("down");
    expect(getCircuitStatus().reason).toBe("AUTH_BLOCKED");
    clearCircuit();
    expect(getCircuitStatus().status).toBe("up");
  });

  it("closes by itself once the TTL has passed", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    openCircuit("PROVIDER_DOWN", 1_000);
    expect(isCircuitOpen()).toBe(true);
    expect(isCircuitOpen(Date.now() + 2_000)).toBe(false);
    expect(getCircuitStatus().status).toBe("up");
  });
});
