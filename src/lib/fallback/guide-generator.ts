/**
 * Guide Generator: the one effectful call of the fallback path.
 *
 * The backend is a narrow interface so routing stays testable without a live
 * model. generateGuide() owns the call policy: bounded timeout, at most one
 * retry, and no call at all while the LLM circuit is open. Every failure
 * surfaces as FallbackUnavailableError; callers degrade, never rethrow raw.
 */

import { getGuideMaxRetries, getGuideModel, getGuideTimeoutMs, getOpenAiApiKey } from "@/lib/config";
import {
  classifyOpenAiError,
  isCircuitOpen,
  isRetryable,
  openCircuit,
  shouldTripCircuit,
  type LlmErrorType,
} from "@/lib/llm-resilience";
import { buildGuidePrompt, GUIDE_SYSTEM_PROMPT } from "@/lib/prompts/guide-prompt";
import { FallbackUnavailableError } from "@/lib/troubleshooting/errors";
import { detectSafety } from "./safety";
import type { FallbackGuide, GuideStep } from "./types";

export type GuideRequest = {
  equipmentDescriptor: string;
  problemText: string;
  context: string;
};

export type GuideBackend = {
  name: string;
  /** Raw model text for the request; must stop work when `signal` aborts */
  generate(request: GuideRequest, signal: AbortSignal): Promise<string>;
};

export type GeneratePolicy = {
  timeoutMs?: number;
  maxRetries?: number;
};

/** Backend failure carrying the upstream HTTP status when there was one */
export class GuideBackendError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "GuideBackendError";
    this.status = status;
  }
}

/** The backend answered, but with nothing that parses as a step */
export class EmptyGuideReplyError extends GuideBackendError {
  constructor() {
    super("Backend reply contained no numbered steps");
    this.name = "EmptyGuideReplyError";
  }
}

// ── Parsing ─────────────────────────────────────────────────────────

const STEP_RE = /^(?:Step\s+)?(\d+)[.):]\s*(.+)$/i;

/** Numbered lines ("1. …", "2) …", "3: …", "Step 4: …") in order; anything else is ignored */
export function parseNumberedSteps(text: string): GuideStep[] {
  const steps: GuideStep[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim().replace(/^\*\*(.+?)\*\*/, "$1");
    const match = STEP_RE.exec(line);
    const body = match?.[2]?.trim();
    if (body) steps.push({ text: body, safety: detectSafety(body) });
  }
  return steps;
}

// ── OpenAI backend ──────────────────────────────────────────────────

function readCompletionText(data: unknown): string {
  if (typeof data !== "object" || data === null || !("choices" in data)) return "";
  const { choices } = data;
  if (!Array.isArray(choices)) return "";
  const first: unknown = choices[0];
  if (typeof first !== "object" || first === null || !("message" in first)) return "";
  const { message } = first;
  if (typeof message !== "object" || message === null || !("content" in message)) return "";
  return typeof message.content === "string" ? message.content : "";
}

export function createOpenAiGuideBackend(opts: { apiKey?: string; model?: string } = {}): GuideBackend {
  return {
    name: "openai",
    async generate(request, signal) {
      const apiKey = opts.apiKey ?? getOpenAiApiKey();
      if (!apiKey) throw new GuideBackendError("OPENAI_API_KEY is not set", 401);

      const upstream = await fetch("https://api.openai.com/v1/chat/completions", {
        method: "POST",
        signal,
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model: opts.model ?? getGuideModel(),
          temperature: 0.3,
          max_tokens: 1024,
          messages: [
            { role: "system", content: GUIDE_SYSTEM_PROMPT },
            { role: "user", content: buildGuidePrompt(request) },
          ],
        }),
      });

      if (!upstream.ok) {
        const text = await upstream.text().catch(() => "");
        throw new GuideBackendError(`Upstream error (${upstream.status}) ${text}`.slice(0, 500), upstream.status);
      }
      const data: unknown = await upstream.json();
      return readCompletionText(data);
    },
  };
}

// ── Call policy ─────────────────────────────────────────────────────

function abortAfter(ms: number): { signal: AbortSignal; done: Promise<never>; cancel: () => void } {
  const ac = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const done = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      ac.abort();
      reject(new GuideBackendError(`Guide generation timed out after ${ms}ms`));
    }, ms);
  });
  // The losing side of the race must not surface as an unhandled rejection
  done.catch(() => undefined);
  return { signal: ac.signal, done, cancel: () => clearTimeout(timer) };
}

function classify(err: unknown, timedOut: boolean): LlmErrorType {
  if (err instanceof EmptyGuideReplyError) return "EMPTY_RESPONSE";
  if (err instanceof GuideBackendError) {
    return classifyOpenAiError({ status: err.status, message: err.message, aborted: timedOut });
  }
  return classifyOpenAiError({ message: err instanceof Error ? err.message : String(err), aborted: timedOut });
}

/**
 * Generate a provisional guide. Throws FallbackUnavailableError on timeout,
 * backend failure, an open circuit, or a reply with no numbered steps.
 */
export async function generateGuide(
  request: GuideRequest,
  backend: GuideBackend,
  confidence: number,
  policy: GeneratePolicy = {}
): Promise<FallbackGuide> {
  const timeoutMs = policy.timeoutMs ?? getGuideTimeoutMs();
  const attempts = 1 + Math.min(1, Math.max(0, policy.maxRetries ?? getGuideMaxRetries()));

  let lastError: unknown = null;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (isCircuitOpen()) {
      throw new FallbackUnavailableError("Generative backend circuit is open", { cause: lastError });
    }

    const deadline = abortAfter(timeoutMs);
    let timedOut = false;
    deadline.signal.addEventListener("abort", () => {
      timedOut = true;
    });

    try {
      const raw = await Promise.race([backend.generate(request, deadline.signal), deadline.done]);
      const steps = parseNumberedSteps(raw);
      if (steps.length === 0) throw new EmptyGuideReplyError();
      return {
        equipmentDescriptor: request.equipmentDescriptor,
        problemText: request.problemText,
        context: request.context,
        steps,
        rawSourceText: raw,
        confidence,
      };
    } catch (err) {
      lastError = err;
      const reason = classify(err, timedOut);
      console.warn(
        `[Guide Generator] ${backend.name} attempt ${attempt}/${attempts} failed (${reason}):`,
        err instanceof Error ? err.message : String(err)
      );
      if (shouldTripCircuit(reason)) openCircuit(reason);
      if (!isRetryable(reason)) break;
    } finally {
      deadline.cancel();
    }
  }

  throw new FallbackUnavailableError("Generative backend unavailable", { cause: lastError });
}
