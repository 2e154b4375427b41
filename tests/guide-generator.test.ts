import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { clearCircuit, getCircuitStatus, openCircuit } from "@/lib/llm-resilience";
import {
  createOpenAiGuideBackend,
  generateGuide,
  GuideBackendError,
  parseNumberedSteps,
  type GuideBackend,
  type GuideRequest,
} from "@/lib/fallback/guide-generator";
import { buildGuidePrompt } from "@/lib/prompts/guide-prompt";
import { FallbackUnavailableError } from "@/lib/troubleshooting/errors";

const REQUEST: GuideRequest = {
  equipmentDescriptor: "Siemens S7-1200",
  problemText: "Profinet fault",
  context: "",
};

const REPLY = [
  "1. Check the link LED on the Profinet port",
  "2. Reseat the Profinet cable at both ends",
  "3. Confirm the device name in the hardware configuration",
].join("\n");

function backendOf(generate: GuideBackend["generate"]): GuideBackend {
  return { name: "fake", generate: vi.fn(generate) };
}

describe("parseNumberedSteps", () => {
  it("reads numbered lines in their common forms and ignores the rest", () => {
    const steps = parseNumberedSteps(
      ["Here are the steps:", "1. Check A", "2) Check B", "Step 3: WARNING: lock out the feeder", "**4.** Bold step", "", "Thanks"].join(
        "\n"
      )
    );
    expect(steps).toEqual([
      { text: "Check A", safety: false },
      { text: "Check B", safety: false },
      { text: "WARNING: lock out the feeder", safety: true },
      { text: "Bold step", safety: false },
    ]);
  });

  it("returns nothing for an unnumbered reply", () => {
    expect(parseNumberedSteps("I am not sure what is wrong.")).toEqual([]);
  });
});

describe("buildGuidePrompt", () => {
  it("lists the equipment and problem, and context only when given", () => {
    expect(buildGuidePrompt(REQUEST)).toBe(
      "Equipment: Siemens S7-1200\nProblem: Profinet fault\n\nWrite the numbered diagnostic steps now."
    );
    expect(buildGuidePrompt({ ...REQUEST, context: "Line 3 packer" })).toContain("Additional context: Line 3 packer");
  });
});

describe("generateGuide", () => {
  beforeEach(() => {
    clearCircuit();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    clearCircuit();
    vi.restoreAllMocks();
  });

  it("returns the parsed guide with the raw text and confidence", async () => {
    const backend = backendOf(async () => REPLY);
    const guide = await generateGuide(REQUEST, backend, 0.55);
    expect(guide.steps.map((s) => s.text)).toEqual([
      "Check the link LED on the Profinet port",
      "Reseat the Profinet cable at both ends",
      "Confirm the device name in the hardware configuration",
    ]);
    expect(guide.rawSourceText).toBe(REPLY);
    expect(guide.confidence).toBe(0.55);
    expect(guide.equipmentDescriptor).toBe("Siemens S7-1200");
  });

  it("retries once after a transient failure", async () => {
    let calls = 0;
    const backend = backendOf(async () => {
      calls++;
      if (calls === 1) throw new Error("socket hang up");
      return REPLY;
    });
    const guide = await generateGuide(REQUEST, backend, 0.5, { maxRetries: 1 });
    expect(guide.steps).toHaveLength(3);
    expect(backend.generate).toHaveBeenCalledTimes(2);
  });

  it("classifies a reply with no steps as empty and gives up after the single retry", async () => {
    const backend = backendOf(async () => "I cannot help with that.");
    await expect(generateGuide(REQUEST, backend, 0.5, { maxRetries: 1 })).rejects.toBeInstanceOf(FallbackUnavailableError);
    expect(backend.generate).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith(
      "[Guide Generator] fake attempt 1/2 failed (EMPTY_RESPONSE):",
      "Backend reply contained no numbered steps"
    );
    expect(getCircuitStatus().status).toBe("up");
  });

  it("never makes more than two calls, whatever the retry setting", async () => {
    const backend = backendOf(async () => "nothing numbered");
    await expect(generateGuide(REQUEST, backend, 0.5, { maxRetries: 5 })).rejects.toBeInstanceOf(FallbackUnavailableError);
    expect(backend.generate).toHaveBeenCalledTimes(2);
  });

  it("times out a hung backend and aborts its signal", async () => {
    const seen: { signal?: AbortSignal } = {};
    const backend = backendOf((_, signal) => {
      seen.signal = signal;
      return new Promise<string>(() => {});
    });
    await expect(generateGuide(REQUEST, backend, 0.5, { timeoutMs: 20, maxRetries: 0 })).rejects.toBeInstanceOf(
      FallbackUnavailableError
    );
    expect(backend.generate).toHaveBeenCalledTimes(1);
    expect(seen.signal?.aborted).toBe(true);
  });

  it("classifies an aborted call as a timeout", async () => {
    const backend = backendOf(() => new Promise<string>(() => {}));
    await expect(generateGuide(REQUEST, backend, 0.5, { timeoutMs: 20, maxRetries: 0 })).rejects.toBeInstanceOf(
      FallbackUnavailableError
    );
    expect(console.warn).toHaveBeenCalledWith(
      "[Guide Generator] fake attempt 1/1 failed (TIMEOUT):",
      "Guide generation timed out after 20ms"
    );
  });

  it("trips the circuit on a provider outage and skips the retry", async () => {
    const backend = backendOf(async () => {
      throw new GuideBackendError("Upstream error (503)", 503);
    });
    await expect(generateGuide(REQUEST, backend, 0.5, { maxRetries: 1 })).rejects.toBeInstanceOf(FallbackUnavailableError);
    expect(backend.generate).toHaveBeenCalledTimes(1);
    expect(getCircuitStatus().status).toBe("down");
  });

  it("does not retry an auth failure", async () => {
    const backend = backendOf(async () => {
      throw new GuideBackendError("Upstream error (401)", 401);
    });
    await expect(generateGuide(REQUEST, backend, 0.5, { maxRetries: 1 })).rejects.toBeInstanceOf(FallbackUnavailableError);
    expect(backend.generate).toHaveBeenCalledTimes(1);
  });

  it("makes no call while the circuit is open", async () => {
    openCircuit("PROVIDER_DOWN", 60_000);
    const backend = backendOf(async () => REPLY);
    await expect(generateGuide(REQUEST, backend, 0.5)).rejects.toBeInstanceOf(FallbackUnavailableError);
    expect(backend.generate).not.toHaveBeenCalled();
  });
});

describe("createOpenAiGuideBackend", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a chat completion and returns the message content", async () => {
    const fetchMock = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) =>
        new Response(JSON.stringify({ choices: [{ message: { content: REPLY } }] }), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const backend = createOpenAiGuideBackend({ apiKey: "test-secret", model: "test-model" });
    const text = await backend.generate(REQUEST, new AbortController().signal);
    expect(text).toBe(REPLY);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(init?.method).toBe("POST");
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: "test-model", temperature: 0.3 });
  });

  it("raises the upstream status on a failed response", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("overloaded", { status: 503 }))
    );
    const backend = createOpenAiGuideBackend({ apiKey: "test-secret" });
    await expect(backend.generate(REQUEST, new AbortController().signal)).rejects.toMatchObject({
      name: "GuideBackendError",
      status: 503,
      message: "Upstream error (503) overloaded",
    });
  });

  it("refuses to call without an API key", async () => {
    vi.stubEnv("OPENAI_API_KEY", "");
    const backend = createOpenAiGuideBackend();
    await expect(backend.generate(REQUEST, new AbortController().signal)).rejects.toMatchObject({ status: 401 });
    vi.stubEnv("OPENAI_API_KEY", "test-secret");
  });
});
