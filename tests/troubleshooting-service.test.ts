import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { knowledgeStore, resetMemoryStore } from "@/lib/knowledge-store";
import { clearCircuit } from "@/lib/llm-resilience";
import { GraphNotFoundError } from "@/lib/troubleshooting/errors";
import { GraphRegistry } from "@/lib/troubleshooting/graph-registry";
import { NOTICES } from "@/lib/troubleshooting/navigator";
import {
  GUIDE_CLOSED_TEXT,
  GUIDE_DISCARDED_TEXT,
  GUIDE_SAVED_TEXT,
  LOOKUP_UNPUBLISHED_TEXT,
  TroubleshootingService,
  type ActionReply,
} from "@/lib/troubleshooting/service";
import { SessionQueue } from "@/lib/troubleshooting/session-queue";

/**
 * Transport boundary tests: send / edit / discard instructions, per-message
 * ordering, and double-tap handling.
 */

const PUMP = `flowchart TD
  A{Is the pump running?}
  A -->|Yes| B[Check the discharge valve] --> D((Done))
  A -->|No| C((Check the motor starter))
`;

const PUMP_V2 = `flowchart TD
  A{Is pump P-101 running?}
  A -->|Yes| B[Check the discharge valve] --> D((Done))
  A -->|No| C((Check the motor starter))
`;

const DAY = 24 * 60 * 60 * 1000;

function firstPayload(reply: { render: { buttons: Array<Array<{ payload: string }>> } }): string {
  return reply.render.buttons[0][0].payload;
}

function expectEdit(reply: ActionReply) {
  if (reply.op !== "edit") throw new Error(`expected an edit, got ${reply.op}`);
  return reply;
}

// ── SessionQueue ────────────────────────────────────────────────────

describe("SessionQueue", () => {
  it("runs tasks for one session in arrival order", async () => {
    const queue = new SessionQueue();
    const order: string[] = [];
    const slow = queue.run("m1", async () => {
      await new Promise((r) => setTimeout(r, 20));
      order.push("first");
    });
    const fast = queue.run("m1", () => {
      order.push("second");
    });
    await Promise.all([slow, fast]);
    expect(order).toEqual(["first", "second"]);
  });

  it("does not make other sessions wait", async () => {
    const queue = new SessionQueue();
    const order: string[] = [];
    const slow = queue.run("m1", async () => {
      await new Promise((r) => setTimeout(r, 20));
      order.push("m1");
    });
    const other = queue.run("m2", () => {
      order.push("m2");
    });
    await Promise.all([slow, other]);
    expect(order).toEqual(["m2", "m1"]);
  });

  it("keeps going after a failed task and forgets drained sessions", async () => {
    const queue = new SessionQueue();
    const failed = queue.run("m1", () => {
      throw new Error("boom");
    });
    const next = queue.run("m1", () => "ok");
    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
    await new Promise((r) => setTimeout(r, 0));
    expect(queue.size).toBe(0);
  });
});

// ── TroubleshootingService ──────────────────────────────────────────

describe("TroubleshootingService", () => {
  let service: TroubleshootingService;

  beforeEach(async () => {
    resetMemoryStore();
    clearCircuit();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    service = new TroubleshootingService({ registry: new GraphRegistry() });
    await service.publishGraph("pump", PUMP);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends a new message on start", async () => {
    const reply = await service.start("pump");
    expect(reply.op).toBe("send");
    expect(reply.render.nodeId).toBe("A");
    expect(reply.render.buttons[0].map((b) => b.label)).toEqual(["Yes", "No"]);
  });

  it("starts the default graph when no key is given", async () => {
    await expect(service.start()).rejects.toBeInstanceOf(GraphNotFoundError);
    vi.stubEnv("DEFAULT_GRAPH_KEY", "pump");
    expect((await service.start()).render.graphKey).toBe("pump");
    vi.stubEnv("DEFAULT_GRAPH_KEY", "");
  });

  it("edits the same message on every button press", async () => {
    const start = await service.start("pump");
    const reply = expectEdit(await service.handleAction({ messageId: "m1", payload: firstPayload(start) }));
    expect(reply.messageId).toBe("m1");
    expect(reply.render.text).toBe("<b>Step 2</b>\n\nCheck the discharge valve");
    expect(reply.recovered).toBeNull();
  });

  it("applies the first of two concurrent taps and discards the second", async () => {
    const start = await service.start("pump");
    const payload = firstPayload(start);
    const [first, second] = await Promise.all([
      service.handleAction({ messageId: "m1", payload }),
      service.handleAction({ messageId: "m1", payload }),
    ]);
    expect(first.op).toBe("edit");
    expect(second).toEqual({ op: "discard", messageId: "m1", reason: "superseded" });
  });

  it("accepts the latest token after a discard", async () => {
    const start = await service.start("pump");
    const atB = expectEdit(await service.handleAction({ messageId: "m1", payload: firstPayload(start) }));
    await service.handleAction({ messageId: "m1", payload: firstPayload(start) });
    const atD = expectEdit(await service.handleAction({ messageId: "m1", payload: firstPayload(atB) }));
    expect(atD.render.text).toBe("Done");
  });

  it("keeps separate messages independent", async () => {
    const start = await service.start("pump");
    const payload = firstPayload(start);
    expect((await service.handleAction({ messageId: "m1", payload })).op).toBe("edit");
    expect((await service.handleAction({ messageId: "m2", payload })).op).toBe("edit");
  });

  it("resets an unreadable payload to the root", async () => {
    const reply = expectEdit(await service.handleAction({ messageId: "m1", payload: "zzz" }));
    expect(reply.recovered).toBe("reset");
    expect(reply.render.text.startsWith(`<i>${NOTICES.unreadable}</i>`)).toBe(true);
  });

  it("restores published graphs from the store", async () => {
    const restarted = new TroubleshootingService({ registry: new GraphRegistry() });
    expect((await restarted.start("pump")).render.nodeId).toBe("A");
  });

  it("keeps old versions decodable until garbage collection", async () => {
    const start = await service.start("pump");
    await service.publishGraph("pump", PUMP_V2);

    const pinned = expectEdit(await service.handleAction({ messageId: "m1", payload: firstPayload(start) }));
    expect(pinned.recovered).toBeNull();

    const removed = await service.collectGarbage(new Date(Date.now() + 31 * DAY));
    expect(removed).toHaveLength(1);
    expect(removed[0].version).toBe(start.render.graphVersion);

    const reset = expectEdit(await service.handleAction({ messageId: "m2", payload: firstPayload(start) }));
    expect(reset.recovered).toBe("reset");
    expect(reset.render.text).toBe(`<i>${NOTICES.graphUpdated}</i>\n\n<b>Step 1</b>\n\nIs pump P-101 running?`);
  });

  it("serves identical source under two keys without one taking over the other", async () => {
    await service.publishGraph("line-1", PUMP);
    const start = await service.start("line-1");
    const second = await service.publishGraph("line-2", PUMP);
    expect(second.created).toBe(true);
    expect(second.record.version).not.toBe(start.render.graphVersion);

    const reply = expectEdit(await service.handleAction({ messageId: "m1", payload: firstPayload(start) }));
    expect(reply.recovered).toBeNull();
    expect(reply.render.text).toBe("<b>Step 2</b>\n\nCheck the discharge valve");

    const stored = await knowledgeStore.listGraphVersions();
    expect(stored.map((v) => v.graphKey).sort()).toEqual(["line-1", "line-2", "pump"]);

    const restarted = new TroubleshootingService({ registry: new GraphRegistry() });
    const afterRestart = expectEdit(await restarted.handleAction({ messageId: "m2", payload: firstPayload(start) }));
    expect(afterRestart.recovered).toBeNull();
    expect(afterRestart.render.text).toBe("<b>Step 2</b>\n\nCheck the discharge valve");
  });

  describe("guide decisions", () => {
    async function generatedGapId(): Promise<string> {
      const gap = await knowledgeStore.createGap({
        query: "Siemens S7-1200, Profinet fault",
        route: "RESEARCH",
        score: 0.55,
        safety: false,
        status: "guide_generated",
        guide: {
          equipmentDescriptor: "Siemens S7-1200",
          problemText: "Profinet fault",
          context: "",
          steps: [{ text: "Check the link LED", safety: false }],
          rawSourceText: "1. Check the link LED",
          confidence: 0.55,
        },
      });
      return gap.id;
    }

    it("saves, discards, then refuses further changes", async () => {
      const gapId = await generatedGapId();

      const saved = expectEdit(await service.handleAction({ messageId: "g1", payload: `gs${gapId}` }));
      expect(saved.render).toEqual({ text: GUIDE_SAVED_TEXT, media: null, buttons: [] });
      expect((await knowledgeStore.getGap(gapId))?.status).toBe("draft");

      const discarded = expectEdit(await service.handleAction({ messageId: "g1", payload: `gd${gapId}` }));
      expect(discarded.render.text).toBe(GUIDE_DISCARDED_TEXT);
      expect(await knowledgeStore.listDrafts()).toEqual([]);

      const closed = expectEdit(await service.handleAction({ messageId: "g1", payload: `gs${gapId}` }));
      expect(closed.render.text).toBe(GUIDE_CLOSED_TEXT);
    });

    it("answers an unknown gap with the closed text", async () => {
      const reply = expectEdit(await service.handleAction({ messageId: "g1", payload: "gsno-such-gap" }));
      expect(reply.render.text).toBe(GUIDE_CLOSED_TEXT);
    });
  });

  describe("query", () => {
    it("starts navigation for a published match", async () => {
      const reply = await service.query({ query: "pump, not running", score: 0.92, match: { graphKey: "pump" } });
      expect(reply.route).toBe("LOOKUP");
      expect(reply.gapId).toBeNull();
      expect(reply.render.text).toBe("<b>Step 1</b>\n\nIs the pump running?");
    });

    it("explains when the match is not published", async () => {
      const reply = await service.query({ query: "fan, noisy", score: 0.92, match: { graphKey: "fan" } });
      expect(reply.route).toBe("LOOKUP");
      expect(reply.render).toEqual({ text: LOOKUP_UNPUBLISHED_TEXT, media: null, buttons: [] });
    });

    it("returns the clarifying question with the logged gap", async () => {
      const reply = await service.query({ query: "it keeps stopping", score: 0.2 });
      expect(reply.route).toBe("CLARIFY");
      expect(reply.gapId).not.toBeNull();
      expect(reply.render.buttons).toEqual([]);
    });
  });
});
