/**
 * Troubleshooting Service: the transport boundary.
 *
 * Translates transport events into engine calls and back into one of three
 * instructions: send a new message (first interaction only), edit the
 * message the action came from, or discard a render that a newer action
 * already superseded.
 */

import { getDefaultGraphKey } from "@/lib/config";
import { resolveQuery, type QueryInput, type RouterDeps } from "@/lib/fallback/confidence-router";
import { acceptGuide, rejectGuide } from "@/lib/fallback/draft-promoter";
import type { Route } from "@/lib/fallback/types";
import { knowledgeStore, type KnowledgeStore } from "@/lib/knowledge-store";
import { retentionCutoff } from "@/lib/retention";
import { parseAction, type ActionPayload } from "./action-payload";
import { DecodeError, GraphNotFoundError, RecordNotFoundError, ReviewStateError } from "./errors";
import { escapeHtml } from "./formatting";
import { getGraphRegistry, type GraphRegistry, type GraphVersionRecord, type PublishResult } from "./graph-registry";
import { Navigator, type NavigatorOptions } from "./navigator";
import { SessionQueue } from "./session-queue";
import type { MessageRender, NavigationOutcome, RenderInstruction } from "./types";

export type StartReply = { op: "send"; render: RenderInstruction };

export type ActionReply =
  | { op: "edit"; messageId: string; render: MessageRender; recovered: NavigationOutcome["recovered"] }
  | { op: "discard"; messageId: string; reason: "superseded" };

export type QueryReply = {
  op: "send";
  route: Route;
  degradedFrom: "RESEARCH" | null;
  gapId: string | null;
  render: MessageRender;
};

export type ServiceDeps = {
  registry?: GraphRegistry;
  store?: KnowledgeStore;
  navigator?: NavigatorOptions;
  router?: Omit<RouterDeps, "store">;
};

/** Messages whose last issued token is remembered; older ones fall back to token-only checks */
const ISSUED_TOKEN_LIMIT = 10_000;

export const GUIDE_SAVED_TEXT = "Saved as a draft. A maintenance lead will review it before it is published.";
export const GUIDE_DISCARDED_TEXT = "Guide discarded. Thanks for the feedback.";
export const GUIDE_CLOSED_TEXT = "This guide can no longer be changed.";
export const LOOKUP_UNPUBLISHED_TEXT = "A matching guide exists but is not published yet. Try again later.";

export class TroubleshootingService {
  readonly registry: GraphRegistry;
  private readonly store: KnowledgeStore;
  private readonly navigator: Navigator;
  private readonly queue = new SessionQueue();
  private readonly issued = new Map<string, string>();
  private hydrated: Promise<void> | null = null;

  constructor(private readonly deps: ServiceDeps = {}) {
    this.registry = deps.registry ?? getGraphRegistry();
    this.store = deps.store ?? knowledgeStore;
    this.navigator = new Navigator(this.registry, deps.navigator);
  }

  /** Load persisted graph versions once per process */
  private ready(): Promise<void> {
    if (!this.hydrated) {
      this.hydrated = this.store.listGraphVersions().then((records) => {
        this.registry.hydrate(records);
      });
      this.hydrated.catch(() => {
        this.hydrated = null;
      });
    }
    return this.hydrated;
  }

  // ── Authoring ─────────────────────────────────────────────────────

  async publishGraph(graphKey: string, source: string): Promise<PublishResult> {
    await this.ready();
    const result = this.registry.publish(graphKey, source);
    if (result.superseded) await this.store.saveGraphVersion(result.superseded);
    if (result.created) await this.store.saveGraphVersion(result.record);
    return result;
  }

  /** Drop superseded versions past the retention window, in memory and in the store */
  async collectGarbage(now: Date = new Date(), dryRun = false): Promise<GraphVersionRecord[]> {
    await this.ready();
    const removed = await this.store.deleteSupersededBefore(retentionCutoff(now), dryRun);
    if (!dryRun) this.registry.collectGarbage(now);
    return removed;
  }

  // ── Navigation ────────────────────────────────────────────────────

  async start(graphKey?: string | null): Promise<StartReply> {
    await this.ready();
    const key = graphKey?.trim() || getDefaultGraphKey();
    if (!key) throw new GraphNotFoundError(null);
    return { op: "send", render: this.navigator.start(key).render };
  }

  /** Actions for one message are applied strictly in arrival order */
  async handleAction(input: { messageId: string; payload: string }): Promise<ActionReply> {
    await this.ready();
    return this.queue.run(input.messageId, () => this.applyAction(input.messageId, input.payload));
  }

  private async applyAction(messageId: string, payload: string): Promise<ActionReply> {
    let action: ActionPayload;
    try {
      action = parseAction(payload);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      return this.edit(messageId, this.navigator.recover(err));
    }

    if (action.kind === "guide") {
      return { op: "edit", messageId, render: await this.applyGuideDecision(action.gapId, action.decision), recovered: null };
    }

    const latest = this.issued.get(messageId);
    if (latest !== undefined && latest !== action.token) {
      console.log(`[Troubleshooting] Discarding superseded action on message ${messageId}`);
      return { op: "discard", messageId, reason: "superseded" };
    }

    return this.edit(messageId, this.navigator.apply(action));
  }

  private edit(messageId: string, outcome: NavigationOutcome): ActionReply {
    this.issued.delete(messageId);
    this.issued.set(messageId, outcome.render.token);
    if (this.issued.size > ISSUED_TOKEN_LIMIT) {
      const oldest = this.issued.keys().next();
      if (!oldest.done) this.issued.delete(oldest.value);
    }
    return { op: "edit", messageId, render: outcome.render, recovered: outcome.recovered };
  }

  private async applyGuideDecision(gapId: string, decision: "save" | "discard"): Promise<MessageRender> {
    try {
      if (decision === "save") {
        await acceptGuide(gapId, this.store);
        return { text: escapeHtml(GUIDE_SAVED_TEXT), media: null, buttons: [] };
      }
      await rejectGuide(gapId, this.store);
      return { text: escapeHtml(GUIDE_DISCARDED_TEXT), media: null, buttons: [] };
    } catch (err) {
      if (!(err instanceof RecordNotFoundError) && !(err instanceof ReviewStateError)) throw err;
      console.warn(`[Troubleshooting] Guide ${decision} on ${gapId} refused: ${err.message}`);
      return { text: escapeHtml(GUIDE_CLOSED_TEXT), media: null, buttons: [] };
    }
  }

  // ── Free-text fallback ────────────────────────────────────────────

  async query(input: QueryInput): Promise<QueryReply> {
    await this.ready();
    const outcome = await resolveQuery(input, { ...this.deps.router, store: this.store });
    const base = { op: "send" as const, route: outcome.route, degradedFrom: outcome.degradedFrom, gapId: outcome.gap?.id ?? null };

    if (outcome.route === "LOOKUP" && outcome.match && this.registry.latest(outcome.match.graphKey)) {
      return { ...base, render: this.navigator.start(outcome.match.graphKey).render };
    }
    const text = outcome.route === "LOOKUP" ? escapeHtml(LOOKUP_UNPUBLISHED_TEXT) : outcome.text;
    return { ...base, render: { text, media: null, buttons: outcome.buttons } };
  }
}

declare global {
  var __troubleshootService: TroubleshootingService | undefined;
}

export function getTroubleshootingService(): TroubleshootingService {
  if (!globalThis.__troubleshootService) {
    globalThis.__troubleshootService = new TroubleshootingService();
  }
  return globalThis.__troubleshootService;
}

export function resetTroubleshootingService(): void {
  globalThis.__troubleshootService = undefined;
}
