/**
 * Draft review: the human-gated step between a draft fragment and a served
 * graph. A reviewer approves or rejects the draft; an approved draft is then
 * published under a graph key as a new graph version.
 */

import { knowledgeStore, type KnowledgeStore } from "@/lib/knowledge-store";
import { RecordNotFoundError, ReviewStateError } from "@/lib/troubleshooting/errors";
import type { PublishResult } from "@/lib/troubleshooting/graph-registry";
import { getTroubleshootingService } from "@/lib/troubleshooting/service";
import type { DraftFragment, DraftStatus } from "./types";

type ReviewStore = Pick<KnowledgeStore, "getDraft" | "updateDraft">;

/** Anything that serves graph source after loading the versions already stored */
export type GraphPublisher = {
  publishGraph(graphKey: string, source: string): Promise<PublishResult>;
};

export type DraftStats = Record<DraftStatus, number> & { total: number };

async function pendingDraft(draftId: string, store: ReviewStore, action: string): Promise<DraftFragment> {
  const draft = await store.getDraft(draftId);
  if (!draft) throw new RecordNotFoundError("draft", draftId);
  if (draft.status !== "draft") {
    throw new ReviewStateError(`Draft ${draftId} is already ${draft.status}; it cannot be ${action}`);
  }
  return draft;
}

export async function approveDraft(
  draftId: string,
  reviewer: string,
  store: ReviewStore = knowledgeStore
): Promise<DraftFragment> {
  const name = reviewer.trim();
  if (!name) throw new ReviewStateError("A reviewer name is required to approve a draft");

  const existing = await store.getDraft(draftId);
  if (existing?.status === "approved") return existing;
  await pendingDraft(draftId, store, "approved");

  const approved = await store.updateDraft(draftId, {
    status: "approved",
    reviewedBy: name,
    reviewedAt: new Date().toISOString(),
  });
  if (!approved) throw new RecordNotFoundError("draft", draftId);
  console.log(`[Draft Review] Draft ${draftId} approved by ${name}`);
  return approved;
}

/** Reject a pending draft. The record stays, with the reviewer and the reason. */
export async function rejectDraft(
  draftId: string,
  reviewer: string,
  reason: string,
  store: ReviewStore = knowledgeStore
): Promise<DraftFragment> {
  const name = reviewer.trim();
  const why = reason.trim();
  if (!name) throw new ReviewStateError("A reviewer name is required to reject a draft");
  if (!why) throw new ReviewStateError("A reason is required to reject a draft");

  await pendingDraft(draftId, store, "rejected");
  const rejected = await store.updateDraft(draftId, {
    status: "rejected",
    reviewedBy: name,
    reviewedAt: new Date().toISOString(),
    rejectionReason: why,
  });
  if (!rejected) throw new RecordNotFoundError("draft", draftId);
  console.log(`[Draft Review] Draft ${draftId} rejected by ${name}: ${why}`);
  return rejected;
}

export async function getDraftStats(
  store: Pick<KnowledgeStore, "countDraftsByStatus"> = knowledgeStore
): Promise<DraftStats> {
  const counts = await store.countDraftsByStatus();
  return { ...counts, total: counts.draft + counts.approved + counts.rejected };
}

export async function publishApprovedDraft(
  draftId: string,
  graphKey: string,
  deps: { store?: ReviewStore; publisher?: GraphPublisher } = {}
): Promise<PublishResult> {
  const store = deps.store ?? knowledgeStore;
  const publisher = deps.publisher ?? getTroubleshootingService();

  const draft = await store.getDraft(draftId);
  if (!draft) throw new RecordNotFoundError("draft", draftId);
  if (draft.status !== "approved") {
    throw new ReviewStateError(`Draft ${draftId} must be approved before it is published`);
  }

  const result = await publisher.publishGraph(graphKey, draft.source);
  await store.updateDraft(draftId, { publishedAs: result.record.version });
  return result;
}
