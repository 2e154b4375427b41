/**
 * Draft Promoter: turns an accepted generated guide into a draft graph
 * fragment: one `step` node per guide step, in order, ending in a single
 * `terminal` node.
 *
 * Drafts are stored, never served. Publishing one is a separate, human-gated
 * action (see draft-review.ts).
 */

import { knowledgeStore, type KnowledgeStore } from "@/lib/knowledge-store";
import { compileDiagram } from "@/lib/troubleshooting/diagram-compiler";
import { RecordNotFoundError, ReviewStateError } from "@/lib/troubleshooting/errors";
import type { DiagramEdge, DiagramNode } from "@/lib/troubleshooting/types";
import type { DraftFragment, FallbackGuide, KnowledgeGap } from "./types";

export const DRAFT_EDGE_LABEL = "Next";
export const DRAFT_TERMINAL_ID = "done";
export const DRAFT_TERMINAL_TEXT = "End of guide. If the fault persists, escalate to a qualified technician.";

type PromoterStore = Pick<KnowledgeStore, "getGap" | "updateGap" | "createDraft" | "getDraft" | "deleteDraft">;

export type ChainFragment = Pick<DraftFragment, "title" | "root" | "nodes" | "edges" | "source">;

/** Quoted node text: no double quotes, no line breaks */
function dslText(text: string): string {
  return text.replace(/"/g, "'").replace(/\s*\r?\n\s*/g, " ").trim();
}

export function fragmentToDiagramSource(fragment: Pick<DraftFragment, "root" | "nodes" | "edges">): string {
  const lines = ["flowchart TD", `  %% root: ${fragment.root}`];
  for (const node of fragment.nodes) {
    lines.push(node.kind === "terminal" ? `  ${node.id}(("${dslText(node.text)}"))` : `  ${node.id}["${dslText(node.text)}"]`);
  }
  for (const edge of fragment.edges) {
    lines.push(`  ${edge.source} -->|${edge.label}| ${edge.target}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Linear chain s1 → s2 → … → sN → done.
 *
 * Safety-flagged steps keep a WARNING prefix rather than the safety flag: a
 * flagged node is a navigation stop and would end the chain at that step.
 */
export function buildChainFragment(guide: FallbackGuide): ChainFragment {
  if (guide.steps.length === 0) {
    throw new ReviewStateError("Guide has no steps to promote");
  }

  const ids = guide.steps.map((_, i) => `s${i + 1}`);
  const nodes: DiagramNode[] = guide.steps.map((step, i) => ({
    id: ids[i],
    kind: "step",
    text: step.safety && !/^warning:/i.test(step.text) ? `WARNING: ${step.text}` : step.text,
    media: null,
    safety: false,
    edges: [`e${i}`],
    index: i,
  }));
  nodes.push({
    id: DRAFT_TERMINAL_ID,
    kind: "terminal",
    text: DRAFT_TERMINAL_TEXT,
    media: null,
    safety: false,
    edges: [],
    index: ids.length,
  });

  const edges: DiagramEdge[] = ids.map((source, i) => ({
    id: `e${i}`,
    source,
    target: ids[i + 1] ?? DRAFT_TERMINAL_ID,
    label: DRAFT_EDGE_LABEL,
  }));

  const title = [guide.equipmentDescriptor, guide.problemText].filter((s) => s.trim()).join(": ") || "Generated guide";
  const root = ids[0];
  const source = fragmentToDiagramSource({ root, nodes, edges });
  // A draft that could never be published is rejected up front
  compileDiagram(source);

  return { title, root, nodes, edges, source };
}

async function requireGap(store: PromoterStore, gapId: string): Promise<KnowledgeGap> {
  const gap = await store.getGap(gapId);
  if (!gap) throw new RecordNotFoundError("gap", gapId);
  return gap;
}

/** Store the chain built from an accepted gap's guide as a draft fragment */
export async function promoteGuide(gap: KnowledgeGap, store: PromoterStore = knowledgeStore): Promise<DraftFragment> {
  if (gap.status !== "accepted") {
    throw new ReviewStateError(`Gap ${gap.id} is "${gap.status}"; only accepted guides are promoted`);
  }
  if (!gap.guide) {
    throw new ReviewStateError(`Gap ${gap.id} has no generated guide`);
  }

  const draft = await store.createDraft({ gapId: gap.id, ...buildChainFragment(gap.guide) });
  await store.updateGap(gap.id, { status: "draft", draftId: draft.id });
  console.log(`[Draft Promoter] Gap ${gap.id} → draft ${draft.id} (${draft.nodes.length} nodes)`);
  return draft;
}

/**
 * Explicit acceptance of a generated guide, then promotion to a draft.
 * Accepting a gap that already produced a draft returns that draft.
 */
export async function acceptGuide(gapId: string, store: PromoterStore = knowledgeStore): Promise<DraftFragment> {
  const gap = await requireGap(store, gapId);

  if (gap.status === "draft" && gap.draftId) {
    const existing = await store.getDraft(gap.draftId);
    if (existing) return existing;
  }
  if (gap.status !== "guide_generated" && gap.status !== "accepted") {
    throw new ReviewStateError(`Gap ${gapId} is "${gap.status}" and cannot be accepted`);
  }

  const accepted = await store.updateGap(gapId, { status: "accepted" });
  if (!accepted) throw new RecordNotFoundError("gap", gapId);
  return promoteGuide(accepted, store);
}

/** Discard the guide (and any draft built from it); the gap record is kept */
export async function rejectGuide(gapId: string, store: PromoterStore = knowledgeStore): Promise<KnowledgeGap> {
  const gap = await requireGap(store, gapId);
  if (gap.status === "rejected") return gap;

  let draftId = gap.draftId;
  if (draftId) {
    const draft = await store.getDraft(draftId);
    if (draft?.status === "approved") {
      throw new ReviewStateError(`Draft ${draft.id} is already approved; unpublish it through review instead`);
    }
    // A reviewer's rejection stays on record
    if (draft?.status !== "rejected") {
      await store.deleteDraft(draftId);
      draftId = null;
    }
  }

  const rejected = await store.updateGap(gapId, { status: "rejected", draftId });
  if (!rejected) throw new RecordNotFoundError("gap", gapId);
  console.log(`[Draft Promoter] Gap ${gapId} rejected`);
  return rejected;
}
