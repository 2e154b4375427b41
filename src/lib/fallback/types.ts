/**
 * Fallback Types: knowledge gaps, generated guides and draft fragments.
 */

import type { DiagramEdge, DiagramNode } from "@/lib/troubleshooting/types";

export type Route = "LOOKUP" | "RESEARCH" | "CLARIFY" | "ESCALATE";

export type GapStatus = "gap_logged" | "guide_generated" | "accepted" | "draft" | "rejected";

export type GuideStep = {
  text: string;
  safety: boolean;
};

export type FallbackGuide = {
  equipmentDescriptor: string;
  problemText: string;
  context: string;
  steps: GuideStep[];
  rawSourceText: string;
  confidence: number;
};

export type KnowledgeGap = {
  id: string;
  query: string;
  route: Exclude<Route, "LOOKUP">;
  score: number;
  safety: boolean;
  status: GapStatus;
  /** Set when RESEARCH failed and the turn degraded to CLARIFY */
  degradedFrom: "RESEARCH" | null;
  /** Human review deadline, ESCALATE only */
  reviewDueAt: string | null;
  guide: FallbackGuide | null;
  draftId: string | null;
  createdAt: string;
  updatedAt: string;
};

export type DraftStatus = "draft" | "approved" | "rejected";

export type DraftFragment = {
  id: string;
  gapId: string;
  status: DraftStatus;
  title: string;
  root: string;
  nodes: DiagramNode[];
  edges: DiagramEdge[];
  /** Diagram source generated from the chain, compiled on publish */
  source: string;
  reviewedBy: string | null;
  reviewedAt: string | null;
  /** Reviewer's reason, set when the draft is rejected */
  rejectionReason: string | null;
  publishedAs: string | null;
  createdAt: string;
  updatedAt: string;
};
