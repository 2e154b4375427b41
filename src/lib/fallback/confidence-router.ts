/**
 * Confidence Router: what to do with a free-text query that matched no
 * graph node directly.
 *
 * decideRoute() is the pure decision table; resolveQuery() applies it,
 * calling the generative backend for RESEARCH and logging a knowledge gap
 * for every outcome except LOOKUP.
 */

import { getReferralContact, getRouterThresholds, getSafetyReviewSlaHours } from "@/lib/config";
import { knowledgeStore, type KnowledgeStore } from "@/lib/knowledge-store";
import { encodeAction } from "@/lib/troubleshooting/action-payload";
import { ACTION_LABELS } from "@/lib/troubleshooting/button-layout";
import { FallbackUnavailableError } from "@/lib/troubleshooting/errors";
import { escapeHtml, formatSafetyBlock } from "@/lib/troubleshooting/formatting";
import type { ButtonGrid } from "@/lib/troubleshooting/types";
import { createOpenAiGuideBackend, generateGuide, type GeneratePolicy, type GuideBackend } from "./guide-generator";
import { isSafetyQuery } from "./safety";
import type { FallbackGuide, KnowledgeGap, Route } from "./types";

export type RouteThresholds = { lookup: number; research: number };

/** Precedence: safety, then score against the thresholds (inclusive lower bounds) */
export function decideRoute(
  input: { score: number; safety: boolean },
  thresholds: RouteThresholds = getRouterThresholds()
): Route {
  if (input.safety) return "ESCALATE";
  if (input.score >= thresholds.lookup) return "LOOKUP";
  if (input.score >= thresholds.research) return "RESEARCH";
  return "CLARIFY";
}

// ── Query resolution ────────────────────────────────────────────────

export type LookupMatch = {
  graphKey: string;
  title?: string;
};

export type QueryInput = {
  query: string;
  /** Similarity of the best existing match, 0..1 */
  score: number;
  safety?: boolean;
  categories?: string[];
  equipmentDescriptor?: string;
  problemText?: string;
  context?: string;
  match?: LookupMatch | null;
};

export type QueryOutcome = {
  route: Route;
  degradedFrom: "RESEARCH" | null;
  gap: KnowledgeGap | null;
  /** HTML text for the transport; empty for LOOKUP */
  text: string;
  buttons: ButtonGrid;
  guide: FallbackGuide | null;
  match: LookupMatch | null;
  question: string | null;
};

export type RouterDeps = {
  store?: Pick<KnowledgeStore, "createGap">;
  backend?: GuideBackend;
  policy?: GeneratePolicy;
  now?: () => Date;
};

export const CLARIFY_QUESTIONS = {
  equipment: "Which equipment is this? Please send the make and model.",
  symptom: "What is the equipment doing, or failing to do, right now?",
  faultCode: "Is the equipment showing a fault code or alarm? If so, what does it read?",
} as const;

const ESCALATE_WARNING =
  "This problem may involve a safety hazard. Do not continue troubleshooting on your own.";

/** "Siemens S7-1200, Profinet fault" → equipment before the first comma, problem after it */
export function splitQuery(query: string): { equipmentDescriptor: string; problemText: string } {
  const at = query.indexOf(",");
  if (at === -1) return { equipmentDescriptor: "", problemText: query.trim() };
  return { equipmentDescriptor: query.slice(0, at).trim(), problemText: query.slice(at + 1).trim() };
}

/** Exactly one question: what is missing first (equipment, then symptom), else ask for a fault code */
export function chooseClarifyQuestion(args: { equipmentDescriptor: string; problemText: string }): string {
  if (!args.equipmentDescriptor.trim()) return CLARIFY_QUESTIONS.equipment;
  if (!args.problemText.trim()) return CLARIFY_QUESTIONS.symptom;
  return CLARIFY_QUESTIONS.faultCode;
}

export function formatGuide(guide: FallbackGuide): string {
  const head = `<b>${escapeHtml(guide.equipmentDescriptor || "Equipment")}: ${escapeHtml(guide.problemText)}</b>`;
  const note = "<i>Generated guide. Not yet reviewed by a maintenance lead.</i>";
  const steps = guide.steps.map((step, i) =>
    step.safety ? formatSafetyBlock(`${i + 1}. ${step.text}`) : `${i + 1}. ${escapeHtml(step.text)}`
  );
  return [head, note, ...steps].join("\n\n");
}

function guideButtons(gapId: string): ButtonGrid {
  return [
    [
      { label: ACTION_LABELS.save, payload: encodeAction({ kind: "guide", decision: "save", gapId }) },
      { label: ACTION_LABELS.discard, payload: encodeAction({ kind: "guide", decision: "discard", gapId }) },
    ],
  ];
}

export async function resolveQuery(input: QueryInput, deps: RouterDeps = {}): Promise<QueryOutcome> {
  const store = deps.store ?? knowledgeStore;
  const now = deps.now ?? (() => new Date());
  const safety = isSafetyQuery(input);
  const route = decideRoute({ score: input.score, safety });
  const split = splitQuery(input.query);
  const equipmentDescriptor = input.equipmentDescriptor?.trim() || split.equipmentDescriptor;
  const problemText = input.problemText?.trim() || split.problemText;

  console.log(`[Confidence Router] score=${input.score} safety=${safety} → ${route}`);

  const base = { query: input.query, score: input.score, safety };
  const empty = { degradedFrom: null, buttons: [], guide: null, match: null, question: null };

  if (route === "LOOKUP") {
    return { ...empty, route, gap: null, text: "", match: input.match ?? null };
  }

  if (route === "ESCALATE") {
    const reviewDueAt = new Date(now().getTime() + getSafetyReviewSlaHours() * 3_600_000).toISOString();
    const gap = await store.createGap({ ...base, route, status: "gap_logged", reviewDueAt });
    return {
      ...empty,
      route,
      gap,
      text: [formatSafetyBlock(ESCALATE_WARNING), escapeHtml(getReferralContact())].join("\n\n"),
    };
  }

  if (route === "RESEARCH") {
    try {
      const guide = await generateGuide(
        { equipmentDescriptor, problemText, context: input.context?.trim() ?? "" },
        deps.backend ?? createOpenAiGuideBackend(),
        input.score,
        deps.policy
      );
      const gap = await store.createGap({ ...base, route, status: "guide_generated", guide });
      return { ...empty, route, gap, guide, text: formatGuide(guide), buttons: guideButtons(gap.id) };
    } catch (err) {
      if (!(err instanceof FallbackUnavailableError)) throw err;
      console.warn("[Confidence Router] RESEARCH degraded to CLARIFY:", err.message);
      const question = chooseClarifyQuestion({ equipmentDescriptor, problemText });
      const gap = await store.createGap({ ...base, route: "CLARIFY", status: "gap_logged", degradedFrom: "RESEARCH" });
      return { ...empty, route: "CLARIFY", degradedFrom: "RESEARCH", gap, question, text: escapeHtml(question) };
    }
  }

  const question = chooseClarifyQuestion({ equipmentDescriptor, problemText });
  const gap = await store.createGap({ ...base, route, status: "gap_logged" });
  return { ...empty, route, gap, question, text: escapeHtml(question) };
}
