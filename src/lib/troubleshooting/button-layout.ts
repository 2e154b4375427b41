/**
 * Button Layout Generator: turns a node's outgoing choices and the
 * contextual actions that apply to it into a grid of buttons.
 *
 * Ordering is fixed: choices in declared edge order, then contextual actions
 * in priority order (back, restart, save, discard). Choices fill rows of at
 * most 8; contextual actions share one final row.
 */

import { getButtonLabelWidth, MAX_BUTTONS_PER_ROW, MAX_TOTAL_BUTTONS } from "@/lib/config";
import { EncodingError } from "./errors";
import {
  CONTEXTUAL_ACTION_ORDER,
  type ButtonDescriptor,
  type ButtonGrid,
  type ContextualAction,
  type DiagramEdge,
  type DiagramNode,
} from "./types";

export const ACTION_LABELS: Record<ContextualAction | "refer", string> = {
  back: "Back",
  restart: "Start over",
  save: "Save guide",
  discard: "Discard",
  refer: "Get qualified help",
};

const ELLIPSIS = "…";

export type LayoutPayloads = Partial<Record<ContextualAction | "refer", string>> & {
  /** Payload for the choice at a given ordinal (declared edge order) */
  choice?: (ordinal: number) => string;
};

export type LayoutInput = {
  node: DiagramNode;
  edges: DiagramEdge[];
  historyEmpty: boolean;
  payloads: LayoutPayloads;
};

export type LayoutOptions = {
  maxPerRow?: number;
  labelWidth?: number;
  maxButtons?: number;
};

/** Truncate to `width` code points, ending in an ellipsis. Never returns an empty label. */
export function truncateLabel(label: string, width: number = getButtonLabelWidth()): string {
  const chars = [...label.trim()];
  if (chars.length <= width) return chars.join("");
  return chars.slice(0, Math.max(1, width - 1)).join("").trimEnd() + ELLIPSIS;
}

function chunk<T>(items: T[], size: number): T[][] {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    rows.push(items.slice(i, i + size));
  }
  return rows;
}

export function buildButtonGrid(input: LayoutInput, options: LayoutOptions = {}): ButtonGrid {
  const maxPerRow = Math.min(options.maxPerRow ?? MAX_BUTTONS_PER_ROW, MAX_BUTTONS_PER_ROW);
  const labelWidth = options.labelWidth ?? getButtonLabelWidth();
  const maxButtons = options.maxButtons ?? MAX_TOTAL_BUTTONS;
  const { node, edges, payloads } = input;

  const button = (label: string, payload: string): ButtonDescriptor => ({
    label: truncateLabel(label, labelWidth),
    payload,
  });

  // Safety-flagged nodes: referral-only layout, no choices, no back
  if (node.safety) {
    const row: ButtonDescriptor[] = [];
    if (payloads.refer) row.push(button(ACTION_LABELS.refer, payloads.refer));
    if (payloads.restart) row.push(button(ACTION_LABELS.restart, payloads.restart));
    return row.length > 0 ? [row] : [];
  }

  const choices: ButtonDescriptor[] = [];
  const choicePayload = payloads.choice;
  if (choicePayload && node.kind !== "terminal") {
    edges.forEach((edge, ordinal) => {
      choices.push(button(edge.label, choicePayload(ordinal)));
    });
  }

  const actions: ButtonDescriptor[] = [];
  for (const action of CONTEXTUAL_ACTION_ORDER) {
    const payload = payloads[action];
    if (!payload) continue;
    if (action === "back" && input.historyEmpty) continue;
    actions.push(button(ACTION_LABELS[action], payload));
  }

  if (choices.length + actions.length > maxButtons) {
    throw new EncodingError(`Node "${node.id}" would render ${choices.length + actions.length} buttons; limit is ${maxButtons}`);
  }

  const grid = chunk(choices, maxPerRow);
  for (const row of chunk(actions, maxPerRow)) grid.push(row);
  return grid;
}

export function countButtons(grid: ButtonGrid): number {
  return grid.reduce((sum, row) => sum + row.length, 0);
}
