/**
 * Troubleshooting Engine Types
 *
 * Core type definitions for compiled decision graphs, navigation state,
 * and the render instructions handed to the chat transport.
 */

// ── Diagram ─────────────────────────────────────────────────────────

export type NodeKind = "step" | "decision" | "terminal" | "media" | "safety";

export type DiagramNode = {
  id: string;
  kind: NodeKind;
  text: string;
  /** Image URL or file reference shown with the node */
  media: string | null;
  /** Set by kind `safety`, `:::safety` or `class … safety` */
  safety: boolean;
  /** Outgoing edge ids, in declared order */
  edges: string[];
  /** Compact index used by the navigation token (declaration order) */
  index: number;
};

export type DiagramEdge = {
  id: string;
  source: string;
  target: string;
  /** Button text */
  label: string;
};

export type DecisionGraph = {
  root: string;
  nodes: Readonly<Record<string, DiagramNode>>;
  edges: Readonly<Record<string, DiagramEdge>>;
  /** index → node id */
  nodeOrder: readonly string[];
  /** SHA-256 of the graph key and the canonical graph serialization */
  version: string;
  /** First 32 bits of `version`, carried in navigation tokens */
  versionIndex: number;
  /** SHA-256 of the source text the graph was compiled from */
  sourceHash: string;
};

// ── Navigation ──────────────────────────────────────────────────────

export type NavigationState = {
  graphKey: string;
  graphVersion: string;
  currentNode: string;
  /** Previously visited node ids, most recent last; never contains currentNode */
  history: string[];
};

export type ContextualAction = "back" | "restart" | "save" | "discard";

/** Fixed priority order for contextual actions in a button grid */
export const CONTEXTUAL_ACTION_ORDER: readonly ContextualAction[] = ["back", "restart", "save", "discard"];

export type ButtonDescriptor = {
  label: string;
  payload: string;
};

export type ButtonGrid = ButtonDescriptor[][];

export type RenderInstruction = {
  text: string;
  media: string | null;
  safety: boolean;
  buttons: ButtonGrid;
  token: string;
  /** One-line notice shown above the node (reset, stale button, referral) */
  notice: string | null;
  nodeId: string;
  graphKey: string;
  graphVersion: string;
};

/** What any outbound message carries, navigation or not */
export type MessageRender = Pick<RenderInstruction, "text" | "media" | "buttons">;

export type NavigationOutcome = {
  state: NavigationState;
  render: RenderInstruction;
  /** Why the outcome differs from the requested transition, if it does */
  recovered: "reset" | "rerender" | null;
};
