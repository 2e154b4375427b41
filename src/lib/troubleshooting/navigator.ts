/**
 * Navigator: the troubleshooting state machine.
 *
 * A session is UNBOUND until `start` pins it to the latest version of a
 * graph. Every later action arrives with the token of the render it came
 * from; the state is rebuilt from that token alone, the transition is applied
 * against the pinned version, and a fresh render (with a fresh token) is
 * returned for the transport to apply as an edit of the same message.
 *
 * Runtime failures never escape as crashes:
 * - unreadable / stale token → reset to the root of the latest version
 * - choice not offered by the current node → re-render the current node
 */

import { getDefaultGraphKey, getHistoryMaxDepth, getReferralContact, PAYLOAD_BUDGET_BYTES } from "@/lib/config";
import { encodeAction, type ActionPayload } from "./action-payload";
import { buildButtonGrid, type LayoutOptions, type LayoutPayloads } from "./button-layout";
import { getNode, getOutgoingEdges } from "./diagram-compiler";
import { DecodeError, GraphNotFoundError, InvalidTransitionError, StaleTokenError } from "./errors";
import { formatNodeText } from "./formatting";
import { HistoryStack } from "./history-stack";
import { decodeTokenWithGraph, encodeTokenWithHistory, type TokenResolver } from "./navigation-codec";
import type { DecisionGraph, DiagramNode, NavigationOutcome, NavigationState, RenderInstruction } from "./types";

/** The registry surface the navigator reads from */
export type GraphSource = {
  latest(graphKey: string): DecisionGraph | null;
  resolve: TokenResolver;
  findKeyByTag(tag: number): string | null;
  keys(): string[];
};

export type NavigationAction = Exclude<ActionPayload, { kind: "guide" }>;

export type NavigatorOptions = {
  payloadBudget?: number;
  historyMaxDepth?: number;
  layout?: LayoutOptions;
};

export const NOTICES = {
  graphUpdated: "This guide was updated since your last step, so it has restarted from the beginning.",
  unreadable: "That button could not be read, so the guide has restarted from the beginning.",
  staleChoice: "That option is no longer available. Here is your current step.",
} as const;

// ── Pure transitions ────────────────────────────────────────────────

function nodeOrThrow(graph: DecisionGraph, nodeId: string): DiagramNode {
  const node = getNode(graph, nodeId);
  if (!node) throw new InvalidTransitionError(nodeId, "node is not part of the pinned graph version");
  return node;
}

/** Bind a session to the root of a graph version */
export function startState(graphKey: string, graph: DecisionGraph): NavigationState {
  return { graphKey, graphVersion: graph.version, currentNode: graph.root, history: [] };
}

/** Follow the outgoing edge at `choice` (declared order) */
export function selectTransition(
  state: NavigationState,
  graph: DecisionGraph,
  choice: number,
  maxDepth: number = getHistoryMaxDepth()
): NavigationState {
  const node = nodeOrThrow(graph, state.currentNode);
  if (node.kind === "terminal") {
    throw new InvalidTransitionError(node.id, "terminal nodes have no forward transition");
  }
  if (node.safety) {
    throw new InvalidTransitionError(node.id, "safety-flagged nodes only offer referral or restart");
  }
  const edge = getOutgoingEdges(graph, node.id)[choice];
  if (!edge) {
    throw new InvalidTransitionError(node.id, `no choice at position ${choice}`);
  }

  const history = new HistoryStack(state.history, maxDepth);
  history.push(node.id);
  history.arriveAt(edge.target);
  return { ...state, currentNode: edge.target, history: history.toArray() };
}

/** Follow the outgoing edge whose label matches (case-insensitive) */
export function selectByLabel(
  state: NavigationState,
  graph: DecisionGraph,
  label: string,
  maxDepth?: number
): NavigationState {
  const wanted = label.trim().toLowerCase();
  const choice = getOutgoingEdges(graph, state.currentNode).findIndex((e) => e.label.toLowerCase() === wanted);
  if (choice === -1) {
    throw new InvalidTransitionError(state.currentNode, `no choice labelled "${label}"`);
  }
  return selectTransition(state, graph, choice, maxDepth);
}

/** Pop one step of history; with empty history the state is returned unchanged */
export function backTransition(
  state: NavigationState,
  graph: DecisionGraph,
  maxDepth: number = getHistoryMaxDepth()
): NavigationState {
  const node = nodeOrThrow(graph, state.currentNode);
  if (node.safety) {
    throw new InvalidTransitionError(node.id, "safety-flagged nodes only offer referral or restart");
  }
  const history = new HistoryStack(state.history, maxDepth);
  const previous = history.pop();
  if (previous === null) return state;
  return { ...state, currentNode: previous, history: history.toArray() };
}

/** Clear history and move to the root of the latest version (the only point a session adopts one) */
export function restartTransition(state: NavigationState, latest: DecisionGraph): NavigationState {
  return startState(state.graphKey, latest);
}

// ── Rendering ───────────────────────────────────────────────────────

/**
 * Render a state. The returned state has its history trimmed to what the
 * token actually carries, so the next decode rebuilds exactly this state.
 */
export function renderState(
  state: NavigationState,
  graph: DecisionGraph,
  opts: { notice?: string | null; payloadBudget?: number; layout?: LayoutOptions } = {}
): { state: NavigationState; render: RenderInstruction } {
  const budget = opts.payloadBudget ?? PAYLOAD_BUDGET_BYTES;
  const node = nodeOrThrow(graph, state.currentNode);

  const { token, historyKept } = encodeTokenWithHistory(state, graph, budget);
  const trimmed: NavigationState = { ...state, history: state.history.slice(state.history.length - historyKept) };

  const payloads: LayoutPayloads = {
    choice: (ordinal) => encodeAction({ kind: "select", choice: ordinal, token }, budget),
    back: encodeAction({ kind: "back", token }, budget),
    restart: encodeAction({ kind: "restart", token }, budget),
  };
  if (node.safety) payloads.refer = encodeAction({ kind: "refer", token }, budget);

  const buttons = buildButtonGrid(
    { node, edges: getOutgoingEdges(graph, node.id), historyEmpty: trimmed.history.length === 0, payloads },
    opts.layout
  );

  const notice = opts.notice ?? null;
  return {
    state: trimmed,
    render: {
      text: formatNodeText(node, { notice, stepNumber: trimmed.history.length + 1 }),
      media: node.media,
      safety: node.safety,
      buttons,
      token,
      notice,
      nodeId: node.id,
      graphKey: trimmed.graphKey,
      graphVersion: graph.version,
    },
  };
}

// ── Navigator ───────────────────────────────────────────────────────

export class Navigator {
  private readonly payloadBudget: number;

  constructor(
    private readonly graphs: GraphSource,
    private readonly options: NavigatorOptions = {}
  ) {
    this.payloadBudget = options.payloadBudget ?? PAYLOAD_BUDGET_BYTES;
  }

  private get maxDepth(): number {
    return this.options.historyMaxDepth ?? getHistoryMaxDepth();
  }

  private outcome(
    state: NavigationState,
    graph: DecisionGraph,
    notice: string | null,
    recovered: NavigationOutcome["recovered"]
  ): NavigationOutcome {
    const rendered = renderState(state, graph, { notice, payloadBudget: this.payloadBudget, layout: this.options.layout });
    return { ...rendered, recovered };
  }

  /** UNBOUND → root of the latest version of `graphKey` */
  start(graphKey: string): NavigationOutcome {
    const graph = this.graphs.latest(graphKey);
    if (!graph) throw new GraphNotFoundError(graphKey);
    return this.outcome(startState(graphKey, graph), graph, null, null);
  }

  apply(action: NavigationAction): NavigationOutcome {
    let state: NavigationState;
    let resolved: DecisionGraph;
    try {
      ({ state, graph: resolved } = decodeTokenWithGraph(action.token, this.graphs.resolve, this.payloadBudget));
    } catch (err) {
      if (err instanceof DecodeError) return this.recover(err);
      throw err;
    }

    try {
      switch (action.kind) {
        case "select":
          return this.outcome(selectTransition(state, resolved, action.choice, this.maxDepth), resolved, null, null);
        case "back":
          return this.outcome(backTransition(state, resolved, this.maxDepth), resolved, null, null);
        case "restart": {
          const latest = this.graphs.latest(state.graphKey) ?? resolved;
          return this.outcome(restartTransition(state, latest), latest, null, null);
        }
        case "refer": {
          const node = nodeOrThrow(resolved, state.currentNode);
          if (!node.safety) throw new InvalidTransitionError(node.id, "referral is only offered on safety-flagged nodes");
          return this.outcome(state, resolved, getReferralContact(), null);
        }
      }
    } catch (err) {
      if (!(err instanceof InvalidTransitionError)) throw err;
      console.warn(`[Navigator] ${err.message}; re-rendering current node`);
      return this.outcome(state, resolved, NOTICES.staleChoice, "rerender");
    }
  }

  /** Reset after an unreadable or stale payload. Throws GraphNotFoundError when no graph can take the session. */
  recover(err: DecodeError): NavigationOutcome {
    const graphKey = this.recoveryKey(err);
    const graph = graphKey ? this.graphs.latest(graphKey) : null;
    if (!graphKey || !graph) {
      console.error(`[Navigator] Cannot recover session: ${err.message}`);
      throw new GraphNotFoundError(graphKey);
    }
    const notice = err instanceof StaleTokenError ? NOTICES.graphUpdated : NOTICES.unreadable;
    console.warn(`[Navigator] ${err.message}; resetting to root of "${graphKey}"`);
    return this.outcome(startState(graphKey, graph), graph, notice, "reset");
  }

  /** Graph to reset into: the token's own graph when its tag is readable, else the configured default */
  private recoveryKey(err: DecodeError): string | null {
    if (err instanceof StaleTokenError) {
      const key = this.graphs.findKeyByTag(err.graphKeyTag);
      if (key) return key;
    }
    const fallback = getDefaultGraphKey();
    if (fallback) return fallback;
    const keys = this.graphs.keys();
    return keys.length === 1 ? keys[0] : null;
  }
}
