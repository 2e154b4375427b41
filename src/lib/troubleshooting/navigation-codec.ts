/**
 * Navigation Codec: packs a session's graph position and history into an
 * opaque token small enough for a 64-byte callback payload.
 *
 * Layout (before base64url, no padding):
 *
 *   byte 0      format (1)
 *   bytes 1-2   graph key tag (first 16 bits of sha256(graphKey))
 *   bytes 3-6   graph version index (uint32, big endian)
 *   varint      current node index
 *   varint*     history node indices, oldest first
 *
 * The token is the only carrier of navigation state: any instance holding the
 * graph version can rebuild the NavigationState from it. When the history does
 * not fit the budget, the oldest entries are dropped first.
 */

import { createHash } from "node:crypto";
import { PAYLOAD_BUDGET_BYTES } from "@/lib/config";
import { DecodeError, EncodingError, StaleTokenError } from "./errors";
import type { DecisionGraph, NavigationState } from "./types";

const FORMAT = 1;
const HEADER_BYTES = 7;
const MAX_VARINT_BYTES = 4;
const TOKEN_CHARSET_RE = /^[A-Za-z0-9_-]+$/;

/** Characters reserved in front of the token for the action code and choice */
export const ACTION_PREFIX_MAX = 3;

export type ResolvedGraph = { graphKey: string; graph: DecisionGraph };

/** Looks up a served graph version by the identifiers carried in a token */
export type TokenResolver = (versionIndex: number, graphKeyTag: number) => ResolvedGraph | null;

// ── Sizes ───────────────────────────────────────────────────────────

function base64Length(bytes: number): number {
  return Math.ceil((bytes * 4) / 3);
}

export function varintLength(value: number): number {
  let length = 1;
  while (value >= 0x80) {
    value = Math.floor(value / 0x80);
    length++;
  }
  return length;
}

/** Longest token string allowed for a payload budget */
export function tokenCharBudget(payloadBudget: number = PAYLOAD_BUDGET_BYTES): number {
  return payloadBudget - ACTION_PREFIX_MAX;
}

/**
 * Reject graphs whose worst-case minimal token (current node plus the one
 * history entry needed for BACK) cannot fit the payload budget.
 */
export function assertTokenBudget(nodeCount: number, payloadBudget: number = PAYLOAD_BUDGET_BYTES): void {
  const widest = varintLength(Math.max(0, nodeCount - 1));
  if (widest > MAX_VARINT_BYTES) {
    throw new EncodingError(`Graph has ${nodeCount} nodes; node indices above ${MAX_VARINT_BYTES} varint bytes are not supported`);
  }
  const minimalBytes = HEADER_BYTES + widest + (nodeCount > 1 ? widest : 0);
  const chars = base64Length(minimalBytes);
  if (chars > tokenCharBudget(payloadBudget)) {
    throw new EncodingError(
      `Minimal navigation token needs ${chars + ACTION_PREFIX_MAX} bytes; payload budget is ${payloadBudget}`
    );
  }
}

export function graphKeyTag(graphKey: string): number {
  return createHash("sha256").update(graphKey, "utf8").digest().readUInt16BE(0);
}

// ── Varints ─────────────────────────────────────────────────────────

function writeVarint(out: number[], value: number): void {
  while (value >= 0x80) {
    out.push((value & 0x7f) | 0x80);
    value = Math.floor(value / 0x80);
  }
  out.push(value);
}

function readVarint(bytes: Buffer, start: number): { value: number; next: number } {
  let value = 0;
  let factor = 1;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const pos = start + i;
    if (pos >= bytes.length) throw new DecodeError("Token ends inside a varint");
    const byte = bytes[pos];
    value += (byte & 0x7f) * factor;
    if ((byte & 0x80) === 0) {
      if (byte === 0 && i > 0) throw new DecodeError("Non-canonical varint in token");
      return { value, next: pos + 1 };
    }
    factor *= 0x80;
  }
  throw new DecodeError("Varint too long in token");
}

// ── Encode ──────────────────────────────────────────────────────────

function indexOf(graph: DecisionGraph, nodeId: string): number {
  const node = Object.prototype.hasOwnProperty.call(graph.nodes, nodeId) ? graph.nodes[nodeId] : undefined;
  if (!node) {
    throw new EncodingError(`Node "${nodeId}" is not part of graph version ${graph.version.slice(0, 12)}`);
  }
  return node.index;
}

function pack(graphKey: string, graph: DecisionGraph, current: number, history: number[]): string {
  const out: number[] = [FORMAT];
  const tag = graphKeyTag(graphKey);
  out.push((tag >>> 8) & 0xff, tag & 0xff);
  const v = graph.versionIndex >>> 0;
  out.push((v >>> 24) & 0xff, (v >>> 16) & 0xff, (v >>> 8) & 0xff, v & 0xff);
  writeVarint(out, current);
  for (const index of history) writeVarint(out, index);
  return Buffer.from(out).toString("base64url");
}

export type EncodedToken = {
  token: string;
  /** History entries the token carries; the rest were dropped oldest-first */
  historyKept: number;
};

/**
 * Encode navigation state. History is truncated from the oldest end until the
 * token fits; the current node is always kept.
 */
export function encodeTokenWithHistory(
  state: NavigationState,
  graph: DecisionGraph,
  payloadBudget: number = PAYLOAD_BUDGET_BYTES
): EncodedToken {
  if (state.graphVersion !== graph.version) {
    throw new EncodingError(`State is pinned to ${state.graphVersion.slice(0, 12)}, not ${graph.version.slice(0, 12)}`);
  }
  const budget = tokenCharBudget(payloadBudget);
  const current = indexOf(graph, state.currentNode);
  const history = state.history.map((id) => indexOf(graph, id));

  let token = pack(state.graphKey, graph, current, history);
  while (token.length > budget && history.length > 0) {
    history.shift();
    token = pack(state.graphKey, graph, current, history);
  }
  if (token.length > budget) {
    throw new EncodingError(`Navigation token for "${state.currentNode}" exceeds ${payloadBudget} bytes`);
  }
  return { token, historyKept: history.length };
}

export function encodeToken(
  state: NavigationState,
  graph: DecisionGraph,
  payloadBudget: number = PAYLOAD_BUDGET_BYTES
): string {
  return encodeTokenWithHistory(state, graph, payloadBudget).token;
}

// ── Decode ──────────────────────────────────────────────────────────

/**
 * Decode a token back into navigation state, together with the graph version
 * it is pinned to.
 *
 * Throws DecodeError for malformed tokens and StaleTokenError when the graph
 * version it references is unknown or retired.
 */
export function decodeTokenWithGraph(
  token: string,
  resolve: TokenResolver,
  payloadBudget: number = PAYLOAD_BUDGET_BYTES
): { state: NavigationState; graph: DecisionGraph } {
  if (!token || token.length > tokenCharBudget(payloadBudget) || !TOKEN_CHARSET_RE.test(token)) {
    throw new DecodeError("Token is empty, too long, or not base64url");
  }

  const bytes = Buffer.from(token, "base64url");
  if (bytes.toString("base64url") !== token) {
    throw new DecodeError("Token is not canonically encoded");
  }
  if (bytes.length < HEADER_BYTES + 1 || bytes[0] !== FORMAT) {
    throw new DecodeError("Token header is invalid");
  }

  const tag = bytes.readUInt16BE(1);
  const versionIndex = bytes.readUInt32BE(3);
  const resolved = resolve(versionIndex, tag);
  if (!resolved) {
    throw new StaleTokenError(versionIndex, tag);
  }
  const { graph, graphKey } = resolved;

  const nodeAt = (index: number): string => {
    if (index >= graph.nodeOrder.length) {
      throw new DecodeError(`Token references node index ${index} outside the graph`);
    }
    return graph.nodeOrder[index];
  };

  let read = readVarint(bytes, HEADER_BYTES);
  const currentNode = nodeAt(read.value);
  const history: string[] = [];
  while (read.next < bytes.length) {
    read = readVarint(bytes, read.next);
    const id = nodeAt(read.value);
    if (id === currentNode || history.includes(id)) {
      throw new DecodeError("Token history repeats a node");
    }
    history.push(id);
  }

  return { state: { graphKey, graphVersion: graph.version, currentNode, history }, graph };
}

export function decodeToken(
  token: string,
  resolve: TokenResolver,
  payloadBudget: number = PAYLOAD_BUDGET_BYTES
): NavigationState {
  return decodeTokenWithGraph(token, resolve, payloadBudget).state;
}
