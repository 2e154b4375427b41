/**
 * Diagram Compiler: turns an author-written flowchart into a validated,
 * immutable DecisionGraph.
 *
 * Source format is a Mermaid-style flowchart:
 *
 *   flowchart TD
 *     %% root: A
 *     A[Check supply voltage] --> B{Breaker tripped?}
 *     B -->|Yes| C((Reset breaker and retest))
 *     B -->|No| D>Isolate and lock out before opening the panel]
 *     click A "https://example.test/panel.jpg"
 *
 * Shapes: [step]  {decision}  ((terminal))  [/media/]  >safety]
 * A `:::safety` suffix or `class A,B safety` sets the safety flag.
 *
 * Compilation is pure: the same source always yields the same graph with the
 * same node order. The version hash also covers the graph key, so identical
 * source served under two keys gives two distinct versions.
 */

import { createHash } from "node:crypto";
import { MAX_TOTAL_BUTTONS, PAYLOAD_BUDGET_BYTES } from "@/lib/config";
import {
  AmbiguousRouteError,
  DanglingEdgeError,
  OrphanNodeError,
  ParseError,
} from "./errors";
import { assertTokenBudget } from "./navigation-codec";
import {
  CONTEXTUAL_ACTION_ORDER,
  type DecisionGraph,
  type DiagramEdge,
  type DiagramNode,
  type NodeKind,
} from "./types";

export type CompileOptions = {
  /** Graph key the version is served under; part of the version hash */
  graphKey?: string;
  /** Callback payload budget the graph must fit (default 64 bytes) */
  payloadBudget?: number;
  /** Transport maximum for buttons in one message (default 100) */
  maxButtons?: number;
};

/** Label given to the single unlabeled edge of a non-decision node */
export const DEFAULT_EDGE_LABEL = "Continue";

// ── Tokenizer ───────────────────────────────────────────────────────

type NodeDecl = { kind: NodeKind; text: string; line: number };

type RawEdge = { source: string; target: string; label: string | null; line: number };

type ParsedSource = {
  order: string[];
  decls: Map<string, NodeDecl>;
  edges: RawEdge[];
  media: Map<string, string>;
  safetyFlags: Set<string>;
  declaredRoot: { id: string; line: number } | null;
};

const HEADER_RE = /^(?:flowchart|graph)(?:\s+(?:TD|TB|LR|RL|BT))?\s*;?$/i;
const ROOT_DIRECTIVE_RE = /^%%\s*root\s*:\s*([A-Za-z0-9_]+)\s*$/i;
const CLICK_RE = /^click\s+([A-Za-z0-9_]+)\s+(?:href\s+)?"([^"]+)"/i;
const CLASS_RE = /^class\s+([A-Za-z0-9_,\s]+?)\s+([A-Za-z0-9_-]+)\s*;?$/i;
const IGNORED_RE = /^(?:(?:classDef|style|linkStyle)\s.*|subgraph(?:\s.*)?|end|direction\s+\w+)$/i;

const ID_RE = /^[A-Za-z0-9_]+/;
const LABELED_ARROW_RE = /^--\s+(.+?)\s+-{2,}>/;
const ARROW_RE = /^(?:-{2,}>|={2,}>|-\.+->)/;
const PIPE_LABEL_RE = /^\s*\|([^|]*)\|/;

const SHAPES: Array<{ open: string; close: string; kind: NodeKind }> = [
  // Longest openers first so "((" wins over "(" and "[/" over "["
  { open: "((", close: "))", kind: "terminal" },
  { open: "[/", close: "/]", kind: "media" },
  { open: "[", close: "]", kind: "step" },
  { open: "{", close: "}", kind: "decision" },
  { open: ">", close: "]", kind: "safety" },
];

type NodeRef = { id: string; decl: { kind: NodeKind; text: string } | null; safety: boolean; end: number };

function readNodeRef(text: string, start: number, line: number): NodeRef {
  const idMatch = ID_RE.exec(text.slice(start));
  if (!idMatch) {
    throw new ParseError(`Expected a node id at column ${start + 1}`, { code: "SYNTAX", line });
  }
  const id = idMatch[0];
  let pos = start + id.length;
  let decl: NodeRef["decl"] = null;

  const shape = SHAPES.find((s) => text.startsWith(s.open, pos));
  if (shape) {
    pos += shape.open.length;
    let body: string;
    if (text[pos] === '"') {
      const closeQuote = text.indexOf('"', pos + 1);
      if (closeQuote === -1) {
        throw new ParseError(`Unterminated quoted text for node "${id}"`, { code: "SYNTAX", nodeId: id, line });
      }
      body = text.slice(pos + 1, closeQuote);
      pos = closeQuote + 1;
      if (!text.startsWith(shape.close, pos)) {
        throw new ParseError(`Expected "${shape.close}" after text of node "${id}"`, { code: "SYNTAX", nodeId: id, line });
      }
    } else {
      const close = text.indexOf(shape.close, pos);
      if (close === -1) {
        throw new ParseError(`Unclosed shape for node "${id}"`, { code: "SYNTAX", nodeId: id, line });
      }
      body = text.slice(pos, close);
      pos = close;
    }
    pos += shape.close.length;
    const nodeText = body.trim();
    if (!nodeText) {
      throw new ParseError(`Node "${id}" has empty text`, { code: "INVALID_NODE", nodeId: id, line });
    }
    decl = { kind: shape.kind, text: nodeText };
  }

  let safety = false;
  const classMatch = /^:::([A-Za-z0-9_-]+)/.exec(text.slice(pos));
  if (classMatch) {
    safety = classMatch[1].toLowerCase() === "safety";
    pos += classMatch[0].length;
  }

  return { id, decl, safety, end: pos };
}

function skipSpaces(text: string, pos: number): number {
  while (pos < text.length && /\s/.test(text[pos])) pos++;
  return pos;
}

function readArrow(text: string, start: number, line: number): { label: string | null; end: number } {
  const rest = text.slice(start);

  const labeled = LABELED_ARROW_RE.exec(rest);
  if (labeled) {
    return { label: labeled[1].trim(), end: start + labeled[0].length };
  }

  const arrow = ARROW_RE.exec(rest);
  if (!arrow) {
    throw new ParseError(`Expected an arrow at column ${start + 1}`, { code: "SYNTAX", line });
  }
  let end = start + arrow[0].length;
  const pipe = PIPE_LABEL_RE.exec(text.slice(end));
  if (pipe) {
    end += pipe[0].length;
    return { label: pipe[1].trim() || null, end };
  }
  return { label: null, end };
}

function declare(parsed: ParsedSource, ref: NodeRef, line: number): void {
  if (!parsed.order.includes(ref.id)) parsed.order.push(ref.id);
  if (ref.safety) parsed.safetyFlags.add(ref.id);
  if (!ref.decl) return;

  const existing = parsed.decls.get(ref.id);
  if (existing) {
    if (existing.kind !== ref.decl.kind || existing.text !== ref.decl.text) {
      throw new ParseError(
        `Node "${ref.id}" redeclared with a different shape or text (first declared on line ${existing.line})`,
        { code: "INVALID_NODE", nodeId: ref.id, line }
      );
    }
    return;
  }
  parsed.decls.set(ref.id, { ...ref.decl, line });
}

function parseStatement(parsed: ParsedSource, text: string, line: number): void {
  let pos = 0;
  let prev = readNodeRef(text, pos, line);
  declare(parsed, prev, line);
  pos = skipSpaces(text, prev.end);

  if (pos >= text.length && !prev.decl) {
    throw new ParseError(`Node statement "${prev.id}" needs a shape`, { code: "SYNTAX", nodeId: prev.id, line });
  }

  while (pos < text.length) {
    const arrow = readArrow(text, pos, line);
    pos = skipSpaces(text, arrow.end);
    const next = readNodeRef(text, pos, line);
    declare(parsed, next, line);
    parsed.edges.push({ source: prev.id, target: next.id, label: arrow.label, line });
    prev = next;
    pos = skipSpaces(text, next.end);
  }
}

function parseDiagramSource(source: string): ParsedSource {
  const parsed: ParsedSource = {
    order: [],
    decls: new Map(),
    edges: [],
    media: new Map(),
    safetyFlags: new Set(),
    declaredRoot: null,
  };
  const pendingRefs: Array<{ id: string; line: number; what: string }> = [];

  source.split(/\r?\n/).forEach((rawLine, i) => {
    const line = i + 1;
    const text = rawLine.trim().replace(/;$/, "").trim();
    if (!text || text.startsWith("```")) return;

    if (text.startsWith("%%")) {
      const root = ROOT_DIRECTIVE_RE.exec(text);
      if (root) {
        if (parsed.declaredRoot && parsed.declaredRoot.id !== root[1]) {
          throw new ParseError(`Second root declared ("${root[1]}")`, { code: "MISSING_ROOT", nodeId: root[1], line });
        }
        parsed.declaredRoot = { id: root[1], line };
      }
      return;
    }
    if (HEADER_RE.test(text) || IGNORED_RE.test(text)) return;

    const click = CLICK_RE.exec(text);
    if (click) {
      parsed.media.set(click[1], click[2]);
      pendingRefs.push({ id: click[1], line, what: "click" });
      return;
    }

    const cls = CLASS_RE.exec(text);
    if (cls) {
      const ids = cls[1].split(",").map((s) => s.trim()).filter(Boolean);
      for (const id of ids) {
        if (cls[2].toLowerCase() === "safety") parsed.safetyFlags.add(id);
        pendingRefs.push({ id, line, what: "class" });
      }
      return;
    }

    parseStatement(parsed, text, line);
  });

  for (const ref of pendingRefs) {
    if (!parsed.decls.has(ref.id)) {
      throw new ParseError(`"${ref.what}" references undeclared node "${ref.id}"`, {
        code: "INVALID_NODE",
        nodeId: ref.id,
        line: ref.line,
      });
    }
  }

  return parsed;
}

// ── Validation ──────────────────────────────────────────────────────

function pickRoot(parsed: ParsedSource): string {
  if (parsed.declaredRoot) {
    if (!parsed.decls.has(parsed.declaredRoot.id)) {
      throw new ParseError(`Declared root "${parsed.declaredRoot.id}" is not a declared node`, {
        code: "MISSING_ROOT",
        nodeId: parsed.declaredRoot.id,
        line: parsed.declaredRoot.line,
      });
    }
    return parsed.declaredRoot.id;
  }
  const withIncoming = new Set(parsed.edges.map((e) => e.target));
  return parsed.order.find((id) => !withIncoming.has(id)) ?? parsed.order[0];
}

function sweep(root: string, edges: RawEdge[]): Set<string> {
  const adjacency = new Map<string, string[]>();
  for (const edge of edges) {
    const list = adjacency.get(edge.source) ?? [];
    list.push(edge.target);
    adjacency.set(edge.source, list);
  }

  const reached = new Set<string>([root]);
  const queue = [root];
  for (let i = 0; i < queue.length; i++) {
    for (const target of adjacency.get(queue[i]) ?? []) {
      if (!reached.has(target)) {
        reached.add(target);
        queue.push(target);
      }
    }
  }
  return reached;
}

function validateNode(node: DiagramNode, outgoing: RawEdge[], maxButtons: number): void {
  const firstLine = outgoing[0]?.line ?? null;
  const stops = node.kind === "terminal" || node.kind === "safety" || node.safety;

  if (stops) {
    if (outgoing.length > 0) {
      const what = node.kind === "terminal" ? "terminal" : "safety-flagged";
      throw new ParseError(`${what} node "${node.id}" cannot have outgoing edges`, {
        code: "INVALID_NODE",
        nodeId: node.id,
        line: firstLine,
      });
    }
    return;
  }

  if (node.kind === "media" && !node.media) {
    throw new ParseError(`Media node "${node.id}" has no media reference (add: click ${node.id} "…")`, {
      code: "INVALID_NODE",
      nodeId: node.id,
    });
  }

  if (node.kind === "decision") {
    const unlabeled = outgoing.find((e) => !e.label);
    if (unlabeled) {
      throw new AmbiguousRouteError(node.id, `choice leading to "${unlabeled.target}" has no label`, unlabeled.line);
    }
    if (outgoing.length < 2) {
      throw new AmbiguousRouteError(node.id, "a decision needs at least two labeled choices", firstLine);
    }
  } else {
    if (outgoing.length === 0) {
      throw new ParseError(`Node "${node.id}" has no outgoing edge; end a path with a ((terminal)) node`, {
        code: "INVALID_NODE",
        nodeId: node.id,
      });
    }
    if (outgoing.length > 1) {
      throw new AmbiguousRouteError(node.id, "only decision nodes may branch", outgoing[1].line);
    }
  }

  const seen = new Map<string, RawEdge>();
  for (const edge of outgoing) {
    const key = (edge.label ?? DEFAULT_EDGE_LABEL).toLowerCase();
    const dup = seen.get(key);
    if (dup) {
      throw new AmbiguousRouteError(
        node.id,
        `label "${edge.label ?? DEFAULT_EDGE_LABEL}" leads to both "${dup.target}" and "${edge.target}"`,
        edge.line
      );
    }
    seen.set(key, edge);
  }

  if (outgoing.length + CONTEXTUAL_ACTION_ORDER.length > maxButtons) {
    throw new ParseError(
      `Node "${node.id}" has ${outgoing.length} choices; the transport allows ${maxButtons - CONTEXTUAL_ACTION_ORDER.length}`,
      { code: "TOO_MANY_CHOICES", nodeId: node.id, line: firstLine }
    );
  }
}

// ── Hashing ─────────────────────────────────────────────────────────

export function hashSource(source: string): string {
  return createHash("sha256").update(source, "utf8").digest("hex");
}

function canonicalize(graphKey: string, root: string, nodes: DiagramNode[], edges: DiagramEdge[]): string {
  return JSON.stringify({
    graphKey,
    root,
    nodes: nodes.map((n) => [n.id, n.kind, n.text, n.media, n.safety]),
    edges: edges.map((e) => [e.source, e.target, e.label]),
  });
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child && typeof child === "object" && !Object.isFrozen(child)) deepFreeze(child);
  }
  return Object.freeze(value);
}

// ── Compile ─────────────────────────────────────────────────────────

/**
 * Compile flowchart source into a DecisionGraph.
 * Throws a ParseError subclass (or EncodingError) describing the first problem found.
 */
export function compileDiagram(source: string, options: CompileOptions = {}): DecisionGraph {
  const payloadBudget = options.payloadBudget ?? PAYLOAD_BUDGET_BYTES;
  const maxButtons = options.maxButtons ?? MAX_TOTAL_BUTTONS;
  const parsed = parseDiagramSource(source);

  if (parsed.order.length === 0) {
    throw new ParseError("Diagram declares no nodes", { code: "MISSING_ROOT" });
  }

  for (const edge of parsed.edges) {
    for (const end of [edge.source, edge.target]) {
      if (!parsed.decls.has(end)) {
        throw new DanglingEdgeError(edge.source, edge.target, end, edge.line);
      }
    }
  }

  const root = pickRoot(parsed);
  const reached = sweep(root, parsed.edges);
  const orphans = parsed.order.filter((id) => !reached.has(id));
  if (orphans.length > 0) {
    throw new OrphanNodeError(orphans);
  }

  const edges: DiagramEdge[] = [];
  const outgoingBySource = new Map<string, RawEdge[]>();
  parsed.edges.forEach((raw, i) => {
    const sourceKind = parsed.decls.get(raw.source)?.kind;
    edges.push({
      id: `e${i}`,
      source: raw.source,
      target: raw.target,
      label: raw.label ?? (sourceKind === "decision" ? "" : DEFAULT_EDGE_LABEL),
    });
    const list = outgoingBySource.get(raw.source) ?? [];
    list.push(raw);
    outgoingBySource.set(raw.source, list);
  });

  const nodes: DiagramNode[] = parsed.order.map((id, index) => {
    const decl = parsed.decls.get(id);
    if (!decl) {
      throw new ParseError(`Node "${id}" is referenced but never declared`, { code: "INVALID_NODE", nodeId: id });
    }
    return {
      id,
      kind: decl.kind,
      text: decl.text,
      media: parsed.media.get(id) ?? null,
      safety: decl.kind === "safety" || parsed.safetyFlags.has(id),
      edges: edges.filter((e) => e.source === id).map((e) => e.id),
      index,
    };
  });

  for (const node of nodes) {
    validateNode(node, outgoingBySource.get(node.id) ?? [], maxButtons);
  }

  assertTokenBudget(nodes.length, payloadBudget);

  const canonical = canonicalize(options.graphKey ?? "", root, nodes, edges);
  const version = createHash("sha256").update(canonical, "utf8").digest("hex");

  return deepFreeze({
    root,
    nodes: Object.fromEntries(nodes.map((n) => [n.id, n])),
    edges: Object.fromEntries(edges.map((e) => [e.id, e])),
    nodeOrder: nodes.map((n) => n.id),
    version,
    versionIndex: parseInt(version.slice(0, 8), 16) >>> 0,
    sourceHash: hashSource(source),
  });
}

// ── Compile cache ───────────────────────────────────────────────────

const compileCache = new Map<string, DecisionGraph>();

/** compileDiagram, memoized by source hash and options. Only successes are cached. */
export function compileDiagramCached(source: string, options: CompileOptions = {}): DecisionGraph {
  const key = `${options.graphKey ?? ""}:${hashSource(source)}:${options.payloadBudget ?? PAYLOAD_BUDGET_BYTES}:${options.maxButtons ?? MAX_TOTAL_BUTTONS}`;
  const cached = compileCache.get(key);
  if (cached) return cached;

  const graph = compileDiagram(source, options);
  compileCache.set(key, graph);
  return graph;
}

export function getCompileCacheSize(): number {
  return compileCache.size;
}

export function clearCompileCache(): void {
  compileCache.clear();
}

// ── Graph helpers ───────────────────────────────────────────────────

export function getNode(graph: DecisionGraph, nodeId: string): DiagramNode | null {
  return Object.prototype.hasOwnProperty.call(graph.nodes, nodeId) ? graph.nodes[nodeId] : null;
}

export function getOutgoingEdges(graph: DecisionGraph, nodeId: string): DiagramEdge[] {
  const node = getNode(graph, nodeId);
  if (!node) return [];
  return node.edges.map((id) => graph.edges[id]);
}
