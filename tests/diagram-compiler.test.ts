import { describe, it, expect, beforeEach } from "vitest";
import {
  clearCompileCache,
  compileDiagram,
  compileDiagramCached,
  DEFAULT_EDGE_LABEL,
  getCompileCacheSize,
  getOutgoingEdges,
} from "@/lib/troubleshooting/diagram-compiler";
import {
  AmbiguousRouteError,
  DanglingEdgeError,
  EncodingError,
  OrphanNodeError,
  ParseError,
} from "@/lib/troubleshooting/errors";

/**
 * Diagram compiler tests.
 *
 * Covers:
 * - DSL shapes, edges, directives
 * - Reachability (orphans) and dangling edges
 * - Per-kind edge rules and ambiguity
 * - Determinism, freezing and the compile cache
 * - Payload budget check
 */

const LINEAR = `flowchart TD
  A[Check supply voltage] --> B[Check fuse F1] --> C((Done))
`;

const DECISION = `flowchart TD
  A{Which LED is lit?}
  A -->|Green| B((Normal))
  A -->|Amber| C((Check network cable))
  A -->|Red| D((Replace module))
`;

function expectThrow<T extends Error>(fn: () => unknown, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(type);
    if (err instanceof type) return err;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}

// ── Shapes & edges ──────────────────────────────────────────────────

describe("compileDiagram: shapes and edges", () => {
  it("compiles a linear chain with default edge labels", () => {
    const graph = compileDiagram(LINEAR);
    expect(graph.root).toBe("A");
    expect(graph.nodeOrder).toEqual(["A", "B", "C"]);
    expect(graph.nodes.A.kind).toBe("step");
    expect(graph.nodes.C.kind).toBe("terminal");
    expect(getOutgoingEdges(graph, "A").map((e) => [e.target, e.label])).toEqual([["B", DEFAULT_EDGE_LABEL]]);
    expect(graph.nodes.C.edges).toEqual([]);
  });

  it("keeps decision edges in declared order", () => {
    const graph = compileDiagram(DECISION);
    expect(getOutgoingEdges(graph, "A").map((e) => e.label)).toEqual(["Green", "Amber", "Red"]);
    expect(graph.nodes.A.index).toBe(0);
    expect(graph.nodes.D.index).toBe(3);
  });

  it("accepts `-- label -->` edges and quoted text", () => {
    const graph = compileDiagram(`flowchart LR
  A{"Voltage at L1 (400V)?"} -- Present --> B((Check contactor))
  A -- Missing --> C((Check upstream breaker))
`);
    expect(graph.nodes.A.text).toBe("Voltage at L1 (400V)?");
    expect(getOutgoingEdges(graph, "A").map((e) => e.label)).toEqual(["Present", "Missing"]);
  });

  it("reads media, safety, class and root directives", () => {
    const graph = compileDiagram(`\`\`\`mermaid
flowchart TD
  %% root: A
  A[/Compare the wiring to the photo/] --> B{Wiring matches?}
  B -->|Yes| C((Done))
  B -->|No| E>Isolate the drive before touching X2]
  click A "https://example.test/x2.jpg"
  class C safety
\`\`\``);
    expect(graph.root).toBe("A");
    expect(graph.nodes.A.kind).toBe("media");
    expect(graph.nodes.A.media).toBe("https://example.test/x2.jpg");
    expect(graph.nodes.E.kind).toBe("safety");
    expect(graph.nodes.E.safety).toBe(true);
    expect(graph.nodes.C.kind).toBe("terminal");
    expect(graph.nodes.C.safety).toBe(true);
  });

  it("sets the safety flag from a :::safety suffix", () => {
    const graph = compileDiagram(`flowchart TD
  A{Panel warm to the touch?} -->|Yes| B[Open the panel and inspect]:::safety
  A -->|No| C((Done))
`);
    expect(graph.nodes.B.kind).toBe("step");
    expect(graph.nodes.B.safety).toBe(true);
  });

  it("treats `end` as a node id when it carries a shape", () => {
    const graph = compileDiagram(`flowchart TD
  A[Reset the drive] --> end((Done))
`);
    expect(graph.nodeOrder).toEqual(["A", "end"]);
  });
});

// ── Structural errors ───────────────────────────────────────────────

describe("compileDiagram: structural errors", () => {
  it("names the unreachable node", () => {
    const err = expectThrow(
      () =>
        compileDiagram(`flowchart TD
  A[Start] --> B{OK?}
  B -->|Yes| C((Done))
  B -->|No| E((Call support))
  D[Orphan step] --> C
`),
      OrphanNodeError
    );
    expect(err.orphans).toEqual(["D"]);
    expect(err.nodeId).toBe("D");
    expect(err.message).toBe("Unreachable from root: D");
  });

  it("rejects an edge to an undeclared node with its line", () => {
    const err = expectThrow(() => compileDiagram("flowchart TD\n  A[Start] --> B\n"), DanglingEdgeError);
    expect(err.nodeId).toBe("B");
    expect(err.edge).toEqual({ source: "A", target: "B" });
    expect(err.line).toBe(2);
  });

  it("rejects a decision with fewer than two choices", () => {
    const err = expectThrow(
      () => compileDiagram("flowchart TD\n  A{OK?} -->|Yes| B((Done))\n"),
      AmbiguousRouteError
    );
    expect(err.nodeId).toBe("A");
  });

  it("rejects duplicate labels regardless of case", () => {
    expectThrow(
      () =>
        compileDiagram(`flowchart TD
  A{OK?} -->|Yes| B((Done))
  A -->|yes| C((Other))
`),
      AmbiguousRouteError
    );
  });

  it("rejects an unlabeled decision edge", () => {
    expectThrow(
      () =>
        compileDiagram(`flowchart TD
  A{OK?} -->|Yes| B((Done))
  A --> C((Other))
`),
      AmbiguousRouteError
    );
  });

  it("rejects a branching step", () => {
    expectThrow(
      () =>
        compileDiagram(`flowchart TD
  A[Check] --> B((Done))
  A --> C((Other))
`),
      AmbiguousRouteError
    );
  });

  it("rejects outgoing edges on a terminal node", () => {
    const err = expectThrow(
      () => compileDiagram("flowchart TD\n  A((Done)) --> B((Again))\n  %% root: A\n"),
      ParseError
    );
    expect(err.code).toBe("INVALID_NODE");
    expect(err.nodeId).toBe("A");
  });

  it("rejects outgoing edges on a safety-flagged node", () => {
    const err = expectThrow(
      () => compileDiagram("flowchart TD\n  A[Open panel]:::safety --> B((Done))\n"),
      ParseError
    );
    expect(err.code).toBe("INVALID_NODE");
  });

  it("rejects a media node without a media reference", () => {
    const err = expectThrow(() => compileDiagram("flowchart TD\n  A[/See photo/] --> B((Done))\n"), ParseError);
    expect(err.code).toBe("INVALID_NODE");
    expect(err.nodeId).toBe("A");
  });

  it("rejects a declared root that does not exist", () => {
    const err = expectThrow(() => compileDiagram("flowchart TD\n  %% root: Z\n  A[Go] --> B((Done))\n"), ParseError);
    expect(err.code).toBe("MISSING_ROOT");
  });

  it("rejects a node redeclared with different text", () => {
    const err = expectThrow(
      () => compileDiagram("flowchart TD\n  A[Go] --> B((Done))\n  A[Stop] --> B\n"),
      ParseError
    );
    expect(err.code).toBe("INVALID_NODE");
    expect(err.line).toBe(3);
  });

  it("rejects more choices than the transport can show", () => {
    const err = expectThrow(() => compileDiagram(DECISION, { maxButtons: 6 }), ParseError);
    expect(err.code).toBe("TOO_MANY_CHOICES");
  });

  it("rejects a graph whose minimal token exceeds the payload budget", () => {
    expectThrow(() => compileDiagram(LINEAR, { payloadBudget: 12 }), EncodingError);
  });
});

// ── Determinism & cache ─────────────────────────────────────────────

describe("compileDiagram: determinism and caching", () => {
  beforeEach(() => {
    clearCompileCache();
  });

  it("produces the same version and node order for the same source", () => {
    const a = compileDiagram(DECISION);
    const b = compileDiagram(DECISION);
    expect(a).toEqual(b);
    expect(a.version).toMatch(/^[0-9a-f]{64}$/);
    expect(a.versionIndex).toBe(parseInt(a.version.slice(0, 8), 16));
  });

  it("produces a new version when the content changes", () => {
    const a = compileDiagram(LINEAR);
    const b = compileDiagram(LINEAR.replace("Check fuse F1", "Check fuse F2"));
    expect(b.version).not.toBe(a.version);
  });

  it("gives identical source a distinct version per graph key", () => {
    const a = compileDiagram(LINEAR, { graphKey: "line-1" });
    const b = compileDiagram(LINEAR, { graphKey: "line-2" });
    expect(b.version).not.toBe(a.version);
    expect(b.nodeOrder).toEqual(a.nodeOrder);
    expect(compileDiagram(LINEAR, { graphKey: "line-1" }).version).toBe(a.version);
  });

  it("caches per graph key", () => {
    const first = compileDiagramCached(LINEAR, { graphKey: "line-1" });
    const second = compileDiagramCached(LINEAR, { graphKey: "line-2" });
    expect(second).not.toBe(first);
    expect(getCompileCacheSize()).toBe(2);
  });

  it("returns a deep-frozen graph", () => {
    const graph = compileDiagram(LINEAR);
    expect(Object.isFrozen(graph)).toBe(true);
    expect(Object.isFrozen(graph.nodes.A)).toBe(true);
    expect(Object.isFrozen(graph.nodes.A.edges)).toBe(true);
  });

  it("never recompiles identical source", () => {
    const first = compileDiagramCached(LINEAR);
    const second = compileDiagramCached(LINEAR);
    expect(second).toBe(first);
    expect(getCompileCacheSize()).toBe(1);
  });

  it("does not cache failures", () => {
    expect(() => compileDiagramCached("flowchart TD\n  A[Start] --> B\n")).toThrow(DanglingEdgeError);
    expect(getCompileCacheSize()).toBe(0);
  });
});
