/**
 * Graph Registry: the served versions of every decision graph.
 *
 * Versions are addressed by graph key and content, and are immutable. Publishing a changed source
 * adds a new version and marks the previous one superseded; sessions pinned
 * to the old version keep decoding against it until the retention window
 * closes, then their tokens go stale.
 */

import { isExpired } from "@/lib/retention";
import { compileDiagramCached, type CompileOptions } from "./diagram-compiler";
import { EncodingError } from "./errors";
import { graphKeyTag, type ResolvedGraph } from "./navigation-codec";
import type { DecisionGraph } from "./types";

export type GraphVersionRecord = {
  graphKey: string;
  version: string;
  versionIndex: number;
  source: string;
  publishedAt: string;
  supersededAt: string | null;
};

export type PublishResult = {
  graph: DecisionGraph;
  record: GraphVersionRecord;
  /** False when the source compiled to the version already being served */
  created: boolean;
  superseded: GraphVersionRecord | null;
};

type Entry = { record: GraphVersionRecord; graph: DecisionGraph };

export class GraphRegistry {
  private readonly byVersion = new Map<string, Entry>();
  private readonly byIndex = new Map<number, Entry>();
  private readonly latestByKey = new Map<string, string>();

  constructor(private readonly compileOptions: CompileOptions = {}) {}

  /**
   * Compile and serve `source` under `graphKey`.
   * Throws the compiler's ParseError / EncodingError; nothing is registered then.
   */
  publish(graphKey: string, source: string, now: Date = new Date()): PublishResult {
    const key = graphKey.trim();
    if (!key) throw new Error("graphKey is required");

    const graph = compileDiagramCached(source, { ...this.compileOptions, graphKey: key });
    const latestVersion = this.latestByKey.get(key);
    const latest = latestVersion ? this.byVersion.get(latestVersion) : undefined;
    if (latest && latest.graph.version === graph.version) {
      return { graph: latest.graph, record: latest.record, created: false, superseded: null };
    }

    const clash = this.byIndex.get(graph.versionIndex);
    if (clash && clash.graph.version !== graph.version) {
      throw new EncodingError(
        `Version index ${graph.versionIndex} of "${key}" collides with "${clash.record.graphKey}"; change the source and republish`
      );
    }

    let superseded: GraphVersionRecord | null = null;
    if (latest) {
      latest.record = { ...latest.record, supersededAt: now.toISOString() };
      superseded = latest.record;
    }

    const record: GraphVersionRecord = {
      graphKey: key,
      version: graph.version,
      versionIndex: graph.versionIndex,
      source,
      publishedAt: now.toISOString(),
      supersededAt: null,
    };
    this.register({ record, graph });

    console.log(
      `[Graph Registry] Published "${key}" version ${graph.version.slice(0, 12)} (${graph.nodeOrder.length} nodes)`
    );
    return { graph, record, created: true, superseded };
  }

  /** Restore persisted versions, e.g. at startup. Records are applied oldest first. */
  hydrate(records: GraphVersionRecord[]): void {
    const sorted = [...records].sort((a, b) => a.publishedAt.localeCompare(b.publishedAt));
    for (const record of sorted) {
      try {
        const graph = compileDiagramCached(record.source, { ...this.compileOptions, graphKey: record.graphKey });
        this.register({ record: { ...record, version: graph.version, versionIndex: graph.versionIndex }, graph });
      } catch (err) {
        // A stored version that no longer compiles is not served; its tokens go stale
        console.error(
          `[Graph Registry] Skipping stored version ${record.version.slice(0, 12)} of "${record.graphKey}":`,
          err instanceof Error ? err.message : String(err)
        );
      }
    }
  }

  private register(entry: Entry): void {
    this.byVersion.set(entry.graph.version, entry);
    this.byIndex.set(entry.graph.versionIndex, entry);
    if (entry.record.supersededAt === null) {
      this.latestByKey.set(entry.record.graphKey, entry.graph.version);
    }
  }

  latest(graphKey: string): DecisionGraph | null {
    const version = this.latestByKey.get(graphKey);
    return version ? this.byVersion.get(version)?.graph ?? null : null;
  }

  getVersion(version: string): DecisionGraph | null {
    return this.byVersion.get(version)?.graph ?? null;
  }

  /** TokenResolver: a served version whose graph key matches the token's tag */
  resolve = (versionIndex: number, tag: number): ResolvedGraph | null => {
    const entry = this.byIndex.get(versionIndex);
    if (!entry || graphKeyTag(entry.record.graphKey) !== tag) return null;
    return { graphKey: entry.record.graphKey, graph: entry.graph };
  };

  /** Graph key whose tag matches, for recovering a session from a stale token */
  findKeyByTag(tag: number): string | null {
    for (const key of this.latestByKey.keys()) {
      if (graphKeyTag(key) === tag) return key;
    }
    return null;
  }

  keys(): string[] {
    return [...this.latestByKey.keys()].sort();
  }

  listVersions(graphKey: string): GraphVersionRecord[] {
    return [...this.byVersion.values()]
      .filter((e) => e.record.graphKey === graphKey)
      .map((e) => e.record)
      .sort((a, b) => a.publishedAt.localeCompare(b.publishedAt));
  }

  /** Drop superseded versions past the retention window. Returns what was dropped. */
  collectGarbage(now: Date = new Date(), retentionDays?: number): GraphVersionRecord[] {
    const dropped: GraphVersionRecord[] = [];
    for (const [version, entry] of this.byVersion) {
      if (!isExpired(entry.record.supersededAt, now, retentionDays)) continue;
      this.byVersion.delete(version);
      this.byIndex.delete(entry.graph.versionIndex);
      dropped.push(entry.record);
    }
    if (dropped.length > 0) {
      console.log(`[Graph Registry] Retired ${dropped.length} superseded version(s)`);
    }
    return dropped;
  }
}

declare global {
  var __troubleshootGraphRegistry: GraphRegistry | undefined;
}

/** Process-wide registry (cached on globalThis across dev hot reloads) */
export function getGraphRegistry(): GraphRegistry {
  if (!globalThis.__troubleshootGraphRegistry) {
    globalThis.__troubleshootGraphRegistry = new GraphRegistry();
  }
  return globalThis.__troubleshootGraphRegistry;
}

export function resetGraphRegistry(): void {
  globalThis.__troubleshootGraphRegistry = undefined;
}
