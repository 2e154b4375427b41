import { getPool } from "@/lib/db";
import type { DraftFragment, DraftStatus, FallbackGuide, GapStatus, KnowledgeGap } from "@/lib/fallback/types";
import type { GraphVersionRecord } from "@/lib/troubleshooting/graph-registry";
import type { DiagramEdge, DiagramNode } from "@/lib/troubleshooting/types";

/**
 * Knowledge Store: gap records, draft fragments and graph version history.
 *
 * Postgres when DATABASE_URL is set, otherwise an in-memory store kept on
 * globalThis (dev server and tests).
 */

export type CreateGapInput = {
  query: string;
  route: KnowledgeGap["route"];
  score: number;
  safety: boolean;
  status: GapStatus;
  degradedFrom?: "RESEARCH" | null;
  reviewDueAt?: string | null;
  guide?: FallbackGuide | null;
};

export type GapPatch = Partial<Pick<KnowledgeGap, "status" | "guide" | "draftId">>;

export type DraftPatch = Partial<
  Pick<DraftFragment, "status" | "reviewedBy" | "reviewedAt" | "rejectionReason" | "publishedAs">
>;

function nowIso() {
  return new Date().toISOString();
}

function uuid() {
  return globalThis.crypto?.randomUUID
    ? globalThis.crypto.randomUUID()
    : `id_${Math.random().toString(16).slice(2)}_${Date.now()}`;
}

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

// ── Memory ──────────────────────────────────────────────────────────

type MemoryStore = {
  gaps: Map<string, KnowledgeGap>;
  drafts: Map<string, DraftFragment>;
  /** Keyed by versionKey(record) */
  versions: Map<string, GraphVersionRecord>;
};

declare global {
  var __troubleshootMemoryStore: MemoryStore | undefined;
}

function getMemoryStore(): MemoryStore {
  if (!globalThis.__troubleshootMemoryStore) {
    globalThis.__troubleshootMemoryStore = {
      gaps: new Map(),
      drafts: new Map(),
      versions: new Map(),
    };
  }
  return globalThis.__troubleshootMemoryStore;
}

/** Test helper: drop everything held in memory mode */
export function resetMemoryStore(): void {
  globalThis.__troubleshootMemoryStore = undefined;
}

// ── Row mapping ─────────────────────────────────────────────────────

type GapRow = {
  id: string;
  query: string;
  route: KnowledgeGap["route"];
  score: number;
  safety: boolean;
  status: GapStatus;
  degraded_from: "RESEARCH" | null;
  review_due_at: Date | null;
  guide: FallbackGuide | null;
  draft_id: string | null;
  created_at: Date;
  updated_at: Date;
};

type DraftRow = {
  id: string;
  gap_id: string;
  status: DraftStatus;
  title: string;
  root: string;
  nodes: DiagramNode[];
  edges: DiagramEdge[];
  source: string;
  reviewed_by: string | null;
  reviewed_at: Date | null;
  rejection_reason: string | null;
  published_as: string | null;
  created_at: Date;
  updated_at: Date;
};

type VersionRow = {
  graph_key: string;
  version: string;
  version_index: string;
  source: string;
  published_at: Date;
  superseded_at: Date | null;
};

function toGap(row: GapRow): KnowledgeGap {
  return {
    id: row.id,
    query: row.query,
    route: row.route,
    score: Number(row.score),
    safety: row.safety,
    status: row.status,
    degradedFrom: row.degraded_from,
    reviewDueAt: iso(row.review_due_at),
    guide: row.guide,
    draftId: row.draft_id,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function toDraft(row: DraftRow): DraftFragment {
  return {
    id: row.id,
    gapId: row.gap_id,
    status: row.status,
    title: row.title,
    root: row.root,
    nodes: row.nodes,
    edges: row.edges,
    source: row.source,
    reviewedBy: row.reviewed_by,
    reviewedAt: iso(row.reviewed_at),
    rejectionReason: row.rejection_reason,
    publishedAs: row.published_as,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function toVersion(row: VersionRow): GraphVersionRecord {
  return {
    graphKey: row.graph_key,
    version: row.version,
    // BIGINT arrives as a string
    versionIndex: Number(row.version_index),
    source: row.source,
    publishedAt: row.published_at.toISOString(),
    supersededAt: iso(row.superseded_at),
  };
}

// ── Gaps ────────────────────────────────────────────────────────────

async function createGap(input: CreateGapInput): Promise<KnowledgeGap> {
  const gap: KnowledgeGap = {
    id: uuid(),
    query: input.query,
    route: input.route,
    score: input.score,
    safety: input.safety,
    status: input.status,
    degradedFrom: input.degradedFrom ?? null,
    reviewDueAt: input.reviewDueAt ?? null,
    guide: input.guide ?? null,
    draftId: null,
    createdAt: nowIso(),
    updatedAt: nowIso(),
  };

  const pool = getPool();
  if (!pool) {
    getMemoryStore().gaps.set(gap.id, gap);
    return gap;
  }

  const { rows } = await pool.query<GapRow>(
    `INSERT INTO knowledge_gaps (id, query, route, score, safety, status, degraded_from, review_due_at, guide)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
     RETURNING *`,
    [
      gap.id,
      gap.query,
      gap.route,
      gap.score,
      gap.safety,
      gap.status,
      gap.degradedFrom,
      gap.reviewDueAt,
      gap.guide ? JSON.stringify(gap.guide) : null,
    ]
  );
  return toGap(rows[0]);
}

async function getGap(id: string): Promise<KnowledgeGap | null> {
  const pool = getPool();
  if (!pool) return getMemoryStore().gaps.get(id) ?? null;

  const { rows } = await pool.query<GapRow>("SELECT * FROM knowledge_gaps WHERE id = $1", [id]);
  return rows[0] ? toGap(rows[0]) : null;
}

async function updateGap(id: string, patch: GapPatch): Promise<KnowledgeGap | null> {
  const pool = getPool();
  if (!pool) {
    const store = getMemoryStore();
    const gap = store.gaps.get(id);
    if (!gap) return null;
    const updated = { ...gap, ...patch, updatedAt: nowIso() };
    store.gaps.set(id, updated);
    return updated;
  }

  const { rows } = await pool.query<GapRow>(
    `UPDATE knowledge_gaps
        SET status = COALESCE($2, status),
            guide = CASE WHEN $3::boolean THEN $4::jsonb ELSE guide END,
            draft_id = CASE WHEN $5::boolean THEN $6 ELSE draft_id END,
            updated_at = now()
      WHERE id = $1
      RETURNING *`,
    [
      id,
      patch.status ?? null,
      patch.guide !== undefined,
      patch.guide ? JSON.stringify(patch.guide) : null,
      patch.draftId !== undefined,
      patch.draftId ?? null,
    ]
  );
  return rows[0] ? toGap(rows[0]) : null;
}

async function listGaps(filter: { status?: GapStatus } = {}): Promise<KnowledgeGap[]> {
  const pool = getPool();
  if (!pool) {
    return [...getMemoryStore().gaps.values()]
      .filter((g) => !filter.status || g.status === filter.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  const { rows } = await pool.query<GapRow>(
    `SELECT * FROM knowledge_gaps
      WHERE ($1::text IS NULL OR status = $1)
      ORDER BY created_at DESC
      LIMIT 200`,
    [filter.status ?? null]
  );
  return rows.map(toGap);
}

// ── Drafts ──────────────────────────────────────────────────────────

async function createDraft(
  input: Omit<
    DraftFragment,
    "id" | "status" | "reviewedBy" | "reviewedAt" | "rejectionReason" | "publishedAs" | "createdAt" | "updatedAt"
  >
): Promise<DraftFragment> {
  const draft: DraftFragment = {
    ...input,
    id: uuid(),
    status: "draft",
    reviewedBy: null,
    reviewedAt: null,
    rejectionReason: null,
    publishedAs: null,
    createdAt: nowIso(),
    updatedAt: nowIso(),
  };

  const pool = getPool();
  if (!pool) {
    getMemoryStore().drafts.set(draft.id, draft);
    return draft;
  }

  const { rows } = await pool.query<DraftRow>(
    `INSERT INTO draft_fragments (id, gap_id, status, title, root, nodes, edges, source)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
     RETURNING *`,
    [
      draft.id,
      draft.gapId,
      draft.status,
      draft.title,
      draft.root,
      JSON.stringify(draft.nodes),
      JSON.stringify(draft.edges),
      draft.source,
    ]
  );
  return toDraft(rows[0]);
}

async function getDraft(id: string): Promise<DraftFragment | null> {
  const pool = getPool();
  if (!pool) return getMemoryStore().drafts.get(id) ?? null;

  const { rows } = await pool.query<DraftRow>("SELECT * FROM draft_fragments WHERE id = $1", [id]);
  return rows[0] ? toDraft(rows[0]) : null;
}

async function updateDraft(id: string, patch: DraftPatch): Promise<DraftFragment | null> {
  const pool = getPool();
  if (!pool) {
    const store = getMemoryStore();
    const draft = store.drafts.get(id);
    if (!draft) return null;
    const updated = { ...draft, ...patch, updatedAt: nowIso() };
    store.drafts.set(id, updated);
    return updated;
  }

  const { rows } = await pool.query<DraftRow>(
    `UPDATE draft_fragments
        SET status = COALESCE($2, status),
            reviewed_by = COALESCE($3, reviewed_by),
            reviewed_at = COALESCE($4, reviewed_at),
            published_as = COALESCE($5, published_as),
            rejection_reason = COALESCE($6, rejection_reason),
            updated_at = now()
      WHERE id = $1
      RETURNING *`,
    [
      id,
      patch.status ?? null,
      patch.reviewedBy ?? null,
      patch.reviewedAt ?? null,
      patch.publishedAs ?? null,
      patch.rejectionReason ?? null,
    ]
  );
  return rows[0] ? toDraft(rows[0]) : null;
}

async function deleteDraft(id: string): Promise<void> {
  const pool = getPool();
  if (!pool) {
    getMemoryStore().drafts.delete(id);
    return;
  }
  await pool.query("DELETE FROM draft_fragments WHERE id = $1", [id]);
}

async function listDrafts(filter: { status?: DraftStatus } = {}): Promise<DraftFragment[]> {
  const pool = getPool();
  if (!pool) {
    return [...getMemoryStore().drafts.values()]
      .filter((d) => !filter.status || d.status === filter.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  const { rows } = await pool.query<DraftRow>(
    `SELECT * FROM draft_fragments
      WHERE ($1::text IS NULL OR status = $1)
      ORDER BY created_at DESC
      LIMIT 100`,
    [filter.status ?? null]
  );
  return rows.map(toDraft);
}

/** Number of drafts in each status */
async function countDraftsByStatus(): Promise<Record<DraftStatus, number>> {
  const counts: Record<DraftStatus, number> = { draft: 0, approved: 0, rejected: 0 };
  const pool = getPool();
  if (!pool) {
    for (const draft of getMemoryStore().drafts.values()) counts[draft.status] += 1;
    return counts;
  }

  const { rows } = await pool.query<{ status: DraftStatus; count: string }>(
    "SELECT status, COUNT(*) AS count FROM draft_fragments GROUP BY status"
  );
  for (const row of rows) counts[row.status] = Number(row.count);
  return counts;
}

// ── Graph versions ──────────────────────────────────────────────────

function versionKey(record: Pick<GraphVersionRecord, "graphKey" | "version">): string {
  return `${record.graphKey}:${record.version}`;
}

async function saveGraphVersion(record: GraphVersionRecord): Promise<void> {
  const pool = getPool();
  if (!pool) {
    getMemoryStore().versions.set(versionKey(record), record);
    return;
  }
  await pool.query(
    `INSERT INTO graph_versions (version, graph_key, version_index, source, published_at, superseded_at)
     VALUES ($1, $2, $3, $4, $5, $6)
     ON CONFLICT (graph_key, version) DO UPDATE SET superseded_at = EXCLUDED.superseded_at`,
    [record.version, record.graphKey, record.versionIndex, record.source, record.publishedAt, record.supersededAt]
  );
}

async function listGraphVersions(): Promise<GraphVersionRecord[]> {
  const pool = getPool();
  if (!pool) {
    return [...getMemoryStore().versions.values()].sort((a, b) => a.publishedAt.localeCompare(b.publishedAt));
  }
  const { rows } = await pool.query<VersionRow>("SELECT * FROM graph_versions ORDER BY published_at ASC");
  return rows.map(toVersion);
}

/** Delete superseded versions whose supersededAt is before `cutoff`. Returns the deleted versions. */
async function deleteSupersededBefore(cutoff: Date, dryRun = false): Promise<GraphVersionRecord[]> {
  const pool = getPool();
  if (!pool) {
    const store = getMemoryStore();
    const expired = [...store.versions.values()].filter(
      (v) => v.supersededAt !== null && v.supersededAt < cutoff.toISOString()
    );
    if (!dryRun) for (const v of expired) store.versions.delete(versionKey(v));
    return expired;
  }

  const sql = dryRun
    ? "SELECT * FROM graph_versions WHERE superseded_at IS NOT NULL AND superseded_at < $1"
    : "DELETE FROM graph_versions WHERE superseded_at IS NOT NULL AND superseded_at < $1 RETURNING *";
  const { rows } = await pool.query<VersionRow>(sql, [cutoff.toISOString()]);
  return rows.map(toVersion);
}

function hasDb(): boolean {
  return getPool() !== null;
}

export const knowledgeStore = {
  hasDb,

  createGap,
  getGap,
  updateGap,
  listGaps,

  createDraft,
  getDraft,
  updateDraft,
  deleteDraft,
  listDrafts,
  countDraftsByStatus,

  saveGraphVersion,
  listGraphVersions,
  deleteSupersededBefore,
};

export type KnowledgeStore = typeof knowledgeStore;
