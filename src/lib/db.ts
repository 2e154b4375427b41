/**
 * Shared pg Pool for the knowledge store.
 *
 * The pool is cached on globalThis so Next.js dev hot-reload does not
 * create new connections on every module re-evaluation.
 *
 * Returns null when DATABASE_URL is not configured; callers then fall back
 * to the in-memory store.
 */

import { Pool } from "pg";

declare global {
  var __troubleshootPool: Pool | undefined;
}

export function getPool(): Pool | null {
  const url = process.env.DATABASE_URL;
  if (!url) return null;

  if (!globalThis.__troubleshootPool) {
    const pool = new Pool({ connectionString: url, max: 10 });
    pool.on("error", (err) => {
      console.error("[DB] Idle client error:", err.message);
    });
    globalThis.__troubleshootPool = pool;
  }
  return globalThis.__troubleshootPool;
}

export async function closePool(): Promise<void> {
  const pool = globalThis.__troubleshootPool;
  globalThis.__troubleshootPool = undefined;
  if (pool) await pool.end();
}
