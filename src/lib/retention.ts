/**
 * Retention Logic: single source of truth for graph-version expiry.
 *
 * Rules:
 * - The latest version of a graph never expires.
 * - A superseded version stays decodable for the retention window, so
 *   sessions pinned to it can finish their journey.
 * - expiresAt = supersededAt + retention window
 * - Expired versions are dropped from the registry and cleaned up by cron.
 */

import { getGraphRetentionDays } from "@/lib/config";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Compute the expiration timestamp from a supersededAt date.
 */
export function computeExpiresAt(supersededAt: Date | string, retentionDays: number = getGraphRetentionDays()): Date {
  const base = typeof supersededAt === "string" ? new Date(supersededAt) : supersededAt;
  return new Date(base.getTime() + retentionDays * DAY_MS);
}

/**
 * Compute time left in seconds until expiration.
 * Returns 0 if already expired.
 */
export function computeTimeLeftSeconds(expiresAt: Date | string, now?: Date): number {
  const exp = typeof expiresAt === "string" ? new Date(expiresAt) : expiresAt;
  const ref = now ?? new Date();
  const diff = exp.getTime() - ref.getTime();
  return Math.max(0, Math.floor(diff / 1000));
}

/**
 * Check if a superseded version has outlived the retention window.
 * Versions that were never superseded (supersededAt null) never expire.
 */
export function isExpired(supersededAt: Date | string | null, now?: Date, retentionDays?: number): boolean {
  if (supersededAt === null) return false;
  const expiresAt = computeExpiresAt(supersededAt, retentionDays);
  return computeTimeLeftSeconds(expiresAt, now) <= 0;
}

/** Oldest supersededAt that is still inside the window */
export function retentionCutoff(now: Date = new Date(), retentionDays: number = getGraphRetentionDays()): Date {
  return new Date(now.getTime() - retentionDays * DAY_MS);
}
