#!/usr/bin/env npx tsx
/**
 * Retention Cleanup Script: deletes superseded graph versions whose
 * retention window has closed.
 *
 * Retention window: GRAPH_RETENTION_DAYS (default 30) from supersededAt.
 * The latest version of every graph is never deleted. Tokens pinned to a
 * deleted version decode as stale and reset to the latest root.
 *
 * Run: npx tsx scripts/cleanup-retention.ts
 * Schedule via cron (daily): 0 3 * * * cd /path/to/project && npx tsx scripts/cleanup-retention.ts
 *
 * Options:
 *   --dry-run   Show what would be deleted without actually deleting
 */

import dotenv from "dotenv";
import { getGraphRetentionDays } from "../src/lib/config";
import { closePool } from "../src/lib/db";
import { knowledgeStore } from "../src/lib/knowledge-store";
import { retentionCutoff } from "../src/lib/retention";

dotenv.config({ path: ".env.local" });
dotenv.config();

const DRY_RUN = process.argv.includes("--dry-run");

async function main() {
  try {
    if (!knowledgeStore.hasDb()) {
      console.log(`[Retention Cleanup] DATABASE_URL is not set; nothing persisted to clean up.`);
      return;
    }

    const days = getGraphRetentionDays();
    const cutoffDate = retentionCutoff(new Date(), days);

    console.log(`[Retention Cleanup] ${DRY_RUN ? "(DRY RUN) " : ""}Started at ${new Date().toISOString()}`);
    console.log(`[Retention Cleanup] Retention window: ${days} days`);
    console.log(`[Retention Cleanup] Cutoff date: ${cutoffDate.toISOString()}`);

    const expired = await knowledgeStore.deleteSupersededBefore(cutoffDate, DRY_RUN);
    console.log(`[Retention Cleanup] Found ${expired.length} expired graph version(s)`);

    if (expired.length === 0) {
      console.log(`[Retention Cleanup] Nothing to clean up. Done.`);
      return;
    }

    for (const v of expired) {
      console.log(
        `  - "${v.graphKey}" ${v.version.slice(0, 12)} (superseded ${v.supersededAt ?? "never"})${DRY_RUN ? " (would delete)" : ""}`
      );
    }
    console.log(`[Retention Cleanup] ${DRY_RUN ? "DRY RUN complete" : `Deleted ${expired.length} version(s)`}. Done.`);
  } catch (error) {
    console.error(`[Retention Cleanup] Error:`, error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void main();
