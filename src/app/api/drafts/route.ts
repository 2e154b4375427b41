import { NextResponse } from "next/server";
import { getDraftStats } from "@/lib/fallback/draft-review";
import type { DraftStatus } from "@/lib/fallback/types";
import { errorResponse } from "@/lib/http";
import { knowledgeStore } from "@/lib/knowledge-store";

export const runtime = "nodejs";

const STATUSES: readonly DraftStatus[] = ["draft", "approved", "rejected"];

export async function GET(req: Request) {
  try {
    const raw = new URL(req.url).searchParams.get("status");
    const status = STATUSES.find((s) => s === raw);
    const [drafts, stats] = await Promise.all([knowledgeStore.listDrafts({ status }), getDraftStats()]);
    return NextResponse.json({ drafts, stats });
  } catch (err: unknown) {
    return errorResponse(err, "/api/drafts GET", "Failed to load drafts");
  }
}
