import { NextResponse } from "next/server";
import { errorResponse } from "@/lib/http";
import { knowledgeStore } from "@/lib/knowledge-store";
import type { GapStatus } from "@/lib/fallback/types";

export const runtime = "nodejs";

const STATUSES: readonly GapStatus[] = ["gap_logged", "guide_generated", "accepted", "draft", "rejected"];

function parseStatus(value: string | null): GapStatus | undefined {
  return STATUSES.find((s) => s === value);
}

export async function GET(req: Request) {
  try {
    const status = parseStatus(new URL(req.url).searchParams.get("status"));
    const gaps = await knowledgeStore.listGaps({ status });
    return NextResponse.json({ gaps });
  } catch (err: unknown) {
    return errorResponse(err, "/api/gaps GET", "Failed to load gaps");
  }
}
