import { NextResponse } from "next/server";
import {
  badRequest,
  booleanField,
  errorResponse,
  numberField,
  objectField,
  readJsonObject,
  stringArrayField,
  stringField,
} from "@/lib/http";
import { getTroubleshootingService } from "@/lib/troubleshooting";

export const runtime = "nodejs";

/**
 * Free-text query with no direct match.
 * Body: { query, score, safety?, categories?, equipmentDescriptor?, problemText?, context?, match?: { graphKey, title? } }
 */
export async function POST(req: Request) {
  try {
    const body = await readJsonObject(req);
    const query = stringField(body, "query")?.trim();
    const score = numberField(body, "score");
    if (!query) return badRequest("query is required");
    if (score === undefined || score < 0 || score > 1) return badRequest("score must be a number between 0 and 1");

    const match = objectField(body, "match");
    const matchKey = stringField(match ?? null, "graphKey");

    const reply = await getTroubleshootingService().query({
      query,
      score,
      safety: booleanField(body, "safety"),
      categories: stringArrayField(body, "categories"),
      equipmentDescriptor: stringField(body, "equipmentDescriptor"),
      problemText: stringField(body, "problemText"),
      context: stringField(body, "context"),
      match: matchKey ? { graphKey: matchKey, title: stringField(match ?? null, "title") } : null,
    });
    return NextResponse.json(reply, { status: 201 });
  } catch (err: unknown) {
    return errorResponse(err, "/api/troubleshoot/query", "Failed to resolve query");
  }
}
