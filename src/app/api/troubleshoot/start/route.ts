import { NextResponse } from "next/server";
import { errorResponse, readJsonObject, stringField } from "@/lib/http";
import { getTroubleshootingService } from "@/lib/troubleshooting";

export const runtime = "nodejs";

/** First interaction: bind a session and send a new message */
export async function POST(req: Request) {
  try {
    const body = await readJsonObject(req);
    const reply = await getTroubleshootingService().start(stringField(body, "graphKey"));
    return NextResponse.json(reply, { status: 201 });
  } catch (err: unknown) {
    return errorResponse(err, "/api/troubleshoot/start", "Failed to start troubleshooting");
  }
}
