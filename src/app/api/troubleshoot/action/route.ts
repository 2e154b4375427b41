import { NextResponse } from "next/server";
import { badRequest, errorResponse, readJsonObject, stringField } from "@/lib/http";
import { getTroubleshootingService } from "@/lib/troubleshooting";

export const runtime = "nodejs";

/** Button press on an existing message; answered with an edit or a discard */
export async function POST(req: Request) {
  try {
    const body = await readJsonObject(req);
    const messageId = stringField(body, "messageId")?.trim();
    const payload = stringField(body, "payload");
    if (!messageId || payload === undefined) {
      return badRequest("messageId and payload are required");
    }

    const reply = await getTroubleshootingService().handleAction({ messageId, payload });
    return NextResponse.json(reply);
  } catch (err: unknown) {
    return errorResponse(err, "/api/troubleshoot/action", "Failed to apply action");
  }
}
