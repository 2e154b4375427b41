import { NextResponse } from "next/server";
import { badRequest, errorResponse, readJsonObject, stringField } from "@/lib/http";
import { getTroubleshootingService } from "@/lib/troubleshooting";

export const runtime = "nodejs";

export async function GET() {
  try {
    const { registry } = getTroubleshootingService();
    const graphs = registry.keys().map((graphKey) => ({
      graphKey,
      versions: registry.listVersions(graphKey).map(({ source: _source, ...meta }) => meta),
    }));
    return NextResponse.json({ graphs });
  } catch (err: unknown) {
    return errorResponse(err, "/api/graphs GET", "Failed to list graphs");
  }
}

/** Publish diagram source; compile errors answer 422 with the offending node / edge / line */
export async function POST(req: Request) {
  try {
    const body = await readJsonObject(req);
    const graphKey = stringField(body, "graphKey")?.trim();
    const source = stringField(body, "source");
    if (!graphKey || !source?.trim()) {
      return badRequest("graphKey and source are required");
    }

    const result = await getTroubleshootingService().publishGraph(graphKey, source);
    return NextResponse.json(
      {
        graphKey: result.record.graphKey,
        version: result.record.version,
        versionIndex: result.record.versionIndex,
        root: result.graph.root,
        nodes: result.graph.nodeOrder.length,
        created: result.created,
        superseded: result.superseded?.version ?? null,
      },
      { status: result.created ? 201 : 200 }
    );
  } catch (err: unknown) {
    return errorResponse(err, "/api/graphs POST", "Failed to publish graph");
  }
}
