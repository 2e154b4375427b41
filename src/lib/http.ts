/**
 * Route handler helpers: JSON body reading and error → response mapping.
 */

import { NextResponse } from "next/server";
import {
  EncodingError,
  GraphNotFoundError,
  ParseError,
  RecordNotFoundError,
  ReviewStateError,
} from "@/lib/troubleshooting/errors";

export type JsonBody = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parsed JSON object body, or null when the body is missing or not an object */
export async function readJsonObject(req: Request): Promise<JsonBody | null> {
  const data: unknown = await req.json().catch(() => null);
  return isJsonObject(data) ? data : null;
}

export function stringField(body: JsonBody | null, key: string): string | undefined {
  const value = body?.[key];
  return typeof value === "string" ? value : undefined;
}

export function numberField(body: JsonBody | null, key: string): number | undefined {
  const value = body?.[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function booleanField(body: JsonBody | null, key: string): boolean | undefined {
  const value = body?.[key];
  return typeof value === "boolean" ? value : undefined;
}

export function stringArrayField(body: JsonBody | null, key: string): string[] | undefined {
  const value = body?.[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

export function objectField(body: JsonBody | null, key: string): JsonBody | undefined {
  const value = body?.[key];
  return isJsonObject(value) ? value : undefined;
}

export function badRequest(error: string) {
  return NextResponse.json({ error }, { status: 400 });
}

/**
 * Map engine errors to responses. Compile and budget errors are the author's
 * to fix (422, with the offending node / edge / line); anything unexpected is
 * logged and answered with a generic 500.
 */
export function errorResponse(err: unknown, scope: string, fallbackMessage: string) {
  if (err instanceof ParseError) {
    return NextResponse.json(
      { error: err.message, kind: err.name, code: err.code, nodeId: err.nodeId, edge: err.edge, line: err.line },
      { status: 422 }
    );
  }
  if (err instanceof EncodingError) {
    return NextResponse.json({ error: err.message, kind: err.name, code: err.code }, { status: 422 });
  }
  if (err instanceof GraphNotFoundError || err instanceof RecordNotFoundError) {
    return NextResponse.json({ error: err.message, code: err.code }, { status: 404 });
  }
  if (err instanceof ReviewStateError) {
    return NextResponse.json({ error: err.message, code: err.code }, { status: 409 });
  }

  const msg = err instanceof Error ? err.message : String(err);
  console.error(`[API ${scope}] ERROR:`, msg);
  console.error(err instanceof Error ? err.stack : err);
  return NextResponse.json({ error: fallbackMessage }, { status: 500 });
}
