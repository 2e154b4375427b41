/**
 * Action payloads carried by buttons.
 *
 *   s<cc><token>   select choice cc (two base64url digits, declared edge order)
 *   b<token>       back
 *   r<token>       restart
 *   x<token>       referral on a safety-flagged node
 *   gs<gapId>      save a generated guide
 *   gd<gapId>      discard a generated guide
 *
 * Every payload fits the transport's 64-byte callback limit.
 */

import { PAYLOAD_BUDGET_BYTES } from "@/lib/config";
import { DecodeError, EncodingError } from "./errors";

export type ActionPayload =
  | { kind: "select"; choice: number; token: string }
  | { kind: "back"; token: string }
  | { kind: "restart"; token: string }
  | { kind: "refer"; token: string }
  | { kind: "guide"; decision: "save" | "discard"; gapId: string };

const DIGITS = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_";
const MAX_CHOICE = DIGITS.length * DIGITS.length - 1;
const GAP_ID_RE = /^[A-Za-z0-9_-]{1,60}$/;

function byteLength(value: string): number {
  return Buffer.byteLength(value, "utf8");
}

export function encodeAction(action: ActionPayload, payloadBudget: number = PAYLOAD_BUDGET_BYTES): string {
  let payload: string;
  switch (action.kind) {
    case "select": {
      if (!Number.isInteger(action.choice) || action.choice < 0 || action.choice > MAX_CHOICE) {
        throw new EncodingError(`Choice ordinal ${action.choice} cannot be encoded`);
      }
      const hi = DIGITS[Math.floor(action.choice / DIGITS.length)];
      const lo = DIGITS[action.choice % DIGITS.length];
      payload = `s${hi}${lo}${action.token}`;
      break;
    }
    case "back":
      payload = `b${action.token}`;
      break;
    case "restart":
      payload = `r${action.token}`;
      break;
    case "refer":
      payload = `x${action.token}`;
      break;
    case "guide":
      payload = `g${action.decision === "save" ? "s" : "d"}${action.gapId}`;
      break;
  }

  if (byteLength(payload) > payloadBudget) {
    throw new EncodingError(`Action payload is ${byteLength(payload)} bytes; limit is ${payloadBudget}`);
  }
  return payload;
}

export function parseAction(payload: string, payloadBudget: number = PAYLOAD_BUDGET_BYTES): ActionPayload {
  if (!payload || byteLength(payload) > payloadBudget) {
    throw new DecodeError("Action payload is empty or over budget");
  }

  const code = payload[0];
  const rest = payload.slice(1);
  switch (code) {
    case "s": {
      if (rest.length < 2) throw new DecodeError("Select payload has no choice ordinal");
      const hi = DIGITS.indexOf(rest[0]);
      const lo = DIGITS.indexOf(rest[1]);
      if (hi === -1 || lo === -1) throw new DecodeError("Select payload has no choice ordinal");
      return { kind: "select", choice: hi * DIGITS.length + lo, token: rest.slice(2) };
    }
    case "b":
      return { kind: "back", token: rest };
    case "r":
      return { kind: "restart", token: rest };
    case "x":
      return { kind: "refer", token: rest };
    case "g": {
      const decision = rest[0] === "s" ? "save" : rest[0] === "d" ? "discard" : null;
      const gapId = rest.slice(1);
      if (!decision || !GAP_ID_RE.test(gapId)) throw new DecodeError("Guide payload is malformed");
      return { kind: "guide", decision, gapId };
    }
    default:
      throw new DecodeError(`Unknown action code "${code}"`);
  }
}
