/**
 * Runtime configuration: read from process.env on every call so tests can
 * stub values with vi.stubEnv without reloading modules.
 */

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function readString(name: string, fallback: string): string {
  const raw = process.env[name]?.trim();
  return raw ? raw : fallback;
}

// ── Wire limits (transport) ─────────────────────────────────────────

/** Callback payload limit of the chat transport, in bytes */
export const PAYLOAD_BUDGET_BYTES = 64;
export const MAX_BUTTONS_PER_ROW = 8;
export const MAX_TOTAL_BUTTONS = 100;

// ── Navigation ──────────────────────────────────────────────────────

export function getHistoryMaxDepth(): number {
  return Math.max(1, Math.floor(readNumber("HISTORY_MAX_DEPTH", 50)));
}

export function getButtonLabelWidth(): number {
  return Math.max(4, Math.floor(readNumber("BUTTON_LABEL_WIDTH", 32)));
}

/** Graph used when a token is unreadable and carries no graph hint */
export function getDefaultGraphKey(): string | null {
  return process.env.DEFAULT_GRAPH_KEY?.trim() || null;
}

export function getReferralContact(): string {
  return readString(
    "REFERRAL_CONTACT",
    "Stop work and contact your site safety lead or a qualified senior technician."
  );
}

// ── Confidence router ───────────────────────────────────────────────

export function getRouterThresholds(): { lookup: number; research: number } {
  return {
    lookup: readNumber("ROUTER_LOOKUP_THRESHOLD", 0.8),
    research: readNumber("ROUTER_RESEARCH_THRESHOLD", 0.4),
  };
}

export function getSafetyReviewSlaHours(): number {
  return readNumber("SAFETY_REVIEW_SLA_HOURS", 24);
}

// ── Generative backend ──────────────────────────────────────────────

export function getOpenAiApiKey(): string | null {
  return process.env.OPENAI_API_KEY?.trim() || null;
}

export function getGuideModel(): string {
  return readString("GUIDE_MODEL", "gpt-4o-mini");
}

export function getGuideTimeoutMs(): number {
  return Math.max(1000, readNumber("GUIDE_TIMEOUT_MS", 20_000));
}

/** At most one retry of the generative call is ever allowed */
export function getGuideMaxRetries(): number {
  return Math.min(1, Math.max(0, Math.floor(readNumber("GUIDE_MAX_RETRIES", 1))));
}

// ── Retention ───────────────────────────────────────────────────────

export function getGraphRetentionDays(): number {
  return Math.max(1, readNumber("GRAPH_RETENTION_DAYS", 30));
}
