/**
 * Safety keyword detection for free-text queries and generated steps.
 *
 * A match forces ESCALATE in the confidence router and flags a generated
 * step so it renders inside a safety block.
 */

export const SAFETY_KEYWORDS: readonly string[] = [
  "warning:",
  "danger:",
  "caution:",
  "safety:",
  "lock out",
  "lockout",
  "tag out",
  "tagout",
  "high voltage",
  "electric shock",
  "arc flash",
  "ppe required",
  "personal protective",
  "hazard",
  "risk of injury",
  "risk of death",
  "e-stop",
  "interlock",
];

/** Categories the caller's classifier may attach to a query */
export const SAFETY_CATEGORIES: readonly string[] = ["electrical_hazard", "injury", "fire", "gas_leak", "safety"];

export function findSafetyKeywords(text: string): string[] {
  const lower = text.toLowerCase();
  return SAFETY_KEYWORDS.filter((keyword) => lower.includes(keyword));
}

export function detectSafety(text: string): boolean {
  return findSafetyKeywords(text).length > 0;
}

/** Caller flag OR keyword match OR a safety category */
export function isSafetyQuery(args: { query: string; safety?: boolean; categories?: readonly string[] }): boolean {
  if (args.safety) return true;
  if (args.categories?.some((c) => SAFETY_CATEGORIES.includes(c.trim().toLowerCase()))) return true;
  return detectSafety(args.query);
}
