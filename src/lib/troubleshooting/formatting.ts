/**
 * Message formatting for the chat transport (HTML parse mode).
 *
 * Safety-flagged content is wrapped in a blockquote so it stands apart from
 * ordinary steps. Media captions are capped at the transport's caption limit.
 */

import type { DiagramNode } from "./types";

export const CAPTION_LIMIT = 1024;
const TRUNCATE_SUFFIX = "...";

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatSafetyBlock(text: string): string {
  return `<blockquote><b>SAFETY WARNING</b>\n\n${escapeHtml(text)}</blockquote>`;
}

export function truncateCaption(text: string, limit: number = CAPTION_LIMIT): string {
  if (text.length <= limit) return text;
  return text.slice(0, limit - TRUNCATE_SUFFIX.length) + TRUNCATE_SUFFIX;
}

export function formatNodeText(
  node: DiagramNode,
  opts: { notice?: string | null; stepNumber?: number } = {}
): string {
  const head: string[] = [];
  if (opts.notice) head.push(`<i>${escapeHtml(opts.notice)}</i>`);
  if (opts.stepNumber && node.kind !== "terminal") head.push(`<b>Step ${opts.stepNumber}</b>`);

  const assemble = (body: string) =>
    [...head, node.safety ? formatSafetyBlock(body) : escapeHtml(body)].join("\n\n");

  let text = assemble(node.text);
  if (!node.media) return text;

  // Shorten the node text (never the markup) until the caption fits
  let body = node.text;
  while (text.length > CAPTION_LIMIT && body.length > 0) {
    const overflow = text.length - CAPTION_LIMIT;
    body = truncateCaption(body, Math.max(TRUNCATE_SUFFIX.length, body.length - overflow));
    if (body.length <= TRUNCATE_SUFFIX.length) {
      body = "";
    }
    text = assemble(body);
  }
  return text;
}
