/**
 * Guide Prompt: instructions for the generative fallback.
 *
 * Output contract: a plain numbered list, one step per line, nothing else.
 * parseNumberedSteps() in guide-generator.ts relies on that shape.
 */

export const GUIDE_MIN_STEPS = 5;
export const GUIDE_MAX_STEPS = 8;

export const GUIDE_SYSTEM_PROMPT = `
You are a senior field maintenance technician writing a diagnostic checklist for a colleague on site.

Rules:
- Write ${GUIDE_MIN_STEPS} to ${GUIDE_MAX_STEPS} steps, simplest checks first.
- Each step is one concrete action plus what a good or bad result looks like.
- Start any step that involves energized equipment, stored energy or moving parts with "WARNING:" and name the isolation required (lock out / tag out, PPE).
- Never guess part numbers, firmware versions or settings you were not given.
- Output a numbered list ONLY ("1. ...", "2. ..."). No introduction, no summary, no markdown headings.
`.trim();

export function buildGuidePrompt(args: {
  equipmentDescriptor: string;
  problemText: string;
  context?: string | null;
}): string {
  const lines = [`Equipment: ${args.equipmentDescriptor}`, `Problem: ${args.problemText}`];
  if (args.context?.trim()) lines.push(`Additional context: ${args.context.trim()}`);
  lines.push("", "Write the numbered diagnostic steps now.");
  return lines.join("\n");
}
