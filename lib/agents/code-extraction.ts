/**
 * Pulls ICD-10-like codes out of free-text or JSON model replies.
 */

import { z } from "zod";

/**
 * Structured payload the alternative-suggestion prompt asks for. Both keys
 * are required for the strict pass.
 */
export const suggestedCodesSchema = z.object({
  finalCodes: z.array(z.string()),
  content: z.array(z.record(z.unknown())),
});

export type SuggestedCodes = z.infer<typeof suggestedCodesSchema>;

// One uppercase letter, 1-2 digits, optional dot and digit suffix.
// Lenient relative to the real ICD-10 grammar (see DESIGN.md).
const ICD_CODE_PATTERN = /\b[A-Z]\d{1,2}\.?\d*\b/g;

/**
 * Strict decode first, regex scan second. Never throws.
 */
export function extractIcdCodes(response: string): string[] {
  const structured = parseSuggestedCodes(response);
  if (structured) {
    return structured.finalCodes;
  }
  return response.match(ICD_CODE_PATTERN) ?? [];
}

function parseSuggestedCodes(response: string): SuggestedCodes | null {
  let payload: unknown;
  try {
    payload = JSON.parse(response);
  } catch {
    return null;
  }
  const result = suggestedCodesSchema.safeParse(payload);
  return result.success ? result.data : null;
}

/**
 * Strips a surrounding markdown code fence. The opening line is dropped when
 * it starts with a fence (so ```json is removed too); the closing line only
 * when it is exactly a fence.
 */
export function cleanJsonResponse(response: string): string {
  let cleaned = response.trim();
  if (cleaned.startsWith("```")) {
    let lines = cleaned.split("\n");
    if (lines[0].trim().startsWith("```")) {
      lines = lines.slice(1);
    }
    if (lines.length > 0 && lines[lines.length - 1].trim() === "```") {
      lines = lines.slice(0, -1);
    }
    cleaned = lines.join("\n").trim();
  }
  return cleaned;
}
