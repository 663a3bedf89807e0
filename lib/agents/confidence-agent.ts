/**
 * Confidence Agent
 *
 * Asks an agent for a 0-100 confidence score and supporting evidence for one
 * code. Replies that are not a usable JSON object are retried with a
 * corrective prompt; once the retries are spent the defaults are returned.
 */

import { z } from "zod";
import { ChatAgent, ConfidenceResult, DEFAULT_CONFIDENCE_SCORE, NO_EVIDENCE_PROVIDED } from "./types";
import { CONFIDENCE_CORRECTION_PROMPT, confidencePrompt } from "./prompts/icd-review-prompts";
import { cleanJsonResponse } from "./code-extraction";
import type { WorkflowLogger } from "../logging/logging";

export interface ConfidenceOptions {
  maxRetries?: number;
  defaultScore?: number;
  defaultEvidence?: string[];
  logger?: WorkflowLogger;
}

export const DEFAULT_CONFIDENCE_RETRIES = 2;

const confidenceReplySchema = z.record(z.unknown());

/**
 * Integer reading of a score: numbers are truncated toward zero, strings must
 * hold an optionally signed integer, booleans count as 1 and 0.
 */
export function parseScore(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value.trim(), 10);
  }
  throw new Error(`Score is not an integer: ${JSON.stringify(value)}`);
}

function evidenceToString(item: unknown): string {
  return typeof item === "string" ? item : JSON.stringify(item);
}

/**
 * Parses one reply. Returns null when the reply is well formed but out of
 * bounds, throws when it cannot be read at all.
 */
export function parseConfidenceReply(
  reply: string,
  defaultScore: number,
  defaultEvidence: string[],
): { score: number; evidence: string[] } | null {
  const data = confidenceReplySchema.parse(JSON.parse(cleanJsonResponse(reply)));

  const score = "score" in data ? parseScore(data.score) : defaultScore;
  const evidence = "evidence" in data ? data.evidence : defaultEvidence;

  if (score < 0 || score > 100 || !Array.isArray(evidence) || evidence.length === 0) {
    return null;
  }
  return { score, evidence: evidence.map(evidenceToString) };
}

export async function getConfidenceAndEvidence(
  agent: ChatAgent,
  code: string,
  description: string,
  summary: string,
  options: ConfidenceOptions = {},
): Promise<ConfidenceResult> {
  const maxRetries = options.maxRetries ?? DEFAULT_CONFIDENCE_RETRIES;
  const defaultScore = options.defaultScore ?? DEFAULT_CONFIDENCE_SCORE;
  const defaultEvidence = options.defaultEvidence ?? [NO_EVIDENCE_PROVIDED];
  const logger = options.logger;
  const fn = "getConfidenceAndEvidence";

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const prompt = attempt === 0 ? confidencePrompt(code, description, summary) : CONFIDENCE_CORRECTION_PROMPT;

    try {
      const reply = await agent.generateReply([{ role: "user", content: prompt }]);
      logger?.logDebug(fn, `Raw confidence reply from ${agent.name}`, { code, attempt, reply });

      const parsed = parseConfidenceReply(reply, defaultScore, defaultEvidence);
      if (parsed) {
        return { ...parsed, attempts: attempt + 1, usedFallback: false };
      }
      logger?.logWarn(fn, `Confidence reply from ${agent.name} out of bounds`, { code, attempt });
    } catch (error) {
      logger?.logWarn(fn, `Unusable confidence reply from ${agent.name}`, {
        code,
        attempt,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  logger?.logWarn(fn, `Falling back to default confidence for ${code}`, { agent: agent.name, defaultScore });
  return { score: defaultScore, evidence: [...defaultEvidence], attempts: maxRetries + 1, usedFallback: true };
}
