/**
 * ICD Validation Agent
 *
 * Asks one agent to confirm or reject each candidate ICD-10 code against the
 * clinical summary. When any code is rejected the agent proposes a
 * replacement set, which is validated in the next round, up to `maxRetries`
 * rounds.
 */

import { ChatAgent, CodeDescriptions, DESCRIPTION_NOT_FOUND, ValidationResult } from "./types";
import { validationPrompt, alternativeSuggestionPrompt } from "./prompts/icd-review-prompts";
import { extractIcdCodes } from "./code-extraction";
import { Icd10Lookup, getDefaultIcd10OntologyService } from "../services/icd10-ontology-service";
import type { WorkflowLogger } from "../logging/logging";

export interface ValidationOptions {
  maxRetries?: number;
  ontology?: Icd10Lookup;
  logger?: WorkflowLogger;
}

export const DEFAULT_VALIDATION_RETRIES = 2;

/**
 * Case-insensitive substring test, so "Confirmed." and "CONFIRMED: ..." count.
 */
export function isConfirmation(reply: string): boolean {
  return reply.toUpperCase().includes("CONFIRMED");
}

export async function validateIcdCodes(
  agent: ChatAgent,
  codes: string[],
  descriptions: CodeDescriptions,
  summary: string,
  options: ValidationOptions = {},
): Promise<ValidationResult> {
  const maxRetries = options.maxRetries ?? DEFAULT_VALIDATION_RETRIES;
  const ontology = options.ontology ?? getDefaultIcd10OntologyService();
  const logger = options.logger;
  const fn = "validateIcdCodes";

  let candidates = [...codes];
  let currentDescriptions = descriptions;
  let round = 0;

  logger?.logWorkflow(fn, `Validation started for ${agent.name}`, { codes: candidates, maxRetries });

  if (candidates.length === 0) {
    logger?.logInfo(fn, "No candidate codes to validate", { agent: agent.name });
    return { codes: [], success: true, outcome: "all_confirmed", rounds: 0 };
  }

  while (round < maxRetries) {
    const confirmed: string[] = [];
    const rejected: string[] = [];

    for (const code of candidates) {
      const description = Object.hasOwn(currentDescriptions, code)
        ? currentDescriptions[code]
        : DESCRIPTION_NOT_FOUND;
      const reply = await agent.generateReply([
        { role: "user", content: validationPrompt(code, description, summary) },
      ]);

      if (isConfirmation(reply)) {
        confirmed.push(code);
        logger?.logDebug(fn, `${agent.name} confirmed ${code}`, { round });
      } else {
        rejected.push(code);
        logger?.logDebug(fn, `${agent.name} rejected ${code}`, { round, reply });
      }
    }

    if (rejected.length === 0) {
      logger?.logInfo(fn, `All codes confirmed by ${agent.name}`, { codes: confirmed, rounds: round + 1 });
      return { codes: confirmed, success: true, outcome: "all_confirmed", rounds: round + 1 };
    }

    const reply = await agent.generateReply([
      { role: "user", content: alternativeSuggestionPrompt(candidates, rejected, summary) },
    ]);
    const suggested = extractIcdCodes(reply);

    if (suggested.length === 0) {
      logger?.logWarn(fn, `${agent.name} suggested no alternatives; keeping confirmed codes`, {
        confirmed,
        rejected,
      });
      return { codes: confirmed, success: true, outcome: "alternatives_exhausted", rounds: round + 1 };
    }

    logger?.logInfo(fn, `${agent.name} suggested alternative codes`, { rejected, suggested });
    candidates = suggested;
    currentDescriptions = ontology.getDescriptions(candidates);
    round++;
  }

  logger?.logWarn(fn, `Maximum retries reached for ${agent.name}`, { codes: candidates, maxRetries });
  return { codes: candidates, success: false, outcome: "retries_exhausted", rounds: round };
}
