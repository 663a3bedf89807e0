/**
 * ICD Review Orchestrator
 *
 * Runs the review for each model in turn: validate the candidate codes,
 * then score every surviving code. Agents, codes and retry rounds are all
 * processed sequentially.
 */

import { ChatAgent, ModelResults, ScoredCode } from "../agents/types";
import { validateIcdCodes } from "../agents/icd-validation-agent";
import { getConfidenceAndEvidence } from "../agents/confidence-agent";
import { extractValidEvidence } from "../agents/summary-evidence";
import { Icd10Lookup, getDefaultIcd10OntologyService } from "../services/icd10-ontology-service";
import { ResolvedRagOutput, jointSummary } from "./rag-input";
import type { WorkflowLogger } from "../logging/logging";

export interface ModelReviewOptions {
  numCodes?: number;
  validationRetries?: number;
  confidenceRetries?: number;
  ontology?: Icd10Lookup;
  logger?: WorkflowLogger;
}

export interface ModelRun {
  label: string;
  agent: ChatAgent;
  rag: ResolvedRagOutput;
}

export const DEFAULT_NUM_CODES = 5;
export const DRIVER_VALIDATION_RETRIES = 3;

export async function processModelIcdCodes(
  rag: ResolvedRagOutput,
  agent: ChatAgent,
  options: ModelReviewOptions = {},
): Promise<ScoredCode[]> {
  const numCodes = options.numCodes ?? DEFAULT_NUM_CODES;
  const ontology = options.ontology ?? getDefaultIcd10OntologyService();
  const logger = options.logger;
  const fn = "processModelIcdCodes";

  const initialCodes = rag.codes.slice(0, numCodes);
  const summary = jointSummary(rag);

  logger?.logWorkflow(fn, `Reviewing ${initialCodes.length} codes with ${agent.name}`, {
    format: rag.format,
    codes: initialCodes,
    chartId: rag.chart?.chartId,
  });

  const validation = await validateIcdCodes(agent, initialCodes, ontology.getDescriptions(initialCodes), summary, {
    maxRetries: options.validationRetries ?? DRIVER_VALIDATION_RETRIES,
    ontology,
    logger,
  });

  const summaryEvidence = extractValidEvidence(summary);
  const results: ScoredCode[] = [];

  for (const code of validation.codes.slice(0, numCodes)) {
    const description = ontology.getDescription(code);
    const confidence = await getConfidenceAndEvidence(agent, code, description, summary, {
      maxRetries: options.confidenceRetries,
      logger,
    });

    results.push({
      code,
      description,
      confidenceScore: confidence.score,
      modelEvidence: confidence.evidence,
      summaryEvidence: [...summaryEvidence],
    });
  }

  logger?.logWorkflow(fn, `Finished review with ${agent.name}`, {
    outcome: validation.outcome,
    rounds: validation.rounds,
    scored: results.map((result) => ({ code: result.code, score: result.confidenceScore })),
  });

  return results;
}

/**
 * Runs every model in the given order; the result keeps that order.
 */
export async function processAllModelsIcdCodes(
  runs: ModelRun[],
  options: ModelReviewOptions = {},
): Promise<ModelResults> {
  const results: ModelResults = {};

  for (const run of runs) {
    options.logger?.logWorkflow("processAllModelsIcdCodes", `Processing ${run.label} RAG output`, {
      agent: run.agent.name,
    });
    results[run.label] = await processModelIcdCodes(run.rag, run.agent, options);
  }

  return results;
}
