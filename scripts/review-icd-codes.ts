#!/usr/bin/env tsx

/**
 * Runs the three review agents over the final-codes fixtures and prints the
 * confidence report.
 *
 * Usage: tsx scripts/review-icd-codes.ts [fixture-dir]
 */

import { loadEnvironment } from "../lib/config/env";
import { loadIcdReviewConfig } from "../lib/config/icd-review-config";
import { createAgentsFromConfig } from "../lib/services/ai-model-service";
import { createIcd10OntologyService } from "../lib/services/icd10-ontology-service";
import { processAllModelsIcdCodes } from "../lib/workflow/icd-review-orchestrator";
import { fixtureDirectory, loadRagFixtures } from "../lib/workflow/rag-fixtures";
import { formatConfidenceReport } from "../lib/coder/confidence-report";
import { WorkflowLogger } from "../lib/logging/logging";

async function main(): Promise<void> {
  loadEnvironment();
  const logger = new WorkflowLogger(undefined, { runLabel: "review-icd-codes" });

  try {
    const config = loadIcdReviewConfig();
    const agents = createAgentsFromConfig(config, logger);
    const ontology = createIcd10OntologyService(config.icd10CodesFile, logger);
    const fixtures = loadRagFixtures(
      agents.map(({ label }) => label),
      process.argv[2] ?? fixtureDirectory("final-codes"),
    );

    const results = await processAllModelsIcdCodes(
      agents.map(({ label, agent }) => ({ label, agent, rag: fixtures[label] })),
      { ontology, logger },
    );

    console.log("\n📋 Final ICD Codes with Confidence Scores and Evidence:");
    console.log(JSON.stringify(formatConfidenceReport(results), null, 2));

    const summary = logger.generateExecutionSummary();
    console.log(`\n✅ Review finished: ${summary.apiCalls} model calls, $${summary.totalAiCost.toFixed(4)} estimated cost`);
  } finally {
    await logger.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`❌ ICD review failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
