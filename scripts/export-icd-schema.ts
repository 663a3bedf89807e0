#!/usr/bin/env tsx

/**
 * Runs the three review agents over the chart fixtures and writes the
 * ICD-10 schema document.
 *
 * Usage: tsx scripts/export-icd-schema.ts [output.json] [fixture-dir]
 */

import * as fs from "fs";
import { loadEnvironment } from "../lib/config/env";
import { loadIcdReviewConfig } from "../lib/config/icd-review-config";
import { createAgentsFromConfig } from "../lib/services/ai-model-service";
import { createIcd10OntologyService } from "../lib/services/icd10-ontology-service";
import { processAllModelsIcdCodes } from "../lib/workflow/icd-review-orchestrator";
import { fixtureDirectory, loadRagFixtures } from "../lib/workflow/rag-fixtures";
import { convertToIcd10Schema, formatIcd10CodeResults } from "../lib/coder/icd10-schema-transformer";
import { WorkflowLogger } from "../lib/logging/logging";

const DEFAULT_OUTPUT = "icd_schema_output.json";

async function main(): Promise<void> {
  loadEnvironment();
  const logger = new WorkflowLogger(undefined, { runLabel: "export-icd-schema" });
  const outputPath = process.argv[2] ?? DEFAULT_OUTPUT;

  try {
    const config = loadIcdReviewConfig();
    const agents = createAgentsFromConfig(config, logger);
    const ontology = createIcd10OntologyService(config.icd10CodesFile, logger);
    const fixtures = loadRagFixtures(
      agents.map(({ label }) => label),
      process.argv[3] ?? fixtureDirectory("chart"),
    );

    const results = await processAllModelsIcdCodes(
      agents.map(({ label, agent }) => ({ label, agent, rag: fixtures[label] })),
      { ontology, logger },
    );
    const document = convertToIcd10Schema(formatIcd10CodeResults(results));

    fs.writeFileSync(outputPath, JSON.stringify(document, null, 2));
    logger.logInfo("export-icd-schema", "Schema document written", { outputPath });
    console.log(`✅ Final output saved to ${outputPath}`);
  } finally {
    await logger.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`❌ Schema export failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
