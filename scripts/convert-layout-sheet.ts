#!/usr/bin/env tsx

/**
 * Converts a record layout spreadsheet to its JSON field map.
 *
 * Usage: tsx scripts/convert-layout-sheet.ts <layout.xlsx> [output.json]
 */

import * as fs from "fs";
import { convertLayoutSheet } from "../lib/tools/layout-sheet-converter";
import { WorkflowLogger } from "../lib/logging/logging";

const DEFAULT_OUTPUT = "output.json";

async function main(): Promise<void> {
  const [inputPath, outputPath = DEFAULT_OUTPUT] = process.argv.slice(2);
  if (!inputPath) {
    console.error("Usage: tsx scripts/convert-layout-sheet.ts <layout.xlsx> [output.json]");
    process.exit(1);
  }

  const logger = new WorkflowLogger(undefined, { runLabel: "convert-layout-sheet" });
  try {
    const document = await convertLayoutSheet(inputPath, logger);
    const json = JSON.stringify(document, null, 4);

    console.log(json);
    fs.writeFileSync(outputPath, json);
    console.log(`\n✅ Wrote ${Object.keys(document.detail).length} fields to ${outputPath}`);
  } finally {
    await logger.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`❌ Conversion failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
