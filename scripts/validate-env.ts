#!/usr/bin/env tsx

/**
 * Environment Variable Validation Script
 *
 * Checks that the provider keys the review agents need are present and that
 * the optional overrides parse.
 */

import { ZodError } from "zod";
import { loadEnvironment } from "../lib/config/env";
import { loadIcdReviewConfig } from "../lib/config/icd-review-config";
import { LogConfigManager } from "../lib/logging/log-config";

const REQUIRED_ENV_VARS = ["OPENAI_API_KEY", "GROQ_API_KEY"];

const OPTIONAL_ENV_VARS = [
  "GROQ_BASE_URL",
  "ICD_REVIEW_OPENAI_MODEL",
  "ICD_REVIEW_MISTRAL_MODEL",
  "ICD_REVIEW_LLAMA_MODEL",
  "ICD_REVIEW_TEMPERATURE",
  "ICD_REVIEW_MAX_TOKENS",
  "ICD10_CODES_FILE",
  "WORKFLOW_LOG_LEVEL",
  "WORKFLOW_FILE_LOGGING_ENABLED",
  "WORKFLOW_LOG_DIRECTORY",
];

function displayValue(name: string, value: string): string {
  if (name.includes("KEY") || name.includes("SECRET")) {
    return `${value.substring(0, 4)}...`;
  }
  return value.length > 50 ? `${value.substring(0, 47)}...` : value;
}

function validateEnvironment(): boolean {
  console.log("🔍 Validating environment variables...\n");

  let hasErrors = false;

  console.log("📋 Required Variables:");
  for (const envVar of REQUIRED_ENV_VARS) {
    const value = process.env[envVar];
    if (!value) {
      console.log(`❌ ${envVar}: MISSING`);
      hasErrors = true;
    } else {
      console.log(`✅ ${envVar}: ${displayValue(envVar, value)}`);
    }
  }

  console.log("\n📋 Optional Variables:");
  for (const envVar of OPTIONAL_ENV_VARS) {
    const value = process.env[envVar];
    if (!value) {
      console.log(`⚠️  ${envVar}: NOT SET`);
    } else {
      console.log(`✅ ${envVar}: ${displayValue(envVar, value)}`);
    }
  }

  try {
    const config = loadIcdReviewConfig();
    console.log("\n🤖 Agent roster:");
    for (const agent of config.agents) {
      console.log(`✅ ${agent.label}: ${agent.name} (${agent.backend}, ${agent.provider}/${agent.model})`);
    }
  } catch (error) {
    if (!(error instanceof ZodError)) throw error;
    console.log("\n❌ Invalid configuration values:");
    for (const issue of error.issues) {
      console.log(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    hasErrors = true;
  }

  const logConfigErrors = LogConfigManager.validateConfig();
  if (logConfigErrors.length > 0) {
    console.log("\n⚠️  Logging configuration:");
    logConfigErrors.forEach((error) => console.log(`   ${error}`));
  }

  return !hasErrors;
}

function main(): void {
  loadEnvironment();

  if (!validateEnvironment()) {
    console.log("\n❌ Environment validation failed!");
    console.log("\n💡 To fix this: add the missing or invalid variables to .env.local (see .env.example)");
    process.exit(1);
  }
  console.log("\n✅ Environment validation passed! All required variables are present.");
}

if (require.main === module) {
  main();
}
