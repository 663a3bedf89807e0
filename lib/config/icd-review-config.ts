/**
 * ICD review configuration: provider credentials and the agent roster,
 * read from environment variables.
 */

import { z } from "zod";
import { AgentDefinition, AIModelConfig, IcdReviewConfig } from "./ai-model-types";

export const DEFAULT_GROQ_BASE_URL = "https://api.groq.com/openai/v1";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  GROQ_API_KEY: optionalString,
  GROQ_BASE_URL: optionalString.pipe(z.string().url().optional()),
  ICD_REVIEW_OPENAI_MODEL: optionalString,
  ICD_REVIEW_MISTRAL_MODEL: optionalString,
  ICD_REVIEW_LLAMA_MODEL: optionalString,
  ICD_REVIEW_TEMPERATURE: optionalString.pipe(z.coerce.number().min(0).max(2).optional()),
  ICD_REVIEW_MAX_TOKENS: optionalString.pipe(z.coerce.number().int().min(1).max(8000).optional()),
  ICD10_CODES_FILE: optionalString,
});

export type IcdReviewEnv = z.infer<typeof envSchema>;

const DEFAULT_TEMPERATURE = 0.1;
const DEFAULT_MAX_TOKENS = 1024;

/**
 * The three reviewers, in the order their results are reported.
 */
export function buildDefaultRoster(env: IcdReviewEnv): AgentDefinition[] {
  const temperature = env.ICD_REVIEW_TEMPERATURE ?? DEFAULT_TEMPERATURE;
  const maxTokens = env.ICD_REVIEW_MAX_TOKENS ?? DEFAULT_MAX_TOKENS;

  return [
    {
      label: "OpenAI",
      name: "OpenAI_Agent",
      backend: "assistant",
      provider: "openai",
      model: env.ICD_REVIEW_OPENAI_MODEL ?? "gpt-4o",
      temperature,
      maxTokens,
    },
    {
      label: "Mistral",
      name: "Groq_Mistral_Agent",
      backend: "chat-completions",
      provider: "groq",
      model: env.ICD_REVIEW_MISTRAL_MODEL ?? "llama-3.3-70b-versatile",
      temperature,
      maxTokens,
    },
    {
      label: "LLaMA",
      name: "Groq_LLaMA_Agent",
      backend: "chat-completions",
      provider: "groq",
      model: env.ICD_REVIEW_LLAMA_MODEL ?? "llama3-70b-8192",
      temperature,
      maxTokens,
    },
  ];
}

/**
 * Parses the environment. Throws a ZodError listing every invalid variable.
 */
export function loadIcdReviewConfig(env: NodeJS.ProcessEnv = process.env): IcdReviewConfig {
  const parsed = envSchema.parse(env);

  return {
    credentials: {
      openaiApiKey: parsed.OPENAI_API_KEY,
      groqApiKey: parsed.GROQ_API_KEY,
      groqBaseUrl: parsed.GROQ_BASE_URL ?? DEFAULT_GROQ_BASE_URL,
    },
    agents: buildDefaultRoster(parsed),
    icd10CodesFile: parsed.ICD10_CODES_FILE,
  };
}

export function validateAIModelConfig(config: Partial<AIModelConfig>): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.provider && !["openai", "groq"].includes(config.provider)) {
    errors.push('Provider must be either "openai" or "groq"');
  }

  if (config.model !== undefined && config.model.trim() === "") {
    errors.push("Model must not be empty");
  }

  if (config.temperature !== undefined && (config.temperature < 0 || config.temperature > 2)) {
    errors.push("Temperature must be between 0 and 2");
  }

  if (config.maxTokens !== undefined && (config.maxTokens < 1 || config.maxTokens > 8000)) {
    errors.push("Max tokens must be between 1 and 8000");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
