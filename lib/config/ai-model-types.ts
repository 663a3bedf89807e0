/**
 * AI Model Configuration Types
 *
 * Types describing which model backs each review agent and how it is called.
 */

// ============================================================================
// AI MODEL CONFIGURATION
// ============================================================================

/**
 * `assistant` goes through the AI SDK's generic text generation;
 * `chat-completions` calls an OpenAI-compatible chat endpoint directly.
 */
export type AgentBackend = "assistant" | "chat-completions";

export type AIProvider = "openai" | "groq";

export interface AIModelConfig {
  provider: AIProvider;
  model: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Everything needed to build one agent. Constructed from configuration and
 * passed explicitly; nothing is created at import time.
 */
export interface AgentDefinition extends AIModelConfig {
  /** key used in result documents, e.g. "OpenAI" */
  label: string;
  /** agent name used in logs and prompts, e.g. "OpenAI_Agent" */
  name: string;
  backend: AgentBackend;
}

export interface ProviderCredentials {
  openaiApiKey?: string;
  groqApiKey?: string;
  groqBaseUrl: string;
}

export interface IcdReviewConfig {
  credentials: ProviderCredentials;
  agents: AgentDefinition[];
  /** ICD-10-CM code table to use instead of the bundled subset */
  icd10CodesFile?: string;
}

// ============================================================================
// USAGE
// ============================================================================

export interface CompletionUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResult {
  text: string;
  usage?: CompletionUsage;
}
