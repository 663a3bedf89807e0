/**
 * AI Model Service
 *
 * Builds the review agents from their definitions. Two backends share the
 * `ChatAgent` calling convention:
 *
 * - `assistant`: text generation through the AI SDK with an OpenAI model.
 * - `chat-completions`: a direct chat completion request through the openai
 *   SDK against an OpenAI-compatible endpoint (Groq by default).
 *
 * Neither backend retries; failures propagate to the caller.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText, type ModelMessage } from "ai";
import OpenAI from "openai";

import { BaseChatAgent } from "../agents/agent-core";
import { ChatAgent, ChatMessage, ERROR_CODES, ErrorCode, ProcessingErrorSeverity, WorkflowError } from "../agents/types";
import { AgentDefinition, CompletionResult, CompletionUsage, IcdReviewConfig, ProviderCredentials } from "../config/ai-model-types";
import { validateAIModelConfig } from "../config/icd-review-config";
import type { WorkflowLogger } from "../logging/logging";

export class AIModelServiceError extends WorkflowError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(code, message, ProcessingErrorSeverity.CRITICAL, context);
    this.name = "AIModelServiceError";
  }
}

// ============================================================================
// BACKEND SEAMS
// ============================================================================

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
}

/**
 * Narrow view of an OpenAI-compatible chat endpoint.
 */
export interface ChatCompletionsClient {
  createChatCompletion(request: CompletionRequest): Promise<{ content: string | null; usage?: CompletionUsage }>;
}

/**
 * Generic text generation, as offered by the AI SDK.
 */
export type TextGenerator = (request: CompletionRequest) => Promise<CompletionResult>;

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

function toModelMessage(message: ChatMessage): ModelMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

export function createOpenAICompatibleClient(apiKey: string, baseURL: string): ChatCompletionsClient {
  const client = new OpenAI({ apiKey, baseURL });

  return {
    async createChatCompletion(request) {
      const response = await client.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toOpenAIMessage),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        stream: false,
      });

      return {
        content: response.choices[0]?.message?.content ?? null,
        usage: response.usage
          ? { inputTokens: response.usage.prompt_tokens || 0, outputTokens: response.usage.completion_tokens || 0 }
          : undefined,
      };
    },
  };
}

export function createAiSdkTextGenerator(apiKey: string): TextGenerator {
  const provider = createOpenAI({ apiKey });

  return async (request) => {
    const result = await generateText({
      model: provider(request.model),
      messages: request.messages.map(toModelMessage),
      temperature: request.temperature,
      maxOutputTokens: request.maxTokens,
    });

    return {
      text: result.text,
      usage: {
        inputTokens: result.usage.inputTokens || 0,
        outputTokens: result.usage.outputTokens || 0,
      },
    };
  };
}

// ============================================================================
// AGENTS
// ============================================================================

export class ChatCompletionsAgent extends BaseChatAgent {
  constructor(
    definition: AgentDefinition,
    private readonly client: ChatCompletionsClient,
    logger?: WorkflowLogger,
  ) {
    super(definition, logger);
  }

  protected async complete(messages: ChatMessage[]): Promise<CompletionResult> {
    const response = await this.client.createChatCompletion({
      model: this.definition.model,
      messages,
      temperature: this.definition.temperature,
      maxTokens: this.definition.maxTokens,
    });

    if (response.content === null) {
      this.logger?.logWarn(`${this.name}.complete`, "Backend returned no message content", {
        model: this.definition.model,
      });
    }

    return { text: response.content ?? "", usage: response.usage };
  }
}

export class AssistantAgent extends BaseChatAgent {
  constructor(
    definition: AgentDefinition,
    private readonly generate: TextGenerator,
    logger?: WorkflowLogger,
  ) {
    super(definition, logger);
  }

  protected async complete(messages: ChatMessage[]): Promise<CompletionResult> {
    return this.generate({
      model: this.definition.model,
      messages,
      temperature: this.definition.temperature,
      maxTokens: this.definition.maxTokens,
    });
  }
}

// ============================================================================
// FACTORIES
// ============================================================================

function requireKey(key: string | undefined, variable: string, definition: AgentDefinition): string {
  if (!key) {
    throw new AIModelServiceError(
      ERROR_CODES.MISSING_CONFIGURATION,
      `${variable} is required for agent ${definition.name}`,
      { agent: definition.name, provider: definition.provider },
    );
  }
  return key;
}

/**
 * Builds one agent. Throws `AIModelServiceError` when the definition is out
 * of bounds or its provider has no API key.
 */
export function createChatAgent(
  definition: AgentDefinition,
  credentials: ProviderCredentials,
  logger?: WorkflowLogger,
): BaseChatAgent {
  const validation = validateAIModelConfig(definition);
  if (!validation.valid) {
    throw new AIModelServiceError(
      ERROR_CODES.INVALID_CONFIGURATION,
      `Invalid configuration for agent ${definition.name}: ${validation.errors.join("; ")}`,
      { agent: definition.name, errors: validation.errors },
    );
  }

  const apiKey =
    definition.provider === "openai"
      ? requireKey(credentials.openaiApiKey, "OPENAI_API_KEY", definition)
      : requireKey(credentials.groqApiKey, "GROQ_API_KEY", definition);

  logger?.logDebug("createChatAgent", `Creating ${definition.backend} agent`, {
    agent: definition.name,
    provider: definition.provider,
    model: definition.model,
  });

  if (definition.backend === "assistant") {
    return new AssistantAgent(definition, createAiSdkTextGenerator(apiKey), logger);
  }

  const baseURL = definition.provider === "groq" ? credentials.groqBaseUrl : "https://api.openai.com/v1";
  return new ChatCompletionsAgent(definition, createOpenAICompatibleClient(apiKey, baseURL), logger);
}

/**
 * Builds every agent of the roster, keyed by label in roster order.
 */
export function createAgentsFromConfig(
  config: IcdReviewConfig,
  logger?: WorkflowLogger,
): Array<{ label: string; agent: ChatAgent }> {
  return config.agents.map((definition) => ({
    label: definition.label,
    agent: createChatAgent(definition, config.credentials, logger),
  }));
}
