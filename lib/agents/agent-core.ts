/**
 * Agent Core
 *
 * Abstract base class for the chat agents. Subclasses implement `complete`
 * against one backend; the public `generateReply` wraps it with request and
 * usage logging so every backend reports the same way.
 */

import { ChatAgent, ChatMessage } from "./types";
import { AgentDefinition, CompletionResult } from "../config/ai-model-types";
import { calculateTokenCost } from "../config/ai-model-pricing";
import type { WorkflowLogger } from "../logging/logging";

// ============================================================================
// BASE CHAT AGENT
// ============================================================================

export abstract class BaseChatAgent implements ChatAgent {
  constructor(
    protected readonly definition: AgentDefinition,
    protected readonly logger?: WorkflowLogger,
  ) {}

  get name(): string {
    return this.definition.name;
  }

  get label(): string {
    return this.definition.label;
  }

  /**
   * Sends the conversation to the backend. Must not retry.
   */
  protected abstract complete(messages: ChatMessage[]): Promise<CompletionResult>;

  public async generateReply(messages: ChatMessage[]): Promise<string> {
    const startTime = Date.now();
    const callId = this.logger?.logApiCall(
      this.definition.backend,
      "generateReply",
      { agent: this.name, model: this.definition.model, messageCount: messages.length },
      startTime,
    );

    try {
      const result = await this.complete(messages);
      const executionTime = Date.now() - startTime;

      if (callId) {
        this.logger?.logApiResponse(
          callId,
          this.definition.backend,
          "generateReply",
          { agent: this.name, replyLength: result.text.length },
          null,
          executionTime,
        );
      }
      if (result.usage) {
        this.logUsage(result.usage.inputTokens, result.usage.outputTokens, executionTime);
      }

      return result.text;
    } catch (error) {
      if (callId) {
        this.logger?.logApiResponse(callId, this.definition.backend, "generateReply", null, error, Date.now() - startTime);
      }
      throw error;
    }
  }

  private logUsage(inputTokens: number, outputTokens: number, requestDuration: number): void {
    if (!this.logger) return;

    const costs = calculateTokenCost(this.definition.model, inputTokens, outputTokens);
    this.logger.logAiUsage(`${this.name}.generateReply`, {
      model: this.definition.model,
      provider: this.definition.provider,
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      inputCost: costs.inputCost,
      outputCost: costs.outputCost,
      totalCost: costs.totalCost,
      requestDuration,
    });
  }

  getAgentInfo(): { name: string; label: string; backend: string; provider: string; model: string } {
    return {
      name: this.name,
      label: this.label,
      backend: this.definition.backend,
      provider: this.definition.provider,
      model: this.definition.model,
    };
  }
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Type guard for objects following the agent calling convention.
 */
export function isChatAgent(obj: unknown): obj is ChatAgent {
  return (
    typeof obj === "object" &&
    obj !== null &&
    "name" in obj &&
    typeof obj.name === "string" &&
    "generateReply" in obj &&
    typeof obj.generateReply === "function"
  );
}

export type ScriptedReply = string | ((messages: ChatMessage[]) => string);

/**
 * Agent that answers from a script, for tests and dry runs. Replies are
 * consumed in order; once the script runs out the last reply repeats, and an
 * empty script always answers with an empty string. `calls` records every
 * conversation it received.
 */
export function createMockChatAgent(
  name: string,
  replies: ScriptedReply[] | ((messages: ChatMessage[], callIndex: number) => string),
): ChatAgent & { calls: ChatMessage[][] } {
  const calls: ChatMessage[][] = [];

  return {
    name,
    calls,
    async generateReply(messages: ChatMessage[]): Promise<string> {
      const callIndex = calls.length;
      calls.push(messages);

      if (typeof replies === "function") {
        return replies(messages, callIndex);
      }
      if (replies.length === 0) {
        return "";
      }
      const reply = replies[Math.min(callIndex, replies.length - 1)];
      return typeof reply === "function" ? reply(messages) : reply;
    },
  };
}
