/**
 * Core types for the ICD review workflow: agents, code records, loop
 * results and processing errors.
 */

// ============================================================================
// ENUMS & ERROR CONTRACT
// ============================================================================

export enum ProcessingErrorSeverity {
  LOW = "LOW",
  MEDIUM = "MEDIUM",
  HIGH = "HIGH",
  CRITICAL = "CRITICAL",
}

export interface ProcessingError {
  code?: string;
  message: string;
  severity: ProcessingErrorSeverity;
  timestamp: Date;
  source?: string;
  context?: Record<string, unknown>;
}

export const ERROR_CODES = {
  MISSING_CONFIGURATION: "MISSING_CONFIGURATION",
  INVALID_CONFIGURATION: "INVALID_CONFIGURATION",
  INVALID_RAG_OUTPUT: "INVALID_RAG_OUTPUT",
  MISSING_COLUMN: "MISSING_COLUMN",
  UNREADABLE_WORKBOOK: "UNREADABLE_WORKBOOK",
  INVALID_ICD10_TABLE: "INVALID_ICD10_TABLE",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base class for errors raised by the workflow. Carries the same fields as
 * a ProcessingError so it can be logged or collected without conversion.
 */
export class WorkflowError extends Error implements ProcessingError {
  public readonly code: ErrorCode;
  public readonly severity: ProcessingErrorSeverity;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    severity: ProcessingErrorSeverity,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "WorkflowError";
    this.code = code;
    this.severity = severity;
    this.timestamp = new Date();
    this.context = context;
  }
}

// ============================================================================
// AGENTS
// ============================================================================

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Uniform calling convention shared by every model backend.
 */
export interface ChatAgent {
  readonly name: string;
  generateReply(messages: ChatMessage[]): Promise<string>;
}

// ============================================================================
// CODE RECORDS & LOOP RESULTS
// ============================================================================

export const DESCRIPTION_NOT_FOUND = "Description not found";
export const DEFAULT_CONFIDENCE_SCORE = 50;
export const NO_EVIDENCE_PROVIDED = "No evidence provided";

export type CodeDescriptions = Record<string, string>;

export type ValidationOutcome =
  /** every candidate in the last round was confirmed */
  | "all_confirmed"
  /** the agent returned no usable alternatives */
  | "alternatives_exhausted"
  /** the retry bound was reached with codes still rejected */
  | "retries_exhausted";

export interface ValidationResult {
  codes: string[];
  success: boolean;
  outcome: ValidationOutcome;
  rounds: number;
}

export interface ConfidenceResult {
  score: number;
  evidence: string[];
  attempts: number;
  usedFallback: boolean;
}

export interface ScoredCode {
  code: string;
  description: string;
  confidenceScore: number;
  /** evidence phrases returned by the scoring model */
  modelEvidence: string[];
  /** sentences taken from the joint clinical summary */
  summaryEvidence: string[];
}

/** Scored codes keyed by model label, in roster order. */
export type ModelResults = Record<string, ScoredCode[]>;
