/**
 * RAG input boundary
 *
 * Retrieval output arrives in one of two shapes. It is recognised once here
 * and resolved to a single internal form; nothing downstream inspects the
 * raw keys.
 *
 * - final-codes: { finalCodes, content: [{ disease?, summary }] }
 * - chart:       { dxCodes, summaryInfo: [{ disease?, text }], chartId?, MemberId?, ... }
 */

import { z } from "zod";
import { ERROR_CODES, ProcessingErrorSeverity, WorkflowError } from "../agents/types";

export class RagOutputFormatError extends WorkflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ERROR_CODES.INVALID_RAG_OUTPUT, message, ProcessingErrorSeverity.HIGH, context);
    this.name = "RagOutputFormatError";
  }
}

const looseText = z
  .unknown()
  .transform((value) => (typeof value === "string" ? value : value === undefined || value === null ? "" : String(value)));

const finalCodesSchema = z.object({
  finalCodes: z.array(z.string()).default([]),
  content: z
    .array(z.object({ disease: looseText, summary: looseText }).passthrough())
    .default([]),
});

const chartSchema = z.object({
  chartId: z.string().optional(),
  MemberId: z.string().optional(),
  llm: z.string().optional(),
  dxCodes: z.array(z.string()).default([]),
  previouslSubmittedCodes: z.array(z.string()).default([]),
  summaryInfo: z
    .array(z.object({ disease: looseText, text: looseText }).passthrough())
    .default([]),
});

export type RagOutputFormat = "final-codes" | "chart";

export interface SummaryEntry {
  disease: string;
  text: string;
}

export interface ChartMetadata {
  chartId?: string;
  memberId?: string;
  llm?: string;
  previouslySubmittedCodes: string[];
}

export interface ResolvedRagOutput {
  format: RagOutputFormat;
  codes: string[];
  summaries: SummaryEntry[];
  chart?: ChartMetadata;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The chart shape is recognised by `dxCodes` or `summaryInfo`; any other
 * object is read as the final-codes shape with missing arrays defaulted.
 */
export function detectRagOutputFormat(raw: unknown): RagOutputFormat {
  if (!isRecord(raw)) {
    throw new RagOutputFormatError("RAG output must be a JSON object", {
      receivedType: Array.isArray(raw) ? "array" : raw === null ? "null" : typeof raw,
    });
  }
  return "dxCodes" in raw || "summaryInfo" in raw ? "chart" : "final-codes";
}

export function resolveRagOutput(raw: unknown): ResolvedRagOutput {
  const format = detectRagOutputFormat(raw);

  if (format === "chart") {
    const parsed = chartSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RagOutputFormatError("Invalid chart RAG output", { issues: parsed.error.issues });
    }
    const chart = parsed.data;
    return {
      format,
      codes: chart.dxCodes,
      summaries: chart.summaryInfo.map((entry) => ({ disease: entry.disease, text: entry.text })),
      chart: {
        chartId: chart.chartId,
        memberId: chart.MemberId,
        llm: chart.llm,
        previouslySubmittedCodes: chart.previouslSubmittedCodes,
      },
    };
  }

  const parsed = finalCodesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RagOutputFormatError("Invalid final-codes RAG output", { issues: parsed.error.issues });
  }
  return {
    format,
    codes: parsed.data.finalCodes,
    summaries: parsed.data.content.map((entry) => ({ disease: entry.disease, text: entry.summary })),
  };
}

/**
 * Summary texts joined with newlines, in input order.
 */
export function jointSummary(rag: ResolvedRagOutput): string {
  return rag.summaries.map((entry) => entry.text).join("\n");
}
