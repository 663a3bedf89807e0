import { ModelResults } from "../agents/types";

export interface ConfidenceReportEntry {
  icd_code: string;
  confidence: number;
  evidence: string[];
}

export type ConfidenceReport = Record<string, ConfidenceReportEntry[]>;

/**
 * Per-model list of scored codes with the evidence the scoring model gave.
 */
export function formatConfidenceReport(results: ModelResults): ConfidenceReport {
  const report: ConfidenceReport = {};
  for (const [label, scored] of Object.entries(results)) {
    report[label] = scored.map((result) => ({
      icd_code: result.code,
      confidence: result.confidenceScore,
      evidence: [...result.modelEvidence],
    }));
  }
  return report;
}
