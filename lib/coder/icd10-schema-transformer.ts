/**
 * ICD-10 schema transformer
 *
 * Reshapes scored codes into the ICD-10 schema document consumed
 * downstream. Fields the review does not produce (service date, provider,
 * place of service, ...) are filled with fixed placeholders.
 */

import { DEFAULT_CONFIDENCE_SCORE, ModelResults, NO_EVIDENCE_PROVIDED } from "../agents/types";

// ============================================================================
// TYPES
// ============================================================================

/** One scored code as reported per model before conversion. */
export interface Icd10CodeResult {
  code?: string;
  description?: string;
  confidence_score?: number;
  evidence?: string[];
}

export type Icd10CodeResults = Record<string, { ICD10Codes: Icd10CodeResult[] }>;

export interface Icd10SchemaAttribute {
  type: "evidence";
  score: number;
  relationshipScore: number;
  text: string;
}

export interface Icd10SchemaEntry {
  Text: string;
  disease: string;
  Category: string;
  Type: string;
  Score: number;
  Attributes: Icd10SchemaAttribute[];
  Traits: Array<{ Name: string; Score: number }>;
  ICD10CMConcepts: Array<{ Description: string; Code: string; hccCode: string; Score: number }>;
  DOS: string;
  Provider: string;
  PlaceOfService: string;
  SignatureProvider: string;
  NoteType: string;
  PageNumbers: number[];
}

export type Icd10SchemaDocument = Record<string, { ICD10Codes: Icd10SchemaEntry[] }>;

// ============================================================================
// DEFAULTS
// ============================================================================

export const SCHEMA_DEFAULTS = {
  text: "No text provided",
  disease: "Unknown disease",
  category: "General",
  type: "Default",
  relationshipScore: 50,
  traitName: "default",
  conceptDescription: "No description",
  conceptCode: "Unknown",
  hccCode: "24",
  dos: "01-01-2020",
  provider: "Unknown Provider",
  unknown: "Unknown",
} as const;

const TEXT_WORD_LIMIT = 10;

// ============================================================================
// CONVERSION
// ============================================================================

/**
 * Per-model `{ ICD10Codes }` lists carrying the summary-derived evidence.
 */
export function formatIcd10CodeResults(results: ModelResults): Icd10CodeResults {
  const formatted: Icd10CodeResults = {};
  for (const [label, scored] of Object.entries(results)) {
    formatted[label] = {
      ICD10Codes: scored.map((result) => ({
        code: result.code,
        description: result.description,
        confidence_score: result.confidenceScore,
        evidence: [...result.summaryEvidence],
      })),
    };
  }
  return formatted;
}

export function convertResultToIcd10Schema(result: Icd10CodeResult): Icd10SchemaEntry {
  const score = result.confidence_score ?? DEFAULT_CONFIDENCE_SCORE;
  const evidence = result.evidence ?? [NO_EVIDENCE_PROVIDED];

  // first evidence sentence, cut to its first ten words; absent evidence
  // gives the text placeholder even though the attributes get the marker
  const text =
    result.evidence && result.evidence.length > 0
      ? result.evidence[0]
          .split(/\s+/)
          .filter((word) => word.length > 0)
          .slice(0, TEXT_WORD_LIMIT)
          .join(" ")
      : SCHEMA_DEFAULTS.text;

  return {
    Text: text,
    disease: result.description ?? SCHEMA_DEFAULTS.disease,
    Category: SCHEMA_DEFAULTS.category,
    Type: SCHEMA_DEFAULTS.type,
    Score: score,
    Attributes: evidence.map((item) => ({
      type: "evidence" as const,
      score,
      relationshipScore: SCHEMA_DEFAULTS.relationshipScore,
      text: item,
    })),
    Traits: [{ Name: SCHEMA_DEFAULTS.traitName, Score: score }],
    ICD10CMConcepts: [
      {
        Description: result.description ?? SCHEMA_DEFAULTS.conceptDescription,
        Code: result.code ?? SCHEMA_DEFAULTS.conceptCode,
        hccCode: SCHEMA_DEFAULTS.hccCode,
        Score: score,
      },
    ],
    DOS: SCHEMA_DEFAULTS.dos,
    Provider: SCHEMA_DEFAULTS.provider,
    PlaceOfService: SCHEMA_DEFAULTS.unknown,
    SignatureProvider: SCHEMA_DEFAULTS.unknown,
    NoteType: SCHEMA_DEFAULTS.unknown,
    PageNumbers: [],
  };
}

export function convertToIcd10Schema(results: Icd10CodeResults): Icd10SchemaDocument {
  const document: Icd10SchemaDocument = {};
  for (const [label, modelData] of Object.entries(results)) {
    document[label] = { ICD10Codes: modelData.ICD10Codes.map(convertResultToIcd10Schema) };
  }
  return document;
}
