/**
 * Tests for the confidence report and ICD-10 schema output
 */

import { ModelResults } from '../lib/agents/types';
import { formatConfidenceReport } from '../lib/coder/confidence-report';
import {
  convertResultToIcd10Schema,
  convertToIcd10Schema,
  formatIcd10CodeResults,
} from '../lib/coder/icd10-schema-transformer';

const results: ModelResults = {
  OpenAI: [
    {
      code: 'I10',
      description: 'Essential (primary) hypertension',
      confidenceScore: 80,
      modelEvidence: ['BP 158/94'],
      summaryEvidence: ['Blood pressure was elevated at 158/94 on two separate visits during the spring.'],
    },
  ],
  Mistral: [],
};

describe('formatConfidenceReport', () => {
  test('should list each code with the model evidence', () => {
    expect(formatConfidenceReport(results)).toEqual({
      OpenAI: [{ icd_code: 'I10', confidence: 80, evidence: ['BP 158/94'] }],
      Mistral: [],
    });
  });
});

describe('formatIcd10CodeResults', () => {
  test('should carry the summary evidence', () => {
    expect(formatIcd10CodeResults(results)).toEqual({
      OpenAI: {
        ICD10Codes: [
          {
            code: 'I10',
            description: 'Essential (primary) hypertension',
            confidence_score: 80,
            evidence: ['Blood pressure was elevated at 158/94 on two separate visits during the spring.'],
          },
        ],
      },
      Mistral: { ICD10Codes: [] },
    });
  });
});

describe('convertResultToIcd10Schema', () => {
  test('should map a scored code with fixed placeholders', () => {
    const entry = convertResultToIcd10Schema({
      code: 'I10',
      description: 'Essential (primary) hypertension',
      confidence_score: 80,
      evidence: ['Blood pressure was elevated at 158/94 on two separate visits during the spring.', 'Second.'],
    });

    expect(entry).toEqual({
      Text: 'Blood pressure was elevated at 158/94 on two separate visits',
      disease: 'Essential (primary) hypertension',
      Category: 'General',
      Type: 'Default',
      Score: 80,
      Attributes: [
        {
          type: 'evidence',
          score: 80,
          relationshipScore: 50,
          text: 'Blood pressure was elevated at 158/94 on two separate visits during the spring.',
        },
        { type: 'evidence', score: 80, relationshipScore: 50, text: 'Second.' },
      ],
      Traits: [{ Name: 'default', Score: 80 }],
      ICD10CMConcepts: [{ Description: 'Essential (primary) hypertension', Code: 'I10', hccCode: '24', Score: 80 }],
      DOS: '01-01-2020',
      Provider: 'Unknown Provider',
      PlaceOfService: 'Unknown',
      SignatureProvider: 'Unknown',
      NoteType: 'Unknown',
      PageNumbers: [],
    });
  });

  test('should fill defaults for an empty result', () => {
    const entry = convertResultToIcd10Schema({});

    expect(entry.Text).toBe('No text provided');
    expect(entry.disease).toBe('Unknown disease');
    expect(entry.Score).toBe(50);
    expect(entry.Attributes).toEqual([
      { type: 'evidence', score: 50, relationshipScore: 50, text: 'No evidence provided' },
    ]);
    expect(entry.ICD10CMConcepts).toEqual([{ Description: 'No description', Code: 'Unknown', hccCode: '24', Score: 50 }]);
  });

  test('should produce no attributes for an explicitly empty evidence list', () => {
    const entry = convertResultToIcd10Schema({ code: 'R51', evidence: [] });

    expect(entry.Text).toBe('No text provided');
    expect(entry.Attributes).toEqual([]);
  });
});

describe('convertToIcd10Schema', () => {
  test('should keep the model labels and order', () => {
    const document = convertToIcd10Schema(formatIcd10CodeResults(results));

    expect(Object.keys(document)).toEqual(['OpenAI', 'Mistral']);
    expect(document.OpenAI.ICD10Codes[0].Text).toBe('Blood pressure was elevated at 158/94 on two separate visits');
    expect(document.Mistral.ICD10Codes).toEqual([]);
  });
});
