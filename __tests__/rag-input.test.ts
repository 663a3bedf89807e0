/**
 * Tests for resolving the two retrieval output shapes
 */

import {
  RagOutputFormatError,
  detectRagOutputFormat,
  jointSummary,
  resolveRagOutput,
} from '../lib/workflow/rag-input';

describe('resolveRagOutput', () => {
  test('should resolve the final-codes shape', () => {
    const resolved = resolveRagOutput({
      finalCodes: ['I10'],
      content: [{ disease: 'Hypertension', summary: 'Blood pressure was high.' }],
    });

    expect(resolved).toEqual({
      format: 'final-codes',
      codes: ['I10'],
      summaries: [{ disease: 'Hypertension', text: 'Blood pressure was high.' }],
    });
  });

  test('should resolve the chart shape with its metadata', () => {
    const resolved = resolveRagOutput({
      chartId: 'chart-test',
      MemberId: 'member-test',
      dxCodes: ['G51.0'],
      summaryInfo: [{ text: 'Facial weakness persists.' }],
    });

    expect(resolved).toEqual({
      format: 'chart',
      codes: ['G51.0'],
      summaries: [{ disease: '', text: 'Facial weakness persists.' }],
      chart: {
        chartId: 'chart-test',
        memberId: 'member-test',
        llm: undefined,
        previouslySubmittedCodes: [],
      },
    });
  });

  test('should default missing arrays to empty', () => {
    expect(resolveRagOutput({})).toEqual({ format: 'final-codes', codes: [], summaries: [] });
    expect(resolveRagOutput({ summaryInfo: [] }).codes).toEqual([]);
  });

  test('should read a missing summary as empty text', () => {
    expect(resolveRagOutput({ finalCodes: [], content: [{ disease: 'Flu' }] }).summaries).toEqual([
      { disease: 'Flu', text: '' },
    ]);
  });

  test('should reject input that is not an object', () => {
    expect(() => resolveRagOutput('I10')).toThrow(RagOutputFormatError);
    expect(() => resolveRagOutput(['I10'])).toThrow(RagOutputFormatError);
    expect(() => resolveRagOutput(null)).toThrow('RAG output must be a JSON object');
  });

  test('should reject arrays of the wrong type', () => {
    try {
      resolveRagOutput({ finalCodes: 'I10' });
      throw new Error('expected resolveRagOutput to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(RagOutputFormatError);
      expect(error).toHaveProperty('code', 'INVALID_RAG_OUTPUT');
    }
  });
});

describe('detectRagOutputFormat', () => {
  test('should recognise the chart shape by its keys', () => {
    expect(detectRagOutputFormat({ dxCodes: [] })).toBe('chart');
    expect(detectRagOutputFormat({ finalCodes: [] })).toBe('final-codes');
  });
});

describe('jointSummary', () => {
  test('should join summary texts with newlines', () => {
    const resolved = resolveRagOutput({
      content: [{ summary: 'First.' }, { summary: 'Second.' }],
    });
    expect(jointSummary(resolved)).toBe('First.\nSecond.');
  });
});
