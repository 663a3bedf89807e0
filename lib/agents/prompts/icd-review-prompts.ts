/**
 * Prompt templates for the ICD review agents.
 *
 * - Validation: confirm or reject a single ICD-10 code against the summary
 * - Alternative suggestion: propose replacement codes for a rejected set
 * - Confidence: score a code 0-100 with supporting evidence phrases
 *
 * Placeholders are written as {NAME} and filled with fillPromptTemplate.
 */

export type PromptPlaceholder =
  | "ICD_CODE"
  | "DESCRIPTION"
  | "SUMMARY"
  | "PREVIOUS_CODES"
  | "REJECTED_CODES";

export const VALIDATION_PROMPT_TEMPLATE = `You are an experienced, certified ICD-10 medical coder reviewing codes proposed for a patient's clinical summary.

Code under review: {ICD_CODE}
Official description: {DESCRIPTION}

Clinical summary:
{SUMMARY}

Decide whether this code is clinically justified by the summary.

Review checklist:
1. Read the whole summary: history, symptoms, diagnostic results, treatment and medications.
2. Check that the condition named by the code is actually documented, not merely mentioned as ruled out or absent.
3. Check that the code's specificity matches the documentation (type, site, laterality, complications).
4. Consider whether a more accurate code exists for the documented condition.

Response format:
- If the code is fully supported, reply with the single word CONFIRMED.
- Otherwise reply with REJECTED, the alternative ICD-10 code you would use, and one sentence of justification quoting the summary.`;

export const ALTERNATIVE_SUGGESTION_PROMPT_TEMPLATE = `You are an experienced, certified ICD-10 medical coder refining a set of proposed diagnosis codes.

Codes proposed in the previous round: {PREVIOUS_CODES}
Codes that were rejected on review: {REJECTED_CODES}

Clinical summary:
{SUMMARY}

Re-evaluate the proposed codes against the summary and suggest the set of ICD-10 codes that best captures the documented conditions. Keep codes that are supported, replace the rejected ones with more accurate codes, and drop conditions the summary does not support.

Guidelines:
1. Base every code on explicit clinical evidence in the summary.
2. Distinguish primary from secondary diagnoses and list the primary first.
3. Use the most specific code the documentation allows.
4. Suggest at most five codes.

Return only the JSON object below, with no commentary, markdown or code fences:
{
  "finalCodes": ["code1", "code2", "code3"],
  "content": []
}`;

export const CONFIDENCE_PROMPT_TEMPLATE = `You are an experienced, certified ICD-10 medical coder assigning a confidence score to a diagnosis code.

Code: {ICD_CODE}
Official description: {DESCRIPTION}

Clinical summary:
{SUMMARY}

Score how well the code matches the documented clinical picture:
- 90 to 100: near-perfect alignment with explicit documentation
- 50 to 89: partial or indirect support
- 0 to 49: poor or no support

Also list 2-3 short evidence phrases (at most 20 words each) taken from the summary that justify the score.

Return only a JSON object with exactly these keys, no commentary:
{
  "score": 85,
  "evidence": ["phrase one", "phrase two"]
}`;

export const CONFIDENCE_CORRECTION_PROMPT =
  "Your previous response did not follow the required JSON format. Re-evaluate the code and reply with only a JSON object containing the keys 'score' (an integer from 0 to 100) and 'evidence' (a non-empty list of short phrases).";

/**
 * Replaces every occurrence of each provided placeholder. Placeholders with
 * no value are left untouched.
 */
export function fillPromptTemplate(
  template: string,
  values: Partial<Record<PromptPlaceholder, string>>,
): string {
  let prompt = template;
  for (const [placeholder, value] of Object.entries(values)) {
    if (value === undefined) continue;
    prompt = prompt.split(`{${placeholder}}`).join(value);
  }
  return prompt;
}

export const validationPrompt = (code: string, description: string, summary: string): string =>
  fillPromptTemplate(VALIDATION_PROMPT_TEMPLATE, {
    ICD_CODE: code,
    DESCRIPTION: description,
    SUMMARY: summary,
  });

export const alternativeSuggestionPrompt = (
  previousCodes: string[],
  rejectedCodes: string[],
  summary: string,
): string =>
  fillPromptTemplate(ALTERNATIVE_SUGGESTION_PROMPT_TEMPLATE, {
    PREVIOUS_CODES: previousCodes.join(", "),
    REJECTED_CODES: rejectedCodes.join(", "),
    SUMMARY: summary,
  });

export const confidencePrompt = (code: string, description: string, summary: string): string =>
  fillPromptTemplate(CONFIDENCE_PROMPT_TEMPLATE, {
    ICD_CODE: code,
    DESCRIPTION: description,
    SUMMARY: summary,
  });
