/**
 * AI Model Pricing Configuration
 *
 * Prices are in USD per 1000 tokens.
 */

export interface ModelPricing {
  inputTokenPrice: number;
  outputTokenPrice: number;
}

export const AI_MODEL_PRICING: Record<string, ModelPricing> = {
  "gpt-4o-mini": {
    inputTokenPrice: 0.00015,
    outputTokenPrice: 0.0006,
  },
  "gpt-4o": {
    inputTokenPrice: 0.0025,
    outputTokenPrice: 0.01,
  },
  "gpt-4.1": {
    inputTokenPrice: 0.002,
    outputTokenPrice: 0.008,
  },
  // Groq-hosted open models
  "llama-3.3-70b-versatile": {
    inputTokenPrice: 0.00059,
    outputTokenPrice: 0.00079,
  },
  "llama3-70b-8192": {
    inputTokenPrice: 0.00059,
    outputTokenPrice: 0.00079,
  },
  "mixtral-8x7b-32768": {
    inputTokenPrice: 0.00024,
    outputTokenPrice: 0.00024,
  },
  default: {
    inputTokenPrice: 0.01,
    outputTokenPrice: 0.03,
  },
};

/**
 * Exact match first, then the first key contained in the model name.
 */
export function getModelPricing(model: string): ModelPricing {
  const exact = AI_MODEL_PRICING[model];
  if (exact) {
    return exact;
  }

  for (const [key, pricing] of Object.entries(AI_MODEL_PRICING)) {
    if (key !== "default" && model.toLowerCase().includes(key.toLowerCase())) {
      return pricing;
    }
  }

  return AI_MODEL_PRICING.default;
}

export function calculateTokenCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
): { inputCost: number; outputCost: number; totalCost: number } {
  const pricing = getModelPricing(model);

  const inputCost = (inputTokens / 1000) * pricing.inputTokenPrice;
  const outputCost = (outputTokens / 1000) * pricing.outputTokenPrice;
  const totalCost = inputCost + outputCost;

  return {
    inputCost: Math.round(inputCost * 10000) / 10000,
    outputCost: Math.round(outputCost * 10000) / 10000,
    totalCost: Math.round(totalCost * 10000) / 10000,
  };
}
