import type { TokenUsage } from '../types/model.js';
import { MODEL_PRICING } from '../constants.js';

const TOKENS_PER_PRICE_UNIT = 1_000_000;

/** USD cost of a settled call. Models missing from the price table cost nothing. */
export function calculateCost(model: string, usage: Pick<TokenUsage, 'promptTokens' | 'completionTokens'>): number {
  const price = MODEL_PRICING[model];
  if (!price) return 0;
  const input = usage.promptTokens * price.inputPerMillion;
  const output = usage.completionTokens * price.outputPerMillion;
  return (input + output) / TOKENS_PER_PRICE_UNIT;
}
