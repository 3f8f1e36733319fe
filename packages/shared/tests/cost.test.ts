import { describe, it, expect } from 'vitest';
import { calculateCost } from '../src/utils/cost.js';

describe('calculateCost', () => {
  it('prices prompt and completion tokens separately', () => {
    // (2000 * 0.15 + 500 * 0.60) / 1M
    expect(calculateCost('gpt-4o-mini', { promptTokens: 2_000, completionTokens: 500 })).toBeCloseTo(0.0006, 10);
  });

  it('charges nothing for models missing from the price table', () => {
    expect(calculateCost('unknown-model', { promptTokens: 1_000, completionTokens: 1_000 })).toBe(0);
  });
});
