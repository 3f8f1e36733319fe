import type { BackoffConfig, EndpointLimits, TollgateConfig } from './types/config.js';
import type { ModelPricing } from './types/model.js';

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseMs: 1_000,
  multiplier: 2,
  maxMs: 60_000,
  jitter: true,
};

export const DEFAULT_LIMITS: EndpointLimits = {
  requestsPerPeriod: 60,
  tokensPerPeriod: 200_000,
  periodMs: 60_000,
};

export const DEFAULT_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_TYPED_MAX_ATTEMPTS = 3;

/** Float slack when comparing accumulated USD totals against caps */
export const BUDGET_EPSILON_USD = 1e-9;

export const DEFAULT_CONFIG: TollgateConfig = {
  providers: {},
  endpoints: {},
  budget: {},
  typed: {
    maxAttempts: DEFAULT_TYPED_MAX_ATTEMPTS,
  },
  logging: {
    level: 'info',
  },
};

export const MODEL_PRICING: Record<string, ModelPricing> = {
  // Anthropic
  'claude-3-5-haiku-20241022': { inputPerMillion: 0.80, outputPerMillion: 4.00 },
  'claude-3-5-sonnet-20241022': { inputPerMillion: 3.00, outputPerMillion: 15.00 },
  'claude-sonnet-4-20250514': { inputPerMillion: 3.00, outputPerMillion: 15.00 },
  'claude-opus-4-20250514': { inputPerMillion: 15.00, outputPerMillion: 75.00 },
  // OpenAI
  'gpt-4o-mini': { inputPerMillion: 0.15, outputPerMillion: 0.60 },
  'gpt-4o': { inputPerMillion: 2.50, outputPerMillion: 10.00 },
  'o1': { inputPerMillion: 15.00, outputPerMillion: 60.00 },
  // Google
  'gemini-2.0-flash': { inputPerMillion: 0.10, outputPerMillion: 0.40 },
  'gemini-1.5-pro': { inputPerMillion: 1.25, outputPerMillion: 5.00 },
  // Ollama (local = free)
  'llama3.2:3b': { inputPerMillion: 0, outputPerMillion: 0 },
  'qwen2.5:7b': { inputPerMillion: 0, outputPerMillion: 0 },
};
