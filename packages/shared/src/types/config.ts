import type { ModelProviderName } from './model.js';

export interface EndpointLimits {
  requestsPerPeriod?: number;
  tokensPerPeriod?: number;
  periodMs: number;
  maxConcurrent?: number;
}

export interface BackoffConfig {
  baseMs: number;
  multiplier: number;
  maxMs: number;
  /** Full jitter: wait a random time between 0 and the computed delay */
  jitter: boolean;
}

export interface EndpointConfig {
  provider: ModelProviderName;
  model: string;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  limits: EndpointLimits;
  timeoutMs: number;
  maxAttempts: number;
  /** Give up waiting for admission after this long; unset waits indefinitely */
  admissionDeadlineMs?: number;
  backoff: BackoffConfig;
}

export interface ProvidersConfig {
  ollama?: {
    baseUrl: string;
    enabled: boolean;
  };
  anthropic?: {
    apiKey?: string;
    enabled: boolean;
  };
  openai?: {
    apiKey?: string;
    enabled: boolean;
  };
  google?: {
    apiKey?: string;
    enabled: boolean;
  };
}

export interface BudgetConfig {
  /** Cap for the scope every CLI invocation runs under */
  capUsd?: number;
}

export interface TypedConfig {
  maxAttempts: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
}

export interface TollgateConfig {
  providers: ProvidersConfig;
  endpoints: Record<string, EndpointConfig>;
  budget: BudgetConfig;
  typed: TypedConfig;
  logging: LoggingConfig;
}
