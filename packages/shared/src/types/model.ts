export type ModelProviderName = 'ollama' | 'anthropic' | 'openai' | 'google';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ModelRequest {
  model: string;
  provider: ModelProviderName;
  system?: string;
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
  responseFormat?: 'text' | 'json';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ModelResponse {
  model: string;
  provider: ModelProviderName;
  content: string;
  tokenUsage: TokenUsage;
  latencyMs: number;
  /** Dollar cost reported by the adapter once the call has settled */
  costUsd: number;
  finishReason: 'stop' | 'length' | 'error';
}

export interface ChatOptions {
  /** Fires when the attempt is abandoned (timeout or caller cancellation) */
  signal?: AbortSignal;
}

export interface ModelPricing {
  inputPerMillion: number;
  outputPerMillion: number;
}
