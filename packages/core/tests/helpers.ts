import { ModelProvider } from '@tollgate/models';
import type {
  ChatOptions,
  EndpointConfig,
  ModelProviderName,
  ModelRequest,
  ModelResponse,
} from '@tollgate/shared';

export type Step =
  | { reply: string; costUsd?: number; totalTokens?: number }
  | { fail: unknown }
  | { hang: true };

export function reply(text: string, costUsd = 0.01, totalTokens = 30): Step {
  return { reply: text, costUsd, totalTokens };
}

/** Provider that plays back a fixed script of replies and failures. */
export class ScriptedProvider extends ModelProvider {
  readonly name: ModelProviderName = 'openai';
  readonly requests: ModelRequest[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private steps: Step[], private fallback?: Step) {
    super();
  }

  async chat(request: ModelRequest, options: ChatOptions = {}): Promise<ModelResponse> {
    this.requests.push(request);
    this.signals.push(options.signal);
    const step = this.steps.shift() ?? this.fallback;
    if (!step) throw new Error('Script ran out of steps');

    if ('fail' in step) throw step.fail;
    if ('hang' in step) {
      const { signal } = options;
      return new Promise<ModelResponse>((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }

    const totalTokens = step.totalTokens ?? 30;
    return {
      model: request.model,
      provider: 'openai',
      content: step.reply,
      tokenUsage: { promptTokens: totalTokens, completionTokens: 0, totalTokens },
      latencyMs: 1,
      costUsd: step.costUsd ?? 0.01,
      finishReason: 'stop',
    };
  }
}

export function endpointConfig(overrides: Partial<EndpointConfig> = {}): EndpointConfig {
  return {
    provider: 'openai',
    model: 'gpt-4o-mini',
    limits: { periodMs: 1_000 },
    timeoutMs: 5_000,
    maxAttempts: 3,
    backoff: { baseMs: 100, multiplier: 2, maxMs: 1_000, jitter: false },
    ...overrides,
  };
}

export function collectLines(): { lines: string[]; destination: { write(msg: string): void } } {
  const lines: string[] = [];
  return { lines, destination: { write: (msg: string) => { lines.push(msg); } } };
}
