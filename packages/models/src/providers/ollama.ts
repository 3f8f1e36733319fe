import { z } from 'zod';
import {
  monotonicNow,
  type ChatOptions,
  type ModelRequest,
  type ModelResponse,
  type ModelProviderName,
} from '@tollgate/shared';
import { classifyProviderError, failureForStatus } from '../failure.js';
import { DEFAULT_COMPLETION_TOKENS, ModelProvider } from '../provider.js';

const ollamaChatResponseSchema = z.object({
  model: z.string(),
  message: z.object({ role: z.string(), content: z.string() }).optional(),
  done: z.boolean(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export class OllamaProvider extends ModelProvider {
  readonly name: ModelProviderName = 'ollama';

  private baseUrl: string;

  constructor(config: { baseUrl?: string } = {}) {
    super();
    this.baseUrl = config.baseUrl ?? 'http://localhost:11434';
  }

  async chat(request: ModelRequest, options: ChatOptions = {}): Promise<ModelResponse> {
    const startTime = monotonicNow();

    const messages: Array<{ role: string; content: string }> = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    for (const msg of request.messages) {
      messages.push({ role: msg.role, content: msg.content });
    }

    const body = {
      model: request.model,
      messages,
      stream: false,
      options: {
        temperature: request.temperature ?? 0.1,
        num_predict: request.maxTokens ?? DEFAULT_COMPLETION_TOKENS,
      },
      ...(request.responseFormat === 'json' ? { format: 'json' } : {}),
    };

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (err) {
      throw classifyProviderError(this.name, err);
    }

    if (!res.ok) {
      const text = await res.text();
      throw failureForStatus(this.name, res.status, `Ollama API error (${res.status}): ${text}`);
    }

    const parsed = ollamaChatResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw failureForStatus(this.name, 502, `Unexpected Ollama response: ${parsed.error.message}`);
    }
    const data = parsed.data;
    const latencyMs = monotonicNow() - startTime;
    const promptTokens = data.prompt_eval_count ?? 0;
    const completionTokens = data.eval_count ?? 0;

    return {
      model: data.model,
      provider: 'ollama',
      content: data.message?.content ?? '',
      tokenUsage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
      latencyMs,
      costUsd: 0, // Local = free
      finishReason: data.done_reason === 'length' ? 'length' : 'stop',
    };
  }
}
