import Anthropic from '@anthropic-ai/sdk';
import {
  calculateCost,
  monotonicNow,
  type ChatOptions,
  type ModelRequest,
  type ModelResponse,
  type ModelProviderName,
} from '@tollgate/shared';
import { classifyProviderError } from '../failure.js';
import { DEFAULT_COMPLETION_TOKENS, ModelProvider } from '../provider.js';

export class AnthropicProvider extends ModelProvider {
  readonly name: ModelProviderName = 'anthropic';

  private client: Anthropic;

  constructor(config: { apiKey: string }) {
    super();
    // Retries belong to the call envelope, not the SDK.
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async chat(request: ModelRequest, options: ChatOptions = {}): Promise<ModelResponse> {
    const startTime = monotonicNow();

    const system = [request.system, ...request.messages.filter(m => m.role === 'system').map(m => m.content)]
      .filter((part): part is string => Boolean(part))
      .join('\n\n');
    const messages = request.messages
      .filter(m => m.role !== 'system')
      .map(m => ({
        role: m.role === 'assistant' ? ('assistant' as const) : ('user' as const),
        content: m.content,
      }));

    const response = await this.client.messages
      .create(
        {
          model: request.model,
          max_tokens: request.maxTokens ?? DEFAULT_COMPLETION_TOKENS,
          ...(system ? { system } : {}),
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          messages,
        },
        { signal: options.signal },
      )
      .catch((err: unknown) => {
        throw classifyProviderError(this.name, err);
      });

    const latencyMs = monotonicNow() - startTime;
    const tokenUsage = {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    };

    const content = response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('');

    return {
      model: request.model,
      provider: 'anthropic',
      content,
      tokenUsage,
      latencyMs,
      costUsd: calculateCost(request.model, tokenUsage),
      finishReason: response.stop_reason === 'max_tokens' ? 'length' : 'stop',
    };
  }
}
