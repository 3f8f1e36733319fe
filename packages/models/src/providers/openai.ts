import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import {
  calculateCost,
  monotonicNow,
  type ChatMessage,
  type ChatOptions,
  type ModelRequest,
  type ModelResponse,
  type ModelProviderName,
} from '@tollgate/shared';
import { classifyProviderError } from '../failure.js';
import { DEFAULT_COMPLETION_TOKENS, ModelProvider } from '../provider.js';

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAIProvider extends ModelProvider {
  readonly name: ModelProviderName = 'openai';

  private client: OpenAI;

  constructor(config: { apiKey: string; baseURL?: string }) {
    super();
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
  }

  async chat(request: ModelRequest, options: ChatOptions = {}): Promise<ModelResponse> {
    const startTime = monotonicNow();

    const messages: ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    messages.push(...request.messages.map(toMessageParam));

    const response = await this.client.chat.completions
      .create(
        {
          model: request.model,
          messages,
          max_tokens: request.maxTokens ?? DEFAULT_COMPLETION_TOKENS,
          temperature: request.temperature ?? 0.1,
          ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
        },
        { signal: options.signal },
      )
      .catch((err: unknown) => {
        throw classifyProviderError(this.name, err);
      });

    const latencyMs = monotonicNow() - startTime;
    const choice = response.choices[0];
    const tokenUsage = {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    };

    return {
      model: request.model,
      provider: 'openai',
      content: choice?.message?.content ?? '',
      tokenUsage,
      latencyMs,
      costUsd: calculateCost(request.model, tokenUsage),
      finishReason: choice?.finish_reason === 'length' ? 'length' : 'stop',
    };
  }
}
