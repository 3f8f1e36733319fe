import { GoogleGenerativeAI, type GenerateContentResult } from '@google/generative-ai';
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

export class GoogleProvider extends ModelProvider {
  readonly name: ModelProviderName = 'google';

  private client: GoogleGenerativeAI;

  constructor(config: { apiKey: string }) {
    super();
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  async chat(request: ModelRequest, options: ChatOptions = {}): Promise<ModelResponse> {
    const startTime = monotonicNow();

    const model = this.client.getGenerativeModel({
      model: request.model,
      systemInstruction: request.system || undefined,
      generationConfig: {
        maxOutputTokens: request.maxTokens ?? DEFAULT_COMPLETION_TOKENS,
        temperature: request.temperature ?? 0.1,
        ...(request.responseFormat === 'json' ? { responseMimeType: 'application/json' } : {}),
      },
    });

    const contents = request.messages.map(m => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }],
    }));

    let result: GenerateContentResult;
    let text: string;
    try {
      result = await model.generateContent({ contents }, { signal: options.signal });
      // text() throws when the candidate was blocked
      text = result.response.text();
    } catch (err) {
      throw classifyProviderError(this.name, err);
    }

    const latencyMs = monotonicNow() - startTime;
    const usage = result.response.usageMetadata;
    const tokenUsage = {
      promptTokens: usage?.promptTokenCount ?? 0,
      completionTokens: usage?.candidatesTokenCount ?? 0,
      totalTokens: usage?.totalTokenCount ?? 0,
    };

    return {
      model: request.model,
      provider: 'google',
      content: text,
      tokenUsage,
      latencyMs,
      costUsd: calculateCost(request.model, tokenUsage),
      finishReason: 'stop',
    };
  }
}
