import { describe, it, expect, vi, beforeEach } from 'vitest';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: vi.fn().mockImplementation(function () {
    return { messages: { create } };
  }),
}));

import Anthropic from '@anthropic-ai/sdk';
import { ProviderFailure } from '@tollgate/shared';
import { AnthropicProvider } from '../src/providers/anthropic.js';

describe('AnthropicProvider', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('disables SDK retries', () => {
    new AnthropicProvider({ apiKey: 'test-key' });
    expect(Anthropic).toHaveBeenCalledWith({ apiKey: 'test-key', maxRetries: 0 });
  });

  it('maps the request and response', async () => {
    create.mockResolvedValue({
      content: [
        { type: 'text', text: 'Hello' },
        { type: 'text', text: ' there' },
      ],
      usage: { input_tokens: 1000, output_tokens: 500 },
      stop_reason: 'end_turn',
    });
    const provider = new AnthropicProvider({ apiKey: 'test-key' });
    const controller = new AbortController();

    const response = await provider.chat(
      {
        model: 'claude-3-5-haiku-20241022',
        provider: 'anthropic',
        system: 'Be brief',
        messages: [
          { role: 'system', content: 'Answer in English' },
          { role: 'user', content: 'Hi' },
        ],
      },
      { signal: controller.signal },
    );

    expect(create).toHaveBeenCalledWith(
      {
        model: 'claude-3-5-haiku-20241022',
        max_tokens: 1024,
        system: 'Be brief\n\nAnswer in English',
        messages: [{ role: 'user', content: 'Hi' }],
      },
      { signal: controller.signal },
    );
    expect(response.content).toBe('Hello there');
    expect(response.tokenUsage).toEqual({ promptTokens: 1000, completionTokens: 500, totalTokens: 1500 });
    // (1000 * 0.80 + 500 * 4.00) / 1M
    expect(response.costUsd).toBeCloseTo(0.0028, 10);
    expect(response.finishReason).toBe('stop');
  });

  it('reports truncation', async () => {
    create.mockResolvedValue({
      content: [{ type: 'text', text: 'cut' }],
      usage: { input_tokens: 1, output_tokens: 1 },
      stop_reason: 'max_tokens',
    });
    const provider = new AnthropicProvider({ apiKey: 'test-key' });
    const response = await provider.chat({
      model: 'claude-3-5-haiku-20241022',
      provider: 'anthropic',
      messages: [{ role: 'user', content: 'Hi' }],
    });
    expect(response.finishReason).toBe('length');
  });

  it('classifies SDK errors', async () => {
    create.mockRejectedValueOnce(Object.assign(new Error('Overloaded'), { status: 529 }));
    create.mockRejectedValueOnce(Object.assign(new Error('invalid x-api-key'), { status: 401 }));
    const provider = new AnthropicProvider({ apiKey: 'test-key' });
    const request = {
      model: 'claude-3-5-haiku-20241022',
      provider: 'anthropic' as const,
      messages: [{ role: 'user' as const, content: 'Hi' }],
    };

    const overloaded = await provider.chat(request).catch((err: unknown) => err);
    expect(overloaded).toBeInstanceOf(ProviderFailure);
    expect(overloaded).toMatchObject({ kind: 'retryable', status: 529, message: 'anthropic: Overloaded' });

    const unauthorized = await provider.chat(request).catch((err: unknown) => err);
    expect(unauthorized).toMatchObject({ kind: 'fatal', reason: 'auth' });
  });

  it('estimates tokens from the prompt and completion budget', () => {
    const provider = new AnthropicProvider({ apiKey: 'test-key' });
    const request = {
      model: 'claude-3-5-haiku-20241022',
      provider: 'anthropic' as const,
      system: 'abcd',
      messages: [{ role: 'user' as const, content: 'abcdefgh' }],
    };
    expect(provider.estimateTokens({ ...request, maxTokens: 100 })).toBe(103);
    expect(provider.estimateTokens(request)).toBe(1027);
  });
});
