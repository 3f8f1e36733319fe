import { describe, it, expect, vi, afterEach } from 'vitest';
import { OllamaProvider } from '../src/providers/ollama.js';

const request = {
  model: 'llama3.2:3b',
  provider: 'ollama' as const,
  system: 'Be brief',
  messages: [{ role: 'user' as const, content: 'Hi' }],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('OllamaProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts to /api/chat and reports zero cost', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({
        model: 'llama3.2:3b',
        message: { role: 'assistant', content: 'Hello!' },
        done: true,
        prompt_eval_count: 12,
        eval_count: 3,
      }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const provider = new OllamaProvider({ baseUrl: 'http://ollama.test' });

    const response = await provider.chat(request);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test/api/chat');
    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({
      model: 'llama3.2:3b',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Hi' },
      ],
      stream: false,
      options: { temperature: 0.1, num_predict: 1024 },
    });
    expect(response.content).toBe('Hello!');
    expect(response.tokenUsage).toEqual({ promptTokens: 12, completionTokens: 3, totalTokens: 15 });
    expect(response.costUsd).toBe(0);
  });

  it('maps HTTP errors by status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('model not found', { status: 404 })));
    const provider = new OllamaProvider();

    await expect(provider.chat(request)).rejects.toMatchObject({
      kind: 'fatal',
      status: 404,
      message: 'ollama: Ollama API error (404): model not found',
    });
  });

  it('retries when the server is unreachable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));
    const provider = new OllamaProvider();

    await expect(provider.chat(request)).rejects.toMatchObject({ kind: 'retryable', reason: 'network' });
  });

  it('rejects malformed bodies', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ unexpected: true })));
    const provider = new OllamaProvider();

    await expect(provider.chat(request)).rejects.toMatchObject({ kind: 'retryable', status: 502 });
  });
});
