import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ModelGateway, createLogger } from '@tollgate/core';
import { ModelProvider, ModelProviderRegistry } from '@tollgate/models';
import {
  BudgetExceededError,
  tollgateConfigSchema,
  type ModelProviderName,
  type ModelRequest,
  type ModelResponse,
} from '@tollgate/shared';
import { runInvoke } from '../src/commands/invoke.js';
import { loadShape, runTyped } from '../src/commands/typed.js';
import { redactConfig } from '../src/commands/config.js';
import { buildProviders } from '../src/setup.js';

class CannedProvider extends ModelProvider {
  readonly name: ModelProviderName = 'openai';

  constructor(private replies: string[]) {
    super();
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    return {
      model: request.model,
      provider: 'openai',
      content: this.replies.shift() ?? '',
      tokenUsage: { promptTokens: 30, completionTokens: 10, totalTokens: 40 },
      latencyMs: 1,
      costUsd: 0.002,
      finishReason: 'stop',
    };
  }
}

function gatewayWith(replies: string[]): ModelGateway {
  const providers = new ModelProviderRegistry();
  providers.register(new CannedProvider(replies));
  const config = tollgateConfigSchema.parse({
    endpoints: { fast: { provider: 'openai', model: 'gpt-4o-mini' } },
  });
  return new ModelGateway({ config, providers, logger: createLogger({ level: 'silent' }) });
}

describe('invoke command', () => {
  it('prints the reply followed by usage', async () => {
    const output = await runInvoke(gatewayWith(['Hola']), 'fast', 'Say hi in Spanish', { cap: 0.5 });
    expect(output).toBe([
      'Hola',
      '',
      '--- Usage ---',
      'fast: 1 call (1 ok, 0 failed), 40 tokens, $0.0020',
      'Scope total: $0.0020 / $0.5000 cap',
    ].join('\n'));
  });

  it('prints JSON on request', async () => {
    const output = await runInvoke(gatewayWith(['Hola']), 'fast', 'Say hi', { json: true });
    expect(JSON.parse(output)).toMatchObject({ text: 'Hola', costUsd: 0.002, record: { outcome: 'success' } });
  });

  it('fails once the cap is crossed', async () => {
    await expect(runInvoke(gatewayWith(['Hola']), 'fast', 'Say hi', { cap: 0.001 })).rejects.toBeInstanceOf(
      BudgetExceededError,
    );
  });
});

describe('typed command', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tollgate-shape-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a shape file and prints the validated value', async () => {
    const path = join(dir, 'person.json');
    await writeFile(path, JSON.stringify({ kind: 'object', fields: { name: { kind: 'string' } } }));
    const shape = await loadShape(path);

    const output = await runTyped(gatewayWith(['{"name": "Ada"}']), 'fast', 'Who wrote the first program?', shape, {});

    expect(output).toBe([
      '{',
      '  "name": "Ada"',
      '}',
      '',
      'Typed attempts: 1',
      '  [1] valid',
      '--- Usage ---',
      'fast: 1 call (1 ok, 0 failed), 40 tokens, $0.0020',
      'Scope total: $0.0020 (no cap)',
    ].join('\n'));
  });

  it('rejects shape files that do not describe a shape', async () => {
    const path = join(dir, 'bad.json');
    await writeFile(path, JSON.stringify({ kind: 'number', min: 'zero' }));
    await expect(loadShape(path)).rejects.toThrow(`Invalid shape in ${path}: min: Expected number, received string`);

    await writeFile(path, '{ not json');
    await expect(loadShape(path)).rejects.toThrow(`Cannot parse ${path}`);
  });
});

describe('setup', () => {
  it('registers only providers that can connect', () => {
    const config = tollgateConfigSchema.parse({
      providers: {
        ollama: {},
        openai: { apiKey: 'test-key' },
        anthropic: {},
        google: { apiKey: 'test-key', enabled: false },
      },
    });
    expect(buildProviders(config).listAll().map(p => p.name)).toEqual(['ollama', 'openai']);
  });

  it('hides API keys when showing the configuration', () => {
    const config = tollgateConfigSchema.parse({ providers: { openai: { apiKey: 'test-key' } } });
    expect(redactConfig(config).providers.openai).toEqual({ apiKey: '***', enabled: true });
    expect(config.providers.openai?.apiKey).toBe('test-key');
  });
});
