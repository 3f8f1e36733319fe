import { describe, it, expect } from 'vitest';
import { shapeSchema } from '../src/schemas/shape.schema.js';
import { tollgateConfigSchema } from '../src/schemas/config.schema.js';

describe('shapeSchema', () => {
  it('accepts nested shapes', () => {
    const result = shapeSchema.safeParse({
      kind: 'object',
      fields: {
        probability: { kind: 'number', min: 0, max: 1 },
        factors: { kind: 'list', items: { kind: 'string' } },
        weights: { kind: 'mapping', values: { kind: 'number' } },
      },
    });
    expect(result.success).toBe(true);
  });

  it('rejects an enum without values', () => {
    const result = shapeSchema.safeParse({ kind: 'enum', values: [] });
    expect(result.success).toBe(false);
  });

  it('rejects unknown kinds deep in the tree', () => {
    const result = shapeSchema.safeParse({
      kind: 'list',
      items: { kind: 'tuple' },
    });
    expect(result.success).toBe(false);
  });
});

describe('tollgateConfigSchema', () => {
  it('fills endpoint defaults', () => {
    const config = tollgateConfigSchema.parse({
      endpoints: {
        fast: { provider: 'openai', model: 'gpt-4o-mini' },
      },
    });
    const fast = config.endpoints.fast;
    expect(fast.timeoutMs).toBe(120_000);
    expect(fast.maxAttempts).toBe(3);
    expect(fast.limits).toEqual({ requestsPerPeriod: 60, tokensPerPeriod: 200_000, periodMs: 60_000 });
    expect(fast.backoff).toEqual({ baseMs: 1_000, multiplier: 2, maxMs: 60_000, jitter: true });
    expect(config.typed.maxAttempts).toBe(3);
    expect(config.logging.level).toBe('info');
  });

  it('rejects a zero attempt budget', () => {
    const result = tollgateConfigSchema.safeParse({
      endpoints: { fast: { provider: 'openai', model: 'gpt-4o-mini', maxAttempts: 0 } },
    });
    expect(result.success).toBe(false);
  });
});
