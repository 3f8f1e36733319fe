import { describe, it, expect } from 'vitest';
import { TollgateError } from '@tollgate/shared';
import { CallLog } from '../src/call-log.js';

const start = { endpoint: 'fast', estimatedTokens: 100, scopeChain: ['scope_a'] };

describe('CallLog', () => {
  it('tracks attempts and settles a record once', () => {
    const log = new CallLog();
    const record = log.begin(start);

    expect(record).toMatchObject({ outcome: 'pending', attempt: 0, actualTokens: null, costUsd: null });

    log.recordAttempt(record.id, { attempt: 1, outcome: 'timeout', admissionWaitMs: 0, latencyMs: 1_000 });
    log.recordAttempt(record.id, { attempt: 2, outcome: 'success', admissionWaitMs: 20, latencyMs: 300 });
    const settled = log.finalize(record.id, { outcome: 'success', actualTokens: 80, costUsd: 0.002 });

    expect(settled.attempt).toBe(2);
    expect(settled.attempts.map(a => a.outcome)).toEqual(['timeout', 'success']);
    expect(settled.actualTokens).toBe(80);
    expect(settled.finishedAt).toBeDefined();
    expect(() => log.finalize(record.id, { outcome: 'fatal_error' })).toThrow(TollgateError);
    expect(() => log.recordAttempt(record.id, {
      attempt: 3, outcome: 'success', admissionWaitMs: 0, latencyMs: 1,
    })).toThrow('already finalized as success');
  });

  it('rejects unknown ids', () => {
    const log = new CallLog();
    expect(() => log.finalize('call_missing', { outcome: 'success' })).toThrow('No call record with id call_missing');
  });

  it('copies the scope chain', () => {
    const chain = ['scope_a', 'scope_b'];
    const record = new CallLog().begin({ ...start, scopeChain: chain });
    chain.push('scope_c');
    expect(record.scopeChain).toEqual(['scope_a', 'scope_b']);
  });

  it('lists and summarizes per endpoint', () => {
    const log = new CallLog();
    const a = log.begin(start);
    const b = log.begin(start);
    log.begin(start);
    const c = log.begin({ ...start, endpoint: 'slow' });
    log.finalize(a.id, { outcome: 'success', actualTokens: 50, costUsd: 0.25 });
    log.finalize(b.id, { outcome: 'exhausted' });
    log.finalize(c.id, { outcome: 'success', actualTokens: 10, costUsd: 0.5 });

    expect(log.list('fast')).toHaveLength(3);
    expect(log.list()).toHaveLength(4);
    expect(log.summarize()).toEqual([
      { endpoint: 'fast', calls: 3, successes: 1, failures: 1, pending: 1, totalTokens: 50, totalCostUsd: 0.25 },
      { endpoint: 'slow', calls: 1, successes: 1, failures: 0, pending: 0, totalTokens: 10, totalCostUsd: 0.5 },
    ]);
  });

  it('drops the oldest finished records past the limit', () => {
    const log = new CallLog(2);
    const pending = log.begin(start);
    const done = log.begin(start);
    log.finalize(done.id, { outcome: 'success' });
    const latest = log.begin(start);

    expect(log.get(done.id)).toBeUndefined();
    expect(log.list().map(r => r.id)).toEqual([pending.id, latest.id]);
  });
});
