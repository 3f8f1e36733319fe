import { describe, it, expect, vi } from 'vitest';
import { settleAll } from '../src/batching.js';
import { createLogger } from '../src/logger.js';

describe('settleAll', () => {
  it('splits successes from failures without rejecting', async () => {
    const onError = vi.fn();
    const failure = new Error('two is unlucky');

    const settled = await settleAll(
      [1, 2, 3],
      async (n) => {
        if (n === 2) throw failure;
        return n * 10;
      },
      { logger: createLogger({ level: 'silent' }), onError },
    );

    expect(settled.succeeded).toEqual([{ input: 1, output: 10 }, { input: 3, output: 30 }]);
    expect(settled.failed).toEqual([{ input: 2, error: failure }]);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(failure, 2);
  });

  it('turns synchronous throws into failures', async () => {
    const settled = await settleAll(
      ['a'],
      (input: string): Promise<string> => {
        throw new Error(`bad ${input}`);
      },
      { logger: createLogger({ level: 'silent' }) },
    );
    expect(settled.succeeded).toEqual([]);
    expect(settled.failed).toHaveLength(1);
  });
});
