import { getLogger, type Logger } from './logger.js';

export interface Settled<I, O> {
  succeeded: Array<{ input: I; output: O }>;
  failed: Array<{ input: I; error: unknown }>;
}

export interface SettleOptions<I> {
  logger?: Logger;
  onError?: (error: unknown, input: I) => void;
}

/**
 * Runs `fn` over every input concurrently and splits the outcomes. Failures
 * are logged and reported through `onError` instead of rejecting the batch.
 */
export async function settleAll<I, O>(
  inputs: readonly I[],
  fn: (input: I) => Promise<O>,
  options: SettleOptions<I> = {},
): Promise<Settled<I, O>> {
  const logger = (options.logger ?? getLogger()).child({ component: 'batching' });
  const outcomes = await Promise.allSettled(inputs.map(async input => fn(input)));

  const settled: Settled<I, O> = { succeeded: [], failed: [] };
  outcomes.forEach((outcome, i) => {
    const input = inputs[i];
    if (outcome.status === 'fulfilled') {
      settled.succeeded.push({ input, output: outcome.value });
      return;
    }
    const error: unknown = outcome.reason;
    logger.warn({ index: i, err: error instanceof Error ? error.message : String(error) }, 'Batch item failed');
    options.onError?.(error, input);
    settled.failed.push({ input, error });
  });

  if (settled.failed.length > 0) {
    logger.info({ succeeded: settled.succeeded.length, failed: settled.failed.length }, 'Batch finished with failures');
  }
  return settled;
}
