import { Command } from 'commander';
import type { ModelGateway } from '@tollgate/core';
import { formatUsage } from '../output/formatter.js';
import { openSession, reportFailure, runScoped, shutdownOnInterrupt } from '../setup.js';
import { parsePositiveInt, parseUsd, type CallCommandOptions } from './options.js';

export interface InvokeCommandOptions extends CallCommandOptions {
  timeout?: number;
}

export async function runInvoke(
  gateway: ModelGateway,
  endpoint: string,
  prompt: string,
  options: InvokeCommandOptions,
): Promise<string> {
  const { value: result, scope } = await runScoped(gateway, options.cap, () =>
    gateway.invokeDetailed(endpoint, prompt, { timeoutMs: options.timeout, maxAttempts: options.attempts }),
  );

  if (options.json) {
    return JSON.stringify({ text: result.text, costUsd: result.costUsd, record: result.record, scope }, null, 2);
  }
  return [result.text, '', formatUsage(gateway.callLog.summarize(), scope)].join('\n');
}

export const invokeCommand = new Command('invoke')
  .description('Send a prompt to an endpoint and print the reply')
  .argument('<endpoint>', 'Endpoint name from the configuration')
  .argument('<prompt>', 'Prompt text')
  .option('-c, --config <path>', 'Config file to use instead of searching for one')
  .option('--timeout <ms>', 'Per-attempt timeout', parsePositiveInt)
  .option('--attempts <n>', 'Transport attempts', parsePositiveInt)
  .option('--cap <usd>', 'Spending cap for this invocation', parseUsd)
  .option('--json', 'Output the reply and its call record as JSON')
  .action(async (endpoint: string, prompt: string, options: InvokeCommandOptions) => {
    try {
      const { config, gateway } = await openSession({ configPath: options.config });
      const detach = shutdownOnInterrupt(gateway);
      try {
        console.log(await runInvoke(gateway, endpoint, prompt, { ...options, cap: options.cap ?? config.budget.capUsd }));
      } finally {
        detach();
      }
    } catch (err) {
      reportFailure(err);
    }
  });
