import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import type { ModelGateway } from '@tollgate/core';
import { TollgateError, shapeSchema, type Shape } from '@tollgate/shared';
import { formatAttempts, formatUsage } from '../output/formatter.js';
import { openSession, reportFailure, runScoped, shutdownOnInterrupt } from '../setup.js';
import { parsePositiveInt, parseUsd, type CallCommandOptions } from './options.js';

export interface TypedCommandOptions extends CallCommandOptions {
  shape: string;
}

/** Reads a shape definition from a JSON file. */
export async function loadShape(path: string): Promise<Shape> {
  const content = await readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new TollgateError('INVALID_SHAPE', `Cannot parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = shapeSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new TollgateError('INVALID_SHAPE', `Invalid shape in ${path}: ${issues.join(', ')}`);
  }
  return result.data;
}

export async function runTyped(
  gateway: ModelGateway,
  endpoint: string,
  prompt: string,
  shape: Shape,
  options: Omit<TypedCommandOptions, 'shape'>,
): Promise<string> {
  const { value: result, scope } = await runScoped(gateway, options.cap, () =>
    gateway.invokeTypedDetailed(endpoint, prompt, shape, { typedMaxAttempts: options.attempts }),
  );

  if (options.json) {
    return JSON.stringify({ value: result.value, attempts: result.attempts, scope }, null, 2);
  }
  return [
    JSON.stringify(result.value, null, 2),
    '',
    formatAttempts(result.attempts),
    formatUsage(gateway.callLog.summarize(), scope),
  ].join('\n');
}

export const typedCommand = new Command('typed')
  .description('Ask for a structured answer and validate it against a shape')
  .argument('<endpoint>', 'Endpoint name from the configuration')
  .argument('<prompt>', 'Prompt text')
  .requiredOption('-s, --shape <file>', 'JSON file describing the expected shape')
  .option('-c, --config <path>', 'Config file to use instead of searching for one')
  .option('--attempts <n>', 'Corrective attempts before giving up', parsePositiveInt)
  .option('--cap <usd>', 'Spending cap for this invocation', parseUsd)
  .option('--json', 'Output the value and every attempt as JSON')
  .action(async (endpoint: string, prompt: string, options: TypedCommandOptions) => {
    try {
      const shape = await loadShape(options.shape);
      const { config, gateway } = await openSession({ configPath: options.config });
      const detach = shutdownOnInterrupt(gateway);
      try {
        console.log(await runTyped(gateway, endpoint, prompt, shape, {
          ...options,
          cap: options.cap ?? config.budget.capUsd,
        }));
      } finally {
        detach();
      }
    } catch (err) {
      reportFailure(err);
    }
  });
