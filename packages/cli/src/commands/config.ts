import { Command } from 'commander';
import { CONFIG_FILE_NAMES, ConfigManager } from '@tollgate/core';
import type { TollgateConfig } from '@tollgate/shared';
import { formatEndpoints } from '../output/formatter.js';
import { reportFailure } from '../setup.js';

export const ENV_VARS = [
  'TOLLGATE_ANTHROPIC_API_KEY',
  'TOLLGATE_OPENAI_API_KEY',
  'TOLLGATE_GOOGLE_API_KEY',
  'TOLLGATE_OLLAMA_BASE_URL',
  'TOLLGATE_BUDGET_CAP_USD',
  'TOLLGATE_LOG_LEVEL',
];

/** Copy of the configuration with API keys hidden. */
export function redactConfig(config: TollgateConfig): TollgateConfig {
  const providers = { ...config.providers };
  if (providers.anthropic?.apiKey) providers.anthropic = { ...providers.anthropic, apiKey: '***' };
  if (providers.openai?.apiKey) providers.openai = { ...providers.openai, apiKey: '***' };
  if (providers.google?.apiKey) providers.google = { ...providers.google, apiKey: '***' };
  return { ...config, providers };
}

interface ConfigCommandOptions {
  config?: string;
}

export const configCommand = new Command('config')
  .description('Inspect the Tollgate configuration');

configCommand
  .command('show')
  .description('Show the resolved configuration')
  .option('-c, --config <path>', 'Config file to use instead of searching for one')
  .action(async (options: ConfigCommandOptions) => {
    try {
      const config = await new ConfigManager().load({ configPath: options.config });
      console.log(JSON.stringify(redactConfig(config), null, 2));
    } catch (err) {
      reportFailure(err);
    }
  });

configCommand
  .command('path')
  .description('Show where configuration is read from')
  .action(async () => {
    try {
      const mgr = new ConfigManager();
      await mgr.load();
      console.log(`Loaded from: ${mgr.getSourcePath() ?? '(no file found, defaults only)'}`);
      console.log('');
      console.log('Config files searched in this directory and its parents (first found wins):');
      CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
      console.log('');
      console.log('Environment variables:');
      for (const name of ENV_VARS) console.log(`  ${name}`);
    } catch (err) {
      reportFailure(err);
    }
  });

configCommand
  .command('endpoints')
  .description('List configured endpoints and their limits')
  .option('-c, --config <path>', 'Config file to use instead of searching for one')
  .action(async (options: ConfigCommandOptions) => {
    try {
      const config = await new ConfigManager().load({ configPath: options.config });
      console.log(formatEndpoints(config.endpoints));
    } catch (err) {
      reportFailure(err);
    }
  });
