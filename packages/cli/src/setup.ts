import {
  ConfigManager,
  ModelGateway,
  createLogger,
  setLogger,
  type LoadOptions,
  type Logger,
  type ScopeHandle,
} from '@tollgate/core';
import {
  AnthropicProvider,
  GoogleProvider,
  ModelProviderRegistry,
  OllamaProvider,
  OpenAIProvider,
} from '@tollgate/models';
import { toErrorPayload, type ScopeSnapshot, type TollgateConfig } from '@tollgate/shared';
import { formatError } from './output/formatter.js';

/** Registers every enabled provider that has what it needs to connect. */
export function buildProviders(config: TollgateConfig): ModelProviderRegistry {
  const registry = new ModelProviderRegistry();
  const { providers } = config;

  if (providers.ollama?.enabled) {
    registry.register(new OllamaProvider({ baseUrl: providers.ollama.baseUrl }));
  }
  if (providers.anthropic?.enabled && providers.anthropic.apiKey) {
    registry.register(new AnthropicProvider({ apiKey: providers.anthropic.apiKey }));
  }
  if (providers.openai?.enabled && providers.openai.apiKey) {
    registry.register(new OpenAIProvider({ apiKey: providers.openai.apiKey }));
  }
  if (providers.google?.enabled && providers.google.apiKey) {
    registry.register(new GoogleProvider({ apiKey: providers.google.apiKey }));
  }

  return registry;
}

export interface Session {
  config: TollgateConfig;
  gateway: ModelGateway;
  logger: Logger;
}

export async function openSession(options: LoadOptions = {}): Promise<Session> {
  const config = await new ConfigManager().load(options);
  const logger = createLogger({ level: config.logging.level });
  setLogger(logger);
  const gateway = new ModelGateway({ config, providers: buildProviders(config), logger });
  return { config, gateway, logger };
}

/** Runs `fn` under one top-level scope and reports where that scope ended up. */
export async function runScoped<T>(
  gateway: ModelGateway,
  capUsd: number | undefined,
  fn: (scope: ScopeHandle) => Promise<T>,
): Promise<{ value: T; scope: ScopeSnapshot }> {
  return gateway.withScope({ label: 'cli', capUsd }, async (scope) => {
    const value = await fn(scope);
    return { value, scope: scope.snapshot() };
  });
}

/** Cancels outstanding calls on Ctrl+C. Returns a function that removes the handler. */
export function shutdownOnInterrupt(gateway: ModelGateway): () => void {
  const onInterrupt = () => gateway.shutdown();
  process.once('SIGINT', onInterrupt);
  return () => {
    process.removeListener('SIGINT', onInterrupt);
  };
}

export function reportFailure(err: unknown): void {
  console.error(formatError(toErrorPayload(err)));
  process.exitCode = 1;
}
