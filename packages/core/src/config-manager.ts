import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type TollgateConfig,
  DEFAULT_CONFIG,
  tollgateConfigSchema,
  ConfigError,
} from '@tollgate/shared';

export const CONFIG_FILE_NAMES = ['tollgate.config.yaml', 'tollgate.config.yml', 'tollgate.config.json'];

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface LoadOptions {
  configPath?: string;
  /** Where the upward search for a config file starts */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: TollgateConfig = DEFAULT_CONFIG;
  private sourcePath: string | null = null;

  async load(options: LoadOptions = {}): Promise<TollgateConfig> {
    const env = options.env ?? process.env;

    // 1. Config file (defaults come from the schema)
    let merged: PlainObject = {};
    const found = this.findConfigFile(options.configPath, options.cwd);
    if (found) {
      merged = deepMerge(merged, await this.parseConfigFile(found));
    }
    this.sourcePath = found;

    // 2. Environment variables
    merged = deepMerge(merged, this.loadEnvVars(env));

    // 3. Validate
    const result = tollgateConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    this.config = result.data;
    return this.config;
  }

  get<K extends keyof TollgateConfig>(key: K): TollgateConfig[K] {
    return this.config[key];
  }

  getAll(): TollgateConfig {
    return this.config;
  }

  /** File the configuration was read from, or null when only defaults and env applied. */
  getSourcePath(): string | null {
    return this.sourcePath;
  }

  private findConfigFile(configPath?: string, cwd?: string): string | null {
    if (configPath) {
      const p = resolve(cwd ?? process.cwd(), configPath);
      if (!existsSync(p)) {
        throw new ConfigError(`Config file not found: ${p}`);
      }
      return p;
    }

    // Search cwd and parent directories
    let dir = resolve(cwd ?? process.cwd());
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return p;
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<PlainObject> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }

  private loadEnvVars(env: NodeJS.ProcessEnv): PlainObject {
    const config: PlainObject = {};
    const providers: PlainObject = {};

    if (env.TOLLGATE_ANTHROPIC_API_KEY) {
      providers.anthropic = { apiKey: env.TOLLGATE_ANTHROPIC_API_KEY, enabled: true };
    }
    if (env.TOLLGATE_OPENAI_API_KEY) {
      providers.openai = { apiKey: env.TOLLGATE_OPENAI_API_KEY, enabled: true };
    }
    if (env.TOLLGATE_GOOGLE_API_KEY) {
      providers.google = { apiKey: env.TOLLGATE_GOOGLE_API_KEY, enabled: true };
    }
    if (env.TOLLGATE_OLLAMA_BASE_URL) {
      providers.ollama = { baseUrl: env.TOLLGATE_OLLAMA_BASE_URL, enabled: true };
    }
    if (Object.keys(providers).length > 0) {
      config.providers = providers;
    }

    if (env.TOLLGATE_BUDGET_CAP_USD) {
      // NaN is left for the schema to reject
      config.budget = { capUsd: Number(env.TOLLGATE_BUDGET_CAP_USD) };
    }

    if (env.TOLLGATE_LOG_LEVEL) {
      config.logging = { level: env.TOLLGATE_LOG_LEVEL };
    }

    return config;
  }
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const from = source[key];
    const into = target[key];
    result[key] = isPlainObject(from) && isPlainObject(into) ? deepMerge(into, from) : from;
  }
  return result;
}
