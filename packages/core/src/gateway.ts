import {
  UnknownEndpointError,
  ConfigError,
  DEFAULT_TYPED_MAX_ATTEMPTS,
  linkSignals,
  realClock,
  type CallResult,
  type Clock,
  type EndpointConfig,
  type InferShape,
  type ScopeOptions,
  type ScopeSnapshot,
  type Shape,
  type TollgateConfig,
} from '@tollgate/shared';
import type { ModelProviderRegistry } from '@tollgate/models';
import { AdmissionLimiter, type LimiterStats } from './admission-limiter.js';
import { BudgetLedger, type ScopeHandle } from './budget-ledger.js';
import { CallEnvelope, type ExecuteOptions } from './call-envelope.js';
import { CallLog } from './call-log.js';
import { getLogger, type Logger } from './logger.js';
import {
  runSemanticLoop,
  shapeInterpreter,
  yesNoInterpreter,
  type ResponseInterpreter,
  type TypedResult,
} from './typed-invocation.js';

export interface ModelGatewayOptions {
  config: Pick<TollgateConfig, 'endpoints'> & Partial<Pick<TollgateConfig, 'typed'>>;
  providers: ModelProviderRegistry;
  ledger?: BudgetLedger;
  callLog?: CallLog;
  clock?: Clock;
  logger?: Logger;
  random?: () => number;
}

export type InvokeOptions = Omit<ExecuteOptions, 'responseFormat'>;

export interface TypedInvokeOptions extends InvokeOptions {
  /** Semantic attempts; transport retries happen inside each one */
  typedMaxAttempts?: number;
}

interface Endpoint {
  config: EndpointConfig;
  limiter: AdmissionLimiter;
  envelope: CallEnvelope;
}

/**
 * Entry point for callers: one limiter and envelope per configured endpoint,
 * a shared budget ledger, and text, typed and yes/no invocation on top.
 */
export class ModelGateway {
  readonly ledger: BudgetLedger;
  readonly callLog: CallLog;

  private endpoints = new Map<string, Endpoint>();
  private shutdownController = new AbortController();
  private typedMaxAttempts: number;
  private logger: Logger;
  private rootLogger: Logger;

  constructor(options: ModelGatewayOptions) {
    const clock = options.clock ?? realClock;
    const logger = options.logger ?? getLogger();
    this.rootLogger = logger;
    this.logger = logger.child({ component: 'gateway' });
    this.ledger = options.ledger ?? new BudgetLedger({ logger });
    this.callLog = options.callLog ?? new CallLog();
    this.typedMaxAttempts = options.config.typed?.maxAttempts ?? DEFAULT_TYPED_MAX_ATTEMPTS;

    for (const [name, config] of Object.entries(options.config.endpoints)) {
      const provider = options.providers.get(config.provider);
      if (!provider) {
        throw new ConfigError(`endpoints.${name}: provider "${config.provider}" is not configured`);
      }
      const limiter = new AdmissionLimiter({ endpoint: name, limits: config.limits, clock, logger });
      const envelope = new CallEnvelope({
        endpoint: name,
        config,
        provider,
        limiter,
        ledger: this.ledger,
        callLog: this.callLog,
        clock,
        logger,
        random: options.random,
      });
      this.endpoints.set(name, { config, limiter, envelope });
    }
  }

  listEndpoints(): string[] {
    return Array.from(this.endpoints.keys());
  }

  /** Opens a scope that stays current for the calling call tree until closed. */
  openScope(options: ScopeOptions = {}): ScopeHandle {
    return this.ledger.openScope(options);
  }

  withScope<T>(options: ScopeOptions, fn: (scope: ScopeHandle) => Promise<T> | T): Promise<T> {
    return this.ledger.withScope(options, fn);
  }

  currentUsage(scope?: ScopeHandle): number {
    return this.ledger.currentUsage(scope);
  }

  amountLeft(scope?: ScopeHandle): number {
    return this.ledger.amountLeft(scope);
  }

  scopeChain(scope?: ScopeHandle): ScopeSnapshot[] {
    return this.ledger.chain(scope);
  }

  async invoke(endpoint: string, prompt: string, options: InvokeOptions = {}): Promise<string> {
    const result = await this.invokeDetailed(endpoint, prompt, options);
    return result.text;
  }

  invokeDetailed(endpoint: string, prompt: string, options: InvokeOptions = {}): Promise<CallResult> {
    return this.execute(endpoint, prompt, options);
  }

  async invokeTyped<S extends Shape>(
    endpoint: string,
    prompt: string,
    shape: S,
    options: TypedInvokeOptions = {},
  ): Promise<InferShape<S>> {
    const result = await this.invokeTypedDetailed(endpoint, prompt, shape, options);
    return result.value;
  }

  invokeTypedDetailed<S extends Shape>(
    endpoint: string,
    prompt: string,
    shape: S,
    options: TypedInvokeOptions = {},
  ): Promise<TypedResult<InferShape<S>>> {
    // JSON modes of the providers only produce objects
    const json = shape.kind === 'object' || shape.kind === 'mapping';
    return this.runTyped(endpoint, prompt, shapeInterpreter(shape), options, json);
  }

  /** Asks for a final YES or NO; the last keyword in the answer decides. */
  async invokeYesNo(endpoint: string, prompt: string, options: TypedInvokeOptions = {}): Promise<boolean> {
    const result = await this.runTyped(endpoint, prompt, yesNoInterpreter, options, false);
    return result.value;
  }

  stats(): Record<string, LimiterStats> {
    const stats: Record<string, LimiterStats> = {};
    for (const [name, { limiter }] of this.endpoints) {
      stats[name] = limiter.stats();
    }
    return stats;
  }

  /** Cancels every pending and future call made through this gateway. */
  shutdown(): void {
    if (this.shutdownController.signal.aborted) return;
    this.logger.info('Gateway shutting down');
    this.shutdownController.abort();
  }

  private async runTyped<T>(
    endpoint: string,
    prompt: string,
    interpreter: ResponseInterpreter<T>,
    options: TypedInvokeOptions,
    json: boolean,
  ): Promise<TypedResult<T>> {
    const { typedMaxAttempts, ...callOptions } = options;
    this.resolve(endpoint);
    return runSemanticLoop(
      prompt,
      interpreter,
      attemptPrompt => this.execute(endpoint, attemptPrompt, {
        ...callOptions,
        ...(json ? { responseFormat: 'json' as const } : {}),
      }),
      { endpoint, maxAttempts: typedMaxAttempts ?? this.typedMaxAttempts, logger: this.rootLogger },
    );
  }

  private async execute(endpoint: string, prompt: string, options: ExecuteOptions): Promise<CallResult> {
    const { envelope } = this.resolve(endpoint);
    const linked = linkSignals(options.signal, this.shutdownController.signal);
    try {
      return await envelope.execute([{ role: 'user', content: prompt }], { ...options, signal: linked.signal });
    } finally {
      linked.dispose();
    }
  }

  private resolve(endpoint: string): Endpoint {
    const found = this.endpoints.get(endpoint);
    if (!found) throw new UnknownEndpointError(endpoint);
    return found;
  }
}
