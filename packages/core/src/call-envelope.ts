import {
  AdmissionTimeoutError,
  BudgetExceededError,
  CallCancelledError,
  CallExhaustedError,
  CallTimeoutError,
  ProviderFailure,
  ProviderFatalError,
  linkSignals,
  realClock,
  whenAborted,
  type AttemptErrorInfo,
  type AttemptOutcome,
  type BackoffConfig,
  type CallCompletionOutcome,
  type CallRecord,
  type CallResult,
  type ChatMessage,
  type Clock,
  type EndpointConfig,
  type ModelRequest,
  type ModelResponse,
} from '@tollgate/shared';
import type { ModelProvider } from '@tollgate/models';
import type { AdmissionGrant, AdmissionLimiter } from './admission-limiter.js';
import type { BudgetLedger, ScopeHandle } from './budget-ledger.js';
import type { CallLog } from './call-log.js';
import { getLogger, type Logger } from './logger.js';

export interface CallEnvelopeOptions {
  endpoint: string;
  config: EndpointConfig;
  provider: ModelProvider;
  limiter: AdmissionLimiter;
  ledger: BudgetLedger;
  callLog: CallLog;
  clock?: Clock;
  logger?: Logger;
  /** Source of jitter; defaults to Math.random */
  random?: () => number;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  admissionDeadlineMs?: number;
  signal?: AbortSignal;
  /** Scope to check and charge; defaults to the current scope of the call tree */
  scope?: ScopeHandle;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  responseFormat?: 'text' | 'json';
}

interface CallUsage {
  actualTokens?: number;
  costUsd?: number;
}

type AttemptResult =
  | { kind: 'success'; response: ModelResponse }
  | { kind: 'failed'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

export function backoffDelay(backoff: BackoffConfig, attempt: number, random: () => number = Math.random): number {
  const delay = Math.min(backoff.maxMs, backoff.baseMs * Math.pow(backoff.multiplier, attempt - 1));
  return backoff.jitter ? random() * delay : delay;
}

function errorInfo(err: unknown): AttemptErrorInfo {
  if (err instanceof ProviderFailure) {
    return { name: err.name, code: err.code, message: err.message, status: err.status };
  }
  if (err instanceof CallTimeoutError) {
    return { name: err.name, code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}

/**
 * Runs one logical call against one endpoint: budget check, admission, the
 * provider call raced against a timeout, then retry with exponential backoff
 * until success, a fatal failure or the attempt budget runs out.
 */
export class CallEnvelope {
  readonly endpoint: string;

  private config: EndpointConfig;
  private provider: ModelProvider;
  private limiter: AdmissionLimiter;
  private ledger: BudgetLedger;
  private callLog: CallLog;
  private clock: Clock;
  private logger: Logger;
  private random: () => number;

  constructor(options: CallEnvelopeOptions) {
    this.endpoint = options.endpoint;
    this.config = options.config;
    this.provider = options.provider;
    this.limiter = options.limiter;
    this.ledger = options.ledger;
    this.callLog = options.callLog;
    this.clock = options.clock ?? realClock;
    this.random = options.random ?? Math.random;
    this.logger = (options.logger ?? getLogger()).child({ component: 'call-envelope', endpoint: options.endpoint });
  }

  buildRequest(messages: ChatMessage[], options: ExecuteOptions = {}): ModelRequest {
    const system = options.system ?? this.config.system;
    const maxTokens = options.maxTokens ?? this.config.maxTokens;
    const temperature = options.temperature ?? this.config.temperature;
    return {
      model: this.config.model,
      provider: this.config.provider,
      messages,
      ...(system !== undefined ? { system } : {}),
      ...(maxTokens !== undefined ? { maxTokens } : {}),
      ...(temperature !== undefined ? { temperature } : {}),
      ...(options.responseFormat ? { responseFormat: options.responseFormat } : {}),
    };
  }

  async execute(messages: ChatMessage[], options: ExecuteOptions = {}): Promise<CallResult> {
    const request = this.buildRequest(messages, options);
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const maxAttempts = options.maxAttempts ?? this.config.maxAttempts;
    const deadlineMs = options.admissionDeadlineMs ?? this.config.admissionDeadlineMs;
    const scope = options.scope ?? this.ledger.current();
    const { signal } = options;

    if (maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
    }

    const estimatedTokens = this.provider.estimateTokens(request);
    const { id } = this.callLog.begin({
      endpoint: this.endpoint,
      estimatedTokens,
      scopeChain: this.ledger.chain(scope).map(s => s.id),
    });
    const finish = (outcome: CallCompletionOutcome, usage: CallUsage = {}): CallRecord =>
      this.callLog.finalize(id, { outcome, ...usage });

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new CallCancelledError(this.endpoint, finish('cancelled'));
      }

      try {
        this.ledger.assertWithinBudget(scope);
      } catch (err) {
        if (err instanceof BudgetExceededError) {
          throw err.withRecord(finish('budget_blocked'));
        }
        finish('fatal_error');
        throw err;
      }

      let grant: AdmissionGrant;
      try {
        grant = await this.limiter.admit(estimatedTokens, { deadlineMs, signal });
      } catch (err) {
        if (err instanceof AdmissionTimeoutError) {
          throw new AdmissionTimeoutError(this.endpoint, err.waitedMs, err.deadlineMs, finish('admission_timeout'));
        }
        if (err instanceof CallCancelledError) {
          throw new CallCancelledError(this.endpoint, finish('cancelled'));
        }
        finish('fatal_error');
        throw err;
      }

      // The scope may have been spent by other calls while this one queued.
      try {
        this.ledger.assertWithinBudget(scope);
      } catch (err) {
        grant.release();
        if (err instanceof BudgetExceededError) {
          throw err.withRecord(finish('budget_blocked'));
        }
        finish('fatal_error');
        throw err;
      }

      const startedAt = this.clock.now();
      let result: AttemptResult;
      try {
        result = await this.attempt(request, timeoutMs, signal);
      } finally {
        grant.release();
      }
      const latencyMs = this.clock.now() - startedAt;
      const base = { attempt, admissionWaitMs: grant.waitedMs, latencyMs };

      if (result.kind === 'cancelled' || signal?.aborted) {
        this.logger.debug({ attempt }, 'Call cancelled');
        throw new CallCancelledError(this.endpoint, finish('cancelled'));
      }

      if (result.kind === 'success') {
        const { response } = result;
        grant.reconcile(response.tokenUsage.totalTokens);
        this.callLog.recordAttempt(id, { ...base, outcome: 'success' });
        const completion = { actualTokens: response.tokenUsage.totalTokens, costUsd: response.costUsd };
        try {
          this.ledger.settle(response.costUsd, scope);
        } catch (err) {
          const record = finish('success', completion);
          if (err instanceof BudgetExceededError) throw err.withRecord(record);
          throw err;
        }
        const record = finish('success', completion);
        this.logger.debug(
          { callId: id, attempt, tokens: completion.actualTokens, costUsd: completion.costUsd },
          'Call succeeded',
        );
        return {
          text: response.content,
          tokenUsage: response.tokenUsage,
          costUsd: response.costUsd,
          record,
        };
      }

      let outcome: AttemptOutcome;
      let error: unknown;
      if (result.kind === 'timeout') {
        outcome = 'timeout';
        error = new CallTimeoutError(this.endpoint, attempt, timeoutMs);
      } else {
        error = result.error;
        if (error instanceof ProviderFailure && error.kind === 'fatal') {
          outcome = 'fatal_error';
        } else if (error instanceof ProviderFailure && error.reason === 'rate_limited') {
          outcome = 'rate_limited';
        } else {
          outcome = 'retryable_error';
        }
      }
      this.callLog.recordAttempt(id, { ...base, outcome, error: errorInfo(error) });

      if (outcome === 'fatal_error' && error instanceof ProviderFailure) {
        this.logger.warn({ callId: id, attempt, status: error.status, err: error.message }, 'Fatal provider failure');
        throw new ProviderFatalError(this.endpoint, error, finish('fatal_error'));
      }

      if (attempt >= maxAttempts) {
        const record = finish('exhausted');
        this.logger.warn({ callId: id, attempts: attempt }, 'Call exhausted its attempts');
        throw new CallExhaustedError(this.endpoint, record);
      }

      const delay = backoffDelay(this.config.backoff, attempt, this.random);
      this.logger.info({ callId: id, attempt, outcome, delayMs: delay }, 'Retrying after backoff');
      await this.clock.sleep(delay, signal);
    }
  }

  /**
   * One provider call raced against the timeout and the caller's signal. The
   * losing provider call is aborted and its settlement ignored.
   */
  private async attempt(request: ModelRequest, timeoutMs: number, signal?: AbortSignal): Promise<AttemptResult> {
    const attemptController = new AbortController();
    const linked = linkSignals(signal, attemptController.signal);
    const timer = new AbortController();
    const aborted = signal ? whenAborted(signal) : undefined;

    const contenders: Promise<AttemptResult>[] = [
      this.provider.chat(request, { signal: linked.signal }).then(
        (response): AttemptResult => ({ kind: 'success', response }),
        (error: unknown): AttemptResult => ({ kind: 'failed', error }),
      ),
      this.clock.sleep(timeoutMs, timer.signal).then((): AttemptResult => ({ kind: 'timeout' })),
    ];
    if (aborted) {
      contenders.push(aborted.promise.then((): AttemptResult => ({ kind: 'cancelled' })));
    }

    try {
      const result = await Promise.race(contenders);
      if (result.kind === 'timeout' || result.kind === 'cancelled') {
        attemptController.abort();
      }
      return result;
    } finally {
      timer.abort();
      aborted?.dispose();
      linked.dispose();
    }
  }
}
