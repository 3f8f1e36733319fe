import type { BudgetCheckPhase, ScopeSnapshot } from '../types/budget.js';
import type { CallRecord, TypedAttempt } from '../types/call.js';

export class TollgateError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'TollgateError';
    this.code = code;
    this.details = details;
  }
}

export type FailureKind = 'retryable' | 'fatal';

export type FailureReason = 'rate_limited' | 'network' | 'server' | 'client' | 'auth' | 'unknown';

/**
 * Raised by provider adapters. The kind decides whether the call envelope
 * retries the attempt or gives up on the whole call.
 */
export class ProviderFailure extends TollgateError {
  constructor(
    public readonly provider: string,
    public readonly kind: FailureKind,
    message: string,
    public readonly reason: FailureReason = 'unknown',
    public readonly status?: number,
  ) {
    super('PROVIDER_FAILURE', `${provider}: ${message}`, { provider, kind, reason, status });
    this.name = 'ProviderFailure';
  }
}

export class ConfigError extends TollgateError {
  constructor(message: string) {
    super('CONFIG_ERROR', `Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class UnknownEndpointError extends TollgateError {
  constructor(public readonly endpoint: string) {
    super('UNKNOWN_ENDPOINT', `Endpoint "${endpoint}" is not registered`, { endpoint });
    this.name = 'UnknownEndpointError';
  }
}

export class ScopeClosedError extends TollgateError {
  constructor(public readonly scopeId: string) {
    super('SCOPE_CLOSED', `Spending scope ${scopeId} is already closed`, { scopeId });
    this.name = 'ScopeClosedError';
  }
}

export interface BudgetExceededInfo {
  phase: BudgetCheckPhase;
  scopeId: string;
  capUsd: number;
  totalUsd: number;
  /** Charge that pushed the scope over; 0 when blocked before the call */
  amountUsd: number;
  scopeChain: ScopeSnapshot[];
  record?: CallRecord;
}

export class BudgetExceededError extends TollgateError {
  readonly phase: BudgetCheckPhase;
  readonly scopeId: string;
  readonly capUsd: number;
  readonly totalUsd: number;
  readonly amountUsd: number;
  readonly scopeChain: ScopeSnapshot[];
  readonly record?: CallRecord;

  constructor(info: BudgetExceededInfo) {
    const message = info.phase === 'before_call'
      ? `Budget exceeded: scope ${info.scopeId} has spent $${info.totalUsd.toFixed(4)} of its $${info.capUsd.toFixed(4)} cap`
      : `Budget exceeded: charge of $${info.amountUsd.toFixed(4)} brought scope ${info.scopeId} to ` +
        `$${info.totalUsd.toFixed(4)}, over its $${info.capUsd.toFixed(4)} cap`;
    super('BUDGET_EXCEEDED', message, {
      phase: info.phase,
      scopeId: info.scopeId,
      capUsd: info.capUsd,
      totalUsd: info.totalUsd,
      amountUsd: info.amountUsd,
      scopeChain: info.scopeChain.map(s => s.id),
    });
    this.name = 'BudgetExceededError';
    this.phase = info.phase;
    this.scopeId = info.scopeId;
    this.capUsd = info.capUsd;
    this.totalUsd = info.totalUsd;
    this.amountUsd = info.amountUsd;
    this.scopeChain = info.scopeChain;
    this.record = info.record;
  }

  /** Same failure, carrying the record of the call it interrupted. */
  withRecord(record: CallRecord): BudgetExceededError {
    return new BudgetExceededError({
      phase: this.phase,
      scopeId: this.scopeId,
      capUsd: this.capUsd,
      totalUsd: this.totalUsd,
      amountUsd: this.amountUsd,
      scopeChain: this.scopeChain,
      record,
    });
  }
}

export class AdmissionTimeoutError extends TollgateError {
  constructor(
    public readonly endpoint: string,
    public readonly waitedMs: number,
    public readonly deadlineMs: number,
    public readonly record?: CallRecord,
  ) {
    super(
      'ADMISSION_TIMEOUT',
      `Waited ${waitedMs}ms for a rate-limit slot on "${endpoint}" (deadline ${deadlineMs}ms)`,
      { endpoint, waitedMs, deadlineMs },
    );
    this.name = 'AdmissionTimeoutError';
  }
}

export class CallTimeoutError extends TollgateError {
  constructor(
    public readonly endpoint: string,
    public readonly attempt: number,
    public readonly timeoutMs: number,
  ) {
    super(
      'CALL_TIMEOUT',
      `Attempt ${attempt} on "${endpoint}" did not settle within ${timeoutMs}ms`,
      { endpoint, attempt, timeoutMs },
    );
    this.name = 'CallTimeoutError';
  }
}

export class CallCancelledError extends TollgateError {
  constructor(
    public readonly endpoint: string,
    public readonly record?: CallRecord,
  ) {
    super('CALL_CANCELLED', `Call to "${endpoint}" was cancelled`, { endpoint });
    this.name = 'CallCancelledError';
  }
}

export class ProviderFatalError extends TollgateError {
  constructor(
    public readonly endpoint: string,
    public readonly failure: ProviderFailure,
    public readonly record: CallRecord,
  ) {
    super(
      'PROVIDER_FATAL',
      `Non-retryable failure on "${endpoint}" at attempt ${record.attempt}: ${failure.message}`,
      { endpoint, attempt: record.attempt, status: failure.status, scopeChain: record.scopeChain },
    );
    this.name = 'ProviderFatalError';
  }
}

export class CallExhaustedError extends TollgateError {
  constructor(
    public readonly endpoint: string,
    public readonly record: CallRecord,
  ) {
    super(
      'CALL_EXHAUSTED',
      `All ${record.attempt} attempts on "${endpoint}" failed (${record.attempts.map(a => a.outcome).join(', ')})`,
      { endpoint, attempt: record.attempt, scopeChain: record.scopeChain },
    );
    this.name = 'CallExhaustedError';
  }
}

export class TypeValidationExhaustedError extends TollgateError {
  constructor(
    public readonly endpoint: string,
    public readonly attempts: TypedAttempt[],
  ) {
    const last = attempts[attempts.length - 1];
    super(
      'TYPE_VALIDATION_EXHAUSTED',
      `No valid structured answer from "${endpoint}" after ${attempts.length} attempts` +
        (last ? ` (last: ${last.outcome}: ${last.issues.join('; ')})` : ''),
      { endpoint, attempts: attempts.length },
    );
    this.name = 'TypeValidationExhaustedError';
  }
}

export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof TollgateError) {
    return { code: err.code, message: err.message, ...(err.details ? { details: err.details } : {}) };
  }
  if (err instanceof Error) {
    return { code: 'INTERNAL_ERROR', message: err.message };
  }
  return { code: 'INTERNAL_ERROR', message: String(err) };
}
