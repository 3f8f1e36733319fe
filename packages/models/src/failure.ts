import { ProviderFailure } from '@tollgate/shared';
import type { FailureReason } from '@tollgate/shared';

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Maps an HTTP status to a failure. 408, 409, 429 and 5xx are worth retrying. */
export function failureForStatus(provider: string, status: number, message: string): ProviderFailure {
  if (status === 429) {
    return new ProviderFailure(provider, 'retryable', message, 'rate_limited', status);
  }
  if (status === 408) {
    return new ProviderFailure(provider, 'retryable', message, 'network', status);
  }
  if (status === 409 || status >= 500) {
    return new ProviderFailure(provider, 'retryable', message, 'server', status);
  }
  const reason: FailureReason = status === 401 || status === 403 ? 'auth' : 'client';
  return new ProviderFailure(provider, 'fatal', message, reason, status);
}

/**
 * Classifies whatever an SDK threw. Errors without a status (connection
 * resets, DNS failures) are treated as retryable network failures.
 */
export function classifyProviderError(provider: string, err: unknown): ProviderFailure {
  if (err instanceof ProviderFailure) return err;

  const status = statusOf(err);
  if (status !== undefined) {
    return failureForStatus(provider, status, messageOf(err));
  }
  if (err instanceof Error) {
    return new ProviderFailure(provider, 'retryable', err.message, 'network');
  }
  return new ProviderFailure(provider, 'retryable', messageOf(err));
}
