import type { TokenUsage } from './model.js';

export type AttemptOutcome =
  | 'success'
  | 'timeout'
  | 'rate_limited'
  | 'retryable_error'
  | 'fatal_error';

export type CallOutcome =
  | 'pending'
  | 'success'
  | 'timeout'
  | 'rate_limited'
  | 'fatal_error'
  | 'exhausted'
  | 'cancelled'
  | 'budget_blocked'
  | 'admission_timeout';

export type CallCompletionOutcome = Exclude<CallOutcome, 'pending'>;

export interface AttemptErrorInfo {
  name: string;
  code?: string;
  message: string;
  status?: number;
}

export interface AttemptRecord {
  attempt: number;
  outcome: AttemptOutcome;
  /** Time spent queued in the admission limiter */
  admissionWaitMs: number;
  latencyMs: number;
  error?: AttemptErrorInfo;
}

export interface CallRecord {
  id: string;
  endpoint: string;
  estimatedTokens: number;
  actualTokens: number | null;
  costUsd: number | null;
  outcome: CallOutcome;
  /** Number of transport attempts made so far */
  attempt: number;
  attempts: AttemptRecord[];
  scopeChain: string[];
  startedAt: string;
  finishedAt?: string;
}

export interface CallResult {
  text: string;
  tokenUsage: TokenUsage;
  costUsd: number;
  record: CallRecord;
}

export type ValidationOutcome = 'valid' | 'parse_failed' | 'shape_mismatch';

export interface TypedAttempt {
  index: number;
  prompt: string;
  rawResponse: string;
  outcome: ValidationOutcome;
  issues: string[];
  callId: string;
}
