import {
  TollgateError,
  generateId,
  isoNow,
  type AttemptRecord,
  type CallCompletionOutcome,
  type CallRecord,
} from '@tollgate/shared';

export interface CallStart {
  endpoint: string;
  estimatedTokens: number;
  scopeChain: string[];
}

export interface CallCompletion {
  outcome: CallCompletionOutcome;
  actualTokens?: number;
  costUsd?: number;
}

export interface EndpointSummary {
  endpoint: string;
  calls: number;
  successes: number;
  failures: number;
  pending: number;
  totalTokens: number;
  totalCostUsd: number;
}

/**
 * In-memory record of every call and its attempts. Oldest finished records
 * are dropped once `maxRecords` is exceeded.
 */
export class CallLog {
  private records = new Map<string, CallRecord>();

  constructor(private maxRecords = 1_000) {}

  begin(start: CallStart): CallRecord {
    const record: CallRecord = {
      id: generateId('call'),
      endpoint: start.endpoint,
      estimatedTokens: start.estimatedTokens,
      actualTokens: null,
      costUsd: null,
      outcome: 'pending',
      attempt: 0,
      attempts: [],
      scopeChain: [...start.scopeChain],
      startedAt: isoNow(),
    };
    this.records.set(record.id, record);
    this.evict();
    return record;
  }

  recordAttempt(id: string, attempt: AttemptRecord): void {
    const record = this.getPending(id);
    record.attempts.push(attempt);
    record.attempt = attempt.attempt;
  }

  /** Settles a record. Each record is finalized exactly once. */
  finalize(id: string, completion: CallCompletion): CallRecord {
    const record = this.getPending(id);
    record.outcome = completion.outcome;
    record.actualTokens = completion.actualTokens ?? null;
    record.costUsd = completion.costUsd ?? null;
    record.finishedAt = isoNow();
    return record;
  }

  get(id: string): CallRecord | undefined {
    return this.records.get(id);
  }

  list(endpoint?: string): CallRecord[] {
    const all = Array.from(this.records.values());
    return endpoint === undefined ? all : all.filter(r => r.endpoint === endpoint);
  }

  summarize(): EndpointSummary[] {
    const byEndpoint = new Map<string, EndpointSummary>();
    for (const record of this.records.values()) {
      let summary = byEndpoint.get(record.endpoint);
      if (!summary) {
        summary = {
          endpoint: record.endpoint,
          calls: 0,
          successes: 0,
          failures: 0,
          pending: 0,
          totalTokens: 0,
          totalCostUsd: 0,
        };
        byEndpoint.set(record.endpoint, summary);
      }
      summary.calls++;
      if (record.outcome === 'success') summary.successes++;
      else if (record.outcome === 'pending') summary.pending++;
      else summary.failures++;
      summary.totalTokens += record.actualTokens ?? 0;
      summary.totalCostUsd += record.costUsd ?? 0;
    }
    return Array.from(byEndpoint.values());
  }

  private getPending(id: string): CallRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new TollgateError('CALL_NOT_FOUND', `No call record with id ${id}`, { id });
    }
    if (record.outcome !== 'pending') {
      throw new TollgateError('CALL_ALREADY_FINALIZED', `Call ${id} was already finalized as ${record.outcome}`, {
        id,
        outcome: record.outcome,
      });
    }
    return record;
  }

  private evict(): void {
    if (this.records.size <= this.maxRecords) return;
    for (const [id, record] of this.records) {
      if (this.records.size <= this.maxRecords) break;
      if (record.outcome !== 'pending') this.records.delete(id);
    }
  }
}
