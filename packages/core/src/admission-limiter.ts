import {
  AdmissionTimeoutError,
  CallCancelledError,
  realClock,
  whenAborted,
  type Clock,
  type EndpointLimits,
} from '@tollgate/shared';
import { getLogger, type Logger } from './logger.js';

interface WindowEntry {
  grantedAt: number;
  tokens: number;
  inFlight: boolean;
}

interface Deferred {
  promise: Promise<void>;
  resolve(): void;
}

function deferred(): Deferred {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export interface AdmitOptions {
  /** Give up with AdmissionTimeoutError after waiting this long */
  deadlineMs?: number;
  /** Abort while queued gives up the queue position with CallCancelledError */
  signal?: AbortSignal;
}

export interface LimiterStats {
  queued: number;
  inFlight: number;
  requestsInWindow: number;
  tokensInWindow: number;
}

export interface AdmissionLimiterOptions {
  endpoint: string;
  limits: EndpointLimits;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Permission to make one request. Holds a slot until released; its tokens stay
 * in the window for a full period after the grant.
 */
export class AdmissionGrant {
  private released = false;

  constructor(
    private entry: WindowEntry,
    private onChange: () => void,
    readonly waitedMs: number,
  ) {}

  get tokens(): number {
    return this.entry.tokens;
  }

  /** Replaces the estimate with the actual usage. Never blocks. */
  reconcile(actualTokens: number): void {
    if (!Number.isFinite(actualTokens) || actualTokens < 0) {
      throw new RangeError(`Token count must be a non-negative number, got ${actualTokens}`);
    }
    this.entry.tokens = actualTokens;
    this.onChange();
  }

  /** Ends the in-flight period. Idempotent. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.entry.inFlight = false;
    this.onChange();
  }
}

/**
 * Sliding-window admission for one endpoint.
 *
 * A grant counts against the request and token ceilings while it is in flight
 * and for `periodMs` after it was granted. Waiters are served strictly in
 * arrival order and sleep until the next expiry or release instead of polling.
 */
export class AdmissionLimiter {
  readonly endpoint: string;

  private limits: EndpointLimits;
  private clock: Clock;
  private logger: Logger;
  private entries: WindowEntry[] = [];
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private changed = deferred();

  constructor(options: AdmissionLimiterOptions) {
    const { limits } = options;
    if (limits.periodMs <= 0) {
      throw new RangeError(`periodMs must be positive, got ${limits.periodMs}`);
    }
    this.endpoint = options.endpoint;
    this.limits = limits;
    this.clock = options.clock ?? realClock;
    this.logger = (options.logger ?? getLogger()).child({
      component: 'admission-limiter',
      endpoint: options.endpoint,
    });
  }

  async admit(estimatedTokens: number, options: AdmitOptions = {}): Promise<AdmissionGrant> {
    if (!Number.isFinite(estimatedTokens) || estimatedTokens < 0) {
      throw new RangeError(`Estimated tokens must be a non-negative number, got ${estimatedTokens}`);
    }
    const { tokensPerPeriod } = this.limits;
    if (tokensPerPeriod !== undefined && estimatedTokens > tokensPerPeriod) {
      throw new RangeError(
        `Request of ${estimatedTokens} tokens can never fit the ${tokensPerPeriod}-token window of "${this.endpoint}"`,
      );
    }
    if (options.signal?.aborted) {
      throw new CallCancelledError(this.endpoint);
    }

    const start = this.clock.now();
    const previous = this.tail;
    let releaseTurn = () => {};
    const turn = new Promise<void>((resolve) => {
      releaseTurn = resolve;
    });
    // Chained on `previous` as well, so leaving the queue early keeps FIFO order
    this.tail = previous.then(() => turn);
    this.queued++;

    try {
      let myTurn = false;
      const turnReached = previous.then(() => {
        myTurn = true;
      });
      while (!myTurn) {
        await this.suspend(turnReached, Infinity, start, options);
      }

      for (;;) {
        const now = this.clock.now();
        this.prune(now);
        const waitMs = this.waitTime(estimatedTokens, now);
        if (waitMs === 0) break;
        await this.suspend(this.changed.promise, waitMs, start, options);
      }

      const entry: WindowEntry = { grantedAt: this.clock.now(), tokens: estimatedTokens, inFlight: true };
      this.entries.push(entry);
      const waitedMs = entry.grantedAt - start;
      this.logger.debug({ estimatedTokens, waitedMs }, 'Admitted');
      return new AdmissionGrant(entry, () => this.notify(), waitedMs);
    } finally {
      this.queued--;
      releaseTurn();
    }
  }

  stats(): LimiterStats {
    this.prune(this.clock.now());
    return {
      queued: this.queued,
      inFlight: this.entries.filter(e => e.inFlight).length,
      requestsInWindow: this.entries.length,
      tokensInWindow: this.entries.reduce((sum, e) => sum + e.tokens, 0),
    };
  }

  private notify(): void {
    const current = this.changed;
    this.changed = deferred();
    current.resolve();
  }

  private prune(now: number): void {
    const { periodMs } = this.limits;
    this.entries = this.entries.filter(e => e.inFlight || e.grantedAt + periodMs > now);
  }

  /**
   * How long until a request of `tokens` fits: 0 when it fits now, Infinity
   * when only a release can make room.
   */
  private waitTime(tokens: number, now: number): number {
    const { requestsPerPeriod, tokensPerPeriod, maxConcurrent, periodMs } = this.limits;
    const expiring = this.entries
      .filter(e => !e.inFlight)
      .map(e => ({ at: e.grantedAt + periodMs, tokens: e.tokens }))
      .sort((a, b) => a.at - b.at);

    let wait = 0;

    if (maxConcurrent !== undefined) {
      const inFlight = this.entries.length - expiring.length;
      if (inFlight >= maxConcurrent) return Infinity;
    }

    if (requestsPerPeriod !== undefined && this.entries.length >= requestsPerPeriod) {
      const mustExpire = this.entries.length - requestsPerPeriod + 1;
      if (expiring.length < mustExpire) return Infinity;
      wait = Math.max(wait, expiring[mustExpire - 1].at - now);
    }

    if (tokensPerPeriod !== undefined) {
      const used = this.entries.reduce((sum, e) => sum + e.tokens, 0);
      let excess = used + tokens - tokensPerPeriod;
      if (excess > 0) {
        let until = Infinity;
        for (const e of expiring) {
          excess -= e.tokens;
          if (excess <= 0) {
            until = e.at;
            break;
          }
        }
        if (until === Infinity) return Infinity;
        wait = Math.max(wait, until - now);
      }
    }

    return Math.max(0, wait);
  }

  /**
   * Waits for `event`, `waitMs`, the deadline or the abort signal, whichever
   * comes first. Throws when the deadline has passed or the signal aborted.
   */
  private async suspend(event: Promise<void>, waitMs: number, start: number, options: AdmitOptions): Promise<void> {
    let sleepMs = waitMs;
    if (options.deadlineMs !== undefined) {
      const waited = this.clock.now() - start;
      const remaining = options.deadlineMs - waited;
      if (remaining <= 0) {
        this.logger.warn({ waitedMs: waited, deadlineMs: options.deadlineMs }, 'Admission deadline passed');
        throw new AdmissionTimeoutError(this.endpoint, waited, options.deadlineMs);
      }
      sleepMs = Math.min(sleepMs, remaining);
    }

    const timer = new AbortController();
    const aborted = options.signal ? whenAborted(options.signal) : undefined;
    const contenders: Promise<void>[] = [event];
    if (Number.isFinite(sleepMs)) contenders.push(this.clock.sleep(sleepMs, timer.signal));
    if (aborted) contenders.push(aborted.promise);

    try {
      await Promise.race(contenders);
    } finally {
      timer.abort();
      aborted?.dispose();
    }

    if (options.signal?.aborted) {
      throw new CallCancelledError(this.endpoint);
    }
  }
}
