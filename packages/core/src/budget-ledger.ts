import { AsyncLocalStorage } from 'node:async_hooks';
import {
  BUDGET_EPSILON_USD,
  BudgetExceededError,
  ScopeClosedError,
  generateId,
  scopeOptionsSchema,
  type ScopeOptions,
  type ScopeSnapshot,
} from '@tollgate/shared';
import { getLogger, type Logger } from './logger.js';

/**
 * A spending scope. Totals only ever grow; closing a scope freezes it and
 * removes it from the accounting of later charges.
 */
export class ScopeHandle {
  readonly id: string;
  readonly label?: string;
  readonly capUsd?: number;
  readonly parent?: ScopeHandle;
  readonly logUsage: boolean;

  private total = 0;
  private open = true;
  private children = new Set<string>();

  constructor(
    options: ScopeOptions,
    parent: ScopeHandle | undefined,
    private logger: Logger,
    private onClose?: (scope: ScopeHandle) => void,
  ) {
    if (options.capUsd !== undefined && (!Number.isFinite(options.capUsd) || options.capUsd < 0)) {
      throw new RangeError(`Scope cap must be a non-negative number, got ${options.capUsd}`);
    }
    this.id = generateId('scope');
    this.label = options.label;
    this.capUsd = options.capUsd;
    this.parent = parent;
    this.logUsage = options.logUsage ?? false;
    parent?.children.add(this.id);
  }

  get totalUsd(): number {
    return this.total;
  }

  /** Remaining room under the cap; Infinity when uncapped. */
  get amountLeftUsd(): number {
    return this.capUsd === undefined ? Infinity : Math.max(0, this.capUsd - this.total);
  }

  get isOpen(): boolean {
    return this.open;
  }

  get childIds(): string[] {
    return [...this.children];
  }

  /** Idempotent. */
  close(): void {
    if (!this.open) return;
    this.open = false;
    this.logger.debug({ scopeId: this.id, totalUsd: this.total, capUsd: this.capUsd }, 'Scope closed');
    this.onClose?.(this);
  }

  /** True when the scope has a cap and `total` is over it. */
  isOver(total = this.total): boolean {
    return this.capUsd !== undefined && total - this.capUsd > BUDGET_EPSILON_USD;
  }

  /** True when the scope has a cap and nothing is left under it. */
  isSpent(): boolean {
    return this.capUsd !== undefined && this.total >= this.capUsd - BUDGET_EPSILON_USD;
  }

  /** @internal Called by the ledger inside its synchronous charge section. */
  attribute(amountUsd: number): void {
    this.total += amountUsd;
  }

  snapshot(): ScopeSnapshot {
    return {
      id: this.id,
      label: this.label,
      capUsd: this.capUsd,
      totalUsd: this.total,
      amountLeftUsd: this.amountLeftUsd,
      open: this.open,
      parentId: this.parent?.id,
      childIds: this.childIds,
    };
  }
}

export interface BudgetLedgerOptions {
  logger?: Logger;
}

/**
 * Nested spending scopes, one stack per asynchronous call tree.
 *
 * Every charge is attributed to the innermost open scope and to each open
 * ancestor. Both `charge` and `close` run without awaiting, so they are
 * atomic with respect to each other.
 */
export class BudgetLedger {
  private storage = new AsyncLocalStorage<ScopeHandle | undefined>();
  private logger: Logger;

  constructor(options: BudgetLedgerOptions = {}) {
    this.logger = (options.logger ?? getLogger()).child({ component: 'budget-ledger' });
  }

  /**
   * Opens a scope nested under the current one and makes it current for the
   * rest of the calling call tree. Closing it hands the call tree back to the
   * nearest open ancestor. The caller owns the handle and must `close()` it.
   */
  openScope(options: ScopeOptions = {}): ScopeHandle {
    const scope = this.createScope(options, (closed) => this.leave(closed));
    this.storage.enterWith(scope);
    return scope;
  }

  /** Runs `fn` with `scope` as the current scope of its call tree. */
  run<T>(scope: ScopeHandle, fn: () => T): T {
    return this.storage.run(scope, fn);
  }

  /** Opens a scope, runs `fn` inside it and closes it on every exit path. */
  async withScope<T>(options: ScopeOptions, fn: (scope: ScopeHandle) => Promise<T> | T): Promise<T> {
    const scope = this.createScope(options);
    try {
      return await this.run(scope, () => fn(scope));
    } finally {
      scope.close();
    }
  }

  /** The innermost scope of the calling call tree, open or not. */
  current(): ScopeHandle | undefined {
    return this.storage.getStore();
  }

  /** Open scopes from `scope` (default: current) up to the root, innermost first. */
  chain(scope: ScopeHandle | undefined = this.current()): ScopeSnapshot[] {
    return this.openChain(scope).map(s => s.snapshot());
  }

  currentUsage(scope: ScopeHandle | undefined = this.current()): number {
    return scope?.totalUsd ?? 0;
  }

  /** Smallest remaining amount across the open chain; Infinity when nothing is capped. */
  amountLeft(scope: ScopeHandle | undefined = this.current()): number {
    return this.openChain(scope).reduce((left, s) => Math.min(left, s.amountLeftUsd), Infinity);
  }

  /**
   * Throws a `before_call` BudgetExceededError when any open scope in the
   * chain has nothing left under its cap.
   */
  assertWithinBudget(scope: ScopeHandle | undefined = this.current()): void {
    const chain = this.openChain(scope);
    const spent = chain.find(s => s.isSpent());
    if (!spent || spent.capUsd === undefined) return;

    throw new BudgetExceededError({
      phase: 'before_call',
      scopeId: spent.id,
      capUsd: spent.capUsd,
      totalUsd: spent.totalUsd,
      amountUsd: 0,
      scopeChain: chain.map(s => s.snapshot()),
    });
  }

  /**
   * Charges the cost of a call that has already happened. When `scope` was
   * closed while the call was in flight, the amount goes to its nearest open
   * ancestor instead; with none left open it is only logged.
   */
  settle(amountUsd: number, scope: ScopeHandle | undefined = this.current()): void {
    const target = this.nearestOpen(scope);
    if (scope && target !== scope) {
      this.logger.warn(
        { scopeId: scope.id, chargedScopeId: target?.id, amountUsd },
        'Scope closed before its call settled',
      );
    }
    if (!target) return;
    this.charge(amountUsd, target);
  }

  /**
   * Records `amountUsd` against the innermost open scope and every open
   * ancestor. The charge is always recorded; afterwards an `after_charge`
   * BudgetExceededError is thrown if it pushed any scope over its cap.
   */
  charge(amountUsd: number, scope: ScopeHandle | undefined = this.current()): void {
    if (!Number.isFinite(amountUsd) || amountUsd < 0) {
      throw new RangeError(`Charge amount must be a non-negative number, got ${amountUsd}`);
    }
    if (!scope) {
      this.logger.debug({ amountUsd }, 'Charge outside any scope');
      return;
    }
    if (!scope.isOpen) {
      throw new ScopeClosedError(scope.id);
    }
    if (amountUsd === 0) {
      this.logger.debug({ scopeId: scope.id }, 'Zero charge');
    }

    const chain = this.openChain(scope);
    for (const s of chain) {
      s.attribute(amountUsd);
      if (s.logUsage) {
        this.logger.info(
          { scopeId: s.id, label: s.label, amountUsd, totalUsd: s.totalUsd, capUsd: s.capUsd },
          'Scope usage',
        );
      }
    }

    const over = chain.find(s => s.isOver());
    if (!over || over.capUsd === undefined) return;

    this.logger.warn(
      { scopeId: over.id, capUsd: over.capUsd, totalUsd: over.totalUsd, amountUsd },
      'Charge pushed scope over its cap',
    );
    throw new BudgetExceededError({
      phase: 'after_charge',
      scopeId: over.id,
      capUsd: over.capUsd,
      totalUsd: over.totalUsd,
      amountUsd,
      scopeChain: chain.map(s => s.snapshot()),
    });
  }

  private createScope(options: ScopeOptions, onClose?: (scope: ScopeHandle) => void): ScopeHandle {
    const parsed = scopeOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw new RangeError(`Invalid scope options: ${issues.join(', ')}`);
    }
    const parent = this.nearestOpen(this.storage.getStore());
    const scope = new ScopeHandle(options, parent, this.logger, onClose);
    this.logger.debug(
      { scopeId: scope.id, parentId: parent?.id, capUsd: scope.capUsd, label: scope.label },
      'Scope opened',
    );
    return scope;
  }

  private leave(scope: ScopeHandle): void {
    if (this.storage.getStore() !== scope) return;
    this.storage.enterWith(this.nearestOpen(scope.parent));
  }

  private nearestOpen(scope: ScopeHandle | undefined): ScopeHandle | undefined {
    let node = scope;
    while (node && !node.isOpen) node = node.parent;
    return node;
  }

  private openChain(scope: ScopeHandle | undefined): ScopeHandle[] {
    const chain: ScopeHandle[] = [];
    for (let node = scope; node; node = node.parent) {
      if (node.isOpen) chain.push(node);
    }
    return chain;
  }
}
