import { describe, it, expect } from 'vitest';
import { BudgetExceededError, ScopeClosedError } from '@tollgate/shared';
import { BudgetLedger } from '../src/budget-ledger.js';
import { createLogger } from '../src/logger.js';
import { collectLines } from './helpers.js';

describe('BudgetLedger', () => {
  it('attributes charges to the current scope and every ancestor', async () => {
    const ledger = new BudgetLedger();
    await ledger.withScope({ label: 'outer' }, async (outer) => {
      await ledger.withScope({ label: 'inner' }, async (inner) => {
        ledger.charge(0.25);
        expect(inner.totalUsd).toBeCloseTo(0.25, 10);
      });
      ledger.charge(0.5);
      expect(outer.totalUsd).toBeCloseTo(0.75, 10);
    });
  });

  it('records the charge that crosses the cap and then raises', async () => {
    const ledger = new BudgetLedger();
    await ledger.withScope({ capUsd: 1 }, async (scope) => {
      ledger.charge(0.4);
      ledger.charge(0.4);
      let caught: unknown;
      try {
        ledger.charge(0.4);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(BudgetExceededError);
      expect(caught).toMatchObject({ phase: 'after_charge', scopeId: scope.id, capUsd: 1, amountUsd: 0.4 });
      expect(scope.totalUsd).toBeCloseTo(1.2, 10);
    });
  });

  it('lets two of three concurrent $0.40 charges under a $1 cap through', async () => {
    const ledger = new BudgetLedger();
    await ledger.withScope({ capUsd: 1 }, async (scope) => {
      const results = await Promise.allSettled(
        [0.4, 0.4, 0.4].map(async (amount) => {
          await Promise.resolve();
          ledger.charge(amount);
        }),
      );
      expect(results.map(r => r.status)).toEqual(['fulfilled', 'fulfilled', 'rejected']);
      expect(scope.totalUsd).toBeCloseTo(1.2, 10);
    });
  });

  it('does not raise when a charge lands exactly on the cap', async () => {
    const ledger = new BudgetLedger();
    await ledger.withScope({ capUsd: 0.8 }, async () => {
      ledger.charge(0.4);
      expect(() => ledger.charge(0.4)).not.toThrow();
    });
  });

  it('blocks the next call once a scope has nothing left', async () => {
    const ledger = new BudgetLedger();
    await ledger.withScope({ capUsd: 0.5 }, async (scope) => {
      ledger.assertWithinBudget();
      ledger.charge(0.5);
      expect(() => ledger.assertWithinBudget()).toThrow(BudgetExceededError);
      try {
        ledger.assertWithinBudget();
      } catch (err) {
        expect(err).toMatchObject({ phase: 'before_call', scopeId: scope.id, amountUsd: 0 });
      }
    });
  });

  it('blocks calls under an uncapped scope when an ancestor is spent', async () => {
    const ledger = new BudgetLedger();
    await ledger.withScope({ capUsd: 1 }, async (outer) => {
      await ledger.withScope({}, async () => {
        ledger.charge(1);
        expect(() => ledger.assertWithinBudget()).toThrow(
          `Budget exceeded: scope ${outer.id} has spent $1.0000 of its $1.0000 cap`,
        );
      });
    });
  });

  it('never raises for uncapped scopes', async () => {
    const ledger = new BudgetLedger();
    await ledger.withScope({}, async (scope) => {
      ledger.charge(1_000);
      ledger.assertWithinBudget();
      expect(scope.amountLeftUsd).toBe(Infinity);
    });
  });

  it('treats a second close as a no-op and rejects later charges', () => {
    const ledger = new BudgetLedger();
    const scope = ledger.openScope({ capUsd: 1 });
    ledger.charge(0.3, scope);
    scope.close();
    scope.close();
    expect(scope.isOpen).toBe(false);
    expect(scope.totalUsd).toBeCloseTo(0.3, 10);
    expect(() => ledger.charge(0.1, scope)).toThrow(ScopeClosedError);
  });

  it('makes an opened scope current until it closes', async () => {
    const ledger = new BudgetLedger();
    const outer = ledger.openScope({ label: 'outer' });
    const inner = ledger.openScope({ label: 'inner', capUsd: 5 });
    expect(inner.parent).toBe(outer);
    expect(ledger.current()).toBe(inner);

    await Promise.resolve();
    ledger.charge(1);
    expect(inner.totalUsd).toBeCloseTo(1, 10);
    expect(ledger.currentUsage()).toBeCloseTo(1, 10);

    inner.close();
    expect(ledger.current()).toBe(outer);
    ledger.charge(0.5);
    expect(inner.totalUsd).toBeCloseTo(1, 10);
    expect(outer.totalUsd).toBeCloseTo(1.5, 10);

    outer.close();
    expect(ledger.current()).toBeUndefined();
  });

  it('settles a late charge on the nearest open ancestor', () => {
    const ledger = new BudgetLedger();
    const outer = ledger.openScope({ capUsd: 2 });
    const inner = ledger.openScope();
    inner.close();

    ledger.settle(0.75, inner);
    expect(inner.totalUsd).toBe(0);
    expect(outer.totalUsd).toBeCloseTo(0.75, 10);

    outer.close();
    expect(() => ledger.settle(0.25, inner)).not.toThrow();
    expect(outer.totalUsd).toBeCloseTo(0.75, 10);
  });

  it('skips closed ancestors', () => {
    const ledger = new BudgetLedger();
    const outer = ledger.openScope();
    const inner = ledger.run(outer, () => ledger.openScope());
    expect(inner.parent).toBe(outer);

    outer.close();
    ledger.charge(0.2, inner);
    expect(inner.totalUsd).toBeCloseTo(0.2, 10);
    expect(outer.totalUsd).toBe(0);
  });

  it('keeps a separate scope stack per call tree', async () => {
    const ledger = new BudgetLedger();
    await ledger.withScope({ label: 'root' }, async (root) => {
      const [a, b] = await Promise.all([
        ledger.withScope({ label: 'a' }, async (scope) => {
          await new Promise(resolve => setTimeout(resolve, 5));
          expect(ledger.current()).toBe(scope);
          ledger.charge(0.1);
          return scope;
        }),
        ledger.withScope({ label: 'b' }, async (scope) => {
          expect(ledger.current()).toBe(scope);
          ledger.charge(0.2);
          return scope;
        }),
      ]);
      expect(a.totalUsd).toBeCloseTo(0.1, 10);
      expect(b.totalUsd).toBeCloseTo(0.2, 10);
      expect(root.totalUsd).toBeCloseTo(0.3, 10);
      expect(root.childIds).toEqual([a.id, b.id]);
      expect(ledger.current()).toBe(root);
    });
    expect(ledger.current()).toBeUndefined();
  });

  it('closes the scope when the callback throws', async () => {
    const ledger = new BudgetLedger();
    let captured: { isOpen: boolean } | undefined;
    await expect(
      ledger.withScope({}, async (scope) => {
        captured = scope;
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(captured?.isOpen).toBe(false);
  });

  it('rejects negative and non-finite amounts', () => {
    const ledger = new BudgetLedger();
    const scope = ledger.openScope();
    expect(() => ledger.charge(-0.01, scope)).toThrow(RangeError);
    expect(() => ledger.charge(Number.NaN, scope)).toThrow(RangeError);
    expect(scope.totalUsd).toBe(0);
  });

  it('rejects negative caps', () => {
    expect(() => new BudgetLedger().openScope({ capUsd: -1 })).toThrow(
      'Invalid scope options: capUsd: Number must be greater than or equal to 0',
    );
  });

  it('ignores charges made outside any scope', () => {
    const ledger = new BudgetLedger();
    expect(() => ledger.charge(5)).not.toThrow();
    expect(ledger.currentUsage()).toBe(0);
  });

  it('reports the tightest remaining amount across the chain', async () => {
    const ledger = new BudgetLedger();
    await ledger.withScope({ capUsd: 1 }, async () => {
      await ledger.withScope({ capUsd: 0.5 }, async (inner) => {
        ledger.charge(0.3);
        expect(ledger.amountLeft()).toBeCloseTo(0.2, 10);
        expect(inner.amountLeftUsd).toBeCloseTo(0.2, 10);

        const chain = ledger.chain();
        expect(chain.map(s => s.capUsd)).toEqual([0.5, 1]);
        expect(chain[0].parentId).toBe(chain[1].id);
        expect(chain[1].amountLeftUsd).toBeCloseTo(0.7, 10);
      });
    });
  });

  it('logs usage on each charge when asked', async () => {
    const { lines, destination } = collectLines();
    const ledger = new BudgetLedger({ logger: createLogger({ level: 'info', destination }) });

    await ledger.withScope({ label: 'tracked', logUsage: true }, async () => {
      ledger.charge(0.1);
    });

    const entries = lines.map(line => JSON.parse(line));
    const usage = entries.filter(e => e.msg === 'Scope usage');
    expect(usage).toHaveLength(1);
    expect(usage[0]).toMatchObject({ label: 'tracked', amountUsd: 0.1, totalUsd: 0.1, component: 'budget-ledger' });
  });
});
