export interface ScopeOptions {
  /** Absolute cap in USD. Unset means unlimited. */
  capUsd?: number;
  label?: string;
  /** Log the running total on every charge */
  logUsage?: boolean;
}

export interface ScopeSnapshot {
  id: string;
  label?: string;
  capUsd?: number;
  totalUsd: number;
  /** Remaining room under the cap; Infinity when uncapped */
  amountLeftUsd: number;
  open: boolean;
  parentId?: string;
  childIds: string[];
}

export type BudgetCheckPhase = 'before_call' | 'after_charge';
