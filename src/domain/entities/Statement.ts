import type { StatementTransaction } from './Transaction.js';

export interface StatementPeriod {
  start_date: string;
  end_date: string;
}

export interface Statement {
  account_holder: string;
  bank_name: string;
  account_number: string; // masked, last 4 digits visible
  statement_period: StatementPeriod;
  opening_balance: number;
  closing_balance: number;
  transactions: StatementTransaction[];
  currency: string;
}

/**
 * One provider call's output before merging. Mirrors Statement loosely and may still carry the
 * continuation fields.
 */
export interface StatementChunk {
  [field: string]: unknown;
  transactions?: unknown;
  closing_balance?: unknown;
  has_more?: unknown;
  next_page_hint?: unknown;
}

export const DEFAULT_CURRENCY = 'USD';

export const emptyStatementChunk = (): StatementChunk => ({
  account_holder: '',
  bank_name: '',
  account_number: '',
  statement_period: { start_date: '', end_date: '' },
  opening_balance: 0,
  closing_balance: 0,
  transactions: [],
  currency: DEFAULT_CURRENCY,
});
