export type TransactionType = 'credit' | 'debit';

export interface StatementTransaction {
  date: string; // YYYY-MM-DD
  description: string;
  amount: number; // always > 0, direction carried by type
  type: TransactionType;
  category?: string;
  balance?: number;
}
