import type { TransactionType } from './Transaction.js';

export interface StatementEntry {
  id: string;
  statementFileId: string;
  bankAccountId: string;
  categoryId?: string;
  tags?: string[];
  date: string; // ISO date
  time?: string;
  description: string;
  transactionReference?: string;
  debitCredit: TransactionType;
  amount: number;
  balance?: number;
  notes?: string;
  createdAt: string;
  updatedAt?: string;
  updatedBy?: string;
}

export interface EntrySplit {
  id: string;
  entryId: string;
  categoryId: string;
  amount: number;
  description?: string;
  createdAt: string;
  updatedAt?: string;
  updatedBy?: string;
}
