import { DEFAULT_CURRENCY, type Statement, type StatementPeriod } from '../entities/Statement.js';
import type { StatementTransaction, TransactionType } from '../entities/Transaction.js';
import { SchemaViolationError } from '../errors/ExtractionErrors.js';

export interface NormalizeOptions {
  /** Read a zero running balance as "not reported" instead of 0. */
  zeroBalanceIsAbsent?: boolean;
}

const REQUIRED_FIELDS = [
  'account_holder',
  'bank_name',
  'account_number',
  'statement_period',
  'opening_balance',
  'closing_balance',
] as const;

const REQUIRED_TRANSACTION_FIELDS = ['date', 'description', 'amount', 'type'] as const;

const transactionTypes: Record<string, TransactionType> = {
  credit: 'credit',
  cr: 'credit',
  debit: 'debit',
  db: 'debit',
  dr: 'debit',
};

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isMissing = (value: unknown): boolean => value === undefined || value === null;

const toDecimal = (value: unknown, field: string): number => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  throw new SchemaViolationError(field, 'must be a decimal number');
};

const toText = (value: unknown, field: string): string => {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number') {
    return String(value);
  }

  throw new SchemaViolationError(field, 'must be text');
};

/**
 * Keeps the last four digits of an account number visible and masks every earlier digit.
 */
export const maskAccountNumber = (accountNumber: string): string => {
  const digitCount = (accountNumber.match(/\d/g) ?? []).length;
  let toMask = Math.max(0, digitCount - 4);

  return accountNumber.replace(/\d/g, (digit) => {
    if (toMask > 0) {
      toMask--;
      return '*';
    }
    return digit;
  });
};

const normalizePeriod = (value: unknown): StatementPeriod => {
  if (!isRecord(value)) {
    throw new SchemaViolationError('statement_period', 'must be an object with start_date and end_date');
  }

  for (const key of ['start_date', 'end_date'] as const) {
    if (isMissing(value[key])) {
      throw new SchemaViolationError(`statement_period.${key}`);
    }
  }

  return {
    start_date: toText(value.start_date, 'statement_period.start_date'),
    end_date: toText(value.end_date, 'statement_period.end_date'),
  };
};

const normalizeType = (value: unknown, field: string): TransactionType => {
  const key = typeof value === 'string' ? value.trim().toLowerCase() : '';
  const type = transactionTypes[key];

  if (!type) {
    throw new SchemaViolationError(field, 'must be "credit" or "debit"');
  }

  return type;
};

const normalizeTransaction = (value: unknown, index: number, options: NormalizeOptions): StatementTransaction => {
  const path = `transactions[${index}]`;

  if (!isRecord(value)) {
    throw new SchemaViolationError(path, 'must be an object');
  }

  for (const key of REQUIRED_TRANSACTION_FIELDS) {
    if (isMissing(value[key])) {
      throw new SchemaViolationError(`${path}.${key}`);
    }
  }

  const amount = Math.abs(toDecimal(value.amount, `${path}.amount`));
  if (amount === 0) {
    throw new SchemaViolationError(`${path}.amount`, 'must be greater than zero');
  }

  const transaction: StatementTransaction = {
    date: toText(value.date, `${path}.date`),
    description: toText(value.description, `${path}.description`),
    amount,
    type: normalizeType(value.type, `${path}.type`),
  };

  if (typeof value.category === 'string' && value.category.trim() !== '') {
    transaction.category = value.category;
  }

  if (!isMissing(value.balance) && value.balance !== '') {
    const balance = toDecimal(value.balance, `${path}.balance`);
    if (!(options.zeroBalanceIsAbsent && balance === 0)) {
      transaction.balance = balance;
    }
  }

  return transaction;
};

/**
 * Converts a recovered record into the canonical Statement, naming the first offending field
 * when the record does not fit.
 */
export const normalizeStatement = (record: UnknownRecord, options: NormalizeOptions = {}): Statement => {
  for (const field of REQUIRED_FIELDS) {
    if (isMissing(record[field])) {
      throw new SchemaViolationError(field);
    }
  }

  const rawTransactions = isMissing(record.transactions) ? [] : record.transactions;
  if (!Array.isArray(rawTransactions)) {
    throw new SchemaViolationError('transactions', 'must be a list');
  }

  const currency = typeof record.currency === 'string' && record.currency.trim() !== ''
    ? record.currency.trim()
    : DEFAULT_CURRENCY;

  return {
    account_holder: toText(record.account_holder, 'account_holder'),
    bank_name: toText(record.bank_name, 'bank_name'),
    account_number: maskAccountNumber(toText(record.account_number, 'account_number')),
    statement_period: normalizePeriod(record.statement_period),
    opening_balance: toDecimal(record.opening_balance, 'opening_balance'),
    closing_balance: toDecimal(record.closing_balance, 'closing_balance'),
    transactions: rawTransactions.map((txn: unknown, index: number) => normalizeTransaction(txn, index, options)),
    currency,
  };
};
