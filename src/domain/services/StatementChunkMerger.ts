import type { StatementChunk } from '../entities/Statement.js';

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const transactionsOf = (chunk: StatementChunk): unknown[] =>
  Array.isArray(chunk.transactions) ? chunk.transactions : [];

/**
 * Dedupe key for a transaction: date, description and the amount read as a number.
 */
export const transactionKey = (transaction: unknown): string => {
  const fields = isRecord(transaction) ? transaction : {};
  return JSON.stringify([fields.date ?? null, fields.description ?? null, Number(fields.amount ?? 0)]);
};

export const hasMorePages = (chunk: StatementChunk): boolean =>
  chunk.has_more === true && typeof chunk.next_page_hint === 'string' && chunk.next_page_hint !== '';

export const nextPageHint = (chunk: StatementChunk): string =>
  typeof chunk.next_page_hint === 'string' ? chunk.next_page_hint : '';

/**
 * Folds a newer chunk into the accumulator. Identity fields keep the accumulator's values,
 * closing_balance follows the newest chunk that reports one, and transactions are appended
 * only when their key has not been seen.
 */
export const mergeChunks = (accumulator: StatementChunk, next: StatementChunk): StatementChunk => {
  const merged: StatementChunk = { ...accumulator };

  for (const [field, value] of Object.entries(next)) {
    if (field === 'transactions' || field === 'has_more' || field === 'next_page_hint') {
      continue;
    }
    if ((merged[field] === undefined || merged[field] === null) && value !== undefined && value !== null) {
      merged[field] = value;
    }
  }

  const transactions = [...transactionsOf(accumulator)];
  const seen = new Set(transactions.map(transactionKey));

  for (const transaction of transactionsOf(next)) {
    const key = transactionKey(transaction);
    if (!seen.has(key)) {
      transactions.push(transaction);
      seen.add(key);
    }
  }
  merged.transactions = transactions;

  if (next.closing_balance !== undefined && next.closing_balance !== null) {
    merged.closing_balance = next.closing_balance;
  }

  merged.has_more = next.has_more === true;
  if (typeof next.next_page_hint === 'string' && next.next_page_hint !== '') {
    merged.next_page_hint = next.next_page_hint;
  } else {
    delete merged.next_page_hint;
  }

  return merged;
};

export const stripContinuationFields = (chunk: StatementChunk): StatementChunk => {
  const { has_more: _hasMore, next_page_hint: _nextPageHint, ...rest } = chunk;
  return rest;
};
