import { describe, expect, it } from 'vitest';
import type { StatementChunk } from '../../../src/domain/entities/Statement.js';
import {
  hasMorePages,
  mergeChunks,
  nextPageHint,
  stripContinuationFields,
  transactionKey,
} from '../../../src/domain/services/StatementChunkMerger.js';

const salary = { date: '2024-01-05', description: 'Salary', amount: 500, type: 'credit' };
const coffee = { date: '2024-01-09', description: 'Coffee', amount: 4.5, type: 'debit' };
const rent = { date: '2024-01-15', description: 'Rent', amount: 900, type: 'debit' };

describe('transactionKey', () => {
  it('reads the amount as a number', () => {
    expect(transactionKey({ ...coffee, amount: '4.50' })).toBe(transactionKey(coffee));
    expect(transactionKey(coffee)).toBe('["2024-01-09","Coffee",4.5]');
  });
});

describe('mergeChunks', () => {
  it('keeps identity fields from the first chunk and backfills absent ones', () => {
    const accumulator: StatementChunk = {
      account_holder: 'Jane Doe',
      bank_name: null,
      closing_balance: 100,
      transactions: [salary],
      has_more: true,
      next_page_hint: 'after Salary',
    };
    const next: StatementChunk = {
      account_holder: 'Someone Else',
      bank_name: 'Test Bank',
      closing_balance: 200,
      transactions: [{ ...salary }, coffee],
      has_more: false,
    };

    expect(mergeChunks(accumulator, next)).toEqual({
      account_holder: 'Jane Doe',
      bank_name: 'Test Bank',
      closing_balance: 200,
      transactions: [salary, coffee],
      has_more: false,
    });
  });

  it('keeps the closing balance when the next chunk has none', () => {
    const merged = mergeChunks({ closing_balance: 100 }, { closing_balance: null, transactions: [] });

    expect(merged.closing_balance).toBe(100);
  });

  it('deduplicates within the incoming chunk as well', () => {
    const merged = mergeChunks({ transactions: [] }, { transactions: [rent, { ...rent }, coffee] });

    expect(merged.transactions).toEqual([rent, coffee]);
  });

  it('takes the continuation hint from the next chunk', () => {
    const merged = mergeChunks({ transactions: [] }, { transactions: [], has_more: true, next_page_hint: 'after Rent' });

    expect(hasMorePages(merged)).toBe(true);
    expect(nextPageHint(merged)).toBe('after Rent');
  });

  it('does not mutate the accumulator', () => {
    const accumulator: StatementChunk = { transactions: [salary], has_more: true, next_page_hint: 'p2' };

    mergeChunks(accumulator, { transactions: [coffee], has_more: false });

    expect(accumulator).toEqual({ transactions: [salary], has_more: true, next_page_hint: 'p2' });
  });
});

describe('continuation fields', () => {
  it('requires has_more to be exactly true and a non-empty hint', () => {
    expect(hasMorePages({ has_more: 'true', next_page_hint: 'x' })).toBe(false);
    expect(hasMorePages({ has_more: true, next_page_hint: '' })).toBe(false);
    expect(hasMorePages({ has_more: true })).toBe(false);
    expect(hasMorePages({ has_more: true, next_page_hint: 'x' })).toBe(true);
  });

  it('strips has_more and next_page_hint', () => {
    expect(stripContinuationFields({ bank_name: 'Test Bank', has_more: false, next_page_hint: 'x' })).toEqual({
      bank_name: 'Test Bank',
    });
  });
});
