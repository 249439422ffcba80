import { describe, expect, it, vi } from 'vitest';
import type { ExtractionProviderPort } from '../../../src/application/ports/ExtractionProviderPort.js';
import { StatementExtractionEngine } from '../../../src/application/services/StatementExtractionEngine.js';
import type { StatementChunk } from '../../../src/domain/entities/Statement.js';
import { ProviderUnavailableError } from '../../../src/domain/errors/ExtractionErrors.js';

const createChunk = (overrides: StatementChunk = {}): StatementChunk => ({
  account_holder: 'Jane Doe',
  bank_name: 'Test Bank',
  account_number: '000012345678',
  statement_period: { start_date: '2024-01-01', end_date: '2024-01-31' },
  opening_balance: 1000,
  closing_balance: 1000,
  transactions: [],
  ...overrides,
});

const txn = (day: number, description: string, amount: number, type = 'debit') => ({
  date: `2024-01-${String(day).padStart(2, '0')}`,
  description,
  amount,
  type,
});

const createProvider = () => {
  const extractFromText = vi.fn<ExtractionProviderPort['extractFromText']>();
  const extractFromImages = vi.fn<ExtractionProviderPort['extractFromImages']>();
  const provider: ExtractionProviderPort = { provider: 'openai', extractFromText, extractFromImages };
  return { provider, extractFromText, extractFromImages };
};

describe('StatementExtractionEngine.extractFromText', () => {
  it('follows the continuation hint and merges both chunks', async () => {
    const { provider, extractFromText } = createProvider();
    extractFromText
      .mockResolvedValueOnce(
        createChunk({
          transactions: [txn(5, 'Salary', 500, 'credit'), txn(10, 'Coffee', 4.5)],
          closing_balance: 1495.5,
          has_more: true,
          next_page_hint: 'after 2024-01-10 Coffee',
        }),
      )
      .mockResolvedValueOnce({
        transactions: [txn(10, 'Coffee', 4.5), txn(15, 'Rent', 900)],
        closing_balance: 595.5,
        has_more: false,
      });

    const statement = await new StatementExtractionEngine(provider).extractFromText('STATEMENT TEXT');

    expect(extractFromText).toHaveBeenCalledTimes(2);
    expect(extractFromText).toHaveBeenNthCalledWith(1, 'STATEMENT TEXT', '');
    expect(extractFromText).toHaveBeenNthCalledWith(2, 'STATEMENT TEXT', 'after 2024-01-10 Coffee');
    expect(statement).toEqual({
      account_holder: 'Jane Doe',
      bank_name: 'Test Bank',
      account_number: '********5678',
      statement_period: { start_date: '2024-01-01', end_date: '2024-01-31' },
      opening_balance: 1000,
      closing_balance: 595.5,
      transactions: [
        { date: '2024-01-05', description: 'Salary', amount: 500, type: 'credit' },
        { date: '2024-01-10', description: 'Coffee', amount: 4.5, type: 'debit' },
        { date: '2024-01-15', description: 'Rent', amount: 900, type: 'debit' },
      ],
      currency: 'USD',
    });
  });

  it('stops after the follow-up cap even when the model keeps asking for more', async () => {
    const { provider, extractFromText } = createProvider();
    let call = 0;
    extractFromText.mockImplementation(async () => {
      call++;
      return createChunk({ transactions: [txn(call, `Row ${call}`, call)], has_more: true, next_page_hint: `row ${call}` });
    });

    const statement = await new StatementExtractionEngine(provider).extractFromText('text');

    expect(extractFromText).toHaveBeenCalledTimes(4);
    expect(statement.transactions.map((t) => t.description)).toEqual(['Row 1', 'Row 2', 'Row 3', 'Row 4']);
    expect(statement).not.toHaveProperty('has_more');
    expect(statement).not.toHaveProperty('next_page_hint');
  });

  it('honours a custom follow-up limit', async () => {
    const { provider, extractFromText } = createProvider();
    extractFromText.mockResolvedValue(createChunk({ has_more: true, next_page_hint: 'more' }));

    await new StatementExtractionEngine(provider, { maxFollowUps: 1 }).extractFromText('text');

    expect(extractFromText).toHaveBeenCalledTimes(2);
  });

  it('makes a single call when has_more comes without a hint', async () => {
    const { provider, extractFromText } = createProvider();
    extractFromText.mockResolvedValue(createChunk({ has_more: true, next_page_hint: '' }));

    await new StatementExtractionEngine(provider).extractFromText('text');

    expect(extractFromText).toHaveBeenCalledTimes(1);
  });

  it('fails the whole job when a follow-up call fails', async () => {
    const { provider, extractFromText } = createProvider();
    extractFromText
      .mockResolvedValueOnce(createChunk({ has_more: true, next_page_hint: 'p2' }))
      .mockRejectedValueOnce(new ProviderUnavailableError('openai', 'TRANSPORT', 'socket hang up'));

    await expect(new StatementExtractionEngine(provider).extractFromText('text')).rejects.toThrow(
      'Provider openai unavailable: socket hang up',
    );
  });
});

describe('StatementExtractionEngine.extractFromImages', () => {
  it('calls once per distinct page with a page label', async () => {
    const { provider, extractFromImages } = createProvider();
    extractFromImages.mockImplementation(async (_images, hint) =>
      hint === 'page=1'
        ? createChunk({ transactions: [txn(3, 'Deposit', 200, 'credit')], closing_balance: 1200 })
        : { account_holder: 'Page Two Name', transactions: [txn(20, 'Groceries', 80)], closing_balance: 1120 },
    );

    const statement = await new StatementExtractionEngine(provider).extractFromImages(['img-a', 'img-b', 'img-a']);

    expect(extractFromImages).toHaveBeenCalledTimes(2);
    expect(extractFromImages).toHaveBeenNthCalledWith(1, ['img-a'], 'page=1');
    expect(extractFromImages).toHaveBeenNthCalledWith(2, ['img-b'], 'page=2');
    expect(statement.account_holder).toBe('Jane Doe');
    expect(statement.closing_balance).toBe(1120);
    expect(statement.transactions.map((t) => t.description)).toEqual(['Deposit', 'Groceries']);
  });

  it('returns the empty skeleton without calling the provider when there are no pages', async () => {
    const { provider, extractFromImages } = createProvider();

    const statement = await new StatementExtractionEngine(provider).extractFromImages([]);

    expect(extractFromImages).not.toHaveBeenCalled();
    expect(statement).toEqual({
      account_holder: '',
      bank_name: '',
      account_number: '',
      statement_period: { start_date: '', end_date: '' },
      opening_balance: 0,
      closing_balance: 0,
      transactions: [],
      currency: 'USD',
    });
  });

  it('folds pages in page order when calls finish out of order', async () => {
    const { provider, extractFromImages } = createProvider();
    extractFromImages.mockImplementation(async (images) => {
      const page = Number(images[0].replace('img-', ''));
      await new Promise((resolve) => setTimeout(resolve, page === 1 ? 20 : 0));
      return page === 1
        ? createChunk({ transactions: [txn(1, 'Page 1', 1)], closing_balance: 100 })
        : { account_holder: `Holder ${page}`, transactions: [txn(page, `Page ${page}`, page)], closing_balance: page * 100 };
    });

    const statement = await new StatementExtractionEngine(provider, { imageConcurrency: 3 }).extractFromImages([
      'img-1',
      'img-2',
      'img-3',
    ]);

    expect(statement.account_holder).toBe('Jane Doe');
    expect(statement.closing_balance).toBe(300);
    expect(statement.transactions.map((t) => t.description)).toEqual(['Page 1', 'Page 2', 'Page 3']);
  });
});
