import { describe, expect, it } from 'vitest';
import { matchesSearch, newestFirst, paginate, parseCalendarDate } from '../../../src/application/services/LedgerSupport.js';
import { BadRequestError } from '../../../src/domain/errors/AppError.js';

describe('paginate', () => {
  const items = ['a', 'b', 'c', 'd', 'e'];

  it('slices the requested page and counts pages', () => {
    expect(paginate(items, { page: 2, pageSize: 2 })).toEqual({
      items: ['c', 'd'],
      total: 5,
      page: 2,
      pageSize: 2,
      totalPages: 3,
    });
  });

  it('returns an empty page past the end', () => {
    expect(paginate(items, { page: 4, pageSize: 2 }).items).toEqual([]);
  });

  it('reports one page for an empty list', () => {
    expect(paginate([], { page: 1, pageSize: 10 })).toMatchObject({ total: 0, totalPages: 1 });
  });

  it('rejects out-of-range page parameters', () => {
    expect(() => paginate(items, { page: 0, pageSize: 10 })).toThrowError(
      new BadRequestError('Page number must be greater than 0'),
    );
    expect(() => paginate(items, { page: 1, pageSize: 101 })).toThrowError('Page size must be between 1 and 100');
    expect(() => paginate(items, { page: 1, pageSize: 0 })).toThrowError('Page size must be between 1 and 100');
  });
});

describe('ledger helpers', () => {
  it('sorts newest first by timestamp', () => {
    const rows = [
      { id: 'old', at: '2024-01-01T00:00:00.000Z' },
      { id: 'new', at: '2024-03-01T00:00:00.000Z' },
      { id: 'mid', at: '2024-02-01T00:00:00.000Z' },
    ];

    expect(newestFirst(rows, (row) => row.at).map((row) => row.id)).toEqual(['new', 'mid', 'old']);
  });

  it('searches any field case-insensitively', () => {
    expect(matchesSearch('HARBOR', 'Riverside', 'Harbor Capital')).toBe(true);
    expect(matchesSearch('harbor', 'Riverside', undefined)).toBe(false);
    expect(matchesSearch('  ', 'anything')).toBe(true);
    expect(matchesSearch(undefined)).toBe(true);
  });

  it('accepts only real calendar dates', () => {
    expect(parseCalendarDate('2024-02-29', 'periodStart').format('YYYY-MM-DD')).toBe('2024-02-29');
    expect(() => parseCalendarDate('2023-02-29', 'periodStart')).toThrowError(
      'periodStart is not a valid calendar date',
    );
  });
});
