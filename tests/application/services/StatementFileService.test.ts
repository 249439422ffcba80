import { beforeEach, describe, expect, it } from 'vitest';
import { BadRequestError, NotFoundError } from '../../../src/domain/errors/AppError.js';
import { createLedger, FIRST_PAGE, seedStatementFile, type Ledger } from '../../support/ledgerFixtures.js';

describe('StatementFileService', () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = createLedger();
  });

  it('registers a file against an existing account', async () => {
    const { account, file } = await seedStatementFile(ledger);

    expect(file).toMatchObject({
      bankAccountId: account.id,
      periodStart: '2024-01-01',
      periodEnd: '2024-01-31',
      uploadedAt: '2024-01-01T00:00:02.000Z',
    });
  });

  it('rejects a period that ends before it starts', async () => {
    const { account } = await seedStatementFile(ledger);

    await expect(
      ledger.statementFiles.create({
        bankAccountId: account.id,
        filePath: 'statements/bad.pdf',
        periodStart: '2024-02-10',
        periodEnd: '2024-02-01',
        uploadedBy: 'tester',
      }),
    ).rejects.toThrowError(new BadRequestError('periodEnd must not be before periodStart'));
  });

  it('rejects an impossible date', async () => {
    const { account } = await seedStatementFile(ledger);

    await expect(
      ledger.statementFiles.create({
        bankAccountId: account.id,
        filePath: 'statements/bad.pdf',
        periodStart: '2024-02-30',
        periodEnd: '2024-03-01',
        uploadedBy: 'tester',
      }),
    ).rejects.toThrowError('periodStart is not a valid calendar date');
  });

  it('requires an existing account', async () => {
    await expect(
      ledger.statementFiles.create({
        bankAccountId: 'missing',
        filePath: 'statements/2024-01.pdf',
        periodStart: '2024-01-01',
        periodEnd: '2024-01-31',
        uploadedBy: 'tester',
      }),
    ).rejects.toThrowError(new NotFoundError('Bank account with ID missing not found'));
  });

  it('checks the merged period on update', async () => {
    const { file } = await seedStatementFile(ledger);

    await expect(ledger.statementFiles.update(file.id, { periodEnd: '2023-12-31' })).rejects.toBeInstanceOf(
      BadRequestError,
    );
    await expect(ledger.statementFiles.update(file.id, { periodEnd: '2024-02-15' })).resolves.toMatchObject({
      periodStart: '2024-01-01',
      periodEnd: '2024-02-15',
    });
  });

  it('lists by account and deletes entries with the file', async () => {
    const { account, file } = await seedStatementFile(ledger);
    await ledger.statementEntries.create({
      statementFileId: file.id,
      bankAccountId: account.id,
      date: '2024-01-05',
      description: 'Office rent',
      debitCredit: 'debit',
      amount: 1200,
    });

    const listed = await ledger.statementFiles.list(FIRST_PAGE, { bank_account_id: account.id });
    expect(listed.items.map((item) => item.id)).toEqual([file.id]);

    await ledger.statementFiles.delete(file.id);

    await expect(ledger.statementFiles.get(file.id)).rejects.toThrowError(
      `Bank statement file with ID ${file.id} not found`,
    );
    await expect(ledger.storage.statementEntries.findAll()).resolves.toEqual([]);
    await expect(ledger.bankAccounts.get(account.id)).resolves.toEqual(account);
  });
});
