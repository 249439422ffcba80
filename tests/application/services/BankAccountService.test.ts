import { beforeEach, describe, expect, it } from 'vitest';
import { lastFourDigits } from '../../../src/application/services/BankAccountService.js';
import { BadRequestError, ConflictError } from '../../../src/domain/errors/AppError.js';
import { createLedger, FIRST_PAGE, seedStatementFile, type Ledger } from '../../support/ledgerFixtures.js';

describe('lastFourDigits', () => {
  it('keeps the last four digits only', () => {
    expect(lastFourDigits('0012-3456-7890')).toBe('7890');
    expect(lastFourDigits('ACCT 12')).toBe('12');
  });

  it('rejects a number without digits', () => {
    expect(() => lastFourDigits('****')).toThrowError(
      new BadRequestError('Account number must contain at least one digit'),
    );
  });
});

describe('BankAccountService', () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = createLedger();
  });

  it('stores only the last four digits of the account number', async () => {
    const { account } = await seedStatementFile(ledger);

    expect(account.accountNumber).toBe('7890');
  });

  it('requires an existing project', async () => {
    await expect(
      ledger.bankAccounts.create({
        projectId: 'missing',
        accountNumber: '1234',
        bankName: 'Test Bank',
        accountType: 'savings',
        createdBy: 'tester',
      }),
    ).rejects.toThrowError('Project with ID missing not found');
  });

  it('rejects the same bank and number twice in a project', async () => {
    const { project } = await seedStatementFile(ledger);

    await expect(
      ledger.bankAccounts.create({
        projectId: project.id,
        accountNumber: '9999-7890',
        bankName: 'TEST BANK',
        accountType: 'savings',
        createdBy: 'tester',
      }),
    ).rejects.toThrowError(new ConflictError('Bank account already exists for this project'));
  });

  it('filters by project and searches bank names', async () => {
    const { project, account } = await seedStatementFile(ledger);
    const other = await ledger.projects.create({
      name: 'Hilltop Villas',
      developerName: 'South Homes',
      investorName: 'Harbor Capital',
      createdBy: 'tester',
    });
    await ledger.bankAccounts.create({
      projectId: other.id,
      accountNumber: '7890',
      bankName: 'Test Bank',
      accountType: 'checking',
      createdBy: 'tester',
    });

    const byProject = await ledger.bankAccounts.list(FIRST_PAGE, { project_id: project.id });
    const bySearch = await ledger.bankAccounts.list(FIRST_PAGE, { search: 'other bank' });

    expect(byProject.items.map((item) => item.id)).toEqual([account.id]);
    expect(bySearch.total).toBe(0);
  });

  it('masks a new account number on update', async () => {
    const { account } = await seedStatementFile(ledger);

    const updated = await ledger.bankAccounts.update(account.id, { accountNumber: '5555 4444 3333', color: 'blue' });

    expect(updated).toMatchObject({ accountNumber: '3333', color: 'blue', bankName: 'Test Bank' });
  });

  it('deletes statement files, entries and splits with the account', async () => {
    const { account, file } = await seedStatementFile(ledger);
    const category = await ledger.categories.create({ name: 'Rent', createdBy: 'tester' });
    const entry = await ledger.statementEntries.create({
      statementFileId: file.id,
      bankAccountId: account.id,
      date: '2024-01-05',
      description: 'Office rent',
      debitCredit: 'debit',
      amount: 1200,
    });
    await ledger.statementEntries.createSplit({ entryId: entry.id, categoryId: category.id, amount: 1200 });

    await ledger.bankAccounts.delete(account.id);

    await expect(ledger.storage.bankAccounts.findAll()).resolves.toEqual([]);
    await expect(ledger.storage.statementFiles.findAll()).resolves.toEqual([]);
    await expect(ledger.storage.statementEntries.findAll()).resolves.toEqual([]);
    await expect(ledger.storage.entrySplits.findAll()).resolves.toEqual([]);
    await expect(ledger.storage.categories.findAll()).resolves.toHaveLength(1);
  });
});
