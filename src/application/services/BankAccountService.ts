import { randomUUID } from 'node:crypto';
import type { BankAccount } from '../../domain/entities/BankAccount.js';
import { BadRequestError, ConflictError, NotFoundError } from '../../domain/errors/AppError.js';
import type { BankAccountCreateDTO, BankAccountFilterDTO, BankAccountUpdateDTO } from '../dto/LedgerDTO.js';
import type { PageDTO, PageQueryDTO } from '../dto/PaginationDTO.js';
import type { LedgerStoragePort } from '../ports/LedgerStoragePort.js';
import {
  deleteEntryCascade,
  deleteStatementFileCascade,
  matchesSearch,
  newestFirst,
  paginate,
  systemClock,
  type Clock,
} from './LedgerSupport.js';

/**
 * Only the last four digits of an account number are ever stored.
 */
export const lastFourDigits = (accountNumber: string): string => {
  const digits = accountNumber.replace(/\D/g, '');
  if (digits.length === 0) {
    throw new BadRequestError('Account number must contain at least one digit', { accountNumber: '[redacted]' });
  }
  return digits.slice(-4);
};

export class BankAccountService {
  constructor(
    private readonly storage: LedgerStoragePort,
    private readonly clock: Clock = systemClock,
  ) {}

  async create(input: BankAccountCreateDTO): Promise<BankAccount> {
    const project = await this.storage.projects.findById(input.projectId);
    if (!project) {
      throw new NotFoundError(`Project with ID ${input.projectId} not found`, { projectId: input.projectId });
    }

    const account: BankAccount = {
      id: randomUUID(),
      projectId: input.projectId,
      accountNumber: lastFourDigits(input.accountNumber),
      bankName: input.bankName,
      accountType: input.accountType,
      color: input.color,
      createdBy: input.createdBy,
      createdAt: this.clock(),
    };

    await this.assertUnique(account);
    await this.storage.bankAccounts.save(account);
    console.log('🏦 Bank account created', { id: account.id, projectId: account.projectId, bank: account.bankName });
    return account;
  }

  async get(id: string): Promise<BankAccount> {
    const account = await this.storage.bankAccounts.findById(id);
    if (!account) {
      throw new NotFoundError(`Bank account with ID ${id} not found`, { bankAccountId: id });
    }
    return account;
  }

  async list(query: PageQueryDTO, filter: BankAccountFilterDTO = {}): Promise<PageDTO<BankAccount>> {
    const accounts = await this.storage.bankAccounts.findAll(
      (account) =>
        (filter.project_id === undefined || account.projectId === filter.project_id) &&
        matchesSearch(filter.search, account.bankName, account.accountNumber, account.accountType),
    );

    return paginate(newestFirst(accounts, (account) => account.createdAt), query);
  }

  async update(id: string, input: BankAccountUpdateDTO): Promise<BankAccount> {
    const account = await this.get(id);
    const { accountNumber, ...rest } = input;

    const updated: BankAccount = {
      ...account,
      ...rest,
      accountNumber: accountNumber === undefined ? account.accountNumber : lastFourDigits(accountNumber),
      updatedAt: this.clock(),
    };

    if (updated.accountNumber !== account.accountNumber || updated.bankName !== account.bankName) {
      await this.assertUnique(updated);
    }

    await this.storage.bankAccounts.save(updated);
    return updated;
  }

  /** Hard delete; statement files, entries and splits of the account go with it. */
  async delete(id: string): Promise<void> {
    await this.get(id);

    const files = await this.storage.statementFiles.findAll((file) => file.bankAccountId === id);
    for (const file of files) {
      await deleteStatementFileCascade(this.storage, file.id);
    }

    const strays = await this.storage.statementEntries.findAll((entry) => entry.bankAccountId === id);
    for (const entry of strays) {
      await deleteEntryCascade(this.storage, entry.id);
    }

    await this.storage.bankAccounts.delete(id);
    console.log('🗑️ Bank account deleted', { id, statementFiles: files.length });
  }

  private async assertUnique(account: BankAccount): Promise<void> {
    const bankName = account.bankName.toLowerCase();
    const clashes = await this.storage.bankAccounts.findAll(
      (other) =>
        other.id !== account.id &&
        other.projectId === account.projectId &&
        other.accountNumber === account.accountNumber &&
        other.bankName.toLowerCase() === bankName,
    );

    if (clashes.length > 0) {
      throw new ConflictError('Bank account already exists for this project', {
        projectId: account.projectId,
        bankName: account.bankName,
        accountNumber: account.accountNumber,
      });
    }
  }
}
