import { randomUUID } from 'node:crypto';
import type { EntrySplit, StatementEntry } from '../../domain/entities/StatementEntry.js';
import { NotFoundError } from '../../domain/errors/AppError.js';
import type {
  EntrySplitCreateDTO,
  EntrySplitFilterDTO,
  EntrySplitUpdateDTO,
  StatementEntryCreateDTO,
  StatementEntryFilterDTO,
  StatementEntryUpdateDTO,
} from '../dto/LedgerDTO.js';
import type { PageDTO, PageQueryDTO } from '../dto/PaginationDTO.js';
import type { LedgerStoragePort } from '../ports/LedgerStoragePort.js';
import { deleteEntryCascade, matchesSearch, newestFirst, paginate, systemClock, type Clock } from './LedgerSupport.js';

export class StatementEntryService {
  constructor(
    private readonly storage: LedgerStoragePort,
    private readonly clock: Clock = systemClock,
  ) {}

  async create(input: StatementEntryCreateDTO): Promise<StatementEntry> {
    const file = await this.storage.statementFiles.findById(input.statementFileId);
    if (!file) {
      throw new NotFoundError(`Bank statement file with ID ${input.statementFileId} not found`, {
        statementFileId: input.statementFileId,
      });
    }

    const account = await this.storage.bankAccounts.findById(input.bankAccountId);
    if (!account) {
      throw new NotFoundError(`Bank account with ID ${input.bankAccountId} not found`, {
        bankAccountId: input.bankAccountId,
      });
    }

    await this.assertCategoryExists(input.categoryId);

    const entry: StatementEntry = { id: randomUUID(), ...input, createdAt: this.clock() };
    await this.storage.statementEntries.save(entry);
    return entry;
  }

  async get(id: string): Promise<StatementEntry> {
    const entry = await this.storage.statementEntries.findById(id);
    if (!entry) {
      throw new NotFoundError(`Bank statement entry with ID ${id} not found`, { entryId: id });
    }
    return entry;
  }

  async list(query: PageQueryDTO, filter: StatementEntryFilterDTO = {}): Promise<PageDTO<StatementEntry>> {
    const entries = await this.storage.statementEntries.findAll(
      (entry) =>
        (filter.bank_account_id === undefined || entry.bankAccountId === filter.bank_account_id) &&
        (filter.statement_file_id === undefined || entry.statementFileId === filter.statement_file_id) &&
        (filter.category_id === undefined || entry.categoryId === filter.category_id) &&
        (filter.transaction_type === undefined || entry.debitCredit === filter.transaction_type) &&
        matchesSearch(filter.search, entry.description, entry.transactionReference, entry.notes),
    );

    return paginate(newestFirst(entries, (entry) => entry.createdAt), query);
  }

  async update(id: string, input: StatementEntryUpdateDTO): Promise<StatementEntry> {
    const entry = await this.get(id);
    await this.assertCategoryExists(input.categoryId);

    const updated: StatementEntry = { ...entry, ...input, updatedAt: this.clock() };
    await this.storage.statementEntries.save(updated);
    return updated;
  }

  /** Hard delete; splits of the entry go with it. */
  async delete(id: string): Promise<void> {
    await this.get(id);
    await deleteEntryCascade(this.storage, id);
  }

  async createSplit(input: EntrySplitCreateDTO): Promise<EntrySplit> {
    await this.get(input.entryId);
    await this.assertCategoryExists(input.categoryId);

    const split: EntrySplit = {
      id: randomUUID(),
      entryId: input.entryId,
      categoryId: input.categoryId,
      amount: input.amount,
      description: input.description,
      createdAt: this.clock(),
    };

    await this.storage.entrySplits.save(split);
    return split;
  }

  async getSplit(id: string): Promise<EntrySplit> {
    const split = await this.storage.entrySplits.findById(id);
    if (!split) {
      throw new NotFoundError(`Bank statement entry split with ID ${id} not found`, { splitId: id });
    }
    return split;
  }

  async listSplits(query: PageQueryDTO, filter: EntrySplitFilterDTO = {}): Promise<PageDTO<EntrySplit>> {
    const splits = await this.storage.entrySplits.findAll(
      (split) =>
        (filter.entry_id === undefined || split.entryId === filter.entry_id) &&
        (filter.category_id === undefined || split.categoryId === filter.category_id),
    );

    return paginate(newestFirst(splits, (split) => split.createdAt), query);
  }

  async updateSplit(id: string, input: EntrySplitUpdateDTO): Promise<EntrySplit> {
    const split = await this.getSplit(id);
    await this.assertCategoryExists(input.categoryId);

    const updated: EntrySplit = { ...split, ...input, updatedAt: this.clock() };
    await this.storage.entrySplits.save(updated);
    return updated;
  }

  async deleteSplit(id: string): Promise<void> {
    await this.getSplit(id);
    await this.storage.entrySplits.delete(id);
  }

  private async assertCategoryExists(categoryId: string | undefined): Promise<void> {
    if (categoryId === undefined) {
      return;
    }

    const category = await this.storage.categories.findById(categoryId);
    if (!category) {
      throw new NotFoundError(`Category with ID ${categoryId} not found`, { categoryId });
    }
  }
}
