import { randomUUID } from 'node:crypto';
import type { StatementFile } from '../../domain/entities/StatementFile.js';
import { BadRequestError, NotFoundError } from '../../domain/errors/AppError.js';
import type { StatementFileCreateDTO, StatementFileFilterDTO, StatementFileUpdateDTO } from '../dto/LedgerDTO.js';
import type { PageDTO, PageQueryDTO } from '../dto/PaginationDTO.js';
import type { LedgerStoragePort } from '../ports/LedgerStoragePort.js';
import {
  deleteStatementFileCascade,
  matchesSearch,
  newestFirst,
  paginate,
  parseCalendarDate,
  systemClock,
  type Clock,
} from './LedgerSupport.js';

const assertPeriod = (periodStart: string, periodEnd: string): void => {
  const start = parseCalendarDate(periodStart, 'periodStart');
  const end = parseCalendarDate(periodEnd, 'periodEnd');

  if (end.isBefore(start, 'day')) {
    throw new BadRequestError('periodEnd must not be before periodStart', { periodStart, periodEnd });
  }
};

export class StatementFileService {
  constructor(
    private readonly storage: LedgerStoragePort,
    private readonly clock: Clock = systemClock,
  ) {}

  async create(input: StatementFileCreateDTO): Promise<StatementFile> {
    assertPeriod(input.periodStart, input.periodEnd);

    const account = await this.storage.bankAccounts.findById(input.bankAccountId);
    if (!account) {
      throw new NotFoundError(`Bank account with ID ${input.bankAccountId} not found`, {
        bankAccountId: input.bankAccountId,
      });
    }

    const file: StatementFile = {
      id: randomUUID(),
      bankAccountId: input.bankAccountId,
      filePath: input.filePath,
      periodStart: input.periodStart,
      periodEnd: input.periodEnd,
      uploadedBy: input.uploadedBy,
      uploadedAt: this.clock(),
    };

    await this.storage.statementFiles.save(file);
    console.log('📁 Statement file registered', { id: file.id, bankAccountId: file.bankAccountId });
    return file;
  }

  async get(id: string): Promise<StatementFile> {
    const file = await this.storage.statementFiles.findById(id);
    if (!file) {
      throw new NotFoundError(`Bank statement file with ID ${id} not found`, { statementFileId: id });
    }
    return file;
  }

  async list(query: PageQueryDTO, filter: StatementFileFilterDTO = {}): Promise<PageDTO<StatementFile>> {
    const files = await this.storage.statementFiles.findAll(
      (file) =>
        (filter.bank_account_id === undefined || file.bankAccountId === filter.bank_account_id) &&
        matchesSearch(filter.search, file.filePath),
    );

    return paginate(newestFirst(files, (file) => file.uploadedAt), query);
  }

  async update(id: string, input: StatementFileUpdateDTO): Promise<StatementFile> {
    const file = await this.get(id);
    const updated: StatementFile = { ...file, ...input, updatedAt: this.clock() };

    assertPeriod(updated.periodStart, updated.periodEnd);

    await this.storage.statementFiles.save(updated);
    return updated;
  }

  /** Hard delete; entries and their splits are removed too. */
  async delete(id: string): Promise<void> {
    await this.get(id);
    await deleteStatementFileCascade(this.storage, id);
    console.log('🗑️ Statement file deleted', { id });
  }
}
