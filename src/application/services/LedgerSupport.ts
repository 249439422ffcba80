import dayjs, { type Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { BadRequestError } from '../../domain/errors/AppError.js';
import type { LedgerStoragePort } from '../ports/LedgerStoragePort.js';
import type { PageDTO, PageQueryDTO } from '../dto/PaginationDTO.js';

dayjs.extend(customParseFormat);

export const MAX_PAGE_SIZE = 100;

export type Clock = () => string;

export const systemClock: Clock = () => dayjs().toISOString();

export const paginate = <T>(items: T[], query: PageQueryDTO): PageDTO<T> => {
  const { page, pageSize } = query;

  if (page < 1) {
    throw new BadRequestError('Page number must be greater than 0', { page });
  }

  if (pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new BadRequestError(`Page size must be between 1 and ${MAX_PAGE_SIZE}`, { pageSize });
  }

  const total = items.length;
  const offset = (page - 1) * pageSize;

  return {
    items: items.slice(offset, offset + pageSize),
    total,
    page,
    pageSize,
    totalPages: total > 0 ? Math.ceil(total / pageSize) : 1,
  };
};

export const newestFirst = <T>(items: T[], timestampOf: (item: T) => string): T[] =>
  [...items].sort((a, b) => timestampOf(b).localeCompare(timestampOf(a)));

export const matchesSearch = (search: string | undefined, ...fields: Array<string | undefined>): boolean => {
  const needle = search?.trim().toLowerCase();
  if (!needle) {
    return true;
  }

  return fields.some((field) => field?.toLowerCase().includes(needle) ?? false);
};

export const parseCalendarDate = (value: string, field: string): Dayjs => {
  const parsed = dayjs(value, 'YYYY-MM-DD', true);
  if (!parsed.isValid()) {
    throw new BadRequestError(`${field} is not a valid calendar date`, { [field]: value });
  }
  return parsed;
};

/**
 * Removes a statement file together with its entries and their splits.
 */
export const deleteStatementFileCascade = async (storage: LedgerStoragePort, statementFileId: string): Promise<void> => {
  const entries = await storage.statementEntries.findAll((entry) => entry.statementFileId === statementFileId);
  for (const entry of entries) {
    await deleteEntryCascade(storage, entry.id);
  }
  await storage.statementFiles.delete(statementFileId);
};

export const deleteEntryCascade = async (storage: LedgerStoragePort, entryId: string): Promise<void> => {
  const splits = await storage.entrySplits.findAll((split) => split.entryId === entryId);
  for (const split of splits) {
    await storage.entrySplits.delete(split.id);
  }
  await storage.statementEntries.delete(entryId);
};
