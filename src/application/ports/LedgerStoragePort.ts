import type { BankAccount } from '../../domain/entities/BankAccount.js';
import type { Category } from '../../domain/entities/Category.js';
import type { Project } from '../../domain/entities/Project.js';
import type { EntrySplit, StatementEntry } from '../../domain/entities/StatementEntry.js';
import type { StatementFile } from '../../domain/entities/StatementFile.js';

export interface RepositoryPort<T extends { id: string }> {
  save(entity: T): Promise<void>;
  findById(id: string): Promise<T | null>;
  findAll(filter?: (entity: T) => boolean): Promise<T[]>;
  delete(id: string): Promise<boolean>;
}

export interface LedgerStoragePort {
  projects: RepositoryPort<Project>;
  bankAccounts: RepositoryPort<BankAccount>;
  categories: RepositoryPort<Category>;
  statementFiles: RepositoryPort<StatementFile>;
  statementEntries: RepositoryPort<StatementEntry>;
  entrySplits: RepositoryPort<EntrySplit>;
}
