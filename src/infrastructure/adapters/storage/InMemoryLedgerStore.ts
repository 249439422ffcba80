import type { BankAccount } from '../../../domain/entities/BankAccount.js';
import type { Category } from '../../../domain/entities/Category.js';
import type { Project } from '../../../domain/entities/Project.js';
import type { EntrySplit, StatementEntry } from '../../../domain/entities/StatementEntry.js';
import type { StatementFile } from '../../../domain/entities/StatementFile.js';
import type { LedgerStoragePort, RepositoryPort } from '../../../application/ports/LedgerStoragePort.js';

export class InMemoryRepository<T extends { id: string }> implements RepositoryPort<T> {
  private readonly records = new Map<string, T>();

  async save(entity: T): Promise<void> {
    this.records.set(entity.id, { ...entity });
  }

  async findById(id: string): Promise<T | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async findAll(filter?: (entity: T) => boolean): Promise<T[]> {
    const all = Array.from(this.records.values(), (record) => ({ ...record }));
    return filter ? all.filter(filter) : all;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}

// In-memory adapter, state lives for the life of the process.
export class InMemoryLedgerStore implements LedgerStoragePort {
  readonly projects = new InMemoryRepository<Project>();
  readonly bankAccounts = new InMemoryRepository<BankAccount>();
  readonly categories = new InMemoryRepository<Category>();
  readonly statementFiles = new InMemoryRepository<StatementFile>();
  readonly statementEntries = new InMemoryRepository<StatementEntry>();
  readonly entrySplits = new InMemoryRepository<EntrySplit>();
}
