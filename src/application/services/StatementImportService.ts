import { randomUUID } from 'node:crypto';
import type { Statement } from '../../domain/entities/Statement.js';
import type { StatementEntry } from '../../domain/entities/StatementEntry.js';
import type { StatementTransaction } from '../../domain/entities/Transaction.js';
import { NotFoundError } from '../../domain/errors/AppError.js';
import { transactionKey } from '../../domain/services/StatementChunkMerger.js';
import type { CategoryMatcherPort } from '../ports/CategoryMatcherPort.js';
import type { LedgerStoragePort } from '../ports/LedgerStoragePort.js';
import { systemClock, type Clock } from './LedgerSupport.js';

export interface ImportSummary {
  imported: number;
  skipped: number;
  entries: StatementEntry[];
}

/**
 * Stores the transactions of a parsed Statement as entries of an existing statement file.
 * Transactions already present in the file (same date, description and amount) are skipped.
 */
export class StatementImportService {
  constructor(
    private readonly storage: LedgerStoragePort,
    private readonly matcher: CategoryMatcherPort,
    private readonly clock: Clock = systemClock,
  ) {}

  async importStatement(statementFileId: string, statement: Statement): Promise<ImportSummary> {
    const file = await this.storage.statementFiles.findById(statementFileId);
    if (!file) {
      throw new NotFoundError(`Bank statement file with ID ${statementFileId} not found`, { statementFileId });
    }

    const categories = await this.storage.categories.findAll((category) => category.isActive);
    const existing = await this.storage.statementEntries.findAll((entry) => entry.statementFileId === statementFileId);
    const seen = new Set(existing.map((entry) => transactionKey(entry)));

    const entries: StatementEntry[] = [];
    let skipped = 0;

    for (const txn of statement.transactions) {
      const key = transactionKey(txn);
      if (seen.has(key)) {
        skipped++;
        continue;
      }
      seen.add(key);

      const entry = this.mapEntry(txn, file.id, file.bankAccountId);
      entry.categoryId = this.matcher.match(txn.description, categories, txn.category)?.id;

      await this.storage.statementEntries.save(entry);
      entries.push(entry);
    }

    console.log('📥 Statement imported', {
      statementFileId,
      bank: statement.bank_name,
      period: statement.statement_period,
      imported: entries.length,
      skipped,
      categorized: entries.filter((entry) => entry.categoryId !== undefined).length,
    });

    return { imported: entries.length, skipped, entries };
  }

  private mapEntry(txn: StatementTransaction, statementFileId: string, bankAccountId: string): StatementEntry {
    return {
      id: randomUUID(),
      statementFileId,
      bankAccountId,
      date: txn.date,
      description: txn.description,
      debitCredit: txn.type,
      amount: txn.amount,
      balance: txn.balance,
      createdAt: this.clock(),
    };
  }
}
