import { describe, expect, it, vi } from 'vitest';
import type { DocumentProcessorPort } from '../../../src/application/ports/DocumentProcessorPort.js';
import type { ExtractionProviderPort, ProviderName } from '../../../src/application/ports/ExtractionProviderPort.js';
import type { StatementChunk } from '../../../src/domain/entities/Statement.js';
import { AppContainer, type ProviderFactory } from '../../../src/infrastructure/bootstrap/AppContainer.js';
import { loadConfig } from '../../../src/infrastructure/config/Config.js';
import { createTickingClock } from '../../support/ledgerFixtures.js';

const CHUNK: StatementChunk = {
  account_holder: 'Jane Doe',
  bank_name: 'Test Bank',
  account_number: '987654321',
  statement_period: { start_date: '2024-02-01', end_date: '2024-02-29' },
  opening_balance: 250,
  closing_balance: 250,
  transactions: [],
};

class FixedProvider implements ExtractionProviderPort {
  constructor(readonly provider: ProviderName) {}

  async extractFromText(): Promise<StatementChunk> {
    return { ...CHUNK };
  }

  async extractFromImages(): Promise<StatementChunk> {
    return {
      ...CHUNK,
      transactions: [{ date: '2024-02-03', description: 'Refund', amount: 25, balance: 0, type: 'credit' }],
    };
  }
}

const createContainer = () => {
  const providerFactory = vi.fn<ProviderFactory>((name) => new FixedProvider(name));
  const documents: DocumentProcessorPort = {
    extractText: vi.fn(async () => 'STATEMENT TEXT'),
    convertToImages: vi.fn(async () => ['page-1']),
  };
  const container = new AppContainer({
    config: loadConfig({ OPENAI_API_KEY: 'test-secret', STATEMENT_ZERO_BALANCE_ABSENT: 'true' }),
    documents,
    providerFactory,
    clock: createTickingClock(),
  });

  return { container, providerFactory };
};

const upload = {
  originalName: 'statement.pdf',
  mimeType: 'application/pdf',
  size: 16,
  read: async () => Buffer.from('%PDF-1.7 content'),
};

describe('AppContainer', () => {
  it('reports which providers have credentials', () => {
    const { container } = createContainer();

    expect(container.isProviderConfigured('openai')).toBe(true);
    expect(container.isProviderConfigured('claude')).toBe(false);
    expect(container.isProviderConfigured('gemini')).toBe(false);
  });

  it('builds a parser for the requested provider with the configured options', async () => {
    const { container, providerFactory } = createContainer();

    const response = await container.createStatementParser('gemini').parseStatement(upload, true);

    expect(providerFactory).toHaveBeenCalledWith('gemini', container.config);
    expect(response.success).toBe(true);
    expect(response.data?.account_number).toBe('*****4321');
    expect(response.data?.transactions).toEqual([
      { date: '2024-02-03', description: 'Refund', amount: 25, type: 'credit' },
    ]);
  });

  it('uses the default provider when none is named', async () => {
    const { container, providerFactory } = createContainer();

    await container.createStatementParser().parseStatement(upload, false);

    expect(providerFactory).toHaveBeenCalledWith('openai', container.config);
  });

  it('wires the ledger services to one store', async () => {
    const { container } = createContainer();

    const project = await container.projects.create({
      name: 'Riverside Towers',
      developerName: 'North Build',
      investorName: 'Harbor Capital',
      createdBy: 'tester',
    });

    await expect(container.storage.projects.findById(project.id)).resolves.toMatchObject({
      createdAt: '2024-01-01T00:00:00.000Z',
    });
  });
});
