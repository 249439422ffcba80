import type { CategoryMatcherPort } from '../../application/ports/CategoryMatcherPort.js';
import type { DocumentProcessorPort } from '../../application/ports/DocumentProcessorPort.js';
import type { ExtractionProviderPort, ProviderName } from '../../application/ports/ExtractionProviderPort.js';
import type { LedgerStoragePort } from '../../application/ports/LedgerStoragePort.js';
import type { UploadValidatorPort } from '../../application/ports/UploadValidatorPort.js';
import { BankAccountService } from '../../application/services/BankAccountService.js';
import { CategoryService } from '../../application/services/CategoryService.js';
import { systemClock, type Clock } from '../../application/services/LedgerSupport.js';
import { ProjectService } from '../../application/services/ProjectService.js';
import { StatementEntryService } from '../../application/services/StatementEntryService.js';
import { StatementExtractionEngine } from '../../application/services/StatementExtractionEngine.js';
import { StatementFileService } from '../../application/services/StatementFileService.js';
import { StatementImportService } from '../../application/services/StatementImportService.js';
import { StatementParsingService } from '../../application/services/StatementParsingService.js';
import { RegexCategoryMatcher } from '../adapters/categorizer/RegexCategoryMatcher.js';
import { createExtractionProvider } from '../adapters/llm/ExtractionProviderFactory.js';
import { PdfDocumentProcessor } from '../adapters/pdf/PdfDocumentProcessor.js';
import { InMemoryLedgerStore } from '../adapters/storage/InMemoryLedgerStore.js';
import { PdfUploadValidator } from '../adapters/validation/PdfUploadValidator.js';
import { loadConfig, type AppConfig } from '../config/Config.js';

export type ProviderFactory = (name: ProviderName, config: AppConfig) => ExtractionProviderPort;

export interface AppContainerOverrides {
  config?: AppConfig;
  storage?: LedgerStoragePort;
  documents?: DocumentProcessorPort;
  uploadValidator?: UploadValidatorPort;
  categoryMatcher?: CategoryMatcherPort;
  providerFactory?: ProviderFactory;
  clock?: Clock;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly storage: LedgerStoragePort;
  readonly documents: DocumentProcessorPort;
  readonly uploadValidator: UploadValidatorPort;
  readonly categoryMatcher: CategoryMatcherPort;
  private readonly providerFactory: ProviderFactory;

  readonly projects: ProjectService;
  readonly bankAccounts: BankAccountService;
  readonly categories: CategoryService;
  readonly statementFiles: StatementFileService;
  readonly statementEntries: StatementEntryService;
  readonly statementImport: StatementImportService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    const clock = overrides.clock ?? systemClock;

    this.storage = overrides.storage ?? new InMemoryLedgerStore();
    this.documents =
      overrides.documents ?? new PdfDocumentProcessor({ renderScale: this.config.extraction.renderScale });
    this.uploadValidator =
      overrides.uploadValidator ?? new PdfUploadValidator({ maxFileSizeMb: this.config.upload.maxFileSizeMb });
    this.categoryMatcher = overrides.categoryMatcher ?? new RegexCategoryMatcher();
    this.providerFactory = overrides.providerFactory ?? createExtractionProvider;

    this.projects = new ProjectService(this.storage, clock);
    this.bankAccounts = new BankAccountService(this.storage, clock);
    this.categories = new CategoryService(this.storage, clock);
    this.statementFiles = new StatementFileService(this.storage, clock);
    this.statementEntries = new StatementEntryService(this.storage, clock);
    this.statementImport = new StatementImportService(this.storage, this.categoryMatcher, clock);
  }

  /**
   * Builds a parser with its own adapter and engine, so concurrent requests share no state.
   */
  createStatementParser(provider: ProviderName = this.config.extraction.defaultProvider): StatementParsingService {
    const { maxFollowUps, imageConcurrency, zeroBalanceIsAbsent } = this.config.extraction;
    const engine = new StatementExtractionEngine(this.providerFactory(provider, this.config), {
      maxFollowUps,
      imageConcurrency,
      normalize: { zeroBalanceIsAbsent },
    });

    return new StatementParsingService(this.uploadValidator, this.documents, engine);
  }

  isProviderConfigured(provider: ProviderName): boolean {
    return this.config[provider].apiKey !== '';
  }
}
