import cors from 'cors';
import express, { type Express, type Request } from 'express';
import multer from 'multer';
import {
  BankAccountCreateSchema,
  BankAccountFilterSchema,
  BankAccountUpdateSchema,
  CategoryCreateSchema,
  CategoryFilterSchema,
  CategoryUpdateSchema,
  EntrySplitCreateSchema,
  EntrySplitFilterSchema,
  EntrySplitUpdateSchema,
  ProjectCreateSchema,
  ProjectFilterSchema,
  ProjectUpdateSchema,
  StatementEntryCreateSchema,
  StatementEntryFilterSchema,
  StatementEntryUpdateSchema,
  StatementFileCreateSchema,
  StatementFileFilterSchema,
  StatementFileUpdateSchema,
} from '../../application/dto/LedgerDTO.js';
import { isProviderName, PROVIDER_NAMES, type ProviderName } from '../../application/ports/ExtractionProviderPort.js';
import type { UploadedStatementFile } from '../../application/ports/UploadValidatorPort.js';
import { BadRequestError } from '../../domain/errors/AppError.js';
import type { AppContainer } from '../bootstrap/AppContainer.js';
import { createErrorHandler, notFoundHandler } from './errorHandler.js';
import { asyncRoute, registerCrudRoutes } from './registerCrudRoutes.js';

const toUploadedFile = (file: Request['file']): UploadedStatementFile | undefined =>
  file && {
    originalName: file.originalname,
    mimeType: file.mimetype,
    size: file.size,
    read: async () => file.buffer,
  };

const queryFlag = (value: unknown, fallback: boolean): boolean => {
  if (typeof value !== 'string') {
    return fallback;
  }
  return value.toLowerCase() !== 'false';
};

export const createHttpApp = (container: AppContainer): Express => {
  const app = express();
  const router = express.Router();
  const { config } = container;

  // Memory storage; the validator re-checks the buffer once it is read.
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.upload.maxFileSizeMb * 1024 * 1024 },
  });

  const providerFrom = (req: Request): ProviderName => {
    const requested = req.query.llm_provider;
    if (requested === undefined) {
      return config.extraction.defaultProvider;
    }
    if (!isProviderName(requested)) {
      throw new BadRequestError(`Unsupported LLM provider. Choose one of: ${PROVIDER_NAMES.join(', ')}`, {
        llm_provider: String(requested),
      });
    }
    return requested;
  };

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  router.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: config.app.name,
      version: config.app.version,
      providers: Object.fromEntries(PROVIDER_NAMES.map((name) => [name, container.isProviderConfigured(name)])),
    });
  });

  router.get('/supported-formats', (_req, res) => {
    res.json({
      supported_formats: ['pdf'],
      max_file_size_mb: config.upload.maxFileSizeMb,
      parsing_methods: ['vision', 'text'],
      llm_providers: PROVIDER_NAMES,
      default_provider: config.extraction.defaultProvider,
    });
  });

  router.post(
    '/parse-statement',
    upload.single('file'),
    asyncRoute(async (req, res) => {
      const parser = container.createStatementParser(providerFrom(req));
      const result = await parser.parseStatement(toUploadedFile(req.file), queryFlag(req.query.use_vision, true));
      res.status(result.success ? 200 : 422).json(result);
    }),
  );

  router.post(
    '/statement-files/:id/parse',
    upload.single('file'),
    asyncRoute(async (req, res) => {
      const file = await container.statementFiles.get(req.params.id);
      const parser = container.createStatementParser(providerFrom(req));
      const parsed = await parser.parseStatement(toUploadedFile(req.file), queryFlag(req.query.use_vision, true));

      if (!parsed.success || !parsed.data) {
        res.status(422).json({ parsed, imported: 0, skipped: 0 });
        return;
      }

      const summary = await container.statementImport.importStatement(file.id, parsed.data);
      res.json({ parsed, imported: summary.imported, skipped: summary.skipped });
    }),
  );

  registerCrudRoutes(router, '/projects', {
    createSchema: ProjectCreateSchema,
    updateSchema: ProjectUpdateSchema,
    filterSchema: ProjectFilterSchema,
    create: (input) => container.projects.create(input),
    get: (id) => container.projects.get(id),
    list: (query, filter) => container.projects.list(query, filter),
    update: (id, input) => container.projects.update(id, input),
    remove: (id) => container.projects.delete(id),
  });

  registerCrudRoutes(router, '/bank-accounts', {
    createSchema: BankAccountCreateSchema,
    updateSchema: BankAccountUpdateSchema,
    filterSchema: BankAccountFilterSchema,
    create: (input) => container.bankAccounts.create(input),
    get: (id) => container.bankAccounts.get(id),
    list: (query, filter) => container.bankAccounts.list(query, filter),
    update: (id, input) => container.bankAccounts.update(id, input),
    remove: (id) => container.bankAccounts.delete(id),
  });

  registerCrudRoutes(router, '/categories', {
    createSchema: CategoryCreateSchema,
    updateSchema: CategoryUpdateSchema,
    filterSchema: CategoryFilterSchema,
    create: (input) => container.categories.create(input),
    get: (id) => container.categories.get(id),
    list: (query, filter) => container.categories.list(query, filter),
    update: (id, input) => container.categories.update(id, input),
    remove: (id) => container.categories.delete(id),
  });

  registerCrudRoutes(router, '/statement-files', {
    createSchema: StatementFileCreateSchema,
    updateSchema: StatementFileUpdateSchema,
    filterSchema: StatementFileFilterSchema,
    create: (input) => container.statementFiles.create(input),
    get: (id) => container.statementFiles.get(id),
    list: (query, filter) => container.statementFiles.list(query, filter),
    update: (id, input) => container.statementFiles.update(id, input),
    remove: (id) => container.statementFiles.delete(id),
  });

  registerCrudRoutes(router, '/statement-entries', {
    createSchema: StatementEntryCreateSchema,
    updateSchema: StatementEntryUpdateSchema,
    filterSchema: StatementEntryFilterSchema,
    create: (input) => container.statementEntries.create(input),
    get: (id) => container.statementEntries.get(id),
    list: (query, filter) => container.statementEntries.list(query, filter),
    update: (id, input) => container.statementEntries.update(id, input),
    remove: (id) => container.statementEntries.delete(id),
  });

  registerCrudRoutes(router, '/entry-splits', {
    createSchema: EntrySplitCreateSchema,
    updateSchema: EntrySplitUpdateSchema,
    filterSchema: EntrySplitFilterSchema,
    create: (input) => container.statementEntries.createSplit(input),
    get: (id) => container.statementEntries.getSplit(id),
    list: (query, filter) => container.statementEntries.listSplits(query, filter),
    update: (id, input) => container.statementEntries.updateSplit(id, input),
    remove: (id) => container.statementEntries.deleteSplit(id),
  });

  app.use('/api/v1', router);
  app.use('/api', notFoundHandler);
  app.use(createErrorHandler(config.upload.maxFileSizeMb));

  return app;
};
