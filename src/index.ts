export * from './domain/entities/Statement.js';
export * from './domain/entities/Transaction.js';
export type { Project } from './domain/entities/Project.js';
export type { BankAccount } from './domain/entities/BankAccount.js';
export type { Category } from './domain/entities/Category.js';
export type { StatementFile } from './domain/entities/StatementFile.js';
export type { EntrySplit, StatementEntry } from './domain/entities/StatementEntry.js';
export * from './domain/errors/AppError.js';
export * from './domain/errors/ExtractionErrors.js';
export * from './domain/services/JsonRecovery.js';
export * from './domain/services/StatementNormalizer.js';
export * from './domain/services/StatementChunkMerger.js';
export * from './application/dto/StatementDTO.js';
export * from './application/ports/ExtractionProviderPort.js';
export type { DocumentProcessorPort } from './application/ports/DocumentProcessorPort.js';
export type { UploadedStatementFile, UploadValidatorPort } from './application/ports/UploadValidatorPort.js';
export { StatementExtractionEngine, DEFAULT_MAX_FOLLOW_UPS } from './application/services/StatementExtractionEngine.js';
export type { StatementExtractionEngineOptions } from './application/services/StatementExtractionEngine.js';
export { StatementParsingService } from './application/services/StatementParsingService.js';
export type { ParsedResponse } from './application/services/StatementParsingService.js';
export { createExtractionProvider } from './infrastructure/adapters/llm/ExtractionProviderFactory.js';
export { OpenAIExtractionProvider } from './infrastructure/adapters/llm/OpenAIExtractionProvider.js';
export { ClaudeExtractionProvider } from './infrastructure/adapters/llm/ClaudeExtractionProvider.js';
export { GeminiExtractionProvider } from './infrastructure/adapters/llm/GeminiExtractionProvider.js';
export { PdfDocumentProcessor } from './infrastructure/adapters/pdf/PdfDocumentProcessor.js';
export { PdfUploadValidator } from './infrastructure/adapters/validation/PdfUploadValidator.js';
export { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
export { createHttpApp } from './infrastructure/http/createHttpApp.js';
export { loadConfig } from './infrastructure/config/Config.js';
export type { AppConfig } from './infrastructure/config/Config.js';
