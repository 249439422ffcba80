import { performance } from 'node:perf_hooks';
import type { Statement } from '../../domain/entities/Statement.js';
import { AppError } from '../../domain/errors/AppError.js';
import type { ParsedResponseDTO } from '../dto/StatementDTO.js';
import type { DocumentProcessorPort } from '../ports/DocumentProcessorPort.js';
import type { UploadedStatementFile, UploadValidatorPort } from '../ports/UploadValidatorPort.js';
import type { StatementExtractionEngine } from './StatementExtractionEngine.js';

export type ParsedResponse = Readonly<ParsedResponseDTO>;

const buildResponse = (startedAt: number, outcome: { data: Statement } | { error: string }): ParsedResponse =>
  Object.freeze({
    success: 'data' in outcome,
    data: 'data' in outcome ? outcome.data : null,
    error: 'error' in outcome ? outcome.error : null,
    processing_time: (performance.now() - startedAt) / 1000,
  });

/**
 * Entry point for one uploaded statement. Every failure is returned as an unsuccessful
 * ParsedResponse; nothing is thrown to the caller.
 */
export class StatementParsingService {
  constructor(
    private readonly validator: UploadValidatorPort,
    private readonly documents: DocumentProcessorPort,
    private readonly engine: StatementExtractionEngine,
  ) {}

  async parseStatement(file: UploadedStatementFile | undefined, useVision = true): Promise<ParsedResponse> {
    const startedAt = performance.now();

    try {
      this.validator.validateUpload(file);
      const content = await file.read();
      this.validator.validateContent(content);

      const statement = useVision ? await this.parseWithVision(content) : await this.parseWithText(content);
      const response = buildResponse(startedAt, { data: statement });

      console.log('✅ Statement parsed', {
        file: file?.originalName,
        mode: useVision ? 'vision' : 'text',
        transactions: statement.transactions.length,
        seconds: Number(response.processing_time.toFixed(3)),
      });

      return response;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      const response = buildResponse(startedAt, { error: message });

      console.error('❌ Statement parsing failed', {
        file: file?.originalName,
        code: error instanceof AppError ? error.code : 'UNEXPECTED_ERROR',
        error: message,
      });

      return response;
    }
  }

  private async parseWithVision(content: Buffer): Promise<Statement> {
    const images = await this.documents.convertToImages(content);
    return this.engine.extractFromImages(images);
  }

  private async parseWithText(content: Buffer): Promise<Statement> {
    const text = await this.documents.extractText(content);
    return this.engine.extractFromText(text);
  }
}
