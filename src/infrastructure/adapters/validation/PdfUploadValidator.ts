import type { UploadedStatementFile, UploadValidatorPort } from '../../../application/ports/UploadValidatorPort.js';
import { ValidationError } from '../../../domain/errors/ExtractionErrors.js';

const PDF_MIME_TYPE = 'application/pdf';
const PDF_MAGIC = Buffer.from('%PDF');

export interface PdfUploadValidatorOptions {
  maxFileSizeMb: number;
}

export class PdfUploadValidator implements UploadValidatorPort {
  private readonly maxBytes: number;

  constructor(private readonly options: PdfUploadValidatorOptions) {
    this.maxBytes = options.maxFileSizeMb * 1024 * 1024;
  }

  validateUpload(file: UploadedStatementFile | undefined): asserts file is UploadedStatementFile {
    if (!file) {
      throw new ValidationError('No file uploaded');
    }

    if (!file.originalName.toLowerCase().endsWith('.pdf') || file.mimeType !== PDF_MIME_TYPE) {
      throw new ValidationError('Invalid file type. Only PDF files are allowed.', {
        details: { fileName: file.originalName, mimeType: file.mimeType },
      });
    }

    if (file.size !== undefined && file.size > this.maxBytes) {
      throw this.tooLarge(file.size);
    }
  }

  validateContent(content: Buffer): void {
    // Size is not always known before the body is read.
    if (content.length > this.maxBytes) {
      throw this.tooLarge(content.length);
    }

    if (content.length < PDF_MAGIC.length || !content.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC)) {
      throw new ValidationError('Invalid PDF file content.');
    }
  }

  private tooLarge(size: number): ValidationError {
    return new ValidationError(`File too large. Maximum size is ${this.options.maxFileSizeMb}MB.`, {
      statusCode: 413,
      details: { size, maxBytes: this.maxBytes },
    });
  }
}
