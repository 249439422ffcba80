export interface UploadedStatementFile {
  originalName: string;
  mimeType: string;
  size?: number;
  read(): Promise<Buffer>;
}

export interface UploadValidatorPort {
  validateUpload(file: UploadedStatementFile | undefined): asserts file is UploadedStatementFile;
  validateContent(content: Buffer): void;
}
