export interface DocumentProcessorPort {
  extractText(content: Buffer): Promise<string>;
  /** Renders each page to a base64-encoded PNG, in page order. */
  convertToImages(content: Buffer): Promise<string[]>;
}
