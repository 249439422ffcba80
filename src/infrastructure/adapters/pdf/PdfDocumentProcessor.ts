import { PDFParse } from 'pdf-parse';
import type { DocumentProcessorPort } from '../../../application/ports/DocumentProcessorPort.js';

export interface PdfDocumentProcessorOptions {
  renderScale?: number;
}

const withParser = async <T>(content: Buffer, task: (parser: PDFParse) => Promise<T>): Promise<T> => {
  // pdf.js takes ownership of the bytes it is given, so hand it a copy.
  const parser = new PDFParse({ data: new Uint8Array(content) });
  try {
    return await task(parser);
  } finally {
    await parser.destroy();
  }
};

export class PdfDocumentProcessor implements DocumentProcessorPort {
  private readonly renderScale: number;

  constructor(options: PdfDocumentProcessorOptions = {}) {
    this.renderScale = options.renderScale ?? 1.5;
  }

  async extractText(content: Buffer): Promise<string> {
    try {
      const result = await withParser(content, (parser) => parser.getText());
      const text = result.text || '';

      console.log('📄 PDF text extracted', {
        pages: result.total,
        textLength: text.length,
      });

      return text;
    } catch (error) {
      throw new Error(`Failed to extract text from PDF: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async convertToImages(content: Buffer): Promise<string[]> {
    try {
      const result = await withParser(content, (parser) =>
        parser.getScreenshot({ scale: this.renderScale, imageDataUrl: false, imageBuffer: true }),
      );
      const images = result.pages.map((page) => Buffer.from(page.data).toString('base64'));

      console.log('🖼️ PDF pages rendered', { pages: images.length, scale: this.renderScale });

      return images;
    } catch (error) {
      throw new Error(`Failed to convert PDF to images: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
