import { emptyStatementChunk, type Statement, type StatementChunk } from '../../domain/entities/Statement.js';
import { hashContent } from '../../domain/services/ContentHasher.js';
import {
  hasMorePages,
  mergeChunks,
  nextPageHint,
  stripContinuationFields,
} from '../../domain/services/StatementChunkMerger.js';
import { normalizeStatement, type NormalizeOptions } from '../../domain/services/StatementNormalizer.js';
import type { ExtractionProviderPort } from '../ports/ExtractionProviderPort.js';

export const DEFAULT_MAX_FOLLOW_UPS = 3;

export interface StatementExtractionEngineOptions {
  maxFollowUps?: number;
  imageConcurrency?: number;
  normalize?: NormalizeOptions;
}

interface PageImage {
  pageNumber: number;
  image: string;
}

/**
 * Drives one extraction job against a provider: follows continuation hints in text mode,
 * calls once per distinct page in image mode, and folds the chunks into one Statement.
 */
export class StatementExtractionEngine {
  private readonly maxFollowUps: number;
  private readonly imageConcurrency: number;

  constructor(
    private readonly provider: ExtractionProviderPort,
    private readonly options: StatementExtractionEngineOptions = {},
  ) {
    this.maxFollowUps = Math.max(0, options.maxFollowUps ?? DEFAULT_MAX_FOLLOW_UPS);
    this.imageConcurrency = Math.max(1, options.imageConcurrency ?? 1);
  }

  async extractFromText(text: string): Promise<Statement> {
    let merged = await this.provider.extractFromText(text, '');
    let followUps = 0;

    while (followUps < this.maxFollowUps && hasMorePages(merged)) {
      const hint = nextPageHint(merged);
      const next = await this.provider.extractFromText(text, hint);
      merged = mergeChunks(merged, next);
      followUps++;
    }

    if (hasMorePages(merged)) {
      console.warn(`⚠️ ${this.provider.provider} still reported more pages after ${followUps} follow-ups, stopping`);
    }

    console.log('📄 Text extraction finished', {
      provider: this.provider.provider,
      calls: followUps + 1,
      transactions: Array.isArray(merged.transactions) ? merged.transactions.length : 0,
    });

    return this.finish(merged);
  }

  async extractFromImages(images: string[]): Promise<Statement> {
    const pages = this.uniquePages(images);

    if (pages.length === 0) {
      console.log('📭 No page images to extract, returning empty statement');
      return this.finish(emptyStatementChunk());
    }

    const chunks: StatementChunk[] = [];
    for (let offset = 0; offset < pages.length; offset += this.imageConcurrency) {
      const batch = pages.slice(offset, offset + this.imageConcurrency);
      const results = await Promise.all(
        batch.map((page) => this.provider.extractFromImages([page.image], `page=${page.pageNumber}`)),
      );
      chunks.push(...results);
    }

    const merged = chunks.slice(1).reduce(mergeChunks, chunks[0]);

    console.log('🖼️ Image extraction finished', {
      provider: this.provider.provider,
      pagesSubmitted: images.length,
      pagesExtracted: pages.length,
      transactions: Array.isArray(merged.transactions) ? merged.transactions.length : 0,
    });

    return this.finish(merged);
  }

  private uniquePages(images: string[]): PageImage[] {
    const seen = new Set<string>();
    const pages: PageImage[] = [];

    images.forEach((image, index) => {
      const hash = hashContent(image);
      if (seen.has(hash)) {
        return;
      }
      seen.add(hash);
      pages.push({ pageNumber: index + 1, image });
    });

    return pages;
  }

  private finish(chunk: StatementChunk): Statement {
    return normalizeStatement(stripContinuationFields(chunk), this.options.normalize);
  }
}
