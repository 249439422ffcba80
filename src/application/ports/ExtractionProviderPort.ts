import type { StatementChunk } from '../../domain/entities/Statement.js';

export const PROVIDER_NAMES = ['openai', 'claude', 'gemini'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export const isProviderName = (value: unknown): value is ProviderName =>
  typeof value === 'string' && PROVIDER_NAMES.some((name) => name === value);

/**
 * One model backend. Each call performs exactly one model request and returns the response
 * already recovered into a record.
 */
export interface ExtractionProviderPort {
  readonly provider: ProviderName;
  extractFromText(text: string, continuationHint?: string): Promise<StatementChunk>;
  extractFromImages(images: string[], continuationHint?: string): Promise<StatementChunk>;
}
