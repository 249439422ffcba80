import type { StatementChunk } from '../../../domain/entities/Statement.js';
import { recoverJson } from '../../../domain/services/JsonRecovery.js';
import type { ExtractionProviderPort, ProviderName } from '../../../application/ports/ExtractionProviderPort.js';
import { buildImageInstruction, buildSystemPrompt, buildTextInstruction } from './StatementPrompt.js';
import { transportFailure } from './providerErrors.js';

export interface ModelRequest {
  system: string;
  instruction: string;
  images: string[]; // base64 PNG, no data: prefix
}

/**
 * Shared request flow for chat-style model backends. Subclasses translate a ModelRequest into
 * their SDK call and return the raw response text.
 */
export abstract class ModelExtractionProvider implements ExtractionProviderPort {
  abstract readonly provider: ProviderName;

  protected abstract readonly guidance: string;

  protected abstract complete(request: ModelRequest): Promise<string>;

  async extractFromText(text: string, continuationHint?: string): Promise<StatementChunk> {
    return this.request({
      system: buildSystemPrompt(this.guidance),
      instruction: buildTextInstruction(text, continuationHint),
      images: [],
    });
  }

  async extractFromImages(images: string[], continuationHint?: string): Promise<StatementChunk> {
    return this.request({
      system: buildSystemPrompt(this.guidance),
      instruction: buildImageInstruction(continuationHint),
      images,
    });
  }

  private async request(request: ModelRequest): Promise<StatementChunk> {
    let content: string;
    try {
      content = await this.complete(request);
    } catch (error) {
      throw transportFailure(this.provider, error);
    }

    const { record, strategy } = recoverJson(content);
    if (strategy !== 'direct') {
      console.log(`🩹 ${this.provider} response recovered`, { strategy, length: content.length });
    }

    return record;
  }
}
