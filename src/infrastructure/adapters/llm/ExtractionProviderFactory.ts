import type { ExtractionProviderPort, ProviderName } from '../../../application/ports/ExtractionProviderPort.js';
import type { AppConfig } from '../../config/Config.js';
import { ClaudeExtractionProvider } from './ClaudeExtractionProvider.js';
import { GeminiExtractionProvider } from './GeminiExtractionProvider.js';
import { OpenAIExtractionProvider } from './OpenAIExtractionProvider.js';

export const createExtractionProvider = (name: ProviderName, config: AppConfig): ExtractionProviderPort => {
  switch (name) {
    case 'openai':
      return new OpenAIExtractionProvider(config.openai);
    case 'claude':
      return new ClaudeExtractionProvider(config.claude);
    case 'gemini':
      return new GeminiExtractionProvider(config.gemini);
  }
};
