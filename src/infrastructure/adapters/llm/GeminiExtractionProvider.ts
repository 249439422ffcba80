import { GoogleGenAI, type GenerateContentParameters, type Part } from '@google/genai';
import type { AppConfig } from '../../config/Config.js';
import { ModelExtractionProvider, type ModelRequest } from './ModelExtractionProvider.js';
import { notConfigured } from './providerErrors.js';

export type GeminiSender = (params: GenerateContentParameters) => Promise<string | undefined>;

export type GeminiSettings = AppConfig['gemini'];

const GEMINI_GUIDANCE = `
Model guidance:
- Treat each image as one statement page and read it top to bottom.
- Ignore headers, footers and page totals that repeat across pages.
- Return the JSON object only.
`;

const createSender = (settings: GeminiSettings): GeminiSender | null => {
  if (!settings.apiKey) {
    return null;
  }

  const ai = new GoogleGenAI({ apiKey: settings.apiKey, httpOptions: { timeout: settings.timeoutMs } });

  return async (params) => {
    const response = await ai.models.generateContent(params);
    return response.text;
  };
};

export class GeminiExtractionProvider extends ModelExtractionProvider {
  readonly provider = 'gemini';
  protected readonly guidance = GEMINI_GUIDANCE;
  private readonly sender: GeminiSender | null;

  constructor(
    private readonly settings: GeminiSettings,
    sender?: GeminiSender,
  ) {
    super();
    this.sender = sender ?? createSender(settings);
  }

  buildParams(request: ModelRequest): GenerateContentParameters {
    const parts: Part[] = [{ text: request.instruction }];
    for (const image of request.images) {
      parts.push({ inlineData: { mimeType: 'image/png', data: image } });
    }

    return {
      model: this.settings.model,
      contents: [{ role: 'user', parts }],
      config: {
        systemInstruction: request.system,
        temperature: this.settings.temperature,
        maxOutputTokens: this.settings.maxTokens,
        responseMimeType: 'application/json',
      },
    };
  }

  protected async complete(request: ModelRequest): Promise<string> {
    if (!this.sender) {
      throw notConfigured(this.provider, 'GEMINI_API_KEY');
    }

    return (await this.sender(this.buildParams(request))) ?? '';
  }
}
