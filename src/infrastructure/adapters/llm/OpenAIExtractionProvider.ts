import OpenAI from 'openai';
import type {
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import type { AppConfig } from '../../config/Config.js';
import { ModelExtractionProvider, type ModelRequest } from './ModelExtractionProvider.js';
import { notConfigured } from './providerErrors.js';

export type OpenAISender = (params: ChatCompletionCreateParamsNonStreaming) => Promise<string | null>;

export type OpenAISettings = AppConfig['openai'];

const OPENAI_GUIDANCE = `
Model guidance:
- Read every table row in order; multi-line descriptions belong to the row they start on.
- Keep numbers exactly as printed apart from removing currency symbols and separators.
- Respond with the JSON object only.
`;

const JSON_MODE_MODELS = ['gpt-4o', 'gpt-4.1'];

const isReasoningModel = (model: string): boolean => model.startsWith('gpt-5') || /^o\d/.test(model);

const supportsJsonMode = (model: string): boolean => JSON_MODE_MODELS.some((prefix) => model.startsWith(prefix));

const createSender = (settings: OpenAISettings): OpenAISender | null => {
  if (!settings.apiKey) {
    return null;
  }

  const client = new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseUrl,
    timeout: settings.timeoutMs,
    maxRetries: 0,
  });

  return async (params) => {
    const completion = await client.chat.completions.create(params);
    return completion.choices[0]?.message?.content ?? null;
  };
};

export class OpenAIExtractionProvider extends ModelExtractionProvider {
  readonly provider = 'openai';
  protected readonly guidance = OPENAI_GUIDANCE;
  private readonly sender: OpenAISender | null;

  constructor(
    private readonly settings: OpenAISettings,
    sender?: OpenAISender,
  ) {
    super();
    this.sender = sender ?? createSender(settings);
  }

  buildParams(request: ModelRequest): ChatCompletionCreateParamsNonStreaming {
    const { model } = this.settings;
    const userContent: ChatCompletionContentPart[] = [{ type: 'text', text: request.instruction }];

    for (const image of request.images) {
      userContent.push({ type: 'image_url', image_url: { url: `data:image/png;base64,${image}`, detail: 'high' } });
    }

    const params: ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.images.length > 0 ? userContent : request.instruction },
      ],
    };

    if (isReasoningModel(model)) {
      params.reasoning_effort = this.settings.reasoningEffort;
      params.max_completion_tokens = this.settings.maxTokens;
    } else {
      params.temperature = this.settings.temperature;
      params.max_tokens = this.settings.maxTokens;
    }

    if (supportsJsonMode(model)) {
      params.response_format = { type: 'json_object' };
    }

    return params;
  }

  protected async complete(request: ModelRequest): Promise<string> {
    if (!this.sender) {
      throw notConfigured(this.provider, 'OPENAI_API_KEY');
    }

    return (await this.sender(this.buildParams(request))) ?? '';
  }
}
