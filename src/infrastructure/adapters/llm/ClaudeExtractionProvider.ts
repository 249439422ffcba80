import Anthropic from '@anthropic-ai/sdk';
import type {
  ImageBlockParam,
  MessageCreateParamsNonStreaming,
  TextBlockParam,
} from '@anthropic-ai/sdk/resources/messages';
import type { AppConfig } from '../../config/Config.js';
import { ModelExtractionProvider, type ModelRequest } from './ModelExtractionProvider.js';
import { notConfigured } from './providerErrors.js';

export type ClaudeSender = (params: MessageCreateParamsNonStreaming) => Promise<string>;

export type ClaudeSettings = AppConfig['claude'];

const CLAUDE_GUIDANCE = `
Model guidance:
- Work through ambiguous rows carefully and use the surrounding rows to infer missing values.
- Check the day and month order of every date against the statement period.
- For tables that span columns, parse row by row before checking balances.
- Do not wrap the JSON in prose or code fences.
`;

const createSender = (settings: ClaudeSettings): ClaudeSender | null => {
  if (!settings.apiKey) {
    return null;
  }

  const client = new Anthropic({ apiKey: settings.apiKey, timeout: settings.timeoutMs, maxRetries: 0 });

  return async (params) => {
    const message = await client.messages.create(params);
    return message.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('');
  };
};

export class ClaudeExtractionProvider extends ModelExtractionProvider {
  readonly provider = 'claude';
  protected readonly guidance = CLAUDE_GUIDANCE;
  private readonly sender: ClaudeSender | null;

  constructor(
    private readonly settings: ClaudeSettings,
    sender?: ClaudeSender,
  ) {
    super();
    this.sender = sender ?? createSender(settings);
  }

  buildParams(request: ModelRequest): MessageCreateParamsNonStreaming {
    const content: Array<TextBlockParam | ImageBlockParam> = request.images.map((image): ImageBlockParam => ({
      type: 'image',
      source: { type: 'base64', media_type: 'image/png', data: image },
    }));
    content.push({ type: 'text', text: request.instruction });

    return {
      model: this.settings.model,
      max_tokens: this.settings.maxTokens,
      temperature: this.settings.temperature,
      system: request.system,
      messages: [{ role: 'user', content }],
    };
  }

  protected async complete(request: ModelRequest): Promise<string> {
    if (!this.sender) {
      throw notConfigured(this.provider, 'ANTHROPIC_API_KEY');
    }

    return this.sender(this.buildParams(request));
  }
}
