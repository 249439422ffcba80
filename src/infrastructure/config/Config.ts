import { isProviderName, type ProviderName } from '../../application/ports/ExtractionProviderPort.js';

export type ReasoningEffort = 'low' | 'medium' | 'high';

export interface ModelSettings {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface AppConfig {
  app: {
    name: string;
    version: string;
    port: number;
  };
  openai: ModelSettings & {
    apiKey: string;
    model: string;
    baseUrl?: string;
    reasoningEffort: ReasoningEffort;
  };
  claude: ModelSettings & {
    apiKey: string;
    model: string;
  };
  gemini: ModelSettings & {
    apiKey: string;
    model: string;
  };
  upload: {
    maxFileSizeMb: number;
  };
  extraction: {
    defaultProvider: ProviderName;
    maxFollowUps: number;
    imageConcurrency: number;
    renderScale: number;
    zeroBalanceIsAbsent: boolean;
  };
}

const numberFrom = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const reasoningEffortFrom = (raw: string | undefined): ReasoningEffort => {
  switch (raw) {
    case 'medium':
    case 'high':
      return raw;
    default:
      return 'low';
  }
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const defaultProvider = env.DEFAULT_LLM_PROVIDER;
  const shared: ModelSettings = {
    maxTokens: numberFrom(env.LLM_MAX_TOKENS, 4000),
    temperature: numberFrom(env.LLM_TEMPERATURE, 0.1),
    timeoutMs: numberFrom(env.LLM_TIMEOUT_MS, 120_000),
  };

  return {
    app: {
      name: 'Statement Ledger Service',
      version: '0.1.0',
      port: numberFrom(env.PORT, 4000),
    },
    openai: {
      ...shared,
      apiKey: env.OPENAI_API_KEY ?? '',
      model: env.OPENAI_MODEL ?? 'gpt-4o',
      baseUrl: env.OPENAI_BASE_URL,
      reasoningEffort: reasoningEffortFrom(env.LLM_REASONING_EFFORT),
    },
    claude: {
      ...shared,
      apiKey: env.ANTHROPIC_API_KEY ?? '',
      model: env.CLAUDE_MODEL ?? 'claude-3-5-sonnet-20241022',
    },
    gemini: {
      ...shared,
      apiKey: env.GEMINI_API_KEY ?? '',
      model: env.GEMINI_MODEL ?? 'gemini-2.0-flash',
    },
    upload: {
      maxFileSizeMb: numberFrom(env.MAX_FILE_SIZE_MB, 10),
    },
    extraction: {
      defaultProvider: isProviderName(defaultProvider) ? defaultProvider : 'openai',
      maxFollowUps: numberFrom(env.EXTRACTION_MAX_FOLLOW_UPS, 3),
      imageConcurrency: numberFrom(env.VISION_CONCURRENCY, 1),
      renderScale: numberFrom(env.PDF_RENDER_SCALE, 1.5),
      zeroBalanceIsAbsent: env.STATEMENT_ZERO_BALANCE_ABSENT === 'true',
    },
  };
};
