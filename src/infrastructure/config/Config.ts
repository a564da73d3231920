export type LlmProviderName = 'gemini' | 'openai' | 'openrouter' | 'ollama';

export interface LlmProviderConfig {
  name: LlmProviderName;
  model: string;
  apiKey: string;
  baseURL?: string;
  maxAttempts: number;
  enabled: boolean;
}

export interface AppConfig {
  llm: {
    timeoutMs: number;
    retryBackoffMs: number;
    providers: LlmProviderConfig[];
  };
  server: {
    port: number;
    corsOrigins: string[];
  };
  app: {
    baseCurrency: string;
  };
}

const DEFAULT_PROVIDER_ORDER: LlmProviderName[] = ['gemini', 'openai', 'openrouter', 'ollama'];

const parseInteger = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseProviderOrder = (value: string | undefined): LlmProviderName[] => {
  if (!value) {
    return DEFAULT_PROVIDER_ORDER;
  }

  const names = value
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter((name): name is LlmProviderName => DEFAULT_PROVIDER_ORDER.some((known) => known === name));

  return names.length > 0 ? names : DEFAULT_PROVIDER_ORDER;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const providers: Record<LlmProviderName, LlmProviderConfig> = {
    gemini: {
      name: 'gemini',
      model: env.GEMINI_MODEL ?? 'gemini-2.5-flash',
      apiKey: env.GEMINI_API_KEY ?? '',
      baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai/',
      maxAttempts: 1,
      enabled: Boolean(env.GEMINI_API_KEY),
    },
    openai: {
      name: 'openai',
      model: env.OPENAI_MODEL ?? 'gpt-4o-mini',
      apiKey: env.OPENAI_API_KEY ?? '',
      maxAttempts: 1,
      enabled: Boolean(env.OPENAI_API_KEY),
    },
    openrouter: {
      name: 'openrouter',
      model: env.OPENROUTER_MODEL ?? 'openai/gpt-4o-mini',
      apiKey: env.OPENROUTER_API_KEY ?? '',
      baseURL: 'https://openrouter.ai/api/v1',
      maxAttempts: 1,
      enabled: Boolean(env.OPENROUTER_API_KEY),
    },
    ollama: {
      name: 'ollama',
      model: env.OLLAMA_MODEL ?? 'llama3.1:8b',
      // Ollama ignores the key, but the SDK refuses to start without one.
      apiKey: 'ollama',
      baseURL: `${(env.OLLAMA_BASE_URL ?? 'http://localhost:11434').replace(/\/+$/, '')}/v1`,
      maxAttempts: 2,
      enabled: Boolean(env.OLLAMA_BASE_URL) || env.OLLAMA_ENABLED === 'true',
    },
  };

  return {
    llm: {
      timeoutMs: parseInteger(env.LLM_TIMEOUT_MS, 25_000),
      retryBackoffMs: parseInteger(env.LLM_RETRY_BACKOFF_MS, 1_000),
      providers: parseProviderOrder(env.LLM_PROVIDER_ORDER).map((name) => providers[name]),
    },
    server: {
      port: parseInteger(env.PORT, 4000),
      corsOrigins: (env.CORS_ORIGINS ?? 'http://localhost,http://localhost:3000')
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean),
    },
    app: {
      baseCurrency: env.APP_BASE_CURRENCY ?? 'USD',
    },
  };
};
