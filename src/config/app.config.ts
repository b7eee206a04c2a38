import 'dotenv/config';
import { RetryOptions } from '../utils/retry.util';

export type LlmProvider = 'openai' | 'grok';

export interface AppConfig {
  readonly llm: {
    readonly provider: LlmProvider;
    readonly apiKey: string;
    readonly model: string;
    readonly temperature: number;
    readonly maxTokens: number;
    readonly timeoutMs: number;
    readonly baseUrl?: string;
  };
  /** Completion settings for mitigation plans, which are longer and less deterministic than scores. */
  readonly mitigation: {
    readonly temperature: number;
    readonly maxTokens: number;
  };
  readonly weather: {
    readonly baseUrl: string;
    readonly timeoutMs: number;
    readonly forecastHorizonDays: number;
  };
  readonly data: {
    readonly referencePath: string;
    readonly newsFeedPath: string;
  };
  readonly cache: {
    readonly assessmentTtlMs: number;
    readonly newsTtlMs: number;
  };
  readonly lookup: {
    readonly fuzzyThreshold: number;
  };
  readonly retry: RetryOptions;
  readonly server: {
    readonly port: number;
  };
}

const GROK_BASE_URL = 'https://api.x.ai/v1';

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: 'gpt-4o-mini',
  grok: 'grok-3'
};

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return value;
}

function floatFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseFloat(raw);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be a number`);
  }
  return value;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const providerRaw = (env.LLM_PROVIDER || 'openai').toLowerCase();
  if (providerRaw !== 'openai' && providerRaw !== 'grok') {
    throw new Error('LLM_PROVIDER must be either "openai" or "grok"');
  }
  const provider: LlmProvider = providerRaw;

  const apiKey = provider === 'grok' ? env.XAI_API_KEY : env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error(
      provider === 'grok'
        ? 'XAI_API_KEY environment variable is required when LLM_PROVIDER is grok'
        : 'OPENAI_API_KEY environment variable is required'
    );
  }

  const temperature = floatFromEnv(env, 'LLM_TEMPERATURE', 0.3);
  if (temperature < 0 || temperature > 2) {
    throw new Error('LLM_TEMPERATURE must be between 0 and 2');
  }

  const mitigationTemperature = floatFromEnv(env, 'MITIGATION_TEMPERATURE', 0.7);
  if (mitigationTemperature < 0 || mitigationTemperature > 2) {
    throw new Error('MITIGATION_TEMPERATURE must be between 0 and 2');
  }

  const fuzzyThreshold = floatFromEnv(env, 'FUZZY_MATCH_THRESHOLD', 0.3);
  if (fuzzyThreshold < 0 || fuzzyThreshold > 1) {
    throw new Error('FUZZY_MATCH_THRESHOLD must be between 0 and 1');
  }

  const config: AppConfig = {
    llm: {
      provider,
      apiKey,
      model: env.LLM_MODEL || DEFAULT_MODELS[provider],
      temperature,
      maxTokens: intFromEnv(env, 'LLM_MAX_TOKENS', 1000),
      timeoutMs: intFromEnv(env, 'LLM_TIMEOUT_MS', 60_000),
      baseUrl: provider === 'grok' ? GROK_BASE_URL : undefined
    },
    mitigation: {
      temperature: mitigationTemperature,
      maxTokens: intFromEnv(env, 'MITIGATION_MAX_TOKENS', 2000)
    },
    weather: {
      baseUrl: env.WEATHER_API_URL || 'https://api.open-meteo.com/v1/forecast',
      timeoutMs: intFromEnv(env, 'WEATHER_TIMEOUT_MS', 30_000),
      forecastHorizonDays: 16
    },
    data: {
      referencePath: env.REFERENCE_DATA_PATH || './data/reference-data.json',
      newsFeedPath: env.NEWS_FEED_PATH || './data/news-feed.json'
    },
    cache: {
      assessmentTtlMs: intFromEnv(env, 'ASSESSMENT_CACHE_TTL_MS', 300_000),
      newsTtlMs: intFromEnv(env, 'NEWS_CACHE_TTL_MS', 1_800_000)
    },
    lookup: {
      fuzzyThreshold
    },
    retry: {
      maxRetries: intFromEnv(env, 'RETRY_MAX_ATTEMPTS', 3),
      baseDelay: intFromEnv(env, 'RETRY_BASE_DELAY_MS', 1000),
      maxDelay: intFromEnv(env, 'RETRY_MAX_DELAY_MS', 10_000),
      jitterFactor: floatFromEnv(env, 'RETRY_JITTER_FACTOR', 0.1)
    },
    server: {
      port: intFromEnv(env, 'API_PORT', 3001)
    }
  };

  return deepFreeze(config);
}
