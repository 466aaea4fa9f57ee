import type { StoreBackend } from '../types/notification';

export type SummarizerProvider = 'gemini' | 'heuristic';

export interface AppConfig {
  port: number;
  store: {
    backend: StoreBackend;
  };
  csv: {
    dataDir: string;
    indiaFile: string;
    usaFile: string;
    optionLimit: number;
  };
  mongo: {
    uri: string;
    database: string;
    optionLimit: number;
    connectTimeoutMs: number;
  };
  summarizer: {
    provider: SummarizerProvider;
    apiKey?: string;
    model: string;
    baseUrl: string;
    timeoutMs: number;
    maxInputChars: number;
  };
  security: {
    allowedOrigins: string[];
    maxRequestSize: string;
  };
}

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const backendFromEnv = (value: string | undefined, fallback: StoreBackend): StoreBackend => {
  if (!value) {
    return fallback;
  }

  const normalized = value.toLowerCase();
  if (normalized === 'csv' || normalized === 'file') {
    return 'csv';
  }
  if (normalized === 'mongo' || normalized === 'mongodb') {
    return 'mongo';
  }

  return fallback;
};

const providerFromEnv = (value: string | undefined, fallback: SummarizerProvider): SummarizerProvider => {
  if (!value) {
    return fallback;
  }

  const normalized = value.toLowerCase();
  if (normalized === 'gemini' || normalized === 'heuristic') {
    return normalized;
  }

  return fallback;
};

const listFromEnv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) {
    return fallback;
  }
  const items = value.split(',').map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
};

/**
 * Build the configuration from an environment map. Exposed so tests and the
 * CLI can derive a config without touching `process.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: numberFromEnv(env.PORT, 5213),
    store: {
      backend: backendFromEnv(env.STORE_BACKEND, 'csv')
    },
    csv: {
      dataDir: env.DATA_DIR ?? './data',
      indiaFile: env.INDIA_CSV_FILE ?? 'IND_data.csv',
      usaFile: env.USA_CSV_FILE ?? 'USA_data.csv',
      optionLimit: numberFromEnv(env.CSV_OPTION_LIMIT, 100)
    },
    mongo: {
      uri: env.MONGODB_URI ?? 'mongodb://localhost:27017/',
      database: env.MONGODB_DATABASE ?? 'notification_summarizer',
      optionLimit: numberFromEnv(env.MONGODB_OPTION_LIMIT, 1000),
      connectTimeoutMs: numberFromEnv(env.MONGODB_CONNECT_TIMEOUT_MS, 5000)
    },
    summarizer: {
      provider: providerFromEnv(env.SUMMARIZER_PROVIDER, 'gemini'),
      apiKey: env.GOOGLE_API_KEY || undefined,
      model: env.GEMINI_MODEL ?? 'gemini-2.0-flash-exp',
      baseUrl: env.GEMINI_BASE_URL ?? 'https://generativelanguage.googleapis.com',
      timeoutMs: numberFromEnv(env.SUMMARIZER_TIMEOUT_MS, 30000),
      maxInputChars: numberFromEnv(env.SUMMARIZER_MAX_INPUT_CHARS, 4000)
    },
    security: {
      allowedOrigins: listFromEnv(env.ALLOWED_ORIGINS, ['*']),
      maxRequestSize: env.MAX_REQUEST_SIZE ?? '1mb'
    }
  };
}
